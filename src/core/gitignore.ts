// src/core/gitignore.ts

import type {FileNode, ScaffoldOpts} from '../schema';
import {file, resolveLeaf} from './structure';
import {resolveNames} from './substitute';

export const GITIGNORE = '.gitignore';
export const VERSION_FILE_COMMENT = '# Generated by setuptools_scm';

export function versionFileEntry(opts: ScaffoldOpts): string {
    return `src/${resolveNames(opts).package}/_version.py`;
}

/**
 * Append the setuptools_scm version file to ignore-file text unless a line
 * already lists it. Text that already has it comes back unchanged.
 */
export function appendVersionFileEntry(text: string | null, opts: ScaffoldOpts): string {
    const current = text ?? '';
    const entry = versionFileEntry(opts);

    if (current.split(/\r?\n/).some((line) => line.trim() === entry)) {
        return current;
    }

    const eol = current.includes('\r\n') ? '\r\n' : '\n';
    const base = current && !current.endsWith('\n') ? current + eol : current;
    return `${base}${VERSION_FILE_COMMENT}${eol}${entry}${eol}`;
}

export function modifyGitignore(node: FileNode, opts: ScaffoldOpts): FileNode {
    const [contents, policy] = resolveLeaf(node, opts);
    return file(appendVersionFileEntry(contents, opts), policy);
}
