// test/gitignore.spec.ts

import {describe, it, expect} from 'vitest';
import {appendVersionFileEntry, modifyGitignore, versionFileEntry} from '../src/core/gitignore';
import {file, reifyContent} from '../src/core/structure';

const opts = {project: 'my-cool-project', package: 'my_cool_package'};
const TAIL = '# Generated by setuptools_scm\nsrc/my_cool_package/_version.py\n';

describe('appendVersionFileEntry', () => {
    it('appends the comment and the entry', () => {
        expect(appendVersionFileEntry('*.pyc\n', opts)).toBe(`*.pyc\n${TAIL}`);
    });

    it('adds a newline first when the text lacks one', () => {
        expect(appendVersionFileEntry('*.pyc', opts)).toBe(`*.pyc\n${TAIL}`);
    });

    it('treats missing content as empty', () => {
        expect(appendVersionFileEntry(null, opts)).toBe(TAIL);
        expect(appendVersionFileEntry('', opts)).toBe(TAIL);
    });

    it('does nothing when the entry is already listed', () => {
        const text = '*.pyc\n  src/my_cool_package/_version.py  \n';
        expect(appendVersionFileEntry(text, opts)).toBe(text);
    });

    it('is idempotent', () => {
        const once = appendVersionFileEntry('*.pyc\n', opts);
        expect(appendVersionFileEntry(once, opts)).toBe(once);
    });

    it('follows CRLF line endings', () => {
        expect(appendVersionFileEntry('*.pyc\r\n', opts)).toBe(
            '*.pyc\r\n# Generated by setuptools_scm\r\nsrc/my_cool_package/_version.py\r\n',
        );
    });
});

describe('versionFileEntry', () => {
    it('derives the package when only the project is known', () => {
        expect(versionFileEntry({project: 'a-b'})).toBe('src/a_b/_version.py');
    });
});

describe('modifyGitignore', () => {
    it('keeps the write policy and patches the content', () => {
        const patched = modifyGitignore(file('dist/\n', 'skip-on-update'), opts);

        expect(patched.policy).toBe('skip-on-update');
        expect(reifyContent(patched.content, opts)).toBe(`dist/\n${TAIL}`);
    });
});
