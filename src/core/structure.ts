// src/core/structure.ts

import {minimatch} from 'minimatch';
import type {
    ContentProducer,
    DirNode,
    FileNode,
    LeafContent,
    ScaffoldOpts,
    Structure,
    TreeNode,
    TreePath,
    WritePolicy,
} from '../schema';
import {toPosixPath} from '../util/fs-utils';
import {renderTemplate, templateVars} from './substitute';

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export function literal(text: string): LeafContent {
    return {kind: 'literal', text};
}

export function deferred(produce: ContentProducer): LeafContent {
    return {kind: 'deferred', produce};
}

/**
 * Deferred content rendered from a `${var}` template once options are known.
 */
export function template(source: string): LeafContent {
    return deferred((opts) => renderTemplate(source, templateVars(opts)));
}

export function file(content: LeafContent | string, policy: WritePolicy = 'overwrite'): FileNode {
    return {
        type: 'file',
        content: typeof content === 'string' ? literal(content) : content,
        policy,
    };
}

export function dir(children: Structure): DirNode {
    return {type: 'dir', children};
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function splitPath(target: TreePath): string[] {
    const parts = typeof target === 'string' ? toPosixPath(target).split('/') : [...target];
    return parts.filter((p) => p !== '' && p !== '.');
}

export function getNode(tree: Structure, target: TreePath): TreeNode | undefined {
    const [head, ...rest] = splitPath(target);
    if (head === undefined) return undefined;

    const node = tree[head];
    if (!node || rest.length === 0) return node;
    return node.type === 'dir' ? getNode(node.children, rest) : undefined;
}

export function getFile(tree: Structure, target: TreePath): FileNode | undefined {
    const node = getNode(tree, target);
    return node?.type === 'file' ? node : undefined;
}

/**
 * Return a copy of `tree` with `node` placed at `target`, creating
 * intermediate directories as needed.
 */
export function setNode(tree: Structure, target: TreePath, node: TreeNode): Structure {
    const [head, ...rest] = splitPath(target);
    if (head === undefined) {
        throw new Error('Cannot set a node at an empty path.');
    }

    if (rest.length === 0) {
        return {...tree, [head]: node};
    }

    const current = tree[head];
    const children = current?.type === 'dir' ? current.children : {};
    return {...tree, [head]: dir(setNode(children, rest, node))};
}

/**
 * Every file in the tree with its POSIX path, in key order.
 */
export function listFiles(tree: Structure, prefix = ''): Array<[string, FileNode]> {
    const out: Array<[string, FileNode]> = [];
    for (const [key, node] of Object.entries(tree)) {
        const rel = prefix ? `${prefix}/${key}` : key;
        if (node.type === 'file') {
            out.push([rel, node]);
        } else {
            out.push(...listFiles(node.children, rel));
        }
    }
    return out;
}

// ---------------------------------------------------------------------------
// Merge / reject
// ---------------------------------------------------------------------------

function keepsExisting(policy: WritePolicy, opts: ScaffoldOpts): boolean {
    switch (policy) {
        case 'no-overwrite':
            return true;
        case 'skip-on-update':
            return opts.update === true;
        case 'overwrite':
            return false;
    }
}

function mergeNode(existing: TreeNode, addition: TreeNode, opts: ScaffoldOpts): TreeNode {
    if (existing.type === 'dir' && addition.type === 'dir') {
        return dir(merge(existing.children, addition.children, opts));
    }
    if (addition.type === 'file' && keepsExisting(addition.policy, opts)) {
        return existing;
    }
    return addition;
}

/**
 * Overlay `additions` onto `tree`.
 *
 * Directories merge by key union. A file landing on an existing entry is
 * governed by its own write policy.
 */
export function merge(tree: Structure, additions: Structure, opts: ScaffoldOpts = {}): Structure {
    const result: Record<string, TreeNode> = {...tree};
    for (const [key, addition] of Object.entries(additions)) {
        const existing = result[key];
        result[key] = existing ? mergeNode(existing, addition, opts) : addition;
    }
    return result;
}

/**
 * Remove the node at `target`. A missing path leaves the tree as is;
 * directories emptied by the removal are kept.
 */
export function reject(tree: Structure, target: TreePath): Structure {
    const [head, ...rest] = splitPath(target);
    if (head === undefined || !Object.prototype.hasOwnProperty.call(tree, head)) {
        return tree;
    }

    if (rest.length === 0) {
        const {[head]: _removed, ...remaining} = tree;
        return remaining;
    }

    const node = tree[head];
    if (node.type !== 'dir') return tree;

    const children = reject(node.children, rest);
    return children === node.children ? tree : {...tree, [head]: dir(children)};
}

/**
 * Remove every file whose path matches the glob.
 */
export function rejectMatching(tree: Structure, pattern: string): Structure {
    return listFiles(tree)
        .filter(([rel]) => minimatch(rel, pattern, {dot: true}))
        .reduce((acc, [rel]) => reject(acc, rel), tree);
}

// ---------------------------------------------------------------------------
// Content
// ---------------------------------------------------------------------------

/**
 * Materialize leaf content for the given options.
 *
 * A producer must hand back a string (or null); anything else is a bug in
 * the producer and is reported as-is.
 */
export function reifyContent(content: LeafContent, opts: ScaffoldOpts): string | null {
    if (content === null) return null;
    if (content.kind === 'literal') return content.text;

    const value: unknown = content.produce(opts);
    if (value === null || typeof value === 'string') {
        return value;
    }
    throw new TypeError(
        `Content producer returned ${typeof value}; expected a string or null.`,
    );
}

/**
 * Resolve a leaf into its concrete text and its write policy.
 */
export function resolveLeaf(node: FileNode, opts: ScaffoldOpts): [string | null, WritePolicy] {
    return [reifyContent(node.content, opts), node.policy];
}
