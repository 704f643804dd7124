// src/schema/structure.ts

import type {ScaffoldOpts} from './options';

/**
 * Per-leaf rule deciding what happens when something already exists at the
 * target path, both when merging trees and when flushing them to disk.
 *
 * - `overwrite`: always replace.
 * - `no-overwrite`: create only; an existing entry is never touched.
 * - `skip-on-update`: keep an existing entry on update runs
 *   (`opts.update === true`), replace it otherwise.
 */
export type WritePolicy = 'overwrite' | 'no-overwrite' | 'skip-on-update';

export type ContentProducer = (opts: ScaffoldOpts) => string | null;

export interface LiteralContent {
   kind: 'literal';
   text: string;
}

/**
 * Content that is only known once the run options are.
 */
export interface DeferredContent {
   kind: 'deferred';
   produce: ContentProducer;
}

/**
 * `null` marks a leaf that exists in the tree but has no content yet.
 */
export type LeafContent = LiteralContent | DeferredContent | null;

export interface FileNode {
   type: 'file';
   content: LeafContent;
   policy: WritePolicy;
}

export interface DirNode {
   type: 'dir';
   children: Structure;
}

export type TreeNode = FileNode | DirNode;

/**
 * A project tree keyed by path segment. Trees are treated as immutable
 * values: every operation returns a new tree.
 */
export type Structure = Readonly<Record<string, TreeNode>>;

/**
 * A `/`-separated relative path or its segments.
 */
export type TreePath = string | readonly string[];
