// src/host/apply-structure.ts

import fs from "fs";
import path from "path";
import type { FileNode, ScaffoldOpts, Structure } from "../schema";
import { reifyContent } from "../core/structure";
import {
  ensureDirSync,
  resolveProjectPath,
  writeFileSafeSync,
} from "../util/fs-utils";
import type { Logger } from "../util/logger";
import { defaultLogger } from "../util/logger";

export interface WriteOptions {
  /**
   * Optional logger; defaults to defaultLogger.child('[write]').
   */
  logger?: Logger;
}

export interface WriteResult {
  /** Files that did not exist before, project-root relative, POSIX. */
  created: string[];
  /** Existing files replaced because their policy allowed it. */
  updated: string[];
  /** Files left alone: kept by policy, or leaves without content. */
  skipped: string[];
}

/**
 * Decide whether a file already on disk may be replaced.
 */
export function mayReplace(node: FileNode, opts: ScaffoldOpts): boolean {
  switch (node.policy) {
    case "overwrite":
      return true;
    case "no-overwrite":
      return false;
    case "skip-on-update":
      return opts.update !== true;
  }
}

/**
 * Flush a structure under `rootDir`, honoring each leaf's write policy
 * against what is already on disk.
 */
export function writeStructure(
  structure: Structure,
  opts: ScaffoldOpts,
  rootDir: string,
  options: WriteOptions = {},
): WriteResult {
  const logger = options.logger ?? defaultLogger.child("[write]");
  const rootAbs = ensureDirSync(rootDir);
  const result: WriteResult = { created: [], updated: [], skipped: [] };

  function handleFile(rel: string, node: FileNode): void {
    const absFile = resolveProjectPath(rootAbs, rel);
    const exists = fs.existsSync(absFile);

    if (exists && !mayReplace(node, opts)) {
      result.skipped.push(rel);
      logger.debug(`kept ${rel} (${node.policy})`);
      return;
    }

    const content = reifyContent(node.content, opts);
    if (content === null) {
      result.skipped.push(rel);
      logger.debug(`no content for ${rel}; not written`);
      return;
    }

    writeFileSafeSync(absFile, content);

    if (exists) {
      result.updated.push(rel);
      logger.info(`updated ${rel}`);
    } else {
      result.created.push(rel);
      logger.info(`created ${rel}`);
    }
  }

  function walk(tree: Structure, prefix: string): void {
    for (const [key, node] of Object.entries(tree)) {
      const rel = prefix ? `${prefix}/${key}` : key;
      if (node.type === "dir") {
        // empty directories are part of the project too
        ensureDirSync(resolveProjectPath(rootAbs, rel));
        walk(node.children, rel);
      } else {
        handleFile(rel, node);
      }
    }
  }

  walk(structure, "");
  logger.debug(
    `wrote ${path.basename(rootAbs)}: ${result.created.length} created, ` +
      `${result.updated.length} updated, ${result.skipped.length} skipped`,
  );
  return result;
}
