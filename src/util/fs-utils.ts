// src/util/fs-utils.ts

import fs from 'fs';
import path from 'path';

/**
 * Convert any path to a POSIX-style path with forward slashes.
 */
export function toPosixPath(p: string): string {
   return p.replace(/\\/g, '/');
}

/**
 * Ensure a directory exists (like mkdir -p).
 * Returns the absolute path of the directory.
 */
export function ensureDirSync(dirPath: string): string {
   if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
   }
   return path.resolve(dirPath);
}

/**
 * Write a UTF-8 file, creating parent directories if needed.
 */
export function writeFileSafeSync(filePath: string, contents: string): void {
   ensureDirSync(path.dirname(filePath));
   fs.writeFileSync(filePath, contents, 'utf8');
}

/**
 * Resolve an absolute path from projectRoot + relative path,
 * and assert it stays within the project root.
 *
 * Throws if the resolved path escapes the project root.
 */
export function resolveProjectPath(projectRoot: string, relPath: string): string {
   const absRoot = path.resolve(projectRoot);
   const absTarget = path.resolve(absRoot, relPath);

   const rootWithSep = absRoot.endsWith(path.sep) ? absRoot : absRoot + path.sep;
   if (!absTarget.startsWith(rootWithSep) && absTarget !== absRoot) {
      throw new Error(
         `Attempted to resolve path outside project root: ` +
         `root="${absRoot}", target="${absTarget}"`,
      );
   }

   return absTarget;
}

/**
 * Directory exists and has at least one entry.
 */
export function isNonEmptyDirSync(dirPath: string): boolean {
   return fs.existsSync(dirPath) && fs.readdirSync(dirPath).length > 0;
}
