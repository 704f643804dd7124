// src/util/package-info.ts

import fs from 'fs';
import path from 'path';
import {defaultLogger} from './logger';

const PACKAGE_JSON = path.resolve(__dirname, '..', '..', 'package.json');

/**
 * Version of this package as published, or "unknown" when package.json
 * cannot be read (e.g. a bundled copy without it).
 */
export function clickstartVersion(packageJsonPath: string = PACKAGE_JSON): string {
   try {
      const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
      if (
         typeof parsed === 'object' &&
         parsed !== null &&
         'version' in parsed &&
         typeof parsed.version === 'string' &&
         parsed.version
      ) {
         return parsed.version;
      }
      defaultLogger.debug(`No version field in ${packageJsonPath}`);
   } catch (err) {
      defaultLogger.debug(`Could not read ${packageJsonPath}`, err);
   }
   return 'unknown';
}
