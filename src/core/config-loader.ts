// src/core/config-loader.ts

import fs from 'fs';
import path from 'path';
import os from 'os';
import crypto from 'crypto';
import { transform } from 'esbuild';

import {
   CONFIG_BASENAME,
   type ClickstartConfig,
   type ClickstartSettings,
   type ProjectLayout,
} from '../schema';
import { defaultLogger, type Logger } from '../util/logger';
import { ensureDirSync } from '../util/fs-utils';

export const DEFAULT_SETTINGS: ClickstartSettings = {
   layout: 'pyproject',
   requirements: ['click>=8.1', 'pytest>=8', 'pytest-cov>=5'],
   pythonMinimum: '3.12',
   pythonBelow: '3.13',
};

const CONFIG_EXTENSIONS = ['.ts', '.mts', '.js', '.cjs', '.json'];

export interface LoadClickstartConfigOptions {
   /**
    * Explicit config file path (absolute or relative to cwd).
    * When given, the file must exist.
    */
   configPath?: string;

   logger?: Logger;
}

export interface LoadClickstartConfigResult {
   config: ClickstartConfig;
   /** Absolute path of the file that was loaded, if any. */
   configPath: string | null;
}

/**
 * Load `clickstart.config.*` from `cwd` (or `options.configPath`).
 *
 * No config file is not an error: the result is an empty config.
 */
export async function loadClickstartConfig(
   cwd: string,
   options: LoadClickstartConfigOptions = {},
): Promise<LoadClickstartConfigResult> {
   const logger = options.logger ?? defaultLogger.child('[config]');
   const absCwd = path.resolve(cwd);

   let configPath: string | null;
   if (options.configPath) {
      configPath = path.resolve(absCwd, options.configPath);
      if (!fs.existsSync(configPath)) {
         throw new Error(`Config file not found: ${configPath}`);
      }
   } else {
      configPath = findConfigPath(absCwd);
   }

   if (!configPath) {
      logger.debug(`No ${CONFIG_BASENAME}.* in ${absCwd}; using defaults.`);
      return { config: {}, configPath: null };
   }

   logger.debug(`Loading config from ${configPath}`);
   const raw = await importConfig(configPath);
   return { config: validateConfig(raw, configPath), configPath };
}

export function findConfigPath(dir: string): string | null {
   for (const ext of CONFIG_EXTENSIONS) {
      const full = path.join(dir, `${CONFIG_BASENAME}${ext}`);
      if (fs.existsSync(full)) {
         return full;
      }
   }
   return null;
}

/**
 * Fill the defaults in.
 */
export function resolveSettings(config: ClickstartConfig = {}): ClickstartSettings {
   return {
      layout: config.layout ?? DEFAULT_SETTINGS.layout,
      requirements: config.requirements ?? DEFAULT_SETTINGS.requirements,
      pythonMinimum: config.pythonMinimum ?? DEFAULT_SETTINGS.pythonMinimum,
      pythonBelow: config.pythonBelow ?? DEFAULT_SETTINGS.pythonBelow,
   };
}

function isRecord(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLayout(value: unknown): value is ProjectLayout {
   return value === 'pyproject' || value === 'setup.cfg';
}

function isStringArray(value: unknown): value is string[] {
   return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/**
 * Check an imported value against ClickstartConfig, field by field.
 */
export function validateConfig(raw: unknown, source = 'config'): ClickstartConfig {
   if (!isRecord(raw)) {
      throw new Error(`${source}: config must export an object.`);
   }

   const config: ClickstartConfig = {};
   const record = raw;

   if (record.layout !== undefined) {
      if (!isLayout(record.layout)) {
         throw new Error(`${source}: "layout" must be "pyproject" or "setup.cfg".`);
      }
      config.layout = record.layout;
   }

   if (record.requirements !== undefined) {
      if (!isStringArray(record.requirements)) {
         throw new Error(`${source}: "requirements" must be an array of strings.`);
      }
      config.requirements = record.requirements;
   }

   for (const key of ['pythonMinimum', 'pythonBelow'] as const) {
      const value = record[key];
      if (value === undefined) continue;
      if (typeof value !== 'string' || !/^\d+(\.\d+)*$/.test(value)) {
         throw new Error(`${source}: "${key}" must be a version string like "3.12".`);
      }
      config[key] = value;
   }

   return config;
}

/**
 * Load the raw export of a config file.
 * - .json is parsed.
 * - .ts/.mts is transpiled with esbuild to CommonJS and required.
 * - .js/.cjs is required directly.
 */
async function importConfig(configPath: string): Promise<unknown> {
   const ext = path.extname(configPath).toLowerCase();

   if (ext === '.json') {
      return JSON.parse(fs.readFileSync(configPath, 'utf8'));
   }

   if (ext === '.ts' || ext === '.mts') {
      return importTsConfig(configPath);
   }

   return unwrapDefault(require(configPath));
}

/**
 * Transpile a TS config with esbuild and require the compiled file.
 * The temp file is keyed on (path + mtime) so edits invalidate it.
 */
async function importTsConfig(configPath: string): Promise<unknown> {
   const source = fs.readFileSync(configPath, 'utf8');
   const stat = fs.statSync(configPath);

   const hash = crypto
      .createHash('sha1')
      .update(configPath)
      .update(String(stat.mtimeMs))
      .digest('hex');

   const tmpDir = ensureDirSync(path.join(os.tmpdir(), 'clickstart-config'));
   const tmpFile = path.join(tmpDir, `${hash}.cjs`);

   if (!fs.existsSync(tmpFile)) {
      const result = await transform(source, {
         loader: 'ts',
         format: 'cjs',
         target: 'node20',
         sourcemap: 'inline',
      });
      fs.writeFileSync(tmpFile, result.code, 'utf8');
   }

   return unwrapDefault(require(tmpFile));
}

function unwrapDefault(mod: unknown): unknown {
   if (typeof mod === 'object' && mod !== null && 'default' in mod && mod.default !== undefined) {
      return mod.default;
   }
   return mod;
}
