// src/schema/config.ts

/**
 * Packaging layout of the generated project.
 *
 * - `pyproject`: manifest-only project; the host's `setup.cfg`/`setup.py`
 *   are dropped and replaced by the bundled `pyproject.toml`.
 * - `setup.cfg`: legacy layout kept for backward compatibility; the host's
 *   `setup.cfg` is patched in place and no Makefile or pre-commit config is
 *   added.
 */
export type ProjectLayout = 'pyproject' | 'setup.cfg';

/**
 * Shape of `clickstart.config.*`. Every field is optional.
 */
export interface ClickstartConfig {
   layout?: ProjectLayout;

   /**
    * Runtime requirements written to `install_requires`.
    * Default: click>=8.1, pytest>=8, pytest-cov>=5.
    */
   requirements?: string[];

   /**
    * Minimum supported Python version (inclusive). Default: "3.12".
    */
   pythonMinimum?: string;

   /**
    * Upper Python bound (exclusive). Default: "3.13".
    */
   pythonBelow?: string;
}

/**
 * Config with defaults applied; what the extension actually runs with.
 */
export interface ClickstartSettings {
   layout: ProjectLayout;
   requirements: readonly string[];
   pythonMinimum: string;
   pythonBelow: string;
}
