// src/schema/options.ts

export type OptionValue =
   | string
   | number
   | boolean
   | null
   | undefined
   | readonly string[];

/**
 * Options populated by the host for a single generation run.
 *
 * The extension only reads from it. Unknown keys are carried along untouched.
 */
export interface ScaffoldOpts {
   /** Canonical project (distribution) name, hyphens allowed. */
   readonly project?: string;

   /** Canonical importable package identifier. */
   readonly package?: string;

   /** Fallback for `project` used by some hosts and template configs. */
   readonly project_name?: string;

   /** Fallback for `package`. */
   readonly package_name?: string;

   /** Last-resort fallback for the project name. */
   readonly name?: string;

   /**
    * True when regenerating on top of an existing project.
    * Drives the `skip-on-update` write policy.
    */
   readonly update?: boolean;

   /** True when the host was asked to overwrite an existing directory. */
   readonly force?: boolean;

   readonly [key: string]: OptionValue;
}

/**
 * Names resolved from the options with all fallbacks applied.
 */
export interface ResolvedNames {
   project: string;
   package: string;
}
