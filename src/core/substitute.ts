// src/core/substitute.ts

import type {OptionValue, ResolvedNames, ScaffoldOpts} from '../schema';

const FALLBACK_NAME = 'project';

/**
 * Brace placeholders and the resolved name each one maps to.
 */
const BRACE_VARS: Readonly<Record<string, keyof ResolvedNames>> = {
    project_name: 'project',
    ProjectName: 'project',
    package_name: 'package',
    PackageName: 'package',
    package: 'package',
};

// One alternation so every placeholder is handled in a single left-to-right pass.
const BRACE_PATTERN = new RegExp(
    `\\{\\{\\s*(${Object.keys(BRACE_VARS).join('|')})\\s*\\}\\}`,
    'g',
);

// Mirrors Python's string.Template: $$, $identifier, ${identifier}.
const DOLLAR_PATTERN = /\$(?:(\$)|([_a-zA-Z][_a-zA-Z0-9]*)|\{([_a-zA-Z][_a-zA-Z0-9]*)\})/g;

function pick(value: OptionValue): string | undefined {
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Derive an importable package identifier from a project name.
 *
 * "my-cool-project" -> "my_cool_project"
 */
export function toPackageName(project: string): string {
    return project.replace(/-/g, '_');
}

/**
 * Resolve the project and package names with their fallbacks:
 * - project: `project` -> `project_name` -> `name` -> "project"
 * - package: `package` -> `package_name` -> derived from the project
 */
export function resolveNames(opts: ScaffoldOpts): ResolvedNames {
    const project =
        pick(opts.project) ?? pick(opts.project_name) ?? pick(opts.name) ?? FALLBACK_NAME;
    const pkg = pick(opts.package) ?? pick(opts.package_name) ?? toPackageName(project);
    return {project, package: pkg};
}

/**
 * Replace `{{ project_name }}`, `{{ package_name }}`, `{{ ProjectName }}`,
 * `{{ PackageName }}` and `{{ package }}` (inner whitespace optional).
 * Anything else between braces is left as is.
 */
export function substituteBraceVars(text: string, opts: ScaffoldOpts): string {
    const names = resolveNames(opts);
    return text.replace(BRACE_PATTERN, (_match, key: string) => names[BRACE_VARS[key]]);
}

/**
 * Variables visible to `${var}` templates: every scalar option plus the
 * resolved names.
 */
export function templateVars(opts: ScaffoldOpts): Record<string, string> {
    const vars: Record<string, string> = {};
    for (const [key, value] of Object.entries(opts)) {
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            vars[key] = String(value);
        }
    }

    const names = resolveNames(opts);
    vars.project = names.project;
    vars.package = names.package;
    vars.name = pick(opts.name) ?? names.project;
    return vars;
}

/**
 * Host template syntax with "safe" semantics: `$$` becomes `$`, known
 * `$name`/`${name}` are replaced and unknown ones stay untouched.
 */
export function renderTemplate(text: string, vars: Readonly<Record<string, string>>): string {
    return text.replace(
        DOLLAR_PATTERN,
        (match, escaped: string | undefined, bare: string | undefined, braced: string | undefined) => {
            if (escaped) return '$';
            const key = bare ?? braced;
            if (key === undefined || !Object.prototype.hasOwnProperty.call(vars, key)) {
                return match;
            }
            return vars[key];
        },
    );
}
