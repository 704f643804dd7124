// src/core/templates.ts

import fs from 'fs';
import path from 'path';

/**
 * Returns the raw text of a logical template name.
 */
export type TemplateLoader = (name: string) => string;

/**
 * Bundled templates live in `<package root>/templates`, which is two levels
 * up from both `src/core` and `dist/core`.
 */
export const TEMPLATES_DIR = path.resolve(__dirname, '..', '..', 'templates');

export function templatePath(name: string, templatesDir: string = TEMPLATES_DIR): string {
    return path.join(templatesDir, `${name}.template`);
}

/**
 * Loader over a template directory. Names may contain `/` to reach
 * subdirectories (e.g. "host/setup.cfg").
 */
export function bundledTemplates(templatesDir: string = TEMPLATES_DIR): TemplateLoader {
    return (name: string) => {
        const filePath = templatePath(name, templatesDir);
        if (!fs.existsSync(filePath)) {
            throw new Error(`Template "${name}" not found. Expected "${filePath}".`);
        }
        return fs.readFileSync(filePath, 'utf8');
    };
}

/**
 * Loader over an in-memory map; handy for hosts that ship their own set.
 */
export function inlineTemplates(templates: Readonly<Record<string, string>>): TemplateLoader {
    return (name: string) => {
        if (!Object.prototype.hasOwnProperty.call(templates, name)) {
            throw new Error(`Template "${name}" not found.`);
        }
        return templates[name];
    };
}
