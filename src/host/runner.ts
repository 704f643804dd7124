// src/host/runner.ts

import path from 'path';
import type {Action, Extension, ScaffoldOpts, Structure} from '../schema';
import {runActions} from '../core/actions';
import {bundledTemplates, type TemplateLoader} from '../core/templates';
import {isNonEmptyDirSync} from '../util/fs-utils';
import type {Logger} from '../util/logger';
import {defaultLogger} from '../util/logger';
import {writeStructure, type WriteResult} from './apply-structure';
import {defaultActions, defaultOptions, type ProjectInput} from './define-structure';

export interface CreateProjectInput extends ProjectInput {
    /** Directory the project folder is created in. Defaults to cwd. */
    outputDir?: string;
}

export interface CreateProjectOptions {
    extensions?: readonly Extension[];

    /** Templates for the host's own files. */
    templates?: TemplateLoader;

    /**
     * Optional logger override.
     */
    logger?: Logger;
}

export interface CreateProjectResult extends WriteResult {
    /** Absolute project directory. */
    root: string;
    opts: ScaffoldOpts;
    structure: Structure;
}

/**
 * Activate every extension over the host's default actions, in order.
 */
export function buildActions(
    extensions: readonly Extension[] = [],
    templates: TemplateLoader = bundledTemplates(),
): Action[] {
    return extensions.reduce<Action[]>((acc, ext) => ext.activate(acc), defaultActions(templates));
}

/**
 * Generate a project once: run the pipeline, then write the tree.
 *
 * An existing non-empty directory is only written into with `update` or
 * `force`.
 */
export function createProject(
    input: CreateProjectInput,
    options: CreateProjectOptions = {},
): CreateProjectResult {
    const logger = options.logger ?? defaultLogger.child('[host]');
    const opts = defaultOptions(input);
    const root = path.resolve(input.outputDir ?? process.cwd(), input.project.trim());

    if (isNonEmptyDirSync(root) && !opts.update && !opts.force) {
        throw new Error(
            `Directory "${root}" already exists and is not empty. Use --update or --force.`,
        );
    }

    const actions = buildActions(options.extensions, options.templates);
    logger.debug(`actions: ${actions.map((a) => a.name).join(', ')}`);

    const result = runActions(actions, {}, opts, logger.child('[actions]'));
    const written = writeStructure(result.structure, result.opts, root, {
        logger: logger.child('[write]'),
    });

    return {...written, root, opts: result.opts, structure: result.structure};
}
