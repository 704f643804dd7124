// src/core/actions.ts

import type {Action, ActionParams, RegisterPosition, ScaffoldOpts, Structure} from '../schema';
import {defaultLogger, type Logger} from '../util/logger';

/**
 * Name of the host action that lays down the default project tree.
 * Extensions register after it unless told otherwise.
 */
export const DEFINE_STRUCTURE = 'define_structure';

function indexOfAction(actions: readonly Action[], name: string): number {
    return actions.findIndex((a) => a.name === name);
}

/**
 * Return a new action list with `action` inserted relative to a named one.
 *
 * - `{after}` / `{before}`: the anchor must exist.
 * - neither: after `define_structure`, or at the end when the host has none.
 */
export function registerAction(
    actions: readonly Action[],
    action: Action,
    position: RegisterPosition = {},
): Action[] {
    if (indexOfAction(actions, action.name) !== -1) {
        throw new Error(`Action "${action.name}" is already registered.`);
    }

    const anchor = position.before ?? position.after;
    let index: number;

    if (anchor === undefined) {
        const defined = indexOfAction(actions, DEFINE_STRUCTURE);
        index = defined === -1 ? actions.length : defined + 1;
    } else {
        const found = indexOfAction(actions, anchor);
        if (found === -1) {
            throw new Error(`Cannot register "${action.name}": no action named "${anchor}".`);
        }
        index = position.before !== undefined ? found : found + 1;
    }

    return [...actions.slice(0, index), action, ...actions.slice(index)];
}

/**
 * Thread a tree and its options through every action, in order. The first
 * error stops the run.
 */
export function runActions(
    actions: readonly Action[],
    structure: Structure,
    opts: ScaffoldOpts,
    logger: Logger = defaultLogger.child('[actions]'),
): ActionParams {
    return actions.reduce<ActionParams>(
        (params, action) => {
            logger.debug(`running ${action.name}`);
            return action.run(params.structure, params.opts);
        },
        {structure, opts},
    );
}
