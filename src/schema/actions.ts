// src/schema/actions.ts

import type {ScaffoldOpts} from './options';
import type {Structure} from './structure';

export interface ActionParams {
   structure: Structure;
   opts: ScaffoldOpts;
}

/**
 * A single named step of the host pipeline.
 *
 * Steps are total and synchronous; a thrown error aborts the whole run.
 */
export interface Action {
   name: string;
   run(structure: Structure, opts: ScaffoldOpts): ActionParams;
}

export interface RegisterPosition {
   /** Insert right after the action with this name. */
   after?: string;
   /** Insert right before the action with this name. */
   before?: string;
}

/**
 * Contract between the host and an extension.
 */
export interface Extension {
   readonly name: string;
   /** Command-line flag the host uses to enable the extension. */
   readonly flag: string;
   activate(actions: readonly Action[]): Action[];
}
