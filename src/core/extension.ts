// src/core/extension.ts

import type {
    Action,
    ActionParams,
    ClickstartConfig,
    ClickstartSettings,
    Extension,
    FileNode,
    ScaffoldOpts,
    Structure,
} from '../schema';
import {defaultLogger, type Logger} from '../util/logger';
import {registerAction, runActions, DEFINE_STRUCTURE} from './actions';
import {resolveSettings} from './config-loader';
import {GITIGNORE, modifyGitignore} from './gitignore';
import {SETUP_CFG, modifySetupCfg} from './setup-cfg';
import {
    deferred,
    dir,
    file,
    getFile,
    merge,
    reject,
    rejectMatching,
    setNode,
    template,
} from './structure';
import {resolveNames, substituteBraceVars} from './substitute';
import {bundledTemplates, type TemplateLoader} from './templates';
import {amendTests} from './tests-structure';

export interface ClickstartOptions extends ClickstartConfig {
    /** Where templates come from. Defaults to the bundled directory. */
    templates?: TemplateLoader;
    logger?: Logger;
}

export interface StepContext {
    settings: ClickstartSettings;
    templates: TemplateLoader;
    logger: Logger;
}

/**
 * Build files rendered with brace placeholders only, so `$(VAR)` and `$$`
 * reach Make and YAML untouched.
 */
const BUILD_TEMPLATES: Readonly<Record<string, string>> = {
    Makefile: 'Makefile',
    'pyproject.toml': 'pyproject.toml',
    '.pre-commit-config.yaml': 'pre-commit-config.yaml',
    'README.md': 'README.md',
};

/**
 * Markdown docs built with Sphinx + MyST, rendered with `${var}` like the
 * Python sources.
 */
const DOC_TEMPLATES: Readonly<Record<string, string>> = {
    'docs/conf.py': 'docs/conf.py',
    'docs/requirements.txt': 'docs/requirements.txt',
    'docs/index.md': 'docs/index.md',
    'docs/readme.md': 'docs/readme.md',
    'docs/authors.md': 'docs/authors.md',
    'docs/changelog.md': 'docs/changelog.md',
    'docs/contributing.md': 'docs/contributing.md',
    'docs/license.md': 'docs/license.md',
    '.readthedocs.yml': 'readthedocs.yml',
};

// Host docs files that share a path with ours and must not win the merge.
const REPLACED_DOCS = ['docs/conf.py', 'docs/requirements.txt'];

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

/**
 * CLI, API, runner and test scaffolding. The host's default conftest is
 * replaced by ours.
 */
export function addFiles(structure: Structure, opts: ScaffoldOpts, ctx: StepContext): ActionParams {
    const {package: pkg} = resolveNames(opts);
    const t = ctx.templates;

    const files: Structure = {
        src: dir({
            [pkg]: dir({
                'cli.py': file(template(t('cli')), 'no-overwrite'),
                'api.py': file(template(t('api')), 'no-overwrite'),
            }),
        }),
        '__main__.py': file(template(t('runner')), 'no-overwrite'),
        tests: dir({
            'conftest.py': file(template(t('conftest')), 'no-overwrite'),
        }),
    };

    const withoutDefault = reject(structure, 'tests/conftest.py');
    const merged = merge(withoutDefault, files, opts);
    return {structure: amendTests(merged, opts, t), opts};
}

/**
 * Makefile, pyproject.toml, pre-commit config, README.md and the Markdown
 * docs. Only used for the pyproject layout.
 */
export function addClickstartTemplates(
    structure: Structure,
    opts: ScaffoldOpts,
    ctx: StepContext,
): ActionParams {
    if (ctx.settings.layout !== 'pyproject') {
        ctx.logger.debug(`layout "${ctx.settings.layout}": no build templates added`);
        return {structure, opts};
    }

    const files: Record<string, FileNode> = {};
    for (const [target, name] of Object.entries(BUILD_TEMPLATES)) {
        const source = ctx.templates(name);
        files[target] = file(deferred((o) => substituteBraceVars(source, o)), 'no-overwrite');
    }

    let next = REPLACED_DOCS.reduce((acc, target) => reject(acc, target), structure);
    next = merge(next, files, opts);
    for (const [target, name] of Object.entries(DOC_TEMPLATES)) {
        const doc = file(template(ctx.templates(name)), 'no-overwrite');
        next = merge(next, setNode({}, target, doc), opts);
    }

    return {structure: next, opts};
}

/**
 * Patch setup.cfg when the host produced one. Projects without it are left
 * alone, except in the setup.cfg layout which cannot work without it.
 *
 * In the pyproject layout the patched file is dropped later by
 * `reject_defaults`; it is still parsed here, so a host setup.cfg that does
 * not parse fails the run in both layouts.
 */
export function patchSetupCfg(structure: Structure, opts: ScaffoldOpts, ctx: StepContext): ActionParams {
    const node = getFile(structure, SETUP_CFG);
    if (!node) {
        if (ctx.settings.layout === 'setup.cfg') {
            throw new Error(`${SETUP_CFG} is required by the "setup.cfg" layout but the host did not define it.`);
        }
        ctx.logger.debug(`no ${SETUP_CFG} in the tree; skipping`);
        return {structure, opts};
    }

    if (ctx.settings.layout === 'pyproject') {
        ctx.logger.debug(`patching ${SETUP_CFG}; reject_defaults removes it in the pyproject layout`);
    }
    const patched = modifySetupCfg(node, opts, ctx.settings);
    return {structure: setNode(structure, SETUP_CFG, patched), opts};
}

export function patchGitignore(structure: Structure, opts: ScaffoldOpts, ctx: StepContext): ActionParams {
    const node = getFile(structure, GITIGNORE);
    if (!node) {
        ctx.logger.debug(`no ${GITIGNORE} in the tree; skipping`);
        return {structure, opts};
    }
    return {structure: setNode(structure, GITIGNORE, modifyGitignore(node, opts)), opts};
}

/**
 * Drop host defaults the Click template replaces. Runs last so it also sees
 * whatever earlier steps left behind.
 */
export function rejectDefaults(structure: Structure, opts: ScaffoldOpts, ctx: StepContext): ActionParams {
    const {package: pkg} = resolveNames(opts);

    let next = reject(structure, ['src', pkg, 'skeleton.py']);
    next = reject(next, 'tests/test_skeleton.py');

    if (ctx.settings.layout === 'pyproject') {
        next = reject(next, SETUP_CFG);
        next = reject(next, 'setup.py');
        next = rejectMatching(next, '*.rst');
        next = rejectMatching(next, 'docs/*.rst');
    }

    return {structure: next, opts};
}

// ---------------------------------------------------------------------------
// Extension
// ---------------------------------------------------------------------------

type Step = (structure: Structure, opts: ScaffoldOpts, ctx: StepContext) => ActionParams;

const STEPS: ReadonlyArray<[string, Step]> = [
    ['add_files', addFiles],
    ['add_clickstart_templates', addClickstartTemplates],
    ['patch_setup_cfg', patchSetupCfg],
    ['patch_gitignore', patchGitignore],
    ['reject_defaults', rejectDefaults],
];

/**
 * Turns a freshly scaffolded Python project into a Click CLI application.
 */
export class Clickstart implements Extension {
    readonly name = 'clickstart';
    readonly flag = '--clickstart';
    readonly settings: ClickstartSettings;

    private readonly templates: TemplateLoader;
    private readonly logger: Logger;

    constructor(options: ClickstartOptions = {}) {
        this.settings = resolveSettings(options);
        this.templates = options.templates ?? bundledTemplates();
        this.logger = options.logger ?? defaultLogger.child('[extension]');
    }

    /**
     * The extension's own steps, in the order they must run.
     */
    actions(): Action[] {
        return STEPS.map(([name, step]) => {
            const ctx: StepContext = {
                settings: this.settings,
                templates: this.templates,
                logger: this.logger.child(`[${name}]`),
            };
            const action: Action = {
                name,
                run: (structure: Structure, opts: ScaffoldOpts) => step(structure, opts, ctx),
            };
            return action;
        });
    }

    /**
     * Insert the steps after the host's `define_structure`, keeping their
     * relative order.
     */
    activate(actions: readonly Action[]): Action[] {
        let previous = DEFINE_STRUCTURE;
        return this.actions().reduce<Action[]>((acc, action) => {
            const position = acc.some((a) => a.name === previous) ? {after: previous} : {};
            previous = action.name;
            return registerAction(acc, action, position);
        }, [...actions]);
    }

    /**
     * Run only the extension steps over an existing tree.
     */
    run(structure: Structure, opts: ScaffoldOpts): ActionParams {
        return runActions(this.actions(), structure, opts, this.logger);
    }
}

export function runClickstart(
    structure: Structure,
    opts: ScaffoldOpts,
    options: ClickstartOptions = {},
): ActionParams {
    return new Clickstart(options).run(structure, opts);
}
