// src/core/setup-cfg.ts

import {
    addSectionAfter,
    comment,
    findOption,
    formatCfg,
    getOption,
    hasSection,
    insertBlocks,
    option,
    parseCfg,
    requireSection,
    setOption,
    setOptionValues,
    updateSection,
    type CfgDocument,
} from '../ast';
import type {ClickstartSettings, FileNode, ScaffoldOpts} from '../schema';
import {file, resolveLeaf} from './structure';
import {resolveNames, substituteBraceVars} from './substitute';

export const SETUP_CFG = 'setup.cfg';
export const OPTIONS_SECTION = 'options';
export const ENTRY_POINTS_SECTION = 'options.entry_points';

export type CfgPatch = (
    doc: CfgDocument,
    opts: ScaffoldOpts,
    settings: ClickstartSettings,
) => CfgDocument;

export function pythonRequiresComment(settings: ClickstartSettings): string {
    return `# Minimum Python Version ${settings.pythonMinimum} required`;
}

export function pythonRequiresValue(settings: ClickstartSettings): string {
    return `>=${settings.pythonMinimum},<${settings.pythonBelow}`;
}

export function consoleScript(opts: ScaffoldOpts): string {
    const {package: pkg} = resolveNames(opts);
    return `${pkg} = ${pkg}.cli:cli`;
}

/**
 * Replace `install_requires` with the configured requirement list.
 */
export const addInstallRequires: CfgPatch = (doc, _opts, settings) => {
    requireSection(doc, OPTIONS_SECTION);
    return setOptionValues(doc, OPTIONS_SECTION, 'install_requires', settings.requirements);
};

/**
 * Pin `python_requires`, with its explanatory comment, right above
 * `install_requires`. An existing pin is updated where it stands.
 */
export const addPythonRequires: CfgPatch = (doc, _opts, settings) => {
    const note = pythonRequiresComment(settings);
    const value = pythonRequiresValue(settings);
    const section = requireSection(doc, OPTIONS_SECTION);

    if (!getOption(doc, OPTIONS_SECTION, 'python_requires')) {
        const anchor = findOption(section, 'install_requires');
        const index = anchor === -1 ? section.blocks.length : anchor;
        return insertBlocks(doc, OPTIONS_SECTION, index, [
            comment(note),
            option('python_requires', value),
        ]);
    }

    const updated = setOption(doc, OPTIONS_SECTION, 'python_requires', value);
    const blocks = requireSection(updated, OPTIONS_SECTION).blocks;
    const index = blocks.findIndex((b) => b.type === 'option' && b.key === 'python_requires');
    const above = blocks[index - 1];
    if (above?.type === 'comment' && above.raw.trim() === note) {
        return updated;
    }
    return insertBlocks(updated, OPTIONS_SECTION, index, [comment(note)]);
};

/**
 * Make `console_scripts` the first entry of [options.entry_points] and point
 * it at `<package>.cli:cli`.
 */
export const addEntryPoint: CfgPatch = (doc, opts) => {
    requireSection(doc, OPTIONS_SECTION);
    const withSection = hasSection(doc, ENTRY_POINTS_SECTION)
        ? doc
        : addSectionAfter(doc, OPTIONS_SECTION, ENTRY_POINTS_SECTION);

    return updateSection(withSection, ENTRY_POINTS_SECTION, (blocks) => [
        option('console_scripts', '', [consoleScript(opts)]),
        ...blocks.filter((b) => !(b.type === 'option' && b.key === 'console_scripts')),
    ]);
};

export const SETUP_CFG_PATCHES: readonly CfgPatch[] = [
    addInstallRequires,
    addPythonRequires,
    addEntryPoint,
];

/**
 * Apply every patch to setup.cfg text, in order.
 */
export function patchSetupCfgText(
    text: string,
    opts: ScaffoldOpts,
    settings: ClickstartSettings,
): string {
    const doc = parseCfg(substituteBraceVars(text, opts), SETUP_CFG);
    const patched = SETUP_CFG_PATCHES.reduce((acc, patch) => patch(acc, opts, settings), doc);
    return formatCfg(patched);
}

/**
 * Patch the setup.cfg leaf. The write policy is kept as it was.
 */
export function modifySetupCfg(
    node: FileNode,
    opts: ScaffoldOpts,
    settings: ClickstartSettings,
): FileNode {
    const [contents, policy] = resolveLeaf(node, opts);
    if (contents === null) {
        throw new Error(`${SETUP_CFG} has no content to patch.`);
    }
    return file(patchSetupCfgText(contents, opts, settings), policy);
}
