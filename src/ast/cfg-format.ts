// src/ast/cfg-format.ts

import type {CfgBlock, CfgDocument, CfgOption, CfgSection} from './cfg-parser';

export const VALUE_INDENT = '    ';

/**
 * Canonical rendering of an edited option:
 *
 *   key = value
 *
 * or, for multi-line values,
 *
 *   key =
 *       first
 *       second
 */
export function renderOption(option: CfgOption): string[] {
    if (option.raw) return [...option.raw];

    const head = option.value ? `${option.key} = ${option.value}` : `${option.key} =`;
    return [head, ...option.lines.map((line) => `${VALUE_INDENT}${line}`)];
}

function renderBlock(block: CfgBlock): string[] {
    return block.type === 'option' ? renderOption(block) : [block.raw];
}

function renderSection(section: CfgSection): string[] {
    return [section.header ?? `[${section.name}]`, ...section.blocks.flatMap(renderBlock)];
}

/**
 * Print a document back to text. Untouched blocks come out exactly as they
 * were read.
 */
export function formatCfg(doc: CfgDocument): string {
    const lines = [
        ...doc.preamble.map((b) => b.raw),
        ...doc.sections.flatMap(renderSection),
    ];
    if (lines.length === 0) return '';
    return lines.join(doc.eol) + (doc.finalNewline ? doc.eol : '');
}
