// src/ast/cfg-edit.ts

import type {CfgBlock, CfgComment, CfgDocument, CfgOption, CfgSection} from './cfg-parser';

/*
 * Pure edits over a CfgDocument. Each function returns a new document and
 * leaves the input untouched, so edits can be chained with reduce().
 */

export function getSection(doc: CfgDocument, name: string): CfgSection | undefined {
    return doc.sections.find((s) => s.name === name);
}

export function hasSection(doc: CfgDocument, name: string): boolean {
    return getSection(doc, name) !== undefined;
}

export function requireSection(doc: CfgDocument, name: string, fileName = 'setup.cfg'): CfgSection {
    const section = getSection(doc, name);
    if (!section) {
        throw new Error(`${fileName}: missing required section [${name}].`);
    }
    return section;
}

export function findOption(section: CfgSection, key: string): number {
    return section.blocks.findIndex((b) => b.type === 'option' && b.key === key);
}

export function getOption(doc: CfgDocument, sectionName: string, key: string): CfgOption | undefined {
    const block = getSection(doc, sectionName)?.blocks.find(
        (b) => b.type === 'option' && b.key === key,
    );
    return block?.type === 'option' ? block : undefined;
}

export function option(key: string, value: string, lines: readonly string[] = []): CfgOption {
    return {type: 'option', key, value, lines, raw: null};
}

/**
 * A comment block; a leading "# " is added unless the text already starts
 * with a comment prefix.
 */
export function comment(text: string): CfgComment {
    const raw = /^[#;]/.test(text) ? text : `# ${text}`;
    return {type: 'comment', raw};
}

export function updateSection(
    doc: CfgDocument,
    name: string,
    update: (blocks: readonly CfgBlock[]) => readonly CfgBlock[],
): CfgDocument {
    requireSection(doc, name);
    return {
        ...doc,
        sections: doc.sections.map((s) => (s.name === name ? {...s, blocks: update(s.blocks)} : s)),
    };
}

export function insertBlocks(
    doc: CfgDocument,
    sectionName: string,
    index: number,
    blocks: readonly CfgBlock[],
): CfgDocument {
    return updateSection(doc, sectionName, (current) => [
        ...current.slice(0, index),
        ...blocks,
        ...current.slice(index),
    ]);
}

/**
 * Put `value` on an option, in place when it exists; otherwise append it
 * after the last option of the section.
 */
export function setOption(
    doc: CfgDocument,
    sectionName: string,
    key: string,
    value: string,
    lines: readonly string[] = [],
): CfgDocument {
    const next = option(key, value, lines);
    return updateSection(doc, sectionName, (blocks) => {
        const index = blocks.findIndex((b) => b.type === 'option' && b.key === key);
        if (index !== -1) {
            return blocks.map((b, i) => (i === index ? next : b));
        }

        let lastOption = -1;
        blocks.forEach((b, i) => {
            if (b.type === 'option') lastOption = i;
        });
        return [...blocks.slice(0, lastOption + 1), next, ...blocks.slice(lastOption + 1)];
    });
}

/**
 * Multi-line value, one entry per line, nothing on the key line.
 */
export function setOptionValues(
    doc: CfgDocument,
    sectionName: string,
    key: string,
    values: readonly string[],
): CfgDocument {
    return setOption(doc, sectionName, key, '', values);
}

/**
 * Add an empty section right after `afterName`. When another section follows,
 * the new one ends with a blank line so the two headers do not touch.
 */
export function addSectionAfter(doc: CfgDocument, afterName: string, name: string): CfgDocument {
    if (hasSection(doc, name)) {
        throw new Error(`Section [${name}] already exists.`);
    }

    const index = doc.sections.findIndex((s) => s.name === afterName);
    if (index === -1) {
        throw new Error(`Cannot add [${name}] after missing section [${afterName}].`);
    }

    const followed = index < doc.sections.length - 1;
    const added: CfgSection = {
        name,
        header: null,
        blocks: followed ? [{type: 'blank', raw: ''}] : [],
    };

    return {
        ...doc,
        sections: [...doc.sections.slice(0, index + 1), added, ...doc.sections.slice(index + 1)],
    };
}
