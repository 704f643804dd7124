// src/ast/cfg-parser.ts

/**
 * Line model for INI-style files such as setup.cfg.
 *
 * Every parsed block keeps the exact source lines it came from (`raw`), so
 * that printing an unedited document gives back the original text. Blocks
 * created or edited later carry `raw: null` and are rendered canonically.
 */

export interface CfgComment {
    type: 'comment';
    raw: string;
}

export interface CfgBlank {
    type: 'blank';
    raw: string;
}

export interface CfgOption {
    type: 'option';
    key: string;
    /** Value on the key line, trimmed. Often empty for multi-line values. */
    value: string;
    /**
     * Continuation values, one per line, indentation stripped. Comments and
     * blank lines inside the value are kept in `raw` only.
     */
    lines: readonly string[];
    /** Source lines (key line + continuations); null once edited. */
    raw: readonly string[] | null;
}

export type CfgBlock = CfgComment | CfgBlank | CfgOption;

export interface CfgSection {
    name: string;
    /** Source header line; null for sections added by an edit. */
    header: string | null;
    blocks: readonly CfgBlock[];
}

export type LineEnding = '\n' | '\r\n';

export interface CfgDocument {
    /** Comments and blank lines before the first section. */
    preamble: readonly (CfgComment | CfgBlank)[];
    sections: readonly CfgSection[];
    eol: LineEnding;
    finalNewline: boolean;
}

export class CfgParseError extends Error {
    constructor(
        readonly fileName: string,
        readonly line: number,
        detail: string,
    ) {
        super(`${fileName}: ${detail} on line ${line}.`);
        this.name = 'CfgParseError';
    }
}

const SECTION_RE = /^\[([^\]]*)\]/;
const OPTION_RE = /^(.*?)\s*([=:])\s*(.*)$/;
const COMMENT_RE = /^\s*[#;]/;

interface MutableSection {
    name: string;
    header: string;
    blocks: CfgBlock[];
}

interface MutableOption {
    type: 'option';
    key: string;
    value: string;
    lines: string[];
    raw: string[];
}

/**
 * Split text into lines, remembering the line ending and whether the text
 * ended with one.
 */
export function splitLines(text: string): {
    lines: string[];
    eol: LineEnding;
    finalNewline: boolean;
} {
    const eol: LineEnding = text.includes('\r\n') ? '\r\n' : '\n';
    if (text === '') {
        return {lines: [], eol, finalNewline: false};
    }

    const lines = text.split(/\r?\n/);
    const finalNewline = lines[lines.length - 1] === '';
    if (finalNewline) lines.pop();

    return {lines, eol, finalNewline};
}

/**
 * Parse INI text into a CfgDocument.
 *
 * Throws CfgParseError on:
 * - an option before the first section header
 * - an indented continuation line with no option to continue
 * - a line that is neither header, comment nor `key = value`
 * - a duplicate section, or a duplicate option within one section
 */
export function parseCfg(text: string, fileName = '<config>'): CfgDocument {
    const {lines, eol, finalNewline} = splitLines(text);

    const preamble: (CfgComment | CfgBlank)[] = [];
    const sections: MutableSection[] = [];
    let section: MutableSection | null = null;
    let option: MutableOption | null = null;

    // Blank and comment lines seen while an option is open. They join the
    // option when an indented line follows, otherwise they become blocks.
    let pending: (CfgComment | CfgBlank)[] = [];

    const push = (block: CfgComment | CfgBlank) => {
        if (section) {
            section.blocks.push(block);
        } else {
            preamble.push(block);
        }
    };

    const flush = () => {
        pending.forEach(push);
        pending = [];
    };

    lines.forEach((raw, i) => {
        const lineNo = i + 1;

        if (!raw.trim() || COMMENT_RE.test(raw)) {
            const block: CfgComment | CfgBlank = raw.trim()
                ? {type: 'comment', raw}
                : {type: 'blank', raw};
            if (option) {
                pending.push(block);
            } else {
                push(block);
            }
            return;
        }

        if (/^\s/.test(raw)) {
            if (!option) {
                throw new CfgParseError(fileName, lineNo, 'Continuation line without an option');
            }
            option.raw.push(...pending.map((b) => b.raw), raw);
            option.lines.push(raw.trim());
            pending = [];
            return;
        }

        flush();
        option = null;

        const header = raw.match(SECTION_RE);
        if (header) {
            const name = header[1].trim();
            if (!name) {
                throw new CfgParseError(fileName, lineNo, 'Empty section name');
            }
            if (sections.some((s) => s.name === name)) {
                throw new CfgParseError(fileName, lineNo, `Duplicate section "${name}"`);
            }
            section = {name, header: raw, blocks: []};
            sections.push(section);
            return;
        }

        const match = raw.match(OPTION_RE);
        if (!match || !match[1].trim()) {
            throw new CfgParseError(fileName, lineNo, `Expected "key = value" but found "${raw}"`);
        }
        if (!section) {
            throw new CfgParseError(fileName, lineNo, 'Option found before any section header');
        }

        const key = match[1].trim();
        const duplicate = section.blocks.some((b) => b.type === 'option' && b.key === key);
        if (duplicate) {
            throw new CfgParseError(
                fileName,
                lineNo,
                `Duplicate option "${key}" in section "${section.name}"`,
            );
        }

        const parsed: MutableOption = {
            type: 'option',
            key,
            value: match[3].trim(),
            lines: [],
            raw: [raw],
        };
        option = parsed;
        section.blocks.push(parsed);
    });

    flush();
    return {preamble, sections, eol, finalNewline};
}
