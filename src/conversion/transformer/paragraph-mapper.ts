/**
 * Paragraph classification and list labels.
 *
 * Rule priority, first match wins:
 *   1. empty paragraph  → placeholder when its style is a placeholder style, else dropped
 *   2. style map entry  → the mapped block role
 *   3. list detection   → list style pattern, or w:numPr numbering
 *   4. anything else    → body paragraph
 */

import { MAX_NESTING_LEVEL, NUMBER_FORMAT_LIST_TYPES } from '../constants.js';
import { mapFirstText } from '../inline.js';
import type { BlockRole, Inline, ListType, NumberingMap, ParagraphNode } from '../types.js';
import type { StyleLookup } from './style-lookup.js';

export type ParagraphClass =
    | { kind: 'drop' }
    | { kind: 'placeholder' }
    | { kind: 'text'; role: BlockRole; level: number | null }
    | { kind: 'list'; listType: ListType; level: number };

export function listTypeForFormat(numFmt: string | undefined, fallback: ListType): ListType {
    return (numFmt && NUMBER_FORMAT_LIST_TYPES[numFmt]) || fallback;
}

const clampLevel = (level: number): number => Math.min(Math.max(level, 1), MAX_NESTING_LEVEL);

export function classifyParagraph(
    paragraph: ParagraphNode,
    hasContent: boolean,
    lookup: StyleLookup,
    numbering: NumberingMap,
): ParagraphClass {
    const style = paragraph.styleClass;
    if (!hasContent) {
        return lookup.isPlaceholder(style) ? { kind: 'placeholder' } : { kind: 'drop' };
    }

    const rule = lookup.paragraphRule(style);
    if (rule) {
        const level = rule.role === 'heading' ? clampLevel(rule.level ?? 1) : null;
        return { kind: 'text', role: rule.role, level };
    }

    const numberingLevel = paragraph.numbering ? paragraph.numbering.level + 1 : null;
    const styled = lookup.listStyle(style);
    if (styled) {
        return { kind: 'list', listType: styled.listType, level: clampLevel(styled.level ?? numberingLevel ?? 1) };
    }
    if (paragraph.numbering) {
        const numFmt = numbering.get(paragraph.numbering.numId)?.get(paragraph.numbering.level);
        return {
            kind: 'list',
            listType: listTypeForFormat(numFmt, lookup.defaultListType),
            level: clampLevel(paragraph.numbering.level + 1),
        };
    }
    return { kind: 'text', role: 'paragraph', level: null };
}

// ═══════════════════════════════════════════════════════════════════════
// Labels
// ═══════════════════════════════════════════════════════════════════════

function alphabetic(n: number): string {
    let out = '';
    let rest = n;
    while (rest > 0) {
        const digit = (rest - 1) % 26;
        out = String.fromCharCode(97 + digit) + out;
        rest = Math.floor((rest - 1) / 26);
    }
    return out;
}

const ROMAN_NUMERALS: ReadonlyArray<readonly [number, string]> = [
    [1000, 'm'], [900, 'cm'], [500, 'd'], [400, 'cd'],
    [100, 'c'], [90, 'xc'], [50, 'l'], [40, 'xl'],
    [10, 'x'], [9, 'ix'], [5, 'v'], [4, 'iv'], [1, 'i'],
];

function roman(n: number): string {
    let out = '';
    let rest = n;
    for (const [value, numeral] of ROMAN_NUMERALS) {
        while (rest >= value) {
            out += numeral;
            rest -= value;
        }
    }
    return out;
}

export function formatListLabel(listType: ListType, n: number): string | null {
    switch (listType) {
        case 'bullet':
            return '•';
        case 'order':
            return `${n}.`;
        case 'lower-alpha':
            return `${alphabetic(n)}.`;
        case 'upper-alpha':
            return `${alphabetic(n).toUpperCase()}.`;
        case 'lower-roman':
            return `${roman(n)}.`;
        case 'upper-roman':
            return `${roman(n).toUpperCase()}.`;
        case 'none':
            return null;
    }
}

/** Per-level counters; a change of type at a level restarts its count. */
export class ListLabeler {
    private readonly counters = new Map<number, { listType: ListType; count: number }>();

    next(listType: ListType, level: number): string | null {
        for (const key of [...this.counters.keys()]) {
            if (key > level) this.counters.delete(key);
        }
        const slot = this.counters.get(level);
        const count = slot && slot.listType === listType ? slot.count + 1 : 1;
        this.counters.set(level, { listType, count });
        return formatListLabel(listType, count);
    }

    reset(): void {
        this.counters.clear();
    }
}

/** A label typed into the text itself, e.g. "a)\t" or "•\t". */
const MANUAL_LABEL = /^\s*([•●○▪■◦–-]|\(?(?:\d{1,3}|[a-zA-Z]|[ivxlcdm]+|[IVXLCDM]+)[.)])\t/;

export function extractManualLabel(content: Inline[]): { label: string | null; content: Inline[] } {
    let label: string | null = null;
    const stripped = mapFirstText(content, (value) => {
        const match = MANUAL_LABEL.exec(value);
        if (match) {
            label = match[1];
            return value.slice(match[0].length);
        }
        return value.replace(/^\t+/, '');
    });
    return { label, content: stripped };
}
