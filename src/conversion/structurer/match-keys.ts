/**
 * Normalized keys for reference matching.
 *
 * Bibliographic citations and entries are compared as token lists: lower
 * case, connectors ("and", "&", "et al.") and punctuation removed. Figure
 * and table references are compared by label keys such as "figure:2".
 */

import type { LabelTable } from '../../config.js';
import type { FloatKind } from '../types.js';

const YEAR_TOKEN = /^\d{4}[a-z]?$/;

export function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Word connectors only match as whole words. */
function wordPattern(word: string): string {
    const before = /^[\p{L}\p{N}]/u.test(word) ? '(?<![\\p{L}\\p{N}])' : '';
    const after = /[\p{L}\p{N}]$/u.test(word) ? '(?![\\p{L}\\p{N}])' : '';
    return `${before}${escapeRegExp(word)}${after}`;
}

function alternation(words: readonly string[]): string {
    return [...words]
        .sort((a, b) => b.length - a.length)
        .map((w) => wordPattern(w.toLowerCase()))
        .join('|');
}

export function matchTokens(value: string, connectors: readonly string[]): string[] {
    let normalized = value.toLowerCase();
    if (connectors.length > 0) {
        normalized = normalized.replace(new RegExp(alternation(connectors), 'gu'), ' ');
    }
    return normalized.split(/[^\p{L}\p{N}]+/u).filter((token) => token !== '');
}

export function isYearToken(token: string): boolean {
    return YEAR_TOKEN.test(token);
}

/** Tokens up to and including the first year token (all tokens when there is none). */
export function throughFirstYear(tokens: readonly string[]): string[] {
    const index = tokens.findIndex(isYearToken);
    return index < 0 ? [...tokens] : tokens.slice(0, index + 1);
}

/**
 * Anchored, ordered, whole-token match: the first citation token must be
 * the first entry token, the rest must appear in order.
 */
export function matchesLeadingTokens(citation: readonly string[], leading: readonly string[]): boolean {
    if (citation.length === 0 || leading.length === 0 || citation[0] !== leading[0]) return false;
    let j = 1;
    for (let i = 1; i < citation.length; i++) {
        while (j < leading.length && leading[j] !== citation[i]) j++;
        if (j >= leading.length) return false;
        j++;
    }
    return true;
}

// ═══════════════════════════════════════════════════════════════════════
// Figure and table labels
// ═══════════════════════════════════════════════════════════════════════

export interface LabelReference {
    /** null when the text carries a number but no label word. */
    kind: FloatKind | null;
    number: string;
    /** Sub-figure letter, lower case ('' when absent). */
    suffix: string;
    /** Length of the matched label text. */
    length: number;
}

export function labelKey(kind: FloatKind, number: string, suffix = ''): string {
    return `${kind}:${number}${suffix}`;
}

function stemKind(stem: string, labels: LabelTable): FloatKind | null {
    const lower = stem.toLowerCase();
    if (labels.figure.some((w) => w.toLowerCase() === lower)) return 'figure';
    if (labels.table.some((w) => w.toLowerCase() === lower)) return 'table';
    return null;
}

/** Parse "Figure 2", "Figs. 3a" or a bare "4" at the start of `value`. */
export function parseLabelReference(value: string, labels: LabelTable): LabelReference | null {
    const stems = [...labels.figure, ...labels.table].sort((a, b) => b.length - a.length).map(escapeRegExp);
    const pattern = new RegExp(`^\\s*(?:(${stems.join('|')})\\s*)?(\\d+(?:[.\\-]\\d+)*)([a-z])?(?![\\p{L}\\p{N}])`, 'iu');
    const match = pattern.exec(value);
    if (!match) return null;
    return {
        kind: match[1] ? stemKind(match[1], labels) : null,
        number: match[2],
        suffix: (match[3] ?? '').toLowerCase(),
        length: match[0].length,
    };
}

export interface CompoundPart {
    text: string;
    separator: boolean;
}

/** Split "Figures 2 and 3", "Tables 1–4" or "Figure 1, 2; 5" into parts and separators. */
export function splitCompoundReference(value: string, labels: LabelTable): CompoundPart[] {
    const words = alternation([...labels.connectors, ...labels.rangeWords]);
    const separator = new RegExp(`(\\s*(?:[,;&–—]${words ? `|${words}` : ''})\\s*)`, 'giu');
    return value
        .split(separator)
        .map((part, index) => ({ text: part, separator: index % 2 === 1 }))
        .filter((part) => part.text !== '');
}
