/**
 * Reference lists and bibliography entries.
 *
 * Consecutive reference paragraphs become one ref-list. Each entry is built
 * once from its styled runs and never changes afterwards.
 */

import type { ConversionContext } from '../context.js';
import { plainText, text } from '../inline.js';
import type {
    BibliographyEntry,
    Contributor,
    FlowNode,
    Inline,
    InlineRole,
    PersonGroupMember,
    PublicationType,
    ReferencePart,
    RefListNode,
} from '../types.js';
import { isContainer } from './flow.js';
import { matchTokens, throughFirstYear } from './match-keys.js';

const YEAR = /(\d{4})([a-z]?)/i;

interface Segment {
    role: InlineRole | null;
    text: string;
}

/** Role runs as single segments, everything else as plain text. */
function segmentsOf(nodes: readonly Inline[]): Segment[] {
    const out: Segment[] = [];
    for (const node of nodes) {
        if (node.type === 'role') out.push({ role: node.role, text: plainText(node.children).trim() });
        else if (node.type === 'text') out.push({ role: null, text: node.value });
        else if (node.type !== 'comment') out.push(...segmentsOf(node.children));
    }
    return out;
}

function hasLetters(value: string): boolean {
    return /\p{L}/u.test(value);
}

/** Pair surnames with given names when only non-letters separate them. */
export function contributorsOf(segments: readonly Segment[]): Contributor[] {
    const out: Contributor[] = [];
    let current: { surname: string | null; givenNames: string | null } | null = null;
    let gapHasLetters = false;

    const close = (): void => {
        if (current) out.push({ kind: 'person', ...current });
        current = null;
    };

    for (const segment of segments) {
        if (segment.role === 'surname' || segment.role === 'given-names') {
            const field = segment.role === 'surname' ? 'surname' : 'givenNames';
            if (current && current[field] === null && !gapHasLetters) {
                current[field] = segment.text;
            } else {
                close();
                current = { surname: null, givenNames: null };
                current[field] = segment.text;
            }
            gapHasLetters = false;
        } else if (segment.role === 'collab') {
            close();
            out.push({ kind: 'collab', name: segment.text });
        } else if (segment.role === null) {
            if (hasLetters(segment.text)) gapHasLetters = true;
        } else {
            close();
        }
    }
    close();
    return out;
}

function firstOf(segments: readonly Segment[], role: InlineRole): string | null {
    return segments.find((s) => s.role === role && s.text !== '')?.text ?? null;
}

export function extractYear(value: string | null): string | null {
    const match = value ? YEAR.exec(value) : null;
    return match ? `${match[1]}${match[2].toLowerCase()}` : null;
}

export function classifyEntry(fields: {
    url: string | null;
    issue: string | null;
    articleTitle: string | null;
    chapterTitle: string | null;
    publisher: string | null;
}): PublicationType {
    if (fields.url) return 'web';
    if (fields.issue || fields.articleTitle) return 'article';
    if (fields.chapterTitle || fields.publisher) return 'book';
    return 'other';
}

// ═══════════════════════════════════════════════════════════════════════
// Output grouping
// ═══════════════════════════════════════════════════════════════════════

/** "(2020a)." inside a year run → "(" year "2020a" ")." */
function isolateYears(nodes: readonly Inline[]): Inline[] {
    return nodes.flatMap((node): Inline[] => {
        if (node.type !== 'role' || node.role !== 'year') return [node];
        const value = plainText(node.children);
        const match = YEAR.exec(value);
        if (!match) return [node];
        const before = value.slice(0, match.index);
        const after = value.slice(match.index + match[0].length);
        return [
            ...(before ? [text(before)] : []),
            { type: 'role', role: 'year', children: [text(match[0])] },
            ...(after ? [text(after)] : []),
        ];
    });
}

function isNameRole(node: Inline | undefined): boolean {
    return node !== undefined && node.type === 'role' && (node.role === 'surname' || node.role === 'given-names');
}

/**
 * Top-level runs of name roles (with connector-only text between them)
 * become person groups; adjacent surname/given-name pairs become one name.
 */
export function groupReferenceParts(content: readonly Inline[], connectors: readonly string[]): ReferencePart[] {
    const nodes = isolateYears(content);
    const parts: ReferencePart[] = [];
    const isConnectorText = (node: Inline): boolean => node.type === 'text' && matchTokens(node.value, connectors).length === 0;

    let i = 0;
    while (i < nodes.length) {
        if (!isNameRole(nodes[i])) {
            parts.push({ type: 'inline', inline: nodes[i] });
            i++;
            continue;
        }
        // extend over names and connector text, ending on a name
        let end = i;
        let cursor = i + 1;
        while (cursor < nodes.length && (isNameRole(nodes[cursor]) || isConnectorText(nodes[cursor]))) {
            if (isNameRole(nodes[cursor])) end = cursor;
            cursor++;
        }

        const members: PersonGroupMember[] = [];
        let k = i;
        while (k <= end) {
            const node = nodes[k];
            if (!isNameRole(node)) {
                members.push({ type: 'inline', inline: node });
                k++;
                continue;
            }
            const gap = nodes[k + 1];
            const partner = nodes[k + 2];
            if (
                k + 2 <= end &&
                gap.type === 'text' &&
                !hasLetters(gap.value) &&
                isNameRole(partner) &&
                partner.type === 'role' &&
                node.type === 'role' &&
                partner.role !== node.role
            ) {
                members.push({ type: 'name', parts: [node, gap, partner] });
                k += 3;
            } else if (k + 1 <= end && isNameRole(gap) && gap.type === 'role' && node.type === 'role' && gap.role !== node.role) {
                members.push({ type: 'name', parts: [node, gap] });
                k += 2;
            } else {
                members.push({ type: 'name', parts: [node] });
                k++;
            }
        }
        parts.push({ type: 'person-group', members });
        i = end + 1;
    }
    return parts;
}

// ═══════════════════════════════════════════════════════════════════════
// Entries and lists
// ═══════════════════════════════════════════════════════════════════════

export function createEntry(content: Inline[], context: ConversionContext): BibliographyEntry {
    const connectors = context.config.labels.connectors;
    const segments = segmentsOf(content);
    const contributors = contributorsOf(segments);
    const year = extractYear(firstOf(segments, 'year'));
    const fields = {
        articleTitle: firstOf(segments, 'article-title'),
        chapterTitle: firstOf(segments, 'chapter-title'),
        source: firstOf(segments, 'source'),
        publisher: firstOf(segments, 'publisher'),
        volume: firstOf(segments, 'volume'),
        issue: firstOf(segments, 'issue'),
        firstPage: firstOf(segments, 'fpage'),
        lastPage: firstOf(segments, 'lpage'),
        url: firstOf(segments, 'url'),
        doi: firstOf(segments, 'doi'),
    };
    const names = contributors.map((c) => (c.kind === 'collab' ? c.name : c.surname ?? c.givenNames ?? ''));

    return {
        id: `bid_${context.chapterNumber}_${context.next('reference')}`,
        publicationType: classifyEntry(fields),
        contributors,
        year,
        ...fields,
        parts: groupReferenceParts(content, connectors),
        leadingTokens: throughFirstYear(matchTokens(plainText(content), connectors)),
        keyTokens: matchTokens([...names, year ?? ''].join(' '), connectors),
    };
}

/** Group consecutive reference paragraphs, in every container, into ref-lists. */
export function buildBibliography(flow: FlowNode[], context: ConversionContext): { flow: FlowNode[]; entries: BibliographyEntry[] } {
    const entries: BibliographyEntry[] = [];

    const group = (nodes: readonly FlowNode[]): FlowNode[] => {
        const out: FlowNode[] = [];
        let open: RefListNode | null = null;
        for (const node of nodes) {
            if (node.kind === 'reference') {
                const entry = createEntry(node.content, context);
                entries.push(entry);
                if (open) {
                    open.entries.push(entry);
                } else {
                    const list: RefListNode = { kind: 'ref-list', entries: [entry] };
                    out.push(list);
                    open = list;
                }
                continue;
            }
            open = null;
            out.push(isContainer(node) ? { ...node, children: group(node.children) } : node);
        }
        return out;
    };

    return { flow: group(flow), entries };
}
