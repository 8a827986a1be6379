/**
 * Citation resolution.
 *
 * Bibliographic citations resolve by anchored, ordered token matching
 * against each entry's leading text. Figure and table citations resolve by
 * label key, after splitting compound references such as "Figures 2 and 3".
 * Every marker becomes a cross-reference: either resolved to exactly one
 * target, or explicitly unresolved.
 */

import type { ConversionContext } from '../context.js';
import { childrenOf, plainText, text, withChildren } from '../inline.js';
import type {
    BibliographyEntry,
    CitationRecord,
    CrossReference,
    FloatBlock,
    FloatKind,
    FlowNode,
    FrontMatter,
    Inline,
    ReferenceResolution,
    RoleInline,
} from '../types.js';
import { mapFlowInlines, mapTableInlines } from './flow.js';
import {
    labelKey,
    matchesLeadingTokens,
    matchTokens,
    parseLabelReference,
    splitCompoundReference,
    throughFirstYear,
} from './match-keys.js';

export interface CitationOutcome {
    frontMatter: FrontMatter;
    body: FlowNode[];
    citations: CitationRecord[];
}

interface Resolution {
    target: string | null;
    resolution: ReferenceResolution;
}

/** Label kind carried forward between markers of one paragraph. */
interface StemState {
    kind: FloatKind | null;
}

export class CitationResolver {
    readonly records: CitationRecord[] = [];
    private readonly floatsByKey = new Map<string, FloatBlock>();

    constructor(
        private readonly entries: readonly BibliographyEntry[],
        floats: readonly FloatBlock[],
        private readonly context: ConversionContext,
    ) {
        for (const float of floats) {
            if (float.labelKey && !this.floatsByKey.has(float.labelKey)) this.floatsByKey.set(float.labelKey, float);
        }
    }

    /** Rewrite all citation markers of one paragraph. */
    resolveContent = (content: Inline[]): Inline[] => this.rewrite(content, { kind: null });

    /** Bibliographic match for one citation text. */
    matchEntry(citation: string): Resolution {
        const tokens = throughFirstYear(matchTokens(citation, this.context.config.labels.connectors));
        const candidates = this.entries.filter((entry) => matchesLeadingTokens(tokens, entry.leadingTokens));
        if (candidates.length === 1) return { target: candidates[0].id, resolution: 'resolved' };
        if (candidates.length === 0) return { target: null, resolution: 'no-match' };
        const key = tokens.join(' ');
        const exact = candidates.filter((entry) => entry.keyTokens.join(' ') === key);
        return exact.length === 1 ? { target: exact[0].id, resolution: 'resolved' } : { target: null, resolution: 'ambiguous' };
    }

    /** Label match for one part of a figure/table reference. */
    matchLabel(part: string, fallbackKind: FloatKind, state: StemState): Resolution & { kind: FloatKind } {
        const ref = parseLabelReference(part, this.context.config.labels);
        if (ref?.kind) state.kind = ref.kind;
        const kind = ref?.kind ?? state.kind ?? fallbackKind;
        if (!ref) return { kind, target: null, resolution: 'no-match' };

        const float =
            this.floatsByKey.get(labelKey(kind, ref.number, ref.suffix)) ??
            (ref.suffix ? this.floatsByKey.get(labelKey(kind, ref.number)) : undefined);
        return float ? { kind, target: float.id, resolution: 'resolved' } : { kind, target: null, resolution: 'no-match' };
    }

    private rewrite(nodes: readonly Inline[], state: StemState): Inline[] {
        const out: Inline[] = [];
        for (const node of nodes) {
            if (node.type === 'role' && node.role === 'citation') {
                out.push(...this.bibliographic(node));
            } else if (node.type === 'role' && (node.role === 'figure-citation' || node.role === 'table-citation')) {
                out.push(...this.labelled(node, node.role === 'figure-citation' ? 'figure' : 'table', state));
            } else {
                const children = childrenOf(node);
                out.push(children ? withChildren(node, this.rewrite(children, state)) : node);
            }
        }
        return out;
    }

    private xref(refType: CrossReference['refType'], citation: string, found: Resolution, children: Inline[]): CrossReference {
        this.records.push({ text: citation, refType, target: found.target, resolution: found.resolution });
        if (found.resolution !== 'resolved') {
            this.context.report('unresolved-reference', `${found.resolution === 'ambiguous' ? 'ambiguous' : 'unmatched'} ${refType} citation "${citation}"`, {
                text: citation,
                resolution: found.resolution,
            });
        }
        return { type: 'xref', refType, target: found.target, resolution: found.resolution, children };
    }

    /** "(Smith, 2020; Jones, 2019)" yields one cross-reference per citation. */
    private bibliographic(node: RoleInline): Inline[] {
        const citation = plainText(node.children);
        const pieces = citation.split(/(;\s*)/);
        if (pieces.length === 1) {
            return [this.xref('bibr', citation.trim(), this.matchEntry(citation), node.children)];
        }
        const out: Inline[] = [];
        pieces.forEach((piece, index) => {
            if (piece === '') return;
            out.push(index % 2 === 1 || piece.trim() === '' ? text(piece) : this.xref('bibr', piece.trim(), this.matchEntry(piece), [text(piece)]));
        });
        return out;
    }

    private labelled(node: RoleInline, fallbackKind: FloatKind, state: StemState): Inline[] {
        const citation = plainText(node.children);
        const parts = splitCompoundReference(citation, this.context.config.labels);
        const resolve = (part: string, children: Inline[]): CrossReference => {
            const found = this.matchLabel(part, fallbackKind, state);
            return this.xref(found.kind === 'figure' ? 'fig' : 'table', part.trim(), found, children);
        };
        const references = parts.filter((part) => !part.separator);
        if (references.length <= 1) {
            return [resolve(references[0]?.text ?? citation, node.children)];
        }
        return parts.map((part) => (part.separator ? text(part.text) : resolve(part.text, [text(part.text)])));
    }
}

/** Resolve every marker in document order: front matter, body, then float captions and tables. */
export function resolveCitations(
    frontMatter: FrontMatter,
    body: FlowNode[],
    floats: FloatBlock[],
    entries: readonly BibliographyEntry[],
    context: ConversionContext,
): CitationOutcome {
    const resolver = new CitationResolver(entries, floats, context);
    const front: FrontMatter = {
        ...frontMatter,
        title: frontMatter.title && resolver.resolveContent(frontMatter.title),
        abstract: frontMatter.abstract && { ...frontMatter.abstract, content: resolver.resolveContent(frontMatter.abstract.content) },
    };
    const resolved = mapFlowInlines(body, resolver.resolveContent);
    for (const float of floats) {
        float.caption = resolver.resolveContent(float.caption);
        if (float.attribution) float.attribution = resolver.resolveContent(float.attribution);
        float.tables = float.tables.map((table) => mapTableInlines(table, resolver.resolveContent));
    }
    return { frontMatter: front, body: resolved, citations: resolver.records };
}
