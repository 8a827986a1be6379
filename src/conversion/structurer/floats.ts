/**
 * Figure and table floats.
 *
 * Collection pulls captions (and the tables that follow table captions) out
 * of the flow. Placement puts each float back after the first paragraph
 * that cites it, or after the last reference list when nothing does.
 *
 * Placement state per float: pending → placed-inline | appended, once.
 */

import type { LabelTable } from '../../config.js';
import type { ConversionContext } from '../context.js';
import { dropLeadingText, plainText, visitInlines } from '../inline.js';
import type {
    Block,
    FloatBlock,
    FloatFlow,
    FloatKind,
    FlowNode,
    Inline,
    ListItemNode,
    ListNode,
    ParagraphFlow,
    RefListNode,
    ReconstructedTable,
    TableFlow,
} from '../types.js';
import { mapFlow, walkFlow } from './flow.js';
import { labelKey, parseLabelReference } from './match-keys.js';

export interface FloatCollection {
    blocks: Block[];
    floats: FloatBlock[];
}

interface CaptionParts {
    label: string | null;
    labelKey: string | null;
    caption: Inline[];
}

function leadingSeparatorLength(value: string): number {
    return /^[\s.:–—-]*/.exec(value)?.[0].length ?? 0;
}

function keyFor(label: string, kind: FloatKind, labels: LabelTable): string | null {
    const ref = parseLabelReference(label, labels);
    return ref ? labelKey(ref.kind ?? kind, ref.number, ref.suffix) : null;
}

/** Separate "Figure 2" from the caption text, by number style or by label words. */
export function splitCaption(content: Inline[], kind: FloatKind, labels: LabelTable): CaptionParts {
    const numberRole = kind === 'figure' ? 'figure-number' : 'table-number';
    const index = content.findIndex((node) => node.type === 'role' && node.role === numberRole);
    const styled = index >= 0 ? content[index] : null;

    if (styled && styled.type === 'role') {
        const label = plainText(styled.children).trim().replace(/[.:]$/, '');
        const rest = [...content.slice(0, index), ...content.slice(index + 1)];
        return {
            label,
            labelKey: keyFor(label, kind, labels),
            caption: dropLeadingText(rest, leadingSeparatorLength(plainText(rest))),
        };
    }

    const captionText = plainText(content);
    const ref = parseLabelReference(captionText, labels);
    if (!ref || ref.kind === null) return { label: null, labelKey: null, caption: content };

    const label = captionText.slice(0, ref.length).trim();
    const consumed = ref.length + leadingSeparatorLength(captionText.slice(ref.length));
    return {
        label,
        labelKey: labelKey(ref.kind, ref.number, ref.suffix),
        caption: dropLeadingText(content, consumed),
    };
}

function newFloat(kind: FloatKind, content: Inline[], context: ConversionContext): FloatBlock {
    const parts = splitCaption(content, kind, context.config.labels);
    const prefix = kind === 'figure' ? 'fig' : 'tab';
    return {
        id: `${prefix}${context.chapterNumber}_${context.next(kind)}`,
        kind,
        label: parts.label,
        labelKey: parts.labelKey,
        caption: parts.caption,
        tables: [],
        attribution: null,
        placement: 'pending',
    };
}

export function collectFloats(blocks: Block[], context: ConversionContext): FloatCollection {
    const rest: Block[] = [];
    const floats: FloatBlock[] = [];
    const seenKeys = new Set<string>();

    for (let i = 0; i < blocks.length; i++) {
        const block = blocks[i];
        if (block.type !== 'text' || (block.role !== 'figure-caption' && block.role !== 'table-caption')) {
            rest.push(block);
            continue;
        }

        const float = newFloat(block.role === 'figure-caption' ? 'figure' : 'table', block.content, context);
        if (float.kind === 'table') {
            const tables: ReconstructedTable[] = [];
            let next = blocks[i + 1];
            while (next && next.type === 'table') {
                tables.push(next.table);
                i++;
                next = blocks[i + 1];
            }
            float.tables = tables;
            if (next && next.type === 'text' && next.role === 'table-source') {
                float.attribution = next.content;
                i++;
            }
            if (tables.length === 0) {
                context.report('structural-anomaly', `table caption ${float.label ?? float.id} has no table`);
            }
        }

        if (float.labelKey) {
            if (seenKeys.has(float.labelKey)) {
                context.report('structural-anomaly', `duplicate float label ${float.label ?? float.labelKey}`, { id: float.id });
            }
            seenKeys.add(float.labelKey);
        }
        floats.push(float);
    }
    return { blocks: rest, floats };
}

// ═══════════════════════════════════════════════════════════════════════
// Placement
// ═══════════════════════════════════════════════════════════════════════

function floatFlow(float: FloatBlock): FloatFlow {
    return { kind: 'float', float };
}

export function placeFloats(body: FlowNode[], floats: FloatBlock[]): FlowNode[] {
    const byId = new Map(floats.map((f) => [f.id, f]));
    const anchored = new Map<ParagraphFlow | TableFlow | ListItemNode, FloatBlock[]>();

    const claim = (owner: ParagraphFlow | TableFlow | ListItemNode, content: Inline[]): void => {
        visitInlines(content, (node) => {
            if (node.type !== 'xref' || node.resolution !== 'resolved' || node.target === null) return;
            if (node.refType !== 'fig' && node.refType !== 'table') return;
            const float = byId.get(node.target);
            if (!float || float.placement !== 'pending') return;
            float.placement = 'placed-inline';
            anchored.set(owner, [...(anchored.get(owner) ?? []), float]);
        });
    };
    const claimList = (list: ListNode): void => {
        for (const item of list.items) {
            claim(item, item.content);
            item.children.forEach(claimList);
        }
    };
    walkFlow(body, (node) => {
        if (node.kind === 'paragraph') claim(node, node.content);
        else if (node.kind === 'list') claimList(node);
        else if (node.kind === 'table') {
            for (const row of node.table.rows) {
                for (const cell of row.cells) cell.paragraphs.forEach((paragraph) => claim(node, paragraph));
            }
        }
    });

    const attach = (list: ListNode): ListNode => ({
        ...list,
        items: list.items.map((item) => ({
            ...item,
            floats: [...item.floats, ...(anchored.get(item) ?? [])],
            children: item.children.map(attach),
        })),
    });
    let placed = mapFlow(body, (node) => {
        if (node.kind === 'paragraph' || node.kind === 'table') return [node, ...(anchored.get(node) ?? []).map(floatFlow)];
        if (node.kind === 'list') return [attach(node)];
        return [node];
    });

    const appended = floats.filter((f) => f.placement === 'pending');
    if (appended.length === 0) return placed;
    for (const float of appended) float.placement = 'appended';

    const refLists: RefListNode[] = [];
    walkFlow(placed, (node) => {
        if (node.kind === 'ref-list') refLists.push(node);
    });
    const anchor: RefListNode | undefined = refLists[refLists.length - 1];
    if (!anchor) return [...placed, ...appended.map(floatFlow)];

    placed = mapFlow(placed, (node) => (node === anchor ? [node, ...appended.map(floatFlow)] : [node]));
    return placed;
}
