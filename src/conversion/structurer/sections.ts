/**
 * Section nesting.
 *
 * A heading of level L closes every open section of level ≥ L and opens a
 * new one inside whatever remains open, so the result is always a tree.
 * A `<case study>` marker opens a box. Headings never close an open box;
 * only the matching `</case study>` marker does, together with every
 * section opened inside it.
 */

import type { LabelTable } from '../../config.js';
import { CASE_STUDY_MARKER } from '../constants.js';
import type { ConversionContext } from '../context.js';
import { dropLeadingText, plainText, unwrapSoleFormat } from '../inline.js';
import type { Block, BoxNode, ContainerNode, FlowNode, Inline, KeyTermListNode, SectionNode } from '../types.js';
import { escapeRegExp } from './match-keys.js';

function toFlow(block: Block): FlowNode {
    switch (block.type) {
        case 'list-item':
            return {
                kind: 'list',
                listType: block.listType,
                level: block.level,
                items: [{ label: block.label, content: block.content, floats: [], children: [] }],
            };
        case 'table':
            return { kind: 'table', table: block.table };
        case 'placeholder':
            return { kind: 'placeholder', styleClass: block.styleClass };
        case 'text':
            return block.role === 'reference'
                ? { kind: 'reference', content: block.content }
                : { kind: 'paragraph', styleClass: block.styleClass, content: block.content };
    }
}

/** 'open' or 'close' for a case study marker paragraph. */
function boxMarker(block: Block): 'open' | 'close' | null {
    if (block.type !== 'text' || block.role !== 'paragraph') return null;
    const match = CASE_STUDY_MARKER.exec(plainText(block.content));
    if (!match) return null;
    return match[1] ? 'close' : 'open';
}

/** "Case Study 3.1: Title" → label "Case Study 3.1:" and the rest as title. */
export function splitBoxTitle(content: Inline[], labels: LabelTable): { label: string | null; title: Inline[] } {
    const title = unwrapSoleFormat(content, 'bold');
    if (labels.caseStudy.length === 0) return { label: null, title };
    const words = labels.caseStudy.map(escapeRegExp).join('|');
    const match = new RegExp(`^\\s*((?:${words})\\s+[0-9][0-9.\\-]*:?)\\s*`, 'i').exec(plainText(title));
    if (!match) return { label: null, title };
    return { label: match[1], title: dropLeadingText(title, match[0].length) };
}

export function buildSections(blocks: readonly Block[], context: ConversionContext): FlowNode[] {
    const root: FlowNode[] = [];
    const open: ContainerNode[] = [];
    const top = (): ContainerNode | undefined => open[open.length - 1];
    const container = (): FlowNode[] => top()?.children ?? root;

    for (const block of blocks) {
        const marker = boxMarker(block);
        if (marker === 'open') {
            const box: BoxNode = { kind: 'box', id: `cs${context.chapterNumber}_${context.next('box')}`, label: null, title: [], children: [] };
            container().push(box);
            open.push(box);
            continue;
        }
        if (marker === 'close') {
            const index = open.map((node) => node.kind).lastIndexOf('box');
            if (index < 0) context.report('structural-anomaly', 'case study end marker without an open case study');
            else open.length = index;
            continue;
        }

        if (block.type === 'text' && block.role === 'heading') {
            const level = block.level ?? 1;
            for (let current = top(); current?.kind === 'section' && current.level >= level; current = top()) open.pop();
            const section: SectionNode = {
                kind: 'section',
                id: `ch${context.chapterNumber}lev${level}sec${context.next('section')}`,
                level,
                title: unwrapSoleFormat(block.content, 'bold'),
                children: [],
            };
            container().push(section);
            open.push(section);
            continue;
        }

        if (block.type === 'text' && block.role === 'case-study-title') {
            const box = top();
            if (box?.kind === 'box' && box.title.length === 0 && box.children.length === 0) {
                const parts = splitBoxTitle(block.content, context.config.labels);
                box.label = parts.label;
                box.title = parts.title;
                continue;
            }
            context.report('structural-anomaly', 'case study title outside the start of a case study', { text: plainText(block.content) });
        }

        if (block.type === 'text' && block.role === 'key-term') {
            const siblings = container();
            const last: FlowNode | undefined = siblings[siblings.length - 1];
            const term = { id: `term${context.next('term')}`, content: block.content };
            if (last?.kind === 'key-term-list') {
                last.terms.push(term);
            } else {
                const list: KeyTermListNode = { kind: 'key-term-list', terms: [term] };
                siblings.push(list);
            }
            continue;
        }

        container().push(toFlow(block));
    }

    for (const node of open) {
        if (node.kind === 'box') context.report('structural-anomaly', `case study ${node.id} is not closed`, { id: node.id });
    }
    return root;
}
