/**
 * Key-term linking.
 *
 * Bold text that spells a key term, case-insensitively and optionally with
 * a plural "s", is wrapped in a cross-reference to the term's list entry.
 * Existing cross-references and links are left alone.
 */

import { childrenOf, plainText, withChildren } from '../inline.js';
import type { FlowNode, Inline } from '../types.js';
import { mapFlowInlines, walkFlow } from './flow.js';

/** Lower-cased term text → term id; the first definition of a term wins. */
export function keyTermIndex(body: readonly FlowNode[]): Map<string, string> {
    const index = new Map<string, string>();
    walkFlow(body, (node) => {
        if (node.kind !== 'key-term-list') return;
        for (const term of node.terms) {
            const key = plainText(term.content).trim().toLowerCase();
            if (key !== '' && !index.has(key)) index.set(key, term.id);
        }
    });
    return index;
}

function termFor(index: ReadonlyMap<string, string>, value: string): string | null {
    const key = value.trim().toLowerCase();
    return index.get(key) ?? (key.endsWith('s') ? index.get(key.slice(0, -1)) ?? null : null);
}

export function linkKeyTerms(body: FlowNode[]): FlowNode[] {
    const index = keyTermIndex(body);
    if (index.size === 0) return body;

    const link = (nodes: Inline[]): Inline[] =>
        nodes.map((node): Inline => {
            if (node.type === 'xref' || node.type === 'link') return node;
            if (node.type === 'format' && node.format === 'bold') {
                const target = termFor(index, plainText(node.children));
                if (target) {
                    return { ...node, children: [{ type: 'xref', refType: 'keyterm', target, resolution: 'resolved', children: node.children }] };
                }
            }
            const children = childrenOf(node);
            return children ? withChildren(node, link(children)) : node;
        });
    return mapFlowInlines(body, link);
}
