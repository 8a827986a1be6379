/**
 * Inline cleanup to a fixed point:
 *  - adjacent text leaves are joined
 *  - adjacent identical wrappers are merged
 *  - wrappers with nothing visible inside are unwrapped
 *
 * Each rule removes exactly one node, so the node count is the measure.
 */

import { childrenOf, countNodes, plainText, withChildren } from '../inline.js';
import { rewriteToFixedPoint, type FixedPointResult } from '../rewrite.js';
import type { Inline, InlineFormat } from '../types.js';

/** Formats that are invisible on whitespace. */
const WHITESPACE_TRANSPARENT: ReadonlySet<InlineFormat> = new Set(['bold', 'italic', 'small-caps', 'superscript', 'subscript']);

function isBlankWrapper(node: Inline): node is Extract<Inline, { type: 'format' | 'role' }> {
    if (node.type !== 'format' && node.type !== 'role') return false;
    const content = plainText(node.children);
    if (content === '') return true;
    return node.type === 'format' && WHITESPACE_TRANSPARENT.has(node.format) && content.trim() === '';
}

function sameWrapper(a: Inline, b: Inline): boolean {
    if (a.type === 'format' && b.type === 'format') return a.format === b.format;
    if (a.type === 'role' && b.type === 'role') return a.role === b.role;
    return false;
}

/** Apply the first applicable rule, or return null. */
function mergeStep(nodes: Inline[]): Inline[] | null {
    for (let i = 0; i < nodes.length; i++) {
        const a = nodes[i];
        const b: Inline | undefined = nodes[i + 1];

        if (isBlankWrapper(a)) {
            return [...nodes.slice(0, i), ...a.children, ...nodes.slice(i + 1)];
        }
        if (b && a.type === 'text' && b.type === 'text') {
            return [...nodes.slice(0, i), { type: 'text', value: a.value + b.value }, ...nodes.slice(i + 2)];
        }
        if (b && sameWrapper(a, b)) {
            const merged = withChildren(a, [...(childrenOf(a) ?? []), ...(childrenOf(b) ?? [])]);
            return [...nodes.slice(0, i), merged, ...nodes.slice(i + 2)];
        }
        const children = childrenOf(a);
        if (children) {
            const inner = mergeStep(children);
            if (inner) return [...nodes.slice(0, i), withChildren(a, inner), ...nodes.slice(i + 1)];
        }
    }
    return null;
}

/** The merged inlines with the number of rules applied, never more than `countNodes(nodes)`. */
export function mergeInlineSteps(nodes: Inline[]): FixedPointResult<Inline[]> {
    return rewriteToFixedPoint(nodes, mergeStep, countNodes, 'inline merge');
}

export function mergeInlines(nodes: Inline[]): Inline[] {
    return mergeInlineSteps(nodes).value;
}
