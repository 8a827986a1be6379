/**
 * Helpers over the inline IR shared by the transformer and the structurer.
 */

import type { Inline, InlineFormat, TextInline } from './types.js';

export function text(value: string): TextInline {
    return { type: 'text', value };
}

export function childrenOf(node: Inline): Inline[] | null {
    switch (node.type) {
        case 'text':
        case 'comment':
            return null;
        default:
            return node.children;
    }
}

/** Copy of `node` with new children; leaves are returned unchanged. */
export function withChildren(node: Inline, children: Inline[]): Inline {
    switch (node.type) {
        case 'text':
        case 'comment':
            return node;
        default:
            return { ...node, children };
    }
}

/** Concatenated text content, markup stripped. */
export function plainText(nodes: readonly Inline[]): string {
    let out = '';
    for (const node of nodes) {
        if (node.type === 'text') out += node.value;
        else if (node.type !== 'comment') out += plainText(node.children);
    }
    return out;
}

export function countNodes(nodes: readonly Inline[]): number {
    let count = 0;
    for (const node of nodes) {
        count++;
        const children = childrenOf(node);
        if (children) count += countNodes(children);
    }
    return count;
}

/**
 * Rewrite the first text leaf (depth-first). Returns the input array when
 * there is no text leaf.
 */
export function mapFirstText(nodes: Inline[], fn: (value: string) => string): Inline[] {
    for (let i = 0; i < nodes.length; i++) {
        const node = nodes[i];
        if (node.type === 'text') {
            return [...nodes.slice(0, i), text(fn(node.value)), ...nodes.slice(i + 1)];
        }
        const children = childrenOf(node);
        if (children && plainText(children) !== '') {
            return [...nodes.slice(0, i), withChildren(node, mapFirstText(children, fn)), ...nodes.slice(i + 1)];
        }
    }
    return nodes;
}

/** Depth-first rewrite of every node, children first. */
export function mapInlines(nodes: readonly Inline[], fn: (node: Inline) => Inline[]): Inline[] {
    const out: Inline[] = [];
    for (const node of nodes) {
        const children = childrenOf(node);
        out.push(...fn(children ? withChildren(node, mapInlines(children, fn)) : node));
    }
    return out;
}

/** Visit every node depth-first in document order. */
export function visitInlines(nodes: readonly Inline[], visit: (node: Inline) => void): void {
    for (const node of nodes) {
        visit(node);
        const children = childrenOf(node);
        if (children) visitInlines(children, visit);
    }
}

/** `[<bold>x</bold>]` → `[x]`; anything else is returned as is. */
export function unwrapSoleFormat(nodes: Inline[], format: InlineFormat): Inline[] {
    const only = nodes.length === 1 ? nodes[0] : null;
    return only && only.type === 'format' && only.format === format ? only.children : nodes;
}

/** Drop the first `count` characters of text content, emptied leaves included. */
export function dropLeadingText(nodes: Inline[], count: number): Inline[] {
    let remaining = count;
    const walk = (list: Inline[]): Inline[] => {
        const out: Inline[] = [];
        for (const node of list) {
            if (remaining <= 0) {
                out.push(node);
                continue;
            }
            if (node.type === 'text') {
                const cut = Math.min(remaining, node.value.length);
                remaining -= cut;
                if (cut < node.value.length) out.push(text(node.value.slice(cut)));
                continue;
            }
            const children = childrenOf(node);
            if (!children) {
                out.push(node);
                continue;
            }
            const rest = walk(children);
            if (plainText(rest) !== '' || rest.some((n) => n.type === 'comment')) out.push(withChildren(node, rest));
        }
        return out;
    };
    return walk(nodes);
}
