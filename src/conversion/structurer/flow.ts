/**
 * Traversal helpers over the structured flow tree.
 */

import type { ContainerNode, FlowNode, Inline, ListItemNode, ListNode, ReconstructedTable } from '../types.js';

export function isContainer(node: FlowNode): node is ContainerNode {
    return node.kind === 'section' || node.kind === 'box';
}

/** Rebuild a flow bottom-up; `fn` maps each node (children already mapped) to its replacements. */
export function mapFlow(nodes: readonly FlowNode[], fn: (node: FlowNode) => FlowNode[]): FlowNode[] {
    const out: FlowNode[] = [];
    for (const node of nodes) {
        out.push(...fn(isContainer(node) ? { ...node, children: mapFlow(node.children, fn) } : node));
    }
    return out;
}

export function mapTableInlines(table: ReconstructedTable, fn: (content: Inline[]) => Inline[]): ReconstructedTable {
    return {
        ...table,
        rows: table.rows.map((row) => ({
            ...row,
            cells: row.cells.map((cell) => ({ ...cell, paragraphs: cell.paragraphs.map(fn) })),
        })),
    };
}

function mapListInlines(list: ListNode, fn: (content: Inline[]) => Inline[]): ListNode {
    return {
        ...list,
        items: list.items.map(
            (item): ListItemNode => ({
                ...item,
                content: fn(item.content),
                children: item.children.map((child) => mapListInlines(child, fn)),
            }),
        ),
    };
}

/**
 * Apply `fn` to every inline sequence of the body in document order:
 * section and box titles, paragraphs, list items and table cells.
 */
export function mapFlowInlines(nodes: readonly FlowNode[], fn: (content: Inline[]) => Inline[]): FlowNode[] {
    return nodes.map((node): FlowNode => {
        switch (node.kind) {
            case 'section':
            case 'box': {
                const title = fn(node.title);
                return { ...node, title, children: mapFlowInlines(node.children, fn) };
            }
            case 'paragraph':
                return { ...node, content: fn(node.content) };
            case 'list':
                return mapListInlines(node, fn);
            case 'table':
                return { ...node, table: mapTableInlines(node.table, fn) };
            default:
                return node;
        }
    });
}

/** Visit every node depth-first in document order. */
export function walkFlow(nodes: readonly FlowNode[], visit: (node: FlowNode) => void): void {
    for (const node of nodes) {
        visit(node);
        if (isContainer(node)) walkFlow(node.children, visit);
    }
}
