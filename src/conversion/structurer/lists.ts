/**
 * List nesting.
 *
 * Every list item starts as a singleton list. Two rules are applied one
 * site at a time until none applies:
 *   merge  adjacent lists of the same type and level become one list
 *   nest   a list whose level is one deeper than its predecessor moves into
 *          the predecessor's last item (types may differ)
 * The deepest site goes first; at equal depth merge beats nest, then the
 * leftmost site wins.
 *
 * Measure: Σ (W − depth) over all lists, with W one above the deepest level
 * and depth the number of enclosing lists. A list's depth never exceeds
 * level − 1, so every term is positive; merge removes a term and nest
 * lowers at least one.
 */

import { rewriteToFixedPoint, type FixedPointResult } from '../rewrite.js';
import type { FlowNode, ListNode } from '../types.js';
import { isContainer } from './flow.js';

interface Site {
    depth: number;
    merge: boolean;
    first: ListNode;
    second: ListNode;
    /** Detach `second` from its container. */
    remove: () => void;
}

function cloneList(list: ListNode): ListNode {
    return { ...list, items: list.items.map((item) => ({ ...item, children: item.children.map(cloneList) })) };
}

function cloneFlow(nodes: readonly FlowNode[]): FlowNode[] {
    return nodes.map((node): FlowNode => {
        if (isContainer(node)) return { ...node, children: cloneFlow(node.children) };
        if (node.kind === 'list') return cloneList(node);
        return node;
    });
}

function siteFor(first: ListNode, second: ListNode, remove: () => void): Site | null {
    if (first.listType === second.listType && first.level === second.level) {
        return { depth: second.level, merge: true, first, second, remove };
    }
    if (second.level === first.level + 1) {
        return { depth: second.level, merge: false, first, second, remove };
    }
    return null;
}

function collectSites(nodes: FlowNode[], sites: Site[]): void {
    for (let i = 0; i < nodes.length; i++) {
        const node = nodes[i];
        if (isContainer(node)) collectSites(node.children, sites);
        if (node.kind === 'list') collectListSites(node, sites);
        const next: FlowNode | undefined = nodes[i + 1];
        if (node.kind === 'list' && next && next.kind === 'list') {
            const site = siteFor(node, next, () => nodes.splice(i + 1, 1));
            if (site) sites.push(site);
        }
    }
}

function collectListSites(list: ListNode, sites: Site[]): void {
    for (const item of list.items) {
        const children = item.children;
        for (let i = 0; i < children.length; i++) {
            collectListSites(children[i], sites);
            const next: ListNode | undefined = children[i + 1];
            if (next) {
                const site = siteFor(children[i], next, () => children.splice(i + 1, 1));
                if (site) sites.push(site);
            }
        }
    }
}

/** Sites arrive in document order, so the first best site is the leftmost. */
function pickSite(sites: readonly Site[]): Site | null {
    let best: Site | null = null;
    for (const site of sites) {
        if (
            !best ||
            site.depth > best.depth ||
            (site.depth === best.depth && site.merge && !best.merge)
        ) {
            best = site;
        }
    }
    return best;
}

function nestStep(flow: FlowNode[]): FlowNode[] | null {
    const copy = cloneFlow(flow);
    const sites: Site[] = [];
    collectSites(copy, sites);
    const site = pickSite(sites);
    if (!site) return null;

    site.remove();
    if (site.merge) {
        site.first.items.push(...site.second.items);
    } else {
        site.first.items[site.first.items.length - 1].children.push(site.second);
    }
    return copy;
}

function forEachList(nodes: readonly FlowNode[], visit: (list: ListNode, depth: number) => void): void {
    const walkList = (list: ListNode, depth: number): void => {
        visit(list, depth);
        for (const item of list.items) item.children.forEach((child) => walkList(child, depth + 1));
    };
    for (const node of nodes) {
        if (isContainer(node)) forEachList(node.children, visit);
        else if (node.kind === 'list') walkList(node, 0);
    }
}

export function listMeasure(flow: readonly FlowNode[]): number {
    let deepest = 0;
    forEachList(flow, (list) => {
        deepest = Math.max(deepest, list.level);
    });
    let measure = 0;
    forEachList(flow, (_, depth) => {
        measure += deepest + 1 - depth;
    });
    return measure;
}

export function nestLists(flow: FlowNode[]): FixedPointResult<FlowNode[]> {
    return rewriteToFixedPoint(flow, nestStep, listMeasure, 'list nesting');
}
