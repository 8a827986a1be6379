/**
 * DocNode inlines → inline IR.
 */

import type { ConversionContext } from '../context.js';
import {
    BOOKMARK_REFERENCE_FIELD,
    HYPERLINK_FIELD,
    HYPERLINK_LOCAL_SWITCH,
    TABLE_DECLARATION_FIELD,
} from '../constants.js';
import type { FieldNode, Inline, InlineNode } from '../types.js';
import { wrapRunText } from './run-formatting.js';
import type { StyleLookup } from './style-lookup.js';

/** Give scheme-less link targets an explicit scheme. */
export function externalHref(target: string): string {
    const trimmed = target.trim();
    if (/^[a-z][a-z0-9+.-]*:/i.test(trimmed) || trimmed.startsWith('#')) return trimmed;
    if (/^[^\s/@]+@[^\s/@]+$/.test(trimmed)) return `mailto:${trimmed}`;
    return `http://${trimmed}`;
}

function convertField(field: FieldNode, children: Inline[]): Inline[] {
    const instruction = field.instruction;
    if (TABLE_DECLARATION_FIELD.test(instruction)) return [];

    const hyperlink = HYPERLINK_FIELD.exec(instruction);
    if (hyperlink) {
        if (HYPERLINK_LOCAL_SWITCH.test(instruction)) {
            return [{ type: 'xref', refType: 'other', target: hyperlink[1], resolution: 'resolved', children }];
        }
        return [{ type: 'link', href: externalHref(hyperlink[1]), children }];
    }

    const bookmark = BOOKMARK_REFERENCE_FIELD.exec(instruction);
    if (bookmark) {
        return [{ type: 'xref', refType: 'other', target: bookmark[1], resolution: 'resolved', children }];
    }
    return children;
}

export function convertInlineNodes(nodes: readonly InlineNode[], lookup: StyleLookup, context: ConversionContext): Inline[] {
    const out: Inline[] = [];
    for (const node of nodes) {
        switch (node.kind) {
            case 'run': {
                const role = lookup.characterRole(node.styleClass);
                for (const t of node.children) out.push(wrapRunText(t.text, t.flags, role));
                break;
            }
            case 'hyperlink': {
                const children = convertInlineNodes(node.children, lookup, context);
                if (node.anchor) {
                    out.push({ type: 'xref', refType: 'other', target: node.anchor, resolution: 'resolved', children });
                } else if (node.target) {
                    out.push({ type: 'link', href: externalHref(node.target), children });
                } else {
                    context.report('structural-anomaly', 'hyperlink without target or anchor');
                    out.push(...children);
                }
                break;
            }
            case 'field':
                out.push(...convertField(node, convertInlineNodes(node.children, lookup, context)));
                break;
            case 'comment-range':
                out.push({ type: 'comment', edge: node.edge, id: node.commentId });
                break;
        }
    }
    return out;
}
