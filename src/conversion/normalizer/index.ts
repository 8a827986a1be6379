/**
 * Style Normalizer: document.xml text in, NormalizedDocument out.
 *
 * @module conversion/normalizer
 */

import { logger } from '../../utils/logger.js';
import type { ConversionContext } from '../context.js';
import { TABLE_DECLARATION_FIELD } from '../constants.js';
import { getBody, parseXml } from '../dom.js';
import type { BlockNode, InlineNode, NormalizedDocument, ParagraphNode, RelationshipMap } from '../types.js';
import { cleanupMarkup } from './markup-cleanup.js';
import { readBody } from './document-reader.js';

export { cleanupMarkup } from './markup-cleanup.js';
export type { CleanupSummary } from './markup-cleanup.js';
export { readBody, readRunFlags } from './document-reader.js';

function declaredColumnsOf(node: InlineNode): number | null {
    if (node.kind !== 'field') return null;
    const match = TABLE_DECLARATION_FIELD.exec(node.instruction);
    return match ? parseInt(match[1], 10) : null;
}

function hasVisibleContent(nodes: InlineNode[]): boolean {
    return nodes.some((node) => {
        switch (node.kind) {
            case 'run':
                return node.children.some((t) => t.text.trim() !== '');
            case 'comment-range':
                return false;
            default:
                return hasVisibleContent(node.children);
        }
    });
}

/**
 * Move table-declaration fields onto the table that follows them.
 * The marker is consumed; a paragraph left empty by it disappears.
 */
export function applyTableDeclarations(blocks: BlockNode[], context: ConversionContext): BlockNode[] {
    const out: BlockNode[] = [];
    let pending: number | null = null;

    for (const block of blocks) {
        if (block.kind === 'table') {
            out.push(pending === null ? block : { ...block, declaredColumns: pending });
            pending = null;
            continue;
        }
        const kept: InlineNode[] = [];
        let found = false;
        for (const child of block.children) {
            const declared = declaredColumnsOf(child);
            if (declared === null) {
                kept.push(child);
                continue;
            }
            if (pending !== null) {
                context.report('structural-anomaly', 'table declaration superseded before any table', { columns: pending });
            }
            pending = declared;
            found = true;
        }
        if (!found) {
            out.push(block);
        } else if (hasVisibleContent(kept)) {
            const rest: ParagraphNode = { ...block, children: kept };
            out.push(rest);
        }
    }

    if (pending !== null) {
        context.report('structural-anomaly', 'table declaration not followed by a table', { columns: pending });
    }
    return out;
}

/** Parse, clean and read one document.xml. */
export function normalizeDocument(documentXml: string, relationships: RelationshipMap, context: ConversionContext): NormalizedDocument {
    const body = getBody(parseXml(documentXml, context.documentName));
    const summary = cleanupMarkup(body);
    logger.debug(
        `${context.documentName}: cleanup removed ${summary.removed}, unwrapped ${summary.unwrapped}, ` +
            `restyled ${summary.restyled}, folded ${summary.foldedCells} cells`,
    );
    return { blocks: applyTableDeclarations(readBody(body, relationships, context), context) };
}
