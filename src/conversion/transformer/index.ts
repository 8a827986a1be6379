/**
 * Structural Transformer: NormalizedDocument in, flat Block stream out.
 *
 * @module conversion/transformer
 */

import type { ConversionContext } from '../context.js';
import { plainText } from '../inline.js';
import type { Block, CellNode, Inline, NormalizedDocument, NumberingMap, ParagraphNode } from '../types.js';
import { convertInlineNodes } from './inline-converter.js';
import { mergeInlines } from './inline-merge.js';
import { classifyParagraph, extractManualLabel, ListLabeler } from './paragraph-mapper.js';
import { StyleLookup } from './style-lookup.js';
import { reconstructTable } from './table-reconstructor.js';

export { FORMAT_CHAINS, canonicalFlags, formatChain, wrapRunText } from './run-formatting.js';
export { mergeInlines } from './inline-merge.js';
export { classifyParagraph, formatListLabel, ListLabeler } from './paragraph-mapper.js';
export { reconstructTable, columnPercentages, expectedColumns } from './table-reconstructor.js';
export { StyleLookup } from './style-lookup.js';
export { externalHref } from './inline-converter.js';

function paragraphContent(paragraph: ParagraphNode, lookup: StyleLookup, context: ConversionContext): Inline[] {
    return mergeInlines(convertInlineNodes(paragraph.children, lookup, context));
}

export function transformDocument(doc: NormalizedDocument, numbering: NumberingMap, context: ConversionContext): Block[] {
    const lookup = new StyleLookup(context.config.styleMap);
    const labeler = new ListLabeler();
    const blocks: Block[] = [];

    const convertCell = (cell: CellNode): Inline[][] =>
        cell.children
            .map((p) => paragraphContent(p, lookup, context))
            .filter((content) => plainText(content).trim() !== '');

    for (const node of doc.blocks) {
        if (node.kind === 'table') {
            labeler.reset();
            blocks.push({ type: 'table', table: reconstructTable(node, convertCell, lookup, context) });
            continue;
        }

        const content = paragraphContent(node, lookup, context);
        const decision = classifyParagraph(node, plainText(content).trim() !== '', lookup, numbering);
        switch (decision.kind) {
            case 'drop':
                break;
            case 'placeholder':
                labeler.reset();
                blocks.push({ type: 'placeholder', styleClass: node.styleClass });
                break;
            case 'list': {
                const manual = extractManualLabel(content);
                const counted = labeler.next(decision.listType, decision.level);
                blocks.push({
                    type: 'list-item',
                    listType: decision.listType,
                    level: decision.level,
                    label: manual.label ?? counted,
                    styleClass: node.styleClass,
                    content: mergeInlines(manual.content),
                });
                break;
            }
            case 'text':
                labeler.reset();
                blocks.push({
                    type: 'text',
                    role: decision.role,
                    level: decision.level,
                    styleClass: node.styleClass,
                    content,
                });
                break;
        }
    }
    return blocks;
}
