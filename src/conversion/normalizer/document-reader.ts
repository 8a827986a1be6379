/**
 * Reads a cleaned <w:body> into the DocNode tree.
 *
 * Complex fields (w:fldChar begin/separate/end) are folded into FieldNodes
 * holding their instruction and displayed result. Anything the reader does
 * not understand is recorded as a structural anomaly and read through.
 */

import type { ConversionContext } from '../context.js';
import { FormatFlag, NAMESPACES, NO_FORMATTING, SUPPRESSED_BORDER_VALUES } from '../constants.js';
import {
    elementChildren,
    getChildValue,
    getDirectChild,
    getDirectChildren,
    getWordAttribute,
    isToggleOn,
} from '../dom.js';
import type {
    BlockNode,
    BorderEdge,
    CellNode,
    FieldNode,
    FormatFlags,
    InlineNode,
    NumberingReference,
    ParagraphNode,
    RelationshipMap,
    RowNode,
    RunNode,
    TableNode,
    TextNode,
} from '../types.js';

/** Body-level and inline elements that carry nothing for conversion. */
const IGNORED_ELEMENTS = new Set([
    'pPr',
    'rPr',
    'sectPr',
    'bookmarkStart',
    'bookmarkEnd',
    'permStart',
    'permEnd',
    'lastRenderedPageBreak',
    'commentReference',
    'footnoteReference',
    'endnoteReference',
    'softHyphen',
    'annotationRef',
    'drawing',
    'pict',
    'object',
]);

const BORDER_EDGES: Readonly<Record<string, BorderEdge>> = {
    top: 'top',
    bottom: 'bottom',
    left: 'left',
    start: 'left',
    right: 'right',
    end: 'right',
};

function parsePositiveInt(value: string | null, fallback: number): number {
    const parsed = value === null ? NaN : parseInt(value, 10);
    return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

export function readRunFlags(rPr: Element | null): FormatFlags {
    if (!rPr) return NO_FORMATTING;
    let flags = NO_FORMATTING;
    if (isToggleOn(rPr, 'b')) flags |= FormatFlag.BOLD;
    if (isToggleOn(rPr, 'i')) flags |= FormatFlag.ITALIC;
    if (isToggleOn(rPr, 'u')) flags |= FormatFlag.UNDERLINE;
    if (isToggleOn(rPr, 'strike') || isToggleOn(rPr, 'dstrike')) flags |= FormatFlag.STRIKE;
    if (isToggleOn(rPr, 'smallCaps')) flags |= FormatFlag.SMALL_CAPS;
    const vertAlign = getChildValue(rPr, 'vertAlign');
    if (vertAlign === 'superscript') flags |= FormatFlag.SUPERSCRIPT;
    else if (vertAlign === 'subscript') flags |= FormatFlag.SUBSCRIPT;
    return flags;
}

// ═══════════════════════════════════════════════════════════════════════
// Inline collection
// ═══════════════════════════════════════════════════════════════════════

interface FieldFrame {
    instruction: string;
    inResult: boolean;
    children: InlineNode[];
}

/** Collects inline nodes for one container, tracking open complex fields. */
class InlineCollector {
    private readonly root: InlineNode[] = [];
    private readonly fields: FieldFrame[] = [];
    private readonly discarded: InlineNode[] = [];

    constructor(private readonly context: ConversionContext) {}

    private sink(): InlineNode[] {
        const top = this.fields[this.fields.length - 1];
        if (!top) return this.root;
        return top.inResult ? top.children : this.discarded;
    }

    push(node: InlineNode): void {
        this.sink().push(node);
    }

    fieldChar(type: string | null): void {
        if (type === 'begin') {
            this.fields.push({ instruction: '', inResult: false, children: [] });
            return;
        }
        const top = this.fields[this.fields.length - 1];
        if (!top) {
            this.context.report('structural-anomaly', `field ${type ?? 'marker'} without a matching begin`);
            return;
        }
        if (type === 'separate') {
            top.inResult = true;
        } else if (type === 'end') {
            this.fields.pop();
            this.push(fieldNode(top.instruction, top.children));
        }
    }

    instruction(text: string): void {
        const top = this.fields[this.fields.length - 1];
        if (top && !top.inResult) top.instruction += text;
    }

    /** Close the container; fields left open keep the result read so far. */
    finish(): InlineNode[] {
        while (this.fields.length > 0) {
            const open = this.fields.pop();
            if (!open) break;
            this.context.report('structural-anomaly', 'field not closed within its paragraph', {
                instruction: open.instruction.trim(),
            });
            this.push(fieldNode(open.instruction, open.children));
        }
        return this.root;
    }
}

function fieldNode(instruction: string, children: InlineNode[]): FieldNode {
    return { kind: 'field', instruction: instruction.trim(), children, styleClass: '', flags: NO_FORMATTING };
}

function runText(el: Element): string | null {
    switch (el.localName) {
        case 't':
            return el.textContent ?? '';
        case 'tab':
            return '\t';
        case 'br':
        case 'cr':
            return '\n';
        case 'noBreakHyphen':
            return '‑';
        case 'sym': {
            const code = parseInt(getWordAttribute(el, 'char') ?? '', 16);
            return Number.isNaN(code) ? '' : String.fromCodePoint(code);
        }
        default:
            return null;
    }
}

function readRun(r: Element, collector: InlineCollector, context: ConversionContext): void {
    const rPr = getDirectChild(r, 'rPr');
    const styleClass = getChildValue(rPr, 'rStyle') ?? '';
    const flags = readRunFlags(rPr);
    let texts: TextNode[] = [];

    const flush = (): void => {
        if (texts.length === 0) return;
        const run: RunNode = { kind: 'run', styleClass, flags, children: texts };
        collector.push(run);
        texts = [];
    };

    for (const child of elementChildren(r)) {
        if (child.namespaceURI !== NAMESPACES.W) continue;
        const text = runText(child);
        if (text !== null) {
            const last = texts[texts.length - 1];
            if (last) last.text += text;
            else texts.push({ kind: 'text', text, styleClass, flags });
            continue;
        }
        if (child.localName === 'fldChar') {
            flush();
            collector.fieldChar(getWordAttribute(child, 'fldCharType'));
        } else if (child.localName === 'instrText') {
            collector.instruction(child.textContent ?? '');
        } else if (!IGNORED_ELEMENTS.has(child.localName)) {
            context.report('structural-anomaly', `unexpected run content <w:${child.localName}>`);
        }
    }
    flush();
}

/** Text of a foreign subtree (math, markup-compatibility wrappers), fallback branches skipped. */
function foreignText(el: Element): string {
    if (el.localName === 'Fallback') return '';
    if (el.localName === 't') return el.textContent ?? '';
    return elementChildren(el).map(foreignText).join('');
}

function plainRun(text: string): RunNode {
    return {
        kind: 'run',
        styleClass: '',
        flags: NO_FORMATTING,
        children: [{ kind: 'text', text, styleClass: '', flags: NO_FORMATTING }],
    };
}

function readInlines(container: Element, collector: InlineCollector, relationships: RelationshipMap, context: ConversionContext): void {
    for (const el of elementChildren(container)) {
        if (el.namespaceURI !== NAMESPACES.W) {
            context.report('structural-anomaly', `unsupported inline element <${el.nodeName}>`);
            const text = foreignText(el);
            if (text !== '') collector.push(plainRun(text));
            continue;
        }
        switch (el.localName) {
            case 'r':
                readRun(el, collector, context);
                break;
            case 'hyperlink': {
                const inner = new InlineCollector(context);
                readInlines(el, inner, relationships, context);
                const rId = el.getAttributeNS(NAMESPACES.R, 'id') || el.getAttribute('r:id');
                const target = rId ? relationships.get(rId) ?? null : null;
                if (rId && target === null) {
                    context.report('structural-anomaly', `hyperlink relationship ${rId} not found`);
                }
                collector.push({
                    kind: 'hyperlink',
                    anchor: getWordAttribute(el, 'anchor'),
                    target,
                    children: inner.finish(),
                    styleClass: '',
                    flags: NO_FORMATTING,
                });
                break;
            }
            case 'fldSimple': {
                const inner = new InlineCollector(context);
                readInlines(el, inner, relationships, context);
                collector.push(fieldNode(getWordAttribute(el, 'instr') ?? '', inner.finish()));
                break;
            }
            case 'commentRangeStart':
            case 'commentRangeEnd':
                collector.push({
                    kind: 'comment-range',
                    edge: el.localName === 'commentRangeStart' ? 'start' : 'end',
                    commentId: getWordAttribute(el, 'id') ?? '',
                    styleClass: '',
                    flags: NO_FORMATTING,
                });
                break;
            default:
                if (!IGNORED_ELEMENTS.has(el.localName)) {
                    context.report('structural-anomaly', `unexpected inline element <w:${el.localName}>`);
                    readInlines(el, collector, relationships, context);
                }
        }
    }
}

// ═══════════════════════════════════════════════════════════════════════
// Blocks
// ═══════════════════════════════════════════════════════════════════════

function readNumbering(pPr: Element | null): NumberingReference | null {
    const numPr = pPr ? getDirectChild(pPr, 'numPr') : null;
    const numId = getChildValue(numPr, 'numId');
    if (!numId || numId === '0') return null;
    return { numId, level: parsePositiveInt(getChildValue(numPr, 'ilvl'), 0) };
}

function readParagraph(p: Element, relationships: RelationshipMap, context: ConversionContext): ParagraphNode {
    const pPr = getDirectChild(p, 'pPr');
    const collector = new InlineCollector(context);
    readInlines(p, collector, relationships, context);
    return {
        kind: 'paragraph',
        styleClass: getChildValue(pPr, 'pStyle') ?? '',
        flags: NO_FORMATTING,
        numbering: readNumbering(pPr),
        justification: getChildValue(pPr, 'jc'),
        children: collector.finish(),
    };
}

function readSuppressedBorders(tcPr: Element | null): BorderEdge[] {
    const borders = tcPr ? getDirectChild(tcPr, 'tcBorders') : null;
    if (!borders) return [];
    const edges: BorderEdge[] = [];
    for (const edge of elementChildren(borders)) {
        const mapped = BORDER_EDGES[edge.localName];
        const val = getWordAttribute(edge, 'val');
        if (mapped && val && SUPPRESSED_BORDER_VALUES.has(val) && !edges.includes(mapped)) edges.push(mapped);
    }
    return edges;
}

/** Paragraphs of a cell; nested tables are flattened into their paragraphs. */
function readCellParagraphs(container: Element, relationships: RelationshipMap, context: ConversionContext): ParagraphNode[] {
    const out: ParagraphNode[] = [];
    for (const el of elementChildren(container)) {
        if (el.localName === 'p') {
            out.push(readParagraph(el, relationships, context));
        } else if (el.localName === 'tbl') {
            context.report('structural-anomaly', 'nested table flattened into its cell');
            for (const tr of getDirectChildren(el, 'tr')) {
                for (const tc of getDirectChildren(tr, 'tc')) out.push(...readCellParagraphs(tc, relationships, context));
            }
        }
    }
    return out;
}

function readCell(tc: Element, relationships: RelationshipMap, context: ConversionContext): CellNode {
    const tcPr = getDirectChild(tc, 'tcPr');
    const vMerge = tcPr ? getDirectChild(tcPr, 'vMerge') : null;
    const shd = tcPr ? getDirectChild(tcPr, 'shd') : null;
    const fill = shd ? getWordAttribute(shd, 'fill') : null;
    return {
        kind: 'cell',
        styleClass: '',
        flags: NO_FORMATTING,
        gridSpan: Math.max(1, parsePositiveInt(getChildValue(tcPr, 'gridSpan'), 1)),
        verticalMerge: vMerge ? (getWordAttribute(vMerge, 'val') === 'restart' ? 'restart' : 'continue') : null,
        gridColumn: 0,
        shading: fill && fill !== 'auto' ? fill.toUpperCase() : null,
        suppressedBorders: readSuppressedBorders(tcPr),
        children: readCellParagraphs(tc, relationships, context),
    };
}

function readRow(tr: Element, relationships: RelationshipMap, context: ConversionContext): RowNode {
    const trPr = getDirectChild(tr, 'trPr');
    const gridBefore = parsePositiveInt(getChildValue(trPr, 'gridBefore'), 0);
    const cells = getDirectChildren(tr, 'tc').map((tc) => readCell(tc, relationships, context));
    let column = gridBefore;
    for (const cell of cells) {
        cell.gridColumn = column;
        column += cell.gridSpan;
    }
    return {
        kind: 'row',
        styleClass: '',
        flags: NO_FORMATTING,
        isHeader: isToggleOn(trPr, 'tblHeader'),
        gridBefore,
        gridAfter: parsePositiveInt(getChildValue(trPr, 'gridAfter'), 0),
        children: cells,
    };
}

function readTable(tbl: Element, relationships: RelationshipMap, context: ConversionContext): TableNode {
    const tblPr = getDirectChild(tbl, 'tblPr');
    const grid = getDirectChild(tbl, 'tblGrid');
    const columnWidths = grid
        ? getDirectChildren(grid, 'gridCol').map((col) => parsePositiveInt(getWordAttribute(col, 'w'), 0))
        : [];
    return {
        kind: 'table',
        styleClass: getChildValue(tblPr, 'tblStyle') ?? '',
        flags: NO_FORMATTING,
        declaredColumns: null,
        columnWidths,
        children: getDirectChildren(tbl, 'tr').map((tr) => readRow(tr, relationships, context)),
    };
}

/** Read the block-level content of a cleaned body. */
export function readBody(body: Element, relationships: RelationshipMap, context: ConversionContext): BlockNode[] {
    const blocks: BlockNode[] = [];
    for (const el of elementChildren(body)) {
        if (el.namespaceURI === NAMESPACES.W && el.localName === 'p') {
            blocks.push(readParagraph(el, relationships, context));
        } else if (el.namespaceURI === NAMESPACES.W && el.localName === 'tbl') {
            blocks.push(readTable(el, relationships, context));
        } else if (!IGNORED_ELEMENTS.has(el.localName)) {
            context.report('structural-anomaly', `unsupported block element <${el.nodeName}> skipped`);
        }
    }
    return blocks;
}
