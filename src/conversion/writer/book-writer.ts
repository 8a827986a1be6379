/**
 * BITS book-part output.
 *
 * The structured document is rendered into a fresh DOM and serialised with
 * @xmldom/xmldom, so text and attribute escaping is left to the serializer.
 */

import type { ConversionContext } from '../context.js';
import { BITS_DTD_VERSION, NAMESPACES, XML_DECLARATION } from '../constants.js';
import { parseXml, serializeXml } from '../dom.js';
import { plainText } from '../inline.js';
import type {
    BibliographyEntry,
    Contributor,
    FloatBlock,
    FlowNode,
    FrontMatter,
    Inline,
    InlineFormat,
    InlineRole,
    KeyTerm,
    ListNode,
    PartHeading,
    ReconstructedCell,
    ReconstructedRow,
    ReconstructedTable,
    StructuredDocument,
} from '../types.js';

const FORMAT_ELEMENTS: Record<InlineFormat, string> = {
    bold: 'bold',
    italic: 'italic',
    underline: 'underline',
    strike: 'strike',
    'small-caps': 'sc',
    superscript: 'sup',
    subscript: 'sub',
};

/** Roles with an element everywhere. */
const TYPOGRAPHIC_ROLES: Partial<Record<InlineRole, string>> = {
    monospace: 'monospace',
    'sans-serif': 'sans-serif',
};

/** Roles with an element inside mixed citations only. */
const REFERENCE_ROLES: Partial<Record<InlineRole, string>> = {
    surname: 'surname',
    'given-names': 'given-names',
    collab: 'collab',
    year: 'year',
    'article-title': 'article-title',
    'chapter-title': 'chapter-title',
    source: 'source',
    publisher: 'publisher-name',
    volume: 'volume',
    issue: 'issue',
    fpage: 'fpage',
    lpage: 'lpage',
};

type AttributeValue = string | number | null | undefined;

class BookBuilder {
    constructor(
        private readonly doc: Document,
        private readonly context: ConversionContext,
    ) {}

    el(name: string, attributes: Record<string, AttributeValue> = {}): Element {
        const element = this.doc.createElement(name);
        for (const [key, value] of Object.entries(attributes)) {
            if (value === null || value === undefined) continue;
            if (key.startsWith('xlink:')) element.setAttributeNS(NAMESPACES.XLINK, key, String(value));
            else element.setAttribute(key, String(value));
        }
        return element;
    }

    textEl(name: string, value: string, attributes: Record<string, AttributeValue> = {}): Element {
        const element = this.el(name, attributes);
        element.appendChild(this.doc.createTextNode(value));
        return element;
    }

    /** Append a block-level child followed by a line break. */
    block(parent: Element, child: Element): Element {
        parent.appendChild(child);
        parent.appendChild(this.doc.createTextNode('\n'));
        return child;
    }

    // ── Inline ───────────────────────────────────────────────────────────

    inlines(parent: Element, nodes: readonly Inline[], inReference = false): Element {
        for (const node of nodes) this.inline(parent, node, inReference);
        return parent;
    }

    private inline(parent: Element, node: Inline, inReference: boolean): void {
        switch (node.type) {
            case 'text':
                parent.appendChild(this.doc.createTextNode(node.value));
                return;
            case 'format':
                parent.appendChild(this.inlines(this.el(FORMAT_ELEMENTS[node.format]), node.children, inReference));
                return;
            case 'role':
                this.role(parent, node.role, node.children, inReference);
                return;
            case 'comment':
                parent.appendChild(this.doc.createProcessingInstruction(`comment-${node.edge}`, `id="${node.id.replace(/["?>]/g, '')}"`));
                return;
            case 'xref': {
                const attributes =
                    node.resolution === 'resolved' && node.target !== null
                        ? { 'ref-type': node.refType, rid: node.target }
                        : { 'ref-type': node.refType, 'specific-use': 'unresolved' };
                parent.appendChild(this.inlines(this.el('xref', attributes), node.children, inReference));
                return;
            }
            case 'link':
                parent.appendChild(this.inlines(this.el('ext-link', { 'ext-link-type': 'uri', 'xlink:href': node.href }), node.children, inReference));
                return;
        }
    }

    private role(parent: Element, role: InlineRole, children: Inline[], inReference: boolean): void {
        const typographic = TYPOGRAPHIC_ROLES[role];
        if (typographic) {
            parent.appendChild(this.inlines(this.el(typographic), children, inReference));
            return;
        }
        if (inReference && (role === 'url' || role === 'doi')) {
            const target = plainText(children).trim();
            const attributes = { 'ext-link-type': role === 'url' ? 'uri' : 'doi', 'xlink:href': target };
            parent.appendChild(this.inlines(this.el('ext-link', attributes), children, true));
            return;
        }
        const referenceElement = inReference ? REFERENCE_ROLES[role] : undefined;
        if (referenceElement) {
            parent.appendChild(this.inlines(this.el(referenceElement), children, true));
            return;
        }
        this.inlines(parent, children, inReference);
    }

    // ── Front matter ─────────────────────────────────────────────────────

    meta(front: FrontMatter): Element {
        const meta = this.el('book-part-meta');
        const titleGroup = this.block(meta, this.el('title-group'));
        if (front.chapterLabel) titleGroup.appendChild(this.textEl('label', front.chapterLabel));
        titleGroup.appendChild(this.inlines(this.el('title'), front.title ?? []));

        if (front.authors.length > 0) {
            const group = this.block(meta, this.el('contrib-group'));
            for (const author of front.authors) group.appendChild(this.contrib(author));
        }
        if (front.abstract) {
            const abstract = this.block(meta, this.el('abstract'));
            abstract.appendChild(this.textEl('title', front.abstract.title));
            abstract.appendChild(this.inlines(this.el('p'), front.abstract.content));
        }
        if (front.keywords) {
            const group = this.block(meta, this.el('kwd-group'));
            group.appendChild(this.textEl('title', front.keywords.title));
            for (const term of front.keywords.terms) group.appendChild(this.textEl('kwd', term));
        }
        return meta;
    }

    private contrib(author: Contributor): Element {
        const contrib = this.el('contrib', { 'contrib-type': 'author' });
        if (author.kind === 'collab') {
            contrib.appendChild(this.textEl('collab', author.name));
            return contrib;
        }
        const name = contrib.appendChild(this.el('name'));
        if (author.surname) name.appendChild(this.textEl('surname', author.surname));
        if (author.givenNames) name.appendChild(this.textEl('given-names', author.givenNames));
        return contrib;
    }

    // ── Flow ─────────────────────────────────────────────────────────────

    flow(parent: Element, nodes: readonly FlowNode[]): void {
        for (const node of nodes) {
            switch (node.kind) {
                case 'section': {
                    const sec = this.block(parent, this.el('sec', { id: node.id }));
                    this.block(sec, this.inlines(this.el('title'), node.title));
                    this.flow(sec, node.children);
                    break;
                }
                case 'box': {
                    const box = this.block(parent, this.el('boxed-text', { id: node.id, 'content-type': 'case study', position: 'float' }));
                    if (node.label !== null) box.appendChild(this.textEl('label', node.label));
                    if (node.title.length > 0) {
                        const caption = this.block(box, this.el('caption'));
                        caption.appendChild(this.inlines(this.el('title'), node.title));
                    }
                    this.flow(box, node.children);
                    break;
                }
                case 'paragraph':
                    this.block(parent, this.inlines(this.el('p'), node.content));
                    break;
                case 'key-term-list':
                    this.block(parent, this.keyTerms(node.terms));
                    break;
                case 'list':
                    this.block(parent, this.list(node));
                    break;
                case 'ref-list':
                    this.block(parent, this.refList(node.entries));
                    break;
                case 'table': {
                    const wrap = this.block(parent, this.el('table-wrap', { position: 'anchor' }));
                    wrap.appendChild(this.table(node.table));
                    break;
                }
                case 'float':
                    this.block(parent, this.float(node.float));
                    break;
                case 'placeholder':
                    this.block(parent, this.el('p', { 'content-type': node.styleClass }));
                    break;
                case 'reference':
                    // grouped into ref-lists before output
                    this.block(parent, this.inlines(this.el('p'), node.content));
                    break;
            }
        }
    }

    private list(list: ListNode): Element {
        const element = this.el('list', { 'list-type': list.listType });
        for (const item of list.items) {
            const listItem = this.block(element, this.el('list-item'));
            if (item.label !== null) listItem.appendChild(this.textEl('label', item.label));
            listItem.appendChild(this.inlines(this.el('p'), item.content));
            for (const float of item.floats) listItem.appendChild(this.float(float));
            for (const child of item.children) listItem.appendChild(this.list(child));
        }
        return element;
    }

    private keyTerms(terms: readonly KeyTerm[]): Element {
        const element = this.el('list', { 'list-type': 'bullet' });
        for (const term of terms) {
            const listItem = this.block(element, this.el('list-item'));
            listItem.appendChild(this.inlines(this.el('p', { id: term.id }), term.content));
        }
        return element;
    }

    // ── References ───────────────────────────────────────────────────────

    private refList(entries: readonly BibliographyEntry[]): Element {
        const refList = this.el('ref-list');
        for (const entry of entries) {
            const ref = this.block(refList, this.el('ref', { id: entry.id }));
            ref.appendChild(this.citation(entry));
        }
        return refList;
    }

    private citation(entry: BibliographyEntry): Element {
        const citation = this.el('mixed-citation', { 'publication-type': entry.publicationType });
        for (const part of entry.parts) {
            if (part.type === 'inline') {
                this.inline(citation, part.inline, true);
                continue;
            }
            const group = citation.appendChild(this.el('person-group', { 'person-group-type': 'author' }));
            for (const member of part.members) {
                if (member.type === 'name') group.appendChild(this.inlines(this.el('string-name'), member.parts, true));
                else this.inline(group, member.inline, true);
            }
        }
        return citation;
    }

    // ── Floats and tables ────────────────────────────────────────────────

    float(float: FloatBlock): Element {
        const element = this.el(float.kind === 'figure' ? 'fig' : 'table-wrap', { id: float.id });
        if (float.label) element.appendChild(this.textEl('label', float.label));
        if (float.caption.length > 0) {
            const caption = element.appendChild(this.el('caption'));
            caption.appendChild(this.inlines(this.el('title'), float.caption));
        }
        if (float.kind === 'figure') {
            element.appendChild(this.el('graphic', { 'xlink:href': `media/${float.id}` }));
            return element;
        }
        for (const table of float.tables) element.appendChild(this.table(table));
        if (float.attribution) element.appendChild(this.inlines(this.el('attrib'), float.attribution));
        return element;
    }

    table(table: ReconstructedTable): Element {
        const element = this.el('table', { frame: 'hsides', rules: 'groups' });
        if (table.columnWidths.length > 0) {
            const colgroup = element.appendChild(this.el('colgroup'));
            for (const width of table.columnWidths) colgroup.appendChild(this.el('col', { width: `${width}%` }));
        }
        // a table needs a body, so an all-header table keeps its rows there
        const headerRows = table.headerRowCount < table.rows.length ? table.headerRowCount : 0;
        if (headerRows > 0) {
            const thead = element.appendChild(this.el('thead'));
            for (const row of table.rows.slice(0, headerRows)) thead.appendChild(this.row(row));
        }
        const tbody = element.appendChild(this.el('tbody'));
        for (const row of table.rows.slice(headerRows)) tbody.appendChild(this.row(row));
        return element;
    }

    private row(row: ReconstructedRow): Element {
        const tr = this.el('tr');
        for (const cell of row.cells) tr.appendChild(this.cell(cell, row.header));
        return tr;
    }

    private cell(cell: ReconstructedCell, headerRow: boolean): Element {
        const styles = [
            ...(cell.rowSeparator ? [] : ['border-bottom: none']),
            ...(cell.columnSeparator ? [] : ['border-right: none']),
        ];
        const element = this.el(headerRow || cell.header ? 'th' : 'td', {
            rowspan: cell.rowSpan > 1 ? cell.rowSpan : null,
            colspan: cell.colSpan > 1 ? cell.colSpan : null,
            align: cell.align === 'decimal' ? 'char' : cell.align,
            char: cell.align === 'decimal' ? '.' : null,
            style: styles.length > 0 ? styles.join('; ') : null,
        });
        cell.paragraphs.forEach((paragraph, index) => {
            if (index > 0) element.appendChild(this.el('break'));
            this.inlines(element, paragraph);
        });
        return element;
    }

    // ── Document ─────────────────────────────────────────────────────────

    /** The enclosing part's book-part; the chapter goes into the returned body. */
    private partBody(parent: Element, heading: PartHeading): Element {
        const part = this.block(parent, this.el('book-part', { id: `pt${heading.number}`, 'book-part-type': 'part' }));
        part.appendChild(this.doc.createTextNode('\n'));
        const meta = this.block(part, this.el('book-part-meta'));
        const titleGroup = this.block(meta, this.el('title-group'));
        titleGroup.appendChild(this.textEl('label', heading.label));
        titleGroup.appendChild(this.inlines(this.el('title'), heading.title ?? []));
        const body = this.block(part, this.el('body'));
        body.appendChild(this.doc.createTextNode('\n'));
        return body;
    }

    book(structured: StructuredDocument): void {
        const root = this.doc.documentElement;
        root.setAttributeNS(NAMESPACES.XML, 'xml:lang', this.context.config.labels.language);
        root.appendChild(this.doc.createTextNode('\n'));
        const bookBody = this.block(root, this.el('book-body'));
        bookBody.appendChild(this.doc.createTextNode('\n'));
        const partHeading = structured.frontMatter.part;
        const chapterParent = partHeading ? this.partBody(bookBody, partHeading) : bookBody;
        const part = this.block(chapterParent, this.el('book-part', { id: `ch${this.context.chapterNumber}`, 'book-part-type': 'chapter' }));
        part.appendChild(this.doc.createTextNode('\n'));
        this.block(part, this.meta(structured.frontMatter));
        const body = this.block(part, this.el('body'));
        body.appendChild(this.doc.createTextNode('\n'));
        this.flow(body, structured.body);
    }
}

export function renderBook(structured: StructuredDocument, context: ConversionContext): Document {
    const skeleton =
        `<book xmlns:xlink="${NAMESPACES.XLINK}" xmlns:mml="${NAMESPACES.MML}" ` +
        `dtd-version="${BITS_DTD_VERSION}"/>`;
    const doc = parseXml(skeleton, 'book skeleton');
    new BookBuilder(doc, context).book(structured);
    return doc;
}

export function serializeBook(doc: Document): string {
    return `${XML_DECLARATION}\n${serializeXml(doc)}\n`;
}
