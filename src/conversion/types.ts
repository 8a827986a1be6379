/**
 * Conversion type definitions.
 *
 * Single source of truth for the three intermediate representations:
 *  - DocNode    : the normalized source tree (style normalizer output)
 *  - Block      : the flat semantic stream (structural transformer output)
 *  - FlowNode   : the nested publication tree (semantic structurer output)
 *
 * @module conversion/types
 */

import type { BLOCK_ROLES, INLINE_ROLES, LIST_TYPES } from './constants.js';

// ═══════════════════════════════════════════════════════════════════════
// Vocabularies
// ═══════════════════════════════════════════════════════════════════════

export type BlockRole = (typeof BLOCK_ROLES)[number];
export type ListType = (typeof LIST_TYPES)[number];
export type InlineRole = (typeof INLINE_ROLES)[number];

/** Bitset of FormatFlag values. */
export type FormatFlags = number;

export type CellAlignment = 'left' | 'center' | 'right' | 'justify' | 'decimal';
export type BorderEdge = 'top' | 'bottom' | 'left' | 'right';

// ═══════════════════════════════════════════════════════════════════════
// Normalized source tree (DocNode)
// ═══════════════════════════════════════════════════════════════════════

interface DocNodeBase {
    /** Source style name after normalization ('' when unstyled). */
    styleClass: string;
    flags: FormatFlags;
}

export interface TextNode extends DocNodeBase {
    kind: 'text';
    text: string;
}

export interface RunNode extends DocNodeBase {
    kind: 'run';
    children: TextNode[];
}

export interface HyperlinkNode extends DocNodeBase {
    kind: 'hyperlink';
    /** Bookmark name for internal links. */
    anchor: string | null;
    /** Resolved relationship target for external links. */
    target: string | null;
    children: InlineNode[];
}

export interface CommentRangeNode extends DocNodeBase {
    kind: 'comment-range';
    edge: 'start' | 'end';
    commentId: string;
}

export interface FieldNode extends DocNodeBase {
    kind: 'field';
    instruction: string;
    /** The field's displayed result. */
    children: InlineNode[];
}

export type InlineNode = RunNode | HyperlinkNode | CommentRangeNode | FieldNode;

export interface NumberingReference {
    numId: string;
    /** 0-based w:ilvl. */
    level: number;
}

export interface ParagraphNode extends DocNodeBase {
    kind: 'paragraph';
    numbering: NumberingReference | null;
    /** Raw w:jc value. */
    justification: string | null;
    children: InlineNode[];
}

export interface CellNode extends DocNodeBase {
    kind: 'cell';
    gridSpan: number;
    verticalMerge: 'restart' | 'continue' | null;
    /** 0-based grid column where the cell starts; assigned during normalization. */
    gridColumn: number;
    shading: string | null;
    suppressedBorders: BorderEdge[];
    children: ParagraphNode[];
}

export interface RowNode extends DocNodeBase {
    kind: 'row';
    isHeader: boolean;
    gridBefore: number;
    /** Grid columns left empty after the last cell. */
    gridAfter: number;
    children: CellNode[];
}

export interface TableNode extends DocNodeBase {
    kind: 'table';
    /** Column count declared by a table-declaration field; null when undeclared. */
    declaredColumns: number | null;
    /** w:gridCol widths in twentieths of a point. */
    columnWidths: number[];
    children: RowNode[];
}

export type BlockNode = ParagraphNode | TableNode;
export type DocNode = BlockNode | RowNode | CellNode | InlineNode | TextNode;

export interface NormalizedDocument {
    blocks: BlockNode[];
}

// ═══════════════════════════════════════════════════════════════════════
// Source side tables
// ═══════════════════════════════════════════════════════════════════════

/** Relationship id → target. */
export type RelationshipMap = Map<string, string>;

/** numId → (ilvl → numFmt). */
export type NumberingMap = Map<string, Map<number, string>>;

export interface DocumentSource {
    documentXml: string;
    relationshipsXml: string | null;
    numberingXml: string | null;
}

// ═══════════════════════════════════════════════════════════════════════
// Inline IR
// ═══════════════════════════════════════════════════════════════════════

export type InlineFormat =
    | 'bold'
    | 'italic'
    | 'underline'
    | 'strike'
    | 'small-caps'
    | 'superscript'
    | 'subscript';

export type RefType = 'bibr' | 'fig' | 'table' | 'keyterm' | 'other';
export type ReferenceResolution = 'resolved' | 'no-match' | 'ambiguous';

export interface TextInline {
    type: 'text';
    value: string;
}

export interface FormatInline {
    type: 'format';
    format: InlineFormat;
    children: Inline[];
}

export interface RoleInline {
    type: 'role';
    role: InlineRole;
    children: Inline[];
}

export interface CommentMarker {
    type: 'comment';
    edge: 'start' | 'end';
    id: string;
}

export interface CrossReference {
    type: 'xref';
    refType: RefType;
    target: string | null;
    resolution: ReferenceResolution;
    children: Inline[];
}

export interface ExternalLink {
    type: 'link';
    href: string;
    children: Inline[];
}

export type Inline = TextInline | FormatInline | RoleInline | CommentMarker | CrossReference | ExternalLink;
export type WrapperInline = FormatInline | RoleInline;

// ═══════════════════════════════════════════════════════════════════════
// Reconstructed tables
// ═══════════════════════════════════════════════════════════════════════

export interface ReconstructedCell {
    gridColumn: number;
    rowSpan: number;
    colSpan: number;
    align: CellAlignment | null;
    /** False when the bottom border is suppressed. */
    rowSeparator: boolean;
    /** False when the right border is suppressed. */
    columnSeparator: boolean;
    header: boolean;
    paragraphs: Inline[][];
}

export interface ReconstructedRow {
    header: boolean;
    cells: ReconstructedCell[];
}

export interface ReconstructedTable {
    columnCount: number;
    /** Percentages summing to ~100; empty when the source had no grid. */
    columnWidths: number[];
    headerRowCount: number;
    rows: ReconstructedRow[];
    /** True when span validation failed and every source cell was emitted as 1×1. */
    spanFallback: boolean;
}

// ═══════════════════════════════════════════════════════════════════════
// Flat semantic stream (Block)
// ═══════════════════════════════════════════════════════════════════════

export interface TextBlock {
    type: 'text';
    role: BlockRole;
    /** Heading level (1-based); null for other roles. */
    level: number | null;
    styleClass: string;
    content: Inline[];
}

export interface ListItemBlock {
    type: 'list-item';
    listType: ListType;
    /** 1-based nesting level. */
    level: number;
    label: string | null;
    styleClass: string;
    content: Inline[];
}

export interface PlaceholderBlock {
    type: 'placeholder';
    styleClass: string;
}

export interface TableBlock {
    type: 'table';
    table: ReconstructedTable;
}

export type Block = TextBlock | ListItemBlock | PlaceholderBlock | TableBlock;

// ═══════════════════════════════════════════════════════════════════════
// Bibliography
// ═══════════════════════════════════════════════════════════════════════

export type PublicationType = 'web' | 'article' | 'book' | 'other';

export type Contributor =
    | { kind: 'person'; surname: string | null; givenNames: string | null }
    | { kind: 'collab'; name: string };

/** Reference content regrouped for output: name runs become person groups. */
export type ReferencePart =
    | { type: 'inline'; inline: Inline }
    | { type: 'person-group'; members: PersonGroupMember[] };

export type PersonGroupMember =
    | { type: 'name'; parts: Inline[] }
    | { type: 'inline'; inline: Inline };

export interface BibliographyEntry {
    id: string;
    publicationType: PublicationType;
    contributors: Contributor[];
    /** Four-digit year with optional disambiguation letter, e.g. "2020a". */
    year: string | null;
    articleTitle: string | null;
    chapterTitle: string | null;
    source: string | null;
    publisher: string | null;
    volume: string | null;
    issue: string | null;
    firstPage: string | null;
    lastPage: string | null;
    url: string | null;
    doi: string | null;
    parts: ReferencePart[];
    /** Normalized tokens of the entry text up to and including its first year token. */
    leadingTokens: string[];
    /** Normalized contributor names followed by the year. */
    keyTokens: string[];
}

// ═══════════════════════════════════════════════════════════════════════
// Floats
// ═══════════════════════════════════════════════════════════════════════

export type FloatKind = 'figure' | 'table';
export type FloatPlacement = 'pending' | 'placed-inline' | 'appended';

export interface FloatBlock {
    id: string;
    kind: FloatKind;
    /** e.g. "Figure 2"; null when the caption carries no label. */
    label: string | null;
    /** Registry key such as "figure:2"; null when unlabeled. */
    labelKey: string | null;
    caption: Inline[];
    tables: ReconstructedTable[];
    attribution: Inline[] | null;
    placement: FloatPlacement;
}

// ═══════════════════════════════════════════════════════════════════════
// Structured publication tree (FlowNode)
// ═══════════════════════════════════════════════════════════════════════

export interface SectionNode {
    kind: 'section';
    id: string;
    level: number;
    title: Inline[];
    children: FlowNode[];
}

/** A case study box; its headings open sections inside it. */
export interface BoxNode {
    kind: 'box';
    id: string;
    /** e.g. "Case Study 3.1:"; null when the title carries no label. */
    label: string | null;
    title: Inline[];
    children: FlowNode[];
}

export interface ParagraphFlow {
    kind: 'paragraph';
    styleClass: string;
    content: Inline[];
}

export interface ListItemNode {
    label: string | null;
    content: Inline[];
    /** Floats placed directly after this item's paragraph. */
    floats: FloatBlock[];
    children: ListNode[];
}

export interface ListNode {
    kind: 'list';
    listType: ListType;
    level: number;
    items: ListItemNode[];
}

/** An ungrouped reference paragraph; only exists until bibliography grouping. */
export interface ReferenceFlow {
    kind: 'reference';
    content: Inline[];
}

export interface RefListNode {
    kind: 'ref-list';
    entries: BibliographyEntry[];
}

export interface TableFlow {
    kind: 'table';
    table: ReconstructedTable;
}

export interface KeyTerm {
    id: string;
    content: Inline[];
}

/** Consecutive key-term paragraphs. */
export interface KeyTermListNode {
    kind: 'key-term-list';
    terms: KeyTerm[];
}

export interface FloatFlow {
    kind: 'float';
    float: FloatBlock;
}

export interface PlaceholderFlow {
    kind: 'placeholder';
    styleClass: string;
}

export type FlowNode =
    | SectionNode
    | BoxNode
    | ParagraphFlow
    | ListNode
    | ReferenceFlow
    | RefListNode
    | TableFlow
    | KeyTermListNode
    | FloatFlow
    | PlaceholderFlow;

/** Flow nodes that hold further flow. */
export type ContainerNode = SectionNode | BoxNode;

// ═══════════════════════════════════════════════════════════════════════
// Front matter
// ═══════════════════════════════════════════════════════════════════════

export interface PartHeading {
    /** e.g. "Part II" */
    label: string;
    number: string;
    title: Inline[] | null;
}

export interface FrontMatter {
    /** The part this chapter opens, when the document starts one. */
    part: PartHeading | null;
    chapterLabel: string | null;
    chapterNumber: string | null;
    title: Inline[] | null;
    authors: Contributor[];
    abstract: { title: string; content: Inline[] } | null;
    keywords: { title: string; terms: string[] } | null;
}

// ═══════════════════════════════════════════════════════════════════════
// Results
// ═══════════════════════════════════════════════════════════════════════

export interface CitationRecord {
    text: string;
    refType: RefType;
    target: string | null;
    resolution: ReferenceResolution;
}

export interface StructuredDocument {
    frontMatter: FrontMatter;
    body: FlowNode[];
    floats: FloatBlock[];
    bibliography: BibliographyEntry[];
    citations: CitationRecord[];
}

export type DiagnosticKind = 'structural-anomaly' | 'merge-inconsistency' | 'unresolved-reference';

export interface Diagnostic {
    kind: DiagnosticKind;
    message: string;
    detail?: Record<string, unknown>;
}
