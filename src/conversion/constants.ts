/**
 * Conversion constants: shared values used across the pipeline stages.
 */

// ═══════════════════════════════════════════════════════════════════════
// XML namespaces
// ═══════════════════════════════════════════════════════════════════════

export const NAMESPACES = {
    W: 'http://schemas.openxmlformats.org/wordprocessingml/2006/main',
    R: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
    RELS: 'http://schemas.openxmlformats.org/package/2006/relationships',
    XLINK: 'http://www.w3.org/1999/xlink',
    MML: 'http://www.w3.org/1998/Math/MathML',
    XML: 'http://www.w3.org/XML/1998/namespace',
} as const;

// ═══════════════════════════════════════════════════════════════════════
// Container paths
// ═══════════════════════════════════════════════════════════════════════

export const DOCX_PATHS = {
    DOCUMENT_XML: 'word/document.xml',
    DOCUMENT_RELS: 'word/_rels/document.xml.rels',
    NUMBERING_XML: 'word/numbering.xml',
} as const;

// ═══════════════════════════════════════════════════════════════════════
// Run formatting flags (bitset)
// ═══════════════════════════════════════════════════════════════════════

export const FormatFlag = {
    BOLD: 1 << 0,
    ITALIC: 1 << 1,
    UNDERLINE: 1 << 2,
    STRIKE: 1 << 3,
    SMALL_CAPS: 1 << 4,
    SUPERSCRIPT: 1 << 5,
    SUBSCRIPT: 1 << 6,
} as const;

export const NO_FORMATTING = 0;

/** Deepest heading or list level the output carries; deeper levels are clamped. */
export const MAX_NESTING_LEVEL = 6;

// ═══════════════════════════════════════════════════════════════════════
// Semantic vocabularies
// ═══════════════════════════════════════════════════════════════════════

export const BLOCK_ROLES = [
    'paragraph',
    'heading',
    'reference',
    'figure-caption',
    'table-caption',
    'table-source',
    'chapter-number',
    'chapter-title',
    'chapter-author',
    'part-number',
    'part-title',
    'case-study-title',
    'key-term',
] as const;

export const LIST_TYPES = [
    'bullet',
    'order',
    'lower-alpha',
    'upper-alpha',
    'lower-roman',
    'upper-roman',
    'none',
] as const;

export const INLINE_ROLES = [
    'surname',
    'given-names',
    'collab',
    'year',
    'article-title',
    'chapter-title',
    'source',
    'publisher',
    'volume',
    'issue',
    'fpage',
    'lpage',
    'url',
    'doi',
    'citation',
    'figure-citation',
    'table-citation',
    'figure-number',
    'table-number',
    'monospace',
    'sans-serif',
] as const;

/** WordprocessingML numFmt values → list type. Anything else falls back to the configured default. */
export const NUMBER_FORMAT_LIST_TYPES: Readonly<Record<string, (typeof LIST_TYPES)[number]>> = {
    bullet: 'bullet',
    decimal: 'order',
    decimalZero: 'order',
    lowerLetter: 'lower-alpha',
    upperLetter: 'upper-alpha',
    lowerRoman: 'lower-roman',
    upperRoman: 'upper-roman',
    none: 'none',
};

// ═══════════════════════════════════════════════════════════════════════
// Table cell lookups
// ═══════════════════════════════════════════════════════════════════════

/** Cell shading fill (upper-case hex) → alignment. */
export const SHADING_ALIGNMENT: Readonly<Record<string, 'left' | 'center' | 'right' | 'justify' | 'decimal'>> = {
    D9D9D9: 'decimal',
    F2F2F2: 'center',
    BFBFBF: 'right',
};

/** Paragraph w:jc values → cell alignment. */
export const JUSTIFICATION_ALIGNMENT: Readonly<Record<string, 'left' | 'center' | 'right' | 'justify'>> = {
    left: 'left',
    start: 'left',
    center: 'center',
    right: 'right',
    end: 'right',
    both: 'justify',
    distribute: 'justify',
};

/** Border w:val values that mean "no border on this edge". */
export const SUPPRESSED_BORDER_VALUES: ReadonlySet<string> = new Set(['nil', 'none']);

// ═══════════════════════════════════════════════════════════════════════
// Field instructions
// ═══════════════════════════════════════════════════════════════════════

/** `SET Table:<columns> …` declares the column count of the next table. */
export const TABLE_DECLARATION_FIELD = /^\s*SET\s+Table:(\d+)/i;

export const HYPERLINK_FIELD = /^\s*HYPERLINK\s+(?:\\l\s+)?"([^"]*)"/i;
export const HYPERLINK_LOCAL_SWITCH = /\\l\s+"/i;
export const BOOKMARK_REFERENCE_FIELD = /^\s*(?:PAGEREF|REF)\s+([^\s\\]+)/i;

// ═══════════════════════════════════════════════════════════════════════
// Output
// ═══════════════════════════════════════════════════════════════════════

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
export const BITS_DTD_VERSION = '2.0';
export const DEFAULT_CHAPTER_NUMBER = '1';

/** A paragraph reading exactly `<case study>` or `</case study>` opens or closes a box. */
export const CASE_STUDY_MARKER = /^\s*<\s*(\/)?\s*case\s+study\s*>\s*$/i;
