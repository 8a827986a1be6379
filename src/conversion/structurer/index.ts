/**
 * Semantic Structurer: flat Block stream in, StructuredDocument out.
 *
 * Steps run in a fixed order: front matter, float collection, sections and
 * boxes, list nesting, bibliography, citation resolution, key-term linking,
 * float placement.
 *
 * @module conversion/structurer
 */

import { logger } from '../../utils/logger.js';
import type { ConversionContext } from '../context.js';
import type { Block, StructuredDocument } from '../types.js';
import { buildBibliography } from './bibliography.js';
import { resolveCitations } from './citations.js';
import { collectFloats, placeFloats } from './floats.js';
import { extractFrontMatter } from './front-matter.js';
import { linkKeyTerms } from './key-terms.js';
import { nestLists } from './lists.js';
import { buildSections } from './sections.js';

export { buildBibliography, classifyEntry, createEntry, extractYear, groupReferenceParts } from './bibliography.js';
export { CitationResolver, resolveCitations } from './citations.js';
export { collectFloats, placeFloats, splitCaption } from './floats.js';
export { extractFrontMatter, parseAuthors, parsePartNumber, splitKeywords } from './front-matter.js';
export { keyTermIndex, linkKeyTerms } from './key-terms.js';
export { listMeasure, nestLists } from './lists.js';
export { buildSections, splitBoxTitle } from './sections.js';
export { labelKey, matchTokens, parseLabelReference, splitCompoundReference } from './match-keys.js';

export function structureDocument(blocks: Block[], context: ConversionContext): StructuredDocument {
    const front = extractFrontMatter(blocks, context);
    const collected = collectFloats(front.blocks, context);
    const sectioned = buildSections(collected.blocks, context);

    const nested = nestLists(sectioned);
    logger.debug(`${context.documentName}: list nesting settled after ${nested.steps} steps`);

    const bibliography = buildBibliography(nested.value, context);
    const cited = resolveCitations(front.frontMatter, bibliography.flow, collected.floats, bibliography.entries, context);
    const body = placeFloats(linkKeyTerms(cited.body), collected.floats);

    return {
        frontMatter: cited.frontMatter,
        body,
        floats: collected.floats,
        bibliography: bibliography.entries,
        citations: cited.citations,
    };
}
