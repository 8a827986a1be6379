/**
 * Public API of the WordprocessingML → BITS converter.
 *
 * @module conversion
 */

export { convertDirectory, convertDocument, convertFile, defaultOutputPath } from './pipeline.js';
export type { ConversionResult, ConvertOptions, FileOutcome } from './pipeline.js';

export { getDefaultConfig, loadConversionConfig } from '../config.js';
export type { ConfigOverrides, ConversionConfig, LabelTable, StyleMap } from '../config.js';

export { ConversionContext } from './context.js';
export { ConversionError, ConversionErrorCode } from './errors.js';
export { normalizeDocument } from './normalizer/index.js';
export { transformDocument } from './transformer/index.js';
export { structureDocument } from './structurer/index.js';
export { renderBook, serializeBook } from './writer/book-writer.js';
export { parseNumbering, parseRelationships, readDocumentSource } from './source.js';

export type * from './types.js';
