/**
 * Conversion pipeline: normalize, transform, structure, write.
 *
 * Every call builds its own ConversionContext, so documents converted in
 * the same process never share sequences or diagnostics.
 */

import fs from 'fs/promises';
import path from 'path';
import { getDefaultConfig, type ConversionConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { ConversionContext } from './context.js';
import { ConversionErrorCode, toConversionError, withErrorContext, type ConversionError } from './errors.js';
import { normalizeDocument } from './normalizer/index.js';
import { parseNumbering, parseRelationships, readDocumentSource } from './source.js';
import { structureDocument } from './structurer/index.js';
import { transformDocument } from './transformer/index.js';
import type { Diagnostic, DocumentSource, StructuredDocument } from './types.js';
import { renderBook, serializeBook } from './writer/book-writer.js';

export interface ConvertOptions {
    config?: ConversionConfig;
    /** Used for identifiers when the document carries no chapter number of its own. */
    chapterNumber?: string;
    /** Name used in log lines and diagnostics. */
    documentName?: string;
}

export interface ConversionResult {
    xml: string;
    document: StructuredDocument;
    diagnostics: Diagnostic[];
}

export interface FileOutcome {
    inputPath: string;
    outputPath: string | null;
    diagnostics: Diagnostic[];
    error: ConversionError | null;
}

function summarize(name: string, diagnostics: readonly Diagnostic[]): string {
    if (diagnostics.length === 0) return `${name}: converted`;
    const counts = new Map<string, number>();
    for (const d of diagnostics) counts.set(d.kind, (counts.get(d.kind) ?? 0) + 1);
    const parts = [...counts].map(([kind, count]) => `${count} ${kind}`);
    return `${name}: converted with ${parts.join(', ')}`;
}

/** Convert one document held in memory. A bare string is taken as document.xml. */
export function convertDocument(source: DocumentSource | string, options: ConvertOptions = {}): ConversionResult {
    const input: DocumentSource =
        typeof source === 'string' ? { documentXml: source, relationshipsXml: null, numberingXml: null } : source;
    const context = new ConversionContext(options.config ?? getDefaultConfig(), options.chapterNumber, options.documentName);

    const normalized = normalizeDocument(input.documentXml, parseRelationships(input.relationshipsXml), context);
    const blocks = transformDocument(normalized, parseNumbering(input.numberingXml), context);
    const document = structureDocument(blocks, context);
    const xml = serializeBook(renderBook(document, context));

    logger.info(summarize(context.documentName, context.diagnostics));
    return { xml, document, diagnostics: context.diagnostics };
}

export function defaultOutputPath(inputPath: string, outDir?: string): string {
    const name = `${path.basename(inputPath, path.extname(inputPath))}.xml`;
    return path.join(outDir ?? path.dirname(inputPath), name);
}

export async function convertFile(inputPath: string, outputPath?: string, options: ConvertOptions = {}): Promise<FileOutcome> {
    const source = await readDocumentSource(inputPath);
    const result = convertDocument(source, { documentName: path.basename(inputPath), ...options });
    const target = outputPath ?? defaultOutputPath(inputPath);

    await withErrorContext(
        async () => {
            await fs.mkdir(path.dirname(target), { recursive: true });
            await fs.writeFile(target, result.xml, 'utf8');
        },
        ConversionErrorCode.OUTPUT_WRITE_FAILED,
        { outputPath: target },
    );
    return { inputPath, outputPath: target, diagnostics: result.diagnostics, error: null };
}

function isDocxName(name: string): boolean {
    return name.toLowerCase().endsWith('.docx') && !name.startsWith('~$');
}

/**
 * Convert every .docx in `dir`. Documents are independent: a failure is
 * recorded in that document's outcome and the rest still run.
 */
export async function convertDirectory(dir: string, outDir?: string, options: ConvertOptions = {}): Promise<FileOutcome[]> {
    const names = await withErrorContext(() => fs.readdir(dir), ConversionErrorCode.INPUT_READ_FAILED, { inputPath: dir });
    const outcomes: FileOutcome[] = [];

    for (const name of names.filter(isDocxName).sort()) {
        const inputPath = path.join(dir, name);
        try {
            outcomes.push(await convertFile(inputPath, defaultOutputPath(inputPath, outDir), options));
        } catch (error) {
            const failure = toConversionError(error, ConversionErrorCode.INVALID_DOCUMENT, { inputPath });
            logger.error(`${name}: ${failure.message}`);
            outcomes.push({ inputPath, outputPath: null, diagnostics: [], error: failure });
        }
    }
    return outcomes;
}
