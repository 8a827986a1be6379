/**
 * Document source reading.
 * Loads the main document part plus its relationship and numbering parts,
 * from either a .docx container or a bare document.xml.
 */

import fs from 'fs/promises';
import path from 'path';
import PizZip from 'pizzip';
import { DOCX_PATHS, NAMESPACES } from './constants.js';
import { elementChildren, getDirectChild, getDirectChildren, getWordAttribute, parseXml } from './dom.js';
import { ConversionError, ConversionErrorCode, withErrorContext } from './errors.js';
import type { DocumentSource, NumberingMap, RelationshipMap } from './types.js';

// ═══════════════════════════════════════════════════════════════════════
// Internal helpers
// ═══════════════════════════════════════════════════════════════════════

function readZipText(zip: PizZip, filePath: string): string | null {
    const file = zip.file(filePath);
    return file ? file.asText() : null;
}

function readContainer(buffer: Buffer, inputPath: string): DocumentSource {
    let zip: PizZip;
    try {
        zip = new PizZip(buffer);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConversionError(`Not a valid .docx container: ${message}`, ConversionErrorCode.INVALID_DOCUMENT, { inputPath });
    }
    const documentXml = readZipText(zip, DOCX_PATHS.DOCUMENT_XML);
    if (documentXml === null) {
        throw new ConversionError(`Container has no ${DOCX_PATHS.DOCUMENT_XML}`, ConversionErrorCode.INVALID_DOCUMENT, { inputPath });
    }
    return {
        documentXml,
        relationshipsXml: readZipText(zip, DOCX_PATHS.DOCUMENT_RELS),
        numberingXml: readZipText(zip, DOCX_PATHS.NUMBERING_XML),
    };
}

async function readOptional(filePath: string): Promise<string | null> {
    try {
        return await fs.readFile(filePath, 'utf8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
        throw error;
    }
}

// ═══════════════════════════════════════════════════════════════════════
// Public API
// ═══════════════════════════════════════════════════════════════════════

/**
 * Read a source document.
 *
 * `.docx` inputs are opened as containers. Anything else is taken to be an
 * extracted document.xml; sibling `_rels/document.xml.rels` and
 * `numbering.xml` files are picked up when present.
 */
export async function readDocumentSource(inputPath: string): Promise<DocumentSource> {
    return withErrorContext(
        async () => {
            const buffer = await fs.readFile(inputPath);
            if (path.extname(inputPath).toLowerCase() === '.docx') {
                return readContainer(buffer, inputPath);
            }
            const dir = path.dirname(inputPath);
            return {
                documentXml: buffer.toString('utf8'),
                relationshipsXml: await readOptional(path.join(dir, '_rels', `${path.basename(inputPath)}.rels`)),
                numberingXml: await readOptional(path.join(dir, 'numbering.xml')),
            };
        },
        ConversionErrorCode.INPUT_READ_FAILED,
        { inputPath },
    );
}

/** Relationship id → target from a .rels part. */
export function parseRelationships(relsXml: string | null): RelationshipMap {
    const map: RelationshipMap = new Map();
    if (!relsXml) return map;
    const doc = parseXml(relsXml, 'relationships part');
    const root = doc.documentElement;
    for (const rel of elementChildren(root)) {
        if (rel.localName !== 'Relationship' || rel.namespaceURI !== NAMESPACES.RELS) continue;
        const id = rel.getAttribute('Id');
        const target = rel.getAttribute('Target');
        if (id && target) map.set(id, target);
    }
    return map;
}

/** numId → (ilvl → numFmt) from numbering.xml, following w:num → w:abstractNum. */
export function parseNumbering(numberingXml: string | null): NumberingMap {
    const result: NumberingMap = new Map();
    if (!numberingXml) return result;
    const root = parseXml(numberingXml, 'numbering part').documentElement;

    const abstractMap = new Map<string, Map<number, string>>();
    for (const absNum of getDirectChildren(root, 'abstractNum')) {
        const absNumId = getWordAttribute(absNum, 'abstractNumId');
        if (!absNumId) continue;
        const levels = new Map<number, string>();
        for (const lvl of getDirectChildren(absNum, 'lvl')) {
            const ilvl = parseInt(getWordAttribute(lvl, 'ilvl') ?? '0', 10);
            const numFmt = getDirectChild(lvl, 'numFmt');
            levels.set(Number.isNaN(ilvl) ? 0 : ilvl, (numFmt && getWordAttribute(numFmt, 'val')) || 'bullet');
        }
        abstractMap.set(absNumId, levels);
    }

    for (const num of getDirectChildren(root, 'num')) {
        const numId = getWordAttribute(num, 'numId');
        const absRef = getDirectChild(num, 'abstractNumId');
        const absNumId = absRef ? getWordAttribute(absRef, 'val') : null;
        const levels = absNumId ? abstractMap.get(absNumId) : undefined;
        if (numId && levels) result.set(numId, levels);
    }
    return result;
}
