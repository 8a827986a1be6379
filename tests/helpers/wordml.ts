/**
 * Small WordprocessingML builders for test fixtures.
 */

import { getDefaultConfig } from '../../src/config.js';
import { NAMESPACES } from '../../src/conversion/constants.js';
import { ConversionContext } from '../../src/conversion/context.js';

export function escapeXml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

export function wordDocument(...blocks: string[]): string {
  return (
    '<?xml version="1.0" encoding="UTF-8"?>' +
    `<w:document xmlns:w="${NAMESPACES.W}" xmlns:r="${NAMESPACES.R}">` +
    `<w:body>${blocks.join('')}</w:body></w:document>`
  );
}

export interface RunOptions {
  style?: string;
  bold?: boolean;
  italic?: boolean;
  vertAlign?: 'superscript' | 'subscript';
}

export function r(text: string, options: RunOptions = {}): string {
  const props = [
    options.style ? `<w:rStyle w:val="${options.style}"/>` : '',
    options.bold ? '<w:b/>' : '',
    options.italic ? '<w:i/>' : '',
    options.vertAlign ? `<w:vertAlign w:val="${options.vertAlign}"/>` : '',
  ].join('');
  return `<w:r>${props ? `<w:rPr>${props}</w:rPr>` : ''}<w:t xml:space="preserve">${escapeXml(text)}</w:t></w:r>`;
}

export interface ParagraphOptions {
  numId?: string;
  ilvl?: number;
  jc?: string;
}

/** A paragraph; plain strings become unstyled runs. */
export function p(style: string | null, content: string | string[], options: ParagraphOptions = {}): string {
  const props = [
    style ? `<w:pStyle w:val="${style}"/>` : '',
    options.numId ? `<w:numPr><w:ilvl w:val="${options.ilvl ?? 0}"/><w:numId w:val="${options.numId}"/></w:numPr>` : '',
    options.jc ? `<w:jc w:val="${options.jc}"/>` : '',
  ].join('');
  const parts = Array.isArray(content) ? content : [content];
  const runs = parts.map((part) => (part.startsWith('<') ? part : r(part))).join('');
  return `<w:p>${props ? `<w:pPr>${props}</w:pPr>` : ''}${runs}</w:p>`;
}

export interface CellOptions {
  gridSpan?: number;
  vMerge?: 'restart' | 'continue';
  hMerge?: 'restart' | 'continue';
  fill?: string;
  noBorders?: Array<'bottom' | 'right'>;
  style?: string;
}

export function tc(text: string, options: CellOptions = {}): string {
  const props = [
    options.gridSpan ? `<w:gridSpan w:val="${options.gridSpan}"/>` : '',
    options.hMerge ? (options.hMerge === 'restart' ? '<w:hMerge w:val="restart"/>' : '<w:hMerge/>') : '',
    options.vMerge ? (options.vMerge === 'restart' ? '<w:vMerge w:val="restart"/>' : '<w:vMerge/>') : '',
    options.noBorders ? `<w:tcBorders>${options.noBorders.map((edge) => `<w:${edge} w:val="nil"/>`).join('')}</w:tcBorders>` : '',
    options.fill ? `<w:shd w:val="clear" w:color="auto" w:fill="${options.fill}"/>` : '',
  ].join('');
  const paragraph = text === '' ? '<w:p/>' : p(options.style ?? null, text);
  return `<w:tc>${props ? `<w:tcPr>${props}</w:tcPr>` : ''}${paragraph}</w:tc>`;
}

export function tr(cells: string[], options: { header?: boolean; gridBefore?: number; gridAfter?: number } = {}): string {
  const props = [
    options.gridBefore ? `<w:gridBefore w:val="${options.gridBefore}"/>` : '',
    options.gridAfter ? `<w:gridAfter w:val="${options.gridAfter}"/>` : '',
    options.header ? '<w:tblHeader/>' : '',
  ].join('');
  return `<w:tr>${props ? `<w:trPr>${props}</w:trPr>` : ''}${cells.join('')}</w:tr>`;
}

export function tbl(rows: string[], grid: number[] = []): string {
  const gridXml = grid.length > 0 ? `<w:tblGrid>${grid.map((w) => `<w:gridCol w:w="${w}"/>`).join('')}</w:tblGrid>` : '';
  return `<w:tbl><w:tblPr/>${gridXml}${rows.join('')}</w:tbl>`;
}

/** Simple field around a single result run. */
export function fldSimple(instruction: string, result: string): string {
  return `<w:fldSimple w:instr="${escapeXml(instruction)}">${result === '' ? '' : r(result)}</w:fldSimple>`;
}

export function numberingXml(numId: string, formats: string[]): string {
  const levels = formats.map((fmt, ilvl) => `<w:lvl w:ilvl="${ilvl}"><w:numFmt w:val="${fmt}"/></w:lvl>`).join('');
  return (
    `<w:numbering xmlns:w="${NAMESPACES.W}">` +
    `<w:abstractNum w:abstractNumId="7">${levels}</w:abstractNum>` +
    `<w:num w:numId="${numId}"><w:abstractNumId w:val="7"/></w:num>` +
    '</w:numbering>'
  );
}

export function testContext(): ConversionContext {
  return new ConversionContext(getDefaultConfig(), '1', 'test.docx');
}
