import fs from 'fs';
import os from 'os';
import path from 'path';
import PizZip from 'pizzip';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConversionErrorCode } from '../../src/conversion/errors.js';
import { convertDirectory, convertDocument, convertFile, defaultOutputPath } from '../../src/conversion/pipeline.js';
import type { FlowNode } from '../../src/conversion/types.js';
import { p, r, tbl, tc, tr, wordDocument } from '../helpers/wordml.js';

const chapter = wordDocument(
  p('ChapterNumber', 'Chapter 3'),
  p('ChapterTitle', 'Testing Things'),
  p('Head1', 'Introduction'),
  p('Para-FL', ['See ', r('Figure 2', { style: 'FigureCitation' }), ' and ', r('(Smith and Jones, 2020)', { style: 'citebib' }), '.']),
  p('FigureLegend', [r('Figure 2', { style: 'FigureNumber' }), ' Sample workflow.']),
  p('Para-FL', ['See also ', r('(Unknown, 1999)', { style: 'citebib' }), '.']),
  p('Head1', 'References'),
  p('Reference-Alphabetical', [
    r('Smith', { style: 'bibsurname' }),
    ', ',
    r('J.', { style: 'bibfname' }),
    ', & ',
    r('Jones', { style: 'bibsurname' }),
    ', ',
    r('K.', { style: 'bibfname' }),
    ' (',
    r('2020', { style: 'bibyear' }),
    '). A study.',
  ]),
  p('FigureLegend', 'Figure 3. Unused diagram.'),
);

const childKinds = (node: FlowNode | undefined): string[] =>
  node?.kind === 'section' ? node.children.map((child) => (child.kind === 'float' ? child.float.id : child.kind)) : [];

describe('convertDocument', () => {
  it('converts a chapter end to end', () => {
    const { xml, document, diagnostics } = convertDocument(chapter, { documentName: 'chapter.docx' });

    expect(document.frontMatter.chapterNumber).toBe('3');
    expect(document.body.map((node) => (node.kind === 'section' ? node.id : node.kind))).toEqual(['ch3lev1sec1', 'ch3lev1sec2']);
    expect(childKinds(document.body[0])).toEqual(['paragraph', 'fig3_1', 'paragraph']);
    expect(childKinds(document.body[1])).toEqual(['ref-list', 'fig3_2']);
    expect(document.bibliography.map((entry) => entry.id)).toEqual(['bid_3_1']);
    expect(document.floats.map((float) => [float.id, float.labelKey, float.placement])).toEqual([
      ['fig3_1', 'figure:2', 'placed-inline'],
      ['fig3_2', 'figure:3', 'appended'],
    ]);

    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].kind).toBe('unresolved-reference');

    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<book ')).toBe(true);
    expect(xml).toContain('<book-part id="ch3" book-part-type="chapter">');
    expect(xml).toContain('<sec id="ch3lev1sec1">');
    expect(xml).toContain('<xref ref-type="fig" rid="fig3_1">Figure 2</xref>');
    expect(xml).toContain('<xref ref-type="bibr" rid="bid_3_1">(Smith and Jones, 2020)</xref>');
    expect(xml).toContain('<xref ref-type="bibr" specific-use="unresolved">(Unknown, 1999)</xref>');
    expect(xml).toContain('<ref id="bid_3_1">');
    expect(xml).toContain('<graphic xlink:href="media/fig3_1"/>');
  });

  it('keeps identifier sequences per conversion', () => {
    const first = convertDocument(chapter);
    const second = convertDocument(chapter);
    expect(second.xml).toBe(first.xml);
  });

  it('reads the text of foreign inline markup through', () => {
    const math = '<m:oMath xmlns:m="http://schemas.openxmlformats.org/officeDocument/2006/math"><m:r><m:t>x=1</m:t></m:r></m:oMath>';
    const { xml, diagnostics } = convertDocument(wordDocument(p(null, ['Let ', math, ' hold.'])));
    expect(xml).toContain('<p>Let x=1 hold.</p>');
    expect(diagnostics.map((d) => d.kind)).toEqual(['structural-anomaly']);
  });

  it('wraps the chapter in its part and writes case studies and linked key terms', () => {
    const { xml, diagnostics } = convertDocument(
      wordDocument(
        p('PartNumber', 'Part 2'),
        p('PartTitle', 'Foundations'),
        p('ChapterNumber', 'Chapter 3'),
        p('ChapterTitle', 'Queues'),
        p('Head1', 'Key terms'),
        p('KeyTerm', 'Queue'),
        p('Para-FL', ['A ', r('queues', { bold: true }), ' grows.']),
        p(null, r('<case study>', { bold: true })),
        p('CaseStudyTitle', 'Case Study 3.1: Backlog'),
        p('CaseStudy-Para-FL', 'Inside the box.'),
        p(null, r('</case study>', { bold: true })),
      ),
    );
    expect(diagnostics).toEqual([]);
    expect(xml).toContain('<book-part id="pt2" book-part-type="part">');
    expect(xml).toContain('<title-group><label>Part 2</label><title>Foundations</title></title-group>');
    expect(xml).toContain('<body>\n<book-part id="ch3" book-part-type="chapter">');
    expect(xml).toContain('<list list-type="bullet"><list-item><p id="term1">Queue</p></list-item>');
    expect(xml).toContain('<p>A <bold><xref ref-type="keyterm" rid="term1">queues</xref></bold> grows.</p>');
    expect(xml).toContain(
      '<boxed-text id="cs3_1" content-type="case study" position="float"><label>Case Study 3.1:</label><caption><title>Backlog</title></caption>\n<p>Inside the box.</p>\n</boxed-text>',
    );
  });

  it('writes a spanning cell with colspan', () => {
    const { xml } = convertDocument(wordDocument(tbl([tr([tc('Merged', { gridSpan: 2 })]), tr([tc('A'), tc('B')])], [1, 1])));
    expect(xml).toContain('<td colspan="2">Merged</td>');
    expect(xml).toContain('<col width="50%"/>');
  });
});

describe('file conversion', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docx-bits-pipeline-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeDocx(name: string, documentXml: string): string {
    const zip = new PizZip();
    zip.file('word/document.xml', documentXml);
    const file = path.join(dir, name);
    fs.writeFileSync(file, zip.generate({ type: 'nodebuffer' }));
    return file;
  }

  it('derives the output name from the input', () => {
    expect(defaultOutputPath(path.join('in', 'ch01.docx'))).toBe(path.join('in', 'ch01.xml'));
    expect(defaultOutputPath(path.join('in', 'ch01.docx'), 'out')).toBe(path.join('out', 'ch01.xml'));
  });

  it('converts a .docx container beside the input', async () => {
    const input = writeDocx('chapter.docx', chapter);
    const outcome = await convertFile(input);
    expect(outcome.outputPath).toBe(path.join(dir, 'chapter.xml'));
    expect(outcome.diagnostics).toHaveLength(1);
    expect(fs.readFileSync(path.join(dir, 'chapter.xml'), 'utf8')).toContain('<sec id="ch3lev1sec2">');
  });

  it('keeps converting a directory after one document fails', async () => {
    fs.writeFileSync(path.join(dir, 'bad.docx'), 'not a zip archive');
    writeDocx('good.docx', wordDocument(p(null, 'Plain text.')));
    const outDir = path.join(dir, 'out');

    const outcomes = await convertDirectory(dir, outDir);
    expect(outcomes.map((o) => path.basename(o.inputPath))).toEqual(['bad.docx', 'good.docx']);
    expect(outcomes[0].error?.code).toBe(ConversionErrorCode.INVALID_DOCUMENT);
    expect(outcomes[0].outputPath).toBeNull();
    expect(outcomes[1].error).toBeNull();
    expect(fs.readFileSync(path.join(outDir, 'good.xml'), 'utf8')).toContain('<p>Plain text.</p>');
  });
});
