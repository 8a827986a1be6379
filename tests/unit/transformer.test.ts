import { describe, expect, it } from 'vitest';
import type { ConversionContext } from '../../src/conversion/context.js';
import { normalizeDocument } from '../../src/conversion/normalizer/index.js';
import { parseNumbering } from '../../src/conversion/source.js';
import { externalHref, formatListLabel, ListLabeler, transformDocument } from '../../src/conversion/transformer/index.js';
import type { Block } from '../../src/conversion/types.js';
import { fldSimple, numberingXml, p, r, testContext, wordDocument } from '../helpers/wordml.js';

function blocksOf(xml: string, context: ConversionContext = testContext(), numbering: string | null = null): Block[] {
  const normalized = normalizeDocument(xml, new Map(), context);
  return transformDocument(normalized, parseNumbering(numbering), context);
}

describe('paragraph classification', () => {
  it('maps styled paragraphs to block roles', () => {
    const blocks = blocksOf(wordDocument(p('Head2', 'Methods'), p('Reference-Alphabetical', 'Doe, J. (2001).'), p(null, 'Body')));
    expect(blocks.map((b) => (b.type === 'text' ? [b.role, b.level] : b.type))).toEqual([
      ['heading', 2],
      ['reference', null],
      ['paragraph', null],
    ]);
  });

  it('looks up case study styles without their prefix', () => {
    const blocks = blocksOf(wordDocument(p('CaseStudy-Head2', 'Background'), p('CaseStudy-BulletList1', 'point'), p('CaseStudyTitle', 'Title')));
    expect(blocks.map((b) => (b.type === 'text' ? [b.role, b.level] : b.type === 'list-item' ? [b.listType, b.level] : b.type))).toEqual([
      ['heading', 2],
      ['bullet', 1],
      ['case-study-title', null],
    ]);
  });

  it('drops empty paragraphs and keeps placeholder styles', () => {
    const blocks = blocksOf(wordDocument('<w:p/>', '<w:p><w:pPr><w:pStyle w:val="cimage"/></w:pPr></w:p>', p(null, '   ')));
    expect(blocks).toEqual([{ type: 'placeholder', styleClass: 'cimage' }]);
  });

  it('labels list items per level and type', () => {
    const blocks = blocksOf(
      wordDocument(p('NumberList1', 'one'), p('BulletList2', 'sub'), p('NumberList1', 'two'), p(null, 'after'), p('NumberList1', 'again')),
    );
    const items = blocks.flatMap((b) => (b.type === 'list-item' ? [[b.listType, b.level, b.label]] : []));
    expect(items).toEqual([
      ['order', 1, '1.'],
      ['bullet', 2, '•'],
      ['order', 1, '2.'],
      ['order', 1, '1.'],
    ]);
  });

  it('takes list type from numbering definitions', () => {
    const blocks = blocksOf(
      wordDocument(p(null, 'first', { numId: '4' }), p(null, 'nested', { numId: '4', ilvl: 1 })),
      testContext(),
      numberingXml('4', ['lowerLetter', 'lowerRoman']),
    );
    const items = blocks.flatMap((b) => (b.type === 'list-item' ? [[b.listType, b.level, b.label]] : []));
    expect(items).toEqual([
      ['lower-alpha', 1, 'a.'],
      ['lower-roman', 2, 'i.'],
    ]);
  });

  it('clamps deep numbering levels to six', () => {
    const blocks = blocksOf(wordDocument(p(null, 'deep', { numId: '4', ilvl: 8 })), testContext(), numberingXml('4', ['bullet']));
    expect(blocks).toHaveLength(1);
    expect(blocks[0]).toMatchObject({ type: 'list-item', listType: 'bullet', level: 6 });
  });

  it('keeps a label typed into the item text', () => {
    const [block] = blocksOf(wordDocument(p('NumberList1', 'b)\tSecond point')));
    expect(block).toMatchObject({ type: 'list-item', label: 'b)', content: [{ type: 'text', value: 'Second point' }] });
  });
});

describe('inline conversion', () => {
  it('wraps character styles in roles outside the format chain', () => {
    const [block] = blocksOf(wordDocument(p(null, [r('See '), r('Smith', { style: 'bibsurname', italic: true })])));
    expect(block).toMatchObject({
      content: [
        { type: 'text', value: 'See ' },
        { type: 'role', role: 'surname', children: [{ type: 'format', format: 'italic', children: [{ type: 'text', value: 'Smith' }] }] },
      ],
    });
  });

  it('folds complex hyperlink fields into links', () => {
    const field =
      '<w:r><w:fldChar w:fldCharType="begin"/></w:r>' +
      '<w:r><w:instrText xml:space="preserve"> HYPERLINK "https://example.org" </w:instrText></w:r>' +
      '<w:r><w:fldChar w:fldCharType="separate"/></w:r>' +
      r('site') +
      '<w:r><w:fldChar w:fldCharType="end"/></w:r>';
    const [block] = blocksOf(wordDocument(p(null, [r('Visit '), field])));
    expect(block).toMatchObject({
      content: [
        { type: 'text', value: 'Visit ' },
        { type: 'link', href: 'https://example.org', children: [{ type: 'text', value: 'site' }] },
      ],
    });
  });

  it('reports a field left open and keeps its result', () => {
    const context = testContext();
    const open = '<w:r><w:fldChar w:fldCharType="begin"/></w:r><w:r><w:instrText>REF bm1</w:instrText></w:r>' +
      '<w:r><w:fldChar w:fldCharType="separate"/></w:r>' + r('see above');
    const [block] = blocksOf(wordDocument(p(null, open)), context);
    expect(block).toMatchObject({
      content: [{ type: 'xref', refType: 'other', target: 'bm1', children: [{ type: 'text', value: 'see above' }] }],
    });
    expect(context.count('structural-anomaly')).toBe(1);
  });

  it('gives scheme-less link targets a scheme', () => {
    expect(externalHref('example.org/page')).toBe('http://example.org/page');
    expect(externalHref('editor@example.org')).toBe('mailto:editor@example.org');
    expect(externalHref('ftp://example.org')).toBe('ftp://example.org');
    expect(externalHref('#section-2')).toBe('#section-2');
  });

  it('consumes table declaration fields', () => {
    const context = testContext();
    const blocks = blocksOf(wordDocument(p(null, [fldSimple('SET Table:3', '')]), p(null, 'text')), context);
    expect(blocks).toHaveLength(1);
    expect(context.count('structural-anomaly')).toBe(1);
  });
});

describe('list labels', () => {
  it('formats every list type', () => {
    expect(formatListLabel('order', 12)).toBe('12.');
    expect(formatListLabel('lower-alpha', 28)).toBe('ab.');
    expect(formatListLabel('upper-alpha', 3)).toBe('C.');
    expect(formatListLabel('lower-roman', 14)).toBe('xiv.');
    expect(formatListLabel('upper-roman', 9)).toBe('IX.');
    expect(formatListLabel('bullet', 5)).toBe('•');
    expect(formatListLabel('none', 1)).toBeNull();
  });

  it('restarts deeper levels when a shallower item appears', () => {
    const labeler = new ListLabeler();
    expect(labeler.next('order', 1)).toBe('1.');
    expect(labeler.next('lower-alpha', 2)).toBe('a.');
    expect(labeler.next('lower-alpha', 2)).toBe('b.');
    expect(labeler.next('order', 1)).toBe('2.');
    expect(labeler.next('lower-alpha', 2)).toBe('a.');
  });
});
