import { describe, expect, it } from 'vitest';
import { text } from '../../src/conversion/inline.js';
import { buildBibliography, classifyEntry, createEntry, extractYear } from '../../src/conversion/structurer/bibliography.js';
import type { FlowNode, Inline, InlineRole } from '../../src/conversion/types.js';
import { testContext } from '../helpers/wordml.js';

const role = (name: InlineRole, value: string): Inline => ({ type: 'role', role: name, children: [text(value)] });

const article: Inline[] = [
  role('surname', 'Smith'),
  text(', '),
  role('given-names', 'J.'),
  text(', & '),
  role('surname', 'Jones'),
  text(', '),
  role('given-names', 'K.'),
  text(' ('),
  role('year', '2020'),
  text('). '),
  role('article-title', 'A study of things'),
  text('. '),
  role('source', 'Journal of Tests'),
  text(', '),
  role('volume', '4'),
  text('('),
  role('issue', '2'),
  text('), '),
  role('fpage', '10'),
  text('–'),
  role('lpage', '20'),
  text('.'),
];

describe('createEntry', () => {
  it('reads contributors, year and fields from styled runs', () => {
    const entry = createEntry(article, testContext());
    expect(entry).toMatchObject({
      id: 'bid_1_1',
      publicationType: 'article',
      contributors: [
        { kind: 'person', surname: 'Smith', givenNames: 'J.' },
        { kind: 'person', surname: 'Jones', givenNames: 'K.' },
      ],
      year: '2020',
      articleTitle: 'A study of things',
      source: 'Journal of Tests',
      volume: '4',
      issue: '2',
      firstPage: '10',
      lastPage: '20',
      leadingTokens: ['smith', 'j', 'jones', 'k', '2020'],
      keyTokens: ['smith', 'jones', '2020'],
    });
  });

  it('groups the leading names into one person group', () => {
    const entry = createEntry(article, testContext());
    const [group, next] = entry.parts;
    expect(group).toEqual({
      type: 'person-group',
      members: [
        { type: 'name', parts: [role('surname', 'Smith'), text(', '), role('given-names', 'J.')] },
        { type: 'inline', inline: text(', & ') },
        { type: 'name', parts: [role('surname', 'Jones'), text(', '), role('given-names', 'K.')] },
      ],
    });
    expect(next).toEqual({ type: 'inline', inline: text(' (') });
  });

  it('keeps an organisation as a collaborator', () => {
    const entry = createEntry([role('collab', 'World Test Agency'), text('. ('), role('year', '2019a'), text('). '), role('url', 'example.org')], testContext());
    expect(entry.contributors).toEqual([{ kind: 'collab', name: 'World Test Agency' }]);
    expect(entry.publicationType).toBe('web');
    expect(entry.keyTokens).toEqual(['world', 'test', 'agency', '2019a']);
  });

  it('isolates the year inside a styled year run', () => {
    const entry = createEntry([role('surname', 'Lee'), text(' '), role('year', '(2018b).')], testContext());
    expect(entry.year).toBe('2018b');
    expect(entry.parts.slice(-3)).toEqual([
      { type: 'inline', inline: text('(') },
      { type: 'inline', inline: role('year', '2018b') },
      { type: 'inline', inline: text(').') },
    ]);
  });
});

describe('classifyEntry', () => {
  const none = { url: null, issue: null, articleTitle: null, chapterTitle: null, publisher: null };

  it('orders web, article, book and other', () => {
    expect(classifyEntry({ ...none, url: 'x', articleTitle: 'y' })).toBe('web');
    expect(classifyEntry({ ...none, issue: '3' })).toBe('article');
    expect(classifyEntry({ ...none, publisher: 'Press' })).toBe('book');
    expect(classifyEntry({ ...none, chapterTitle: 'Part' })).toBe('book');
    expect(classifyEntry(none)).toBe('other');
  });
});

describe('extractYear', () => {
  it('keeps a disambiguation letter in lower case', () => {
    expect(extractYear('(2020A)')).toBe('2020a');
    expect(extractYear('n.d.')).toBeNull();
    expect(extractYear(null)).toBeNull();
  });
});

describe('buildBibliography', () => {
  it('groups consecutive references per container', () => {
    const flow: FlowNode[] = [
      { kind: 'reference', content: [role('surname', 'Ames'), text(' (2001).')] },
      { kind: 'reference', content: [role('surname', 'Bell'), text(' (2002).')] },
      { kind: 'paragraph', styleClass: '', content: [text('break')] },
      { kind: 'reference', content: [role('surname', 'Cole'), text(' (2003).')] },
    ];
    const result = buildBibliography(flow, testContext());
    expect(result.flow.map((node) => (node.kind === 'ref-list' ? node.entries.map((e) => e.id) : node.kind))).toEqual([
      ['bid_1_1', 'bid_1_2'],
      'paragraph',
      ['bid_1_3'],
    ]);
    expect(result.entries).toHaveLength(3);
  });
});
