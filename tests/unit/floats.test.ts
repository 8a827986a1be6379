import { describe, expect, it } from 'vitest';
import { text } from '../../src/conversion/inline.js';
import { collectFloats, placeFloats, splitCaption } from '../../src/conversion/structurer/floats.js';
import type { Block, FloatBlock, FlowNode, Inline, ReconstructedTable } from '../../src/conversion/types.js';
import { testContext } from '../helpers/wordml.js';

const labels = testContext().config.labels;

const table: ReconstructedTable = {
  columnCount: 1,
  columnWidths: [100],
  headerRowCount: 0,
  rows: [
    {
      header: false,
      cells: [{ gridColumn: 0, rowSpan: 1, colSpan: 1, align: null, rowSeparator: true, columnSeparator: true, header: false, paragraphs: [[text('x')]] }],
    },
  ],
  spanFallback: false,
};

const block = (role: 'paragraph' | 'figure-caption' | 'table-caption' | 'table-source', value: string): Block => ({
  type: 'text',
  role,
  level: null,
  styleClass: '',
  content: [text(value)],
});

describe('splitCaption', () => {
  it('takes the label from a number style', () => {
    const content: Inline[] = [{ type: 'role', role: 'figure-number', children: [text('Figure 2')] }, text(' Sample workflow.')];
    expect(splitCaption(content, 'figure', labels)).toEqual({
      label: 'Figure 2',
      labelKey: 'figure:2',
      caption: [text('Sample workflow.')],
    });
  });

  it('takes the label from the leading label words', () => {
    expect(splitCaption([text('Figure 3. Unused diagram.')], 'figure', labels)).toEqual({
      label: 'Figure 3',
      labelKey: 'figure:3',
      caption: [text('Unused diagram.')],
    });
  });

  it('leaves a caption without a label word unlabeled', () => {
    const content = [text('2 views of the tool')];
    expect(splitCaption(content, 'figure', labels)).toEqual({ label: null, labelKey: null, caption: content });
  });
});

describe('collectFloats', () => {
  it('absorbs the tables and source after a table caption', () => {
    const result = collectFloats(
      [block('paragraph', 'before'), block('table-caption', 'Table 1: Results'), { type: 'table', table }, block('table-source', 'Source: test'), block('paragraph', 'after')],
      testContext(),
    );
    expect(result.blocks).toHaveLength(2);
    expect(result.floats).toEqual([
      {
        id: 'tab1_1',
        kind: 'table',
        label: 'Table 1',
        labelKey: 'table:1',
        caption: [text('Results')],
        tables: [table],
        attribution: [text('Source: test')],
        placement: 'pending',
      },
    ]);
  });

  it('reports a table caption without a table and duplicate labels', () => {
    const context = testContext();
    const result = collectFloats([block('table-caption', 'Table 1. Empty'), block('figure-caption', 'Figure 1. A'), block('figure-caption', 'Figure 1. B')], context);
    expect(result.floats.map((f) => f.id)).toEqual(['tab1_1', 'fig1_1', 'fig1_2']);
    expect(context.count('structural-anomaly')).toBe(2);
  });
});

describe('placeFloats', () => {
  const figure = (id: string): FloatBlock => ({
    id,
    kind: 'figure',
    label: null,
    labelKey: null,
    caption: [],
    tables: [],
    attribution: null,
    placement: 'pending',
  });
  const citing = (target: string, value: string): FlowNode => ({
    kind: 'paragraph',
    styleClass: '',
    content: [{ type: 'xref', refType: 'fig', target, resolution: 'resolved', children: [text(value)] }],
  });

  it('places a float after its first citing paragraph and appends the rest after the last ref-list', () => {
    const cited = figure('fig1_1');
    const unused = figure('fig1_2');
    const refs: FlowNode = { kind: 'ref-list', entries: [] };
    const body: FlowNode[] = [
      {
        kind: 'section',
        id: 's1',
        level: 1,
        title: [],
        children: [citing('fig1_1', 'Figure 1'), citing('fig1_1', 'Figure 1 again')],
      },
      { kind: 'section', id: 's2', level: 1, title: [], children: [refs] },
    ];
    const placed = placeFloats(body, [cited, unused]);

    const kinds = placed.map((node) => (node.kind === 'section' ? node.children.map((child) => (child.kind === 'float' ? child.float.id : child.kind)) : []));
    expect(kinds).toEqual([
      ['paragraph', 'fig1_1', 'paragraph'],
      ['ref-list', 'fig1_2'],
    ]);
    expect(cited.placement).toBe('placed-inline');
    expect(unused.placement).toBe('appended');
  });

  it('appends at the end when there is no reference list', () => {
    const unused = figure('fig1_1');
    const placed = placeFloats([{ kind: 'paragraph', styleClass: '', content: [text('x')] }], [unused]);
    expect(placed.map((node) => node.kind)).toEqual(['paragraph', 'float']);
  });

  it('places a float cited from a body table cell after the table', () => {
    const cited = figure('fig1_1');
    const see: Inline[] = [text('See '), { type: 'xref', refType: 'fig', target: 'fig1_1', resolution: 'resolved', children: [text('Figure 1')] }];
    const citingCell = { ...table.rows[0].cells[0], paragraphs: [see] };
    const body: FlowNode[] = [{ kind: 'table', table: { ...table, rows: [{ header: false, cells: [citingCell] }] } }, citing('fig1_1', 'Figure 1 later')];
    const placed = placeFloats(body, [cited]);
    expect(placed.map((node) => (node.kind === 'float' ? node.float.id : node.kind))).toEqual(['table', 'fig1_1', 'paragraph']);
    expect(cited.placement).toBe('placed-inline');
  });

  it('attaches floats cited from list items to the item', () => {
    const cited = figure('fig1_1');
    const list: FlowNode = {
      kind: 'list',
      listType: 'bullet',
      level: 1,
      items: [{ label: null, content: [{ type: 'xref', refType: 'fig', target: 'fig1_1', resolution: 'resolved', children: [text('Figure 1')] }], floats: [], children: [] }],
    };
    const [placed] = placeFloats([list], [cited]);
    expect(placed.kind === 'list' && placed.items[0].floats).toEqual([cited]);
  });
});
