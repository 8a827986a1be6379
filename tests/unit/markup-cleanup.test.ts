import { describe, expect, it } from 'vitest';
import { NAMESPACES } from '../../src/conversion/constants.js';
import { findDescendants, getBody, getWordAttribute, parseXml } from '../../src/conversion/dom.js';
import { cleanupMarkup } from '../../src/conversion/normalizer/markup-cleanup.js';
import { p, r, tbl, tc, tr, wordDocument } from '../helpers/wordml.js';

function bodyOf(...blocks: string[]): Element {
  return getBody(parseXml(wordDocument(...blocks), 'test'));
}

describe('cleanupMarkup', () => {
  it('keeps tracked insertions and drops tracked deletions', () => {
    const body = bodyOf(
      '<w:p><w:ins w:id="1">' + r('kept') + '</w:ins>' +
        '<w:del w:id="2"><w:r><w:delText>gone</w:delText></w:r></w:del></w:p>',
    );
    const summary = cleanupMarkup(body);
    expect(body.textContent).toBe('kept');
    expect(summary.unwrapped).toBe(1);
    expect(findDescendants(body, ['ins', 'del', 'delText'])).toHaveLength(0);
  });

  it('reads content controls through their content', () => {
    const body = bodyOf('<w:sdt><w:sdtPr/><w:sdtContent>' + p(null, 'inside') + '</w:sdtContent></w:sdt>');
    cleanupMarkup(body);
    const paragraphs = findDescendants(body, ['p']);
    expect(paragraphs).toHaveLength(1);
    expect(paragraphs[0].parentNode).toBe(body);
  });

  it('prefixes style names that start with a digit', () => {
    const body = bodyOf(p('1Para', 'x'), p('Normal', 'y'));
    const summary = cleanupMarkup(body);
    const styles = findDescendants(body, ['pStyle']).map((el) => getWordAttribute(el, 'val'));
    expect(styles).toEqual(['A1Para', 'Normal']);
    expect(summary.restyled).toBe(1);
  });

  it('drops table rows marked as deleted', () => {
    const body = bodyOf(
      tbl([tr([tc('a')]), '<w:tr><w:trPr><w:del w:id="3"/></w:trPr>' + tc('b') + '</w:tr>'], [100]),
    );
    cleanupMarkup(body);
    expect(findDescendants(body, ['tr'])).toHaveLength(1);
    expect(body.textContent).toBe('a');
  });

  it('folds horizontal merges into the origin cell span', () => {
    const body = bodyOf(
      tbl([tr([tc('wide', { hMerge: 'restart' }), tc('', { hMerge: 'continue' }), tc('c')])], [1, 1, 1]),
    );
    const summary = cleanupMarkup(body);
    const cells = findDescendants(body, ['tc']);
    expect(summary.foldedCells).toBe(1);
    expect(cells).toHaveLength(2);
    const span = cells[0].getElementsByTagNameNS(NAMESPACES.W, 'gridSpan').item(0);
    expect(span && getWordAttribute(span, 'val')).toBe('2');
    expect(findDescendants(body, ['hMerge'])).toHaveLength(0);
  });

  it('is idempotent', () => {
    const body = bodyOf(p('1Para', ['<w:ins>' + r('x') + '</w:ins>']));
    cleanupMarkup(body);
    const second = cleanupMarkup(body);
    expect(second).toEqual({ removed: 0, unwrapped: 0, restyled: 0, foldedCells: 0 });
  });
});
