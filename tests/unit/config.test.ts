import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { getDefaultConfig, LABELS_FILE, loadConversionConfig, resolveDataFile } from '../../src/config.js';
import { ConversionError, ConversionErrorCode } from '../../src/conversion/errors.js';

function expectConfigError(load: () => unknown): ConversionError {
  try {
    load();
  } catch (error) {
    expect(error).toBeInstanceOf(ConversionError);
    if (error instanceof ConversionError) {
      expect(error.code).toBe(ConversionErrorCode.INVALID_CONFIG);
      return error;
    }
  }
  throw new Error('expected a configuration error');
}

describe('loadConversionConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docx-bits-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const write = (name: string, content: string): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  };

  it('loads the bundled tables', () => {
    const config = getDefaultConfig();
    expect(config.styleMap.paragraphStyles.FigureLegend).toEqual({ role: 'figure-caption' });
    expect(config.labels.table).toEqual(['Table', 'Tables']);
    expect(resolveDataFile(LABELS_FILE).endsWith(path.join('data', 'labels.json'))).toBe(true);
  });

  it('applies schema defaults to an override file', () => {
    const labelsPath = write('labels.json', JSON.stringify({ chapter: ['Kapitel'], figure: ['Abbildung'], table: ['Tabelle'] }));
    const config = loadConversionConfig({ labelsPath });
    expect(config.labels).toEqual({
      language: 'en',
      chapter: ['Kapitel'],
      figure: ['Abbildung'],
      table: ['Tabelle'],
      abstract: [],
      keywords: [],
      part: ['Part', 'Section'],
      caseStudy: ['Case Study'],
      connectors: ['and', '&'],
      rangeWords: ['to'],
    });
  });

  it('rejects a file that is not JSON', () => {
    const labelsPath = write('labels.json', '{ not json');
    const error = expectConfigError(() => loadConversionConfig({ labelsPath }));
    expect(error.context?.filePath).toBe(labelsPath);
  });

  it('rejects a missing file', () => {
    expectConfigError(() => loadConversionConfig({ styleMapPath: path.join(dir, 'absent.json') }));
  });

  it('lists schema problems with their paths', () => {
    const labelsPath = write('labels.json', JSON.stringify({ chapter: [], figure: ['Figure'], table: ['Table'] }));
    const error = expectConfigError(() => loadConversionConfig({ labelsPath }));
    expect(error.message).toContain('chapter: ');
  });

  it('rejects a heading level deeper than six', () => {
    const styleMapPath = write('style-map.json', JSON.stringify({ paragraphStyles: { Head7: { role: 'heading', level: 7 } }, characterStyles: {} }));
    const error = expectConfigError(() => loadConversionConfig({ styleMapPath }));
    expect(error.message).toContain('paragraphStyles.Head7.level: ');
  });

  it('rejects a list style pattern that is not a regular expression', () => {
    const styleMapPath = write(
      'style-map.json',
      JSON.stringify({ paragraphStyles: {}, characterStyles: {}, listStyles: [{ pattern: '([', listType: 'bullet' }] }),
    );
    const error = expectConfigError(() => loadConversionConfig({ styleMapPath }));
    expect(error.message).toContain('listStyles.0.pattern: not a valid regular expression');
  });
});
