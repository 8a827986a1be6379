import { describe, expect, it } from 'vitest';
import { ConversionError, ConversionErrorCode } from '../../src/conversion/errors.js';
import { countNodes, text } from '../../src/conversion/inline.js';
import { rewriteToFixedPoint } from '../../src/conversion/rewrite.js';
import { mergeInlines, mergeInlineSteps } from '../../src/conversion/transformer/inline-merge.js';
import type { Inline } from '../../src/conversion/types.js';

const bold = (...children: Inline[]): Inline => ({ type: 'format', format: 'bold', children });
const italic = (...children: Inline[]): Inline => ({ type: 'format', format: 'italic', children });
const underline = (...children: Inline[]): Inline => ({ type: 'format', format: 'underline', children });

describe('mergeInlines', () => {
  it('joins adjacent text leaves', () => {
    expect(mergeInlines([text('a'), text('b'), text('c')])).toEqual([text('abc')]);
  });

  it('merges adjacent identical wrappers and their text', () => {
    expect(mergeInlines([bold(text('Intro')), bold(text('duction'))])).toEqual([bold(text('Introduction'))]);
  });

  it('keeps different wrappers apart', () => {
    expect(mergeInlines([bold(text('a')), italic(text('b'))])).toEqual([bold(text('a')), italic(text('b'))]);
  });

  it('unwraps whitespace-only wrappers that are invisible on whitespace', () => {
    expect(mergeInlines([italic(text(' ')), text('x')])).toEqual([text(' x')]);
  });

  it('keeps underline on whitespace', () => {
    expect(mergeInlines([underline(text(' '))])).toEqual([underline(text(' '))]);
  });

  it('unwraps empty roles', () => {
    expect(mergeInlines([text('a'), { type: 'role', role: 'year', children: [text('')] }, text('b')])).toEqual([text('ab')]);
  });

  it('is idempotent', () => {
    const once = mergeInlines([bold(text('a')), bold(italic(text(' ')), text('b')), text('c'), text('d')]);
    expect(mergeInlines(once)).toEqual(once);
    expect(once).toEqual([bold(text('a b')), text('cd')]);
  });

  it('applies at most one rule per input node on nested runs', () => {
    const input = [bold(text('a')), bold(italic(text(' ')), text('b')), text('c'), text('d')];
    const result = mergeInlineSteps(input);
    expect(countNodes(input)).toBe(8);
    expect(result.steps).toBe(5);
    expect(result.steps).toBeLessThanOrEqual(countNodes(input));
    expect(result.value).toEqual([bold(text('a b')), text('cd')]);
  });
});

describe('rewriteToFixedPoint', () => {
  it('stops after at most measure(initial) steps', () => {
    const result = rewriteToFixedPoint(5, (n) => (n > 0 ? n - 1 : null), (n) => n, 'countdown');
    expect(result).toEqual({ value: 0, steps: 5 });
  });

  it('fails when a step does not decrease the measure', () => {
    const run = (): unknown => rewriteToFixedPoint(1, (n) => n, (n) => n, 'stuck');
    expect(run).toThrow(ConversionError);
    try {
      run();
    } catch (error) {
      expect(error instanceof ConversionError && error.code).toBe(ConversionErrorCode.REWRITE_DID_NOT_CONVERGE);
    }
  });
});
