import { describe, expect, it } from 'vitest';
import { PipelineError, type FontHandle, type FontMetrics } from '@linewright/contracts';
import { LineComposer } from './line-composer.js';

const makeFont = (size: number, wordWidth: number, spaceWidth: number, metrics: FontMetrics): FontHandle => ({
  key: { size, weight: 'normal', style: 'roman' },
  measure: (text) => (text === ' ' ? spaceWidth : wordWidth),
  metrics: () => metrics,
});

const small = makeFont(16, 40, 8, { ascent: 12, descent: 4, linespace: 16 });
const large = makeFont(32, 80, 16, { ascent: 24, descent: 8, linespace: 32 });

const composer = (width = 800) => new LineComposer({ width, marginX: 13, marginTop: 18 });

describe('LineComposer.placeWord', () => {
  it('places words left to right, advancing by width plus the font space', () => {
    const lines = composer();
    lines.placeWord('a', small);
    lines.placeWord('b', small);
    lines.placeWord('c', large);

    expect(lines.pendingWords.map((word) => word.x)).toEqual([13, 61, 109]);
    expect(lines.cursor.x).toBe(205);
  });

  it('wraps when the word would cross width - margin, measured before placing', () => {
    // usable right edge: 200 - 13 = 187; words start at 13, 61, 109, 157
    const lines = composer(200);
    lines.placeWord('one', small); // 13..53
    lines.placeWord('two', small); // 61..101
    lines.placeWord('three', small); // 109..149
    expect(lines.pendingWords).toHaveLength(3);

    lines.placeWord('four', small); // 157 + 40 = 197 > 187 → new line
    expect(lines.pendingWords.map((word) => [word.text, word.x])).toEqual([['four', 13]]);
    expect(lines.takeDisplayList().map((entry) => entry.text)).toEqual(['one', 'two', 'three']);
  });

  it('does not wrap when the word ends exactly at the right edge', () => {
    const exact = makeFont(16, 174, 8, { ascent: 12, descent: 4, linespace: 16 });
    const lines = composer(200);
    lines.placeWord('fits', exact); // 13 + 174 = 187
    expect(lines.takeDisplayList()).toEqual([]);
    expect(lines.pendingWords).toHaveLength(1);
  });

  it('keeps a word wider than the viewport whole, alone on its line', () => {
    const huge = makeFont(16, 1000, 8, { ascent: 12, descent: 4, linespace: 16 });
    const lines = composer(200);
    lines.placeWord('before', small);
    lines.placeWord('enormous', huge);
    lines.placeWord('after', small);
    lines.flush();

    const entries = lines.takeDisplayList();
    expect(entries.map((entry) => [entry.text, entry.x])).toEqual([
      ['before', 13],
      ['enormous', 13],
      ['after', 13],
    ]);
  });

  it('ignores empty words', () => {
    const lines = composer();
    lines.placeWord('', small);
    expect(lines.pendingWords).toHaveLength(0);
    expect(lines.cursor.x).toBe(13);
  });

  it('rejects non-finite widths as an invariant violation', () => {
    const broken = makeFont(16, Number.NaN, 8, { ascent: 12, descent: 4, linespace: 16 });
    expect(() => composer().placeWord('x', broken)).toThrow(PipelineError);
  });
});

describe('LineComposer.flush', () => {
  it('is a no-op on an empty line', () => {
    const lines = composer();
    lines.flush();
    expect(lines.cursor).toEqual({ x: 13, y: 18 });
    expect(lines.lines).toEqual([]);
  });

  it('aligns mixed fonts on one baseline derived from the tallest ascent', () => {
    const lines = composer();
    lines.placeWord('small', small);
    lines.placeWord('LARGE', large);
    lines.flush();

    // baseline = 18 + 1.25 * 24 = 48
    const entries = lines.takeDisplayList();
    expect(entries.map((entry) => entry.y)).toEqual([36, 24]);
    for (const entry of entries) {
      expect(entry.y + entry.font.metrics().ascent).toBe(48);
    }
    expect(lines.lines).toEqual([{ baseline: 48, maxAscent: 24, maxDescent: 8 }]);
  });

  it('moves the pen below the deepest descent and back to the margin', () => {
    const lines = composer();
    lines.placeWord('LARGE', large);
    lines.placeWord('small', small);
    lines.flush();

    // cursorY = 48 + 1.25 * 8 = 58
    expect(lines.cursor).toEqual({ x: 13, y: 58 });
    expect(lines.pendingWords).toHaveLength(0);
  });

  it('produces non-decreasing baselines across lines', () => {
    const lines = composer(200);
    for (let i = 0; i < 12; i += 1) {
      lines.placeWord(`w${i}`, i % 3 === 0 ? large : small);
    }
    lines.flush();

    const baselines = lines.lines.map((line) => line.baseline);
    expect(baselines.length).toBeGreaterThan(1);
    for (let i = 1; i < baselines.length; i += 1) {
      expect(baselines[i]).toBeGreaterThanOrEqual(baselines[i - 1]);
    }
  });

  it('rejects lines whose fonts report non-finite metrics', () => {
    const broken = makeFont(16, 10, 2, { ascent: Number.NaN, descent: 1, linespace: 1 });
    const lines = composer();
    lines.placeWord('x', broken);
    expect(() => lines.flush()).toThrow('Line fonts reported non-finite metrics');
  });
});

describe('LineComposer.advance / takeDisplayList', () => {
  it('moves the pen down without emitting entries', () => {
    const lines = composer();
    lines.advance(18);
    expect(lines.cursor.y).toBe(36);
    expect(lines.takeDisplayList()).toEqual([]);
  });

  it('hands over entries once', () => {
    const lines = composer();
    lines.placeWord('x', small);
    lines.flush();
    expect(lines.takeDisplayList()).toHaveLength(1);
    expect(lines.takeDisplayList()).toHaveLength(0);
  });
});
