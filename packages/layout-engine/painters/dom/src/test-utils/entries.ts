import type { DisplayEntry, FontHandle, FontKey } from '@linewright/contracts';

/** Handle with linespace = size; widths are irrelevant to painting. */
export const fakeFont = (size = 10, weight: FontKey['weight'] = 'normal', style: FontKey['style'] = 'roman'): FontHandle => ({
  key: { size, weight, style },
  measure: (text) => text.length * size,
  metrics: () => ({ ascent: size * 0.75, descent: size * 0.25, linespace: size }),
});

export const entry = (y: number, text = `w${y}`, font: FontHandle = fakeFont()): DisplayEntry => ({
  x: 13,
  y,
  text,
  font,
});
