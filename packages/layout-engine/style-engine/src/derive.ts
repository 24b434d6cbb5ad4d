import type { TextStyle } from '@linewright/contracts';

type StyleRule = (style: TextStyle) => TextStyle;

const TAG_RULES: Readonly<Record<string, StyleRule>> = {
  i: (style) => ({ ...style, style: 'italic' }),
  b: (style) => ({ ...style, weight: 'bold' }),
  small: (style) => ({ ...style, size: style.size - 2 }),
  big: (style) => ({ ...style, size: style.size + 4 }),
  h1: (style) => ({ ...style, size: style.size + 10 }),
};

/**
 * Apply a tag's override to a style. Pure: `base` is never mutated and an
 * unknown tag returns an equal copy.
 *
 * @example
 * deriveStyle({ size: 16, weight: 'normal', style: 'roman' }, 'big');
 * // { size: 20, weight: 'normal', style: 'roman' }
 */
export function deriveStyle(base: Readonly<TextStyle>, tag: string): TextStyle {
  const rule = Object.prototype.hasOwnProperty.call(TAG_RULES, tag) ? TAG_RULES[tag] : undefined;
  return rule ? rule({ ...base }) : { ...base };
}

/** True when the tag changes the style it is applied to. */
export const isStyleTag = (tag: string): boolean => Object.prototype.hasOwnProperty.call(TAG_RULES, tag);
