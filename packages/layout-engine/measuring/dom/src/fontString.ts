import type { FontKey } from '@linewright/contracts';

/**
 * Build a CSS font shorthand from a font key.
 *
 * @example
 * buildFontString({ size: 16, weight: 'bold', style: 'italic' }, 'serif');
 * // 'italic bold 16px serif'
 */
export function buildFontString(key: FontKey, fontFamily: string): string {
  const parts: string[] = [];
  if (key.style === 'italic') parts.push('italic');
  if (key.weight === 'bold') parts.push('bold');
  parts.push(`${key.size}px`);
  parts.push(fontFamily);
  return parts.join(' ');
}
