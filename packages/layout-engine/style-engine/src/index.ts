/**
 * @linewright/style-engine
 *
 * Derives the text style (size, weight, slant) a token is laid out with.
 * Tags act as one-shot overrides on the running style; there is no CSS and
 * no attribute-driven styling.
 *
 * Tag rules:
 * - `i`     → italic
 * - `b`     → bold
 * - `small` → size − 2
 * - `big`   → size + 4
 * - `h1`    → size + 10
 * - anything else leaves the style unchanged
 */

export { deriveStyle, isStyleTag } from './derive.js';
export { createStyleContext, BLOCK_RESET_TAGS, type StyleContext, type StyleContextOptions } from './context.js';
