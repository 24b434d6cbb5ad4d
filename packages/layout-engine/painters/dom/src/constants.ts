/**
 * DOM Painter Constants
 *
 * Class names and data attributes written by the DOM painter. Tests and host
 * stylesheets select painted words through these.
 *
 * @module constants
 */

export const DOM_CLASS_NAMES = {
  /** Class name for the painter's root element inside the mount. */
  VIEWPORT: 'linewright-viewport',

  /** Class name for one painted word. */
  WORD: 'linewright-word',
} as const;

export type DomClassName = (typeof DOM_CLASS_NAMES)[keyof typeof DOM_CLASS_NAMES];

/** Data attribute carrying the font key (`size/weight/style`) of a word. */
export const FONT_KEY_ATTRIBUTE = 'data-font';
