import { DEFAULT_TEXT_STYLE, type FlatToken, type StyleMode, type TextStyle } from '@linewright/contracts';
import { deriveStyle } from './derive.js';

/**
 * Block tags that put the running style back to the base style before their
 * own rule applies (flat mode only). Inline overrides and headings stay in
 * effect until one of these is reached; `h1` grows the running style.
 */
export const BLOCK_RESET_TAGS: ReadonlySet<string> = new Set(['p']);

export type StyleContextOptions = {
  base?: Readonly<TextStyle>;
  /**
   * `flat` (default): every token mutates one running style and nothing is
   * restored when an element ends.
   * `nested`: a token inherits from its parent only, like a push/pop cascade.
   */
  mode?: StyleMode;
};

export type StyleContext = {
  readonly mode: StyleMode;
  /** Advance to `token` and return the style its text is laid out with. */
  next(token: FlatToken): TextStyle;
  current(): TextStyle;
  reset(): void;
};

export function createStyleContext(options: StyleContextOptions = {}): StyleContext {
  const base: TextStyle = { ...(options.base ?? DEFAULT_TEXT_STYLE) };
  const mode = options.mode ?? 'flat';

  let running: TextStyle = { ...base };
  // nested mode: stack[d] is the style of the most recent token at depth d
  const stack: TextStyle[] = [];

  const nextFlat = (token: FlatToken): TextStyle => {
    if (BLOCK_RESET_TAGS.has(token.tag)) {
      running = { ...base };
    }
    running = deriveStyle(running, token.tag);
    return running;
  };

  const nextNested = (token: FlatToken): TextStyle => {
    const depth = Math.max(0, token.depth);
    const parentIndex = Math.min(depth, stack.length) - 1;
    const parent = parentIndex >= 0 ? stack[parentIndex] : base;
    const style = deriveStyle(parent, token.tag);
    stack.length = parentIndex + 1;
    stack.push(style);
    running = style;
    return style;
  };

  return {
    mode,
    next: mode === 'nested' ? nextNested : nextFlat,
    current: () => ({ ...running }),
    reset: () => {
      running = { ...base };
      stack.length = 0;
    },
  };
}
