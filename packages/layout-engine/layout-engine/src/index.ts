import {
  flattenDocument,
  getTextPayload,
  resolveViewportConfig,
  type DisplayList,
  type DocumentNode,
  type FlatToken,
  type FontProvider,
  type StyleMode,
  type TextStyle,
  type ViewportConfig,
} from '@linewright/contracts';
import { createStyleContext } from '@linewright/style-engine';
import { LineComposer } from './line-composer.js';

export { LineComposer, type LineComposerOptions, type LineMetrics } from './line-composer.js';

/** Blocks that start on a fresh line and leave a vertical gap once they close. */
export const PARAGRAPH_TAGS: ReadonlySet<string> = new Set(['p']);

/** Blocks that start on a fresh line and end their last line when they close. */
export const HEADING_TAGS: ReadonlySet<string> = new Set(['h1']);

/** Tags that end the current line without a gap. */
export const LINE_BREAK_TAGS: ReadonlySet<string> = new Set(['br']);

type OpenBlock = {
  tag: string;
  depth: number;
};

const WHITESPACE = /\s+/;

export type LayoutOptions = {
  /** Source of measurable fonts, usually a font cache. */
  fonts: FontProvider;
  viewport?: Partial<ViewportConfig>;
  baseStyle?: Readonly<TextStyle>;
  /** Defaults to `flat`. */
  styleMode?: StyleMode;
};

const layoutDebugEnabled =
  typeof process !== 'undefined' && typeof process.env !== 'undefined' && Boolean(process.env.LW_DEBUG_LAYOUT);

const layoutLog = (...args: unknown[]): void => {
  if (!layoutDebugEnabled) return;

  console.log(...args);
};

/** Split a text payload into whitespace-delimited words. */
export const splitWords = (text: string): string[] => text.split(WHITESPACE).filter((word) => word.length > 0);

/**
 * Lay out a document (or an already flattened token stream) into a display
 * list of positioned words.
 *
 * The function is deterministic: tokens are visited once, in order. The token
 * stream has no end-of-element events, so a `p` or `h1` counts as closed once
 * a later token sits at its depth or shallower. Each token first closes the
 * blocks it leaves (flush, plus `lineStep` after a `p`), then updates the
 * running style, then opens its own block (`p`, `h1` flush) or breaks the line
 * (`br`), then contributes the words of its own text payload. Blocks still
 * open at the end are closed before the final flush emits the trailing line.
 *
 * @throws {PipelineError} FONT_UNAVAILABLE when a style's font cannot be acquired;
 *   no partial display list is returned in that case
 */
export function layoutDocument(input: DocumentNode | readonly FlatToken[], options: LayoutOptions): DisplayList {
  const tokens = 'tag' in input ? flattenDocument(input) : input;
  const viewport = resolveViewportConfig(options.viewport);
  const styles = createStyleContext({ base: options.baseStyle, mode: options.styleMode });
  const composer = new LineComposer({
    width: viewport.width,
    marginX: viewport.marginX,
    marginTop: viewport.marginTop,
  });

  const openBlocks: OpenBlock[] = [];
  const closeBlocksAt = (depth: number): void => {
    while (openBlocks.length > 0 && openBlocks[openBlocks.length - 1].depth >= depth) {
      const block = openBlocks.pop();
      composer.flush();
      if (block && PARAGRAPH_TAGS.has(block.tag)) {
        composer.advance(viewport.lineStep);
      }
    }
  };

  for (const token of tokens) {
    closeBlocksAt(token.depth);
    const style = styles.next(token);

    if (PARAGRAPH_TAGS.has(token.tag) || HEADING_TAGS.has(token.tag)) {
      composer.flush();
      openBlocks.push({ tag: token.tag, depth: token.depth });
    } else if (LINE_BREAK_TAGS.has(token.tag)) {
      composer.flush();
    }

    const words = splitWords(getTextPayload(token.node));
    if (words.length > 0) {
      const font = options.fonts.getFont(style.size, style.weight, style.style);
      for (const word of words) {
        composer.placeWord(word, font);
      }
    }
  }

  closeBlocksAt(Number.NEGATIVE_INFINITY);
  composer.flush();

  const displayList = composer.takeDisplayList();
  layoutLog('[layoutDocument]', {
    tokens: tokens.length,
    lines: composer.lines.length,
    entries: displayList.length,
    styleMode: styles.mode,
  });
  return displayList;
}

/** Bottom edge of the laid-out content (0 for an empty list). */
export function getDocumentHeight(displayList: DisplayList): number {
  let bottom = 0;
  for (const entry of displayList) {
    bottom = Math.max(bottom, entry.y + entry.font.metrics().linespace);
  }
  return bottom;
}
