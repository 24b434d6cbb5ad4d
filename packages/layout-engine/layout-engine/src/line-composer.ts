import {
  LINE_HEIGHT_MULTIPLIER,
  PipelineError,
  fontKeyToString,
  type DisplayEntry,
  type DisplayList,
  type FontHandle,
  type WordBox,
} from '@linewright/contracts';

export type LineComposerOptions = {
  /** Viewport width; words wrap once they would cross `width - marginX`. */
  width: number;
  marginX: number;
  marginTop: number;
};

export type LineMetrics = {
  baseline: number;
  maxAscent: number;
  maxDescent: number;
};

/**
 * Greedy line builder.
 *
 * Words accumulate on the current line until the next one would overflow the
 * right edge; the line is then flushed into display entries that share one
 * baseline, and the overflowing word starts the next line. Words are never
 * split, so a word wider than the viewport sits alone on its line.
 */
export class LineComposer {
  private readonly options: LineComposerOptions;
  private line: WordBox[] = [];
  private entries: DisplayEntry[] = [];
  private readonly flushed: LineMetrics[] = [];
  private cursorX: number;
  private cursorY: number;

  constructor(options: LineComposerOptions) {
    this.options = options;
    this.cursorX = options.marginX;
    this.cursorY = options.marginTop;
  }

  get cursor(): { x: number; y: number } {
    return { x: this.cursorX, y: this.cursorY };
  }

  /** Words waiting on the current (unflushed) line. */
  get pendingWords(): readonly WordBox[] {
    return this.line;
  }

  /** Baseline metrics of every line flushed so far, top to bottom. */
  get lines(): readonly LineMetrics[] {
    return this.flushed;
  }

  placeWord(word: string, font: FontHandle): void {
    if (word.length === 0) return;

    const width = font.measure(word);
    if (!Number.isFinite(width)) {
      throw new PipelineError('INVARIANT_VIOLATION', `Font ${fontKeyToString(font.key)} measured "${word}" as ${width}`);
    }

    if (this.cursorX + width > this.options.width - this.options.marginX) {
      this.flush();
    }

    this.line.push({ x: this.cursorX, text: word, font });
    this.cursorX += width + font.measure(' ');
  }

  flush(): void {
    if (this.line.length === 0) return;

    let maxAscent = Number.NEGATIVE_INFINITY;
    let maxDescent = Number.NEGATIVE_INFINITY;
    for (const word of this.line) {
      const metrics = word.font.metrics();
      maxAscent = Math.max(maxAscent, metrics.ascent);
      maxDescent = Math.max(maxDescent, metrics.descent);
    }
    if (!Number.isFinite(maxAscent) || !Number.isFinite(maxDescent)) {
      throw new PipelineError('INVARIANT_VIOLATION', 'Line fonts reported non-finite metrics', {
        words: this.line.map((word) => word.text),
      });
    }

    const baseline = this.cursorY + LINE_HEIGHT_MULTIPLIER * maxAscent;
    for (const word of this.line) {
      this.entries.push({
        x: word.x,
        y: baseline - word.font.metrics().ascent,
        text: word.text,
        font: word.font,
      });
    }
    this.flushed.push({ baseline, maxAscent, maxDescent });

    this.cursorY = baseline + LINE_HEIGHT_MULTIPLIER * maxDescent;
    this.cursorX = this.options.marginX;
    this.line = [];
  }

  /** Move the pen down without emitting anything (paragraph gaps). */
  advance(dy: number): void {
    this.cursorY += dy;
  }

  /**
   * Hand over the entries produced so far and start a fresh list.
   * Pending words are not included; flush first.
   */
  takeDisplayList(): DisplayList {
    const list = this.entries;
    this.entries = [];
    return list;
  }
}
