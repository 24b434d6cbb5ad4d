export { PipelineError, toPipelineError, type PipelineErrorCode } from './errors.js';
export {
  DEFAULT_VIEWPORT_CONFIG,
  LINE_HEIGHT_MULTIPLIER,
  resolveViewportConfig,
  type ViewportConfig,
} from './config.js';
export {
  TEXT_NODE_TAG,
  TEXT_CONTENT_ATTRIBUTE,
  isTextNode,
  getTextPayload,
  type DocumentNode,
  type FlatToken,
} from './document.js';
export { flattenDocument, getNodes, getTextNodes } from './flatten.js';

// ============================================================================
// Text style & fonts
// ============================================================================

export type FontWeight = 'normal' | 'bold';
export type FontSlant = 'roman' | 'italic';

export type TextStyle = {
  /** Font size in pixels; a positive integer. */
  size: number;
  weight: FontWeight;
  style: FontSlant;
};

export const DEFAULT_TEXT_STYLE: Readonly<TextStyle> = {
  size: 16,
  weight: 'normal',
  style: 'roman',
};

export type FontKey = Readonly<TextStyle>;

export const fontKeyToString = (key: FontKey): string => `${key.size}/${key.weight}/${key.style}`;

export type FontMetrics = {
  ascent: number;
  descent: number;
  /** Distance between consecutive baselines for this font alone. */
  linespace: number;
};

/**
 * Measurable font owned by a font cache. Layout code only borrows handles.
 */
export interface FontHandle {
  readonly key: FontKey;
  measure(text: string): number;
  metrics(): FontMetrics;
}

/**
 * Low-level font source a font cache builds handles from.
 *
 * `acquire` throws when the backend cannot produce the requested font.
 */
export interface FontBackend {
  readonly name: string;
  acquire(key: FontKey): FontHandle;
}

/** Anything layout can ask for a font. */
export interface FontProvider {
  getFont(size: number, weight: FontWeight, style: FontSlant): FontHandle;
}

// ============================================================================
// Layout output
// ============================================================================

/** A word placed on the line currently being built. */
export type WordBox = {
  readonly x: number;
  readonly text: string;
  readonly font: FontHandle;
};

export type DisplayEntry = {
  readonly x: number;
  /** Top of the word box (baseline minus the font's ascent). */
  readonly y: number;
  readonly text: string;
  readonly font: FontHandle;
};

export type DisplayList = readonly DisplayEntry[];

export type StyleMode = 'flat' | 'nested';

// ============================================================================
// Rendering
// ============================================================================

export type DrawCommand = {
  x: number;
  y: number;
  text: string;
  font: FontKey;
};

/**
 * Target the viewport paints onto.
 */
export interface RenderSurface {
  clear(): void;
  drawText(x: number, y: number, text: string, font: FontHandle): void;
}
