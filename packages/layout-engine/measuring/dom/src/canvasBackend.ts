import { PipelineError, type FontBackend, type FontHandle, type FontKey, type FontMetrics } from '@linewright/contracts';
import { buildFontString } from './fontString.js';
import { assertSupportedKey } from './validation.js';

/** Subset of `TextMetrics` the backend reads. */
export type CanvasTextMetricsLike = {
  width: number;
  actualBoundingBoxAscent?: number;
  actualBoundingBoxDescent?: number;
  fontBoundingBoxAscent?: number;
  fontBoundingBoxDescent?: number;
};

/** Subset of `CanvasRenderingContext2D` the backend needs. */
export interface TextMeasuringContext {
  font: string;
  measureText(text: string): CanvasTextMetricsLike;
}

export type CanvasBackendOptions = {
  fontFamily: string;
  /** Context to measure with; defaults to a lazily created DOM canvas. */
  context?: TextMeasuringContext;
};

// Sample string covering a tall capital and a descender.
const METRICS_SAMPLE = 'Hg';

/**
 * Global canvas context cache for text measurement.
 * Reused across calls to avoid repeated canvas creation.
 */
let canvasContext: CanvasRenderingContext2D | null = null;

/**
 * Get or create a canvas 2D context for text measurement.
 *
 * @throws {PipelineError} FONT_UNAVAILABLE when no DOM canvas exists (plain
 *   Node without a canvas-capable document) or it yields no 2D context
 */
function getCanvasContext(): CanvasRenderingContext2D {
  if (!canvasContext) {
    const canvas = typeof document !== 'undefined' ? document.createElement('canvas') : null;

    if (!canvas) {
      throw new PipelineError(
        'FONT_UNAVAILABLE',
        'Canvas not available. Run in a DOM environment or use deterministic measurement.',
      );
    }

    canvasContext = canvas.getContext('2d');
    if (!canvasContext) {
      throw new PipelineError('FONT_UNAVAILABLE', 'Failed to get 2D context from canvas');
    }
  }

  return canvasContext;
}

const firstPositive = (...values: Array<number | undefined>): number | undefined =>
  values.find((value): value is number => typeof value === 'number' && Number.isFinite(value) && value > 0);

/**
 * Font backend measuring with the host's canvas text renderer.
 *
 * Ascent/descent come from `fontBoundingBox*` when the host reports them,
 * then `actualBoundingBox*`, then the 0.8/0.2 approximations.
 */
export function createCanvasBackend(options: CanvasBackendOptions): FontBackend {
  const resolveContext = (): TextMeasuringContext => options.context ?? getCanvasContext();

  return {
    name: 'canvas',
    acquire(key: FontKey): FontHandle {
      assertSupportedKey(key);
      const ctx = resolveContext();
      const font = buildFontString(key, options.fontFamily);

      const measureWith = (text: string): CanvasTextMetricsLike => {
        ctx.font = font;
        return ctx.measureText(text);
      };

      const sample = measureWith(METRICS_SAMPLE);
      if (!Number.isFinite(sample.width)) {
        throw new PipelineError('FONT_UNAVAILABLE', `Canvas cannot measure font "${font}"`, { key });
      }
      const ascent =
        firstPositive(sample.fontBoundingBoxAscent, sample.actualBoundingBoxAscent) ?? key.size * 0.8;
      const descent =
        firstPositive(sample.fontBoundingBoxDescent, sample.actualBoundingBoxDescent) ?? key.size * 0.2;
      const metrics: FontMetrics = { ascent, descent, linespace: ascent + descent };

      return {
        key,
        measure: (text) => measureWith(text).width,
        metrics: () => ({ ...metrics }),
      };
    },
  };
}
