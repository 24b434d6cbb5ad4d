/**
 * Font measurement for the layout engine.
 *
 * Responsibilities:
 * - Own the process-wide font cache (empty at start, filled lazily, never evicted)
 * - Pick the measurement backend: the host's canvas (`browser`) or fixed
 *   ratios (`deterministic`, for plain Node and reproducible output)
 * - Surface unsupported fonts as FONT_UNAVAILABLE errors, never substitutes
 */

import type { FontBackend, FontHandle, FontSlant, FontWeight } from '@linewright/contracts';
import { createCanvasBackend } from './canvasBackend.js';
import { createDeterministicBackend } from './deterministicBackend.js';
import { FontCache } from './fontCache.js';

export { FontCache, createFontCache } from './fontCache.js';
export { MeasurementCache } from './measurementCache.js';
export {
  createCanvasBackend,
  type CanvasBackendOptions,
  type CanvasTextMetricsLike,
  type TextMeasuringContext,
} from './canvasBackend.js';
export {
  createDeterministicBackend,
  DEFAULT_DETERMINISTIC_RATIOS,
  type DeterministicRatios,
} from './deterministicBackend.js';
export { buildFontString } from './fontString.js';

type MeasurementMode = 'browser' | 'deterministic';

type MeasurementConfig = {
  mode: MeasurementMode;
  fonts: {
    family: string;
  };
  cacheSize: number;
};

const measurementConfig: MeasurementConfig = {
  mode: 'browser',
  fonts: {
    family: 'serif',
  },
  cacheSize: 5000,
};

let sharedCache: FontCache | null = null;

function createBackend(config: MeasurementConfig): FontBackend {
  if (config.mode === 'deterministic') {
    return createDeterministicBackend();
  }
  return createCanvasBackend({ fontFamily: config.fonts.family });
}

/**
 * Change how the shared font cache measures text. Switching mode or family
 * drops every cached font, since handles from the old backend no longer apply.
 */
export function configureMeasurement(options: {
  mode?: MeasurementMode;
  fonts?: Partial<MeasurementConfig['fonts']>;
  cacheSize?: number;
}): void {
  let backendChanged = false;
  if (options.mode && options.mode !== measurementConfig.mode) {
    measurementConfig.mode = options.mode;
    backendChanged = true;
  }
  if (options.fonts?.family && options.fonts.family !== measurementConfig.fonts.family) {
    measurementConfig.fonts = { ...measurementConfig.fonts, family: options.fonts.family };
    backendChanged = true;
  }
  if (typeof options.cacheSize === 'number' && Number.isFinite(options.cacheSize) && options.cacheSize > 0) {
    measurementConfig.cacheSize = options.cacheSize;
    sharedCache?.setWidthCacheSize(options.cacheSize);
  }
  if (backendChanged) {
    sharedCache = null;
  }
}

export function getMeasurementMode(): MeasurementMode {
  return measurementConfig.mode;
}

/** The process-wide font cache, created on first use. */
export function getSharedFontCache(): FontCache {
  if (!sharedCache) {
    sharedCache = new FontCache(createBackend(measurementConfig), measurementConfig.cacheSize);
  }
  return sharedCache;
}

/**
 * Fetch a font from the process-wide cache.
 *
 * @throws {PipelineError} FONT_UNAVAILABLE when the backend cannot produce it
 */
export function getFont(size: number, weight: FontWeight, style: FontSlant): FontHandle {
  return getSharedFontCache().getFont(size, weight, style);
}

/** Empty the process-wide cache. Mostly useful between tests. */
export function clearFontCache(): void {
  sharedCache?.clear();
}
