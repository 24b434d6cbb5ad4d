import { PipelineError } from './errors.js';

/**
 * Line-height multiplier applied to the tallest ascent above a baseline and
 * to the deepest descent below it. Not configurable.
 */
export const LINE_HEIGHT_MULTIPLIER = 1.25;

export type ViewportConfig = {
  /** Viewport width in px; lines wrap at `width - marginX`. */
  width: number;
  /** Viewport height in px; the visible band is `[scrollY, scrollY + height]`. */
  height: number;
  /** Left margin, also kept free on the right. */
  marginX: number;
  /** y of the first line's top. */
  marginTop: number;
  /** Extra vertical gap inserted at a paragraph boundary. */
  lineStep: number;
  /** Distance moved by one scroll-down event. */
  scrollStep: number;
};

export const DEFAULT_VIEWPORT_CONFIG: Readonly<ViewportConfig> = {
  width: 800,
  height: 600,
  marginX: 13,
  marginTop: 18,
  lineStep: 18,
  scrollStep: 100,
};

const VIEWPORT_KEYS = ['width', 'height', 'marginX', 'marginTop', 'lineStep', 'scrollStep'] as const;
const POSITIVE_KEYS = ['width', 'height', 'scrollStep'] as const;
const NON_NEGATIVE_KEYS = ['marginX', 'marginTop', 'lineStep'] as const;

type ViewportKey = (typeof VIEWPORT_KEYS)[number];

const isViewportKey = (key: string): key is ViewportKey => VIEWPORT_KEYS.some((candidate) => candidate === key);

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws {PipelineError} INVALID_CONFIG when a value is not a finite number,
 *   is out of range, or the margins leave no room for text.
 */
export function resolveViewportConfig(overrides: Partial<ViewportConfig> = {}): ViewportConfig {
  const config: ViewportConfig = { ...DEFAULT_VIEWPORT_CONFIG };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    if (!isViewportKey(key)) {
      throw new PipelineError('INVALID_CONFIG', `Unknown viewport option "${key}"`);
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new PipelineError('INVALID_CONFIG', `Viewport option "${key}" must be a finite number`, { value });
    }
    config[key] = value;
  }

  for (const key of POSITIVE_KEYS) {
    if (config[key] <= 0) {
      throw new PipelineError('INVALID_CONFIG', `Viewport option "${key}" must be positive`, { value: config[key] });
    }
  }
  for (const key of NON_NEGATIVE_KEYS) {
    if (config[key] < 0) {
      throw new PipelineError('INVALID_CONFIG', `Viewport option "${key}" must not be negative`, {
        value: config[key],
      });
    }
  }
  if (config.marginX * 2 >= config.width) {
    throw new PipelineError('INVALID_CONFIG', 'Horizontal margins leave no room for text', {
      width: config.width,
      marginX: config.marginX,
    });
  }
  return config;
}
