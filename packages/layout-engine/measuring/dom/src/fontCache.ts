import {
  fontKeyToString,
  toPipelineError,
  type FontBackend,
  type FontHandle,
  type FontKey,
  type FontMetrics,
  type FontProvider,
  type FontSlant,
  type FontWeight,
} from '@linewright/contracts';
import { MeasurementCache } from './measurementCache.js';

/**
 * Memoized mapping from (size, weight, style) to a font handle.
 *
 * The first request for a key acquires the font from the backend; later
 * requests return the same handle. Entries are never evicted: the key space
 * is bounded by the style combinations a document can produce.
 */
export class FontCache implements FontProvider {
  private readonly fonts = new Map<string, FontHandle>();
  private readonly widths: MeasurementCache;

  constructor(
    private readonly backend: FontBackend,
    widthCacheSize?: number,
  ) {
    this.widths = new MeasurementCache(widthCacheSize);
  }

  get backendName(): string {
    return this.backend.name;
  }

  /** Number of distinct fonts acquired so far. */
  get size(): number {
    return this.fonts.size;
  }

  has(size: number, weight: FontWeight, style: FontSlant): boolean {
    return this.fonts.has(fontKeyToString({ size, weight, style }));
  }

  /**
   * @throws {PipelineError} FONT_UNAVAILABLE when the backend cannot produce the font
   */
  getFont(size: number, weight: FontWeight, style: FontSlant): FontHandle {
    const key: FontKey = { size, weight, style };
    const id = fontKeyToString(key);
    const cached = this.fonts.get(id);
    if (cached) return cached;

    let acquired: FontHandle;
    try {
      acquired = this.backend.acquire(key);
    } catch (error) {
      throw toPipelineError(error, 'FONT_UNAVAILABLE');
    }

    const handle = this.wrap(id, acquired);
    this.fonts.set(id, handle);
    return handle;
  }

  setWidthCacheSize(size: number): void {
    this.widths.setCapacity(size);
  }

  clear(): void {
    this.fonts.clear();
    this.widths.clear();
  }

  private wrap(id: string, inner: FontHandle): FontHandle {
    const widths = this.widths;
    let metrics: FontMetrics | null = null;
    return {
      key: inner.key,
      measure: (text) => widths.getWidth(id, text, (value) => inner.measure(value)),
      metrics: () => {
        if (!metrics) metrics = inner.metrics();
        return metrics;
      },
    };
  }
}

export function createFontCache(backend: FontBackend, widthCacheSize?: number): FontCache {
  return new FontCache(backend, widthCacheSize);
}
