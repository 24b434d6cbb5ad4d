import type { FontHandle, FontKey, FontMetrics, FontProvider, FontSlant, FontWeight } from '@linewright/contracts';

export type FakeFontSpec = {
  measure?: (text: string, key: FontKey) => number;
  metrics?: (key: FontKey) => FontMetrics;
};

/**
 * Width = half the font size per character; ascent = 0.75 × size,
 * descent = 0.25 × size, linespace = size. All values are exact in binary
 * for the even sizes tests use.
 */
export const halfSizeWidth = (text: string, key: FontKey): number => (text.length * key.size) / 2;
export const quarterMetrics = (key: FontKey): FontMetrics => ({
  ascent: key.size * 0.75,
  descent: key.size * 0.25,
  linespace: key.size,
});

export class FakeFonts implements FontProvider {
  readonly requested: FontKey[] = [];
  private readonly handles = new Map<string, FontHandle>();

  constructor(private readonly spec: FakeFontSpec = {}) {}

  getFont(size: number, weight: FontWeight, style: FontSlant): FontHandle {
    const key: FontKey = { size, weight, style };
    this.requested.push(key);
    const id = `${size}/${weight}/${style}`;
    const existing = this.handles.get(id);
    if (existing) return existing;

    const measure = this.spec.measure ?? halfSizeWidth;
    const metrics = this.spec.metrics ?? quarterMetrics;
    const handle: FontHandle = {
      key,
      measure: (text) => measure(text, key),
      metrics: () => metrics(key),
    };
    this.handles.set(id, handle);
    return handle;
  }
}
