/**
 * Bounded text-width cache shared by every font handle of a font cache.
 * Keys combine the font identity and the measured text; the oldest entry is
 * evicted once the cap is reached.
 */

const DEFAULT_CACHE_SIZE = 5000;

export class MeasurementCache {
  private readonly widths = new Map<string, number>();
  private capacity: number;

  constructor(capacity = DEFAULT_CACHE_SIZE) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  get size(): number {
    return this.widths.size;
  }

  setCapacity(capacity: number): void {
    this.capacity = Math.max(1, Math.floor(capacity));
    this.evict();
  }

  getWidth(fontId: string, text: string, measure: (text: string) => number): number {
    const key = `${fontId}|${text}`;
    const cached = this.widths.get(key);
    if (cached !== undefined) return cached;

    const width = measure(text);
    this.widths.set(key, width);
    this.evict();
    return width;
  }

  clear(): void {
    this.widths.clear();
  }

  private evict(): void {
    while (this.widths.size > this.capacity) {
      const oldest = this.widths.keys().next();
      if (oldest.done) return;
      this.widths.delete(oldest.value);
    }
  }
}
