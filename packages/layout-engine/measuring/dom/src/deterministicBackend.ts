import type { FontBackend, FontHandle, FontKey, FontMetrics } from '@linewright/contracts';
import { assertSupportedKey } from './validation.js';

/**
 * Ratios (relative to the font size) used by the deterministic backend.
 *
 * Typography approximations:
 * - advance ≈ fontSize * 0.5 per code point (× boldAdvanceScale when bold)
 * - ascent ≈ fontSize * 0.8
 * - descent ≈ fontSize * 0.2
 * - linespace = ascent + descent
 */
export type DeterministicRatios = {
  advance: number;
  boldAdvanceScale: number;
  ascent: number;
  descent: number;
};

export const DEFAULT_DETERMINISTIC_RATIOS: Readonly<DeterministicRatios> = {
  advance: 0.5,
  boldAdvanceScale: 1.1,
  ascent: 0.8,
  descent: 0.2,
};

/**
 * Font backend that needs no rendering host. Widths depend only on the number
 * of code points, which makes layouts reproducible across machines.
 */
export function createDeterministicBackend(ratios: Partial<DeterministicRatios> = {}): FontBackend {
  const resolved: DeterministicRatios = { ...DEFAULT_DETERMINISTIC_RATIOS, ...ratios };

  return {
    name: 'deterministic',
    acquire(key: FontKey): FontHandle {
      assertSupportedKey(key);
      const advance = key.size * resolved.advance * (key.weight === 'bold' ? resolved.boldAdvanceScale : 1);
      const ascent = key.size * resolved.ascent;
      const descent = key.size * resolved.descent;
      const metrics: FontMetrics = { ascent, descent, linespace: ascent + descent };

      return {
        key,
        measure: (text) => Array.from(text).length * advance,
        metrics: () => ({ ...metrics }),
      };
    },
  };
}
