import { afterEach, describe, expect, it } from 'vitest';
import { clearFontCache, configureMeasurement, getFont, getMeasurementMode, getSharedFontCache } from './index.js';

describe('shared font cache', () => {
  afterEach(() => {
    configureMeasurement({ mode: 'browser' });
  });

  it('returns the same handle for the same key across calls', () => {
    configureMeasurement({ mode: 'deterministic' });
    expect(getFont(16, 'normal', 'roman')).toBe(getFont(16, 'normal', 'roman'));
  });

  it('starts empty again after clearFontCache()', () => {
    configureMeasurement({ mode: 'deterministic' });
    getFont(16, 'normal', 'roman');
    clearFontCache();
    expect(getSharedFontCache().size).toBe(0);
  });

  it('rebuilds the cache when the mode changes', () => {
    configureMeasurement({ mode: 'deterministic' });
    const cache = getSharedFontCache();
    expect(cache.backendName).toBe('deterministic');

    configureMeasurement({ mode: 'browser' });
    expect(getMeasurementMode()).toBe('browser');
    expect(getSharedFontCache()).not.toBe(cache);
    expect(getSharedFontCache().backendName).toBe('canvas');
  });

  it('keeps the cache when the configuration does not change the backend', () => {
    configureMeasurement({ mode: 'deterministic' });
    const cache = getSharedFontCache();
    configureMeasurement({ mode: 'deterministic', cacheSize: 10 });
    expect(getSharedFontCache()).toBe(cache);
  });
});
