import { describe, it, expect } from 'vitest';
import { regimeConfigSchema } from '../../src/config.js';
import {
  classifyPercentile,
  detectVolatilityRegime,
  percentileOfLast,
} from '../../src/regime.js';
import { barsWithRanges, fallingRanges, risingRanges } from '../helpers/fixtures.js';

const defaults = regimeConfigSchema.parse({});

describe('percentileOfLast', () => {
  it('counts values strictly below the last one', () => {
    expect(percentileOfLast([1, 2, 3, 4])).toBe(75);
    expect(percentileOfLast([2, 2, 2, 2])).toBe(0);
  });
});

describe('classifyPercentile', () => {
  it('uses inclusive 25/75 thresholds', () => {
    expect(classifyPercentile(25, defaults)).toBe('low');
    expect(classifyPercentile(25.1, defaults)).toBe('medium');
    expect(classifyPercentile(74.9, defaults)).toBe('medium');
    expect(classifyPercentile(75, defaults)).toBe('high');
  });
});

describe('detectVolatilityRegime', () => {
  it('is high when the current ATR tops its history', () => {
    const reading = detectVolatilityRegime(barsWithRanges(risingRanges(40)));
    // 40 bars give 27 ATR(14) values; 26 are below the last
    expect(reading.regime).toBe('high');
    expect(reading.sampleSize).toBe(27);
    expect(reading.percentile).toBeCloseTo((26 / 27) * 100, 10);
  });

  it('is low when the current ATR is the lowest', () => {
    const reading = detectVolatilityRegime(barsWithRanges(fallingRanges(40)));
    expect(reading.regime).toBe('low');
    expect(reading.percentile).toBe(0);
  });

  it('defaults to medium with fewer than 30 bars', () => {
    const reading = detectVolatilityRegime(barsWithRanges(risingRanges(29)));
    expect(reading).toEqual({ regime: 'medium', percentile: null, currentValue: null, sampleSize: 0 });
  });

  it('defaults to medium when the indicator yields fewer than 2 values', () => {
    const config = regimeConfigSchema.parse({ period: 30 });
    const reading = detectVolatilityRegime(barsWithRanges(risingRanges(30)), config);
    expect(reading.regime).toBe('medium');
    expect(reading.sampleSize).toBe(1);
  });

  it('only looks at the most recent lookback bars', () => {
    // a long calm history followed by 40 bars of shrinking ranges
    const ranges = [...Array.from({ length: 100 }, () => 0.5), ...fallingRanges(40)];
    const config = regimeConfigSchema.parse({ lookbackBars: 40 });
    expect(detectVolatilityRegime(barsWithRanges(ranges), config).regime).toBe('low');
  });

  it('supports range standard deviation as the proxy', () => {
    const ranges = [...Array.from({ length: 39 }, () => 1), 10];
    const config = regimeConfigSchema.parse({ proxy: 'range_stddev' });
    const reading = detectVolatilityRegime(barsWithRanges(ranges), config);

    // 27 values: 26 windows of equal ranges (stddev 0), then the spike
    expect(reading.sampleSize).toBe(27);
    expect(reading.regime).toBe('high');
  });
});
