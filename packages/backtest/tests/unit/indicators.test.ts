import { describe, it, expect } from 'vitest';
import {
  atr,
  compactSeries,
  ema,
  lastValue,
  rollingStdDev,
  trueRange,
  vwap,
} from '../../src/indicators/series.js';
import { bar } from '../helpers/fixtures.js';

describe('ema', () => {
  it('seeds with the SMA of the first period values', () => {
    // seed (1+2+3)/3 = 2, k = 0.5: (4-2)*0.5+2 = 3, (5-3)*0.5+3 = 4
    expect(ema([1, 2, 3, 4, 5], 3)).toEqual([null, null, 2, 3, 4]);
  });

  it('rejects a non-positive period', () => {
    expect(() => ema([1], 0)).toThrow('EMA period must be > 0');
  });
});

describe('vwap', () => {
  it('weights the typical price by volume and restarts each UTC day', () => {
    const candles = [
      bar(0, 10, 12, 9, 12),
      { ...bar(1, 12, 15, 12, 15), volume: 300 },
      bar(24, 20, 21, 19, 20),
    ];
    // typical 11 and 14: (11*100 + 14*300) / 400 = 13.25; next day starts over at 20
    expect(vwap(candles)).toEqual([11, 13.25, 20]);
  });

  it('is null throughout when no bar carries volume', () => {
    const candles = [bar(0, 10, 12, 9, 12), bar(1, 12, 15, 12, 15)].map((c) => ({
      ...c,
      volume: 0,
    }));
    expect(vwap(candles)).toEqual([null, null]);
  });
});

describe('trueRange and atr', () => {
  const candles = [
    bar(0, 10, 12, 9, 11),
    bar(1, 11, 13, 10, 12),
    bar(2, 12, 12.5, 8, 9),
    bar(3, 9, 10, 8.5, 9.5),
  ];

  it('uses the previous close for gaps', () => {
    // bar 2: max(4.5, |12.5-12|, |8-12|) = 4.5; bar 3: max(1.5, |10-9|, |8.5-9|) = 1.5
    expect(trueRange(candles)).toEqual([3, 3, 4.5, 1.5]);
  });

  it('smooths with the Wilder method', () => {
    // seed (3+3)/2 = 3; (3*1+4.5)/2 = 3.75; (3.75+1.5)/2 = 2.625
    expect(atr(candles, 2)).toEqual([null, 3, 3.75, 2.625]);
  });
});

describe('rollingStdDev', () => {
  it('computes the population standard deviation', () => {
    expect(rollingStdDev([2, 4, 4, 4, 5, 5, 7, 9], 8)[7]).toBe(2);
  });

  it('rejects windows smaller than 2', () => {
    expect(() => rollingStdDev([1, 2], 1)).toThrow('Standard deviation window must be > 1');
  });
});

describe('series helpers', () => {
  it('drops warmup nulls', () => {
    expect(compactSeries([null, 1, null, 2])).toEqual([1, 2]);
  });

  it('finds the last non-null value', () => {
    expect(lastValue([1, 2, null])).toBe(2);
    expect(lastValue([null, null])).toBeNull();
  });
});
