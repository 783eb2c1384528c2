/**
 * Indicator Series Utilities
 *
 * Array-based indicator calculations shared by strategies and the selector.
 * Every function returns an array aligned with its input, with null during warmup.
 */

import type { Candle } from '@stratlab/core';

export function closeSeries(candles: readonly Candle[]): number[] {
  return candles.map((c) => c.close);
}

export function rangeSeries(candles: readonly Candle[]): number[] {
  return candles.map((c) => c.high - c.low);
}

/**
 * Exponential Moving Average over a value array, seeded with the SMA of the
 * first `period` values
 */
export function ema(values: readonly number[], period: number): Array<number | null> {
  if (period <= 0) throw new Error('EMA period must be > 0');
  const out: Array<number | null> = new Array(values.length).fill(null);
  const k = 2 / (period + 1);

  let emaPrev: number | null = null;
  let sum = 0;

  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (!isFinite(v)) {
      out[i] = null;
      continue;
    }

    if (i < period) {
      sum += v;
      if (i === period - 1) {
        emaPrev = sum / period;
        out[i] = emaPrev;
      }
      continue;
    }

    emaPrev = emaPrev === null ? v : (v - emaPrev) * k + emaPrev;
    out[i] = emaPrev;
  }

  return out;
}

/**
 * Volume-weighted average of the typical price, anchored at each UTC day.
 * Null while the day has no volume; all null when the series carries none.
 */
export function vwap(candles: readonly Candle[]): Array<number | null> {
  const out: Array<number | null> = new Array(candles.length).fill(null);
  if (candles.every((c) => c.volume === 0)) return out;

  let day: number | null = null;
  let pv = 0;
  let vol = 0;
  for (let i = 0; i < candles.length; i++) {
    const c = candles[i];
    const d = Math.floor(c.timestamp / 86_400);
    if (d !== day) {
      day = d;
      pv = 0;
      vol = 0;
    }
    pv += ((c.high + c.low + c.close) / 3) * c.volume;
    vol += c.volume;
    out[i] = vol > 0 ? pv / vol : null;
  }

  return out;
}

/**
 * True range: max(high - low, |high - prevClose|, |low - prevClose|).
 * The first bar has no previous close and uses high - low.
 */
export function trueRange(candles: readonly Candle[]): number[] {
  return candles.map((c, i) => {
    if (i === 0) return c.high - c.low;
    const prevClose = candles[i - 1].close;
    return Math.max(c.high - c.low, Math.abs(c.high - prevClose), Math.abs(c.low - prevClose));
  });
}

/**
 * Average True Range with Wilder smoothing
 */
export function atr(candles: readonly Candle[], period: number = 14): Array<number | null> {
  if (period <= 0) throw new Error('ATR period must be > 0');
  const tr = trueRange(candles);
  const out: Array<number | null> = new Array(candles.length).fill(null);

  let prev: number | null = null;
  let sum = 0;
  for (let i = 0; i < tr.length; i++) {
    if (i < period) {
      sum += tr[i];
      if (i === period - 1) {
        prev = sum / period;
        out[i] = prev;
      }
      continue;
    }
    prev = prev === null ? tr[i] : (prev * (period - 1) + tr[i]) / period;
    out[i] = prev;
  }

  return out;
}

/**
 * Rolling population standard deviation over a value array
 */
export function rollingStdDev(values: readonly number[], window: number): Array<number | null> {
  if (window <= 1) throw new Error('Standard deviation window must be > 1');
  const out: Array<number | null> = new Array(values.length).fill(null);

  for (let i = window - 1; i < values.length; i++) {
    const start = i - window + 1;
    let sum = 0;
    for (let j = start; j <= i; j++) sum += values[j];
    const mean = sum / window;

    let varSum = 0;
    for (let j = start; j <= i; j++) {
      const d = values[j] - mean;
      varSum += d * d;
    }
    out[i] = Math.sqrt(varSum / window);
  }

  return out;
}

/**
 * Drop warmup nulls
 */
export function compactSeries(values: ReadonlyArray<number | null>): number[] {
  const out: number[] = [];
  for (const v of values) {
    if (v !== null && Number.isFinite(v)) out.push(v);
  }
  return out;
}

/**
 * Last non-null value of a series
 */
export function lastValue(values: ReadonlyArray<number | null>): number | null {
  for (let i = values.length - 1; i >= 0; i--) {
    const v = values[i];
    if (v !== null) return v;
  }
  return null;
}
