import type { Candle } from '@stratlab/core';

/**
 * True when bar `index` has the highest high (or lowest low) of the
 * `order` bars on each side, clipped to the series bounds. Ties count.
 */
function isExtremum(
  bars: readonly Candle[],
  index: number,
  order: number,
  kind: 'high' | 'low'
): boolean {
  const from = Math.max(0, index - order);
  const to = Math.min(bars.length - 1, index + order);
  const value = kind === 'high' ? bars[index].high : bars[index].low;

  for (let j = from; j <= to; j++) {
    const other = kind === 'high' ? bars[j].high : bars[j].low;
    if (kind === 'high' ? other > value : other < value) {
      return false;
    }
  }
  return true;
}

export function swingHighIndices(bars: readonly Candle[], order: number): number[] {
  const out: number[] = [];
  for (let i = 0; i < bars.length; i++) {
    if (isExtremum(bars, i, order, 'high')) out.push(i);
  }
  return out;
}

export function swingLowIndices(bars: readonly Candle[], order: number): number[] {
  const out: number[] = [];
  for (let i = 0; i < bars.length; i++) {
    if (isExtremum(bars, i, order, 'low')) out.push(i);
  }
  return out;
}

/**
 * Lowest swing low in [index - lookback, index), or null when there is none
 */
export function recentSwingLow(
  bars: readonly Candle[],
  index: number,
  lookback: number,
  order: number
): number | null {
  const start = Math.max(0, index - lookback);
  const lows = swingLowIndices(bars.slice(0, index + 1), order)
    .filter((i) => i >= start && i < index)
    .map((i) => bars[i].low);
  return lows.length > 0 ? Math.min(...lows) : null;
}

/**
 * Highest swing high in [index - lookback, index), or null when there is none
 */
export function recentSwingHigh(
  bars: readonly Candle[],
  index: number,
  lookback: number,
  order: number
): number | null {
  const start = Math.max(0, index - lookback);
  const highs = swingHighIndices(bars.slice(0, index + 1), order)
    .filter((i) => i >= start && i < index)
    .map((i) => bars[i].high);
  return highs.length > 0 ? Math.max(...highs) : null;
}
