/**
 * OHLCV bar for one instrument at one fixed interval.
 *
 * Candle.timestamp is UNIX seconds (UTC) and marks the open of the bar.
 * Series are expected in ascending timestamp order and are never mutated.
 */
export interface Candle {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Bar interval labels used by the price-history collaborator
 */
export type Timeframe = 'M15' | 'H1' | 'H4' | 'D1';

/**
 * Number of bars per trading day for each timeframe (24h market)
 */
export const BARS_PER_DAY: Record<Timeframe, number> = {
  M15: 96,
  H1: 24,
  H4: 6,
  D1: 1,
};
