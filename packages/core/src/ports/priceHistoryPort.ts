/**
 * Price History Port
 *
 * Read side of the price-history collaborator. Bars come back ordered by
 * timestamp ascending and are treated as immutable for the range returned.
 */

import type { Candle } from '../types/candle.js';

export type PriceHistoryRequest = {
  symbol: string;
  timeframe: string;
  /** UNIX seconds, inclusive */
  from?: number;
  /** UNIX seconds, inclusive */
  to?: number;
  /** Most recent N bars (applied after from/to) */
  limit?: number;
};

export interface PriceHistoryPort {
  /**
   * Fetch bars for one instrument and interval.
   *
   * Failures are thrown to the caller; the evaluation core does not retry.
   */
  getCandles(request: PriceHistoryRequest): Promise<Candle[]>;
}
