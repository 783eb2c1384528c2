/**
 * Strategy Decision-Function Contract
 *
 * One callable per strategy: a bounded window of bars in, candidates out.
 * The same callable serves backtests and live signal generation.
 *
 * A window shorter than the strategy's declared minimum is answered with an
 * explicit `insufficient_history` result. An empty candidate list means the
 * strategy looked and found nothing.
 */

import type { Candle } from '../types/candle.js';
import type { TradeCandidate } from '../types/trade.js';

export type DecisionResult =
  | { status: 'ok'; candidates: TradeCandidate[] }
  | { status: 'insufficient_history'; required: number; received: number };

export type DecisionFunction = (window: readonly Candle[]) => DecisionResult;

export interface Strategy {
  /** Unique strategy identifier */
  readonly name: string;
  /** Minimum number of bars analyze() needs */
  readonly minCandles: number;
  readonly timeframe: string;
  analyze: DecisionFunction;
}

export function decided(candidates: TradeCandidate[]): DecisionResult {
  return { status: 'ok', candidates };
}

export function insufficientHistory(required: number, received: number): DecisionResult {
  return { status: 'insufficient_history', required, received };
}

/**
 * Guard for strategies: returns the insufficient-history result when the
 * window is shorter than minCandles, null otherwise.
 */
export function checkHistory(
  window: readonly Candle[],
  minCandles: number
): DecisionResult | null {
  return window.length < minCandles ? insufficientHistory(minCandles, window.length) : null;
}
