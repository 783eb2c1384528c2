/**
 * Trade Types
 * ===========
 * Candidates produced by strategy decision functions and the trades the
 * simulator resolves them into.
 */

export type TradeDirection = 'long' | 'short';

/**
 * A proposed trade emitted by a strategy decision function.
 *
 * Ordering invariant (checked by the simulator before anything else):
 * - long:  stopLoss < entryPrice < takeProfit1 < takeProfit2
 * - short: stopLoss > entryPrice > takeProfit1 > takeProfit2
 */
export interface TradeCandidate {
  strategyName: string;
  direction: TradeDirection;
  entryPrice: number;
  stopLoss: number;
  takeProfit1: number;
  takeProfit2: number;
  /** Timestamp (UNIX seconds) of the bar that triggered the candidate */
  timestamp: number;
  /** 0-100 */
  confidence: number;
  reasoning: string;
  timeframe?: string;
  session?: string;
}

export type TradeOutcome = 'TP1_HIT' | 'TP2_HIT' | 'SL_HIT' | 'EXPIRED';

export const WINNING_OUTCOMES: ReadonlySet<TradeOutcome> = new Set<TradeOutcome>([
  'TP1_HIT',
  'TP2_HIT',
]);

/**
 * Resolved trade. Created only by the trade simulator and never mutated.
 */
export interface SimulatedTrade {
  readonly candidate: Readonly<TradeCandidate>;
  readonly outcome: TradeOutcome;
  readonly exitPrice: number;
  /** Realized PnL in pips (signed price distance / pip size) */
  readonly pnlPips: number;
  readonly barsHeld: number;
  /** Spread applied at entry, in price units */
  readonly spreadCost: number;
  /** Timestamp of the bar the trade resolved on; null when no bar followed the candidate */
  readonly exitTimestamp: number | null;
}
