/**
 * Aggregated performance of a set of simulated trades.
 *
 * All ratios are rounded to 4 decimals so they survive a NUMERIC(10,4) column.
 */
export interface BacktestMetrics {
  /** Fraction of TP1/TP2 outcomes, 0-1 */
  winRate: number;
  /** Gross profit / gross loss, capped */
  profitFactor: number;
  /** Annualized mean / sample stdev of per-trade PnL */
  sharpeRatio: number;
  /** Largest peak-to-trough decline of cumulative PnL, in pips */
  maxDrawdown: number;
  /** maxDrawdown as a fraction of the peak it fell from; null when that peak was 0 */
  maxDrawdownPct: number | null;
  /** Mean PnL per trade, in pips */
  expectancy: number;
  totalTrades: number;
}

export const EMPTY_METRICS: Readonly<BacktestMetrics> = Object.freeze({
  winRate: 0,
  profitFactor: 0,
  sharpeRatio: 0,
  maxDrawdown: 0,
  maxDrawdownPct: null,
  expectancy: 0,
  totalTrades: 0,
});

/**
 * Walk-forward efficiency ratios (out-of-sample / in-sample).
 * A ratio is null when the in-sample value is 0.
 */
export interface WalkForwardEfficiency {
  winRate: number | null;
  profitFactor: number | null;
}

export type WalkForwardStatus = 'validated' | 'insufficient_data';

export interface DateRange {
  start: number;
  end: number;
}

export interface WalkForwardResult {
  strategyName: string;
  windowDays: number;
  status: WalkForwardStatus;
  inSample: BacktestMetrics;
  outOfSample: BacktestMetrics;
  /** Always false when status is insufficient_data */
  isOverfitted: boolean;
  efficiency: WalkForwardEfficiency;
  /** Mean of the non-null efficiency ratios, null when none */
  averageEfficiency: number | null;
  splitIndex: number;
  inSampleRange: DateRange | null;
  outOfSampleRange: DateRange | null;
}
