import type { TradeDirection } from './trade.js';

export type VolatilityRegime = 'low' | 'medium' | 'high';

/**
 * Per-strategy scoring result for one selection cycle. Recomputed every cycle.
 */
export interface StrategyScore {
  strategyName: string;
  compositeScore: number;
  winRate: number;
  profitFactor: number;
  sharpeRatio: number;
  expectancy: number;
  maxDrawdown: number;
  totalTrades: number;
  windowDays: number;
  regime: VolatilityRegime;
  isDegraded: boolean;
  degradationReason: string | null;
  /** Higher-timeframe trend agreement; null when it was not evaluated */
  confluence: boolean | null;
}

/**
 * Live (forward) performance of a strategy's delivered signals
 */
export interface LivePerformance {
  strategyName: string;
  winRate: number;
  profitFactor: number;
  avgRiskReward: number;
  totalSignals: number;
}

export type RecentDirections = Readonly<Record<string, TradeDirection>>;
