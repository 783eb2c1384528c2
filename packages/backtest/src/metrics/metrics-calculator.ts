/**
 * Metrics Calculator
 *
 * Aggregates simulated trades into BacktestMetrics. Math runs on raw floats;
 * every ratio is rounded to 4 decimals on the way out.
 */

import {
  EMPTY_METRICS,
  WINNING_OUTCOMES,
  type BacktestMetrics,
  type SimulatedTrade,
} from '@stratlab/core';
import { DEFAULT_METRICS_CONFIG, type MetricsConfig } from '../config.js';

export interface DrawdownResult {
  /** Largest peak-to-trough decline, in pips */
  maxDrawdown: number;
  /** maxDrawdown / the peak it fell from; null when that peak was 0 */
  maxDrawdownPct: number | null;
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

function sum(values: readonly number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

/**
 * Trades ordered by the timestamp of the candidate that opened them.
 * Array.prototype.sort is stable, so same-bar trades keep their input order.
 */
export function chronological(trades: readonly SimulatedTrade[]): SimulatedTrade[] {
  return [...trades].sort((a, b) => a.candidate.timestamp - b.candidate.timestamp);
}

/**
 * Max drawdown of the cumulative PnL curve. The running peak starts at 0.
 */
export function computeMaxDrawdown(pnlValues: readonly number[]): DrawdownResult {
  let cumulative = 0;
  let peak = 0;
  let maxDrawdown = 0;
  let peakAtMax = 0;

  for (const pnl of pnlValues) {
    cumulative += pnl;
    if (cumulative > peak) {
      peak = cumulative;
    }
    const drawdown = peak - cumulative;
    if (drawdown > maxDrawdown) {
      maxDrawdown = drawdown;
      peakAtMax = peak;
    }
  }

  return {
    maxDrawdown,
    maxDrawdownPct: maxDrawdown > 0 && peakAtMax !== 0 ? maxDrawdown / peakAtMax : null,
  };
}

/**
 * Annualized Sharpe ratio of per-trade PnL using the sample standard
 * deviation. 0 with fewer than 2 trades or zero dispersion.
 */
export function computeSharpeRatio(
  pnlValues: readonly number[],
  tradingDaysPerYear: number = DEFAULT_METRICS_CONFIG.tradingDaysPerYear
): number {
  const n = pnlValues.length;
  if (n < 2) {
    return 0;
  }

  const mean = sum(pnlValues) / n;
  const variance = sum(pnlValues.map((p) => (p - mean) ** 2)) / (n - 1);
  const std = Math.sqrt(variance);
  if (std === 0) {
    return 0;
  }
  return (mean / std) * Math.sqrt(tradingDaysPerYear);
}

/**
 * Gross profit / gross loss. With no losses the cap is returned, or 0 when
 * there is no profit either.
 */
export function computeProfitFactor(
  pnlValues: readonly number[],
  cap: number = DEFAULT_METRICS_CONFIG.profitFactorCap
): number {
  const grossProfit = sum(pnlValues.filter((p) => p > 0));
  const grossLoss = Math.abs(sum(pnlValues.filter((p) => p < 0)));

  if (grossLoss === 0) {
    return grossProfit > 0 ? cap : 0;
  }
  return Math.min(grossProfit / grossLoss, cap);
}

export function computeMetrics(
  trades: readonly SimulatedTrade[],
  config: MetricsConfig = DEFAULT_METRICS_CONFIG
): BacktestMetrics {
  if (trades.length === 0) {
    return { ...EMPTY_METRICS };
  }

  const ordered = chronological(trades);
  const pnlValues = ordered.map((t) => t.pnlPips);
  const total = ordered.length;

  const wins = ordered.filter((t) => WINNING_OUTCOMES.has(t.outcome)).length;
  const { maxDrawdown, maxDrawdownPct } = computeMaxDrawdown(pnlValues);

  return {
    winRate: round4(wins / total),
    profitFactor: round4(computeProfitFactor(pnlValues, config.profitFactorCap)),
    sharpeRatio: round4(computeSharpeRatio(pnlValues, config.tradingDaysPerYear)),
    maxDrawdown: round4(maxDrawdown),
    maxDrawdownPct: maxDrawdownPct === null ? null : round4(maxDrawdownPct),
    expectancy: round4(sum(pnlValues) / total),
    totalTrades: total,
  };
}
