/**
 * Composite Scoring
 *
 * Min-max normalises each metric across the eligible strategies and takes a
 * weighted sum. Drawdown is inverted so lower drawdown scores higher.
 */

import type { BacktestResultRecord, LivePerformance, VolatilityRegime } from '@stratlab/core';
import type { LiveBlendConfig, MetricWeights, RegimePenalties } from './config.js';

export type ScoredMetric = keyof MetricWeights;

export const SCORED_METRICS: readonly ScoredMetric[] = [
  'winRate',
  'profitFactor',
  'sharpeRatio',
  'expectancy',
  'maxDrawdown',
];

/**
 * Min-max normalisation to [0, 1]. A single value or a flat range maps to 0.5.
 */
export function normalizeMetric(values: readonly number[]): number[] {
  if (values.length === 0) {
    return [];
  }
  const min = Math.min(...values);
  const max = Math.max(...values);
  const range = max - min;
  if (values.length === 1 || range === 0) {
    return values.map(() => 0.5);
  }
  return values.map((v) => (v - min) / range);
}

/**
 * Composite score per record, aligned with the input order
 */
export function computeCompositeScores(
  records: readonly BacktestResultRecord[],
  weights: MetricWeights
): number[] {
  const normalised = new Map<ScoredMetric, number[]>(
    SCORED_METRICS.map((metric) => [metric, normalizeMetric(records.map((r) => r[metric]))])
  );

  return records.map((_, i) => {
    let score = 0;
    for (const metric of SCORED_METRICS) {
      const value = normalised.get(metric)?.[i] ?? 0.5;
      score += weights[metric] * (metric === 'maxDrawdown' ? 1 - value : value);
    }
    return score;
  });
}

/**
 * Score multiplier for a strategy in a regime; 1 when the table has no entry
 */
export function regimeMultiplier(
  strategyName: string,
  regime: VolatilityRegime,
  penalties: RegimePenalties
): number {
  return penalties[regime][strategyName] ?? 1;
}

/**
 * 0-1 score from live performance:
 * weighted win rate, capped profit factor and capped risk:reward
 */
export function scoreLivePerformance(perf: LivePerformance, config: LiveBlendConfig): number {
  const { scoreWeights, profitFactorCap, riskRewardCap } = config;
  const pf = Math.min(Math.max(perf.profitFactor, 0), profitFactorCap) / profitFactorCap;
  const rr = Math.min(Math.max(perf.avgRiskReward, 0), riskRewardCap) / riskRewardCap;

  return (
    scoreWeights.winRate * perf.winRate +
    scoreWeights.profitFactor * pf +
    scoreWeights.avgRiskReward * rr
  );
}

/**
 * Blend a backtest score with live performance when enough live signals
 * exist. Returns null when no blend applies.
 */
export function blendLiveScore(
  score: number,
  perf: LivePerformance | undefined,
  config: LiveBlendConfig
): number | null {
  if (!perf || perf.totalSignals < config.minSignals) {
    return null;
  }
  return (1 - config.weight) * score + config.weight * scoreLivePerformance(perf, config);
}
