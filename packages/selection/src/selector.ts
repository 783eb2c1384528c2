/**
 * Strategy Selector
 *
 * Pure function of a snapshot: stored backtest results, recent bars and
 * optional live performance in, ranked StrategyScores out. Nothing is kept
 * between cycles, so a restart always re-derives the same choice.
 *
 * Steps:
 * 1. Latest non-walk-forward result per strategy; below minTrades is ineligible
 * 2. Volatility regime from recent bars
 * 3. Weighted composite of min-max normalised metrics
 * 4. Regime multiplier from the penalty table
 * 5. Live-performance blend
 * 6. Degradation against the oldest baseline; degraded strategies rank last
 * 7. Higher-timeframe confluence bonus for the top entry
 */

import type {
  BacktestResultRecord,
  Candle,
  LivePerformance,
  RecentDirections,
  StrategyScore,
} from '@stratlab/core';
import { DEFAULT_SELECTOR_CONFIG, type SelectorConfig } from './config.js';
import { checkTrendConfluence } from './confluence.js';
import { checkDegradation } from './degradation.js';
import { logger } from './logger.js';
import { detectVolatilityRegime } from './regime.js';
import { blendLiveScore, computeCompositeScores, regimeMultiplier } from './scoring.js';

export interface SelectionInput {
  /** Candidate strategy names */
  strategies: readonly string[];
  /** Stored results, any order */
  results: readonly BacktestResultRecord[];
  /** Recent bars of the signal timeframe, ascending */
  recentBars: readonly Candle[];
  /** Higher-timeframe bars for the confluence check */
  coarseBars?: readonly Candle[];
  /** Direction of each strategy's most recent signal */
  recentDirections?: RecentDirections;
  livePerformance?: readonly LivePerformance[];
}

function newestFirst(a: BacktestResultRecord, b: BacktestResultRecord): number {
  return b.createdAt - a.createdAt;
}

function oldestFirst(a: BacktestResultRecord, b: BacktestResultRecord): number {
  return a.createdAt - b.createdAt;
}

/**
 * Most recent non-walk-forward result for a strategy, trying the preferred
 * window horizons in order and then any horizon
 */
export function latestResultFor(
  strategyName: string,
  results: readonly BacktestResultRecord[],
  preferredWindows: readonly number[]
): BacktestResultRecord | null {
  const own = results
    .filter((r) => r.strategyName === strategyName && !r.isWalkForward)
    .sort(newestFirst);

  for (const windowDays of preferredWindows) {
    const match = own.find((r) => r.windowDays === windowDays);
    if (match) {
      return match;
    }
  }
  return own[0] ?? null;
}

/**
 * Oldest non-walk-forward result for a strategy, the degradation baseline
 */
export function baselineResultFor(
  strategyName: string,
  results: readonly BacktestResultRecord[]
): BacktestResultRecord | null {
  const own = results
    .filter((r) => r.strategyName === strategyName && !r.isWalkForward)
    .sort(oldestFirst);
  return own[0] ?? null;
}

/**
 * Non-degraded first, then score descending, then name ascending
 */
export function compareScores(a: StrategyScore, b: StrategyScore): number {
  if (a.isDegraded !== b.isDegraded) {
    return a.isDegraded ? 1 : -1;
  }
  if (a.compositeScore !== b.compositeScore) {
    return b.compositeScore - a.compositeScore;
  }
  return a.strategyName.localeCompare(b.strategyName);
}

function eligibleResults(input: SelectionInput, config: SelectorConfig): BacktestResultRecord[] {
  const eligible: BacktestResultRecord[] = [];

  for (const strategyName of input.strategies) {
    const latest = latestResultFor(strategyName, input.results, config.preferredWindows);
    if (!latest) {
      logger.warn('No backtest results for strategy', { strategy: strategyName });
      continue;
    }
    if (latest.totalTrades < config.minTrades) {
      logger.warn('Strategy excluded: too few trades', {
        strategy: strategyName,
        totalTrades: latest.totalTrades,
        minTrades: config.minTrades,
      });
      continue;
    }
    eligible.push(latest);
  }

  return eligible;
}

/**
 * Every eligible strategy, best first. Empty when none qualifies.
 */
export function rankStrategies(
  input: SelectionInput,
  config: SelectorConfig = DEFAULT_SELECTOR_CONFIG
): StrategyScore[] {
  const eligible = eligibleResults(input, config);
  if (eligible.length === 0) {
    logger.warn('No strategy passed the eligibility filter', {
      candidates: input.strategies.length,
    });
    return [];
  }

  const { regime } = detectVolatilityRegime(input.recentBars, config.regime);
  const baseScores = computeCompositeScores(eligible, config.weights);
  const live = new Map((input.livePerformance ?? []).map((p) => [p.strategyName, p]));

  const scores = eligible.map((record, i): StrategyScore => {
    let compositeScore =
      baseScores[i] * regimeMultiplier(record.strategyName, regime, config.regimePenalties);

    const blended = blendLiveScore(compositeScore, live.get(record.strategyName), config.liveBlend);
    if (blended !== null) {
      logger.info('Blended live performance into score', {
        strategy: record.strategyName,
        before: compositeScore,
        after: blended,
      });
      compositeScore = blended;
    }

    const verdict = checkDegradation(
      record,
      baselineResultFor(record.strategyName, input.results),
      config.degradation
    );
    if (verdict.isDegraded) {
      logger.warn('Strategy is degraded', {
        strategy: record.strategyName,
        reason: verdict.reason,
      });
    }

    return {
      strategyName: record.strategyName,
      compositeScore,
      winRate: record.winRate,
      profitFactor: record.profitFactor,
      sharpeRatio: record.sharpeRatio,
      expectancy: record.expectancy,
      maxDrawdown: record.maxDrawdown,
      totalTrades: record.totalTrades,
      windowDays: record.windowDays,
      regime,
      isDegraded: verdict.isDegraded,
      degradationReason: verdict.reason,
      confluence: null,
    };
  });

  scores.sort(compareScores);
  applyConfluence(scores, input, config);

  logger.info('Ranked strategies', {
    regime,
    ranking: scores.map((s) => ({
      strategy: s.strategyName,
      score: Math.round(s.compositeScore * 10_000) / 10_000,
      degraded: s.isDegraded,
    })),
  });

  return scores;
}

function applyConfluence(
  scores: StrategyScore[],
  input: SelectionInput,
  config: SelectorConfig
): void {
  const top = scores[0];
  const direction = input.recentDirections?.[top.strategyName];
  if (!input.coarseBars || !direction) {
    return;
  }

  const agrees = checkTrendConfluence(input.coarseBars, direction, config.confluence);
  top.confluence = agrees;
  if (agrees) {
    top.compositeScore += config.confluence.bonus;
  }
}

/**
 * Highest-ranked eligible strategy, or null when none qualifies
 */
export function selectBest(
  input: SelectionInput,
  config: SelectorConfig = DEFAULT_SELECTOR_CONFIG
): StrategyScore | null {
  return rankStrategies(input, config)[0] ?? null;
}
