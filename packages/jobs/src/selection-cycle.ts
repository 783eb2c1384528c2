/**
 * Selection Cycle
 *
 * Reads stored results and recent bars, then asks the selector for the best
 * strategy. Stateless: every run re-derives the choice from storage.
 */

import { selectBest } from '@stratlab/selection';
import type {
  BacktestResultRecord,
  BacktestResultsPort,
  Candle,
  LivePerformance,
  PriceHistoryPort,
  RecentDirections,
  StrategyScore,
} from '@stratlab/core';
import { EvaluationCycleError } from '@stratlab/utils';
import { DEFAULT_EVALUATION_CONFIG, type EvaluationConfig } from './config.js';
import { logger } from './logger.js';

export interface SelectionCycleDeps {
  priceHistory: PriceHistoryPort;
  results: BacktestResultsPort;
  /** Candidate strategy names */
  strategies: readonly string[];
  /** Direction of each strategy's latest signal; enables the confluence check */
  recentDirections?: RecentDirections;
  livePerformance?: readonly LivePerformance[];
  config?: EvaluationConfig;
}

async function readResults(results: BacktestResultsPort): Promise<BacktestResultRecord[]> {
  try {
    return await results.listResults();
  } catch (error) {
    throw new EvaluationCycleError('read_results', error);
  }
}

async function readBars(
  priceHistory: PriceHistoryPort,
  symbol: string,
  timeframe: string,
  limit: number
): Promise<Candle[]> {
  try {
    return await priceHistory.getCandles({ symbol, timeframe, limit });
  } catch (error) {
    throw new EvaluationCycleError('read_prices', error, { symbol, timeframe });
  }
}

export async function runSelectionCycle(deps: SelectionCycleDeps): Promise<StrategyScore | null> {
  const config = deps.config ?? DEFAULT_EVALUATION_CONFIG;

  const results = await readResults(deps.results);
  const recentBars = await readBars(
    deps.priceHistory,
    config.symbol,
    config.timeframe,
    config.recentBars
  );
  const coarseBars = deps.recentDirections
    ? await readBars(deps.priceHistory, config.symbol, config.coarseTimeframe, config.coarseBars)
    : undefined;

  const best = selectBest(
    {
      strategies: deps.strategies,
      results,
      recentBars,
      coarseBars,
      recentDirections: deps.recentDirections,
      livePerformance: deps.livePerformance,
    },
    config.selection
  );

  if (best) {
    logger.info('Selected strategy', {
      strategy: best.strategyName,
      score: best.compositeScore,
      regime: best.regime,
      degraded: best.isDegraded,
    });
  } else {
    logger.warn('No strategy selected', { candidates: deps.strategies.length });
  }

  return best;
}
