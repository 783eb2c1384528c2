/**
 * Evaluation Cycle
 * ================
 *
 * Scheduled unit of work that refreshes the stored backtest results:
 * 1. Read the full bar history of the configured instrument (fail fast)
 * 2. For every registered strategy run the rolling backtest per horizon and
 *    the walk-forward validation
 * 3. Append every resulting record in one atomic commit
 *
 * A failure to read prices or to persist aborts the cycle with
 * EvaluationCycleError and nothing is written. Too little history is not an
 * error: the cycle returns `insufficient_history` and writes nothing.
 */

import {
  BacktestRunner,
  SessionSpreadModel,
  WalkForwardValidator,
  averageEfficiency,
  type HorizonBacktest,
} from '@stratlab/backtest';
import type {
  BacktestMetrics,
  BacktestResultsPort,
  Candle,
  ClockPort,
  NewBacktestResultRecord,
  PriceHistoryPort,
  Strategy,
  StrategyRegistry,
  WalkForwardResult,
} from '@stratlab/core';
import { EvaluationCycleError, timed } from '@stratlab/utils';
import { DEFAULT_EVALUATION_CONFIG, type EvaluationConfig } from './config.js';
import { logger } from './logger.js';

export interface EvaluationCycleDeps {
  priceHistory: PriceHistoryPort;
  results: BacktestResultsPort;
  registry: StrategyRegistry;
  clock: ClockPort;
  config?: EvaluationConfig;
}

export interface StrategyEvaluation {
  strategyName: string;
  horizons: Array<{ windowDays: number; totalTrades: number; persisted: boolean }>;
  walkForward: WalkForwardResult;
  walkForwardPersisted: boolean;
}

export type EvaluationCycleSummary =
  | {
      status: 'completed';
      cycleAt: number;
      barsRead: number;
      evaluations: StrategyEvaluation[];
      /** Strategies whose evaluation threw; nothing of theirs was written */
      failed: string[];
      recordsWritten: number;
    }
  | {
      status: 'insufficient_history';
      cycleAt: number;
      barsRead: number;
      required: number;
    };

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * Bars a cycle needs: one walk-forward window of history plus the trade
 * duration ceiling
 */
export function requiredHistory(config: EvaluationConfig): number {
  return (
    config.walkForward.windowDays * config.backtest.runner.barsPerDay +
    config.backtest.simulator.maxBarsForward
  );
}

interface RecordContext {
  timeframe: string;
  startDate: number;
  endDate: number;
  spreadModel: string;
  createdAt: number;
}

function metricFields(metrics: BacktestMetrics) {
  return {
    winRate: metrics.winRate,
    profitFactor: metrics.profitFactor,
    sharpeRatio: metrics.sharpeRatio,
    maxDrawdown: metrics.maxDrawdown,
    expectancy: metrics.expectancy,
    totalTrades: metrics.totalTrades,
  };
}

export function horizonRecord(run: HorizonBacktest, ctx: RecordContext): NewBacktestResultRecord {
  return {
    strategyName: run.strategyName,
    timeframe: ctx.timeframe,
    windowDays: run.windowDays,
    startDate: ctx.startDate,
    endDate: ctx.endDate,
    ...metricFields(run.metrics),
    isWalkForward: false,
    isOverfitted: null,
    walkForwardEfficiency: null,
    wfeWinRate: null,
    wfeProfitFactor: null,
    spreadModel: ctx.spreadModel,
    createdAt: ctx.createdAt,
  };
}

/**
 * Walk-forward record carrying the out-of-sample metrics. No verdict is
 * stored when the validator had too few out-of-sample trades.
 */
export function walkForwardRecord(
  result: WalkForwardResult,
  ctx: RecordContext
): NewBacktestResultRecord {
  const average = averageEfficiency(result.efficiency);
  const validated = result.status === 'validated';
  return {
    strategyName: result.strategyName,
    timeframe: ctx.timeframe,
    windowDays: result.windowDays,
    startDate: ctx.startDate,
    endDate: ctx.endDate,
    ...metricFields(result.outOfSample),
    isWalkForward: true,
    isOverfitted: validated ? result.isOverfitted : null,
    walkForwardEfficiency: average === null ? null : round4(average),
    wfeWinRate: result.efficiency.winRate === null ? null : round4(result.efficiency.winRate),
    wfeProfitFactor:
      result.efficiency.profitFactor === null ? null : round4(result.efficiency.profitFactor),
    spreadModel: ctx.spreadModel,
    createdAt: ctx.createdAt,
  };
}

async function readHistory(
  priceHistory: PriceHistoryPort,
  config: EvaluationConfig
): Promise<Candle[]> {
  try {
    return await priceHistory.getCandles({ symbol: config.symbol, timeframe: config.timeframe });
  } catch (error) {
    throw new EvaluationCycleError('read_prices', error, {
      symbol: config.symbol,
      timeframe: config.timeframe,
    });
  }
}

function evaluateStrategy(
  strategy: Strategy,
  bars: readonly Candle[],
  runner: BacktestRunner,
  validator: WalkForwardValidator,
  ctx: RecordContext
): { evaluation: StrategyEvaluation; records: NewBacktestResultRecord[] } {
  const records: NewBacktestResultRecord[] = [];
  const horizons = runner.runFull(strategy, bars).map((run) => {
    const persisted = run.metrics.totalTrades > 0;
    if (persisted) {
      records.push(horizonRecord(run, ctx));
    } else {
      logger.info('No trades; result not persisted', {
        strategy: strategy.name,
        windowDays: run.windowDays,
      });
    }
    return { windowDays: run.windowDays, totalTrades: run.metrics.totalTrades, persisted };
  });

  const walkForward = validator.validate(strategy, bars);
  const walkForwardPersisted = walkForward.outOfSample.totalTrades > 0;
  if (walkForwardPersisted) {
    records.push(walkForwardRecord(walkForward, ctx));
  } else {
    logger.info('No out-of-sample trades; walk-forward result not persisted', {
      strategy: strategy.name,
    });
  }

  return {
    evaluation: { strategyName: strategy.name, horizons, walkForward, walkForwardPersisted },
    records,
  };
}

export async function runEvaluationCycle(deps: EvaluationCycleDeps): Promise<EvaluationCycleSummary> {
  const config = deps.config ?? DEFAULT_EVALUATION_CONFIG;
  const cycleAt = deps.clock.nowMs();

  const bars = await readHistory(deps.priceHistory, config);
  const required = requiredHistory(config);
  if (bars.length < required) {
    logger.warn('Insufficient bar history; skipping evaluation cycle', {
      symbol: config.symbol,
      timeframe: config.timeframe,
      have: bars.length,
      need: required,
    });
    return { status: 'insufficient_history', cycleAt, barsRead: bars.length, required };
  }

  const spreadModel = new SessionSpreadModel(config.backtest.spread);
  const runner = new BacktestRunner({
    spreadModel,
    simulator: config.backtest.simulator,
    metrics: config.backtest.metrics,
    runner: config.backtest.runner,
  });
  const validator = new WalkForwardValidator(runner, config.walkForward);
  const ctx: RecordContext = {
    timeframe: config.timeframe,
    startDate: bars[0].timestamp,
    endDate: bars[bars.length - 1].timestamp,
    spreadModel: spreadModel.name,
    createdAt: cycleAt,
  };

  const evaluations: StrategyEvaluation[] = [];
  const failed: string[] = [];
  const records: NewBacktestResultRecord[] = [];

  for (const strategy of deps.registry.list()) {
    try {
      const outcome = timed(
        logger,
        'Strategy evaluation',
        () => evaluateStrategy(strategy, bars, runner, validator, ctx),
        { strategy: strategy.name }
      );
      evaluations.push(outcome.evaluation);
      records.push(...outcome.records);
    } catch (error) {
      logger.error('Strategy evaluation failed; skipping strategy', error, {
        strategy: strategy.name,
      });
      failed.push(strategy.name);
    }
  }

  try {
    await deps.results.appendResults(records);
  } catch (error) {
    throw new EvaluationCycleError('persist_results', error, { records: records.length });
  }

  logger.info('Evaluation cycle complete', {
    strategies: evaluations.length,
    failed,
    recordsWritten: records.length,
    barsRead: bars.length,
  });

  return {
    status: 'completed',
    cycleAt,
    barsRead: bars.length,
    evaluations,
    failed,
    recordsWritten: records.length,
  };
}
