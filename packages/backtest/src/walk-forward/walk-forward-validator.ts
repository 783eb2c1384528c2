/**
 * Walk-Forward Validation
 *
 * Splits a bar series chronologically (first 80% in-sample, last 20%
 * out-of-sample), backtests each half on its own and compares the two.
 *
 * A strategy is overfitted when any tracked efficiency ratio (OOS / IS)
 * falls below the degradation threshold. Below minOosTrades out-of-sample
 * trades no verdict is given: the result is `insufficient_data`.
 */

import type {
  BacktestMetrics,
  Candle,
  DateRange,
  Strategy,
  WalkForwardEfficiency,
  WalkForwardResult,
} from '@stratlab/core';
import { DEFAULT_WALK_FORWARD_CONFIG, type WalkForwardConfig } from '../config.js';
import { logger } from '../logger.js';
import { BacktestRunner } from '../runner/backtest-runner.js';

export interface WalkForwardSplit {
  splitIndex: number;
  inSample: Candle[];
  outOfSample: Candle[];
}

/**
 * Chronological split at floor(n * trainFraction)
 */
export function splitChronologically(
  bars: readonly Candle[],
  trainFraction: number = DEFAULT_WALK_FORWARD_CONFIG.trainFraction
): WalkForwardSplit {
  const splitIndex = Math.floor(bars.length * trainFraction);
  return {
    splitIndex,
    inSample: bars.slice(0, splitIndex),
    outOfSample: bars.slice(splitIndex),
  };
}

function dateRange(bars: readonly Candle[]): DateRange | null {
  if (bars.length === 0) {
    return null;
  }
  return { start: bars[0].timestamp, end: bars[bars.length - 1].timestamp };
}

function ratio(outOfSample: number, inSample: number): number | null {
  return inSample > 0 ? outOfSample / inSample : null;
}

/**
 * OOS / IS for win rate and profit factor. A ratio is null when its
 * in-sample value is 0.
 */
export function computeEfficiency(
  inSample: BacktestMetrics,
  outOfSample: BacktestMetrics
): WalkForwardEfficiency {
  return {
    winRate: ratio(outOfSample.winRate, inSample.winRate),
    profitFactor: ratio(outOfSample.profitFactor, inSample.profitFactor),
  };
}

export function averageEfficiency(efficiency: WalkForwardEfficiency): number | null {
  const values = [efficiency.winRate, efficiency.profitFactor].filter(
    (v): v is number => v !== null
  );
  if (values.length === 0) {
    return null;
  }
  return values.reduce((a, b) => a + b, 0) / values.length;
}

export class WalkForwardValidator {
  readonly runner: BacktestRunner;
  readonly config: WalkForwardConfig;

  constructor(
    runner: BacktestRunner = new BacktestRunner(),
    config: WalkForwardConfig = DEFAULT_WALK_FORWARD_CONFIG
  ) {
    this.runner = runner;
    this.config = config;
  }

  validate(
    strategy: Strategy,
    bars: readonly Candle[],
    windowDays: number = this.config.windowDays
  ): WalkForwardResult {
    const split = splitChronologically(bars, this.config.trainFraction);

    logger.info('Walk-forward split', {
      strategy: strategy.name,
      windowDays,
      inSampleBars: split.inSample.length,
      outOfSampleBars: split.outOfSample.length,
    });

    const [inSampleRun] = this.runner.runFull(strategy, split.inSample, [windowDays]);
    const [outOfSampleRun] = this.runner.runFull(strategy, split.outOfSample, [windowDays]);
    const inSample = inSampleRun.metrics;
    const outOfSample = outOfSampleRun.metrics;

    const base = {
      strategyName: strategy.name,
      windowDays,
      inSample,
      outOfSample,
      splitIndex: split.splitIndex,
      inSampleRange: dateRange(split.inSample),
      outOfSampleRange: dateRange(split.outOfSample),
    };

    if (outOfSample.totalTrades < this.config.minOosTrades) {
      logger.warn('Insufficient out-of-sample trades; skipping overfitting detection', {
        strategy: strategy.name,
        windowDays,
        outOfSampleTrades: outOfSample.totalTrades,
        minOosTrades: this.config.minOosTrades,
      });
      return {
        ...base,
        status: 'insufficient_data',
        isOverfitted: false,
        efficiency: { winRate: null, profitFactor: null },
        averageEfficiency: null,
      };
    }

    const efficiency = computeEfficiency(inSample, outOfSample);
    const threshold = this.config.degradationThreshold;
    const degraded = Object.entries(efficiency).filter(
      ([, value]) => value !== null && value < threshold
    );
    const isOverfitted = degraded.length > 0;

    if (isOverfitted) {
      logger.warn('Strategy shows overfitting', {
        strategy: strategy.name,
        windowDays,
        degradedMetrics: degraded.map(([metric]) => metric),
        efficiency,
        threshold,
      });
    } else {
      logger.info('Strategy passed walk-forward validation', {
        strategy: strategy.name,
        windowDays,
        efficiency,
      });
    }

    return {
      ...base,
      status: 'validated',
      isOverfitted,
      efficiency,
      averageEfficiency: averageEfficiency(efficiency),
    };
  }
}

function formatRatio(value: number | null): string {
  return value === null ? 'n/a' : value.toFixed(3);
}

/**
 * One-paragraph plain-text summary of a walk-forward result
 */
export function formatWalkForwardResult(result: WalkForwardResult): string {
  const { inSample, outOfSample } = result;
  const verdict =
    result.status === 'insufficient_data'
      ? 'INSUFFICIENT DATA'
      : result.isOverfitted
        ? 'OVERFITTED'
        : 'PASSED';

  return [
    `Walk-forward ${result.strategyName} (${result.windowDays}d): ${verdict}`,
    `  in-sample:     trades=${inSample.totalTrades} winRate=${inSample.winRate} profitFactor=${inSample.profitFactor}`,
    `  out-of-sample: trades=${outOfSample.totalTrades} winRate=${outOfSample.winRate} profitFactor=${outOfSample.profitFactor}`,
    `  efficiency:    winRate=${formatRatio(result.efficiency.winRate)} profitFactor=${formatRatio(result.efficiency.profitFactor)}`,
  ].join('\n');
}
