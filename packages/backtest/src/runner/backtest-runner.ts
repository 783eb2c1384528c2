/**
 * Backtest Runner
 *
 * Slides a fixed-size window across a bar series, calls the strategy's
 * decision function on each window (the same callable used live) and
 * simulates every candidate against the bars after the window.
 *
 * The last window position leaves maxBarsForward trailing bars so trades
 * opened near the end of history can still resolve.
 */

import type {
  BacktestMetrics,
  Candle,
  DecisionResult,
  SimulatedTrade,
  Strategy,
  StrategyRegistry,
} from '@stratlab/core';
import {
  DEFAULT_METRICS_CONFIG,
  DEFAULT_RUNNER_CONFIG,
  DEFAULT_SIMULATOR_CONFIG,
  type MetricsConfig,
  type RunnerConfig,
  type SimulatorConfig,
} from '../config.js';
import { logger } from '../logger.js';
import { computeMetrics } from '../metrics/metrics-calculator.js';
import { SessionSpreadModel, type SpreadModel } from '../sim/spread-model.js';
import { simulateCandidates } from '../sim/trade-simulator.js';

export interface BacktestRunnerOptions {
  spreadModel?: SpreadModel;
  simulator?: SimulatorConfig;
  metrics?: MetricsConfig;
  runner?: RunnerConfig;
}

/**
 * Result of one horizon of runFull
 */
export interface HorizonBacktest {
  strategyName: string;
  windowDays: number;
  windowBars: number;
  metrics: BacktestMetrics;
  trades: SimulatedTrade[];
  /** First bar of the evaluated history; null for an empty series */
  startDate: number | null;
  /** Last bar of the evaluated history; null for an empty series */
  endDate: number | null;
}

export class BacktestRunner {
  readonly spreadModel: SpreadModel;
  readonly simulatorConfig: SimulatorConfig;
  readonly metricsConfig: MetricsConfig;
  readonly runnerConfig: RunnerConfig;

  constructor(options: BacktestRunnerOptions = {}) {
    this.spreadModel = options.spreadModel ?? new SessionSpreadModel();
    this.simulatorConfig = options.simulator ?? DEFAULT_SIMULATOR_CONFIG;
    this.metricsConfig = options.metrics ?? DEFAULT_METRICS_CONFIG;
    this.runnerConfig = options.runner ?? DEFAULT_RUNNER_CONFIG;
  }

  /**
   * Fewest bars a rolling run over `windowSize` bars needs
   */
  minimumBars(windowSize: number): number {
    return windowSize + this.simulatorConfig.maxBarsForward;
  }

  /**
   * Run a strategy on rolling windows and collect the simulated trades.
   *
   * @param windowSize - Bars per decision window
   * @param stepSize - Bars to advance between windows
   */
  runRolling(
    strategy: Strategy,
    bars: readonly Candle[],
    windowSize: number,
    stepSize: number
  ): SimulatedTrade[] {
    if (windowSize <= 0 || stepSize <= 0) {
      throw new RangeError(
        `windowSize and stepSize must be positive (got ${windowSize}, ${stepSize})`
      );
    }

    const { maxBarsForward } = this.simulatorConfig;
    const required = this.minimumBars(windowSize);
    if (bars.length < required) {
      logger.warn('Insufficient bars for rolling backtest', {
        strategy: strategy.name,
        have: bars.length,
        need: required,
        windowSize,
        maxBarsForward,
      });
      return [];
    }

    const trades: SimulatedTrade[] = [];
    const lastStart = bars.length - windowSize - maxBarsForward;

    for (let start = 0; start < lastStart; start += stepSize) {
      const end = start + windowSize;
      const window = bars.slice(start, end);

      let decision: DecisionResult;
      try {
        decision = strategy.analyze(window);
      } catch (error) {
        logger.error('Strategy decision function failed; skipping window', error, {
          strategy: strategy.name,
          windowStart: start,
        });
        continue;
      }

      if (decision.status === 'insufficient_history') {
        logger.debug('Skipping window: insufficient history', {
          strategy: strategy.name,
          windowStart: start,
          required: decision.required,
          received: decision.received,
        });
        continue;
      }

      if (decision.candidates.length === 0) {
        continue;
      }

      const forward = bars.slice(end, end + maxBarsForward);
      trades.push(
        ...simulateCandidates(decision.candidates, forward, this.spreadModel, this.simulatorConfig)
      );
    }

    return trades;
  }

  /**
   * Rolling backtest plus metrics for each horizon (in days).
   */
  runFull(
    strategy: Strategy,
    bars: readonly Candle[],
    horizonsDays: readonly number[] = this.runnerConfig.horizonsDays
  ): HorizonBacktest[] {
    const { barsPerDay, stepDays } = this.runnerConfig;
    const startDate = bars.length > 0 ? bars[0].timestamp : null;
    const endDate = bars.length > 0 ? bars[bars.length - 1].timestamp : null;

    return horizonsDays.map((windowDays) => {
      const windowBars = windowDays * barsPerDay;
      const trades = this.runRolling(strategy, bars, windowBars, stepDays * barsPerDay);
      const metrics = computeMetrics(trades, this.metricsConfig);

      logger.info('Backtest complete', {
        strategy: strategy.name,
        windowDays,
        totalTrades: metrics.totalTrades,
        winRate: metrics.winRate,
        profitFactor: metrics.profitFactor,
      });

      return {
        strategyName: strategy.name,
        windowDays,
        windowBars,
        metrics,
        trades,
        startDate,
        endDate,
      };
    });
  }

  /**
   * runFull for every registered strategy, keyed by strategy name
   */
  runAllStrategies(
    registry: StrategyRegistry,
    bars: readonly Candle[],
    horizonsDays?: readonly number[]
  ): Map<string, HorizonBacktest[]> {
    const results = new Map<string, HorizonBacktest[]>();
    for (const strategy of registry.list()) {
      results.set(strategy.name, this.runFull(strategy, bars, horizonsDays));
    }
    return results;
  }
}
