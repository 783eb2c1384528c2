/**
 * Backtest Run Handler
 *
 * Rolling-window backtest of one or every registered strategy over a bar
 * file, one row per (strategy, horizon).
 *
 * Pure handler - no console output, no process.exit.
 */

import { BacktestRunner, SessionSpreadModel, type HorizonBacktest } from '@stratlab/backtest';
import { toIsoUtc, type Strategy, type StrategyRegistry } from '@stratlab/core';
import type { EvaluationConfig } from '@stratlab/jobs';
import type { BacktestRunArgs } from '../../command-defs/backtest.js';
import type { CommandContext } from '../../core/command-context.js';
import { loadBarFile } from '../../core/json-files.js';

export type BacktestRow = {
  strategyName: string;
  windowDays: number;
  windowBars: number;
  totalTrades: number;
  winRate: number;
  profitFactor: number;
  sharpeRatio: number;
  maxDrawdown: number;
  maxDrawdownPct: number | null;
  expectancy: number;
  startDate: string | null;
  endDate: string | null;
};

export function runnerFor(config: EvaluationConfig): BacktestRunner {
  return new BacktestRunner({
    spreadModel: new SessionSpreadModel(config.backtest.spread),
    simulator: config.backtest.simulator,
    metrics: config.backtest.metrics,
    runner: config.backtest.runner,
  });
}

/**
 * The named strategy, or all of them in registration order
 *
 * @throws StrategyNotFoundError for an unknown name
 */
export function pickStrategies(registry: StrategyRegistry, name?: string): Strategy[] {
  return name === undefined ? registry.list() : [registry.require(name)];
}

export function toBacktestRow(run: HorizonBacktest): BacktestRow {
  const { metrics } = run;
  return {
    strategyName: run.strategyName,
    windowDays: run.windowDays,
    windowBars: run.windowBars,
    totalTrades: metrics.totalTrades,
    winRate: metrics.winRate,
    profitFactor: metrics.profitFactor,
    sharpeRatio: metrics.sharpeRatio,
    maxDrawdown: metrics.maxDrawdown,
    maxDrawdownPct: metrics.maxDrawdownPct,
    expectancy: metrics.expectancy,
    startDate: run.startDate === null ? null : toIsoUtc(run.startDate),
    endDate: run.endDate === null ? null : toIsoUtc(run.endDate),
  };
}

export async function runBacktestHandler(
  args: BacktestRunArgs,
  ctx: CommandContext
): Promise<BacktestRow[]> {
  const strategies = pickStrategies(ctx.registry, args.strategy);
  const { bars } = await loadBarFile(args.bars);
  const runner = runnerFor(ctx.config);
  const horizons = args.horizons ?? ctx.config.backtest.runner.horizonsDays;

  return strategies.flatMap((strategy) =>
    runner.runFull(strategy, bars, horizons).map(toBacktestRow)
  );
}
