/**
 * Walk-Forward Handler
 *
 * Chronological in-sample/out-of-sample validation of one or every
 * registered strategy over a bar file.
 *
 * Pure handler - no console output, no process.exit.
 */

import { WalkForwardValidator, formatWalkForwardResult } from '@stratlab/backtest';
import type { WalkForwardResult } from '@stratlab/core';
import type { WalkForwardArgs } from '../../command-defs/backtest.js';
import type { CommandContext } from '../../core/command-context.js';
import { loadBarFile } from '../../core/json-files.js';
import type { TableRow } from '../../core/output-formatter.js';
import { pickStrategies, runnerFor } from './run-backtest.js';

export async function walkForwardHandler(
  args: WalkForwardArgs,
  ctx: CommandContext
): Promise<WalkForwardResult[]> {
  const strategies = pickStrategies(ctx.registry, args.strategy);
  const { bars } = await loadBarFile(args.bars);
  const validator = new WalkForwardValidator(runnerFor(ctx.config), {
    ...ctx.config.walkForward,
    trainFraction: args.trainFraction ?? ctx.config.walkForward.trainFraction,
  });

  return strategies.map((strategy) => validator.validate(strategy, bars));
}

export function walkForwardRows(results: WalkForwardResult[]): TableRow[] {
  return results.map((r) => ({
    strategyName: r.strategyName,
    status: r.status,
    overfitted: r.status === 'validated' ? r.isOverfitted : null,
    inSampleTrades: r.inSample.totalTrades,
    outOfSampleTrades: r.outOfSample.totalTrades,
    oosWinRate: r.outOfSample.winRate,
    oosProfitFactor: r.outOfSample.profitFactor,
    wfeWinRate: r.efficiency.winRate,
    wfeProfitFactor: r.efficiency.profitFactor,
  }));
}

export function walkForwardText(results: WalkForwardResult[]): string {
  return results.map(formatWalkForwardResult).join('\n\n');
}
