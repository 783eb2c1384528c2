/**
 * Evaluation Cycle Handler
 *
 * One evaluation cycle over a bar file. Results go to the Postgres store, or
 * to a throwaway in-memory store on a dry run.
 *
 * Pure handler - no console output, no process.exit.
 */

import { runEvaluationCycle, type EvaluationCycleSummary } from '@stratlab/jobs';
import { InMemoryBacktestResultsRepository } from '@stratlab/storage';
import type { CycleArgs } from '../../command-defs/jobs.js';
import type { CommandContext } from '../../core/command-context.js';
import { loadBarFile } from '../../core/json-files.js';
import { JsonFilePriceHistory } from '../../core/json-price-history.js';
import type { TableRow } from '../../core/output-formatter.js';

export async function runCycleHandler(
  args: CycleArgs,
  ctx: CommandContext
): Promise<EvaluationCycleSummary> {
  const bars = await loadBarFile(args.bars);
  return runEvaluationCycle({
    priceHistory: new JsonFilePriceHistory({ [ctx.config.timeframe]: bars }),
    results: args.dryRun ? new InMemoryBacktestResultsRepository() : ctx.results(),
    registry: ctx.registry,
    clock: ctx.clock,
    config: ctx.config,
  });
}

export function cycleRows(summary: EvaluationCycleSummary): TableRow[] {
  if (summary.status === 'insufficient_history') {
    return [{ status: summary.status, barsRead: summary.barsRead, required: summary.required }];
  }

  return summary.evaluations.flatMap((evaluation) => [
    ...evaluation.horizons.map((h) => ({
      strategyName: evaluation.strategyName,
      run: `${h.windowDays}d`,
      trades: h.totalTrades,
      persisted: h.persisted,
    })),
    {
      strategyName: evaluation.strategyName,
      run: 'walk-forward',
      trades: evaluation.walkForward.outOfSample.totalTrades,
      persisted: evaluation.walkForwardPersisted,
    },
  ]);
}
