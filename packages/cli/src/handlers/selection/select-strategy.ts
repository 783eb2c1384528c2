/**
 * Select Handler
 *
 * Runs the selection cycle over file inputs: stored results from JSON, the
 * signal-timeframe bars and, for the confluence check, higher-timeframe bars.
 *
 * Pure handler - no console output, no process.exit.
 */

import type { StrategyScore } from '@stratlab/core';
import { runSelectionCycle } from '@stratlab/jobs';
import { InMemoryBacktestResultsRepository } from '@stratlab/storage';
import { ValidationError } from '@stratlab/utils';
import type { SelectArgs } from '../../command-defs/selection.js';
import type { CommandContext } from '../../core/command-context.js';
import {
  loadBarFile,
  loadLivePerformanceFile,
  loadResultsFile,
  type BarFile,
} from '../../core/json-files.js';
import { JsonFilePriceHistory } from '../../core/json-price-history.js';
import type { TableRow } from '../../core/output-formatter.js';

export async function selectStrategyHandler(
  args: SelectArgs,
  ctx: CommandContext
): Promise<StrategyScore | null> {
  const { config } = ctx;
  if (args.directions && !args.coarseBars) {
    throw new ValidationError('The confluence check needs higher-timeframe bars', {
      option: 'coarseBars',
      timeframe: config.coarseTimeframe,
    });
  }

  const files: Record<string, BarFile> = { [config.timeframe]: await loadBarFile(args.bars) };
  if (args.coarseBars) {
    files[config.coarseTimeframe] = await loadBarFile(args.coarseBars);
  }

  return runSelectionCycle({
    priceHistory: new JsonFilePriceHistory(files),
    results: new InMemoryBacktestResultsRepository(await loadResultsFile(args.results)),
    strategies: args.strategies ?? ctx.registry.listNames(),
    recentDirections: args.directions,
    livePerformance: args.live ? await loadLivePerformanceFile(args.live) : undefined,
    config,
  });
}

export function selectionRows(score: StrategyScore | null): TableRow[] {
  return score === null ? [] : [{ ...score }];
}
