/**
 * Selection Commands
 */

import type { Command } from 'commander';
import { selectSchema } from '../command-defs/selection.js';
import { coerceJson, coerceStringArray } from '../core/coerce.js';
import type { CommandContextFactory } from '../core/command-context.js';
import { defineCommand } from '../core/defineCommand.js';
import { selectionRows, selectStrategyHandler } from '../handlers/selection/select-strategy.js';

export function registerSelectionCommands(program: Command, createContext?: CommandContextFactory): void {
  if (program.commands.find((cmd) => cmd.name() === 'select')) {
    return;
  }

  const selectCmd = program
    .command('select')
    .description('Pick the best strategy from stored results and recent bars')
    .requiredOption('--bars <path>', 'JSON bar file of the signal timeframe (most recent bars)')
    .requiredOption('--results <path>', 'JSON array of stored backtest results')
    .option('--coarse-bars <path>', 'JSON bar file of the higher timeframe')
    .option('--directions <json>', 'Latest signal direction per strategy, e.g. {"ema_momentum":"long"}')
    .option('--live <path>', 'JSON array of live performance per strategy')
    .option('--strategies <names>', 'Candidate strategies, comma-separated')
    .option('--config <path>', 'config.yaml path')
    .option('--format <format>', 'Output format: json, table or text', 'json');

  defineCommand(selectCmd, {
    name: 'select',
    schema: selectSchema,
    coerce: (raw) => ({
      ...raw,
      directions: coerceJson(raw.directions, 'directions'),
      strategies: coerceStringArray(raw.strategies, 'strategies'),
    }),
    handler: selectStrategyHandler,
    toRows: selectionRows,
    createContext,
  });
}
