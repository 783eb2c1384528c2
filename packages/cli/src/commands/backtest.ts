/**
 * Backtest Commands
 */

import type { Command } from 'commander';
import { backtestRunSchema, walkForwardSchema } from '../command-defs/backtest.js';
import { coerceNumber, coerceNumberArray } from '../core/coerce.js';
import type { CommandContextFactory } from '../core/command-context.js';
import { defineCommand } from '../core/defineCommand.js';
import { runBacktestHandler } from '../handlers/backtest/run-backtest.js';
import {
  walkForwardHandler,
  walkForwardRows,
  walkForwardText,
} from '../handlers/backtest/walk-forward.js';

export function registerBacktestCommands(program: Command, createContext?: CommandContextFactory): void {
  if (program.commands.find((cmd) => cmd.name() === 'backtest')) {
    return;
  }

  const backtestCmd = program.command('backtest').description('Rolling-window backtests');

  const runCmd = backtestCmd
    .command('run')
    .description('Backtest registered strategies over a JSON bar file')
    .requiredOption('--bars <path>', 'JSON bar file of the signal timeframe')
    .option('--strategy <name>', 'Strategy name (default: every registered strategy)')
    .option('--horizons <days>', 'Window horizons in days, e.g. 30,60')
    .option('--config <path>', 'config.yaml path')
    .option('--format <format>', 'Output format: json, table or text', 'json');

  defineCommand(runCmd, {
    name: 'backtest.run',
    schema: backtestRunSchema,
    coerce: (raw) => ({ ...raw, horizons: coerceNumberArray(raw.horizons, 'horizons') }),
    handler: runBacktestHandler,
    toRows: (rows) => rows.map((row) => ({ ...row })),
    createContext,
  });

  const walkForwardCmd = backtestCmd
    .command('walk-forward')
    .description('Walk-forward validation over a JSON bar file')
    .requiredOption('--bars <path>', 'JSON bar file of the signal timeframe')
    .option('--strategy <name>', 'Strategy name (default: every registered strategy)')
    .option('--train-fraction <fraction>', 'In-sample share, between 0 and 1')
    .option('--config <path>', 'config.yaml path')
    .option('--format <format>', 'Output format: json, table or text', 'json');

  defineCommand(walkForwardCmd, {
    name: 'backtest.walk-forward',
    schema: walkForwardSchema,
    coerce: (raw) => ({ ...raw, trainFraction: coerceNumber(raw.trainFraction, 'trainFraction') }),
    handler: walkForwardHandler,
    toRows: walkForwardRows,
    toText: walkForwardText,
    createContext,
  });
}
