/**
 * Job Commands
 */

import type { Command } from 'commander';
import { cycleSchema, migrateSchema } from '../command-defs/jobs.js';
import type { CommandContextFactory } from '../core/command-context.js';
import { defineCommand } from '../core/defineCommand.js';
import { cycleRows, runCycleHandler } from '../handlers/jobs/run-cycle.js';
import { migrateHandler } from '../handlers/jobs/migrate.js';

export function registerJobCommands(program: Command, createContext?: CommandContextFactory): void {
  if (program.commands.find((cmd) => cmd.name() === 'cycle')) {
    return;
  }

  const cycleCmd = program
    .command('cycle')
    .description('Run one evaluation cycle and persist the results')
    .requiredOption('--bars <path>', 'JSON bar file with the full history')
    .option('--dry-run', 'Keep results in memory instead of Postgres', false)
    .option('--config <path>', 'config.yaml path')
    .option('--format <format>', 'Output format: json, table or text', 'json');

  defineCommand(cycleCmd, {
    name: 'cycle',
    schema: cycleSchema,
    handler: runCycleHandler,
    toRows: cycleRows,
    createContext,
  });

  const migrateCmd = program
    .command('migrate')
    .description('Create the backtest_results table')
    .option('--config <path>', 'config.yaml path')
    .option('--format <format>', 'Output format: json, table or text', 'json');

  defineCommand(migrateCmd, {
    name: 'migrate',
    schema: migrateSchema,
    handler: migrateHandler,
    toRows: (result) => result.applied.map((migration) => ({ migration })),
    createContext,
  });
}
