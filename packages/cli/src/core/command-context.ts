/**
 * Command Context
 *
 * Composition root shared by the commands: configuration, the strategy
 * registry, the clock and the Postgres-backed result store. The pool is
 * opened on first use and closed when the command finishes.
 */

import {
  createSystemClock,
  type BacktestResultsPort,
  type ClockPort,
  type StrategyRegistry,
} from '@stratlab/core';
import { loadEvaluationConfig, type EvaluationConfig } from '@stratlab/jobs';
import {
  closePostgresPool,
  createPostgresResultsRepository,
  getPostgresPool,
  poolConnector,
  runMigrations,
} from '@stratlab/storage';
import { createDefaultRegistry } from '@stratlab/strategies';
import { loadConfigFromYaml } from '@stratlab/utils';

export interface CommandContext {
  config: EvaluationConfig;
  registry: StrategyRegistry;
  clock: ClockPort;
  results(): BacktestResultsPort;
  migrate(): Promise<string[]>;
  write(text: string): void;
  close(): Promise<void>;
}

export type CommandContextFactory = (configPath?: string) => CommandContext;

export const createCommandContext: CommandContextFactory = (configPath) => {
  const config = loadEvaluationConfig(loadConfigFromYaml(configPath));
  let results: BacktestResultsPort | null = null;

  return {
    config,
    registry: createDefaultRegistry({
      timeframe: config.timeframe,
      sessions: config.backtest.spread.sessions,
    }),
    clock: createSystemClock(),
    results: () => {
      if (!results) {
        results = createPostgresResultsRepository();
      }
      return results;
    },
    migrate: () => runMigrations(poolConnector(getPostgresPool())),
    write: (text) => {
      process.stdout.write(`${text}\n`);
    },
    close: closePostgresPool,
  };
};
