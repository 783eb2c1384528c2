#!/usr/bin/env node

/**
 * stratlab CLI entry point
 */

import { program } from 'commander';
import { logger } from '@stratlab/utils';
import { handleError } from '../core/error-handler.js';
import { registerBacktestCommands } from '../commands/backtest.js';
import { registerJobCommands } from '../commands/jobs.js';
import { registerSelectionCommands } from '../commands/selection.js';

program
  .name('stratlab')
  .description('Backtest, validate and select trading strategies')
  .version('0.1.0');

registerBacktestCommands(program);
registerSelectionCommands(program);
registerJobCommands(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error) {
    const message = handleError(error);
    process.stderr.write(`Error: ${message}\n`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error in CLI', error);
  process.exit(1);
});

export { program };
