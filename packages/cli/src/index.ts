/**
 * @stratlab/cli
 *
 * Command registration for the stratlab program; the executable lives in
 * bin/stratlab.ts.
 */

export { registerBacktestCommands } from './commands/backtest.js';
export { registerSelectionCommands } from './commands/selection.js';
export { registerJobCommands } from './commands/jobs.js';
export type { CommandContext, CommandContextFactory } from './core/command-context.js';
export { createCommandContext } from './core/command-context.js';
export { JsonFilePriceHistory } from './core/json-price-history.js';
export { loadBarFile, loadResultsFile, loadLivePerformanceFile } from './core/json-files.js';
