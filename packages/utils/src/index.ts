/**
 * @stratlab/utils - Shared utilities package
 *
 * Logger, configuration loading and error handling.
 */

export { logger, Logger, winstonLogger } from './logger.js';
export type { LogContext } from './logger.js';
export { createPackageLogger, timed } from './logging/index.js';

export * from './config/index.js';

export * from './errors.js';
export { handleError } from './error-handler.js';
export type { ErrorHandlerResult } from './error-handler.js';
