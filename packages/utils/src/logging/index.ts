/**
 * Package-aware logging
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@stratlab/utils';
 *
 * const logger = createPackageLogger('@stratlab/backtest');
 * logger.info('Backtest complete', { strategy: 'ema_momentum' });
 * ```
 */

import { Logger } from '../logger.js';

const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = new Logger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

/**
 * Time a synchronous unit of work and log its duration at debug level
 */
export function timed<T>(logger: Logger, operation: string, fn: () => T, context?: Record<string, unknown>): T {
  const startedAt = performance.now();
  try {
    return fn();
  } finally {
    logger.debug(`${operation} finished`, {
      ...context,
      durationMs: Math.round(performance.now() - startedAt),
    });
  }
}
