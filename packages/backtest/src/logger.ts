/**
 * Backtest Package Logger
 */

import { createPackageLogger } from '@stratlab/utils';

export const logger = createPackageLogger('@stratlab/backtest');
