/**
 * Backtest Results Port
 *
 * Persistence boundary for aggregated backtest results.
 * Jobs and the selector depend on this port, not on a specific store.
 */

import type { BacktestResultRecord, NewBacktestResultRecord } from '../types/results.js';

export type BacktestResultQuery = {
  strategyName?: string;
  isWalkForward?: boolean;
  windowDays?: number;
};

export interface BacktestResultsPort {
  /**
   * Append every record of one evaluation cycle in a single atomic commit.
   * Either all records become visible or none do.
   *
   * @returns The stored records with their assigned ids
   */
  appendResults(records: NewBacktestResultRecord[]): Promise<BacktestResultRecord[]>;

  /**
   * List stored results ordered by createdAt ascending (oldest first)
   */
  listResults(query?: BacktestResultQuery): Promise<BacktestResultRecord[]>;
}
