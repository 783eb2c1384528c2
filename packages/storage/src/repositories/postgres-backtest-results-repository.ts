/**
 * Postgres Backtest Results Repository
 *
 * Append-only: one evaluation cycle's records go in with a single
 * BEGIN/COMMIT, so readers see the whole cycle or none of it.
 */

import type {
  BacktestResultQuery,
  BacktestResultRecord,
  BacktestResultsPort,
  NewBacktestResultRecord,
} from '@stratlab/core';
import { DatabaseError } from '@stratlab/utils';
import { logger } from '../logger.js';
import {
  getPostgresPool,
  poolConnector,
  queryPostgres,
  withPostgresTransaction,
  type PostgresConnector,
} from '../postgres/postgres-client.js';
import { assertValidRecords, rowToRecord } from './record-schema.js';

const RESULT_COLUMNS = `id, strategy_name, timeframe, window_days, start_date, end_date,
  win_rate, profit_factor, sharpe_ratio, max_drawdown, expectancy, total_trades,
  is_walk_forward, is_overfitted, walk_forward_efficiency, wfe_win_rate,
  wfe_profit_factor, spread_model, created_at`;

export const INSERT_RESULT_SQL = `INSERT INTO backtest_results (
  strategy_name, timeframe, window_days, start_date, end_date,
  win_rate, profit_factor, sharpe_ratio, max_drawdown, expectancy, total_trades,
  is_walk_forward, is_overfitted, walk_forward_efficiency, wfe_win_rate,
  wfe_profit_factor, spread_model, created_at
) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18)
RETURNING ${RESULT_COLUMNS}`;

function insertParams(record: NewBacktestResultRecord): unknown[] {
  return [
    record.strategyName,
    record.timeframe,
    record.windowDays,
    record.startDate,
    record.endDate,
    record.winRate,
    record.profitFactor,
    record.sharpeRatio,
    record.maxDrawdown,
    record.expectancy,
    record.totalTrades,
    record.isWalkForward,
    record.isOverfitted,
    record.walkForwardEfficiency,
    record.wfeWinRate,
    record.wfeProfitFactor,
    record.spreadModel,
    record.createdAt,
  ];
}

/**
 * SELECT statement and parameters for a result query
 */
export function buildListQuery(query: BacktestResultQuery = {}): { text: string; params: unknown[] } {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (query.strategyName !== undefined) {
    params.push(query.strategyName);
    conditions.push(`strategy_name = $${params.length}`);
  }
  if (query.isWalkForward !== undefined) {
    params.push(query.isWalkForward);
    conditions.push(`is_walk_forward = $${params.length}`);
  }
  if (query.windowDays !== undefined) {
    params.push(query.windowDays);
    conditions.push(`window_days = $${params.length}`);
  }

  const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
  return {
    text: `SELECT ${RESULT_COLUMNS} FROM backtest_results${where} ORDER BY created_at ASC, id ASC`,
    params,
  };
}

export class PostgresBacktestResultsRepository implements BacktestResultsPort {
  constructor(private readonly connector: PostgresConnector) {}

  async appendResults(records: NewBacktestResultRecord[]): Promise<BacktestResultRecord[]> {
    if (records.length === 0) {
      return [];
    }
    assertValidRecords(records);

    try {
      const stored = await withPostgresTransaction(this.connector, async (client) => {
        const inserted: BacktestResultRecord[] = [];
        for (const record of records) {
          const result = await client.query(INSERT_RESULT_SQL, insertParams(record));
          inserted.push(rowToRecord(result.rows[0]));
        }
        return inserted;
      });

      logger.info('Backtest results committed', { count: stored.length });
      return stored;
    } catch (error) {
      logger.error('Failed to append backtest results', error, { count: records.length });
      throw new DatabaseError('Failed to append backtest results', 'append_results', {
        count: records.length,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async listResults(query?: BacktestResultQuery): Promise<BacktestResultRecord[]> {
    const { text, params } = buildListQuery(query);
    try {
      const rows = await queryPostgres(this.connector, text, params);
      return rows.map(rowToRecord);
    } catch (error) {
      logger.error('Failed to list backtest results', error, { query });
      throw new DatabaseError('Failed to list backtest results', 'list_results', {
        query,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Repository on the process-wide pool configured from the environment
 */
export function createPostgresResultsRepository(): PostgresBacktestResultsRepository {
  return new PostgresBacktestResultsRepository(poolConnector(getPostgresPool()));
}
