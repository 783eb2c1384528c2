/**
 * @stratlab/storage
 *
 * Backtest result persistence: Postgres and in-memory adapters of
 * BacktestResultsPort.
 */

export {
  createPostgresPool,
  getPostgresPool,
  poolConnector,
  queryPostgres,
  withPostgresTransaction,
  closePostgresPool,
} from './postgres/postgres-client.js';
export type {
  PostgresConnector,
  PostgresQueryable,
  PostgresSession,
} from './postgres/postgres-client.js';
export { loadMigrations, runMigrations, MIGRATIONS_DIR } from './postgres/migrations.js';
export type { Migration } from './postgres/migrations.js';

export {
  PostgresBacktestResultsRepository,
  createPostgresResultsRepository,
  buildListQuery,
  INSERT_RESULT_SQL,
} from './repositories/postgres-backtest-results-repository.js';
export { InMemoryBacktestResultsRepository } from './repositories/in-memory-backtest-results-repository.js';
export {
  newBacktestResultRecordSchema,
  backtestResultRowSchema,
  assertValidRecords,
  rowToRecord,
} from './repositories/record-schema.js';
export type { BacktestResultRow } from './repositories/record-schema.js';
