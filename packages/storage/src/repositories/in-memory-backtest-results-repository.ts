import type {
  BacktestResultQuery,
  BacktestResultRecord,
  BacktestResultsPort,
  NewBacktestResultRecord,
} from '@stratlab/core';
import { assertValidRecords } from './record-schema.js';

function matches(record: BacktestResultRecord, query: BacktestResultQuery): boolean {
  return (
    (query.strategyName === undefined || record.strategyName === query.strategyName) &&
    (query.isWalkForward === undefined || record.isWalkForward === query.isWalkForward) &&
    (query.windowDays === undefined || record.windowDays === query.windowDays)
  );
}

/**
 * Process-local result store for tests and file-based CLI runs.
 * A batch is validated in full before any record is appended.
 */
export class InMemoryBacktestResultsRepository implements BacktestResultsPort {
  private records: BacktestResultRecord[] = [];
  private nextId = 1;

  constructor(seed: readonly BacktestResultRecord[] = []) {
    this.records = seed.map((r) => ({ ...r }));
    this.nextId = seed.length + 1;
  }

  async appendResults(records: NewBacktestResultRecord[]): Promise<BacktestResultRecord[]> {
    assertValidRecords(records);

    const stored = records.map((record, i) => ({ ...record, id: String(this.nextId + i) }));
    this.records.push(...stored);
    this.nextId += stored.length;
    return stored.map((r) => ({ ...r }));
  }

  async listResults(query: BacktestResultQuery = {}): Promise<BacktestResultRecord[]> {
    return this.records
      .filter((r) => matches(r, query))
      .sort((a, b) => a.createdAt - b.createdAt)
      .map((r) => ({ ...r }));
  }

  get size(): number {
    return this.records.length;
  }
}
