import { describe, it, expect } from 'vitest';
import { ValidationError } from '@stratlab/utils';
import { InMemoryBacktestResultsRepository } from '../../src/repositories/in-memory-backtest-results-repository.js';
import { newRecord } from '../helpers/fake-postgres.js';

describe('InMemoryBacktestResultsRepository', () => {
  it('assigns sequential ids', async () => {
    const repo = new InMemoryBacktestResultsRepository();

    const stored = await repo.appendResults([newRecord(), newRecord({ strategyName: 'beta' })]);

    expect(stored.map((r) => r.id)).toEqual(['1', '2']);
    expect(repo.size).toBe(2);
  });

  it('lists oldest first and applies filters', async () => {
    const repo = new InMemoryBacktestResultsRepository();
    await repo.appendResults([
      newRecord({ strategyName: 'alpha', createdAt: 300 }),
      newRecord({ strategyName: 'beta', createdAt: 100 }),
      newRecord({ strategyName: 'alpha', createdAt: 200, isWalkForward: true }),
    ]);

    const all = await repo.listResults();
    const alpha = await repo.listResults({ strategyName: 'alpha', isWalkForward: false });

    expect(all.map((r) => r.createdAt)).toEqual([100, 200, 300]);
    expect(alpha.map((r) => r.id)).toEqual(['1']);
  });

  it('appends nothing when any record in the batch is invalid', async () => {
    const repo = new InMemoryBacktestResultsRepository();

    await expect(
      repo.appendResults([newRecord(), newRecord({ totalTrades: -1 })])
    ).rejects.toBeInstanceOf(ValidationError);

    expect(repo.size).toBe(0);
  });

  it('hands out copies', async () => {
    const repo = new InMemoryBacktestResultsRepository();
    const [stored] = await repo.appendResults([newRecord()]);
    stored.winRate = 0;

    const [listed] = await repo.listResults();
    expect(listed.winRate).toBe(0.55);
  });

  it('continues ids after seeded records', async () => {
    const repo = new InMemoryBacktestResultsRepository([{ ...newRecord(), id: '1' }]);
    const [stored] = await repo.appendResults([newRecord()]);
    expect(stored.id).toBe('2');
  });
});
