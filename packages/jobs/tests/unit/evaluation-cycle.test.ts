import { describe, it, expect, vi } from 'vitest';
import {
  StrategyRegistry,
  createFixedClock,
  type BacktestResultsPort,
} from '@stratlab/core';
import {
  InMemoryBacktestResultsRepository,
  PostgresBacktestResultsRepository,
  type PostgresConnector,
} from '@stratlab/storage';
import { EvaluationCycleError } from '@stratlab/utils';
import { evaluationConfigSchema } from '../../src/config.js';
import { requiredHistory, runEvaluationCycle } from '../../src/evaluation-cycle.js';
import { logger } from '../../src/logger.js';
import {
  CYCLE_AT,
  FakePriceHistory,
  brokenStrategy,
  flatBars,
  silentStrategy,
  steadyLongStrategy,
} from '../helpers/fakes.js';

// 2 bars per day keeps the series short: 5d window = 10 bars, 4 bars forward
const config = evaluationConfigSchema.parse({
  backtest: {
    simulator: { maxBarsForward: 4 },
    runner: { barsPerDay: 2, horizonsDays: [5, 10], stepDays: 1 },
  },
  walkForward: { windowDays: 5, minOosTrades: 1 },
});

function setup(barCount: number, strategies = [steadyLongStrategy(), silentStrategy()]) {
  const priceHistory = new FakePriceHistory({ H1: flatBars(barCount) });
  const results = new InMemoryBacktestResultsRepository();
  const deps = {
    priceHistory,
    results,
    registry: new StrategyRegistry(strategies),
    clock: createFixedClock(CYCLE_AT),
    config,
  };
  return { priceHistory, results, deps };
}

describe('requiredHistory', () => {
  it('is one walk-forward window plus the forward horizon', () => {
    expect(requiredHistory(config)).toBe(14);
  });
});

describe('runEvaluationCycle', () => {
  it('persists horizon and walk-forward results for strategies that traded', async () => {
    const { priceHistory, results, deps } = setup(100);
    const bars = flatBars(100);

    const summary = await runEvaluationCycle(deps);

    expect(priceHistory.requests).toEqual([{ symbol: 'XAUUSD', timeframe: 'H1' }]);
    expect(summary).toMatchObject({ status: 'completed', recordsWritten: 3, failed: [] });

    const stored = await results.listResults();
    expect(
      stored.map((r) => [r.strategyName, r.windowDays, r.isWalkForward, r.totalTrades])
    ).toEqual([
      ['steady', 5, false, 43],
      ['steady', 10, false, 38],
      ['steady', 5, true, 3],
    ]);
    for (const record of stored) {
      expect(record).toMatchObject({
        timeframe: 'H1',
        startDate: bars[0].timestamp,
        endDate: bars[99].timestamp,
        spreadModel: 'session_aware',
        createdAt: CYCLE_AT,
      });
    }
  });

  it('stores the walk-forward verdict and leaves it off horizon records', async () => {
    const { results, deps } = setup(100);

    await runEvaluationCycle(deps);

    const [horizon] = await results.listResults({ isWalkForward: false });
    const [walkForward] = await results.listResults({ isWalkForward: true });
    expect(horizon.isOverfitted).toBeNull();
    // No winners in sample, so both efficiency ratios are undefined
    expect(walkForward).toMatchObject({
      isOverfitted: false,
      walkForwardEfficiency: null,
      wfeWinRate: null,
      wfeProfitFactor: null,
      winRate: 0,
    });
  });

  it('reports strategies without trades as not persisted', async () => {
    const { deps } = setup(100);

    const summary = await runEvaluationCycle(deps);

    if (summary.status !== 'completed') throw new Error('expected a completed cycle');
    const silent = summary.evaluations.find((e) => e.strategyName === 'silent');
    expect(silent?.horizons).toEqual([
      { windowDays: 5, totalTrades: 0, persisted: false },
      { windowDays: 10, totalTrades: 0, persisted: false },
    ]);
    expect(silent?.walkForwardPersisted).toBe(false);
  });

  it('skips the cycle when history is too short', async () => {
    const { results, deps } = setup(13);
    const warnSpy = vi.spyOn(logger, 'warn');

    const summary = await runEvaluationCycle(deps);

    expect(summary).toEqual({
      status: 'insufficient_history',
      cycleAt: CYCLE_AT,
      barsRead: 13,
      required: 14,
    });
    expect(results.size).toBe(0);
    expect(warnSpy).toHaveBeenCalledWith(
      'Insufficient bar history; skipping evaluation cycle',
      expect.objectContaining({ have: 13, need: 14 })
    );
  });

  it('aborts before writing when prices cannot be read', async () => {
    const { priceHistory, results, deps } = setup(100);
    priceHistory.failure = new Error('connection refused');

    const error = await runEvaluationCycle(deps).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EvaluationCycleError);
    expect(error).toMatchObject({
      stage: 'read_prices',
      message: 'Evaluation cycle aborted at read_prices: connection refused',
    });
    expect(results.size).toBe(0);
  });

  it('aborts when the results cannot be persisted', async () => {
    const { deps } = setup(100);
    const failing: BacktestResultsPort = {
      appendResults: async () => {
        throw new Error('disk full');
      },
      listResults: async () => [],
    };

    await expect(runEvaluationCycle({ ...deps, results: failing })).rejects.toMatchObject({
      stage: 'persist_results',
    });
  });

  it('rolls back a partially inserted batch', async () => {
    const statements: string[] = [];
    const connector: PostgresConnector = {
      connect: async () => ({
        query: async (text) => {
          statements.push(text.trim().split(/\s+/)[0]);
          if (text.startsWith('INSERT')) {
            throw new Error('constraint violation');
          }
          return { rows: [] };
        },
        release: () => undefined,
      }),
    };
    const { deps } = setup(100);

    const error = await runEvaluationCycle({
      ...deps,
      results: new PostgresBacktestResultsRepository(connector),
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EvaluationCycleError);
    expect(statements).toEqual(['BEGIN', 'INSERT', 'ROLLBACK']);
  });

  it('skips a strategy whose evaluation throws and keeps the others', async () => {
    const { results, deps } = setup(100, [brokenStrategy(), steadyLongStrategy()]);

    const summary = await runEvaluationCycle(deps);

    expect(summary).toMatchObject({ status: 'completed', failed: ['broken'], recordsWritten: 3 });
    const stored = await results.listResults();
    expect(new Set(stored.map((r) => r.strategyName))).toEqual(new Set(['steady']));
  });
});
