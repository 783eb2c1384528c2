/**
 * End-to-end scenarios over the default session spreads and simulator limits
 */

import { describe, it, expect } from 'vitest';
import { runnerConfigSchema } from '../../src/config.js';
import { BacktestRunner } from '../../src/runner/backtest-runner.js';
import { simulateTrade } from '../../src/sim/trade-simulator.js';
import { WalkForwardValidator } from '../../src/walk-forward/walk-forward-validator.js';
import { alwaysLongStrategy, bar, barsFromCloses, linearCloses, longCandidate } from '../helpers/fixtures.js';

// one bar per "day" keeps the windows small; spread model and 72-bar ceiling stay default
const runner = new BacktestRunner({
  runner: runnerConfigSchema.parse({ barsPerDay: 1, horizonsDays: [5] }),
});

describe('backtest scenarios', () => {
  it('wins every trade on a monotonically rising series', () => {
    const bars = barsFromCloses(linearCloses(100, 100, 1));
    const [result] = runner.runFull(alwaysLongStrategy(), bars);

    // 100 - 5 - 72 windows
    expect(result.metrics.totalTrades).toBe(23);
    expect(result.trades.every((t) => t.outcome === 'TP1_HIT')).toBe(true);
    expect(result.metrics.winRate).toBe(1);
    expect(result.metrics.profitFactor).toBe(9999.9999);
  });

  it('loses every trade on a monotonically falling series', () => {
    const bars = barsFromCloses(linearCloses(100, 300, -1));
    const [result] = runner.runFull(alwaysLongStrategy(), bars);

    expect(result.metrics.totalTrades).toBe(23);
    expect(result.trades.every((t) => t.outcome === 'SL_HIT')).toBe(true);
    expect(result.metrics.winRate).toBe(0);
    expect(result.metrics.profitFactor).toBe(0);
    expect(result.metrics.expectancy).toBeLessThan(0);
  });

  it('treats a bar that crosses both stop and target as a stop-out', () => {
    const candidate = longCandidate({ stopLoss: 90, takeProfit1: 120, takeProfit2: 140 });
    const trade = simulateTrade(candidate, [bar(1, 100, 125, 85, 110)], 0.3);

    expect(trade.outcome).toBe('SL_HIT');
    expect(trade.exitPrice).toBe(90);
  });

  it('reports insufficient data rather than overfitting with too few out-of-sample trades', () => {
    const bars = barsFromCloses(linearCloses(100, 100, 1));
    const result = new WalkForwardValidator(runner).validate(alwaysLongStrategy(), bars, 5);

    expect(result.status).toBe('insufficient_data');
    expect(result.isOverfitted).toBe(false);
    expect(result.inSample.totalTrades).toBe(3);
  });
});
