import { describe, it, expect, vi } from 'vitest';
import { EMPTY_METRICS } from '@stratlab/core';
import { runnerConfigSchema, simulatorConfigSchema, walkForwardConfigSchema } from '../../src/config.js';
import { logger } from '../../src/logger.js';
import { BacktestRunner } from '../../src/runner/backtest-runner.js';
import { FixedSpreadModel } from '../../src/sim/spread-model.js';
import {
  averageEfficiency,
  computeEfficiency,
  formatWalkForwardResult,
  splitChronologically,
  WalkForwardValidator,
} from '../../src/walk-forward/walk-forward-validator.js';
import { alwaysLongStrategy, barsFromCloses, linearCloses } from '../helpers/fixtures.js';

function validator(): WalkForwardValidator {
  const runner = new BacktestRunner({
    spreadModel: new FixedSpreadModel(0),
    simulator: simulatorConfigSchema.parse({ maxBarsForward: 30 }),
    runner: runnerConfigSchema.parse({ barsPerDay: 1, horizonsDays: [5] }),
  });
  return new WalkForwardValidator(runner, walkForwardConfigSchema.parse({ windowDays: 5 }));
}

describe('splitChronologically', () => {
  it('splits at floor(n * 0.8) without reordering', () => {
    const bars = barsFromCloses(linearCloses(11, 100, 1));
    const split = splitChronologically(bars);

    expect(split.splitIndex).toBe(8);
    expect(split.inSample).toEqual(bars.slice(0, 8));
    expect(split.outOfSample).toEqual(bars.slice(8));
  });
});

describe('computeEfficiency', () => {
  it('divides out-of-sample by in-sample and nulls a zero baseline', () => {
    const efficiency = computeEfficiency(
      { ...EMPTY_METRICS, winRate: 0.6, profitFactor: 0 },
      { ...EMPTY_METRICS, winRate: 0.3, profitFactor: 1.2 }
    );
    expect(efficiency).toEqual({ winRate: 0.5, profitFactor: null });
  });

  it('averages only the non-null ratios', () => {
    expect(averageEfficiency({ winRate: 0.5, profitFactor: null })).toBe(0.5);
    expect(averageEfficiency({ winRate: 0.5, profitFactor: 1 })).toBe(0.75);
    expect(averageEfficiency({ winRate: null, profitFactor: null })).toBeNull();
  });
});

describe('WalkForwardValidator', () => {
  it('passes a strategy that performs the same out of sample', () => {
    const bars = barsFromCloses(linearCloses(200, 100, 1));
    const result = validator().validate(alwaysLongStrategy(), bars);

    expect(result.status).toBe('validated');
    expect(result.splitIndex).toBe(160);
    expect(result.inSample.totalTrades).toBe(125);
    expect(result.outOfSample.totalTrades).toBe(5);
    expect(result.efficiency).toEqual({ winRate: 1, profitFactor: 1 });
    expect(result.averageEfficiency).toBe(1);
    expect(result.isOverfitted).toBe(false);
    expect(result.inSampleRange).toEqual({ start: bars[0].timestamp, end: bars[159].timestamp });
    expect(result.outOfSampleRange).toEqual({
      start: bars[160].timestamp,
      end: bars[199].timestamp,
    });
  });

  it('flags a strategy whose out-of-sample performance collapses', () => {
    // rises for 160 bars, then falls: every out-of-sample long is stopped out
    const closes = [...linearCloses(160, 100, 1), ...linearCloses(40, 258, -1)];
    const result = validator().validate(alwaysLongStrategy(), barsFromCloses(closes));

    expect(result.status).toBe('validated');
    expect(result.inSample.winRate).toBe(1);
    expect(result.outOfSample.winRate).toBe(0);
    expect(result.efficiency).toEqual({ winRate: 0, profitFactor: 0 });
    expect(result.isOverfitted).toBe(true);
  });

  it('returns insufficient_data instead of a verdict with too few out-of-sample trades', () => {
    const warn = vi.spyOn(logger, 'warn');
    // out-of-sample half (20 bars) is shorter than window + maxBarsForward
    const bars = barsFromCloses(linearCloses(100, 100, 1));
    const result = validator().validate(alwaysLongStrategy(), bars);

    expect(result.status).toBe('insufficient_data');
    expect(result.isOverfitted).toBe(false);
    expect(result.efficiency).toEqual({ winRate: null, profitFactor: null });
    expect(result.averageEfficiency).toBeNull();
    expect(result.outOfSample.totalTrades).toBe(0);
    expect(warn).toHaveBeenCalledWith(
      'Insufficient out-of-sample trades; skipping overfitting detection',
      expect.objectContaining({ outOfSampleTrades: 0, minOosTrades: 5 })
    );
  });
});

describe('formatWalkForwardResult', () => {
  it('summarizes the verdict and ratios', () => {
    const text = formatWalkForwardResult({
      strategyName: 'always_long',
      windowDays: 30,
      status: 'validated',
      inSample: { ...EMPTY_METRICS, totalTrades: 40, winRate: 0.6, profitFactor: 1.8 },
      outOfSample: { ...EMPTY_METRICS, totalTrades: 10, winRate: 0.2, profitFactor: 0.5 },
      isOverfitted: true,
      efficiency: { winRate: 0.3333, profitFactor: null },
      averageEfficiency: 0.3333,
      splitIndex: 800,
      inSampleRange: null,
      outOfSampleRange: null,
    });

    expect(text.split('\n')).toEqual([
      'Walk-forward always_long (30d): OVERFITTED',
      '  in-sample:     trades=40 winRate=0.6 profitFactor=1.8',
      '  out-of-sample: trades=10 winRate=0.2 profitFactor=0.5',
      '  efficiency:    winRate=0.333 profitFactor=n/a',
    ]);
  });
});
