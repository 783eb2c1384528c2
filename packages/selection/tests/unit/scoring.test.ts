import { describe, it, expect } from 'vitest';
import {
  degradationConfigSchema,
  liveBlendConfigSchema,
  metricWeightsSchema,
  regimePenaltiesSchema,
} from '../../src/config.js';
import {
  blendLiveScore,
  computeCompositeScores,
  normalizeMetric,
  regimeMultiplier,
  scoreLivePerformance,
} from '../../src/scoring.js';
import { checkDegradation } from '../../src/degradation.js';
import { resultRecord } from '../helpers/fixtures.js';

const weights = metricWeightsSchema.parse({});
const live = liveBlendConfigSchema.parse({});

describe('normalizeMetric', () => {
  it('maps to [0, 1] by min and max', () => {
    expect(normalizeMetric([2, 4, 6])).toEqual([0, 0.5, 1]);
  });

  it('maps a single value or a flat range to 0.5', () => {
    expect(normalizeMetric([3])).toEqual([0.5]);
    expect(normalizeMetric([3, 3])).toEqual([0.5, 0.5]);
  });
});

describe('computeCompositeScores', () => {
  it('scores a lone strategy at 0.5', () => {
    expect(computeCompositeScores([resultRecord()], weights)[0]).toBeCloseTo(0.5, 10);
  });

  it('inverts drawdown so the smaller drawdown scores higher', () => {
    const [better, worse] = computeCompositeScores(
      [
        resultRecord({ strategyName: 'a', maxDrawdown: 50 }),
        resultRecord({ strategyName: 'b', maxDrawdown: 150 }),
      ],
      weights
    );
    // every other metric is flat at 0.5
    expect(better).toBeCloseTo(0.85 * 0.5 + 0.15, 10);
    expect(worse).toBeCloseTo(0.85 * 0.5, 10);
  });

  it('gives 1 and 0 to strategies that dominate each other', () => {
    const scores = computeCompositeScores(
      [
        resultRecord({ winRate: 0.7, profitFactor: 2, sharpeRatio: 2, expectancy: 8, maxDrawdown: 40 }),
        resultRecord({ winRate: 0.5, profitFactor: 1.1, sharpeRatio: 0.5, expectancy: 2, maxDrawdown: 90 }),
      ],
      weights
    );
    expect(scores[0]).toBeCloseTo(1, 10);
    expect(scores[1]).toBeCloseTo(0, 10);
  });
});

describe('regimeMultiplier', () => {
  const penalties = regimePenaltiesSchema.parse(undefined);

  it('penalises breakout strategies in high volatility', () => {
    expect(regimeMultiplier('breakout_expansion', 'high', penalties)).toBe(0.9);
    expect(regimeMultiplier('breakout_expansion', 'low', penalties)).toBe(1);
  });

  it('penalises trend strategies in low volatility', () => {
    expect(regimeMultiplier('trend_continuation', 'low', penalties)).toBe(0.9);
  });

  it('leaves unlisted strategies alone', () => {
    expect(regimeMultiplier('ema_momentum', 'high', penalties)).toBe(1);
  });
});

describe('live blending', () => {
  const perf = {
    strategyName: 'alpha',
    winRate: 0.6,
    profitFactor: 1.5,
    avgRiskReward: 2,
    totalSignals: 10,
  };

  it('scores live performance with capped profit factor and risk:reward', () => {
    // 0.4 * 0.6 + 0.35 * 0.5 + 0.25 * 0.4
    expect(scoreLivePerformance(perf, live)).toBeCloseTo(0.515, 10);
    expect(scoreLivePerformance({ ...perf, profitFactor: 9, avgRiskReward: 12 }, live)).toBeCloseTo(
      0.4 * 0.6 + 0.35 + 0.25,
      10
    );
  });

  it('blends 70/30 with enough live signals', () => {
    expect(blendLiveScore(0.5, perf, live)).toBeCloseTo(0.7 * 0.5 + 0.3 * 0.515, 10);
  });

  it('does not blend below the signal minimum or without live data', () => {
    expect(blendLiveScore(0.5, { ...perf, totalSignals: 4 }, live)).toBeNull();
    expect(blendLiveScore(0.5, undefined, live)).toBeNull();
  });
});

describe('checkDegradation', () => {
  const config = degradationConfigSchema.parse({});

  it('flags a profit factor below 1.0', () => {
    expect(checkDegradation(resultRecord({ profitFactor: 0.8 }), null, config)).toEqual({
      isDegraded: true,
      reason: 'Profit factor 0.8000 below 1.0',
    });
  });

  it('flags a win-rate drop larger than 0.15 from the baseline', () => {
    const baseline = resultRecord({ id: 'old', winRate: 0.7, createdAt: 1 });
    const current = resultRecord({ id: 'new', winRate: 0.5, createdAt: 2 });
    expect(checkDegradation(current, baseline, config)).toEqual({
      isDegraded: true,
      reason: 'Win rate dropped 0.2000 (from 0.7000 to 0.5000)',
    });
  });

  it('joins several reasons', () => {
    const baseline = resultRecord({ id: 'old', winRate: 0.7 });
    const current = resultRecord({ id: 'new', winRate: 0.5, profitFactor: 0.9 });
    expect(checkDegradation(current, baseline, config).reason).toBe(
      'Profit factor 0.9000 below 1.0; Win rate dropped 0.2000 (from 0.7000 to 0.5000)'
    );
  });

  it('ignores a baseline that is the current record', () => {
    const current = resultRecord({ winRate: 0.5 });
    expect(checkDegradation(current, current, config)).toEqual({ isDegraded: false, reason: null });
  });

  it('accepts a drop within the threshold', () => {
    const baseline = resultRecord({ id: 'old', winRate: 0.75 });
    const current = resultRecord({ id: 'new', winRate: 0.625 });
    expect(checkDegradation(current, baseline, config).isDegraded).toBe(false);
  });
});
