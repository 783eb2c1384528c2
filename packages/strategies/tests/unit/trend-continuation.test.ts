import { describe, it, expect } from 'vitest';
import { assertValidCandidate } from '@stratlab/core';
import { createTrendContinuationStrategy } from '../../src/trend-continuation.js';
import { BASE_TS, HOUR, pullbackThenConfirm, rallyThenConfirm } from '../helpers/bars.js';

describe('trend_continuation', () => {
  const strategy = createTrendContinuationStrategy();

  it('needs the slow EMA on the pullback bar plus the confirmation bar', () => {
    expect(strategy.minCandles).toBe(201);
    expect(strategy.analyze(pullbackThenConfirm().slice(0, 200))).toEqual({
      status: 'insufficient_history',
      required: 201,
      received: 200,
    });
  });

  it('buys the confirmation after a pullback to EMA-50 in an uptrend', () => {
    const result = strategy.analyze(pullbackThenConfirm());

    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.candidates).toHaveLength(1);
    const [candidate] = result.candidates;

    // ATR 41.25/14 on the pullback bar: stop 1228 - 1.5 ATR, TP1 at 2R,
    // TP2 at the 1253.25 swing high ahead of 3R
    expect(candidate).toMatchObject({
      strategyName: 'trend_continuation',
      direction: 'long',
      entryPrice: 1231,
      stopLoss: 1223.58,
      takeProfit1: 1245.84,
      takeProfit2: 1253.25,
      timestamp: BASE_TS + 255 * HOUR,
      confidence: 70,
      timeframe: 'H1',
      session: 'london',
    });
    expect(candidate.reasoning).toBe(
      'Bullish trend continuation: EMA-50 (1228.52) above EMA-200 (1154.25), ' +
        'pullback to EMA-50 zone, momentum confirmation candle. ' +
        'Entry at 1231.00, SL below pullback low at 1223.58.'
    );
    expect(() => assertValidCandidate(candidate)).not.toThrow();
  });

  it('sells the confirmation after a rally to EMA-50 in a downtrend', () => {
    const result = strategy.analyze(rallyThenConfirm());

    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.candidates).toHaveLength(1);
    expect(result.candidates[0]).toMatchObject({
      direction: 'short',
      entryPrice: 1769,
      stopLoss: 1776.42,
      takeProfit1: 1754.16,
      takeProfit2: 1746.75,
      confidence: 70,
    });
    expect(() => assertValidCandidate(result.candidates[0])).not.toThrow();
  });

  it('stays flat when the confirmation does not clear the pullback high', () => {
    expect(strategy.analyze(pullbackThenConfirm(1230.4))).toEqual({
      status: 'ok',
      candidates: [],
    });
  });

  it('reads its session filter from the configured session table', () => {
    const nightOnly = createTrendContinuationStrategy(
      {},
      { sessions: { asian: [23, 8], london: [0, 2], new_york: [2, 4], overlap: [2, 2] } }
    );
    expect(nightOnly.analyze(pullbackThenConfirm())).toEqual({ status: 'ok', candidates: [] });
  });
});
