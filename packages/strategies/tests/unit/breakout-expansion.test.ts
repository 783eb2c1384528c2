import { describe, it, expect } from 'vitest';
import { assertValidCandidate } from '@stratlab/core';
import {
  compressionRun,
  createBreakoutExpansionStrategy,
  rollingMean,
} from '../../src/breakout-expansion.js';
import { compressionThen } from '../helpers/bars.js';

describe('rollingMean', () => {
  it('averages the trailing period once it is full', () => {
    expect(rollingMean([null, 1, 2, 3, 4], 2)).toEqual([null, null, 1.5, 2.5, 3.5]);
  });

  it('restarts after a gap', () => {
    expect(rollingMean([1, 2, null, 3, 4], 2)).toEqual([null, 1.5, null, null, 3.5]);
  });
});

describe('compressionRun', () => {
  it('counts consecutive compressed bars back from the index', () => {
    expect(compressionRun([1, 1, 1, 1], [4, 4, 4, 4], 3, 0.5)).toBe(4);
    expect(compressionRun([1, 3, 1, 1], [4, 4, 4, 4], 3, 0.5)).toBe(2);
    expect(compressionRun([1, null, 1], [4, 4, 4], 2, 0.5)).toBe(1);
  });
});

describe('breakout_expansion', () => {
  const strategy = createBreakoutExpansionStrategy();

  it('needs ATR, its average and a consolidation worth of bars', () => {
    expect(strategy.minCandles).toBe(74);
    expect(strategy.analyze(compressionThen({ open: 100, high: 100, low: 100, close: 100 }).slice(0, 70)))
      .toEqual({ status: 'insufficient_history', required: 74, received: 70 });
  });

  it('goes long when price expands above the consolidation range', () => {
    // Last bar opens at 14:00 UTC
    const result = strategy.analyze(
      compressionThen({ open: 100, high: 115.2, low: 99.9, close: 115 })
    );

    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.candidates).toHaveLength(1);
    const [candidate] = result.candidates;
    expect(candidate).toMatchObject({
      strategyName: 'breakout_expansion',
      direction: 'long',
      entryPrice: 115,
      stopLoss: 99.9,
      takeProfit1: 115.2,
      takeProfit2: 115.4,
      confidence: 60,
      session: 'london',
    });
    expect(candidate.reasoning.startsWith('Bullish breakout from ')).toBe(true);
    expect(() => assertValidCandidate(candidate)).not.toThrow();
  });

  it('goes short when price expands below the range', () => {
    const result = strategy.analyze(
      compressionThen({ open: 100, high: 100.1, low: 84.8, close: 85 })
    );

    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.candidates[0]).toMatchObject({
      direction: 'short',
      entryPrice: 85,
      stopLoss: 100.1,
      takeProfit1: 84.8,
      takeProfit2: 84.6,
    });
  });

  it('labels the candidate with the first active session of the configured table', () => {
    const labelled = createBreakoutExpansionStrategy({}, { sessions: { afternoon: [13, 15] } });
    const result = labelled.analyze(
      compressionThen({ open: 100, high: 115.2, low: 99.9, close: 115 })
    );

    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.candidates[0].session).toBe('afternoon');
  });

  it('stays flat while price remains inside the range', () => {
    const result = strategy.analyze(
      compressionThen({ open: 100, high: 100.1, low: 99.9, close: 100 })
    );
    expect(result).toEqual({ status: 'ok', candidates: [] });
  });
});
