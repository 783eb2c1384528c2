/**
 * Shared bar, candidate and strategy builders for backtest tests
 */

import {
  decided,
  type Candle,
  type SimulatedTrade,
  type Strategy,
  type TradeCandidate,
  type TradeOutcome,
} from '@stratlab/core';

/** 2024-01-01T00:00:00Z */
export const BASE_TS = 1_704_067_200;
export const HOUR = 3600;

export function bar(index: number, open: number, high: number, low: number, close: number): Candle {
  return { timestamp: BASE_TS + index * HOUR, open, high, low, close, volume: 100 };
}

/**
 * Hourly bars from a close path. Each bar opens at the previous close and
 * its range extends 0.5 beyond the body on both sides.
 */
export function barsFromCloses(closes: readonly number[]): Candle[] {
  return closes.map((close, i) => {
    const open = i === 0 ? close : closes[i - 1];
    return bar(i, open, Math.max(open, close) + 0.5, Math.min(open, close) - 0.5, close);
  });
}

export function linearCloses(count: number, start: number, step: number): number[] {
  return Array.from({ length: count }, (_, i) => start + i * step);
}

export function flatBars(count: number, price: number = 100): Candle[] {
  return Array.from({ length: count }, (_, i) => bar(i, price, price + 0.5, price - 0.5, price));
}

export function longCandidate(overrides: Partial<TradeCandidate> = {}): TradeCandidate {
  return {
    strategyName: 'test_strategy',
    direction: 'long',
    entryPrice: 100,
    stopLoss: 99,
    takeProfit1: 102,
    takeProfit2: 104,
    timestamp: BASE_TS,
    confidence: 60,
    reasoning: 'test',
    ...overrides,
  };
}

export function shortCandidate(overrides: Partial<TradeCandidate> = {}): TradeCandidate {
  return {
    strategyName: 'test_strategy',
    direction: 'short',
    entryPrice: 100,
    stopLoss: 101,
    takeProfit1: 98,
    takeProfit2: 96,
    timestamp: BASE_TS,
    confidence: 60,
    reasoning: 'test',
    ...overrides,
  };
}

/**
 * Strategy that goes long on the last bar of every window:
 * stop 10 below the close, TP1 20 above, TP2 40 above.
 */
export function alwaysLongStrategy(name: string = 'always_long'): Strategy {
  return {
    name,
    minCandles: 1,
    timeframe: 'H1',
    analyze: (window) => {
      const last = window[window.length - 1];
      return decided([
        longCandidate({
          strategyName: name,
          entryPrice: last.close,
          stopLoss: last.close - 10,
          takeProfit1: last.close + 20,
          takeProfit2: last.close + 40,
          timestamp: last.timestamp,
        }),
      ]);
    },
  };
}

export function trade(
  outcome: TradeOutcome,
  pnlPips: number,
  timestamp: number = BASE_TS
): SimulatedTrade {
  return {
    candidate: longCandidate({ timestamp }),
    outcome,
    exitPrice: 100,
    pnlPips,
    barsHeld: 1,
    spreadCost: 0,
    exitTimestamp: timestamp + HOUR,
  };
}
