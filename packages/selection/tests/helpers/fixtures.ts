import type { BacktestResultRecord, Candle } from '@stratlab/core';

/** 2024-01-01T00:00:00Z */
export const BASE_TS = 1_704_067_200;

export function resultRecord(overrides: Partial<BacktestResultRecord> = {}): BacktestResultRecord {
  return {
    id: 'r-1',
    strategyName: 'alpha',
    timeframe: 'H1',
    windowDays: 30,
    startDate: BASE_TS,
    endDate: BASE_TS + 86_400 * 90,
    winRate: 0.6,
    profitFactor: 1.5,
    sharpeRatio: 1,
    maxDrawdown: 100,
    expectancy: 5,
    totalTrades: 80,
    isWalkForward: false,
    isOverfitted: null,
    walkForwardEfficiency: null,
    wfeWinRate: null,
    wfeProfitFactor: null,
    spreadModel: 'session_aware',
    createdAt: 1_000,
    ...overrides,
  };
}

/**
 * Bars centred on 100 whose high-low range is given per bar
 */
export function barsWithRanges(ranges: readonly number[], hours: number = 1): Candle[] {
  return ranges.map((range, i) => ({
    timestamp: BASE_TS + i * 3600 * hours,
    open: 100,
    high: 100 + range / 2,
    low: 100 - range / 2,
    close: 100,
    volume: 100,
  }));
}

export function trendingBars(count: number, step: number, hours: number = 4): Candle[] {
  return Array.from({ length: count }, (_, i) => {
    const close = 1000 + i * step;
    return {
      timestamp: BASE_TS + i * 3600 * hours,
      open: close - step,
      high: Math.max(close, close - step) + 1,
      low: Math.min(close, close - step) - 1,
      close,
      volume: 100,
    };
  });
}

export const risingRanges = (count: number) => Array.from({ length: count }, (_, i) => i + 1);
export const fallingRanges = (count: number) => Array.from({ length: count }, (_, i) => count - i);
