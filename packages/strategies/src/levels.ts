import type { TradeDirection } from '@stratlab/core';

export function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}

export interface TradeLevels {
  entryPrice: number;
  stopLoss: number;
  takeProfit1: number;
  takeProfit2: number;
}

/**
 * Entry, stop and two targets at fixed risk multiples, rounded to cents
 */
export function levelsFromRisk(
  direction: TradeDirection,
  entry: number,
  stop: number,
  tp1Multiple: number,
  tp2Multiple: number
): TradeLevels {
  const risk = Math.abs(entry - stop);
  const sign = direction === 'long' ? 1 : -1;
  return {
    entryPrice: roundPrice(entry),
    stopLoss: roundPrice(stop),
    takeProfit1: roundPrice(entry + sign * tp1Multiple * risk),
    takeProfit2: roundPrice(entry + sign * tp2Multiple * risk),
  };
}
