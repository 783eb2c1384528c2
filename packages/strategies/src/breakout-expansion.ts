/**
 * Breakout Expansion
 *
 * Volatility-compression breakout evaluated on the last bar of the window.
 * A consolidation is a run of bars whose ATR sits below half its 50-bar
 * average; the last bar must end that run by closing outside the
 * consolidation range. Stop at the far side of the range (its midpoint when
 * the range is wider than 3 ATR); targets at one and two range heights.
 */

import {
  checkHistory,
  decided,
  utcHour,
  type Candle,
  type DecisionResult,
  type Strategy,
  type TradeCandidate,
  type TradeDirection,
} from '@stratlab/core';
import { atr, getActiveSessions, isHourInWindow } from '@stratlab/backtest';
import { roundPrice } from './levels.js';
import { resolveStrategyOptions, type StrategyOptions } from './options.js';

export interface BreakoutExpansionParams {
  atrLength: number;
  atrMaLength: number;
  compression: number;
  minConsolidationBars: number;
  volumeMultiple: number;
  wideRangeAtrMultiple: number;
  breakoutBodyAtr: number;
  baseConfidence: number;
  /** UTC hours [start, end) counted as the London open */
  londonOpen: [number, number];
}

export const BREAKOUT_EXPANSION_DEFAULTS: BreakoutExpansionParams = {
  atrLength: 14,
  atrMaLength: 50,
  compression: 0.5,
  minConsolidationBars: 10,
  volumeMultiple: 1.5,
  wideRangeAtrMultiple: 3.0,
  breakoutBodyAtr: 1.5,
  baseConfidence: 50,
  londonOpen: [7, 9],
};

export const BREAKOUT_EXPANSION = 'breakout_expansion';

/**
 * Trailing mean over a series with warmup nulls; null until `period`
 * consecutive values are available
 */
export function rollingMean(
  values: ReadonlyArray<number | null>,
  period: number
): Array<number | null> {
  const out: Array<number | null> = new Array(values.length).fill(null);
  let run = 0;
  let sum = 0;

  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (v === null) {
      run = 0;
      sum = 0;
      continue;
    }
    run++;
    sum += v;
    if (run > period) {
      const dropped = values[i - period];
      sum -= dropped ?? 0;
    }
    if (run >= period) {
      out[i] = sum / period;
    }
  }

  return out;
}

/**
 * Number of consecutive compressed bars ending at `index`
 */
export function compressionRun(
  atrSeries: ReadonlyArray<number | null>,
  atrMa: ReadonlyArray<number | null>,
  index: number,
  compression: number
): number {
  let run = 0;
  for (let j = index; j >= 0; j--) {
    const a = atrSeries[j];
    const ma = atrMa[j];
    if (a === null || ma === null || ma <= 0 || !(a < compression * ma)) {
      break;
    }
    run++;
  }
  return run;
}

function volumeConfirms(
  window: readonly Candle[],
  start: number,
  index: number,
  multiple: number
): boolean {
  const consolidation = window.slice(start, index);
  if (window.every((c) => c.volume === 0) || consolidation.length === 0) {
    return false;
  }
  const average = consolidation.reduce((acc, c) => acc + c.volume, 0) / consolidation.length;
  return average > 0 && window[index].volume > multiple * average;
}

export function createBreakoutExpansionStrategy(
  overrides: Partial<BreakoutExpansionParams> = {},
  options: StrategyOptions = {}
): Strategy {
  const params: BreakoutExpansionParams = { ...BREAKOUT_EXPANSION_DEFAULTS, ...overrides };
  const { timeframe, sessions } = resolveStrategyOptions(options);
  const minCandles = params.atrLength + params.atrMaLength + params.minConsolidationBars;

  function analyze(window: readonly Candle[]): DecisionResult {
    const short = checkHistory(window, minCandles);
    if (short) {
      return short;
    }

    const atrSeries = atr(window, params.atrLength);
    const atrMa = rollingMean(atrSeries, params.atrMaLength);
    const i = window.length - 1;
    const bar = window[i];
    const atrValue = atrSeries[i];
    const atrMaValue = atrMa[i];

    if (atrValue === null || atrMaValue === null || atrMaValue <= 0) {
      return decided([]);
    }
    // The breakout bar itself must have left the compression
    if (atrValue < params.compression * atrMaValue) {
      return decided([]);
    }

    const consolidationBars = compressionRun(atrSeries, atrMa, i - 1, params.compression);
    if (consolidationBars < params.minConsolidationBars) {
      return decided([]);
    }

    const start = i - consolidationBars;
    const range = window.slice(start, i);
    const rangeHigh = Math.max(...range.map((c) => c.high));
    const rangeLow = Math.min(...range.map((c) => c.low));
    const height = rangeHigh - rangeLow;
    if (height <= 0) {
      return decided([]);
    }

    let direction: TradeDirection;
    if (bar.close > rangeHigh) {
      direction = 'long';
    } else if (bar.close < rangeLow) {
      direction = 'short';
    } else {
      return decided([]);
    }

    const entry = bar.close;
    const wide = height > params.wideRangeAtrMultiple * atrValue;
    const sign = direction === 'long' ? 1 : -1;
    const stop = wide ? (rangeHigh + rangeLow) / 2 : direction === 'long' ? rangeLow : rangeHigh;

    let confidence = params.baseConfidence;
    if (consolidationBars > 20) confidence += 10;
    if (Math.abs(bar.close - bar.open) > params.breakoutBodyAtr * atrValue) confidence += 10;
    if (volumeConfirms(window, start, i, params.volumeMultiple)) confidence += 10;
    if (isHourInWindow(utcHour(bar.timestamp), params.londonOpen)) confidence += 10;

    const candidate: TradeCandidate = {
      strategyName: BREAKOUT_EXPANSION,
      direction,
      entryPrice: roundPrice(entry),
      stopLoss: roundPrice(stop),
      takeProfit1: roundPrice(entry + sign * height),
      takeProfit2: roundPrice(entry + sign * 2 * height),
      timestamp: bar.timestamp,
      confidence: Math.min(confidence, 100),
      reasoning:
        `${direction === 'long' ? 'Bullish' : 'Bearish'} breakout from ${consolidationBars}-bar ` +
        `consolidation range (${rangeLow.toFixed(2)}-${rangeHigh.toFixed(2)}). ` +
        `Entry at ${entry.toFixed(2)}, SL at ${stop.toFixed(2)}.`,
      timeframe,
      session: getActiveSessions(bar.timestamp, sessions)[0],
    };

    return decided([candidate]);
  }

  return { name: BREAKOUT_EXPANSION, minCandles, timeframe, analyze };
}
