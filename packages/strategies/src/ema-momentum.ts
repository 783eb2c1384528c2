/**
 * EMA Momentum
 *
 * Trend-following decision function evaluated on the last bar of the window:
 * - EMA(21) > EMA(50) > EMA(200) (or the reverse for shorts)
 * - EMA(21) and EMA(50) moved in the trend direction over the last 5 bars
 * - a candle body of at least 0.6 ATR closing beyond EMA(21) in that direction
 * - London or New York session
 *
 * Stop beyond the recent swing extreme padded by 1 ATR and capped at
 * 150 pips; targets at 1.5R and 3R.
 */

import {
  checkHistory,
  decided,
  type Candle,
  type DecisionResult,
  type Strategy,
  type TradeCandidate,
  type TradeDirection,
} from '@stratlab/core';
import {
  atr,
  closeSeries,
  ema,
  getActiveSessions,
  isInSession,
  type SessionWindow,
} from '@stratlab/backtest';
import { levelsFromRisk } from './levels.js';
import { resolveStrategyOptions, type StrategyOptions } from './options.js';
import { recentSwingHigh, recentSwingLow } from './swings.js';

export interface EmaMomentumParams {
  emaFast: number;
  emaMid: number;
  emaSlow: number;
  atrLength: number;
  bodyAtrMultiple: number;
  slAtrMultiple: number;
  tp1RiskMultiple: number;
  tp2RiskMultiple: number;
  slopeBars: number;
  swingOrder: number;
  swingLookback: number;
  baseConfidence: number;
  maxStopPips: number;
  pipSize: number;
}

export const EMA_MOMENTUM_DEFAULTS: EmaMomentumParams = {
  emaFast: 21,
  emaMid: 50,
  emaSlow: 200,
  atrLength: 14,
  bodyAtrMultiple: 0.6,
  slAtrMultiple: 1.0,
  tp1RiskMultiple: 1.5,
  tp2RiskMultiple: 3.0,
  slopeBars: 5,
  swingOrder: 5,
  swingLookback: 20,
  baseConfidence: 50,
  maxStopPips: 150,
  pipSize: 0.1,
};

export const EMA_MOMENTUM = 'ema_momentum';

interface EmaSnapshot {
  fast: number;
  mid: number;
  slow: number;
  atr: number;
}

/**
 * Additive 0-100 score: base plus 10 for each of wide EMA(21/50) separation,
 * close far from EMA(21), London/New York overlap and wide EMA(50/200)
 * separation.
 */
function confidenceFor(
  close: number,
  timestamp: number,
  snap: EmaSnapshot,
  params: EmaMomentumParams,
  sessions: Record<string, SessionWindow>
): number {
  let score = params.baseConfidence;
  if (Math.abs(snap.fast - snap.mid) > 1.0 * snap.atr) score += 10;
  if (Math.abs(close - snap.fast) > 0.3 * snap.atr) score += 10;
  if (isInSession(timestamp, 'overlap', sessions)) score += 10;
  if (Math.abs(snap.mid - snap.slow) > 2.0 * snap.atr) score += 10;
  return Math.min(score, 100);
}

function stopFor(
  direction: TradeDirection,
  window: readonly Candle[],
  index: number,
  entry: number,
  atrValue: number,
  params: EmaMomentumParams
): number {
  const start = Math.max(0, index - params.swingLookback);
  const recent = window.slice(start, index + 1);
  const maxDistance = params.maxStopPips * params.pipSize;

  if (direction === 'long') {
    const swing =
      recentSwingLow(window, index, params.swingLookback, params.swingOrder) ??
      Math.min(...recent.map((c) => c.low));
    const stop = swing - params.slAtrMultiple * atrValue;
    return entry - stop > maxDistance ? entry - maxDistance : stop;
  }

  const swing =
    recentSwingHigh(window, index, params.swingLookback, params.swingOrder) ??
    Math.max(...recent.map((c) => c.high));
  const stop = swing + params.slAtrMultiple * atrValue;
  return stop - entry > maxDistance ? entry + maxDistance : stop;
}

export function createEmaMomentumStrategy(
  overrides: Partial<EmaMomentumParams> = {},
  options: StrategyOptions = {}
): Strategy {
  const params: EmaMomentumParams = { ...EMA_MOMENTUM_DEFAULTS, ...overrides };
  const { timeframe, sessions } = resolveStrategyOptions(options);
  const minCandles = params.emaSlow;

  function analyze(window: readonly Candle[]): DecisionResult {
    const short = checkHistory(window, minCandles);
    if (short) {
      return short;
    }

    const closes = closeSeries(window);
    const fast = ema(closes, params.emaFast);
    const mid = ema(closes, params.emaMid);
    const slow = ema(closes, params.emaSlow);
    const atrSeries = atr(window, params.atrLength);

    const i = window.length - 1;
    const bar = window[i];
    const atrValue = atrSeries[i];
    const f = fast[i];
    const m = mid[i];
    const s = slow[i];
    const fPrev = fast[i - params.slopeBars];
    const mPrev = mid[i - params.slopeBars];

    if (
      atrValue === null ||
      atrValue <= 0 ||
      f === null ||
      m === null ||
      s === null ||
      fPrev === null ||
      mPrev === null
    ) {
      return decided([]);
    }

    if (
      !isInSession(bar.timestamp, 'london', sessions) &&
      !isInSession(bar.timestamp, 'new_york', sessions)
    ) {
      return decided([]);
    }

    if (Math.abs(bar.close - bar.open) < params.bodyAtrMultiple * atrValue) {
      return decided([]);
    }

    const bullish = f > m && m > s && f > fPrev && m > mPrev && bar.close > bar.open && bar.close > f;
    const bearish = f < m && m < s && f < fPrev && m < mPrev && bar.close < bar.open && bar.close < f;
    if (!bullish && !bearish) {
      return decided([]);
    }

    const direction: TradeDirection = bullish ? 'long' : 'short';
    const entry = bar.close;
    const stop = stopFor(direction, window, i, entry, atrValue, params);
    if (Math.abs(entry - stop) <= 0) {
      return decided([]);
    }

    const snap = { fast: f, mid: m, slow: s, atr: atrValue };
    const levels = levelsFromRisk(
      direction,
      entry,
      stop,
      params.tp1RiskMultiple,
      params.tp2RiskMultiple
    );
    const relation = bullish ? '>' : '<';

    const candidate: TradeCandidate = {
      strategyName: EMA_MOMENTUM,
      direction,
      ...levels,
      timestamp: bar.timestamp,
      confidence: confidenceFor(entry, bar.timestamp, snap, params, sessions),
      reasoning:
        `${bullish ? 'Bullish' : 'Bearish'} EMA momentum: EMA-${params.emaFast} (${f.toFixed(2)}) ` +
        `${relation} EMA-${params.emaMid} (${m.toFixed(2)}) ${relation} EMA-${params.emaSlow} ` +
        `(${s.toFixed(2)}). Strong ${bullish ? 'bullish' : 'bearish'} candle at ${entry.toFixed(2)}. ` +
        `SL at ${levels.stopLoss.toFixed(2)}, TP1 at ${levels.takeProfit1.toFixed(2)}.`,
      timeframe,
      session: getActiveSessions(bar.timestamp, sessions)[0],
    };

    return decided([candidate]);
  }

  return { name: EMA_MOMENTUM, minCandles, timeframe, analyze };
}
