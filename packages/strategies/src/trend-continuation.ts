/**
 * Trend Continuation
 *
 * EMA-trend pullback, decided on the last bar of the window. The bar before
 * it is the pullback bar: EMA(50) and EMA(200) at least half an ATR apart, a
 * London or New York hour, a close back inside EMA(50) ± 1 ATR after one of
 * the preceding closes sat beyond that zone. The last bar confirms by closing
 * in the trend direction past the pullback bar's extreme.
 *
 * Stop beyond the pullback extreme by 1.5 ATR (never nearer than 1.5 ATR),
 * TP1 at 2R, TP2 at the nearest earlier swing past TP1 or 3R.
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
  vwap,
} from '@stratlab/backtest';
import { roundPrice } from './levels.js';
import { resolveStrategyOptions, type StrategyOptions } from './options.js';
import { swingHighIndices, swingLowIndices } from './swings.js';

export interface TrendContinuationParams {
  emaFast: number;
  emaSlow: number;
  atrLength: number;
  pullbackAtrMultiple: number;
  slAtrMultiple: number;
  tp1RiskMultiple: number;
  tp2RiskMultiple: number;
  pullbackLookback: number;
  /** Minimum EMA separation, in ATRs, that counts as a trend */
  trendAtrMultiple: number;
  /** Bars back the EMA separation is compared against */
  spreadLookback: number;
  swingOrder: number;
  baseConfidence: number;
}

export const TREND_CONTINUATION_DEFAULTS: TrendContinuationParams = {
  emaFast: 50,
  emaSlow: 200,
  atrLength: 14,
  pullbackAtrMultiple: 1.0,
  slAtrMultiple: 1.5,
  tp1RiskMultiple: 2.0,
  tp2RiskMultiple: 3.0,
  pullbackLookback: 5,
  trendAtrMultiple: 0.5,
  spreadLookback: 10,
  swingOrder: 5,
  baseConfidence: 50,
};

export const TREND_CONTINUATION = 'trend_continuation';

/**
 * Nearest swing extreme beyond `entry` among swings before `before`:
 * the lowest swing high above a long entry, the highest swing low below a
 * short one
 */
function swingTarget(
  direction: TradeDirection,
  window: readonly Candle[],
  before: number,
  entry: number,
  order: number
): number | null {
  if (direction === 'long') {
    const highs = swingHighIndices(window, order)
      .filter((j) => j < before)
      .map((j) => window[j].high)
      .filter((h) => h > entry);
    return highs.length > 0 ? Math.min(...highs) : null;
  }
  const lows = swingLowIndices(window, order)
    .filter((j) => j < before)
    .map((j) => window[j].low)
    .filter((l) => l < entry);
  return lows.length > 0 ? Math.max(...lows) : null;
}

export function createTrendContinuationStrategy(
  overrides: Partial<TrendContinuationParams> = {},
  options: StrategyOptions = {}
): Strategy {
  const params: TrendContinuationParams = { ...TREND_CONTINUATION_DEFAULTS, ...overrides };
  const { timeframe, sessions } = resolveStrategyOptions(options);
  // EMA(slow) defined on the pullback bar, plus the confirmation bar
  const minCandles = params.emaSlow + 1;

  function inTradingHours(timestamp: number): boolean {
    return isInSession(timestamp, 'london', sessions) || isInSession(timestamp, 'new_york', sessions);
  }

  function analyze(window: readonly Candle[]): DecisionResult {
    const short = checkHistory(window, minCandles);
    if (short) {
      return short;
    }

    const closes = closeSeries(window);
    const fast = ema(closes, params.emaFast);
    const slow = ema(closes, params.emaSlow);
    const atrSeries = atr(window, params.atrLength);

    const c = window.length - 1;
    const i = c - 1;
    const pullback = window[i];
    const confirm = window[c];
    const f = fast[i];
    const s = slow[i];
    const atrValue = atrSeries[i];

    if (f === null || s === null || atrValue === null || atrValue <= 0) {
      return decided([]);
    }
    if (!inTradingHours(pullback.timestamp)) {
      return decided([]);
    }
    if (Math.abs(f - s) < params.trendAtrMultiple * atrValue) {
      return decided([]);
    }

    const direction: TradeDirection = f > s ? 'long' : 'short';
    const sign = direction === 'long' ? 1 : -1;
    const zone = params.pullbackAtrMultiple * atrValue;
    const lookbackStart = Math.max(0, i - params.pullbackLookback);
    const prior = window.slice(lookbackStart, i);

    const wasExtended = prior.some((bar) => sign * (bar.close - f) > zone);
    if (!wasExtended || Math.abs(pullback.close - f) > zone) {
      return decided([]);
    }

    const confirmed =
      direction === 'long'
        ? confirm.close > confirm.open && confirm.close > pullback.high
        : confirm.close < confirm.open && confirm.close < pullback.low;
    if (!confirmed) {
      return decided([]);
    }

    const entry = confirm.close;
    const pullbackBars = window.slice(lookbackStart, i + 1);
    const minDistance = params.slAtrMultiple * atrValue;
    const stop =
      direction === 'long'
        ? Math.min(Math.min(...pullbackBars.map((b) => b.low)) - minDistance, entry - minDistance)
        : Math.max(Math.max(...pullbackBars.map((b) => b.high)) + minDistance, entry + minDistance);
    const risk = Math.abs(entry - stop);

    const takeProfit1 = roundPrice(entry + sign * params.tp1RiskMultiple * risk);
    const swing = swingTarget(direction, window, i, entry, params.swingOrder);
    const takeProfit2 =
      swing !== null && sign * (roundPrice(swing) - takeProfit1) > 0
        ? roundPrice(swing)
        : roundPrice(entry + sign * params.tp2RiskMultiple * risk);

    let confidence = params.baseConfidence;
    const vwapValue = vwap(window)[c];
    if (vwapValue !== null && sign * (entry - vwapValue) > 0) confidence += 10;
    if (Math.abs(pullback.close - f) < 0.5 * atrValue) confidence += 10;
    if (isInSession(pullback.timestamp, 'overlap', sessions)) confidence += 10;
    const earlierFast = fast[i - params.spreadLookback];
    const earlierSlow = slow[i - params.spreadLookback];
    if (
      earlierFast !== null &&
      earlierSlow !== null &&
      Math.abs(f - s) > Math.abs(earlierFast - earlierSlow)
    ) {
      confidence += 10;
    }

    const bullish = direction === 'long';
    const candidate: TradeCandidate = {
      strategyName: TREND_CONTINUATION,
      direction,
      entryPrice: roundPrice(entry),
      stopLoss: roundPrice(stop),
      takeProfit1,
      takeProfit2,
      timestamp: confirm.timestamp,
      confidence: Math.min(confidence, 100),
      reasoning:
        `${bullish ? 'Bullish' : 'Bearish'} trend continuation: EMA-${params.emaFast} ` +
        `(${f.toFixed(2)}) ${bullish ? 'above' : 'below'} EMA-${params.emaSlow} (${s.toFixed(2)}), ` +
        `pullback to EMA-${params.emaFast} zone, momentum confirmation candle. ` +
        `Entry at ${entry.toFixed(2)}, SL ${bullish ? 'below pullback low' : 'above pullback high'} ` +
        `at ${stop.toFixed(2)}.`,
      timeframe,
      session: getActiveSessions(confirm.timestamp, sessions)[0],
    };

    return decided([candidate]);
  }

  return { name: TREND_CONTINUATION, minCandles, timeframe, analyze };
}
