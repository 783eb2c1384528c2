/**
 * Trade Simulator
 *
 * Walks a trade candidate forward through the bars that follow it and
 * resolves which level was touched first.
 *
 * Rules:
 * - Only bars with timestamp strictly after candidate.timestamp are scanned.
 * - Spread is always charged: a long buys at entry + spread, a short's stop is
 *   checked against the ask (high + spread).
 * - Per bar the stop is checked before TP2, and TP2 before TP1. When one bar's
 *   range covers both the stop and a target the trade is a stop-out: bar data
 *   cannot tell which was touched first, so the worse outcome is assumed.
 *   Do not reorder.
 * - At most maxBarsForward bars are scanned, then the trade expires at the
 *   last scanned close.
 */

import {
  assertValidCandidate,
  InvalidCandidateError,
  type Candle,
  type SimulatedTrade,
  type TradeCandidate,
  type TradeOutcome,
} from '@stratlab/core';
import { DEFAULT_SIMULATOR_CONFIG, type SimulatorConfig } from '../config.js';
import { logger } from '../logger.js';
import type { SpreadModel } from './spread-model.js';

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Signed PnL in pips, rounded to 2 decimals
 */
export function pnlInPips(
  direction: TradeCandidate['direction'],
  entry: number,
  exit: number,
  pipSize: number
): number {
  const distance = direction === 'long' ? exit - entry : entry - exit;
  return roundTo(distance / pipSize, 2);
}

/**
 * Bars eligible for resolving a candidate: strictly after its timestamp,
 * capped at maxBarsForward
 */
export function barsAfter(
  candidate: Pick<TradeCandidate, 'timestamp'>,
  bars: readonly Candle[],
  maxBarsForward: number
): Candle[] {
  const first = bars.findIndex((bar) => bar.timestamp > candidate.timestamp);
  if (first === -1) {
    return [];
  }
  return bars.slice(first, first + maxBarsForward);
}

/**
 * Resolve one candidate against the bars that follow it.
 *
 * @param bars - Any bar series; bars at or before the candidate are ignored
 * @param spread - Spread in price units at the candidate's timestamp
 * @throws InvalidCandidateError if stop/target ordering is broken
 */
export function simulateTrade(
  candidate: TradeCandidate,
  bars: readonly Candle[],
  spread: number,
  config: SimulatorConfig = DEFAULT_SIMULATOR_CONFIG
): SimulatedTrade {
  assertValidCandidate(candidate);

  const isLong = candidate.direction === 'long';
  const entry = isLong ? candidate.entryPrice + spread : candidate.entryPrice;
  const { stopLoss, takeProfit1, takeProfit2 } = candidate;

  const resolve = (
    outcome: TradeOutcome,
    exitPrice: number,
    barsHeld: number,
    exitTimestamp: number | null
  ): SimulatedTrade =>
    Object.freeze({
      candidate: Object.freeze({ ...candidate }),
      outcome,
      exitPrice,
      pnlPips: pnlInPips(candidate.direction, entry, exitPrice, config.pipSize),
      barsHeld,
      spreadCost: spread,
      exitTimestamp,
    });

  const scan = barsAfter(candidate, bars, config.maxBarsForward);

  for (let i = 0; i < scan.length; i++) {
    const bar = scan[i];
    const barsHeld = i + 1;

    const stopHit = isLong ? bar.low <= stopLoss : bar.high + spread >= stopLoss;
    if (stopHit) {
      return resolve('SL_HIT', stopLoss, barsHeld, bar.timestamp);
    }

    const tp2Hit = isLong ? bar.high >= takeProfit2 : bar.low <= takeProfit2;
    if (tp2Hit) {
      return resolve('TP2_HIT', takeProfit2, barsHeld, bar.timestamp);
    }

    const tp1Hit = isLong ? bar.high >= takeProfit1 : bar.low <= takeProfit1;
    if (tp1Hit) {
      return resolve('TP1_HIT', takeProfit1, barsHeld, bar.timestamp);
    }
  }

  if (scan.length === 0) {
    return resolve('EXPIRED', entry, 0, null);
  }

  const last = scan[scan.length - 1];
  return resolve('EXPIRED', last.close, scan.length, last.timestamp);
}

/**
 * Simulate a batch of candidates against one bar series, each with the
 * spread at its own timestamp. Candidates that break the ordering contract
 * are logged and left out.
 */
export function simulateCandidates(
  candidates: readonly TradeCandidate[],
  bars: readonly Candle[],
  spreadModel: SpreadModel,
  config: SimulatorConfig = DEFAULT_SIMULATOR_CONFIG
): SimulatedTrade[] {
  const trades: SimulatedTrade[] = [];

  for (const candidate of candidates) {
    try {
      const spread = spreadModel.getSpread(candidate.timestamp);
      trades.push(simulateTrade(candidate, bars, spread, config));
    } catch (error) {
      if (!(error instanceof InvalidCandidateError)) {
        throw error;
      }
      logger.warn('Rejected invalid trade candidate', {
        strategy: candidate.strategyName,
        issues: error.issues,
        candidate,
      });
    }
  }

  return trades;
}
