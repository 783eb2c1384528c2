/**
 * Degradation Check
 *
 * Compares a strategy's current result against its own oldest stored
 * (non-walk-forward) baseline. Degraded strategies are still scored but rank
 * after every healthy one.
 */

import type { BacktestResultRecord } from '@stratlab/core';
import type { DegradationConfig } from './config.js';

export interface DegradationVerdict {
  isDegraded: boolean;
  reason: string | null;
}

export function checkDegradation(
  current: BacktestResultRecord,
  baseline: BacktestResultRecord | null,
  config: DegradationConfig
): DegradationVerdict {
  const reasons: string[] = [];

  if (current.profitFactor < config.minProfitFactor) {
    reasons.push(
      `Profit factor ${current.profitFactor.toFixed(4)} below ${config.minProfitFactor.toFixed(1)}`
    );
  }

  if (baseline && baseline.id !== current.id) {
    const drop = baseline.winRate - current.winRate;
    if (drop > config.maxWinRateDrop) {
      reasons.push(
        `Win rate dropped ${drop.toFixed(4)} (from ${baseline.winRate.toFixed(4)} to ${current.winRate.toFixed(4)})`
      );
    }
  }

  return reasons.length > 0
    ? { isDegraded: true, reason: reasons.join('; ') }
    : { isDegraded: false, reason: null };
}
