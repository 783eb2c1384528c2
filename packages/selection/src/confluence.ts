/**
 * Higher-Timeframe Trend Confluence
 *
 * A direction agrees with the coarse trend when the fast EMA sits above the
 * slow EMA for a long, below it for a short.
 */

import { closeSeries, ema, lastValue } from '@stratlab/backtest';
import type { Candle, TradeDirection } from '@stratlab/core';
import { DEFAULT_SELECTOR_CONFIG, type ConfluenceConfig } from './config.js';
import { logger } from './logger.js';

/**
 * @returns false when there are too few bars to judge the trend
 */
export function checkTrendConfluence(
  bars: readonly Candle[],
  direction: TradeDirection,
  config: ConfluenceConfig = DEFAULT_SELECTOR_CONFIG.confluence
): boolean {
  if (bars.length < config.minBars || bars.length < config.slowPeriod) {
    logger.warn('Insufficient coarse bars for confluence check', {
      have: bars.length,
      need: Math.max(config.minBars, config.slowPeriod),
    });
    return false;
  }

  const closes = closeSeries(bars);
  const fast = lastValue(ema(closes, config.fastPeriod));
  const slow = lastValue(ema(closes, config.slowPeriod));
  if (fast === null || slow === null) {
    return false;
  }

  const agrees = direction === 'long' ? fast > slow : fast < slow;
  logger.debug('Trend confluence', { direction, fast, slow, agrees });
  return agrees;
}
