/**
 * Volatility Regime Detection
 *
 * Ranks the current value of a volatility proxy against its own trailing
 * history and classifies the percentile into low / medium / high.
 */

import { atr, compactSeries, rangeSeries, rollingStdDev } from '@stratlab/backtest';
import type { Candle, VolatilityRegime } from '@stratlab/core';
import { DEFAULT_SELECTOR_CONFIG, type RegimeConfig } from './config.js';
import { logger } from './logger.js';

export interface RegimeReading {
  regime: VolatilityRegime;
  /** Share of the series strictly below the current value, 0-100; null when not computed */
  percentile: number | null;
  currentValue: number | null;
  sampleSize: number;
}

/**
 * Volatility proxy series without warmup values
 */
export function volatilitySeries(bars: readonly Candle[], config: RegimeConfig): number[] {
  if (config.proxy === 'range_stddev') {
    return compactSeries(rollingStdDev(rangeSeries(bars), config.period));
  }
  return compactSeries(atr(bars, config.period));
}

/**
 * Percentile rank of the last value: share of values strictly below it
 */
export function percentileOfLast(values: readonly number[]): number {
  const current = values[values.length - 1];
  const below = values.filter((v) => v < current).length;
  return (below / values.length) * 100;
}

export function classifyPercentile(percentile: number, config: RegimeConfig): VolatilityRegime {
  if (percentile <= config.lowPercentile) {
    return 'low';
  }
  if (percentile >= config.highPercentile) {
    return 'high';
  }
  return 'medium';
}

export function detectVolatilityRegime(
  recentBars: readonly Candle[],
  config: RegimeConfig = DEFAULT_SELECTOR_CONFIG.regime
): RegimeReading {
  const bars = recentBars.slice(-config.lookbackBars);

  if (bars.length < config.minBars) {
    logger.warn('Insufficient bars for regime detection; defaulting to medium', {
      have: bars.length,
      need: config.minBars,
    });
    return { regime: 'medium', percentile: null, currentValue: null, sampleSize: 0 };
  }

  const values = volatilitySeries(bars, config);
  if (values.length < 2) {
    logger.warn('Volatility series too short; defaulting to medium', {
      proxy: config.proxy,
      values: values.length,
    });
    return { regime: 'medium', percentile: null, currentValue: null, sampleSize: values.length };
  }

  const percentile = percentileOfLast(values);
  const regime = classifyPercentile(percentile, config);
  const currentValue = values[values.length - 1];

  logger.debug('Volatility regime', {
    proxy: config.proxy,
    currentValue,
    percentile,
    sampleSize: values.length,
    regime,
  });

  return { regime, percentile, currentValue, sampleSize: values.length };
}
