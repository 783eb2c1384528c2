import { StrategyRegistry, type Strategy } from '@stratlab/core';
import { createBreakoutExpansionStrategy } from './breakout-expansion.js';
import { createEmaMomentumStrategy } from './ema-momentum.js';
import type { StrategyOptions } from './options.js';
import { createTrendContinuationStrategy } from './trend-continuation.js';

/**
 * Strategies registered at startup, in evaluation order
 */
export function defaultStrategies(options: StrategyOptions = {}): Strategy[] {
  return [
    createEmaMomentumStrategy({}, options),
    createTrendContinuationStrategy({}, options),
    createBreakoutExpansionStrategy({}, options),
  ];
}

export function createDefaultRegistry(options: StrategyOptions = {}): StrategyRegistry {
  return new StrategyRegistry(defaultStrategies(options));
}
