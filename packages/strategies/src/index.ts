/**
 * @stratlab/strategies
 *
 * Reference decision functions and the default strategy registry.
 */

export type { EmaMomentumParams } from './ema-momentum.js';
export { createEmaMomentumStrategy, EMA_MOMENTUM, EMA_MOMENTUM_DEFAULTS } from './ema-momentum.js';
export type { TrendContinuationParams } from './trend-continuation.js';
export {
  createTrendContinuationStrategy,
  TREND_CONTINUATION,
  TREND_CONTINUATION_DEFAULTS,
} from './trend-continuation.js';
export type { BreakoutExpansionParams } from './breakout-expansion.js';
export {
  createBreakoutExpansionStrategy,
  BREAKOUT_EXPANSION,
  BREAKOUT_EXPANSION_DEFAULTS,
  rollingMean,
  compressionRun,
} from './breakout-expansion.js';
export { swingHighIndices, swingLowIndices, recentSwingHigh, recentSwingLow } from './swings.js';
export type { TradeLevels } from './levels.js';
export { levelsFromRisk, roundPrice } from './levels.js';
export type { StrategyOptions } from './options.js';
export { resolveStrategyOptions } from './options.js';
export { createDefaultRegistry, defaultStrategies } from './registry.js';
