/**
 * @stratlab/selection
 *
 * Regime-aware strategy ranking over stored backtest results.
 */

export * from './config.js';

export type { SelectionInput } from './selector.js';
export {
  selectBest,
  rankStrategies,
  latestResultFor,
  baselineResultFor,
  compareScores,
} from './selector.js';

export type { RegimeReading } from './regime.js';
export {
  detectVolatilityRegime,
  volatilitySeries,
  percentileOfLast,
  classifyPercentile,
} from './regime.js';

export type { ScoredMetric } from './scoring.js';
export {
  SCORED_METRICS,
  normalizeMetric,
  computeCompositeScores,
  regimeMultiplier,
  scoreLivePerformance,
  blendLiveScore,
} from './scoring.js';

export type { DegradationVerdict } from './degradation.js';
export { checkDegradation } from './degradation.js';
export { checkTrendConfluence } from './confluence.js';
