/**
 * @stratlab/core
 *
 * Foundational, shared types and interfaces for strategy evaluation.
 * This package has zero dependencies on other @stratlab packages.
 */

export type { Candle, Timeframe } from './types/candle.js';
export { BARS_PER_DAY } from './types/candle.js';

export type {
  TradeDirection,
  TradeCandidate,
  TradeOutcome,
  SimulatedTrade,
} from './types/trade.js';
export { WINNING_OUTCOMES } from './types/trade.js';

export type {
  BacktestMetrics,
  WalkForwardEfficiency,
  WalkForwardStatus,
  WalkForwardResult,
  DateRange,
} from './types/metrics.js';
export { EMPTY_METRICS } from './types/metrics.js';

export type {
  VolatilityRegime,
  StrategyScore,
  LivePerformance,
  RecentDirections,
} from './types/selection.js';

export type { BacktestResultRecord, NewBacktestResultRecord } from './types/results.js';

export { tradeCandidateSchema, assertValidCandidate } from './schemas/candidate.js';

export type { DecisionResult, DecisionFunction, Strategy } from './strategy/contract.js';
export { decided, insufficientHistory, checkHistory } from './strategy/contract.js';
export { StrategyRegistry } from './strategy/registry.js';

export * from './ports/index.js';
export { ValidationError, InvalidCandidateError, StrategyNotFoundError } from './errors.js';
export { fromUnixSeconds, utcHour, toIsoUtc } from './time/index.js';
