/**
 * @stratlab/backtest
 *
 * Trade simulation, metrics, rolling-window backtests and walk-forward
 * validation.
 */

export * from './config.js';

export {
  closeSeries,
  rangeSeries,
  ema,
  vwap,
  trueRange,
  atr,
  rollingStdDev,
  compactSeries,
  lastValue,
} from './indicators/series.js';

export { getActiveSessions, isInSession, isHourInWindow } from './sim/sessions.js';
export type { SpreadModel } from './sim/spread-model.js';
export { SessionSpreadModel, FixedSpreadModel } from './sim/spread-model.js';
export { simulateTrade, simulateCandidates, barsAfter, pnlInPips } from './sim/trade-simulator.js';

export type { DrawdownResult } from './metrics/metrics-calculator.js';
export {
  computeMetrics,
  computeMaxDrawdown,
  computeSharpeRatio,
  computeProfitFactor,
  chronological,
} from './metrics/metrics-calculator.js';

export type { BacktestRunnerOptions, HorizonBacktest } from './runner/backtest-runner.js';
export { BacktestRunner } from './runner/backtest-runner.js';

export type { WalkForwardSplit } from './walk-forward/walk-forward-validator.js';
export {
  WalkForwardValidator,
  splitChronologically,
  computeEfficiency,
  averageEfficiency,
  formatWalkForwardResult,
} from './walk-forward/walk-forward-validator.js';
