/**
 * @stratlab/jobs
 *
 * Scheduled units of work: the evaluation cycle (backtest, walk-forward,
 * atomic persist) and the selection cycle.
 */

export type { EvaluationConfig } from './config.js';
export {
  evaluationConfigSchema,
  DEFAULT_EVALUATION_CONFIG,
  loadEvaluationConfig,
} from './config.js';

export type {
  EvaluationCycleDeps,
  EvaluationCycleSummary,
  StrategyEvaluation,
} from './evaluation-cycle.js';
export {
  runEvaluationCycle,
  requiredHistory,
  horizonRecord,
  walkForwardRecord,
} from './evaluation-cycle.js';

export type { SelectionCycleDeps } from './selection-cycle.js';
export { runSelectionCycle } from './selection-cycle.js';
