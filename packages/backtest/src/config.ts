/**
 * Backtest Configuration
 *
 * Every tunable of the simulation and validation path, with defaults.
 * Loaded from the `evaluation.backtest` / `evaluation.walkForward` sections
 * of config.yaml by the jobs package.
 */

import { z } from 'zod';
import { BARS_PER_DAY } from '@stratlab/core';

const hour = z.number().int().min(0).max(23);

/**
 * Session window in UTC hours, [start, end). start > end wraps past midnight.
 */
export const sessionWindowSchema = z.tuple([hour, hour]);

export type SessionWindow = z.infer<typeof sessionWindowSchema>;

export const DEFAULT_SESSIONS: Record<string, SessionWindow> = {
  asian: [23, 8],
  london: [7, 16],
  new_york: [12, 21],
  overlap: [12, 16],
};

/**
 * Spread per session in price units. For a 0.10 pip, 0.30 is 3 pips.
 */
export const DEFAULT_SESSION_SPREADS: Record<string, number> = {
  overlap: 0.2,
  london: 0.3,
  new_york: 0.3,
  asian: 0.5,
};

export const spreadConfigSchema = z.object({
  sessions: z.record(sessionWindowSchema).default(DEFAULT_SESSIONS),
  sessionSpreads: z.record(z.number().nonnegative()).default(DEFAULT_SESSION_SPREADS),
  /** Off-session / unknown session spread; the least liquid session's value */
  defaultSpread: z.number().nonnegative().default(0.5),
});

export type SpreadConfig = z.infer<typeof spreadConfigSchema>;

export const simulatorConfigSchema = z.object({
  /** Trade-duration ceiling in bars (72 = 3 days of H1) */
  maxBarsForward: z.number().int().positive().default(72),
  /** Price distance of one pip */
  pipSize: z.number().positive().default(0.1),
});

export type SimulatorConfig = z.infer<typeof simulatorConfigSchema>;

export const metricsConfigSchema = z.object({
  tradingDaysPerYear: z.number().positive().default(252),
  /** Substituted for an unbounded profit factor (no losing trades) */
  profitFactorCap: z.number().positive().default(9999.9999),
});

export type MetricsConfig = z.infer<typeof metricsConfigSchema>;

export const runnerConfigSchema = z.object({
  timeframe: z.string().default('H1'),
  barsPerDay: z.number().int().positive().default(BARS_PER_DAY.H1),
  horizonsDays: z.array(z.number().int().positive()).nonempty().default([30, 60]),
  stepDays: z.number().int().positive().default(1),
});

export type RunnerConfig = z.infer<typeof runnerConfigSchema>;

export const walkForwardConfigSchema = z.object({
  /** Chronological in-sample share */
  trainFraction: z.number().gt(0).lt(1).default(0.8),
  /** Below this many out-of-sample trades no overfitting verdict is given */
  minOosTrades: z.number().int().nonnegative().default(5),
  /** Out-of-sample / in-sample ratio below which a strategy is overfitted */
  degradationThreshold: z.number().positive().default(0.5),
  windowDays: z.number().int().positive().default(30),
});

export type WalkForwardConfig = z.infer<typeof walkForwardConfigSchema>;

export const backtestConfigSchema = z.object({
  spread: spreadConfigSchema.default({}),
  simulator: simulatorConfigSchema.default({}),
  metrics: metricsConfigSchema.default({}),
  runner: runnerConfigSchema.default({}),
});

export type BacktestConfig = z.infer<typeof backtestConfigSchema>;

export const DEFAULT_SPREAD_CONFIG: SpreadConfig = spreadConfigSchema.parse({});
export const DEFAULT_SIMULATOR_CONFIG: SimulatorConfig = simulatorConfigSchema.parse({});
export const DEFAULT_METRICS_CONFIG: MetricsConfig = metricsConfigSchema.parse({});
export const DEFAULT_RUNNER_CONFIG: RunnerConfig = runnerConfigSchema.parse({});
export const DEFAULT_WALK_FORWARD_CONFIG: WalkForwardConfig = walkForwardConfigSchema.parse({});
