/**
 * Selector Configuration
 *
 * Scoring weights and regime penalties are configuration, not code: the
 * defaults express a consistency-first preference (win rate and profit
 * factor dominate) and have no empirical backing beyond that.
 */

import { z } from 'zod';

const WEIGHT_SUM_TOLERANCE = 1e-6;

function sumsToOne(weights: Record<string, number>): boolean {
  const total = Object.values(weights).reduce((a, b) => a + b, 0);
  return Math.abs(total - 1) < WEIGHT_SUM_TOLERANCE;
}

const weight = z.number().min(0).max(1);

export const metricWeightsSchema = z
  .object({
    winRate: weight.default(0.3),
    profitFactor: weight.default(0.25),
    sharpeRatio: weight.default(0.15),
    expectancy: weight.default(0.15),
    /** Applied to the inverted (lower is better) drawdown */
    maxDrawdown: weight.default(0.15),
  })
  .refine(sumsToOne, { message: 'metric weights must sum to 1.0' });

export type MetricWeights = z.infer<typeof metricWeightsSchema>;

export const volatilityProxySchema = z.enum(['atr', 'range_stddev']);

export type VolatilityProxy = z.infer<typeof volatilityProxySchema>;

export const regimeConfigSchema = z.object({
  proxy: volatilityProxySchema.default('atr'),
  period: z.number().int().min(2).default(14),
  /** Most recent bars considered (720 = 30 days of H1) */
  lookbackBars: z.number().int().positive().default(720),
  /** Below this many bars the regime is medium */
  minBars: z.number().int().positive().default(30),
  lowPercentile: z.number().min(0).max(100).default(25),
  highPercentile: z.number().min(0).max(100).default(75),
});

export type RegimeConfig = z.infer<typeof regimeConfigSchema>;

const multiplier = z.number().positive();

/**
 * Regime -> strategy name -> score multiplier
 */
export const regimePenaltiesSchema = z
  .object({
    low: z.record(multiplier).default({}),
    medium: z.record(multiplier).default({}),
    high: z.record(multiplier).default({}),
  })
  .default({
    low: { trend_continuation: 0.9 },
    medium: {},
    high: { breakout_expansion: 0.9 },
  });

export type RegimePenalties = z.infer<typeof regimePenaltiesSchema>;

export const degradationConfigSchema = z.object({
  minProfitFactor: z.number().nonnegative().default(1.0),
  /** Absolute win-rate drop from the oldest baseline that counts as degraded */
  maxWinRateDrop: z.number().min(0).max(1).default(0.15),
});

export type DegradationConfig = z.infer<typeof degradationConfigSchema>;

export const confluenceConfigSchema = z.object({
  bonus: z.number().nonnegative().default(0.05),
  fastPeriod: z.number().int().positive().default(50),
  slowPeriod: z.number().int().positive().default(200),
  /** Fewest coarse bars the trend check accepts */
  minBars: z.number().int().positive().default(200),
});

export type ConfluenceConfig = z.infer<typeof confluenceConfigSchema>;

export const liveBlendConfigSchema = z.object({
  /** Share of the blended score taken from live performance */
  weight: z.number().min(0).max(1).default(0.3),
  minSignals: z.number().int().nonnegative().default(5),
  scoreWeights: z
    .object({
      winRate: weight.default(0.4),
      profitFactor: weight.default(0.35),
      avgRiskReward: weight.default(0.25),
    })
    .refine(sumsToOne, { message: 'live score weights must sum to 1.0' })
    .default({}),
  profitFactorCap: z.number().positive().default(3),
  riskRewardCap: z.number().positive().default(5),
});

export type LiveBlendConfig = z.infer<typeof liveBlendConfigSchema>;

export const selectorConfigSchema = z.object({
  weights: metricWeightsSchema.default({}),
  minTrades: z.number().int().nonnegative().default(50),
  /** Window horizons tried in order when picking a strategy's latest result */
  preferredWindows: z.array(z.number().int().positive()).default([14, 30, 60, 7]),
  regime: regimeConfigSchema.default({}),
  regimePenalties: regimePenaltiesSchema,
  degradation: degradationConfigSchema.default({}),
  confluence: confluenceConfigSchema.default({}),
  liveBlend: liveBlendConfigSchema.default({}),
});

export type SelectorConfig = z.infer<typeof selectorConfigSchema>;

export const DEFAULT_SELECTOR_CONFIG: SelectorConfig = selectorConfigSchema.parse({});
