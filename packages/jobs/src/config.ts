/**
 * Evaluation Configuration
 *
 * The `evaluation` section of config.yaml. Every key is optional; omitted
 * keys take the defaults of the package that owns them.
 *
 * ```yaml
 * evaluation:
 *   symbol: XAUUSD
 *   timeframe: H1
 *   backtest:
 *     simulator: { maxBarsForward: 72, pipSize: 0.1 }
 *   walkForward: { trainFraction: 0.8 }
 *   selection:
 *     minTrades: 50
 * ```
 */

import { z } from 'zod';
import { backtestConfigSchema, walkForwardConfigSchema } from '@stratlab/backtest';
import { selectorConfigSchema } from '@stratlab/selection';
import { loadConfigSection, type AppConfig } from '@stratlab/utils';

export const evaluationConfigSchema = z.object({
  symbol: z.string().min(1).default('XAUUSD'),
  timeframe: z.string().min(1).default('H1'),
  backtest: backtestConfigSchema.default({}),
  walkForward: walkForwardConfigSchema.default({}),
  selection: selectorConfigSchema.default({}),
  /** Bars of the signal timeframe read for regime detection */
  recentBars: z.number().int().positive().default(720),
  /** Higher timeframe read for the confluence check */
  coarseTimeframe: z.string().min(1).default('H4'),
  coarseBars: z.number().int().positive().default(250),
});

export type EvaluationConfig = z.infer<typeof evaluationConfigSchema>;

export const DEFAULT_EVALUATION_CONFIG: EvaluationConfig = evaluationConfigSchema.parse({});

/**
 * @throws ConfigurationError naming every invalid key
 */
export function loadEvaluationConfig(config?: AppConfig): EvaluationConfig {
  return loadConfigSection('evaluation', evaluationConfigSchema, config);
}
