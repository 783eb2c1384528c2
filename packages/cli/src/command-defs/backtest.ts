import { z } from 'zod';
import { commonOptionsSchema } from './common.js';

/**
 * backtest run: rolling-window backtest of one or every registered strategy
 */
export const backtestRunSchema = commonOptionsSchema.extend({
  bars: z.string().min(1),
  strategy: z.string().min(1).optional(),
  horizons: z.array(z.number().int().positive()).nonempty().optional(),
});

export type BacktestRunArgs = z.infer<typeof backtestRunSchema>;

/**
 * backtest walk-forward: chronological in-sample/out-of-sample validation
 */
export const walkForwardSchema = commonOptionsSchema.extend({
  bars: z.string().min(1),
  strategy: z.string().min(1).optional(),
  trainFraction: z.number().gt(0).lt(1).optional(),
});

export type WalkForwardArgs = z.infer<typeof walkForwardSchema>;
