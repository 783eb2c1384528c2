import { z } from 'zod';
import { commonOptionsSchema } from './common.js';

/**
 * select: rank stored results against the current regime
 *
 * `directions` maps strategy name to the direction of its latest signal and
 * turns on the higher-timeframe confluence check (needs `coarseBars`).
 */
export const selectSchema = commonOptionsSchema.extend({
  bars: z.string().min(1),
  results: z.string().min(1),
  coarseBars: z.string().min(1).optional(),
  directions: z.record(z.enum(['long', 'short'])).optional(),
  live: z.string().min(1).optional(),
  strategies: z.array(z.string().min(1)).nonempty().optional(),
});

export type SelectArgs = z.infer<typeof selectSchema>;
