import { z } from 'zod';
import { commonOptionsSchema } from './common.js';

/**
 * cycle: one evaluation cycle over a bar file, persisted to Postgres unless
 * `dryRun` keeps the results in memory
 */
export const cycleSchema = commonOptionsSchema.extend({
  bars: z.string().min(1),
  dryRun: z.boolean().default(false),
});

export type CycleArgs = z.infer<typeof cycleSchema>;

export const migrateSchema = commonOptionsSchema;

export type MigrateArgs = z.infer<typeof migrateSchema>;
