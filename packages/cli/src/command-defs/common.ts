import { z } from 'zod';

export const outputFormatSchema = z.enum(['json', 'table', 'text']).default('json');

export type OutputFormat = z.infer<typeof outputFormatSchema>;

/**
 * Options every command accepts
 */
export const commonOptionsSchema = z.object({
  config: z.string().min(1).optional(),
  format: outputFormatSchema,
});
