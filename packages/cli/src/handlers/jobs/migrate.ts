import type { CommandContext } from '../../core/command-context.js';

/**
 * Apply the SQL migrations of the result store
 */
export async function migrateHandler(_args: unknown, ctx: CommandContext): Promise<{ applied: string[] }> {
  return { applied: await ctx.migrate() };
}
