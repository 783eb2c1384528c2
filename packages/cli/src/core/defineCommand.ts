/**
 * Standard Command Wrapper
 *
 * - Commander owns flags and parsing (camelCase keys)
 * - coerce() turns string values into numbers, lists and JSON; it never
 *   renames keys
 * - the zod schema of the command validates the coerced options
 * - the handler gets the validated args and a CommandContext; its result is
 *   written in the requested format and the context is closed afterwards
 */

import type { Command } from 'commander';
import type { ZodType, ZodTypeDef } from 'zod';
import { ValidationError } from '@stratlab/utils';
import type { OutputFormat } from '../command-defs/common.js';
import { createCommandContext, type CommandContext, type CommandContextFactory } from './command-context.js';
import { formatOutput, type TableRow } from './output-formatter.js';
import { logger } from '../logger.js';

type RawOpts = Record<string, unknown>;

export type DefineCommandArgs<TArgs extends { format: OutputFormat; config?: string }, TResult> = {
  name: string;
  schema: ZodType<TArgs, ZodTypeDef, unknown>;
  coerce?: (raw: RawOpts) => RawOpts;
  handler: (args: TArgs, ctx: CommandContext) => Promise<TResult>;
  toRows?: (result: TResult) => TableRow[];
  toText?: (result: TResult) => string;
  createContext?: CommandContextFactory;
};

export function validateArgs<T>(name: string, schema: ZodType<T, ZodTypeDef, unknown>, opts: RawOpts): T {
  const parsed = schema.safeParse(opts);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ValidationError(`Invalid options for ${name}: ${issues.join('; ')}`, {
      command: name,
      issues,
    });
  }
  return parsed.data;
}

export function defineCommand<TArgs extends { format: OutputFormat; config?: string }, TResult>(
  cmd: Command,
  args: DefineCommandArgs<TArgs, TResult>
): Command {
  cmd.action(async () => {
    const rawOpts: RawOpts = cmd.opts();
    const coerced = args.coerce ? args.coerce(rawOpts) : rawOpts;
    const validated = validateArgs(args.name, args.schema, coerced);

    const ctx = (args.createContext ?? createCommandContext)(validated.config);
    const startedAt = Date.now();
    try {
      const result = await args.handler(validated, ctx);
      ctx.write(
        formatOutput(result, validated.format, { toRows: args.toRows, toText: args.toText })
      );
      logger.debug('Command complete', { command: args.name, durationMs: Date.now() - startedAt });
    } finally {
      await ctx.close();
    }
  });

  return cmd;
}
