/**
 * Standard Command Wrapper
 *
 * - Commander owns flags & parsing
 * - Wrapper owns: positional-arg merging, value coercion, schema validation,
 *   handler invocation, output formatting and error reporting
 *
 * Invariant: Normalization never renames keys. Ever.
 */

import type { Command } from 'commander';
import type { z } from 'zod';
import { formatOutput, type OutputFormat } from '@seedhash/utils';
import type { CommandContext } from './command-context.js';
import { handleError } from './error-handler.js';

export type DefineCommandArgs<TSchema extends z.ZodTypeAny, TResult> = {
  schema: TSchema;
  handler: (args: z.infer<TSchema>, ctx: CommandContext) => TResult | Promise<TResult>;
  // Merge Commander positional arguments into options before coercion
  argsToOpts?: (args: string[], rawOpts: Record<string, unknown>) => Record<string, unknown>;
  // Value coercion only (numbers), NOT key renaming
  coerce?: (raw: Record<string, unknown>) => Record<string, unknown>;
};

function outputFormat(value: unknown): OutputFormat {
  return value === 'table' || value === 'csv' ? value : 'json';
}

/**
 * Standard command wiring:
 * - Commander parses flags -> camelCase properties
 * - Optional coerce() for value parsing only
 * - Validates with the command's zod schema
 * - Runs the handler and writes the formatted result
 *
 * Errors are written to ctx.writeErr and set a non-zero exit code; they are not
 * rethrown, so one bad invocation never crashes the host process.
 */
export function defineCommand<TSchema extends z.ZodTypeAny, TResult>(
  cmd: Command,
  ctx: CommandContext,
  def: DefineCommandArgs<TSchema, TResult>
): Command {
  cmd.action(async () => {
    try {
      // Commander gives camelCase keys already
      const rawOpts: Record<string, unknown> = { ...cmd.opts() };
      const merged = def.argsToOpts ? def.argsToOpts([...cmd.args], rawOpts) : rawOpts;
      const coerced = def.coerce ? def.coerce(merged) : merged;

      const validated: z.infer<TSchema> = def.schema.parse(coerced);
      const result = await def.handler(validated, ctx);

      ctx.write(formatOutput(result, outputFormat(coerced.format)));
    } catch (error) {
      ctx.writeErr(`Error: ${handleError(ctx.logger, error, { command: cmd.name() })}`);
      process.exitCode = 1;
    }
  });

  return cmd;
}
