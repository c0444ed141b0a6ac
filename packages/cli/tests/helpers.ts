import { vi } from 'vitest';
import { SeedhashConfigSchema } from '@seedhash/utils';
import { createCommandContext, type CommandContext } from '../src/core/command-context.js';

export interface CapturedContext {
  ctx: CommandContext;
  out: string[];
  err: string[];
}

/**
 * Command context with default config, captured output and a silenced logger
 */
export function createTestContext(overrides: Record<string, unknown> = {}): CapturedContext {
  const out: string[] = [];
  const err: string[] = [];
  const ctx = createCommandContext({
    config: SeedhashConfigSchema.parse(overrides),
    write: (text) => out.push(text),
    writeErr: (text) => err.push(text),
  });
  vi.spyOn(ctx.logger, 'error').mockImplementation(() => undefined);
  vi.spyOn(ctx.logger, 'warn').mockImplementation(() => undefined);
  return { ctx, out, err };
}
