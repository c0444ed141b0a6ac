/**
 * Generate Seeds Handler
 */

import type { z } from 'zod';
import { SeedHashGenerator } from '@seedhash/core';
import type { CommandContext } from '../../core/command-context.js';
import type { generateSchema } from '../../command-defs/seeds.js';

export type GenerateSeedsArgs = z.infer<typeof generateSchema>;

export function generateSeedsHandler(args: GenerateSeedsArgs, ctx: CommandContext): number[] {
  const generator = new SeedHashGenerator(
    args.input,
    args.min ?? ctx.config.defaultMinValue,
    args.max ?? ctx.config.defaultMaxValue
  );
  ctx.logger.debug('Generating seeds', { inputString: args.input, seed: generator.seed, count: args.count });
  return generator.generate(args.count);
}
