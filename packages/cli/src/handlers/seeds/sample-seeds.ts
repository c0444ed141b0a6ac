/**
 * Sample Seeds Handler
 */

import type { z } from 'zod';
import {
  DEFAULT_SEED_RANGE,
  SeedSampler,
  deriveSeed,
  runSampling,
  type SamplingStrategy,
} from '@seedhash/core';
import type { CommandContext } from '../../core/command-context.js';
import type { sampleSchema } from '../../command-defs/seeds.js';

export type SampleSeedsArgs = z.infer<typeof sampleSchema>;

function toStrategy(args: SampleSeedsArgs): SamplingStrategy {
  switch (args.method) {
    case 'stratified':
      return { method: 'stratified', nStrata: args.nStrata };
    case 'cluster':
      return {
        method: 'cluster',
        nClusters: args.nClusters,
        samplesPerCluster: args.samplesPerCluster,
      };
    case 'simple':
    case 'systematic':
      return { method: args.method };
  }
}

export function sampleSeedsHandler(args: SampleSeedsArgs, ctx: CommandContext): number[] {
  const masterSeed = args.masterSeed ?? deriveSeed(args.input ?? '');
  const sampler = new SeedSampler(masterSeed, {
    clusterRadiusFraction: ctx.config.clusterRadiusFraction,
    logger: ctx.logger,
  });
  const range = {
    min: args.min ?? DEFAULT_SEED_RANGE.min,
    max: args.max ?? DEFAULT_SEED_RANGE.max,
  };
  return runSampling(sampler, toStrategy(args), args.nSamples, range);
}
