/**
 * Sampling strategy selection
 *
 * A closed set of four strategies with a single dispatch point, so adding a
 * strategy is a compile error until every switch handles it.
 */

import { z } from 'zod';
import type { SeedRange } from './range.js';
import type { SeedSampler } from './sampler.js';

export const SAMPLING_METHODS = ['simple', 'stratified', 'cluster', 'systematic'] as const;

export type SamplingMethod = (typeof SAMPLING_METHODS)[number];

export const SamplingMethodSchema = z.enum(SAMPLING_METHODS);

export const SamplingStrategySchema = z.discriminatedUnion('method', [
  z.object({ method: z.literal('simple') }),
  z.object({
    method: z.literal('stratified'),
    nStrata: z.number().int().positive().optional(),
  }),
  z.object({
    method: z.literal('cluster'),
    nClusters: z.number().int().positive().optional(),
    samplesPerCluster: z.number().int().positive().optional(),
  }),
  z.object({ method: z.literal('systematic') }),
]);

export type SamplingStrategy = z.infer<typeof SamplingStrategySchema>;

function assertNever(value: never): never {
  throw new Error(`Unhandled sampling strategy: ${JSON.stringify(value)}`);
}

/**
 * Strategy with default parameters for a method tag
 */
export function strategyFor(method: SamplingMethod): SamplingStrategy {
  return { method };
}

/**
 * Run one strategy against a sampler
 */
export function runSampling(
  sampler: SeedSampler,
  strategy: SamplingStrategy,
  nSamples: number,
  seedRange?: SeedRange
): number[] {
  switch (strategy.method) {
    case 'simple':
      return sampler.simpleRandomSampling(nSamples, seedRange);
    case 'stratified':
      return sampler.stratifiedRandomSampling(nSamples, seedRange, strategy.nStrata);
    case 'cluster':
      return sampler.clusterRandomSampling(
        nSamples,
        seedRange,
        strategy.nClusters,
        strategy.samplesPerCluster
      );
    case 'systematic':
      return sampler.systematicRandomSampling(nSamples, seedRange);
    default:
      return assertNever(strategy);
  }
}
