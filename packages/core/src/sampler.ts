/**
 * Seed Sampler
 *
 * Four sampling disciplines over an integer range, all driven by one master
 * seed. Each method starts its own RNG from the master seed, so a result
 * depends only on the master seed and that call's arguments, never on which
 * methods ran before it.
 */

import { ValidationError, createLogger, getSeedhashConfig, type Logger } from '@seedhash/utils';
import { foldSeed } from './hash-seed.js';
import { DEFAULT_SEED_RANGE, clampToRange, rangeSpan, validateRange, type SeedRange } from './range.js';
import { SeededRNG } from './rng.js';
import { assertInteger, assertPositiveCount } from './validation.js';

export interface SeedSamplerOptions {
  /**
   * Cluster neighbourhood radius as a fraction of `max - min`, in [0, 0.5].
   * Defaults to the configured `clusterRadiusFraction` (0.02).
   */
  clusterRadiusFraction?: number;
  logger?: Logger;
}

/**
 * One contiguous slice of a range used by stratified sampling
 */
export interface Stratum {
  index: number;
  min: number;
  max: number;
}

/**
 * Split `total` into `parts` near-equal integers. The `total % parts`
 * leftover goes one-each to the first parts, or all of it to the last part.
 */
export function allocateEvenly(
  total: number,
  parts: number,
  remainderTo: 'first' | 'last'
): number[] {
  const base = Math.floor(total / parts);
  const remainder = total % parts;
  const sizes = new Array<number>(parts).fill(base);
  if (remainderTo === 'first') {
    for (let i = 0; i < remainder; i++) {
      sizes[i] = base + 1;
    }
  } else {
    sizes[parts - 1] = base + remainder;
  }
  return sizes;
}

/**
 * Partition the half-open interval `[range.min, range.max)` into `nStrata`
 * contiguous strata of width `floor((max - min) / nStrata)`. The last stratum
 * absorbs the `(max - min) % nStrata` leftover and ends at `range.max - 1`, so
 * the strata tile the interval with no gaps and `range.max` itself is never
 * drawn.
 */
export function computeStrata(range: SeedRange, nStrata: number): Stratum[] {
  assertPositiveCount(nStrata, 'nStrata', 'InvalidStrataCount');
  const extent = range.max - range.min;
  if (nStrata > extent) {
    throw new ValidationError(
      `nStrata (${nStrata}) exceeds max - min (${extent}); each stratum needs at least one integer`,
      'InvalidStrataCount',
      { nStrata, extent }
    );
  }

  const width = Math.floor(extent / nStrata);
  const strata: Stratum[] = [];
  for (let index = 0; index < nStrata; index++) {
    const min = range.min + index * width;
    const max = index === nStrata - 1 ? range.max - 1 : min + width - 1;
    strata.push({ index, min, max });
  }
  return strata;
}

/**
 * Per-cluster member counts summing to exactly `nSamples`.
 *
 * Without `samplesPerCluster` the split is even with the remainder on the last
 * cluster. With it, clusters are filled in order until `nSamples` is reached and
 * any shortfall is added to the last cluster.
 */
export function allocateClusterSizes(
  nSamples: number,
  nClusters: number,
  samplesPerCluster?: number
): number[] {
  if (samplesPerCluster === undefined) {
    return allocateEvenly(nSamples, nClusters, 'last');
  }

  const sizes: number[] = [];
  let remaining = nSamples;
  for (let i = 0; i < nClusters; i++) {
    const take = Math.min(samplesPerCluster, remaining);
    sizes.push(take);
    remaining -= take;
  }
  sizes[nClusters - 1] = (sizes[nClusters - 1] ?? 0) + remaining;
  return sizes;
}

export class SeedSampler {
  readonly masterSeed: number;
  private readonly rngSeed: number;
  readonly clusterRadiusFraction: number;
  private readonly logger: Logger;

  constructor(masterSeed: number, options: SeedSamplerOptions = {}) {
    assertInteger(masterSeed, 'masterSeed');

    const fraction = options.clusterRadiusFraction ?? getSeedhashConfig().clusterRadiusFraction;
    if (typeof fraction !== 'number' || !(fraction >= 0 && fraction <= 0.5)) {
      throw new ValidationError(
        `clusterRadiusFraction must be between 0 and 0.5, got ${fraction}`,
        'InvalidOption',
        { clusterRadiusFraction: fraction }
      );
    }

    this.masterSeed = masterSeed;
    this.rngSeed = foldSeed(masterSeed);
    this.clusterRadiusFraction = fraction;
    this.logger = (options.logger ?? createLogger('@seedhash/core')).child({ seed: masterSeed });
  }

  /**
   * Simple random sampling: every integer of the range is equally likely,
   * drawn with replacement.
   */
  simpleRandomSampling(nSamples: number, seedRange: SeedRange = DEFAULT_SEED_RANGE): number[] {
    assertPositiveCount(nSamples, 'nSamples');
    const range = validateRange(seedRange.min, seedRange.max);
    const rng = this.createRng();

    const seeds: number[] = [];
    for (let i = 0; i < nSamples; i++) {
      seeds.push(rng.nextInt(range.min, range.max));
    }

    this.logger.debug('Simple random sampling', { method: 'simple', nSamples });
    return seeds;
  }

  /**
   * Stratified random sampling: split the range into strata and draw from each,
   * so every region of the range is represented.
   *
   * `floor(nSamples / nStrata)` draws per stratum, one extra for each of the
   * first `nSamples % nStrata` strata. Output is grouped by stratum in order.
   */
  stratifiedRandomSampling(
    nSamples: number,
    seedRange: SeedRange = DEFAULT_SEED_RANGE,
    nStrata: number = 4
  ): number[] {
    assertPositiveCount(nSamples, 'nSamples');
    const range = validateRange(seedRange.min, seedRange.max);
    const strata = computeStrata(range, nStrata);
    const allocation = allocateEvenly(nSamples, strata.length, 'first');
    const rng = this.createRng();

    const seeds: number[] = [];
    strata.forEach((stratum, i) => {
      const draws = allocation[i] ?? 0;
      for (let j = 0; j < draws; j++) {
        seeds.push(rng.nextInt(stratum.min, stratum.max));
      }
    });

    this.logger.debug('Stratified random sampling', { method: 'stratified', nSamples, nStrata });
    return seeds;
  }

  /**
   * Cluster random sampling: pick random centers, then draw members uniformly
   * within `radius` of each center, clamped to the range.
   *
   * Centers are drawn with replacement and may coincide. Output is grouped by
   * cluster in the order the centers were drawn.
   */
  clusterRandomSampling(
    nSamples: number,
    seedRange: SeedRange = DEFAULT_SEED_RANGE,
    nClusters: number = 5,
    samplesPerCluster?: number
  ): number[] {
    assertPositiveCount(nSamples, 'nSamples');
    const range = validateRange(seedRange.min, seedRange.max);
    assertPositiveCount(nClusters, 'nClusters', 'InvalidClusterCount');
    if (samplesPerCluster !== undefined) {
      assertPositiveCount(samplesPerCluster, 'samplesPerCluster', 'InvalidClusterCount');
    }

    const sizes = allocateClusterSizes(nSamples, nClusters, samplesPerCluster);
    const radius = this.clusterRadius(range);
    const rng = this.createRng();

    const seeds: number[] = [];
    for (const size of sizes) {
      const center = rng.nextInt(range.min, range.max);
      for (let j = 0; j < size; j++) {
        const offset = radius > 0 ? rng.nextInt(-radius, radius) : 0;
        seeds.push(clampToRange(center + offset, range));
      }
    }

    this.logger.debug('Cluster random sampling', {
      method: 'cluster',
      nSamples,
      nClusters,
      radius,
    });
    return seeds;
  }

  /**
   * Systematic random sampling: one random start in `[0, step)`, then every
   * `step`-th integer, where `step = floor(span / nSamples)`.
   */
  systematicRandomSampling(
    nSamples: number,
    seedRange: SeedRange = DEFAULT_SEED_RANGE
  ): number[] {
    assertPositiveCount(nSamples, 'nSamples');
    const range = validateRange(seedRange.min, seedRange.max);
    const span = rangeSpan(range);
    const step = Math.floor(span / nSamples);
    if (step === 0) {
      throw new ValidationError(
        `nSamples (${nSamples}) exceeds the range span (${span}); systematic sampling needs at least one integer per interval`,
        'InvalidSampleCount',
        { nSamples, span }
      );
    }

    const start = this.createRng().nextInt(0, step - 1);
    const seeds: number[] = [];
    for (let i = 0; i < nSamples; i++) {
      seeds.push(range.min + start + i * step);
    }

    this.logger.debug('Systematic random sampling', { method: 'systematic', nSamples, step });
    return seeds;
  }

  /**
   * Neighbourhood half-width used around cluster centers
   */
  clusterRadius(range: SeedRange): number {
    return Math.floor((range.max - range.min) * this.clusterRadiusFraction);
  }

  private createRng(): SeededRNG {
    return new SeededRNG(this.rngSeed);
  }
}
