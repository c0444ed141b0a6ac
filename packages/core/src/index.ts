/**
 * @seedhash/core
 *
 * String → seed derivation, seeded integer sequences and the four sampling
 * strategies.
 */

export {
  SEED_HEX_PREFIX_LENGTH,
  SEED_BIT_WIDTH,
  SEED_UPPER_BOUND,
  md5Hex,
  seedFromHex,
  deriveSeed,
  foldSeed,
} from './hash-seed.js';

export {
  MAX_RANGE_SPAN,
  DEFAULT_MIN_VALUE,
  DEFAULT_MAX_VALUE,
  DEFAULT_SEED_RANGE,
  validateRange,
  rangeSpan,
  clampToRange,
} from './range.js';
export type { SeedRange } from './range.js';

export { SeededRNG } from './rng.js';
export type { DeterministicRNG } from './rng.js';

export { SeedHashGenerator } from './generator.js';

export {
  SeedSampler,
  allocateEvenly,
  allocateClusterSizes,
  computeStrata,
} from './sampler.js';
export type { SeedSamplerOptions, Stratum } from './sampler.js';

export {
  SAMPLING_METHODS,
  SamplingMethodSchema,
  SamplingStrategySchema,
  strategyFor,
  runSampling,
} from './strategies.js';
export type { SamplingMethod, SamplingStrategy } from './strategies.js';
