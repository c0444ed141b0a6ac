/**
 * Determinism Contract
 *
 * Every generator and sampler call owns a private SeededRNG. Nothing here reads
 * or writes global random state, so independent instances can be used side by
 * side without disturbing each other's streams.
 */

import { ValidationError } from '@seedhash/utils';

const UINT32_RANGE = 2 ** 32;

/**
 * Deterministic random number generator interface
 *
 * Replaces Math.random() to ensure seeded, deterministic randomness.
 */
export interface DeterministicRNG {
  /**
   * Next unsigned 32-bit word
   */
  nextUint32(): number;

  /**
   * Generate next random number in [0, 1)
   */
  next(): number;

  /**
   * Generate next random integer in [min, max] (inclusive)
   */
  nextInt(min: number, max: number): number;

  /**
   * Seed this stream was created from
   */
  getSeed(): number;

  /**
   * Clone RNG state (for creating independent streams)
   */
  clone(): DeterministicRNG;
}

/**
 * Seeded random number generator using mulberry32
 *
 * 32-bit state, one state word per seed. Integer draws use rejection sampling
 * so every value of the range is equally likely.
 */
export class SeededRNG implements DeterministicRNG {
  private readonly seed: number;
  private state: number;

  constructor(seed: number) {
    if (!Number.isSafeInteger(seed) || seed < 0) {
      throw new ValidationError(
        `RNG seed must be a non-negative integer, got ${seed}`,
        'TypeMismatch',
        { seed }
      );
    }
    this.seed = seed;
    this.state = seed >>> 0;
  }

  nextUint32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return (t ^ (t >>> 14)) >>> 0;
  }

  next(): number {
    return this.nextUint32() / UINT32_RANGE;
  }

  nextInt(min: number, max: number): number {
    if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max) || max < min) {
      throw new ValidationError(
        `nextInt bounds must be integers with min <= max, got [${min}, ${max}]`,
        'InvalidRange',
        { min, max }
      );
    }
    const span = max - min + 1;
    if (span > UINT32_RANGE) {
      throw new ValidationError(
        `nextInt span ${span} exceeds ${UINT32_RANGE}`,
        'RangeOverflow',
        { min, max, span }
      );
    }
    if (span === UINT32_RANGE) {
      return min + this.nextUint32();
    }

    // Largest multiple of span below 2^32; words at or above it are redrawn
    const limit = UINT32_RANGE - (UINT32_RANGE % span);
    let word = this.nextUint32();
    while (word >= limit) {
      word = this.nextUint32();
    }
    return min + (word % span);
  }

  getSeed(): number {
    return this.seed;
  }

  clone(): SeededRNG {
    const cloned = new SeededRNG(this.seed);
    cloned.state = this.state;
    return cloned;
  }
}
