/**
 * Seed Hash Generator
 *
 * Turns a human-readable string into a reproducible sequence of integers.
 */

import { createLogger, getSeedhashConfig } from '@seedhash/utils';
import { md5Hex, seedFromHex } from './hash-seed.js';
import { validateRange, type SeedRange } from './range.js';
import { SeededRNG } from './rng.js';
import { assertNonEmptyString, assertPositiveCount } from './validation.js';

const logger = createLogger('@seedhash/core');

/**
 * Deterministic integer sequences derived from a string.
 *
 * @example
 * ```typescript
 * const gen = new SeedHashGenerator('experiment_1');
 * gen.generate(5); // same five integers on every call and every run
 * ```
 */
export class SeedHashGenerator {
  readonly inputString: string;
  readonly range: SeedRange;
  readonly seed: number;
  private readonly digest: string;

  /**
   * @param minValue - inclusive lower bound (default from config, -1e9)
   * @param maxValue - inclusive upper bound (default from config, 1e9)
   * @throws ValidationError (EmptyInput, TypeMismatch, InvalidRange, RangeOverflow)
   */
  constructor(inputString: string, minValue?: number, maxValue?: number) {
    assertNonEmptyString(inputString, 'inputString');

    // Only consult config for bounds the caller left out
    const config =
      minValue === undefined || maxValue === undefined ? getSeedhashConfig() : undefined;

    this.inputString = inputString;
    this.range = validateRange(
      minValue ?? config?.defaultMinValue,
      maxValue ?? config?.defaultMaxValue
    );
    this.digest = md5Hex(inputString);
    this.seed = seedFromHex(this.digest);

    logger.debug('Created seed generator', {
      inputString,
      seed: this.seed,
      min: this.range.min,
      max: this.range.max,
    });
  }

  get minValue(): number {
    return this.range.min;
  }

  get maxValue(): number {
    return this.range.max;
  }

  /**
   * Draw `count` integers in [minValue, maxValue], with replacement.
   *
   * Each call starts a fresh stream from the seed, so repeated calls return the
   * same sequence.
   */
  generate(count: number): number[] {
    assertPositiveCount(count, 'count');

    const rng = this.createRng();
    const values: number[] = [];
    for (let i = 0; i < count; i++) {
      values.push(rng.nextInt(this.range.min, this.range.max));
    }
    return values;
  }

  /**
   * Full MD5 hex digest of the input string
   */
  getHash(): string {
    return this.digest;
  }

  /**
   * A private RNG positioned at the start of this generator's stream
   */
  createRng(): SeededRNG {
    return new SeededRNG(this.seed);
  }

  toJSON(): { inputString: string; minValue: number; maxValue: number; seed: number; hash: string } {
    return {
      inputString: this.inputString,
      minValue: this.range.min,
      maxValue: this.range.max,
      seed: this.seed,
      hash: this.digest,
    };
  }

  toString(): string {
    return (
      `SeedHashGenerator(inputString='${this.inputString}', ` +
      `minValue=${this.range.min}, maxValue=${this.range.max}, seed=${this.seed})`
    );
  }
}
