/**
 * Integer ranges for draws and samples
 */

import { ValidationError } from '@seedhash/utils';
import { assertInteger } from './validation.js';

/**
 * Inclusive integer range, always `min < max`
 */
export interface SeedRange {
  readonly min: number;
  readonly max: number;
}

/**
 * Widest span SeededRNG can draw from uniformly (one 32-bit word per draw)
 */
export const MAX_RANGE_SPAN = 2 ** 32;

/**
 * Generator defaults. Both bounds fit a signed 32-bit integer, so the same
 * defaults hold on hosts without wide integers.
 */
export const DEFAULT_MIN_VALUE = -1_000_000_000;
export const DEFAULT_MAX_VALUE = 1_000_000_000;

/**
 * Sampler default: non-negative seeds that fit a signed 32-bit integer
 */
export const DEFAULT_SEED_RANGE: SeedRange = Object.freeze({ min: 0, max: 2 ** 31 - 1 });

/**
 * Validate a pair of bounds and return them as a frozen range.
 */
export function validateRange(minValue: unknown, maxValue: unknown): SeedRange {
  assertInteger(minValue, 'minValue');
  assertInteger(maxValue, 'maxValue');

  if (minValue >= maxValue) {
    throw new ValidationError(
      `minValue (${minValue}) must be less than maxValue (${maxValue})`,
      'InvalidRange',
      { minValue, maxValue }
    );
  }

  const span = maxValue - minValue + 1;
  if (span > MAX_RANGE_SPAN) {
    throw new ValidationError(
      `Range [${minValue}, ${maxValue}] spans ${span} integers; at most ${MAX_RANGE_SPAN} can be sampled`,
      'RangeOverflow',
      { minValue, maxValue, span, maxSpan: MAX_RANGE_SPAN }
    );
  }

  return Object.freeze({ min: minValue, max: maxValue });
}

/**
 * Count of integers in the range
 */
export function rangeSpan(range: SeedRange): number {
  return range.max - range.min + 1;
}

export function clampToRange(value: number, range: SeedRange): number {
  return Math.max(range.min, Math.min(range.max, value));
}
