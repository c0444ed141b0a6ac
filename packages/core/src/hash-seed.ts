/**
 * String → seed derivation
 *
 * MD5 is used for its speed and even bit spread, not for security.
 *
 * Cross-platform contract: the seed is the first SEED_HEX_PREFIX_LENGTH hex
 * characters of the digest read as an unsigned integer. Eight characters give
 * 32 bits, which is exactly the state width of SeededRNG and fits a JavaScript
 * number without loss. Other implementations truncate differently (modulo 2^32
 * of the whole digest, or 7 characters on 32-bit signed hosts), so seeds are
 * not expected to match across platforms.
 */

import { createHash } from 'crypto';
import { assertNonEmptyString } from './validation.js';

/** Hex characters of the digest kept for the seed */
export const SEED_HEX_PREFIX_LENGTH = 8;

/** Bits in a derived seed (4 per hex character) */
export const SEED_BIT_WIDTH = SEED_HEX_PREFIX_LENGTH * 4;

/** Exclusive upper bound of every derived seed */
export const SEED_UPPER_BOUND = 2 ** SEED_BIT_WIDTH;

/**
 * Full MD5 digest of the UTF-8 encoded input, 32 lowercase hex characters
 */
export function md5Hex(input: string): string {
  assertNonEmptyString(input, 'inputString');
  return createHash('md5').update(input, 'utf8').digest('hex');
}

/**
 * Read a seed from an already computed hex digest
 */
export function seedFromHex(hex: string): number {
  return Number.parseInt(hex.slice(0, SEED_HEX_PREFIX_LENGTH), 16);
}

/**
 * Derive a deterministic seed in [0, SEED_UPPER_BOUND) from a string
 *
 * Same input → same seed
 */
export function deriveSeed(input: string): number {
  return seedFromHex(md5Hex(input));
}


/**
 * Map any safe integer onto the 32-bit RNG state. Seeds already in
 * [0, SEED_UPPER_BOUND) are unchanged; others wrap modulo 2^32.
 */
export function foldSeed(seed: number): number {
  return ((seed % SEED_UPPER_BOUND) + SEED_UPPER_BOUND) % SEED_UPPER_BOUND;
}
