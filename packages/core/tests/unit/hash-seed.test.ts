import { describe, it, expect } from 'vitest';
import { ValidationError } from '@seedhash/utils';
import {
  SEED_BIT_WIDTH,
  SEED_HEX_PREFIX_LENGTH,
  SEED_UPPER_BOUND,
  deriveSeed,
  foldSeed,
  md5Hex,
  seedFromHex,
} from '../../src/hash-seed.js';

function errorKind(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof ValidationError ? error.kind : 'not-a-validation-error';
  }
  return undefined;
}

describe('md5Hex', () => {
  it('should return the full lowercase digest', () => {
    expect(md5Hex('abc')).toBe('900150983cd24fb0d6963f7d28e17f72');
    expect(md5Hex('The quick brown fox jumps over the lazy dog')).toBe(
      '9e107d9d372bb6826bd81d3542a419d6'
    );
  });

  it('should hash the UTF-8 bytes of the input', () => {
    expect(md5Hex('héllo')).toBe('be50e8478cf24ff3595bc7307fb91b50');
  });

  it('should reject an empty string', () => {
    expect(errorKind(() => md5Hex(''))).toBe('EmptyInput');
  });

  it('should reject a non-string input', () => {
    expect(errorKind(() => Reflect.apply(md5Hex, undefined, [42]))).toBe('TypeMismatch');
  });
});

describe('seedFromHex', () => {
  it('should read the first eight hex characters', () => {
    expect(seedFromHex('900150983cd24fb0d6963f7d28e17f72')).toBe(0x90015098);
    expect(seedFromHex('ffffffff00000000')).toBe(SEED_UPPER_BOUND - 1);
    expect(seedFromHex('00000000ffffffff')).toBe(0);
  });
});

describe('deriveSeed', () => {
  it('should derive known seeds', () => {
    expect(deriveSeed('abc')).toBe(2416005272);
    expect(deriveSeed('a')).toBe(214005177);
    expect(deriveSeed('experiment_1')).toBe(3893810001);
  });

  it('should be stable across calls', () => {
    expect(deriveSeed('run-7')).toBe(deriveSeed('run-7'));
  });

  it('should keep 32 bits of the digest', () => {
    expect(SEED_HEX_PREFIX_LENGTH).toBe(8);
    expect(SEED_BIT_WIDTH).toBe(32);
    expect(SEED_UPPER_BOUND).toBe(4294967296);
  });
});

describe('foldSeed', () => {
  it('should leave 32-bit seeds unchanged', () => {
    expect(foldSeed(0)).toBe(0);
    expect(foldSeed(2416005272)).toBe(2416005272);
  });

  it('should wrap negative and wide seeds modulo 2^32', () => {
    expect(foldSeed(-1)).toBe(SEED_UPPER_BOUND - 1);
    expect(foldSeed(-123456)).toBe(SEED_UPPER_BOUND - 123456);
    expect(foldSeed(2 ** 32)).toBe(0);
    expect(foldSeed(2 ** 40 + 7)).toBe(7);
  });
});
