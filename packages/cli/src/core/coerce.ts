/**
 * Value Coercion Helpers
 *
 * These functions coerce values (numbers from argv strings) but NEVER rename keys.
 * Use these in defineCommand's coerce() function.
 */

import { ValidationError } from '@seedhash/utils';

function isString(x: unknown): x is string {
  return typeof x === 'string';
}

/**
 * Coerce a value to a number
 * Accepts:
 * - Number: returns as-is
 * - String number: '123' -> 123
 * - undefined/null returns undefined
 */
export function coerceNumber(v: unknown, name: string): number | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === 'number') return v;
  if (isString(v) && v.trim() !== '') {
    const n = Number(v);
    if (!Number.isFinite(n))
      throw new ValidationError(`Invalid number for ${name}: '${v}'`, 'TypeMismatch', {
        name,
        value: v,
      });
    return n;
  }
  throw new ValidationError(`Invalid number for ${name}`, 'TypeMismatch', { name, value: v });
}

/**
 * Coerce the named keys of an options object to numbers, leaving the rest untouched
 */
export function coerceNumbers(
  opts: Record<string, unknown>,
  keys: readonly string[]
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...opts };
  for (const key of keys) {
    if (out[key] !== undefined) {
      out[key] = coerceNumber(out[key], key);
    }
  }
  return out;
}
