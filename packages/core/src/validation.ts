/**
 * Input guards shared by the generator and the sampler.
 *
 * Every guard throws a ValidationError whose message names the offending value
 * and the bound it broke.
 */

import { ValidationError, type ValidationErrorKind } from '@seedhash/utils';

function describe(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return value === null ? 'null' : typeof value;
}

export function assertNonEmptyString(value: unknown, name: string): asserts value is string {
  if (typeof value !== 'string') {
    throw new ValidationError(`${name} must be a string, got ${describe(value)}`, 'TypeMismatch', {
      name,
      receivedType: typeof value,
    });
  }
  if (value.length === 0) {
    throw new ValidationError(`${name} cannot be empty`, 'EmptyInput', { name });
  }
}

export function assertInteger(value: unknown, name: string): asserts value is number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ValidationError(`${name} must be a number, got ${describe(value)}`, 'TypeMismatch', {
      name,
      value: describe(value),
    });
  }
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${name} must be an integer, got ${value}`, 'TypeMismatch', {
      name,
      value,
    });
  }
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError(
      `${name} (${value}) is outside the safe integer range [${Number.MIN_SAFE_INTEGER}, ${Number.MAX_SAFE_INTEGER}]`,
      'RangeOverflow',
      { name, value }
    );
  }
}

/**
 * A strictly positive safe integer, reported under `kind` when it is not.
 */
export function assertPositiveCount(
  value: unknown,
  name: string,
  kind: ValidationErrorKind = 'InvalidCount'
): asserts value is number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ValidationError(`${name} must be a number, got ${describe(value)}`, 'TypeMismatch', {
      name,
      value: describe(value),
    });
  }
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`, kind, {
      name,
      value,
    });
  }
}
