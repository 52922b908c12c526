import type { FieldValidator } from './definition.js';

/**
 * Stock field validators.
 *
 * Each factory returns a pure function following the FieldValidator
 * contract: `true` on success, a message otherwise. Validators only run
 * after the field's type check passed, but they still guard their input
 * type so they can be reused on `any` fields.
 */

export function startsWith(prefix: string): FieldValidator {
  return (value) =>
    typeof value === 'string' && value.startsWith(prefix)
      ? true
      : `must start with "${prefix}"`;
}

export function oneOf(allowed: readonly unknown[]): FieldValidator {
  return (value) =>
    allowed.includes(value)
      ? true
      : `must be one of: ${allowed.map((v) => JSON.stringify(v)).join(', ')}`;
}

export function matchesPattern(pattern: RegExp): FieldValidator {
  return (value) =>
    typeof value === 'string' && pattern.test(value)
      ? true
      : `must match ${String(pattern)}`;
}

export function nonEmpty(): FieldValidator {
  return (value) => {
    if (typeof value === 'string' || Array.isArray(value)) {
      return value.length > 0 ? true : 'must not be empty';
    }
    if (typeof value === 'object' && value !== null) {
      return Object.keys(value).length > 0 ? true : 'must not be empty';
    }
    return true;
  };
}

export function lengthBetween(min: number, max: number = Number.POSITIVE_INFINITY): FieldValidator {
  return (value) => {
    if (typeof value !== 'string' && !Array.isArray(value)) return 'must have a length';
    if (value.length < min) return `length must be at least ${min}`;
    if (value.length > max) return `length must be at most ${max}`;
    return true;
  };
}

export function inRange(min: number, max: number): FieldValidator {
  return (value) =>
    typeof value === 'number' && value >= min && value <= max
      ? true
      : `must be between ${min} and ${max}`;
}

export function equals(expected: unknown): FieldValidator {
  return (value) => (value === expected ? true : `must equal ${JSON.stringify(expected)}`);
}

/** Runs validators in order and reports the first failure. */
export function allOf(...validators: readonly FieldValidator[]): FieldValidator {
  return (value) => {
    for (const validator of validators) {
      const outcome = validator(value);
      if (outcome !== true) return outcome;
    }
    return true;
  };
}
