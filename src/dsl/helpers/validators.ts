/**
 * Validation helpers for DSL builder inputs.
 *
 * Invalid input is rejected at the call site, not at `build()`.
 *
 * @module
 */

import { DslValidationError } from './errors.js';

/**
 * Asserts that `value` is a non-empty string.
 *
 * @param label - A human-readable parameter name used in the error message.
 * @throws {DslValidationError} If `value` is not a string or is empty.
 */
export function requireNonEmptyString(value: unknown, label: string): asserts value is string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new DslValidationError(`${label} must be a non-empty string`);
  }
}

/**
 * Asserts that `value` is a finite number.
 *
 * @throws {DslValidationError} If `value` is `NaN`, infinite or not a number.
 */
export function requireFiniteNumber(value: unknown, label: string): asserts value is number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new DslValidationError(`${label} must be a finite number`);
  }
}
