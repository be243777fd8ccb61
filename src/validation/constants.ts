/**
 * Shared validation constants.
 *
 * Single source of truth for strategy names and term syntax. Used by the
 * rule validator, the YAML schema and the CLI.
 *
 * @module
 */

export const CONFLICT_STRATEGIES = ['priority', 'specificity', 'order'] as const;
export type ConflictStrategyName = (typeof CONFLICT_STRATEGIES)[number];

/** Prefix marking a variable in the string shorthand (`?student`). */
export const VARIABLE_PREFIX = '?';

/** Valid variable name: letters, digits, `_` and `-`, not starting with a digit or `-`. */
export const VARIABLE_NAME_RE = /^[A-Za-z_][\w-]*$/;

export function isConflictStrategy(value: unknown): value is ConflictStrategyName {
  return typeof value === 'string' && (CONFLICT_STRATEGIES as readonly string[]).includes(value);
}
