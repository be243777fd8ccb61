import type { Constant, Pattern, Term, Variable } from '../../types/fact.js';
import { VARIABLE_NAME_RE, VARIABLE_PREFIX } from '../../validation/constants.js';
import { isConstant } from '../../matching/terms.js';
import type { TermInput } from '../types.js';
import { DslValidationError } from './errors.js';

/**
 * Creates a variable term.
 *
 * @example
 * v('student')   // { var: 'student' }, same as the shorthand '?student'
 */
export function v(name: string): Variable {
  if (typeof name !== 'string' || !VARIABLE_NAME_RE.test(name)) {
    throw new DslValidationError(`Invalid variable name: ${JSON.stringify(name)}`);
  }
  return { var: name };
}

/**
 * Type-guard for a `{ var }` object.
 */
export function isVar(value: unknown): value is Variable {
  return (
    value !== null &&
    typeof value === 'object' &&
    'var' in value &&
    typeof value.var === 'string'
  );
}

/**
 * Normalizes a term: `'?name'` strings become variables, everything else
 * must be a constant or a `{ var }` object.
 *
 * @throws {DslValidationError} For anything that is not a term.
 */
export function toTerm(value: TermInput, label = 'term'): Term {
  if (isVar(value)) {
    return v(value.var);
  }
  if (typeof value === 'string' && value.startsWith(VARIABLE_PREFIX)) {
    return v(value.slice(VARIABLE_PREFIX.length));
  }
  if (isConstant(value)) {
    return value;
  }
  throw new DslValidationError(`${label} must be a string, finite number, boolean or variable`);
}

/**
 * Normalizes every term of a pattern.
 */
export function toPattern(terms: readonly TermInput[], label = 'pattern'): Pattern {
  if (!Array.isArray(terms) || terms.length === 0) {
    throw new DslValidationError(`${label} must be a non-empty array of terms`);
  }
  return terms.map((term, i) => toTerm(term, `${label}[${i}]`));
}

/**
 * Builds a ground fact. Variables (including `'?x'` strings) are rejected.
 */
export function fact(...terms: Constant[]): Constant[] {
  if (terms.length === 0) {
    throw new DslValidationError('fact() needs at least one term');
  }
  for (const [i, term] of terms.entries()) {
    if (!isConstant(term)) {
      throw new DslValidationError(`fact()[${i}] must be a string, finite number or boolean`);
    }
    if (typeof term === 'string' && term.startsWith(VARIABLE_PREFIX)) {
      throw new DslValidationError(`fact()[${i}] must be ground, got variable ${term}`);
    }
  }
  return terms;
}
