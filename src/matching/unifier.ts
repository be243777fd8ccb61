import type { Bindings, Constant, Fact, Pattern } from '../types/fact.js';
import { UnboundVariableError } from '../core/errors.js';
import { EMPTY_BINDINGS, isVariable } from './terms.js';

/**
 * Unifies a pattern with a ground fact, extending `bindings`.
 *
 * Walks both tuples position by position:
 * - a constant must equal the fact's term exactly,
 * - a bound variable must resolve to the fact's term,
 * - an unbound variable is bound to the fact's term.
 *
 * Returns a new binding set on success and `null` when the pair does not
 * match (including an arity mismatch). The incoming bindings are never
 * modified, so callers can keep them for other candidate facts.
 */
export function unify(pattern: Pattern, fact: Fact, bindings: Bindings = EMPTY_BINDINGS): Bindings | null {
  if (pattern.length !== fact.length) {
    return null;
  }

  const extended = new Map<string, Constant>(bindings);

  for (const [i, term] of pattern.entries()) {
    const value = fact[i];
    if (value === undefined) {
      return null;
    }

    if (!isVariable(term)) {
      if (term !== value) return null;
      continue;
    }

    const bound = extended.get(term.var);
    if (bound === undefined) {
      extended.set(term.var, value);
    } else if (bound !== value) {
      return null;
    }
  }

  return extended;
}

/**
 * Replaces every variable of the pattern with its bound value.
 *
 * @throws {UnboundVariableError} When a variable has no binding.
 */
export function substitute(pattern: Pattern, bindings: Bindings): Fact {
  return pattern.map((term) => {
    if (!isVariable(term)) {
      return term;
    }
    const value = bindings.get(term.var);
    if (value === undefined) {
      throw new UnboundVariableError(term.var);
    }
    return value;
  });
}
