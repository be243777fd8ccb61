import type { Bindings, Constant, Fact, Term, Variable } from '../types/fact.js';

/** Shared empty binding set */
export const EMPTY_BINDINGS: Bindings = new Map();

export function isVariable(term: Term): term is Variable {
  return typeof term === 'object';
}

export function isConstant(value: unknown): value is Constant {
  return (
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

/** Creates a variable term. */
export function variable(name: string): Variable {
  return { var: name };
}

/**
 * Identity key of a fact.
 *
 * Serialized with JSON so `'5'` and `5` stay distinct facts.
 */
export function factKey(fact: Fact): string {
  return JSON.stringify(fact);
}

/** Order-independent identity key of a binding set. */
export function bindingsKey(bindings: Bindings): string {
  const entries = [...bindings.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(entries);
}
