import type { Bindings } from '../types/fact.js';
import type { Rule } from '../types/rule.js';
import type { Instantiation } from '../types/engine.js';
import type { FactStore } from '../core/fact-store.js';
import { EMPTY_BINDINGS } from './terms.js';
import { unify } from './unifier.js';

/**
 * Finds every binding set satisfying all antecedents of the rule jointly.
 *
 * Folds over the antecedents carrying the binding sets that survived so
 * far: each one is extended against every candidate fact for the next
 * antecedent. The result keeps discovery order, which the order strategy
 * relies on.
 */
export function matchRule(rule: Rule, facts: FactStore): Instantiation[] {
  let partial: Bindings[] = [EMPTY_BINDINGS];

  for (const antecedent of rule.antecedents) {
    const candidates = facts.candidatesFor(antecedent);
    const next: Bindings[] = [];

    for (const bindings of partial) {
      for (const fact of candidates) {
        const extended = unify(antecedent, fact, bindings);
        if (extended !== null) {
          next.push(extended);
        }
      }
    }

    partial = next;
    if (partial.length === 0) {
      return [];
    }
  }

  return partial.map((bindings, ordinal) => ({ rule, bindings, ordinal }));
}

/**
 * Matches all rules, in declared order.
 */
export function matchRules(rules: readonly Rule[], facts: FactStore): Instantiation[] {
  return rules.flatMap((rule) => matchRule(rule, facts));
}
