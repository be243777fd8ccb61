import type { Fact, ProvenanceRecord } from '../types/fact.js';
import type { Instantiation } from '../types/engine.js';
import { substitute } from '../matching/unifier.js';
import type { FactStore } from './fact-store.js';
import type { FiredHistory } from './refraction.js';

/** Outcome of firing one instantiation */
export interface FiringOutcome {
  fact: Fact;
  derived: boolean;                 // false = fact was already in working memory
  provenance?: ProvenanceRecord;    // Only for newly derived facts
}

/**
 * Fires an instantiation.
 *
 * The consequent is instantiated with the winning bindings. A new fact is
 * stored together with its provenance (supports are the antecedents
 * re-instantiated with the same bindings). An already known fact is left
 * untouched. Either way the instantiation goes into the history.
 */
export function fire(
  instantiation: Instantiation,
  facts: FactStore,
  history: FiredHistory,
  cycle: number,
): FiringOutcome {
  const { rule, bindings } = instantiation;
  const fact = substitute(rule.consequent, bindings);

  history.record(instantiation);

  if (facts.has(fact)) {
    return { fact, derived: false };
  }

  const provenance: ProvenanceRecord = {
    rule: rule.name,
    bindings,
    supports: rule.antecedents.map((antecedent) => substitute(antecedent, bindings)),
    cycle,
  };
  facts.add(fact, provenance);

  return { fact, derived: true, provenance };
}
