import type { Fact, Pattern } from './fact.js';

/** Rule as supplied by a rule set (before compilation) */
export interface RuleInput {
  name: string;
  description?: string;
  priority?: number;            // Higher = preferred by the priority strategy (default 0)

  // Conjunctive antecedents, at least one
  antecedents: Pattern[];

  // Fact template derived when the rule fires
  consequent: Pattern;
}

/** Compiled rule, read-only for the duration of a run */
export interface Rule {
  readonly name: string;
  readonly description?: string;
  readonly priority: number;
  readonly antecedents: readonly Pattern[];
  readonly consequent: Pattern;

  /** Position in the declared rule order */
  readonly order: number;

  /** Number of antecedents */
  readonly specificity: number;
}

/** Rules plus the initial working memory they run against */
export interface RuleSet {
  rules: RuleInput[];
  facts: Fact[];
}
