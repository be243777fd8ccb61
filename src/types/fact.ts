/** Atomic ground value */
export type Constant = string | number | boolean;

/** Pattern variable, scoped to a single rule instantiation */
export interface Variable {
  readonly var: string;
}

/** Term of a pattern: constant or variable */
export type Term = Constant | Variable;

/**
 * Fact - ground atom, every term is a constant.
 *
 * Facts are value-like: two facts are equal when their terms are equal
 * position by position, e.g. `['enrolled', 'Alice', 'CS101']`.
 */
export type Fact = readonly Constant[];

/** Tuple of terms, possibly containing variables (rule antecedents and consequents only) */
export type Pattern = readonly Term[];

/** Immutable variable name → constant mapping */
export type Bindings = ReadonlyMap<string, Constant>;

/** Justification attached to a derived fact */
export interface ProvenanceRecord {
  rule: string;               // Name of the firing rule
  bindings: Bindings;         // Binding set used for the firing
  supports: readonly Fact[];  // Ground antecedents, in antecedent order
  cycle: number;              // Cycle in which the fact was derived
}
