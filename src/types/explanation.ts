import type { Bindings, Fact } from './fact.js';

/** Derivation tree of a fact */
export type Explanation =
  | InitialFactNode
  | DerivedFactNode;

/** Fact present in the initial working memory (leaf) */
export interface InitialFactNode {
  type: 'initial';
  fact: Fact;
}

/** Fact derived by a rule firing */
export interface DerivedFactNode {
  type: 'derived';
  fact: Fact;
  rule: string;
  bindings: Bindings;
  cycle: number;
  supports: Explanation[];   // In antecedent order
}
