/**
 * Shared types for the DSL layer.
 *
 * @module
 */

import type { Term } from '../types/fact.js';

/** A term, or a `'?name'` string standing for the variable `name` */
export type TermInput = Term | string;

/** Pattern written with {@link TermInput}s */
export type PatternInput = readonly TermInput[];

/** Intermediate builder state */
export interface RuleBuildContext {
  name: string;
  description?: string;
  priority?: number;
  antecedents: PatternInput[];
  consequent?: PatternInput;
}
