/**
 * Arity consistency per predicate.
 *
 * The predicate of a pattern or fact is its first term, when that term is
 * a constant. Every use of a predicate across the rule patterns must have
 * the same arity, and an initial fact must match the arity of the
 * patterns that use its predicate. Facts whose predicate no pattern uses
 * are not constrained.
 *
 * @module
 */

import type { IssueCollector } from '../types.js';
import { isObject } from '../types.js';

interface ArityUse {
  arity: number;
  path: string;
}

export class ArityTracker {
  private readonly uses = new Map<string, ArityUse>();

  /** Records a rule pattern, reporting a clash with earlier patterns. */
  observe(tuple: unknown, path: string, collector: IssueCollector): void {
    const predicate = predicateOf(tuple);
    if (predicate === undefined || !Array.isArray(tuple)) return;

    const known = this.uses.get(predicate);

    if (!known) {
      this.uses.set(predicate, { arity: tuple.length, path });
      return;
    }

    if (known.arity !== tuple.length) {
      collector.addError(
        path,
        `Predicate ${predicate} has arity ${tuple.length}, but arity ${known.arity} at ${known.path}`,
      );
    }
  }

  /** Checks an initial fact against the patterns seen so far; records nothing. */
  checkFact(fact: unknown, path: string, collector: IssueCollector): void {
    const predicate = predicateOf(fact);
    if (predicate === undefined || !Array.isArray(fact)) return;

    const known = this.uses.get(predicate);
    if (known && known.arity !== fact.length) {
      collector.addError(
        path,
        `Fact ${predicate} has arity ${fact.length}, but patterns use arity ${known.arity} (${known.path})`,
      );
    }
  }
}

function predicateOf(tuple: unknown): string | undefined {
  if (!Array.isArray(tuple) || tuple.length === 0) return undefined;
  const first: unknown = tuple[0];
  return isObject(first) ? undefined : JSON.stringify(first);
}
