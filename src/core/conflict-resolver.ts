import type { ConflictStrategy, Instantiation } from '../types/engine.js';
import type { Rule } from '../types/rule.js';
import { InvariantViolationError } from './errors.js';

/** Preference score of a rule under a strategy; higher wins. */
type RuleScore = (rule: Rule) => number;

const STRATEGY_SCORES: Record<ConflictStrategy, RuleScore> = {
  priority: (rule) => rule.priority,
  specificity: (rule) => rule.specificity,
  order: () => 0,
};

/**
 * Order strategy comparison: declared rule order, then binding discovery order.
 */
export function compareByOrder(a: Instantiation, b: Instantiation): number {
  return a.rule.order - b.rule.order || a.ordinal - b.ordinal;
}

/**
 * Selects the instantiation to fire from a non-empty conflict set.
 *
 * The strategy score decides first; ties (and the whole `order` strategy)
 * fall back to {@link compareByOrder}. The result depends only on the
 * candidates and static rule metadata, never on the order of the input.
 *
 * @throws {InvariantViolationError} When `candidates` is empty.
 */
export function selectInstantiation(
  candidates: readonly Instantiation[],
  strategy: ConflictStrategy,
): Instantiation {
  const [first, ...rest] = candidates;
  if (first === undefined) {
    throw new InvariantViolationError('Conflict resolver invoked with an empty conflict set');
  }

  const score = STRATEGY_SCORES[strategy];
  let best = first;
  let bestScore = score(first.rule);

  for (const candidate of rest) {
    const candidateScore = score(candidate.rule);
    if (
      candidateScore > bestScore ||
      (candidateScore === bestScore && compareByOrder(candidate, best) < 0)
    ) {
      best = candidate;
      bestScore = candidateScore;
    }
  }

  return best;
}
