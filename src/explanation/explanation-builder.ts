import type { Fact } from '../types/fact.js';
import type { Explanation } from '../types/explanation.js';
import type { FactStore } from '../core/fact-store.js';
import { UnknownFactError } from '../core/errors.js';
import { factKey } from '../matching/terms.js';
import { renderFact } from './render.js';

/**
 * Builds derivation trees from the provenance kept in a {@link FactStore}.
 *
 * Trees are computed on demand. Provenance never changes once a fact is
 * stored, so built subtrees are cached per fact and shared between
 * explanations; a support used by several derivations appears in each of
 * their trees.
 */
export class ExplanationBuilder {
  private readonly cache = new Map<string, Explanation>();

  constructor(private readonly facts: FactStore) {}

  /**
   * @throws {UnknownFactError} When the fact is not in working memory.
   */
  explain(fact: Fact): Explanation {
    if (!this.facts.has(fact)) {
      throw new UnknownFactError(fact, renderFact(fact));
    }
    return this.build(fact);
  }

  private build(fact: Fact): Explanation {
    const key = factKey(fact);
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const provenance = this.facts.getProvenance(fact);
    const node: Explanation = provenance
      ? {
          type: 'derived',
          fact,
          rule: provenance.rule,
          bindings: provenance.bindings,
          cycle: provenance.cycle,
          supports: provenance.supports.map((support) => this.build(support)),
        }
      : { type: 'initial', fact };

    this.cache.set(key, node);
    return node;
  }
}

/**
 * Depth of a derivation tree; an initial fact has depth 0.
 */
export function explanationDepth(explanation: Explanation): number {
  if (explanation.type === 'initial') return 0;
  return 1 + Math.max(0, ...explanation.supports.map(explanationDepth));
}

/**
 * Names of the rules used anywhere in a derivation tree, in first-use order
 * of a depth-first walk.
 */
export function rulesUsed(explanation: Explanation): string[] {
  const names: string[] = [];
  const visit = (node: Explanation): void => {
    if (node.type === 'initial') return;
    if (!names.includes(node.rule)) names.push(node.rule);
    node.supports.forEach(visit);
  };
  visit(explanation);
  return names;
}
