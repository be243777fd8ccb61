/**
 * Plain-text rendering of terms, facts, bindings and derivation trees.
 *
 * Facts render as `(enrolled, Alice, CS501)`, variables as `?s`.
 *
 * @module
 */

import type { Bindings, Term } from '../types/fact.js';
import type { Explanation } from '../types/explanation.js';
import { isVariable } from '../matching/terms.js';

export function renderTerm(term: Term): string {
  return isVariable(term) ? `?${term.var}` : String(term);
}

export function renderFact(fact: readonly unknown[]): string {
  return `(${fact.map((term) => (isTermLike(term) ? renderTerm(term) : String(term))).join(', ')})`;
}

export function renderBindings(bindings: Bindings): string {
  const parts = [...bindings.entries()].map(([name, value]) => `?${name} → ${String(value)}`);
  return `{${parts.join(', ')}}`;
}

/**
 * Renders a derivation tree, one fact per line, supports indented below
 * the fact they justify.
 */
export function renderExplanation(explanation: Explanation, indent = '  '): string {
  const lines: string[] = [];

  const visit = (node: Explanation, depth: number): void => {
    const prefix = indent.repeat(depth);
    if (node.type === 'initial') {
      lines.push(`${prefix}${renderFact(node.fact)} [initial]`);
      return;
    }
    lines.push(
      `${prefix}${renderFact(node.fact)} [${node.rule}, cycle ${node.cycle}] ${renderBindings(node.bindings)}`,
    );
    for (const support of node.supports) {
      visit(support, depth + 1);
    }
  };

  visit(explanation, 0);
  return lines.join('\n');
}

function isTermLike(value: unknown): value is Term {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    (typeof value === 'object' && value !== null && 'var' in value)
  );
}
