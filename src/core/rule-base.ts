import type { Pattern } from '../types/fact.js';
import type { Rule, RuleInput } from '../types/rule.js';

/**
 * Read-only table of compiled rules in declared order.
 *
 * Loaded once before a run. Inputs are expected to be validated already
 * (see `RuleInputValidator`).
 */
export class RuleBase {
  private readonly rules: readonly Rule[];
  private readonly byName: Map<string, Rule>;

  constructor(inputs: readonly RuleInput[]) {
    this.rules = Object.freeze(inputs.map(compileRule));
    this.byName = new Map(this.rules.map((rule) => [rule.name, rule]));
  }

  get(name: string): Rule | undefined {
    return this.byName.get(name);
  }

  getAll(): readonly Rule[] {
    return this.rules;
  }

  get size(): number {
    return this.rules.length;
  }
}

function compileRule(input: RuleInput, order: number): Rule {
  const antecedents = input.antecedents.map(freezePattern);
  return Object.freeze({
    name: input.name,
    ...(input.description !== undefined && { description: input.description }),
    priority: input.priority ?? 0,
    antecedents: Object.freeze(antecedents),
    consequent: freezePattern(input.consequent),
    order,
    specificity: antecedents.length,
  });
}

function freezePattern(pattern: Pattern): Pattern {
  return Object.freeze(pattern.map((term) => (typeof term === 'object' ? Object.freeze({ var: term.var }) : term)));
}
