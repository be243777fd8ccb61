import type { RuleInput } from '../../types/rule.js';
import type { PatternInput, RuleBuildContext } from '../types.js';
import { DslValidationError } from '../helpers/errors.js';
import { requireFiniteNumber, requireNonEmptyString } from '../helpers/validators.js';
import { toPattern } from '../helpers/terms.js';

/**
 * Fluent builder for assembling rule definitions.
 *
 * Use the static {@link RuleBuilder.create} method (also exported as `Rule`)
 * as the entry point, then chain configuration methods and finish with
 * {@link RuleBuilder.build}.
 *
 * @example
 * ```typescript
 * Rule.create('grad-only-violation')
 *   .priority(5)
 *   .when(['enrolled', '?s', '?c'], ['graduate-only', '?c'])
 *   .then(['flag-violation', '?s', '?c'])
 *   .build();
 * ```
 */
export class RuleBuilder {
  private ctx: RuleBuildContext;

  private constructor(name: string) {
    this.ctx = {
      name,
      antecedents: [],
    };
  }

  /**
   * Creates a new rule builder.
   *
   * @param name - Unique rule name (must be a non-empty string).
   * @throws {DslValidationError} If `name` is empty or not a string.
   */
  static create(name: string): RuleBuilder {
    requireNonEmptyString(name, 'Rule name');
    return new RuleBuilder(name);
  }

  /**
   * Sets an optional description for the rule.
   */
  description(value: string): this {
    this.ctx.description = value;
    return this;
  }

  /**
   * Sets the priority used by the priority strategy (higher wins, default `0`).
   *
   * @throws {DslValidationError} If `value` is not a finite number.
   */
  priority(value: number): this {
    requireFiniteNumber(value, 'Priority');
    this.ctx.priority = value;
    return this;
  }

  /**
   * Appends antecedent patterns. All antecedents must hold jointly.
   *
   * Calling `when()` multiple times accumulates patterns in call order.
   */
  when(...patterns: PatternInput[]): this {
    if (patterns.length === 0) {
      throw new DslValidationError('when() needs at least one pattern');
    }
    this.ctx.antecedents.push(...patterns);
    return this;
  }

  /**
   * Sets the consequent pattern.
   */
  then(pattern: PatternInput): this {
    this.ctx.consequent = pattern;
    return this;
  }

  /**
   * Validates the accumulated state and returns the rule input.
   *
   * Terms are normalized here (`'?x'` → `{ var: 'x' }`); semantic checks
   * such as unbound consequent variables are left to the engine's
   * validator.
   *
   * @throws {DslValidationError} If antecedents or the consequent are missing.
   */
  build(): RuleInput {
    if (this.ctx.antecedents.length === 0) {
      throw new DslValidationError(`Rule "${this.ctx.name}": at least one antecedent is required. Use .when() to add one.`);
    }

    if (!this.ctx.consequent) {
      throw new DslValidationError(`Rule "${this.ctx.name}": consequent is required. Use .then() to set it.`);
    }

    return {
      name: this.ctx.name,
      ...(this.ctx.description !== undefined && { description: this.ctx.description }),
      priority: this.ctx.priority ?? 0,
      antecedents: this.ctx.antecedents.map((pattern, i) => toPattern(pattern, `antecedents[${i}]`)),
      consequent: toPattern(this.ctx.consequent, 'consequent'),
    };
  }
}

/**
 * Entry point for the fluent rule builder.
 */
export const Rule = {
  create: (name: string): RuleBuilder => RuleBuilder.create(name),
} as const;
