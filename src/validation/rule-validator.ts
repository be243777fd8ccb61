/**
 * Main rule input validator.
 *
 * Validates rules and whole rule sets and returns all issues (errors +
 * warnings) rather than throwing on the first problem. The engine runs it
 * before a run starts and refuses to start when errors are found.
 *
 * @module
 */

import { IssueCollector, isObject, hasProperty } from './types.js';
import type { ValidationResult } from './types.js';
import { validatePattern, validateFact } from './validators/pattern.js';
import { ArityTracker } from './validators/arity.js';

/** Options for {@link RuleInputValidator}. */
export interface ValidatorOptions {
  /** When true, reports variables used only once in a rule as warnings. */
  strict?: boolean;
}

type RuleRecord = Record<string, unknown>;

/**
 * Validates rule inputs against the expected schema.
 *
 * ```ts
 * const v = new RuleInputValidator();
 * const result = v.validateRuleSet({ rules, facts });
 * if (!result.valid) { … }
 * ```
 */
export class RuleInputValidator {
  private readonly strict: boolean;

  constructor(options: ValidatorOptions = {}) {
    this.strict = options.strict ?? false;
  }

  /** Validates a single rule input. */
  validate(input: unknown): ValidationResult {
    const collector = new IssueCollector();

    if (!isObject(input)) {
      collector.addError('', 'Rule must be an object');
      return collector.toResult();
    }

    this.validateRule(input, '', collector, new ArityTracker());
    return collector.toResult();
  }

  /** Validates an array of rule inputs, including duplicate-name detection. */
  validateMany(inputs: unknown): ValidationResult {
    const collector = new IssueCollector();
    this.validateRules(inputs, '', collector, new ArityTracker());
    return collector.toResult();
  }

  /**
   * Validates a rule set: `{ rules, facts }`.
   *
   * Arity is checked across rule patterns; each fact is checked against
   * the patterns sharing its predicate.
   */
  validateRuleSet(input: unknown): ValidationResult {
    const collector = new IssueCollector();

    if (!isObject(input)) {
      collector.addError('', 'Rule set must be an object');
      return collector.toResult();
    }

    const arity = new ArityTracker();

    if (!hasProperty(input, 'rules')) {
      collector.addError('rules', 'Required field "rules" is missing');
    } else {
      this.validateRules(input['rules'], 'rules', collector, arity);
    }

    if (!hasProperty(input, 'facts')) {
      collector.addError('facts', 'Required field "facts" is missing');
    } else {
      this.validateFacts(input['facts'], 'facts', collector, arity);
    }

    return collector.toResult();
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private validateRules(inputs: unknown, prefix: string, collector: IssueCollector, arity: ArityTracker): void {
    if (!Array.isArray(inputs)) {
      collector.addError(prefix, 'Rules must be an array');
      return;
    }

    if (inputs.length === 0) {
      collector.addWarning(prefix, 'Rule set has no rules');
    }

    const names = new Set<string>();

    for (let i = 0; i < inputs.length; i++) {
      const rule: unknown = inputs[i];
      const rulePrefix = `${prefix}[${i}]`;

      if (!isObject(rule)) {
        collector.addError(rulePrefix, 'Rule must be an object');
        continue;
      }

      const name = rule['name'];
      if (typeof name === 'string') {
        if (names.has(name)) {
          collector.addError(this.fieldPath(rulePrefix, 'name'), `Duplicate rule name: ${name}`);
        } else {
          names.add(name);
        }
      }

      this.validateRule(rule, rulePrefix, collector, arity);
    }
  }

  private validateFacts(facts: unknown, prefix: string, collector: IssueCollector, arity: ArityTracker): void {
    if (!Array.isArray(facts)) {
      collector.addError(prefix, 'Facts must be an array');
      return;
    }

    for (let i = 0; i < facts.length; i++) {
      const path = `${prefix}[${i}]`;
      if (validateFact(facts[i], path, collector)) {
        arity.checkFact(facts[i], path, collector);
      }
    }
  }

  private validateRule(rule: RuleRecord, prefix: string, collector: IssueCollector, arity: ArityTracker): void {
    this.validateRequiredFields(rule, prefix, collector);
    this.validateOptionalFields(rule, prefix, collector);

    const bound = new Set<string>();
    const occurrences = new Map<string, number>();
    const count = (vars: readonly string[], pattern: unknown): void => {
      if (!Array.isArray(pattern)) return;
      for (const term of pattern) {
        const name: unknown = isObject(term) ? term['var'] : undefined;
        if (typeof name === 'string' && vars.includes(name)) {
          occurrences.set(name, (occurrences.get(name) ?? 0) + 1);
        }
      }
    };

    if (hasProperty(rule, 'antecedents')) {
      const antecedents = rule['antecedents'];
      const path = this.fieldPath(prefix, 'antecedents');

      if (!Array.isArray(antecedents)) {
        collector.addError(path, 'Field "antecedents" must be an array');
      } else if (antecedents.length === 0) {
        collector.addError(path, 'Rule must have at least one antecedent');
      } else {
        for (let i = 0; i < antecedents.length; i++) {
          const antecedentPath = `${path}[${i}]`;
          const check = validatePattern(antecedents[i], antecedentPath, collector);
          check.variables.forEach((name) => bound.add(name));
          count(check.variables, antecedents[i]);
          if (check.wellFormed) {
            arity.observe(antecedents[i], antecedentPath, collector);
          }
        }
      }
    }

    if (hasProperty(rule, 'consequent')) {
      const consequent = rule['consequent'];
      const path = this.fieldPath(prefix, 'consequent');
      const check = validatePattern(consequent, path, collector);
      count(check.variables, consequent);

      for (const name of check.variables) {
        if (!bound.has(name)) {
          collector.addError(path, `Variable "?${name}" is not bound by any antecedent`);
        }
      }
      if (check.wellFormed) {
        arity.observe(consequent, path, collector);
      }
    }

    if (this.strict) {
      for (const [name, uses] of occurrences) {
        if (uses === 1 && bound.has(name)) {
          collector.addWarning(
            this.fieldPath(prefix, 'antecedents'),
            `Variable "?${name}" is bound but never used`,
          );
        }
      }
    }
  }

  private validateRequiredFields(rule: RuleRecord, prefix: string, collector: IssueCollector): void {
    if (!hasProperty(rule, 'name')) {
      collector.addError(this.fieldPath(prefix, 'name'), 'Required field "name" is missing');
    } else if (typeof rule['name'] !== 'string') {
      collector.addError(this.fieldPath(prefix, 'name'), 'Field "name" must be a string');
    } else if (rule['name'].trim() === '') {
      collector.addError(this.fieldPath(prefix, 'name'), 'Field "name" cannot be empty');
    }

    if (!hasProperty(rule, 'antecedents')) {
      collector.addError(this.fieldPath(prefix, 'antecedents'), 'Required field "antecedents" is missing');
    }

    if (!hasProperty(rule, 'consequent')) {
      collector.addError(this.fieldPath(prefix, 'consequent'), 'Required field "consequent" is missing');
    }
  }

  private validateOptionalFields(rule: RuleRecord, prefix: string, collector: IssueCollector): void {
    if (hasProperty(rule, 'description') && typeof rule['description'] !== 'string') {
      collector.addError(
        this.fieldPath(prefix, 'description'),
        'Field "description" must be a string',
      );
    }

    if (hasProperty(rule, 'priority')) {
      const priority = rule['priority'];
      if (typeof priority !== 'number' || !Number.isFinite(priority)) {
        collector.addError(
          this.fieldPath(prefix, 'priority'),
          'Field "priority" must be a finite number',
        );
      } else if (!Number.isInteger(priority)) {
        collector.addWarning(
          this.fieldPath(prefix, 'priority'),
          'Field "priority" should be an integer',
        );
      }
    }
  }

  private fieldPath(prefix: string, field: string): string {
    return prefix ? `${prefix}.${field}` : field;
  }
}
