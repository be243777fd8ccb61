import { describe, it, expect } from 'vitest';
import { RuleInputValidator, RuleValidationError } from '../../../src/validation/index.js';

const s = { var: 's' };
const c = { var: 'c' };

const gradOnly = {
  name: 'grad-only-violation',
  priority: 5,
  antecedents: [
    ['enrolled', s, c],
    ['graduate-only', c],
  ],
  consequent: ['flag-violation', s, c],
};

describe('RuleInputValidator', () => {
  const validator = new RuleInputValidator();

  describe('validate()', () => {
    it('accepts a well-formed rule', () => {
      expect(validator.validate(gradOnly)).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it('rejects a non-object', () => {
      expect(validator.validate('rule').errors).toEqual([
        { path: '(root)', message: 'Rule must be an object', severity: 'error' },
      ]);
    });

    it('reports every missing required field', () => {
      const result = validator.validate({});

      expect(result.errors.map((e) => `${e.path}: ${e.message}`)).toEqual([
        'name: Required field "name" is missing',
        'antecedents: Required field "antecedents" is missing',
        'consequent: Required field "consequent" is missing',
      ]);
    });

    it('rejects an empty name', () => {
      const result = validator.validate({ ...gradOnly, name: '  ' });

      expect(result.errors).toEqual([{ path: 'name', message: 'Field "name" cannot be empty', severity: 'error' }]);
    });

    it('rejects a rule without antecedents', () => {
      const result = validator.validate({ ...gradOnly, antecedents: [], consequent: ['flag'] });

      expect(result.errors).toEqual([
        { path: 'antecedents', message: 'Rule must have at least one antecedent', severity: 'error' },
      ]);
    });

    it('rejects consequent variables not bound by an antecedent', () => {
      const result = validator.validate({ ...gradOnly, consequent: ['flag-violation', s, { var: 'reason' }] });

      expect(result.errors).toEqual([
        {
          path: 'consequent',
          message: 'Variable "?reason" is not bound by any antecedent',
          severity: 'error',
        },
      ]);
    });

    it('rejects empty patterns and invalid terms', () => {
      const result = validator.validate({
        ...gradOnly,
        antecedents: [[], ['enrolled', null, c], ['x', { var: '1bad' }]],
      });

      expect(result.errors.map((e) => `${e.path}: ${e.message}`)).toEqual([
        'antecedents[0]: Pattern must have at least one term',
        'antecedents[1][1]: Term must be a string, number, boolean or variable',
        'antecedents[2][1]: Variable must have a valid "var" name',
        'consequent: Variable "?s" is not bound by any antecedent',
      ]);
    });

    it('rejects non-finite numbers', () => {
      const result = validator.validate({ ...gradOnly, consequent: ['flag-violation', s, Infinity] });

      expect(result.errors).toEqual([
        { path: 'consequent[2]', message: 'Numeric term must be finite', severity: 'error' },
      ]);
    });

    it('warns about string constants that look like variables', () => {
      const result = validator.validate({ ...gradOnly, antecedents: [['enrolled', s, c], ['graduate-only', '?c']] });

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([
        {
          path: 'antecedents[1][1]',
          message: 'Constant "?c" looks like a variable; use { var: "c" }',
          severity: 'warning',
        },
      ]);
    });

    it('treats a non-number priority as an error and a fractional one as a warning', () => {
      expect(validator.validate({ ...gradOnly, priority: 'high' }).errors).toEqual([
        { path: 'priority', message: 'Field "priority" must be a finite number', severity: 'error' },
      ]);

      const fractional = validator.validate({ ...gradOnly, priority: 1.5 });
      expect(fractional.valid).toBe(true);
      expect(fractional.warnings).toEqual([
        { path: 'priority', message: 'Field "priority" should be an integer', severity: 'warning' },
      ]);
    });

    it('checks arity within one rule', () => {
      const result = validator.validate({
        ...gradOnly,
        antecedents: [['enrolled', s, c], ['enrolled', s]],
      });

      expect(result.errors).toEqual([
        {
          path: 'antecedents[1]',
          message: 'Predicate "enrolled" has arity 2, but arity 3 at antecedents[0]',
          severity: 'error',
        },
      ]);
    });
  });

  describe('validateMany()', () => {
    it('reports duplicate names', () => {
      const result = validator.validateMany([gradOnly, gradOnly]);

      expect(result.errors).toEqual([
        { path: '[1].name', message: 'Duplicate rule name: grad-only-violation', severity: 'error' },
      ]);
    });

    it('requires an array', () => {
      expect(validator.validateMany(gradOnly).errors[0]?.message).toBe('Rules must be an array');
    });
  });

  describe('validateRuleSet()', () => {
    it('accepts a consistent rule set', () => {
      const result = validator.validateRuleSet({
        rules: [gradOnly],
        facts: [
          ['enrolled', 'Alice', 'CS501'],
          ['graduate-only', 'CS501'],
        ],
      });

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([]);
    });

    it('requires rules and facts', () => {
      expect(validator.validateRuleSet({}).errors.map((e) => e.message)).toEqual([
        'Required field "rules" is missing',
        'Required field "facts" is missing',
      ]);
    });

    it('warns about an empty rule list', () => {
      const result = validator.validateRuleSet({ rules: [], facts: [] });

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([{ path: 'rules', message: 'Rule set has no rules', severity: 'warning' }]);
    });

    it('rejects non-ground and empty facts', () => {
      const result = validator.validateRuleSet({
        rules: [gradOnly],
        facts: [['enrolled', s, 'CS501'], [], 'student'],
      });

      expect(result.errors.map((e) => `${e.path}: ${e.message}`)).toEqual([
        'facts[0][1]: Fact must be ground (no variables)',
        'facts[1]: Fact must have at least one term',
        'facts[2]: Fact must be an array of constants',
      ]);
    });

    it('checks fact arity against the rule patterns', () => {
      const result = validator.validateRuleSet({
        rules: [gradOnly],
        facts: [['graduate-only', 'CS501', 'fall']],
      });

      expect(result.errors).toEqual([
        {
          path: 'facts[0]',
          message: 'Fact "graduate-only" has arity 3, but patterns use arity 2 (rules[0].antecedents[1])',
          severity: 'error',
        },
      ]);
    });

    it('accepts facts of differing arity when no pattern uses their predicate', () => {
      const result = validator.validateRuleSet({
        rules: [gradOnly],
        facts: [['note', 'a'], ['note', 'a', 'b'], ['graduate-only', 'CS501']],
      });

      expect(result).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it('uses rule indexes in paths', () => {
      const result = validator.validateRuleSet({
        rules: [gradOnly, { ...gradOnly, name: 'second', antecedents: [] }],
        facts: [],
      });

      expect(result.errors).toEqual([
        { path: 'rules[1].antecedents', message: 'Rule must have at least one antecedent', severity: 'error' },
        {
          path: 'rules[1].consequent',
          message: 'Variable "?s" is not bound by any antecedent',
          severity: 'error',
        },
        {
          path: 'rules[1].consequent',
          message: 'Variable "?c" is not bound by any antecedent',
          severity: 'error',
        },
      ]);
    });
  });

  describe('strict mode', () => {
    it('warns about antecedent variables used only once', () => {
      const strict = new RuleInputValidator({ strict: true });
      const result = strict.validate({
        name: 'any-enrollment',
        antecedents: [['enrolled', s, c]],
        consequent: ['student', s],
      });

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([
        { path: 'antecedents', message: 'Variable "?c" is bound but never used', severity: 'warning' },
      ]);
    });

    it('is silent when every variable joins or reaches the consequent', () => {
      const strict = new RuleInputValidator({ strict: true });

      expect(strict.validate(gradOnly).warnings).toEqual([]);
    });

    it('is off by default', () => {
      const result = validator.validate({
        name: 'any-enrollment',
        antecedents: [['enrolled', s, c]],
        consequent: ['student', s],
      });

      expect(result.warnings).toEqual([]);
    });
  });
});

describe('RuleValidationError', () => {
  it('lists every issue in its message', () => {
    const error = new RuleValidationError('Rule set validation failed', [
      { path: 'rules[0].name', message: 'Field "name" cannot be empty', severity: 'error' },
      { path: 'facts[2]', message: 'Fact must have at least one term', severity: 'error' },
    ]);

    expect(error.message).toBe(
      'Rule set validation failed: rules[0].name: Field "name" cannot be empty; facts[2]: Fact must have at least one term',
    );
    expect(error.statusCode).toBe(400);
    expect(error.code).toBe('RULE_VALIDATION_ERROR');
    expect(error.details).toBe(error.issues);
  });
});
