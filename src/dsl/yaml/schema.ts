/**
 * YAML schema validation and transformation into `RuleSet`.
 *
 * Provides structural validation with path-aware error messages. Semantic
 * checks (unbound consequent variables, arity, duplicate names) are done
 * by the engine's `RuleInputValidator` when the rule set is loaded.
 *
 * Two variable syntaxes are supported:
 * - Shorthand string: `?student`
 * - Explicit object: `{ var: student }`
 *
 * @module
 */

import type { Constant, Fact, Pattern, Term } from '../../types/fact.js';
import type { RuleInput, RuleSet } from '../../types/rule.js';
import { VARIABLE_NAME_RE, VARIABLE_PREFIX } from '../../validation/constants.js';
import { DslError } from '../helpers/errors.js';

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class YamlValidationError extends DslError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(`${path}: ${message}`);
    this.name = 'YamlValidationError';
    this.path = path;
  }
}

// ---------------------------------------------------------------------------
// Primitive validators
// ---------------------------------------------------------------------------

function get(obj: Record<string, unknown>, key: string): unknown {
  return obj[key];
}

function has(obj: Record<string, unknown>, key: string): boolean {
  return key in obj && obj[key] !== undefined && obj[key] !== null;
}

function requireString(value: unknown, path: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new YamlValidationError(
      `must be a non-empty string, got ${value === '' ? 'empty string' : typeof value}`,
      path,
    );
  }
  return value;
}

function requireNumber(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new YamlValidationError(`must be a finite number, got ${typeof value}`, path);
  }
  return value;
}

function requireArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new YamlValidationError(`must be an array, got ${describe(value)}`, path);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new YamlValidationError(`must be an object, got ${describe(value)}`, path);
  }
  return value;
}

/** First present key among aliases (`when` / `antecedents`). */
function requireAliased(obj: Record<string, unknown>, keys: readonly string[], path: string): [string, unknown] {
  for (const key of keys) {
    if (has(obj, key)) {
      return [key, get(obj, key)];
    }
  }
  throw new YamlValidationError(`missing required field "${keys[0] ?? ''}"`, path);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

// ---------------------------------------------------------------------------
// Terms
// ---------------------------------------------------------------------------

/**
 * Validates a raw term. `?name` strings and `{ var: name }` objects become
 * variables; strings, finite numbers and booleans are constants.
 */
export function validateTerm(value: unknown, path: string): Term {
  if (typeof value === 'string') {
    if (value.startsWith(VARIABLE_PREFIX)) {
      return variableTerm(value.slice(VARIABLE_PREFIX.length), path);
    }
    return value;
  }

  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'number') {
    return requireNumber(value, path);
  }

  if (isRecord(value)) {
    const keys = Object.keys(value);
    if (keys.length === 1 && keys[0] === 'var') {
      return variableTerm(value['var'], path);
    }
  }

  throw new YamlValidationError(
    `must be a string, number, boolean or { var: name }, got ${describe(value)}`,
    path,
  );
}

function variableTerm(name: unknown, path: string): Term {
  if (typeof name !== 'string' || !VARIABLE_NAME_RE.test(name)) {
    throw new YamlValidationError(`invalid variable name ${JSON.stringify(name)}`, path);
  }
  return { var: name };
}

export function validatePattern(value: unknown, path: string): Pattern {
  const terms = requireArray(value, path);
  if (terms.length === 0) {
    throw new YamlValidationError('must have at least one term', path);
  }
  return terms.map((term, i) => validateTerm(term, `${path}[${i}]`));
}

/**
 * Validates an initial fact: like a pattern, but every term must be a constant.
 */
export function validateFact(value: unknown, path: string): Fact {
  return validatePattern(value, path).map((term, i): Constant => {
    if (typeof term === 'object') {
      throw new YamlValidationError('facts must be ground, got a variable', `${path}[${i}]`);
    }
    return term;
  });
}

// ---------------------------------------------------------------------------
// Rule
// ---------------------------------------------------------------------------

/**
 * Validates a raw object (typically from a YAML parser) and returns a
 * type-safe `RuleInput`.
 *
 * Fields: `name` (required), `description`, `priority` (default `0`),
 * `when` or `antecedents` (required, non-empty), `then` or `consequent`
 * (required).
 *
 * @param obj  - The raw parsed object.
 * @param path - Dot-notated path prefix for error messages (default `"rule"`).
 * @throws {YamlValidationError} On any validation error (message includes the
 *         field path).
 */
export function validateRule(obj: unknown, path: string = 'rule'): RuleInput {
  const o = requireObject(obj, path);

  if (!has(o, 'name')) {
    throw new YamlValidationError('missing required field "name"', path);
  }
  const name = requireString(get(o, 'name'), `${path}.name`);

  const [whenKey, rawWhen] = requireAliased(o, ['when', 'antecedents'], path);
  const whenArr = requireArray(rawWhen, `${path}.${whenKey}`);
  if (whenArr.length === 0) {
    throw new YamlValidationError('must have at least one antecedent', `${path}.${whenKey}`);
  }

  const [thenKey, rawThen] = requireAliased(o, ['then', 'consequent'], path);

  const priorityVal = get(o, 'priority');
  const descriptionVal = get(o, 'description');

  const rule: RuleInput = {
    name,
    priority: priorityVal !== undefined ? requireNumber(priorityVal, `${path}.priority`) : 0,
    antecedents: whenArr.map((p, i) => validatePattern(p, `${path}.${whenKey}[${i}]`)),
    consequent: validatePattern(rawThen, `${path}.${thenKey}`),
  };

  if (descriptionVal !== undefined) {
    rule.description = requireString(descriptionVal, `${path}.description`);
  }

  return rule;
}

// ---------------------------------------------------------------------------
// Rule set
// ---------------------------------------------------------------------------

/**
 * Validates a rule-set document: `{ rules: [...], facts?: [...] }`.
 *
 * `facts` defaults to an empty working memory.
 */
export function validateRuleSet(obj: unknown, path: string = 'ruleSet'): RuleSet {
  const o = requireObject(obj, path);

  if (!has(o, 'rules')) {
    throw new YamlValidationError('missing required field "rules"', path);
  }
  const rules = requireArray(get(o, 'rules'), 'rules');
  const facts = has(o, 'facts') ? requireArray(get(o, 'facts'), 'facts') : [];

  return {
    rules: rules.map((rule, i) => validateRule(rule, `rules[${i}]`)),
    facts: facts.map((fact, i) => validateFact(fact, `facts[${i}]`)),
  };
}
