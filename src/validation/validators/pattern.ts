/**
 * Pattern and fact validation.
 *
 * @module
 */

import { VARIABLE_NAME_RE, VARIABLE_PREFIX } from '../constants.js';
import type { IssueCollector } from '../types.js';
import { isObject } from '../types.js';

export interface PatternCheck {
  /** Variable names in order of first occurrence */
  variables: string[];
  /** Every term is a constant or a well-formed variable */
  wellFormed: boolean;
}

/**
 * Validates a rule pattern. Variables are `{ var: name }` objects.
 */
export function validatePattern(pattern: unknown, path: string, collector: IssueCollector): PatternCheck {
  const result: PatternCheck = { variables: [], wellFormed: false };

  if (!Array.isArray(pattern)) {
    collector.addError(path, 'Pattern must be an array of terms');
    return result;
  }

  if (pattern.length === 0) {
    collector.addError(path, 'Pattern must have at least one term');
    return result;
  }

  let wellFormed = true;
  for (let i = 0; i < pattern.length; i++) {
    const term: unknown = pattern[i];
    const termPath = `${path}[${i}]`;

    if (isObject(term)) {
      const name = term['var'];
      if (typeof name !== 'string' || !VARIABLE_NAME_RE.test(name)) {
        collector.addError(termPath, 'Variable must have a valid "var" name');
        wellFormed = false;
      } else if (!result.variables.includes(name)) {
        result.variables.push(name);
      }
      continue;
    }

    if (!checkConstant(term, termPath, collector)) {
      wellFormed = false;
    }
  }

  result.wellFormed = wellFormed;
  return result;
}

/**
 * Validates an initial fact: a non-empty tuple of constants.
 */
export function validateFact(fact: unknown, path: string, collector: IssueCollector): boolean {
  if (!Array.isArray(fact)) {
    collector.addError(path, 'Fact must be an array of constants');
    return false;
  }

  if (fact.length === 0) {
    collector.addError(path, 'Fact must have at least one term');
    return false;
  }

  let valid = true;
  for (let i = 0; i < fact.length; i++) {
    const term: unknown = fact[i];
    const termPath = `${path}[${i}]`;

    if (isObject(term) && 'var' in term) {
      collector.addError(termPath, 'Fact must be ground (no variables)');
      valid = false;
    } else if (!checkConstant(term, termPath, collector)) {
      valid = false;
    }
  }
  return valid;
}

function checkConstant(term: unknown, path: string, collector: IssueCollector): boolean {
  if (typeof term === 'string') {
    if (term.startsWith(VARIABLE_PREFIX)) {
      collector.addWarning(
        path,
        `Constant "${term}" looks like a variable; use { var: "${term.slice(VARIABLE_PREFIX.length)}" }`,
      );
    }
    return true;
  }

  if (typeof term === 'boolean') {
    return true;
  }

  if (typeof term === 'number') {
    if (!Number.isFinite(term)) {
      collector.addError(path, 'Numeric term must be finite');
      return false;
    }
    return true;
  }

  collector.addError(path, 'Term must be a string, number, boolean or variable');
  return false;
}
