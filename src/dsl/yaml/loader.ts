/**
 * YAML loader for rule sets.
 *
 * Accepts two shapes of YAML input:
 * - An object with `rules` (and optionally `facts`)
 * - A top-level sequence of rules (no initial facts)
 *
 * @example
 * ```typescript
 * import { loadRuleSetFromYAML, loadRuleSetFromFile } from 'forward-rules/dsl';
 *
 * const ruleSet = loadRuleSetFromYAML(`
 *   rules:
 *     - name: grad-only-violation
 *       priority: 5
 *       when:
 *         - [enrolled, '?s', '?c']
 *         - [graduate-only, '?c']
 *       then: [flag-violation, '?s', '?c']
 *   facts:
 *     - [enrolled, Alice, CS501]
 *     - [graduate-only, CS501]
 * `);
 *
 * const fromFile = await loadRuleSetFromFile('./rulesets/enrollment.yaml');
 * ```
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { validateRuleSet, YamlValidationError } from './schema.js';
import type { RuleSet } from '../../types/rule.js';
import { DslError } from '../helpers/errors.js';

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class YamlLoadError extends DslError {
  constructor(message: string, readonly filePath?: string | undefined) {
    super(filePath ? `${filePath}: ${message}` : message);
    this.name = 'YamlLoadError';
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parses a YAML string into a structurally validated rule set.
 *
 * @throws {YamlLoadError} On YAML syntax errors or empty input
 * @throws {YamlValidationError} When the structure of a rule or fact is invalid
 */
export function loadRuleSetFromYAML(yamlContent: string): RuleSet {
  let parsed: unknown;
  try {
    parsed = parse(yamlContent);
  } catch (err) {
    throw new YamlLoadError(
      `YAML syntax error: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (parsed === null || parsed === undefined) {
    throw new YamlLoadError('YAML content is empty');
  }

  // Top-level sequence of rules
  if (Array.isArray(parsed)) {
    if (parsed.length === 0) {
      throw new YamlLoadError('YAML array is empty, expected at least one rule');
    }
    return validateRuleSet({ rules: parsed });
  }

  if (typeof parsed !== 'object') {
    throw new YamlLoadError(`Expected YAML object or array, got ${typeof parsed}`);
  }

  return validateRuleSet(parsed);
}

/**
 * Loads a rule set from a YAML file.
 *
 * @throws {YamlLoadError} On read errors, YAML syntax errors, empty files
 *         and structural validation errors (prefixed with the file path)
 */
export async function loadRuleSetFromFile(filePath: string): Promise<RuleSet> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new YamlLoadError(
      `Failed to read file: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }

  try {
    return loadRuleSetFromYAML(content);
  } catch (err) {
    if (err instanceof YamlLoadError) {
      throw new YamlLoadError(err.message, filePath);
    }
    if (err instanceof YamlValidationError) {
      throw new YamlLoadError(err.message, filePath);
    }
    throw err;
  }
}
