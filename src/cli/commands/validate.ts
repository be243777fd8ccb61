/**
 * The validate command: checks a rule-set file without running it.
 */

import type { GlobalOptions, ValidateOutput } from '../types.js';
import { RuleInputValidator } from '../../validation/index.js';
import { loadRuleSet } from '../services/rule-set-loader.js';
import { ValidationError } from '../utils/errors.js';
import { printData, print, warning } from '../utils/output.js';

/** Options of the validate command */
export interface ValidateOptions extends GlobalOptions {
  strict: boolean;
}

/**
 * Validate command action.
 */
export async function validateCommand(file: string, options: ValidateOptions): Promise<void> {
  const { ruleSet, path } = await loadRuleSet(file);
  const result = new RuleInputValidator({ strict: options.strict }).validateRuleSet(ruleSet);

  const output: ValidateOutput = {
    file: path,
    valid: result.valid,
    ruleCount: ruleSet.rules.length,
    factCount: ruleSet.facts.length,
    errorCount: result.errors.length,
    warningCount: result.warnings.length,
    errors: result.errors,
    warnings: result.warnings
  };

  printData({ type: 'validation', data: output });

  if (!result.valid) {
    throw new ValidationError(`Validation failed with ${result.errors.length} error(s)`, result.errors);
  }

  // In strict mode, warnings also cause non-zero exit
  if (options.strict && result.warnings.length > 0) {
    print('');
    print(warning('Strict mode: warnings treated as errors'));
    throw new ValidationError(
      `Strict validation failed with ${result.warnings.length} warning(s)`,
      result.warnings
    );
  }
}
