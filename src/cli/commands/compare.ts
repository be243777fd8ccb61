/**
 * The compare command: runs a rule set under every conflict strategy.
 */

import type { CliConfig, GlobalOptions } from '../types.js';
import type { StrategyComparison } from '../../core/strategy-comparison.js';
import { compareStrategies } from '../../core/strategy-comparison.js';
import { RuleValidationError } from '../../validation/index.js';
import { loadRuleSet } from '../services/rule-set-loader.js';
import { RunFailedError, ValidationError } from '../utils/errors.js';
import { printData } from '../utils/output.js';
import { resolveMaxCycles } from './engine-factory.js';

/** Options of the compare command */
export interface CompareCommandOptions extends GlobalOptions {
  maxCycles: number | undefined;
}

/**
 * Compare command action.
 */
export async function compareCommand(file: string, options: CompareCommandOptions, config: CliConfig): Promise<void> {
  const { ruleSet } = await loadRuleSet(file);
  const maxCycles = resolveMaxCycles(options.maxCycles, config);

  let comparison: StrategyComparison;
  try {
    comparison = compareStrategies(ruleSet, undefined, { maxCycles });
  } catch (err) {
    if (err instanceof RuleValidationError) {
      throw new ValidationError('Rule set validation failed', err.issues, err);
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new RunFailedError(`Run failed: ${message}`, err instanceof Error ? err : undefined);
  }

  printData({ type: 'comparison', data: comparison });
}
