/**
 * The explain command: runs a rule set and prints the derivation tree of
 * one fact.
 */

import type { CliConfig, GlobalOptions } from '../types.js';
import type { Constant } from '../../types/fact.js';
import { UnknownFactError } from '../../core/errors.js';
import { loadRuleSet } from '../services/rule-set-loader.js';
import { CliError, InvalidArgumentsError, RunFailedError } from '../utils/errors.js';
import { printData } from '../utils/output.js';
import { createEngine, resolveMaxCycles, resolveStrategy, type EngineOptions } from './engine-factory.js';

/** Options of the explain command */
export interface ExplainCommandOptions extends GlobalOptions, EngineOptions {}

const NUMBER_RE = /^-?\d+(\.\d+)?$/;

/**
 * Reads a command-line fact term: `true`/`false` become booleans and
 * decimal literals numbers, anything else stays a string.
 */
export function parseFactTerm(raw: string): Constant {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (NUMBER_RE.test(raw)) return Number(raw);
  return raw;
}

/**
 * Explain command action.
 */
export async function explainCommand(
  file: string,
  terms: readonly (string | number)[],
  options: ExplainCommandOptions,
  config: CliConfig
): Promise<void> {
  if (terms.length === 0) {
    throw new InvalidArgumentsError('Fact to explain needs at least one term');
  }
  const fact = terms.map((term) => parseFactTerm(String(term)));

  const { ruleSet } = await loadRuleSet(file);
  const engine = createEngine(ruleSet, {
    strategy: resolveStrategy(options.strategy, config),
    maxCycles: resolveMaxCycles(options.maxCycles, config)
  });

  try {
    engine.run();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RunFailedError(`Run failed: ${message}`, err instanceof Error ? err : undefined);
  }

  try {
    printData({ type: 'explanation', data: engine.explain(fact) });
  } catch (err) {
    if (err instanceof UnknownFactError) {
      throw new CliError(err.message, undefined, err);
    }
    throw err;
  }
}
