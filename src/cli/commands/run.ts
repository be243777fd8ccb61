/**
 * The run command: runs a rule set to saturation and prints what fired.
 */

import type { CliConfig, GlobalOptions, RunOutput } from '../types.js';
import type { RunResult } from '../../types/engine.js';
import { loadRuleSet } from '../services/rule-set-loader.js';
import { RunFailedError } from '../utils/errors.js';
import { printData } from '../utils/output.js';
import { createEngine, resolveMaxCycles, resolveStrategy, type EngineOptions } from './engine-factory.js';

/** Options of the run command */
export interface RunCommandOptions extends GlobalOptions, EngineOptions {
  explain: boolean;
  trace: boolean;
}

/**
 * Run command action.
 */
export async function runCommand(file: string, options: RunCommandOptions, config: CliConfig): Promise<void> {
  const { ruleSet, path } = await loadRuleSet(file);

  const engine = createEngine(ruleSet, {
    strategy: resolveStrategy(options.strategy, config),
    maxCycles: resolveMaxCycles(options.maxCycles, config),
    tracing: { enabled: options.trace }
  });

  let result: RunResult;
  try {
    result = engine.run();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RunFailedError(`Run failed: ${message}`, err instanceof Error ? err : undefined);
  }

  const output: RunOutput = {
    file: path,
    result,
    explanations: options.explain ? result.derivedFacts.map((fact) => engine.explain(fact)) : [],
    trace: options.trace ? engine.getTraceCollector().query({}) : []
  };

  printData({ type: 'run', data: output });
}
