import type { Fact } from '../types/fact.js';
import type { RuleSet } from '../types/rule.js';
import type { Explanation } from '../types/explanation.js';
import type { ConflictStrategy, InferenceEngineConfig, RunResult } from '../types/engine.js';
import { CONFLICT_STRATEGIES } from '../validation/constants.js';
import { factKey } from '../matching/terms.js';
import { InferenceEngine } from './inference-engine.js';

/** Outcome of one strategy in a comparison */
export interface StrategyRun {
  strategy: ConflictStrategy;
  result: RunResult;
  /** Derivation trees of the derived facts, in derivation order */
  explanations: Explanation[];
}

export interface StrategyComparison {
  runs: StrategyRun[];
  /** Whether every run ended with the same set of facts */
  sameFinalFacts: boolean;
  /** Rule fired first by each strategy (`undefined` if nothing fired) */
  firstFired: Partial<Record<ConflictStrategy, string>>;
}

/**
 * Runs the rule set once per strategy.
 *
 * Every run gets its own engine, so its own copy of the initial facts and
 * a fresh history; no run sees another run's derived facts.
 */
export function compareStrategies(
  ruleSet: RuleSet,
  strategies: readonly ConflictStrategy[] = CONFLICT_STRATEGIES,
  config: Omit<InferenceEngineConfig, 'strategy'> = {},
): StrategyComparison {
  const runs = strategies.map((strategy): StrategyRun => {
    const engine = new InferenceEngine(ruleSet, { ...config, strategy });
    const result = engine.run();
    return {
      strategy,
      result,
      explanations: result.derivedFacts.map((fact) => engine.explain(fact)),
    };
  });

  const firstFired: Partial<Record<ConflictStrategy, string>> = {};
  for (const run of runs) {
    const first = run.result.firings[0];
    if (first) {
      firstFired[run.strategy] = first.rule;
    }
  }

  return {
    runs,
    sameFinalFacts: runs.every((run, _, all) => sameFactSet(run.result.facts, all[0]?.result.facts ?? [])),
    firstFired,
  };
}

function sameFactSet(a: readonly Fact[], b: readonly Fact[]): boolean {
  if (a.length !== b.length) return false;
  const keys = new Set(a.map(factKey));
  return b.every((fact) => keys.has(factKey(fact)));
}
