import type { Bindings, Fact, ProvenanceRecord } from './fact.js';
import type { Rule } from './rule.js';

/** Conflict-resolution strategy, one per run */
export type ConflictStrategy = 'priority' | 'specificity' | 'order';

/** Engine lifecycle: `saturated` and `failed` are terminal */
export type EngineState = 'running' | 'saturated' | 'failed';

/** A (rule, binding set) pair eligible to fire */
export interface Instantiation {
  readonly rule: Rule;
  readonly bindings: Bindings;
  /** Discovery position of the binding set within its rule's matches */
  readonly ordinal: number;
}

/** One entry of the firing log */
export interface FiringRecord {
  cycle: number;
  rule: string;
  bindings: Bindings;
  fact: Fact;
  derived: boolean;     // false = the consequent was already known
}

/** Result of a single match-select-fire cycle */
export interface CycleResult {
  cycle: number;
  state: EngineState;
  candidates: number;
  firing?: FiringRecord;
}

/** Engine counters */
export interface EngineStats {
  rulesCount: number;
  factsCount: number;
  cycles: number;
  firings: number;
  derivedFacts: number;
  duplicateFirings: number;
  durationMs: number;
}

/** Result of running the engine to a terminal state */
export interface RunResult {
  state: EngineState;
  strategy: ConflictStrategy;
  cycles: number;
  firings: FiringRecord[];
  facts: Fact[];
  derivedFacts: Fact[];
  stats: EngineStats;
}

/** Callback for newly derived facts */
export type FactDerivedListener = (fact: Fact, provenance: ProvenanceRecord) => void;

/** Tracing configuration */
export interface TracingConfig {
  enabled?: boolean;
  maxEntries?: number;
}

/** Engine configuration */
export interface InferenceEngineConfig {
  /** Name used in diagnostics (default: 'inference-engine') */
  name?: string;

  /** Conflict-resolution strategy (default: 'priority') */
  strategy?: ConflictStrategy;

  /** Upper bound on firing cycles before the run fails (default: 10000) */
  maxCycles?: number;

  tracing?: TracingConfig;

  onFactDerived?: FactDerivedListener;
}
