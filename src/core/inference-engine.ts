import type { Fact } from '../types/fact.js';
import type { RuleSet } from '../types/rule.js';
import type { Explanation } from '../types/explanation.js';
import type {
  ConflictStrategy,
  CycleResult,
  EngineState,
  EngineStats,
  FactDerivedListener,
  FiringRecord,
  InferenceEngineConfig,
  Instantiation,
  RunResult,
} from '../types/engine.js';
import { RuleInputValidator, RuleValidationError } from '../validation/index.js';
import { matchRule } from '../matching/instantiation-generator.js';
import { ExplanationBuilder } from '../explanation/explanation-builder.js';
import { TraceCollector } from '../debugging/trace-collector.js';
import { renderBindings, renderFact } from '../explanation/render.js';
import { FactStore, type FactAddedEvent } from './fact-store.js';
import { RuleBase } from './rule-base.js';
import { FiredHistory, filterFired } from './refraction.js';
import { selectInstantiation } from './conflict-resolver.js';
import { fire } from './executor.js';
import { CycleLimitError, EngineStateError } from './errors.js';

const DEFAULT_MAX_CYCLES = 10_000;

interface EngineInternals {
  cycles: number;
  duplicateFirings: number;
  durationMs: number;
}

/**
 * Forward-chaining inference engine.
 *
 * Owns one fact store and one fired-instantiation history. Each cycle
 * matches every rule against the current facts, drops instantiations that
 * already fired, lets the conflict strategy pick one and fires it. The run
 * ends `saturated` when nothing is left to fire, or `failed` when a cycle
 * throws.
 *
 * ```ts
 * const engine = new InferenceEngine({ rules, facts }, { strategy: 'specificity' });
 * const result = engine.run();
 * engine.explain(result.derivedFacts[0]);
 * ```
 */
export class InferenceEngine {
  private readonly ruleBase: RuleBase;
  private readonly factStore: FactStore;
  private readonly history = new FiredHistory();
  private readonly explanationBuilder: ExplanationBuilder;
  private readonly traceCollector: TraceCollector;
  private readonly config: Required<Omit<InferenceEngineConfig, 'tracing' | 'onFactDerived'>>;
  private readonly onFactDerived: FactDerivedListener | undefined;

  private readonly firings: FiringRecord[] = [];
  private readonly internals: EngineInternals = {
    cycles: 0,
    duplicateFirings: 0,
    durationMs: 0,
  };

  private _state: EngineState = 'running';
  private _failure: Error | undefined;

  /**
   * Loads the rule set. Rules and initial facts are validated first and
   * the engine refuses to start on any validation error.
   *
   * @throws {RuleValidationError} With every issue found.
   */
  constructor(ruleSet: RuleSet, config: InferenceEngineConfig = {}) {
    const validation = new RuleInputValidator().validateRuleSet(ruleSet);
    if (!validation.valid) {
      throw new RuleValidationError('Rule set validation failed', validation.errors);
    }

    this.config = {
      name: config.name ?? 'inference-engine',
      strategy: config.strategy ?? 'priority',
      maxCycles: config.maxCycles ?? DEFAULT_MAX_CYCLES,
    };
    this.onFactDerived = config.onFactDerived;

    this.ruleBase = new RuleBase(ruleSet.rules);
    this.factStore = FactStore.from(ruleSet.facts, {
      name: `${this.config.name}-facts`,
      ...(this.onFactDerived !== undefined && { onFactAdded: this.notifyDerived }),
    });
    this.explanationBuilder = new ExplanationBuilder(this.factStore);
    this.traceCollector = new TraceCollector({
      enabled: config.tracing?.enabled ?? false,
      maxEntries: config.tracing?.maxEntries ?? 10_000,
    });
  }

  get state(): EngineState {
    return this._state;
  }

  get strategy(): ConflictStrategy {
    return this.config.strategy;
  }

  /** Error that moved the engine to `failed`, if any. */
  get failure(): Error | undefined {
    return this._failure;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                              RUNNING
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Runs one match-select-fire cycle.
   *
   * @throws {EngineStateError} When the engine is already terminal.
   * @throws The error that failed the cycle; the engine is `failed` afterwards.
   */
  step(): CycleResult {
    if (this._state !== 'running') {
      throw new EngineStateError(this._state, 'step');
    }

    const startTime = performance.now();
    const cycle = ++this.internals.cycles;

    try {
      return this.runCycle(cycle);
    } catch (error) {
      this._state = 'failed';
      this._failure = error instanceof Error ? error : new Error(String(error));
      this.traceCollector.record('engine_failed', cycle, { error: this._failure.message });
      throw error;
    } finally {
      this.internals.durationMs += performance.now() - startTime;
    }
  }

  /**
   * Runs cycles until the engine saturates.
   *
   * @throws The error that failed the run.
   */
  run(): RunResult {
    while (this._state === 'running') {
      this.step();
    }
    return this.getResult();
  }

  private runCycle(cycle: number): CycleResult {
    this.traceCollector.record('cycle_started', cycle, { facts: this.factStore.size });

    const candidates: Instantiation[] = [];
    for (const rule of this.ruleBase.getAll()) {
      const unfired = filterFired(matchRule(rule, this.factStore), this.history);
      this.traceCollector.record('rule_matched', cycle, { instantiations: unfired.length }, rule.name);
      candidates.push(...unfired);
    }
    this.traceCollector.record('instantiations_matched', cycle, { candidates: candidates.length });

    if (candidates.length === 0) {
      this._state = 'saturated';
      this.traceCollector.record('engine_saturated', cycle, {
        firings: this.firings.length,
        facts: this.factStore.size,
      });
      return { cycle, state: this._state, candidates: 0 };
    }

    if (this.firings.length >= this.config.maxCycles) {
      throw new CycleLimitError(this.config.maxCycles);
    }

    const selected = selectInstantiation(candidates, this.config.strategy);
    this.traceCollector.record('instantiation_fired', cycle, {
      bindings: renderBindings(selected.bindings),
      strategy: this.config.strategy,
    }, selected.rule.name);

    const outcome = fire(selected, this.factStore, this.history, cycle);
    const firing: FiringRecord = {
      cycle,
      rule: selected.rule.name,
      bindings: selected.bindings,
      fact: outcome.fact,
      derived: outcome.derived,
    };
    this.firings.push(firing);

    if (outcome.derived) {
      this.traceCollector.record('fact_derived', cycle, { fact: renderFact(outcome.fact) }, selected.rule.name);
    } else {
      this.internals.duplicateFirings++;
      this.traceCollector.record('fact_already_known', cycle, { fact: renderFact(outcome.fact) }, selected.rule.name);
    }

    return { cycle, state: this._state, candidates: candidates.length, firing };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                              QUERIES
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Derivation tree of a fact in working memory.
   *
   * @throws {UnknownFactError} When the fact is not in working memory.
   */
  explain(fact: Fact): Explanation {
    return this.explanationBuilder.explain(fact);
  }

  hasFact(fact: Fact): boolean {
    return this.factStore.has(fact);
  }

  /** All facts in insertion order (initial facts first). */
  getFacts(): Fact[] {
    return this.factStore.getAll();
  }

  /** Derived facts in derivation order. */
  getDerivedFacts(): Fact[] {
    return this.factStore.getDerived();
  }

  /** Firing log in firing order. */
  getFirings(): FiringRecord[] {
    return [...this.firings];
  }

  getTraceCollector(): TraceCollector {
    return this.traceCollector;
  }

  getStats(): EngineStats {
    return {
      rulesCount: this.ruleBase.size,
      factsCount: this.factStore.size,
      cycles: this.internals.cycles,
      firings: this.firings.length,
      derivedFacts: this.firings.length - this.internals.duplicateFirings,
      duplicateFirings: this.internals.duplicateFirings,
      durationMs: this.internals.durationMs,
    };
  }

  getResult(): RunResult {
    return {
      state: this._state,
      strategy: this.config.strategy,
      cycles: this.internals.cycles,
      firings: this.getFirings(),
      facts: this.getFacts(),
      derivedFacts: this.getDerivedFacts(),
      stats: this.getStats(),
    };
  }

  private readonly notifyDerived = (event: FactAddedEvent): void => {
    if (event.provenance && this.onFactDerived) {
      this.onFactDerived(event.fact, event.provenance);
    }
  };
}
