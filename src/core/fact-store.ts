import type { Constant, Fact, Pattern, ProvenanceRecord } from '../types/fact.js';
import { factKey, isVariable } from '../matching/terms.js';

/**
 * Notification about a fact entering working memory.
 */
export interface FactAddedEvent {
  fact: Fact;
  provenance?: ProvenanceRecord;
}

/**
 * Callback for fact insertions.
 */
export type FactAddedListener = (event: FactAddedEvent) => void;

export interface FactStoreConfig {
  name?: string;
  onFactAdded?: FactAddedListener;
}

/**
 * Working memory: an insertion-ordered set of ground facts.
 *
 * Facts are only ever added. A derived fact carries its provenance record
 * for as long as it lives in the store; initial facts have none.
 */
export class FactStore {
  private readonly facts: Map<string, Fact> = new Map();
  private readonly provenance: Map<string, ProvenanceRecord> = new Map();
  private readonly name: string;
  private readonly addListener: FactAddedListener | undefined;

  /**
   * Predicate index for faster matching.
   * Maps the first term of a fact to the keys of facts starting with it,
   * in insertion order.
   */
  private readonly predicateIndex: Map<Constant, Set<string>> = new Map();

  constructor(config: FactStoreConfig = {}) {
    this.name = config.name ?? 'facts';
    this.addListener = config.onFactAdded;
  }

  /**
   * Creates a store holding the given initial facts (no provenance).
   */
  static from(facts: Iterable<Fact>, config: FactStoreConfig = {}): FactStore {
    const store = new FactStore(config);
    for (const fact of facts) {
      store.add(fact);
    }
    return store;
  }

  /**
   * Adds a fact. Returns `false` when an equal fact is already present,
   * in which case neither the fact nor the provenance is recorded.
   */
  add(fact: Fact, provenance?: ProvenanceRecord): boolean {
    const key = factKey(fact);
    if (this.facts.has(key)) {
      return false;
    }

    const stored = Object.freeze([...fact]);
    this.facts.set(key, stored);
    this.indexKey(key, stored);

    if (provenance) {
      this.provenance.set(key, provenance);
    }

    this.notifyAdded(provenance ? { fact: stored, provenance } : { fact: stored });
    return true;
  }

  has(fact: Fact): boolean {
    return this.facts.has(factKey(fact));
  }

  /**
   * Provenance of a derived fact, `undefined` for initial or unknown facts.
   */
  getProvenance(fact: Fact): ProvenanceRecord | undefined {
    return this.provenance.get(factKey(fact));
  }

  isDerived(fact: Fact): boolean {
    return this.provenance.has(factKey(fact));
  }

  /**
   * Facts that could unify with the pattern, in insertion order.
   *
   * A pattern starting with a constant only sees facts sharing that first
   * term; any other pattern sees the whole store.
   */
  candidatesFor(pattern: Pattern): Fact[] {
    const first = pattern[0];
    if (first === undefined || isVariable(first)) {
      return this.getAll();
    }

    const keys = this.predicateIndex.get(first);
    if (!keys) {
      return [];
    }

    const results: Fact[] = [];
    for (const key of keys) {
      const fact = this.facts.get(key);
      if (fact) {
        results.push(fact);
      }
    }
    return results;
  }

  /**
   * Number of facts.
   */
  get size(): number {
    return this.facts.size;
  }

  /**
   * All facts in insertion order.
   */
  getAll(): Fact[] {
    return [...this.facts.values()];
  }

  /**
   * Derived facts in derivation order.
   */
  getDerived(): Fact[] {
    return this.getAll().filter((fact) => this.isDerived(fact));
  }

  private indexKey(key: string, fact: Fact): void {
    const first = fact[0];
    if (first === undefined) {
      return;
    }
    let keys = this.predicateIndex.get(first);
    if (!keys) {
      keys = new Set();
      this.predicateIndex.set(first, keys);
    }
    keys.add(key);
  }

  private notifyAdded(event: FactAddedEvent): void {
    if (this.addListener) {
      try {
        this.addListener(event);
      } catch (error) {
        console.error(`[${this.name}] Error in fact listener:`, error);
      }
    }
  }
}
