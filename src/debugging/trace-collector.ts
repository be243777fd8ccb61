import type {
  TraceEntry,
  TraceEntryType,
  TraceFilter,
  TraceSubscriber,
} from './types.js';

/** Configuration options for TraceCollector */
export interface TraceCollectorConfig {
  /** Maximum number of entries to keep in the ring buffer (default: 10000) */
  maxEntries?: number;

  /** Whether tracing is initially enabled (default: false) */
  enabled?: boolean;
}

/**
 * Collects and indexes trace entries from inference runs.
 *
 * Uses a ring buffer to limit memory usage while keeping lookup by cycle,
 * rule name, and entry type.
 */
export class TraceCollector {
  private readonly maxEntries: number;
  private enabled: boolean;
  private nextSeq = 1;

  private readonly entries: TraceEntry[] = [];
  private readonly byCycle = new Map<number, Set<number>>();
  private readonly byRule = new Map<string, Set<number>>();
  private readonly byType = new Map<TraceEntryType, Set<number>>();
  private readonly entriesBySeq = new Map<number, TraceEntry>();

  private readonly subscribers = new Set<TraceSubscriber>();

  constructor(config: TraceCollectorConfig = {}) {
    this.maxEntries = config.maxEntries ?? 10_000;
    this.enabled = config.enabled ?? false;
  }

  /** Enable trace collection */
  enable(): void {
    this.enabled = true;
  }

  /** Disable trace collection */
  disable(): void {
    this.enabled = false;
  }

  /** Check if tracing is currently enabled */
  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Record a new trace entry.
   *
   * If tracing is disabled, this is a no-op.
   */
  record(
    type: TraceEntryType,
    cycle: number,
    details: Record<string, unknown>,
    rule?: string,
  ): TraceEntry | undefined {
    if (!this.enabled) {
      return undefined;
    }

    const entry: TraceEntry = {
      seq: this.nextSeq++,
      timestamp: Date.now(),
      type,
      cycle,
      details,
      ...(rule !== undefined && { rule }),
    };

    this.addEntry(entry);
    this.notifySubscribers(entry);

    return entry;
  }

  /** All entries of one cycle, in recording order. */
  getByCycle(cycle: number): TraceEntry[] {
    return this.resolveEntries(this.byCycle.get(cycle));
  }

  /** All entries mentioning a rule, in recording order. */
  getByRule(rule: string): TraceEntry[] {
    return this.resolveEntries(this.byRule.get(rule));
  }

  /** All entries of a type, in recording order. */
  getByType(type: TraceEntryType): TraceEntry[] {
    return this.resolveEntries(this.byType.get(type));
  }

  /**
   * Get the most recent trace entries.
   * Returns entries in reverse recording order (newest first).
   */
  getRecent(limit = 100): TraceEntry[] {
    const startIndex = Math.max(0, this.entries.length - limit);
    return this.entries.slice(startIndex).reverse();
  }

  /**
   * Query trace entries with flexible filtering.
   */
  query(filter: TraceFilter): TraceEntry[] {
    let result: TraceEntry[];

    // Start with the most selective filter
    if (filter.cycle !== undefined) {
      result = this.getByCycle(filter.cycle);
    } else if (filter.rule !== undefined) {
      result = this.getByRule(filter.rule);
    } else {
      result = [...this.entries];
    }

    if (filter.rule !== undefined) {
      result = result.filter((e) => e.rule === filter.rule);
    }

    if (filter.types && filter.types.length > 0) {
      const typeSet = new Set(filter.types);
      result = result.filter((e) => typeSet.has(e.type));
    }

    if (filter.limit !== undefined && result.length > filter.limit) {
      result = result.slice(-filter.limit);
    }

    return result;
  }

  /**
   * Subscribe to new trace entries in real-time.
   * Returns an unsubscribe function.
   */
  subscribe(subscriber: TraceSubscriber): () => void {
    this.subscribers.add(subscriber);

    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  /** Get the current number of stored entries */
  get size(): number {
    return this.entries.length;
  }

  /** Clear all stored entries and indexes */
  clear(): void {
    this.entries.length = 0;
    this.entriesBySeq.clear();
    this.byCycle.clear();
    this.byRule.clear();
    this.byType.clear();
  }

  private addEntry(entry: TraceEntry): void {
    // Enforce ring buffer limit
    if (this.entries.length >= this.maxEntries) {
      this.evictOldest();
    }

    this.entries.push(entry);
    this.entriesBySeq.set(entry.seq, entry);
    this.indexEntry(entry);
  }

  private evictOldest(): void {
    // Remove approximately 10% when limit is reached
    const toRemove = Math.max(1, Math.ceil(this.maxEntries * 0.1));

    for (const removed of this.entries.splice(0, toRemove)) {
      this.unindexEntry(removed);
      this.entriesBySeq.delete(removed.seq);
    }
  }

  private indexEntry(entry: TraceEntry): void {
    addToIndex(this.byCycle, entry.cycle, entry.seq);
    if (entry.rule !== undefined) {
      addToIndex(this.byRule, entry.rule, entry.seq);
    }
    addToIndex(this.byType, entry.type, entry.seq);
  }

  private unindexEntry(entry: TraceEntry): void {
    removeFromIndex(this.byCycle, entry.cycle, entry.seq);
    if (entry.rule !== undefined) {
      removeFromIndex(this.byRule, entry.rule, entry.seq);
    }
    removeFromIndex(this.byType, entry.type, entry.seq);
  }

  private resolveEntries(seqs: Set<number> | undefined): TraceEntry[] {
    if (!seqs) {
      return [];
    }

    const result: TraceEntry[] = [];
    for (const seq of seqs) {
      const entry = this.entriesBySeq.get(seq);
      if (entry) {
        result.push(entry);
      }
    }
    return result.sort((a, b) => a.seq - b.seq);
  }

  private notifySubscribers(entry: TraceEntry): void {
    for (const subscriber of this.subscribers) {
      try {
        subscriber(entry);
      } catch (error) {
        console.error('[trace-collector] Error in trace subscriber:', error);
      }
    }
  }
}

function addToIndex<K>(index: Map<K, Set<number>>, key: K, seq: number): void {
  let set = index.get(key);
  if (!set) {
    set = new Set();
    index.set(key, set);
  }
  set.add(seq);
}

function removeFromIndex<K>(index: Map<K, Set<number>>, key: K, seq: number): void {
  const set = index.get(key);
  if (set) {
    set.delete(seq);
    if (set.size === 0) {
      index.delete(key);
    }
  }
}
