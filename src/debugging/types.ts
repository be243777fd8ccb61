/**
 * Tracing types for inference runs.
 */

/** Types of trace entries that can be recorded */
export type TraceEntryType =
  | 'cycle_started'
  | 'rule_matched'
  | 'instantiations_matched'
  | 'instantiation_fired'
  | 'fact_derived'
  | 'fact_already_known'
  | 'engine_saturated'
  | 'engine_failed';

/** A single trace entry recording an engine activity */
export interface TraceEntry {
  /** Monotonic sequence number within the collector */
  seq: number;

  /** Unix timestamp in milliseconds when this occurred */
  timestamp: number;

  /** Type of activity being traced */
  type: TraceEntryType;

  /** Inference cycle the activity belongs to */
  cycle: number;

  /** Name of the rule involved, if applicable */
  rule?: string;

  /** Additional contextual information about the activity */
  details: Record<string, unknown>;
}

/** Filter options for querying trace entries */
export interface TraceFilter {
  cycle?: number;
  rule?: string;
  types?: TraceEntryType[];

  /** Maximum number of entries to return (the most recent ones) */
  limit?: number;
}

/** Callback type for trace entry subscriptions */
export type TraceSubscriber = (entry: TraceEntry) => void;
