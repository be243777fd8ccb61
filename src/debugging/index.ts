export { TraceCollector } from './trace-collector.js';
export type { TraceCollectorConfig } from './trace-collector.js';
export type { TraceEntry, TraceEntryType, TraceFilter, TraceSubscriber } from './types.js';
