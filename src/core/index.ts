export { InferenceEngine } from './inference-engine.js';
export { FactStore } from './fact-store.js';
export type { FactStoreConfig, FactAddedEvent, FactAddedListener } from './fact-store.js';
export { RuleBase } from './rule-base.js';
export { FiredHistory, filterFired, instantiationKey } from './refraction.js';
export { selectInstantiation, compareByOrder } from './conflict-resolver.js';
export { fire } from './executor.js';
export type { FiringOutcome } from './executor.js';
export { compareStrategies } from './strategy-comparison.js';
export type { StrategyRun, StrategyComparison } from './strategy-comparison.js';
export {
  EngineError,
  InvariantViolationError,
  UnboundVariableError,
  CycleLimitError,
  UnknownFactError,
  EngineStateError,
} from './errors.js';
