// Types
export * from './types/index.js';

// Core components
export * from './core/index.js';

// Matching
export * from './matching/index.js';

// Explanation
export * from './explanation/index.js';

// Validation
export * from './validation/index.js';

// Tracing
export * from './debugging/index.js';

// Main InferenceEngine class
export { InferenceEngine } from './core/inference-engine.js';
