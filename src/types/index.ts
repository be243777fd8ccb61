export * from './fact.js';
export * from './rule.js';
export * from './engine.js';
export * from './explanation.js';
