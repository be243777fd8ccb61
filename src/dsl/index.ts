/**
 * DSL for **forward-rules**.
 *
 * Two complementary ways to define rules:
 *
 * 1. **Fluent Builder API**: rules written in TypeScript.
 * 2. **YAML Loader**: rule-set files with rules and initial facts.
 *
 * In both, `'?name'` is shorthand for the variable `{ var: 'name' }`.
 *
 * @example
 * ```typescript
 * import { Rule, fact } from 'forward-rules/dsl';
 *
 * const rule = Rule.create('grad-only-violation')
 *   .priority(5)
 *   .when(['enrolled', '?s', '?c'], ['graduate-only', '?c'])
 *   .then(['flag-violation', '?s', '?c'])
 *   .build();
 *
 * const facts = [fact('enrolled', 'Alice', 'CS501'), fact('graduate-only', 'CS501')];
 * ```
 *
 * @module dsl
 */

// Builder
export { Rule, RuleBuilder } from './builder/index.js';

// Terms
export { v, isVar, toTerm, toPattern, fact } from './helpers/terms.js';

// YAML loader
export {
  loadRuleSetFromYAML,
  loadRuleSetFromFile,
  YamlLoadError,
  validateRuleSet,
  validateRule,
  YamlValidationError,
} from './yaml/index.js';

// Errors
export { DslError, DslValidationError } from './helpers/errors.js';

// Types
export type { TermInput, PatternInput } from './types.js';
