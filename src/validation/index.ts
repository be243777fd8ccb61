/**
 * Rule-set validation module.
 *
 * @module
 */

// Types
export type { ValidationIssue, ValidationResult } from './types.js';

// Constants
export {
  CONFLICT_STRATEGIES,
  VARIABLE_PREFIX,
  VARIABLE_NAME_RE,
  isConflictStrategy,
} from './constants.js';
export type { ConflictStrategyName } from './constants.js';

// Validator
export { RuleInputValidator } from './rule-validator.js';
export type { ValidatorOptions } from './rule-validator.js';

// Error
export { RuleValidationError } from './rule-validation-error.js';
