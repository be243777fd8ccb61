/**
 * Error thrown when a rule set fails validation.
 *
 * Carries every issue found (`statusCode` + `code` pattern), so callers
 * can report all problems at once.
 *
 * @module
 */

import type { ValidationIssue } from './types.js';

export class RuleValidationError extends Error {
  readonly statusCode = 400;
  readonly code = 'RULE_VALIDATION_ERROR';
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(issues.length > 0 ? `${message}: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}` : message);
    this.name = 'RuleValidationError';
    this.issues = issues;
  }

  /** Exposes issues as `details` for error reporting. */
  get details(): ValidationIssue[] {
    return this.issues;
  }
}
