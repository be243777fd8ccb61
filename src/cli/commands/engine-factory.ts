/**
 * Builds inference engines for the CLI commands.
 */

import type { RuleSet } from '../../types/rule.js';
import type { ConflictStrategy, InferenceEngineConfig } from '../../types/engine.js';
import type { CliConfig } from '../types.js';
import { InferenceEngine } from '../../core/inference-engine.js';
import { RuleValidationError } from '../../validation/index.js';
import { isConflictStrategy } from '../../validation/constants.js';
import { InvalidArgumentsError, ValidationError } from '../utils/errors.js';

/** Engine-related command options */
export interface EngineOptions {
  strategy: string | undefined;
  maxCycles: number | undefined;
}

/** Strategy from the command line, falling back to the configuration */
export function resolveStrategy(value: string | undefined, config: CliConfig): ConflictStrategy {
  if (value === undefined) {
    return config.engine.strategy;
  }
  if (!isConflictStrategy(value)) {
    throw new InvalidArgumentsError(`Unknown strategy "${value}", expected priority, specificity or order`);
  }
  return value;
}

/** Cycle limit from the command line, falling back to the configuration */
export function resolveMaxCycles(value: number | undefined, config: CliConfig): number {
  if (value === undefined) {
    return config.engine.maxCycles;
  }
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidArgumentsError(`--max-cycles must be a positive integer, got ${String(value)}`);
  }
  return value;
}

/**
 * Creates an engine, reporting rule-set validation failures as CLI
 * validation errors.
 */
export function createEngine(ruleSet: RuleSet, config: InferenceEngineConfig): InferenceEngine {
  try {
    return new InferenceEngine(ruleSet, config);
  } catch (err) {
    if (err instanceof RuleValidationError) {
      throw new ValidationError('Rule set validation failed', err.issues, err);
    }
    throw err;
  }
}
