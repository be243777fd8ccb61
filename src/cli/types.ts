/**
 * CLI types for forward-rules.
 */

import type { ConflictStrategy, RunResult } from '../types/engine.js';
import type { Explanation } from '../types/explanation.js';
import type { StrategyComparison } from '../core/strategy-comparison.js';
import type { ValidationIssue } from '../validation/types.js';
import type { TraceEntry } from '../debugging/types.js';

/** Supported output formats */
export type OutputFormat = 'json' | 'pretty';

/** CLI exit codes */
export const ExitCode = {
  Success: 0,
  GeneralError: 1,
  InvalidArguments: 2,
  ValidationError: 3,
  FileNotFound: 4,
  RunFailed: 5
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Global CLI options */
export interface GlobalOptions {
  format: OutputFormat;
  quiet: boolean;
  noColor: boolean;
  config: string | undefined;
}

/** CLI configuration (from the configuration file) */
export interface CliConfig {
  engine: {
    strategy: ConflictStrategy;
    maxCycles: number;
  };
  output: {
    format: OutputFormat;
    colors: boolean;
  };
}

/** Default CLI configuration */
export const DEFAULT_CLI_CONFIG: CliConfig = {
  engine: {
    strategy: 'priority',
    maxCycles: 10_000
  },
  output: {
    format: 'pretty',
    colors: true
  }
};

/** Outcome of validating a rule-set file */
export interface ValidateOutput {
  file: string;
  valid: boolean;
  ruleCount: number;
  factCount: number;
  errorCount: number;
  warningCount: number;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/** A run together with the derivation trees requested for it */
export interface RunOutput {
  file: string;
  result: RunResult;
  explanations: Explanation[];
  /** Trace entries, empty unless tracing was requested */
  trace: TraceEntry[];
}

/** Data handed to an output formatter */
export type FormattableData =
  | { type: 'run'; data: RunOutput }
  | { type: 'comparison'; data: StrategyComparison }
  | { type: 'explanation'; data: Explanation }
  | { type: 'validation'; data: ValidateOutput };
