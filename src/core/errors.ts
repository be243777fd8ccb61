/**
 * Errors raised by the inference engine.
 *
 * Every engine error derives from {@link EngineError}, so callers can catch
 * the whole family at once. Unification failures are not errors: `unify`
 * returns `null` for them.
 *
 * @module
 */

export class EngineError extends Error {
  readonly code: string;

  constructor(message: string, code = 'ENGINE_ERROR') {
    super(message);
    this.name = 'EngineError';
    this.code = code;
  }
}

/** An engine-internal contract was broken (e.g. resolving an empty conflict set). */
export class InvariantViolationError extends EngineError {
  constructor(message: string) {
    super(message, 'INVARIANT_VIOLATION');
    this.name = 'InvariantViolationError';
  }
}

/** Substitution hit a variable with no binding. */
export class UnboundVariableError extends EngineError {
  readonly variable: string;

  constructor(variable: string) {
    super(`Variable "?${variable}" is not bound`, 'UNBOUND_VARIABLE');
    this.name = 'UnboundVariableError';
    this.variable = variable;
  }
}

/** The run exceeded the configured `maxCycles`. */
export class CycleLimitError extends EngineError {
  readonly maxCycles: number;

  constructor(maxCycles: number) {
    super(`Run exceeded the limit of ${maxCycles} firing cycles`, 'CYCLE_LIMIT_EXCEEDED');
    this.name = 'CycleLimitError';
    this.maxCycles = maxCycles;
  }
}

/** Requested fact is not in the fact store. */
export class UnknownFactError extends EngineError {
  readonly statusCode = 404;
  readonly fact: readonly unknown[];

  constructor(fact: readonly unknown[], rendered: string) {
    super(`Fact ${rendered} is not in working memory`, 'UNKNOWN_FACT');
    this.name = 'UnknownFactError';
    this.fact = fact;
  }
}

/** Operation is not allowed in the engine's current state. */
export class EngineStateError extends EngineError {
  readonly state: string;

  constructor(state: string, operation: string) {
    super(`Cannot ${operation}: engine is ${state}`, 'INVALID_ENGINE_STATE');
    this.name = 'EngineStateError';
    this.state = state;
  }
}
