/**
 * Error hierarchy for the DSL module.
 *
 * Every DSL error derives from {@link DslError}, so all of them can be
 * caught at once:
 *
 * ```typescript
 * try {
 *   Rule.create('grad-only').build();
 * } catch (err) {
 *   if (err instanceof DslError) {
 *     // builder, YAML loader or schema error
 *   }
 * }
 * ```
 */

/**
 * Base error class for all DSL operations.
 *
 * Common ancestor of {@link DslValidationError}, YamlLoadError and
 * YamlValidationError.
 */
export class DslError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DslError';
  }
}

/**
 * Invalid input to a DSL builder.
 *
 * Raised for an invalid argument to a builder method (empty name,
 * non-finite priority, malformed term) or for an incomplete builder at
 * `build()` time.
 *
 * @example
 * ```typescript
 * import { DslValidationError, Rule } from 'forward-rules/dsl';
 *
 * try {
 *   Rule.create('').build();
 * } catch (err) {
 *   if (err instanceof DslValidationError) {
 *     console.error('Invalid input:', err.message);
 *   }
 * }
 * ```
 */
export class DslValidationError extends DslError {
  constructor(message: string) {
    super(message);
    this.name = 'DslValidationError';
  }
}
