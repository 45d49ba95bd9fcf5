/**
 * distance-in-words/result
 *
 * Minimal Result type used by the `try*` variants of the public API.
 */

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful result.
 * Use `ok(value)` to create instances.
 */
export type Ok<T> = { ok: true; value: T };

/**
 * Represents a failed result.
 * Use `err(error)` to create instances.
 */
export type Err<E> = { ok: false; error: E };

/**
 * Outcome of an operation that might fail, returned instead of throwing.
 *
 * @template T - The type of the success value
 * @template E - The type of the error value (defaults to unknown)
 */
export type Result<T, E = unknown> = Ok<T> | Err<E>;

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Creates a successful Result.
 */
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result.
 */
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Checks if a Result is successful.
 */
export const isOk = <T, E>(r: Result<T, E>): r is Ok<T> => r.ok;

/**
 * Checks if a Result is a failure.
 */
export const isErr = <T, E>(r: Result<T, E>): r is Err<E> => !r.ok;

// =============================================================================
// Transformers
// =============================================================================

/**
 * Transforms the success value, leaving an Err untouched.
 *
 * @example
 * ```typescript
 * map(ok(2), (n) => n * 10); // ok(20)
 * ```
 */
export const map = <T, U, E>(r: Result<T, E>, fn: (value: T) => U): Result<U, E> =>
  r.ok ? ok(fn(r.value)) : r;

/**
 * Chains a Result-returning function onto a success value.
 * The error union widens to include the errors of `fn`.
 */
export const andThen = <T, U, E, F>(
  r: Result<T, E>,
  fn: (value: T) => Result<U, F>
): Result<U, E | F> => (r.ok ? fn(r.value) : r);

/**
 * Extracts the value from an Ok result, or returns a default value if it's an Err.
 */
export const unwrapOr = <T, E>(r: Result<T, E>, defaultValue: T): T =>
  r.ok ? r.value : defaultValue;
