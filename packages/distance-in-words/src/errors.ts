/**
 * distance-in-words/errors
 *
 * Error types raised while turning a duration into words.
 * Uses TaggedError so callers can switch on `_tag`.
 *
 * @example
 * ```typescript
 * import { isInvalidInputError } from 'distance-in-words/errors';
 *
 * try {
 *   formatApproximateDuration(Number.NaN);
 * } catch (error) {
 *   if (isInvalidInputError(error)) console.log(error.reason);
 * }
 * ```
 */

import { TaggedError } from "./tagged-error";

// =============================================================================
// Error Types
// =============================================================================

/**
 * No duration value was supplied (`undefined` or `null`).
 *
 * @example
 * ```typescript
 * const error = new MissingInputError({ operation: 'timeAgoInWords' });
 * console.log(error.message); // "MissingInputError: No duration supplied to timeAgoInWords"
 * ```
 */
export class MissingInputError extends TaggedError("MissingInputError", {
  message: (p: {
    /** Public operation that received no value */
    operation?: string;
  }) =>
    p.operation
      ? `MissingInputError: No duration supplied to ${p.operation}`
      : "MissingInputError: No duration supplied",
}) {}

/**
 * The duration could not be read as a finite number of seconds.
 */
export class InvalidInputError extends TaggedError("InvalidInputError", {
  message: (p: {
    /** Why the value was rejected */
    reason: string;
    /** Raw value that was rejected */
    value?: unknown;
  }) => `InvalidInputError: ${p.reason}`,
}) {}

/**
 * A renderer was asked for a bucket id it has no phrase for. Raised when a
 * locale table and the classifier disagree; not something to recover from.
 *
 * @example
 * ```typescript
 * const error = new UnknownBucketError({ bucket: 'x_weeks', locale: 'en' });
 * console.log(error.message); // "UnknownBucketError: Unknown bucket 'x_weeks' in locale en"
 * ```
 */
export class UnknownBucketError extends TaggedError("UnknownBucketError", {
  message: (p: {
    /** Bucket id that was looked up */
    bucket: string;
    /** Locale of the table that was searched */
    locale?: string;
  }) =>
    p.locale
      ? `UnknownBucketError: Unknown bucket '${p.bucket}' in locale ${p.locale}`
      : `UnknownBucketError: Unknown bucket '${p.bucket}'`,
}) {}

/**
 * No phrase table is registered for the requested locale.
 */
export class UnknownLocaleError extends TaggedError("UnknownLocaleError", {
  message: (p: {
    /** Locale tag that was requested */
    locale: string;
    /** Locale tags the registry can serve */
    available: readonly string[];
  }) =>
    `UnknownLocaleError: No phrases for locale '${p.locale}' (available: ${p.available.join(", ")})`,
}) {}

// =============================================================================
// Union Type
// =============================================================================

/**
 * Union of every error the library raises.
 */
export type DistanceInWordsError =
  | MissingInputError
  | InvalidInputError
  | UnknownBucketError
  | UnknownLocaleError;

const ERROR_TAGS: ReadonlySet<string> = new Set([
  "MissingInputError",
  "InvalidInputError",
  "UnknownBucketError",
  "UnknownLocaleError",
]);

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a MissingInputError.
 */
export function isMissingInputError(error: unknown): error is MissingInputError {
  return TaggedError.isTaggedError(error) && error._tag === "MissingInputError";
}

/**
 * Check if an error is an InvalidInputError.
 */
export function isInvalidInputError(error: unknown): error is InvalidInputError {
  return TaggedError.isTaggedError(error) && error._tag === "InvalidInputError";
}

/**
 * Check if an error is an UnknownBucketError.
 */
export function isUnknownBucketError(error: unknown): error is UnknownBucketError {
  return TaggedError.isTaggedError(error) && error._tag === "UnknownBucketError";
}

/**
 * Check if an error is an UnknownLocaleError.
 */
export function isUnknownLocaleError(error: unknown): error is UnknownLocaleError {
  return TaggedError.isTaggedError(error) && error._tag === "UnknownLocaleError";
}

/**
 * Check if an error is any DistanceInWordsError.
 */
export function isDistanceInWordsError(error: unknown): error is DistanceInWordsError {
  return TaggedError.isTaggedError(error) && ERROR_TAGS.has(error._tag);
}
