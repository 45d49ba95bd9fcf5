/**
 * Turning durations and timestamps into phrases: coercion, classification
 * and rendering composed behind one options object.
 */

import type { Bucket } from "./buckets";
import { tryClassify, type ClassifyOptions } from "./classify";
import {
  resolveSeconds,
  systemClock,
  tryToDurationSource,
  type Clock,
  type DurationInput,
  type DurationSource,
  type EpochLike,
} from "./coerce";
import {
  InvalidInputError,
  MissingInputError,
  UnknownLocaleError,
  type DistanceInWordsError,
} from "./errors";
import { defaultLocaleRegistry, type LocaleRegistry } from "./locale/registry";
import type { PhraseRenderer } from "./locale/types";
import { andThen, err, map, ok, type Result } from "./result";

// =============================================================================
// Types
// =============================================================================

/**
 * Diagnostics emitted through `onEvent` while a phrase is produced.
 */
export type DistanceInWordsEvent =
  | { type: "duration_coerced"; source: DurationSource; seconds: number }
  | { type: "duration_classified"; seconds: number; bucket: Bucket; includeSeconds: boolean }
  | { type: "phrase_rendered"; locale: string; bucket: Bucket; text: string };

export interface FormatOptions extends ClassifyOptions {
  /**
   * Locale tag looked up in `locales`.
   * @default "en"
   */
  locale?: string;
  /** Registry `locale` is resolved against. Defaults to English only. */
  locales?: LocaleRegistry;
  /** Renderer to use directly; takes precedence over `locale`. */
  renderer?: PhraseRenderer;
  /** Clock in epoch seconds, used for timestamps. */
  now?: Clock;
  /** Called synchronously for each step; exceptions propagate to the caller. */
  onEvent?: (event: DistanceInWordsEvent) => void;
}

/** A point in time: epoch seconds, a `Date`, or an epoch-bearing object. */
export type TimeInput = number | Date | EpochLike;

const DEFAULT_LOCALE = "en";

const KNOWN_OPTION_KEYS: ReadonlySet<string> = new Set([
  "includeSeconds",
  "locale",
  "locales",
  "renderer",
  "now",
  "onEvent",
]);

// =============================================================================
// Option checks
// =============================================================================

function toCamelCase(key: string): string {
  return key.replace(/[_-]([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

/**
 * Warn about option keys that will be ignored, such as `include_seconds`
 * carried over from Rails-style helpers.
 */
function warnOnUnknownOptions(options: object, operation: string): void {
  const unknownKeys = Object.keys(options).filter((key) => !KNOWN_OPTION_KEYS.has(key));
  if (unknownKeys.length === 0) return;

  const suggestions = unknownKeys
    .map(toCamelCase)
    .filter((key) => KNOWN_OPTION_KEYS.has(key));

  console.warn(
    `distance-in-words: Unknown option${unknownKeys.length > 1 ? "s" : ""} ` +
      `(${unknownKeys.join(", ")}) passed to ${operation} will be ignored.` +
      (suggestions.length > 0 ? ` Did you mean ${suggestions.join(", ")}?` : "")
  );
}

// =============================================================================
// Pipeline steps
// =============================================================================

function resolveRenderer(options: FormatOptions): Result<PhraseRenderer, UnknownLocaleError> {
  if (options.renderer) return ok(options.renderer);

  const registry = options.locales ?? defaultLocaleRegistry;
  const locale = options.locale ?? DEFAULT_LOCALE;
  if (!registry.has(locale)) {
    return err(new UnknownLocaleError({ locale, available: registry.locales }));
  }
  return ok(registry.resolve(locale));
}

function readSource(
  value: unknown,
  operation: string
): Result<DurationSource, MissingInputError | InvalidInputError> {
  if (value === undefined || value === null) {
    return err(new MissingInputError({ operation }));
  }
  return tryToDurationSource(value);
}

function readSeconds(
  value: unknown,
  operation: string,
  options: FormatOptions
): Result<number, MissingInputError | InvalidInputError> {
  return map(readSource(value, operation), (source) => {
    const seconds = resolveSeconds(source, options.now);
    options.onEvent?.({ type: "duration_coerced", source, seconds });
    return seconds;
  });
}

function readEpochSeconds(
  value: unknown,
  operation: string
): Result<number, MissingInputError | InvalidInputError> {
  return andThen(readSource(value, operation), (source) => {
    switch (source.kind) {
      case "EpochBearing":
        return ok(source.epochSeconds);
      case "PlainSeconds":
        return ok(source.seconds);
      case "CalendarComponents":
        return err(
          new InvalidInputError({
            reason: `${operation} needs a point in time, got calendar components`,
            value,
          })
        );
    }
  });
}

function phrase(
  seconds: number,
  options: FormatOptions
): Result<string, InvalidInputError | UnknownLocaleError> {
  return andThen(resolveRenderer(options), (renderer) =>
    map(tryClassify(seconds, options), (bucket) => {
      options.onEvent?.({
        type: "duration_classified",
        seconds,
        bucket,
        includeSeconds: options.includeSeconds ?? false,
      });
      const text = renderer.render(bucket.id, bucket.count);
      options.onEvent?.({ type: "phrase_rendered", locale: renderer.locale, bucket, text });
      return text;
    })
  );
}

function orThrow<T>(result: Result<T, DistanceInWordsError>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Phrase for a duration, returned as a Result instead of thrown.
 *
 * A renderer that throws `UnknownBucketError` disagrees with the classifier;
 * that error is thrown rather than returned.
 */
export function tryFormatApproximateDuration(
  duration: DurationInput | null | undefined,
  options: FormatOptions = {}
): Result<string, DistanceInWordsError> {
  warnOnUnknownOptions(options, "formatApproximateDuration");
  return andThen(readSeconds(duration, "formatApproximateDuration", options), (seconds) =>
    phrase(seconds, options)
  );
}

/**
 * Approximate a duration in words. The sign is ignored.
 *
 * Accepts seconds, or anything `toDurationSource` understands: a `Date` or
 * epoch-bearing object is measured against `now`, calendar components are
 * summed with 30-day months.
 *
 * @throws MissingInputError when `duration` is `undefined` or `null`
 * @throws InvalidInputError when no finite number of seconds can be read
 * @throws UnknownLocaleError when `locale` is not in `locales`
 *
 * @example
 * ```typescript
 * formatApproximateDuration(0); // "less than a minute"
 * formatApproximateDuration(3600 * 4.6); // "about 5 hours"
 * formatApproximateDuration(15, { includeSeconds: true }); // "less than 20 seconds"
 * ```
 */
export function formatApproximateDuration(
  duration: DurationInput | null | undefined,
  options?: FormatOptions
): string {
  return orThrow(tryFormatApproximateDuration(duration, options));
}

function distance(
  from: unknown,
  to: unknown,
  options: FormatOptions,
  operation: string
): Result<string, DistanceInWordsError> {
  return andThen(readEpochSeconds(from, operation), (start) =>
    andThen(readEpochSeconds(to, operation), (end) => {
      const seconds = end - start;
      options.onEvent?.({
        type: "duration_coerced",
        source: { kind: "PlainSeconds", seconds },
        seconds,
      });
      return phrase(seconds, options);
    })
  );
}

/**
 * Words for the distance between two points in time. Numbers are epoch
 * seconds; order does not matter.
 *
 * @example
 * ```typescript
 * distanceOfTimeInWords(0, 3600 * 24 * 3); // "3 days"
 * ```
 */
export function distanceOfTimeInWords(
  from: TimeInput | null | undefined,
  to: TimeInput | null | undefined,
  options: FormatOptions = {}
): string {
  warnOnUnknownOptions(options, "distanceOfTimeInWords");
  return orThrow(distance(from, to, options, "distanceOfTimeInWords"));
}

/**
 * Words for the time elapsed since `from`, measured against `now`.
 *
 * @example
 * ```typescript
 * timeAgoInWords(new Date(Date.now() - 90_000)); // "2 minutes"
 * ```
 */
export function timeAgoInWords(
  from: TimeInput | null | undefined,
  options: FormatOptions = {}
): string {
  warnOnUnknownOptions(options, "timeAgoInWords");
  const now = options.now ?? systemClock;
  return orThrow(distance(from, now(), options, "timeAgoInWords"));
}
