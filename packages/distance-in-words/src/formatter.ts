import type { Bucket } from "./buckets";
import { classify, type ClassifyOptions } from "./classify";
import type { DurationInput } from "./coerce";
import type { DistanceInWordsError } from "./errors";
import {
  distanceOfTimeInWords,
  formatApproximateDuration,
  timeAgoInWords,
  tryFormatApproximateDuration,
  type FormatOptions,
  type TimeInput,
} from "./format";
import type { Result } from "./result";

/**
 * Formatting functions bound to a set of default options. Per-call options
 * are merged over the defaults.
 */
export interface Formatter {
  readonly defaults: Readonly<FormatOptions>;
  format(duration: DurationInput | null | undefined, options?: FormatOptions): string;
  tryFormat(
    duration: DurationInput | null | undefined,
    options?: FormatOptions
  ): Result<string, DistanceInWordsError>;
  classify(durationSeconds: number, options?: ClassifyOptions): Bucket;
  distance(
    from: TimeInput | null | undefined,
    to: TimeInput | null | undefined,
    options?: FormatOptions
  ): string;
  timeAgo(from: TimeInput | null | undefined, options?: FormatOptions): string;
}

// Per-call options over defaults; an option set to `undefined` keeps the default.
function mergeOptions(defaults: Readonly<FormatOptions>, options?: FormatOptions): FormatOptions {
  const merged: FormatOptions = { ...defaults };
  if (!options) return merged;
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) Reflect.set(merged, key, value);
  }
  return merged;
}

/**
 * Create a {@link Formatter}.
 *
 * @example
 * ```typescript
 * const words = createFormatter({ includeSeconds: true, locale: 'de', locales });
 * words.format(12); // "weniger als 20 Sekunden"
 * words.format(12, { includeSeconds: false }); // "weniger als eine Minute"
 * ```
 */
export function createFormatter(defaults: FormatOptions = {}): Formatter {
  const frozenDefaults = Object.freeze({ ...defaults });
  const withDefaults = (options?: FormatOptions): FormatOptions =>
    mergeOptions(frozenDefaults, options);

  return Object.freeze({
    defaults: frozenDefaults,
    format: (duration, options) => formatApproximateDuration(duration, withDefaults(options)),
    tryFormat: (duration, options) =>
      tryFormatApproximateDuration(duration, withDefaults(options)),
    classify: (durationSeconds, options) =>
      classify(durationSeconds, {
        includeSeconds: withDefaults(options).includeSeconds,
      }),
    distance: (from, to, options) => distanceOfTimeInWords(from, to, withDefaults(options)),
    timeAgo: (from, options) => timeAgoInWords(from, withDefaults(options)),
  } satisfies Formatter);
}
