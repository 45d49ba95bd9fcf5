/**
 * distance-in-words
 *
 * Approximate durations in words: "less than a minute", "about 5 hours",
 * "almost 2 years". Thresholds follow Rails' `distance_of_time_in_words`.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { formatApproximateDuration, timeAgoInWords } from 'distance-in-words';
 *
 * formatApproximateDuration(3600 * 4.6); // "about 5 hours"
 * formatApproximateDuration(20, { includeSeconds: true }); // "half a minute"
 * timeAgoInWords(post.createdAt); // "3 days"
 * ```
 *
 * ## Entry Points
 *
 * - `distance-in-words` - everything below, plus the `DistanceInWords` namespace
 * - `distance-in-words/classify` - bucket classifier and thresholds
 * - `distance-in-words/coerce` - reading seconds from dates and duration objects
 * - `distance-in-words/locale` - phrase tables, renderers, locale registries
 * - `distance-in-words/errors` - error classes and type guards
 * - `distance-in-words/tagged-error` - the TaggedError factory
 * - `distance-in-words/result` - Result type used by the `try*` functions
 */

import * as result from "./result";
import { classify, tryClassify } from "./classify";
import { toSeconds, tryToSeconds } from "./coerce";
import {
  distanceOfTimeInWords,
  formatApproximateDuration,
  timeAgoInWords,
  tryFormatApproximateDuration,
} from "./format";
import { createFormatter } from "./formatter";
import { createLocaleRegistry, createRenderer, defineLocale, en } from "./locale";
import { TaggedError } from "./tagged-error";

// =============================================================================
// DistanceInWords namespace
// =============================================================================

const DistanceInWords = {
  ...result,
  TaggedError,
  classify,
  tryClassify,
  toSeconds,
  tryToSeconds,
  format: formatApproximateDuration,
  tryFormat: tryFormatApproximateDuration,
  distance: distanceOfTimeInWords,
  timeAgo: timeAgoInWords,
  createFormatter,
  createRenderer,
  createLocaleRegistry,
  defineLocale,
  en,
} as const;

export { DistanceInWords };

// =============================================================================
// Named exports (tree-shake friendly)
// =============================================================================

export {
  formatApproximateDuration,
  tryFormatApproximateDuration,
  distanceOfTimeInWords,
  timeAgoInWords,
  type DistanceInWordsEvent,
  type FormatOptions,
  type TimeInput,
} from "./format";

export { createFormatter, type Formatter } from "./formatter";

export {
  classify,
  tryClassify,
  roundHalfUp,
  type ClassifyOptions,
} from "./classify";

export {
  BUCKET_IDS,
  isBucketId,
  MINUTES_IN_YEAR,
  MINUTES_IN_QUARTER_YEAR,
  MINUTES_IN_THREE_QUARTERS_YEAR,
  type Bucket,
  type BucketId,
} from "./buckets";

export {
  toDurationSource,
  tryToDurationSource,
  resolveSeconds,
  toSeconds,
  tryToSeconds,
  systemClock,
  type DurationSource,
  type DurationInput,
  type EpochLike,
  type CalendarLike,
  type Clock,
  type CoerceOptions,
} from "./coerce";

export {
  en,
  createRenderer,
  defineLocale,
  createLocaleRegistry,
  defaultLocaleRegistry,
  type LocaleRegistry,
  type LocaleDefinition,
  type PhraseRenderer,
  type PhraseTable,
  type PhraseTemplate,
  type PluralTemplate,
} from "./locale";

export {
  MissingInputError,
  InvalidInputError,
  UnknownBucketError,
  UnknownLocaleError,
  isMissingInputError,
  isInvalidInputError,
  isUnknownBucketError,
  isUnknownLocaleError,
  isDistanceInWordsError,
  type DistanceInWordsError,
} from "./errors";

export { TaggedError, type TagOf, type ErrorByTag, type PropsOf } from "./tagged-error";

export { ok, err, isOk, isErr, map, andThen, unwrapOr, type Ok, type Err, type Result } from "./result";
