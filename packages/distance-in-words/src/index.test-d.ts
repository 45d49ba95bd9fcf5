/**
 * Type tests for distance-in-words
 * Run with: npm run test:types
 */
/* eslint-disable @typescript-eslint/no-unused-vars */
import { expectType } from "tsd";
import {
  classify,
  createFormatter,
  formatApproximateDuration,
  tryFormatApproximateDuration,
  tryClassify,
  toDurationSource,
  TaggedError,
  InvalidInputError,
  type Bucket,
  type BucketId,
  type DistanceInWordsError,
  type DurationSource,
  type ErrorByTag,
  type Result,
  type TagOf,
} from "./index";

// =============================================================================
// TEST: classify returns a bucket from the closed set
// =============================================================================

function _testClassify() {
  const bucket = classify(90, { includeSeconds: true });
  expectType<Bucket>(bucket);
  expectType<BucketId>(bucket.id);
  expectType<number>(bucket.count);

  const result = tryClassify(90);
  expectType<Result<Bucket, InvalidInputError>>(result);
}

// =============================================================================
// TEST: formatting accepts the documented inputs
// =============================================================================

function _testFormatInputs() {
  expectType<string>(formatApproximateDuration(30));
  expectType<string>(formatApproximateDuration(new Date()));
  expectType<string>(formatApproximateDuration({ days: 2, minutes: 5 }));
  expectType<string>(formatApproximateDuration({ epoch: () => 0 }));
  expectType<string>(formatApproximateDuration(undefined));

  expectType<Result<string, DistanceInWordsError>>(tryFormatApproximateDuration(30));

  // @ts-expect-error - booleans are not durations
  formatApproximateDuration(true);
}

// =============================================================================
// TEST: DurationSource narrows on kind
// =============================================================================

function _testDurationSource() {
  const source = toDurationSource(42);
  expectType<DurationSource>(source);
  if (source.kind === "CalendarComponents") {
    expectType<number>(source.months);
  }
}

// =============================================================================
// TEST: error union narrows on _tag
// =============================================================================

function _testErrorTags(
  error: DistanceInWordsError,
  tag: TagOf<DistanceInWordsError>,
  invalid: ErrorByTag<DistanceInWordsError, "InvalidInputError">
) {
  expectType<"MissingInputError" | "InvalidInputError" | "UnknownBucketError" | "UnknownLocaleError">(
    tag
  );
  expectType<InvalidInputError>(invalid);

  if (error._tag === "UnknownLocaleError") {
    expectType<readonly string[]>(error.available);
  }
}

// =============================================================================
// TEST: TaggedError constructor props
// =============================================================================

function _testTaggedErrorProps() {
  class Required extends TaggedError("Required")<{ id: string }> {}
  new Required({ id: "a" });
  // @ts-expect-error - required props cannot be omitted
  new Required();

  class Optional extends TaggedError("Optional")<{ hint?: string }> {}
  new Optional();

  // @ts-expect-error - reason is required
  new InvalidInputError({});
}

// =============================================================================
// TEST: formatter methods
// =============================================================================

function _testFormatter() {
  const words = createFormatter({ includeSeconds: true });
  expectType<string>(words.format(12));
  expectType<Bucket>(words.classify(12));
  expectType<string>(words.timeAgo(new Date()));
}
