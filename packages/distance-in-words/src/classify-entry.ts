/**
 * distance-in-words/classify
 *
 * The bucket classifier on its own, for callers that render phrases
 * themselves.
 *
 * @example
 * ```typescript
 * import { classify } from 'distance-in-words/classify';
 *
 * classify(16560); // { id: 'about_x_hours', count: 5 }
 * ```
 */

export {
  // Classification
  classify,
  tryClassify,
  roundHalfUp,
  type ClassifyOptions,
} from "./classify";

export {
  // Buckets
  BUCKET_IDS,
  isBucketId,
  type Bucket,
  type BucketId,

  // Constants
  MINUTES_IN_YEAR,
  MINUTES_IN_QUARTER_YEAR,
  MINUTES_IN_THREE_QUARTERS_YEAR,
} from "./buckets";
