/**
 * distance-in-words/errors entry point
 *
 * Error types raised while turning a duration into words.
 */
export {
  // Errors
  MissingInputError,
  InvalidInputError,
  UnknownBucketError,
  UnknownLocaleError,
  // Union type
  type DistanceInWordsError,
  // Type guards
  isMissingInputError,
  isInvalidInputError,
  isUnknownBucketError,
  isUnknownLocaleError,
  isDistanceInWordsError,
} from "./errors";
