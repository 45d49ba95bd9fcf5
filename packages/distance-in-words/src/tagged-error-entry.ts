/**
 * distance-in-words/tagged-error
 *
 * The factory the library's errors are built with, for callers who want
 * their own errors to match on `_tag` the same way.
 */

export {
  // Factory function
  TaggedError,

  // Types
  type TaggedErrorBase,
  type TaggedErrorOptions,
  type TaggedErrorConstructor,
  type TaggedErrorWithPropsConstructor,

  // Type utilities
  type TagOf,
  type ErrorByTag,
  type PropsOf,
} from "./tagged-error";
