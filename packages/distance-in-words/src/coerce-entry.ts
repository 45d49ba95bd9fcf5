/**
 * distance-in-words/coerce
 *
 * Reading seconds out of numbers, dates and duration-like objects.
 *
 * @example
 * ```typescript
 * import { toSeconds } from 'distance-in-words/coerce';
 *
 * toSeconds({ months: 1 }); // 2592000
 * ```
 */

export {
  // Coercion
  toDurationSource,
  tryToDurationSource,
  resolveSeconds,
  toSeconds,
  tryToSeconds,
  systemClock,

  // Types
  type DurationSource,
  type PlainSeconds,
  type EpochBearing,
  type CalendarComponents,
  type DurationInput,
  type EpochLike,
  type CalendarLike,
  type Clock,
  type CoerceOptions,
} from "./coerce";
