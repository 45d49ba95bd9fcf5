/**
 * distance-in-words/classify
 *
 * Maps a number of seconds to a {@link Bucket}. The rules are checked in
 * order and the first match wins, reproducing Rails'
 * `distance_of_time_in_words` thresholds.
 *
 *     0 <-> 29 secs                        less than a minute
 *     30 secs <-> 1 min, 29 secs           1 minute
 *     1 min, 30 secs <-> 44 mins, 29 secs  [2..44] minutes
 *     44 mins, 30 secs <-> 89 mins, 29 secs  about 1 hour
 *     89 mins, 30 secs <-> 23 hrs, 59 mins, 29 secs  about [2..24] hours
 *     23 hrs, 59 mins, 30 secs <-> 41 hrs, 59 mins, 29 secs  1 day
 *     41 hrs, 59 mins, 30 secs <-> 29 days, 23 hrs, 59 mins, 29 secs  [2..29] days
 *     29 days, 23 hrs, 59 mins, 30 secs <-> 59 days, 23 hrs, 59 mins, 29 secs  about [1..2] months
 *     59 days, 23 hrs, 59 mins, 30 secs <-> 1 yr  [2..12] months
 *     1 yr <-> 1 yr, 3 months              about 1 year
 *     1 yr, 3 months <-> 1 yr, 9 months    over 1 year
 *     1 yr, 9 months <-> 2 yr minus 1 sec  almost 2 years
 */

import {
  bucket,
  MINUTES_IN_DAY,
  MINUTES_IN_HOUR,
  MINUTES_IN_MONTH,
  MINUTES_IN_QUARTER_YEAR,
  MINUTES_IN_THREE_QUARTERS_YEAR,
  MINUTES_IN_YEAR,
  type Bucket,
} from "./buckets";
import { InvalidInputError } from "./errors";
import { err, ok, type Result } from "./result";

export interface ClassifyOptions {
  /**
   * Split the first ninety seconds into "less than 5/10/20 seconds",
   * "half a minute" and "less than a minute".
   * @default false
   */
  includeSeconds?: boolean;
}

/**
 * Round half up: `floor(x + 0.5)`. Callers only pass non-negative values.
 */
export function roundHalfUp(x: number): number {
  return Math.floor(x + 0.5);
}

function classifySubMinute(mins: number, secs: number, includeSeconds: boolean): Bucket {
  if (!includeSeconds) {
    return mins === 0 ? bucket("less_than_x_minutes", 1) : bucket("x_minutes", mins);
  }

  if (secs <= 4) return bucket("less_than_x_seconds", 5);
  if (secs <= 9) return bucket("less_than_x_seconds", 10);
  if (secs <= 19) return bucket("less_than_x_seconds", 20);
  if (secs <= 39) return bucket("half_a_minute", 20);
  if (secs <= 59) return bucket("less_than_x_minutes", 1);
  return bucket("x_minutes", 1);
}

function classifyYears(mins: number): Bucket {
  const years = Math.floor(mins / MINUTES_IN_YEAR);
  const remainder = mins % MINUTES_IN_YEAR;

  if (remainder < MINUTES_IN_QUARTER_YEAR) return bucket("about_x_years", years);
  if (remainder < MINUTES_IN_THREE_QUARTERS_YEAR) return bucket("over_x_years", years);
  return bucket("almost_x_years", years + 1);
}

/**
 * Classify a duration without throwing.
 * Non-finite durations produce an `InvalidInputError`.
 */
export function tryClassify(
  durationSeconds: number,
  options: ClassifyOptions = {}
): Result<Bucket, InvalidInputError> {
  if (!Number.isFinite(durationSeconds)) {
    return err(
      new InvalidInputError({
        reason: `Duration must be a finite number of seconds, got ${String(durationSeconds)}`,
        value: durationSeconds,
      })
    );
  }

  const duration = Math.abs(durationSeconds);
  const mins = roundHalfUp(duration / 60);
  const secs = roundHalfUp(duration);

  if (mins <= 1) return ok(classifySubMinute(mins, secs, options.includeSeconds ?? false));
  if (mins <= 44) return ok(bucket("x_minutes", mins));
  if (mins <= 89) return ok(bucket("about_x_hours", 1));

  // 90 mins up to 24 hours
  if (mins <= 1439) return ok(bucket("about_x_hours", roundHalfUp(mins / MINUTES_IN_HOUR)));

  // 24 hours up to 42 hours
  if (mins <= 2519) return ok(bucket("x_days", 1));

  // 42 hours up to 30 days
  if (mins <= 43199) return ok(bucket("x_days", roundHalfUp(mins / MINUTES_IN_DAY)));

  // 30 days up to 60 days
  if (mins <= 86399) return ok(bucket("about_x_months", roundHalfUp(mins / MINUTES_IN_MONTH)));

  // 60 days up to 365 days
  if (mins <= MINUTES_IN_YEAR) return ok(bucket("x_months", roundHalfUp(mins / MINUTES_IN_MONTH)));

  return ok(classifyYears(mins));
}

/**
 * Classify a duration in seconds. The sign is ignored.
 *
 * @throws InvalidInputError for NaN and infinities
 *
 * @example
 * ```typescript
 * classify(3600 * 4.6); // { id: 'about_x_hours', count: 5 }
 * classify(45, { includeSeconds: true }); // { id: 'less_than_x_minutes', count: 1 }
 * ```
 */
export function classify(durationSeconds: number, options?: ClassifyOptions): Bucket {
  const result = tryClassify(durationSeconds, options);
  if (!result.ok) throw result.error;
  return result.value;
}
