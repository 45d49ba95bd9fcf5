/**
 * Turning caller values into a signed number of seconds.
 *
 * A value is first sorted into one of three {@link DurationSource} variants
 * by looking at what it can do, then resolved against a clock. The
 * classifier only ever sees the resolved number.
 */

import { InvalidInputError, MissingInputError } from "./errors";
import { andThen, err, ok, type Result } from "./result";

// =============================================================================
// Types
// =============================================================================

/** A plain count of seconds. */
export type PlainSeconds = {
  readonly kind: "PlainSeconds";
  readonly seconds: number;
};

/** A point in time; its distance from "now" is the duration. */
export type EpochBearing = {
  readonly kind: "EpochBearing";
  readonly epochSeconds: number;
};

/** Calendar-style components. Months count as 30 days. */
export type CalendarComponents = {
  readonly kind: "CalendarComponents";
  readonly months: number;
  readonly days: number;
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
};

export type DurationSource = PlainSeconds | EpochBearing | CalendarComponents;

/** Objects that can report the epoch seconds of a point in time. */
export type EpochLike =
  | { epoch(): number }
  | { readonly epoch: number }
  | { unix(): number }
  | { toSeconds(): number };

/**
 * Objects carrying calendar-style duration components, such as Luxon or
 * Temporal durations. Years fold into months and weeks into days.
 */
export type CalendarLike = {
  readonly years?: number;
  readonly quarters?: number;
  readonly months?: number;
  readonly weeks?: number;
  readonly days?: number;
  readonly hours?: number;
  readonly minutes?: number;
  readonly seconds?: number;
  readonly milliseconds?: number;
  readonly microseconds?: number;
  readonly nanoseconds?: number;
};

/** Values the coercion step accepts. Numbers and numeric strings are seconds. */
export type DurationInput = number | bigint | string | Date | EpochLike | CalendarLike;

/** Current time in epoch seconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now() / 1000;

export interface CoerceOptions {
  /** Clock used for epoch-bearing values. Defaults to {@link systemClock}. */
  now?: Clock;
}

type CoercionError = MissingInputError | InvalidInputError;

// Methods returning epoch seconds: `epoch()`, Day.js/Moment `unix()`,
// Luxon `toSeconds()`. A numeric `epoch` property is accepted too.
const EPOCH_METHODS = ["epoch", "unix", "toSeconds"] as const;

const CALENDAR_FIELDS = ["months", "days", "hours", "minutes", "seconds"] as const;

type CalendarField = (typeof CALENDAR_FIELDS)[number];

// Signed decimal with optional fraction and exponent; no hex, binary or Infinity.
const DECIMAL_NUMERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

// Unit fields read from a duration object: [field, component, times, per].
// A year is 12 months of 30 days.
const CALENDAR_UNITS: ReadonlyArray<readonly [string, CalendarField, number, number]> = [
  ["years", "months", 12, 1],
  ["quarters", "months", 3, 1],
  ["months", "months", 1, 1],
  ["weeks", "days", 7, 1],
  ["days", "days", 1, 1],
  ["hours", "hours", 1, 1],
  ["minutes", "minutes", 1, 1],
  ["seconds", "seconds", 1, 1],
  ["milliseconds", "seconds", 1, 1e3],
  ["microseconds", "seconds", 1, 1e6],
  ["nanoseconds", "seconds", 1, 1e9],
];

const SECONDS_PER: Record<CalendarField, number> = {
  months: 86_400 * 30,
  days: 86_400,
  hours: 3_600,
  minutes: 60,
  seconds: 1,
};

// =============================================================================
// Capability inspection
// =============================================================================

function describeValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "function") return "a function";
  if (typeof value === "object" && value !== null) {
    const name = value.constructor?.name;
    return name && name !== "Object" ? `a ${name}` : "an object";
  }
  return String(value);
}

function readEpoch(value: object): Result<number, InvalidInputError> | undefined {
  for (const name of EPOCH_METHODS) {
    const member: unknown = Reflect.get(value, name);
    let reading: unknown;
    if (typeof member === "function") {
      reading = Reflect.apply(member, value, []);
    } else if (name === "epoch" && typeof member === "number") {
      reading = member;
    } else {
      continue;
    }

    if (typeof reading !== "number" || !Number.isFinite(reading)) {
      return err(
        new InvalidInputError({
          reason: `${name}() must return a finite number of epoch seconds, got ${describeValue(reading)}`,
          value,
        })
      );
    }
    return ok(reading);
  }
  return undefined;
}

function readCalendar(value: object): Result<CalendarComponents, InvalidInputError> | undefined {
  const components: Record<CalendarField, number> = {
    months: 0,
    days: 0,
    hours: 0,
    minutes: 0,
    seconds: 0,
  };
  let found = false;

  for (const [field, into, times, per] of CALENDAR_UNITS) {
    const component: unknown = Reflect.get(value, field);
    if (component === undefined || component === null) continue;
    if (typeof component !== "number") {
      return err(
        new InvalidInputError({
          reason: `Duration field '${field}' must be a number, got ${describeValue(component)}`,
          value,
        })
      );
    }
    components[into] += (component * times) / per;
    found = true;
  }

  if (!found) return undefined;
  const calendar: CalendarComponents = { kind: "CalendarComponents", ...components };
  return ok(calendar);
}

/**
 * Sort a value into a {@link DurationSource} without throwing.
 *
 * Checked in order: missing, number/bigint/numeric string, `Date`,
 * epoch-bearing object, calendar components.
 */
export function tryToDurationSource(value: unknown): Result<DurationSource, CoercionError> {
  if (value === undefined || value === null) {
    return err(new MissingInputError());
  }

  if (typeof value === "number") {
    return ok({ kind: "PlainSeconds", seconds: value });
  }

  if (typeof value === "bigint") {
    return ok({ kind: "PlainSeconds", seconds: Number(value) });
  }

  if (typeof value === "string") {
    const trimmed = value.trim();
    const seconds = Number(trimmed);
    if (!DECIMAL_NUMERAL.test(trimmed) || !Number.isFinite(seconds)) {
      return err(
        new InvalidInputError({
          reason: `Cannot read ${describeValue(value)} as a number of seconds`,
          value,
        })
      );
    }
    return ok({ kind: "PlainSeconds", seconds });
  }

  if (value instanceof Date) {
    const millis = value.getTime();
    if (Number.isNaN(millis)) {
      return err(new InvalidInputError({ reason: "Date is invalid", value }));
    }
    return ok({ kind: "EpochBearing", epochSeconds: millis / 1000 });
  }

  if (typeof value === "object") {
    const epoch = readEpoch(value);
    if (epoch) {
      if (!epoch.ok) return epoch;
      return ok({ kind: "EpochBearing", epochSeconds: epoch.value });
    }

    const calendar = readCalendar(value);
    if (calendar) return calendar;
  }

  return err(
    new InvalidInputError({
      reason: `Cannot read ${describeValue(value)} as a duration`,
      value,
    })
  );
}

/**
 * Throwing variant of {@link tryToDurationSource}.
 */
export function toDurationSource(value: unknown): DurationSource {
  const result = tryToDurationSource(value);
  if (!result.ok) throw result.error;
  return result.value;
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Signed seconds for a source. Epoch-bearing sources give `now - epoch`,
 * so past times are positive.
 */
export function resolveSeconds(source: DurationSource, now: Clock = systemClock): number {
  switch (source.kind) {
    case "PlainSeconds":
      return source.seconds;
    case "EpochBearing":
      return now() - source.epochSeconds;
    case "CalendarComponents": {
      const components = source;
      return CALENDAR_FIELDS.reduce(
        (total, field) => total + components[field] * SECONDS_PER[field],
        0
      );
    }
  }
}

/**
 * Coerce any accepted value to a finite number of seconds without throwing.
 */
export function tryToSeconds(
  value: unknown,
  options: CoerceOptions = {}
): Result<number, CoercionError> {
  return andThen(tryToDurationSource(value), (source) => {
    const seconds = resolveSeconds(source, options.now);
    if (!Number.isFinite(seconds)) {
      return err(
        new InvalidInputError({
          reason: `Duration must be a finite number of seconds, got ${String(seconds)}`,
          value,
        })
      );
    }
    return ok(seconds);
  });
}

/**
 * Coerce any accepted value to a finite number of seconds.
 *
 * @throws MissingInputError for `undefined` and `null`
 * @throws InvalidInputError when no finite number of seconds can be read
 *
 * @example
 * ```typescript
 * toSeconds({ days: 1, minutes: 30 }); // 88200
 * toSeconds(new Date(0), { now: () => 60 }); // 60
 * ```
 */
export function toSeconds(value: unknown, options?: CoerceOptions): number {
  const result = tryToSeconds(value, options);
  if (!result.ok) throw result.error;
  return result.value;
}
