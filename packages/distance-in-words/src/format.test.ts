/**
 * Tests for format.ts - end-to-end phrases, events and option checks
 */
import { afterEach, describe, it, expect, vi } from "vitest";
import {
  distanceOfTimeInWords,
  formatApproximateDuration,
  timeAgoInWords,
  tryFormatApproximateDuration,
  type DistanceInWordsEvent,
  type TimeInput,
} from "./format";
import { InvalidInputError, MissingInputError, UnknownBucketError } from "./errors";
import { createLocaleRegistry } from "./locale/registry";
import { en } from "./locale/en";
import type { PhraseRenderer } from "./locale/types";
import { de } from "./__fixtures__/de";

const MINUTE = 60;
const DAY = 86_400;
const YEAR_MINUTES = 525_600;

afterEach(() => {
  vi.restoreAllMocks();
  vi.useRealTimers();
});

describe("formatApproximateDuration", () => {
  describe("English phrases", () => {
    it.each([
      [0, "less than a minute"],
      [29, "less than a minute"],
      [30, "1 minute"],
      [90, "2 minutes"],
      [44.5 * MINUTE, "about 1 hour"],
      [3600 * 4.6, "about 5 hours"],
      [3 * DAY, "3 days"],
      [45 * DAY, "about 2 months"],
      [90 * DAY, "3 months"],
      [(YEAR_MINUTES + 100) * MINUTE, "about 1 year"],
      [(YEAR_MINUTES * 2 + 131_400) * MINUTE, "over 2 years"],
      [(YEAR_MINUTES * 2 + 394_200) * MINUTE, "almost 3 years"],
      [3600 * 24 * 365 * 10, "about 10 years"],
    ])("formats %s seconds as %j", (seconds, expected) => {
      expect(formatApproximateDuration(seconds)).toBe(expected);
    });

    it("ignores the sign", () => {
      expect(formatApproximateDuration(-16_560)).toBe("about 5 hours");
    });
  });

  describe("includeSeconds", () => {
    it.each([
      [3, "less than 5 seconds"],
      [15, "less than 20 seconds"],
      [20, "half a minute"],
      [45, "less than a minute"],
      [75, "1 minute"],
    ])("formats %s seconds as %j", (seconds, expected) => {
      expect(formatApproximateDuration(seconds, { includeSeconds: true })).toBe(expected);
    });
  });

  describe("coerced input", () => {
    it("reads numeric strings", () => {
      expect(formatApproximateDuration("90")).toBe("2 minutes");
    });

    it("sums calendar components", () => {
      expect(formatApproximateDuration({ days: 3 })).toBe("3 days");
      expect(formatApproximateDuration({ months: 2 })).toBe("2 months");
    });

    it("counts years as 12 months and weeks as 7 days", () => {
      expect(formatApproximateDuration({ weeks: 2, days: 0 })).toBe("14 days");
      expect(formatApproximateDuration({ years: 1, months: 0 })).toBe("12 months");
      expect(formatApproximateDuration({ years: 2 })).toBe("almost 2 years");
    });

    it("rejects numeric strings in other bases", () => {
      expect(() => formatApproximateDuration("0x1A")).toThrow(
        'InvalidInputError: Cannot read "0x1A" as a number of seconds'
      );
    });

    it("measures Dates against now", () => {
      expect(formatApproximateDuration(new Date(0), { now: () => 3 * 3600 })).toBe(
        "about 3 hours"
      );
    });

    it("treats future Dates by absolute distance", () => {
      expect(formatApproximateDuration(new Date(7_200_000), { now: () => 0 })).toBe(
        "about 2 hours"
      );
    });
  });

  describe("errors", () => {
    it("throws MissingInputError without a duration", () => {
      expect(() => formatApproximateDuration(undefined)).toThrow(MissingInputError);
      expect(() => formatApproximateDuration(null)).toThrow(
        "MissingInputError: No duration supplied to formatApproximateDuration"
      );
    });

    it("throws InvalidInputError for non-finite durations", () => {
      expect(() => formatApproximateDuration(Number.NaN)).toThrow(
        "InvalidInputError: Duration must be a finite number of seconds, got NaN"
      );
    });

    it("throws UnknownLocaleError for unknown locales", () => {
      expect(() => formatApproximateDuration(90, { locale: "fr" })).toThrow(
        "UnknownLocaleError: No phrases for locale 'fr' (available: en)"
      );
    });

    it("lets UnknownBucketError from a renderer propagate", () => {
      const renderer: PhraseRenderer = {
        locale: "broken",
        render(bucket) {
          throw new UnknownBucketError({ bucket, locale: "broken" });
        },
      };
      expect(() => formatApproximateDuration(90, { renderer })).toThrow(
        "UnknownBucketError: Unknown bucket 'x_minutes' in locale broken"
      );
    });
  });

  describe("locales and renderers", () => {
    const locales = createLocaleRegistry([en, de]);

    it("renders with the selected locale", () => {
      expect(formatApproximateDuration(90, { locale: "de", locales })).toBe("2 Minuten");
      expect(formatApproximateDuration(20, { locale: "de", locales, includeSeconds: true })).toBe(
        "eine halbe Minute"
      );
    });

    it("uses an injected renderer over the locale", () => {
      const renderer: PhraseRenderer = {
        locale: "test",
        render: (bucket, count) => `${bucket}:${count}`,
      };
      expect(formatApproximateDuration(16_560, { renderer, locale: "fr" })).toBe(
        "about_x_hours:5"
      );
    });
  });

  describe("onEvent", () => {
    it("reports each step", () => {
      const events: DistanceInWordsEvent[] = [];
      formatApproximateDuration(16_560, { onEvent: (event) => events.push(event) });

      const bucket = { id: "about_x_hours", count: 5 };
      expect(events).toEqual([
        {
          type: "duration_coerced",
          source: { kind: "PlainSeconds", seconds: 16_560 },
          seconds: 16_560,
        },
        { type: "duration_classified", seconds: 16_560, bucket, includeSeconds: false },
        { type: "phrase_rendered", locale: "en", bucket, text: "about 5 hours" },
      ]);
    });

    it("propagates exceptions from the hook", () => {
      const onEvent = () => {
        throw new Error("sink down");
      };
      expect(() => formatApproximateDuration(1, { onEvent })).toThrow("sink down");
    });
  });

  describe("unknown options", () => {
    it("warns and suggests the camelCase key", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const options = { locale: "en", include_seconds: true };

      expect(formatApproximateDuration(20, options)).toBe("less than a minute");
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        "distance-in-words: Unknown option (include_seconds) passed to " +
          "formatApproximateDuration will be ignored. Did you mean includeSeconds?"
      );
    });

    it("lists every unknown key", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const options = { locale: "en", include_seconds: true, scope: "datetime" };

      formatApproximateDuration(20, options);
      expect(warn).toHaveBeenCalledWith(
        "distance-in-words: Unknown options (include_seconds, scope) passed to " +
          "formatApproximateDuration will be ignored. Did you mean includeSeconds?"
      );
    });

    it("stays quiet for known options", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      formatApproximateDuration(20, { includeSeconds: true, locale: "en" });
      expect(warn).not.toHaveBeenCalled();
    });
  });
});

describe("tryFormatApproximateDuration", () => {
  it("returns Ok with the phrase", () => {
    expect(tryFormatApproximateDuration(90)).toEqual({ ok: true, value: "2 minutes" });
  });

  it("returns Err for unknown locales", () => {
    const result = tryFormatApproximateDuration(90, { locale: "fr" });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error._tag).toBe("UnknownLocaleError");
      expect(result.error.message).toBe(
        "UnknownLocaleError: No phrases for locale 'fr' (available: en)"
      );
    }
  });

  it("returns Err for missing input", () => {
    const result = tryFormatApproximateDuration(undefined);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(MissingInputError);
    }
  });
});

describe("distanceOfTimeInWords", () => {
  it("measures between epoch seconds in either order", () => {
    expect(distanceOfTimeInWords(0, 3 * DAY)).toBe("3 days");
    expect(distanceOfTimeInWords(3 * DAY, 0)).toBe("3 days");
  });

  it("measures between Dates", () => {
    expect(distanceOfTimeInWords(new Date(0), new Date(90_000))).toBe("2 minutes");
  });

  it("mixes Dates and epoch-bearing objects", () => {
    expect(distanceOfTimeInWords(new Date(0), { unix: () => 15 }, { includeSeconds: true })).toBe(
      "less than 20 seconds"
    );
  });

  it("rejects calendar components", () => {
    const calendar: TimeInput = JSON.parse('{"days": 1}');
    expect(() => distanceOfTimeInWords(calendar, 0)).toThrow(InvalidInputError);
    expect(() => distanceOfTimeInWords(calendar, 0)).toThrow(
      "InvalidInputError: distanceOfTimeInWords needs a point in time, got calendar components"
    );
  });

  it("reports the signed distance through onEvent", () => {
    const events: DistanceInWordsEvent[] = [];
    distanceOfTimeInWords(3600, 0, { onEvent: (event) => events.push(event) });

    const bucket = { id: "about_x_hours", count: 1 };
    expect(events).toEqual([
      { type: "duration_coerced", source: { kind: "PlainSeconds", seconds: -3600 }, seconds: -3600 },
      { type: "duration_classified", seconds: -3600, bucket, includeSeconds: false },
      { type: "phrase_rendered", locale: "en", bucket, text: "about 1 hour" },
    ]);
  });

  it("throws MissingInputError for a missing end", () => {
    expect(() => distanceOfTimeInWords(null, 0)).toThrow(
      "MissingInputError: No duration supplied to distanceOfTimeInWords"
    );
  });
});

describe("timeAgoInWords", () => {
  it("measures against the injected clock", () => {
    expect(timeAgoInWords(0, { now: () => 45 })).toBe("1 minute");
    expect(timeAgoInWords(0, { now: () => 45, includeSeconds: true })).toBe("less than a minute");
  });

  it("accepts Dates", () => {
    const tenYears = 3600 * 24 * 365 * 10;
    expect(timeAgoInWords(new Date(1_000_000), { now: () => 1000 + tenYears })).toBe(
      "about 10 years"
    );
  });

  it("defaults to the system clock", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(100_000));
    expect(timeAgoInWords(new Date(10_000))).toBe("2 minutes");
  });

  it("reports the elapsed seconds through onEvent", () => {
    const events: DistanceInWordsEvent[] = [];
    timeAgoInWords(0, { now: () => 45, onEvent: (event) => events.push(event) });
    expect(events[0]).toEqual({
      type: "duration_coerced",
      source: { kind: "PlainSeconds", seconds: 45 },
      seconds: 45,
    });
  });

  it("names itself in MissingInputError", () => {
    expect(() => timeAgoInWords(undefined)).toThrow(
      "MissingInputError: No duration supplied to timeAgoInWords"
    );
  });
});
