import type { LocaleDefinition } from "../locale/types";

/** German phrase table used by tests that swap locales. */
export const de: LocaleDefinition = {
  locale: "de",
  phrases: {
    about_x_hours: { one: "etwa {count} Stunde", other: "etwa {count} Stunden" },
    about_x_months: { one: "etwa {count} Monat", other: "etwa {count} Monate" },
    about_x_years: { one: "etwa {count} Jahr", other: "etwa {count} Jahre" },
    almost_x_years: { one: "fast {count} Jahr", other: "fast {count} Jahre" },
    half_a_minute: "eine halbe Minute",
    less_than_x_minutes: { one: "weniger als eine Minute", other: "weniger als {count} Minuten" },
    less_than_x_seconds: { one: "weniger als {count} Sekunde", other: "weniger als {count} Sekunden" },
    over_x_years: { one: "mehr als {count} Jahr", other: "mehr als {count} Jahre" },
    x_days: { one: "{count} Tag", other: "{count} Tage" },
    x_minutes: { one: "{count} Minute", other: "{count} Minuten" },
    x_months: { one: "{count} Monat", other: "{count} Monate" },
  },
};
