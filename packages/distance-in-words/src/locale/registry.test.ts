/**
 * Tests for locale/registry.ts - locale lookup and fallback
 */
import { describe, it, expect } from "vitest";
import { UnknownLocaleError } from "../errors";
import { de } from "../__fixtures__/de";
import { en } from "./en";
import { createLocaleRegistry, defaultLocaleRegistry } from "./registry";

describe("createLocaleRegistry", () => {
  const locales = createLocaleRegistry([en, de]);

  it("lists the defined locales", () => {
    expect(locales.locales).toEqual(["en", "de"]);
  });

  it("resolves exact tags", () => {
    expect(locales.resolve("de").render("x_minutes", 3)).toBe("3 Minuten");
  });

  it("falls back to the base language", () => {
    expect(locales.resolve("de-AT").locale).toBe("de");
    expect(locales.has("en-GB")).toBe(true);
  });

  it("ignores case and underscores", () => {
    expect(locales.resolve("EN_gb").locale).toBe("en");
  });

  it("throws UnknownLocaleError for unknown tags", () => {
    expect(locales.has("fr")).toBe(false);
    expect(() => locales.resolve("fr")).toThrow(UnknownLocaleError);
    expect(() => locales.resolve("fr")).toThrow(
      "UnknownLocaleError: No phrases for locale 'fr' (available: en, de)"
    );
  });

  it("lets later definitions replace earlier ones", () => {
    const override = createLocaleRegistry([
      en,
      { locale: "en", phrases: { ...en.phrases, half_a_minute: "30 seconds or so" } },
    ]);
    expect(override.locales).toEqual(["en"]);
    expect(override.resolve("en").render("half_a_minute", 20)).toBe("30 seconds or so");
  });

  it("accepts underscored locale tags in definitions", () => {
    const british = createLocaleRegistry([{ ...en, locale: "en_GB" }]);
    expect(british.locales).toEqual(["en-GB"]);
    expect(british.resolve("en_gb").render("x_days", 2)).toBe("2 days");
  });

  it("reports invalid locale tags as InvalidInputError", () => {
    expect(() => createLocaleRegistry([{ ...en, locale: "en GB" }])).toThrow(
      "InvalidInputError: Locale tag 'en GB' is not a valid language tag"
    );
  });

  it("is frozen", () => {
    expect(Object.isFrozen(locales)).toBe(true);
    expect(Object.isFrozen(locales.locales)).toBe(true);
  });
});

describe("defaultLocaleRegistry", () => {
  it("only knows English", () => {
    expect(defaultLocaleRegistry.locales).toEqual(["en"]);
    expect(defaultLocaleRegistry.resolve("en-US").render("x_days", 2)).toBe("2 days");
  });
});
