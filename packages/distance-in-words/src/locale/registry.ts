import { UnknownLocaleError } from "../errors";
import { en } from "./en";
import { createRenderer } from "./renderer";
import type { LocaleDefinition, PhraseRenderer } from "./types";

export interface LocaleRegistry {
  /** Locale tags of the definitions, in canonical form. */
  readonly locales: readonly string[];
  has(locale: string): boolean;
  /**
   * Renderer for a locale tag: exact match first (case-insensitive,
   * `_` and `-` are equivalent), then the base language.
   *
   * @throws UnknownLocaleError when neither is defined
   */
  resolve(locale: string): PhraseRenderer;
}

function normalizeTag(tag: string): string {
  return tag.trim().replaceAll("_", "-").toLowerCase();
}

function lookup(renderers: ReadonlyMap<string, PhraseRenderer>, locale: string) {
  const tag = normalizeTag(locale);
  return renderers.get(tag) ?? renderers.get(tag.split("-")[0] ?? tag);
}

/**
 * Build an immutable registry. Later definitions for the same tag replace
 * earlier ones.
 *
 * @example
 * ```typescript
 * const locales = createLocaleRegistry([en, de]);
 * locales.resolve('de-AT').render('x_days', 2); // "2 Tage"
 * ```
 */
export function createLocaleRegistry(definitions: readonly LocaleDefinition[]): LocaleRegistry {
  const renderers = new Map<string, PhraseRenderer>();
  for (const definition of definitions) {
    const renderer = createRenderer(definition);
    renderers.set(normalizeTag(renderer.locale), renderer);
  }
  const locales = Object.freeze([...renderers.values()].map((renderer) => renderer.locale));

  return Object.freeze({
    locales,
    has(locale: string): boolean {
      return lookup(renderers, locale) !== undefined;
    },
    resolve(locale: string): PhraseRenderer {
      const renderer = lookup(renderers, locale);
      if (!renderer) {
        throw new UnknownLocaleError({ locale, available: locales });
      }
      return renderer;
    },
  });
}

/** Registry holding only the built-in English phrases. */
export const defaultLocaleRegistry: LocaleRegistry = createLocaleRegistry([en]);
