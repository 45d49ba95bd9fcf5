import { BUCKET_IDS, isBucketId } from "../buckets";
import { InvalidInputError, UnknownBucketError } from "../errors";
import type { LocaleDefinition, PhraseRenderer, PhraseTemplate } from "./types";

const COUNT_PLACEHOLDER = "{count}";

// `en_GB` is read as `en-GB`; the result is the canonical BCP 47 form.
function canonicalLocale(locale: string): string {
  const tag = locale.trim().replaceAll("_", "-");
  try {
    return Intl.getCanonicalLocales(tag)[0] ?? tag;
  } catch (cause) {
    if (!(cause instanceof RangeError)) throw cause;
    throw new InvalidInputError({
      reason: `Locale tag '${locale}' is not a valid language tag`,
      value: locale,
    });
  }
}

/**
 * Check a locale definition against the closed set of bucket ids and
 * freeze it. The locale tag is returned in canonical form.
 *
 * @throws UnknownBucketError for a missing or unexpected bucket id
 * @throws InvalidInputError for a plural template without an `other` form,
 *   or a locale tag that is not a valid language tag
 */
export function defineLocale(definition: LocaleDefinition): LocaleDefinition {
  const { phrases } = definition;
  const locale = canonicalLocale(definition.locale);

  for (const id of BUCKET_IDS) {
    if (!Object.hasOwn(phrases, id)) {
      throw new UnknownBucketError({ bucket: id, locale });
    }
    const template: PhraseTemplate = phrases[id];
    if (typeof template !== "string" && typeof template.other !== "string") {
      throw new InvalidInputError({
        reason: `Phrase '${id}' in locale ${locale} has no "other" form`,
        value: template,
      });
    }
  }

  for (const key of Object.keys(phrases)) {
    if (!isBucketId(key)) {
      throw new UnknownBucketError({ bucket: key, locale });
    }
  }

  return Object.freeze({ locale, phrases: Object.freeze({ ...phrases }) });
}

/**
 * Build a renderer for one locale. Plural forms are chosen with
 * `Intl.PluralRules` for the definition's locale.
 *
 * @example
 * ```typescript
 * const renderer = createRenderer(en);
 * renderer.render('x_days', 1); // "1 day"
 * renderer.render('x_days', 3); // "3 days"
 * ```
 */
export function createRenderer(definition: LocaleDefinition): PhraseRenderer {
  const { locale, phrases } = defineLocale(definition);
  const rules = new Intl.PluralRules(locale);

  return Object.freeze({
    locale,
    render(bucket: string, count: number): string {
      if (!isBucketId(bucket)) {
        throw new UnknownBucketError({ bucket, locale });
      }
      const template = phrases[bucket];
      const text =
        typeof template === "string"
          ? template
          : (template[rules.select(count)] ?? template.other);
      return text.replaceAll(COUNT_PLACEHOLDER, String(count));
    },
  });
}
