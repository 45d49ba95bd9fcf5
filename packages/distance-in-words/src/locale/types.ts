import type { BucketId } from "../buckets";

export type PluralCategory = Intl.LDMLPluralRule;

/**
 * Phrase forms keyed by `Intl.PluralRules` category. `other` is the
 * fallback for any category the table leaves out.
 */
export type PluralTemplate = { readonly other: string } & {
  readonly [C in Exclude<PluralCategory, "other">]?: string;
};

/**
 * A phrase: a fixed string, or plural forms. `{count}` is replaced by the
 * bucket's count.
 */
export type PhraseTemplate = string | PluralTemplate;

export type PhraseTable = { readonly [K in BucketId]: PhraseTemplate };

export interface LocaleDefinition {
  /** BCP 47 tag, also used to pick plural rules. */
  readonly locale: string;
  readonly phrases: PhraseTable;
}

/**
 * Turns a classified bucket into text. The formatter only ever talks to
 * this interface, so any language can be swapped in.
 */
export interface PhraseRenderer {
  readonly locale: string;
  /** @throws UnknownBucketError when `bucket` is not a known bucket id */
  render(bucket: string, count: number): string;
}
