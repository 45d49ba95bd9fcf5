/**
 * distance-in-words/locale
 *
 * Phrase tables, renderers and locale registries.
 *
 * @example
 * ```typescript
 * import { createLocaleRegistry, en } from 'distance-in-words/locale';
 *
 * const locales = createLocaleRegistry([en, fr]);
 * formatApproximateDuration(90, { locale: 'fr', locales });
 * ```
 */

export * from "./locale";
