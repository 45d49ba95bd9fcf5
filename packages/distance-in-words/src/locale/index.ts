export { en } from "./en";
export { createRenderer, defineLocale } from "./renderer";
export { createLocaleRegistry, defaultLocaleRegistry, type LocaleRegistry } from "./registry";
export type {
  LocaleDefinition,
  PhraseRenderer,
  PhraseTable,
  PhraseTemplate,
  PluralCategory,
  PluralTemplate,
} from "./types";
