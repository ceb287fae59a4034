/**
 * Message catalogue lookup for response labels
 */

import en from './messages/en.json';
import el from './messages/el.json';
import type { Locale, TranslationsResponse } from '../../../shared/types/index.js';

export const BASE_LOCALE: Locale = 'en';

export const SUPPORTED_LOCALES: readonly Locale[] = ['en', 'el'];

const catalogues: Record<Locale, Readonly<Record<string, string>>> = { en, el };

export type Translator = ((key: string) => string) & { readonly locale: Locale };

function isSupportedLocale(value: string): value is Locale {
  return SUPPORTED_LOCALES.some(locale => locale === value);
}

/**
 * Reduce a locale hint ("el-GR", "EN") to a supported catalogue key, or the fallback
 */
export function normaliseLocale(locale: string | null | undefined, fallback: Locale = BASE_LOCALE): Locale {
  if (!locale) {
    return fallback;
  }
  const primary = locale.trim().toLowerCase().split(/[-_]/)[0];
  return isSupportedLocale(primary) ? primary : fallback;
}

/**
 * Translator for a locale, falling back to the base catalogue and then to the key
 */
export function getTranslator(locale?: string | null): Translator {
  const resolved = normaliseLocale(locale);
  const messages = catalogues[resolved];
  const fallback = catalogues[BASE_LOCALE];

  const translate = (key: string): string => messages[key] ?? fallback[key] ?? key;
  return Object.assign(translate, { locale: resolved });
}

/**
 * Full catalogue for a locale with base-locale entries filling any gaps
 */
export function loadTranslations(locale?: string | null): TranslationsResponse {
  const resolved = normaliseLocale(locale);
  return {
    locale: resolved,
    fallback_locale: BASE_LOCALE,
    available_locales: [...SUPPORTED_LOCALES],
    messages: { ...catalogues[BASE_LOCALE], ...catalogues[resolved] }
  };
}
