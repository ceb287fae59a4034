import { Request } from 'express';
import { env } from '../config/env.js';
import { normaliseLocale } from '../localization/translator.js';
import type { Locale } from '../../../shared/types/index.js';

/**
 * Primary tag of the first Accept-Language entry ("el-GR,el;q=0.9" -> "el-GR")
 */
function acceptLanguage(req: Request): string | undefined {
  const header = req.headers['accept-language'];
  if (!header) {
    return undefined;
  }
  const [first] = header.split(',');
  return first.split(';')[0].trim() || undefined;
}

/**
 * Locale hint for a request: the explicit value, else ?locale, else Accept-Language
 */
export function requestLocaleHint(req: Request, explicit?: unknown): string | undefined {
  if (typeof explicit === 'string' && explicit.trim().length > 0) {
    return explicit;
  }
  const query = req.query.locale;
  if (typeof query === 'string' && query.trim().length > 0) {
    return query;
  }
  return acceptLanguage(req);
}

export function resolveRequestLocale(req: Request): Locale {
  return normaliseLocale(requestLocaleHint(req), env.DEFAULT_LOCALE);
}
