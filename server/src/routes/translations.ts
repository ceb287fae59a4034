import { Router, Request, Response } from 'express';
import { loadTranslations } from '../localization/translator.js';
import { resolveRequestLocale } from '../middleware/locale.js';

export function createTranslationRouter(): Router {
  const router = Router();

  /**
   * GET /api/v1/translations
   * Catalogue for ?locale or Accept-Language
   */
  router.get('/', (req: Request, res: Response) => {
    res.json(loadTranslations(resolveRequestLocale(req)));
  });

  /**
   * GET /api/v1/translations/:locale
   * Catalogue for the named locale; unknown locales get the base catalogue
   */
  router.get('/:locale', (req: Request, res: Response) => {
    res.json(loadTranslations(req.params.locale));
  });

  return router;
}
