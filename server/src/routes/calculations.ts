import { Router, Request, Response, NextFunction } from 'express';
import type { YearConfigProvider } from '../tax/config/yearConfigStore.js';
import { calculateTax } from '../services/calculationService.js';
import { requestLocaleHint } from '../middleware/locale.js';
import { CalculationValidationError } from '../utils/AppError.js';

export function createCalculationRouter(store: YearConfigProvider): Router {
  const router = Router();

  /**
   * POST /api/v1/calculations
   * Calculates the tax position for one declaration
   */
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: unknown = req.body;
      if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        throw CalculationValidationError.single('', 'Request body must be a JSON object');
      }

      const explicit = 'locale' in body ? body.locale : undefined;
      const locale = requestLocaleHint(req, explicit);
      const payload = locale === undefined ? body : { ...body, locale };

      res.json(calculateTax(payload, { store }));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
