import { Router, Request, Response, NextFunction } from 'express';
import type {
  ConfigMetaResponse,
  EfkaCategoriesResponse,
  InvestmentCategoriesResponse,
  YearsResponse
} from '../../../shared/types/index.js';
import { API_VERSION } from '../config/env.js';
import { getTranslator } from '../localization/translator.js';
import { resolveRequestLocale } from '../middleware/locale.js';
import { summariseYear } from '../services/yearSummary.js';
import type { YearConfigStore } from '../tax/config/yearConfigStore.js';
import { AppError } from '../utils/AppError.js';
import { toRate } from '../utils/decimal.js';

function parseYear(raw: string): number {
  const year = Number(raw);
  if (!Number.isInteger(year) || year <= 0) {
    throw AppError.badRequest(`Invalid tax year '${raw}'`, 'VALIDATION_ERROR');
  }
  return year;
}

export function createConfigRouter(store: YearConfigStore): Router {
  const router = Router();

  /**
   * GET /api/v1/config/meta
   * Service version with the supported and default years
   */
  router.get('/meta', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const response: ConfigMetaResponse = {
        version: API_VERSION,
        supported_years: store.availableYears(),
        default_year: store.defaultYear()
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/config/years
   * Every configured year's rules, and the year selected by default
   */
  router.get('/years', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const supportedYears = store.availableYears();
      const response: YearsResponse = {
        years: supportedYears.map(year => summariseYear(store.load(year))),
        supported_years: supportedYears,
        default_year: store.defaultYear()
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/config/:year/investment-categories
   * Investment categories with their flat rates, sorted by id
   */
  router.get('/:year/investment-categories', (req: Request, res: Response, next: NextFunction) => {
    try {
      const year = parseYear(req.params.year);
      const config = store.load(year);
      const translate = getTranslator(resolveRequestLocale(req));

      const response: InvestmentCategoriesResponse = {
        year,
        locale: translate.locale,
        categories: Object.entries(config.investment.rates)
          .sort(([a], [b]) => a.localeCompare(b))
          .map(([id, rate]) => ({
            id,
            label: translate(`details.investment.${id}`),
            rate: toRate(rate)
          }))
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/config/:year/efka-categories
   * Freelance EFKA contribution classes in configured order
   */
  router.get('/:year/efka-categories', (req: Request, res: Response, next: NextFunction) => {
    try {
      const year = parseYear(req.params.year);
      const config = store.load(year);
      const translate = getTranslator(resolveRequestLocale(req));

      const response: EfkaCategoriesResponse = {
        year,
        locale: translate.locale,
        categories: config.freelance.efkaCategories.map(category => ({
          id: category.id,
          label: translate(category.labelKey),
          monthly_amount: category.monthlyAmount,
          auxiliary_monthly_amount: category.auxiliaryMonthlyAmount,
          lump_sum_monthly_amount: category.lumpSumMonthlyAmount
        }))
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
