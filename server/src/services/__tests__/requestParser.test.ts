import { describe, it, expect } from '@jest/globals';
import {
  NET_INCOME_INPUT_ERROR,
  normaliseCalculationRequest,
  parseCalculationRequest
} from '../requestParser';
import { YearConfigStore } from '../../tax/config/yearConfigStore';
import { CalculationValidationError } from '../../utils/AppError';

const store = new YearConfigStore();

function normalise(payload: Record<string, unknown>) {
  const request = parseCalculationRequest(payload);
  return normaliseCalculationRequest(request, store.load(request.year), 'en');
}

function issuesOf(action: () => unknown) {
  try {
    action();
  } catch (error) {
    if (error instanceof CalculationValidationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('Expected a validation error');
}

describe('Request Parser', () => {
  describe('parseCalculationRequest()', () => {
    it('should accept a minimal payload and fill defaults', () => {
      const request = parseCalculationRequest({ year: 2024 });
      expect(request.year).toBe(2024);
      expect(request.withholding_tax).toBe(0);
      expect(request.employment).toBeUndefined();
    });

    it('should coerce numeric strings', () => {
      const request = parseCalculationRequest({ year: '2024', employment: { gross_income: '30000' } });
      expect(request.year).toBe(2024);
      expect(request.employment?.gross_income).toBe(30000);
    });

    it('should reject negative amounts with one message', () => {
      const action = () => parseCalculationRequest({ year: 2024, employment: { gross_income: -1 } });
      expect(action).toThrow('Invalid calculation payload: employment.gross_income: value cannot be negative');
    });

    it('should require a year', () => {
      expect(issuesOf(() => parseCalculationRequest({}))).toEqual([{ field: 'year', message: 'Required' }]);
    });

    it('should reject legacy net income fields', () => {
      const issues = issuesOf(() => parseCalculationRequest({ year: 2024, employment: { net_income: 1500 } }));
      expect(issues).toEqual([{ field: 'employment.net_income', message: NET_INCOME_INPUT_ERROR }]);
    });

    it('should reject more dependants than supported', () => {
      const issues = issuesOf(() => parseCalculationRequest({ year: 2024, dependents: { children: 16 } }));
      expect(issues).toEqual([{ field: 'dependents.children', message: 'at most 15 dependants are supported' }]);
    });

    it('should reject unknown fields', () => {
      const issues = issuesOf(() => parseCalculationRequest({ year: 2024, bonus: 1 }));
      expect(issues).toEqual([{ field: '', message: "Unrecognized key(s) in object: 'bonus'" }]);
    });

    it('should reject an unknown trade fee location', () => {
      const issues = issuesOf(() =>
        parseCalculationRequest({ year: 2024, freelance: { profit: 1000, trade_fee_location: 'island' } })
      );
      expect(issues).toEqual([
        { field: 'freelance.trade_fee_location', message: 'Invalid trade fee location selection' }
      ]);
    });

    it('should treat an empty trade fee location as standard', () => {
      const request = parseCalculationRequest({ year: 2024, freelance: { trade_fee_location: '' } });
      expect(request.freelance?.trade_fee_location).toBe('standard');
    });

    it('should reject conflicting birth years', () => {
      const issues = issuesOf(() =>
        parseCalculationRequest({ year: 2024, demographics: { birth_year: 1990, taxpayer_birth_year: 1991 } })
      );
      expect(issues).toEqual([
        { field: 'demographics', message: 'birth_year and taxpayer_birth_year must match when both are provided' }
      ]);
    });
  });

  describe('normaliseCalculationRequest()', () => {
    it('should reject payroll frequencies the year does not allow', () => {
      const issues = issuesOf(() => normalise({ year: 2024, employment: { gross_income: 1000, payments_per_year: 13 } }));
      expect(issues).toEqual([{ field: 'employment.payments_per_year', message: 'must be one of 12, 14' }]);
    });

    it('should reject birth years outside the window', () => {
      const issues = issuesOf(() => normalise({ year: 2024, demographics: { birth_year: 2030 } }));
      expect(issues).toEqual([{ field: 'demographics.birth_year', message: 'must be between 1901 and 2024' }]);
    });

    it('should reject unknown EFKA categories', () => {
      const issues = issuesOf(() => normalise({ year: 2024, freelance: { efka_category: 'made_up' } }));
      expect(issues).toEqual([{ field: 'freelance.efka_category', message: "Unknown EFKA category 'made_up'" }]);
    });

    it('should let the social contributions switch set unspecified parts', () => {
      const input = normalise({
        year: 2024,
        employment: { gross_income: 1000, include_social_contributions: false, include_employer_contributions: true }
      });
      expect(input.employment.includeSocialContributions).toBe(false);
      expect(input.employment.includeEmployeeContributions).toBe(false);
      expect(input.employment.includeEmployerContributions).toBe(true);
    });

    it('should switch social contributions off when every part is off', () => {
      const input = normalise({
        year: 2024,
        employment: {
          gross_income: 1000,
          include_employee_contributions: false,
          include_manual_employee_contributions: false,
          include_employer_contributions: false
        }
      });
      expect(input.employment.includeSocialContributions).toBe(false);
    });

    it('should derive profit from revenue and expenses', () => {
      const input = normalise({ year: 2024, freelance: { gross_revenue: 8000, deductible_expenses: 9000 } });
      expect(input.freelance.profit).toBe(0);
    });

    it('should resolve the locale', () => {
      expect(normalise({ year: 2024, locale: 'el-GR' }).locale).toBe('el');
      expect(normalise({ year: 2024, locale: 'fr' }).locale).toBe('en');
    });

    it('should let request toggles override the year defaults', () => {
      expect(normalise({ year: 2026 }).toggleEnabled('youth_eligibility')).toBe(true);
      expect(normalise({ year: 2026, toggles: { youth_eligibility: false } }).toggleEnabled('youth_eligibility')).toBe(
        false
      );
    });

    it('should derive the youth category from the birth year', () => {
      expect(normalise({ year: 2026, demographics: { birth_year: 1998 } }).youthRateCategory).toBe('age26_30');
      expect(normalise({ year: 2026, demographics: { birth_year: 1990 } }).youthRateCategory).toBeUndefined();
      expect(normalise({ year: 2024, demographics: { birth_year: 2003 } }).youthRateCategory).toBeUndefined();
    });

    it('should report presumptive adjustments when enabled', () => {
      const input = normalise({ year: 2026, demographics: { small_village: true, new_mother: true } });
      expect(input.presumptiveAdjustments).toEqual(['small_village', 'new_mother']);
    });
  });
});
