import { describe, it, expect } from '@jest/globals';
import { calculateRental } from '../rental';
import { calculateInvestment } from '../investment';
import { calculateEnfia, calculateLuxury } from '../obligations';
import { YearConfigStore } from '../config/yearConfigStore';
import { normaliseCalculationRequest, parseCalculationRequest } from '../../services/requestParser';
import { getTranslator } from '../../localization/translator';

const store = new YearConfigStore();
const config = store.load(2024);
const en = getTranslator('en');

function inputFor(payload: Record<string, unknown>) {
  return normaliseCalculationRequest(parseCalculationRequest({ year: 2024, ...payload }), config, 'en');
}

describe('Rental calculator', () => {
  it('should tax net rent on the rental ladder', () => {
    const detail = calculateRental(
      inputFor({ rental: { gross_income: 20000, deductible_expenses: 2000 } }),
      config.rental,
      en
    );

    // 12,000 x 15% + 6,000 x 35%
    expect(detail).toEqual({
      category: 'rental',
      label: 'Rental income',
      gross_income: 20000,
      deductible_expenses: 2000,
      taxable_income: 18000,
      tax: 3900,
      total_tax: 3900,
      net_income: 14100
    });
  });

  it('should keep expenses above rent at zero tax', () => {
    const detail = calculateRental(
      inputFor({ rental: { gross_income: 1000, deductible_expenses: 1500 } }),
      config.rental,
      en
    );
    expect(detail?.taxable_income).toBe(0);
    expect(detail?.tax).toBe(0);
    expect(detail?.net_income).toBe(-500);
  });

  it('should produce no row without rental activity', () => {
    expect(calculateRental(inputFor({}), config.rental, en)).toBeNull();
  });
});

describe('Investment calculator', () => {
  it('should tax each category at its flat rate', () => {
    const detail = calculateInvestment(
      inputFor({ investment: { dividends: 1000, interest: 500, capital_gains: 2000 } }),
      config.investment,
      en
    );

    expect(detail?.tax).toBe(425);
    expect(detail?.total_tax).toBe(425);
    expect(detail?.gross_income).toBe(3500);
    expect(detail?.net_income).toBe(3075);
    expect(detail?.items).toEqual([
      { type: 'dividends', label: 'Dividends', amount: 1000, rate: 0.05, tax: 50 },
      { type: 'interest', label: 'Interest', amount: 500, rate: 0.15, tax: 75 },
      { type: 'capital_gains', label: 'Capital gains', amount: 2000, rate: 0.15, tax: 300 }
    ]);
  });

  it('should produce no row when nothing is positive', () => {
    expect(calculateInvestment(inputFor({ investment: { dividends: 0 } }), config.investment, en)).toBeNull();
  });

  it('should ignore categories the year does not configure', () => {
    expect(calculateInvestment(inputFor({ investment: { crypto: 500 } }), config.investment, en)).toBeNull();
  });
});

describe('Obligations', () => {
  it('should pass ENFIA and luxury tax through', () => {
    const input = inputFor({ obligations: { enfia: 320, luxury: 880 } });

    expect(calculateEnfia(input, en)).toEqual({
      category: 'enfia',
      label: 'ENFIA property tax',
      tax: 320,
      total_tax: 320,
      net_income: -320
    });
    expect(calculateLuxury(input, getTranslator('el'))?.net_income).toBe(-880);
  });

  it('should skip obligations that were not declared', () => {
    const input = inputFor({ obligations: { enfia: 320 } });
    expect(calculateLuxury(input, en)).toBeNull();
  });
});
