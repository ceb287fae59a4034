import { describe, it, expect } from '@jest/globals';
import { YearConfigStore } from '../../config/yearConfigStore';
import type { TradeFeeConfig } from '../../config/yearConfig';
import { normaliseCalculationRequest, parseCalculationRequest } from '../../../services/requestParser';
import { getTranslator } from '../../../localization/translator';
import { toCurrency } from '../../../utils/decimal';
import {
  applyDeductionCredits,
  applyFamilyCredit,
  buildIncomeComponents,
  calculateGeneralIncome,
  calculateTradeFee,
  taxComponents
} from '../index';

const store = new YearConfigStore();

function prepare(payload: Record<string, unknown>) {
  const request = parseCalculationRequest(payload);
  const config = store.load(request.year);
  return { input: normaliseCalculationRequest(request, config, 'en'), config };
}

function credited(payload: Record<string, unknown>) {
  const { input, config } = prepare(payload);
  const taxed = taxComponents(buildIncomeComponents(input, config), input, config);
  return applyFamilyCredit(taxed, input, config);
}

describe('Income Component Builder', () => {
  it('should build an employment component with contributions', () => {
    const { input, config } = prepare({ year: 2024, employment: { gross_income: 30000 } });
    const [employment, ...rest] = buildIncomeComponents(input, config);

    expect(rest).toHaveLength(0);
    expect(employment.category).toBe('employment');
    expect(employment.taxableIncome.toNumber()).toBe(30000);
    expect(employment.employeeContributions.toNumber()).toBe(4161);
    expect(employment.employerContributions.toNumber()).toBe(6687);
    expect(employment.paymentsPerYear).toBe(14);
    expect(toCurrency(employment.monthlyGrossIncome ?? 0)).toBe(2142.86);
  });

  it('should zero every contribution when social contributions are excluded', () => {
    const { input, config } = prepare({
      year: 2024,
      employment: { gross_income: 30000, employee_contributions: 500, include_social_contributions: false }
    });
    const [employment] = buildIncomeComponents(input, config);

    expect(employment.employeeContributions.toNumber()).toBe(0);
    expect(employment.employeeManualContributions.toNumber()).toBe(0);
    expect(employment.employerContributions.toNumber()).toBe(0);
  });

  it('should add manual contributions to the automatic ones', () => {
    const { input, config } = prepare({
      year: 2024,
      employment: { gross_income: 30000, employee_contributions: 500 }
    });
    const [employment] = buildIncomeComponents(input, config);

    expect(employment.employeeContributions.toNumber()).toBe(4661);
    expect(employment.employeeManualContributions.toNumber()).toBe(500);
  });

  it('should cap the contribution base at the monthly ceiling', () => {
    const { input, config } = prepare({
      year: 2024,
      employment: { gross_income: 120000, payments_per_year: 12 }
    });
    const [employment] = buildIncomeComponents(input, config);

    // 7,572.62 x 12 = 90,871.44 at 13.87%
    expect(toCurrency(employment.employeeContributions)).toBe(12603.87);
    expect(employment.taxableIncome.toNumber()).toBe(120000);
  });

  it('should derive annual income from monthly income', () => {
    const { input, config } = prepare({ year: 2024, employment: { monthly_income: 2000 } });
    const [employment] = buildIncomeComponents(input, config);

    expect(employment.grossIncome.toNumber()).toBe(28000);
    expect(employment.monthlyGrossIncome?.toNumber()).toBe(2000);
  });

  it('should tax freelance profit after included contributions', () => {
    const { input, config } = prepare({
      year: 2024,
      freelance: { gross_revenue: 20000, deductible_expenses: 5000, mandatory_contributions: 3000 }
    });
    const [freelance] = buildIncomeComponents(input, config);

    expect(freelance.grossIncome.toNumber()).toBe(15000);
    expect(freelance.taxableIncome.toNumber()).toBe(12000);
    expect(freelance.additionalContributions.toNumber()).toBe(3000);
    expect(freelance.tradeFee.toNumber()).toBe(0);
  });

  it('should price EFKA category contributions by month', () => {
    const { input, config } = prepare({
      year: 2024,
      freelance: { gross_revenue: 20000, efka_category: 'engineer_class_1' }
    });
    const [freelance] = buildIncomeComponents(input, config);

    expect(freelance.categoryContributions.toNumber()).toBe(2866.44);
    expect(freelance.auxiliaryContributions.toNumber()).toBe(504);
    expect(freelance.lumpSumContributions.toNumber()).toBe(300);
    expect(freelance.taxableIncome.toNumber()).toBe(16329.56);
  });

  it('should make agricultural income credit-eligible only when it is the sole activity', () => {
    const alone = prepare({ year: 2024, agricultural: { gross_revenue: 10000, deductible_expenses: 2000 } });
    const [farming] = buildIncomeComponents(alone.input, alone.config);
    expect(farming.taxableIncome.toNumber()).toBe(8000);
    expect(farming.creditEligible).toBe(true);

    const mixed = prepare({
      year: 2024,
      employment: { gross_income: 10000 },
      agricultural: { gross_revenue: 10000 }
    });
    const components = buildIncomeComponents(mixed.input, mixed.config);
    expect(components.map(component => [component.category, component.creditEligible])).toEqual([
      ['employment', true],
      ['agricultural', false]
    ]);
  });

  it('should keep professional farmers credit-eligible alongside other income', () => {
    const { input, config } = prepare({
      year: 2024,
      employment: { gross_income: 10000 },
      agricultural: { gross_revenue: 10000, professional_farmer: true }
    });
    const farming = buildIncomeComponents(input, config).find(component => component.category === 'agricultural');
    expect(farming?.creditEligible).toBe(true);
  });

  it('should build nothing for an empty declaration', () => {
    const { input, config } = prepare({ year: 2024 });
    expect(buildIncomeComponents(input, config)).toEqual([]);
  });
});

describe('calculateTradeFee()', () => {
  const fee: TradeFeeConfig = {
    standardAmount: 650,
    reducedAmount: 325,
    newlySelfEmployedReductionYears: 5,
    sunset: null,
    feeSunset: false
  };

  const freelancer = (freelance: Record<string, unknown> = {}) =>
    prepare({ year: 2024, freelance: { profit: 10000, ...freelance } }).input;

  it('should charge the standard amount', () => {
    expect(calculateTradeFee(freelancer(), fee).toNumber()).toBe(650);
  });

  it('should charge the reduced amount in a reduced location', () => {
    expect(calculateTradeFee(freelancer({ trade_fee_location: 'reduced' }), fee).toNumber()).toBe(325);
  });

  it('should reduce the fee for the newly self-employed', () => {
    const input = freelancer({ newly_self_employed: true, years_active: 2 });
    expect(calculateTradeFee(input, fee).toNumber()).toBe(325);
    expect(calculateTradeFee(input, { ...fee, reducedAmount: null }).toNumber()).toBe(0);
  });

  it('should waive the fee when excluded or without taxable profit', () => {
    expect(calculateTradeFee(freelancer({ include_trade_fee: false }), fee).toNumber()).toBe(0);
    expect(calculateTradeFee(freelancer({ profit: 0, gross_revenue: 0 }), fee).toNumber()).toBe(0);
  });

  it('should waive the fee from the year before a scheduled abolition', () => {
    const scheduled = (year: number): TradeFeeConfig => ({
      ...fee,
      sunset: { statusKey: 'trade_fee.sunset.scheduled', year }
    });
    expect(calculateTradeFee(freelancer(), scheduled(2025)).toNumber()).toBe(0);
    expect(calculateTradeFee(freelancer(), scheduled(2027)).toNumber()).toBe(650);
    expect(calculateTradeFee(freelancer(), { ...fee, feeSunset: true }).toNumber()).toBe(0);
  });
});

describe('Credit Apportionment Engine', () => {
  it('should reduce the family credit above the income threshold', () => {
    const result = credited({ year: 2024, dependents: { children: 1 }, employment: { gross_income: 30000 } });
    const [employment] = result.components;

    // 810 - (30,000 - 12,000) / 1,000 x 20
    expect(result.creditRequested.toNumber()).toBe(450);
    expect(result.creditApplied.toNumber()).toBe(450);
    expect(employment.taxBeforeCredit.toNumber()).toBe(5900);
    expect(employment.taxAfterCredit.toNumber()).toBe(5450);
  });

  it('should split the credit by pre-credit tax across eligible components', () => {
    const result = credited({
      year: 2024,
      employment: { gross_income: 20000 },
      pension: { gross_income: 10000 }
    });
    const [employment, pension] = result.components;

    expect(result.creditRequested.toNumber()).toBe(417);
    expect(toCurrency(employment.taxBeforeCredit)).toBe(3933.33);
    expect(toCurrency(pension.taxBeforeCredit)).toBe(1966.67);
    expect(toCurrency(employment.credit)).toBe(278);
    expect(toCurrency(pension.credit)).toBe(139);
    expect(toCurrency(employment.taxAfterCredit)).toBe(3655.33);
  });

  it('should leave components that are not credit-eligible untouched', () => {
    const result = credited({
      year: 2024,
      employment: { gross_income: 20000 },
      other: { taxable_income: 10000 }
    });
    const [employment, other] = result.components;

    // 777 - (20,000 - 12,000) / 1,000 x 20
    expect(result.creditApplied.toNumber()).toBe(617);
    expect(toCurrency(employment.taxAfterCredit)).toBe(3316.33);
    expect(other.credit.toNumber()).toBe(0);
    expect(toCurrency(other.taxAfterCredit)).toBe(1966.67);
  });

  it('should never apply more credit than the eligible tax', () => {
    const result = credited({ year: 2024, agricultural: { gross_revenue: 10000, deductible_expenses: 2000 } });

    expect(result.creditRequested.toNumber()).toBe(777);
    expect(result.creditApplied.toNumber()).toBe(720);
    expect(result.components[0].taxAfterCredit.toNumber()).toBe(0);
  });

  it('should only consider the configured credit sources', () => {
    const result = credited({ year: 2025, pension: { gross_income: 20000 } });

    expect(result.creditRequested.toNumber()).toBe(0);
    expect(result.components[0].taxAfterCredit.toNumber()).toBe(3100);
  });

  it('should grant a salary-only credit to the employment component alone', () => {
    const result = credited({
      year: 2025,
      employment: { gross_income: 1000 },
      pension: { gross_income: 20000 }
    });
    const [employment, pension] = result.components;

    // 21,000 on the ladder: 900 + 2,200 + 280 = 3,380
    expect(result.creditRequested.toNumber()).toBe(777);
    expect(result.creditApplied.toNumber()).toBe(777);
    expect(toCurrency(employment.taxBeforeCredit)).toBe(160.95);
    expect(employment.credit.toNumber()).toBe(777);
    expect(employment.taxAfterCredit.toNumber()).toBe(0);
    expect(pension.credit.toNumber()).toBe(0);
    expect(toCurrency(pension.taxAfterCredit)).toBe(3219.05);
  });

  it('should cap the applied credit by the tax of every component', () => {
    const result = credited({
      year: 2026,
      demographics: { birth_year: 2003 },
      employment: { gross_income: 15000 },
      pension: { gross_income: 5000 }
    });
    const [employment, pension] = result.components;

    // 777 - (15,000 - 12,000) / 1,000 x 20, within the pension's 225 + 500
    expect(employment.taxBeforeCredit.toNumber()).toBe(0);
    expect(pension.taxBeforeCredit.toNumber()).toBe(725);
    expect(result.creditApplied.toNumber()).toBe(717);
    expect(employment.credit.toNumber()).toBe(0);
    expect(pension.credit.toNumber()).toBe(0);
    expect(pension.taxAfterCredit.toNumber()).toBe(725);
  });

  it('should exempt large families from the phase-out', () => {
    const result = credited({ year: 2025, dependents: { children: 5 }, employment: { gross_income: 30000 } });

    // 1,340 for four children plus 220 for the fifth
    expect(result.creditRequested.toNumber()).toBe(1560);
    expect(result.components[0].taxAfterCredit.toNumber()).toBe(4340);
  });

  it('should apply youth rates to employment income', () => {
    const result = credited({
      year: 2026,
      demographics: { birth_year: 2003 },
      employment: { gross_income: 15000 }
    });
    expect(result.components[0].taxBeforeCredit.toNumber()).toBe(0);
    expect(result.creditApplied.toNumber()).toBe(0);
  });
});

describe('Deduction Credit Engine', () => {
  function deductions(payload: Record<string, unknown>) {
    const { input, config } = prepare(payload);
    const taxed = taxComponents(buildIncomeComponents(input, config), input, config);
    const family = applyFamilyCredit(taxed, input, config);
    return applyDeductionCredits(family.components, input, config.deductions);
  }

  it('should apply each rule and keep credits within the remaining tax', () => {
    const result = deductions({
      year: 2024,
      dependents: { children: 1 },
      employment: { gross_income: 30000 },
      deductions: { donations: 5000, medical: 2000, education: 1500, insurance: 1000 }
    });

    expect(
      result.entries.map(entry => [entry.type, entry.eligible.toNumber(), entry.creditApplied.toNumber()])
    ).toEqual([
      ['donations', 3000, 600],
      ['medical', 500, 50],
      ['education', 1000, 100],
      ['insurance', 1000, 100]
    ]);
    expect(result.entries[0].notes).toBe('Only donations up to 10% of eligible income qualify for the 20% credit.');
    expect(result.entries[2].notes).toBe(
      'Education expenses eligible for credits are capped at €1,000.00; excess is ignored.'
    );
    expect(result.entries[3].notes).toBeNull();
    expect(result.totalApplied.toNumber()).toBe(850);
    expect(result.components[0].deductionsApplied.toNumber()).toBe(850);
    expect(result.components[0].taxAfterCredit.toNumber()).toBe(4600);
  });

  it('should explain a medical threshold that was not met', () => {
    const result = deductions({
      year: 2024,
      employment: { gross_income: 30000 },
      deductions: { medical: 1000 }
    });

    expect(result.entries[0].eligible.toNumber()).toBe(0);
    expect(result.entries[0].notes).toBe('Medical expenses must exceed 5% of income before a credit is granted.');
  });

  it('should scale credits down to the tax left after the family credit', () => {
    const result = deductions({
      year: 2024,
      employment: { gross_income: 12000 },
      deductions: { donations: 3000, medical: 5000, education: 1000, insurance: 1200 }
    });

    // 1,340 tax less the 777 family credit leaves 563 for 900 requested
    expect(result.entries.map(entry => entry.creditRequested.toNumber())).toEqual([240, 440, 100, 120]);
    expect(result.entries.map(entry => toCurrency(entry.creditApplied))).toEqual([150.13, 275.24, 62.56, 75.07]);
    expect(toCurrency(result.totalApplied)).toBe(563);
    expect(toCurrency(result.components[0].taxAfterCredit)).toBe(0);
    expect(result.entries[3].notes).toBe('Credits were limited by the remaining tax liability.');
  });

  it('should report deductions without any taxable income', () => {
    const result = deductions({ year: 2024, deductions: { donations: 100 } });

    expect(result.components).toEqual([]);
    expect(result.entries[0].creditApplied.toNumber()).toBe(0);
    expect(result.entries[0].notes).toBe('Donations cannot generate a credit without taxable income.');
  });
});

describe('calculateGeneralIncome()', () => {
  it('should build detail rows with per-payment figures', () => {
    const { input, config } = prepare({ year: 2024, dependents: { children: 1 }, employment: { gross_income: 30000 } });
    const result = calculateGeneralIncome(input, config, getTranslator('en'));
    const [detail] = result.details;

    expect(detail).toMatchObject({
      category: 'employment',
      label: 'Employment income',
      gross_income: 30000,
      taxable_income: 30000,
      tax: 5450,
      total_tax: 5450,
      net_income: 20389,
      tax_before_credits: 5900,
      credits: 450,
      employee_contributions: 4161,
      employee_contributions_per_payment: 297.21,
      employer_contributions: 6687,
      employer_contributions_per_payment: 477.64,
      employer_cost: 36687,
      employer_cost_per_payment: 2620.5,
      monthly_gross_income: 2142.86,
      payments_per_year: 14,
      gross_income_per_payment: 2142.86,
      net_income_per_payment: 1456.36
    });
    expect(result.totals.net.toNumber()).toBe(20389);
  });
});
