/**
 * Income Component Builder
 *
 * Turns a normalised input into the general income components that share the
 * progressive ladder: employment, pension, freelance, agricultural, other.
 * A category without activity produces no component.
 */

import type { CalculationInput } from '../../models/calculationInput.js';
import { createComponent, type IncomeComponent } from '../../models/incomeComponent.js';
import { Decimal, ZERO, decimal, min } from '../../utils/decimal.js';
import type { PayrollRules, TradeFeeConfig, YearConfiguration } from '../config/yearConfig.js';

function resolvePayments(declared: number | null, payroll: PayrollRules): number {
  return declared !== null && declared > 0 ? declared : payroll.defaultPaymentsPerYear;
}

function resolveMonthlyIncome(monthly: number | null, gross: Decimal, payments: number): Decimal {
  return monthly !== null ? decimal(monthly) : gross.dividedBy(payments);
}

function buildEmploymentComponent(input: CalculationInput, config: YearConfiguration): IncomeComponent {
  const employment = input.employment;
  const { contributions, payroll } = config.employment;

  const gross = decimal(employment.income);
  const paymentsPerYear = resolvePayments(employment.paymentsPerYear, payroll);

  // Contributions are charged on salary up to the monthly ceiling; tax is not
  let contributionBase = gross;
  if (contributions.monthlySalaryCap !== null && contributions.monthlySalaryCap > 0) {
    contributionBase = min(gross, decimal(contributions.monthlySalaryCap).times(paymentsPerYear));
  }

  const social = employment.includeSocialContributions;
  const includeAuto = social && employment.includeEmployeeContributions;
  const includeManual = social && employment.includeManualContributions;
  const includeEmployer = social && employment.includeEmployerContributions;

  const autoContribution = includeAuto ? contributionBase.times(contributions.employeeRate) : ZERO;
  const manualContribution = includeManual ? decimal(employment.manualContributions) : ZERO;
  const employerContribution = includeEmployer ? contributionBase.times(contributions.employerRate) : ZERO;

  return createComponent({
    category: 'employment',
    labelKey: 'details.employment',
    grossIncome: gross,
    taxableIncome: gross,
    creditEligible: true,
    employeeContributions: autoContribution.plus(manualContribution),
    employeeManualContributions: manualContribution,
    employerContributions: employerContribution,
    includeEmployeeContributions: includeAuto || includeManual,
    paymentsPerYear,
    monthlyGrossIncome: resolveMonthlyIncome(employment.monthlyIncome, gross, paymentsPerYear)
  });
}

function buildPensionComponent(input: CalculationInput, config: YearConfiguration): IncomeComponent {
  const gross = decimal(input.pension.income);
  const paymentsPerYear = resolvePayments(input.pension.paymentsPerYear, config.pension.payroll);

  return createComponent({
    category: 'pension',
    labelKey: 'details.pension',
    grossIncome: gross,
    taxableIncome: gross,
    creditEligible: true,
    paymentsPerYear,
    monthlyGrossIncome: resolveMonthlyIncome(input.pension.monthlyIncome, gross, paymentsPerYear)
  });
}

/**
 * Business activity fee owed by a freelancer for the year
 */
export function calculateTradeFee(input: CalculationInput, config: TradeFeeConfig): Decimal {
  if (!input.freelance.includeTradeFee) {
    return ZERO;
  }
  if (input.freelanceTaxableIncome.lte(0)) {
    return ZERO;
  }
  if (config.feeSunset) {
    return ZERO;
  }

  // A scheduled abolition already applies in the year before it takes effect
  const sunset = config.sunset;
  if (sunset && sunset.statusKey.trim().toLowerCase().endsWith('scheduled')) {
    if (sunset.year === null || input.year >= sunset.year - 1) {
      return ZERO;
    }
  }

  let amount = decimal(config.standardAmount);
  if (input.freelance.tradeFeeLocation === 'reduced' && config.reducedAmount !== null) {
    amount = decimal(config.reducedAmount);
  }

  if (input.freelance.newlySelfEmployed) {
    const yearsActive = input.freelance.yearsActive ?? 0;
    const reductionYears = config.newlySelfEmployedReductionYears;
    if (reductionYears !== null && yearsActive < reductionYears) {
      amount = config.reducedAmount !== null ? min(amount, config.reducedAmount) : ZERO;
    }
  }

  return Decimal.max(amount, 0);
}

function buildFreelanceComponent(input: CalculationInput, config: YearConfiguration): IncomeComponent {
  return createComponent({
    category: 'freelance',
    labelKey: 'details.freelance',
    grossIncome: input.freelance.profit,
    taxableIncome: input.freelanceTaxableIncome,
    creditEligible: true,
    deductibleExpenses: decimal(input.freelance.deductibleExpenses),
    contributions: input.freelanceTotalContributions,
    categoryContributions: decimal(input.freelanceEffectiveCategoryContribution),
    additionalContributions: decimal(input.freelanceEffectiveMandatoryContribution),
    auxiliaryContributions: decimal(input.freelanceEffectiveAuxiliaryContribution),
    lumpSumContributions: decimal(input.freelanceEffectiveLumpSumContribution),
    tradeFee: calculateTradeFee(input, config.freelance.tradeFee)
  });
}

export function buildIncomeComponents(input: CalculationInput, config: YearConfiguration): IncomeComponent[] {
  const components: IncomeComponent[] = [];

  if (input.hasEmploymentIncome) {
    components.push(buildEmploymentComponent(input, config));
  }

  if (input.hasPensionIncome) {
    components.push(buildPensionComponent(input, config));
  }

  if (input.hasFreelanceActivity) {
    components.push(buildFreelanceComponent(input, config));
  }

  if (input.hasAgriculturalIncome) {
    components.push(
      createComponent({
        category: 'agricultural',
        labelKey: 'details.agricultural',
        grossIncome: input.agricultural.grossRevenue,
        taxableIncome: input.agriculturalTaxableIncome,
        creditEligible: input.qualifiesForAgriculturalTaxCredit,
        deductibleExpenses: decimal(input.agricultural.deductibleExpenses)
      })
    );
  }

  if (input.hasOtherIncome) {
    components.push(
      createComponent({
        category: 'other',
        labelKey: 'details.other',
        grossIncome: input.otherTaxableIncome,
        taxableIncome: input.otherTaxableIncome,
        creditEligible: false
      })
    );
  }

  return components;
}
