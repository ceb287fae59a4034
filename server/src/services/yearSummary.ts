/**
 * Year Summary
 *
 * Wire form of a year's rules for clients that populate forms (payroll
 * frequencies, brackets, youth bands, trade fee) without repeating them.
 */

import type {
  BracketSummary,
  DependantRateEntry,
  FamilyTaxCreditSummary,
  PayrollSummary,
  TradeFeeSummary,
  YearSummary,
  YouthRateEntry
} from '../../../shared/types/index.js';
import {
  YOUTH_CATEGORIES,
  type DependantRates,
  type PayrollRules,
  type ProgressiveBracket,
  type TaxCreditTable,
  type TradeFeeConfig,
  type YearConfiguration
} from '../tax/config/yearConfig.js';

function dependantRates(rates: DependantRates): DependantRateEntry[] {
  return [...rates].map(([dependants, rate]) => ({ dependants, rate }));
}

export function summariseBracket(bracket: ProgressiveBracket): BracketSummary {
  if (bracket.kind === 'flat') {
    return { type: 'single', upper: bracket.upperBound, rate: bracket.rate };
  }

  const youth: YouthRateEntry[] = [];
  for (const band of YOUTH_CATEGORIES) {
    const table = bracket.youth[band];
    if (!table) {
      continue;
    }
    const entry: YouthRateEntry = { band };
    if (table.rate !== null) {
      entry.rate = table.rate;
    }
    if (table.dependants.size > 0) {
      entry.dependant_rates = dependantRates(table.dependants);
    }
    youth.push(entry);
  }

  return { type: 'multi', upper: bracket.upperBound, household: dependantRates(bracket.household), youth };
}

/**
 * Youth bands any bracket defines, sorted
 */
export function youthBands(brackets: readonly ProgressiveBracket[]): string[] {
  const bands = new Set<string>();
  for (const bracket of brackets) {
    if (bracket.kind === 'multi') {
      Object.keys(bracket.youth).forEach(band => bands.add(band));
    }
  }
  return [...bands].sort();
}

function payroll(rules: PayrollRules): PayrollSummary {
  return {
    allowed_payments_per_year: [...rules.allowedPaymentsPerYear],
    default_payments_per_year: rules.defaultPaymentsPerYear
  };
}

function familyTaxCredit(table: TaxCreditTable): FamilyTaxCreditSummary {
  return {
    amounts_by_children: [...table.amountsByChildren].map(([children, amount]) => ({ children, amount })),
    incremental_amount_per_child: table.incrementalAmountPerChild,
    income_reduction_exempt_from_dependants: table.incomeReductionExemptFromDependants,
    credit_sources: [...table.creditSources]
  };
}

function tradeFee(fee: TradeFeeConfig): TradeFeeSummary {
  const summary: TradeFeeSummary = {
    standard_amount: fee.standardAmount,
    reduced_amount: fee.reducedAmount,
    newly_self_employed_reduction_years: fee.newlySelfEmployedReductionYears,
    fee_sunset: fee.feeSunset
  };
  if (fee.sunset) {
    summary.sunset = { status_key: fee.sunset.statusKey, year: fee.sunset.year };
  }
  return summary;
}

export function summariseYear(config: YearConfiguration): YearSummary {
  const { employment, pension, freelance } = config;

  return {
    year: config.year,
    toggles: { ...config.meta.toggles },
    birth_year_window: { ...config.meta.birthYearWindow },
    employment: {
      payroll: payroll(employment.payroll),
      contributions: {
        employee_rate: employment.contributions.employeeRate,
        employer_rate: employment.contributions.employerRate,
        monthly_salary_cap: employment.contributions.monthlySalaryCap
      },
      family_tax_credit: familyTaxCredit(employment.taxCredit),
      brackets: employment.brackets.map(summariseBracket),
      youth: { bands: youthBands(employment.brackets) }
    },
    pension: {
      payroll: payroll(pension.payroll),
      family_tax_credit: familyTaxCredit(pension.taxCredit)
    },
    freelance: {
      trade_fee: tradeFee(freelance.tradeFee),
      efka_categories: freelance.efkaCategories.map(category => category.id)
    },
    rental: {
      brackets: config.rental.brackets.map(summariseBracket)
    },
    investment: {
      rates: { ...config.investment.rates }
    }
  };
}
