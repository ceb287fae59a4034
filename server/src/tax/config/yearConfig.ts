/**
 * Year Configuration Schema
 *
 * Tax year rules live in JSON files (config/years/<year>.json). This module
 * validates a parsed file and turns it into the immutable, camelCased
 * structure the calculators read. Progressive brackets become a tagged union
 * so that rate lookups never inspect shapes at runtime.
 */

import { z } from 'zod';

export const YOUTH_CATEGORIES = ['under_25', 'age26_30'] as const;
export type YouthCategory = (typeof YOUTH_CATEGORIES)[number];

export const CREDIT_SOURCES = ['employment', 'pension', 'agricultural'] as const;
export type CreditSource = (typeof CREDIT_SOURCES)[number];

/** Rates keyed by dependant count, ascending */
export type DependantRates = ReadonlyMap<number, number>;

export interface FlatBracket {
  readonly kind: 'flat';
  readonly upperBound: number | null;
  readonly rate: number;
}

export interface YouthRateTable {
  readonly dependants: DependantRates;
  readonly rate: number | null;
}

export interface MultiRateBracket {
  readonly kind: 'multi';
  readonly upperBound: number | null;
  readonly household: DependantRates;
  readonly youth: Readonly<Partial<Record<YouthCategory, YouthRateTable>>>;
}

export type ProgressiveBracket = FlatBracket | MultiRateBracket;

export interface TaxCreditTable {
  readonly amountsByChildren: ReadonlyMap<number, number>;
  readonly incrementalAmountPerChild: number;
  readonly incomeReductionExemptFromDependants: number | null;
  readonly creditSources: readonly CreditSource[];
}

export interface PayrollRules {
  readonly allowedPaymentsPerYear: readonly number[];
  readonly defaultPaymentsPerYear: number;
}

export interface ContributionRates {
  readonly employeeRate: number;
  readonly employerRate: number;
  readonly monthlySalaryCap: number | null;
}

export interface TradeFeeSunset {
  readonly statusKey: string;
  readonly year: number | null;
}

export interface TradeFeeConfig {
  readonly standardAmount: number;
  readonly reducedAmount: number | null;
  readonly newlySelfEmployedReductionYears: number | null;
  readonly sunset: TradeFeeSunset | null;
  readonly feeSunset: boolean;
}

export interface EfkaCategory {
  readonly id: string;
  readonly labelKey: string;
  readonly monthlyAmount: number;
  readonly auxiliaryMonthlyAmount: number | null;
  readonly lumpSumMonthlyAmount: number | null;
}

export interface DeductionRules {
  readonly donations: { readonly creditRate: number; readonly incomeCapRate: number | null };
  readonly medical: { readonly creditRate: number; readonly incomeThresholdRate: number; readonly maxCredit: number };
  readonly education: { readonly creditRate: number; readonly maxEligibleExpense: number };
  readonly insurance: { readonly creditRate: number; readonly maxEligibleExpense: number };
}

export interface YearConfiguration {
  readonly year: number;
  readonly meta: {
    readonly toggles: Readonly<Record<string, boolean>>;
    readonly birthYearWindow: { readonly min: number; readonly max: number };
  };
  readonly employment: {
    readonly brackets: readonly ProgressiveBracket[];
    readonly taxCredit: TaxCreditTable;
    readonly payroll: PayrollRules;
    readonly contributions: ContributionRates;
  };
  readonly pension: {
    readonly taxCredit: TaxCreditTable;
    readonly payroll: PayrollRules;
  };
  readonly freelance: {
    readonly tradeFee: TradeFeeConfig;
    readonly efkaCategories: readonly EfkaCategory[];
  };
  readonly rental: {
    readonly brackets: readonly ProgressiveBracket[];
  };
  readonly investment: {
    readonly rates: Readonly<Record<string, number>>;
  };
  readonly deductions: DeductionRules;
}

const amount = z.number().min(0);
const rate = z.number().min(0);
const fraction = z.number().min(0).max(1);
const upperBound = z.number().positive().nullable().default(null);

function toDependantMap(entries: Record<string, number>): DependantRates {
  return new Map(
    Object.entries(entries)
      .map(([count, value]): [number, number] => [Number(count), value])
      .sort(([a], [b]) => a - b)
  );
}

const dependantRatesSchema = z
  .record(z.string().regex(/^\d+$/, 'Dependant counts must be non-negative integers'), rate)
  .refine(entries => Object.keys(entries).length > 0, 'Rate tables require dependant mappings')
  .transform(toDependantMap);

const flatBracketSchema = z
  .object({ upper: upperBound, rate })
  .strict()
  .transform((bracket): FlatBracket => ({ kind: 'flat', upperBound: bracket.upper, rate: bracket.rate }));

const youthTableSchema = z.union([
  rate.transform((value): YouthRateTable => ({ dependants: new Map(), rate: value })),
  z
    .object({ dependants: dependantRatesSchema.optional(), rate: rate.optional() })
    .strict()
    .refine(
      table => table.dependants !== undefined || table.rate !== undefined,
      'Youth tables must define a base rate or dependant overrides'
    )
    .transform((table): YouthRateTable => ({
      dependants: table.dependants ?? new Map(),
      rate: table.rate ?? null
    }))
]);

const multiRateBracketSchema = z
  .object({
    upper: upperBound,
    rates: z
      .object({
        household: dependantRatesSchema,
        youth: z.record(z.enum(YOUTH_CATEGORIES), youthTableSchema).optional()
      })
      .strict()
  })
  .strict()
  .transform((bracket): MultiRateBracket => ({
    kind: 'multi',
    upperBound: bracket.upper,
    household: bracket.rates.household,
    youth: bracket.rates.youth ?? {}
  }));

const bracketSchema = z.union([flatBracketSchema, multiRateBracketSchema]);

export const bracketLadderSchema = z
  .array(bracketSchema)
  .min(1, 'At least one tax bracket must be defined')
  .superRefine((brackets, ctx) => {
    let lastUpper: number | null = null;
    brackets.forEach((bracket, index) => {
      const upper = bracket.upperBound;
      if (upper === null && index !== brackets.length - 1) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Only the final tax bracket may be open-ended' });
      }
      if (upper !== null && lastUpper !== null && upper <= lastUpper) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Tax brackets must be in ascending order' });
      }
      if (upper !== null) {
        lastUpper = upper;
      }
    });
    if (brackets.length > 0 && brackets[brackets.length - 1].upperBound !== null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Final tax bracket must have an open upper bound' });
    }
  });

const taxCreditSchema = z
  .object({
    amounts_by_children: z
      .record(z.string().regex(/^\d+$/, 'Child counts must be non-negative integers'), amount)
      .refine(entries => Object.keys(entries).length > 0, "'amounts_by_children' must not be empty"),
    incremental_amount_per_child: amount.default(0),
    income_reduction_exempt_from_dependants: z.number().int().min(0).nullable().default(null),
    credit_sources: z.array(z.enum(CREDIT_SOURCES)).default([...CREDIT_SOURCES])
  })
  .strict()
  .transform((credit): TaxCreditTable => ({
    amountsByChildren: toDependantMap(credit.amounts_by_children),
    incrementalAmountPerChild: credit.incremental_amount_per_child,
    incomeReductionExemptFromDependants: credit.income_reduction_exempt_from_dependants,
    creditSources: credit.credit_sources
  }));

const payrollSchema = z
  .object({
    allowed_payments_per_year: z.array(z.number().int().positive()).min(1),
    default_payments_per_year: z.number().int().positive().optional()
  })
  .strict()
  .transform((payroll, ctx): PayrollRules => {
    const allowed = [...new Set(payroll.allowed_payments_per_year)].sort((a, b) => a - b);
    const fallback = allowed[allowed.length - 1];
    const defaultPayments = payroll.default_payments_per_year ?? fallback;
    if (!allowed.includes(defaultPayments)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Default payroll frequency must be listed in the allowed set'
      });
    }
    return { allowedPaymentsPerYear: allowed, defaultPaymentsPerYear: defaultPayments };
  });

const contributionsSchema = z
  .object({
    employee_rate: rate.default(0),
    employer_rate: rate.default(0),
    monthly_salary_cap: amount.nullable().default(null)
  })
  .strict()
  .transform((rates): ContributionRates => ({
    employeeRate: rates.employee_rate,
    employerRate: rates.employer_rate,
    monthlySalaryCap: rates.monthly_salary_cap
  }));

const tradeFeeSchema = z
  .object({
    standard_amount: amount,
    reduced_amount: amount.nullable().default(null),
    newly_self_employed_reduction_years: z.number().int().positive().nullable().default(null),
    sunset: z
      .object({
        status_key: z.string(),
        year: z.number().int().positive().nullable().default(null)
      })
      .nullable()
      .default(null),
    fee_sunset: z.boolean().default(false)
  })
  .strict()
  .transform((fee): TradeFeeConfig => ({
    standardAmount: fee.standard_amount,
    reducedAmount: fee.reduced_amount,
    newlySelfEmployedReductionYears: fee.newly_self_employed_reduction_years,
    sunset: fee.sunset ? { statusKey: fee.sunset.status_key, year: fee.sunset.year } : null,
    feeSunset: fee.fee_sunset
  }));

const efkaCategorySchema = z
  .object({
    id: z.string().min(1),
    label_key: z.string().min(1),
    monthly_amount: amount,
    auxiliary_monthly_amount: amount.nullable().default(null),
    lump_sum_monthly_amount: amount.nullable().default(null)
  })
  .strict()
  .transform((category): EfkaCategory => ({
    id: category.id,
    labelKey: category.label_key,
    monthlyAmount: category.monthly_amount,
    auxiliaryMonthlyAmount: category.auxiliary_monthly_amount,
    lumpSumMonthlyAmount: category.lump_sum_monthly_amount
  }));

const deductionRulesSchema = z
  .object({
    donations: z
      .object({ credit_rate: fraction, income_cap_rate: fraction.nullable() })
      .strict()
      .default({ credit_rate: 0.2, income_cap_rate: 0.1 }),
    medical: z
      .object({ credit_rate: fraction, income_threshold_rate: fraction, max_credit: amount })
      .strict()
      .default({ credit_rate: 0.1, income_threshold_rate: 0.05, max_credit: 3000 }),
    education: z
      .object({ credit_rate: fraction, max_eligible_expense: amount })
      .strict()
      .default({ credit_rate: 0.1, max_eligible_expense: 1000 }),
    insurance: z
      .object({ credit_rate: fraction, max_eligible_expense: amount })
      .strict()
      .default({ credit_rate: 0.1, max_eligible_expense: 1200 })
  })
  .strict()
  .default({})
  .transform((rules): DeductionRules => ({
    donations: { creditRate: rules.donations.credit_rate, incomeCapRate: rules.donations.income_cap_rate },
    medical: {
      creditRate: rules.medical.credit_rate,
      incomeThresholdRate: rules.medical.income_threshold_rate,
      maxCredit: rules.medical.max_credit
    },
    education: {
      creditRate: rules.education.credit_rate,
      maxEligibleExpense: rules.education.max_eligible_expense
    },
    insurance: {
      creditRate: rules.insurance.credit_rate,
      maxEligibleExpense: rules.insurance.max_eligible_expense
    }
  }));

export const yearConfigurationSchema = z
  .object({
    year: z.number().int().positive(),
    meta: z
      .object({
        toggles: z.record(z.boolean()).default({}),
        birth_year_window: z
          .object({ min: z.number().int().positive(), max: z.number().int().positive() })
          .strict()
          .optional()
      })
      .passthrough()
      .default({}),
    income: z
      .object({
        employment: z
          .object({
            tax_brackets: bracketLadderSchema,
            tax_credit: taxCreditSchema,
            payroll: payrollSchema,
            contributions: contributionsSchema
          })
          .strict(),
        pension: z
          .object({
            tax_credit: taxCreditSchema.optional(),
            payroll: payrollSchema.optional()
          })
          .strict()
          .default({}),
        freelance: z
          .object({
            trade_fee: tradeFeeSchema,
            efka_categories: z.array(efkaCategorySchema).default([])
          })
          .strict(),
        rental: z.object({ tax_brackets: bracketLadderSchema }).strict(),
        investment: z
          .object({
            rates: z
              .record(rate)
              .refine(rates => Object.keys(rates).length > 0, 'Investment configuration requires at least one rate')
          })
          .strict()
      })
      .strict(),
    deductions: z.object({ rules: deductionRulesSchema }).strict().default({})
  })
  .strict()
  .transform((raw): YearConfiguration => ({
    year: raw.year,
    meta: {
      toggles: raw.meta.toggles,
      birthYearWindow: raw.meta.birth_year_window ?? { min: 1901, max: raw.year }
    },
    employment: {
      brackets: raw.income.employment.tax_brackets,
      taxCredit: raw.income.employment.tax_credit,
      payroll: raw.income.employment.payroll,
      contributions: raw.income.employment.contributions
    },
    // Pension inherits the salary credit table and payroll rules unless it overrides them
    pension: {
      taxCredit: raw.income.pension.tax_credit ?? raw.income.employment.tax_credit,
      payroll: raw.income.pension.payroll ?? raw.income.employment.payroll
    },
    freelance: {
      tradeFee: raw.income.freelance.trade_fee,
      efkaCategories: raw.income.freelance.efka_categories
    },
    rental: { brackets: raw.income.rental.tax_brackets },
    investment: { rates: raw.income.investment.rates },
    deductions: raw.deductions.rules
  }));

export type YearConfigurationInput = z.input<typeof yearConfigurationSchema>;
