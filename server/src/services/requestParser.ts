/**
 * Calculation request parsing
 *
 * Two steps, both completed before any tax is computed:
 * 1. parseCalculationRequest checks the payload shape (snake_case JSON)
 * 2. normaliseCalculationRequest applies the year's rules (payroll
 *    frequencies, EFKA categories, birth year window) and derives the
 *    amounts the calculators read
 *
 * Every problem found is reported together in one CalculationValidationError.
 */

import { z } from 'zod';
import { env } from '../config/env.js';
import { CalculationInput, type TradeFeeLocation } from '../models/calculationInput.js';
import { YOUTH_CATEGORIES, type YearConfiguration } from '../tax/config/yearConfig.js';
import { normaliseLocale } from '../localization/translator.js';
import { CalculationValidationError, type ValidationIssue } from '../utils/AppError.js';
import { decimal, nonNegative } from '../utils/decimal.js';
import type { Locale } from '../../../shared/types/index.js';

export const NET_INCOME_INPUT_ERROR =
  'Employment net income inputs are no longer supported; provide gross amounts instead';

const NEGATIVE_VALUE = 'value cannot be negative';
const MONTHS_PER_YEAR = 12;

function coerceNumericString(value: unknown) {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  if (trimmed.length === 0) return value;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : value;
}

const amountValue = z.preprocess(coerceNumericString, z.number().finite().min(0, NEGATIVE_VALUE));
const amount = amountValue.default(0);
const optionalAmount = amountValue.nullish();
const count = z.preprocess(coerceNumericString, z.number().int().min(0, NEGATIVE_VALUE));
const flag = z.boolean().nullish();
const youthCategory = z.enum(YOUTH_CATEGORIES).nullish();

const dependentsSchema = z
  .object({
    children: count
      .pipe(z.number().max(env.MAX_DEPENDANTS, `at most ${env.MAX_DEPENDANTS} dependants are supported`))
      .default(0)
  })
  .strict();

const demographicsSchema = z
  .object({
    birth_year: count.nullish(),
    taxpayer_birth_year: count.nullish(),
    age_band: youthCategory,
    youth_employment_override: youthCategory,
    small_village: flag,
    new_mother: flag
  })
  .strict()
  .refine(
    data => data.birth_year == null || data.taxpayer_birth_year == null || data.birth_year === data.taxpayer_birth_year,
    { message: 'birth_year and taxpayer_birth_year must match when both are provided' }
  );

const employmentSchema = z
  .object({
    gross_income: amount,
    monthly_income: optionalAmount,
    net_income: optionalAmount.refine(value => value == null || value <= 0, NET_INCOME_INPUT_ERROR),
    net_monthly_income: optionalAmount.refine(value => value == null || value <= 0, NET_INCOME_INPUT_ERROR),
    payments_per_year: count.nullish(),
    employee_contributions: amount,
    include_social_contributions: flag,
    include_employee_contributions: flag,
    include_manual_employee_contributions: flag,
    include_employer_contributions: flag
  })
  .strict();

const pensionSchema = z
  .object({
    gross_income: amount,
    monthly_income: optionalAmount,
    payments_per_year: count.nullish()
  })
  .strict();

const tradeFeeLocation = z.preprocess(
  value => (typeof value === 'string' ? value.trim().toLowerCase() || 'standard' : value ?? 'standard'),
  z.enum(['standard', 'reduced'], { errorMap: () => ({ message: 'Invalid trade fee location selection' }) })
);

const freelanceSchema = z
  .object({
    profit: optionalAmount,
    gross_revenue: amount,
    deductible_expenses: amount,
    efka_category: z.string().trim().min(1).nullish(),
    efka_months: count.pipe(z.number().max(MONTHS_PER_YEAR, 'must be between 0 and 12')).nullish(),
    mandatory_contributions: amount,
    auxiliary_contributions: amount,
    lump_sum_contributions: amount,
    include_trade_fee: flag,
    include_category_contributions: flag,
    include_mandatory_contributions: flag,
    include_auxiliary_contributions: flag,
    include_lump_sum_contributions: flag,
    trade_fee_location: tradeFeeLocation,
    years_active: count.nullish(),
    newly_self_employed: flag
  })
  .strict();

const rentalSchema = z.object({ gross_income: amount, deductible_expenses: amount }).strict();

const agriculturalSchema = z
  .object({ gross_revenue: amount, deductible_expenses: amount, professional_farmer: flag })
  .strict();

const otherSchema = z.object({ taxable_income: amount }).strict();

const obligationsSchema = z.object({ enfia: amount, luxury: amount }).strict();

const deductionsSchema = z
  .object({ donations: amount, medical: amount, education: amount, insurance: amount })
  .strict();

export const calculationRequestSchema = z
  .object({
    year: z.preprocess(coerceNumericString, z.number().int().positive()),
    locale: z.string().nullish(),
    dependents: dependentsSchema.nullish(),
    demographics: demographicsSchema.nullish(),
    employment: employmentSchema.nullish(),
    pension: pensionSchema.nullish(),
    freelance: freelanceSchema.nullish(),
    rental: rentalSchema.nullish(),
    agricultural: agriculturalSchema.nullish(),
    investment: z.record(amountValue).nullish(),
    other: otherSchema.nullish(),
    obligations: obligationsSchema.nullish(),
    deductions: deductionsSchema.nullish(),
    toggles: z.record(z.boolean()).nullish(),
    withholding_tax: amount
  })
  .strict();

export type CalculationRequest = z.infer<typeof calculationRequestSchema>;

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message
  }));
}

/**
 * Validate the shape of a calculation payload
 * @throws CalculationValidationError listing every problem found
 */
export function parseCalculationRequest(payload: unknown): CalculationRequest {
  const parsed = calculationRequestSchema.safeParse(payload);
  if (!parsed.success) {
    throw new CalculationValidationError(toIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Section of a request, with every field at its default when absent
 */
function section<T extends z.ZodTypeAny>(schema: T, value: z.infer<T> | null | undefined): z.infer<T> {
  return value ?? schema.parse({});
}

function checkPayments(
  field: string,
  payments: number | null | undefined,
  allowed: readonly number[],
  issues: ValidationIssue[]
): number | null {
  if (payments == null || payments === 0) {
    return null;
  }
  if (!allowed.includes(payments)) {
    issues.push({ field, message: `must be one of ${allowed.join(', ')}` });
  }
  return payments;
}

interface ContributionFlags {
  social: boolean;
  employee: boolean;
  manual: boolean;
  employer: boolean;
}

/**
 * An explicit social contributions switch sets every unspecified part;
 * without it, contributions count as included while any part is included
 */
function resolveContributionFlags(employment: z.infer<typeof employmentSchema>): ContributionFlags {
  const social = employment.include_social_contributions;
  if (social != null) {
    return {
      social,
      employee: employment.include_employee_contributions ?? social,
      manual: employment.include_manual_employee_contributions ?? social,
      employer: employment.include_employer_contributions ?? social
    };
  }

  const employee = employment.include_employee_contributions ?? true;
  const manual = employment.include_manual_employee_contributions ?? true;
  const employer = employment.include_employer_contributions ?? true;
  return { social: employee || manual || employer, employee, manual, employer };
}

function annualIncome(gross: number, monthly: number | null | undefined, payments: number): number {
  if (gross > 0) {
    return gross;
  }
  if (monthly != null && monthly > 0) {
    return decimal(monthly).times(payments).toNumber();
  }
  return 0;
}

/**
 * Apply a year's rules to a parsed request and build the calculation input
 * @throws CalculationValidationError when the request breaks a year rule
 */
export function normaliseCalculationRequest(
  request: CalculationRequest,
  config: YearConfiguration,
  defaultLocale: Locale = env.DEFAULT_LOCALE
): CalculationInput {
  const issues: ValidationIssue[] = [];

  const employment = section(employmentSchema, request.employment);
  const pension = section(pensionSchema, request.pension);
  const freelance = section(freelanceSchema, request.freelance);
  const demographics = section(demographicsSchema, request.demographics);

  // Payroll frequencies
  const employmentPayments = checkPayments(
    'employment.payments_per_year',
    employment.payments_per_year,
    config.employment.payroll.allowedPaymentsPerYear,
    issues
  );
  const pensionPayments = checkPayments(
    'pension.payments_per_year',
    pension.payments_per_year,
    config.pension.payroll.allowedPaymentsPerYear,
    issues
  );

  // Birth year window
  const birthYear = demographics.birth_year ?? demographics.taxpayer_birth_year ?? null;
  const window = config.meta.birthYearWindow;
  if (birthYear !== null && (birthYear < window.min || birthYear > window.max)) {
    issues.push({
      field: 'demographics.birth_year',
      message: `must be between ${window.min} and ${window.max}`
    });
  }

  // EFKA category contributions
  const months = freelance.efka_months ?? MONTHS_PER_YEAR;
  let categoryContribution = 0;
  let auxiliaryContributions = freelance.auxiliary_contributions;
  let lumpSumContributions = freelance.lump_sum_contributions;
  const categoryId = freelance.efka_category ?? null;
  if (categoryId !== null) {
    const category = config.freelance.efkaCategories.find(entry => entry.id === categoryId);
    if (!category) {
      issues.push({ field: 'freelance.efka_category', message: `Unknown EFKA category '${categoryId}'` });
    } else {
      categoryContribution = decimal(category.monthlyAmount).times(months).toNumber();
      if (auxiliaryContributions <= 0 && category.auxiliaryMonthlyAmount !== null) {
        auxiliaryContributions = decimal(category.auxiliaryMonthlyAmount).times(months).toNumber();
      }
      if (lumpSumContributions <= 0 && category.lumpSumMonthlyAmount !== null) {
        lumpSumContributions = decimal(category.lumpSumMonthlyAmount).times(months).toNumber();
      }
    }
  }

  if (issues.length > 0) {
    throw new CalculationValidationError(issues);
  }

  const flags = resolveContributionFlags(employment);
  const profit =
    freelance.profit ?? nonNegative(decimal(freelance.gross_revenue).minus(freelance.deductible_expenses)).toNumber();
  const tradeFeeLocation: TradeFeeLocation = freelance.trade_fee_location;

  const rental = section(rentalSchema, request.rental);
  const agricultural = section(agriculturalSchema, request.agricultural);
  const obligations = section(obligationsSchema, request.obligations);
  const deductions = section(deductionsSchema, request.deductions);

  return new CalculationInput({
    year: request.year,
    locale: normaliseLocale(request.locale, defaultLocale),
    children: request.dependents?.children ?? 0,
    employment: {
      income: annualIncome(
        employment.gross_income,
        employment.monthly_income,
        employmentPayments ?? config.employment.payroll.defaultPaymentsPerYear
      ),
      declaredGrossIncome: employment.gross_income,
      monthlyIncome: employment.monthly_income ?? null,
      paymentsPerYear: employmentPayments,
      manualContributions: employment.employee_contributions,
      includeSocialContributions: flags.social,
      includeEmployeeContributions: flags.employee,
      includeManualContributions: flags.manual,
      includeEmployerContributions: flags.employer
    },
    pension: {
      income: annualIncome(
        pension.gross_income,
        pension.monthly_income,
        pensionPayments ?? config.pension.payroll.defaultPaymentsPerYear
      ),
      declaredGrossIncome: pension.gross_income,
      monthlyIncome: pension.monthly_income ?? null,
      paymentsPerYear: pensionPayments
    },
    freelance: {
      profit,
      grossRevenue: freelance.gross_revenue,
      deductibleExpenses: freelance.deductible_expenses,
      efkaCategoryId: categoryId,
      efkaMonths: categoryId !== null ? months : null,
      categoryContribution,
      mandatoryContributions: freelance.mandatory_contributions,
      auxiliaryContributions,
      lumpSumContributions,
      includeCategoryContributions: freelance.include_category_contributions ?? true,
      includeMandatoryContributions: freelance.include_mandatory_contributions ?? true,
      includeAuxiliaryContributions: freelance.include_auxiliary_contributions ?? true,
      includeLumpSumContributions: freelance.include_lump_sum_contributions ?? true,
      includeTradeFee: freelance.include_trade_fee ?? true,
      tradeFeeLocation,
      yearsActive: freelance.years_active ?? null,
      newlySelfEmployed: freelance.newly_self_employed ?? false
    },
    rental: {
      grossIncome: rental.gross_income,
      deductibleExpenses: rental.deductible_expenses
    },
    agricultural: {
      grossRevenue: agricultural.gross_revenue,
      deductibleExpenses: agricultural.deductible_expenses,
      professionalFarmer: agricultural.professional_farmer ?? false
    },
    otherTaxableIncome: request.other?.taxable_income ?? 0,
    investment: request.investment ?? {},
    obligations: { enfia: obligations.enfia, luxury: obligations.luxury },
    deductions: {
      donations: deductions.donations,
      medical: deductions.medical,
      education: deductions.education,
      insurance: deductions.insurance
    },
    withholdingTax: request.withholding_tax,
    toggles: { ...config.meta.toggles, ...(request.toggles ?? {}) },
    demographics: {
      birthYear,
      ageBand: demographics.age_band ?? null,
      youthOverride: demographics.youth_employment_override ?? null,
      smallVillage: demographics.small_village ?? false,
      newMother: demographics.new_mother ?? false
    }
  });
}
