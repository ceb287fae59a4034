/**
 * Tax Calculation Service
 *
 * Entry point for one calculation: validates the payload, loads the year's
 * rules, runs the general income pipeline and the standalone calculators,
 * and aggregates the rows into the summary.
 */

import type {
  CalculationDetail,
  CalculationMeta,
  CalculationResponse,
  CalculationSummary,
  DeductionBreakdownEntry,
  Locale,
  SummaryLabels
} from '../../../shared/types/index.js';
import { env } from '../config/env.js';
import { getTranslator, type Translator } from '../localization/translator.js';
import type { CalculationInput } from '../models/calculationInput.js';
import { DetailTotals } from '../models/incomeComponent.js';
import { getYearConfigStore, type YearConfigProvider } from '../tax/config/yearConfigStore.js';
import { calculateGeneralIncome, type DeductionCredit } from '../tax/generalIncome/index.js';
import { calculateInvestment } from '../tax/investment.js';
import { calculateEnfia, calculateLuxury } from '../tax/obligations.js';
import { calculateRental } from '../tax/rental.js';
import { Decimal, decimal, toCurrency, toRate } from '../utils/decimal.js';
import { createModuleLogger } from './logger.js';
import { normaliseCalculationRequest, parseCalculationRequest } from './requestParser.js';

const log = createModuleLogger('calculation');

const MONTHS_PER_YEAR = 12;

export interface CalculationOptions {
  /** Year configuration source; the process-wide store when omitted */
  store?: YearConfigProvider;
  /** Locale used when the payload names none */
  defaultLocale?: Locale;
}

function summaryLabels(translate: Translator, withholding: boolean): SummaryLabels {
  const labels: SummaryLabels = {
    income_total: translate('summary.income_total'),
    taxable_income: translate('summary.taxable_income'),
    tax_total: translate('summary.tax_total'),
    net_income: translate('summary.net_income'),
    net_monthly_income: translate('summary.net_monthly_income'),
    average_monthly_tax: translate('summary.average_monthly_tax'),
    effective_tax_rate: translate('summary.effective_tax_rate'),
    deductions_entered: translate('summary.deductions_entered'),
    deductions_applied: translate('summary.deductions_applied')
  };
  if (withholding) {
    labels.withholding_tax = translate('summary.withholding_tax');
    labels.balance_due = translate('summary.balance_due');
  }
  return labels;
}

function breakdownEntry(entry: DeductionCredit, translate: Translator): DeductionBreakdownEntry {
  return {
    type: entry.type,
    label: translate(entry.labelKey),
    entered: toCurrency(entry.entered),
    eligible: toCurrency(entry.eligible),
    credit_rate: toRate(entry.creditRate),
    credit_requested: toCurrency(entry.creditRequested),
    credit_applied: toCurrency(entry.creditApplied),
    notes: entry.notes
  };
}

function buildSummary(
  input: CalculationInput,
  totals: DetailTotals,
  deductionsApplied: Decimal,
  deductions: DeductionCredit[],
  translate: Translator
): CalculationSummary {
  const hasWithholding = input.withholdingTax > 0;
  const effectiveRate = totals.income.gt(0) ? totals.tax.dividedBy(totals.income) : decimal(0);

  const summary: CalculationSummary = {
    income_total: toCurrency(totals.income),
    taxable_income: toCurrency(totals.taxable),
    tax_total: toCurrency(totals.tax),
    net_income: toCurrency(totals.net),
    net_monthly_income: toCurrency(totals.net.dividedBy(MONTHS_PER_YEAR)),
    average_monthly_tax: toCurrency(totals.tax.dividedBy(MONTHS_PER_YEAR)),
    effective_tax_rate: toRate(effectiveRate),
    deductions_entered: toCurrency(input.totalDeductions),
    deductions_applied: toCurrency(deductionsApplied),
    labels: summaryLabels(translate, hasWithholding)
  };

  if (hasWithholding) {
    const balance = totals.tax.minus(input.withholdingTax);
    summary.withholding_tax = toCurrency(input.withholdingTax);
    summary.balance_due = toCurrency(balance.abs());
    summary.balance_due_is_refund = balance.lt(0);
  }

  if (deductions.length > 0) {
    summary.deductions_breakdown = deductions.map(entry => breakdownEntry(entry, translate));
  }

  return summary;
}

function buildMeta(input: CalculationInput, locale: Locale): CalculationMeta {
  const meta: CalculationMeta = { year: input.year, locale };

  const youthCategory = input.youthRateCategory;
  if (youthCategory) {
    meta.youth_relief_category = youthCategory;
  }
  const adjustments = input.presumptiveAdjustments;
  if (adjustments.length > 0) {
    meta.presumptive_adjustments = adjustments;
  }

  return meta;
}

/**
 * Calculate the tax position for a request payload
 * @throws CalculationValidationError when the payload is invalid
 * @throws ConfigurationNotFoundError when the year has no configuration
 */
export function calculateTax(payload: unknown, options: CalculationOptions = {}): CalculationResponse {
  const request = parseCalculationRequest(payload);
  const store = options.store ?? getYearConfigStore();
  const config = store.load(request.year);

  const input = normaliseCalculationRequest(request, config, options.defaultLocale ?? env.DEFAULT_LOCALE);
  const translate = getTranslator(input.locale);

  const general = calculateGeneralIncome(input, config, translate);
  const details: CalculationDetail[] = [...general.details];
  const totals = new DetailTotals();
  totals.merge(general.totals);

  const standalone = [
    calculateRental(input, config.rental, translate),
    calculateInvestment(input, config.investment, translate),
    calculateEnfia(input, translate),
    calculateLuxury(input, translate)
  ];
  for (const detail of standalone) {
    if (!detail) {
      continue;
    }
    details.push(detail);
    totals.add({
      income: detail.gross_income,
      tax: detail.total_tax,
      net: detail.net_income,
      taxable: detail.taxable_income
    });
  }

  const summary = buildSummary(input, totals, general.deductionsApplied, general.deductions, translate);

  log.debug(`Calculated ${input.year} tax over ${details.length} detail rows`, {
    locale: translate.locale,
    taxTotal: summary.tax_total
  });

  return {
    summary,
    details,
    meta: buildMeta(input, translate.locale)
  };
}
