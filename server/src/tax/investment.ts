/**
 * Investment income calculator
 *
 * Each category is taxed at its own flat rate; the result is one aggregated
 * row carrying a per-category breakdown.
 */

import type { CalculationDetail, InvestmentItem } from '../../../shared/types/index.js';
import type { Translator } from '../localization/translator.js';
import type { CalculationInput } from '../models/calculationInput.js';
import { ZERO, decimal, toCurrency } from '../utils/decimal.js';
import type { YearConfiguration } from './config/yearConfig.js';

export function calculateInvestment(
  input: CalculationInput,
  config: YearConfiguration['investment'],
  translate: Translator
): CalculationDetail | null {
  if (!input.hasInvestmentIncome) {
    return null;
  }

  const items: InvestmentItem[] = [];
  let grossTotal = ZERO;
  let taxTotal = ZERO;

  for (const [category, rate] of Object.entries(config.rates)) {
    const amount = decimal(input.investment[category] ?? 0);
    if (amount.lte(0)) {
      continue;
    }

    const tax = amount.times(rate);
    grossTotal = grossTotal.plus(amount);
    taxTotal = taxTotal.plus(tax);
    items.push({
      type: category,
      label: translate(`details.investment.${category}`),
      amount: toCurrency(amount),
      rate,
      tax: toCurrency(tax)
    });
  }

  // Only amounts for unconfigured categories were declared
  if (grossTotal.lte(0)) {
    return null;
  }

  return {
    category: 'investment',
    label: translate('details.investment'),
    gross_income: toCurrency(grossTotal),
    taxable_income: toCurrency(grossTotal),
    tax: toCurrency(taxTotal),
    total_tax: toCurrency(taxTotal),
    net_income: toCurrency(grossTotal.minus(taxTotal)),
    items
  };
}
