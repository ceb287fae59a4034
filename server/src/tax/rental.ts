/**
 * Rental income calculator
 *
 * Rental income has its own ladder and takes no part in the family or
 * deduction credits.
 */

import type { CalculationDetail } from '../../../shared/types/index.js';
import type { Translator } from '../localization/translator.js';
import type { CalculationInput } from '../models/calculationInput.js';
import { decimal, toCurrency } from '../utils/decimal.js';
import type { YearConfiguration } from './config/yearConfig.js';
import { calculateProgressiveTax } from './progressive.js';

export function calculateRental(
  input: CalculationInput,
  config: YearConfiguration['rental'],
  translate: Translator
): CalculationDetail | null {
  if (!input.hasRentalIncome) {
    return null;
  }

  const gross = decimal(input.rental.grossIncome);
  const expenses = decimal(input.rental.deductibleExpenses);
  const taxable = input.rentalTaxableIncome;
  const tax = calculateProgressiveTax(taxable, config.brackets);

  return {
    category: 'rental',
    label: translate('details.rental'),
    gross_income: toCurrency(gross),
    deductible_expenses: toCurrency(expenses),
    taxable_income: toCurrency(taxable),
    tax: toCurrency(tax),
    total_tax: toCurrency(tax),
    net_income: toCurrency(gross.minus(expenses).minus(tax))
  };
}
