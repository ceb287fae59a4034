/**
 * ENFIA and luxury living tax
 *
 * Both are assessed amounts passed straight through: the tax is the declared
 * amount and it reduces net income by the same figure.
 */

import type { CalculationDetail } from '../../../shared/types/index.js';
import type { Translator } from '../localization/translator.js';
import type { CalculationInput } from '../models/calculationInput.js';
import { decimal, toCurrency } from '../utils/decimal.js';

function obligationDetail(
  category: 'enfia' | 'luxury',
  amount: number,
  translate: Translator
): CalculationDetail {
  const due = toCurrency(amount);
  return {
    category,
    label: translate(`details.${category}`),
    tax: due,
    total_tax: due,
    net_income: toCurrency(decimal(amount).negated())
  };
}

export function calculateEnfia(input: CalculationInput, translate: Translator): CalculationDetail | null {
  return input.hasEnfiaObligation ? obligationDetail('enfia', input.obligations.enfia, translate) : null;
}

export function calculateLuxury(input: CalculationInput, translate: Translator): CalculationDetail | null {
  return input.hasLuxuryObligation ? obligationDetail('luxury', input.obligations.luxury, translate) : null;
}
