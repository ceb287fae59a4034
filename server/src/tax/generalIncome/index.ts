/**
 * General income: every category that shares the progressive ladder
 *
 * build components -> progressive tax -> family credit -> deduction credits -> detail rows
 */

import type { CalculationDetail } from '../../../../shared/types/index.js';
import type { Translator } from '../../localization/translator.js';
import type { CalculationInput } from '../../models/calculationInput.js';
import { DetailTotals, type SettledComponent } from '../../models/incomeComponent.js';
import type { Decimal } from '../../utils/decimal.js';
import type { YearConfiguration } from '../config/yearConfig.js';
import { buildIncomeComponents } from './components.js';
import { applyFamilyCredit, taxComponents } from './credits.js';
import { applyDeductionCredits, type DeductionCredit } from './deductions.js';
import { detailFromComponent } from './details.js';

export interface GeneralIncomeResult {
  components: SettledComponent[];
  details: CalculationDetail[];
  totals: DetailTotals;
  deductions: DeductionCredit[];
  deductionsApplied: Decimal;
  creditRequested: Decimal;
  creditApplied: Decimal;
}

export function calculateGeneralIncome(
  input: CalculationInput,
  config: YearConfiguration,
  translate: Translator
): GeneralIncomeResult {
  const components = buildIncomeComponents(input, config);

  const taxed = taxComponents(components, input, config);
  const credited = applyFamilyCredit(taxed, input, config);
  const settled = applyDeductionCredits(credited.components, input, config.deductions);

  const totals = new DetailTotals();
  const details = settled.components.map(component => {
    const detail = detailFromComponent(component, translate);
    totals.add({
      income: detail.gross_income,
      tax: detail.total_tax,
      net: detail.net_income,
      taxable: detail.taxable_income
    });
    return detail;
  });

  return {
    components: settled.components,
    details,
    totals,
    deductions: settled.entries,
    deductionsApplied: settled.totalApplied,
    creditRequested: credited.creditRequested,
    creditApplied: credited.creditApplied
  };
}

export { buildIncomeComponents, calculateTradeFee } from './components.js';
export { applyFamilyCredit, taxComponents } from './credits.js';
export { applyDeductionCredits } from './deductions.js';
export type { DeductionCredit } from './deductions.js';
