/**
 * Deduction Credit Engine
 *
 * Itemised expenses (donations, medical, education, insurance) earn tax
 * credits. Each type has its own eligibility rule; together they can never
 * exceed the tax left after the family credit, and what is granted is taken
 * off the credit-eligible components in proportion to that remaining tax.
 */

import type { DeductionType } from '../../../../shared/types/index.js';
import type { CalculationInput } from '../../models/calculationInput.js';
import type { CreditedComponent, SettledComponent } from '../../models/incomeComponent.js';
import {
  Decimal,
  ZERO,
  decimal,
  formatEuro,
  formatPercentage,
  min,
  nonNegative,
  sumOf
} from '../../utils/decimal.js';
import type { DeductionRules } from '../config/yearConfig.js';
import { apportion } from '../progressive.js';

const LIMITED_BY_TAX_NOTE = 'Credits were limited by the remaining tax liability.';

export interface DeductionCredit {
  type: DeductionType;
  labelKey: string;
  entered: Decimal;
  eligible: Decimal;
  creditRate: number;
  creditRequested: Decimal;
  creditApplied: Decimal;
  notes: string | null;
}

export interface DeductionCreditResult {
  components: SettledComponent[];
  entries: DeductionCredit[];
  totalApplied: Decimal;
}

interface EntryDraft {
  eligible: Decimal;
  creditRate: number;
  creditRequested: Decimal;
  notes: string[];
}

function donationsDraft(entered: Decimal, income: Decimal, rules: DeductionRules['donations']): EntryDraft {
  const notes: string[] = [];
  let eligible = ZERO;

  if (income.gt(0)) {
    eligible = entered;
    if (rules.incomeCapRate !== null) {
      const cap = income.times(rules.incomeCapRate);
      if (entered.gt(cap)) {
        eligible = cap;
        notes.push(
          `Only donations up to ${formatPercentage(rules.incomeCapRate)} of eligible income ` +
            `qualify for the ${formatPercentage(rules.creditRate)} credit.`
        );
      }
    }
  } else {
    notes.push('Donations cannot generate a credit without taxable income.');
  }

  return { eligible, creditRate: rules.creditRate, creditRequested: eligible.times(rules.creditRate), notes };
}

function medicalDraft(entered: Decimal, income: Decimal, rules: DeductionRules['medical']): EntryDraft {
  const notes: string[] = [];
  const thresholdLabel = formatPercentage(rules.incomeThresholdRate);
  let eligible = ZERO;

  if (income.gt(0)) {
    const threshold = income.times(rules.incomeThresholdRate);
    eligible = nonNegative(entered.minus(threshold));
    if (entered.lte(threshold)) {
      notes.push(`Medical expenses must exceed ${thresholdLabel} of income before a credit is granted.`);
    }
  } else {
    notes.push(`Medical credits require taxable income to satisfy the ${thresholdLabel} threshold.`);
  }

  let creditRequested = eligible.times(rules.creditRate);
  if (creditRequested.gt(rules.maxCredit)) {
    creditRequested = decimal(rules.maxCredit);
    notes.push(`Medical expense credits are capped at ${formatEuro(rules.maxCredit)} per taxpayer.`);
  }

  return { eligible, creditRate: rules.creditRate, creditRequested, notes };
}

function cappedExpenseDraft(
  entered: Decimal,
  rules: DeductionRules['education'] | DeductionRules['insurance'],
  capNote: string
): EntryDraft {
  const eligible = min(entered, rules.maxEligibleExpense);
  const notes = entered.gt(rules.maxEligibleExpense) ? [capNote] : [];
  return { eligible, creditRate: rules.creditRate, creditRequested: eligible.times(rules.creditRate), notes };
}

export function applyDeductionCredits(
  components: readonly CreditedComponent[],
  input: CalculationInput,
  rules: DeductionRules
): DeductionCreditResult {
  const eligibleTax = components.map(component => (component.creditEligible ? component.taxAfterCredit : ZERO));
  const availableTax = sumOf(eligibleTax);
  const incomeForThresholds = sumOf(
    components.filter(component => component.creditEligible).map(component => component.grossIncome)
  );

  const drafts: Array<{ type: DeductionType; entered: Decimal; draft: EntryDraft }> = [];
  const { donations, medical, education, insurance } = input.deductions;

  if (donations > 0) {
    const entered = decimal(donations);
    drafts.push({ type: 'donations', entered, draft: donationsDraft(entered, incomeForThresholds, rules.donations) });
  }
  if (medical > 0) {
    const entered = decimal(medical);
    drafts.push({ type: 'medical', entered, draft: medicalDraft(entered, incomeForThresholds, rules.medical) });
  }
  if (education > 0) {
    const entered = decimal(education);
    const note =
      `Education expenses eligible for credits are capped at ${formatEuro(rules.education.maxEligibleExpense)}; ` +
      'excess is ignored.';
    drafts.push({ type: 'education', entered, draft: cappedExpenseDraft(entered, rules.education, note) });
  }
  if (insurance > 0) {
    const entered = decimal(insurance);
    const note =
      'Life and health insurance premiums eligible for credits are capped at ' +
      `${formatEuro(rules.insurance.maxEligibleExpense)}.`;
    drafts.push({ type: 'insurance', entered, draft: cappedExpenseDraft(entered, rules.insurance, note) });
  }

  const totalRequested = sumOf(drafts.map(({ draft }) => draft.creditRequested));
  const limited = totalRequested.gt(availableTax);
  const scale = limited ? availableTax.dividedBy(totalRequested) : decimal(1);

  const entries = drafts.map(({ type, entered, draft }): DeductionCredit => {
    const notes = limited ? [...draft.notes, LIMITED_BY_TAX_NOTE] : draft.notes;
    return {
      type,
      labelKey: `forms.deductions.${type}`,
      entered,
      eligible: draft.eligible,
      creditRate: draft.creditRate,
      creditRequested: draft.creditRequested,
      creditApplied: totalRequested.gt(0) ? draft.creditRequested.times(scale) : ZERO,
      notes: notes.length > 0 ? notes.join(' ') : null
    };
  });

  const totalApplied = sumOf(entries.map(entry => entry.creditApplied));
  const shares = apportion(totalApplied, eligibleTax);

  const settled = components.map((component, index) =>
    Object.freeze({
      ...component,
      deductionsApplied: shares[index],
      taxAfterCredit: nonNegative(component.taxAfterCredit.minus(shares[index]))
    })
  );

  return { components: settled, entries, totalApplied };
}
