/**
 * Credit Apportionment Engine
 *
 * Taxes the general income components on the shared ladder and applies the
 * family tax credit. The credit is the single highest candidate among the
 * credit sources present (never a sum), reduced by the income phase-out and
 * split by share of pre-credit tax across the components it is granted to.
 */

import type { CalculationInput } from '../../models/calculationInput.js';
import type { CreditedComponent, IncomeComponent, TaxedComponent } from '../../models/incomeComponent.js';
import { Decimal, ZERO, decimal, min, nonNegative, sumOf } from '../../utils/decimal.js';
import { CREDIT_SOURCES, type CreditSource, type YearConfiguration } from '../config/yearConfig.js';
import { allocateProgressiveTax, apportion } from '../progressive.js';
import { creditForChildren, resolveRate } from '../rates.js';

// The credit shrinks by €20 per €1,000 (pro rata) of salary income above €12,000
const PHASE_OUT_THRESHOLD = 12000;
const PHASE_OUT_STEP = 1000;
const PHASE_OUT_AMOUNT = 20;

export interface FamilyCreditResult {
  components: CreditedComponent[];
  creditRequested: Decimal;
  creditApplied: Decimal;
}

/**
 * Progressive tax for every component on the employment ladder.
 * Youth rates only ever apply to the employment stream.
 */
export function taxComponents(
  components: readonly IncomeComponent[],
  input: CalculationInput,
  config: YearConfiguration
): TaxedComponent[] {
  const dependants = Math.max(input.children, 0);
  const youthCategory = input.youthRateCategory;

  const taxes = allocateProgressiveTax(
    components.map(component => component.taxableIncome),
    config.employment.brackets,
    (index, bracket) =>
      resolveRate(bracket, dependants, components[index].category === 'employment' ? youthCategory : undefined)
  );

  return components.map((component, index) => Object.freeze({ ...component, taxBeforeCredit: taxes[index] }));
}

/**
 * Income the phase-out is measured against: declared salary and pension
 * gross where given, otherwise the gross of those components
 */
export function creditReductionBase(
  components: readonly IncomeComponent[],
  input: CalculationInput,
  sources: readonly CreditSource[]
): Decimal {
  const salarySources = sources.filter(
    (source): source is 'employment' | 'pension' => source === 'employment' || source === 'pension'
  );

  const declared = sumOf(
    salarySources.map(source => Math.max(input[source].declaredGrossIncome, 0))
  );
  if (declared.gt(0)) {
    return declared;
  }

  return sumOf(
    components
      .filter(component => component.creditEligible && salarySources.some(source => source === component.category))
      .map(component => component.grossIncome)
  );
}

export function creditReduction(base: Decimal): Decimal {
  if (base.lte(PHASE_OUT_THRESHOLD)) {
    return ZERO;
  }
  return base.minus(PHASE_OUT_THRESHOLD).dividedBy(PHASE_OUT_STEP).times(PHASE_OUT_AMOUNT);
}

function qualifies(components: readonly IncomeComponent[], source: CreditSource): boolean {
  return components.some(component => component.category === source && component.creditEligible);
}

/**
 * Credit candidates, one per credit source with a qualifying component
 */
export function familyCreditCandidates(
  components: readonly IncomeComponent[],
  input: CalculationInput,
  config: YearConfiguration
): Decimal[] {
  const candidates: Decimal[] = [];
  for (const source of config.employment.taxCredit.creditSources) {
    if (!qualifies(components, source)) {
      continue;
    }
    const table = source === 'pension' ? config.pension.taxCredit : config.employment.taxCredit;
    candidates.push(decimal(creditForChildren(table, input.children)));
  }
  return candidates;
}

/**
 * Whether a component shares in the family credit. A year that lists every
 * source grants it to all credit-eligible components; otherwise only to the
 * categories that produced a candidate.
 */
export function sharesFamilyCredit(
  component: IncomeComponent,
  components: readonly IncomeComponent[],
  sources: readonly CreditSource[]
): boolean {
  if (!component.creditEligible) {
    return false;
  }
  if (CREDIT_SOURCES.every(source => sources.includes(source))) {
    return true;
  }
  return sources.some(source => source === component.category && qualifies(components, source));
}

export function applyFamilyCredit(
  taxed: readonly TaxedComponent[],
  input: CalculationInput,
  config: YearConfiguration
): FamilyCreditResult {
  const taxCredit = config.employment.taxCredit;
  const exemptFrom = taxCredit.incomeReductionExemptFromDependants;
  const exempt = exemptFrom !== null && input.children >= exemptFrom;

  const reduction = exempt ? ZERO : creditReduction(creditReductionBase(taxed, input, taxCredit.creditSources));
  const candidates = familyCreditCandidates(taxed, input, config).map(candidate =>
    nonNegative(candidate.minus(reduction))
  );

  const creditRequested = candidates.length > 0 ? Decimal.max(...candidates) : ZERO;
  const creditApplied = min(creditRequested, sumOf(taxed.map(component => component.taxBeforeCredit)));

  const eligibleTax = taxed.map(component =>
    sharesFamilyCredit(component, taxed, taxCredit.creditSources) ? component.taxBeforeCredit : ZERO
  );
  const shares = apportion(creditApplied, eligibleTax);

  const components = taxed.map((component, index) =>
    Object.freeze({
      ...component,
      credit: shares[index],
      taxAfterCredit: nonNegative(component.taxBeforeCredit.minus(shares[index]))
    })
  );

  return { components, creditRequested, creditApplied };
}
