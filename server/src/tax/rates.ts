/**
 * Rate resolution for progressive brackets and family tax credit tables
 */

import type {
  DependantRates,
  ProgressiveBracket,
  TaxCreditTable,
  YouthCategory
} from './config/yearConfig.js';

/**
 * Look up a dependant-keyed rate: exact count, else the next higher defined
 * count, else the highest defined count
 */
export function rateForDependants(table: DependantRates, dependants: number): number | undefined {
  const exact = table.get(dependants);
  if (exact !== undefined) {
    return exact;
  }

  let highest: number | undefined;
  for (const [count, rate] of table) {
    if (dependants < count) {
      return rate;
    }
    highest = rate;
  }
  return highest;
}

/**
 * Marginal rate of a bracket for a household profile
 */
export function resolveRate(
  bracket: ProgressiveBracket,
  dependants: number,
  youthCategory?: YouthCategory
): number {
  if (bracket.kind === 'flat') {
    return bracket.rate;
  }

  const count = Math.max(dependants, 0);
  const householdRate = rateForDependants(bracket.household, count) ?? 0;

  const youth = youthCategory ? bracket.youth[youthCategory] : undefined;
  if (!youth) {
    return householdRate;
  }
  if (youth.dependants.size > 0) {
    return rateForDependants(youth.dependants, count) ?? householdRate;
  }
  return youth.rate ?? householdRate;
}

/**
 * Family tax credit for a number of dependent children
 * Counts above the highest listed one add the incremental amount per extra child.
 */
export function creditForChildren(table: TaxCreditTable, children: number): number {
  if (children < 0) {
    return 0;
  }

  const exact = table.amountsByChildren.get(children);
  if (exact !== undefined) {
    return exact;
  }

  const counts = [...table.amountsByChildren.keys()];
  if (counts.length === 0) {
    return 0;
  }

  const highestCount = Math.max(...counts);
  const baseAmount = table.amountsByChildren.get(highestCount) ?? 0;
  if (children <= highestCount) {
    return baseAmount;
  }
  return baseAmount + (children - highestCount) * table.incrementalAmountPerChild;
}
