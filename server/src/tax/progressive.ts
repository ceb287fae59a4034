/**
 * Progressive Tax Allocator
 *
 * Walks a bracket ladder for one amount, or for several income streams that
 * share one ladder. All arithmetic stays in Decimal at full precision; callers
 * round when they build output.
 */

import { Decimal, ZERO, decimal, nonNegative, sumOf, type Numeric } from '../utils/decimal.js';
import type { ProgressiveBracket } from './config/yearConfig.js';
import { resolveRate } from './rates.js';

/**
 * Rate to apply for the stream at `index` within `bracket`
 */
export type StreamRateResolver = (index: number, bracket: ProgressiveBracket) => Numeric;

/**
 * Split `total` across `weights` in proportion to each weight.
 * Negative weights count as zero; if nothing carries weight every share is zero.
 */
export function apportion(total: Numeric, weights: readonly Numeric[]): Decimal[] {
  const normalized = weights.map(weight => nonNegative(weight));
  const weightTotal = sumOf(normalized);
  if (weightTotal.lte(0)) {
    return normalized.map(() => ZERO);
  }

  const amount = decimal(total);
  return normalized.map(weight => amount.times(weight).dividedBy(weightTotal));
}

/**
 * Tax several streams on one ladder.
 *
 * The combined amount walks the ladder once; the slice of it that falls into
 * each bracket is apportioned to the streams by their share of the combined
 * amount and taxed at the rate the resolver gives that stream.
 */
export function allocateProgressiveTax(
  amounts: readonly Numeric[],
  brackets: readonly ProgressiveBracket[],
  rateFor: StreamRateResolver
): Decimal[] {
  const streams = amounts.map(amount => nonNegative(amount));
  const taxes = streams.map(() => ZERO);

  const total = sumOf(streams);
  if (total.lte(0)) {
    return taxes;
  }

  let lowerBound = ZERO;
  for (const bracket of brackets) {
    const upper = bracket.upperBound === null ? total : Decimal.min(bracket.upperBound, total);
    const slice = upper.minus(lowerBound);

    if (slice.gt(0)) {
      const shares = apportion(slice, streams);
      shares.forEach((share, index) => {
        if (share.gt(0)) {
          taxes[index] = taxes[index].plus(share.times(rateFor(index, bracket)));
        }
      });
    }

    if (bracket.upperBound === null || total.lte(bracket.upperBound)) {
      break;
    }
    lowerBound = Decimal.max(lowerBound, bracket.upperBound);
  }

  return taxes;
}

/**
 * Tax a single amount on a ladder, using household rates for no dependants
 */
export function calculateProgressiveTax(
  amount: Numeric,
  brackets: readonly ProgressiveBracket[]
): Decimal {
  const [tax] = allocateProgressiveTax([amount], brackets, (_index, bracket) => resolveRate(bracket, 0));
  return tax;
}
