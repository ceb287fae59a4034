/**
 * Decimal.js utility functions for tax calculations
 *
 * Intermediate amounts keep full precision; values are only rounded when they
 * leave the engine (2 places for money, 4 for rates), so that apportioned
 * shares still add up to the amount they were split from.
 */

import Decimal from 'decimal.js';

// Precision: 28 significant digits, half-up rounding on output
Decimal.set({
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -9e15,
  toExpPos: 9e15
});

export type Numeric = number | string | Decimal;

export const ZERO = new Decimal(0);

/**
 * Create a Decimal from a number, string, or existing Decimal (no rounding)
 */
export function decimal(value: Numeric): Decimal {
  return new Decimal(value);
}

/**
 * Sum any number of values
 * Example: sum(10.5, 20.3, 5.1) = 35.9
 */
export function sum(...values: Numeric[]): Decimal {
  return values.reduce<Decimal>((total, val) => total.plus(val), ZERO);
}

/**
 * Sum a list of values
 */
export function sumOf(values: readonly Numeric[]): Decimal {
  return sum(...values);
}

/**
 * Find the minimum of multiple values
 */
export function min(...values: Numeric[]): Decimal {
  return Decimal.min(...values.map(v => new Decimal(v)));
}

/**
 * Find the maximum of multiple values
 */
export function max(...values: Numeric[]): Decimal {
  return Decimal.max(...values.map(v => new Decimal(v)));
}

/**
 * Ensure a value is not negative (floor at zero)
 */
export function nonNegative(value: Numeric): Decimal {
  return Decimal.max(0, value);
}

/**
 * Round a monetary amount to cents and convert for JSON serialization
 */
export function toCurrency(value: Numeric): number {
  return new Decimal(value).toDecimalPlaces(2).toNumber();
}

/**
 * Round a rate to four decimal places
 */
export function toRate(value: Numeric): number {
  return new Decimal(value).toDecimalPlaces(4).toNumber();
}

/**
 * Human-readable percentage label
 * Example: formatPercentage(0.2) = "20%", formatPercentage(0.125) = "12.50%"
 */
export function formatPercentage(rate: Numeric): string {
  const percentage = new Decimal(rate).times(100);
  if (percentage.isInteger()) {
    return `${percentage.toFixed(0)}%`;
  }
  return `${percentage.toFixed(2)}%`;
}

const euroFormatter = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2
});

/**
 * Euro amount label
 * Example: formatEuro(3000) = "€3,000.00"
 */
export function formatEuro(value: Numeric): string {
  return `€${euroFormatter.format(toCurrency(value))}`;
}

export { Decimal };
