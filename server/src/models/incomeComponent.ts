/**
 * General income components
 *
 * Categories that share the progressive ladder move through four stages,
 * each adding the fields its step computes:
 *
 *   IncomeComponent -> TaxedComponent -> CreditedComponent -> SettledComponent
 *
 * Every stage returns new frozen records; nothing is written back.
 */

import { Decimal, ZERO, decimal, type Numeric } from '../utils/decimal.js';
import type { GeneralIncomeCategory } from '../../../shared/types/index.js';

export interface IncomeComponent {
  readonly category: GeneralIncomeCategory;
  readonly labelKey: string;
  readonly grossIncome: Decimal;
  readonly taxableIncome: Decimal;
  readonly creditEligible: boolean;
  readonly deductibleExpenses: Decimal;

  // Freelance
  readonly contributions: Decimal;
  readonly categoryContributions: Decimal;
  readonly additionalContributions: Decimal;
  readonly auxiliaryContributions: Decimal;
  readonly lumpSumContributions: Decimal;
  readonly tradeFee: Decimal;

  // Employment & pension
  readonly employeeContributions: Decimal;
  readonly employeeManualContributions: Decimal;
  readonly employerContributions: Decimal;
  readonly includeEmployeeContributions: boolean;
  readonly paymentsPerYear: number | null;
  readonly monthlyGrossIncome: Decimal | null;
}

export interface TaxedComponent extends IncomeComponent {
  readonly taxBeforeCredit: Decimal;
}

export interface CreditedComponent extends TaxedComponent {
  readonly credit: Decimal;
  readonly taxAfterCredit: Decimal;
}

export interface SettledComponent extends CreditedComponent {
  readonly deductionsApplied: Decimal;
}

type ComponentFields = Pick<IncomeComponent, 'category' | 'labelKey' | 'creditEligible'> & {
  grossIncome: Numeric;
  taxableIncome: Numeric;
} & Partial<Omit<IncomeComponent, 'category' | 'labelKey' | 'creditEligible' | 'grossIncome' | 'taxableIncome'>>;

/**
 * Build a component, zeroing every field the category does not use
 */
export function createComponent(fields: ComponentFields): IncomeComponent {
  return Object.freeze({
    deductibleExpenses: ZERO,
    contributions: ZERO,
    categoryContributions: ZERO,
    additionalContributions: ZERO,
    auxiliaryContributions: ZERO,
    lumpSumContributions: ZERO,
    tradeFee: ZERO,
    employeeContributions: ZERO,
    employeeManualContributions: ZERO,
    employerContributions: ZERO,
    includeEmployeeContributions: false,
    paymentsPerYear: null,
    monthlyGrossIncome: null,
    ...fields,
    grossIncome: decimal(fields.grossIncome),
    taxableIncome: decimal(fields.taxableIncome)
  });
}

export function isSalaryCategory(category: GeneralIncomeCategory): boolean {
  return category === 'employment' || category === 'pension';
}

/**
 * Tax owed by the component; freelancers also owe the trade fee
 */
export function componentTotalTax(component: CreditedComponent): Decimal {
  if (component.category === 'freelance') {
    return component.taxAfterCredit.plus(component.tradeFee);
  }
  return component.taxAfterCredit;
}

export function componentNetIncome(component: CreditedComponent): Decimal {
  let net = component.grossIncome.minus(component.taxAfterCredit);
  if (component.category === 'freelance') {
    net = net.minus(component.contributions).minus(component.tradeFee);
  }
  if (isSalaryCategory(component.category) && component.includeEmployeeContributions) {
    net = net.minus(component.employeeContributions);
  }
  return net;
}

export function employerCost(component: IncomeComponent): Decimal {
  return component.grossIncome.plus(component.employerContributions);
}

/**
 * Split an annual amount over the component's payments, if it has any
 */
export function perPayment(component: IncomeComponent, annual: Numeric): Decimal | null {
  if (!component.paymentsPerYear || component.paymentsPerYear <= 0) {
    return null;
  }
  return decimal(annual).dividedBy(component.paymentsPerYear);
}

/**
 * Running totals over detail rows; one instance per calculation
 */
export class DetailTotals {
  income: Decimal = ZERO;
  tax: Decimal = ZERO;
  net: Decimal = ZERO;
  taxable: Decimal = ZERO;

  add(values: { income?: Numeric; tax?: Numeric; net?: Numeric; taxable?: Numeric }): void {
    this.income = this.income.plus(values.income ?? 0);
    this.tax = this.tax.plus(values.tax ?? 0);
    this.net = this.net.plus(values.net ?? 0);
    this.taxable = this.taxable.plus(values.taxable ?? 0);
  }

  merge(other: DetailTotals): void {
    this.add(other);
  }
}
