/**
 * Detail rows for settled general income components
 */

import type { CalculationDetail } from '../../../../shared/types/index.js';
import type { Translator } from '../../localization/translator.js';
import {
  componentNetIncome,
  componentTotalTax,
  employerCost,
  isSalaryCategory,
  perPayment,
  type SettledComponent
} from '../../models/incomeComponent.js';
import { toCurrency } from '../../utils/decimal.js';

function addEmploymentFields(detail: CalculationDetail, component: SettledComponent): void {
  if (!isSalaryCategory(component.category)) {
    return;
  }

  if (!component.employeeContributions.isZero()) {
    detail.employee_contributions = toCurrency(component.employeeContributions);
    if (!component.employeeManualContributions.isZero()) {
      detail.employee_contributions_manual = toCurrency(component.employeeManualContributions);
    }
    const employeePerPayment = perPayment(component, component.employeeContributions);
    if (employeePerPayment) {
      detail.employee_contributions_per_payment = toCurrency(employeePerPayment);
    }
  }

  if (!component.employerContributions.isZero()) {
    detail.employer_contributions = toCurrency(component.employerContributions);
    const employerPerPayment = perPayment(component, component.employerContributions);
    if (employerPerPayment) {
      detail.employer_contributions_per_payment = toCurrency(employerPerPayment);
    }
  }

  if (component.category === 'employment') {
    const cost = employerCost(component);
    detail.employer_cost = toCurrency(cost);
    const costPerPayment = perPayment(component, cost);
    if (costPerPayment) {
      detail.employer_cost_per_payment = toCurrency(costPerPayment);
    }
  }
}

function addFreelanceFields(detail: CalculationDetail, component: SettledComponent, translate: Translator): void {
  if (component.category !== 'freelance') {
    return;
  }

  detail.deductible_contributions = toCurrency(component.contributions);
  detail.trade_fee = toCurrency(component.tradeFee);
  if (!component.tradeFee.isZero()) {
    detail.trade_fee_label = translate('details.trade_fee');
  }

  if (!component.categoryContributions.isZero()) {
    detail.category_contributions = toCurrency(component.categoryContributions);
  }
  if (!component.additionalContributions.isZero()) {
    detail.additional_contributions = toCurrency(component.additionalContributions);
  }
  if (!component.auxiliaryContributions.isZero()) {
    detail.auxiliary_contributions = toCurrency(component.auxiliaryContributions);
  }
  if (!component.lumpSumContributions.isZero()) {
    detail.lump_sum_contributions = toCurrency(component.lumpSumContributions);
  }
}

function addPaymentFields(detail: CalculationDetail, component: SettledComponent): void {
  if (component.monthlyGrossIncome !== null) {
    detail.monthly_gross_income = toCurrency(component.monthlyGrossIncome);
  }
  if (!component.paymentsPerYear) {
    return;
  }

  detail.payments_per_year = component.paymentsPerYear;
  const grossPerPayment = perPayment(component, component.grossIncome);
  if (grossPerPayment) {
    detail.gross_income_per_payment = toCurrency(grossPerPayment);
  }
  const netPerPayment = perPayment(component, componentNetIncome(component));
  if (netPerPayment) {
    detail.net_income_per_payment = toCurrency(netPerPayment);
  }
}

export function detailFromComponent(component: SettledComponent, translate: Translator): CalculationDetail {
  const detail: CalculationDetail = {
    category: component.category,
    label: translate(component.labelKey),
    gross_income: toCurrency(component.grossIncome),
    taxable_income: toCurrency(component.taxableIncome),
    tax: toCurrency(component.taxAfterCredit),
    total_tax: toCurrency(componentTotalTax(component)),
    net_income: toCurrency(componentNetIncome(component))
  };

  if (!component.deductibleExpenses.isZero()) {
    detail.deductible_expenses = toCurrency(component.deductibleExpenses);
  }

  if (component.creditEligible) {
    detail.tax_before_credits = toCurrency(component.taxBeforeCredit);
    detail.credits = toCurrency(component.credit);
  }

  addEmploymentFields(detail, component);
  addFreelanceFields(detail, component, translate);
  addPaymentFields(detail, component);

  if (!component.deductionsApplied.isZero()) {
    detail.deductions_applied = toCurrency(component.deductionsApplied);
  }

  return detail;
}
