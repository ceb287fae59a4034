/**
 * Normalised calculation input
 *
 * Built once per request by the request parser. Raw amounts are stored as
 * given; everything derived (taxable amounts, activity flags, youth category)
 * is computed on read so it can never drift from the raw values.
 */

import { Decimal, decimal, nonNegative, sum } from '../utils/decimal.js';
import type { YouthCategory } from '../tax/config/yearConfig.js';

export type TradeFeeLocation = 'standard' | 'reduced';

export type PresumptiveAdjustment = 'small_village' | 'new_mother';

export interface EmploymentInput {
  income: number;
  /** Gross income as entered, 0 when only monthly figures were given */
  declaredGrossIncome: number;
  monthlyIncome: number | null;
  paymentsPerYear: number | null;
  manualContributions: number;
  includeSocialContributions: boolean;
  includeEmployeeContributions: boolean;
  includeManualContributions: boolean;
  includeEmployerContributions: boolean;
}

export interface PensionInput {
  income: number;
  declaredGrossIncome: number;
  monthlyIncome: number | null;
  paymentsPerYear: number | null;
}

export interface FreelanceInput {
  profit: number;
  grossRevenue: number;
  deductibleExpenses: number;
  efkaCategoryId: string | null;
  efkaMonths: number | null;
  categoryContribution: number;
  mandatoryContributions: number;
  auxiliaryContributions: number;
  lumpSumContributions: number;
  includeCategoryContributions: boolean;
  includeMandatoryContributions: boolean;
  includeAuxiliaryContributions: boolean;
  includeLumpSumContributions: boolean;
  includeTradeFee: boolean;
  tradeFeeLocation: TradeFeeLocation;
  yearsActive: number | null;
  newlySelfEmployed: boolean;
}

export interface RentalInput {
  grossIncome: number;
  deductibleExpenses: number;
}

export interface AgriculturalInput {
  grossRevenue: number;
  deductibleExpenses: number;
  professionalFarmer: boolean;
}

export interface ObligationsInput {
  enfia: number;
  luxury: number;
}

export interface DeductionsInput {
  donations: number;
  medical: number;
  education: number;
  insurance: number;
}

export interface DemographicsInput {
  birthYear: number | null;
  ageBand: YouthCategory | null;
  youthOverride: YouthCategory | null;
  smallVillage: boolean;
  newMother: boolean;
}

export interface CalculationInputData {
  year: number;
  locale: string;
  children: number;
  employment: EmploymentInput;
  pension: PensionInput;
  freelance: FreelanceInput;
  rental: RentalInput;
  agricultural: AgriculturalInput;
  otherTaxableIncome: number;
  investment: Readonly<Record<string, number>>;
  obligations: ObligationsInput;
  deductions: DeductionsInput;
  withholdingTax: number;
  toggles: Readonly<Record<string, boolean>>;
  demographics: DemographicsInput;
}

export class CalculationInput {
  readonly year: number;
  readonly locale: string;
  readonly children: number;
  readonly employment: Readonly<EmploymentInput>;
  readonly pension: Readonly<PensionInput>;
  readonly freelance: Readonly<FreelanceInput>;
  readonly rental: Readonly<RentalInput>;
  readonly agricultural: Readonly<AgriculturalInput>;
  readonly otherTaxableIncome: number;
  readonly investment: Readonly<Record<string, number>>;
  readonly obligations: Readonly<ObligationsInput>;
  readonly deductions: Readonly<DeductionsInput>;
  readonly withholdingTax: number;
  readonly toggles: Readonly<Record<string, boolean>>;
  readonly demographics: Readonly<DemographicsInput>;

  constructor(data: CalculationInputData) {
    this.year = data.year;
    this.locale = data.locale;
    this.children = data.children;
    this.employment = Object.freeze({ ...data.employment });
    this.pension = Object.freeze({ ...data.pension });
    this.freelance = Object.freeze({ ...data.freelance });
    this.rental = Object.freeze({ ...data.rental });
    this.agricultural = Object.freeze({ ...data.agricultural });
    this.otherTaxableIncome = data.otherTaxableIncome;
    this.investment = Object.freeze({ ...data.investment });
    this.obligations = Object.freeze({ ...data.obligations });
    this.deductions = Object.freeze({ ...data.deductions });
    this.withholdingTax = data.withholdingTax;
    this.toggles = Object.freeze({ ...data.toggles });
    this.demographics = Object.freeze({ ...data.demographics });
    Object.freeze(this);
  }

  toggleEnabled(key: string): boolean {
    return this.toggles[key] === true;
  }

  // Employment & pension

  get hasEmploymentIncome(): boolean {
    return this.employment.income > 0;
  }

  get hasPensionIncome(): boolean {
    return this.pension.income > 0;
  }

  // Freelance

  get freelanceEffectiveCategoryContribution(): number {
    return this.freelance.includeCategoryContributions ? this.freelance.categoryContribution : 0;
  }

  get freelanceEffectiveMandatoryContribution(): number {
    return this.freelance.includeMandatoryContributions ? this.freelance.mandatoryContributions : 0;
  }

  get freelanceEffectiveAuxiliaryContribution(): number {
    return this.freelance.includeAuxiliaryContributions ? this.freelance.auxiliaryContributions : 0;
  }

  get freelanceEffectiveLumpSumContribution(): number {
    return this.freelance.includeLumpSumContributions ? this.freelance.lumpSumContributions : 0;
  }

  get freelanceTotalContributions(): Decimal {
    return sum(
      this.freelanceEffectiveCategoryContribution,
      this.freelanceEffectiveMandatoryContribution,
      this.freelanceEffectiveAuxiliaryContribution,
      this.freelanceEffectiveLumpSumContribution
    );
  }

  get freelanceTaxableIncome(): Decimal {
    return nonNegative(decimal(this.freelance.profit).minus(this.freelanceTotalContributions));
  }

  get hasFreelanceActivity(): boolean {
    return (
      this.freelance.profit > 0 ||
      this.freelanceTotalContributions.gt(0) ||
      this.freelanceTaxableIncome.gt(0)
    );
  }

  // Agricultural

  get agriculturalTaxableIncome(): Decimal {
    return nonNegative(decimal(this.agricultural.grossRevenue).minus(this.agricultural.deductibleExpenses));
  }

  get hasAgriculturalIncome(): boolean {
    return (
      this.agricultural.grossRevenue > 0 ||
      this.agricultural.deductibleExpenses > 0 ||
      this.agriculturalTaxableIncome.gt(0)
    );
  }

  get hasNonAgriculturalTaxableIncome(): boolean {
    return (
      this.hasEmploymentIncome ||
      this.hasPensionIncome ||
      this.freelanceTaxableIncome.gt(0) ||
      this.otherTaxableIncome > 0 ||
      this.rentalTaxableIncome.gt(0) ||
      this.hasInvestmentIncome
    );
  }

  /**
   * Farmers share in the family credit when farming is their profession or
   * their only taxable activity
   */
  get qualifiesForAgriculturalTaxCredit(): boolean {
    if (!this.hasAgriculturalIncome) {
      return false;
    }
    if (this.agricultural.professionalFarmer) {
      return true;
    }
    return !this.hasNonAgriculturalTaxableIncome;
  }

  // Other, rental, investment

  get hasOtherIncome(): boolean {
    return this.otherTaxableIncome > 0;
  }

  get rentalTaxableIncome(): Decimal {
    return nonNegative(decimal(this.rental.grossIncome).minus(this.rental.deductibleExpenses));
  }

  get hasRentalIncome(): boolean {
    return this.rental.grossIncome > 0 || this.rental.deductibleExpenses > 0 || this.rentalTaxableIncome.gt(0);
  }

  get hasInvestmentIncome(): boolean {
    return Object.values(this.investment).some(amount => amount > 0);
  }

  // Deductions & obligations

  get totalDeductions(): Decimal {
    const { donations, medical, education, insurance } = this.deductions;
    return nonNegative(sum(donations, medical, education, insurance));
  }

  get hasEnfiaObligation(): boolean {
    return this.obligations.enfia > 0;
  }

  get hasLuxuryObligation(): boolean {
    return this.obligations.luxury > 0;
  }

  // Demographics

  get taxpayerAge(): number | undefined {
    const { birthYear } = this.demographics;
    if (birthYear === null) {
      return undefined;
    }
    const age = this.year - birthYear;
    return age >= 0 ? age : undefined;
  }

  get youthRateCategory(): YouthCategory | undefined {
    const { youthOverride, ageBand } = this.demographics;
    if (youthOverride) {
      return youthOverride;
    }
    if (!this.toggleEnabled('youth_eligibility')) {
      return undefined;
    }
    if (ageBand) {
      return ageBand;
    }

    const age = this.taxpayerAge;
    if (age === undefined) {
      return undefined;
    }
    if (age < 25) {
      return 'under_25';
    }
    if (age <= 30) {
      return 'age26_30';
    }
    return undefined;
  }

  get presumptiveAdjustments(): PresumptiveAdjustment[] {
    if (!this.toggleEnabled('presumptive_relief')) {
      return [];
    }
    const adjustments: PresumptiveAdjustment[] = [];
    if (this.demographics.smallVillage) {
      adjustments.push('small_village');
    }
    if (this.demographics.newMother) {
      adjustments.push('new_mother');
    }
    return adjustments;
  }
}
