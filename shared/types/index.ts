// Shared types between the calculation API and its clients

export type Locale = 'en' | 'el'

export type GeneralIncomeCategory = 'employment' | 'pension' | 'freelance' | 'agricultural' | 'other'

export type DetailCategory = GeneralIncomeCategory | 'rental' | 'investment' | 'enfia' | 'luxury'

export type DeductionType = 'donations' | 'medical' | 'education' | 'insurance'

export interface InvestmentItem {
  type: string
  label: string
  amount: number
  rate: number
  tax: number
}

export interface CalculationDetail {
  category: DetailCategory
  label: string
  gross_income?: number
  taxable_income?: number
  tax: number
  total_tax: number
  net_income: number
  deductible_expenses?: number

  // Credit-eligible general income
  tax_before_credits?: number
  credits?: number
  deductions_applied?: number

  // Employment & pension
  employee_contributions?: number
  employee_contributions_manual?: number
  employee_contributions_per_payment?: number
  employer_contributions?: number
  employer_contributions_per_payment?: number
  employer_cost?: number
  employer_cost_per_payment?: number
  monthly_gross_income?: number
  payments_per_year?: number
  gross_income_per_payment?: number
  net_income_per_payment?: number

  // Freelance
  deductible_contributions?: number
  trade_fee?: number
  trade_fee_label?: string
  category_contributions?: number
  additional_contributions?: number
  auxiliary_contributions?: number
  lump_sum_contributions?: number

  // Investment
  items?: InvestmentItem[]
}

export interface DeductionBreakdownEntry {
  type: DeductionType
  label: string
  entered: number
  eligible: number
  credit_rate: number
  credit_requested: number
  credit_applied: number
  notes: string | null
}

export interface SummaryLabels {
  income_total: string
  taxable_income: string
  tax_total: string
  net_income: string
  net_monthly_income: string
  average_monthly_tax: string
  effective_tax_rate: string
  deductions_entered: string
  deductions_applied: string
  withholding_tax?: string
  balance_due?: string
}

export interface CalculationSummary {
  income_total: number
  taxable_income: number
  tax_total: number
  net_income: number
  net_monthly_income: number
  average_monthly_tax: number
  effective_tax_rate: number
  deductions_entered: number
  deductions_applied: number
  labels: SummaryLabels
  withholding_tax?: number
  balance_due?: number
  balance_due_is_refund?: boolean
  deductions_breakdown?: DeductionBreakdownEntry[]
}

export interface CalculationMeta {
  year: number
  locale: Locale
  youth_relief_category?: string
  presumptive_adjustments?: string[]
}

export interface CalculationResponse {
  summary: CalculationSummary
  details: CalculationDetail[]
  meta: CalculationMeta
}

export interface SupportedYearsResponse {
  supported_years: number[]
  default_year: number
}

export interface ConfigMetaResponse extends SupportedYearsResponse {
  version: string
}

export interface DependantRateEntry {
  dependants: number
  rate: number
}

export interface YouthRateEntry {
  band: string
  rate?: number
  dependant_rates?: DependantRateEntry[]
}

export type BracketSummary =
  | { type: 'single'; upper: number | null; rate: number }
  | { type: 'multi'; upper: number | null; household: DependantRateEntry[]; youth: YouthRateEntry[] }

export interface PayrollSummary {
  allowed_payments_per_year: number[]
  default_payments_per_year: number
}

export interface FamilyTaxCreditSummary {
  amounts_by_children: Array<{ children: number; amount: number }>
  incremental_amount_per_child: number
  income_reduction_exempt_from_dependants: number | null
  credit_sources: string[]
}

export interface TradeFeeSummary {
  standard_amount: number
  reduced_amount: number | null
  newly_self_employed_reduction_years: number | null
  fee_sunset: boolean
  sunset?: { status_key: string; year: number | null }
}

export interface YearSummary {
  year: number
  toggles: Record<string, boolean>
  birth_year_window: { min: number; max: number }
  employment: {
    payroll: PayrollSummary
    contributions: {
      employee_rate: number
      employer_rate: number
      monthly_salary_cap: number | null
    }
    family_tax_credit: FamilyTaxCreditSummary
    brackets: BracketSummary[]
    youth: { bands: string[] }
  }
  pension: {
    payroll: PayrollSummary
    family_tax_credit: FamilyTaxCreditSummary
  }
  freelance: {
    trade_fee: TradeFeeSummary
    efka_categories: string[]
  }
  rental: {
    brackets: BracketSummary[]
  }
  investment: {
    rates: Record<string, number>
  }
}

export interface YearsResponse extends SupportedYearsResponse {
  years: YearSummary[]
}

export interface TranslationsResponse {
  locale: Locale
  fallback_locale: Locale
  available_locales: Locale[]
  messages: Record<string, string>
}

export interface InvestmentCategory {
  id: string
  label: string
  rate: number
}

export interface InvestmentCategoriesResponse {
  year: number
  locale: Locale
  categories: InvestmentCategory[]
}

export interface ApiErrorResponse {
  error: string
  message: string
  reference?: string
  details?: unknown
}

export interface EfkaCategoryOption {
  id: string
  label: string
  monthly_amount: number
  auxiliary_monthly_amount: number | null
  lump_sum_monthly_amount: number | null
}

export interface EfkaCategoriesResponse {
  year: number
  locale: Locale
  categories: EfkaCategoryOption[]
}
