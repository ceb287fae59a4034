import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { YearConfigStore } from '../yearConfigStore';
import type { YearConfigurationInput } from '../yearConfig';
import { ConfigurationError, ConfigurationNotFoundError } from '../../../utils/AppError';

function minimalConfig(year: number): YearConfigurationInput {
  return {
    year,
    income: {
      employment: {
        tax_brackets: [
          { upper: 10000, rate: 0.1 },
          { upper: null, rate: 0.2 }
        ],
        tax_credit: { amounts_by_children: { '0': 500 } },
        payroll: { allowed_payments_per_year: [12], default_payments_per_year: 12 },
        contributions: { employee_rate: 0.1, employer_rate: 0.2 }
      },
      freelance: { trade_fee: { standard_amount: 0 } },
      rental: { tax_brackets: [{ upper: null, rate: 0.15 }] },
      investment: { rates: { dividends: 0.05 } }
    }
  };
}

describe('YearConfigStore', () => {
  describe('shipped configurations', () => {
    const store = new YearConfigStore();

    it('should list the supported years and the default', () => {
      expect(store.availableYears()).toEqual([2024, 2025, 2026]);
      expect(store.defaultYear()).toBe(2026);
    });

    it('should parse flat brackets for 2024', () => {
      const config = store.load(2024);
      expect(config.year).toBe(2024);
      expect(config.employment.brackets).toHaveLength(5);
      expect(config.employment.brackets[0]).toEqual({ kind: 'flat', upperBound: 10000, rate: 0.09 });
      expect(config.employment.brackets[4]).toEqual({ kind: 'flat', upperBound: null, rate: 0.44 });
      expect(config.employment.contributions).toEqual({
        employeeRate: 0.1387,
        employerRate: 0.2229,
        monthlySalaryCap: 7572.62
      });
    });

    it('should copy the employment credit table into pension when omitted', () => {
      const config = store.load(2024);
      expect(config.pension.taxCredit).toEqual(config.employment.taxCredit);
      expect(config.pension.payroll.defaultPaymentsPerYear).toBe(14);
    });

    it('should parse multi-rate brackets with youth tables for 2026', () => {
      const [first] = store.load(2026).employment.brackets;
      expect(first.kind).toBe('multi');
      if (first.kind !== 'multi') return;
      expect(first.household.get(4)).toBe(0);
      expect(first.youth.under_25?.rate).toBe(0);
    });

    it('should return the cached instance on repeated loads', () => {
      expect(store.load(2025)).toBe(store.load(2025));
    });

    it('should apply deduction rule defaults', () => {
      const rules = store.load(2024).deductions;
      expect(rules.medical).toEqual({ creditRate: 0.1, incomeThresholdRate: 0.05, maxCredit: 3000 });
    });
  });

  describe('error handling', () => {
    let directory: string;

    const writeJson = (name: string, value: unknown) => {
      writeFileSync(join(directory, name), JSON.stringify(value));
    };

    beforeEach(() => {
      directory = mkdtempSync(join(tmpdir(), 'year-config-'));
    });

    afterEach(() => {
      rmSync(directory, { recursive: true, force: true });
    });

    it('should load a minimal configuration with defaults', () => {
      writeJson('manifest.json', { years: [2030] });
      writeJson('2030.json', minimalConfig(2030));

      const store = new YearConfigStore({ directory });
      const config = store.load(2030);
      expect(store.defaultYear()).toBe(2030);
      expect(config.meta.birthYearWindow).toEqual({ min: 1901, max: 2030 });
      expect(config.employment.taxCredit.creditSources).toEqual(['employment', 'pension', 'agricultural']);
    });

    it('should reject a year the manifest does not declare', () => {
      writeJson('manifest.json', { years: [2030] });
      const store = new YearConfigStore({ directory });

      expect(() => store.load(1999)).toThrow(ConfigurationNotFoundError);
      expect(() => store.load(1999)).toThrow('Year 1999 is not supported');
    });

    it('should report a declared year without a file as not found', () => {
      writeJson('manifest.json', { years: [2030] });
      const store = new YearConfigStore({ directory });

      expect(() => store.load(2030)).toThrow('Configuration for year 2030 not found');
    });

    it('should reject a file that declares another year', () => {
      writeJson('manifest.json', { years: [2030] });
      writeJson('2030.json', minimalConfig(2031));
      const store = new YearConfigStore({ directory });

      expect(() => store.load(2030)).toThrow(ConfigurationError);
      expect(() => store.load(2030)).toThrow('Configuration file 2030.json declares year 2031');
    });

    it('should reject brackets out of order', () => {
      const config = minimalConfig(2030);
      config.income.employment.tax_brackets = [
        { upper: 20000, rate: 0.1 },
        { upper: 10000, rate: 0.2 },
        { upper: null, rate: 0.3 }
      ];
      writeJson('manifest.json', { years: [2030] });
      writeJson('2030.json', config);
      const store = new YearConfigStore({ directory });

      expect(() => store.load(2030)).toThrow('Configuration for year 2030 is invalid');
    });

    it('should reject malformed JSON', () => {
      writeJson('manifest.json', { years: [2030] });
      writeFileSync(join(directory, '2030.json'), '{ "year": ');
      const store = new YearConfigStore({ directory });

      expect(() => store.load(2030)).toThrow('Unable to read');
    });

    it('should require a manifest', () => {
      const store = new YearConfigStore({ directory });
      expect(() => store.availableYears()).toThrow(ConfigurationError);
    });

    it('should reject a default year missing from the manifest', () => {
      writeJson('manifest.json', { years: [2030], default_year: 2031 });
      const store = new YearConfigStore({ directory });
      expect(() => store.defaultYear()).toThrow('Default year 2031 is not listed in the manifest');
    });

    it('should reload files after clear()', () => {
      writeJson('manifest.json', { years: [2030] });
      writeJson('2030.json', minimalConfig(2030));
      const store = new YearConfigStore({ directory });
      const first = store.load(2030);

      store.clear();
      expect(store.load(2030)).not.toBe(first);
      expect(store.load(2030)).toEqual(first);
    });
  });
});
