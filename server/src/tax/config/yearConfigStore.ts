/**
 * Year Configuration Store
 *
 * Loads tax year rules from JSON files so that a new year only needs a data
 * file, not a code change.
 *
 * Files live in one directory:
 * - manifest.json: { "years": [...], "default_year": 2026 }
 * - <year>.json: rules for a single year
 *
 * Parsed configurations are cached for the lifetime of the store and never
 * mutated, so one instance can serve concurrent calculations.
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import NodeCache from 'node-cache';
import { z } from 'zod';
import { env } from '../../config/env.js';
import { createModuleLogger } from '../../services/logger.js';
import { ConfigurationError, ConfigurationNotFoundError } from '../../utils/AppError.js';
import { yearConfigurationSchema, type YearConfiguration } from './yearConfig.js';

const log = createModuleLogger('yearConfigStore');

export const DEFAULT_CONFIG_DIR = join(__dirname, 'years');

const MANIFEST_KEY = 'manifest';

const manifestSchema = z
  .object({
    years: z.array(z.number().int().positive()).min(1, 'Manifest must list at least one year'),
    default_year: z.number().int().positive().optional()
  })
  .strict();

interface Manifest {
  years: number[];
  defaultYear: number;
}

/**
 * Anything able to hand out a year configuration
 */
export interface YearConfigProvider {
  load(year: number): YearConfiguration;
}

export interface YearConfigStoreOptions {
  directory?: string;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export class YearConfigStore implements YearConfigProvider {
  readonly directory: string;

  private readonly cache = new NodeCache({
    stdTTL: 0,         // Year rules never expire
    checkperiod: 0,
    useClones: false   // Configurations are read-only
  });

  constructor(options: YearConfigStoreOptions = {}) {
    this.directory = options.directory ?? env.TAX_CONFIG_DIR ?? DEFAULT_CONFIG_DIR;
  }

  /**
   * Years declared in the manifest, ascending
   */
  availableYears(): number[] {
    return [...this.manifest().years];
  }

  defaultYear(): number {
    return this.manifest().defaultYear;
  }

  /**
   * Load and validate the configuration for a tax year
   * @throws ConfigurationNotFoundError when the year is undeclared or its file is missing
   * @throws ConfigurationError when the file does not satisfy the schema
   */
  load(year: number): YearConfiguration {
    const key = `year:${year}`;
    const cached = this.cache.get<YearConfiguration>(key);
    if (cached) {
      return cached;
    }

    if (!this.manifest().years.includes(year)) {
      throw new ConfigurationNotFoundError(year, `Year ${year} is not supported`);
    }

    const path = join(this.directory, `${year}.json`);
    if (!existsSync(path)) {
      throw new ConfigurationNotFoundError(year);
    }

    const parsed = yearConfigurationSchema.safeParse(this.readJson(path));
    if (!parsed.success) {
      throw new ConfigurationError(
        `Configuration for year ${year} is invalid: ${describeIssues(parsed.error)}`
      );
    }
    if (parsed.data.year !== year) {
      throw new ConfigurationError(
        `Configuration file ${year}.json declares year ${parsed.data.year}`
      );
    }

    this.cache.set(key, parsed.data);
    log.info(`Loaded tax configuration for ${year}`);
    return parsed.data;
  }

  /**
   * Drop every cached configuration (picked up again on next load)
   */
  clear(): void {
    this.cache.flushAll();
  }

  private manifest(): Manifest {
    const cached = this.cache.get<Manifest>(MANIFEST_KEY);
    if (cached) {
      return cached;
    }

    const path = join(this.directory, 'manifest.json');
    if (!existsSync(path)) {
      throw new ConfigurationError(`No year manifest found in ${this.directory}`);
    }

    const parsed = manifestSchema.safeParse(this.readJson(path));
    if (!parsed.success) {
      throw new ConfigurationError(`Year manifest is invalid: ${describeIssues(parsed.error)}`);
    }

    const years = [...new Set(parsed.data.years)].sort((a, b) => a - b);
    const defaultYear = parsed.data.default_year ?? years[years.length - 1];
    if (!years.includes(defaultYear)) {
      throw new ConfigurationError(`Default year ${defaultYear} is not listed in the manifest`);
    }

    const manifest: Manifest = { years, defaultYear };
    this.cache.set(MANIFEST_KEY, manifest);
    return manifest;
  }

  private readJson(path: string): unknown {
    try {
      const contents: unknown = JSON.parse(readFileSync(path, 'utf-8'));
      return contents;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Unable to read ${path}: ${reason}`);
    }
  }
}

let defaultStore: YearConfigStore | undefined;

/**
 * Process-wide store over the configured directory
 */
export function getYearConfigStore(): YearConfigStore {
  if (!defaultStore) {
    defaultStore = new YearConfigStore();
  }
  return defaultStore;
}
