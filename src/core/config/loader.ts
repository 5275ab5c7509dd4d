/**
 * Configuration Loader
 *
 * Reads msize.config.yaml (or $MSIZE_CONFIG), applies environment
 * overrides and validates the result against ConfigSchema.
 */

import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { parse as parseYaml } from 'yaml';
import { ConfigSchema, type Config } from './schema.js';
import { ConfigError, errorMessage } from '../errors.js';

export const DEFAULT_CONFIG_FILE = 'msize.config.yaml';

let cachedConfig: Config | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  return isRecord(value) ? { ...value } : {};
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot parse ${configPath}: ${errorMessage(error)}`, {
      path: configPath,
    });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${configPath} must contain a mapping at the top level`, { path: configPath });
  }
  return parsed;
}

function applyEnvOverrides(raw: Record<string, unknown>): Record<string, unknown> {
  const result = { ...raw };

  if (process.env.DATABASE_PATH) {
    result.database = { ...section(raw, 'database'), path: process.env.DATABASE_PATH };
  }
  if (process.env.LOG_LEVEL) {
    result.logging = { ...section(raw, 'logging'), level: process.env.LOG_LEVEL };
  }
  if (process.env.REPORTS_DIR) {
    result.reporting = { ...section(raw, 'reporting'), out_dir: process.env.REPORTS_DIR };
  }

  return result;
}

export function loadConfig(configPath?: string): Config {
  dotenv.config();

  const finalPath = path.resolve(configPath || process.env.MSIZE_CONFIG || DEFAULT_CONFIG_FILE);
  const raw = applyEnvOverrides(readConfigFile(finalPath));

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration in ${finalPath}: ${issues.join('; ')}`, {
      path: finalPath,
      issues,
    });
  }

  cachedConfig = result.data;
  return cachedConfig;
}

export function getConfig(): Config {
  if (cachedConfig) return cachedConfig;
  return loadConfig();
}

export function clearConfigCache(): void {
  cachedConfig = null;
}

export function generateDefaultConfig(): string {
  return `# Market Sizing configuration

general:
  name: Market Sizing
  environment: development

estimation:
  currency: EUR
  # Minimum similarity for a curated alias to bind to a stored key
  alias_match_threshold: 0.8
  # Minimum similarity for the last-resort fuzzy match on the canonical key
  fuzzy_match_threshold: 0.7

friction:
  sales_cycle_min_months: 6
  sales_cycle_long_months: 12
  sales_cycle_factor: 0.9
  long_sales_cycle_factor: 0.75
  maturity_floor: 0.5
  competitor_threshold: 50
  competition_factor: 0.9

sensitivity:
  perturbation: 0.2
  critical_threshold: 30
  high_threshold: 15
  medium_threshold: 5
  top_n: 3

reporting:
  out_dir: ./reports
  include_facts: true

database:
  path: ./data/market-sizing.db
  wal_mode: true

logging:
  level: info
  format: pretty
`;
}
