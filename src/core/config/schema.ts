/**
 * Configuration Schema - Zod validation for all config
 */

import { z } from 'zod';

export const GeneralConfigSchema = z.object({
  name: z.string().default('Market Sizing'),
  environment: z.enum(['development', 'production']).default('development'),
});

export const EstimationConfigSchema = z.object({
  currency: z.string().default('EUR'),
  alias_match_threshold: z.number().min(0).max(1).default(0.8),
  fuzzy_match_threshold: z.number().min(0).max(1).default(0.7),
});

export const FrictionConfigSchema = z.object({
  sales_cycle_min_months: z.number().nonnegative().default(6),
  sales_cycle_long_months: z.number().nonnegative().default(12),
  sales_cycle_factor: z.number().gt(0).max(1).default(0.9),
  long_sales_cycle_factor: z.number().gt(0).max(1).default(0.75),
  maturity_floor: z.number().gt(0).max(1).default(0.5),
  competitor_threshold: z.number().nonnegative().default(50),
  competition_factor: z.number().gt(0).max(1).default(0.9),
});

export const SensitivityConfigSchema = z.object({
  perturbation: z.number().gt(0).lt(1).default(0.2),
  critical_threshold: z.number().positive().default(30),
  high_threshold: z.number().positive().default(15),
  medium_threshold: z.number().positive().default(5),
  top_n: z.number().int().positive().default(3),
});

export const ReportingConfigSchema = z.object({
  out_dir: z.string().default('./reports'),
  include_facts: z.boolean().default(true),
});

export const DatabaseConfigSchema = z.object({
  path: z.string().default('./data/market-sizing.db'),
  wal_mode: z.boolean().default(true),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  format: z.enum(['json', 'pretty']).default('json'),
  file: z.string().optional(),
});

export const ConfigSchema = z.object({
  general: GeneralConfigSchema.default({}),
  estimation: EstimationConfigSchema.default({}),
  friction: FrictionConfigSchema.default({}),
  sensitivity: SensitivityConfigSchema.default({}),
  reporting: ReportingConfigSchema.default({}),
  database: DatabaseConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type EstimationConfig = z.infer<typeof EstimationConfigSchema>;
export type FrictionConfig = z.infer<typeof FrictionConfigSchema>;
export type SensitivityConfig = z.infer<typeof SensitivityConfigSchema>;
