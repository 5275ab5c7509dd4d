/**
 * Fact model and the Fact Store contract consumed by the estimation engine
 */

import { z } from 'zod';

export const CONFIDENCE_LEVELS = ['low', 'medium', 'high'] as const;
export type Confidence = (typeof CONFIDENCE_LEVELS)[number];

export const SOURCE_TYPES = ['Primary', 'Secondary', 'Proxy', 'Estimate', 'Internal', 'Missing', 'Unknown'] as const;
export type SourceType = (typeof SOURCE_TYPES)[number];

export type FactValue = number | string | boolean | null | FactValue[] | { [key: string]: FactValue };

export interface Fact {
  id: string;
  key: string;
  category: string;
  value: FactValue;
  unit: string;
  source: string;
  sourceType: SourceType;
  confidence: Confidence;
  notes: string;
}

export interface FactFilter {
  category?: string;
  key?: string;
}

export interface FactStore {
  /** Facts matching the filter, in insertion order */
  getFacts(filter?: FactFilter): Fact[];
  /** Value of the first fact with this key, or the default when no such fact exists */
  getFactValue(key: string, defaultValue?: FactValue): FactValue;
  /** Unique keys, in order of first appearance */
  getAllKeys(): string[];
}

const FactValueSchema: z.ZodType<FactValue> = z.lazy(() =>
  z.union([z.number(), z.string(), z.boolean(), z.null(), z.array(FactValueSchema), z.record(FactValueSchema)])
);

const ConfidenceSchema = z.preprocess(
  value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  z.enum(CONFIDENCE_LEVELS)
);

const SourceTypeSchema = z.preprocess(value => {
  if (typeof value !== 'string') return 'Unknown';
  const match = SOURCE_TYPES.find(type => type.toLowerCase() === value.trim().toLowerCase());
  return match ?? 'Unknown';
}, z.enum(SOURCE_TYPES));

/**
 * Shape of a fact document as written by hand or by an ingestion job.
 * Only `key` is mandatory.
 */
export const FactInputSchema = z.object({
  id: z.string().min(1).optional(),
  key: z.string().trim().min(1),
  category: z.string().default('market_estimation'),
  value: FactValueSchema.default(null),
  unit: z.string().default(''),
  source: z.string().default('N/A'),
  source_type: SourceTypeSchema.optional(),
  sourceType: SourceTypeSchema.optional(),
  confidence: ConfidenceSchema.default('low'),
  notes: z.string().default(''),
});

export type FactInput = z.input<typeof FactInputSchema>;
