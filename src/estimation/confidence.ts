/**
 * Confidence Aggregation
 */

import type { Confidence } from '../facts/types.js';

export type ConfidenceLabel = Confidence | 'none';

const CONFIDENCE_SCORES: Readonly<Record<ConfidenceLabel, number>> = {
  high: 3,
  medium: 2,
  low: 1,
  none: 0,
};

/**
 * Blend per-input labels into one: mean score >= 2.5 is high, >= 1.5 medium,
 * anything else (including no inputs at all) low.
 */
export function aggregateConfidence(labels: readonly ConfidenceLabel[]): Confidence {
  if (labels.length === 0) return 'low';

  const total = labels.reduce((sum, label) => sum + CONFIDENCE_SCORES[label], 0);
  const mean = total / labels.length;

  if (mean >= 2.5) return 'high';
  if (mean >= 1.5) return 'medium';
  return 'low';
}
