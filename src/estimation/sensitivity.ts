/**
 * Sensitivity Analyzer
 *
 * Perturbs one input at a time by ±perturbation, re-runs every estimation
 * and measures how far the base component moves. An estimate that swings
 * under small input changes cannot keep a high confidence label, whatever
 * the confidence of its inputs.
 */

import { z } from 'zod';
import type { Confidence } from '../facts/types.js';
import type {
  AdjustedConfidence,
  EstimationComponent,
  Hypothesis,
  Overrides,
  SensitivityClass,
  SensitivityReport,
  SensitivityScenario,
  SensitivityTest,
  SensitivityVariable,
} from './types.js';
import { humanizeKey } from './insights.js';
import { MarketSizingError } from '../core/errors.js';
import { logger as rootLogger, type Logger } from '../core/logging/logger.js';

export interface SensitivityThresholds {
  critical: number;
  high: number;
  medium: number;
}

export const DEFAULT_SENSITIVITY_THRESHOLDS: Readonly<SensitivityThresholds> = {
  critical: 30,
  high: 15,
  medium: 5,
};

export const DEFAULT_PERTURBATION = 0.2;
export const DEFAULT_TOP_N = 3;

export interface SensitivityOptions {
  perturbation?: number;
  thresholds?: Readonly<SensitivityThresholds>;
  topN?: number;
  logger?: Logger;
}

/** Re-runs every estimation under the given overrides */
export type EstimateAll = (overrides: Overrides) => EstimationComponent[];

const HypothesisSchema = z.object({
  variable: z.string().optional(),
  key: z.string().optional(),
  name: z.string().optional(),
  central_value: z.number().nullable().optional(),
  value: z.number().nullable().optional(),
  unit: z.string().optional(),
});

export function parseHypotheses(input: unknown): Hypothesis[] {
  const result = z.array(HypothesisSchema).safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new MarketSizingError(`Invalid hypotheses: ${issues.join('; ')}`, 'HYPOTHESIS_VALIDATION_ERROR', {
      context: { issues },
    });
  }
  return result.data;
}

export function classifySensitivity(
  score: number,
  thresholds: Readonly<SensitivityThresholds> = DEFAULT_SENSITIVITY_THRESHOLDS
): SensitivityClass {
  if (score >= thresholds.critical) return 'CRITICAL';
  if (score >= thresholds.high) return 'HIGH';
  if (score >= thresholds.medium) return 'MEDIUM';
  return 'LOW';
}

function toAdjusted(confidence: Confidence): AdjustedConfidence {
  switch (confidence) {
    case 'high':
      return 'HIGH';
    case 'medium':
      return 'MEDIUM';
    case 'low':
      return 'LOW';
  }
}

/** CRITICAL drops to LOW, HIGH caps at MEDIUM, anything else keeps the base label */
export function adjustConfidence(
  maxScore: number,
  base: Confidence,
  thresholds: Readonly<SensitivityThresholds> = DEFAULT_SENSITIVITY_THRESHOLDS
): AdjustedConfidence {
  const adjusted = toAdjusted(base);
  switch (classifySensitivity(maxScore, thresholds)) {
    case 'CRITICAL':
      return 'LOW';
    case 'HIGH':
      return adjusted === 'HIGH' ? 'MEDIUM' : adjusted;
    default:
      return adjusted;
  }
}

/**
 * Variables to perturb: the hypotheses when any name a key, otherwise the
 * facts behind the base component. Base values are kept as given; the
 * analyzer skips the ones it cannot perturb.
 */
export function collectVariables(
  base: EstimationComponent,
  hypotheses: readonly Hypothesis[] = []
): SensitivityVariable[] {
  const fromHypotheses = hypotheses.flatMap((hypothesis): SensitivityVariable[] => {
    const key = hypothesis.variable || hypothesis.key;
    if (!key) return [];
    return [{
      key,
      name: hypothesis.name ?? key,
      baseValue: hypothesis.central_value || hypothesis.value,
      unit: hypothesis.unit ?? '',
    }];
  });
  if (fromHypotheses.length > 0) return fromHypotheses;

  return base.dataUsed.map(fact => ({
    key: fact.key,
    name: humanizeKey(fact.key),
    baseValue: fact.value,
    unit: fact.unit,
  }));
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function analyzeSensitivity(
  base: EstimationComponent,
  estimateAll: EstimateAll,
  hypotheses: readonly Hypothesis[] = [],
  options: SensitivityOptions = {}
): SensitivityReport {
  const perturbation = options.perturbation ?? DEFAULT_PERTURBATION;
  const thresholds = options.thresholds ?? DEFAULT_SENSITIVITY_THRESHOLDS;
  const topN = options.topN ?? DEFAULT_TOP_N;
  const log = options.logger ?? rootLogger;

  const baseValue = base.estimatedValue;
  if (baseValue === null) {
    return {
      componentId: base.id,
      baseValue: null,
      tests: [],
      mostSensitiveVariables: [],
      confidenceAdjusted: 'LOW',
      maxSensitivityScore: 0,
      error: 'No base value to test',
    };
  }

  const rerun = (key: string, multiplier: number): number | null => {
    const component = estimateAll({ [key]: multiplier }).find(candidate => candidate.id === base.id);
    return component?.estimatedValue ?? null;
  };

  const scenario = (input: number, result: number): SensitivityScenario => ({
    value: input,
    result,
    deltaPct: round1(((result - baseValue) / baseValue) * 100),
  });

  const tests: SensitivityTest[] = [];

  for (const variable of collectVariables(base, hypotheses)) {
    const inputValue = variable.baseValue;
    if (typeof inputValue !== 'number' || !Number.isFinite(inputValue) || inputValue === 0) {
      log.debug('Skipping variable without numeric base', { component: base.id, variable: variable.key });
      continue;
    }

    const low = rerun(variable.key, 1 - perturbation);
    const high = rerun(variable.key, 1 + perturbation);
    // a zero result leaves nothing to compare against
    if (!low || !high) continue;

    const deltaLow = ((low - baseValue) / baseValue) * 100;
    const deltaHigh = ((high - baseValue) / baseValue) * 100;
    const score = (Math.abs(deltaLow) + Math.abs(deltaHigh)) / 2;

    tests.push({
      hypothesis: variable.name,
      key: variable.key,
      base: inputValue,
      unit: variable.unit,
      lowScenario: scenario(inputValue * (1 - perturbation), low),
      highScenario: scenario(inputValue * (1 + perturbation), high),
      score,
      sensitivity: classifySensitivity(score, thresholds),
    });
  }

  const ranked = [...tests].sort((a, b) => b.score - a.score).slice(0, topN);
  const maxScore = ranked.length > 0 ? ranked[0].score : 0;

  return {
    componentId: base.id,
    baseValue,
    tests,
    mostSensitiveVariables: ranked.map(test => test.hypothesis),
    confidenceAdjusted: adjustConfidence(maxScore, base.confidence, thresholds),
    maxSensitivityScore: round1(maxScore),
  };
}
