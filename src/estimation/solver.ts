/**
 * Component Solver
 *
 * Runs every strategy of a category against the fact store and turns the
 * winner into an Estimation Component.
 */

import type { Fact, FactValue, SourceType } from '../facts/types.js';
import type {
  CategoryDefinition,
  EstimationComponent,
  EstimationResult,
  EstimationStrategy,
  FrictionResult,
  InputBinding,
  Overrides,
} from './types.js';
import type { FactResolver } from './resolver.js';
import { aggregateConfidence } from './confidence.js';
import { evaluate } from './formula.js';
import { computeFriction, DEFAULT_FRICTION_POLICY, type FrictionPolicy } from './reality.js';
import { FormulaError } from '../core/errors.js';
import { logger as rootLogger, type Logger } from '../core/logging/logger.js';

export const DEFAULT_CURRENCY = 'EUR';

/** Source types that mark an input as a stand-in for real data */
const PROXY_SOURCE_TYPES: readonly SourceType[] = ['Proxy', 'Estimate', 'Internal'];

export interface SolverOptions {
  currency?: string;
  frictionPolicy?: Readonly<FrictionPolicy>;
  logger?: Logger;
}

/**
 * Display form of an input inside a calculation trace: thousands separators
 * above 1000, integers as-is, everything else with two decimals.
 */
export function formatInputValue(value: FactValue): string {
  if (typeof value !== 'number') {
    return typeof value === 'string' ? value : JSON.stringify(value);
  }
  if (value > 1000) {
    return value.toLocaleString('en-US', { maximumFractionDigits: 0 });
  }
  if (Number.isInteger(value)) {
    return String(value);
  }
  return value.toFixed(2);
}

export class ComponentSolver {
  private readonly currency: string;
  private readonly frictionPolicy: Readonly<FrictionPolicy>;
  private readonly log: Logger;

  constructor(private readonly resolver: FactResolver, options: SolverOptions = {}) {
    this.currency = options.currency ?? DEFAULT_CURRENCY;
    this.frictionPolicy = options.frictionPolicy ?? DEFAULT_FRICTION_POLICY;
    this.log = options.logger ?? rootLogger;
  }

  /** Read from the store on every call, like the strategy inputs */
  getFriction(): FrictionResult {
    return computeFriction(this.resolver, this.frictionPolicy);
  }

  solveStrategy(strategy: EstimationStrategy, overrides: Overrides = {}): EstimationResult {
    const inputs: Record<string, FactValue> = {};
    const missing: string[] = [];
    const proxies: string[] = [];
    const confidences: Fact['confidence'][] = [];
    const details: string[] = [];
    const bindings: InputBinding[] = [];
    const dataUsed: Fact[] = [];

    for (const [variable, factKey] of Object.entries(strategy.requiredInputs)) {
      const resolution = this.resolver.resolve(factKey);
      if (!resolution || resolution.fact.value === null) {
        missing.push(factKey);
        continue;
      }

      const { fact } = resolution;
      const multiplier = overrides[factKey] ?? overrides[resolution.matchedKey] ?? 1;
      const value = typeof fact.value === 'number' ? fact.value * multiplier : fact.value;

      inputs[variable] = value;
      confidences.push(fact.confidence);
      dataUsed.push(fact);
      bindings.push({
        variable,
        requestedKey: factKey,
        resolvedKey: resolution.matchedKey,
        match: resolution.match,
        similarity: resolution.similarity,
      });

      if (multiplier !== 1) {
        proxies.push(`${variable} Adjusted`);
      }
      if (PROXY_SOURCE_TYPES.includes(fact.sourceType)) {
        proxies.push(`${variable} (${fact.sourceType})`);
      }

      details.push(`${variable}=[${formatInputValue(value)}]`);
    }

    const base: EstimationResult = {
      value: null,
      formulaUsed: strategy.formulaTemplate,
      calculationDetails: '',
      confidence: 'low',
      missingInputs: missing,
      usedProxies: proxies,
      realityFactor: 1,
      frictionExplanation: '',
      frictionAdjustments: [],
      bindings,
      dataUsed,
    };

    if (missing.length > 0) {
      return { ...base, calculationDetails: `Missing: ${missing.join(', ')}` };
    }

    let value: number;
    try {
      value = evaluate(strategy.formulaTemplate, inputs);
    } catch (error) {
      if (!(error instanceof FormulaError)) throw error;
      this.log.warn('Strategy formula failed', { strategy: strategy.id, error: error.message });
      return { ...base, calculationDetails: `Formula error: ${error.message}` };
    }

    const confidence = aggregateConfidence(confidences);

    if (!strategy.realityAdjustmentApplicable) {
      return { ...base, value, confidence, calculationDetails: details.join(' x ') };
    }

    const friction = this.getFriction();
    details.push(`Reality Factor (${Math.round(friction.multiplier * 100)}%)`);

    return {
      ...base,
      value: value * friction.multiplier,
      confidence,
      calculationDetails: details.join(' x '),
      realityFactor: friction.multiplier,
      frictionExplanation: friction.explanation,
      frictionAdjustments: friction.adjustments,
    };
  }

  solve(category: CategoryDefinition, overrides: Overrides = {}): EstimationComponent {
    let best: { strategy: EstimationStrategy; result: EstimationResult } | null = null;
    let firstAttempt: EstimationResult | null = null;
    const log = this.log.child({ component: category.componentId });

    for (const strategy of category.strategies) {
      const result = this.solveStrategy(strategy, overrides);
      firstAttempt ??= result;
      if (result.value === null) {
        log.debug('Strategy unusable', { strategy: strategy.id });
        continue;
      }
      if (!best || (result.confidence === 'high' && best.result.confidence !== 'high')) {
        best = { strategy, result };
      }
    }

    if (!best || best.result.value === null) {
      return this.emptyComponent(category, firstAttempt);
    }

    const { strategy, result } = best;
    return {
      id: category.componentId,
      name: category.name,
      role: category.role,
      methodDescription: strategy.description,
      dataUsed: result.dataUsed,
      missingDataStrategy: 'Complete data (or proxies used).',
      estimatedValue: result.value,
      unit: this.currency,
      confidence: result.confidence,
      status: 'complete',
      color: category.color,
      selectedStrategyName: strategy.name,
      calculationBreakdown: result.calculationDetails,
      methodologyText: strategy.methodologyText,
      strategicNarrative: componentNarrative(strategy, result),
      realityScore: result.frictionExplanation,
      realityFactor: result.realityFactor,
      contributingMethodCount: 1,
      bindings: result.bindings,
    };
  }

  /** Reports what the first declared strategy would need */
  private emptyComponent(category: CategoryDefinition, attempt: EstimationResult | null): EstimationComponent {
    const [first] = category.strategies;
    const missingDataStrategy = !attempt
      ? 'No strategy declared'
      : attempt.missingInputs.length > 0
        ? `Missing data: ${attempt.missingInputs.join(', ')}`
        : attempt.calculationDetails;

    return {
      id: category.componentId,
      name: category.name,
      role: category.role,
      methodDescription: first ? `Proposed method: ${first.name}` : '',
      dataUsed: [],
      missingDataStrategy,
      estimatedValue: null,
      unit: this.currency,
      confidence: 'low',
      status: 'empty',
      color: category.color,
      selectedStrategyName: first?.name ?? '',
      calculationBreakdown: 'Insufficient data',
      methodologyText: '',
      strategicNarrative: '',
      realityScore: '',
      realityFactor: 1,
      contributingMethodCount: 0,
      bindings: [],
    };
  }
}

/** Short "so what" for a solved component */
export function componentNarrative(strategy: EstimationStrategy, result: EstimationResult): string {
  const remarks: string[] = [];

  if (result.realityFactor < 0.8) {
    remarks.push('Warning: large theoretical market but strong adoption friction (cycle/maturity).');
  }
  if (result.frictionAdjustments.some(adjustment => adjustment.signal === 'competition')) {
    remarks.push('Red ocean: high competitive intensity detected.');
  }
  if (strategy.id === 'bu_segmented_pricing') {
    remarks.push('Composite pricing reveals value pockets in services.');
  }

  return remarks.length > 0 ? remarks.join(' ') : 'Healthy alignment between assumptions and volume.';
}
