/**
 * Triangulation Aggregator
 */

import type { EstimationComponent } from './types.js';
import { TRIANGULATION } from './strategies.js';
import { DEFAULT_CURRENCY } from './solver.js';

function formatWhole(value: number): string {
  return value.toLocaleString('en-US', { maximumFractionDigits: 0 });
}

/**
 * Unweighted mean of every component that has a value. A single contributor
 * gives no extra certainty, so confidence only reaches medium with two or more.
 */
export function triangulate(
  components: readonly EstimationComponent[],
  currency: string = DEFAULT_CURRENCY
): EstimationComponent {
  const valid = components.filter(
    (component): component is EstimationComponent & { estimatedValue: number } => component.estimatedValue !== null
  );

  if (valid.length === 0) {
    return {
      id: TRIANGULATION.componentId,
      name: TRIANGULATION.emptyName,
      role: 'Decision synthesis',
      methodDescription: 'Average of the approaches',
      dataUsed: [],
      missingDataStrategy: '',
      estimatedValue: null,
      unit: currency,
      confidence: 'low',
      status: 'empty',
      color: TRIANGULATION.color,
      selectedStrategyName: '',
      calculationBreakdown: '',
      methodologyText: '',
      strategicNarrative: '',
      realityScore: '',
      realityFactor: 1,
      contributingMethodCount: 0,
      bindings: [],
    };
  }

  const values = valid.map(component => component.estimatedValue);
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;

  return {
    id: TRIANGULATION.componentId,
    name: TRIANGULATION.name,
    role: TRIANGULATION.role,
    methodDescription: `Average of ${valid.length} methods.`,
    dataUsed: [],
    missingDataStrategy: '',
    estimatedValue: mean,
    unit: currency,
    confidence: valid.length >= 2 ? 'medium' : 'low',
    status: 'complete',
    color: TRIANGULATION.color,
    selectedStrategyName: 'Arithmetic Mean',
    calculationBreakdown: `(${values.map(formatWhole).join(' + ')}) / ${valid.length}`,
    methodologyText: '',
    strategicNarrative: 'Consensus between methods. Reduces the risk of model error.',
    realityScore: '',
    realityFactor: 1,
    contributingMethodCount: valid.length,
    bindings: [],
  };
}
