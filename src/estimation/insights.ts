/**
 * Insights - waterfall, strategic summary, estimation level and facts table
 */

import type { Fact, FactStore, FactValue } from '../facts/types.js';
import type {
  EstimationComponent,
  EstimationLevelAssessment,
  FactsTableRow,
  WaterfallStep,
} from './types.js';
import type { FactResolver } from './resolver.js';

export const DEFAULT_SAM_PERCENT = 1.0;
export const DEFAULT_SOM_SHARE = 0.2;

function millions(value: number, currency: string): string {
  return `${(value / 1e6).toFixed(1)}M ${currency}`;
}

function dropPercent(ratio: number): string {
  return `-${((1 - ratio) * 100).toFixed(0)}%`;
}

/**
 * TAM -> SAM -> SOM steps. Missing ratios fall back to 100% serviceable and
 * 20% capturable.
 */
export function getWaterfallData(resolver: FactResolver, baseTam: number, currency: string): WaterfallStep[] {
  const samPercent = resolver.resolveNumber('sam_percent') ?? DEFAULT_SAM_PERCENT;
  const somShare = resolver.resolveNumber('som_share') ?? DEFAULT_SOM_SHARE;

  const sam = baseTam * samPercent;
  const som = sam * somShare;

  return [
    { measure: 'absolute', label: 'Total Addressable Market (TAM)', value: baseTam, text: millions(baseTam, currency) },
    { measure: 'relative', label: 'Serviceable Filter (SAM)', value: sam - baseTam, text: dropPercent(samPercent) },
    { measure: 'relative', label: 'Capturable Share (SOM)', value: som - sam, text: dropPercent(somShare) },
    { measure: 'total', label: 'Potential Revenue', value: som, text: millions(som, currency) },
  ];
}

export function generateStrategicSummary(tam: number, som: number): string {
  const ratio = tam > 0 ? som / tam : 0;

  if (ratio < 0.05) {
    return 'Tactical niche: the addressable market is huge but the current target is a precise fraction of it. A wedge strategy is recommended.';
  }
  if (ratio > 0.5) {
    return 'Dominance play: the target is a major share of the total market. Watch for incumbent reactions.';
  }
  return 'Balanced market: targeting is consistent with the macro potential.';
}

function positive(value: FactValue): boolean {
  return typeof value === 'number' && value > 0;
}

/**
 * Level 0 (structural) to 3 (triangulation), from exact keys only.
 */
export function assessEstimationLevel(store: FactStore): EstimationLevelAssessment {
  const tam = store.getFactValue('tam_global_market');
  const samPercent = store.getFactValue('sam_percent');
  const somShare = store.getFactValue('som_share');
  const customers = store.getFactValue('total_potential_customers');
  const price = store.getFactValue('average_price');

  const hasTopDown = positive(tam) && samPercent !== null && somShare !== null;
  const hasBottomUp = positive(customers) && positive(price);

  if (hasTopDown && hasBottomUp) {
    return {
      level: 3,
      confidenceScore: 0.85,
      method: 'Triangulation',
      explanation: 'Robust estimate from converging top-down and bottom-up views.',
    };
  }
  if (hasBottomUp) {
    return {
      level: 2,
      confidenceScore: 0.6,
      method: 'Bottom-Up',
      explanation: 'Estimate from volumes (customers x price). The global view (TAM) is missing.',
    };
  }
  if (hasTopDown) {
    return {
      level: 1,
      confidenceScore: 0.4,
      method: 'Top-Down',
      explanation: 'Theoretical estimate from the global market size (TAM). Needs field validation.',
    };
  }
  return {
    level: 0,
    confidenceScore: 0,
    method: 'None',
    explanation: tam === null
      ? 'TAM missing. Only the estimation structure can be shown.'
      : 'Partial data. Fill in the SAM/SOM percentages or the customer/price data.',
  };
}

export function humanizeKey(key: string): string {
  return key
    .split('_')
    .map(word => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ');
}

function displayValue(fact: Fact): string {
  const { value } = fact;
  const text = typeof value === 'number' && value > 1000
    ? value.toLocaleString('en-US', { maximumFractionDigits: 0 })
    : typeof value === 'string' ? value : JSON.stringify(value);
  return fact.unit ? `${text} ${fact.unit}` : text;
}

/**
 * Every fact annotated with the components that consumed it. Used facts come
 * first; within each group insertion order is kept.
 */
export function buildFactsTable(
  facts: readonly Fact[],
  components: readonly EstimationComponent[],
  labels: Readonly<Record<string, string>>
): FactsTableRow[] {
  const usage = new Map<string, string[]>();
  for (const component of components) {
    const label = labels[component.id] ?? component.name;
    for (const fact of component.dataUsed) {
      const list = usage.get(fact.id) ?? [];
      if (!list.includes(label)) list.push(label);
      usage.set(fact.id, list);
    }
  }

  const rows: FactsTableRow[] = facts.map(fact => ({
    factId: fact.id,
    key: fact.key,
    variable: humanizeKey(fact.key),
    value: displayValue(fact),
    source: fact.source,
    sourceType: fact.sourceType,
    confidence: fact.confidence.toUpperCase(),
    usedIn: usage.get(fact.id)?.join(', ') ?? '-',
  }));

  const used = rows.filter(row => row.usedIn !== '-');
  const unused = rows.filter(row => row.usedIn === '-');
  return [...used, ...unused];
}
