/**
 * Strategy Catalog
 *
 * Per category, an ordered list of strategies. Order matters: the solver keeps
 * the first strategy that produces a value unless a later one is high
 * confidence and the first is not.
 */

import { CATEGORY_IDS, type CategoryDefinition, type CategoryId, type EstimationStrategy } from './types.js';

const MACRO_STRATEGIES: readonly EstimationStrategy[] = [
  {
    id: 'macro_tam_sam',
    name: 'Standard Approach (Global TAM x SAM%)',
    formulaTemplate: '{tam} * {sam_pct}',
    requiredInputs: { tam: 'tam_global_market', sam_pct: 'sam_percent' },
    description: 'Classic top-down decomposition.',
    methodologyText:
      'Start from the total worldwide market (TAM) taken from industry reports, then apply a ' +
      'geographic and segment filter (SAM %) to isolate the accessible share.',
    realityAdjustmentApplicable: false,
  },
  {
    id: 'macro_gdp',
    name: 'GDP Proxy Approach (Sector GDP x Ratio)',
    formulaTemplate: '{gdp} * {ratio}',
    requiredInputs: { gdp: 'sector_gdp_proxy', ratio: 'sector_gdp_ratio' },
    description: 'Estimate based on the economic weight of the sector.',
    methodologyText:
      'Use the GDP of the target sector as a proxy and apply a historical spending ratio to ' +
      'estimate the available budget envelope.',
    realityAdjustmentApplicable: false,
  },
];

const DEMAND_STRATEGIES: readonly EstimationStrategy[] = [
  {
    id: 'bu_segmented_pricing',
    name: 'Segmented Pricing (Core + Modules + Services)',
    formulaTemplate: '{vol} * ({p_core} + {p_mod} + {p_serv})',
    requiredInputs: {
      vol: 'total_potential_customers',
      p_core: 'price_core',
      p_mod: 'price_modules',
      p_serv: 'price_services',
    },
    description: 'High precision from the product mix.',
    methodologyText:
      'Instead of a single price, model the real revenue per account as the base license plus ' +
      'add-on modules plus services (setup, training).',
    realityAdjustmentApplicable: true,
  },
  {
    id: 'bu_volume_price',
    name: 'Volume x Price (Buyers x Basket)',
    formulaTemplate: '{users} * {price}',
    requiredInputs: { users: 'total_potential_customers', price: 'average_price' },
    description: 'Canonical demand-side approach.',
    methodologyText:
      'Multiply the total number of potential customers by the average yearly basket ' +
      '(price or ARPU).',
    realityAdjustmentApplicable: true,
  },
  {
    id: 'bu_niche_penetration',
    name: 'Micro-niche (Target Population x Penetration x Price)',
    formulaTemplate: '{pop} * {pen} * {price}',
    requiredInputs: { pop: 'target_segment_pop', pen: 'penetration_rate_proxy', price: 'average_price' },
    description: 'For segments without a known installed base.',
    methodologyText:
      'For emerging markets: start from the whole segment population, estimate a realistic ' +
      'penetration rate at maturity and value it at the unit price.',
    realityAdjustmentApplicable: true,
  },
];

const SUPPLY_STRATEGIES: readonly EstimationStrategy[] = [
  {
    id: 'sup_production',
    name: 'Production (Volume x Unit Value)',
    formulaTemplate: '{vol} * {uval}',
    requiredInputs: { vol: 'production_volume', uval: 'average_unit_market_value' },
    description: 'Industrial approach from physical flows.',
    methodologyText:
      'Quantify the total volume of goods or services produced or sold by all players and ' +
      'multiply it by the market value of a unit.',
    realityAdjustmentApplicable: false,
  },
  {
    id: 'sup_competitors',
    name: 'Competitor Revenue Sum (Market Share)',
    formulaTemplate: '{rev_sum} / {share_est}',
    requiredInputs: { rev_sum: 'competitors_revenue_sum', share_est: 'top_players_market_share' },
    description: 'Rebuilt from the market share of the leaders.',
    methodologyText:
      'Sum the known revenue of the market leaders and divide by their cumulative market ' +
      'share (e.g. top 3 = 60%) to recover the total market size.',
    realityAdjustmentApplicable: false,
  },
  {
    id: 'sup_multiplier',
    name: 'Leader Revenue x Long Tail Multiplier',
    formulaTemplate: '{rev_sum} * {mult}',
    requiredInputs: { rev_sum: 'top_players_cumulative_revenue', mult: 'market_multiplier_factor' },
    description: 'Extrapolation from market structure (Pareto rule).',
    methodologyText:
      'Take the cumulative revenue of the top players and apply a structural multiplier that ' +
      'accounts for the long tail of small players.',
    realityAdjustmentApplicable: false,
  },
  {
    id: 'sup_fragmentation_led',
    name: 'Fragmentation Multiplier',
    formulaTemplate: '{rev_sum} * (1 + {frag_idx})',
    requiredInputs: { rev_sum: 'top_players_cumulative_revenue', frag_idx: 'market_fragmentation_index' },
    description: 'Fine adjustment based on market concentration.',
    methodologyText:
      'The more fragmented the market, the larger the multiplier. The fragmentation index ' +
      '(0.1 to 3.0) approximates the invisible share of the market.',
    realityAdjustmentApplicable: false,
  },
];

export const CATEGORIES: Readonly<Record<CategoryId, CategoryDefinition>> = {
  macro: {
    id: 'macro',
    componentId: 'comp_macro',
    name: '1. Macro Estimation (Top-Down)',
    shortLabel: 'Macro',
    role: 'Provide an overall order of magnitude.',
    color: '#2196F3',
    strategies: MACRO_STRATEGIES,
  },
  demand: {
    id: 'demand',
    componentId: 'comp_demand',
    name: '2. Demand-Side Estimation',
    shortLabel: 'Demand',
    role: 'Anchor on actual usage and customer granularity.',
    color: '#4CAF50',
    strategies: DEMAND_STRATEGIES,
  },
  supply: {
    id: 'supply',
    componentId: 'comp_supply',
    name: '3. Supply-Side Estimation (Supply-Led)',
    shortLabel: 'Supply',
    role: 'Rebuild the market from revenue flows.',
    color: '#FF9800',
    strategies: SUPPLY_STRATEGIES,
  },
};

export const TRIANGULATION = {
  componentId: 'comp_tria',
  name: '4. Triangulation & Decision',
  emptyName: '4. Triangulation',
  shortLabel: 'Triangulation',
  role: 'Robust synthesis and arbitration.',
  color: '#9C27B0',
} as const;

export function isCategoryId(value: string): value is CategoryId {
  return CATEGORY_IDS.some(id => id === value);
}
