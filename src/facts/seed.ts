/**
 * Demo fact set for an empty store.
 *
 * Top-down and demand data are complete, supply data is left missing so the
 * empty-category path shows up too.
 */

import { parseFacts } from './store.js';
import type { Fact, FactInput } from './types.js';

const SEED_DOCUMENTS: FactInput[] = [
  {
    id: 'ctx_market_scope',
    category: 'context',
    key: 'market_scope',
    value: 'Management software (ERP/CRM) for SMEs in France',
    unit: 'text',
    source: 'User Input',
    source_type: 'Internal',
    confidence: 'high',
    notes: 'Scope of the analysis',
  },
  {
    id: 'md_tam_global',
    key: 'tam_global_market',
    value: 5000000000,
    unit: 'EUR',
    source: 'Industry report 2023',
    source_type: 'Secondary',
    confidence: 'high',
    notes: 'Global management software market',
  },
  {
    id: 'md_sam_segment',
    key: 'sam_percent',
    value: 0.2,
    unit: '%',
    source: 'Internal assumption',
    source_type: 'Internal',
    confidence: 'medium',
    notes: 'SME segment in Europe',
  },
  {
    id: 'md_som_share',
    key: 'som_share',
    value: 0.05,
    unit: '%',
    source: 'Strategic plan',
    source_type: 'Internal',
    confidence: 'low',
    notes: 'Target share in three years',
  },
  {
    id: 'bu_customers',
    key: 'total_potential_customers',
    value: 15000,
    unit: 'companies',
    source: 'Business registry',
    source_type: 'Primary',
    confidence: 'high',
    notes: 'Companies with more than 50 employees',
  },
  {
    id: 'bu_price',
    key: 'average_price',
    value: 12000,
    unit: 'EUR/year',
    source: 'Public price lists',
    source_type: 'Secondary',
    confidence: 'medium',
  },
  {
    id: 'bu_sales_cycle',
    key: 'sales_cycle_months',
    value: 9,
    unit: 'months',
    source: 'Sales team',
    source_type: 'Internal',
    confidence: 'medium',
  },
  {
    id: 'comp_list',
    category: 'competition',
    key: 'competitor_count',
    value: ['Competitor A', 'Competitor B', 'Competitor C'],
    unit: 'list',
    source: 'Manual',
    source_type: 'Internal',
    confidence: 'high',
  },
  {
    id: 'sup_production',
    key: 'production_volume',
    value: null,
    unit: 'units/year',
    source: 'TBD',
    confidence: 'low',
    notes: 'Local or imported production volume',
  },
  {
    id: 'sup_unit_val',
    key: 'average_unit_market_value',
    value: null,
    unit: 'EUR',
    source: 'TBD',
    confidence: 'low',
  },
];

export function seedFacts(): Fact[] {
  return parseFacts(SEED_DOCUMENTS);
}
