/**
 * Context facts - the market scope every estimate is about
 */

import { createFactId } from './store.js';
import type { Fact, FactStore } from './types.js';

export const CONTEXT_CATEGORY = 'context';
export const MARKET_SCOPE_KEY = 'market_scope';
export const DEFAULT_MARKET_SCOPE = 'Undefined market';

export function getMarketScope(store: FactStore): string {
  const [fact] = store.getFacts({ key: MARKET_SCOPE_KEY, category: CONTEXT_CATEGORY });
  if (!fact || typeof fact.value !== 'string' || fact.value.trim() === '') {
    return DEFAULT_MARKET_SCOPE;
  }
  return fact.value;
}

/** Upserting it replaces the current scope, since there is one per (key, category) */
export function marketScopeFact(scope: string): Fact {
  return {
    id: createFactId(),
    key: MARKET_SCOPE_KEY,
    category: CONTEXT_CATEGORY,
    value: scope.trim(),
    unit: 'text',
    source: 'User Input',
    sourceType: 'Internal',
    confidence: 'high',
    notes: 'Scope of the analysis',
  };
}
