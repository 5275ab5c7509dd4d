/**
 * Fact Resolver
 *
 * Looks a canonical fact key up in three passes:
 *   1. exact key
 *   2. curated aliases of the key, matched approximately against stored keys
 *   3. the canonical key itself, matched approximately with a looser cutoff
 */

import type { Fact, FactStore } from '../facts/types.js';
import type { Resolution } from './types.js';
import { findClosestMatch } from './similarity.js';
import { logger as rootLogger, type Logger } from '../core/logging/logger.js';

export const ALIAS_MATCH_THRESHOLD = 0.8;
export const FUZZY_MATCH_THRESHOLD = 0.7;

/** canonical key -> known synonymous keys */
export const DEFAULT_ALIASES: Readonly<Record<string, readonly string[]>> = {
  total_potential_customers: ['target_audience', 'total_users', 'volume_clients', 'potential_buyers', 'target_volume'],
  average_price: ['unit_price', 'arpu', 'selling_price', 'license_cost', 'subscription_fee'],
  sam_percent: ['accessible_market_share', 'sam_share', 'serviceable_share'],
  som_share: ['winnable_market_share', 'som_percent', 'market_penetration'],
  production_volume: ['total_units', 'active_install_base'],
  tam_global_market: ['global_tam', 'total_market_size'],
  price_core: ['core_license_price', 'base_price'],
  price_modules: ['modules_revenue', 'avg_module_price'],
  price_services: ['service_fees', 'implementation_cost'],
};

export interface ResolverOptions {
  aliasThreshold?: number;
  fuzzyThreshold?: number;
  aliases?: Readonly<Record<string, readonly string[]>>;
  logger?: Logger;
}

export class FactResolver {
  private readonly aliasThreshold: number;
  private readonly fuzzyThreshold: number;
  private readonly aliases: Readonly<Record<string, readonly string[]>>;
  private readonly log: Logger;

  constructor(private readonly store: FactStore, options: ResolverOptions = {}) {
    this.aliasThreshold = options.aliasThreshold ?? ALIAS_MATCH_THRESHOLD;
    this.fuzzyThreshold = options.fuzzyThreshold ?? FUZZY_MATCH_THRESHOLD;
    this.aliases = options.aliases ?? DEFAULT_ALIASES;
    this.log = options.logger ?? rootLogger;
  }

  resolve(canonicalKey: string): Resolution | null {
    const exact = this.firstFact(canonicalKey);
    if (exact) {
      return { fact: exact, requestedKey: canonicalKey, matchedKey: canonicalKey, match: 'exact', similarity: 1 };
    }

    const allKeys = this.store.getAllKeys();

    for (const alias of this.aliases[canonicalKey] ?? []) {
      const candidate = findClosestMatch(alias, allKeys, this.aliasThreshold);
      if (!candidate) continue;
      const fact = this.firstFact(candidate.key);
      if (fact) {
        this.log.debug('Alias fact match', {
          requested_key: canonicalKey,
          alias,
          matched_key: candidate.key,
          similarity: candidate.similarity,
        });
        return {
          fact,
          requestedKey: canonicalKey,
          matchedKey: candidate.key,
          match: 'alias',
          similarity: candidate.similarity,
        };
      }
    }

    const fallback = findClosestMatch(canonicalKey, allKeys, this.fuzzyThreshold);
    if (fallback) {
      const fact = this.firstFact(fallback.key);
      if (fact) {
        this.log.warn('Fuzzy fact match', {
          requested_key: canonicalKey,
          matched_key: fallback.key,
          similarity: fallback.similarity,
        });
        return {
          fact,
          requestedKey: canonicalKey,
          matchedKey: fallback.key,
          match: 'fuzzy',
          similarity: fallback.similarity,
        };
      }
    }

    return null;
  }

  /** Numeric value behind a key, or null when unresolved or not a finite number */
  resolveNumber(canonicalKey: string): number | null {
    const resolution = this.resolve(canonicalKey);
    return resolution ? numericValue(resolution.fact) : null;
  }

  private firstFact(key: string): Fact | undefined {
    return this.store.getFacts({ key })[0];
  }
}

export function numericValue(fact: Fact): number | null {
  return typeof fact.value === 'number' && Number.isFinite(fact.value) ? fact.value : null;
}
