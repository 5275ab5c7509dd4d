/**
 * Fact Store Tests
 */

import { describe, it, expect } from 'vitest';
import { InMemoryFactStore, parseFact, parseFacts } from '../../src/facts/store.js';
import { FactValidationError } from '../../src/core/errors.js';
import { parseValueArgument } from '../../src/commands/facts.js';
import { DEFAULT_MARKET_SCOPE, getMarketScope, marketScopeFact } from '../../src/facts/context.js';
import { seedFacts } from '../../src/facts/seed.js';
import { MarketEstimationEngine } from '../../src/estimation/engine.js';
import { Logger } from '../../src/core/logging/logger.js';

const quiet = new Logger({ silent: true });

describe('parseFact', () => {
  it('should fill in defaults', () => {
    const fact = parseFact({ key: 'average_price', value: 120 });

    expect(fact.id).toMatch(/^fact_/);
    expect(fact).toMatchObject({
      key: 'average_price',
      category: 'market_estimation',
      value: 120,
      unit: '',
      source: 'N/A',
      sourceType: 'Unknown',
      confidence: 'low',
      notes: '',
    });
  });

  it('should mark a fact without value as missing', () => {
    const fact = parseFact({ key: 'tam_global_market' });
    expect(fact.value).toBeNull();
    expect(fact.sourceType).toBe('Missing');
  });

  it('should normalise labels case-insensitively', () => {
    const fact = parseFact({ key: 'a', value: 1, confidence: ' High ', source_type: 'proxy' });
    expect(fact.confidence).toBe('high');
    expect(fact.sourceType).toBe('Proxy');

    expect(parseFact({ key: 'a', value: 1, sourceType: 'survey' }).sourceType).toBe('Unknown');
  });

  it('should keep a given id and structured values', () => {
    const fact = parseFact({ id: 'fact_fixed', key: 'competitor_count', value: ['A', 'B'] });
    expect(fact.id).toBe('fact_fixed');
    expect(fact.value).toEqual(['A', 'B']);
  });

  it('should reject documents without a key', () => {
    expect(() => parseFact({ value: 1 })).toThrow(FactValidationError);
    expect(() => parseFact({ key: '   ', value: 1 })).toThrow(/Invalid fact: key/);
    expect(() => parseFact({ key: 'a', confidence: 'certain' })).toThrow(/confidence/);
  });
});

describe('parseFacts', () => {
  it('should require an array', () => {
    expect(() => parseFacts({ key: 'a' })).toThrow('Fact file must contain a JSON array of facts');
  });

  it('should report the index of an invalid document', () => {
    try {
      parseFacts([{ key: 'a', value: 1 }, { value: 2 }]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FactValidationError);
      if (error instanceof FactValidationError) {
        expect(error.message).toMatch(/^Invalid fact at index 1:/);
        expect(error.issues[0]).toMatch(/^\[1\] key:/);
      }
    }
  });
});

describe('InMemoryFactStore', () => {
  const build = () =>
    InMemoryFactStore.fromDocuments([
      { key: 'average_price', value: 100, category: 'pricing' },
      { key: 'total_potential_customers', value: 500 },
      { key: 'average_price', value: 90, category: 'benchmarks' },
    ]);

  it('should filter by key and category in insertion order', () => {
    const store = build();

    expect(store.size).toBe(3);
    expect(store.getFacts({ key: 'average_price' }).map(fact => fact.value)).toEqual([100, 90]);
    expect(store.getFacts({ category: 'benchmarks' })).toHaveLength(1);
    expect(store.getFacts({ category: 'pricing', key: 'average_price' })[0].value).toBe(100);
  });

  it('should return the first value or the default', () => {
    const store = build();

    expect(store.getFactValue('average_price')).toBe(100);
    expect(store.getFactValue('missing_key')).toBeNull();
    expect(store.getFactValue('missing_key', 0)).toBe(0);
  });

  it('should list unique keys in order of first appearance', () => {
    expect(build().getAllKeys()).toEqual(['average_price', 'total_potential_customers']);
  });

  it('should replace a fact with the same key and category in place', () => {
    const store = build();
    const originalId = store.getFacts({ category: 'pricing' })[0].id;

    const stored = store.upsert(parseFact({ key: 'average_price', value: 110, category: 'pricing' }));

    expect(stored.id).toBe(originalId);
    expect(store.size).toBe(3);
    expect(store.getFacts({ key: 'average_price' }).map(fact => fact.value)).toEqual([110, 90]);
  });

  it('should remove by key, optionally within one category', () => {
    const store = build();

    expect(store.remove('average_price', 'benchmarks')).toBe(1);
    expect(store.remove('average_price')).toBe(1);
    expect(store.remove('average_price')).toBe(0);
    expect(store.getAllKeys()).toEqual(['total_potential_customers']);

    store.clear();
    expect(store.size).toBe(0);
  });

  it('should hand out snapshots that later writes do not reach', () => {
    const store = build();
    const snapshot = store.snapshot();

    store.upsert(parseFact({ key: 'average_price', value: 1, category: 'pricing' }));
    store.upsert(parseFact({ key: 'sam_percent', value: 0.3 }));

    expect(snapshot.getFactValue('average_price')).toBe(100);
    expect(snapshot.getAllKeys()).toEqual(['average_price', 'total_potential_customers']);
    expect(Object.isFrozen(snapshot.getFacts()[0])).toBe(true);
  });
});

describe('parseValueArgument', () => {
  it('should parse JSON literals and keep anything else as text', () => {
    expect(parseValueArgument('5000')).toBe(5000);
    expect(parseValueArgument('0.25')).toBe(0.25);
    expect(parseValueArgument('["A","B"]')).toEqual(['A', 'B']);
    expect(parseValueArgument('null')).toBeNull();
    expect(parseValueArgument('SME software')).toBe('SME software');
  });
});

describe('market scope', () => {
  it('should fall back to the default scope', () => {
    expect(getMarketScope(new InMemoryFactStore())).toBe(DEFAULT_MARKET_SCOPE);
    expect(getMarketScope(InMemoryFactStore.fromDocuments([{ key: 'market_scope', category: 'context', value: 42 }]))).toBe(
      'Undefined market'
    );
  });

  it('should only read the scope from the context category', () => {
    const store = InMemoryFactStore.fromDocuments([{ key: 'market_scope', value: 'Filed under the wrong category' }]);
    expect(getMarketScope(store)).toBe(DEFAULT_MARKET_SCOPE);
  });

  it('should replace the scope in place', () => {
    const store = new InMemoryFactStore();
    const first = store.upsert(marketScopeFact('  ERP software for SMEs '));
    store.upsert(marketScopeFact('CRM software for SMEs'));

    expect(getMarketScope(store)).toBe('CRM software for SMEs');
    expect(store.getFacts({ key: 'market_scope' })).toHaveLength(1);
    expect(store.getFacts({ key: 'market_scope' })[0]).toMatchObject({
      id: first.id,
      category: 'context',
      unit: 'text',
      confidence: 'high',
    });
  });
});

describe('seedFacts', () => {
  it('should provide a scoped, partly complete demo set', () => {
    const facts = seedFacts();

    expect(facts).toHaveLength(10);
    expect(new Set(facts.map(fact => `${fact.category}/${fact.key}`)).size).toBe(10);
    expect(facts.find(fact => fact.key === 'production_volume')?.sourceType).toBe('Missing');
    expect(getMarketScope(new InMemoryFactStore(facts))).toBe('Management software (ERP/CRM) for SMEs in France');
  });

  it('should give every top-down and demand strategy what it needs', () => {
    const engine = new MarketEstimationEngine(new InMemoryFactStore(seedFacts()), { logger: quiet });
    const [macro, demand, supply, triangulation] = engine.getAllEstimations();

    expect(macro.estimatedValue).toBe(1000000000);
    expect(demand.estimatedValue).toBe(162000000);
    expect(demand.realityFactor).toBe(0.9);
    expect(supply.status).toBe('empty');
    expect(triangulation.estimatedValue).toBe(581000000);
    expect(engine.determineBestMethod().id).toBe('comp_tria');
    expect(engine.getMarketScope()).toBe('Management software (ERP/CRM) for SMEs in France');
  });
});
