/**
 * Sensitivity Analyzer Tests
 */

import { describe, it, expect } from 'vitest';
import {
  adjustConfidence,
  analyzeSensitivity,
  classifySensitivity,
  collectVariables,
  parseHypotheses,
} from '../../src/estimation/sensitivity.js';
import { MarketEstimationEngine } from '../../src/estimation/engine.js';
import { InMemoryFactStore } from '../../src/facts/store.js';
import { Logger } from '../../src/core/logging/logger.js';
import { MarketSizingError } from '../../src/core/errors.js';

const quiet = new Logger({ silent: true });

const demandStore = InMemoryFactStore.fromDocuments([
  { key: 'total_potential_customers', value: 5000, confidence: 'high', unit: 'clients' },
  { key: 'average_price', value: 12000, confidence: 'high', unit: 'EUR' },
  { key: 'sales_cycle_months', value: 9 },
  { key: 'competitor_count', value: Array.from({ length: 60 }, (_, i) => `Vendor ${i + 1}`) },
]);

describe('classifySensitivity', () => {
  it('should use inclusive lower bounds', () => {
    expect(classifySensitivity(30)).toBe('CRITICAL');
    expect(classifySensitivity(29.99)).toBe('HIGH');
    expect(classifySensitivity(15)).toBe('HIGH');
    expect(classifySensitivity(14.9)).toBe('MEDIUM');
    expect(classifySensitivity(5)).toBe('MEDIUM');
    expect(classifySensitivity(4.99)).toBe('LOW');
    expect(classifySensitivity(0)).toBe('LOW');
  });

  it('should accept custom thresholds', () => {
    expect(classifySensitivity(12, { critical: 20, high: 10, medium: 2 })).toBe('HIGH');
  });
});

describe('adjustConfidence', () => {
  it('should drop to LOW on critical sensitivity', () => {
    expect(adjustConfidence(30, 'high')).toBe('LOW');
    expect(adjustConfidence(45, 'medium')).toBe('LOW');
  });

  it('should cap HIGH at MEDIUM on high sensitivity', () => {
    expect(adjustConfidence(20, 'high')).toBe('MEDIUM');
    expect(adjustConfidence(20, 'medium')).toBe('MEDIUM');
    expect(adjustConfidence(20, 'low')).toBe('LOW');
  });

  it('should keep the base label otherwise', () => {
    expect(adjustConfidence(10, 'high')).toBe('HIGH');
    expect(adjustConfidence(0, 'low')).toBe('LOW');
  });
});

describe('parseHypotheses', () => {
  it('should accept hypotheses with partial fields', () => {
    expect(parseHypotheses([{ variable: 'average_price', central_value: 10 }, { name: 'Unkeyed' }])).toEqual([
      { variable: 'average_price', central_value: 10 },
      { name: 'Unkeyed' },
    ]);
  });

  it('should reject malformed input', () => {
    expect(() => parseHypotheses({ variable: 'x' })).toThrow(MarketSizingError);
    expect(() => parseHypotheses([{ variable: 'x', central_value: 'high' }])).toThrow(/Invalid hypotheses/);
  });
});

describe('collectVariables', () => {
  const engine = new MarketEstimationEngine(demandStore, { logger: quiet });

  it('should fall back to the facts behind the component', () => {
    const variables = collectVariables(engine.getDemandEstimation());

    expect(variables).toEqual([
      { key: 'total_potential_customers', name: 'Total Potential Customers', baseValue: 5000, unit: 'clients' },
      { key: 'average_price', name: 'Average Price', baseValue: 12000, unit: 'EUR' },
    ]);
  });

  it('should prefer keyed hypotheses', () => {
    const variables = collectVariables(engine.getDemandEstimation(), [
      { key: 'average_price', value: 11000 },
      { name: 'No key at all', central_value: 3 },
    ]);

    expect(variables).toEqual([{ key: 'average_price', name: 'average_price', baseValue: 11000, unit: '' }]);
  });
});

describe('analyzeSensitivity', () => {
  it('should perturb each input and classify the swing', () => {
    const engine = new MarketEstimationEngine(demandStore, { logger: quiet });
    const base = engine.getDemandEstimation();
    const report = engine.performSensitivityAnalysis(base);

    expect(report.componentId).toBe('comp_demand');
    expect(report.baseValue).toBe(48600000);
    expect(report.error).toBeUndefined();
    expect(report.tests).toHaveLength(2);

    const [customers, price] = report.tests;
    expect(customers.hypothesis).toBe('Total Potential Customers');
    expect(customers.key).toBe('total_potential_customers');
    expect(customers.base).toBe(5000);
    expect(customers.unit).toBe('clients');
    expect(customers.lowScenario.value).toBe(4000);
    expect(customers.lowScenario.result).toBe(38880000);
    expect(customers.lowScenario.deltaPct).toBe(-20);
    expect(customers.highScenario.value).toBe(6000);
    expect(customers.highScenario.result).toBeCloseTo(58320000, 4);
    expect(customers.highScenario.deltaPct).toBe(20);
    expect(customers.score).toBeCloseTo(20, 10);
    expect(customers.sensitivity).toBe('HIGH');

    expect(price.hypothesis).toBe('Average Price');
    expect(price.sensitivity).toBe('HIGH');

    expect(report.maxSensitivityScore).toBe(20);
    expect(report.confidenceAdjusted).toBe('MEDIUM');
    expect(report.mostSensitiveVariables).toHaveLength(2);
    expect(report.mostSensitiveVariables).toContain('Total Potential Customers');
    expect(report.mostSensitiveVariables).toContain('Average Price');
  });

  it('should downgrade to LOW under a wider perturbation', () => {
    const engine = new MarketEstimationEngine(demandStore, { logger: quiet, sensitivity: { perturbation: 0.4 } });
    const report = engine.performSensitivityAnalysis(engine.getDemandEstimation());

    expect(report.tests.every(test => test.sensitivity === 'CRITICAL')).toBe(true);
    expect(report.maxSensitivityScore).toBe(40);
    expect(report.confidenceAdjusted).toBe('LOW');
  });

  it('should limit the ranking to the top variables', () => {
    const engine = new MarketEstimationEngine(demandStore, { logger: quiet, sensitivity: { topN: 1 } });
    const report = engine.performSensitivityAnalysis(engine.getDemandEstimation());

    expect(report.tests).toHaveLength(2);
    expect(report.mostSensitiveVariables).toHaveLength(1);
  });

  it('should use hypotheses when they name a key', () => {
    const engine = new MarketEstimationEngine(demandStore, { logger: quiet });
    const report = engine.performSensitivityAnalysis(engine.getDemandEstimation(), [
      { variable: 'average_price', name: 'Basket', central_value: 12000, unit: 'EUR' },
    ]);

    expect(report.tests).toHaveLength(1);
    expect(report.tests[0].hypothesis).toBe('Basket');
    expect(report.tests[0].lowScenario.value).toBe(9600);
    expect(report.mostSensitiveVariables).toEqual(['Basket']);
  });

  it('should skip variables without a usable base value', () => {
    const engine = new MarketEstimationEngine(demandStore, { logger: quiet });
    const report = engine.performSensitivityAnalysis(engine.getDemandEstimation(), [
      { variable: 'average_price', central_value: 0 },
      { variable: 'total_potential_customers', central_value: null },
    ]);

    expect(report.tests).toEqual([]);
    expect(report.mostSensitiveVariables).toEqual([]);
    expect(report.maxSensitivityScore).toBe(0);
    expect(report.confidenceAdjusted).toBe('HIGH');
  });

  it('should skip a variable whose rerun collapses to zero', () => {
    const engine = new MarketEstimationEngine(demandStore, { logger: quiet });
    const base = engine.getDemandEstimation();
    const report = analyzeSensitivity(base, () => [{ ...base, estimatedValue: 0 }], [], { logger: quiet });

    expect(report.tests).toEqual([]);
  });

  it('should report an error for a component without value', () => {
    const engine = new MarketEstimationEngine(InMemoryFactStore.fromDocuments([]), { logger: quiet });
    const report = engine.performSensitivityAnalysis(engine.getSupplyEstimation());

    expect(report).toEqual({
      componentId: 'comp_supply',
      baseValue: null,
      tests: [],
      mostSensitiveVariables: [],
      confidenceAdjusted: 'LOW',
      maxSensitivityScore: 0,
      error: 'No base value to test',
    });
  });
});

describe('determineSensitivityBase', () => {
  const macroFacts = [
    { key: 'tam_global_market', value: 500000000, confidence: 'high' },
    { key: 'sam_percent', value: 0.2, confidence: 'high' },
  ];
  const supplyFacts = [
    { key: 'production_volume', value: 2000, confidence: 'medium' },
    { key: 'average_unit_market_value', value: 25000, confidence: 'medium' },
  ];
  const engineOf = (...docs: Array<Record<string, unknown>>) =>
    new MarketEstimationEngine(InMemoryFactStore.fromDocuments(docs), { logger: quiet });

  it('should stand in the demand estimate for a triangulated best method', () => {
    const engine = engineOf(...macroFacts, { key: 'total_potential_customers', value: 5000 }, { key: 'average_price', value: 12000 });

    expect(engine.determineBestMethod().id).toBe('comp_tria');
    const base = engine.determineSensitivityBase();
    expect(base.id).toBe('comp_demand');
    expect(engine.performSensitivityAnalysis(base).tests).toHaveLength(2);
  });

  it('should fall through to supply when demand cannot be solved', () => {
    expect(engineOf(...macroFacts, ...supplyFacts).determineSensitivityBase().id).toBe('comp_supply');
  });

  it('should keep a best method that has inputs', () => {
    expect(engineOf(...macroFacts).determineSensitivityBase().id).toBe('comp_macro');
  });

  it('should return the empty macro shell when nothing is solvable', () => {
    const base = engineOf().determineSensitivityBase();
    expect(base.id).toBe('comp_macro');
    expect(base.status).toBe('empty');
  });
});
