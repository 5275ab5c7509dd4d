/**
 * Integration Test - Full Workflow on an in-memory database
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  getDatabase,
  closeDatabase,
  factsRepo,
  runsRepo,
  estimationsRepo,
  sensitivityRepo,
} from '../../src/core/db/database.js';
import { logger } from '../../src/core/logging/logger.js';
import { parseFact, parseFacts } from '../../src/facts/store.js';
import { MarketEstimationEngine } from '../../src/estimation/engine.js';
import { generateReport, regenerateReport } from '../../src/core/reporting/reporter.js';
import { getMarketScope, marketScopeFact } from '../../src/facts/context.js';
import { seedFacts } from '../../src/facts/seed.js';

const FACTS = [
  { key: 'tam_global_market', value: 500000000, unit: 'EUR', confidence: 'high', source: 'Industry report', source_type: 'Secondary' },
  { key: 'sam_percent', value: 0.2, confidence: 'high', source: 'Analyst estimate', source_type: 'Estimate' },
  { key: 'som_share', value: 0.05, confidence: 'medium' },
  { key: 'total_potential_customers', value: 5000, unit: 'clients', confidence: 'high', source_type: 'Primary' },
  { key: 'average_price', value: 10000, unit: 'EUR', confidence: 'high' },
  { key: 'sales_cycle_months', value: 9, confidence: 'medium' },
  { key: 'competitor_count', value: Array.from({ length: 60 }, (_, i) => `Vendor ${i + 1}`) },
  { key: 'production_volume', value: 2000, confidence: 'medium' },
  { key: 'average_unit_market_value', value: 25000, unit: 'EUR', confidence: 'medium' },
];

describe('Full Workflow Integration', () => {
  let reportsDir: string;

  beforeAll(() => {
    logger.configure({ silent: true });
    closeDatabase();
    getDatabase(':memory:');
    reportsDir = fs.mkdtempSync(path.join(os.tmpdir(), 'msize-reports-'));
  });

  afterAll(() => {
    closeDatabase();
    fs.rmSync(reportsDir, { recursive: true, force: true });
    logger.configure({ silent: false });
  });

  it('should store facts and keep one per key and category', () => {
    expect(factsRepo.upsertMany(parseFacts(FACTS))).toBe(9);
    expect(factsRepo.count()).toBe(9);

    const originalId = factsRepo.getAll()[4].id;
    factsRepo.upsert(parseFact({ key: 'average_price', value: 12000, unit: 'EUR', confidence: 'high', source: 'Pricing page' }));

    const facts = factsRepo.getAll();
    expect(facts).toHaveLength(9);
    expect(facts[4]).toMatchObject({ id: originalId, key: 'average_price', value: 12000, source: 'Pricing page' });
    expect(facts[6].value).toHaveLength(60);
    expect(factsRepo.getByCategory('market_estimation')).toHaveLength(9);
  });

  it('should complete full workflow: facts -> estimate -> sensitivity -> report', () => {
    const engine = new MarketEstimationEngine(factsRepo.loadStore().snapshot());

    // Estimate
    const [macro, demand, supply, triangulation] = engine.getAllEstimations();
    expect(macro.estimatedValue).toBe(100000000);
    expect(macro.confidence).toBe('high');
    expect(demand.estimatedValue).toBe(48600000);
    expect(demand.realityScore).toBe('Sales Cycle Friction x0.9, High Competition x0.9');
    expect(supply.estimatedValue).toBe(50000000);
    expect(supply.confidence).toBe('medium');
    expect(triangulation.estimatedValue).toBe(66200000);
    expect(triangulation.contributingMethodCount).toBe(3);
    expect(triangulation.calculationBreakdown).toBe('(100,000,000 + 48,600,000 + 50,000,000) / 3');

    const best = engine.determineBestMethod();
    expect(best.id).toBe('comp_tria');
    expect(best.confidence).toBe('medium');

    const level = engine.assessEstimationLevel();
    expect(level.level).toBe(3);

    const waterfall = engine.getWaterfallData(500000000);
    const som = waterfall[waterfall.length - 1].value;
    expect(som).toBeCloseTo(5000000, 4);
    expect(engine.generateStrategicSummary(500000000, som)).toMatch(/^Tactical niche:/);

    const runId = runsRepo.create('estimate', { category: 'all', overrides: {} });
    for (const component of [macro, demand, supply, triangulation]) {
      estimationsRepo.create(runId, component);
    }
    estimationsRepo.create(runId, best, { isBest: true });
    runsRepo.complete(runId);

    const stored = estimationsRepo.getByRun(runId);
    expect(stored).toHaveLength(5);
    expect(stored.filter(estimation => estimation.is_best)).toHaveLength(1);
    expect(stored[1].component).toEqual(demand);
    expect(stored[4].component.id).toBe('comp_tria');

    // Sensitivity
    const report = engine.performSensitivityAnalysis(demand);
    expect(report.confidenceAdjusted).toBe('MEDIUM');
    expect(report.maxSensitivityScore).toBe(20);
    sensitivityRepo.create(runId, report);
    expect(sensitivityRepo.getByRun(runId)[0].report).toEqual(report);

    // Report
    const generated = generateReport(
      {
        runId,
        command: 'estimate',
        timestamp: Date.now(),
        components: [macro, demand, supply, triangulation],
        best,
        level,
        waterfall,
        sensitivity: [report],
        facts: engine.getConsolidatedFactsTable(),
      },
      reportsDir
    );

    expect(generated.paths).toHaveLength(2);
    for (const file of generated.paths) {
      expect(fs.existsSync(file)).toBe(true);
    }
    const markdownLines = generated.markdown.split('\n');
    expect(markdownLines[0]).toBe('# Market Sizing Report');
    expect(markdownLines).toContain('**4. Triangulation & Decision:** 66,200,000 EUR (confidence medium)');
    expect(markdownLines).toContain('**Adjusted Confidence:** MEDIUM');
    expect(markdownLines).toContain('| Total Potential Customers | 5,000 clients | N/A | Primary | HIGH | Demand |');
    expect(JSON.parse(generated.json).runId).toBe(runId);
  });

  it('should regenerate a report from a stored run', () => {
    const runId = runsRepo.create('estimate', { category: 'macro' });
    const engine = new MarketEstimationEngine(factsRepo.loadStore().snapshot());
    const macro = engine.getMacroEstimation();
    estimationsRepo.create(runId, macro);
    runsRepo.complete(runId);

    const run = runsRepo.findByPrefix(runId.slice(0, 8));
    expect(run?.id).toBe(runId);
    expect(run?.status).toBe('completed');
    if (!run) return;

    const report = regenerateReport(run, estimationsRepo.getByRun(runId), sensitivityRepo.getByRun(runId), reportsDir);
    const lines = report.markdown.split('\n');

    expect(lines).toContain('- **Status:** completed');
    expect(lines).toContain('- **Components Stored:** 1');
    expect(lines).toContain('| 1. Macro Estimation (Top-Down) | 100,000,000 EUR | high | complete | Standard Approach (Global TAM x SAM%) |');
  });

  it('should record failed runs', () => {
    const runId = runsRepo.create('sensitivity');
    runsRepo.fail(runId, 'Unknown component: comp_other');

    const run = runsRepo.getById(runId);
    expect(run?.status).toBe('failed');
    expect(run?.error).toBe('Unknown component: comp_other');
    expect(run?.completed_at).not.toBeNull();
    expect(runsRepo.getById('does-not-exist')).toBeNull();
  });

  it('should estimate nothing once the facts are cleared', () => {
    expect(factsRepo.remove('sam_percent')).toBe(1);
    expect(factsRepo.clear()).toBe(8);

    const engine = new MarketEstimationEngine(factsRepo.loadStore().snapshot());
    const best = engine.determineBestMethod();

    expect(best.id).toBe('comp_macro');
    expect(best.status).toBe('empty');
    expect(best.missingDataStrategy).toBe('Missing data: tam_global_market, sam_percent');
    expect(engine.assessEstimationLevel().level).toBe(0);
    expect(engine.getConsolidatedFactsTable()).toEqual([]);
  });

  it('should seed an empty store and refuse to seed it twice', () => {
    expect(factsRepo.count()).toBe(0);
    expect(factsRepo.seed(seedFacts())).toBe(10);

    expect(() => factsRepo.seed(seedFacts())).toThrow('Fact store already holds 10 facts');
    expect(factsRepo.count()).toBe(10);
    expect(getMarketScope(factsRepo.loadStore())).toBe('Management software (ERP/CRM) for SMEs in France');
  });

  it('should carry the market scope into regenerated reports', () => {
    factsRepo.upsert(marketScopeFact('CRM software for SMEs in Belgium'));
    const engine = new MarketEstimationEngine(factsRepo.loadStore().snapshot());
    expect(factsRepo.count()).toBe(10);

    const runId = runsRepo.create('estimate', { category: 'all', marketScope: engine.getMarketScope() });
    estimationsRepo.create(runId, engine.getMacroEstimation());
    runsRepo.complete(runId);

    const run = runsRepo.getById(runId);
    if (!run) throw new Error(`Run ${runId} was not stored`);
    const lines = regenerateReport(run, estimationsRepo.getByRun(runId), [], reportsDir).markdown.split('\n');

    expect(lines).toContain('**Market scope:** CRM software for SMEs in Belgium');
    expect(lines).toContain('| 1. Macro Estimation (Top-Down) | 1,000,000,000 EUR | high | complete | Standard Approach (Global TAM x SAM%) |');
  });
});

