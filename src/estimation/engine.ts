/**
 * Market Estimation Engine
 *
 * Facade over the solver, triangulation, selection, sensitivity and insight
 * functions. Every call is a pure function of the injected fact store and the
 * overrides passed in; the store is never written.
 */

import type { FactStore } from '../facts/types.js';
import type {
  CategoryId,
  EstimationComponent,
  EstimationLevelAssessment,
  FactsTableRow,
  Hypothesis,
  Overrides,
  SensitivityReport,
  WaterfallStep,
} from './types.js';
import type { Config } from '../core/config/schema.js';
import { FactResolver, type ResolverOptions } from './resolver.js';
import { ComponentSolver, DEFAULT_CURRENCY } from './solver.js';
import { CATEGORIES, TRIANGULATION } from './strategies.js';
import { DEFAULT_FRICTION_POLICY, type FrictionPolicy } from './reality.js';
import { triangulate } from './triangulation.js';
import { selectBest } from './selector.js';
import { analyzeSensitivity, type SensitivityOptions } from './sensitivity.js';
import {
  assessEstimationLevel,
  buildFactsTable,
  generateStrategicSummary,
  getWaterfallData,
} from './insights.js';
import { getMarketScope } from '../facts/context.js';
import { logger as rootLogger, type Logger } from '../core/logging/logger.js';

export interface EngineOptions {
  currency?: string;
  resolver?: Omit<ResolverOptions, 'logger'>;
  frictionPolicy?: Readonly<FrictionPolicy>;
  sensitivity?: Omit<SensitivityOptions, 'logger'>;
  logger?: Logger;
}

export function engineOptionsFromConfig(config: Config): EngineOptions {
  return {
    currency: config.estimation.currency,
    resolver: {
      aliasThreshold: config.estimation.alias_match_threshold,
      fuzzyThreshold: config.estimation.fuzzy_match_threshold,
    },
    frictionPolicy: {
      salesCycleMinMonths: config.friction.sales_cycle_min_months,
      salesCycleLongMonths: config.friction.sales_cycle_long_months,
      salesCycleFactor: config.friction.sales_cycle_factor,
      longSalesCycleFactor: config.friction.long_sales_cycle_factor,
      maturityFloor: config.friction.maturity_floor,
      competitorThreshold: config.friction.competitor_threshold,
      competitionFactor: config.friction.competition_factor,
    },
    sensitivity: {
      perturbation: config.sensitivity.perturbation,
      thresholds: {
        critical: config.sensitivity.critical_threshold,
        high: config.sensitivity.high_threshold,
        medium: config.sensitivity.medium_threshold,
      },
      topN: config.sensitivity.top_n,
    },
  };
}

export class MarketEstimationEngine {
  private readonly resolver: FactResolver;
  private readonly solver: ComponentSolver;
  private readonly currency: string;
  private readonly sensitivityOptions: SensitivityOptions;

  constructor(private readonly store: FactStore, options: EngineOptions = {}) {
    const log = options.logger ?? rootLogger;
    this.currency = options.currency ?? DEFAULT_CURRENCY;
    this.resolver = new FactResolver(store, { ...options.resolver, logger: log });
    this.solver = new ComponentSolver(this.resolver, {
      currency: this.currency,
      frictionPolicy: options.frictionPolicy ?? DEFAULT_FRICTION_POLICY,
      logger: log,
    });
    this.sensitivityOptions = { ...options.sensitivity, logger: log };
  }

  getResolver(): FactResolver {
    return this.resolver;
  }

  solveCategory(categoryId: CategoryId, overrides: Overrides = {}): EstimationComponent {
    return this.solver.solve(CATEGORIES[categoryId], overrides);
  }

  getMacroEstimation(overrides: Overrides = {}): EstimationComponent {
    return this.solveCategory('macro', overrides);
  }

  getDemandEstimation(overrides: Overrides = {}): EstimationComponent {
    return this.solveCategory('demand', overrides);
  }

  getSupplyEstimation(overrides: Overrides = {}): EstimationComponent {
    return this.solveCategory('supply', overrides);
  }

  triangulate(components: readonly EstimationComponent[]): EstimationComponent {
    return triangulate(components, this.currency);
  }

  /** [macro, demand, supply, triangulation] */
  getAllEstimations(overrides: Overrides = {}): EstimationComponent[] {
    const macro = this.getMacroEstimation(overrides);
    const demand = this.getDemandEstimation(overrides);
    const supply = this.getSupplyEstimation(overrides);
    return [macro, demand, supply, this.triangulate([macro, demand, supply])];
  }

  determineBestMethod(overrides: Overrides = {}): EstimationComponent {
    const [macro, demand, supply, triangulation] = this.getAllEstimations(overrides);
    return selectBest(macro, demand, supply, triangulation);
  }

  /**
   * Component a sensitivity run should perturb when no hypotheses are given.
   * Triangulation has no inputs of its own, so the best solved category
   * stands in for it.
   */
  determineSensitivityBase(): EstimationComponent {
    const [macro, demand, supply, triangulation] = this.getAllEstimations();
    const best = selectBest(macro, demand, supply, triangulation);
    if (best.dataUsed.length > 0) return best;
    return [demand, supply, macro].find(component => component.status === 'complete') ?? best;
  }

  performSensitivityAnalysis(base: EstimationComponent, hypotheses: readonly Hypothesis[] = []): SensitivityReport {
    return analyzeSensitivity(
      base,
      overrides => this.getAllEstimations(overrides),
      hypotheses,
      this.sensitivityOptions
    );
  }

  getConsolidatedFactsTable(): FactsTableRow[] {
    const labels: Record<string, string> = { [TRIANGULATION.componentId]: TRIANGULATION.shortLabel };
    for (const category of Object.values(CATEGORIES)) {
      labels[category.componentId] = category.shortLabel;
    }
    return buildFactsTable(this.store.getFacts(), this.getAllEstimations(), labels);
  }

  getWaterfallData(baseTam: number): WaterfallStep[] {
    return getWaterfallData(this.resolver, baseTam, this.currency);
  }

  generateStrategicSummary(tam: number, som: number): string {
    return generateStrategicSummary(tam, som);
  }

  assessEstimationLevel(): EstimationLevelAssessment {
    return assessEstimationLevel(this.store);
  }

  getMarketScope(): string {
    return getMarketScope(this.store);
  }
}
