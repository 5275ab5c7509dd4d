/**
 * Estimate Command - Size the market from the stored facts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { runsRepo, estimationsRepo } from '../core/db/database.js';
import { generateReport, formatAmount } from '../core/reporting/reporter.js';
import { logger } from '../core/logging/logger.js';
import { MarketSizingError, errorMessage } from '../core/errors.js';
import { isCategoryId } from '../estimation/strategies.js';
import { CATEGORY_IDS } from '../estimation/types.js';
import type { EstimationComponent, Overrides, WaterfallStep } from '../estimation/types.js';
import { collectOverride, createEngine, openWorkspace, parseOverrides } from './context.js';

interface EstimateOptions {
  override?: string[];
  best?: boolean;
  report: boolean;
}

export const estimateCommand = new Command('estimate')
  .description('Run the estimation strategies (one category, or all with triangulation)')
  .argument('[category]', 'Category to solve (macro, demand, supply)')
  .option('-o, --override <key=multiplier>', 'Scale a fact before solving (repeatable)', collectOverride)
  .option('--best', 'Only show the recommended estimate')
  .option('--no-report', 'Skip report generation')
  .action((category: string | undefined, options: EstimateOptions) => {
    const spinner = ora('Estimating market size...').start();
    let runId: string | null = null;

    try {
      const config = openWorkspace();

      if (category !== undefined && !isCategoryId(category)) {
        throw new MarketSizingError(`Unknown category: ${category} (expected ${CATEGORY_IDS.join(', ')})`, 'INVALID_CATEGORY');
      }

      const overrides: Overrides = parseOverrides(options.override);
      const engine = createEngine(config);
      const marketScope = engine.getMarketScope();
      runId = runsRepo.create('estimate', { category: category ?? 'all', overrides, marketScope });
      logger.setContext({ run_id: runId, command: 'estimate' });

      spinner.info(`Market scope: ${chalk.cyan(marketScope)}`);
      spinner.start('Estimating market size...');

      if (category !== undefined) {
        const component = engine.solveCategory(category, overrides);
        estimationsRepo.create(runId, component, { overrides });
        runsRepo.complete(runId);
        spinner.succeed('Estimation complete');

        displayComponent(component);
        if (options.report) {
          const report = generateReport({
            runId,
            command: 'estimate',
            timestamp: Date.now(),
            marketScope,
            components: [component],
            summary: { category, overrides: formatOverrides(overrides) },
          });
          console.log(`Reports: ${chalk.cyan(report.paths.join(', '))}`);
        }
        console.log();
        console.log(`Run ID: ${chalk.gray(runId)}`);
        return;
      }

      const components = engine.getAllEstimations(overrides);
      const best = engine.determineBestMethod(overrides);
      const level = engine.assessEstimationLevel();

      for (const component of components) {
        estimationsRepo.create(runId, component, { overrides });
      }
      estimationsRepo.create(runId, best, { isBest: true, overrides });

      const macro = components.find(component => component.id === 'comp_macro');
      const tam = engine.getResolver().resolveNumber('tam_global_market') ?? macro?.estimatedValue ?? null;
      const waterfall = tam !== null ? engine.getWaterfallData(tam) : [];
      const som = waterfall.length > 0 ? waterfall[waterfall.length - 1].value : null;
      const strategicSummary = tam !== null && som !== null ? engine.generateStrategicSummary(tam, som) : undefined;

      runsRepo.complete(runId);
      spinner.succeed('Estimation complete');

      if (!options.best) {
        for (const component of components) {
          displayComponent(component);
        }
      }

      console.log();
      console.log(chalk.bold('='.repeat(70)));
      console.log(chalk.bold('RECOMMENDED ESTIMATE'));
      console.log(chalk.bold('='.repeat(70)));
      console.log(`${best.name}: ${chalk.cyan(formatAmount(best.estimatedValue, best.unit))} (${best.confidence})`);
      console.log(`Estimation level: ${level.level} - ${level.method} (score ${level.confidenceScore.toFixed(2)})`);
      console.log(chalk.gray(level.explanation));

      if (!options.best && waterfall.length > 0) {
        displayWaterfall(waterfall);
      }
      if (strategicSummary) {
        console.log();
        console.log(chalk.bold('Strategic Summary'));
        console.log(strategicSummary);
      }

      if (options.report) {
        const report = generateReport({
          runId,
          command: 'estimate',
          timestamp: Date.now(),
          marketScope,
          components,
          best,
          level,
          waterfall,
          strategicSummary,
          facts: config.reporting.include_facts ? engine.getConsolidatedFactsTable() : undefined,
          summary: {
            recommended: best.name,
            value: formatAmount(best.estimatedValue, best.unit),
            confidence: best.confidence,
            overrides: formatOverrides(overrides),
          },
        });
        console.log();
        console.log(`Reports: ${chalk.cyan(report.paths.join(', '))}`);
      }

      console.log();
      console.log(`Run ID: ${chalk.gray(runId)}`);
    } catch (error) {
      if (runId) runsRepo.fail(runId, errorMessage(error));
      spinner.fail(`Estimation failed: ${errorMessage(error)}`);
      logger.error('Estimation failed', { error: errorMessage(error) });
      process.exit(1);
    }
  });

function formatOverrides(overrides: Overrides): string {
  const entries = Object.entries(overrides);
  return entries.length > 0 ? entries.map(([key, value]) => `${key} x${value}`).join(', ') : 'none';
}

function displayComponent(component: EstimationComponent): void {
  console.log();
  console.log(chalk.bold(component.name));
  console.log('-'.repeat(70));

  if (component.status === 'empty') {
    console.log(`Status:      ${chalk.gray('empty')}`);
    console.log(`Method:      ${component.methodDescription}`);
    console.log(`Missing:     ${chalk.yellow(component.missingDataStrategy || '-')}`);
    return;
  }

  console.log(`Value:       ${chalk.cyan(formatAmount(component.estimatedValue, component.unit))}`);
  console.log(`Confidence:  ${component.confidence}`);
  console.log(`Strategy:    ${component.selectedStrategyName}`);
  console.log(`Calculation: ${chalk.gray(component.calculationBreakdown)}`);
  if (component.realityScore) {
    console.log(`Friction:    ${component.realityScore}`);
  }
  for (const binding of component.bindings.filter(b => b.match !== 'exact')) {
    console.log(
      chalk.yellow(`Approximate: ${binding.requestedKey} -> ${binding.resolvedKey} (${binding.match}, ${binding.similarity.toFixed(2)})`)
    );
  }
  if (component.strategicNarrative) {
    console.log(chalk.italic(component.strategicNarrative));
  }
}

function displayWaterfall(steps: WaterfallStep[]): void {
  console.log();
  console.log(chalk.bold('TAM / SAM / SOM'));
  console.log('-'.repeat(40));
  for (const step of steps) {
    console.log(`${step.label.padEnd(32)} ${step.text}`);
  }
}
