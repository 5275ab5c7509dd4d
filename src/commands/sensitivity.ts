/**
 * Sensitivity Command - Perturb inputs and measure the impact on an estimate
 */

import { Command } from 'commander';
import fs from 'node:fs';
import chalk from 'chalk';
import ora from 'ora';
import { runsRepo, estimationsRepo, sensitivityRepo } from '../core/db/database.js';
import { generateReport, formatAmount } from '../core/reporting/reporter.js';
import { logger } from '../core/logging/logger.js';
import { MarketSizingError, errorMessage } from '../core/errors.js';
import { parseHypotheses } from '../estimation/sensitivity.js';
import type { Hypothesis, SensitivityClass, SensitivityReport } from '../estimation/types.js';
import { createEngine, openWorkspace } from './context.js';

interface SensitivityCommandOptions {
  hypotheses?: string;
  report: boolean;
}

const CLASS_COLORS: Record<SensitivityClass, (text: string) => string> = {
  CRITICAL: chalk.red,
  HIGH: chalk.yellow,
  MEDIUM: chalk.cyan,
  LOW: chalk.green,
};

export const sensitivityCommand = new Command('sensitivity')
  .description('Run a sensitivity analysis on the recommended estimate (or its best solved category) or a given component')
  .argument('[component_id]', 'Component to analyse (comp_macro, comp_demand, comp_supply, comp_tria)')
  .option('--hypotheses <file>', 'JSON array of hypotheses to perturb instead of the component inputs')
  .option('--no-report', 'Skip report generation')
  .action((componentId: string | undefined, options: SensitivityCommandOptions) => {
    const spinner = ora('Running sensitivity analysis...').start();
    let runId: string | null = null;

    try {
      const config = openWorkspace();
      const hypotheses: Hypothesis[] = options.hypotheses
        ? parseHypotheses(JSON.parse(fs.readFileSync(options.hypotheses, 'utf-8')))
        : [];

      runId = runsRepo.create('sensitivity', { component: componentId ?? 'best', hypotheses: hypotheses.length });
      logger.setContext({ run_id: runId, command: 'sensitivity' });

      const engine = createEngine(config);
      const best = engine.determineBestMethod();
      const base = componentId
        ? engine.getAllEstimations().find(component => component.id === componentId)
        : hypotheses.length > 0 ? best : engine.determineSensitivityBase();

      if (!base) {
        throw new MarketSizingError(`Unknown component: ${componentId}`, 'INVALID_COMPONENT');
      }

      spinner.text = `Perturbing inputs of ${base.name}...`;
      const report = engine.performSensitivityAnalysis(base, hypotheses);

      estimationsRepo.create(runId, base, { isBest: base.id === best.id });
      sensitivityRepo.create(runId, report);
      runsRepo.complete(runId);

      if (report.error) {
        spinner.warn(`Sensitivity unavailable: ${report.error}`);
      } else {
        spinner.succeed('Sensitivity analysis complete');
      }

      displayReport(base.name, report);

      if (options.report) {
        const files = generateReport({
          runId,
          command: 'sensitivity',
          timestamp: Date.now(),
          best: base,
          sensitivity: [report],
          summary: {
            component: base.name,
            confidence_adjusted: report.confidenceAdjusted,
            max_sensitivity_score: report.maxSensitivityScore,
          },
        });
        console.log();
        console.log(`Reports: ${chalk.cyan(files.paths.join(', '))}`);
      }

      console.log();
      console.log(`Run ID: ${chalk.gray(runId)}`);
    } catch (error) {
      if (runId) runsRepo.fail(runId, errorMessage(error));
      spinner.fail(`Sensitivity analysis failed: ${errorMessage(error)}`);
      logger.error('Sensitivity analysis failed', { error: errorMessage(error) });
      process.exit(1);
    }
  });

function displayReport(name: string, report: SensitivityReport): void {
  console.log();
  console.log(chalk.bold('='.repeat(70)));
  console.log(chalk.bold(`SENSITIVITY - ${name}`));
  console.log(chalk.bold('='.repeat(70)));

  if (report.error) {
    console.log(chalk.yellow(report.error));
    return;
  }

  console.log(`Base value:           ${chalk.cyan(formatAmount(report.baseValue))}`);
  console.log(`Adjusted confidence:  ${report.confidenceAdjusted}`);
  console.log(`Max score:            ${report.maxSensitivityScore}`);
  console.log();

  if (report.tests.length === 0) {
    console.log(chalk.gray('No numeric variable could be perturbed.'));
    console.log(chalk.gray('Pass --hypotheses <file> or a component id such as comp_demand.'));
    return;
  }

  console.log(chalk.gray(`${'Hypothesis'.padEnd(32)} ${'Low'.padStart(8)} ${'High'.padStart(8)}  Class`));
  for (const test of report.tests) {
    const color = CLASS_COLORS[test.sensitivity];
    console.log(
      `${test.hypothesis.padEnd(32)} ${`${test.lowScenario.deltaPct}%`.padStart(8)} ${`${test.highScenario.deltaPct}%`.padStart(8)}  ${color(test.sensitivity)}`
    );
  }

  if (report.mostSensitiveVariables.length > 0) {
    console.log();
    console.log(`Most sensitive: ${report.mostSensitiveVariables.join(', ')}`);
  }
}
