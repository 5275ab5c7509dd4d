/**
 * Report Command - rebuild JSON and Markdown reports from a stored run
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { runsRepo, estimationsRepo, sensitivityRepo, type Run } from '../core/db/database.js';
import { regenerateReport } from '../core/reporting/reporter.js';
import { MarketSizingError, errorMessage } from '../core/errors.js';
import { openWorkspace } from './context.js';

interface ReportOptions {
  outDir?: string;
  print?: boolean;
}

function findRun(ref: string | undefined): Run {
  const latest = !ref || ref === 'latest';
  const run = latest ? runsRepo.getLatest() : runsRepo.findByPrefix(ref);
  if (!run) {
    throw new MarketSizingError(latest ? 'No runs recorded yet' : `Run not found: ${ref}`, 'RUN_NOT_FOUND');
  }
  return run;
}

export const reportCommand = new Command('report')
  .description('Rebuild the reports of a past estimate or sensitivity run')
  .argument('[run_id]', 'Run ID, a unique prefix of one, or "latest"', 'latest')
  .option('-o, --out-dir <dir>', 'Write the reports here instead of reporting.out_dir')
  .option('-p, --print', 'Also print the Markdown report')
  .action((ref: string, options: ReportOptions) => {
    try {
      const config = openWorkspace();
      const run = findRun(ref);

      const estimations = estimationsRepo.getByRun(run.id);
      const sensitivity = sensitivityRepo.getByRun(run.id);
      if (estimations.length === 0 && sensitivity.length === 0) {
        console.log(chalk.yellow(`Run ${run.id} (${run.status}) stored no results; the report will be empty.`));
      }

      const report = regenerateReport(run, estimations, sensitivity, options.outDir ?? config.reporting.out_dir);

      if (options.print) {
        console.log(report.markdown);
      }
      console.log(chalk.green(`[OK] Report for ${chalk.cyan(run.id)} (${run.command})`));
      for (const file of report.paths) {
        console.log(`  ${chalk.cyan(file)}`);
      }
    } catch (error) {
      console.log(chalk.red(`Error: ${errorMessage(error)}`));
      process.exitCode = 1;
    }
  });
