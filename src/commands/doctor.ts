/**
 * Doctor Command - config, database and per-category fact coverage
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfig } from '../core/config/loader.js';
import type { Config } from '../core/config/schema.js';
import { getDatabase, closeDatabase, factsRepo } from '../core/db/database.js';
import { errorMessage } from '../core/errors.js';
import { MarketEstimationEngine, engineOptionsFromConfig } from '../estimation/engine.js';
import { CATEGORIES } from '../estimation/strategies.js';
import type { FactStore } from '../facts/types.js';

type CheckStatus = 'pass' | 'fail' | 'warn' | 'skip';

interface CheckResult {
  name: string;
  status: CheckStatus;
  message: string;
  details?: string;
}

const STATUS_LABELS: Record<CheckStatus, string> = {
  pass: chalk.green('[OK]'),
  fail: chalk.red('[FAIL]'),
  warn: chalk.yellow('[WARN]'),
  skip: chalk.gray('[SKIP]'),
};

function checkConfig(): { result: CheckResult; config: Config | null } {
  try {
    const config = getConfig();
    return {
      result: {
        name: 'Configuration',
        status: 'pass',
        message: `${config.general.name} (${config.general.environment})`,
        details: `Currency ${config.estimation.currency}, perturbation ±${config.sensitivity.perturbation * 100}%`,
      },
      config,
    };
  } catch (error) {
    return { result: { name: 'Configuration', status: 'fail', message: errorMessage(error) }, config: null };
  }
}

function checkFacts(config: Config): { result: CheckResult; store: FactStore | null } {
  try {
    getDatabase(config.database.path, { walMode: config.database.wal_mode });
    const store = factsRepo.loadStore().snapshot();
    const count = store.getFacts().length;

    return {
      result: {
        name: 'Fact store',
        status: count > 0 ? 'pass' : 'warn',
        message: config.database.path,
        details: count > 0 ? `${count} facts` : 'Empty: import facts with `msize facts import`',
      },
      store,
    };
  } catch (error) {
    return { result: { name: 'Fact store', status: 'fail', message: errorMessage(error) }, store: null };
  } finally {
    closeDatabase();
  }
}

/** Which strategy would win per category, and which bindings were approximate */
function checkCoverage(config: Config, store: FactStore): CheckResult[] {
  const engine = new MarketEstimationEngine(store, engineOptionsFromConfig(config));

  return Object.values(CATEGORIES).map((category): CheckResult => {
    const component = engine.solveCategory(category.id);
    const name = `Coverage: ${category.shortLabel}`;

    if (component.status === 'empty') {
      return { name, status: 'warn', message: component.missingDataStrategy, details: component.methodDescription };
    }

    const approximate = component.bindings.filter(binding => binding.match !== 'exact');
    return {
      name,
      status: 'pass',
      message: `Solvable with ${component.selectedStrategyName}`,
      details: approximate.length > 0
        ? `Approximate bindings: ${approximate.map(b => `${b.requestedKey} -> ${b.resolvedKey}`).join(', ')}`
        : undefined,
    };
  });
}

function runChecks(): CheckResult[] {
  const { result: configResult, config } = checkConfig();
  if (!config) {
    return [configResult, { name: 'Fact store', status: 'skip', message: 'Configuration invalid' }];
  }

  const { result: factsResult, store } = checkFacts(config);
  return [configResult, factsResult, ...(store ? checkCoverage(config, store) : [])];
}

export const doctorCommand = new Command('doctor')
  .description('Check the configuration, the fact store and which categories can be estimated')
  .action(() => {
    console.log();
    console.log(chalk.bold('msize doctor'));
    console.log('='.repeat(60));
    console.log();

    const results = runChecks();
    for (const result of results) {
      console.log(`${STATUS_LABELS[result.status]} ${result.name}`);
      console.log(`     ${chalk.gray(result.message)}`);
      if (result.details) console.log(`     ${chalk.gray(result.details)}`);
      console.log();
    }

    const count = (status: CheckStatus) => results.filter(r => r.status === status).length;
    console.log('-'.repeat(60));
    console.log(`${chalk.green(count('pass'))} passed, ${chalk.red(count('fail'))} failed, ${chalk.yellow(count('warn'))} warnings`);
    console.log();

    if (count('fail') > 0) {
      console.log(chalk.red('Fix the failed checks above.'));
      process.exitCode = 1;
    } else if (count('warn') > 0) {
      console.log(chalk.yellow('Some categories cannot be estimated yet. Add the facts listed above.'));
    } else {
      console.log(chalk.green('Every category can be estimated.'));
    }
  });
