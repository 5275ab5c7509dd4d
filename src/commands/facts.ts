/**
 * Facts Command - Manage the fact store
 */

import { Command } from 'commander';
import fs from 'node:fs';
import chalk from 'chalk';
import ora from 'ora';
import { factsRepo } from '../core/db/database.js';
import { errorMessage } from '../core/errors.js';
import { logger } from '../core/logging/logger.js';
import { parseFact, parseFacts } from '../facts/store.js';
import { getMarketScope, marketScopeFact } from '../facts/context.js';
import { seedFacts } from '../facts/seed.js';
import type { Fact, FactValue } from '../facts/types.js';
import { createEngine, openWorkspace } from './context.js';

interface AddOptions {
  category: string;
  unit?: string;
  source?: string;
  type?: string;
  confidence: string;
  notes?: string;
}

interface ListOptions {
  category?: string;
  json?: boolean;
}

/** JSON literal when it parses (numbers, lists, objects), raw text otherwise */
export function parseValueArgument(raw: string): FactValue {
  try {
    const parsed: FactValue = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}

function formatValue(fact: Fact): string {
  const text = typeof fact.value === 'number'
    ? fact.value.toLocaleString('en-US')
    : typeof fact.value === 'string' ? fact.value : JSON.stringify(fact.value);
  return fact.unit ? `${text} ${fact.unit}` : text;
}

function colorConfidence(confidence: string): string {
  const label = confidence.toUpperCase();
  if (confidence === 'high') return chalk.green(label);
  if (confidence === 'medium') return chalk.yellow(label);
  return chalk.red(label);
}

const addCommand = new Command('add')
  .description('Add a fact, or overwrite the fact with the same key and category')
  .argument('<key>', 'Fact key (e.g. average_price)')
  .argument('<value>', 'Value (number, JSON or text)')
  .option('-c, --category <category>', 'Fact category', 'market_estimation')
  .option('-u, --unit <unit>', 'Unit')
  .option('-s, --source <source>', 'Source of the figure')
  .option('-t, --type <type>', 'Source type (Primary, Secondary, Proxy, Estimate, Internal)')
  .option('--confidence <level>', 'Confidence (low, medium, high)', 'low')
  .option('--notes <notes>', 'Free-text notes')
  .action((key: string, value: string, options: AddOptions) => {
    try {
      openWorkspace();
      const fact = parseFact({
        key,
        value: parseValueArgument(value),
        category: options.category,
        unit: options.unit,
        source: options.source,
        source_type: options.type,
        confidence: options.confidence,
        notes: options.notes,
      });
      factsRepo.upsert(fact);
      logger.debug('Fact stored', { key: fact.key, category: fact.category });
      console.log(`${chalk.green('[OK]')} ${chalk.cyan(fact.key)} = ${formatValue(fact)} (${fact.category})`);
    } catch (error) {
      console.log(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

const listCommand = new Command('list')
  .description('List stored facts')
  .option('-c, --category <category>', 'Only facts of this category')
  .option('--json', 'Print as JSON')
  .action((options: ListOptions) => {
    try {
      openWorkspace();
      const facts = options.category ? factsRepo.getByCategory(options.category) : factsRepo.getAll();

      if (options.json) {
        console.log(JSON.stringify(facts, null, 2));
        return;
      }

      if (facts.length === 0) {
        console.log(chalk.yellow('No facts stored. Run `msize facts import <file>` or `msize facts add`.'));
        return;
      }

      console.log();
      console.log(chalk.bold(`Facts (${facts.length})`));
      console.log('-'.repeat(90));
      for (const fact of facts) {
        console.log(
          `${fact.key.padEnd(32)} ${formatValue(fact).padEnd(24)} ${colorConfidence(fact.confidence).padEnd(16)} ${chalk.gray(fact.sourceType)} ${chalk.gray(fact.category)}`
        );
      }
      console.log();
    } catch (error) {
      console.log(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

const importCommand = new Command('import')
  .description('Import facts from a JSON array of fact documents')
  .argument('<file>', 'Path to the JSON file')
  .option('--replace', 'Clear the store before importing')
  .action((file: string, options: { replace?: boolean }) => {
    const spinner = ora(`Importing facts from ${file}...`).start();

    try {
      openWorkspace();
      const facts = parseFacts(JSON.parse(fs.readFileSync(file, 'utf-8')));

      if (options.replace) {
        const removed = factsRepo.clear();
        logger.info('Fact store cleared before import', { removed });
      }

      const count = factsRepo.upsertMany(facts);
      spinner.succeed(`Imported ${count} facts (${factsRepo.count()} in store)`);
    } catch (error) {
      spinner.fail(`Import failed: ${errorMessage(error)}`);
      logger.error('Fact import failed', { file, error: errorMessage(error) });
      process.exit(1);
    }
  });

const removeCommand = new Command('remove')
  .description('Remove a fact by key')
  .argument('<key>', 'Fact key')
  .option('-c, --category <category>', 'Only remove the fact of this category')
  .action((key: string, options: { category?: string }) => {
    try {
      openWorkspace();
      const removed = factsRepo.remove(key, options.category);
      if (removed === 0) {
        console.log(chalk.yellow(`No fact found for ${key}`));
        return;
      }
      console.log(`${chalk.green('[OK]')} Removed ${removed} fact(s) for ${chalk.cyan(key)}`);
    } catch (error) {
      console.log(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

const clearCommand = new Command('clear')
  .description('Remove every fact')
  .option('-y, --yes', 'Confirm the deletion')
  .action((options: { yes?: boolean }) => {
    try {
      if (!options.yes) {
        console.log(chalk.yellow('This removes every stored fact. Re-run with --yes to confirm.'));
        process.exit(1);
      }
      openWorkspace();
      const removed = factsRepo.clear();
      console.log(`${chalk.green('[OK]')} Removed ${removed} facts`);
    } catch (error) {
      console.log(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

const tableCommand = new Command('table')
  .description('Show every fact with the estimation components that use it')
  .action(() => {
    try {
      const config = openWorkspace();
      const rows = createEngine(config).getConsolidatedFactsTable();

      if (rows.length === 0) {
        console.log(chalk.yellow('No facts stored.'));
        return;
      }

      console.log();
      console.log(chalk.bold('Consolidated Facts'));
      console.log('-'.repeat(100));
      console.log(chalk.gray(`${'Variable'.padEnd(30)} ${'Value'.padEnd(24)} ${'Type'.padEnd(10)} ${'Conf.'.padEnd(7)} Used In`));
      for (const row of rows) {
        const usedIn = row.usedIn === '-' ? chalk.gray('-') : chalk.cyan(row.usedIn);
        console.log(
          `${row.variable.padEnd(30)} ${row.value.padEnd(24)} ${row.sourceType.padEnd(10)} ${row.confidence.padEnd(7)} ${usedIn}`
        );
      }
      console.log();
    } catch (error) {
      console.log(chalk.red(`Error: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

const scopeCommand = new Command('scope')
  .description('Show the market scope, or set it when a description is given')
  .argument('[description...]', 'New scope, e.g. "ERP software for SMEs in France"')
  .action((words: string[]) => {
    try {
      openWorkspace();
      const description = words.join(' ').trim();
      if (description) {
        factsRepo.upsert(marketScopeFact(description));
      }
      console.log(`Market scope: ${chalk.cyan(getMarketScope(factsRepo.loadStore()))}`);
    } catch (error) {
      console.log(chalk.red(`Error: ${errorMessage(error)}`));
      process.exitCode = 1;
    }
  });

const seedCommand = new Command('seed')
  .description('Fill an empty store with a demo fact set')
  .action(() => {
    const spinner = ora('Seeding demo facts...').start();
    try {
      openWorkspace();
      const count = factsRepo.seed(seedFacts());
      spinner.succeed(`Seeded ${count} facts. Try ${chalk.cyan('msize estimate')}`);
    } catch (error) {
      spinner.fail(`Seed failed: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  });

export const factsCommand = new Command('facts')
  .description('Manage market facts')
  .addCommand(addCommand)
  .addCommand(listCommand)
  .addCommand(importCommand)
  .addCommand(removeCommand)
  .addCommand(clearCommand)
  .addCommand(tableCommand)
  .addCommand(scopeCommand)
  .addCommand(seedCommand);
