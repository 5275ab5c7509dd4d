/**
 * Init Command - scaffold a workspace for market sizing
 *
 * Writes the config and .env.example, then creates the directories and the
 * database at the locations the freshly written config resolves to.
 */

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { DEFAULT_CONFIG_FILE, clearConfigCache, generateDefaultConfig, loadConfig } from '../core/config/loader.js';
import { getDatabase, closeDatabase } from '../core/db/database.js';
import { errorMessage } from '../core/errors.js';

interface InitOptions {
  force?: boolean;
}

const ENV_EXAMPLE = `# Alternative configuration file
# MSIZE_CONFIG=./${DEFAULT_CONFIG_FILE}

# Overrides for database.path, reporting.out_dir and logging.level
# DATABASE_PATH=./data/market-sizing.db
# REPORTS_DIR=./reports
# LOG_LEVEL=debug
`;

function writeScaffold(spinner: Ora, file: string, content: string, force: boolean): void {
  const label = path.basename(file);
  if (fs.existsSync(file) && !force) {
    spinner.info(`${label} already exists (use --force to overwrite)`);
    return;
  }
  fs.writeFileSync(file, content);
  spinner.succeed(`Created ${chalk.cyan(label)}`);
}

function ensureDirectory(spinner: Ora, dir: string): void {
  if (fs.existsSync(dir)) return;
  fs.mkdirSync(dir, { recursive: true });
  spinner.succeed(`Created ${chalk.cyan(path.relative(process.cwd(), dir) + '/')}`);
}

export const initCommand = new Command('init')
  .description('Create a config file, the data directories and the database')
  .option('-f, --force', 'Overwrite existing files')
  .action((options: InitOptions) => {
    const spinner = ora('Scaffolding workspace...').start();
    const force = options.force ?? false;

    try {
      const configPath = path.resolve(DEFAULT_CONFIG_FILE);
      writeScaffold(spinner, configPath, generateDefaultConfig(), force);
      writeScaffold(spinner, path.resolve('.env.example'), ENV_EXAMPLE, force);

      // An existing config may point the data elsewhere
      clearConfigCache();
      const config = loadConfig(configPath);
      const dbPath = path.resolve(config.database.path);

      ensureDirectory(spinner, path.dirname(dbPath));
      ensureDirectory(spinner, path.resolve(config.reporting.out_dir));
      if (config.logging.file) {
        ensureDirectory(spinner, path.dirname(path.resolve(config.logging.file)));
      }

      spinner.start('Creating database tables...');
      getDatabase(dbPath);
      closeDatabase();
      spinner.succeed(`Database ready at ${chalk.cyan(dbPath)}`);

      console.log();
      console.log(chalk.green('[OK] Workspace ready'));
      console.log();
      console.log('Next steps:');
      console.log(`  1. Set the currency and friction policy in ${chalk.cyan(DEFAULT_CONFIG_FILE)}`);
      console.log(`  2. ${chalk.cyan('msize facts import <file.json>')} to load facts`);
      console.log(`  3. ${chalk.cyan('msize doctor')} to see which strategies the facts cover`);
      console.log(`  4. ${chalk.cyan('msize estimate')} to size the market`);
    } catch (error) {
      spinner.fail(`Init failed: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  });
