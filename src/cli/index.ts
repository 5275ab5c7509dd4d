#!/usr/bin/env node

/**
 * msize - market sizing from a store of heterogeneous facts
 */

import { Command } from 'commander';
import { clearConfigCache, loadConfig } from '../core/config/loader.js';
import {
  initCommand,
  factsCommand,
  estimateCommand,
  sensitivityCommand,
  reportCommand,
  doctorCommand,
} from '../commands/index.js';

const program = new Command('msize')
  .description('Size a market from stored facts using top-down, demand-led and supply-led strategies')
  .version('1.0.0')
  .option('-c, --config <path>', 'Config file to use instead of msize.config.yaml')
  .hook('preAction', (root: Command) => {
    const { config } = root.opts<{ config?: string }>();
    if (config) {
      // Commands read the cached config, so prime it with the chosen file
      clearConfigCache();
      loadConfig(config);
    }
  });

for (const command of [initCommand, factsCommand, estimateCommand, sensitivityCommand, reportCommand, doctorCommand]) {
  program.addCommand(command);
}

program.parse();
