/**
 * Shared command setup
 */

import { getConfig } from '../core/config/loader.js';
import type { Config } from '../core/config/schema.js';
import { getDatabase, factsRepo } from '../core/db/database.js';
import { configureLogger } from '../core/logging/logger.js';
import { MarketSizingError } from '../core/errors.js';
import { MarketEstimationEngine, engineOptionsFromConfig } from '../estimation/engine.js';
import type { Overrides } from '../estimation/types.js';

export function openWorkspace(): Config {
  const config = getConfig();
  configureLogger({
    level: config.logging.level,
    format: config.logging.format,
    file: config.logging.file,
  });
  getDatabase(config.database.path, { walMode: config.database.wal_mode });
  return config;
}

/** Engine over a frozen snapshot of the stored facts */
export function createEngine(config: Config): MarketEstimationEngine {
  return new MarketEstimationEngine(factsRepo.loadStore().snapshot(), engineOptionsFromConfig(config));
}

/** Commander collector for repeatable `--override key=multiplier` */
export function collectOverride(entry: string, previous: string[] = []): string[] {
  return [...previous, entry];
}

export function parseOverrides(entries: readonly string[] = []): Overrides {
  const overrides: Record<string, number> = {};
  for (const entry of entries) {
    const separator = entry.indexOf('=');
    const key = separator >= 0 ? entry.slice(0, separator).trim() : '';
    // Everything after the first '=' must be the number
    const raw = separator >= 0 ? entry.slice(separator + 1).trim() : '';
    const multiplier = Number(raw);
    if (!key || raw === '' || !Number.isFinite(multiplier)) {
      throw new MarketSizingError(`Invalid override "${entry}" (expected key=multiplier)`, 'INVALID_OVERRIDE', {
        context: { entry },
      });
    }
    overrides[key] = multiplier;
  }
  return overrides;
}
