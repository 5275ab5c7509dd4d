export * from './estimation/index.js';
export * from './facts/types.js';
export { InMemoryFactStore, parseFact, parseFacts } from './facts/store.js';
export { MarketSizingError, FormulaError, ConfigError, FactValidationError } from './core/errors.js';
export { loadConfig, getConfig, clearConfigCache } from './core/config/loader.js';
export type { Config } from './core/config/schema.js';
