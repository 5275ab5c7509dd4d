/**
 * Database Schema - SQL table definitions
 */

export const SCHEMA_VERSION = 1;

export const TABLES = `
-- Schema version tracking
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY,
  applied_at INTEGER NOT NULL DEFAULT (strftime('%s', 'now') * 1000)
);

-- Facts table, one row per (key, category)
CREATE TABLE IF NOT EXISTS facts (
  id TEXT PRIMARY KEY,
  key TEXT NOT NULL,
  category TEXT NOT NULL,
  value TEXT, -- JSON
  unit TEXT NOT NULL DEFAULT '',
  source TEXT NOT NULL DEFAULT 'N/A',
  source_type TEXT NOT NULL DEFAULT 'Unknown',
  confidence TEXT NOT NULL DEFAULT 'low' CHECK (confidence IN ('low', 'medium', 'high')),
  notes TEXT NOT NULL DEFAULT '',
  seq INTEGER NOT NULL,
  created_at INTEGER NOT NULL DEFAULT (strftime('%s', 'now') * 1000),
  updated_at INTEGER NOT NULL DEFAULT (strftime('%s', 'now') * 1000),
  UNIQUE (key, category)
);

CREATE INDEX IF NOT EXISTS idx_facts_key ON facts(key);
CREATE INDEX IF NOT EXISTS idx_facts_category ON facts(category);

-- Runs table
CREATE TABLE IF NOT EXISTS runs (
  id TEXT PRIMARY KEY,
  command TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('running', 'completed', 'failed')),
  started_at INTEGER NOT NULL,
  completed_at INTEGER,
  error TEXT,
  metadata TEXT -- JSON
);

CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);

-- Estimation components produced by a run
CREATE TABLE IF NOT EXISTS estimations (
  id TEXT PRIMARY KEY,
  run_id TEXT NOT NULL REFERENCES runs(id),
  component_id TEXT NOT NULL,
  name TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('empty', 'complete')),
  estimated_value REAL,
  unit TEXT NOT NULL,
  confidence TEXT NOT NULL,
  strategy TEXT NOT NULL,
  is_best INTEGER NOT NULL DEFAULT 0,
  overrides TEXT, -- JSON
  payload TEXT NOT NULL, -- JSON, full component
  created_at INTEGER NOT NULL DEFAULT (strftime('%s', 'now') * 1000)
);

CREATE INDEX IF NOT EXISTS idx_estimations_run ON estimations(run_id);

-- Sensitivity reports produced by a run
CREATE TABLE IF NOT EXISTS sensitivity_reports (
  id TEXT PRIMARY KEY,
  run_id TEXT NOT NULL REFERENCES runs(id),
  component_id TEXT NOT NULL,
  confidence_adjusted TEXT NOT NULL,
  max_score REAL NOT NULL DEFAULT 0,
  payload TEXT NOT NULL, -- JSON, full report
  created_at INTEGER NOT NULL DEFAULT (strftime('%s', 'now') * 1000)
);

CREATE INDEX IF NOT EXISTS idx_sensitivity_run ON sensitivity_reports(run_id);
`;

export const MIGRATIONS: Record<number, string> = {
  1: TABLES,
};
