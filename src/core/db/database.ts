/**
 * Database Manager - SQLite with migrations
 */

import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { nanoid } from 'nanoid';
import { SCHEMA_VERSION, MIGRATIONS } from './schema.js';
import { createRunId, logger } from '../logging/logger.js';
import { CONFIDENCE_LEVELS, SOURCE_TYPES, type Confidence, type Fact, type SourceType } from '../../facts/types.js';
import { InMemoryFactStore } from '../../facts/store.js';
import { MarketSizingError } from '../errors.js';
import type { EstimationComponent, Overrides, SensitivityReport } from '../../estimation/types.js';

export type RunStatus = 'running' | 'completed' | 'failed';

export interface Run {
  id: string;
  command: string;
  status: RunStatus;
  started_at: number;
  completed_at: number | null;
  error: string | null;
  metadata: unknown | null;
}

export interface StoredEstimation {
  id: string;
  run_id: string;
  component: EstimationComponent;
  is_best: boolean;
  overrides: Overrides;
  created_at: number;
}

export interface StoredSensitivityReport {
  id: string;
  run_id: string;
  report: SensitivityReport;
  created_at: number;
}

type Row = Record<string, unknown>;

let dbInstance: Database.Database | null = null;

export function getDatabase(dbPath?: string, options: { walMode?: boolean } = {}): Database.Database {
  if (dbInstance) return dbInstance;

  const finalPath = dbPath || process.env.DATABASE_PATH || './data/market-sizing.db';
  const inMemory = finalPath === ':memory:';

  if (!inMemory) {
    const dir = path.dirname(finalPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  dbInstance = new Database(finalPath);
  if (!inMemory && options.walMode !== false) {
    dbInstance.pragma('journal_mode = WAL');
  }
  dbInstance.pragma('foreign_keys = ON');

  runMigrations(dbInstance);

  return dbInstance;
}

export function closeDatabase(): void {
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
  }
}

function runMigrations(db: Database.Database): void {
  let currentVersion = 0;
  const hasVersionTable = asRow(
    db.prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'").get()
  );
  if (hasVersionTable) {
    const row = asRow(db.prepare('SELECT MAX(version) as version FROM schema_version').get());
    currentVersion = row ? numberOr(row.version, 0) : 0;
  }

  for (let v = currentVersion + 1; v <= SCHEMA_VERSION; v++) {
    const migration = MIGRATIONS[v];
    if (migration) {
      logger.info(`Running migration to version ${v}`);
      db.exec(migration);
      db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(v);
    }
  }
}

// Repository functions

export const factsRepo = {
  /**
   * Insert a fact, or overwrite the fact sharing its (key, category).
   * An overwritten fact keeps its id and position.
   */
  upsert(fact: Fact): void {
    const db = getDatabase();
    const now = Date.now();
    db.prepare(`
      INSERT INTO facts (id, key, category, value, unit, source, source_type, confidence, notes, seq, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, (SELECT COALESCE(MAX(seq), 0) + 1 FROM facts), ?, ?)
      ON CONFLICT(key, category) DO UPDATE SET
        value = excluded.value,
        unit = excluded.unit,
        source = excluded.source,
        source_type = excluded.source_type,
        confidence = excluded.confidence,
        notes = excluded.notes,
        updated_at = excluded.updated_at
    `).run(
      fact.id,
      fact.key,
      fact.category,
      JSON.stringify(fact.value),
      fact.unit,
      fact.source,
      fact.sourceType,
      fact.confidence,
      fact.notes,
      now,
      now
    );
  },

  upsertMany(facts: Fact[]): number {
    const db = getDatabase();
    const insertAll = db.transaction((items: Fact[]) => {
      for (const fact of items) {
        factsRepo.upsert(fact);
      }
      return items.length;
    });
    return insertAll(facts);
  },

  /** Fill an empty store; refuses to mix seed data into existing facts */
  seed(facts: Fact[]): number {
    const db = getDatabase();
    const seedAll = db.transaction((items: Fact[]) => {
      const existing = factsRepo.count();
      if (existing > 0) {
        throw new MarketSizingError(`Fact store already holds ${existing} facts`, 'STORE_NOT_EMPTY', {
          context: { existing },
        });
      }
      return factsRepo.upsertMany(items);
    });
    return seedAll(facts);
  },

  getAll(): Fact[] {
    const db = getDatabase();
    const rows = db.prepare('SELECT * FROM facts ORDER BY seq ASC').all();
    return rows.map(parseFactRow);
  },

  getByCategory(category: string): Fact[] {
    const db = getDatabase();
    const rows = db.prepare('SELECT * FROM facts WHERE category = ? ORDER BY seq ASC').all(category);
    return rows.map(parseFactRow);
  },

  remove(key: string, category?: string): number {
    const db = getDatabase();
    const result = category
      ? db.prepare('DELETE FROM facts WHERE key = ? AND category = ?').run(key, category)
      : db.prepare('DELETE FROM facts WHERE key = ?').run(key);
    return result.changes;
  },

  clear(): number {
    const db = getDatabase();
    return db.prepare('DELETE FROM facts').run().changes;
  },

  count(): number {
    const db = getDatabase();
    const row = asRow(db.prepare('SELECT COUNT(*) as count FROM facts').get());
    return row ? numberOr(row.count, 0) : 0;
  },

  /** Read-only snapshot for one engine call */
  loadStore(): InMemoryFactStore {
    return new InMemoryFactStore(factsRepo.getAll());
  },
};

export const runsRepo = {
  create(command: string, metadata?: unknown): string {
    const db = getDatabase();
    const id = createRunId();
    db.prepare(`
      INSERT INTO runs (id, command, status, started_at, metadata)
      VALUES (?, ?, 'running', ?, ?)
    `).run(id, command, Date.now(), metadata ? JSON.stringify(metadata) : null);
    return id;
  },

  complete(id: string): void {
    const db = getDatabase();
    db.prepare(`
      UPDATE runs SET status = 'completed', completed_at = ? WHERE id = ?
    `).run(Date.now(), id);
  },

  fail(id: string, error: string): void {
    const db = getDatabase();
    db.prepare(`
      UPDATE runs SET status = 'failed', completed_at = ?, error = ? WHERE id = ?
    `).run(Date.now(), error, id);
  },

  getById(id: string): Run | null {
    const db = getDatabase();
    const row = asRow(db.prepare('SELECT * FROM runs WHERE id = ?').get(id));
    return row ? parseRun(row) : null;
  },

  findByPrefix(prefix: string): Run | null {
    const db = getDatabase();
    const row = asRow(
      db.prepare('SELECT * FROM runs WHERE id LIKE ? ORDER BY started_at DESC LIMIT 1').get(`${prefix}%`)
    );
    return row ? parseRun(row) : null;
  },

  getLatest(): Run | null {
    const db = getDatabase();
    const row = asRow(db.prepare('SELECT * FROM runs ORDER BY started_at DESC LIMIT 1').get());
    return row ? parseRun(row) : null;
  },
};

export const estimationsRepo = {
  create(runId: string, component: EstimationComponent, options: { isBest?: boolean; overrides?: Overrides } = {}): string {
    const db = getDatabase();
    const id = nanoid();
    db.prepare(`
      INSERT INTO estimations (id, run_id, component_id, name, status, estimated_value, unit, confidence, strategy, is_best, overrides, payload, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      runId,
      component.id,
      component.name,
      component.status,
      component.estimatedValue,
      component.unit,
      component.confidence,
      component.selectedStrategyName,
      options.isBest ? 1 : 0,
      JSON.stringify(options.overrides ?? {}),
      JSON.stringify(component),
      Date.now()
    );
    return id;
  },

  getByRun(runId: string): StoredEstimation[] {
    const db = getDatabase();
    const rows = db.prepare('SELECT * FROM estimations WHERE run_id = ? ORDER BY created_at ASC, rowid ASC').all(runId);
    return rows.map(row => parseEstimation(requireRow(row)));
  },
};

export const sensitivityRepo = {
  create(runId: string, report: SensitivityReport): string {
    const db = getDatabase();
    const id = nanoid();
    db.prepare(`
      INSERT INTO sensitivity_reports (id, run_id, component_id, confidence_adjusted, max_score, payload, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      runId,
      report.componentId,
      report.confidenceAdjusted,
      report.maxSensitivityScore,
      JSON.stringify(report),
      Date.now()
    );
    return id;
  },

  getByRun(runId: string): StoredSensitivityReport[] {
    const db = getDatabase();
    const rows = db.prepare('SELECT * FROM sensitivity_reports WHERE run_id = ? ORDER BY created_at ASC, rowid ASC').all(runId);
    return rows.map(row => {
      const r = requireRow(row);
      return {
        id: stringOr(r.id, ''),
        run_id: stringOr(r.run_id, ''),
        report: JSON.parse(stringOr(r.payload, '{}')),
        created_at: numberOr(r.created_at, 0),
      };
    });
  },
};

// Parse helpers
function asRow(value: unknown): Row | undefined {
  return typeof value === 'object' && value !== null ? Object.fromEntries(Object.entries(value)) : undefined;
}

function requireRow(value: unknown): Row {
  const row = asRow(value);
  if (!row) {
    throw new Error('Unexpected empty row');
  }
  return row;
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' ? value : fallback;
}

function nullableNumber(value: unknown): number | null {
  return typeof value === 'number' ? value : null;
}

function nullableString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function parseConfidence(value: unknown): Confidence {
  return CONFIDENCE_LEVELS.find(level => level === value) ?? 'low';
}

function parseSourceType(value: unknown): SourceType {
  return SOURCE_TYPES.find(type => type === value) ?? 'Unknown';
}

function parseRunStatus(value: unknown): RunStatus {
  return value === 'completed' || value === 'failed' ? value : 'running';
}

function parseFactRow(raw: unknown): Fact {
  const row = requireRow(raw);
  return {
    id: stringOr(row.id, ''),
    key: stringOr(row.key, ''),
    category: stringOr(row.category, ''),
    value: typeof row.value === 'string' ? JSON.parse(row.value) : null,
    unit: stringOr(row.unit, ''),
    source: stringOr(row.source, 'N/A'),
    sourceType: parseSourceType(row.source_type),
    confidence: parseConfidence(row.confidence),
    notes: stringOr(row.notes, ''),
  };
}

function parseRun(row: Row): Run {
  return {
    id: stringOr(row.id, ''),
    command: stringOr(row.command, ''),
    status: parseRunStatus(row.status),
    started_at: numberOr(row.started_at, 0),
    completed_at: nullableNumber(row.completed_at),
    error: nullableString(row.error),
    metadata: typeof row.metadata === 'string' ? JSON.parse(row.metadata) : null,
  };
}

function parseEstimation(row: Row): StoredEstimation {
  return {
    id: stringOr(row.id, ''),
    run_id: stringOr(row.run_id, ''),
    component: JSON.parse(stringOr(row.payload, '{}')),
    is_best: row.is_best === 1,
    overrides: JSON.parse(stringOr(row.overrides, '{}')),
    created_at: numberOr(row.created_at, 0),
  };
}
