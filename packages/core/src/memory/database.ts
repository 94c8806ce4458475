// packages/core/src/memory/database.ts

import Database from 'better-sqlite3';
import { z } from 'zod';
import { DatabaseError, errorMessage } from '../utils/errors.js';

const SCHEMA_VERSION = '1';

const MIGRATIONS = [
  // Cleanup runs
  `CREATE TABLE IF NOT EXISTS cleanup_runs (
    id             INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id         TEXT NOT NULL UNIQUE,
    project_dir    TEXT NOT NULL,
    mode           TEXT NOT NULL CHECK(mode IN ('deprecated-controllers','marked-files')),
    outcome        TEXT NOT NULL,
    passes_run     INTEGER NOT NULL DEFAULT 0,
    total_removed  INTEGER NOT NULL DEFAULT 0,
    removed_counts TEXT NOT NULL DEFAULT '{}',
    failures       TEXT NOT NULL DEFAULT '[]',
    error          TEXT,
    duration_ms    INTEGER NOT NULL DEFAULT 0 CHECK(duration_ms >= 0),
    created_at     INTEGER NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_cleanup_runs_created ON cleanup_runs(created_at DESC)',
  'CREATE INDEX IF NOT EXISTS idx_cleanup_runs_mode ON cleanup_runs(mode)',

  // One row per removed symbol
  `CREATE TABLE IF NOT EXISTS cleanup_removals (
    id         INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id     TEXT NOT NULL REFERENCES cleanup_runs(run_id) ON DELETE CASCADE,
    pass       INTEGER NOT NULL CHECK(pass >= 1),
    category   TEXT NOT NULL,
    identity   TEXT NOT NULL,
    symbol     TEXT NOT NULL,
    file       TEXT NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_cleanup_removals_run ON cleanup_removals(run_id, pass)',

  // Schema meta
  `CREATE TABLE IF NOT EXISTS schema_meta (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )`,
];

/**
 * Open a SQLite database and run migrations.
 * Pass ':memory:' for in-memory databases (testing).
 */
export function openDatabase(dbPath: string): Database.Database {
  try {
    const db = new Database(dbPath);
    configurePragmas(db);
    runMigrations(db);
    return db;
  } catch (err) {
    throw new DatabaseError(`Failed to open database at "${dbPath}": ${errorMessage(err)}`, 'open');
  }
}

function configurePragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
}

/**
 * Run all schema migrations. Idempotent (uses IF NOT EXISTS).
 */
export function runMigrations(db: Database.Database): void {
  db.transaction(() => {
    for (const sql of MIGRATIONS) {
      db.exec(sql);
    }
    db.prepare("INSERT OR REPLACE INTO schema_meta(key, value) VALUES ('version', ?)").run(SCHEMA_VERSION);
    db.prepare("INSERT OR IGNORE INTO schema_meta(key, value) VALUES ('created_at', datetime('now'))").run();
  })();
}

const metaRowSchema = z.object({ value: z.string() });

/** Get the current schema version. */
export function getSchemaVersion(db: Database.Database): string | null {
  const row = db.prepare("SELECT value FROM schema_meta WHERE key = 'version'").get();
  const parsed = metaRowSchema.safeParse(row);
  return parsed.success ? parsed.data.value : null;
}
