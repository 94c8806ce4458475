// packages/core/src/memory/run-store.ts — CRUD for cleanup_runs + cleanup_removals

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { CleanupMode, CleanupReport, RemovedSymbol, RunRecord } from '../types/cleanup.js';
import { DatabaseError, errorMessage } from '../utils/errors.js';

const categorySchema = z.enum(['deprecated-method', 'transitive-method', 'import', 'field', 'class']);

const countsSchema = z.object({
  'deprecated-method': z.number(),
  'transitive-method': z.number(),
  import: z.number(),
  field: z.number(),
  class: z.number(),
});

const failuresSchema = z.array(
  z.object({
    symbol: z.string(),
    identity: z.string(),
    category: categorySchema,
    file: z.string(),
    reason: z.string(),
  }),
);

const runRowSchema = z.object({
  run_id: z.string(),
  project_dir: z.string(),
  mode: z.enum(['deprecated-controllers', 'marked-files']),
  outcome: z.enum(['completed', 'nothing-to-do', 'declined', 'cancelled', 'failed']),
  passes_run: z.number(),
  total_removed: z.number(),
  removed_counts: z.string(),
  failures: z.string(),
  error: z.string().nullable(),
  duration_ms: z.number(),
  created_at: z.number(),
});

const removalRowSchema = z.object({
  pass: z.number(),
  category: categorySchema,
  identity: z.string(),
  symbol: z.string(),
  file: z.string(),
});

function parseJson<T>(schema: z.ZodType<T>, text: string, column: string): T {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new DatabaseError(`Corrupt ${column} column: ${errorMessage(err)}`, 'read');
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw new DatabaseError(`Corrupt ${column} column: ${parsed.error.message}`, 'read');
  return parsed.data;
}

function toRecord(row: unknown): RunRecord {
  const parsed = runRowSchema.safeParse(row);
  if (!parsed.success) throw new DatabaseError(`Unexpected cleanup_runs row: ${parsed.error.message}`, 'read');
  const r = parsed.data;
  return {
    runId: r.run_id,
    projectDir: r.project_dir,
    mode: r.mode,
    outcome: r.outcome,
    passesRun: r.passes_run,
    totalRemoved: r.total_removed,
    removedCounts: parseJson(countsSchema, r.removed_counts, 'removed_counts'),
    failures: parseJson(failuresSchema, r.failures, 'failures'),
    error: r.error,
    durationMs: r.duration_ms,
    createdAt: r.created_at,
  };
}

export class RunStore {
  constructor(private db: Database.Database) {}

  /** Persist a finished run and everything it removed, atomically. */
  record(report: CleanupReport, projectDir: string, createdAt = Date.now()): void {
    this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO cleanup_runs (run_id, project_dir, mode, outcome, passes_run, total_removed, removed_counts, failures, error, duration_ms, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          report.runId,
          projectDir,
          report.mode,
          report.outcome,
          report.passesRun,
          report.totalRemoved,
          JSON.stringify(report.removedCounts),
          JSON.stringify(report.failures),
          report.error ?? null,
          report.durationMs,
          createdAt,
        );

      const insertRemoval = this.db.prepare(
        'INSERT INTO cleanup_removals (run_id, pass, category, identity, symbol, file) VALUES (?, ?, ?, ?, ?, ?)',
      );
      for (const removed of report.removed) {
        insertRemoval.run(report.runId, removed.pass, removed.category, removed.identity, removed.symbol, removed.file);
      }
    })();
  }

  get(runId: string): RunRecord | null {
    const row = this.db.prepare('SELECT * FROM cleanup_runs WHERE run_id = ?').get(runId);
    return row === undefined ? null : toRecord(row);
  }

  /** Newest first. */
  list(filter?: { mode?: CleanupMode; limit?: number }): RunRecord[] {
    let sql = 'SELECT * FROM cleanup_runs WHERE 1=1';
    const params: (string | number)[] = [];
    if (filter?.mode) {
      sql += ' AND mode = ?';
      params.push(filter.mode);
    }
    sql += ' ORDER BY created_at DESC, id DESC';
    if (filter?.limit) {
      sql += ' LIMIT ?';
      params.push(filter.limit);
    }
    return this.db.prepare(sql).all(...params).map(toRecord);
  }

  getRemovals(runId: string): RemovedSymbol[] {
    const rows = this.db
      .prepare('SELECT pass, category, identity, symbol, file FROM cleanup_removals WHERE run_id = ? ORDER BY id ASC')
      .all(runId);
    return rows.map((row) => {
      const parsed = removalRowSchema.safeParse(row);
      if (!parsed.success) throw new DatabaseError(`Unexpected cleanup_removals row: ${parsed.error.message}`, 'read');
      return parsed.data;
    });
  }
}
