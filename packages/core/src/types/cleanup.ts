// packages/core/src/types/cleanup.ts — Analysis, plan and report shapes

import type { ClassSymbol, CodeSymbol, FieldSymbol, ImportSymbol, MethodSymbol } from './symbols.js';

export type CleanupMode = 'deprecated-controllers' | 'marked-files';

export type CleanupCategory = 'deprecated-method' | 'transitive-method' | 'import' | 'field' | 'class';

/** Removal order within a pass. */
export const CLEANUP_CATEGORIES: readonly CleanupCategory[] = [
  'deprecated-method',
  'transitive-method',
  'import',
  'field',
  'class',
];

export type CategoryCounts = Record<CleanupCategory, number>;

export function emptyCounts(): CategoryCounts {
  return { 'deprecated-method': 0, 'transitive-method': 0, import: 0, field: 0, class: 0 };
}

export interface FileFindings {
  file: string;
  imports: ImportSymbol[];
  fields: FieldSymbol[];
  classes: ClassSymbol[];
  deprecatedMethods: MethodSymbol[];
  transitiveMethods: MethodSymbol[];
}

/** Result of one read-only pass. Files without findings are omitted from `findings`. */
export interface CleanupAnalysis {
  mode: CleanupMode;
  files: string[];
  findings: FileFindings[];
  totals: CategoryCounts;
  total: number;
  /** Transitively dead method identity to the dead methods whose bodies call it. */
  deadCallers: Record<string, string[]>;
}

export interface PlannedRemoval {
  symbol: CodeSymbol;
  category: CleanupCategory;
  /** Identities that must be removed earlier in the same pass before this one may go. */
  requires: string[];
}

export interface RemovalBatch {
  items: PlannedRemoval[];
  counts: CategoryCounts;
  total: number;
}

export type ApplyResult =
  | { status: 'removed' }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; reason: string };

/** Shown to the user once, before the first mutation. */
export interface CleanupSummary {
  mode: CleanupMode;
  totals: CategoryCounts;
  total: number;
  files: string[];
  lines: string[];
}

export type ConfirmFn = (summary: CleanupSummary) => Promise<boolean> | boolean;

export type RunOutcome = 'completed' | 'nothing-to-do' | 'declined' | 'cancelled' | 'failed';

export interface RemovalFailure {
  symbol: string;
  identity: string;
  category: CleanupCategory;
  file: string;
  reason: string;
}

export interface PassSummary {
  pass: number;
  planned: number;
  removed: number;
  skipped: number;
  failed: number;
  counts: CategoryCounts;
}

export interface RemovedSymbol {
  pass: number;
  category: CleanupCategory;
  identity: string;
  symbol: string;
  file: string;
}

export interface CleanupReport {
  runId: string;
  mode: CleanupMode;
  outcome: RunOutcome;
  removedCounts: CategoryCounts;
  totalRemoved: number;
  removed: RemovedSymbol[];
  failures: RemovalFailure[];
  passesRun: number;
  passes: PassSummary[];
  markedFiles: string[];
  unmarkedFiles: string[];
  error?: string;
  durationMs: number;
}

export interface MarkedFile {
  file: string;
  marked: boolean;
}

/** A persisted run, as listed by the history. */
export interface RunRecord {
  runId: string;
  projectDir: string;
  mode: CleanupMode;
  outcome: RunOutcome;
  passesRun: number;
  totalRemoved: number;
  removedCounts: CategoryCounts;
  failures: RemovalFailure[];
  error: string | null;
  durationMs: number;
  createdAt: number;
}
