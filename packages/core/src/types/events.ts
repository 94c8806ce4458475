// packages/core/src/types/events.ts

/**
 * Progress events emitted by the cleanup driver and consumed by the CLI and
 * MCP server. Type names are dot-separated.
 */

import type { CleanupCategory, CleanupMode, CleanupReport, RunOutcome } from './cleanup.js';

export interface RunStartedEvent {
  type: 'run.started';
  runId: string;
  mode: CleanupMode;
  timestamp: string;
}

export interface AnalysisCompletedEvent {
  type: 'analysis.completed';
  runId: string;
  /** 0 for the initial read-only analysis. */
  pass: number;
  files: number;
  candidates: number;
  timestamp: string;
}

export interface ConfirmationRequestedEvent {
  type: 'confirmation.requested';
  runId: string;
  candidates: number;
  timestamp: string;
}

export interface PassStartedEvent {
  type: 'pass.started';
  runId: string;
  pass: number;
  maxPasses: number;
  timestamp: string;
}

export interface ItemRemovedEvent {
  type: 'item.removed';
  runId: string;
  pass: number;
  category: CleanupCategory;
  symbol: string;
  file: string;
  timestamp: string;
}

export interface ItemFailedEvent {
  type: 'item.failed';
  runId: string;
  pass: number;
  category: CleanupCategory;
  symbol: string;
  file: string;
  reason: string;
  timestamp: string;
}

export interface PassCompletedEvent {
  type: 'pass.completed';
  runId: string;
  pass: number;
  removed: number;
  failed: number;
  timestamp: string;
}

export interface FilesMarkedEvent {
  type: 'files.marked' | 'files.unmarked';
  runId: string;
  files: string[];
  timestamp: string;
}

export interface RunCompletedEvent {
  type: 'run.completed';
  runId: string;
  outcome: RunOutcome;
  report: CleanupReport;
  timestamp: string;
}

export type CleanupEvent =
  | RunStartedEvent
  | AnalysisCompletedEvent
  | ConfirmationRequestedEvent
  | PassStartedEvent
  | ItemRemovedEvent
  | ItemFailedEvent
  | PassCompletedEvent
  | FilesMarkedEvent
  | RunCompletedEvent;
