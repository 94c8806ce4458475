// packages/core/src/types/index.ts -- barrel re-export

export type {
  SymbolKind,
  Modifier,
  ClassKind,
  MethodSymbol,
  FieldSymbol,
  ImportSymbol,
  ClassSymbol,
  CodeSymbol,
} from './symbols.js';
export { describeSymbol } from './symbols.js';

export type {
  ReferenceSite,
  CallExpression,
  FileSymbols,
  ModelSnapshot,
  CodeModelProvider,
} from './model.js';

export type {
  FieldMode,
  ClassMode,
  AnnotationEffect,
  AnnotationPolicy,
  ClassifierConfig,
  LivenessConfig,
  DriverConfig,
  ProjectConfig,
  CleanupPolicy,
} from './config.js';

export type {
  CleanupMode,
  CleanupCategory,
  CategoryCounts,
  FileFindings,
  CleanupAnalysis,
  PlannedRemoval,
  RemovalBatch,
  ApplyResult,
  CleanupSummary,
  ConfirmFn,
  RunOutcome,
  RemovalFailure,
  PassSummary,
  RemovedSymbol,
  CleanupReport,
  MarkedFile,
  RunRecord,
} from './cleanup.js';
export { CLEANUP_CATEGORIES, emptyCounts } from './cleanup.js';

export type {
  RunStartedEvent,
  AnalysisCompletedEvent,
  ConfirmationRequestedEvent,
  PassStartedEvent,
  ItemRemovedEvent,
  ItemFailedEvent,
  PassCompletedEvent,
  FilesMarkedEvent,
  RunCompletedEvent,
  CleanupEvent,
} from './events.js';

export { analyzeInputSchema, cleanupInputSchema, markInputSchema } from './mcp.js';
export type { AnalyzeInput, CleanupInput, MarkInput } from './mcp.js';
