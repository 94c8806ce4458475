// @sweeper/core - Symbol liveness analysis & iterative dead-code elimination for Java sources

export const VERSION = '0.1.0';

// Type definitions
export type {
  // Symbols
  SymbolKind,
  Modifier,
  ClassKind,
  MethodSymbol,
  FieldSymbol,
  ImportSymbol,
  ClassSymbol,
  CodeSymbol,
  // Model
  ReferenceSite,
  CallExpression,
  FileSymbols,
  ModelSnapshot,
  CodeModelProvider,
  // Config
  FieldMode,
  ClassMode,
  AnnotationEffect,
  AnnotationPolicy,
  ClassifierConfig,
  LivenessConfig,
  DriverConfig,
  ProjectConfig,
  CleanupPolicy,
  // Cleanup
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
  // Events
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
  // MCP inputs
  AnalyzeInput,
  CleanupInput,
  MarkInput,
} from './types/index.js';
export {
  describeSymbol,
  CLEANUP_CATEGORIES,
  emptyCounts,
  analyzeInputSchema,
  cleanupInputSchema,
  markInputSchema,
} from './types/index.js';

// Config
export {
  DEFAULT_CONFIG,
  DEFAULT_ANNOTATION_POLICY,
  DEFAULT_POLICY,
  policyFromConfig,
  projectConfigSchema,
  validateConfig,
  loadConfig,
  writeConfig,
  deepMerge,
  createIgnoreFilter,
} from './config/index.js';
export type { ConfigOverrides, ProjectConfigInput } from './config/index.js';

// Engine
export { EventBus } from './engine/event-bus.js';
export { CancellationToken, CancellationError } from './engine/cancellation.js';

// Java source model
export {
  JavaCodeModel,
  JavaSnapshot,
  FileSystemSourceStore,
  MemorySourceStore,
  JavaSyntaxError,
  parseJava,
  loadJavaParser,
  removeDeclaration,
} from './java/index.js';
export type { JavaCodeModelOptions, SourceStore, ParsedUnit } from './java/index.js';

// Cleanup
export {
  classify,
  createClassificationContext,
  findControllers,
  isJavaLangImport,
  LivenessAnalyzer,
  planRemovals,
  MutationApplier,
  FileMarkingCoordinator,
  CleanupDriver,
  buildSummary,
  formatSummary,
  CATEGORY_LABELS,
} from './cleanup/index.js';
export type { ClassificationContext, CleanupDriverOptions, DriverState, RunOptions } from './cleanup/index.js';

// Project wiring
export { openProject } from './project.js';
export type { Project } from './project.js';

// Memory / persistence
export { openDatabase, runMigrations, getSchemaVersion, RunStore } from './memory/index.js';

// Utils
export {
  createLogger,
  silentLogger,
  generateRunId,
  ConfigError,
  ModelReadError,
  StaleSymbolError,
  MutationError,
  CleanupInProgressError,
  DatabaseError,
  errorMessage,
} from './utils/index.js';
export type { Logger, LogLevel } from './utils/index.js';

// Constants
export {
  MAX_PASSES,
  SCOPE_MARKER,
  SUMMARY_PREVIEW_LIMIT,
  CONFIG_FILENAME,
  IGNORE_FILENAME,
  STATE_DIR,
  HISTORY_DEFAULT_LIMIT,
} from './utils/constants.js';
