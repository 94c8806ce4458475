// packages/core/src/cleanup/index.ts — barrel export

export {
  annotationEffects,
  classify,
  createClassificationContext,
  findControllers,
  hasEffect,
  isControllerClass,
  isDeprecatedMethod,
  isJavaLangImport,
  isTransitivelyRemovable,
} from './classifier.js';
export type { ClassificationContext } from './classifier.js';

export { LivenessAnalyzer } from './liveness.js';
export { planRemovals, isExcluded } from './planner.js';
export { MutationApplier } from './applier.js';
export { FileMarkingCoordinator } from './marking.js';
export { CleanupDriver } from './driver.js';
export type { CleanupDriverOptions, DriverState, RunOptions } from './driver.js';
export { buildSummary, formatSummary, CATEGORY_LABELS } from './summary.js';
