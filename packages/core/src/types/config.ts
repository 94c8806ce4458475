// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';

/** `non-public`: not public, not static. `final-private`: additionally final and private. */
export type FieldMode = 'non-public' | 'final-private';

/** `empty`: no methods, fields or nested classes. `no-methods`: no methods at all. */
export type ClassMode = 'empty' | 'no-methods';

/**
 * `controller`: marks a controller class. `deprecated`: marks a method deprecated.
 * `preserve`: never removed. `entry-point`: a method invoked by a framework, never
 * removed as transitively unused.
 */
export type AnnotationEffect = 'controller' | 'deprecated' | 'preserve' | 'entry-point';

export type AnnotationPolicy = Record<string, AnnotationEffect>;

export interface ClassifierConfig {
  fieldMode: FieldMode;
  classMode: ClassMode;
  controllerNameFallback: boolean;
}

export interface LivenessConfig {
  externalSupertypesAreOverrides: boolean;
}

export interface DriverConfig {
  maxPasses: number;
  markAffectedFiles: boolean;
}

export interface ProjectConfig {
  /** Directories scanned for sources, relative to the project root. */
  sourceRoots: string[];
  /** Extra ignore patterns (gitignore syntax). */
  exclude: string[];
  marker: string;
  classifier: ClassifierConfig;
  annotations: AnnotationPolicy;
  liveness: LivenessConfig;
  driver: DriverConfig;
  logLevel: LogLevel;
}

/** Everything the classifier, analyzer and planner need to decide eligibility. */
export interface CleanupPolicy {
  annotations: AnnotationPolicy;
  fieldMode: FieldMode;
  classMode: ClassMode;
  controllerNameFallback: boolean;
  externalSupertypesAreOverrides: boolean;
}
