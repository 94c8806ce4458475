// packages/core/src/config/defaults.ts

import type { AnnotationPolicy, CleanupPolicy, ProjectConfig } from '../types/config.js';
import { MAX_PASSES, SCOPE_MARKER } from '../utils/constants.js';

export const DEFAULT_ANNOTATION_POLICY: AnnotationPolicy = {
  Controller: 'controller',
  RestController: 'controller',
  'org.springframework.stereotype.Controller': 'controller',
  'org.springframework.web.bind.annotation.RestController': 'controller',
  Deprecated: 'deprecated',
  'java.lang.Deprecated': 'deprecated',
  RequestMapping: 'entry-point',
  GetMapping: 'entry-point',
  PostMapping: 'entry-point',
  PutMapping: 'entry-point',
  DeleteMapping: 'entry-point',
  PatchMapping: 'entry-point',
  Scheduled: 'entry-point',
  EventListener: 'entry-point',
  Bean: 'entry-point',
  PostConstruct: 'entry-point',
  Test: 'entry-point',
};

export const DEFAULT_CONFIG: ProjectConfig = {
  sourceRoots: ['.'],
  exclude: [],
  marker: SCOPE_MARKER,
  classifier: {
    fieldMode: 'non-public',
    classMode: 'empty',
    controllerNameFallback: true,
  },
  annotations: DEFAULT_ANNOTATION_POLICY,
  liveness: {
    externalSupertypesAreOverrides: true,
  },
  driver: {
    maxPasses: MAX_PASSES,
    markAffectedFiles: true,
  },
  logLevel: 'info',
};

export function policyFromConfig(config: ProjectConfig): CleanupPolicy {
  return {
    annotations: config.annotations,
    fieldMode: config.classifier.fieldMode,
    classMode: config.classifier.classMode,
    controllerNameFallback: config.classifier.controllerNameFallback,
    externalSupertypesAreOverrides: config.liveness.externalSupertypesAreOverrides,
  };
}

export const DEFAULT_POLICY: CleanupPolicy = policyFromConfig(DEFAULT_CONFIG);
