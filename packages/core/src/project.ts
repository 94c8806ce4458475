// packages/core/src/project.ts — Wires config, source store, model, marking and driver for one project root

import { resolve } from 'node:path';
import { CleanupDriver } from './cleanup/driver.js';
import { FileMarkingCoordinator } from './cleanup/marking.js';
import { policyFromConfig } from './config/defaults.js';
import { createIgnoreFilter } from './config/ignore.js';
import { loadConfig, type ConfigOverrides } from './config/loader.js';
import type { EventBus } from './engine/event-bus.js';
import { JavaCodeModel } from './java/java-model.js';
import { FileSystemSourceStore } from './java/source-store.js';
import type { ProjectConfig } from './types/config.js';
import { silentLogger, type Logger } from './utils/logger.js';

export interface Project {
  projectDir: string;
  config: ProjectConfig;
  store: FileSystemSourceStore;
  model: JavaCodeModel;
  marking: FileMarkingCoordinator;
  driver: CleanupDriver;
}

export function openProject(options: {
  projectDir: string;
  overrides?: ConfigOverrides;
  eventBus?: EventBus;
  logger?: Logger;
}): Project {
  const projectDir = resolve(options.projectDir);
  const logger = options.logger ?? silentLogger;
  const config = loadConfig({ projectDir, overrides: options.overrides });

  const store = new FileSystemSourceStore(projectDir, {
    sourceRoots: config.sourceRoots,
    ignore: createIgnoreFilter(projectDir, { extra: config.exclude }),
  });
  const model = new JavaCodeModel(store, {
    externalSupertypesAreOverrides: config.liveness.externalSupertypesAreOverrides,
    logger,
  });
  const marking = new FileMarkingCoordinator(store, config.marker);
  const driver = new CleanupDriver({
    provider: model,
    marking,
    policy: policyFromConfig(config),
    maxPasses: config.driver.maxPasses,
    markAffectedFiles: config.driver.markAffectedFiles,
    eventBus: options.eventBus,
    logger,
  });

  return { projectDir, config, store, model, marking, driver };
}
