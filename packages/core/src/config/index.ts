// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_CONFIG, DEFAULT_ANNOTATION_POLICY, DEFAULT_POLICY, policyFromConfig } from './defaults.js';
export { projectConfigSchema, validateConfig } from './schema.js';
export type { ProjectConfigInput } from './schema.js';
export { loadConfig, writeConfig, deepMerge } from './loader.js';
export type { ConfigOverrides } from './loader.js';
export { createIgnoreFilter } from './ignore.js';
