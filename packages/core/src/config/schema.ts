// packages/core/src/config/schema.ts

import { z } from 'zod';
import type { ProjectConfig } from '../types/config.js';
import { MAX_PASSES, SCOPE_MARKER } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_ANNOTATION_POLICY } from './defaults.js';

const annotationEffectSchema = z.enum(['controller', 'deprecated', 'preserve', 'entry-point']);

const classifierConfigSchema = z.object({
  fieldMode: z.enum(['non-public', 'final-private']).default('non-public'),
  classMode: z.enum(['empty', 'no-methods']).default('empty'),
  controllerNameFallback: z.boolean().default(true),
});

const livenessConfigSchema = z.object({
  externalSupertypesAreOverrides: z.boolean().default(true),
});

const driverConfigSchema = z.object({
  maxPasses: z.number().int().positive().max(MAX_PASSES).default(MAX_PASSES),
  markAffectedFiles: z.boolean().default(true),
});

export const projectConfigSchema = z.object({
  sourceRoots: z.array(z.string().min(1)).min(1).default(['.']),
  exclude: z.array(z.string()).default([]),
  marker: z
    .string()
    .regex(/^\/\/[^\r\n]*$/, 'Marker must be a single-line // comment')
    .default(SCOPE_MARKER),
  classifier: classifierConfigSchema.default({}),
  annotations: z.record(z.string().min(1), annotationEffectSchema).default(DEFAULT_ANNOTATION_POLICY),
  liveness: livenessConfigSchema.default({}),
  driver: driverConfigSchema.default({}),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type ProjectConfigInput = z.input<typeof projectConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): ProjectConfig {
  const result = projectConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field);
  }
  return result.data;
}
