// packages/core/src/config/loader.ts

import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ProjectConfig } from '../types/config.js';
import { CONFIG_FILENAME, STATE_DIR } from '../utils/constants.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

type PlainObject = Record<string, unknown>;

export type ConfigOverrides = {
  [K in keyof ProjectConfig]?: ProjectConfig[K] extends unknown[]
    ? ProjectConfig[K]
    : ProjectConfig[K] extends object
      ? Partial<ProjectConfig[K]>
      : ProjectConfig[K];
};

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged. Undefined source values are skipped.
 */
function deepMerge(target: object, source: object): PlainObject {
  const result: PlainObject = Object.fromEntries(Object.entries(target));
  for (const [key, srcVal] of Object.entries(source)) {
    if (srcVal === undefined) continue;
    const tgtVal = result[key];
    result[key] = isPlainObject(srcVal) && isPlainObject(tgtVal) ? deepMerge(tgtVal, srcVal) : srcVal;
  }
  return result;
}

/**
 * Load config with precedence: overrides > .sweeper.yml > defaults.
 */
export function loadConfig(options?: {
  projectDir?: string;
  overrides?: ConfigOverrides;
  skipFile?: boolean;
}): ProjectConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged: PlainObject = deepMerge(structuredClone(DEFAULT_CONFIG), {});

  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${CONFIG_FILENAME}: ${errorMessage(err)}`);
    }
    if (isPlainObject(fileConfig)) {
      merged = deepMerge(merged, fileConfig);
    } else if (fileConfig !== null && fileConfig !== undefined) {
      throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping at the top level`);
    }
  }

  if (options?.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  return validateConfig(merged);
}

/**
 * Write a ProjectConfig to .sweeper.yml in the given directory.
 * Also creates .sweeper/db/ and keeps .sweeper/ out of git.
 */
export function writeConfig(config: ProjectConfig, dir: string): string {
  const configPath = join(dir, CONFIG_FILENAME);
  writeFileSync(configPath, stringifyYaml(config, { lineWidth: 100 }), 'utf-8');

  mkdirSync(join(dir, STATE_DIR, 'db'), { recursive: true });

  const gitignorePath = join(dir, '.gitignore');
  if (existsSync(gitignorePath)) {
    const content = readFileSync(gitignorePath, 'utf-8');
    if (!content.includes(`${STATE_DIR}/`)) {
      appendFileSync(gitignorePath, `\n${STATE_DIR}/\n`);
    }
  } else {
    writeFileSync(gitignorePath, `${STATE_DIR}/\n`, 'utf-8');
  }
  return configPath;
}

export { deepMerge };
