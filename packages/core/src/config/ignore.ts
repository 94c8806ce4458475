// packages/core/src/config/ignore.ts — .gitignore + .sweeperignore aware file filtering

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import ignoreModule, { type Ignore } from 'ignore';
import { IGNORE_FILENAME, STATE_DIR } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const BUILTIN_IGNORES = [
  '.git',
  '.idea',
  '.gradle',
  '.mvn',
  'node_modules',
  'build',
  'target',
  'out',
  'bin',
  STATE_DIR,
];

type IgnoreFactory = () => Ignore;

function isIgnoreFactory(value: unknown): value is IgnoreFactory {
  return typeof value === 'function';
}

// `ignore` is CommonJS; the factory is module.exports and module.exports.default.
function ignoreFactory(): IgnoreFactory {
  const mod: unknown = ignoreModule;
  if (isIgnoreFactory(mod)) return mod;
  if (typeof mod === 'object' && mod !== null && 'default' in mod && isIgnoreFactory(mod.default)) {
    return mod.default;
  }
  throw new ConfigError('The ignore module did not export a factory');
}

/**
 * Load and compile all ignore patterns into a single matcher.
 * Precedence: builtins -> .gitignore -> .sweeperignore -> extra patterns
 */
export function createIgnoreFilter(
  projectDir: string,
  options?: { skipGitignore?: boolean; extra?: readonly string[] },
): Ignore {
  const ig = ignoreFactory()();

  ig.add(BUILTIN_IGNORES);

  if (!options?.skipGitignore) {
    const gitignorePath = join(projectDir, '.gitignore');
    if (existsSync(gitignorePath)) {
      ig.add(readFileSync(gitignorePath, 'utf-8'));
    }
  }

  // .sweeperignore can re-include what builtins or .gitignore excluded
  const projectIgnorePath = join(projectDir, IGNORE_FILENAME);
  if (existsSync(projectIgnorePath)) {
    ig.add(readFileSync(projectIgnorePath, 'utf-8'));
  }

  if (options?.extra && options.extra.length > 0) {
    ig.add([...options.extra]);
  }

  return ig;
}
