// packages/cli/src/utils.ts — Project, database and error helpers shared by commands

import { mkdirSync } from 'node:fs';
import { join, relative, resolve, sep } from 'node:path';

import type { EventBus, Project } from '@sweeper/core';
import { STATE_DIR, createLogger, errorMessage, loadConfig, openDatabase, openProject } from '@sweeper/core';
import chalk from 'chalk';

export function getDbPath(projectDir: string): string {
  const dbDir = join(projectDir, STATE_DIR, 'db');
  mkdirSync(dbDir, { recursive: true });
  return join(dbDir, 'sweeper.db');
}

/**
 * Run a command function with a database connection that is guaranteed to close.
 */
export async function withDatabase<T>(
  projectDir: string,
  fn: (db: ReturnType<typeof openDatabase>) => T | Promise<T>,
): Promise<T> {
  const db = openDatabase(getDbPath(projectDir));
  try {
    return await fn(db);
  } finally {
    db.close();
  }
}

/** Open the project at `path`, logging at debug level under --verbose and at the configured level otherwise. */
export function loadProject(path: string, options: { verbose?: boolean; eventBus?: EventBus } = {}): Project {
  const projectDir = resolve(path);
  const { logLevel } = loadConfig({ projectDir });
  return openProject({
    projectDir,
    eventBus: options.eventBus,
    logger: createLogger(options.verbose ? 'debug' : logLevel),
  });
}

/** Project-relative, forward-slash form of a path given on the command line. */
export function toProjectPath(projectDir: string, file: string): string {
  const rel = relative(projectDir, resolve(file));
  return sep === '/' ? rel : rel.split(sep).join('/');
}

export function printError(error: unknown): void {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exitCode = 1;
}
