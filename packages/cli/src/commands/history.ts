// packages/cli/src/commands/history.ts — Past cleanup runs recorded in the project database

import { resolve } from 'node:path';

import type { CleanupMode } from '@sweeper/core';
import { RunStore } from '@sweeper/core';
import chalk from 'chalk';

import { historyLines } from '../render.js';
import { printError, withDatabase } from '../utils.js';

export interface HistoryOptions {
  limit: number;
  mode?: 'deprecated' | 'marked';
  json?: boolean;
}

const MODES: Record<'deprecated' | 'marked', CleanupMode> = {
  deprecated: 'deprecated-controllers',
  marked: 'marked-files',
};

export async function historyCommand(path: string, options: HistoryOptions): Promise<void> {
  try {
    const projectDir = resolve(path);
    const runs = await withDatabase(projectDir, (db) =>
      new RunStore(db).list({ limit: options.limit, mode: options.mode ? MODES[options.mode] : undefined }),
    );

    if (options.json) {
      console.log(JSON.stringify(runs, null, 2));
      return;
    }
    if (runs.length === 0) {
      console.log(chalk.gray('No cleanup runs yet.'));
      return;
    }
    for (const line of historyLines(runs)) console.log(line);
  } catch (error) {
    printError(error);
  }
}
