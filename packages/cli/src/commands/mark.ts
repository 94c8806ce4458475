// packages/cli/src/commands/mark.ts — Add, remove and list the scope marker

import chalk from 'chalk';

import type { Project } from '@sweeper/core';

import { loadProject, printError, toProjectPath } from '../utils.js';

export interface MarkOptions {
  project: string;
  verbose?: boolean;
}

export interface MarksOptions {
  json?: boolean;
  all?: boolean;
  verbose?: boolean;
}

function resolveFiles(project: Project, files: readonly string[]): string[] {
  const known = new Set(project.store.list());
  return files.map((file) => {
    const rel = toProjectPath(project.projectDir, file);
    if (!known.has(rel)) {
      throw new Error(`Not a Java source of this project: ${file}`);
    }
    return rel;
  });
}

export async function markCommand(files: string[], options: MarkOptions): Promise<void> {
  try {
    const project = loadProject(options.project, { verbose: options.verbose });
    const targets = resolveFiles(project, files);
    const changed = project.marking.mark(targets);
    console.log(chalk.green(`Marked ${changed.length} file(s)`));
    for (const file of changed) console.log(`  ${file}`);
    const already = targets.length - changed.length;
    if (already > 0) console.log(chalk.gray(`  ${already} already marked`));
  } catch (error) {
    printError(error);
  }
}

export async function unmarkCommand(files: string[], options: MarkOptions): Promise<void> {
  try {
    const project = loadProject(options.project, { verbose: options.verbose });
    const changed = project.marking.unmark(resolveFiles(project, files));
    console.log(chalk.green(`Unmarked ${changed.length} file(s)`));
    for (const file of changed) console.log(`  ${file}`);
  } catch (error) {
    printError(error);
  }
}

export async function marksCommand(path: string, options: MarksOptions): Promise<void> {
  try {
    const project = loadProject(path, { verbose: options.verbose });
    const status = project.marking.status();
    const shown = options.all ? status : status.filter((entry) => entry.marked);

    if (options.json) {
      console.log(JSON.stringify(shown, null, 2));
      return;
    }
    if (shown.length === 0) {
      console.log(chalk.gray('No marked files.'));
      return;
    }
    for (const entry of shown) {
      console.log(`${entry.marked ? chalk.green('●') : chalk.gray('○')} ${entry.file}`);
    }
  } catch (error) {
    printError(error);
  }
}
