// packages/cli/src/commands/cleanup.ts — Deprecated-controller and marked-file cleanup runs

import { writeFileSync } from 'node:fs';

import type { CleanupMode, CleanupReport, CleanupSummary, ConfirmFn } from '@sweeper/core';
import { CancellationToken, EventBus, RunStore, formatSummary } from '@sweeper/core';
import chalk from 'chalk';

import { printReport, createRenderer } from '../render.js';
import { loadProject, printError, toProjectPath, withDatabase } from '../utils.js';

export interface CleanupOptions {
  yes?: boolean;
  scope?: string[];
  output?: string;
  verbose?: boolean;
}

function acceptWithoutPrompt(summary: CleanupSummary): boolean {
  console.error(formatSummary(summary));
  return true;
}

async function runCleanup(mode: CleanupMode, path: string, options: CleanupOptions): Promise<void> {
  const eventBus = new EventBus();
  const renderer = createRenderer();
  eventBus.on('event', renderer.render);

  const project = loadProject(path, { verbose: options.verbose, eventBus });
  const confirm: ConfirmFn = options.yes
    ? acceptWithoutPrompt
    : async (summary) => (await import('../prompts.js')).confirmCleanup(summary);

  // Ctrl+C lets the current pass finish, then stops.
  const cancellation = new CancellationToken();
  const onInterrupt = (): void => {
    console.error(chalk.yellow('\nStopping after the current pass...'));
    cancellation.cancel();
  };
  process.once('SIGINT', onInterrupt);

  let report: CleanupReport;
  try {
    report =
      mode === 'marked-files'
        ? await project.driver.runMarkedFileCleanup({ confirm, cancellation })
        : await project.driver.runDeprecatedControllerCleanup({
            confirm,
            cancellation,
            scope: options.scope?.map((file) => toProjectPath(project.projectDir, file)),
          });
  } finally {
    process.off('SIGINT', onInterrupt);
    renderer.stop();
  }

  await withDatabase(project.projectDir, (db) => new RunStore(db).record(report, project.projectDir));
  if (options.output) {
    writeFileSync(options.output, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
  }

  printReport(report);
  if (report.outcome === 'failed') process.exitCode = 1;
}

export async function deprecatedCommand(path: string, options: CleanupOptions): Promise<void> {
  try {
    await runCleanup('deprecated-controllers', path, options);
  } catch (error) {
    printError(error);
  }
}

export async function markedCommand(path: string, options: CleanupOptions): Promise<void> {
  try {
    await runCleanup('marked-files', path, options);
  } catch (error) {
    printError(error);
  }
}
