// packages/cli/src/render.ts — Terminal rendering for cleanup events and reports

import type { CleanupEvent, CleanupReport, RunOutcome, RunRecord } from '@sweeper/core';
import { CATEGORY_LABELS, CLEANUP_CATEGORIES } from '@sweeper/core';
import chalk from 'chalk';
import ora from 'ora';

const outcomeColors: Record<RunOutcome, (text: string) => string> = {
  completed: chalk.green,
  'nothing-to-do': chalk.green,
  declined: chalk.yellow,
  cancelled: chalk.yellow,
  failed: chalk.red,
};

export function colorOutcome(outcome: RunOutcome): string {
  return outcomeColors[outcome](outcome);
}

export interface EventRenderer {
  render(event: CleanupEvent): void;
  /** Stop a spinner left running by an interrupted pass. */
  stop(): void;
}

/**
 * Renders driver events on stderr. One spinner per pass; removals and
 * failures are printed as they happen.
 */
export function createRenderer(): EventRenderer {
  let spinner: ReturnType<typeof ora> | null = null;

  function log(line: string): void {
    if (spinner) {
      spinner.clear();
      console.error(line);
      spinner.render();
    } else {
      console.error(line);
    }
  }

  return {
    render(event: CleanupEvent): void {
      switch (event.type) {
        case 'run.started':
          console.error(chalk.gray(`Cleanup ${event.runId} (${event.mode})`));
          break;

        case 'analysis.completed':
          if (event.pass === 0) {
            console.error(chalk.gray(`  ${event.candidates} candidate(s) in ${event.files} file(s)`));
          }
          break;

        case 'pass.started':
          spinner = ora({ text: `Pass ${event.pass}/${event.maxPasses}`, stream: process.stderr }).start();
          break;

        case 'item.removed':
          log(chalk.gray(`  - ${event.symbol} (${event.file})`));
          break;

        case 'item.failed':
          log(chalk.red(`  ✗ ${event.symbol} (${event.file}): ${event.reason}`));
          break;

        case 'pass.completed': {
          const text = `Pass ${event.pass}: ${event.removed} removed${event.failed > 0 ? `, ${event.failed} failed` : ''}`;
          if (spinner) {
            if (event.failed > 0) spinner.warn(text);
            else spinner.succeed(text);
            spinner = null;
          }
          break;
        }

        case 'files.marked':
          console.error(chalk.cyan(`Marked ${event.files.length} file(s) for a marked-file cleanup`));
          break;

        case 'files.unmarked':
          console.error(chalk.gray(`Unmarked ${event.files.length} file(s)`));
          break;

        case 'confirmation.requested':
        case 'run.completed':
          break;
      }
    },

    stop(): void {
      if (spinner) {
        spinner.stop();
        spinner = null;
      }
    },
  };
}

/** Plain-text report lines, without color. */
export function reportLines(report: CleanupReport): string[] {
  const lines = [
    `Run ${report.runId}: ${report.outcome}`,
    `  Removed: ${report.totalRemoved} in ${report.passesRun} pass(es)`,
  ];
  for (const category of CLEANUP_CATEGORIES) {
    const count = report.removedCounts[category];
    if (count > 0) lines.push(`    ${CATEGORY_LABELS[category]}: ${count}`);
  }
  if (report.failures.length > 0) {
    lines.push(`  Failed: ${report.failures.length}`);
    for (const failure of report.failures) {
      lines.push(`    ${failure.symbol} (${failure.file}): ${failure.reason}`);
    }
  }
  if (report.markedFiles.length > 0) lines.push(`  Marked: ${report.markedFiles.join(', ')}`);
  if (report.unmarkedFiles.length > 0) lines.push(`  Unmarked: ${report.unmarkedFiles.join(', ')}`);
  if (report.error) lines.push(`  Error: ${report.error}`);
  return lines;
}

export function printReport(report: CleanupReport): void {
  const [head, ...rest] = reportLines(report);
  console.log(chalk.bold(head.replace(report.outcome, colorOutcome(report.outcome))));
  for (const line of rest) console.log(line);
}

export function historyLines(runs: readonly RunRecord[]): string[] {
  return runs.map((run) =>
    [
      run.runId,
      run.mode.padEnd(22),
      run.outcome.padEnd(13),
      `${run.totalRemoved} removed`,
      `${run.passesRun} pass(es)`,
      new Date(run.createdAt).toISOString(),
    ].join('  '),
  );
}
