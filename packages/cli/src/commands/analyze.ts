// packages/cli/src/commands/analyze.ts — Read-only analysis: what a cleanup would remove

import type { CleanupAnalysis } from '@sweeper/core';
import { buildSummary, formatSummary } from '@sweeper/core';
import chalk from 'chalk';

import { loadProject, printError, toProjectPath } from '../utils.js';

export interface AnalyzeOptions {
  mode: 'deprecated' | 'marked';
  scope?: string[];
  json?: boolean;
  verbose?: boolean;
}

export async function analyzeCommand(path: string, options: AnalyzeOptions): Promise<void> {
  try {
    const project = loadProject(path, { verbose: options.verbose });
    let analysis: CleanupAnalysis;
    if (options.mode === 'marked') {
      analysis = await project.driver.analyzeMarkedFiles();
    } else {
      const scope = options.scope?.map((file) => toProjectPath(project.projectDir, file));
      analysis = await project.driver.analyzeDeprecatedControllers(scope);
    }

    if (options.json) {
      console.log(JSON.stringify(analysis, null, 2));
      return;
    }
    if (analysis.total === 0) {
      console.log(chalk.green('Nothing to remove.'));
      return;
    }
    console.log(formatSummary(buildSummary(analysis)));
  } catch (error) {
    printError(error);
  }
}
