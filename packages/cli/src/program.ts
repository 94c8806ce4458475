// packages/cli/src/program.ts — Command registration

import { Command, InvalidArgumentError, Option } from 'commander';

import { HISTORY_DEFAULT_LIMIT, VERSION } from '@sweeper/core';

import type { AnalyzeOptions } from './commands/analyze.js';
import { analyzeCommand } from './commands/analyze.js';
import type { CleanupOptions } from './commands/cleanup.js';
import { deprecatedCommand, markedCommand } from './commands/cleanup.js';
import { historyCommand } from './commands/history.js';
import { initCommand } from './commands/init.js';
import type { MarkOptions, MarksOptions } from './commands/mark.js';
import { markCommand, marksCommand, unmarkCommand } from './commands/mark.js';

function positiveInt(v: string): number {
  if (!/^\d+$/.test(v)) throw new InvalidArgumentError('Must be a positive integer');
  const n = Number.parseInt(v, 10);
  if (n <= 0) throw new InvalidArgumentError('Must be a positive integer');
  return n;
}

function isVerbose(command: Command): boolean {
  return command.optsWithGlobals().verbose === true;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('sweeper')
    .description('Remove dead code from Java sources: deprecated controller methods, unused imports, fields and classes')
    .version(VERSION)
    .option('--verbose', 'Enable debug logging');

  program
    .command('init')
    .description('Write a .sweeper.yml for the project')
    .argument('[path]', 'Project root', '.')
    .option('--non-interactive', 'Skip prompts, use defaults')
    .option('--force', 'Overwrite an existing .sweeper.yml')
    .action(initCommand);

  program
    .command('analyze')
    .description('Show what a cleanup would remove, without changing anything')
    .argument('[path]', 'Project root', '.')
    .addOption(new Option('--mode <mode>', 'Cleanup to analyze').choices(['deprecated', 'marked']).default('deprecated'))
    .option('--scope <files...>', 'Only look for deprecated methods in these files')
    .option('--json', 'Machine-readable JSON output', false)
    .action((path: string, opts: AnalyzeOptions, command: Command) => analyzeCommand(path, { ...opts, verbose: isVerbose(command) }));

  program
    .command('deprecated')
    .description('Remove unused deprecated controller methods and the methods only they called')
    .argument('[path]', 'Project root', '.')
    .option('--scope <files...>', 'Only look for deprecated methods in these files')
    .option('-y, --yes', 'Skip the confirmation prompt', false)
    .option('--output <file>', 'Write the run report to a JSON file')
    .action((path: string, opts: CleanupOptions, command: Command) => deprecatedCommand(path, { ...opts, verbose: isVerbose(command) }));

  program
    .command('marked')
    .description('Remove unused imports, fields and classes from files carrying the scope marker')
    .argument('[path]', 'Project root', '.')
    .option('-y, --yes', 'Skip the confirmation prompt', false)
    .option('--output <file>', 'Write the run report to a JSON file')
    .action((path: string, opts: CleanupOptions, command: Command) => markedCommand(path, { ...opts, verbose: isVerbose(command) }));

  program
    .command('mark')
    .description('Add the scope marker to Java files')
    .argument('<files...>', 'Files to mark')
    .option('--project <path>', 'Project root', '.')
    .action((files: string[], opts: MarkOptions, command: Command) => markCommand(files, { ...opts, verbose: isVerbose(command) }));

  program
    .command('unmark')
    .description('Remove the scope marker from Java files')
    .argument('<files...>', 'Files to unmark')
    .option('--project <path>', 'Project root', '.')
    .action((files: string[], opts: MarkOptions, command: Command) => unmarkCommand(files, { ...opts, verbose: isVerbose(command) }));

  program
    .command('marks')
    .description('List files carrying the scope marker')
    .argument('[path]', 'Project root', '.')
    .option('--all', 'Include unmarked files', false)
    .option('--json', 'Machine-readable JSON output', false)
    .action((path: string, opts: MarksOptions, command: Command) => marksCommand(path, { ...opts, verbose: isVerbose(command) }));

  program
    .command('history')
    .description('List past cleanup runs')
    .argument('[path]', 'Project root', '.')
    .option('--limit <n>', 'Max results', positiveInt, HISTORY_DEFAULT_LIMIT)
    .addOption(new Option('--mode <mode>', 'Only runs of this cleanup').choices(['deprecated', 'marked']))
    .option('--json', 'Machine-readable JSON output', false)
    .action(historyCommand);

  return program;
}
