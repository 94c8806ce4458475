import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';

import type { ClassMode, FieldMode } from '@sweeper/core';
import { CONFIG_FILENAME, loadConfig, writeConfig } from '@sweeper/core';
import chalk from 'chalk';

import { printError } from '../utils.js';

interface InitOptions {
  nonInteractive?: boolean;
  force?: boolean;
}

export async function initCommand(path: string, options: InitOptions): Promise<void> {
  try {
    const projectDir = resolve(path);
    const configPath = join(projectDir, CONFIG_FILENAME);

    if (existsSync(configPath) && !options.force) {
      console.error(chalk.red('Already initialized. Use --force to overwrite.'));
      process.exitCode = 1;
      return;
    }

    // Start from defaults on --force, not from the file being replaced
    const config = loadConfig({ projectDir, skipFile: options.force });
    let modes: { fieldMode: FieldMode; classMode: ClassMode } = config.classifier;
    if (!options.nonInteractive) {
      const { selectClassifierModes } = await import('../prompts.js');
      modes = await selectClassifierModes();
    }
    config.classifier = { ...config.classifier, ...modes };

    writeConfig(config, projectDir);

    console.log(chalk.green(`\nWrote ${CONFIG_FILENAME}`));
    console.log(chalk.gray(`  fields:  ${config.classifier.fieldMode}`));
    console.log(chalk.gray(`  classes: ${config.classifier.classMode}`));
    console.log(chalk.gray(`  marker:  ${config.marker}`));

    console.log(chalk.gray('\nNext: sweeper analyze'));
  } catch (error) {
    printError(error);
  }
}
