import type { ClassMode, CleanupSummary, FieldMode } from '@sweeper/core';
import { formatSummary } from '@sweeper/core';

export async function confirmCleanup(summary: CleanupSummary): Promise<boolean> {
  const { default: inquirer } = await import('inquirer');

  console.error(`\n${formatSummary(summary)}\n`);
  const { proceed } = await inquirer.prompt([
    {
      type: 'confirm',
      name: 'proceed',
      message: 'Remove these symbols?',
      default: false,
    },
  ]);

  return proceed === true;
}

export async function selectClassifierModes(): Promise<{ fieldMode: FieldMode; classMode: ClassMode }> {
  const { default: inquirer } = await import('inquirer');

  const { fieldMode, classMode } = await inquirer.prompt([
    {
      type: 'select',
      name: 'fieldMode',
      message: 'Which unused fields may be removed?',
      choices: [
        { name: 'Any field that is not public or static (recommended)', value: 'non-public' },
        { name: 'Only private final fields', value: 'final-private' },
      ],
    },
    {
      type: 'select',
      name: 'classMode',
      message: 'Which unused classes may be removed?',
      choices: [
        { name: 'Classes with no members at all (recommended)', value: 'empty' },
        { name: 'Classes without methods', value: 'no-methods' },
      ],
    },
  ]);

  return {
    fieldMode: fieldMode === 'final-private' ? 'final-private' : 'non-public',
    classMode: classMode === 'no-methods' ? 'no-methods' : 'empty',
  };
}
