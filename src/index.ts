#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { configCommand, fixCommand, type FixCommandOptions } from './commands/index.js';

const program = new Command();

program
  .name('unflake')
  .description(
    chalk.green('unflake') +
      ' - Remove unused imports and unused variables from Python code\n' +
      chalk.gray('Acts only on what pyflakes reports; everything else is left byte-for-byte')
  )
  .version('1.0.0')
  .argument('[files...]', 'files to fix')
  .option('-i, --in-place', 'make changes to files instead of printing diffs')
  .option('-r, --recursive', 'drill down directories recursively')
  .option(
    '--imports <list>',
    'by default, only unused standard library imports are removed; specify a comma-separated list of additional modules/packages'
  )
  .option('--remove-all-unused-imports', 'remove all unused imports (not just those from the standard library)')
  .option('--remove-unused-variables', 'remove unused variables')
  .option('-y, --yes', 'do not ask before rewriting files in place')
  .option('--json', 'output a JSON summary instead of diffs')
  .option('--verbose', 'report passes per file and analyzer failures')
  .action(async (files: string[], options: FixCommandOptions) => {
    if (files.length === 0) {
      program.help();
    }
    await fixCommand(files, options);
  });

program
  .command('config')
  .description('Choose how pyflakes is run')
  .action(async () => {
    await configCommand();
  });

program.addHelpText(
  'after',
  `
${chalk.green.bold('Examples:')}
  ${chalk.white('$')} unflake app.py                          ${chalk.gray('# Show what would change')}
  ${chalk.white('$')} unflake -i app.py                       ${chalk.gray('# Rewrite the file')}
  ${chalk.white('$')} unflake -r -i --remove-unused-variables src
  ${chalk.white('$')} unflake --imports django,requests app.py
`
);

await program.parseAsync();
