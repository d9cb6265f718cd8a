/**
 * fix command - Remove unused imports and variables from Python files
 *
 * Usage:
 *   unflake file.py                       # Print a diff of what would change
 *   unflake -i file.py                    # Rewrite the file
 *   unflake -r -i src                     # Every .py file below src/
 *   unflake --remove-unused-variables a.py
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import inquirer from 'inquirer';
import {
  checkAnalyzerAvailable,
  collectPythonFiles,
  createConfiguredPolicy,
  createPyflakesSource,
  loadProjectConfig,
  mergeWithDefaults,
  parseImportList,
  readSourceFile,
  writeSourceFile,
} from '../core/index.js';
import { getDiffText, runFixedPoint } from '../refactor/operations/index.js';
import type { DiagnosticSource, RewritePolicy } from '../refactor/types.js';
import { getGlobalAnalyzer } from './config.js';

export interface FixCommandOptions {
  inPlace?: boolean;
  recursive?: boolean;
  imports?: string;
  removeAllUnusedImports?: boolean;
  removeUnusedVariables?: boolean;
  yes?: boolean;
  json?: boolean;
  verbose?: boolean;
}

export interface FileFixResult {
  file: string;
  changed: boolean;
  iterations: number;
  converged: boolean;
  analyzerErrors: string[];
}

interface FileFixContext {
  diagnose: DiagnosticSource;
  policy: RewritePolicy;
  maxIterations: number;
  options: FixCommandOptions;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Fix a single file: write it back in place, or print the diff
 */
export function fixFile(file: string, context: FileFixContext): FileFixResult {
  const { text, encoding } = readSourceFile(file);
  const analyzerErrors: string[] = [];

  const result = runFixedPoint(text, {
    diagnose: context.diagnose,
    policy: context.policy,
    maxIterations: context.maxIterations,
    onAnalyzerError: (error) => analyzerErrors.push(errorMessage(error)),
  });

  const changed = result.source !== text;

  if (changed) {
    if (context.options.inPlace) {
      writeSourceFile(file, result.source, encoding);
    } else if (!context.options.json) {
      printDiff(getDiffText(text, result.source, file));
    }
  }

  return {
    file,
    changed,
    iterations: result.iterations,
    converged: result.converged,
    analyzerErrors,
  };
}

export async function fixCommand(files: string[], options: FixCommandOptions): Promise<void> {
  const settings = mergeWithDefaults(
    loadProjectConfig(process.cwd()),
    {
      imports: parseImportList(options.imports),
      removeAllUnusedImports: options.removeAllUnusedImports,
      removeUnusedVariables: options.removeUnusedVariables,
    },
    getGlobalAnalyzer()
  );

  // Checked after merging so a config file can trip it too
  if (settings.removeAllUnusedImports && settings.imports.length > 0) {
    console.error(chalk.red('Using both --remove-all-unused-imports and --imports is redundant'));
    process.exit(1);
  }

  try {
    checkAnalyzerAvailable(settings.analyzer);
  } catch (error) {
    console.error(chalk.red(`\nError: ${errorMessage(error)}`));
    console.log(chalk.gray('Install pyflakes (pip install pyflakes) or run `unflake config` to point at it.\n'));
    process.exit(1);
  }

  const filenames = collectPythonFiles(files, {
    recursive: options.recursive,
    exclude: settings.exclude,
  });

  if (options.inPlace && !options.yes && process.stdin.isTTY) {
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: 'confirm',
        name: 'confirm',
        message: chalk.yellow(`Rewrite ${filenames.length} file(s) in place?`),
        default: true,
      },
    ]);

    if (!confirm) {
      console.log(chalk.gray('\n  Cancelled - no files changed.\n'));
      return;
    }
  }

  const context: FileFixContext = {
    diagnose: createPyflakesSource(settings.analyzer),
    policy: createConfiguredPolicy(settings),
    maxIterations: settings.maxIterations,
    options,
  };

  let spinner: Ora | undefined;
  if (options.inPlace && !options.json) {
    spinner = ora(`Fixing ${filenames.length} file(s)...`).start();
  }

  const results: FileFixResult[] = [];
  const errors: Array<{ file: string; error: string }> = [];

  for (const file of filenames) {
    try {
      results.push(fixFile(file, context));
    } catch (error) {
      errors.push({ file, error: errorMessage(error) });
    }
  }

  if (spinner) {
    const changedCount = results.filter((r) => r.changed).length;
    if (errors.length > 0) {
      spinner.warn(`Fixed ${changedCount} file(s), ${errors.length} failed`);
    } else {
      spinner.succeed(`Fixed ${changedCount} of ${results.length} file(s)`);
    }
  }

  if (options.json) {
    console.log(JSON.stringify({ files: results, errors }, null, 2));
  } else {
    printSummary(results, options);
    for (const { file, error } of errors) {
      console.error(chalk.red(`${file}: ${error}`));
    }
  }

  if (errors.length > 0) {
    process.exit(1);
  }
}

/**
 * Write a unified diff to stdout, colored when the terminal supports it
 */
function printDiff(diff: string): void {
  for (const line of diff.match(/[^\n]*\n/g) ?? []) {
    const content = line.slice(0, -1);
    if (content.startsWith('---') || content.startsWith('+++')) {
      process.stdout.write(chalk.bold(content) + '\n');
    } else if (content.startsWith('@@')) {
      process.stdout.write(chalk.cyan(content) + '\n');
    } else if (content.startsWith('-')) {
      process.stdout.write(chalk.red(content) + '\n');
    } else if (content.startsWith('+')) {
      process.stdout.write(chalk.green(content) + '\n');
    } else {
      process.stdout.write(line);
    }
  }
}

function printSummary(results: FileFixResult[], options: FixCommandOptions): void {
  if (options.inPlace) {
    for (const result of results.filter((r) => r.changed)) {
      console.log(chalk.gray(`  - ${result.file}`));
    }
  }

  for (const result of results) {
    if (!result.converged) {
      console.log(chalk.yellow(`  ! ${result.file}: stopped after ${result.iterations} passes without settling`));
    }
    if (options.verbose) {
      console.log(chalk.gray(`  ${result.file}: ${result.iterations} pass(es)${result.changed ? ', changed' : ''}`));
      for (const error of result.analyzerErrors) {
        console.log(chalk.yellow(`    analyzer failed: ${error}`));
      }
    }
  }
}
