import inquirer from 'inquirer';
import chalk from 'chalk';
import Conf from 'conf';
import { DEFAULT_ANALYZER, type AnalyzerConfig } from '../core/analyzer.js';

interface GlobalConfig {
  analyzerCommand?: string;
  analyzerArgs?: string[];
}

const globalConf = new Conf<GlobalConfig>({
  projectName: 'unflake',
  configName: 'config',
});

/** Split `python3 -m pyflakes` into command and arguments */
export function parseAnalyzerCommand(input: string): Partial<AnalyzerConfig> {
  const [command, ...args] = input.trim().split(/\s+/).filter(Boolean);
  if (!command) return {};
  return { command, args };
}

function formatAnalyzer(config: Partial<AnalyzerConfig>): string {
  return [config.command ?? DEFAULT_ANALYZER.command, ...(config.args ?? DEFAULT_ANALYZER.args)].join(' ');
}

export async function configCommand(): Promise<void> {
  console.log(chalk.green.bold('\nunflake - Global Configuration\n'));

  const existingCommand = globalConf.get('analyzerCommand');

  if (existingCommand) {
    const current = formatAnalyzer({ command: existingCommand, args: globalConf.get('analyzerArgs') ?? [] });
    console.log(chalk.gray(`Current analyzer: ${current}\n`));

    const { action } = await inquirer.prompt<{ action: 'update' | 'reset' | 'cancel' }>([
      {
        type: 'list',
        name: 'action',
        message: 'What would you like to do?',
        choices: [
          { name: 'Change analyzer command', value: 'update' },
          { name: 'Reset to default', value: 'reset' },
          { name: 'Cancel', value: 'cancel' },
        ],
      },
    ]);

    if (action === 'cancel') {
      return;
    }

    if (action === 'reset') {
      globalConf.delete('analyzerCommand');
      globalConf.delete('analyzerArgs');
      console.log(chalk.yellow(`\nAnalyzer reset to ${formatAnalyzer({})}.`));
      return;
    }
  }

  const { analyzer } = await inquirer.prompt<{ analyzer: string }>([
    {
      type: 'input',
      name: 'analyzer',
      message: 'Command that runs pyflakes on stdin:',
      default: formatAnalyzer({}),
      validate: (input: string) => {
        if (!input.trim()) {
          return 'Please enter a command';
        }
        return true;
      },
    },
  ]);

  const parsed = parseAnalyzerCommand(analyzer);
  if (parsed.command) {
    globalConf.set('analyzerCommand', parsed.command);
    globalConf.set('analyzerArgs', parsed.args ?? []);
  }

  console.log(chalk.green('\n✓ Analyzer saved successfully!'));
  console.log(chalk.gray(`\nunflake will run: ${formatAnalyzer(parsed)}\n`));
}

/**
 * Analyzer configured for this user, the UNFLAKE_ANALYZER environment
 * variable taking precedence over the stored setting
 */
export function getGlobalAnalyzer(): Partial<AnalyzerConfig> {
  const envCommand = process.env.UNFLAKE_ANALYZER;
  if (envCommand) return parseAnalyzerCommand(envCommand);

  const command = globalConf.get('analyzerCommand');
  if (!command) return {};
  return { command, args: globalConf.get('analyzerArgs') ?? [] };
}
