#!/usr/bin/env node
// Third-party dependencies
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';

// Local imports
import { resolveConfig } from './config';
import { classifySetupError, describeSetupError } from './errors';
import { displayHelp } from './help';
import { runTransfer } from './transfer';

// Types
import type { CliOptions } from './config';

// Package info
import { name, version } from '../package.json';

function parseWorkerCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Print categorized guidance for setup failures, the bare message otherwise
 */
function reportError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  const kind = classifySetupError(error);

  if (!kind) {
    console.error(chalk.red.bold('Error:'), chalk.red(message));
    return;
  }

  const guidance = describeSetupError(kind);
  console.error('');
  console.error(chalk.red.bold(`Error: ${guidance.title}`));
  console.error(chalk.gray(message));
  for (const line of guidance.lines) {
    console.error(line.startsWith('  ') ? chalk.bold(line) : line);
  }
  console.error('');
}

// Create the command line program
const program = new Command();

// Main command
program
  .name(name)
  .version(version)
  .description('Copy every object of a storage bucket into a Google Drive folder tree')
  .option('-b, --bucket <name>', 'Source bucket name')
  .option('-f, --drive-folder <name>', 'Target folder name in Google Drive')
  .option('--gcs-sa <path>', 'Path to a Cloud Storage service account JSON key')
  .option('--drive-sa <path>', 'Path to a Drive service account JSON key')
  .option('--project <id>', 'Google Cloud project ID (needed for user credentials)')
  .option('-w, --workers <number>', 'Number of parallel workers (default: 10)', parseWorkerCount)
  .option('-c, --config <file>', 'Path to a configuration file (YAML or JSON)')
  .option('-p, --prefix <prefix>', 'Only transfer objects with this prefix')
  .option('-d, --dry-run', 'List objects and report the plan without writing to Drive')
  .option('-y, --yes', 'Skip confirmation prompts and proceed with the transfer')
  .option('-v, --verbose', 'Enable verbose logging with detailed error messages')
  .option('-l, --log-file <path>', 'Save logs to the specified file')
  .action(async (options: CliOptions) => {
    try {
      const config = resolveConfig(options);
      await runTransfer(config);
    } catch (error) {
      reportError(error);
      process.exitCode = 1;
    }
  });

// Help command
program
  .command('help [topic]')
  .description('Display help information about specific topics')
  .action((topic?: string) => {
    displayHelp(topic, name);
  });

program.addHelpText('after', `
Examples:
  $ ${name} --bucket my-bucket --drive-folder "Bucket Backup"
  $ ${name} -b my-bucket -f Backup --workers 20 --yes
  $ ${name} -b my-bucket -f Backup --gcs-sa ./gcs-sa.json --drive-sa ./drive-sa.json
  $ ${name} -b my-bucket -f Backup --project my-project
  $ ${name} --config ./transfer.yaml --dry-run
  $ ${name} help config
  $ ${name} help auth
`);

program.parseAsync(process.argv).catch((error: unknown) => {
  reportError(error);
  process.exitCode = 1;
});
