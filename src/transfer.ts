// Third-party dependencies
import chalk from 'chalk';
import cliProgress from 'cli-progress';
import inquirer from 'inquirer';
import ora from 'ora';
import pLimit from 'p-limit';

// Local imports
import { DEFAULT_CONCURRENCY } from './config';
import { acquireServices } from './credentials';
import { toSetupError } from './errors';
import { FolderPathCache } from './folder-cache';
import { resolveOrCreateFolder } from './folder-resolver';
import {
  closeLogger,
  initLogger,
  log,
  LogLevel,
  logError,
  logInfo,
  logSuccess,
  logVerbose,
  logWarning,
} from './logger';
import { destinationPath, isDirectoryPlaceholder, transferObject } from './transfer-worker';
import { TransferStatus } from './types';
import { describeSource, formatBytes, formatTime, truncateKey } from './utils';

// Types
import type {
  SkipReason,
  SourceObject,
  TransferConfig,
  TransferResult,
  TransferServices,
  TransferSummary,
} from './types';

/**
 * Apply include/exclude regex filters to a listing
 */
export function filterObjects(objects: SourceObject[], config: TransferConfig): SourceObject[] {
  let filtered = objects;

  if (config.include && config.include.length > 0) {
    const patterns = config.include.map(pattern => new RegExp(pattern));
    filtered = filtered.filter(object => patterns.some(pattern => pattern.test(object.key)));
  }

  if (config.exclude && config.exclude.length > 0) {
    const patterns = config.exclude.map(pattern => new RegExp(pattern));
    filtered = filtered.filter(object => !patterns.some(pattern => pattern.test(object.key)));
  }

  return filtered;
}

/**
 * Split off objects whose destination path repeats an earlier object's (e.g. `a//b` after `a/b`).
 * The first object in listing order keeps the path.
 */
export function partitionDuplicates(objects: SourceObject[]): { unique: SourceObject[]; duplicates: SourceObject[] } {
  const claimed = new Set<string>();
  const unique: SourceObject[] = [];
  const duplicates: SourceObject[] = [];

  for (const object of objects) {
    if (isDirectoryPlaceholder(object.key)) {
      unique.push(object);
      continue;
    }

    const target = destinationPath(object.key);
    if (claimed.has(target)) {
      duplicates.push(object);
    } else {
      claimed.add(target);
      unique.push(object);
    }
  }

  return { unique, duplicates };
}

function createSummary(total: number): TransferSummary {
  return {
    total,
    succeeded: 0,
    skipped: 0,
    failed: 0,
    failures: [],
    results: [],
    startTime: Date.now(),
  };
}

function recordResult(summary: TransferSummary, result: TransferResult): void {
  summary.results.push(result);

  switch (result.status) {
    case TransferStatus.SUCCEEDED:
      summary.succeeded++;
      break;
    case TransferStatus.SKIPPED:
      summary.skipped++;
      break;
    case TransferStatus.FAILED:
      summary.failed++;
      summary.failures.push({ key: result.key, error: result.error.message });
      break;
  }
}

function statusLabel(result: TransferResult): string {
  switch (result.status) {
    case TransferStatus.SUCCEEDED:
      return chalk.green('Uploaded');
    case TransferStatus.SKIPPED:
      return chalk.gray(`Skipped (${result.reason})`);
    case TransferStatus.FAILED:
      return chalk.red('Failed');
  }
}

function countSkipped(summary: TransferSummary, reason: SkipReason): number {
  return summary.results.filter(
    result => result.status === TransferStatus.SKIPPED && result.reason === reason
  ).length;
}

function printSummary(summary: TransferSummary): void {
  const elapsedTime = Math.floor(((summary.endTime || Date.now()) - summary.startTime) / 1000);

  logInfo('', chalk.white);
  logInfo('Transfer Summary', chalk.cyanBright.bold);
  logInfo('─'.repeat(50), chalk.white);
  logInfo(`Total objects:      ${summary.total}`, chalk.white);
  logInfo(`Uploaded:           ${summary.succeeded}`, chalk.green);
  logInfo(`Already present:    ${countSkipped(summary, 'exists')}`, chalk.gray);
  logInfo(`Placeholders:       ${countSkipped(summary, 'placeholder')}`, chalk.gray);
  logInfo(`Duplicate keys:     ${countSkipped(summary, 'duplicate')}`, chalk.gray);
  logInfo(`Failed:             ${summary.failed}`, chalk.redBright);
  logInfo(`Total time:         ${formatTime(elapsedTime)}`, chalk.white);

  log(
    LogLevel.INFO,
    `Transfer Summary - Total: ${summary.total}, Uploaded: ${summary.succeeded}, Skipped: ${summary.skipped}, Failed: ${summary.failed}, Time: ${formatTime(elapsedTime)}`,
    true
  );

  if (summary.failures.length > 0) {
    logInfo('', chalk.white);
    logWarning('Failed objects:');
    for (const failure of summary.failures) {
      logError(`  ✗ ${failure.key} (${failure.error})`);
    }
  }

  logInfo('', chalk.white);

  if (summary.failed === 0) {
    logSuccess('✓ Transfer complete!');
  } else {
    logWarning('⚠ Transfer completed with some failures. Re-run to retry them.');
  }
}

async function confirmTransfer(objects: SourceObject[], config: TransferConfig): Promise<boolean> {
  const totalBytes = objects.reduce((sum, object) => sum + object.size, 0);

  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message: `Transfer ${objects.length} objects (${formatBytes(totalBytes)}) to Drive folder "${config.target.folderName}"?`,
      default: false,
    },
  ]);

  return confirmed;
}

/**
 * Copy every listed object into the Drive folder named by `config.target.folderName`.
 *
 * Setup failures (credentials, listing, root folder) reject before any object is
 * dispatched. Per-object failures are counted in the returned summary.
 */
export async function runTransfer(config: TransferConfig, services?: TransferServices): Promise<TransferSummary> {
  initLogger(config);

  try {
    const concurrency = config.concurrency || DEFAULT_CONCURRENCY;

    logInfo('Starting bucket transfer...', chalk.cyan);
    logInfo(`Source: ${describeSource(config.source)}`, chalk.cyan);
    logInfo(`Target: Drive folder "${config.target.folderName}"`, chalk.cyan);
    logInfo(`Workers: ${concurrency}`, chalk.white);

    if (config.prefix) {
      logInfo(`Prefix: ${config.prefix}`, chalk.cyan);
    }
    if (config.include && config.include.length > 0) {
      logInfo(`Include patterns: ${config.include.join(', ')}`, chalk.cyan);
    }
    if (config.exclude && config.exclude.length > 0) {
      logInfo(`Exclude patterns: ${config.exclude.join(', ')}`, chalk.cyan);
    }
    if (config.dryRun) {
      logWarning('DRY RUN MODE - Nothing will be written to Drive');
    }

    const active = services ?? (await acquireServices(config));

    // List all objects up front
    const spinner = ora(`Listing objects from ${active.source.describe()}...`).start();
    let objects: SourceObject[];

    try {
      objects = filterObjects(await active.source.listObjects(config.prefix), config);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      spinner.fail(`Failed to list objects: ${err.message}`);
      logError('Failed to list objects', err, true);
      throw toSetupError(error);
    }

    spinner.succeed(`Found ${chalk.bold(objects.length.toString())} objects to transfer`);
    log(LogLevel.SUCCESS, `Found ${objects.length} objects to transfer`, true);

    const summary = createSummary(objects.length);

    if (objects.length === 0) {
      logWarning('Bucket is empty. Nothing to transfer.');
      summary.endTime = Date.now();
      return summary;
    }

    if (config.dryRun) {
      for (const object of objects) {
        if (isDirectoryPlaceholder(object.key)) {
          recordResult(summary, { key: object.key, status: TransferStatus.SKIPPED, reason: 'placeholder' });
          continue;
        }
        logVerbose(`Would transfer ${object.key} -> ${config.target.folderName}/${destinationPath(object.key)}`);
        recordResult(summary, { key: object.key, status: TransferStatus.SKIPPED, reason: 'dry-run' });
      }
      logInfo(`Dry run: ${countSkipped(summary, 'dry-run')} objects would be transferred`, chalk.yellow);
      summary.endTime = Date.now();
      return summary;
    }

    const { unique, duplicates } = partitionDuplicates(objects);
    for (const object of duplicates) {
      logWarning(`Skipping ${object.key}: another object maps to the same Drive path`);
      recordResult(summary, { key: object.key, status: TransferStatus.SKIPPED, reason: 'duplicate' });
    }

    if (!config.skipConfirmation) {
      const confirmed = await confirmTransfer(unique, config);
      if (!confirmed) {
        logWarning('Transfer cancelled by user.');
        summary.endTime = Date.now();
        return summary;
      }
    } else {
      log(LogLevel.INFO, `Proceeding with transfer of ${unique.length} objects (confirmation skipped)`, true);
    }

    // Resolve the destination root once, before any worker starts
    let rootFolderId: string;
    try {
      rootFolderId = await resolveOrCreateFolder(active.createDestination(), config.target.folderName);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logError(`Failed to resolve Drive folder "${config.target.folderName}"`, err, true);
      throw toSetupError(error);
    }
    summary.rootFolderId = rootFolderId;
    logInfo(`Destination Drive folder ID: ${rootFolderId}`, chalk.cyan);

    const folderCache = new FolderPathCache();
    const limit = pLimit(concurrency);

    const progressBar = new cliProgress.SingleBar(
      {
        clearOnComplete: false,
        hideCursor: true,
        format: ' {bar} | {percentage}% | {value}/{total} | {status} | {file}',
      },
      cliProgress.Presets.shades_grey
    );
    progressBar.start(unique.length, 0, { status: chalk.blue('In Progress'), file: '' });

    const runTask = async (object: SourceObject): Promise<void> => {
      let result: TransferResult;
      try {
        // Each worker gets its own Drive client; the credential behind it is shared
        result = await transferObject(object, {
          rootFolderId,
          folderCache,
          destination: active.createDestination(),
        });
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        logError(`Error processing ${object.key}: ${err.message}`, err);
        result = { key: object.key, status: TransferStatus.FAILED, error: err };
      }

      recordResult(summary, result);
      progressBar.increment(1, { status: statusLabel(result), file: truncateKey(object.key) });
    };

    try {
      await Promise.all(unique.map(object => limit(runTask, object)));
    } finally {
      progressBar.stop();
    }

    logVerbose(`Folder cache holds ${folderCache.size} folders`);
    summary.endTime = Date.now();
    printSummary(summary);

    return summary;
  } finally {
    closeLogger();
  }
}
