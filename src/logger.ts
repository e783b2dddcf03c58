// Node.js built-in modules
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

// Third-party dependencies
import chalk from 'chalk';
import * as fsExtra from 'fs-extra';
import { v4 as uuidv4 } from 'uuid';

// Local imports
import { describeSource } from './utils';

// Types
import type { TransferConfig } from './types';

export enum LogLevel {
  INFO = 'INFO',
  SUCCESS = 'SUCCESS',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  DEBUG = 'DEBUG',
}

const CONSOLE_STYLES: Record<LogLevel, (text: string) => string> = {
  [LogLevel.INFO]: chalk.blue,
  [LogLevel.SUCCESS]: chalk.green,
  [LogLevel.WARNING]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
  [LogLevel.DEBUG]: chalk.gray,
};

let config: TransferConfig | null = null;
let logStream: fs.WriteStream | null = null;
let executionId = '-';

function writeRaw(line: string): void {
  logStream?.write(line + '\n');
}

/**
 * Start a run: remember its settings and open the log file if one is configured.
 * The file is appended to, so several runs can share it.
 */
export function initLogger(transferConfig: TransferConfig): void {
  config = transferConfig;
  executionId = uuidv4().slice(0, 8);

  if (!config.logFile) {
    return;
  }

  try {
    fsExtra.ensureDirSync(path.dirname(config.logFile));
    logStream = fs.createWriteStream(config.logFile, { flags: 'a' });
  } catch (error) {
    console.error(chalk.red(`Failed to open log file: ${(error as Error).message}`));
    logStream = null;
    return;
  }

  const user = process.env.USERNAME || process.env.USER || 'unknown';

  writeRaw('');
  writeRaw(`#### run ${executionId} started ${new Date().toISOString()}`);
  writeRaw(`#### pid ${process.pid} on ${os.hostname()} (${os.platform()} ${os.release()}) as ${user}`);

  log(LogLevel.INFO, `Source: ${describeSource(config.source)}`, true);
  log(LogLevel.INFO, `Target: drive://${config.target.folderName}`, true);
  log(LogLevel.INFO, `Workers: ${config.concurrency}, dry run: ${config.dryRun === true}`, true);
  if (config.prefix) {
    log(LogLevel.INFO, `Prefix: ${config.prefix}`, true);
  }
}

/**
 * End the run and close the log file
 */
export function closeLogger(): void {
  if (logStream) {
    writeRaw(`#### run ${executionId} finished ${new Date().toISOString()}`);
    logStream.end();
    logStream = null;
  }
  config = null;
}

/**
 * Write one line to the log file and, unless `skipConsole`, to the console
 */
export function log(level: LogLevel, message: string, skipConsole = false): void {
  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level}] [${executionId}] ${message}`;

  writeRaw(logMessage);

  if (skipConsole) {
    return;
  }

  if (level === LogLevel.DEBUG && !config?.verbose) {
    return;
  }

  console.log(CONSOLE_STYLES[level](`[${level}] ${message}`));
}

/**
 * Error line; the stack goes to the file, and to the console in verbose mode
 */
export function logError(message: string, error?: Error, skipConsole = false): void {
  log(LogLevel.ERROR, message, skipConsole);

  if (error) {
    const errorDetails = `${error.name}: ${error.message}\n${error.stack || '(No stack trace)'}`;

    writeRaw(`[${new Date().toISOString()}] [ERROR_DETAILS] [${executionId}] ${errorDetails}`);

    if (config?.verbose && !skipConsole) {
      console.log(chalk.red(errorDetails));
    }
  }
}

export function logVerbose(message: string): void {
  log(LogLevel.DEBUG, message);
}

export function logSuccess(message: string): void {
  log(LogLevel.SUCCESS, message);
}

export function logWarning(message: string): void {
  log(LogLevel.WARNING, message);
}

/**
 * Info line, optionally pre-colored (the level color wraps it on the console)
 */
export function logInfo(message: string, color?: (message: string) => string): void {
  log(LogLevel.INFO, color ? color(message) : message);
}
