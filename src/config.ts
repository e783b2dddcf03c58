// Node.js built-in modules
import fs from 'node:fs';
import path from 'node:path';

// Third-party dependencies
import yaml from 'js-yaml';

// Types
import type { DriveTargetConfig, SourceConfig, TransferConfig } from './types';

export const DEFAULT_CONCURRENCY = 10;

/**
 * Options accepted on the command line; they override the configuration file
 */
export interface CliOptions {
  bucket?: string;
  driveFolder?: string;
  gcsSa?: string;
  driveSa?: string;
  project?: string;
  workers?: number;
  config?: string;
  prefix?: string;
  dryRun?: boolean;
  yes?: boolean;
  verbose?: boolean;
  logFile?: string;
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read and parse a YAML or JSON configuration file without validating it
 */
export function readConfigFile(configPath: string): RawConfig {
  const resolvedPath = path.resolve(configPath);

  if (!fs.existsSync(resolvedPath)) {
    throw new Error(`Configuration file not found: ${resolvedPath}`);
  }

  const fileContent = fs.readFileSync(resolvedPath, 'utf-8');
  const fileExt = path.extname(resolvedPath).toLowerCase();

  let parsed: unknown;

  try {
    if (fileExt === '.json') {
      parsed = JSON.parse(fileContent);
    } else if (fileExt === '.yaml' || fileExt === '.yml') {
      parsed = yaml.load(fileContent);
    } else {
      throw new Error(`Unsupported configuration file format: ${fileExt}`);
    }
  } catch (error) {
    throw new Error(`Failed to parse configuration file: ${(error as Error).message}`);
  }

  if (!isRecord(parsed)) {
    throw new Error('Configuration file must contain an object');
  }

  return parsed;
}

/**
 * Load and validate a transfer configuration file
 */
export function loadConfig(configPath: string): TransferConfig {
  return validateConfig(readConfigFile(configPath));
}

/**
 * Layer command line options over a raw configuration
 */
export function applyCliOptions(raw: RawConfig, options: CliOptions): RawConfig {
  const source: RawConfig = isRecord(raw.source) ? { ...raw.source } : {};
  const target: RawConfig = isRecord(raw.target) ? { ...raw.target } : {};
  const merged: RawConfig = { ...raw, source, target };

  if (options.bucket) {
    source.bucket = options.bucket;
  }
  if (options.gcsSa) {
    source.keyFile = options.gcsSa;
  }
  if (options.driveFolder) {
    target.folderName = options.driveFolder;
  }
  if (options.driveSa) {
    target.keyFile = options.driveSa;
  }
  if (options.project) {
    source.projectId = options.project;
    target.projectId = options.project;
  }
  if (options.workers !== undefined) {
    merged.concurrency = options.workers;
  }
  if (options.prefix) {
    merged.prefix = options.prefix;
  }
  if (options.dryRun) {
    merged.dryRun = true;
  }
  if (options.yes) {
    merged.skipConfirmation = true;
  }
  if (options.verbose) {
    merged.verbose = true;
  }
  if (options.logFile) {
    merged.logFile = options.logFile;
  }

  return merged;
}

/**
 * Build the run configuration from an optional file plus command line options
 */
export function resolveConfig(options: CliOptions): TransferConfig {
  const raw: RawConfig = options.config ? readConfigFile(options.config) : {};
  return validateConfig(applyCliOptions(raw, options));
}

function requireString(record: RawConfig, field: string, label: string): string {
  const value = record[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new Error(`${label} ${field} is missing`);
  }
  return value;
}

function optionalString(record: RawConfig, field: string, label: string): string | undefined {
  const value = record[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new Error(`${label} ${field} must be a string`);
  }
  return value;
}

function optionalBoolean(record: RawConfig, field: string): boolean {
  const value = record[field];
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value !== 'boolean') {
    throw new Error(`${field} must be a boolean`);
  }
  return value;
}

function optionalPatterns(record: RawConfig, field: 'include' | 'exclude'): string[] | undefined {
  const value = record[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  const label = field === 'include' ? 'Include' : 'Exclude';

  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new Error(`${label} patterns must be an array of strings`);
  }

  for (const pattern of value) {
    try {
      new RegExp(pattern);
    } catch (error) {
      throw new Error(`Invalid ${field} pattern "${pattern}": ${(error as Error).message}`);
    }
  }

  return value;
}

function validateSource(raw: unknown): SourceConfig {
  if (!isRecord(raw)) {
    throw new Error('Source configuration is missing');
  }

  const provider = raw.provider ?? 'gcs';

  if (provider === 's3') {
    return {
      provider: 's3',
      endpoint: requireString(raw, 'endpoint', 'Source'),
      accessKey: requireString(raw, 'accessKey', 'Source'),
      secretKey: requireString(raw, 'secretKey', 'Source'),
      region: requireString(raw, 'region', 'Source'),
      bucket: requireString(raw, 'bucket', 'Source'),
      forcePathStyle: optionalBoolean(raw, 'forcePathStyle'),
    };
  }

  if (provider !== 'gcs') {
    throw new Error('Source provider must be either "gcs" or "s3"');
  }

  return {
    provider: 'gcs',
    bucket: requireString(raw, 'bucket', 'Source'),
    keyFile: optionalString(raw, 'keyFile', 'Source'),
    projectId: optionalString(raw, 'projectId', 'Source'),
  };
}

function validateTarget(raw: unknown): DriveTargetConfig {
  if (!isRecord(raw)) {
    throw new Error('Target configuration is missing');
  }

  let requestTimeout: number | undefined;
  const timeout = raw.requestTimeout;
  if (timeout !== undefined && timeout !== null) {
    if (typeof timeout !== 'number' || timeout <= 0) {
      throw new Error('Target requestTimeout must be a positive number of milliseconds');
    }
    requestTimeout = timeout;
  }

  return {
    folderName: requireString(raw, 'folderName', 'Target'),
    keyFile: optionalString(raw, 'keyFile', 'Target'),
    projectId: optionalString(raw, 'projectId', 'Target'),
    requestTimeout,
  };
}

/**
 * Validate a raw configuration and fill in defaults
 */
export function validateConfig(raw: RawConfig): TransferConfig {
  const concurrency = raw.concurrency ?? DEFAULT_CONCURRENCY;
  if (typeof concurrency !== 'number' || !Number.isInteger(concurrency) || concurrency <= 0) {
    throw new Error('Concurrency must be a positive integer');
  }

  return {
    source: validateSource(raw.source),
    target: validateTarget(raw.target),
    concurrency,
    prefix: optionalString(raw, 'prefix', 'Option'),
    include: optionalPatterns(raw, 'include'),
    exclude: optionalPatterns(raw, 'exclude'),
    dryRun: optionalBoolean(raw, 'dryRun'),
    skipConfirmation: optionalBoolean(raw, 'skipConfirmation'),
    verbose: optionalBoolean(raw, 'verbose'),
    logFile: optionalString(raw, 'logFile', 'Option'),
  };
}
