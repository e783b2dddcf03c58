export interface S3Credentials {
  endpoint: string;
  accessKey: string;
  secretKey: string;
  region: string;
  bucket: string;
  // Optional parameters
  forcePathStyle?: boolean;
}

export interface GcsSourceConfig {
  provider: 'gcs';
  bucket: string;
  keyFile?: string; // Service account key file, ADC when absent
  projectId?: string;
}

export interface S3SourceConfig extends S3Credentials {
  provider: 's3';
}

export type SourceConfig = GcsSourceConfig | S3SourceConfig;

export interface DriveTargetConfig {
  folderName: string; // Root folder created (or reused) in My Drive
  keyFile?: string; // Service account key file, ADC when absent
  projectId?: string;
  requestTimeout?: number; // Per-request timeout in ms for Drive calls, none when absent
}

export interface TransferConfig {
  source: SourceConfig;
  target: DriveTargetConfig;
  // Optional parameters
  concurrency?: number;
  prefix?: string;
  include?: string[];
  exclude?: string[];
  dryRun?: boolean;
  skipConfirmation?: boolean; // Skip confirmation prompts
  verbose?: boolean; // Enable verbose logging
  logFile?: string; // Log file path for saving detailed logs
}

/**
 * Bytes of one source object plus the content type reported by the read, if any
 */
export interface ObjectPayload {
  data: Buffer;
  contentType?: string;
}

/**
 * One listed object. Keys are `/`-delimited virtual paths.
 */
export interface SourceObject {
  key: string;
  size: number;
  contentType?: string;
  read(): Promise<ObjectPayload>;
}

export interface SourceStore {
  describe(): string;
  listObjects(prefix?: string): Promise<SourceObject[]>;
}

export interface DestinationEntry {
  id: string;
  name: string;
}

// 'any' matches files and folders alike
export type EntryKind = 'folder' | 'any';

export interface DestinationStore {
  find(name: string, parentId: string | undefined, kind: EntryKind): Promise<DestinationEntry[]>;
  createFolder(name: string, parentId?: string): Promise<string>;
  createFile(name: string, parentId: string, contentType: string, data: Buffer): Promise<string>;
}

/**
 * Handles shared by a run. Each worker calls createDestination() for its own Drive client.
 */
export interface TransferServices {
  source: SourceStore;
  createDestination(): DestinationStore;
}

// File transfer status
export enum TransferStatus {
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  SKIPPED = 'skipped',
}

export type SkipReason = 'placeholder' | 'exists' | 'duplicate' | 'dry-run';

export type TransferResult =
  | { key: string; status: TransferStatus.SUCCEEDED; fileId: string; bytes: number }
  | { key: string; status: TransferStatus.SKIPPED; reason: SkipReason }
  | { key: string; status: TransferStatus.FAILED; error: Error };

export interface TransferFailure {
  key: string;
  error: string;
}

export interface TransferSummary {
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
  rootFolderId?: string;
  failures: TransferFailure[];
  results: TransferResult[];
  startTime: number;
  endTime?: number;
}
