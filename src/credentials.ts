// Third-party dependencies
import { GoogleAuth } from 'google-auth-library';

// Local imports
import { createDriveDestination } from './drive-client';
import { toSetupError } from './errors';
import { createStorageClient, GcsSource } from './gcs-source';
import { logVerbose } from './logger';
import { createS3Client, S3Source } from './s3-client';

// Types
import type { DriveTargetConfig, SourceConfig, SourceStore, TransferConfig, TransferServices } from './types';

export const DRIVE_SCOPES = ['https://www.googleapis.com/auth/drive'];

/**
 * Build the Drive credential from a key file, or from Application Default Credentials
 */
export function createDriveAuth(target: DriveTargetConfig): GoogleAuth {
  return new GoogleAuth({
    keyFile: target.keyFile,
    scopes: DRIVE_SCOPES,
    projectId: target.projectId,
  });
}

export function createSourceStore(source: SourceConfig): SourceStore {
  if (source.provider === 's3') {
    return new S3Source(createS3Client(source), source);
  }
  return new GcsSource(createStorageClient(source).bucket(source.bucket), source.bucket);
}

/**
 * Load the Drive credential and bill its requests to the configured project.
 *
 * GoogleAuth caches the client it returns here, and every Drive client built
 * on the same GoogleAuth sends its requests through that cached client.
 */
export async function loadDriveCredential(auth: GoogleAuth, target: DriveTargetConfig): Promise<void> {
  const client = await auth.getClient().catch((error: unknown) => {
    throw toSetupError(error);
  });

  if (target.projectId) {
    // Sent as x-goog-user-project; `projectId` alone does not select the quota project
    client.quotaProjectId = target.projectId;
  }
  logVerbose(`Drive credentials loaded${target.keyFile ? ` from ${target.keyFile}` : ' from application defaults'}`);
}

/**
 * Acquire one handle per remote service for a run.
 * The Drive credential is loaded eagerly so missing credentials fail before any listing.
 */
export async function acquireServices(config: TransferConfig): Promise<TransferServices> {
  const source = createSourceStore(config.source);
  const driveAuth = createDriveAuth(config.target);

  await loadDriveCredential(driveAuth, config.target);

  const requestTimeout = config.target.requestTimeout;

  return {
    source,
    createDestination: () => createDriveDestination(driveAuth, { requestTimeout }),
  };
}
