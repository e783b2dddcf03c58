import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { GoogleAuth } from 'google-auth-library';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { acquireServices, createDriveAuth, loadDriveCredential } from '../src/credentials';
import { DriveDestination } from '../src/drive-client';
import { SetupError } from '../src/errors';
import { GcsSource } from '../src/gcs-source';
import { runTransfer } from '../src/transfer';

import type { TransferConfig } from '../src/types';

const tempDirs: string[] = [];

function writeServiceAccountKey(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bucket-to-drive-sa-'));
  tempDirs.push(dir);
  const keyFile = path.join(dir, 'drive-sa.json');
  fs.writeFileSync(
    keyFile,
    JSON.stringify({
      type: 'service_account',
      project_id: 'test-project',
      private_key_id: 'test-key-id',
      private_key: 'test-private-key',
      client_email: 'transfer@test-project.iam.gserviceaccount.com',
      client_id: '1234567890',
    })
  );
  return keyFile;
}

function makeConfig(overrides: Partial<TransferConfig> = {}): TransferConfig {
  return {
    source: { provider: 'gcs', bucket: 'media-archive', projectId: 'test-project' },
    target: { folderName: 'Backup' },
    concurrency: 2,
    skipConfirmation: true,
    ...overrides,
  };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('loadDriveCredential', () => {
  it('bills Drive requests to the configured project', async () => {
    const target = { folderName: 'Backup', keyFile: writeServiceAccountKey(), projectId: 'billing-project' };
    const auth = createDriveAuth(target);

    await loadDriveCredential(auth, target);

    const client = await auth.getClient();
    expect(client.quotaProjectId).toBe('billing-project');
  });

  it('leaves the quota project alone without a project id', async () => {
    const target = { folderName: 'Backup', keyFile: writeServiceAccountKey() };
    const auth = createDriveAuth(target);

    await loadDriveCredential(auth, target);

    const client = await auth.getClient();
    expect(client.quotaProjectId).toBeUndefined();
  });

  it('reports unavailable credentials as a setup error', async () => {
    const auth = createDriveAuth({ folderName: 'Backup' });
    vi.spyOn(auth, 'getClient').mockRejectedValue(
      new Error('Could not load the default credentials. Browse to the setup guide.')
    );

    const loading = loadDriveCredential(auth, { folderName: 'Backup' });

    await expect(loading).rejects.toBeInstanceOf(SetupError);
    await expect(loading).rejects.toMatchObject({ kind: 'missing-credentials' });
  });
});

describe('acquireServices', () => {
  it('builds the bucket source and a new Drive client per call', async () => {
    const services = await acquireServices(
      makeConfig({ target: { folderName: 'Backup', keyFile: writeServiceAccountKey() } })
    );

    expect(services.source).toBeInstanceOf(GcsSource);
    expect(services.source.describe()).toBe('gs://media-archive');

    const first = services.createDestination();
    const second = services.createDestination();
    expect(first).toBeInstanceOf(DriveDestination);
    expect(second).not.toBe(first);
  });

  it('fails on missing Drive credentials before listing the bucket', async () => {
    vi.spyOn(GoogleAuth.prototype, 'getClient').mockRejectedValue(
      new Error('Could not load the default credentials. Browse to the setup guide.')
    );
    const listObjects = vi.spyOn(GcsSource.prototype, 'listObjects');

    const run = runTransfer(makeConfig());

    await expect(run).rejects.toBeInstanceOf(SetupError);
    await expect(run).rejects.toMatchObject({ kind: 'missing-credentials' });
    expect(listObjects).not.toHaveBeenCalled();
  });
});
