// Local imports
import { normalizeSegments } from './folder-cache';
import { logError, logVerbose } from './logger';
import { TransferStatus } from './types';
import { formatBytes } from './utils';

// Types
import type { FolderPathCache } from './folder-cache';
import type { DestinationStore, SourceObject, TransferResult } from './types';

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

export interface WorkerContext {
  rootFolderId: string;
  folderCache: FolderPathCache;
  destination: DestinationStore;
}

export interface ObjectPath {
  folders: string[];
  name: string;
}

export function isDirectoryPlaceholder(key: string): boolean {
  return key.endsWith('/');
}

/**
 * Split a key into its parent folder segments and leaf name
 */
export function splitObjectKey(key: string): ObjectPath {
  const parts = key.split('/');
  const name = parts.pop() ?? '';
  return { folders: normalizeSegments(parts), name };
}

/**
 * The path a key lands on at the destination, used to spot keys that collide
 */
export function destinationPath(key: string): string {
  const { folders, name } = splitObjectKey(key);
  return [...folders, name].join('/');
}

/**
 * Copy one object into its folder under the destination root.
 * Never throws: failures come back as a FAILED result.
 */
export async function transferObject(object: SourceObject, context: WorkerContext): Promise<TransferResult> {
  const { key } = object;

  if (isDirectoryPlaceholder(key)) {
    logVerbose(`Skipping directory placeholder: ${key}`);
    return { key, status: TransferStatus.SKIPPED, reason: 'placeholder' };
  }

  const { folders, name } = splitObjectKey(key);

  try {
    const parentId = await context.folderCache.resolve(context.rootFolderId, folders, context.destination);

    const existing = await context.destination.find(name, parentId, 'any');
    if (existing.length > 0) {
      logVerbose(`Already exists, skipping: ${key} (${existing[0].id})`);
      return { key, status: TransferStatus.SKIPPED, reason: 'exists' };
    }

    const payload = await object.read();
    const contentType = payload.contentType || object.contentType || DEFAULT_CONTENT_TYPE;

    const fileId = await context.destination.createFile(name, parentId, contentType, payload.data);
    logVerbose(`Uploaded ${key} (${formatBytes(payload.data.length)}, ${contentType}) as ${fileId}`);

    return { key, status: TransferStatus.SUCCEEDED, fileId, bytes: payload.data.length };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logError(`Error processing ${key}: ${err.message}`, err);
    return { key, status: TransferStatus.FAILED, error: err };
  }
}
