// Node.js built-in modules
import { Readable } from 'node:stream';

// Third-party dependencies
import { google } from 'googleapis';

// Local imports
import { logVerbose } from './logger';

// Types
import type { GoogleAuth } from 'google-auth-library';
import type { drive_v3 } from 'googleapis';
import type { DestinationEntry, DestinationStore, EntryKind } from './types';

export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

/**
 * The slice of `drive.files` this tool calls
 */
export interface DriveFilesApi {
  list(params: drive_v3.Params$Resource$Files$List): Promise<{ data: drive_v3.Schema$FileList }>;
  create(params: drive_v3.Params$Resource$Files$Create): Promise<{ data: drive_v3.Schema$File }>;
}

/**
 * Escape a value for a single-quoted string in the Drive query language
 */
export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

/**
 * Build a `q` expression matching non-trashed entries with an exact name,
 * optionally restricted to folders and to one parent
 */
export function buildEntryQuery(name: string, parentId: string | undefined, kind: EntryKind): string {
  const clauses: string[] = [];

  if (kind === 'folder') {
    clauses.push(`mimeType='${FOLDER_MIME_TYPE}'`);
  }
  clauses.push(`name='${escapeQueryValue(name)}'`);
  clauses.push('trashed=false');
  if (parentId) {
    clauses.push(`'${escapeQueryValue(parentId)}' in parents`);
  }

  return clauses.join(' and ');
}

export class DriveDestination implements DestinationStore {
  constructor(private readonly files: DriveFilesApi) {}

  async find(name: string, parentId: string | undefined, kind: EntryKind): Promise<DestinationEntry[]> {
    const q = buildEntryQuery(name, parentId, kind);
    logVerbose(`Drive query: ${q}`);

    const response = await this.files.list({ q, fields: 'files(id, name)', spaces: 'drive' });

    const entries: DestinationEntry[] = [];
    for (const file of response.data.files ?? []) {
      if (file.id) {
        entries.push({ id: file.id, name: file.name ?? name });
      }
    }
    return entries;
  }

  async createFolder(name: string, parentId?: string): Promise<string> {
    const response = await this.files.create({
      requestBody: {
        name,
        mimeType: FOLDER_MIME_TYPE,
        parents: parentId ? [parentId] : undefined,
      },
      fields: 'id',
    });

    if (!response.data.id) {
      throw new Error(`Drive returned no id for new folder "${name}"`);
    }
    logVerbose(`Created Drive folder "${name}" (${response.data.id})`);
    return response.data.id;
  }

  async createFile(name: string, parentId: string, contentType: string, data: Buffer): Promise<string> {
    const response = await this.files.create({
      requestBody: {
        name,
        parents: [parentId],
      },
      media: {
        mimeType: contentType,
        body: Readable.from(data),
      },
      fields: 'id',
    });

    if (!response.data.id) {
      throw new Error(`Drive returned no id for uploaded file "${name}"`);
    }
    return response.data.id;
  }
}

export interface DriveClientOptions {
  requestTimeout?: number;
}

/**
 * Build an independent Drive client on top of a shared credential
 */
export function createDriveDestination(auth: GoogleAuth, options: DriveClientOptions = {}): DriveDestination {
  const drive = google.drive({
    version: 'v3',
    auth,
    timeout: options.requestTimeout,
  });
  return new DriveDestination(drive.files);
}
