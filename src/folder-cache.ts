// Third-party dependencies
import pLimit from 'p-limit';

// Local imports
import { resolveOrCreateFolder } from './folder-resolver';

// Types
import type { DestinationStore } from './types';

/**
 * Drop empty segments so `a//b` and `/a/b` resolve like `a/b`
 */
export function normalizeSegments(segments: string[]): string[] {
  return segments.filter(segment => segment.length > 0);
}

/**
 * Run-wide map from a folder path (slash-joined segments below the root) to its Drive id.
 *
 * Lookups of known paths never wait. Misses are resolved one at a time behind a
 * single lock and re-checked once the lock is held, so each prefix costs at most
 * one resolve-or-create round trip no matter how many workers ask for it.
 */
export class FolderPathCache {
  private readonly folders = new Map<string, string>();
  private readonly lock = pLimit(1);

  get size(): number {
    return this.folders.size;
  }

  get(path: string): string | undefined {
    return this.folders.get(path);
  }

  /**
   * Resolve the folder chain for `segments` under `rootId`, returning the id of the last folder
   */
  async resolve(rootId: string, segments: string[], destination: DestinationStore): Promise<string> {
    let parentId = rootId;
    let currentPath = '';

    for (const segment of normalizeSegments(segments)) {
      currentPath = currentPath ? `${currentPath}/${segment}` : segment;

      const cached = this.folders.get(currentPath);
      if (cached) {
        parentId = cached;
        continue;
      }

      parentId = await this.resolveLocked(currentPath, segment, parentId, destination);
    }

    return parentId;
  }

  private resolveLocked(
    path: string,
    name: string,
    parentId: string,
    destination: DestinationStore
  ): Promise<string> {
    return this.lock(async () => {
      // Another worker may have filled it while we waited
      const existing = this.folders.get(path);
      if (existing) {
        return existing;
      }

      const folderId = await resolveOrCreateFolder(destination, name, parentId);
      this.folders.set(path, folderId);
      return folderId;
    });
  }
}
