// Local imports
import { logVerbose } from './logger';

// Types
import type { DestinationStore } from './types';

/**
 * Find a folder by exact name under a parent (or at the top level), creating it on a miss.
 * When several folders share the name, the first one listed is used.
 */
export async function resolveOrCreateFolder(
  destination: DestinationStore,
  name: string,
  parentId?: string
): Promise<string> {
  const matches = await destination.find(name, parentId, 'folder');

  if (matches.length > 0) {
    if (matches.length > 1) {
      logVerbose(`Found ${matches.length} folders named "${name}", using ${matches[0].id}`);
    }
    return matches[0].id;
  }

  return destination.createFolder(name, parentId);
}
