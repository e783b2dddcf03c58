// Third-party dependencies
import { Storage } from '@google-cloud/storage';

// Types
import type { GetFilesOptions } from '@google-cloud/storage';
import type { GcsSourceConfig, SourceObject, SourceStore } from './types';

/**
 * The parts of a Cloud Storage `File` this tool reads
 */
export interface StoredFile {
  name: string;
  metadata: {
    size?: string | number;
    contentType?: string;
  };
  download(): Promise<[Buffer]>;
}

/**
 * The slice of a Cloud Storage `Bucket` this tool calls
 */
export interface BucketFilesApi {
  getFiles(query: GetFilesOptions): Promise<[StoredFile[], ...unknown[]]>;
}

/**
 * Create a Cloud Storage client from a key file, or from Application Default Credentials
 */
export function createStorageClient(config: GcsSourceConfig): Storage {
  return new Storage({
    keyFilename: config.keyFile,
    projectId: config.projectId,
  });
}

export function toSourceObject(file: StoredFile): SourceObject {
  // Object sizes arrive as decimal strings
  const size = Number(file.metadata.size ?? 0);
  const contentType = file.metadata.contentType || undefined;

  return {
    key: file.name,
    size: Number.isFinite(size) ? size : 0,
    contentType,
    read: async () => {
      const [data] = await file.download();
      return { data, contentType };
    },
  };
}

export class GcsSource implements SourceStore {
  constructor(
    private readonly bucket: BucketFilesApi,
    private readonly bucketName: string
  ) {}

  describe(): string {
    return `gs://${this.bucketName}`;
  }

  async listObjects(prefix?: string): Promise<SourceObject[]> {
    const [files] = await this.bucket.getFiles({
      prefix: prefix || undefined,
      autoPaginate: true,
    });
    return files.map(toSourceObject);
  }
}
