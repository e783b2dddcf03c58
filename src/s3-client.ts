// Third-party dependencies
import { GetObjectCommand, ListObjectsV2Command, S3Client } from '@aws-sdk/client-s3';

// Types
import type { ListObjectsV2CommandOutput, S3ClientConfig } from '@aws-sdk/client-s3';
import type { ObjectPayload, S3Credentials, SourceObject, SourceStore } from './types';

export interface ListedObject {
  key: string;
  size: number;
}

/**
 * Create an S3 client from credentials
 */
export function createS3Client(credentials: S3Credentials): S3Client {
  const clientConfig: S3ClientConfig = {
    endpoint: credentials.endpoint,
    region: credentials.region,
    credentials: {
      accessKeyId: credentials.accessKey,
      secretAccessKey: credentials.secretKey,
    },
    forcePathStyle: credentials.forcePathStyle ?? false,
  };

  return new S3Client(clientConfig);
}

/**
 * List all objects in a bucket with pagination
 */
export async function* listAllObjects(
  client: S3Client,
  bucket: string,
  prefix?: string
): AsyncGenerator<ListedObject[]> {
  let continuationToken: string | undefined;

  do {
    const command = new ListObjectsV2Command({
      Bucket: bucket,
      Prefix: prefix || undefined,
      ContinuationToken: continuationToken,
      MaxKeys: 1000,
    });

    const response: ListObjectsV2CommandOutput = await client.send(command);

    if (response.Contents && response.Contents.length > 0) {
      const page: ListedObject[] = [];
      for (const item of response.Contents) {
        if (item.Key) {
          page.push({ key: item.Key, size: item.Size ?? 0 });
        }
      }
      yield page;
    }

    continuationToken = response.NextContinuationToken;
  } while (continuationToken);
}

/**
 * Download an object fully into memory
 */
export async function downloadObject(
  client: S3Client,
  bucket: string,
  key: string
): Promise<ObjectPayload> {
  const response = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));

  if (!response.Body) {
    throw new Error(`Empty response body for ${key}`);
  }

  const bytes = await response.Body.transformToByteArray();
  return {
    data: Buffer.from(bytes),
    contentType: response.ContentType || undefined,
  };
}

export class S3Source implements SourceStore {
  constructor(
    private readonly client: S3Client,
    private readonly credentials: S3Credentials
  ) {}

  describe(): string {
    return `${this.credentials.endpoint}/${this.credentials.bucket}`;
  }

  async listObjects(prefix?: string): Promise<SourceObject[]> {
    const { bucket } = this.credentials;
    const objects: SourceObject[] = [];

    for await (const page of listAllObjects(this.client, bucket, prefix)) {
      for (const item of page) {
        objects.push({
          key: item.key,
          size: item.size,
          read: () => downloadObject(this.client, bucket, item.key),
        });
      }
    }

    return objects;
  }
}
