import { describe, expect, it, vi } from 'vitest';

import { GcsSource, toSourceObject } from '../src/gcs-source';

import type { GetFilesOptions } from '@google-cloud/storage';
import type { StoredFile } from '../src/gcs-source';

function makeFile(name: string, metadata: StoredFile['metadata'], body = `contents of ${name}`): StoredFile {
  return {
    name,
    metadata,
    download: async (): Promise<[Buffer]> => [Buffer.from(body)],
  };
}

function fakeBucket(files: StoredFile[]) {
  return {
    getFiles: vi.fn(async (_query: GetFilesOptions): Promise<[StoredFile[]]> => [files]),
  };
}

describe('toSourceObject', () => {
  it('reads size and content type from the object metadata', () => {
    const object = toSourceObject(makeFile('photos/a.jpg', { size: '2048', contentType: 'image/jpeg' }));

    expect(object).toMatchObject({ key: 'photos/a.jpg', size: 2048, contentType: 'image/jpeg' });
  });

  it('falls back to zero for missing or unreadable sizes', () => {
    expect(toSourceObject(makeFile('a', { size: 'not-a-number' })).size).toBe(0);
    expect(toSourceObject(makeFile('b', {})).size).toBe(0);
    expect(toSourceObject(makeFile('c', { size: 17 })).size).toBe(17);
  });

  it('leaves an empty content type unset', () => {
    expect(toSourceObject(makeFile('a', { contentType: '' })).contentType).toBeUndefined();
  });

  it('downloads the object body on read', async () => {
    const object = toSourceObject(makeFile('notes/a.txt', { size: '5', contentType: 'text/plain' }, 'hello'));

    const payload = await object.read();

    expect(payload.data.toString('utf-8')).toBe('hello');
    expect(payload.contentType).toBe('text/plain');
  });
});

describe('GcsSource', () => {
  it('describes itself by bucket url', () => {
    expect(new GcsSource(fakeBucket([]), 'media-archive').describe()).toBe('gs://media-archive');
  });

  it('lists every page under the prefix', async () => {
    const bucket = fakeBucket([makeFile('photos/a.jpg', { size: '3' }), makeFile('photos/b.jpg', { size: '4' })]);
    const source = new GcsSource(bucket, 'media-archive');

    const objects = await source.listObjects('photos/');

    expect(objects.map(object => [object.key, object.size])).toEqual([
      ['photos/a.jpg', 3],
      ['photos/b.jpg', 4],
    ]);
    expect(bucket.getFiles).toHaveBeenCalledWith({ prefix: 'photos/', autoPaginate: true });
  });

  it('lists the whole bucket without a prefix', async () => {
    const bucket = fakeBucket([]);

    await new GcsSource(bucket, 'media-archive').listObjects();

    expect(bucket.getFiles).toHaveBeenCalledTimes(1);
    expect(bucket.getFiles.mock.calls[0]?.[0]).toEqual({ prefix: undefined, autoPaginate: true });
  });
});
