import { describe, expect, it } from 'vitest';

import { describeSource, formatBytes, formatTime, truncateKey } from '../src/utils';

describe('utils', () => {
  it('formats byte counts', () => {
    expect(formatBytes(0)).toBe('0 Bytes');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5 MB');
  });

  it('formats durations', () => {
    expect(formatTime(0)).toBe('0s');
    expect(formatTime(3725)).toBe('1h 2m 5s');
    expect(formatTime(120)).toBe('2m');
  });

  it('keeps the tail of long keys', () => {
    expect(truncateKey('short.txt')).toBe('short.txt');
    expect(truncateKey('a'.repeat(10) + 'b'.repeat(30))).toBe('...' + 'b'.repeat(30));
  });

  it('describes sources', () => {
    expect(describeSource({ provider: 'gcs', bucket: 'media' })).toBe('gs://media');
    expect(
      describeSource({
        provider: 's3',
        bucket: 'media',
        endpoint: 'http://localhost:9000',
        accessKey: 'test-access',
        secretKey: 'test-secret',
        region: 'us-east-1',
      })
    ).toBe('http://localhost:9000/media');
  });
});
