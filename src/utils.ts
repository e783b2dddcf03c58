// Types
import type { SourceConfig } from './types';

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number, decimals = 2): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.floor(Math.log(bytes) / Math.log(k));

  return parseFloat((bytes / Math.pow(k, i)).toFixed(decimals)) + ' ' + sizes[i];
}

/**
 * Format time duration in seconds to human-readable string
 */
export function formatTime(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  const parts: string[] = [];
  if (hours > 0) {
    parts.push(`${hours}h`);
  }
  if (minutes > 0) {
    parts.push(`${minutes}m`);
  }
  if (secs > 0 || parts.length === 0) {
    parts.push(`${secs}s`);
  }

  return parts.join(' ');
}

/**
 * Shorten a key for progress bar display, keeping its tail
 */
export function truncateKey(key: string, maxLength = 30): string {
  return key.length > maxLength ? '...' + key.slice(-maxLength) : key;
}

export function describeSource(source: SourceConfig): string {
  if (source.provider === 's3') {
    return `${source.endpoint}/${source.bucket}`;
  }
  return `gs://${source.bucket}`;
}
