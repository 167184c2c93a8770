import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { readdir, stat, chmod, utimes } from 'fs/promises';
import { join } from 'path';
import { toIoError } from '../errors.js';
import { isChunkFileName } from './naming.js';

export interface FileInfo {
  path: string;
  size: number;
  /** Full MD5 hex, empty when not computed */
  md5: string;
  /** Unix seconds */
  modified: number;
  permissions: number;
}

export const computeFileMd5 = async (filepath: string): Promise<string> => {
  const hash = createHash('md5');
  try {
    for await (const piece of createReadStream(filepath)) {
      hash.update(piece);
    }
  } catch (error) {
    throw toIoError(error, filepath, 'read');
  }
  return hash.digest('hex');
};

/**
 * Pass 1 of pack: everything every chunk's metadata needs
 */
export const getFileInfo = async (
  filepath: string,
  options?: { md5?: boolean }
): Promise<FileInfo> => {
  let stats;
  try {
    stats = await stat(filepath);
  } catch (error) {
    throw toIoError(error, filepath, 'stat');
  }

  const md5 = options?.md5 ? await computeFileMd5(filepath) : '';

  return {
    path: filepath,
    size: stats.size,
    md5,
    modified: Math.floor(stats.mtimeMs / 1000),
    permissions: stats.mode & 0o777,
  };
};

/**
 * Regular, non-hidden files that are not chunk files, sorted by name
 */
export const listPackableFiles = async (dir: string): Promise<string[]> => {
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw toIoError(error, dir, 'read directory');
  }

  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => !name.startsWith('.') && !isChunkFileName(name))
    .sort()
    .map((name) => join(dir, name));
};

/**
 * Restore mode bits and modification time on a merged file.
 * Returns the failures instead of throwing; neither is fatal.
 */
export const restoreFileAttributes = async (
  filepath: string,
  permissions: number,
  modified: number
): Promise<string[]> => {
  const warnings: string[] = [];

  try {
    await chmod(filepath, permissions);
  } catch (error) {
    warnings.push(`Could not restore permissions ${permissions.toString(8)}: ${String(error)}`);
  }

  try {
    await utimes(filepath, new Date(), modified);
  } catch (error) {
    warnings.push(`Could not restore modification time: ${String(error)}`);
  }

  return warnings;
};

export const formatBytes = (bytes: number): string => {
  // Handle invalid, negative, or zero values
  if (!Number.isFinite(bytes) || bytes <= 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.floor(Math.log(bytes) / Math.log(k));
  // Ensure index is within bounds to prevent undefined access
  const safeIndex = Math.max(0, Math.min(i, sizes.length - 1));
  return `${parseFloat((bytes / Math.pow(k, safeIndex)).toFixed(1))} ${sizes[safeIndex]}`;
};
