import { homedir } from 'os';
import { join, basename, isAbsolute, resolve } from 'path';
import { stat, access } from 'fs/promises';
import { constants } from 'fs';

export const expandPath = (path: string): string => {
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  if (path.startsWith('$HOME/')) {
    return join(homedir(), path.slice(6));
  }
  return isAbsolute(path) ? path : resolve(path);
};

export const pathExists = async (path: string): Promise<boolean> => {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
};

export const isDirectory = async (path: string): Promise<boolean> => {
  try {
    const stats = await stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
};

/**
 * Check that a name read from chunk metadata is a plain file name.
 * Rejects anything that would resolve outside the target directory.
 */
export const isSafeBaseName = (name: string): boolean => {
  if (name.length === 0 || name === '.' || name === '..') {
    return false;
  }
  if (name.includes('/') || name.includes('\\') || name.includes('\0')) {
    return false;
  }
  return basename(name) === name;
};
