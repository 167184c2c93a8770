import { randomBytes } from 'crypto';
import { readFile, writeFile } from 'fs/promises';
import { pathExists } from 'fs-extra';
import { ConfigError, toIoError } from '../../errors.js';
import { DEFAULT_KEY_LENGTH, MAX_KEY_LENGTH, MIN_KEY_LENGTH } from '../../constants.js';
import { expandPath } from '../paths.js';

export interface GenerateKeyFileOptions {
  length?: number;
  force?: boolean;
}

export interface GeneratedKeyFile {
  path: string;
  length: number;
  encodedLength: number;
}

/**
 * Load a key file as password bytes.
 * Any text file works; surrounding whitespace is trimmed.
 */
export const loadKeyFile = async (keyPath: string): Promise<Buffer> => {
  const expandedPath = expandPath(keyPath);

  let content: string;
  try {
    content = await readFile(expandedPath, 'utf-8');
  } catch (error) {
    throw toIoError(error, expandedPath, 'read key file');
  }

  const password = content.trim();
  if (password.length === 0) {
    throw new ConfigError(`Key file is empty: ${expandedPath}`, [
      'Run `cokacenc generate --output <file>` to create a key file',
    ]);
  }

  return Buffer.from(password, 'utf-8');
};

/**
 * Base64 without trailing padding, the key file text encoding
 */
export const encodeKeyMaterial = (raw: Uint8Array): string => {
  return Buffer.from(raw).toString('base64').replace(/=+$/, '');
};

export const generateKeyFile = async (
  outputPath: string,
  options?: GenerateKeyFileOptions
): Promise<GeneratedKeyFile> => {
  const expandedPath = expandPath(outputPath);
  const length = options?.length ?? DEFAULT_KEY_LENGTH;

  if (!Number.isInteger(length) || length < MIN_KEY_LENGTH || length > MAX_KEY_LENGTH) {
    throw new ConfigError(
      `Key length must be an integer between ${MIN_KEY_LENGTH} and ${MAX_KEY_LENGTH}, got ${length}`
    );
  }

  if (!options?.force && (await pathExists(expandedPath))) {
    throw new ConfigError(`File already exists: ${expandedPath}`, ['Use --force to overwrite']);
  }

  const encoded = encodeKeyMaterial(randomBytes(length));

  try {
    await writeFile(expandedPath, encoded, { encoding: 'utf-8', mode: 0o600 });
  } catch (error) {
    throw toIoError(error, expandedPath, 'write key file');
  }

  return { path: expandedPath, length, encodedLength: encoded.length };
};
