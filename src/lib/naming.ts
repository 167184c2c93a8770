import { randomBytes } from 'crypto';
import { readdir } from 'fs/promises';
import { join } from 'path';
import { GroupIdExhaustedError, SeqOverflowError, toIoError } from '../errors.js';
import {
  CHUNK_EXTENSION,
  GROUP_ID_ATTEMPTS,
  GROUP_ID_BYTES,
  MAX_CHUNKS,
  SEQ_LABEL_LENGTH,
  UNPACK_TEMP_SUFFIX,
} from '../constants.js';

const ALPHABET_SIZE = 26;
const CHAR_CODE_A = 'a'.charCodeAt(0);
const CHUNK_NAME_PATTERN = new RegExp(
  `^([0-9a-f]{${GROUP_ID_BYTES * 2}})_([a-z]{${SEQ_LABEL_LENGTH}})${CHUNK_EXTENSION.replace('.', '\\.')}$`
);

export interface EncFileInfo {
  groupId: string;
  seqIndex: number;
  seqLabel: string;
  path: string;
}

/**
 * Encode a chunk index as a four-letter label: 0 → "aaaa", 456975 → "zzzz"
 */
export const seqLabel = (index: number): string => {
  if (!Number.isInteger(index) || index < 0 || index >= MAX_CHUNKS) {
    throw new SeqOverflowError(index);
  }

  let rest = index;
  const letters: string[] = [];
  for (let i = 0; i < SEQ_LABEL_LENGTH; i++) {
    letters.unshift(String.fromCharCode(CHAR_CODE_A + (rest % ALPHABET_SIZE)));
    rest = Math.floor(rest / ALPHABET_SIZE);
  }
  return letters.join('');
};

/**
 * Decode a four-letter label, or null when it is not one
 */
export const parseSeqLabel = (label: string): number | null => {
  if (label.length !== SEQ_LABEL_LENGTH) {
    return null;
  }

  let index = 0;
  for (let i = 0; i < label.length; i++) {
    const digit = label.charCodeAt(i) - CHAR_CODE_A;
    if (digit < 0 || digit >= ALPHABET_SIZE) {
      return null;
    }
    index = index * ALPHABET_SIZE + digit;
  }
  return index;
};

export const chunkFileName = (groupId: string, index: number): string => {
  return `${groupId}_${seqLabel(index)}${CHUNK_EXTENSION}`;
};

export const parseChunkFileName = (name: string): { groupId: string; seqIndex: number } | null => {
  const match = CHUNK_NAME_PATTERN.exec(name);
  if (!match) {
    return null;
  }
  const seqIndex = parseSeqLabel(match[2]);
  if (seqIndex === null) {
    return null;
  }
  return { groupId: match[1], seqIndex };
};

export const isChunkFileName = (name: string): boolean => {
  return name.endsWith(CHUNK_EXTENSION);
};

/** Hidden merge target used while a group is being unpacked */
export const tempMergeName = (groupId: string): string => {
  return `.${groupId}${UNPACK_TEMP_SUFFIX}`;
};

/**
 * Names unpack must never write a merged file to: any chunk file, or the
 * group's own merge target
 */
export const isReservedName = (name: string, groupId: string): boolean => {
  return isChunkFileName(name) || name === tempMergeName(groupId);
};

/**
 * Generate a random 16-hex group id that is not already taken.
 * Gives up after a fixed number of attempts instead of spinning forever.
 */
export const generateGroupId = (
  existing: ReadonlySet<string>,
  random: (size: number) => Buffer = randomBytes
): string => {
  for (let attempt = 0; attempt < GROUP_ID_ATTEMPTS; attempt++) {
    const candidate = random(GROUP_ID_BYTES).toString('hex');
    if (!existing.has(candidate)) {
      return candidate;
    }
  }
  throw new GroupIdExhaustedError(GROUP_ID_ATTEMPTS);
};

const scanChunkFiles = async (dir: string): Promise<EncFileInfo[]> => {
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw toIoError(error, dir, 'read directory');
  }

  const files: EncFileInfo[] = [];
  for (const entry of entries) {
    if (!entry.isFile()) {
      continue;
    }
    const parsed = parseChunkFileName(entry.name);
    if (!parsed) {
      continue;
    }
    files.push({
      groupId: parsed.groupId,
      seqIndex: parsed.seqIndex,
      seqLabel: seqLabel(parsed.seqIndex),
      path: join(dir, entry.name),
    });
  }
  return files;
};

export const existingGroupIds = async (dir: string): Promise<Set<string>> => {
  const files = await scanChunkFiles(dir);
  return new Set(files.map((f) => f.groupId));
};

/**
 * Group chunk files in a directory by group id.
 * Groups come back ordered by id, chunks within a group by sequence index.
 */
export const groupEncFiles = async (dir: string): Promise<Map<string, EncFileInfo[]>> => {
  const files = await scanChunkFiles(dir);

  const buckets = new Map<string, EncFileInfo[]>();
  for (const file of files) {
    const bucket = buckets.get(file.groupId);
    if (bucket) {
      bucket.push(file);
    } else {
      buckets.set(file.groupId, [file]);
    }
  }

  const groups = new Map<string, EncFileInfo[]>();
  for (const groupId of [...buckets.keys()].sort()) {
    const bucket = buckets.get(groupId) ?? [];
    groups.set(
      groupId,
      bucket.sort((a, b) => a.seqIndex - b.seqIndex)
    );
  }
  return groups;
};
