import { open, rm, type FileHandle } from 'fs/promises';
import { basename, dirname, join, resolve } from 'path';
import { IoError, SeqOverflowError, toIoError } from '../errors.js';
import { MAX_CHUNKS, METADATA_VERSION, READ_BUFFER_SIZE } from '../constants.js';
import type { ChunkMetadata } from '../schemas/metadata.schema.js';
import type { PackOptions, PackResult } from '../types.js';
import { ChunkEncryptor, deriveKey, encodeHeader, generateIv, generateSalt } from './crypto/index.js';
import { frameMetadata } from './metadata.js';
import { chunkFileName, existingGroupIds, generateGroupId } from './naming.js';
import { getFileInfo, listPackableFiles, type FileInfo } from './files.js';
import { CleanupList } from './cleanup.js';
import { writeAll, type UnitRunner, runDirectly } from './io.js';
import { logger } from '../ui/logger.js';

export interface ChunkSlice {
  index: number;
  offset: number;
  size: number;
}

/**
 * Number of chunks a file of fileSize bytes splits into.
 * An empty file, or splitSize 0, still gets exactly one chunk.
 */
export const countChunks = (fileSize: number, splitSize: number): number => {
  if (splitSize <= 0) {
    return 1;
  }
  return Math.max(1, Math.ceil(fileSize / splitSize));
};

export const planChunks = (fileSize: number, splitSize: number): ChunkSlice[] => {
  const total = countChunks(fileSize, splitSize);
  if (total > MAX_CHUNKS) {
    throw new SeqOverflowError(total - 1);
  }
  if (total === 1) {
    return [{ index: 0, offset: 0, size: fileSize }];
  }

  const slices: ChunkSlice[] = [];
  for (let index = 0; index < total; index++) {
    const offset = index * splitSize;
    slices.push({ index, offset, size: Math.min(splitSize, fileSize - offset) });
  }
  return slices;
};

export const buildChunkMetadata = (
  groupId: string,
  filename: string,
  info: FileInfo,
  slice: ChunkSlice,
  totalChunks: number
): ChunkMetadata => ({
  version: METADATA_VERSION,
  group_id: groupId,
  filename,
  file_size: info.size,
  md5: info.md5,
  modified: info.modified,
  permissions: info.permissions,
  total_chunks: totalChunks,
  chunk_index: slice.index,
  chunk_offset: slice.offset,
  chunk_data_size: slice.size,
});

/**
 * Encrypt one slice of the source into its own chunk file
 */
const writeChunk = async (
  chunkPath: string,
  source: FileHandle,
  sourcePath: string,
  metadata: ChunkMetadata,
  password: Uint8Array,
  cleanup: CleanupList
): Promise<void> => {
  const salt = generateSalt();
  const iv = generateIv();
  const key = deriveKey(password, salt);

  let out: FileHandle;
  try {
    // 'wx' refuses to clobber a chunk that appeared since the group id was chosen
    out = await open(chunkPath, 'wx');
  } catch (error) {
    throw toIoError(error, chunkPath, 'create chunk');
  }
  cleanup.add(chunkPath);

  try {
    await writeAll(out, encodeHeader(salt, iv));

    const encryptor = new ChunkEncryptor(key, iv);
    await writeAll(out, encryptor.update(frameMetadata(metadata)));

    const buffer = Buffer.alloc(Math.min(READ_BUFFER_SIZE, Math.max(metadata.chunk_data_size, 1)));
    let remaining = metadata.chunk_data_size;
    let position = metadata.chunk_offset;

    while (remaining > 0) {
      const { bytesRead } = await source.read(buffer, 0, Math.min(buffer.length, remaining), position);
      if (bytesRead === 0) {
        throw new IoError(sourcePath, 'finish reading', new Error('file shrank during pack'));
      }
      await writeAll(out, encryptor.update(buffer.subarray(0, bytesRead)));
      remaining -= bytesRead;
      position += bytesRead;
    }

    await writeAll(out, encryptor.finalize());
  } catch (error) {
    throw toIoError(error, chunkPath, 'write chunk');
  } finally {
    await out.close();
  }
};

/**
 * Pack a single file into one or more encrypted chunks beside it.
 *
 * Pass 1 gathers size, mtime, permissions and (optionally) MD5. Pass 2
 * reads the source once more, front to back, writing one chunk per slice.
 * If any chunk fails, every chunk written so far is removed and the source
 * is left as it was.
 */
export const packFile = async (
  sourcePath: string,
  password: Uint8Array,
  options: PackOptions
): Promise<PackResult> => {
  const dir = dirname(sourcePath);
  const filename = basename(sourcePath);

  const info = await getFileInfo(sourcePath, { md5: options.md5 });
  const slices = planChunks(info.size, options.splitSize);
  const groupId = generateGroupId(await existingGroupIds(dir));

  logger.debug(`${filename}: group ${groupId}, ${slices.length} chunk(s)`);

  const cleanup = new CleanupList();
  const chunks = await cleanup.guard(async () => {
    let source: FileHandle;
    try {
      source = await open(sourcePath, 'r');
    } catch (error) {
      throw toIoError(error, sourcePath, 'open');
    }

    try {
      const written: string[] = [];
      for (const slice of slices) {
        const chunkPath = join(dir, chunkFileName(groupId, slice.index));
        const metadata = buildChunkMetadata(groupId, filename, info, slice, slices.length);
        await writeChunk(chunkPath, source, sourcePath, metadata, password, cleanup);
        written.push(chunkPath);
      }
      return written;
    } finally {
      await source.close();
    }
  });
  cleanup.release();

  let deletedSource = false;
  if (options.delete) {
    try {
      await rm(sourcePath);
    } catch (error) {
      throw toIoError(error, sourcePath, 'delete original');
    }
    deletedSource = true;
  }

  return {
    source: sourcePath,
    groupId,
    fileSize: info.size,
    md5: info.md5,
    chunks,
    deletedSource,
  };
};

/**
 * Pack every eligible file in a directory, one at a time.
 * Stops at the first failure; files packed before it stay packed.
 */
export const packDirectory = async (
  dir: string,
  password: Uint8Array,
  options: PackOptions,
  run: UnitRunner<PackResult> = runDirectly
): Promise<PackResult[]> => {
  const excluded = new Set((options.exclude ?? []).map((path) => resolve(path)));
  const files = (await listPackableFiles(dir)).filter((file) => !excluded.has(resolve(file)));
  const results: PackResult[] = [];

  for (const file of files) {
    const result = await run(`Packing ${basename(file)}`, () => packFile(file, password, options));
    results.push(result);
  }

  return results;
};
