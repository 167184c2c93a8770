import { createHash } from 'crypto';
import { open, rename, rm, stat, type FileHandle } from 'fs/promises';
import { join } from 'path';
import {
  ConfigError,
  CryptoError,
  IncompleteMetadataError,
  IntegrityError,
  MetadataInconsistencyError,
  MissingChunkError,
  toIoError,
} from '../errors.js';
import { HEADER_LENGTH, READ_BUFFER_SIZE } from '../constants.js';
import { GROUP_WIDE_FIELDS, type ChunkMetadata } from '../schemas/metadata.schema.js';
import type { UnpackOptions, UnpackResult } from '../types.js';
import { ChunkDecryptor, decodeHeader, deriveKey } from './crypto/index.js';
import { MetadataDemuxer, type ByteSink } from './metadata.js';
import { groupEncFiles, isReservedName, seqLabel, tempMergeName, type EncFileInfo } from './naming.js';
import { restoreFileAttributes } from './files.js';
import { isSafeBaseName, pathExists } from './paths.js';
import { CleanupList } from './cleanup.js';
import { writeAll, type UnitRunner, runDirectly } from './io.js';
import { logger } from '../ui/logger.js';

export interface DecryptedChunk {
  metadata: ChunkMetadata;
  dataBytes: number;
}

/**
 * Decrypt one chunk file, streaming its file data into sink.
 *
 * A framing error is held until the cipher has seen the whole chunk, so a
 * wrong key reports the padding failure. A record that still fails to frame
 * or parse after the padding checks out means corrupted ciphertext and is
 * reported as a CryptoError too.
 */
export const decryptChunk = async (
  chunkPath: string,
  password: Uint8Array,
  sink: ByteSink
): Promise<DecryptedChunk> => {
  let handle: FileHandle;
  try {
    handle = await open(chunkPath, 'r');
  } catch (error) {
    throw toIoError(error, chunkPath, 'open chunk');
  }

  try {
    const headerBytes = Buffer.alloc(HEADER_LENGTH);
    const { bytesRead: headerRead } = await handle.read(headerBytes, 0, HEADER_LENGTH, 0);
    const header = decodeHeader(headerBytes.subarray(0, headerRead));

    const key = deriveKey(password, header.salt);
    const decryptor = new ChunkDecryptor(key, header.iv);
    const demuxer = new MetadataDemuxer(sink);
    const framing: { error: MetadataInconsistencyError | null } = { error: null };

    const feed = async (plaintext: Buffer): Promise<void> => {
      if (framing.error) {
        return;
      }
      try {
        await demuxer.push(plaintext);
      } catch (error) {
        if (!(error instanceof MetadataInconsistencyError)) {
          throw error;
        }
        framing.error = error;
      }
    };

    const buffer = Buffer.alloc(READ_BUFFER_SIZE);
    let position = HEADER_LENGTH;
    for (;;) {
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, position);
      if (bytesRead === 0) {
        break;
      }
      position += bytesRead;
      await feed(decryptor.update(buffer.subarray(0, bytesRead)));
    }
    await feed(decryptor.finalize());

    if (framing.error) {
      throw new CryptoError(`corrupted metadata record in ${chunkPath} (${framing.error.message})`);
    }

    let metadata: ChunkMetadata;
    try {
      metadata = demuxer.metadata();
    } catch (error) {
      if (error instanceof MetadataInconsistencyError || error instanceof IncompleteMetadataError) {
        throw new CryptoError(`corrupted metadata record in ${chunkPath} (${error.message})`);
      }
      throw error;
    }

    return { metadata, dataBytes: demuxer.forwardedBytes };
  } catch (error) {
    throw toIoError(error, chunkPath, 'read chunk');
  } finally {
    await handle.close();
  }
};

/**
 * Check a chunk's record against its position and against chunk 0
 */
const checkChunkMetadata = (
  file: EncFileInfo,
  expectedIndex: number,
  chunk: DecryptedChunk,
  mergedBefore: number,
  reference: ChunkMetadata | null
): void => {
  const { metadata } = chunk;
  const where = `${file.groupId}_${file.seqLabel}`;

  if (metadata.chunk_index !== expectedIndex) {
    throw new MetadataInconsistencyError(
      `${where} declares chunk_index ${metadata.chunk_index}, expected ${expectedIndex}`
    );
  }
  if (metadata.group_id !== file.groupId) {
    throw new MetadataInconsistencyError(`${where} declares group_id ${metadata.group_id}`);
  }
  if (metadata.chunk_offset !== mergedBefore) {
    throw new MetadataInconsistencyError(
      `${where} declares chunk_offset ${metadata.chunk_offset}, expected ${mergedBefore}`
    );
  }
  if (chunk.dataBytes !== metadata.chunk_data_size) {
    throw new MetadataInconsistencyError(
      `${where} carries ${chunk.dataBytes} data byte(s), metadata declares ${metadata.chunk_data_size}`
    );
  }

  if (reference) {
    for (const field of GROUP_WIDE_FIELDS) {
      if (metadata[field] !== reference[field]) {
        throw new MetadataInconsistencyError(
          `${where} disagrees with chunk 0 on ${field} (${String(metadata[field])} vs ${String(reference[field])})`
        );
      }
    }
  }
};

/**
 * Decrypt, merge and verify one group of chunk files into its original file.
 *
 * The merge goes to a hidden temp file that is only renamed into place once
 * every chunk agrees and the hash and size check out. Any failure before
 * that removes the temp file.
 */
export const unpackGroup = async (
  dir: string,
  groupId: string,
  files: EncFileInfo[],
  password: Uint8Array,
  options: UnpackOptions
): Promise<UnpackResult> => {
  if (files.length === 0) {
    throw new MissingChunkError(groupId, seqLabel(0));
  }
  files.forEach((file, i) => {
    if (file.seqIndex !== i) {
      throw new MissingChunkError(groupId, seqLabel(i));
    }
  });

  const tempPath = join(dir, tempMergeName(groupId));
  const cleanup = new CleanupList();

  const result = await cleanup.guard(async (): Promise<UnpackResult> => {
    let out: FileHandle;
    try {
      out = await open(tempPath, 'w');
    } catch (error) {
      throw toIoError(error, tempPath, 'create temp file');
    }
    cleanup.add(tempPath);

    const hash = createHash('md5');
    let merged = 0;
    let reference: ChunkMetadata | null = null;

    const sink: ByteSink = async (data) => {
      try {
        await writeAll(out, data);
      } catch (error) {
        throw toIoError(error, tempPath, 'write temp file');
      }
      hash.update(data);
      merged += data.length;
    };

    try {
      for (const [i, file] of files.entries()) {
        const mergedBefore = merged;
        const chunk = await decryptChunk(file.path, password, sink);
        checkChunkMetadata(file, i, chunk, mergedBefore, reference);

        if (!reference) {
          reference = chunk.metadata;
          if (!isSafeBaseName(reference.filename) || isReservedName(reference.filename, groupId)) {
            throw new MetadataInconsistencyError(`unsafe original filename ${JSON.stringify(reference.filename)}`);
          }
          if (files.length < reference.total_chunks) {
            throw new MissingChunkError(groupId, seqLabel(files.length));
          }
          if (files.length > reference.total_chunks) {
            throw new MetadataInconsistencyError(
              `group ${groupId} has ${files.length} chunk files but declares ${reference.total_chunks}`
            );
          }
        }
      }
    } finally {
      await out.close();
    }

    if (!reference) {
      throw new MissingChunkError(groupId, seqLabel(0));
    }

    const actualMd5 = hash.digest('hex');
    const verified = reference.md5 !== '';
    if (verified && actualMd5 !== reference.md5) {
      throw new IntegrityError(`MD5 mismatch for ${reference.filename}`, reference.md5, actualMd5);
    }

    let tempSize: number;
    try {
      tempSize = (await stat(tempPath)).size;
    } catch (error) {
      throw toIoError(error, tempPath, 'stat');
    }
    if (tempSize !== reference.file_size || merged !== reference.file_size) {
      throw new IntegrityError(
        `size mismatch for ${reference.filename}`,
        String(reference.file_size),
        String(tempSize)
      );
    }

    const outputPath = join(dir, reference.filename);
    if (!options.overwrite && (await pathExists(outputPath))) {
      throw new ConfigError(`Output file already exists: ${outputPath}`, [
        'Move the existing file away, or use --overwrite to replace it',
      ]);
    }

    try {
      await rename(tempPath, outputPath);
    } catch (error) {
      throw toIoError(error, outputPath, 'rename temp file to');
    }
    cleanup.release();

    const { filename } = reference;
    const warnings = await restoreFileAttributes(outputPath, reference.permissions, reference.modified);
    warnings.forEach((w) => logger.debug(`${filename}: ${w}`));

    return {
      groupId,
      output: outputPath,
      fileSize: reference.file_size,
      md5: verified ? actualMd5 : '',
      verified,
      chunkCount: files.length,
      deletedChunks: false,
      warnings,
    };
  });

  if (options.delete) {
    for (const file of files) {
      try {
        await rm(file.path);
      } catch (error) {
        throw toIoError(error, file.path, 'delete chunk');
      }
    }
    result.deletedChunks = true;
  }

  return result;
};

/**
 * Unpack every chunk group in a directory, in group id order.
 * Stops at the first failure; groups already restored stay restored.
 */
export const unpackDirectory = async (
  dir: string,
  password: Uint8Array,
  options: UnpackOptions,
  run: UnitRunner<UnpackResult> = runDirectly
): Promise<UnpackResult[]> => {
  const groups = await groupEncFiles(dir);
  const results: UnpackResult[] = [];

  for (const [groupId, files] of groups) {
    const result = await run(`Unpacking ${groupId} (${files.length} chunk(s))`, () =>
      unpackGroup(dir, groupId, files, password, options)
    );
    results.push(result);
  }

  return results;
};
