/**
 * A chunk's filename comes from decrypted metadata, so a hostile chunk made
 * with the right key must still not write outside the target directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { ChunkEncryptor, deriveKey, encodeHeader, generateIv, generateSalt } from '../../src/lib/crypto/index.js';
import { frameMetadata } from '../../src/lib/metadata.js';
import { unpackDirectory } from '../../src/lib/unpack.js';
import { pathExists } from '../../src/lib/paths.js';
import { MetadataInconsistencyError } from '../../src/errors.js';
import { TEST_PASSWORD, createTempDir, removeTempDir, listDir, unpackOptions } from '../utils/testHelpers.js';

const GROUP_ID = '00000000000000aa';

const writeHostileChunk = async (dir: string, filename: string): Promise<void> => {
  const data = Buffer.from('payload');
  const salt = generateSalt();
  const iv = generateIv();
  const encryptor = new ChunkEncryptor(deriveKey(TEST_PASSWORD, salt), iv);
  const plaintext = Buffer.concat([
    frameMetadata({
      version: 2,
      group_id: GROUP_ID,
      filename,
      file_size: data.length,
      md5: '',
      modified: 1700000000,
      permissions: 0o644,
      total_chunks: 1,
      chunk_index: 0,
      chunk_offset: 0,
      chunk_data_size: data.length,
    }),
    data,
  ]);
  const chunk = Buffer.concat([encodeHeader(salt, iv), encryptor.update(plaintext), encryptor.finalize()]);
  await writeFile(join(dir, `${GROUP_ID}_aaaa.cokacenc`), chunk);
};

describe('Path Traversal Security', () => {
  let root: string;
  let dir: string;

  beforeEach(async () => {
    root = await createTempDir();
    dir = join(root, 'target');
    await mkdir(dir);
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it.each(['../escape.txt', 'sub/escape.txt', '..', '/tmp/escape.txt'])(
    'rejects original filename %s',
    async (filename) => {
      await writeHostileChunk(dir, filename);

      await expect(unpackDirectory(dir, TEST_PASSWORD, unpackOptions())).rejects.toThrow(MetadataInconsistencyError);

      expect(await pathExists(join(dirname(dir), 'escape.txt'))).toBe(false);
      expect(await listDir(dir)).toEqual([`${GROUP_ID}_aaaa.cokacenc`]);
    }
  );

  it.each([`${GROUP_ID}_aaaa.cokacenc`, `.${GROUP_ID}.unpacking`, 'other.cokacenc'])(
    'rejects original filename %s that would clobber chunk or merge files',
    async (filename) => {
      await writeHostileChunk(dir, filename);

      await expect(
        unpackDirectory(dir, TEST_PASSWORD, unpackOptions({ overwrite: true, delete: true }))
      ).rejects.toThrow(MetadataInconsistencyError);

      expect(await listDir(dir)).toEqual([`${GROUP_ID}_aaaa.cokacenc`]);
    }
  );

  it('accepts a plain file name', async () => {
    await writeHostileChunk(dir, 'fine.txt');

    const [result] = await unpackDirectory(dir, TEST_PASSWORD, unpackOptions());

    expect(result.output).toBe(join(dir, 'fine.txt'));
  });
});
