import { z } from 'zod';

const byteCount = z.number().int().nonnegative();

/**
 * Metadata record embedded at the start of every chunk's plaintext.
 * Unknown keys are stripped on parse so newer writers stay readable.
 */
export const chunkMetadataSchema = z.object({
  version: z.number().int().positive(),
  group_id: z.string().regex(/^[0-9a-f]{16}$/, 'group_id must be 16 lowercase hex characters'),
  filename: z.string().min(1),
  file_size: byteCount,
  /** Full MD5 hex of the original file, empty when not computed */
  md5: z.union([z.literal(''), z.string().regex(/^[0-9a-f]{32}$/)]),
  /** Unix seconds */
  modified: z.number().int(),
  permissions: z.number().int().min(0).max(0o7777),
  total_chunks: z.number().int().positive(),
  chunk_index: byteCount,
  chunk_offset: byteCount,
  chunk_data_size: byteCount,
});

export type ChunkMetadata = z.output<typeof chunkMetadataSchema>;

/** Fields every chunk of a group must agree on */
export const GROUP_WIDE_FIELDS = [
  'group_id',
  'filename',
  'file_size',
  'md5',
  'modified',
  'permissions',
  'total_chunks',
] as const satisfies readonly (keyof ChunkMetadata)[];
