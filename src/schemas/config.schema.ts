import { z } from 'zod';
import { DEFAULT_SPLIT_SIZE_MB } from '../constants.js';

export const cokacencConfigSchema = z.object({
  /** Key file path used when --key is not given */
  key: z.string().min(1).optional(),
  /** Maximum chunk size in MB; 0 keeps every file in one chunk */
  size: z.number().int().nonnegative().default(DEFAULT_SPLIT_SIZE_MB),
  /** Compute and verify the MD5 of each original file */
  md5: z.boolean().default(false),
  /** Delete originals after pack, chunk files after unpack */
  delete: z.boolean().default(false),
  /** Let unpack replace an existing file of the same name */
  overwrite: z.boolean().default(false),
});

export type CokacencConfigInput = z.input<typeof cokacencConfigSchema>;
export type CokacencConfigOutput = z.output<typeof cokacencConfigSchema>;
