import {
  chunkMetadataSchema,
  type ChunkMetadata,
} from '../schemas/metadata.schema.js';
import { IncompleteMetadataError, MetadataInconsistencyError } from '../errors.js';
import { MAX_METADATA_LENGTH, METADATA_LENGTH_BYTES } from '../constants.js';

export type ByteSink = (data: Buffer) => Promise<void> | void;

export type DemuxState = 'length' | 'body' | 'forwarding';

export const serializeMetadata = (metadata: ChunkMetadata): Buffer => {
  // Explicit field order keeps the record stable across writers
  const record: ChunkMetadata = {
    version: metadata.version,
    group_id: metadata.group_id,
    filename: metadata.filename,
    file_size: metadata.file_size,
    md5: metadata.md5,
    modified: metadata.modified,
    permissions: metadata.permissions,
    total_chunks: metadata.total_chunks,
    chunk_index: metadata.chunk_index,
    chunk_offset: metadata.chunk_offset,
    chunk_data_size: metadata.chunk_data_size,
  };
  return Buffer.from(JSON.stringify(record), 'utf-8');
};

export const parseMetadata = (bytes: Uint8Array): ChunkMetadata => {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(bytes).toString('utf-8'));
  } catch {
    throw new MetadataInconsistencyError('metadata record is not valid JSON');
  }

  const result = chunkMetadataSchema.safeParse(raw);
  if (!result.success) {
    throw new MetadataInconsistencyError(`invalid metadata record: ${result.error.message}`);
  }
  return result.data;
};

/**
 * Length-prefix a metadata record: [u32 LE length][JSON bytes]
 */
export const frameMetadata = (metadata: ChunkMetadata): Buffer => {
  const body = serializeMetadata(metadata);
  const prefix = Buffer.alloc(METADATA_LENGTH_BYTES);
  prefix.writeUInt32LE(body.length, 0);
  return Buffer.concat([prefix, body]);
};

/**
 * Splits decrypted chunk plaintext into its metadata record and file data.
 *
 * Input may arrive in spans of any size. The first four bytes give the
 * record length, the record follows, and every byte after it is handed to
 * the sink unchanged.
 */
export class MetadataDemuxer {
  private currentState: DemuxState = 'length';
  private readonly lengthBytes = Buffer.alloc(METADATA_LENGTH_BYTES);
  private lengthFilled = 0;
  private body: Buffer = Buffer.alloc(0);
  private bodyFilled = 0;
  private forwarded = 0;
  private parsed: ChunkMetadata | null = null;

  constructor(private readonly sink: ByteSink) {}

  get state(): DemuxState {
    return this.currentState;
  }

  /** Number of data bytes passed to the sink so far */
  get forwardedBytes(): number {
    return this.forwarded;
  }

  async push(span: Uint8Array): Promise<void> {
    let offset = 0;

    while (offset < span.length) {
      if (this.currentState === 'length') {
        const take = Math.min(METADATA_LENGTH_BYTES - this.lengthFilled, span.length - offset);
        this.lengthBytes.set(span.subarray(offset, offset + take), this.lengthFilled);
        this.lengthFilled += take;
        offset += take;

        if (this.lengthFilled === METADATA_LENGTH_BYTES) {
          const declared = this.lengthBytes.readUInt32LE(0);
          if (declared > MAX_METADATA_LENGTH) {
            throw new MetadataInconsistencyError(
              `declared metadata length ${declared} exceeds ${MAX_METADATA_LENGTH} bytes`
            );
          }
          this.body = Buffer.alloc(declared);
          this.currentState = declared === 0 ? 'forwarding' : 'body';
        }
        continue;
      }

      if (this.currentState === 'body') {
        const take = Math.min(this.body.length - this.bodyFilled, span.length - offset);
        this.body.set(span.subarray(offset, offset + take), this.bodyFilled);
        this.bodyFilled += take;
        offset += take;

        if (this.bodyFilled === this.body.length) {
          this.currentState = 'forwarding';
        }
        continue;
      }

      const rest = Buffer.from(span.subarray(offset));
      offset = span.length;
      this.forwarded += rest.length;
      await this.sink(rest);
    }
  }

  /**
   * Raw metadata record bytes; only available once the record is complete
   */
  metadataBytes(): Buffer {
    if (this.currentState !== 'forwarding') {
      throw new IncompleteMetadataError(this.lengthFilled + this.bodyFilled);
    }
    return this.body;
  }

  metadata(): ChunkMetadata {
    if (!this.parsed) {
      this.parsed = parseMetadata(this.metadataBytes());
    }
    return this.parsed;
  }
}
