import { FormatError } from '../../errors.js';
import { FORMAT_VERSION, HEADER_LENGTH, IV_LENGTH, MAGIC, SALT_LENGTH } from '../../constants.js';

export interface ChunkHeader {
  version: number;
  salt: Buffer;
  iv: Buffer;
}

/**
 * Build the 44-byte chunk preamble:
 * MAGIC(8) + VERSION(u32 LE) + SALT(16) + IV(16)
 */
export const encodeHeader = (salt: Uint8Array, iv: Uint8Array): Buffer => {
  if (salt.length !== SALT_LENGTH) {
    throw new FormatError(`salt must be ${SALT_LENGTH} bytes, got ${salt.length}`);
  }
  if (iv.length !== IV_LENGTH) {
    throw new FormatError(`IV must be ${IV_LENGTH} bytes, got ${iv.length}`);
  }

  const version = Buffer.alloc(4);
  version.writeUInt32LE(FORMAT_VERSION, 0);
  return Buffer.concat([MAGIC, version, salt, iv]);
};

export const decodeHeader = (data: Uint8Array): ChunkHeader => {
  if (data.length < HEADER_LENGTH) {
    throw new FormatError(`header too short (${data.length} of ${HEADER_LENGTH} bytes)`);
  }

  const bytes = Buffer.from(data.buffer, data.byteOffset, HEADER_LENGTH);
  let offset = 0;

  const magic = bytes.subarray(offset, offset + MAGIC.length);
  offset += MAGIC.length;
  if (!magic.equals(MAGIC)) {
    throw new FormatError('bad magic header');
  }

  const version = bytes.readUInt32LE(offset);
  offset += 4;
  if (version !== FORMAT_VERSION) {
    throw new FormatError(`unsupported format version ${version} (expected ${FORMAT_VERSION})`);
  }

  const salt = Buffer.from(bytes.subarray(offset, offset + SALT_LENGTH));
  offset += SALT_LENGTH;

  const iv = Buffer.from(bytes.subarray(offset, offset + IV_LENGTH));

  return { version, salt, iv };
};
