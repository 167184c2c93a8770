/**
 * Crypto module - key derivation, chunk ciphers, header codec and key files
 */

export {
  deriveKey,
  generateSalt,
  generateIv,
  ChunkEncryptor,
  ChunkDecryptor,
} from './encryption.js';

export { encodeHeader, decodeHeader } from './header.js';

export type { ChunkHeader } from './header.js';

export { loadKeyFile, generateKeyFile, encodeKeyMaterial } from './keyFile.js';

export type { GenerateKeyFileOptions, GeneratedKeyFile } from './keyFile.js';
