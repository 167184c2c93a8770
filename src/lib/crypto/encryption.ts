/**
 * Per-chunk key derivation and AES-256-CBC stream ciphers
 * Uses Node.js built-in crypto module
 */

import { randomBytes, createCipheriv, createDecipheriv, pbkdf2Sync } from 'crypto';
import { CryptoError } from '../../errors.js';
import {
  CIPHER_ALGORITHM,
  IV_LENGTH,
  KEY_LENGTH,
  PBKDF2_DIGEST,
  PBKDF2_ITERATIONS,
  SALT_LENGTH,
} from '../../constants.js';

type Cipher = ReturnType<typeof createCipheriv>;
type Decipher = ReturnType<typeof createDecipheriv>;

/**
 * Derive a 256-bit key from password bytes using PBKDF2-HMAC-SHA512.
 * Every chunk carries its own salt, so no two chunks share a key.
 */
export const deriveKey = (password: Uint8Array, salt: Uint8Array): Buffer => {
  return pbkdf2Sync(password, salt, PBKDF2_ITERATIONS, KEY_LENGTH, PBKDF2_DIGEST);
};

export const generateSalt = (): Buffer => {
  return randomBytes(SALT_LENGTH);
};

export const generateIv = (): Buffer => {
  return randomBytes(IV_LENGTH);
};

/**
 * Incremental AES-256-CBC encryptor with PKCS#7 padding.
 * Single use: once finalized it rejects further input.
 */
export class ChunkEncryptor {
  private readonly cipher: Cipher;
  private finalized = false;

  constructor(key: Uint8Array, iv: Uint8Array) {
    this.cipher = createCipheriv(CIPHER_ALGORITHM, key, iv);
  }

  update(data: Uint8Array): Buffer {
    if (this.finalized) {
      throw new CryptoError('encryptor used after finalize');
    }
    return this.cipher.update(data);
  }

  finalize(): Buffer {
    if (this.finalized) {
      throw new CryptoError('encryptor finalized twice');
    }
    this.finalized = true;
    return this.cipher.final();
  }
}

/**
 * Incremental AES-256-CBC decryptor.
 * The last block is held back until finalize() so the padding can be checked.
 */
export class ChunkDecryptor {
  private readonly decipher: Decipher;
  private finalized = false;

  constructor(key: Uint8Array, iv: Uint8Array) {
    this.decipher = createDecipheriv(CIPHER_ALGORITHM, key, iv);
  }

  update(data: Uint8Array): Buffer {
    if (this.finalized) {
      throw new CryptoError('decryptor used after finalize');
    }
    return this.decipher.update(data);
  }

  finalize(): Buffer {
    if (this.finalized) {
      throw new CryptoError('decryptor finalized twice');
    }
    this.finalized = true;
    try {
      return this.decipher.final();
    } catch {
      throw new CryptoError('wrong key or corrupted data (bad padding)');
    }
  }
}
