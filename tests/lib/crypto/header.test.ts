import { describe, it, expect } from 'vitest';
import { encodeHeader, decodeHeader } from '../../../src/lib/crypto/header.js';
import { FormatError } from '../../../src/errors.js';

const SALT = Buffer.alloc(16, 0xaa);
const IV = Buffer.alloc(16, 0xbb);

describe('header', () => {
  describe('encodeHeader', () => {
    it('should lay out magic, version, salt and IV in 44 bytes', () => {
      const header = encodeHeader(SALT, IV);

      expect(header).toHaveLength(44);
      expect(header.subarray(0, 8).toString('ascii')).toBe('COKACENC');
      expect(header.readUInt32LE(8)).toBe(2);
      expect(header.subarray(12, 28).equals(SALT)).toBe(true);
      expect(header.subarray(28, 44).equals(IV)).toBe(true);
    });

    it('should reject a salt or IV of the wrong length', () => {
      expect(() => encodeHeader(Buffer.alloc(15), IV)).toThrow(FormatError);
      expect(() => encodeHeader(SALT, Buffer.alloc(17))).toThrow(FormatError);
    });
  });

  describe('decodeHeader', () => {
    it('should read back an encoded header', () => {
      const decoded = decodeHeader(encodeHeader(SALT, IV));

      expect(decoded.version).toBe(2);
      expect(decoded.salt.equals(SALT)).toBe(true);
      expect(decoded.iv.equals(IV)).toBe(true);
    });

    it('should ignore bytes after the header', () => {
      const data = Buffer.concat([encodeHeader(SALT, IV), Buffer.from('ciphertext')]);
      expect(decodeHeader(data).iv.equals(IV)).toBe(true);
    });

    it('should read a header from a subarray of a larger buffer', () => {
      const data = Buffer.concat([Buffer.from('xxxx'), encodeHeader(SALT, IV)]);
      expect(decodeHeader(data.subarray(4)).salt.equals(SALT)).toBe(true);
    });

    it('should reject short input', () => {
      expect(() => decodeHeader(Buffer.alloc(43))).toThrow('header too short');
      expect(() => decodeHeader(Buffer.alloc(0))).toThrow(FormatError);
    });

    it('should reject a bad magic', () => {
      const data = encodeHeader(SALT, IV);
      data.write('COKACENX', 0, 'ascii');
      expect(() => decodeHeader(data)).toThrow('bad magic header');
    });

    it('should reject other format versions', () => {
      const data = encodeHeader(SALT, IV);
      data.writeUInt32LE(1, 8);
      expect(() => decodeHeader(data)).toThrow('unsupported format version 1');
    });
  });
});
