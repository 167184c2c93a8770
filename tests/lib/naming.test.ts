import { describe, it, expect, vi } from 'vitest';
import { vol } from 'memfs';

vi.mock('fs/promises', async () => {
  const memfs = await vi.importActual<typeof import('memfs')>('memfs');
  return memfs.fs.promises;
});

// Import after mocks are set up
import {
  seqLabel,
  parseSeqLabel,
  chunkFileName,
  parseChunkFileName,
  generateGroupId,
  groupEncFiles,
  existingGroupIds,
  tempMergeName,
  isReservedName,
} from '../../src/lib/naming.js';
import { GroupIdExhaustedError, SeqOverflowError } from '../../src/errors.js';

describe('naming', () => {
  describe('seqLabel', () => {
    it('should encode the first and last labels', () => {
      expect(seqLabel(0)).toBe('aaaa');
      expect(seqLabel(456_975)).toBe('zzzz');
    });

    it('should carry into the next letter at multiples of 26', () => {
      expect(seqLabel(1)).toBe('aaab');
      expect(seqLabel(25)).toBe('aaaz');
      expect(seqLabel(26)).toBe('aaba');
      expect(seqLabel(675)).toBe('aazz');
      expect(seqLabel(676)).toBe('abaa');
      expect(seqLabel(17_576)).toBe('baaa');
    });

    it('should reject indices outside the addressable range', () => {
      expect(() => seqLabel(456_976)).toThrow(SeqOverflowError);
      expect(() => seqLabel(-1)).toThrow(SeqOverflowError);
      expect(() => seqLabel(1.5)).toThrow(SeqOverflowError);
    });

    it('should round-trip every addressable index', () => {
      for (let i = 0; i < 456_976; i++) {
        if (parseSeqLabel(seqLabel(i)) !== i) {
          throw new Error(`round-trip failed at ${i}`);
        }
      }
    });
  });

  describe('parseSeqLabel', () => {
    it('should decode valid labels', () => {
      expect(parseSeqLabel('aaaa')).toBe(0);
      expect(parseSeqLabel('aaba')).toBe(26);
      expect(parseSeqLabel('zzzz')).toBe(456_975);
    });

    it('should reject labels of the wrong length', () => {
      expect(parseSeqLabel('')).toBeNull();
      expect(parseSeqLabel('aaa')).toBeNull();
      expect(parseSeqLabel('aaaaa')).toBeNull();
    });

    it('should reject characters outside a-z', () => {
      expect(parseSeqLabel('aAaa')).toBeNull();
      expect(parseSeqLabel('aa1a')).toBeNull();
      expect(parseSeqLabel('aa{a')).toBeNull();
      expect(parseSeqLabel('aa`a')).toBeNull();
    });
  });

  describe('chunk file names', () => {
    it('should compose group id, label and extension', () => {
      expect(chunkFileName('0123456789abcdef', 0)).toBe('0123456789abcdef_aaaa.cokacenc');
      expect(chunkFileName('0123456789abcdef', 27)).toBe('0123456789abcdef_aabb.cokacenc');
    });

    it('should parse names that match the grammar', () => {
      expect(parseChunkFileName('0123456789abcdef_aaab.cokacenc')).toEqual({
        groupId: '0123456789abcdef',
        seqIndex: 1,
      });
    });

    it('should ignore names that do not match the grammar', () => {
      expect(parseChunkFileName('0123456789ABCDEF_aaaa.cokacenc')).toBeNull();
      expect(parseChunkFileName('0123456789abcde_aaaa.cokacenc')).toBeNull();
      expect(parseChunkFileName('0123456789abcdef_aaa.cokacenc')).toBeNull();
      expect(parseChunkFileName('0123456789abcdef_aaaa.enc')).toBeNull();
      expect(parseChunkFileName('0123456789abcdef_aaaaxcokacenc')).toBeNull();
      expect(parseChunkFileName('x0123456789abcdef_aaaa.cokacenc')).toBeNull();
      expect(parseChunkFileName('notes.txt')).toBeNull();
    });

    it('should reserve chunk names and the group merge file', () => {
      expect(isReservedName('0123456789abcdef_aaaa.cokacenc', '0123456789abcdef')).toBe(true);
      expect(isReservedName('notes.cokacenc', '0123456789abcdef')).toBe(true);
      expect(isReservedName('.0123456789abcdef.unpacking', '0123456789abcdef')).toBe(true);
      expect(isReservedName('notes.txt', '0123456789abcdef')).toBe(false);
      expect(isReservedName('.1111111111111111.unpacking', '0123456789abcdef')).toBe(false);
    });

    it('should name the hidden merge file after the group', () => {
      expect(tempMergeName('0123456789abcdef')).toBe('.0123456789abcdef.unpacking');
    });
  });

  describe('generateGroupId', () => {
    it('should produce 16 lowercase hex characters', () => {
      expect(generateGroupId(new Set())).toMatch(/^[0-9a-f]{16}$/);
    });

    it('should retry until the id is not taken', () => {
      const random = vi
        .fn<(size: number) => Buffer>()
        .mockReturnValueOnce(Buffer.from('0011223344556677', 'hex'))
        .mockReturnValueOnce(Buffer.from('8899aabbccddeeff', 'hex'));

      const id = generateGroupId(new Set(['0011223344556677']), random);

      expect(id).toBe('8899aabbccddeeff');
      expect(random).toHaveBeenCalledTimes(2);
      expect(random).toHaveBeenCalledWith(8);
    });

    it('should give up after a bounded number of attempts', () => {
      const random = vi.fn((_size: number) => Buffer.from('0011223344556677', 'hex'));

      expect(() => generateGroupId(new Set(['0011223344556677']), random)).toThrow(GroupIdExhaustedError);
      expect(random).toHaveBeenCalledTimes(16);
    });
  });

  describe('groupEncFiles', () => {
    it('should bucket chunk files by group and sort by sequence', async () => {
      vol.fromJSON({
        '/data/bbbbbbbbbbbbbbbb_aaac.cokacenc': 'c',
        '/data/bbbbbbbbbbbbbbbb_aaaa.cokacenc': 'a',
        '/data/bbbbbbbbbbbbbbbb_aaab.cokacenc': 'b',
        '/data/0000000000000001_aaaa.cokacenc': 'x',
        '/data/notes.txt': 'plain',
        '/data/BBBBBBBBBBBBBBBB_aaaa.cokacenc': 'upper',
      });
      vol.mkdirSync('/data/1111111111111111_aaaa.cokacenc');

      const groups = await groupEncFiles('/data');

      expect([...groups.keys()]).toEqual(['0000000000000001', 'bbbbbbbbbbbbbbbb']);
      const bucket = groups.get('bbbbbbbbbbbbbbbb') ?? [];
      expect(bucket.map((f) => f.seqLabel)).toEqual(['aaaa', 'aaab', 'aaac']);
      expect(bucket.map((f) => f.seqIndex)).toEqual([0, 1, 2]);
      expect(bucket[0].path).toBe('/data/bbbbbbbbbbbbbbbb_aaaa.cokacenc');
    });

    it('should return no groups for a directory without chunks', async () => {
      vol.fromJSON({ '/data/notes.txt': 'plain' });

      const groups = await groupEncFiles('/data');

      expect(groups.size).toBe(0);
    });

    it('should list the group ids present in a directory', async () => {
      vol.fromJSON({
        '/data/bbbbbbbbbbbbbbbb_aaaa.cokacenc': 'a',
        '/data/bbbbbbbbbbbbbbbb_aaab.cokacenc': 'b',
        '/data/0000000000000001_aaaa.cokacenc': 'x',
      });

      const ids = await existingGroupIds('/data');

      expect([...ids].sort()).toEqual(['0000000000000001', 'bbbbbbbbbbbbbbbb']);
    });

    it('should fail with an IO error for a missing directory', async () => {
      await expect(groupEncFiles('/missing')).rejects.toMatchObject({ code: 'IO_ERROR' });
    });
  });
});
