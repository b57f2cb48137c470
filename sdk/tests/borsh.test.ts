import { BorshReader, BorshWriter } from '../src/xcc/borsh';
import { CodecError } from '../src/xcc/errors';
import { U128_MAX, U64_MAX } from '../src/xcc/constants';

const hex = (bytes: Uint8Array) => Buffer.from(bytes).toString('hex');

describe('borsh encoding', () => {
  describe('BorshWriter', () => {
    it('should write integers little-endian', () => {
      const bytes = new BorshWriter().u8(7).u32(0x01020304).u64(0x0102n).toBytes();
      expect(hex(bytes)).toBe('07' + '04030201' + '0201000000000000');
    });

    it('should write u128 as 16 bytes', () => {
      const bytes = new BorshWriter().u128(1n).toBytes();
      expect(hex(bytes)).toBe('01' + '00'.repeat(15));
    });

    it('should prefix byte strings with a u32 length', () => {
      const bytes = new BorshWriter().bytes(Uint8Array.of(0xaa, 0xbb)).toBytes();
      expect(hex(bytes)).toBe('02000000aabb');
    });

    it('should encode strings as UTF-8', () => {
      const bytes = new BorshWriter().string('hé').toBytes();
      expect(hex(bytes)).toBe('0300000068c3a9');
    });

    it('should write fixed bytes without a prefix', () => {
      const bytes = new BorshWriter().fixed(Uint8Array.of(1, 2, 3)).toBytes();
      expect(hex(bytes)).toBe('010203');
    });

    it('should reject out of range values', () => {
      expect(() => new BorshWriter().u8(256)).toThrow(CodecError);
      expect(() => new BorshWriter().u32(-1)).toThrow(CodecError);
      expect(() => new BorshWriter().u64(U64_MAX + 1n)).toThrow(CodecError);
      expect(() => new BorshWriter().u128(-1n)).toThrow(CodecError);
    });
  });

  describe('BorshReader', () => {
    it('should read back what the writer wrote', () => {
      const bytes = new BorshWriter()
        .u8(1)
        .u32(42)
        .u64(U64_MAX)
        .u128(U128_MAX)
        .string('aurora')
        .bytes(Uint8Array.of(9))
        .toBytes();

      const reader = new BorshReader(bytes);
      expect(reader.u8()).toBe(1);
      expect(reader.u32()).toBe(42);
      expect(reader.u64()).toBe(U64_MAX);
      expect(reader.u128()).toBe(U128_MAX);
      expect(reader.string()).toBe('aurora');
      expect(reader.bytes()).toEqual(Uint8Array.of(9));
      expect(reader.remaining).toBe(0);
      expect(() => reader.finish()).not.toThrow();
    });

    it('should skip byte strings', () => {
      const bytes = new BorshWriter().bytes(Uint8Array.of(1, 2, 3)).u8(5).toBytes();
      const reader = new BorshReader(bytes);
      reader.skipBytes();
      expect(reader.u8()).toBe(5);
    });

    it('should fail when input ends early', () => {
      expect(() => new BorshReader(Uint8Array.of(1, 2)).u32()).toThrow(CodecError);
      // length prefix says 4 bytes, only 1 follows
      const truncated = Uint8Array.of(4, 0, 0, 0, 1);
      expect(() => new BorshReader(truncated).bytes()).toThrow('Unexpected end of input');
      expect(() => new BorshReader(truncated).skipBytes()).toThrow(CodecError);
    });

    it('should reject invalid UTF-8', () => {
      const bytes = Uint8Array.of(1, 0, 0, 0, 0xff);
      expect(() => new BorshReader(bytes).string()).toThrow('Invalid UTF-8');
    });

    it('should report trailing bytes', () => {
      const reader = new BorshReader(Uint8Array.of(1, 2));
      reader.u8();
      expect(() => reader.finish()).toThrow('Unexpected 1 trailing bytes');
    });

    it('should respect the view offset of subarrays', () => {
      const backing = Uint8Array.of(0xff, 0x2a, 0, 0, 0);
      const reader = new BorshReader(backing.subarray(1));
      expect(reader.u32()).toBe(42);
    });
  });
});
