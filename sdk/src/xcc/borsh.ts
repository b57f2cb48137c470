/**
 * Borsh Encoding
 *
 * The subset of NEAR's canonical binary format the protocol needs:
 * little-endian integers and u32-length-prefixed byte strings.
 */

import { CodecError } from './errors.js';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Append-only Borsh writer
 *
 * @example
 * ```typescript
 * const bytes = new BorshWriter().u8(1).string('ft_transfer').u64(30_000_000_000_000n).toBytes();
 * ```
 */
export class BorshWriter {
  private chunks: Uint8Array[] = [];
  private length = 0;

  u8(value: number): this {
    assertUint(value, 0xff, 'u8');
    return this.push(Uint8Array.of(value));
  }

  u32(value: number): this {
    assertUint(value, 0xffffffff, 'u32');
    const out = new Uint8Array(4);
    new DataView(out.buffer).setUint32(0, value, true);
    return this.push(out);
  }

  u64(value: bigint): this {
    return this.push(littleEndian(value, 8, 'u64'));
  }

  u128(value: bigint): this {
    return this.push(littleEndian(value, 16, 'u128'));
  }

  /** Raw bytes with no length prefix */
  fixed(bytes: Uint8Array): this {
    return this.push(bytes);
  }

  /** `Vec<u8>`: u32 length followed by the bytes */
  bytes(bytes: Uint8Array): this {
    return this.u32(bytes.length).push(bytes);
  }

  string(value: string): this {
    return this.bytes(textEncoder.encode(value));
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }

  private push(bytes: Uint8Array): this {
    this.chunks.push(bytes);
    this.length += bytes.length;
    return this;
  }
}

/**
 * Sequential Borsh reader over a byte buffer
 */
export class BorshReader {
  private offset = 0;
  private view: DataView;

  constructor(private readonly buffer: Uint8Array) {
    this.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }

  /** Bytes left to read */
  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  u8(): number {
    this.require(1, 'u8');
    return this.view.getUint8(this.offset++);
  }

  u32(): number {
    this.require(4, 'u32');
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  u64(): bigint {
    return this.littleEndian(8, 'u64');
  }

  u128(): bigint {
    return this.littleEndian(16, 'u128');
  }

  fixed(length: number): Uint8Array {
    this.require(length, 'fixed bytes');
    const out = this.buffer.slice(this.offset, this.offset + length);
    this.offset += length;
    return out;
  }

  bytes(): Uint8Array {
    return this.fixed(this.u32());
  }

  /** Advance past a length-prefixed byte string without copying it */
  skipBytes(): void {
    const length = this.u32();
    this.require(length, 'bytes');
    this.offset += length;
  }

  string(): string {
    const raw = this.bytes();
    try {
      return textDecoder.decode(raw);
    } catch {
      throw new CodecError('Invalid UTF-8 in string');
    }
  }

  /** Fail unless every byte has been consumed */
  finish(): void {
    if (this.remaining !== 0) {
      throw new CodecError(`Unexpected ${this.remaining} trailing bytes`);
    }
  }

  private littleEndian(size: number, label: string): bigint {
    this.require(size, label);
    let value = 0n;
    for (let i = size - 1; i >= 0; i--) {
      value = (value << 8n) | BigInt(this.buffer[this.offset + i]);
    }
    this.offset += size;
    return value;
  }

  private require(size: number, label: string): void {
    if (this.offset + size > this.buffer.length) {
      throw new CodecError(
        `Unexpected end of input reading ${label} at offset ${this.offset}`
      );
    }
  }
}

function assertUint(value: number, max: number, label: string): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new CodecError(`${label} out of range: ${value}`);
  }
}

function littleEndian(value: bigint, size: number, label: string): Uint8Array {
  if (value < 0n || value >> BigInt(size * 8) !== 0n) {
    throw new CodecError(`${label} out of range: ${value}`);
  }
  const out = new Uint8Array(size);
  let rest = value;
  for (let i = 0; i < size; i++) {
    out[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return out;
}
