/**
 * Bounds-checked little-endian primitive reads.
 *
 * Each read takes the buffer and an explicit offset and returns the value
 * together with the offset just past it.
 */
import { StructuralError } from '../errors.js';

export type Read<T> = readonly [value: T, next: number];

function ensureAvailable(data: Uint8Array, offset: number, length: number): void {
  if (!Number.isInteger(offset) || offset < 0 || offset + length > data.length) {
    throw new StructuralError(`Read of ${length} byte(s) exceeds buffer of ${data.length} bytes`, offset);
  }
}

export function readUInt8(data: Uint8Array, offset: number): Read<number> {
  ensureAvailable(data, offset, 1);
  return [data[offset], offset + 1];
}

export function readUInt16(data: Uint8Array, offset: number): Read<number> {
  ensureAvailable(data, offset, 2);
  return [data[offset] | (data[offset + 1] << 8), offset + 2];
}

export function readUInt32(data: Uint8Array, offset: number): Read<number> {
  ensureAvailable(data, offset, 4);
  const value: number = (data[offset] | (data[offset + 1] << 8) | (data[offset + 2] << 16) | (data[offset + 3] << 24)) >>> 0;
  return [value, offset + 4];
}

/**
 * Returns a view of `length` bytes starting at `offset`.
 */
export function readBytes(data: Uint8Array, offset: number, length: number): Read<Uint8Array> {
  ensureAvailable(data, offset, length);
  return [data.subarray(offset, offset + length), offset + length];
}

/**
 * Sequential reader over the primitive reads for fixed header layouts.
 */
export class ByteCursor {
  constructor(private readonly data: Uint8Array, private position: number) {}

  get offset(): number {
    return this.position;
  }

  u8(): number {
    const [value, next] = readUInt8(this.data, this.position);
    this.position = next;
    return value;
  }

  u16(): number {
    const [value, next] = readUInt16(this.data, this.position);
    this.position = next;
    return value;
  }

  u32(): number {
    const [value, next] = readUInt32(this.data, this.position);
    this.position = next;
    return value;
  }

  bytes(length: number): Uint8Array {
    const [value, next] = readBytes(this.data, this.position, length);
    this.position = next;
    return value;
  }

  skip(length: number): void {
    ensureAvailable(this.data, this.position, length);
    this.position += length;
  }
}
