/**
 * String pool decoding (UTF-16LE and UTF-8 variants).
 */
import { CHUNK_HEADER_SIZE, RES_STRING_POOL_TYPE, SORTED_FLAG, UTF8_FLAG } from './constants/chunk-types.js';
import { StructuralError } from './errors.js';
import { readChunkHeader } from './chunk-reader.js';
import { ChunkHeader, StringPoolHeader } from './types/chunk.js';
import { ByteCursor, readBytes, readUInt16, readUInt32, readUInt8 } from './utils/byte-cursor.js';

/** Decoded pool: index is the string's ordinal. */
export type StringPool = readonly string[];

/** Leading and trailing NULs, control characters and spaces; other whitespace is kept. */
const SURROUNDING_CONTROLS = /^[\u0000-\u0020]+|[\u0000-\u0020]+$/g;

function decodeText(data: Uint8Array, offset: number, length: number, encoding: 'utf8' | 'utf16le'): string {
  const [bytes] = readBytes(data, offset, length);
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(encoding);
}

/**
 * Reads the pool header fields following the chunk header.
 */
export function readStringPoolHeader(data: Uint8Array, chunk: ChunkHeader): StringPoolHeader {
  const cursor = new ByteCursor(data, chunk.start + CHUNK_HEADER_SIZE);
  const stringCount: number = cursor.u32();
  const styleCount: number = cursor.u32();
  const flags: number = cursor.u32();
  const stringsStart: number = cursor.u32();
  const stylesStart: number = cursor.u32();
  return {
    chunk,
    stringCount,
    styleCount,
    sorted: (flags & SORTED_FLAG) === SORTED_FLAG,
    utf8: (flags & UTF8_FLAG) === UTF8_FLAG,
    stringsStart,
    stylesStart,
  };
}

/**
 * UTF-16 strings: a u16 code-unit count followed by the code units.
 */
function readUtf16String(data: Uint8Array, offset: number): string {
  const [length, textStart] = readUInt16(data, offset);
  if (length === 0) {
    return '';
  }
  return decodeText(data, textStart, length * 2, 'utf16le');
}

/**
 * UTF-8 strings: a character count byte, then the byte count, then the bytes.
 * Only one byte of the byte count is read, so strings longer than 127 bytes
 * whose length uses the two-byte form come out wrong.
 */
function readUtf8String(data: Uint8Array, offset: number): string {
  const [length] = readUInt8(data, offset + 1);
  return decodeText(data, offset + 2, length, 'utf8');
}

/**
 * Decodes the strings of a pool whose header has been read.
 * @returns Strings with surrounding control characters and spaces removed,
 *   indexed by ordinal
 */
export function decodeStringPool(data: Uint8Array, header: StringPoolHeader): StringPool {
  const strings: string[] = [];
  const stringBase: number = header.chunk.start + header.stringsStart;
  // The offset array directly follows the five header fields.
  let offset: number = header.chunk.start + CHUNK_HEADER_SIZE + 20;
  for (let i = 0; i < header.stringCount; i++) {
    const [stringOffset, next] = readUInt32(data, offset);
    offset = next;
    const start: number = stringBase + stringOffset;
    const value: string = header.utf8 ? readUtf8String(data, start) : readUtf16String(data, start);
    strings.push(value.replace(SURROUNDING_CONTROLS, ''));
  }
  return strings;
}

/**
 * Reads a complete string pool chunk at `offset`.
 * @throws {StructuralError} If the chunk at `offset` is not a string pool
 */
export function readStringPoolAt(data: Uint8Array, offset: number, purpose: string): { readonly header: StringPoolHeader; readonly strings: StringPool } {
  const chunk: ChunkHeader = readChunkHeader(data, offset);
  if (chunk.type !== RES_STRING_POOL_TYPE) {
    throw new StructuralError(`Unexpected block type 0x${chunk.type.toString(16)} for ${purpose}`, offset);
  }
  const header: StringPoolHeader = readStringPoolHeader(data, chunk);
  return { header, strings: decodeStringPool(data, header) };
}
