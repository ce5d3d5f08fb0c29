/**
 * Readers for chunk headers and the package / type-spec header layouts.
 */
import { CHUNK_HEADER_SIZE, PACKAGE_NAME_LENGTH } from './constants/chunk-types.js';
import { StructuralError } from './errors.js';
import { ChunkHeader, PackageHeader, TypeSpecHeader } from './types/chunk.js';
import { ByteCursor } from './utils/byte-cursor.js';
import { DecodeContext } from './decode-context.js';

/**
 * Reads the 8-byte header every chunk starts with.
 * @throws {StructuralError} If the declared size cannot hold a chunk header
 */
export function readChunkHeader(data: Uint8Array, offset: number): ChunkHeader {
  const cursor = new ByteCursor(data, offset);
  const type: number = cursor.u16();
  const headerSize: number = cursor.u16();
  const size: number = cursor.u32();
  if (size < CHUNK_HEADER_SIZE) {
    throw new StructuralError(`Chunk of type 0x${type.toString(16)} declares size ${size}`, offset);
  }
  return { start: offset, type, headerSize, size };
}

/** Absolute offset just past the chunk. */
export function chunkEnd(chunk: ChunkHeader): number {
  return chunk.start + chunk.size;
}

function readPackageName(cursor: ByteCursor): string {
  let name = '';
  let terminated = false;
  for (let i = 0; i < PACKAGE_NAME_LENGTH; i++) {
    const codeUnit: number = cursor.u16();
    if (codeUnit === 0) {
      terminated = true;
    }
    if (!terminated) {
      name += String.fromCharCode(codeUnit);
    }
  }
  return name.trim();
}

/**
 * Reads the package header fields following the chunk header.
 */
export function readPackageHeader(data: Uint8Array, chunk: ChunkHeader): PackageHeader {
  const cursor = new ByteCursor(data, chunk.start + CHUNK_HEADER_SIZE);
  const id: number = cursor.u32();
  const name: string = readPackageName(cursor);
  const typeStrings: number = cursor.u32();
  const lastPublicType: number = cursor.u32();
  const keyStrings: number = cursor.u32();
  const lastPublicKey: number = cursor.u32();
  return { chunk, id, name, typeStrings, lastPublicType, keyStrings, lastPublicKey };
}

/**
 * Reads a type specification header.
 * Zero ids and non-zero reserved bytes are reported through the decode context.
 */
export function readTypeSpecHeader(data: Uint8Array, chunk: ChunkHeader, context: DecodeContext): TypeSpecHeader {
  const cursor = new ByteCursor(data, chunk.start + CHUNK_HEADER_SIZE);
  const id: number = cursor.u8();
  if (id === 0) {
    context.violation('File format violation in type spec table: id is zero', cursor.offset - 1);
  }
  const res0: number = cursor.u8();
  if (res0 !== 0) {
    context.violation('File format violation in type spec table: res0 is not zero', cursor.offset - 1);
  }
  const typesCount: number = cursor.u16();
  const entryCount: number = cursor.u32();
  return { chunk, id, res0, typesCount, entryCount };
}
