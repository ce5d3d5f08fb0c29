/**
 * Type chunk headers, their dense or sparse index tables, and entry headers.
 */
import {
  CHUNK_HEADER_SIZE,
  FLAG_COMPACT,
  FLAG_COMPLEX,
  FLAG_OFFSET16,
  FLAG_PUBLIC,
  FLAG_SPARSE,
  FLAG_WEAK,
  MAP_ENTRY_SIZE,
  NO_ENTRY,
  SIMPLE_ENTRY_SIZE,
} from './constants/chunk-types.js';
import { decodeConfig } from './config-decoder.js';
import { DecodeContext } from './decode-context.js';
import { UnsupportedFeatureError } from './errors.js';
import { ChunkHeader, EntryHeader, IndexedEntry, TypeHeader } from './types/chunk.js';
import { ByteCursor, readUInt16, readUInt32 } from './utils/byte-cursor.js';

/**
 * Reads a type chunk header including its configuration record.
 *
 * @returns The header and the offset of the index table, which directly
 *   follows the configuration record
 * @throws {UnsupportedFeatureError} If the chunk uses 16-bit entry offsets
 */
export function readTypeHeader(data: Uint8Array, chunk: ChunkHeader, context: DecodeContext): { readonly header: TypeHeader; readonly indexStart: number } {
  const cursor = new ByteCursor(data, chunk.start + CHUNK_HEADER_SIZE);
  const id: number = cursor.u8();
  if (id === 0) {
    context.violation('File format violation in type table: id is zero', cursor.offset - 1);
  }

  const flagsOffset: number = cursor.offset;
  const flags: number = cursor.u8();
  if ((flags & FLAG_OFFSET16) === FLAG_OFFSET16) {
    throw new UnsupportedFeatureError('Unsupported resource type entry: FLAG_OFFSET16', flagsOffset);
  }
  if ((flags & ~FLAG_SPARSE) !== 0) {
    context.violation('File format violation in type table: flags is not zero or one', flagsOffset);
  }

  const reserved: number = cursor.u16();
  if (reserved !== 0) {
    context.violation('File format violation in type table: reserved is not zero', cursor.offset - 2);
  }
  const entryCount: number = cursor.u32();
  const entriesStart: number = cursor.u32();
  const { config, next } = decodeConfig(data, cursor.offset, context);

  const header: TypeHeader = {
    chunk,
    id,
    flags,
    reserved,
    entryCount,
    entriesStart,
    config,
    sparse: (flags & FLAG_SPARSE) === FLAG_SPARSE,
  };
  return { header, indexStart: next };
}

/**
 * Resolves the index table into absolute entry offsets, skipping undefined
 * slots of a dense table.
 */
export function readEntryIndex(data: Uint8Array, header: TypeHeader, indexStart: number): IndexedEntry[] {
  const entries: IndexedEntry[] = [];
  const entriesBase: number = header.chunk.start + header.entriesStart;
  let offset: number = indexStart;

  for (let i = 0; i < header.entryCount; i++) {
    if (header.sparse) {
      const [entryIndex, afterIndex] = readUInt16(data, offset);
      const [quarterOffset, next] = readUInt16(data, afterIndex);
      offset = next;
      entries.push({ entryIndex, offset: entriesBase + quarterOffset * 4 });
    } else {
      const [entryOffset, next] = readUInt32(data, offset);
      offset = next;
      if (entryOffset === NO_ENTRY) {
        continue;
      }
      entries.push({ entryIndex: i, offset: entriesBase + entryOffset });
    }
  }
  return entries;
}

function warnUnsupportedFlags(flags: number, context: DecodeContext): void {
  if ((flags & FLAG_WEAK) === FLAG_WEAK) {
    context.warnOnce('weak', 'Unsupported entry flag encountered: FLAG_WEAK');
  }
  if ((flags & FLAG_COMPACT) === FLAG_COMPACT) {
    context.warnOnce('compact', 'Unsupported entry flag encountered: FLAG_COMPACT');
  }
}

/**
 * Reads the entry header at `offset`.
 *
 * @returns The header and the offset of the value data, or null when the
 *   header size does not match the entry kind (a warning is logged)
 */
export function readEntryHeader(data: Uint8Array, offset: number, context: DecodeContext): { readonly header: EntryHeader; readonly next: number } | null {
  const cursor = new ByteCursor(data, offset);
  const size: number = cursor.u16();
  const flags: number = cursor.u16();
  const key: number = cursor.u32();
  const complex: boolean = (flags & FLAG_COMPLEX) === FLAG_COMPLEX;
  warnUnsupportedFlags(flags, context);

  const expectedSize: number = complex ? MAP_ENTRY_SIZE : SIMPLE_ENTRY_SIZE;
  if (size !== expectedSize) {
    context.logger.warn(`Unknown entry type of size 0x${size.toString(16)} at 0x${offset.toString(16)}, skipping entry`);
    return null;
  }

  let parent = 0;
  let count = 0;
  if (complex) {
    parent = cursor.u32();
    count = cursor.u32();
  }
  const header: EntryHeader = {
    size,
    flags,
    complex,
    public: (flags & FLAG_PUBLIC) === FLAG_PUBLIC,
    key,
    parent,
    count,
  };
  return { header, next: offset + size };
}
