/**
 * Decoded headers of the structural chunks in a resource table.
 */
import { DeviceConfig } from './device-config.js';

export interface ChunkHeader {
  /** Absolute offset of the chunk in the table buffer. */
  readonly start: number;
  readonly type: number;
  readonly headerSize: number;
  /** Total extent of the chunk, header and payload. */
  readonly size: number;
}

export interface StringPoolHeader {
  readonly chunk: ChunkHeader;
  readonly stringCount: number;
  readonly styleCount: number;
  readonly sorted: boolean;
  readonly utf8: boolean;
  /** Offset of the string data, relative to the chunk start. */
  readonly stringsStart: number;
  readonly stylesStart: number;
}

export interface PackageHeader {
  readonly chunk: ChunkHeader;
  readonly id: number;
  readonly name: string;
  /** Offset of the type string pool, relative to the chunk start. */
  readonly typeStrings: number;
  readonly lastPublicType: number;
  /** Offset of the key string pool, relative to the chunk start. */
  readonly keyStrings: number;
  readonly lastPublicKey: number;
}

export interface TypeSpecHeader {
  readonly chunk: ChunkHeader;
  readonly id: number;
  readonly res0: number;
  readonly typesCount: number;
  readonly entryCount: number;
}

export interface TypeHeader {
  readonly chunk: ChunkHeader;
  readonly id: number;
  readonly flags: number;
  readonly reserved: number;
  readonly entryCount: number;
  /** Offset of the entry area, relative to the chunk start. */
  readonly entriesStart: number;
  readonly config: DeviceConfig;
  readonly sparse: boolean;
}

export interface EntryHeader {
  readonly size: number;
  readonly flags: number;
  readonly complex: boolean;
  readonly public: boolean;
  /** Index into the package key string pool. */
  readonly key: number;
  /** Map entries only: parent map resource id, 0 for none. */
  readonly parent: number;
  /** Map entries only: number of map records that follow. */
  readonly count: number;
}

/** A located entry of a type chunk. */
export interface IndexedEntry {
  readonly entryIndex: number;
  /** Absolute offset of the entry header. */
  readonly offset: number;
}

export interface RawValue {
  /** Absolute offset of the record. */
  readonly offset: number;
  readonly size: number;
  readonly res0: number;
  readonly dataType: number;
  readonly data: number;
}
