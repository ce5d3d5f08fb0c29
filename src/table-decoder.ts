/**
 * Walks the chunks of a resource table and builds the resource model.
 */
import {
  CHUNK_HEADER_SIZE,
  RES_STRING_POOL_TYPE,
  RES_TABLE_PACKAGE_TYPE,
  RES_TABLE_TYPE,
  RES_TABLE_TYPE_SPEC_TYPE,
  RES_TABLE_TYPE_TYPE,
  TABLE_HEADER_SIZE,
} from './constants/chunk-types.js';
import { chunkEnd, readChunkHeader, readPackageHeader, readTypeSpecHeader } from './chunk-reader.js';
import { DecodeContext } from './decode-context.js';
import { readEntryHeader, readEntryIndex, readTypeHeader } from './entry-decoder.js';
import { StructuralError } from './errors.js';
import { joinResourceId } from './resource-id.js';
import { StringPool, decodeStringPool, readStringPoolAt, readStringPoolHeader } from './string-pool.js';
import { ResourceConfiguration, ResourcePackage, ResourceType } from './table-model.js';
import { ChunkHeader, IndexedEntry, PackageHeader, TypeSpecHeader } from './types/chunk.js';
import { INVALID_RESOURCE_NAME } from './types/resource.js';
import { readUInt32 } from './utils/byte-cursor.js';
import { DecodeResult, decodeEntryValue } from './value-decoder.js';

/** Name given to types whose id has no entry in the type string pool. */
export const INVALID_TYPE_NAME = '<INVALID TYPE>';

export interface DecodedTable {
  readonly globalStrings: Map<number, string>;
  readonly packages: ResourcePackage[];
}

/** String pools scoped to one package chunk. */
interface PackagePools {
  readonly typeStrings: StringPool;
  readonly keyStrings: StringPool;
}

/** Types declared by the type specs of the current package chunk, by id. */
type DeclaredTypes = Map<number, ResourceType>;

function hex(value: number): string {
  return `0x${value.toString(16)}`;
}

/**
 * Decodes the entries of one type chunk into a configuration of its type.
 * @throws {StructuralError} If no type spec of the same package chunk
 *   declared the chunk's type id
 */
function decodeTypeChunk(data: Uint8Array, chunk: ChunkHeader, packageHeader: PackageHeader, declared: DeclaredTypes, pools: PackagePools, globalStrings: ReadonlyMap<number, string>, context: DecodeContext): void {
  const { header, indexStart } = readTypeHeader(data, chunk, context);
  const type: ResourceType | undefined = declared.get(header.id);
  if (!type) {
    throw new StructuralError(`Reference to undeclared type ${header.id} found`, chunk.start);
  }
  const configuration: ResourceConfiguration = type.getOrAddConfiguration(header.config);

  const entries: IndexedEntry[] = readEntryIndex(data, header, indexStart);
  for (const indexed of entries) {
    const entry = readEntryHeader(data, indexed.offset, context);
    if (!entry) {
      continue;
    }
    const keyName: string | undefined = pools.keyStrings[entry.header.key];
    const resourceName: string = keyName ?? INVALID_RESOURCE_NAME;

    const decoded: DecodeResult = decodeEntryValue(data, entry.header, entry.next, type.name, globalStrings, context);
    if (!decoded.ok) {
      context.logger.warn(`Could not parse resource ${resourceName}: ${decoded.reason}, skipping entry`);
      continue;
    }

    const resourceId: number = joinResourceId({ packageId: packageHeader.id, typeId: header.id, itemIndex: indexed.entryIndex });
    configuration.resources.push({ ...decoded.value, resourceName, resourceId });
  }
}

function declareType(spec: TypeSpecHeader, resPackage: ResourcePackage, declared: DeclaredTypes, pools: PackagePools, context: DecodeContext): void {
  const typeName: string | undefined = pools.typeStrings[spec.id - 1];
  if (typeName === undefined) {
    context.logger.warn(`Type id ${spec.id} has no name in the type string pool`);
  }
  declared.set(spec.id, resPackage.getOrAddType(spec.id, typeName ?? INVALID_TYPE_NAME));
}

function logPackageSummary(resPackage: ResourcePackage, context: DecodeContext): void {
  for (const type of resPackage.types) {
    const firstConfiguration: ResourceConfiguration | undefined = type.configurations[0];
    context.logger.debug(`\t\tType ${type.name} (${type.id - 1}), configCount=${type.configurations.length}, entryCount=${firstConfiguration ? firstConfiguration.resources.length : 0}`);
  }
}

/**
 * Decodes a package chunk, its string pools and the type chunks nested in it.
 * A package whose id and name were already seen is merged into that package.
 */
function decodePackage(data: Uint8Array, chunk: ChunkHeader, packageIndex: number, packages: ResourcePackage[], globalStrings: ReadonlyMap<number, string>, context: DecodeContext): void {
  const header: PackageHeader = readPackageHeader(data, chunk);
  context.logger.debug(`\tPackage ${packageIndex} id=${header.id} name=${header.name}`);

  // Pool offsets are relative to the package chunk, string offsets inside
  // each pool to the pool chunk.
  const typePool = readStringPoolAt(data, chunk.start + header.typeStrings, 'package type strings');
  const keyPool = readStringPoolAt(data, chunk.start + header.keyStrings, 'package key strings');
  const pools: PackagePools = { typeStrings: typePool.strings, keyStrings: keyPool.strings };

  let resPackage: ResourcePackage | undefined = packages.find((candidate: ResourcePackage) => candidate.id === header.id && candidate.name === header.name);
  if (!resPackage) {
    resPackage = new ResourcePackage(header.id, header.name);
    packages.push(resPackage);
  }

  const declared: DeclaredTypes = new Map<number, ResourceType>();
  const end: number = chunkEnd(chunk);
  let offset: number = chunkEnd(keyPool.header.chunk);
  while (offset < end) {
    const inner: ChunkHeader = readChunkHeader(data, offset);
    if (inner.type === RES_TABLE_TYPE_SPEC_TYPE) {
      declareType(readTypeSpecHeader(data, inner, context), resPackage, declared, pools, context);
    } else if (inner.type === RES_TABLE_TYPE_TYPE) {
      decodeTypeChunk(data, inner, header, declared, pools, globalStrings, context);
    }
    offset = chunkEnd(inner);
  }

  logPackageSummary(resPackage, context);
}

/**
 * Reads the table header at the start of the buffer.
 * @throws {StructuralError} If the buffer does not start with a table chunk
 */
export function readTableHeader(data: Uint8Array): { readonly chunk: ChunkHeader; readonly packageCount: number } {
  const chunk: ChunkHeader = readChunkHeader(data, 0);
  if (chunk.type !== RES_TABLE_TYPE) {
    throw new StructuralError(`Expected a resource table chunk, found type ${hex(chunk.type)}`, 0);
  }
  if (chunk.headerSize < TABLE_HEADER_SIZE) {
    throw new StructuralError(`Resource table header of ${chunk.headerSize} bytes is too small`, 0);
  }
  const [packageCount] = readUInt32(data, CHUNK_HEADER_SIZE);
  return { chunk, packageCount };
}

/**
 * Decodes a complete table. The buffer must start with the table chunk.
 *
 * @throws {StructuralError} On layout faults the walk cannot recover from
 * @throws {FormatViolationError} On reserved-field violations in strict mode
 * @throws {UnsupportedFeatureError} On 16-bit entry offsets
 */
export function decodeTable(data: Uint8Array, context: DecodeContext): DecodedTable {
  const { chunk: tableChunk, packageCount } = readTableHeader(data);
  context.logger.debug(`Package Groups (${packageCount})`);

  const end: number = chunkEnd(tableChunk);
  if (end > data.length) {
    throw new StructuralError(`Resource table declares ${tableChunk.size} bytes but only ${data.length} are available`, 0);
  }

  const globalStrings = new Map<number, string>();
  const packages: ResourcePackage[] = [];
  let packageIndex = 0;
  let offset: number = tableChunk.headerSize;

  while (offset + CHUNK_HEADER_SIZE <= end) {
    const chunk: ChunkHeader = readChunkHeader(data, offset);
    if (chunk.type === RES_STRING_POOL_TYPE) {
      const strings: StringPool = decodeStringPool(data, readStringPoolHeader(data, chunk));
      strings.forEach((value: string, index: number) => globalStrings.set(index, value));
    } else if (chunk.type === RES_TABLE_PACKAGE_TYPE) {
      decodePackage(data, chunk, packageIndex, packages, globalStrings, context);
      packageIndex += 1;
    }
    offset = chunkEnd(chunk);
  }

  return { globalStrings, packages };
}
