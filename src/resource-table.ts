/**
 * Queryable model of a compiled resource table.
 */
import { readFile } from 'node:fs/promises';
import { CHUNK_HEADER_SIZE, STRING_TYPE_NAME, TABLE_HEADER_SIZE } from './constants/chunk-types.js';
import { DecodeContext } from './decode-context.js';
import { ResourceTableError, ResourceTableIoError, StructuralError, TableStateError } from './errors.js';
import { ResourceId, parseResourceId } from './resource-id.js';
import { DecodedTable, decodeTable } from './table-decoder.js';
import { ResourcePackage, ResourceType } from './table-model.js';
import { Resource } from './types/resource.js';
import { Logger, createConsoleLogger } from './utils/logger.js';

export interface ResourceTableOptions {
  /**
   * Throw on reserved fields holding non-zero values instead of logging them.
   * Defaults to true.
   */
  readonly strict?: boolean;
  /** Log sink; defaults to the console. */
  readonly logger?: Logger;
}

/**
 * Lifecycle of a table: `empty` until `parse` starts, `building` while it
 * runs, `ready` once it succeeded. A failed parse returns the table to `empty`.
 */
export type TableState = 'empty' | 'building' | 'ready';

/**
 * Collects a table from a byte stream: the chunk header first, then exactly
 * the declared number of bytes, copied block by block.
 */
async function readTableBytes(stream: AsyncIterable<Uint8Array>): Promise<Buffer> {
  const header: Buffer = Buffer.alloc(CHUNK_HEADER_SIZE);
  let headerFilled = 0;
  let table: Buffer | null = null;
  let filled = 0;

  try {
    for await (const block of stream) {
      let blockOffset = 0;
      while (blockOffset < block.length) {
        if (table === null) {
          const count: number = Math.min(CHUNK_HEADER_SIZE - headerFilled, block.length - blockOffset);
          header.set(block.subarray(blockOffset, blockOffset + count), headerFilled);
          headerFilled += count;
          blockOffset += count;
          if (headerFilled === CHUNK_HEADER_SIZE) {
            const size: number = header.readUInt32LE(4);
            if (size < TABLE_HEADER_SIZE) {
              throw new StructuralError(`Resource table declares size ${size}`, 0);
            }
            table = Buffer.alloc(size);
            header.copy(table, 0);
            filled = CHUNK_HEADER_SIZE;
          }
        } else {
          const count: number = Math.min(table.length - filled, block.length - blockOffset);
          table.set(block.subarray(blockOffset, blockOffset + count), filled);
          filled += count;
          blockOffset += count;
          if (filled === table.length) {
            return table;
          }
        }
      }
    }
  } catch (error) {
    if (error instanceof ResourceTableError) {
      throw error;
    }
    throw new ResourceTableIoError(`Could not read resource table stream: ${error instanceof Error ? error.message : String(error)}`, error);
  }

  const expected: number = table === null ? CHUNK_HEADER_SIZE : table.length;
  const received: number = table === null ? headerFilled : filled;
  throw new ResourceTableIoError(`Resource table stream ended after ${received} of ${expected} bytes`);
}

/**
 * Resource table decoded from the `resources.arsc` member of an application
 * package, with lookups by id, name and type.
 */
export class ResourceTable {
  /** Base error class for decoder failures. */
  static readonly Error: typeof ResourceTableError = ResourceTableError;

  private readonly packages: ResourcePackage[] = [];
  private readonly globalStrings = new Map<number, string>();
  private readonly strict: boolean;
  private readonly logger: Logger;
  private tableState: TableState = 'empty';

  constructor({ strict = true, logger = createConsoleLogger() }: ResourceTableOptions = {}) {
    this.strict = strict;
    this.logger = logger;
  }

  /**
   * Reads and parses a raw table file.
   * @throws {ResourceTableIoError} If the file cannot be read
   */
  static async read({ filePath, options }: { readonly filePath: string; readonly options?: ResourceTableOptions }): Promise<ResourceTable> {
    return new ResourceTable(options).parseFile(filePath);
  }

  /** Reads a table from a byte stream and parses it. */
  static async fromStream({ stream, options }: { readonly stream: AsyncIterable<Uint8Array>; readonly options?: ResourceTableOptions }): Promise<ResourceTable> {
    return new ResourceTable(options).parseStream(stream);
  }

  /** Parses a table held in memory. */
  static fromBuffer({ data, options }: { readonly data: Uint8Array; readonly options?: ResourceTableOptions }): ResourceTable {
    return new ResourceTable(options).parse(data);
  }

  get state(): TableState {
    return this.tableState;
  }

  /**
   * Builds the model from the table bytes. Can be called once per table.
   *
   * @throws {TableStateError} If the table was already parsed
   * @throws {ResourceTableError} If the data is structurally invalid
   */
  parse(data: Uint8Array): this {
    if (this.tableState !== 'empty') {
      throw new TableStateError(`Cannot parse a table in state "${this.tableState}"`);
    }
    this.tableState = 'building';
    let decoded: DecodedTable;
    try {
      decoded = decodeTable(data, new DecodeContext({ strict: this.strict, logger: this.logger }));
    } catch (error) {
      this.tableState = 'empty';
      throw error;
    }
    this.packages.push(...decoded.packages);
    for (const [index, value] of decoded.globalStrings) {
      this.globalStrings.set(index, value);
    }
    this.tableState = 'ready';
    return this;
  }

  /**
   * Reads the table bytes from a stream, then parses them.
   * @throws {ResourceTableIoError} If the stream fails or ends early
   */
  async parseStream(stream: AsyncIterable<Uint8Array>): Promise<this> {
    if (this.tableState !== 'empty') {
      throw new TableStateError(`Cannot parse a table in state "${this.tableState}"`);
    }
    const data: Buffer = await readTableBytes(stream);
    return this.parse(data);
  }

  /**
   * Reads a raw table file, then parses it.
   * @throws {ResourceTableIoError} If the file cannot be read
   */
  async parseFile(filePath: string): Promise<this> {
    let data: Buffer;
    try {
      data = await readFile(filePath);
    } catch (error) {
      throw new ResourceTableIoError(`Could not read resource table "${filePath}": ${error instanceof Error ? error.message : String(error)}`, error);
    }
    return this.parse(data);
  }

  getPackages(): readonly ResourcePackage[] {
    return this.packages;
  }

  getPackage(packageId: number, packageName: string): ResourcePackage | null {
    return this.packages.find((resPackage: ResourcePackage) => resPackage.id === packageId && resPackage.name === packageName) ?? null;
  }

  /** Table-level string pool, by ordinal. */
  getGlobalStringPool(): ReadonlyMap<number, string> {
    return this.globalStrings;
  }

  /**
   * Gets the type addressed by the package and type bits of a resource id.
   * Only the first package with a matching id is considered.
   */
  findResourceType(resourceId: number): ResourceType | null {
    const id: ResourceId = parseResourceId(resourceId);
    const resPackage: ResourcePackage | undefined = this.packages.find((candidate: ResourcePackage) => candidate.id === id.packageId);
    return resPackage?.getTypeById(id.typeId) ?? null;
  }

  /**
   * Finds a resource by id, configuration-agnostic: the first match wins.
   */
  findResource(resourceId: number): Resource | null {
    return this.findResourceType(resourceId)?.getFirstResource(resourceId) ?? null;
  }

  /**
   * Finds every resource with the given id, one per configuration that
   * defines it.
   */
  findAllResources(resourceId: number): Resource[] {
    return this.findResourceType(resourceId)?.getAllResourcesById(resourceId) ?? [];
  }

  /**
   * Gets the resource with the given type name and resource name.
   */
  findResourceByName(typeName: string, resourceName: string): Resource | null {
    for (const resPackage of this.packages) {
      const type: ResourceType | null = resPackage.getResourceType(typeName);
      const match: Resource | undefined = type?.getAllResources().find((resource: Resource) => resource.resourceName === resourceName);
      if (match) {
        return match;
      }
    }
    return null;
  }

  /**
   * Gets the text of the string resource with the given name.
   */
  findStringResource(resourceName: string): string | null {
    const resource: Resource | null = this.findResourceByName(STRING_TYPE_NAME, resourceName);
    return resource?.kind === 'string' ? resource.value : null;
  }

  /**
   * Gets every resource of the given type, one per name.
   */
  findResourcesByType(typeName: string): Resource[] {
    const resources: Resource[] = [];
    for (const resPackage of this.packages) {
      const type: ResourceType | null = resPackage.getResourceType(typeName);
      if (type) {
        resources.push(...type.getAllResources());
      }
    }
    return resources;
  }

  /**
   * Merges another parsed table into this one. Packages match on id and
   * name, types on id and name, configurations on equal settings; matching
   * configurations have their resources appended, everything else is copied
   * in. The other table's global strings replace ours at the same ordinal.
   *
   * @throws {TableStateError} If either table is not ready
   */
  addAll(other: ResourceTable): void {
    if (this.tableState !== 'ready' || other.tableState !== 'ready') {
      throw new TableStateError('Both tables must be parsed before merging');
    }
    for (const resPackage of other.packages) {
      const existing: ResourcePackage | null = this.getPackage(resPackage.id, resPackage.name);
      if (existing) {
        existing.addAll(resPackage);
      } else {
        this.packages.push(resPackage.clone());
      }
    }
    for (const [index, value] of other.globalStrings) {
      this.globalStrings.set(index, value);
    }
  }
}
