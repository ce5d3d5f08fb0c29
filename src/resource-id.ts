/**
 * Resource ids pack the package id, type id and entry index of a resource
 * into one unsigned 32-bit number: `package << 24 | type << 16 | entryIndex`.
 */

export interface ResourceId {
  readonly packageId: number;
  readonly typeId: number;
  readonly itemIndex: number;
}

export function parseResourceId(resourceId: number): ResourceId {
  const id: number = resourceId >>> 0;
  return {
    packageId: (id >>> 24) & 0xff,
    typeId: (id >>> 16) & 0xff,
    itemIndex: id & 0xffff,
  };
}

export function joinResourceId({ packageId, typeId, itemIndex }: ResourceId): number {
  return (((packageId & 0xff) << 24) | ((typeId & 0xff) << 16) | (itemIndex & 0xffff)) >>> 0;
}

/**
 * Parses `0x7f010000`-style or decimal id text.
 * @returns The id, or null when the text is not an id
 */
export function parseResourceIdText(text: string): number | null {
  const trimmed: string = text.trim();
  const match: RegExpExecArray | null = /^(?:0x([0-9a-f]{1,8})|(\d+))$/i.exec(trimmed);
  if (!match) {
    return null;
  }
  const value: number = match[1] !== undefined ? Number.parseInt(match[1], 16) : Number(match[2]);
  return value > 0xffffffff ? null : value >>> 0;
}
