/**
 * Raw value records and their mapping onto resource values.
 */
import {
  ARRAY_TYPE_NAME,
  COMPLEX_RADIX_MASK,
  COMPLEX_RADIX_SHIFT,
  COMPLEX_UNIT_FRACTION,
  COMPLEX_UNIT_MASK,
  COMPLEX_UNIT_SHIFT,
  COMPLEX_MANTISSA_MASK,
  COMPLEX_MANTISSA_SHIFT,
  RADIX_MULTS,
  RES_VALUE_SIZE,
  TYPE_ATTRIBUTE,
  TYPE_DIMENSION,
  TYPE_FLOAT,
  TYPE_FRACTION,
  TYPE_INT_BOOLEAN,
  TYPE_INT_COLOR_ARGB4,
  TYPE_INT_COLOR_ARGB8,
  TYPE_INT_COLOR_RGB4,
  TYPE_INT_COLOR_RGB8,
  TYPE_INT_DEC,
  TYPE_INT_HEX,
  TYPE_NULL,
  TYPE_REFERENCE,
  TYPE_STRING,
} from './constants/chunk-types.js';
import { DecodeContext } from './decode-context.js';
import { EntryHeader, RawValue } from './types/chunk.js';
import { ComplexValue, DIMENSION_UNITS, DimensionUnit, ResourceValue } from './types/resource.js';
import { ByteCursor, readUInt32 } from './utils/byte-cursor.js';

/** Outcome of decoding one value; failures carry the reason to log. */
export type DecodeResult =
  | { readonly ok: true; readonly value: ResourceValue }
  | { readonly ok: false; readonly reason: string };

function success(value: ResourceValue): DecodeResult {
  return { ok: true, value };
}

function failure(reason: string): DecodeResult {
  return { ok: false, reason };
}

function hex(value: number): string {
  return `0x${value.toString(16)}`;
}

/**
 * Reads a raw value record. A non-zero `res0` goes through the decode context.
 * @returns The record and the offset past it, or null when `size` exceeds 8
 */
export function readRawValue(data: Uint8Array, offset: number, context: DecodeContext): { readonly value: RawValue; readonly next: number } | null {
  const cursor = new ByteCursor(data, offset);
  const size: number = cursor.u16();
  if (size > RES_VALUE_SIZE) {
    return null;
  }
  const res0: number = cursor.u8();
  if (res0 !== 0) {
    context.violation('File format violation: res0 is not zero', cursor.offset - 1);
  }
  const dataType: number = cursor.u8();
  const valueData: number = cursor.u32();
  return { value: { offset, size, res0, dataType, data: valueData }, next: cursor.offset };
}

/**
 * Decodes the fixed-point encoding shared by dimensions and fractions: a
 * signed 24-bit mantissa in bits 8..31 scaled by the radix in bits 4..5.
 */
export function complexToFloat(complex: number): number {
  const mantissa: number = complex & (COMPLEX_MANTISSA_MASK << COMPLEX_MANTISSA_SHIFT);
  return mantissa * RADIX_MULTS[(complex >> COMPLEX_RADIX_SHIFT) & COMPLEX_RADIX_MASK];
}

function intBitsToFloat(bits: number): number {
  const scratch: Buffer = Buffer.alloc(4);
  scratch.writeUInt32LE(bits >>> 0);
  return scratch.readFloatLE(0);
}

/**
 * Channel extraction as observed in existing decoders: the shift binds
 * before the mask, so alpha keeps the whole word (as a signed 32-bit value)
 * and red, green and blue all take the low byte.
 */
function decodeColor(data: number): ResourceValue {
  return {
    kind: 'color',
    a: data & (0xff000000 >> (3 * 8)),
    r: data & (0x00ff0000 >> (2 * 8)),
    g: data & (0x0000ff00 >> 8),
    b: data & 0x000000ff,
  };
}

/**
 * Maps a raw value onto a resource value.
 * @param globalStrings - Table-level string pool used by string values
 */
export function decodeValue(raw: RawValue, globalStrings: ReadonlyMap<number, string>): DecodeResult {
  const { dataType, data } = raw;
  switch (dataType) {
    case TYPE_NULL:
      return success({ kind: 'null' });
    case TYPE_REFERENCE:
      return success({ kind: 'reference', referenceId: data });
    case TYPE_ATTRIBUTE:
      return success({ kind: 'attribute', attributeId: data });
    case TYPE_STRING:
      return success({ kind: 'string', value: globalStrings.get(data) ?? null });
    case TYPE_INT_DEC:
      return success({ kind: 'integer', value: data | 0 });
    case TYPE_INT_HEX:
      return success({ kind: 'integer', value: data >>> 0 });
    case TYPE_INT_BOOLEAN:
      return success({ kind: 'boolean', value: data !== 0 });
    case TYPE_INT_COLOR_ARGB8:
    case TYPE_INT_COLOR_RGB8:
    case TYPE_INT_COLOR_ARGB4:
    case TYPE_INT_COLOR_RGB4:
      return success(decodeColor(data));
    case TYPE_DIMENSION: {
      const unit: DimensionUnit | undefined = DIMENSION_UNITS[(data >> COMPLEX_UNIT_SHIFT) & COMPLEX_UNIT_MASK];
      if (unit === undefined) {
        return failure(`invalid dimension unit ${(data >> COMPLEX_UNIT_SHIFT) & COMPLEX_UNIT_MASK}`);
      }
      return success({ kind: 'dimension', value: complexToFloat(data), unit });
    }
    case TYPE_FLOAT:
      return success({ kind: 'float', value: intBitsToFloat(data) });
    case TYPE_FRACTION: {
      const fractionUnit: number = (data >> COMPLEX_UNIT_SHIFT) & COMPLEX_UNIT_MASK;
      return success({
        kind: 'fraction',
        fractionKind: fractionUnit === COMPLEX_UNIT_FRACTION ? 'fraction' : 'fraction-parent',
        value: complexToFloat(data),
      });
    }
    default:
      return failure(`unsupported data type ${hex(dataType)}`);
  }
}

/**
 * Decodes the map records of a complex entry.
 *
 * In a type named "array", string values are collected per map name into an
 * array value in encounter order; everything else is stored by name, the
 * last record winning.
 */
function decodeComplexEntry(data: Uint8Array, entry: EntryHeader, offset: number, typeName: string, globalStrings: ReadonlyMap<number, string>, context: DecodeContext): DecodeResult {
  const records = new Map<string, ResourceValue>();
  // Element lists of the array values stored in `records`, by map name.
  const arrays = new Map<string, ResourceValue[]>();
  let recordOffset: number = offset;

  for (let i = 0; i < entry.count; i++) {
    const [name, valueOffset] = readUInt32(data, recordOffset);
    const raw = readRawValue(data, valueOffset, context);
    if (raw === null) {
      return failure(`map record ${i} at ${hex(recordOffset)} has an oversized value`);
    }
    recordOffset = raw.next;

    const mapName: string = String(name);
    const decoded: DecodeResult = decodeValue(raw.value, globalStrings);
    if (!decoded.ok) {
      context.logger.warn(`Skipping map record ${mapName}: ${decoded.reason}`);
      continue;
    }

    if (typeName === ARRAY_TYPE_NAME && decoded.value.kind === 'string') {
      const elements: ResourceValue[] | undefined = arrays.get(mapName);
      if (elements) {
        elements.push(decoded.value);
      } else if (!records.has(mapName)) {
        const created: ResourceValue[] = [decoded.value];
        arrays.set(mapName, created);
        records.set(mapName, { kind: 'array', elements: created });
      }
      // A non-array value already stored under this name is left alone.
    } else {
      arrays.delete(mapName);
      records.set(mapName, decoded.value);
    }
  }
  const complex: ComplexValue = { kind: 'complex', resType: typeName, value: records };
  return success(complex);
}

/**
 * Decodes the value part of an entry whose header has been read.
 *
 * @param offset - Offset just past the entry header
 * @param typeName - Name of the type that owns the entry
 */
export function decodeEntryValue(data: Uint8Array, entry: EntryHeader, offset: number, typeName: string, globalStrings: ReadonlyMap<number, string>, context: DecodeContext): DecodeResult {
  if (entry.complex) {
    return decodeComplexEntry(data, entry, offset, typeName, globalStrings, context);
  }
  const raw = readRawValue(data, offset, context);
  if (raw === null) {
    return failure(`value at ${hex(offset)} declares a size above ${RES_VALUE_SIZE}`);
  }
  return decodeValue(raw.value, globalStrings);
}
