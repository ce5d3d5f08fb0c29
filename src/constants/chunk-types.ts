/**
 * Binary layout constants of the compiled resource table format.
 * All multi-byte fields are little-endian.
 */

/** Chunk type codes. */
export const RES_STRING_POOL_TYPE = 0x0001;
export const RES_TABLE_TYPE = 0x0002;
export const RES_TABLE_PACKAGE_TYPE = 0x0200;
export const RES_TABLE_TYPE_TYPE = 0x0201;
export const RES_TABLE_TYPE_SPEC_TYPE = 0x0202;

/** Every chunk starts with type (u16), headerSize (u16) and size (u32). */
export const CHUNK_HEADER_SIZE = 8;

/** Table header: chunk header plus the package count (u32). */
export const TABLE_HEADER_SIZE = 12;

/** String pool flags. */
export const SORTED_FLAG = 1 << 0;
export const UTF8_FLAG = 1 << 8;

/** Package names are stored as 128 UTF-16 code units. */
export const PACKAGE_NAME_LENGTH = 128;

/** Entry flags. */
export const FLAG_COMPLEX = 0x0001;
export const FLAG_PUBLIC = 0x0002;
export const FLAG_WEAK = 0x0004;
export const FLAG_COMPACT = 0x0008;

/** Type chunk flags. */
export const FLAG_SPARSE = 0x01;
export const FLAG_OFFSET16 = 0x02;

/** Dense index table sentinel for an undefined entry. */
export const NO_ENTRY = 0xffffffff;

/** Header sizes of simple and map entries. */
export const SIMPLE_ENTRY_SIZE = 0x8;
export const MAP_ENTRY_SIZE = 0x10;

/** Size of a raw value record (size, res0, dataType, data). */
export const RES_VALUE_SIZE = 8;

/** Raw value data types. */
export const TYPE_NULL = 0x00;
export const TYPE_REFERENCE = 0x01;
export const TYPE_ATTRIBUTE = 0x02;
export const TYPE_STRING = 0x03;
export const TYPE_FLOAT = 0x04;
export const TYPE_DIMENSION = 0x05;
export const TYPE_FRACTION = 0x06;
export const TYPE_INT_DEC = 0x10;
export const TYPE_INT_HEX = 0x11;
export const TYPE_INT_BOOLEAN = 0x12;
export const TYPE_INT_COLOR_ARGB8 = 0x1c;
export const TYPE_INT_COLOR_RGB8 = 0x1d;
export const TYPE_INT_COLOR_ARGB4 = 0x1e;
export const TYPE_INT_COLOR_RGB4 = 0x1f;

/** Complex (fixed-point) value layout. */
export const COMPLEX_UNIT_SHIFT = 0;
export const COMPLEX_UNIT_MASK = 0xf;
export const COMPLEX_RADIX_SHIFT = 4;
export const COMPLEX_RADIX_MASK = 0x3;
export const COMPLEX_MANTISSA_SHIFT = 8;
export const COMPLEX_MANTISSA_MASK = 0xffffff;

/** Fraction unit of a fraction of the whole; any other unit is relative to the parent. */
export const COMPLEX_UNIT_FRACTION = 0;

/**
 * Multipliers for the four radix encodings (23p0, 16p7, 8p15, 0p23), folded
 * with the shift that drops the low 8 selector bits of the mantissa word.
 */
const MANTISSA_MULT = 1 / (1 << COMPLEX_MANTISSA_SHIFT);
export const RADIX_MULTS: readonly number[] = [
  1 * MANTISSA_MULT,
  (1 / (1 << 7)) * MANTISSA_MULT,
  (1 / (1 << 15)) * MANTISSA_MULT,
  (1 / (1 << 23)) * MANTISSA_MULT,
];

/** Name of the type whose string map records collapse into arrays. */
export const ARRAY_TYPE_NAME = 'array';

/** Type name used by string resource lookups. */
export const STRING_TYPE_NAME = 'string';
