/**
 * Device configuration records.
 *
 * The record grew over platform releases; its leading `size` field says
 * which tail groups are present. Groups are read in order and reading stops
 * once `size` is covered, which fixes where the following data starts.
 */
import { DecodeContext } from './decode-context.js';
import { DeviceConfig } from './types/device-config.js';
import { ByteCursor } from './utils/byte-cursor.js';

/** Size of the record up to and including minorVersion. */
const BASE_CONFIG_SIZE = 28;
/** Size once all known fields are present. */
const FULL_CONFIG_SIZE = 48;

export const DEFAULT_DEVICE_CONFIG: DeviceConfig = {
  size: BASE_CONFIG_SIZE,
  mcc: 0,
  mnc: 0,
  language: '',
  country: '',
  orientation: 0,
  touchscreen: 0,
  density: 0,
  keyboard: 0,
  navigation: 0,
  inputFlags: 0,
  inputPad0: 0,
  screenWidth: 0,
  screenHeight: 0,
  sdkVersion: 0,
  minorVersion: 0,
  screenLayout: 0,
  uiMode: 0,
  smallestScreenWidthDp: 0,
  screenWidthDp: 0,
  screenHeightDp: 0,
  localeScript: '',
  localeVariant: '',
};

function readChars(cursor: ByteCursor, length: number): string {
  let text = '';
  for (const byte of cursor.bytes(length)) {
    text += String.fromCharCode(byte);
  }
  return text.replace(/\0+$/, '');
}

/**
 * Decodes a configuration record at `offset`.
 * @returns The record and the offset just past the bytes consumed
 */
export function decodeConfig(data: Uint8Array, offset: number, context: DecodeContext): { readonly config: DeviceConfig; readonly next: number } {
  const cursor = new ByteCursor(data, offset);
  const size: number = cursor.u32();
  const base = {
    size,
    mcc: cursor.u16(),
    mnc: cursor.u16(),
    language: readChars(cursor, 2),
    country: readChars(cursor, 2),
    orientation: cursor.u8(),
    touchscreen: cursor.u8(),
    density: cursor.u16(),
    keyboard: cursor.u8(),
    navigation: cursor.u8(),
    inputFlags: cursor.u8(),
    inputPad0: cursor.u8(),
    screenWidth: cursor.u16(),
    screenHeight: cursor.u16(),
    sdkVersion: cursor.u16(),
    minorVersion: cursor.u16(),
  };
  let config: DeviceConfig = { ...DEFAULT_DEVICE_CONFIG, ...base };
  if (size <= BASE_CONFIG_SIZE) {
    return { config, next: cursor.offset };
  }

  config = { ...config, screenLayout: cursor.u8(), uiMode: cursor.u8(), smallestScreenWidthDp: cursor.u16() };
  if (size <= 32) {
    return { config, next: cursor.offset };
  }

  config = { ...config, screenWidthDp: cursor.u16(), screenHeightDp: cursor.u16() };
  if (size <= 36) {
    return { config, next: cursor.offset };
  }

  config = { ...config, localeScript: readChars(cursor, 4) };
  if (size <= 40) {
    return { config, next: cursor.offset };
  }

  config = { ...config, localeVariant: readChars(cursor, 8) };
  if (size <= FULL_CONFIG_SIZE) {
    return { config, next: cursor.offset };
  }

  // Fields newer than the ones above are skipped.
  const extraStart: number = cursor.offset;
  const extra: Uint8Array = cursor.bytes(size - FULL_CONFIG_SIZE);
  if (extra.some((byte: number) => byte !== 0)) {
    context.logger.debug(`Excessive ${extra.length} non-null bytes in config at 0x${extraStart.toString(16)} ignored`);
  }
  return { config, next: cursor.offset };
}

const CONFIG_FIELDS: readonly (keyof DeviceConfig)[] = [
  'size', 'mcc', 'mnc', 'language', 'country', 'orientation', 'touchscreen', 'density',
  'keyboard', 'navigation', 'inputFlags', 'inputPad0', 'screenWidth', 'screenHeight',
  'sdkVersion', 'minorVersion', 'screenLayout', 'uiMode', 'smallestScreenWidthDp',
  'screenWidthDp', 'screenHeightDp', 'localeScript', 'localeVariant',
];

/** Field-by-field equality, `size` included. */
export function configEquals(a: DeviceConfig, b: DeviceConfig): boolean {
  return CONFIG_FIELDS.every((field: keyof DeviceConfig) => a[field] === b[field]);
}
