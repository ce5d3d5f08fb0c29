/**
 * Device configuration a set of resource values applies to.
 * Character fields have trailing NUL bytes removed; an empty string means "any".
 * Fields beyond the record's declared `size` keep their zero defaults.
 */
export interface DeviceConfig {
  /** Number of bytes in the record. */
  readonly size: number;
  readonly mcc: number;
  readonly mnc: number;
  readonly language: string;
  readonly country: string;
  readonly orientation: number;
  readonly touchscreen: number;
  readonly density: number;
  readonly keyboard: number;
  readonly navigation: number;
  readonly inputFlags: number;
  readonly inputPad0: number;
  readonly screenWidth: number;
  readonly screenHeight: number;
  readonly sdkVersion: number;
  readonly minorVersion: number;
  readonly screenLayout: number;
  readonly uiMode: number;
  readonly smallestScreenWidthDp: number;
  readonly screenWidthDp: number;
  readonly screenHeightDp: number;
  readonly localeScript: string;
  readonly localeVariant: string;
}
