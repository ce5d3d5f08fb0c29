/**
 * Human-readable rendering of resource ids, configurations and values.
 */
import { DeviceConfig } from './types/device-config.js';
import { Resource, ResourceValue } from './types/resource.js';

const DENSITY_QUALIFIERS: ReadonlyMap<number, string> = new Map([
  [120, 'ldpi'],
  [160, 'mdpi'],
  [213, 'tvdpi'],
  [240, 'hdpi'],
  [320, 'xhdpi'],
  [480, 'xxhdpi'],
  [640, 'xxxhdpi'],
  [0xfffe, 'anydpi'],
  [0xffff, 'nodpi'],
]);

const ORIENTATION_QUALIFIERS: ReadonlyMap<number, string> = new Map([
  [1, 'port'],
  [2, 'land'],
  [3, 'square'],
]);

export function formatResourceId(resourceId: number): string {
  return `0x${(resourceId >>> 0).toString(16).padStart(8, '0')}`;
}

function hexByte(value: number): string {
  return (value >>> 0).toString(16).padStart(2, '0');
}

/**
 * Renders the qualifiers of a configuration in directory-suffix order,
 * e.g. `en-rUS-sw600dp-land-xhdpi-v21`, or `default` when nothing is set.
 */
export function formatConfig(config: DeviceConfig): string {
  const parts: string[] = [];
  if (config.mcc !== 0) {
    parts.push(`mcc${config.mcc}`);
  }
  if (config.mnc !== 0) {
    parts.push(`mnc${config.mnc}`);
  }
  if (config.language !== '') {
    parts.push(config.language);
  }
  if (config.country !== '') {
    parts.push(`r${config.country}`);
  }
  if (config.localeScript !== '') {
    parts.push(`s${config.localeScript}`);
  }
  if (config.smallestScreenWidthDp !== 0) {
    parts.push(`sw${config.smallestScreenWidthDp}dp`);
  }
  if (config.screenWidthDp !== 0) {
    parts.push(`w${config.screenWidthDp}dp`);
  }
  if (config.screenHeightDp !== 0) {
    parts.push(`h${config.screenHeightDp}dp`);
  }
  const orientation: string | undefined = ORIENTATION_QUALIFIERS.get(config.orientation);
  if (orientation) {
    parts.push(orientation);
  }
  if (config.density !== 0) {
    parts.push(DENSITY_QUALIFIERS.get(config.density) ?? `${config.density}dpi`);
  }
  if (config.sdkVersion !== 0) {
    parts.push(`v${config.sdkVersion}`);
  }
  return parts.length === 0 ? 'default' : parts.join('-');
}

/**
 * Renders a value the way it would be written in a resource XML file.
 */
export function formatValue(value: ResourceValue): string {
  switch (value.kind) {
    case 'null':
      return '@null';
    case 'reference':
      return `@${formatResourceId(value.referenceId)}`;
    case 'attribute':
      return `?${formatResourceId(value.attributeId)}`;
    case 'string':
      return JSON.stringify(value.value);
    case 'integer':
    case 'float':
      return String(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'color':
      return `#${hexByte(value.a)}${hexByte(value.r)}${hexByte(value.g)}${hexByte(value.b)}`;
    case 'dimension':
      return `${value.value}${value.unit}`;
    case 'fraction':
      return `${value.value * 100}${value.fractionKind === 'fraction' ? '%' : '%p'}`;
    case 'array':
      return `[${value.elements.map(formatValue).join(', ')}]`;
    case 'complex':
      return `{${Array.from(value.value, ([name, entry]) => `${name}=${formatValue(entry)}`).join(', ')}}`;
  }
}

/** One-line rendering: id, name and value. */
export function formatResource(resource: Resource): string {
  return `${formatResourceId(resource.resourceId)} ${resource.resourceName} = ${formatValue(resource)}`;
}
