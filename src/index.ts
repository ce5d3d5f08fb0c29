/**
 * arsc-decoder - Main entry point
 *
 * Decodes compiled Android resource tables into a queryable resource model.
 */

export { ResourceTable } from './resource-table.js';
export type { ResourceTableOptions, TableState } from './resource-table.js';
export { ResourcePackage, ResourceType, ResourceConfiguration } from './table-model.js';
export { parseResourceId, joinResourceId, parseResourceIdText } from './resource-id.js';
export type { ResourceId } from './resource-id.js';
export { formatConfig, formatResource, formatResourceId, formatValue } from './format.js';
export { complexToFloat } from './value-decoder.js';
export { configEquals, DEFAULT_DEVICE_CONFIG } from './config-decoder.js';
export {
  ResourceTableError,
  FormatViolationError,
  UnsupportedFeatureError,
  StructuralError,
  ResourceTableIoError,
  TableStateError,
} from './errors.js';
export { createConsoleLogger, silentLogger } from './utils/logger.js';
export type { Logger, ConsoleLoggerOptions } from './utils/logger.js';
export { INVALID_RESOURCE_NAME, DIMENSION_UNITS } from './types/resource.js';
export type {
  ArrayValue,
  AttributeValue,
  BooleanValue,
  ColorValue,
  ComplexValue,
  DimensionUnit,
  DimensionValue,
  FloatValue,
  FractionKind,
  FractionValue,
  IntegerValue,
  NullValue,
  ReferenceValue,
  Resource,
  ResourceIdentity,
  ResourceValue,
  StringValue,
} from './types/resource.js';
export type { DeviceConfig } from './types/device-config.js';
