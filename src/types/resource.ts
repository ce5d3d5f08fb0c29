/**
 * Decoded resource values.
 *
 * `ResourceValue` is a closed union discriminated by `kind`. Top-level
 * resources of a configuration additionally carry their name and id; values
 * nested in arrays and maps do not.
 */

/** Name given to entries whose key is missing from the key string pool. */
export const INVALID_RESOURCE_NAME = '<INVALID RESOURCE>';

export type DimensionUnit = 'px' | 'dip' | 'sp' | 'pt' | 'in' | 'mm';

/** Dimension units indexed by their 4-bit unit code. */
export const DIMENSION_UNITS: readonly DimensionUnit[] = ['px', 'dip', 'sp', 'pt', 'in', 'mm'];

/** A fraction of the whole, or of the parent's size. */
export type FractionKind = 'fraction' | 'fraction-parent';

export interface NullValue {
  readonly kind: 'null';
}

export interface ReferenceValue {
  readonly kind: 'reference';
  readonly referenceId: number;
}

export interface AttributeValue {
  readonly kind: 'attribute';
  readonly attributeId: number;
}

export interface StringValue {
  readonly kind: 'string';
  /** Null when the index is missing from the global string pool. */
  readonly value: string | null;
}

export interface IntegerValue {
  readonly kind: 'integer';
  readonly value: number;
}

export interface FloatValue {
  readonly kind: 'float';
  readonly value: number;
}

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface ColorValue {
  readonly kind: 'color';
  readonly a: number;
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

export interface DimensionValue {
  readonly kind: 'dimension';
  readonly value: number;
  readonly unit: DimensionUnit;
}

export interface FractionValue {
  readonly kind: 'fraction';
  readonly fractionKind: FractionKind;
  readonly value: number;
}

export interface ArrayValue {
  readonly kind: 'array';
  readonly elements: readonly ResourceValue[];
}

export interface ComplexValue {
  readonly kind: 'complex';
  /** Name of the type that owns the map entry. */
  readonly resType: string;
  /** Map records keyed by the decimal form of their name id, in encounter order. */
  readonly value: ReadonlyMap<string, ResourceValue>;
}

export type ResourceValue =
  | NullValue
  | ReferenceValue
  | AttributeValue
  | StringValue
  | IntegerValue
  | FloatValue
  | BooleanValue
  | ColorValue
  | DimensionValue
  | FractionValue
  | ArrayValue
  | ComplexValue;

export interface ResourceIdentity {
  readonly resourceName: string;
  readonly resourceId: number;
}

/** A resource as stored in a configuration. */
export type Resource = ResourceValue & ResourceIdentity;
