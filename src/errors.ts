/**
 * Error classes raised while decoding or combining resource tables.
 */

/** Base class for every decoder failure. */
export class ResourceTableError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'ResourceTableError';
  }
}

function hexOffset(offset: number): string {
  return `0x${offset.toString(16)}`;
}

/**
 * A reserved or must-be-zero field holds another value.
 * Only thrown in strict mode; lenient decoding logs and carries on.
 */
export class FormatViolationError extends ResourceTableError {
  constructor(message: string, public readonly offset: number) {
    super(`${message} offset=${hexOffset(offset)}`);
    this.name = 'FormatViolationError';
  }
}

/** The table uses an encoding the decoder does not implement. */
export class UnsupportedFeatureError extends ResourceTableError {
  constructor(message: string, public readonly offset: number) {
    super(`${message} offset=${hexOffset(offset)}`);
    this.name = 'UnsupportedFeatureError';
  }
}

/** The chunk layout cannot be walked any further. */
export class StructuralError extends ResourceTableError {
  constructor(message: string, public readonly offset: number) {
    super(`${message} offset=${hexOffset(offset)}`);
    this.name = 'StructuralError';
  }
}

/** Reading the table bytes failed. */
export class ResourceTableIoError extends ResourceTableError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ResourceTableIoError';
  }
}

/** An operation was called in the wrong table lifecycle state. */
export class TableStateError extends ResourceTableError {
  constructor(message: string) {
    super(message);
    this.name = 'TableStateError';
  }
}
