/**
 * ComicInfo Errors
 *
 * Closed set of failures raised while loading, validating and serializing
 * ComicInfo metadata. Every class carries a stable `code` so callers can
 * branch without instanceof chains.
 */

// =============================================================================
// Types
// =============================================================================

export type ComicInfoErrorCode =
  | 'PARSE_ERROR'
  | 'FILE_ERROR'
  | 'INVALID_ENUM'
  | 'RANGE_ERROR'
  | 'TYPE_COERCION_ERROR'
  | 'SCHEMA_ERROR';

export type ExpectedScalarType = 'Int' | 'Double';

// =============================================================================
// Error Classes
// =============================================================================

export abstract class ComicInfoError extends Error {
  abstract readonly code: ComicInfoErrorCode;
}

/**
 * Malformed or empty input, missing or wrong root element, unrenderable output.
 */
export class ParseError extends ComicInfoError {
  readonly code = 'PARSE_ERROR';

  constructor(readonly detail: string) {
    super(`Parse error: ${detail}`);
    this.name = 'ParseError';
  }
}

/**
 * Underlying I/O failure while reading from a path or URL.
 */
export class FileError extends ComicInfoError {
  readonly code = 'FILE_ERROR';

  constructor(readonly detail: string) {
    super(`File error: ${detail}`);
    this.name = 'FileError';
  }
}

export class InvalidEnumError extends ComicInfoError {
  readonly code = 'INVALID_ENUM';

  constructor(
    readonly field: string,
    readonly value: string,
    readonly validValues: readonly string[]
  ) {
    super(
      `Invalid value '${value}' for field '${field}'. Valid values are: ${validValues.join(', ')}`
    );
    this.name = 'InvalidEnumError';
  }
}

/**
 * A numeric field parsed successfully but lies outside its closed range.
 * Bounds are kept in the textual form they are reported with.
 */
export class ComicInfoRangeError extends ComicInfoError {
  readonly code = 'RANGE_ERROR';

  constructor(
    readonly field: string,
    readonly value: string,
    readonly min: string,
    readonly max: string
  ) {
    super(`Value '${value}' for field '${field}' is out of range (${min}..${max})`);
    this.name = 'ComicInfoRangeError';
  }
}

export class TypeCoercionError extends ComicInfoError {
  readonly code = 'TYPE_COERCION_ERROR';

  constructor(
    readonly field: string,
    readonly value: string,
    readonly expectedType: ExpectedScalarType
  ) {
    super(`Cannot convert value '${value}' for field '${field}' to ${expectedType}`);
    this.name = 'TypeCoercionError';
  }
}

/**
 * Structural violation not covered by the other kinds.
 */
export class SchemaError extends ComicInfoError {
  readonly code = 'SCHEMA_ERROR';

  constructor(readonly detail: string) {
    super(`Schema error: ${detail}`);
    this.name = 'SchemaError';
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isComicInfoError(error: unknown): error is ComicInfoError {
  return error instanceof ComicInfoError;
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
