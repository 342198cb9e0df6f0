/**
 * Extraction Errors
 *
 * Every error raised by the extractor carries a stable code and a details
 * object. Only MalformedInputError and SchemaMismatchError ever leave
 * `extract()`; GeometryParseError is turned into a null geometry.
 */

export const NAS_ERROR_CODES = {
  MALFORMED_INPUT: 'NAS_MALFORMED_INPUT',
  SCHEMA_MISMATCH: 'NAS_SCHEMA_MISMATCH',
  INVALID_GEOMETRY: 'NAS_INVALID_GEOMETRY',
} as const;

export type NasErrorCode = (typeof NAS_ERROR_CODES)[keyof typeof NAS_ERROR_CODES];

export class NasExtractError extends Error {
  readonly code: NasErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: NasErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'NasExtractError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, NasExtractError.prototype);
  }
}

/**
 * The input is not well-formed XML, or its declared encoding is unknown.
 */
export class MalformedInputError extends NasExtractError {
  constructor(message: string, details?: { line?: number; col?: number; cause?: string }) {
    super(NAS_ERROR_CODES.MALFORMED_INPUT, message, details);
    this.name = 'MalformedInputError';
    Object.setPrototypeOf(this, MalformedInputError.prototype);
  }
}

export interface SchemaMismatchDetails {
  table: string;
  column: string;
  featureId: string | null;
  elementIndex: number;
}

/**
 * A matched feature element lacks its feature id or another required field.
 */
export class SchemaMismatchError extends NasExtractError {
  readonly table: string;
  readonly column: string;
  readonly featureId: string | null;

  constructor(message: string, details: SchemaMismatchDetails) {
    super(NAS_ERROR_CODES.SCHEMA_MISMATCH, message, { ...details });
    this.name = 'SchemaMismatchError';
    this.table = details.table;
    this.column = details.column;
    this.featureId = details.featureId;
    Object.setPrototypeOf(this, SchemaMismatchError.prototype);
  }
}

/**
 * A GML geometry could not be read.
 */
export class GeometryParseError extends NasExtractError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(NAS_ERROR_CODES.INVALID_GEOMETRY, message, details);
    this.name = 'GeometryParseError';
    Object.setPrototypeOf(this, GeometryParseError.prototype);
  }
}
