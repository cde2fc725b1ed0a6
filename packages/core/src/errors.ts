/**
 * @module errors
 * Structured error types and error code registry for facility resolution
 * and configuration loading.
 *
 * Every error here is a validation failure the caller can recover from:
 * one bad facility in one log line never aborts the process.
 */

// =====================================================================
// Error Code Union
// =====================================================================

/** All known error codes. */
export type FacilityErrorCode =
  | 'INVALID_FACILITY_CODE'
  | 'INVALID_FACILITY_LABEL'
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_PARSE_FAILED'
  | 'CONFIG_INVALID';

/** Broad classification of error origin. */
export type ErrorCategory = 'validation' | 'configuration';

/** Machine-readable error payload. */
export interface StructuredError {
  code: FacilityErrorCode;
  category: ErrorCategory;
  message: string;
  details: Record<string, unknown>;
  suggestedActions: string[];
}

// =====================================================================
// Error Metadata Registry
// =====================================================================

interface ErrorMetadataEntry {
  category: ErrorCategory;
  suggestedActions: string[];
}

export const ERROR_METADATA: ReadonlyMap<FacilityErrorCode, ErrorMetadataEntry> = new Map<FacilityErrorCode, ErrorMetadataEntry>([
  ['INVALID_FACILITY_CODE', {
    category: 'validation',
    suggestedActions: ['Flag the record as malformed', 'Check the PRI value of the inbound message'],
  }],
  ['INVALID_FACILITY_LABEL', {
    category: 'validation',
    suggestedActions: ['Use an uppercase label such as KERN or LOCAL0', 'Run `syslog-facility list` for valid labels'],
  }],
  ['CONFIG_NOT_FOUND', {
    category: 'configuration',
    suggestedActions: ['Create facility.yaml in the working directory', 'Pass --config <path>'],
  }],
  ['CONFIG_PARSE_FAILED', {
    category: 'configuration',
    suggestedActions: ['Fix the YAML syntax', 'Make sure the document is a mapping'],
  }],
  ['CONFIG_INVALID', {
    category: 'configuration',
    suggestedActions: ['Fix the reported fields', 'Run `syslog-facility list` for valid facilities'],
  }],
]);

/**
 * Build a {@link StructuredError} from an error code, filling category and
 * suggested actions from {@link ERROR_METADATA}.
 */
export function createStructuredError(
  code: FacilityErrorCode,
  message: string,
  details: Record<string, unknown> = {},
): StructuredError {
  const metadata = ERROR_METADATA.get(code);
  return {
    code,
    category: metadata?.category ?? 'validation',
    message,
    details,
    suggestedActions: metadata ? [...metadata.suggestedActions] : [],
  };
}

// =====================================================================
// Error Classes
// =====================================================================

/**
 * Error subclass wrapping a StructuredError for throw/catch patterns.
 *
 * Use `toJSON()` when the error has to cross a JSON boundary.
 */
export class FacilityError extends Error {
  public readonly structuredError: StructuredError;

  constructor(code: FacilityErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'FacilityError';
    this.structuredError = createStructuredError(code, message, details);
  }

  toJSON(): StructuredError {
    return this.structuredError;
  }

  get code(): FacilityErrorCode {
    return this.structuredError.code;
  }

  get category(): ErrorCategory {
    return this.structuredError.category;
  }

  get details(): Record<string, unknown> {
    return this.structuredError.details;
  }
}

/**
 * Numeric facility code outside 0–23. `value` is the text as given when
 * the code arrived as a string that is not a canonical safe integer.
 */
export class InvalidFacilityCodeError extends FacilityError {
  readonly value: number | string;

  constructor(value: number | string) {
    super('INVALID_FACILITY_CODE', `Invalid facility '${value}'`, { value });
    this.name = 'InvalidFacilityCodeError';
    this.value = value;
  }
}

/** Non-empty label that matches no facility. */
export class InvalidFacilityLabelError extends FacilityError {
  readonly value: string;

  constructor(value: string) {
    super('INVALID_FACILITY_LABEL', `Invalid facility '${value}'`, { value });
    this.name = 'InvalidFacilityLabelError';
    this.value = value;
  }
}
