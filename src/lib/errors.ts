/** Error categories for plangraph */
export const ErrorCode = {
  // Build errors
  SCHEMA_VIOLATION: 'SCHEMA_VIOLATION',
  MALFORMED_DOCUMENT: 'MALFORMED_DOCUMENT',
  IO_FAILURE: 'IO_FAILURE',

  // Operation errors
  INVALID_OPTIONS: 'INVALID_OPTIONS',
  UNKNOWN_FORMAT: 'UNKNOWN_FORMAT',

  // Config errors
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Codes that abort a build; no plan or graph is produced */
export const BUILD_ERROR_CODES: readonly ErrorCode[] = [
  ErrorCode.SCHEMA_VIOLATION,
  ErrorCode.MALFORMED_DOCUMENT,
  ErrorCode.IO_FAILURE,
];

/** plangraph error with code, optional remediation hint and originating cause */
export class PlanGraphError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'PlanGraphError';
  }

  get isBuildFailure(): boolean {
    return BUILD_ERROR_CODES.includes(this.code);
  }
}
