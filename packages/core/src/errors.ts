/**
 * Error codes and custom error classes for Custodian
 */

/**
 * All error codes used in the Custodian system
 */
export type ErrorCode =
  // Per-file pipeline errors (recoverable)
  | 'SOURCE_NOT_FOUND'
  | 'NOT_FOUND'
  | 'CLASSIFICATION_FAILED'
  | 'COPY_FAILED'
  | 'HASH_OR_PERSIST_FAILED'

  // Input errors
  | 'INVALID_CASE_NUMBER'
  | 'INVALID_INTAKE'
  | 'CONFIGURATION_ERROR'

  // Collaborator errors
  | 'REPORT_FAILED'
  | 'UPLOAD_FAILED'

  // Resource provisioning errors (unrecoverable)
  | 'CASE_LAYOUT_MISSING'
  | 'AUDIT_LOG_UNAVAILABLE';

/**
 * Codes the caller may recover from by retrying with different input.
 * Anything else means no audit trail can be written for the case.
 */
const UNRECOVERABLE_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  'CASE_LAYOUT_MISSING',
  'AUDIT_LOG_UNAVAILABLE',
]);

/**
 * Custom error class for Custodian errors
 */
export class CustodianError extends Error {
  /** Error code */
  readonly code: ErrorCode;

  /** Whether the caller can carry on with the session */
  readonly recoverable: boolean;

  /** Additional error details */
  readonly details?: Record<string, unknown>;

  /** Original error that caused this error */
  readonly cause?: Error;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      details?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = 'CustodianError';
    this.code = code;
    this.recoverable = !UNRECOVERABLE_CODES.has(code);
    this.details = options?.details;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CustodianError);
    }
  }

  /**
   * Create a JSON representation of the error
   */
  toJSON(): {
    code: ErrorCode;
    message: string;
    recoverable: boolean;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      details: this.details,
    };
  }
}

/**
 * Error factory functions for common error types
 */
export const Errors = {
  sourceNotFound: (sourcePath: string) =>
    new CustodianError('SOURCE_NOT_FOUND', `File not found: ${sourcePath}`, {
      details: { sourcePath },
    }),

  notFound: (path: string) =>
    new CustodianError('NOT_FOUND', `Path does not exist: ${path}`, {
      details: { path },
    }),

  classificationFailed: (path: string, cause?: Error) =>
    new CustodianError('CLASSIFICATION_FAILED', `Could not get file info for: ${path}`, {
      details: { path },
      cause,
    }),

  copyFailed: (sourcePath: string, destinationPath: string, cause?: Error) =>
    new CustodianError(
      'COPY_FAILED',
      `Failed to copy ${sourcePath} -> ${destinationPath}${cause ? `: ${cause.message}` : ''}`,
      {
        details: { sourcePath, destinationPath },
        cause,
      }
    ),

  hashOrPersistFailed: (storedPath: string, cause?: Error) =>
    new CustodianError(
      'HASH_OR_PERSIST_FAILED',
      `Failed to hash or persist digest for ${storedPath}${cause ? `: ${cause.message}` : ''}`,
      {
        details: { storedPath },
        cause,
      }
    ),

  invalidCaseNumber: (input: string, reason: string) =>
    new CustodianError('INVALID_CASE_NUMBER', `Invalid case number "${input}": ${reason}`, {
      details: { input },
    }),

  invalidIntake: (message: string, details?: Record<string, unknown>) =>
    new CustodianError('INVALID_INTAKE', message, { details }),

  configurationError: (message: string, details?: Record<string, unknown>) =>
    new CustodianError('CONFIGURATION_ERROR', message, { details }),

  caseLayoutMissing: (path: string, cause?: Error) =>
    new CustodianError('CASE_LAYOUT_MISSING', `Case directory is missing or not writable: ${path}`, {
      details: { path },
      cause,
    }),

  auditLogUnavailable: (transport: string, cause?: Error) =>
    new CustodianError(
      'AUDIT_LOG_UNAVAILABLE',
      `Audit log transport "${transport}" failed${cause ? `: ${cause.message}` : ''}`,
      {
        details: { transport },
        cause,
      }
    ),

  reportFailed: (message: string, cause?: Error) =>
    new CustodianError('REPORT_FAILED', message, { cause }),

  uploadFailed: (key: string, cause?: Error) =>
    new CustodianError('UPLOAD_FAILED', `Failed to upload ${key}${cause ? `: ${cause.message}` : ''}`, {
      details: { key },
      cause,
    }),
};

/**
 * Type guard to check if an error is a CustodianError
 */
export function isCustodianError(error: unknown): error is CustodianError {
  return error instanceof CustodianError;
}

/**
 * Convert any thrown value to an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Convert any error to a CustodianError, using `fallback` for foreign errors
 */
export function toCustodianError(
  error: unknown,
  fallback: (cause: Error) => CustodianError
): CustodianError {
  if (error instanceof CustodianError) {
    return error;
  }
  return fallback(toError(error));
}
