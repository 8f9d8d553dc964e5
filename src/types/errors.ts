/**
 * Centralized error type definitions for the SAR ingest pipeline
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  CONFIG_ERROR = 'CONFIG_ERROR',
  AUTHENTICATION_ERROR = 'AUTHENTICATION_ERROR',
  SEARCH_FAILURE = 'SEARCH_FAILURE',
  PARSE_ERROR = 'PARSE_ERROR',
  TRANSFER_ERROR = 'TRANSFER_ERROR',
  EXTRACTION_FAILURE = 'EXTRACTION_FAILURE',
  SCHEDULER_TRANSIENT_ERROR = 'SCHEDULER_TRANSIENT_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Missing or invalid configuration or credentials. Fatal, raised before any I/O.
 */
export class ConfigError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIG_ERROR, true, { issues, ...context });
    this.issues = issues;
  }
}

/**
 * Credentials were present but the provider refused them
 */
export class AuthenticationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.AUTHENTICATION_ERROR, true, context);
  }
}

/**
 * Provider query error. Adapters return it alongside an empty result set instead of throwing.
 */
export class SearchFailure extends AppError {
  public readonly provider: string;

  constructor(provider: string, message: string, context?: Record<string, unknown>) {
    super(`Search failed (${provider}): ${message}`, ErrorCode.SEARCH_FAILURE, true, { provider, ...context });
    this.provider = provider;
  }
}

/**
 * Malformed provider record field. Used as a diagnostic; the record is kept with sentinel values.
 */
export class RecordParseError extends AppError {
  public readonly field: string;

  constructor(field: string, message: string, context?: Record<string, unknown>) {
    super(`${field}: ${message}`, ErrorCode.PARSE_ERROR, true, { field, ...context });
    this.field = field;
  }
}

/**
 * Network or authorization failure while transferring an archive
 */
export class TransferError extends AppError {
  public readonly status?: number;

  constructor(message: string, context?: Record<string, unknown> & { status?: number }) {
    super(message, ErrorCode.TRANSFER_ERROR, true, context);
    this.status = context?.status;
  }
}

export type ExtractionFailureReason = 'NoProductRoot' | 'StructureInvalid' | 'ArchiveUnreadable';

/**
 * Archive or unpacked product is malformed
 */
export class ExtractionFailure extends AppError {
  public readonly reason: ExtractionFailureReason;

  constructor(reason: ExtractionFailureReason, message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.EXTRACTION_FAILURE, true, { reason, ...context });
    this.reason = reason;
  }
}

/**
 * Any uncaught error from one scheduled run. Logged by the scheduler, never rethrown.
 */
export class SchedulerTransientError extends AppError {
  public readonly iteration: number;

  constructor(iteration: number, cause: unknown) {
    super(
      `Scheduled run ${iteration} failed: ${getErrorMessage(cause)}`,
      ErrorCode.SCHEDULER_TRANSIENT_ERROR,
      true,
      { iteration }
    );
    this.iteration = iteration;
    this.cause = cause;
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Extract a readable message from anything that was thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_ERROR, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_ERROR, false, { original: getErrorMessage(error) });
}
