import type { ErrorCode } from '@delaylens/shared';

/**
 * Base application error with a typed error code and HTTP status.
 * All known application errors should extend this class.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    statusCode: number,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed', details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', 400, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * An input document could not be loaded: unreadable file, invalid JSON, or a structure
 * that is not a schedule export. Fatal for the run; no partial analysis is attempted.
 */
export class ScheduleLoadError extends AppError {
  readonly source: string;
  readonly reason: string;

  constructor(source: string, reason: string) {
    super('MALFORMED_SCHEDULE', 400, `Failed to load ${source}: ${reason}`, { source, reason });
    this.name = 'ScheduleLoadError';
    this.source = source;
    this.reason = reason;
  }
}
