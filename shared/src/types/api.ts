import type { ErrorCode } from './errors.js';

/**
 * Error shape returned by every failing endpoint.
 */
export interface ApiError {
  /** Machine-readable error code */
  code: ErrorCode;
  /** Human-readable error description */
  message: string;
  /** Extra context, e.g. which input document failed to load */
  details?: Record<string, unknown>;
}

/**
 * Error response wrapper. All error responses from the API follow this shape.
 */
export interface ApiErrorResponse {
  error: ApiError;
}
