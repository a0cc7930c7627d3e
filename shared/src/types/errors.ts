/**
 * Machine-readable error codes used across all API error responses.
 */
export type ErrorCode =
  | 'ROUTE_NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'MALFORMED_SCHEDULE'
  | 'INTERNAL_ERROR';
