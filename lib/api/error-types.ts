/**
 * API error categories for consistent HTTP status mapping.
 */

export type ApiErrorCode =
  | "bad_request"
  | "validation_failed"
  | "not_found"
  | "conflict"
  | "internal_error";

export interface ApiError {
  error: ApiErrorCode;
  message: string;
  details?: Record<string, string[]>;
}
