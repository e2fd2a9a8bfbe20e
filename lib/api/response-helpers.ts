/**
 * Consistent JSON response and error handling for route handlers.
 */

import type { ApiError, ApiErrorCode } from "./error-types";
import type { DomainError, DomainErrorKind } from "@/lib/services/result";

const HTTP_STATUS: Record<ApiErrorCode, number> = {
  bad_request: 400,
  not_found: 404,
  conflict: 409,
  validation_failed: 422,
  internal_error: 500,
};

const DOMAIN_ERROR_CODE: Record<DomainErrorKind, ApiErrorCode> = {
  not_found: "not_found",
  validation_failed: "validation_failed",
  conflict: "conflict",
};

export function json<T>(data: T, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: {
      "Content-Type": "application/json",
    },
  });
}

export function noContent(): Response {
  return new Response(null, { status: 204 });
}

export function errorResponse(
  error: ApiErrorCode,
  message: string,
  details?: Record<string, string[]>
): Response {
  const status = HTTP_STATUS[error];
  const body: ApiError = {
    error,
    message,
    ...(details && { details }),
  };
  return json(body, status);
}

export function badRequestError(
  message: string,
  details?: Record<string, string[]>
): Response {
  return errorResponse("bad_request", message, details);
}

export function validationError(
  message: string,
  details?: Record<string, string[]>
): Response {
  return errorResponse("validation_failed", message, details);
}

export function internalError(
  message = "An unexpected error occurred"
): Response {
  return errorResponse("internal_error", message);
}

/** Map a service-level failure onto its HTTP response. */
export function domainErrorResponse(error: DomainError): Response {
  return errorResponse(DOMAIN_ERROR_CODE[error.kind], error.message, error.details);
}
