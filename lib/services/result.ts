/**
 * Service result values.
 * Domain failures (not found, validation, conflict) are returned, never thrown;
 * unexpected storage errors still propagate as exceptions.
 */

export type DomainErrorKind = "not_found" | "validation_failed" | "conflict";

export interface DomainError {
  kind: DomainErrorKind;
  message: string;
  details?: Record<string, string[]>;
}

export interface ServiceSuccess<T> {
  success: true;
  data: T;
}

export interface ServiceFailure {
  success: false;
  error: DomainError;
}

export type ServiceResult<T> = ServiceSuccess<T> | ServiceFailure;

export function ok<T>(data: T): ServiceSuccess<T> {
  return { success: true, data };
}

export function notFound(message: string): ServiceFailure {
  return { success: false, error: { kind: "not_found", message } };
}

/** `field` keys the message under details so clients can point at the input. */
export function validationFailed(message: string, field?: string): ServiceFailure {
  return {
    success: false,
    error: {
      kind: "validation_failed",
      message,
      ...(field !== undefined && { details: { [field]: [message] } }),
    },
  };
}

export function conflict(message: string): ServiceFailure {
  return { success: false, error: { kind: "conflict", message } };
}
