/**
 * Typed error model.
 *
 * Expected failures (bad input, missing records) are returned as TypedError
 * values rather than thrown, so callers can branch on `code` and render
 * every message. Only unexpected faults travel as exceptions.
 */

/** Typed suggested fix a client can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "VALIDATION.REQUIRED_FIELD"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

/**
 * A validation failure tied to one input field. `code` is the suffix after
 * "VALIDATION." (e.g. "REQUIRED_FIELD", "DUPLICATE_EMAIL").
 */
export function fieldError(code: string, field: string, message: string): TypedError {
  return createTypedError({
    code: `VALIDATION.${code}`,
    message,
    retryable: false,
    details: { field },
  });
}

export function notFoundError(resourceType: string, resourceId: string | number): TypedError {
  return createTypedError({
    code: 'ACCOUNT.NOT_FOUND',
    message: `${resourceType} not found`,
    retryable: false,
    details: { resourceType, resourceId },
  });
}

export function routeNotFoundError(path: string): TypedError {
  return createTypedError({
    code: 'SYSTEM.ROUTE_NOT_FOUND',
    message: 'Page not found',
    retryable: false,
    details: { path },
  });
}

export function internalError(message = 'Internal server error'): TypedError {
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    retryable: false,
  });
}

/** Map a typed error to the HTTP status that carries it. */
export function httpStatusFor(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  return 500;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
