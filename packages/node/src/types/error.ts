/**
 * Error envelopes.
 *
 *   { "error": { "code": "NOT_ACTIVE", "message": "...", "details": {...} } }
 *
 * Domain failures travel with the code the component threw; the HTTP
 * layer adds a handful of its own.
 */

import type { CoreErrorCode } from "@afterword/types";
import type { EventStoreErrorCode } from "@afterword/event-store";

/** Codes the HTTP layer raises itself. */
export type ApiErrorCode = "VALIDATION_ERROR" | "NOT_FOUND" | "UNAUTHORIZED" | "INTERNAL_ERROR";

/** Codes that originate below the HTTP layer. */
export type DomainErrorCode = CoreErrorCode | EventStoreErrorCode;

export type ErrorCode = ApiErrorCode | DomainErrorCode;

export interface ErrorEnvelope {
  readonly error: {
    readonly code: ErrorCode;
    readonly message: string;
    readonly details?: Record<string, unknown>;
  };
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details === undefined ? { error: { code, message } } : { error: { code, message, details } };
}

/** 404 body for a lookup that found nothing. */
export function notFound(message: string): ErrorEnvelope {
  return createErrorEnvelope("NOT_FOUND", message);
}
