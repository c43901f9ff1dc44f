/**
 * Global error handler.
 *
 * Core and event-store errors carry a `code`; the code picks the HTTP
 * status and is returned unchanged in the envelope. Anything else is a
 * 500 with a generic message, logged with its stack.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { Logger } from "pino";
import { isCoreError } from "@afterword/types";
import { EventStoreError } from "@afterword/event-store";
import type { AppEnv } from "../types/api-contract.js";
import type { DomainErrorCode } from "../types/error.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type DomainStatus = 400 | 403 | 404 | 409 | 422 | 502;

const STATUS_MAP: Readonly<Record<DomainErrorCode, DomainStatus>> = {
  // Malformed input
  INVALID_INPUT: 400,
  LIMIT_EXCEEDED: 400,
  INVALID_STREAM_ID: 400,
  INVALID_POSITION: 400,
  UNKNOWN_EVENT_TYPE: 400,
  INVALID_PAYLOAD: 400,

  // Caller may not do this
  UNAUTHORIZED: 403,
  NOT_SIGNER: 403,
  NOT_ORACLE: 403,

  // Missing records
  NOT_CAPTURED: 404,
  NOT_CONFIGURED: 404,
  UNKNOWN_AGGREGATION: 404,
  CLUSTER_NOT_FOUND: 404,

  // Intent / trigger state
  ALREADY_REVOKED: 409,
  ALREADY_TRIGGERED: 409,
  WRONG_MODE: 409,
  NOT_ELAPSED: 409,
  ALREADY_SIGNED: 409,
  ALREADY_REPORTED: 409,
  ORACLE_NOT_FINALIZED: 409,

  // Resolution state
  CORPUS_NOT_FROZEN: 409,
  CORPUS_ALREADY_FROZEN: 409,
  CLUSTER_EXISTS: 409,

  // Execution state
  NOT_TRIGGERED: 409,
  ALREADY_ACTIVATED: 409,
  NOT_ACTIVATED: 409,
  NOT_ACTIVE: 409,
  SUNSET_NOT_DUE: 409,
  ALREADY_SUNSET: 409,
  NOT_SUNSET: 409,
  RECOVERY_NOT_DUE: 409,
  OPERATION_IN_PROGRESS: 409,

  // Sunset protocol
  SUNSET_NOT_INITIATED: 409,
  STEP_OUT_OF_ORDER: 409,
  STEP_ALREADY_DONE: 409,

  // Refused on the merits
  PROHIBITED_ACTION: 422,
  ACTION_TOO_LONG: 422,
  INSUFFICIENT_TREASURY: 422,
  EMPTY_TREASURY: 422,
  CORPUS_DIGEST_MISMATCH: 422,
  ORACLE_REJECTED: 422,

  // Downstream
  TRANSFER_FAILED: 502,
};

function isDomainErrorCode(code: string): code is DomainErrorCode {
  return Object.hasOwn(STATUS_MAP, code);
}

export function statusForCode(code: string): DomainStatus | undefined {
  return isDomainErrorCode(code) ? STATUS_MAP[code] : undefined;
}

function codeOf(err: Error): DomainErrorCode | undefined {
  if (isCoreError(err) || err instanceof EventStoreError) return err.code;
  return undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the handler registered with Hono's `onError`.
 */
export function createErrorHandler(
  logger?: Logger,
): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    const code = codeOf(err);
    if (code === undefined) {
      logger?.error({ err, requestId: c.get("requestId") }, "unhandled error");
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    return c.json(createErrorEnvelope(code, err.message), STATUS_MAP[code]);
  };
}
