/**
 * Caller identity middleware.
 *
 * Secured mode: the X-Api-Key header is looked up in the configured key
 * registry; a missing or unknown key is a 401.
 *
 * Unsecured mode (tests, local development): the caller is whoever the
 * X-Actor-Id header names, or "anonymous".
 *
 * Either way the result is only an identity. Whether that identity may
 * perform an operation is decided by the domain capability table.
 */

import type { MiddlewareHandler } from "hono";
import type { Principal } from "@afterword/types";
import { PreconditionViolation } from "@afterword/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const ACTOR_HEADER = "X-Actor-Id";
export const ANONYMOUS_IDENTITY = "anonymous";

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Invalid API key"),
        401,
      );
    }

    c.set("auth", { type: "api-key", identity: record.identity });
    await next();
  };
}

export function actorHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const actor = c.req.header(ACTOR_HEADER)?.trim();
    c.set("auth", {
      type: "header",
      identity: actor === undefined || actor === "" ? ANONYMOUS_IDENTITY : actor,
    });
    await next();
  };
}

/**
 * Owner-only operations: the caller must be the principal itself.
 *
 * @throws PreconditionViolation UNAUTHORIZED
 */
export function assertOwner(auth: AuthContext, principal: Principal): void {
  if (auth.identity !== principal) {
    throw new PreconditionViolation(
      "UNAUTHORIZED",
      `"${auth.identity}" may not act on behalf of "${principal}"`,
    );
  }
}
