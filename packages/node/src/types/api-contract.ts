/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { AfterwordService } from "../services/afterword-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    service: AfterwordService;

    /** The calling identity (set by auth middleware, or the actor header in unsecured mode) */
    auth: AuthContext;
  };
}
