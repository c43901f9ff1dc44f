/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Separated from
 * main.ts so tests can drive the app without starting a server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { AfterwordService } from "./services/afterword-service.js";
import type { AfterwordServiceConfig } from "./services/afterword-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { actorHeaderMiddleware, authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createIntentRoutes } from "./routes/intents.js";
import { createTriggerRoutes } from "./routes/triggers.js";
import { createOracleRoutes } from "./routes/oracles.js";
import { createResolutionRoutes } from "./routes/resolution.js";
import { createExecutionRoutes } from "./routes/execution.js";
import { createSunsetRoutes } from "./routes/sunset.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Used to build the service when `service` is not given */
  readonly serviceConfig?: AfterwordServiceConfig;
  /** A prebuilt service, e.g. one sharing a test clock */
  readonly service?: AfterwordService;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Receives unhandled errors */
  readonly logger?: Logger;
  /** When provided, callers must present an API key */
  readonly auth?: AuthConfig;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: AfterwordService;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const service = options.service ?? new AfterwordService(
    options.serviceConfig ?? { admin: "admin" },
  );

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger));

  // ─── Health Routes (no auth) ────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): X-Actor-Id header names the caller
    app.use("/api/*", actorHeaderMiddleware());
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/intents", createIntentRoutes());
  app.route("/api/v1/triggers", createTriggerRoutes());
  app.route("/api/v1/oracles", createOracleRoutes());
  app.route("/api/v1/resolution", createResolutionRoutes());
  app.route("/api/v1/execution", createExecutionRoutes());
  app.route("/api/v1/sunset", createSunsetRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
