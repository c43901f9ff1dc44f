/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if the server is running)
 * GET /ready  — Readiness probe: service wired and audit chain intact
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AfterwordService } from "../services/afterword-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: AfterwordService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.verifyAuditLog();
    const auditLog: SubsystemStatus = integrity.valid
      ? { status: "ok" }
      : { status: "down", detail: `errors=${integrity.errors.length}, lastVerified=${integrity.lastVerifiedPosition}` };
    const ready = service.isReady() && auditLog.status === "ok";

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        subsystems: { auditLog },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
