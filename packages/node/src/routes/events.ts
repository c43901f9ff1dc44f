/**
 * Audit event routes.
 *
 * GET /api/v1/events                      — All events (cursor pagination, ?source=)
 * GET /api/v1/events/verify               — Verify the hash chain
 * GET /api/v1/events/:source/:principal   — One component's events for a principal
 */

import { Hono } from "hono";
import { isEventSource } from "@afterword/types";
import { streamIdFor } from "@afterword/event-store";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const query = queryResult.data;
    const events = c.get("service").eventStore.readAll({
      afterPosition: query.afterPosition,
      source: query.source,
    });

    return c.json(
      paginate(events, { cursor: query.cursor, limit: query.limit }, (e) => e.globalPosition, "globalPosition"),
    );
  });

  routes.get("/verify", (c) => {
    const result = c.get("service").verifyAuditLog();
    return c.json({ data: result });
  });

  routes.get("/:source/:principal", (c) => {
    const source = c.req.param("source");
    if (!isEventSource(source)) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", `Unknown event source "${source}"`), 400);
    }

    const queryResult = ListStreamEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const query = queryResult.data;
    const events = c.get("service").eventStore.read(streamIdFor(source, c.req.param("principal")), {
      afterVersion: query.afterVersion,
    });

    return c.json(
      paginate(events, { cursor: query.cursor, limit: query.limit }, (e) => e.version, "version"),
    );
  });

  return routes;
}
