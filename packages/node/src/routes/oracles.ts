/**
 * Oracle report routes.
 *
 * POST /api/v1/oracles/aggregations/:ref/reports — Report as the calling oracle
 * GET  /api/v1/oracles/aggregations/:ref         — Aggregation result
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { OracleReportSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { notFound } from "../types/error.js";

export function createOracleRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/aggregations/:ref/reports", validateBody(OracleReportSchema), (c) => {
    const result = c.get("service").oracles.submitOracleResult(
      c.req.param("ref"),
      c.get("auth").identity,
      c.get("validatedBody"),
    );
    return c.json({ data: result }, 201);
  });

  routes.get("/aggregations/:ref", async (c) => {
    const ref = c.req.param("ref");
    const result = await c.get("service").oracles.getResult(ref);
    if (result === undefined) {
      return c.json(notFound(`Unknown aggregation "${ref}"`), 404);
    }
    return c.json({ data: result });
  });

  return routes;
}
