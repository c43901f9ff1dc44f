/**
 * Intent ledger routes.
 *
 * POST /api/v1/intents/:principal                     — Capture (or re-capture)
 * GET  /api/v1/intents/:principal                     — Get the intent record
 * POST /api/v1/intents/:principal/goals               — Add a goal
 * POST /api/v1/intents/:principal/versions            — Sign a version digest
 * GET  /api/v1/intents/:principal/versions/:digest    — Is a version signed?
 * POST /api/v1/intents/:principal/revoke              — Revoke
 *
 * Every write is owner-only: the caller must be the principal.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddGoalSchema, CaptureIntentSchema, SignVersionSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { assertOwner } from "../middleware/auth.js";
import { notFound } from "../types/error.js";

export function createIntentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/:principal", validateBody(CaptureIntentSchema), (c) => {
    const principal = c.req.param("principal");
    assertOwner(c.get("auth"), principal);

    const record = c.get("service").intents.capture(principal, c.get("validatedBody"));
    return c.json({ data: record }, 201);
  });

  routes.get("/:principal", (c) => {
    const principal = c.req.param("principal");
    const record = c.get("service").intents.getIntent(principal);
    if (record === undefined) {
      return c.json(notFound(`No intent captured for "${principal}"`), 404);
    }
    return c.json({ data: record });
  });

  routes.post("/:principal/goals", validateBody(AddGoalSchema), (c) => {
    const principal = c.req.param("principal");
    assertOwner(c.get("auth"), principal);

    const body = c.get("validatedBody");
    const goal = c.get("service").intents.addGoal(
      principal,
      body.description,
      body.constraintDigest,
      body.priority,
    );
    return c.json({ data: goal }, 201);
  });

  routes.post("/:principal/versions", validateBody(SignVersionSchema), (c) => {
    const principal = c.req.param("principal");
    assertOwner(c.get("auth"), principal);

    const { versionDigest } = c.get("validatedBody");
    c.get("service").intents.signVersion(principal, versionDigest);
    return c.json({ data: { principal, versionDigest, signed: true } });
  });

  routes.get("/:principal/versions/:digest", (c) => {
    const principal = c.req.param("principal");
    const versionDigest = c.req.param("digest");
    const signed = c.get("service").intents.isVersionSigned(principal, versionDigest);
    return c.json({ data: { principal, versionDigest, signed } });
  });

  routes.post("/:principal/revoke", (c) => {
    const principal = c.req.param("principal");
    assertOwner(c.get("auth"), principal);

    const intents = c.get("service").intents;
    intents.revoke(principal);
    return c.json({ data: intents.getIntent(principal) });
  });

  return routes;
}
