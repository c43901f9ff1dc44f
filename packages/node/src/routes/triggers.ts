/**
 * Trigger routes.
 *
 * POST /api/v1/triggers/:principal/deadman                    — Configure deadman (owner)
 * POST /api/v1/triggers/:principal/quorum                     — Configure quorum (owner)
 * POST /api/v1/triggers/:principal/oracle-consensus           — Configure oracle consensus (owner)
 * POST /api/v1/triggers/:principal/check-in                   — Deadman check-in (owner)
 * POST /api/v1/triggers/:principal/deadman/execute            — Fire an elapsed deadman
 * POST /api/v1/triggers/:principal/signatures                 — Sign as the calling identity
 * POST /api/v1/triggers/:principal/oracle-consensus/complete  — Fire on a finalized verdict
 * GET  /api/v1/triggers/:principal                            — Trigger state
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ConfigureDeadmanSchema,
  ConfigureOracleConsensusSchema,
  ConfigureQuorumSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { assertOwner } from "../middleware/auth.js";

export function createTriggerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Configuration (owner) ───────────────────────────────────────

  routes.post("/:principal/deadman", validateBody(ConfigureDeadmanSchema), (c) => {
    const principal = c.req.param("principal");
    assertOwner(c.get("auth"), principal);

    const config = c.get("service").triggers.configureDeadman(principal, c.get("validatedBody").interval);
    return c.json({ data: config }, 201);
  });

  routes.post("/:principal/quorum", validateBody(ConfigureQuorumSchema), (c) => {
    const principal = c.req.param("principal");
    assertOwner(c.get("auth"), principal);

    const body = c.get("validatedBody");
    const config = c.get("service").triggers.configureQuorum(principal, body.signers, body.required);
    return c.json({ data: config }, 201);
  });

  routes.post(
    "/:principal/oracle-consensus",
    validateBody(ConfigureOracleConsensusSchema),
    async (c) => {
      const principal = c.req.param("principal");
      assertOwner(c.get("auth"), principal);

      const config = await c.get("service").triggers.configureOracleConsensus(
        principal,
        c.get("validatedBody"),
      );
      return c.json({ data: config }, 201);
    },
  );

  routes.post("/:principal/check-in", (c) => {
    const principal = c.req.param("principal");
    assertOwner(c.get("auth"), principal);

    const triggers = c.get("service").triggers;
    triggers.checkIn(principal);
    return c.json({ data: triggers.getState(principal) });
  });

  // ─── Firing ──────────────────────────────────────────────────────

  routes.post("/:principal/deadman/execute", (c) => {
    const principal = c.req.param("principal");
    const triggers = c.get("service").triggers;
    triggers.executeDeadman(principal);
    return c.json({ data: triggers.getState(principal) });
  });

  routes.post("/:principal/signatures", (c) => {
    const principal = c.req.param("principal");
    const triggers = c.get("service").triggers;
    triggers.submitSignature(principal, c.get("auth").identity);
    return c.json({ data: triggers.getState(principal) });
  });

  routes.post("/:principal/oracle-consensus/complete", async (c) => {
    const principal = c.req.param("principal");
    const triggers = c.get("service").triggers;
    await triggers.completeOracleVerification(principal);
    return c.json({ data: triggers.getState(principal) });
  });

  // ─── Queries ─────────────────────────────────────────────────────

  routes.get("/:principal", (c) => {
    const principal = c.req.param("principal");
    return c.json({ data: c.get("service").triggers.getState(principal) });
  });

  return routes;
}
