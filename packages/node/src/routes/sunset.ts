/**
 * Sunset routes.
 *
 * POST /api/v1/sunset/:principal/initiate   — Start the protocol after the term
 * POST /api/v1/sunset/:principal/emergency  — Permissionless start
 * POST /api/v1/sunset/:principal/archives   — Record archives
 * POST /api/v1/sunset/:principal/ip         — Move IP to a post-sunset license
 * POST /api/v1/sunset/:principal/cluster    — Place the legacy in a cluster
 * POST /api/v1/sunset/:principal/complete   — Finish
 * GET  /api/v1/sunset/:principal            — Protocol state and current step
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ArchiveAssetsSchema, ClusterLegacySchema, TransitionIPSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { notFound } from "../types/error.js";

export function createSunsetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/:principal/initiate", (c) => {
    const state = c.get("service").sunset.initiateSunset(c.get("auth").identity, c.req.param("principal"));
    return c.json({ data: state }, 201);
  });

  routes.post("/:principal/emergency", (c) => {
    const state = c.get("service").sunset.emergencySunset(c.req.param("principal"));
    return c.json({ data: state }, 201);
  });

  routes.post("/:principal/archives", validateBody(ArchiveAssetsSchema), (c) => {
    const state = c.get("service").sunset.archiveAssets(
      c.get("auth").identity,
      c.req.param("principal"),
      c.get("validatedBody").archives,
    );
    return c.json({ data: state });
  });

  routes.post("/:principal/ip", validateBody(TransitionIPSchema), (c) => {
    const state = c.get("service").sunset.transitionIP(
      c.get("auth").identity,
      c.req.param("principal"),
      c.get("validatedBody").license,
    );
    return c.json({ data: state });
  });

  routes.post("/:principal/cluster", validateBody(ClusterLegacySchema), (c) => {
    const state = c.get("service").sunset.clusterLegacy(
      c.get("auth").identity,
      c.req.param("principal"),
      c.get("validatedBody").clusterId,
    );
    return c.json({ data: state });
  });

  routes.post("/:principal/complete", (c) => {
    const state = c.get("service").sunset.completeSunset(c.get("auth").identity, c.req.param("principal"));
    return c.json({ data: state });
  });

  routes.get("/:principal", (c) => {
    const principal = c.req.param("principal");
    const sunset = c.get("service").sunset;
    const state = sunset.getSunsetState(principal);
    if (state === undefined) {
      return c.json(notFound(`Sunset for "${principal}" has not been initiated`), 404);
    }
    return c.json({ data: { ...state, step: sunset.getStep(principal) } });
  });

  return routes;
}
