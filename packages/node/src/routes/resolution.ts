/**
 * Resolution routes.
 *
 * POST /api/v1/resolution/clusters                        — Create a legacy cluster
 * GET  /api/v1/resolution/clusters/:clusterId             — Get a cluster
 * POST /api/v1/resolution/:principal/corpus               — Freeze the corpus
 * GET  /api/v1/resolution/:principal/corpus               — Get the corpus record
 * POST /api/v1/resolution/:principal/index                — Write one keyword
 * POST /api/v1/resolution/:principal/index/batch          — Write up to 50 keywords
 * POST /api/v1/resolution/:principal/resolutions          — Cache one query's ranking
 * POST /api/v1/resolution/:principal/resolutions/batch    — Cache up to 20 rankings
 * POST /api/v1/resolution/:principal/resolve              — Best citation
 * POST /api/v1/resolution/:principal/resolve/top-k        — Up to k citations
 * POST /api/v1/resolution/:principal/resolve/batch        — Best citation per query
 * GET  /api/v1/resolution/:principal/cluster              — The principal's cluster
 *
 * Writes need `resolution.index`; lookups are open.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateClusterSchema,
  CreateIndexBatchSchema,
  CreateIndexSchema,
  FreezeCorpusSchema,
  ResolveBatchSchema,
  ResolveSchema,
  ResolveTopKSchema,
  SubmitResolutionBatchSchema,
  SubmitResolutionSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { notFound } from "../types/error.js";

export function createResolutionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Clusters (before /:principal so "clusters" is not a principal) ──

  routes.post("/clusters", validateBody(CreateClusterSchema), (c) => {
    const body = c.get("validatedBody");
    const cluster = c.get("service").resolution.createCluster(
      c.get("auth").identity,
      body.clusterId,
      body.description,
    );
    return c.json({ data: cluster }, 201);
  });

  routes.get("/clusters/:clusterId", (c) => {
    const clusterId = c.req.param("clusterId");
    const cluster = c.get("service").resolution.getCluster(clusterId);
    if (cluster === undefined) {
      return c.json(notFound(`Cluster "${clusterId}" not found`), 404);
    }
    return c.json({ data: cluster });
  });

  // ─── Corpus ──────────────────────────────────────────────────────

  routes.post("/:principal/corpus", validateBody(FreezeCorpusSchema), (c) => {
    const body = c.get("validatedBody");
    const record = c.get("service").resolution.freezeCorpus(
      c.get("auth").identity,
      c.req.param("principal"),
      body.corpusDigest,
      body.storageUri,
      body.windowStart,
      body.windowEnd,
    );
    return c.json({ data: record }, 201);
  });

  routes.get("/:principal/corpus", (c) => {
    const principal = c.req.param("principal");
    const record = c.get("service").resolution.getCorpus(principal);
    if (record === undefined) {
      return c.json(notFound(`No corpus frozen for "${principal}"`), 404);
    }
    return c.json({ data: record });
  });

  // ─── Index & cache writes ────────────────────────────────────────

  routes.post("/:principal/index", validateBody(CreateIndexSchema), (c) => {
    const body = c.get("validatedBody");
    const entry = c.get("service").resolution.createIndex(
      c.get("auth").identity,
      c.req.param("principal"),
      body.keyword,
      body.citations,
      body.scores,
    );
    return c.json({ data: entry }, 201);
  });

  routes.post("/:principal/index/batch", validateBody(CreateIndexBatchSchema), (c) => {
    const entries = c.get("service").resolution.createIndexBatch(
      c.get("auth").identity,
      c.req.param("principal"),
      c.get("validatedBody").items,
    );
    return c.json({ data: entries }, 201);
  });

  routes.post("/:principal/resolutions", validateBody(SubmitResolutionSchema), (c) => {
    const body = c.get("validatedBody");
    const entry = c.get("service").resolution.submitResolution(
      c.get("auth").identity,
      c.req.param("principal"),
      body.query,
      body.citations,
      body.confidences,
    );
    return c.json({ data: entry }, 201);
  });

  routes.post("/:principal/resolutions/batch", validateBody(SubmitResolutionBatchSchema), (c) => {
    const entries = c.get("service").resolution.submitResolutionBatch(
      c.get("auth").identity,
      c.req.param("principal"),
      c.get("validatedBody").items,
    );
    return c.json({ data: entries }, 201);
  });

  // ─── Lookups ─────────────────────────────────────────────────────

  routes.post("/:principal/resolve", validateBody(ResolveSchema), (c) => {
    const body = c.get("validatedBody");
    const resolution = c.get("service").resolution.resolve(
      c.req.param("principal"),
      body.query,
      body.corpusDigest,
    );
    return c.json({ data: resolution });
  });

  routes.post("/:principal/resolve/top-k", validateBody(ResolveTopKSchema), (c) => {
    const body = c.get("validatedBody");
    const result = c.get("service").resolution.resolveTopK(
      c.req.param("principal"),
      body.query,
      body.corpusDigest,
      body.k,
    );
    return c.json({ data: result });
  });

  routes.post("/:principal/resolve/batch", validateBody(ResolveBatchSchema), (c) => {
    const body = c.get("validatedBody");
    const results = c.get("service").resolution.resolveBatch(
      c.req.param("principal"),
      body.queries,
      body.corpusDigest,
    );
    return c.json({ data: results });
  });

  routes.get("/:principal/cluster", (c) => {
    const principal = c.req.param("principal");
    const clusterId = c.get("service").resolution.getLegacyCluster(principal);
    return c.json({ data: { principal, clusterId: clusterId ?? null } });
  });

  return routes;
}
