/**
 * Execution routes.
 *
 * POST /api/v1/execution/:principal/activate          — Activate a triggered intent
 * GET  /api/v1/execution/:principal                   — Engine state
 * POST /api/v1/execution/:principal/actions           — Propose an action
 * POST /api/v1/execution/:principal/fund              — Fund a project
 * POST /api/v1/execution/:principal/distribute        — Distribute revenue
 * POST /api/v1/execution/:principal/licenses          — Issue a license
 * GET  /api/v1/execution/:principal/licenses          — Issued licenses
 * POST /api/v1/execution/:principal/deposits          — Credit the treasury
 * POST /api/v1/execution/:principal/sunset            — Enter sunset after the term
 * POST /api/v1/execution/:principal/emergency-sunset  — Same, permissionless
 * POST /api/v1/execution/:principal/recover           — Recover a sunset treasury
 * GET  /api/v1/execution/:principal/log               — Execution log
 *
 * Gated decisions answer 201 when something was recorded and 200 with
 * `outcome: "inaction"` when confidence fell short.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  DepositSchema,
  IssueLicenseSchema,
  PayoutSchema,
  ProposeActionSchema,
  RecoverFundsSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { decisionStatus, toExecutionStateView } from "../types/views.js";

export function createExecutionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Lifecycle ───────────────────────────────────────────────────

  routes.post("/:principal/activate", (c) => {
    const principal = c.req.param("principal");
    const execution = c.get("service").execution;
    execution.activate(c.get("auth").identity, principal);
    return c.json({ data: toExecutionStateView(execution.getState(principal)) });
  });

  routes.get("/:principal", (c) => {
    const principal = c.req.param("principal");
    const execution = c.get("service").execution;
    return c.json({
      data: {
        ...toExecutionStateView(execution.getState(principal)),
        isActive: execution.isActive(principal),
        isSunsetDue: execution.isSunsetDue(principal),
        operationInProgress: execution.isOperationInProgress(principal),
      },
    });
  });

  routes.post("/:principal/sunset", (c) => {
    const principal = c.req.param("principal");
    const execution = c.get("service").execution;
    execution.activateSunset(c.get("auth").identity, principal);
    return c.json({ data: toExecutionStateView(execution.getState(principal)) });
  });

  routes.post("/:principal/emergency-sunset", (c) => {
    const principal = c.req.param("principal");
    const execution = c.get("service").execution;
    execution.emergencySunset(principal);
    return c.json({ data: toExecutionStateView(execution.getState(principal)) });
  });

  // ─── Gated decisions ─────────────────────────────────────────────

  routes.post("/:principal/actions", validateBody(ProposeActionSchema), (c) => {
    const body = c.get("validatedBody");
    const decision = c.get("service").execution.proposeAction(
      c.get("auth").identity,
      c.req.param("principal"),
      body.action,
      body.query,
      body.corpusDigest,
    );
    return c.json({ data: decision }, decisionStatus(decision));
  });

  routes.post("/:principal/fund", validateBody(PayoutSchema), async (c) => {
    const body = c.get("validatedBody");
    const decision = await c.get("service").execution.fundProject(
      c.get("auth").identity,
      c.req.param("principal"),
      body.recipient,
      body.amount,
      body.description,
      body.corpusDigest,
    );
    return c.json({ data: decision }, decisionStatus(decision));
  });

  routes.post("/:principal/distribute", validateBody(PayoutSchema), async (c) => {
    const body = c.get("validatedBody");
    const decision = await c.get("service").execution.distributeRevenue(
      c.get("auth").identity,
      c.req.param("principal"),
      body.recipient,
      body.amount,
      body.description,
      body.corpusDigest,
    );
    return c.json({ data: decision }, decisionStatus(decision));
  });

  routes.post("/:principal/licenses", validateBody(IssueLicenseSchema), (c) => {
    const body = c.get("validatedBody");
    const decision = c.get("service").execution.issueLicense(
      c.get("auth").identity,
      c.req.param("principal"),
      body.licensee,
      body.assetRef,
      body.royaltyBasisPoints,
      body.durationSeconds,
      body.corpusDigest,
    );
    return c.json({ data: decision }, decisionStatus(decision));
  });

  routes.get("/:principal/licenses", (c) => {
    return c.json({ data: c.get("service").execution.getLicenses(c.req.param("principal")) });
  });

  // ─── Treasury ────────────────────────────────────────────────────

  routes.post("/:principal/deposits", validateBody(DepositSchema), (c) => {
    const principal = c.req.param("principal");
    const balance = c.get("service").execution.depositToTreasury(
      principal,
      c.get("validatedBody").amount,
      c.get("auth").identity,
    );
    return c.json({ data: { principal, balance: balance.toString() } }, 201);
  });

  routes.post("/:principal/recover", validateBody(RecoverFundsSchema), async (c) => {
    const principal = c.req.param("principal");
    const { recipient } = c.get("validatedBody");
    const amount = await c.get("service").execution.emergencyFundRecovery(
      c.get("auth").identity,
      principal,
      recipient,
    );
    return c.json({ data: { principal, recipient, amount: amount.toString() } });
  });

  // ─── Log ─────────────────────────────────────────────────────────

  routes.get("/:principal/log", (c) => {
    return c.json({ data: c.get("service").execution.getExecutionLog(c.req.param("principal")) });
  });

  return routes;
}
