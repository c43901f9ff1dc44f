/**
 * Execution Engine — acts on a principal's behalf after activation.
 *
 * Lifecycle per principal:
 *
 *   inactive ──activate──▶ active ──(FIXED_DURATION elapses)──▶ sunset-due
 *                                                                  │
 *                                      activateSunset / emergencySunset
 *                                                                  ▼
 *                                                               sunset
 *
 * Every decision passes the same gate:
 *   1. the action text is at most MAX_ACTION_LENGTH characters
 *   2. the prohibited-action filter lets it through
 *   3. the corpus resolves the query with confidence >= CONFIDENCE_THRESHOLD
 *
 * Below the threshold the engine does nothing and says so ("inaction").
 * That is a result, not an error.
 *
 * Value-moving operations debit the treasury before the transfer is
 * awaited and hold a per-principal guard until it settles. A failed
 * transfer restores the debit.
 */

import type { Logger } from "pino";
import pino from "pino";
import type { CapabilityTable, Clock, Digest, Identity, Principal } from "@afterword/types";
import {
  CONFIDENCE_THRESHOLD,
  EMERGENCY_RECOVERY_DELAY,
  ExternalTransferFailure,
  FIXED_DURATION,
  MAX_ACTION_LENGTH,
  MAX_ROYALTY_BASIS_POINTS,
  PolicyRejection,
  PreconditionViolation,
  isIntInRange,
  isNonEmptyString,
  sha256Hex,
  systemClock,
} from "@afterword/types";
import { AuditEmitter, canonicalDigest } from "@afterword/event-store";
import type { TriggerStatusReader } from "@afterword/intent-ledger";
import type { CorpusResolver, Resolution } from "@afterword/resolution";
import type { ProhibitedActionFilter } from "./prohibited-action-filter.js";
import { defaultFilter } from "./prohibited-action-filter.js";
import type {
  Decision,
  ExecutionLogEntry,
  ExecutionState,
  FundedProject,
  FundsTransport,
  License,
  SunsetPort,
} from "./types.js";

export interface ExecutionEngineOptions {
  readonly capabilities: CapabilityTable;
  /** Activation requires the principal's intent to be triggered here */
  readonly intents: TriggerStatusReader;
  readonly resolver: CorpusResolver;
  readonly transport: FundsTransport;
  readonly filter?: ProhibitedActionFilter;
  readonly clock?: Clock;
  readonly audit?: AuditEmitter;
  readonly logger?: Logger;
}

interface MutableState {
  readonly principal: Principal;
  activatedAt: number | undefined;
  sunset: boolean;
  sunsetAt: number | undefined;
  treasury: bigint;
  readonly executionLog: ExecutionLogEntry[];
  readonly licenses: License[];
  readonly fundedProjects: FundedProject[];
  readonly distributions: FundedProject[];
}

type PayoutKind = "fund_project" | "distribute_revenue";

export const LICENSE_QUERY = "license_issuance";

export class ExecutionEngine implements SunsetPort {
  private readonly states = new Map<Principal, MutableState>();
  private readonly inFlight = new Set<Principal>();
  private readonly capabilities: CapabilityTable;
  private readonly intents: TriggerStatusReader;
  private readonly resolver: CorpusResolver;
  private readonly transport: FundsTransport;
  private readonly filter: ProhibitedActionFilter;
  private readonly clock: Clock;
  private readonly audit: AuditEmitter;
  private readonly log: Logger;

  constructor(options: ExecutionEngineOptions) {
    this.capabilities = options.capabilities;
    this.intents = options.intents;
    this.resolver = options.resolver;
    this.transport = options.transport;
    this.filter = options.filter ?? defaultFilter;
    this.clock = options.clock ?? systemClock;
    this.audit = options.audit ?? new AuditEmitter({ clock: this.clock });
    this.log = (options.logger ?? pino({ level: "silent" })).child({ component: "execution" });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  activate(caller: Identity, principal: Principal): void {
    this.capabilities.assert("execution.execute", caller);
    this.assertIdle(principal);
    const state = this.stateFor(principal);
    if (state.activatedAt !== undefined) {
      throw new PreconditionViolation("ALREADY_ACTIVATED", `Execution for "${principal}" is already activated`);
    }
    if (!this.intents.isTriggered(principal)) {
      throw new PreconditionViolation("NOT_TRIGGERED", `Intent for "${principal}" has not been triggered`);
    }

    const now = this.clock.now();
    state.activatedAt = now;
    this.audit.emit("execution", caller, "ExecutionActivated", { principal, at: now });
    this.log.info({ principal, activatedAt: now }, "execution activated");
  }

  /**
   * Enter sunset once FIXED_DURATION has elapsed since activation.
   * Holders of `execution.execute` or `execution.sunset` may call this.
   */
  activateSunset(caller: Identity, principal: Principal): void {
    if (
      !this.capabilities.has("execution.execute", caller) &&
      !this.capabilities.has("execution.sunset", caller)
    ) {
      throw new PreconditionViolation(
        "UNAUTHORIZED",
        `Identity "${caller}" lacks capability "execution.execute" or "execution.sunset"`,
      );
    }
    this.enterSunset(caller, principal, false);
  }

  /**
   * Permissionless sunset, so that an absent operator cannot keep the
   * engine running past its term.
   */
  emergencySunset(principal: Principal): void {
    this.enterSunset(principal, principal, true);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Decisions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Propose an action. Returns the executed log entry, or an inaction
   * result when the corpus does not support the action strongly enough.
   *
   * @throws PolicyRejection when the action is too long or prohibited
   */
  proposeAction(
    caller: Identity,
    principal: Principal,
    action: string,
    query: string,
    corpusDigest: Digest,
  ): Decision {
    const state = this.requireOperable(caller, principal);
    this.screen(caller, principal, action);
    requireQuery(query);

    const resolution = this.resolver.resolve(principal, query, corpusDigest);
    if (!this.meetsThreshold(caller, principal, action, query, resolution)) {
      return { outcome: "inaction", citation: resolution.citation, confidence: resolution.confidence };
    }
    return { outcome: "executed", entry: this.record(caller, state, action, query, resolution) };
  }

  /**
   * Send treasury funds to a project. Gated on the query
   * `fund_project:<description>`.
   */
  fundProject(
    caller: Identity,
    principal: Principal,
    recipient: string,
    amount: bigint,
    description: string,
    corpusDigest: Digest,
  ): Promise<Decision> {
    return this.payout("fund_project", caller, principal, recipient, amount, description, corpusDigest);
  }

  /**
   * Distribute treasury revenue. Gated on the query
   * `distribute_revenue:<description>`.
   */
  distributeRevenue(
    caller: Identity,
    principal: Principal,
    recipient: string,
    amount: bigint,
    description: string,
    corpusDigest: Digest,
  ): Promise<Decision> {
    return this.payout("distribute_revenue", caller, principal, recipient, amount, description, corpusDigest);
  }

  issueLicense(
    caller: Identity,
    principal: Principal,
    licensee: string,
    assetRef: string,
    royaltyBasisPoints: number,
    durationSeconds: number,
    corpusDigest: Digest,
  ): Decision {
    const state = this.requireOperable(caller, principal);
    if (!isNonEmptyString(licensee) || !isNonEmptyString(assetRef)) {
      throw new PreconditionViolation("INVALID_INPUT", "licensee and assetRef must be non-empty");
    }
    if (!isIntInRange(royaltyBasisPoints, 0, MAX_ROYALTY_BASIS_POINTS)) {
      throw new PreconditionViolation(
        "INVALID_INPUT",
        `royaltyBasisPoints must be an integer in [0, ${MAX_ROYALTY_BASIS_POINTS}]`,
      );
    }
    if (!Number.isInteger(durationSeconds) || durationSeconds <= 0) {
      throw new PreconditionViolation("INVALID_INPUT", "durationSeconds must be a positive integer");
    }

    const action = `issue_license:${assetRef}`;
    const resolution = this.resolver.resolve(principal, LICENSE_QUERY, corpusDigest);
    if (!this.meetsThreshold(caller, principal, action, LICENSE_QUERY, resolution)) {
      return { outcome: "inaction", citation: resolution.citation, confidence: resolution.confidence };
    }

    const entry = this.record(caller, state, action, LICENSE_QUERY, resolution);
    const license: License = {
      licensee,
      assetRef,
      royaltyBasisPoints,
      startsAt: entry.timestamp,
      endsAt: entry.timestamp + durationSeconds,
    };
    state.licenses.push(license);
    this.audit.emit("execution", caller, "LicenseIssued", {
      principal,
      at: entry.timestamp,
      licensee,
      assetRef,
      royaltyBasisPoints,
      endsAt: license.endsAt,
    });
    return { outcome: "executed", entry };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Treasury
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Credit the treasury. Permissionless; returns the new balance.
   */
  depositToTreasury(principal: Principal, amount: bigint, from: Identity = principal): bigint {
    this.assertIdle(principal);
    requirePositive(amount);
    const state = this.stateFor(principal);
    state.treasury += amount;
    this.audit.emit("execution", from, "TreasuryDeposited", {
      principal,
      at: this.clock.now(),
      amount: amount.toString(),
      balance: state.treasury.toString(),
    });
    this.log.debug({ principal, amount: amount.toString() }, "treasury deposit");
    return state.treasury;
  }

  /**
   * Send the whole remaining treasury to `recipient`, one year after
   * sunset. Returns the amount recovered.
   */
  async emergencyFundRecovery(caller: Identity, principal: Principal, recipient: string): Promise<bigint> {
    this.capabilities.assert("execution.recover", caller);
    this.assertIdle(principal);
    if (!isNonEmptyString(recipient)) {
      throw new PreconditionViolation("INVALID_INPUT", "recipient must be non-empty");
    }
    const state = this.stateFor(principal);
    if (!state.sunset || state.sunsetAt === undefined) {
      throw new PreconditionViolation("NOT_SUNSET", `Execution for "${principal}" has not been sunset`);
    }
    if (this.clock.now() < state.sunsetAt + EMERGENCY_RECOVERY_DELAY) {
      throw new PreconditionViolation(
        "RECOVERY_NOT_DUE",
        `Emergency recovery opens at ${state.sunsetAt + EMERGENCY_RECOVERY_DELAY}`,
      );
    }
    if (state.treasury === 0n) {
      throw new PreconditionViolation("EMPTY_TREASURY", `Treasury for "${principal}" is empty`);
    }

    const amount = state.treasury;
    await this.transfer(principal, state, recipient, amount, "emergency_recovery");

    this.audit.emit("execution", caller, "EmergencyFundsRecovered", {
      principal,
      at: this.clock.now(),
      recipient,
      amount: amount.toString(),
    });
    this.log.info({ principal, recipient, amount: amount.toString() }, "emergency funds recovered");
    return amount;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  isActive(principal: Principal): boolean {
    const state = this.states.get(principal);
    if (state === undefined || state.activatedAt === undefined || state.sunset) return false;
    return this.clock.now() < state.activatedAt + FIXED_DURATION;
  }

  isSunsetDue(principal: Principal): boolean {
    const state = this.states.get(principal);
    if (state === undefined || state.activatedAt === undefined || state.sunset) return false;
    return this.clock.now() >= state.activatedAt + FIXED_DURATION;
  }

  isSunset(principal: Principal): boolean {
    return this.states.get(principal)?.sunset ?? false;
  }

  getState(principal: Principal): ExecutionState {
    const state = this.states.get(principal);
    if (state === undefined) {
      return {
        principal,
        sunset: false,
        treasury: 0n,
        executionLog: [],
        licenses: [],
        fundedProjects: [],
        distributions: [],
      };
    }
    return {
      principal,
      ...(state.activatedAt !== undefined ? { activatedAt: state.activatedAt } : {}),
      sunset: state.sunset,
      ...(state.sunsetAt !== undefined ? { sunsetAt: state.sunsetAt } : {}),
      treasury: state.treasury,
      executionLog: [...state.executionLog],
      licenses: [...state.licenses],
      fundedProjects: [...state.fundedProjects],
      distributions: [...state.distributions],
    };
  }

  getExecutionLog(principal: Principal): readonly ExecutionLogEntry[] {
    return [...(this.states.get(principal)?.executionLog ?? [])];
  }

  getLicenses(principal: Principal): readonly License[] {
    return [...(this.states.get(principal)?.licenses ?? [])];
  }

  getFundedProjects(principal: Principal): readonly FundedProject[] {
    return [...(this.states.get(principal)?.fundedProjects ?? [])];
  }

  getDistributions(principal: Principal): readonly FundedProject[] {
    return [...(this.states.get(principal)?.distributions ?? [])];
  }

  getTreasuryBalance(principal: Principal): bigint {
    return this.states.get(principal)?.treasury ?? 0n;
  }

  isOperationInProgress(principal: Principal): boolean {
    return this.inFlight.has(principal);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private async payout(
    kind: PayoutKind,
    caller: Identity,
    principal: Principal,
    recipient: string,
    amount: bigint,
    description: string,
    corpusDigest: Digest,
  ): Promise<Decision> {
    const state = this.requireOperable(caller, principal);
    if (!isNonEmptyString(recipient)) {
      throw new PreconditionViolation("INVALID_INPUT", "recipient must be non-empty");
    }
    requirePositive(amount);
    this.screen(caller, principal, description);
    if (amount > state.treasury) {
      throw new PreconditionViolation(
        "INSUFFICIENT_TREASURY",
        `Treasury holds ${state.treasury}, cannot send ${amount}`,
      );
    }

    const query = `${kind}:${description}`;
    const resolution = this.resolver.resolve(principal, query, corpusDigest);
    if (!this.meetsThreshold(caller, principal, query, query, resolution)) {
      return { outcome: "inaction", citation: resolution.citation, confidence: resolution.confidence };
    }

    await this.transfer(principal, state, recipient, amount, query);

    const entry = this.record(caller, state, query, query, resolution);
    const payout: FundedProject = { recipient, amount, description, fundedAt: entry.timestamp };
    const payload = {
      principal,
      at: entry.timestamp,
      recipient,
      amount: amount.toString(),
      description,
    };
    if (kind === "fund_project") {
      state.fundedProjects.push(payout);
      this.audit.emit("execution", caller, "ProjectFunded", payload);
    } else {
      state.distributions.push(payout);
      this.audit.emit("execution", caller, "RevenueDistributed", payload);
    }
    return { outcome: "executed", entry };
  }

  /**
   * Debit, send, and restore the debit if the transport rejects. The
   * principal is locked for the whole exchange.
   */
  private async transfer(
    principal: Principal,
    state: MutableState,
    recipient: string,
    amount: bigint,
    memo: string,
  ): Promise<void> {
    state.treasury -= amount;
    this.inFlight.add(principal);
    try {
      await this.transport.send(recipient, amount, memo);
    } catch (err) {
      state.treasury += amount;
      this.log.warn({ principal, recipient, amount: amount.toString(), err }, "transfer failed; debit restored");
      throw new ExternalTransferFailure(
        `Transfer of ${amount} to "${recipient}" failed`,
        recipient,
        amount,
        { cause: err },
      );
    } finally {
      this.inFlight.delete(principal);
    }
  }

  private enterSunset(actor: Identity, principal: Principal, emergency: boolean): void {
    this.assertIdle(principal);
    const state = this.stateFor(principal);
    if (state.activatedAt === undefined) {
      throw new PreconditionViolation("NOT_ACTIVATED", `Execution for "${principal}" was never activated`);
    }
    if (state.sunset) {
      throw new PreconditionViolation("ALREADY_SUNSET", `Execution for "${principal}" is already sunset`);
    }
    const now = this.clock.now();
    const due = state.activatedAt + FIXED_DURATION;
    if (now < due) {
      throw new PreconditionViolation("SUNSET_NOT_DUE", `Sunset is due at ${due}, now ${now}`);
    }

    state.sunset = true;
    state.sunsetAt = now;
    this.audit.emit("execution", actor, "SunsetActivated", { principal, at: now, emergency });
    this.log.info({ principal, emergency }, "sunset activated");
  }

  private requireOperable(caller: Identity, principal: Principal): MutableState {
    this.capabilities.assert("execution.execute", caller);
    this.assertIdle(principal);
    if (!this.isActive(principal)) {
      throw new PreconditionViolation("NOT_ACTIVE", `Execution for "${principal}" is not active`);
    }
    return this.stateFor(principal);
  }

  /**
   * Length cap, then the prohibited-action filter. A filter hit is
   * audited before the rejection is thrown.
   */
  private screen(caller: Identity, principal: Principal, text: string): void {
    if (!isNonEmptyString(text)) {
      throw new PreconditionViolation("INVALID_INPUT", "Action text must be non-empty");
    }
    if (text.length > MAX_ACTION_LENGTH) {
      throw new PolicyRejection(
        "ACTION_TOO_LONG",
        `Action is ${text.length} characters; the limit is ${MAX_ACTION_LENGTH}`,
      );
    }

    const verdict = this.filter.check(text);
    if (verdict.blocked) {
      const layer = verdict.layer ?? "unknown";
      this.audit.emit("execution", caller, "PoliticalActionBlocked", {
        principal,
        at: this.clock.now(),
        actionDigest: sha256Hex(text),
        layer,
      });
      this.log.warn({ principal, layer, filterVersion: this.filter.version }, "prohibited action blocked");
      throw new PolicyRejection("PROHIBITED_ACTION", `Action rejected by the ${layer} filter`, layer);
    }
    if (verdict.advisories.length > 0) {
      this.log.debug({ principal, advisories: verdict.advisories }, "advisory keywords present");
    }
  }

  private meetsThreshold(
    caller: Identity,
    principal: Principal,
    action: string,
    query: string,
    resolution: Resolution,
  ): boolean {
    if (resolution.confidence >= CONFIDENCE_THRESHOLD) return true;
    this.audit.emit("execution", caller, "InactionDefault", {
      principal,
      at: this.clock.now(),
      action,
      query,
      confidence: resolution.confidence,
    });
    this.log.debug({ principal, query, confidence: resolution.confidence }, "below threshold; inaction");
    return false;
  }

  private record(
    caller: Identity,
    state: MutableState,
    action: string,
    query: string,
    resolution: Resolution,
  ): ExecutionLogEntry {
    const entry: ExecutionLogEntry = {
      action,
      query,
      citation: resolution.citation,
      confidence: resolution.confidence,
      timestamp: this.clock.now(),
      decisionDigest: canonicalDigest({
        action,
        citation: resolution.citation,
        confidence: resolution.confidence,
      }),
    };
    state.executionLog.push(entry);
    this.audit.emit("execution", caller, "ActionExecuted", {
      principal: state.principal,
      at: entry.timestamp,
      action,
      query,
      citation: entry.citation,
      confidence: entry.confidence,
      decisionDigest: entry.decisionDigest,
    });
    this.log.info({ principal: state.principal, action, confidence: entry.confidence }, "action executed");
    return entry;
  }

  private assertIdle(principal: Principal): void {
    if (this.inFlight.has(principal)) {
      throw new PreconditionViolation(
        "OPERATION_IN_PROGRESS",
        `A value transfer for "${principal}" is still in flight`,
      );
    }
  }

  private stateFor(principal: Principal): MutableState {
    let state = this.states.get(principal);
    if (state === undefined) {
      state = {
        principal,
        activatedAt: undefined,
        sunset: false,
        sunsetAt: undefined,
        treasury: 0n,
        executionLog: [],
        licenses: [],
        fundedProjects: [],
        distributions: [],
      };
      this.states.set(principal, state);
    }
    return state;
  }
}

// ─── Helpers ───────────────────────────────────────────────────────────

function requirePositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new PreconditionViolation("INVALID_INPUT", `Amount must be positive, got ${amount}`);
  }
}

function requireQuery(query: string): void {
  if (!isNonEmptyString(query)) {
    throw new PreconditionViolation("INVALID_INPUT", "query must be non-empty");
  }
}
