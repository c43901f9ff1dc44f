/**
 * Intent Ledger — the authoritative record of what a principal intends.
 *
 * Rules:
 * - One record per principal
 * - Re-capture before revoke/trigger replaces the record but keeps
 *   its goals and signed versions
 * - Revocation and triggering are one-way and mutually exclusive
 * - Only holders of `intent.trigger` may trigger
 * - Every operation validates fully before it writes anything
 */

import type {
  CapabilityTable,
  Clock,
  Digest,
  Identity,
  Principal,
} from "@afterword/types";
import {
  MAX_ASSETS,
  MAX_CORPUS_WINDOW_YEARS,
  MAX_GOALS,
  MAX_PRIORITY,
  MIN_CORPUS_WINDOW_YEARS,
  MIN_PRIORITY,
  PreconditionViolation,
  isDigest,
  isIntInRange,
  isNonEmptyString,
  systemClock,
} from "@afterword/types";
import { AuditEmitter } from "@afterword/event-store";
import type {
  CaptureInput,
  Goal,
  IntentRecord,
  IntentTriggerPort,
  TriggerStatusReader,
} from "./types.js";

export interface IntentLedgerOptions {
  readonly capabilities: CapabilityTable;
  readonly clock?: Clock;
  readonly audit?: AuditEmitter;
}

export class IntentLedger implements TriggerStatusReader, IntentTriggerPort {
  private readonly records = new Map<Principal, IntentRecord>();
  private readonly capabilities: CapabilityTable;
  private readonly clock: Clock;
  private readonly audit: AuditEmitter;

  constructor(options: IntentLedgerOptions) {
    this.capabilities = options.capabilities;
    this.clock = options.clock ?? systemClock;
    this.audit = options.audit ?? new AuditEmitter({ clock: this.clock });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Capture & refinement
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Capture (or re-capture) a principal's intent.
   */
  capture(principal: Principal, input: CaptureInput): IntentRecord {
    requirePrincipal(principal);
    const existing = this.records.get(principal);
    if (existing !== undefined) {
      assertMutable(existing);
    }
    validateCapture(input);

    const now = this.clock.now();
    const record: IntentRecord = {
      principal,
      intentDigest: input.intentDigest,
      corpusDigest: input.corpusDigest,
      corpusUri: input.corpusUri,
      assetsUri: input.assetsUri,
      assetRefs: [...input.assetRefs],
      corpusWindow: { startYear: input.windowStart, endYear: input.windowEnd },
      goals: existing?.goals ?? [],
      signedVersions: existing?.signedVersions ?? [],
      capturedAt: now,
      revoked: false,
      triggered: false,
    };
    this.records.set(principal, record);

    this.audit.emit("intent-ledger", principal, "IntentCaptured", {
      principal,
      at: now,
      intentDigest: record.intentDigest,
      corpusDigest: record.corpusDigest,
      assetCount: record.assetRefs.length,
      windowStart: input.windowStart,
      windowEnd: input.windowEnd,
    });
    return record;
  }

  addGoal(
    principal: Principal,
    description: string,
    constraintDigest: Digest,
    priority: number,
  ): Goal {
    const record = this.requireMutable(principal);
    if (!isNonEmptyString(description)) {
      throw new PreconditionViolation("INVALID_INPUT", "Goal description must be non-empty");
    }
    if (!isDigest(constraintDigest)) {
      throw new PreconditionViolation("INVALID_INPUT", "Constraint digest must be a SHA-256 hex digest");
    }
    if (!isIntInRange(priority, MIN_PRIORITY, MAX_PRIORITY)) {
      throw new PreconditionViolation(
        "INVALID_INPUT",
        `Priority must be an integer in [${MIN_PRIORITY}, ${MAX_PRIORITY}], got ${priority}`,
      );
    }
    if (record.goals.length >= MAX_GOALS) {
      throw new PreconditionViolation("LIMIT_EXCEEDED", `At most ${MAX_GOALS} goals per intent`);
    }

    const now = this.clock.now();
    const goal: Goal = { description, constraintDigest, priority, addedAt: now };
    this.records.set(principal, { ...record, goals: [...record.goals, goal] });

    this.audit.emit("intent-ledger", principal, "GoalAdded", {
      principal,
      at: now,
      goalIndex: record.goals.length,
      constraintDigest,
      priority,
    });
    return goal;
  }

  /**
   * Record that the principal signed off on a version of their intent.
   * Signing the same digest twice is a no-op.
   */
  signVersion(principal: Principal, versionDigest: Digest): void {
    const record = this.requireMutable(principal);
    if (!isDigest(versionDigest)) {
      throw new PreconditionViolation("INVALID_INPUT", "Version digest must be a SHA-256 hex digest");
    }
    if (record.signedVersions.includes(versionDigest)) {
      return;
    }

    const now = this.clock.now();
    this.records.set(principal, {
      ...record,
      signedVersions: [...record.signedVersions, versionDigest],
    });
    this.audit.emit("intent-ledger", principal, "VersionSigned", {
      principal,
      at: now,
      versionDigest,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Terminal transitions
  // ───────────────────────────────────────────────────────────────────────

  revoke(principal: Principal): void {
    const record = this.requireMutable(principal);
    const now = this.clock.now();
    this.records.set(principal, { ...record, revoked: true });
    this.audit.emit("intent-ledger", principal, "IntentRevoked", { principal, at: now });
  }

  /**
   * Irreversibly trigger a principal's intent.
   *
   * @throws PreconditionViolation UNAUTHORIZED unless `caller` holds `intent.trigger`
   */
  trigger(caller: Identity, principal: Principal): void {
    this.capabilities.assert("intent.trigger", caller);
    const record = this.requireMutable(principal);

    const now = this.clock.now();
    this.records.set(principal, { ...record, triggered: true, triggeredAt: now });
    this.audit.emit("intent-ledger", caller, "IntentTriggered", {
      principal,
      at: now,
      triggeredBy: caller,
    });
  }

  /**
   * Make `identity` the sole holder of `intent.trigger`. Admin only.
   */
  setTriggerCoordinator(caller: Identity, identity: Identity): void {
    this.capabilities.replace(caller, "intent.trigger", [identity]);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getIntent(principal: Principal): IntentRecord | undefined {
    return this.records.get(principal);
  }

  isTriggered(principal: Principal): boolean {
    return this.records.get(principal)?.triggered === true;
  }

  isRevoked(principal: Principal): boolean {
    return this.records.get(principal)?.revoked === true;
  }

  getGoals(principal: Principal): readonly Goal[] {
    return this.records.get(principal)?.goals ?? [];
  }

  isVersionSigned(principal: Principal, versionDigest: Digest): boolean {
    return this.records.get(principal)?.signedVersions.includes(versionDigest) === true;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private requireMutable(principal: Principal): IntentRecord {
    const record = this.records.get(principal);
    if (record === undefined) {
      throw new PreconditionViolation("NOT_CAPTURED", `No intent captured for "${principal}"`);
    }
    assertMutable(record);
    return record;
  }
}

function assertMutable(record: IntentRecord): void {
  if (record.revoked) {
    throw new PreconditionViolation("ALREADY_REVOKED", `Intent for "${record.principal}" is revoked`);
  }
  if (record.triggered) {
    throw new PreconditionViolation("ALREADY_TRIGGERED", `Intent for "${record.principal}" is triggered`);
  }
}

function requirePrincipal(principal: Principal): void {
  if (!isNonEmptyString(principal)) {
    throw new PreconditionViolation("INVALID_INPUT", "Principal must be non-empty");
  }
}

function validateCapture(input: CaptureInput): void {
  if (!isDigest(input.intentDigest) || !isDigest(input.corpusDigest)) {
    throw new PreconditionViolation("INVALID_INPUT", "Intent and corpus digests must be SHA-256 hex digests");
  }
  if (!isNonEmptyString(input.corpusUri) || !isNonEmptyString(input.assetsUri)) {
    throw new PreconditionViolation("INVALID_INPUT", "Corpus and assets URIs must be non-empty");
  }
  if (!Number.isInteger(input.windowStart) || !Number.isInteger(input.windowEnd)) {
    throw new PreconditionViolation("INVALID_INPUT", "Corpus window years must be integers");
  }
  if (input.windowEnd <= input.windowStart) {
    throw new PreconditionViolation("INVALID_INPUT", "Corpus window end must be after its start");
  }
  const width = input.windowEnd - input.windowStart;
  if (width < MIN_CORPUS_WINDOW_YEARS || width > MAX_CORPUS_WINDOW_YEARS) {
    throw new PreconditionViolation(
      "INVALID_INPUT",
      `Corpus window must span ${MIN_CORPUS_WINDOW_YEARS}-${MAX_CORPUS_WINDOW_YEARS} years, got ${width}`,
    );
  }
  if (input.assetRefs.length === 0) {
    throw new PreconditionViolation("INVALID_INPUT", "At least one asset reference is required");
  }
  if (input.assetRefs.length > MAX_ASSETS) {
    throw new PreconditionViolation("LIMIT_EXCEEDED", `At most ${MAX_ASSETS} asset references`);
  }
  if (!input.assetRefs.every(isNonEmptyString)) {
    throw new PreconditionViolation("INVALID_INPUT", "Asset references must be non-empty strings");
  }
}
