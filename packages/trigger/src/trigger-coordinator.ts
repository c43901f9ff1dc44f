/**
 * Trigger Coordinator — decides when a principal's intent activates.
 *
 * States per principal:
 *
 *   unconfigured ──configure*──▶ configured ──fire──▶ triggered
 *                                    │  ▲
 *                                    └──┘ configure* (replaces mode and progress)
 *
 * Firing flips the local state to `triggered` *before* calling the
 * intent ledger, so a re-entrant call sees the trigger as spent. If the
 * ledger refuses, the previous state is restored and the error propagates.
 *
 * Async operations re-read state after every await; anything that
 * changed in between is checked again before a write.
 */

import type { Logger } from "pino";
import pino from "pino";
import type { Clock, Identity, Principal } from "@afterword/types";
import {
  MAX_ORACLES,
  MAX_TRUSTED_SIGNERS,
  MIN_DEADMAN_INTERVAL,
  MIN_QUORUM,
  ORACLE_CONFIDENCE_THRESHOLD,
  PreconditionViolation,
  isDigest,
  isNonEmptyString,
  systemClock,
} from "@afterword/types";
import { AuditEmitter } from "@afterword/event-store";
import type { IntentTriggerPort } from "@afterword/intent-ledger";
import type {
  OracleConsensusInput,
  OracleConsensusProvider,
  TriggerConfig,
  TriggerMode,
  TriggerState,
  TriggerStatus,
} from "./types.js";

export interface TriggerCoordinatorOptions {
  /** The ledger this coordinator triggers */
  readonly intents: IntentTriggerPort;
  readonly oracles: OracleConsensusProvider;
  /** Identity presented to the ledger; must hold `intent.trigger` */
  readonly identity?: Identity;
  readonly clock?: Clock;
  readonly audit?: AuditEmitter;
  readonly logger?: Logger;
}

const UNCONFIGURED: TriggerState = { status: "unconfigured" };

export class TriggerCoordinator {
  readonly identity: Identity;
  private readonly states = new Map<Principal, TriggerState>();
  private readonly intents: IntentTriggerPort;
  private readonly oracles: OracleConsensusProvider;
  private readonly clock: Clock;
  private readonly audit: AuditEmitter;
  private readonly log: Logger;

  constructor(options: TriggerCoordinatorOptions) {
    this.intents = options.intents;
    this.oracles = options.oracles;
    this.identity = options.identity ?? "trigger-coordinator";
    this.clock = options.clock ?? systemClock;
    this.audit = options.audit ?? new AuditEmitter({ clock: this.clock });
    this.log = (options.logger ?? pino({ level: "silent" })).child({ component: "trigger" });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Configuration
  // ───────────────────────────────────────────────────────────────────────

  configureDeadman(principal: Principal, interval: number): TriggerConfig {
    this.requireNotTriggered(principal);
    if (!Number.isInteger(interval) || interval < MIN_DEADMAN_INTERVAL) {
      throw new PreconditionViolation(
        "INVALID_INPUT",
        `Deadman interval must be an integer >= ${MIN_DEADMAN_INTERVAL} seconds`,
      );
    }
    return this.install(principal, {
      mode: "deadman",
      interval,
      lastCheckIn: this.clock.now(),
    });
  }

  configureQuorum(
    principal: Principal,
    signers: readonly Identity[],
    required: number,
  ): TriggerConfig {
    this.requireNotTriggered(principal);
    requireUniqueIdentities(signers, "signer");
    if (signers.length > MAX_TRUSTED_SIGNERS) {
      throw new PreconditionViolation("LIMIT_EXCEEDED", `At most ${MAX_TRUSTED_SIGNERS} trusted signers`);
    }
    if (!Number.isInteger(required) || required < MIN_QUORUM || required > signers.length) {
      throw new PreconditionViolation(
        "INVALID_INPUT",
        `Quorum must satisfy ${MIN_QUORUM} <= required <= signers (${signers.length}), got ${required}`,
      );
    }
    return this.install(principal, {
      mode: "quorum",
      signers: [...signers],
      required,
      signed: [],
    });
  }

  /**
   * Configure oracle consensus. The provider is asked for an aggregation
   * reference first; the configuration is only installed if the
   * principal was not triggered while the provider was answering.
   */
  async configureOracleConsensus(
    principal: Principal,
    input: OracleConsensusInput,
  ): Promise<TriggerConfig> {
    this.requireNotTriggered(principal);
    requireUniqueIdentities(input.oracles, "oracle");
    if (input.oracles.length > MAX_ORACLES) {
      throw new PreconditionViolation("LIMIT_EXCEEDED", `At most ${MAX_ORACLES} oracles`);
    }
    if (
      !Number.isInteger(input.requiredOracles) ||
      input.requiredOracles < 1 ||
      input.requiredOracles > input.oracles.length
    ) {
      throw new PreconditionViolation(
        "INVALID_INPUT",
        `requiredOracles must be in [1, ${input.oracles.length}], got ${input.requiredOracles}`,
      );
    }
    if (!isNonEmptyString(input.eventType)) {
      throw new PreconditionViolation("INVALID_INPUT", "eventType must be non-empty");
    }
    if (!isDigest(input.dataDigest)) {
      throw new PreconditionViolation("INVALID_INPUT", "dataDigest must be a SHA-256 hex digest");
    }

    const aggregationRef = await this.oracles.requestVerification({
      principal,
      oracles: [...input.oracles],
      requiredCount: input.requiredOracles,
      eventType: input.eventType,
      dataDigest: input.dataDigest,
    });

    this.requireNotTriggered(principal);
    return this.install(principal, {
      mode: "oracle-consensus",
      oracles: [...input.oracles],
      requiredOracles: input.requiredOracles,
      eventType: input.eventType,
      dataDigest: input.dataDigest,
      aggregationRef,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deadman
  // ───────────────────────────────────────────────────────────────────────

  checkIn(principal: Principal): void {
    const config = this.requireMode(principal, "deadman");
    const now = this.clock.now();
    this.states.set(principal, {
      status: "configured",
      config: { ...config, lastCheckIn: now },
    });
    this.audit.emit("trigger", principal, "DeadmanCheckIn", { principal, at: now });
  }

  /**
   * Fire a deadman trigger whose interval has elapsed. Anyone may call.
   */
  executeDeadman(principal: Principal): void {
    const config = this.requireMode(principal, "deadman");
    const now = this.clock.now();
    const due = config.lastCheckIn + config.interval;
    if (now < due) {
      throw new PreconditionViolation(
        "NOT_ELAPSED",
        `Deadman for "${principal}" fires at ${due}, now ${now}`,
      );
    }
    this.fire(principal);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Quorum
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Record a trusted signer's signature. Reaching the quorum fires.
   * SignatureReceived precedes the IntentTriggered it completes, and
   * stays in the log if the ledger refuses.
   */
  submitSignature(principal: Principal, signer: Identity): void {
    const config = this.requireMode(principal, "quorum");
    if (!config.signers.includes(signer)) {
      throw new PreconditionViolation("NOT_SIGNER", `"${signer}" is not a trusted signer for "${principal}"`);
    }
    if (config.signed.includes(signer)) {
      throw new PreconditionViolation("ALREADY_SIGNED", `"${signer}" already signed for "${principal}"`);
    }

    const signed = [...config.signed, signer];
    const next: TriggerConfig = { ...config, signed };

    this.audit.emit("trigger", signer, "SignatureReceived", {
      principal,
      at: this.clock.now(),
      signer,
      signatureCount: signed.length,
      required: config.required,
    });
    this.log.info({ principal, signer, count: signed.length, required: config.required }, "signature received");

    if (signed.length >= config.required) {
      this.fire(principal, next);
    } else {
      this.states.set(principal, { status: "configured", config: next });
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Oracle consensus
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Fire once the provider reports a finalized, valid verdict with
   * confidence >= the oracle threshold. Anyone may call.
   */
  async completeOracleVerification(principal: Principal): Promise<void> {
    const config = this.requireMode(principal, "oracle-consensus");
    const result = await this.oracles.getResult(config.aggregationRef);

    const current = this.requireMode(principal, "oracle-consensus");
    if (current.aggregationRef !== config.aggregationRef) {
      throw new PreconditionViolation(
        "ORACLE_NOT_FINALIZED",
        `Oracle configuration for "${principal}" changed during verification`,
      );
    }
    if (result === undefined || !result.finalized) {
      throw new PreconditionViolation(
        "ORACLE_NOT_FINALIZED",
        `Aggregation "${config.aggregationRef}" is not finalized`,
      );
    }
    if (!result.isValid || result.confidence < ORACLE_CONFIDENCE_THRESHOLD) {
      this.log.warn({ principal, result }, "oracle verdict rejected");
      throw new PreconditionViolation(
        "ORACLE_REJECTED",
        `Oracle verdict rejected (valid=${result.isValid}, confidence=${result.confidence})`,
      );
    }
    this.fire(principal);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getConfig(principal: Principal): TriggerConfig | undefined {
    return this.states.get(principal)?.config;
  }

  getStatus(principal: Principal): TriggerStatus {
    return this.stateOf(principal).status;
  }

  getState(principal: Principal): TriggerState {
    return this.stateOf(principal);
  }

  isTriggered(principal: Principal): boolean {
    return this.stateOf(principal).status === "triggered";
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private stateOf(principal: Principal): TriggerState {
    return this.states.get(principal) ?? UNCONFIGURED;
  }

  private install(principal: Principal, config: TriggerConfig): TriggerConfig {
    const now = this.clock.now();
    this.states.set(principal, { status: "configured", config });
    this.audit.emit("trigger", principal, "TriggerConfigured", {
      principal,
      at: now,
      mode: config.mode,
    });
    this.log.info({ principal, mode: config.mode }, "trigger configured");
    return config;
  }

  /**
   * Flip to triggered, then trigger the intent. On failure the state
   * before this call is restored, including any `config` passed in.
   */
  private fire(principal: Principal, config?: TriggerConfig): void {
    const previous = this.stateOf(principal);
    const now = this.clock.now();
    this.states.set(principal, {
      status: "triggered",
      config: config ?? previous.config,
      triggeredAt: now,
    });
    try {
      this.intents.trigger(this.identity, principal);
    } catch (err) {
      this.states.set(principal, previous);
      this.log.warn({ principal, err }, "intent ledger refused trigger; state restored");
      throw err;
    }
    this.log.info({ principal, mode: previous.config?.mode }, "trigger fired");
  }

  private requireNotTriggered(principal: Principal): void {
    if (!isNonEmptyString(principal)) {
      throw new PreconditionViolation("INVALID_INPUT", "Principal must be non-empty");
    }
    if (this.stateOf(principal).status === "triggered") {
      throw new PreconditionViolation("ALREADY_TRIGGERED", `Trigger for "${principal}" already fired`);
    }
  }

  private requireMode<M extends TriggerMode>(
    principal: Principal,
    mode: M,
  ): Extract<TriggerConfig, { mode: M }> {
    this.requireNotTriggered(principal);
    const config = this.stateOf(principal).config;
    if (config === undefined) {
      throw new PreconditionViolation("NOT_CONFIGURED", `No trigger configured for "${principal}"`);
    }
    if (!hasMode(config, mode)) {
      throw new PreconditionViolation(
        "WRONG_MODE",
        `Trigger for "${principal}" is ${config.mode}, not ${mode}`,
      );
    }
    return config;
  }
}

function hasMode<M extends TriggerMode>(
  config: TriggerConfig,
  mode: M,
): config is Extract<TriggerConfig, { mode: M }> {
  return config.mode === mode;
}

function requireUniqueIdentities(ids: readonly Identity[], kind: string): void {
  if (ids.length === 0) {
    throw new PreconditionViolation("INVALID_INPUT", `At least one ${kind} is required`);
  }
  if (!ids.every(isNonEmptyString)) {
    throw new PreconditionViolation("INVALID_INPUT", `Every ${kind} must be a non-empty identity`);
  }
  if (new Set(ids).size !== ids.length) {
    throw new PreconditionViolation("INVALID_INPUT", `Duplicate ${kind} identities`);
  }
}
