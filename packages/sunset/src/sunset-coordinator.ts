/**
 * Sunset Coordinator — the ordered wind-down after an engine's term ends.
 *
 *   initiated ──▶ archived ──▶ ip-transitioned ──▶ clustered ──▶ completed
 *
 * Rules:
 * - Every step is one-way and requires the step before it
 * - `initiateSunset` puts the execution engine into sunset using the
 *   coordinator's own identity; an engine that is already sunset is adopted
 * - `emergencySunset` and `isSunsetDue` are permissionless; every other
 *   step needs `sunset.operate`
 * - Legacy clustering is delegated to the resolution engine, which
 *   records its own audit event
 */

import type { Logger } from "pino";
import pino from "pino";
import type { CapabilityTable, Clock, Identity, Principal, StorageUri } from "@afterword/types";
import {
  MAX_ARCHIVES,
  PreconditionViolation,
  isNonEmptyString,
  systemClock,
} from "@afterword/types";
import { AuditEmitter } from "@afterword/event-store";
import type { SunsetPort } from "@afterword/execution";
import type { LegacyClusterRegistry } from "@afterword/resolution";
import type { SunsetState } from "./types.js";
import { POST_SUNSET_LICENSES, isPostSunsetLicense } from "./types.js";

export interface SunsetCoordinatorOptions {
  readonly capabilities: CapabilityTable;
  readonly execution: SunsetPort;
  readonly clusters: LegacyClusterRegistry;
  /**
   * Identity presented to the execution and resolution engines; must
   * hold `execution.sunset` and `resolution.index`
   */
  readonly identity?: Identity;
  readonly clock?: Clock;
  readonly audit?: AuditEmitter;
  readonly logger?: Logger;
}

export type SunsetStep = "initiated" | "archived" | "ip-transitioned" | "clustered" | "completed";

export class SunsetCoordinator {
  readonly identity: Identity;
  private readonly states = new Map<Principal, SunsetState>();
  private readonly capabilities: CapabilityTable;
  private readonly execution: SunsetPort;
  private readonly clusters: LegacyClusterRegistry;
  private readonly clock: Clock;
  private readonly audit: AuditEmitter;
  private readonly log: Logger;

  constructor(options: SunsetCoordinatorOptions) {
    this.capabilities = options.capabilities;
    this.execution = options.execution;
    this.clusters = options.clusters;
    this.identity = options.identity ?? "sunset-coordinator";
    this.clock = options.clock ?? systemClock;
    this.audit = options.audit ?? new AuditEmitter({ clock: this.clock });
    this.log = (options.logger ?? pino({ level: "silent" })).child({ component: "sunset" });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Start
  // ───────────────────────────────────────────────────────────────────────

  initiateSunset(caller: Identity, principal: Principal): SunsetState {
    this.capabilities.assert("sunset.operate", caller);
    this.requireNotInitiated(principal);
    if (!this.execution.isSunset(principal)) {
      this.execution.activateSunset(this.identity, principal);
    }
    return this.start(caller, principal, false);
  }

  emergencySunset(principal: Principal): SunsetState {
    this.requireNotInitiated(principal);
    if (!this.execution.isSunset(principal)) {
      this.execution.emergencySunset(principal);
    }
    return this.start(principal, principal, true);
  }

  isSunsetDue(principal: Principal): boolean {
    return this.execution.isSunsetDue(principal);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Steps
  // ───────────────────────────────────────────────────────────────────────

  archiveAssets(caller: Identity, principal: Principal, archives: readonly StorageUri[]): SunsetState {
    this.capabilities.assert("sunset.operate", caller);
    const state = this.requireStep(principal, "archived");
    if (archives.length === 0) {
      throw new PreconditionViolation("INVALID_INPUT", "At least one archive is required");
    }
    if (archives.length > MAX_ARCHIVES) {
      throw new PreconditionViolation("LIMIT_EXCEEDED", `At most ${MAX_ARCHIVES} archives`);
    }
    if (!archives.every(isNonEmptyString)) {
      throw new PreconditionViolation("INVALID_INPUT", "Archive URIs must be non-empty");
    }

    const next: SunsetState = { ...state, assetsArchived: true, archives: [...archives] };
    this.states.set(principal, next);
    this.audit.emit("sunset", caller, "AssetsArchived", {
      principal,
      at: this.clock.now(),
      archiveCount: archives.length,
    });
    this.log.info({ principal, archiveCount: archives.length }, "assets archived");
    return next;
  }

  transitionIP(caller: Identity, principal: Principal, license: string): SunsetState {
    this.capabilities.assert("sunset.operate", caller);
    const state = this.requireStep(principal, "ip-transitioned");
    if (!isPostSunsetLicense(license)) {
      throw new PreconditionViolation(
        "INVALID_INPUT",
        `License must be one of ${POST_SUNSET_LICENSES.join(", ")}`,
      );
    }

    const next: SunsetState = { ...state, ipTransitioned: true, postSunsetLicense: license };
    this.states.set(principal, next);
    this.audit.emit("sunset", caller, "IPTransitioned", { principal, at: this.clock.now(), license });
    this.log.info({ principal, license }, "ip transitioned");
    return next;
  }

  clusterLegacy(caller: Identity, principal: Principal, clusterId: string): SunsetState {
    this.capabilities.assert("sunset.operate", caller);
    const state = this.requireStep(principal, "clustered");
    this.clusters.assignLegacyToCluster(this.identity, principal, clusterId);

    const next: SunsetState = { ...state, clustered: true, clusterId };
    this.states.set(principal, next);
    this.log.info({ principal, clusterId }, "legacy clustered");
    return next;
  }

  completeSunset(caller: Identity, principal: Principal): SunsetState {
    this.capabilities.assert("sunset.operate", caller);
    const state = this.requireStep(principal, "completed");

    const now = this.clock.now();
    const next: SunsetState = { ...state, completed: true, completedAt: now };
    this.states.set(principal, next);
    this.audit.emit("sunset", caller, "SunsetCompleted", { principal, at: now });
    this.log.info({ principal }, "sunset completed");
    return next;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getSunsetState(principal: Principal): SunsetState | undefined {
    return this.states.get(principal);
  }

  /** The last step reached, or undefined before initiation. */
  getStep(principal: Principal): SunsetStep | undefined {
    const state = this.states.get(principal);
    return state === undefined ? undefined : stepOf(state);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private start(actor: Identity, principal: Principal, emergency: boolean): SunsetState {
    const now = this.clock.now();
    const state: SunsetState = {
      principal,
      initiatedAt: now,
      emergency,
      assetsArchived: false,
      archives: [],
      ipTransitioned: false,
      clustered: false,
      completed: false,
    };
    this.states.set(principal, state);
    this.audit.emit("sunset", actor, "SunsetInitiated", { principal, at: now });
    this.log.info({ principal, emergency }, "sunset initiated");
    return state;
  }

  private requireNotInitiated(principal: Principal): void {
    if (this.states.has(principal)) {
      throw new PreconditionViolation("STEP_ALREADY_DONE", `Sunset for "${principal}" was already initiated`);
    }
  }

  /**
   * The principal's state, provided `target` is exactly the next step.
   */
  private requireStep(principal: Principal, target: SunsetStep): SunsetState {
    const state = this.states.get(principal);
    if (state === undefined) {
      throw new PreconditionViolation("SUNSET_NOT_INITIATED", `Sunset for "${principal}" has not been initiated`);
    }
    const current = STEP_ORDER.indexOf(stepOf(state));
    const wanted = STEP_ORDER.indexOf(target);
    if (current >= wanted) {
      throw new PreconditionViolation("STEP_ALREADY_DONE", `Step "${target}" is already done for "${principal}"`);
    }
    if (current + 1 !== wanted) {
      throw new PreconditionViolation(
        "STEP_OUT_OF_ORDER",
        `Step "${target}" requires "${STEP_ORDER[wanted - 1] ?? "initiated"}" first`,
      );
    }
    return state;
  }
}

const STEP_ORDER: readonly SunsetStep[] = ["initiated", "archived", "ip-transitioned", "clustered", "completed"];

function stepOf(state: SunsetState): SunsetStep {
  if (state.completed) return "completed";
  if (state.clustered) return "clustered";
  if (state.ipTransitioned) return "ip-transitioned";
  if (state.assetsArchived) return "archived";
  return "initiated";
}
