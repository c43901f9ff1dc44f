/**
 * AfterwordService — Composition root for all domain packages.
 *
 * Route handlers delegate to this service's components; they never
 * construct domain objects themselves. Every component shares one
 * clock, one capability table and one audit log.
 *
 * Capability grants:
 *
 *   intent.trigger     the trigger coordinator
 *   resolution.index   indexers, the sunset coordinator
 *   execution.execute  executors
 *   execution.sunset   sunset operators, the sunset coordinator
 *   execution.recover  recovery identities
 *   sunset.operate     sunset operators
 */

import type { Logger } from "pino";
import pino from "pino";
import type { Clock, Identity } from "@afterword/types";
import { CapabilityTable, systemClock } from "@afterword/types";
import { AuditEmitter, InMemoryEventStore } from "@afterword/event-store";
import type { EventStoreIntegrityResult } from "@afterword/event-store";
import { IntentLedger } from "@afterword/intent-ledger";
import { InMemoryOracleAggregator, TriggerCoordinator } from "@afterword/trigger";
import { ResolutionEngine } from "@afterword/resolution";
import { ExecutionEngine, InMemoryFundsTransport } from "@afterword/execution";
import type { FundsTransport } from "@afterword/execution";
import { SunsetCoordinator } from "@afterword/sunset";

// =============================================================================
// Configuration
// =============================================================================

export interface AfterwordServiceConfig {
  readonly admin: Identity;
  readonly executors?: readonly Identity[];
  readonly indexers?: readonly Identity[];
  readonly sunsetOperators?: readonly Identity[];
  readonly recoverers?: readonly Identity[];
  readonly clock?: Clock;
  /** Defaults to an in-memory transport that records transfers */
  readonly transport?: FundsTransport;
  readonly logger?: Logger;
}

export const TRIGGER_COORDINATOR_IDENTITY = "trigger-coordinator";
export const SUNSET_COORDINATOR_IDENTITY = "sunset-coordinator";

// =============================================================================
// Service
// =============================================================================

export class AfterwordService {
  readonly clock: Clock;
  readonly capabilities: CapabilityTable;
  readonly eventStore: InMemoryEventStore;
  readonly audit: AuditEmitter;
  readonly intents: IntentLedger;
  readonly oracles: InMemoryOracleAggregator;
  readonly triggers: TriggerCoordinator;
  readonly resolution: ResolutionEngine;
  readonly transport: FundsTransport;
  readonly execution: ExecutionEngine;
  readonly sunset: SunsetCoordinator;

  private _ready = false;

  constructor(config: AfterwordServiceConfig) {
    const clock = config.clock ?? systemClock;
    const logger = config.logger ?? pino({ level: "silent" });
    const sunsetOperators = config.sunsetOperators ?? [];

    this.clock = clock;
    this.capabilities = new CapabilityTable(config.admin, {
      "intent.trigger": [TRIGGER_COORDINATOR_IDENTITY],
      "resolution.index": [...(config.indexers ?? []), SUNSET_COORDINATOR_IDENTITY],
      "execution.execute": [...(config.executors ?? [])],
      "execution.sunset": [...sunsetOperators, SUNSET_COORDINATOR_IDENTITY],
      "execution.recover": [...(config.recoverers ?? [])],
      "sunset.operate": [...sunsetOperators],
    });

    this.eventStore = new InMemoryEventStore();
    this.audit = new AuditEmitter({ store: this.eventStore, clock });
    const auditLog = logger.child({ component: "audit" });
    this.eventStore.onAppend((stored) => {
      auditLog.debug(
        { streamId: stored.streamId, type: stored.event.type, position: stored.globalPosition },
        "audit event",
      );
    });

    const shared = { capabilities: this.capabilities, clock, audit: this.audit };

    this.intents = new IntentLedger(shared);
    this.oracles = new InMemoryOracleAggregator();
    this.triggers = new TriggerCoordinator({
      intents: this.intents,
      oracles: this.oracles,
      identity: TRIGGER_COORDINATOR_IDENTITY,
      clock,
      audit: this.audit,
      logger,
    });
    this.resolution = new ResolutionEngine(shared);
    this.transport = config.transport ?? new InMemoryFundsTransport();
    this.execution = new ExecutionEngine({
      ...shared,
      intents: this.intents,
      resolver: this.resolution,
      transport: this.transport,
      logger,
    });
    this.sunset = new SunsetCoordinator({
      ...shared,
      execution: this.execution,
      clusters: this.resolution,
      identity: SUNSET_COORDINATOR_IDENTITY,
      logger,
    });

    this._ready = true;
  }

  isReady(): boolean {
    return this._ready;
  }

  // ─── Audit Log ───────────────────────────────────────────────────

  verifyAuditLog(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }
}
