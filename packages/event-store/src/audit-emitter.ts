/**
 * @afterword/event-store — Audit emitter.
 *
 * The single write path from a core component into the audit log.
 * Each (component, principal) pair is its own stream:
 *
 *   "<source>:<principal>"   e.g. "execution:alice"
 *
 * Payloads are checked against the catalog before anything is appended,
 * so an invalid event never reaches the hash chain.
 */

import { randomUUID } from "node:crypto";
import type { Clock, EventSource, Identity, Principal } from "@afterword/types";
import { systemClock, toIsoTimestamp } from "@afterword/types";
import type { EventCatalog } from "./catalog.js";
import type { AfterwordEventPayloads, AfterwordEventType } from "./afterword-events.js";
import { createAfterwordCatalog } from "./afterword-events.js";
import { InMemoryEventStore } from "./in-memory-store.js";
import type { EventStore, StoredEvent } from "./types.js";
import { EventStoreError } from "./types.js";

export interface AuditEmitterOptions {
  readonly store?: EventStore;
  readonly catalog?: EventCatalog;
  readonly clock?: Clock;
}

export function streamIdFor(source: EventSource, principal: Principal): string {
  return `${source}:${principal}`;
}

export class AuditEmitter {
  readonly store: EventStore;
  readonly catalog: EventCatalog;
  private readonly clock: Clock;

  constructor(options: AuditEmitterOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.store = options.store ?? new InMemoryEventStore();
    this.catalog = options.catalog ?? createAfterwordCatalog();
  }

  /**
   * Validate and append one audit event.
   *
   * @throws EventStoreError UNKNOWN_EVENT_TYPE / INVALID_PAYLOAD
   */
  emit<T extends AfterwordEventType>(
    source: EventSource,
    actor: Identity,
    type: T,
    payload: AfterwordEventPayloads[T],
  ): StoredEvent {
    const schema = this.catalog.getSchema(type);
    if (schema === undefined) {
      throw new EventStoreError("UNKNOWN_EVENT_TYPE", `Unknown event type "${type}"`);
    }
    if (schema.source !== source) {
      throw new EventStoreError(
        "INVALID_PAYLOAD",
        `Event "${type}" belongs to "${schema.source}", not "${source}"`,
      );
    }
    if (!schema.validate(payload)) {
      throw new EventStoreError("INVALID_PAYLOAD", `Payload for "${type}" failed validation`);
    }

    return this.store.append(streamIdFor(source, payload.principal), {
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: toIsoTimestamp(this.clock.now()),
        actor,
        correlationId: payload.principal,
        source,
      },
      payload,
    });
  }

  /**
   * Every event a component recorded for a principal, oldest first.
   */
  history(source: EventSource, principal: Principal): readonly StoredEvent[] {
    return this.store.read(streamIdFor(source, principal));
  }

  /**
   * Event types a component recorded for a principal, oldest first.
   */
  typesFor(source: EventSource, principal: Principal): readonly string[] {
    return this.history(source, principal).map((e) => e.event.type);
  }
}
