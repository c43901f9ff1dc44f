import type { DomainEvent, EventSource } from "@afterword/types";
import type { EventStore } from "../src/types.js";

let seq = 0;

export function makeEvent(
  type: string,
  principal = "alice",
  source: EventSource = "execution",
  payload: Record<string, unknown> = {},
): DomainEvent {
  seq += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${seq}`,
      timestamp: "2030-01-01T00:00:00.000Z",
      actor: "tester",
      correlationId: principal,
      source,
    },
    payload: { principal, at: 0, ...payload },
  };
}

export function makeEvents(count: number): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`Event${i + 1}`));
}

/** Append events one by one to a single stream. */
export function appendAll(
  store: EventStore,
  streamId: string,
  events: readonly DomainEvent[],
): void {
  for (const event of events) {
    store.append(streamId, event);
  }
}
