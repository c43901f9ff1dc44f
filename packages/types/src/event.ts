/**
 * Event Types
 *
 * Every state change in a core component is recorded as a DomainEvent
 * in the audit log.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - Append only: no UPDATE, no DELETE
 */

/**
 * The components that emit audit events.
 */
export type EventSource =
  | "intent-ledger"
  | "trigger"
  | "resolution"
  | "execution"
  | "sunset";

export const EVENT_SOURCES: readonly EventSource[] = [
  "intent-ledger",
  "trigger",
  "resolution",
  "execution",
  "sunset",
];

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping related events; the principal's id by default */
  readonly correlationId: string;

  /** Which component emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "IntentCaptured") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by the catalog) */
  readonly payload: Readonly<Record<string, unknown>>;
}
