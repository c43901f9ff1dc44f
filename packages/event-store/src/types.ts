/**
 * @afterword/event-store — Core types.
 *
 * The audit log is a set of streams, one per (component, principal)
 * pair, threaded together by a single hash chain in append order.
 *
 * Records are never updated or removed. Within a stream, versions run
 * 1, 2, 3 without gaps; across the log, global positions do the same.
 */

import type { DomainEvent, EventMetadata, EventSource } from "@afterword/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * A domain event as committed to the log.
 */
export interface StoredEvent<TPayload = Record<string, unknown>> {
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<TPayload>;
  }>;

  /** "<source>:<principal>" */
  readonly streamId: string;

  /** 1-based position within the stream */
  readonly version: number;

  /** 1-based position in the whole log */
  readonly globalPosition: number;

  /** SHA-256 over the canonical record and `previousHash` */
  readonly hash: string;

  /** Hash of the record at globalPosition - 1, or GENESIS_HASH */
  readonly previousHash: string;
}

/** What the chain commits to. */
export type UnhashedStoredEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Reads
// =============================================================================

export interface StreamReadOptions {
  /** Only records with a version greater than this */
  readonly afterVersion?: number;
  readonly limit?: number;
}

export interface LogReadOptions {
  /** Only records with a global position greater than this */
  readonly afterPosition?: number;
  readonly limit?: number;
  /** Only records emitted by this component */
  readonly source?: EventSource;
}

/** Called once per committed record, in global order. */
export type AppendListener = (stored: StoredEvent) => void;

// =============================================================================
// Event Store Interface
// =============================================================================

export interface EventStore {
  /**
   * Commit one event at the end of a stream and of the chain.
   *
   * @throws EventStoreError INVALID_STREAM_ID
   */
  append(streamId: string, event: DomainEvent): StoredEvent;

  /** A stream's records, oldest first; empty for an unknown stream. */
  read(streamId: string, options?: StreamReadOptions): readonly StoredEvent[];

  /** The whole log in global order. */
  readAll(options?: LogReadOptions): readonly StoredEvent[];

  /** Version of the stream's last record, or 0. */
  streamVersion(streamId: string): number;

  /** Position of the last record in the log, or 0. */
  globalPosition(): number;

  /** Returns a function that removes the listener. */
  onAppend(listener: AppendListener): () => void;

  /** Recompute the hash chain over every record. */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  /** Global position of the offending record */
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "INVALID_POSITION"
  | "UNKNOWN_EVENT_TYPE"
  | "INVALID_PAYLOAD";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
