/**
 * @afterword/event-store — In-memory audit log.
 *
 * Everything lives in process memory and is gone on exit. Records are
 * kept once in the global log; each stream holds the same objects in
 * its own array for version-ordered reads.
 */

import type { DomainEvent } from "@afterword/types";
import type {
  AppendListener,
  EventStore,
  EventStoreIntegrityResult,
  LogReadOptions,
  StoredEvent,
  StreamReadOptions,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export class InMemoryEventStore implements EventStore {
  private readonly streams = new Map<string, StoredEvent[]>();
  private readonly log: StoredEvent[] = [];
  private readonly listeners = new Set<AppendListener>();
  private head: string = GENESIS_HASH;

  // ─── Write ──────────────────────────────────────────────────────────

  append(streamId: string, event: DomainEvent): StoredEvent {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }

    let stream = this.streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this.streams.set(streamId, stream);
    }

    const unhashed = {
      event: { type: event.type, metadata: event.metadata, payload: event.payload },
      streamId,
      version: stream.length + 1,
      globalPosition: this.log.length + 1,
    };
    const stored: StoredEvent = {
      ...unhashed,
      hash: computeEventHash(unhashed, this.head),
      previousHash: this.head,
    };

    this.head = stored.hash;
    stream.push(stored);
    this.log.push(stored);

    for (const listener of this.listeners) {
      listener(stored);
    }
    return stored;
  }

  onAppend(listener: AppendListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options: StreamReadOptions = {}): readonly StoredEvent[] {
    const after = checkedOffset(options.afterVersion, "afterVersion");
    const stream = this.streams.get(streamId) ?? [];
    // versions are 1-based and contiguous, so they double as indices
    return limited(stream.slice(after), options.limit);
  }

  readAll(options: LogReadOptions = {}): readonly StoredEvent[] {
    const after = checkedOffset(options.afterPosition, "afterPosition");
    const source = options.source;
    const tail = this.log.slice(after);
    return limited(
      source === undefined ? tail : tail.filter((e) => e.event.metadata.source === source),
      options.limit,
    );
  }

  streamVersion(streamId: string): number {
    return this.streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this.log.length;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this.log);
  }
}

function checkedOffset(value: number | undefined, name: string): number {
  if (value === undefined) return 0;
  if (!Number.isInteger(value) || value < 0) {
    throw new EventStoreError("INVALID_POSITION", `${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}

function limited(events: StoredEvent[], limit: number | undefined): readonly StoredEvent[] {
  return limit === undefined ? events : events.slice(0, Math.max(0, limit));
}
