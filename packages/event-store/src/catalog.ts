/**
 * @afterword/event-store — Event Catalog.
 *
 * Every audit event type is registered here with:
 * - the component that emits it
 * - a schema version
 * - a runtime payload check
 *
 * The AuditEmitter refuses to append an event whose type is unknown,
 * whose source does not match, or whose payload fails its check.
 */

import type { EventSource } from "@afterword/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "IntentCaptured") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  /** Human-readable description of this event */
  readonly description: string;

  /** Which component emits this event */
  readonly source: EventSource;

  /**
   * Returns true if the payload is valid for this version.
   */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Centralized registry of audit event types.
 *
 * ```ts
 * const catalog = new EventCatalog();
 *
 * catalog.register({
 *   type: "IntentRevoked",
 *   version: 1,
 *   description: "A principal revoked their intent",
 *   source: "intent-ledger",
 *   validate: (p) => isRecord(p) && typeof p.principal === "string",
 * });
 * ```
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   *
   * Re-registering the same version is a no-op; a different version
   * replaces the schema.
   *
   * @throws CatalogError if the version is not a positive integer
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer, got ${schema.version}`,
      );
    }

    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && existing.version === schema.version) {
      return;
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  /**
   * List all registered event types, sorted.
   */
  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * @returns true if valid, false if invalid or unregistered
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    if (schema === undefined) {
      return false;
    }
    return schema.validate(payload);
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
