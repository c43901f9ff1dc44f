/**
 * @afterword/event-store — Append-only audit persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a tamper-evident hash chain
 * - EventCatalog of every audit event type
 * - AuditEmitter, the validated write path used by the core components
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedStoredEvent,
  StreamReadOptions,
  LogReadOptions,
  AppendListener,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export {
  computeEventHash,
  verifyHashChain,
  canonicalDigest,
  GENESIS_HASH,
} from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Audit events
export { AFTERWORD_EVENTS, createAfterwordCatalog } from "./afterword-events.js";
export type {
  AfterwordEventType,
  AfterwordEventPayloads,
  AuditPayload,
  IntentCapturedPayload,
  GoalAddedPayload,
  VersionSignedPayload,
  IntentRevokedPayload,
  IntentTriggeredPayload,
  TriggerConfiguredPayload,
  DeadmanCheckInPayload,
  SignatureReceivedPayload,
  CorpusFrozenPayload,
  IndexCreatedPayload,
  ResolutionSubmittedPayload,
  LegacyClusteredPayload,
  ExecutionActivatedPayload,
  ActionExecutedPayload,
  InactionDefaultPayload,
  PoliticalActionBlockedPayload,
  TreasuryDepositedPayload,
  ProjectFundedPayload,
  RevenueDistributedPayload,
  LicenseIssuedPayload,
  SunsetActivatedPayload,
  EmergencyFundsRecoveredPayload,
  SunsetInitiatedPayload,
  AssetsArchivedPayload,
  IPTransitionedPayload,
  SunsetCompletedPayload,
} from "./afterword-events.js";

// Emitter
export type { AuditEmitterOptions } from "./audit-emitter.js";
export { AuditEmitter, streamIdFor } from "./audit-emitter.js";
