/**
 * @afterword/types — Shared primitives for the Afterword stack.
 *
 * - Identities, digests and constants
 * - The injected Clock
 * - Capability-based authorization
 * - The error taxonomy
 * - Audit event shapes
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No third-party runtime dependencies
 */

export type { Principal, Identity, Digest, StorageUri } from "./primitives.js";
export { isDigest, sha256Hex } from "./primitives.js";

export type { Clock } from "./clock.js";
export { systemClock, ManualClock, toIsoTimestamp } from "./clock.js";

export * from "./constants.js";

export type { Capability, CapabilityGrants } from "./capabilities.js";
export { CapabilityTable, CAPABILITIES, isCapability } from "./capabilities.js";

export type {
  PreconditionCode,
  PolicyCode,
  TransferCode,
  CoreErrorCode,
  CoreError,
} from "./errors.js";
export {
  PreconditionViolation,
  PolicyRejection,
  ExternalTransferFailure,
  isCoreError,
} from "./errors.js";

export type { DomainEvent, EventMetadata, EventSource } from "./event.js";
export { EVENT_SOURCES } from "./event.js";

export {
  isRecord,
  isNonEmptyString,
  isStringArray,
  isIntInRange,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
