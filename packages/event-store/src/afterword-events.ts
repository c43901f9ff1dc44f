/**
 * @afterword/event-store — Audit event definitions.
 *
 * The catalog of every event the core components record.
 *
 * Each event type defines:
 * - A payload interface (what data the event carries)
 * - A schema registration (type + version + validation)
 *
 * Every payload names its principal and carries `at`, the unix-seconds
 * time read from the emitting component's clock. Amounts are decimal
 * strings so payloads stay JSON-canonicalizable.
 */

import type { EventSource } from "@afterword/types";
import { isRecord } from "@afterword/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

/**
 * Fields every audit payload carries.
 */
export interface AuditPayload {
  readonly principal: string;
  readonly at: number;
  readonly [key: string]: unknown;
}

// =============================================================================
// Intent Ledger Events
// =============================================================================

export interface IntentCapturedPayload extends AuditPayload {
  readonly intentDigest: string;
  readonly corpusDigest: string;
  readonly assetCount: number;
  readonly windowStart: number;
  readonly windowEnd: number;
}

export interface GoalAddedPayload extends AuditPayload {
  readonly goalIndex: number;
  readonly constraintDigest: string;
  readonly priority: number;
}

export interface VersionSignedPayload extends AuditPayload {
  readonly versionDigest: string;
}

export type IntentRevokedPayload = AuditPayload;

export interface IntentTriggeredPayload extends AuditPayload {
  readonly triggeredBy: string;
}

// =============================================================================
// Trigger Events
// =============================================================================

export interface TriggerConfiguredPayload extends AuditPayload {
  readonly mode: "deadman" | "quorum" | "oracle-consensus";
}

export type DeadmanCheckInPayload = AuditPayload;

export interface SignatureReceivedPayload extends AuditPayload {
  readonly signer: string;
  readonly signatureCount: number;
  readonly required: number;
}

// =============================================================================
// Resolution Events
// =============================================================================

export interface CorpusFrozenPayload extends AuditPayload {
  readonly corpusDigest: string;
  readonly storageUri: string;
  readonly windowStart: number;
  readonly windowEnd: number;
}

export interface IndexCreatedPayload extends AuditPayload {
  readonly keyword: string;
  readonly citationCount: number;
}

export interface ResolutionSubmittedPayload extends AuditPayload {
  readonly query: string;
  readonly citationCount: number;
  readonly topConfidence: number;
}

export interface LegacyClusteredPayload extends AuditPayload {
  readonly clusterId: string;
}

// =============================================================================
// Execution Events
// =============================================================================

export type ExecutionActivatedPayload = AuditPayload;

export interface ActionExecutedPayload extends AuditPayload {
  readonly action: string;
  readonly query: string;
  readonly citation: string;
  readonly confidence: number;
  readonly decisionDigest: string;
}

export interface InactionDefaultPayload extends AuditPayload {
  readonly action: string;
  readonly query: string;
  readonly confidence: number;
}

export interface PoliticalActionBlockedPayload extends AuditPayload {
  readonly actionDigest: string;
  readonly layer: string;
}

export interface TreasuryDepositedPayload extends AuditPayload {
  readonly amount: string;
  readonly balance: string;
}

export interface ProjectFundedPayload extends AuditPayload {
  readonly recipient: string;
  readonly amount: string;
  readonly description: string;
}

export type RevenueDistributedPayload = ProjectFundedPayload;

export interface LicenseIssuedPayload extends AuditPayload {
  readonly licensee: string;
  readonly assetRef: string;
  readonly royaltyBasisPoints: number;
  readonly endsAt: number;
}

export interface SunsetActivatedPayload extends AuditPayload {
  readonly emergency: boolean;
}

export interface EmergencyFundsRecoveredPayload extends AuditPayload {
  readonly recipient: string;
  readonly amount: string;
}

// =============================================================================
// Sunset Events
// =============================================================================

export type SunsetInitiatedPayload = AuditPayload;

export interface AssetsArchivedPayload extends AuditPayload {
  readonly archiveCount: number;
}

export interface IPTransitionedPayload extends AuditPayload {
  readonly license: string;
}

export type SunsetCompletedPayload = AuditPayload;

// =============================================================================
// Event Type Constants
// =============================================================================

/**
 * All audit event types as constants.
 * Use these instead of string literals for type safety.
 */
export const AFTERWORD_EVENTS = {
  // Intent ledger
  INTENT_CAPTURED: "IntentCaptured",
  GOAL_ADDED: "GoalAdded",
  VERSION_SIGNED: "VersionSigned",
  INTENT_REVOKED: "IntentRevoked",
  INTENT_TRIGGERED: "IntentTriggered",

  // Trigger
  TRIGGER_CONFIGURED: "TriggerConfigured",
  DEADMAN_CHECK_IN: "DeadmanCheckIn",
  SIGNATURE_RECEIVED: "SignatureReceived",

  // Resolution
  CORPUS_FROZEN: "CorpusFrozen",
  INDEX_CREATED: "IndexCreated",
  RESOLUTION_SUBMITTED: "ResolutionSubmitted",
  LEGACY_CLUSTERED: "LegacyClustered",

  // Execution
  EXECUTION_ACTIVATED: "ExecutionActivated",
  ACTION_EXECUTED: "ActionExecuted",
  INACTION_DEFAULT: "InactionDefault",
  POLITICAL_ACTION_BLOCKED: "PoliticalActionBlocked",
  TREASURY_DEPOSITED: "TreasuryDeposited",
  PROJECT_FUNDED: "ProjectFunded",
  REVENUE_DISTRIBUTED: "RevenueDistributed",
  LICENSE_ISSUED: "LicenseIssued",
  SUNSET_ACTIVATED: "SunsetActivated",
  EMERGENCY_FUNDS_RECOVERED: "EmergencyFundsRecovered",

  // Sunset
  SUNSET_INITIATED: "SunsetInitiated",
  ASSETS_ARCHIVED: "AssetsArchived",
  IP_TRANSITIONED: "IPTransitioned",
  SUNSET_COMPLETED: "SunsetCompleted",
} as const;

export type AfterwordEventType =
  (typeof AFTERWORD_EVENTS)[keyof typeof AFTERWORD_EVENTS];

/**
 * Payload shape for each event type.
 */
export interface AfterwordEventPayloads {
  IntentCaptured: IntentCapturedPayload;
  GoalAdded: GoalAddedPayload;
  VersionSigned: VersionSignedPayload;
  IntentRevoked: IntentRevokedPayload;
  IntentTriggered: IntentTriggeredPayload;
  TriggerConfigured: TriggerConfiguredPayload;
  DeadmanCheckIn: DeadmanCheckInPayload;
  SignatureReceived: SignatureReceivedPayload;
  CorpusFrozen: CorpusFrozenPayload;
  IndexCreated: IndexCreatedPayload;
  ResolutionSubmitted: ResolutionSubmittedPayload;
  LegacyClustered: LegacyClusteredPayload;
  ExecutionActivated: ExecutionActivatedPayload;
  ActionExecuted: ActionExecutedPayload;
  InactionDefault: InactionDefaultPayload;
  PoliticalActionBlocked: PoliticalActionBlockedPayload;
  TreasuryDeposited: TreasuryDepositedPayload;
  ProjectFunded: ProjectFundedPayload;
  RevenueDistributed: RevenueDistributedPayload;
  LicenseIssued: LicenseIssuedPayload;
  SunsetActivated: SunsetActivatedPayload;
  EmergencyFundsRecovered: EmergencyFundsRecoveredPayload;
  SunsetInitiated: SunsetInitiatedPayload;
  AssetsArchived: AssetsArchivedPayload;
  IPTransitioned: IPTransitionedPayload;
  SunsetCompleted: SunsetCompletedPayload;
}

// =============================================================================
// Schema Definitions
// =============================================================================

type FieldKind = "string" | "number" | "boolean";

/**
 * Build a validator that requires `principal`, `at` and the given fields.
 */
function fields(spec: Readonly<Record<string, FieldKind>>): (p: unknown) => boolean {
  return (p) => {
    if (!isRecord(p)) return false;
    if (typeof p.principal !== "string" || p.principal.length === 0) return false;
    if (typeof p.at !== "number" || !Number.isInteger(p.at)) return false;
    return Object.entries(spec).every(([key, kind]) => typeof p[key] === kind);
  };
}

const DECIMAL = /^\d+$/;

function amountFields(spec: Readonly<Record<string, FieldKind>>): (p: unknown) => boolean {
  const base = fields({ ...spec, amount: "string" });
  return (p) => base(p) && isRecord(p) && typeof p.amount === "string" && DECIMAL.test(p.amount);
}

function schema(
  type: AfterwordEventType,
  source: EventSource,
  description: string,
  validate: (p: unknown) => boolean,
): EventSchema {
  return { type, version: 1, description, source, validate };
}

const E = AFTERWORD_EVENTS;

const INTENT_SCHEMAS: readonly EventSchema[] = [
  schema(E.INTENT_CAPTURED, "intent-ledger", "A principal captured or refined their intent",
    fields({ intentDigest: "string", corpusDigest: "string", assetCount: "number", windowStart: "number", windowEnd: "number" })),
  schema(E.GOAL_ADDED, "intent-ledger", "A goal was appended to an intent",
    fields({ goalIndex: "number", constraintDigest: "string", priority: "number" })),
  schema(E.VERSION_SIGNED, "intent-ledger", "A version digest of the intent was signed",
    fields({ versionDigest: "string" })),
  schema(E.INTENT_REVOKED, "intent-ledger", "A principal revoked their intent", fields({})),
  schema(E.INTENT_TRIGGERED, "intent-ledger", "An intent was irreversibly triggered",
    fields({ triggeredBy: "string" })),
];

const TRIGGER_SCHEMAS: readonly EventSchema[] = [
  schema(E.TRIGGER_CONFIGURED, "trigger", "A trigger mode was configured or replaced",
    (p) => fields({ mode: "string" })(p) && isRecord(p) &&
      (p.mode === "deadman" || p.mode === "quorum" || p.mode === "oracle-consensus")),
  schema(E.DEADMAN_CHECK_IN, "trigger", "A principal checked in, resetting the deadman timer", fields({})),
  schema(E.SIGNATURE_RECEIVED, "trigger", "A trusted signer signed a quorum trigger",
    fields({ signer: "string", signatureCount: "number", required: "number" })),
];

const RESOLUTION_SCHEMAS: readonly EventSchema[] = [
  schema(E.CORPUS_FROZEN, "resolution", "A principal's corpus was frozen",
    fields({ corpusDigest: "string", storageUri: "string", windowStart: "number", windowEnd: "number" })),
  schema(E.INDEX_CREATED, "resolution", "A keyword index entry was written",
    fields({ keyword: "string", citationCount: "number" })),
  schema(E.RESOLUTION_SUBMITTED, "resolution", "Resolution results were cached for a query",
    fields({ query: "string", citationCount: "number", topConfidence: "number" })),
  schema(E.LEGACY_CLUSTERED, "resolution", "A sunset legacy was assigned to a cluster",
    fields({ clusterId: "string" })),
];

const EXECUTION_SCHEMAS: readonly EventSchema[] = [
  schema(E.EXECUTION_ACTIVATED, "execution", "The execution engine was activated", fields({})),
  schema(E.ACTION_EXECUTED, "execution", "An action cleared every gate and was logged",
    fields({ action: "string", query: "string", citation: "string", confidence: "number", decisionDigest: "string" })),
  schema(E.INACTION_DEFAULT, "execution", "Confidence fell below threshold; nothing was done",
    fields({ action: "string", query: "string", confidence: "number" })),
  schema(E.POLITICAL_ACTION_BLOCKED, "execution", "The prohibited-action filter rejected an action",
    fields({ actionDigest: "string", layer: "string" })),
  schema(E.TREASURY_DEPOSITED, "execution", "Funds were credited to the treasury",
    amountFields({ balance: "string" })),
  schema(E.PROJECT_FUNDED, "execution", "Treasury funds were sent to a project",
    amountFields({ recipient: "string", description: "string" })),
  schema(E.REVENUE_DISTRIBUTED, "execution", "Treasury revenue was distributed",
    amountFields({ recipient: "string", description: "string" })),
  schema(E.LICENSE_ISSUED, "execution", "An asset license was issued",
    fields({ licensee: "string", assetRef: "string", royaltyBasisPoints: "number", endsAt: "number" })),
  schema(E.SUNSET_ACTIVATED, "execution", "The execution engine entered sunset",
    fields({ emergency: "boolean" })),
  schema(E.EMERGENCY_FUNDS_RECOVERED, "execution", "Residual treasury funds were recovered after sunset",
    amountFields({ recipient: "string" })),
];

const SUNSET_SCHEMAS: readonly EventSchema[] = [
  schema(E.SUNSET_INITIATED, "sunset", "The sunset protocol was started", fields({})),
  schema(E.ASSETS_ARCHIVED, "sunset", "Asset archives were recorded",
    fields({ archiveCount: "number" })),
  schema(E.IP_TRANSITIONED, "sunset", "Intellectual property moved to its post-sunset license",
    fields({ license: "string" })),
  schema(E.SUNSET_COMPLETED, "sunset", "The sunset protocol completed", fields({})),
];

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an EventCatalog with every audit event registered at version 1.
 */
export function createAfterwordCatalog(): EventCatalog {
  const catalog = new EventCatalog();

  const allSchemas = [
    ...INTENT_SCHEMAS,
    ...TRIGGER_SCHEMAS,
    ...RESOLUTION_SCHEMAS,
    ...EXECUTION_SCHEMAS,
    ...SUNSET_SCHEMAS,
  ];

  for (const s of allSchemas) {
    catalog.register(s);
  }

  return catalog;
}
