/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type. Schemas check
 * shape only; range and state rules stay with the domain components so
 * there is one source of truth for them.
 */

import { z } from "zod";
import type { EventSource } from "@afterword/types";
import { isEventSource } from "@afterword/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const DigestSchema = z.string().regex(/^[0-9a-f]{64}$/, "Expected a lowercase SHA-256 hex digest");

/** Non-negative integer amount as a decimal string, parsed to bigint */
export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Expected a decimal integer string")
  .transform((v) => BigInt(v));

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Intent DTOs
// =============================================================================

export const CaptureIntentSchema = z.object({
  intentDigest: DigestSchema,
  corpusDigest: DigestSchema,
  corpusUri: z.string().min(1),
  assetsUri: z.string().min(1),
  assetRefs: z.array(z.string()),
  windowStart: z.number().int(),
  windowEnd: z.number().int(),
});

export const AddGoalSchema = z.object({
  description: z.string().min(1),
  constraintDigest: DigestSchema,
  priority: z.number().int(),
});

export const SignVersionSchema = z.object({
  versionDigest: DigestSchema,
});

// =============================================================================
// Trigger DTOs
// =============================================================================

export const ConfigureDeadmanSchema = z.object({
  interval: z.number().int(),
});

export const ConfigureQuorumSchema = z.object({
  signers: z.array(z.string()),
  required: z.number().int(),
});

export const ConfigureOracleConsensusSchema = z.object({
  oracles: z.array(z.string()),
  requiredOracles: z.number().int(),
  eventType: z.string().min(1),
  dataDigest: DigestSchema,
});

export const OracleReportSchema = z.object({
  isValid: z.boolean(),
  confidence: z.number().int(),
});

// =============================================================================
// Resolution DTOs
// =============================================================================

export const FreezeCorpusSchema = z.object({
  corpusDigest: DigestSchema,
  storageUri: z.string().min(1),
  windowStart: z.number().int(),
  windowEnd: z.number().int(),
});

const IndexItemSchema = z.object({
  keyword: z.string().min(1),
  citations: z.array(z.string()),
  scores: z.array(z.number().int()),
});

export const CreateIndexSchema = IndexItemSchema;

export const CreateIndexBatchSchema = z.object({
  items: z.array(IndexItemSchema),
});

const ResolutionItemSchema = z.object({
  query: z.string().min(1),
  citations: z.array(z.string()),
  confidences: z.array(z.number().int()),
});

export const SubmitResolutionSchema = ResolutionItemSchema;

export const SubmitResolutionBatchSchema = z.object({
  items: z.array(ResolutionItemSchema),
});

export const ResolveSchema = z.object({
  query: z.string(),
  corpusDigest: DigestSchema,
});

export const ResolveTopKSchema = ResolveSchema.extend({
  k: z.number().int(),
});

export const ResolveBatchSchema = z.object({
  queries: z.array(z.string()),
  corpusDigest: DigestSchema,
});

export const CreateClusterSchema = z.object({
  clusterId: z.string().min(1),
  description: z.string(),
});

// =============================================================================
// Execution DTOs
// =============================================================================

export const ProposeActionSchema = z.object({
  action: z.string(),
  query: z.string(),
  corpusDigest: DigestSchema,
});

export const PayoutSchema = z.object({
  recipient: z.string().min(1),
  amount: AmountSchema,
  description: z.string(),
  corpusDigest: DigestSchema,
});

export const IssueLicenseSchema = z.object({
  licensee: z.string().min(1),
  assetRef: z.string().min(1),
  royaltyBasisPoints: z.number().int(),
  durationSeconds: z.number().int(),
  corpusDigest: DigestSchema,
});

export const DepositSchema = z.object({
  amount: AmountSchema,
});

export const RecoverFundsSchema = z.object({
  recipient: z.string().min(1),
});

// =============================================================================
// Sunset DTOs
// =============================================================================

export const ArchiveAssetsSchema = z.object({
  archives: z.array(z.string()),
});

export const TransitionIPSchema = z.object({
  license: z.string(),
});

export const ClusterLegacySchema = z.object({
  clusterId: z.string().min(1),
});

// =============================================================================
// Event Queries
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  source: z.custom<EventSource>(isEventSource, "Unknown event source").optional(),
});

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

// =============================================================================
// Derived Types
// =============================================================================

export type CaptureIntentDto = z.infer<typeof CaptureIntentSchema>;
export type AddGoalDto = z.infer<typeof AddGoalSchema>;
export type ConfigureQuorumDto = z.infer<typeof ConfigureQuorumSchema>;
export type ConfigureOracleConsensusDto = z.infer<typeof ConfigureOracleConsensusSchema>;
export type PayoutDto = z.infer<typeof PayoutSchema>;
export type IssueLicenseDto = z.infer<typeof IssueLicenseSchema>;
export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;
