/**
 * Trigger types.
 *
 * A principal's trigger is one of three modes. The variant is replaced
 * wholesale on reconfiguration, which discards any partial progress
 * (check-ins, signatures, aggregation reference).
 */

import type { Digest, Identity, Principal } from "@afterword/types";

export type TriggerMode = "deadman" | "quorum" | "oracle-consensus";

export type TriggerStatus = "unconfigured" | "configured" | "triggered";

export interface DeadmanConfig {
  readonly mode: "deadman";
  /** Seconds of silence after which the trigger may fire */
  readonly interval: number;
  readonly lastCheckIn: number;
}

export interface QuorumConfig {
  readonly mode: "quorum";
  readonly signers: readonly Identity[];
  readonly required: number;
  /** Signers that have signed, in arrival order */
  readonly signed: readonly Identity[];
}

export interface OracleConsensusConfig {
  readonly mode: "oracle-consensus";
  readonly oracles: readonly Identity[];
  readonly requiredOracles: number;
  readonly eventType: string;
  readonly dataDigest: Digest;
  /** Reference returned by the consensus provider */
  readonly aggregationRef: string;
}

export type TriggerConfig = DeadmanConfig | QuorumConfig | OracleConsensusConfig;

export interface TriggerState {
  readonly status: TriggerStatus;
  readonly config?: TriggerConfig;
  readonly triggeredAt?: number;
}

export interface OracleConsensusInput {
  readonly oracles: readonly Identity[];
  readonly requiredOracles: number;
  readonly eventType: string;
  readonly dataDigest: Digest;
}

// =============================================================================
// Oracle consensus port
// =============================================================================

export interface VerificationRequest {
  readonly principal: Principal;
  readonly oracles: readonly Identity[];
  readonly requiredCount: number;
  readonly eventType: string;
  readonly dataDigest: Digest;
}

export interface OracleReport {
  readonly isValid: boolean;
  /** 0-100 */
  readonly confidence: number;
}

export interface AggregationResult {
  readonly finalized: boolean;
  readonly isValid: boolean;
  readonly confidence: number;
  readonly reportCount: number;
}

/**
 * Something that collects independent oracle reports about an event
 * and aggregates them into one verdict.
 */
export interface OracleConsensusProvider {
  /** Open an aggregation; resolves to its reference */
  requestVerification(request: VerificationRequest): Promise<string>;

  /** Current aggregation state, or undefined for an unknown reference */
  getResult(aggregationRef: string): Promise<AggregationResult | undefined>;
}
