/**
 * Execution types.
 *
 * Amounts are bigint in the smallest unit of whatever the transport
 * moves. They cross the audit log and the HTTP surface as decimal strings.
 */

import type { Digest, Principal } from "@afterword/types";

export interface ExecutionLogEntry {
  readonly action: string;
  readonly query: string;
  readonly citation: string;
  /** Always >= CONFIDENCE_THRESHOLD; lower scores never reach the log */
  readonly confidence: number;
  readonly timestamp: number;
  /** sha256(JCS({action, citation, confidence})) */
  readonly decisionDigest: Digest;
}

export interface License {
  readonly licensee: string;
  readonly assetRef: string;
  readonly royaltyBasisPoints: number;
  readonly startsAt: number;
  readonly endsAt: number;
}

export interface FundedProject {
  readonly recipient: string;
  readonly amount: bigint;
  readonly description: string;
  readonly fundedAt: number;
}

export interface ExecutionState {
  readonly principal: Principal;
  /** Unset until `activate` succeeds */
  readonly activatedAt?: number;
  readonly sunset: boolean;
  readonly sunsetAt?: number;
  readonly treasury: bigint;
  readonly executionLog: readonly ExecutionLogEntry[];
  readonly licenses: readonly License[];
  readonly fundedProjects: readonly FundedProject[];
  readonly distributions: readonly FundedProject[];
}

/**
 * Result of a gated decision. Falling below the confidence threshold is
 * a successful outcome, not an error.
 */
export type Decision =
  | { readonly outcome: "executed"; readonly entry: ExecutionLogEntry }
  | { readonly outcome: "inaction"; readonly citation: string; readonly confidence: number };

/**
 * Moves value out of the treasury. Rejecting the returned promise
 * signals that nothing was sent.
 */
export interface FundsTransport {
  send(recipient: string, amount: bigint, memo: string): Promise<void>;
}

/**
 * What the sunset coordinator needs from the engine.
 */
export interface SunsetPort {
  activateSunset(caller: string, principal: Principal): void;
  emergencySunset(principal: Principal): void;
  isSunsetDue(principal: Principal): boolean;
  isSunset(principal: Principal): boolean;
}
