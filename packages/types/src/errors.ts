/**
 * Error Taxonomy
 *
 * Three kinds of failure leave a core component:
 *
 * - PreconditionViolation: wrong state, unauthorized caller, malformed input
 * - PolicyRejection: the prohibited-action filter or length cap refused an action
 * - ExternalTransferFailure: the funds transport rejected a transfer
 *
 * Ambiguity is not an error. A decision below the confidence threshold
 * is a successful "inaction" result.
 *
 * Nothing inside the core retries.
 */

export type PreconditionCode =
  | "UNAUTHORIZED"
  | "INVALID_INPUT"
  | "LIMIT_EXCEEDED"
  // intent
  | "NOT_CAPTURED"
  | "ALREADY_REVOKED"
  | "ALREADY_TRIGGERED"
  // trigger
  | "NOT_CONFIGURED"
  | "WRONG_MODE"
  | "NOT_ELAPSED"
  | "NOT_SIGNER"
  | "ALREADY_SIGNED"
  | "UNKNOWN_AGGREGATION"
  | "NOT_ORACLE"
  | "ALREADY_REPORTED"
  | "ORACLE_NOT_FINALIZED"
  | "ORACLE_REJECTED"
  // resolution
  | "CORPUS_NOT_FROZEN"
  | "CORPUS_ALREADY_FROZEN"
  | "CORPUS_DIGEST_MISMATCH"
  | "CLUSTER_NOT_FOUND"
  | "CLUSTER_EXISTS"
  // execution
  | "NOT_TRIGGERED"
  | "ALREADY_ACTIVATED"
  | "NOT_ACTIVATED"
  | "NOT_ACTIVE"
  | "INSUFFICIENT_TREASURY"
  | "EMPTY_TREASURY"
  | "SUNSET_NOT_DUE"
  | "ALREADY_SUNSET"
  | "NOT_SUNSET"
  | "RECOVERY_NOT_DUE"
  | "OPERATION_IN_PROGRESS"
  // sunset
  | "SUNSET_NOT_INITIATED"
  | "STEP_OUT_OF_ORDER"
  | "STEP_ALREADY_DONE";

export type PolicyCode = "PROHIBITED_ACTION" | "ACTION_TOO_LONG";

export type TransferCode = "TRANSFER_FAILED";

export type CoreErrorCode = PreconditionCode | PolicyCode | TransferCode;

export class PreconditionViolation extends Error {
  constructor(
    public readonly code: PreconditionCode,
    message: string,
  ) {
    super(message);
    this.name = "PreconditionViolation";
  }
}

export class PolicyRejection extends Error {
  constructor(
    public readonly code: PolicyCode,
    message: string,
    /** The filter layer that matched, when the rejection came from the filter */
    public readonly layer?: string,
  ) {
    super(message);
    this.name = "PolicyRejection";
  }
}

export class ExternalTransferFailure extends Error {
  public readonly code: TransferCode = "TRANSFER_FAILED";

  constructor(
    message: string,
    public readonly recipient: string,
    public readonly amount: bigint,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "ExternalTransferFailure";
  }
}

export type CoreError =
  | PreconditionViolation
  | PolicyRejection
  | ExternalTransferFailure;

export function isCoreError(err: unknown): err is CoreError {
  return (
    err instanceof PreconditionViolation ||
    err instanceof PolicyRejection ||
    err instanceof ExternalTransferFailure
  );
}
