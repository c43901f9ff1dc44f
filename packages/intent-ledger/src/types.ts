/**
 * Intent ledger types.
 */

import type { Digest, Principal, StorageUri } from "@afterword/types";

export interface CorpusWindow {
  /** First year of the corpus (inclusive) */
  readonly startYear: number;
  readonly endYear: number;
}

export interface Goal {
  readonly description: string;
  readonly constraintDigest: Digest;
  /** 1 (lowest) to 100 (highest) */
  readonly priority: number;
  readonly addedAt: number;
}

/**
 * A principal's pre-registered intent.
 *
 * `revoked` and `triggered` are terminal and mutually exclusive.
 * Once either is set the record never changes again.
 */
export interface IntentRecord {
  readonly principal: Principal;
  readonly intentDigest: Digest;
  readonly corpusDigest: Digest;
  readonly corpusUri: StorageUri;
  readonly assetsUri: StorageUri;
  readonly assetRefs: readonly string[];
  readonly corpusWindow: CorpusWindow;
  readonly goals: readonly Goal[];
  readonly signedVersions: readonly Digest[];
  readonly capturedAt: number;
  readonly revoked: boolean;
  readonly triggered: boolean;
  readonly triggeredAt?: number;
}

export interface CaptureInput {
  readonly intentDigest: Digest;
  readonly corpusDigest: Digest;
  readonly corpusUri: StorageUri;
  readonly assetsUri: StorageUri;
  readonly assetRefs: readonly string[];
  readonly windowStart: number;
  readonly windowEnd: number;
}

/**
 * The read side other components depend on.
 */
export interface TriggerStatusReader {
  isTriggered(principal: Principal): boolean;
}

/**
 * The write side the trigger coordinator depends on.
 */
export interface IntentTriggerPort {
  trigger(caller: string, principal: Principal): void;
}
