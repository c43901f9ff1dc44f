/**
 * Resolution types.
 *
 * Resolution is advisory: it answers "which citation best supports this
 * query, and how confident is that answer?" and never changes execution
 * state itself.
 */

import type { Digest, Principal, StorageUri } from "@afterword/types";

export interface CorpusRecord {
  readonly principal: Principal;
  readonly corpusDigest: Digest;
  readonly storageUri: StorageUri;
  readonly window: {
    readonly startYear: number;
    readonly endYear: number;
  };
  /** Always true once a record exists; freezing is one-way */
  readonly frozen: true;
  readonly frozenAt: number;
}

export interface IndexEntry {
  readonly keyword: string;
  readonly citations: readonly string[];
  /** 0-100, index-aligned with `citations` */
  readonly scores: readonly number[];
  readonly updatedAt: number;
}

export interface ResolutionCacheEntry {
  readonly query: string;
  /** Sorted by confidence descending; ties keep submission order */
  readonly citations: readonly string[];
  readonly confidences: readonly number[];
  readonly resolvedAt: number;
}

export interface Resolution {
  readonly citation: string;
  readonly confidence: number;
}

export interface TopKResult {
  readonly citations: readonly string[];
  readonly confidences: readonly number[];
}

export interface IndexBatchItem {
  readonly keyword: string;
  readonly citations: readonly string[];
  readonly scores: readonly number[];
}

export interface ResolutionBatchItem {
  readonly query: string;
  readonly citations: readonly string[];
  readonly confidences: readonly number[];
}

export interface LegacyCluster {
  readonly clusterId: string;
  readonly description: string;
  readonly members: readonly Principal[];
  readonly createdAt: number;
}

/**
 * The read side the execution engine consumes.
 */
export interface CorpusResolver {
  resolve(principal: Principal, query: string, expectedCorpusDigest: Digest): Resolution;
}

/**
 * The cluster assignment the sunset coordinator consumes.
 */
export interface LegacyClusterRegistry {
  assignLegacyToCluster(caller: string, principal: Principal, clusterId: string): void;
  getLegacyCluster(principal: Principal): string | undefined;
}
