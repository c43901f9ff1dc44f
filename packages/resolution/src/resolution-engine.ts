/**
 * Resolution Engine — confidence-scored lookups against a frozen corpus.
 *
 * Rules:
 * - A principal's corpus is frozen once and never changes
 * - Lookups hard-fail when the caller's corpus digest differs from the
 *   frozen one (or nothing is frozen); silence is never a match
 * - The resolution cache wins over the keyword index
 * - Among equal confidences the first-seen citation wins
 * - Mutations require `resolution.index`; lookups are open
 * - Batches validate every item before writing any
 */

import type {
  CapabilityTable,
  Clock,
  Digest,
  Identity,
  Principal,
} from "@afterword/types";
import {
  MAX_CITATIONS_PER_INDEX,
  MAX_CONFIDENCE,
  MAX_INDEX_BATCH,
  MAX_RESOLUTION_BATCH,
  MAX_TOPK_RESULTS,
  PreconditionViolation,
  isDigest,
  isIntInRange,
  isNonEmptyString,
  systemClock,
} from "@afterword/types";
import { AuditEmitter } from "@afterword/event-store";
import type {
  CorpusRecord,
  CorpusResolver,
  IndexBatchItem,
  IndexEntry,
  LegacyCluster,
  LegacyClusterRegistry,
  Resolution,
  ResolutionBatchItem,
  ResolutionCacheEntry,
  TopKResult,
} from "./types.js";

export interface ResolutionEngineOptions {
  readonly capabilities: CapabilityTable;
  readonly clock?: Clock;
  readonly audit?: AuditEmitter;
}

const NO_RESOLUTION: Resolution = { citation: "", confidence: 0 };

export class ResolutionEngine implements CorpusResolver, LegacyClusterRegistry {
  private readonly corpora = new Map<Principal, CorpusRecord>();
  private readonly indexes = new Map<Principal, Map<string, IndexEntry>>();
  private readonly cache = new Map<Principal, Map<string, ResolutionCacheEntry>>();
  private readonly clusters = new Map<string, LegacyCluster>();
  private readonly legacyClusters = new Map<Principal, string>();
  private readonly capabilities: CapabilityTable;
  private readonly clock: Clock;
  private readonly audit: AuditEmitter;

  constructor(options: ResolutionEngineOptions) {
    this.capabilities = options.capabilities;
    this.clock = options.clock ?? systemClock;
    this.audit = options.audit ?? new AuditEmitter({ clock: this.clock });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Corpus
  // ───────────────────────────────────────────────────────────────────────

  freezeCorpus(
    caller: Identity,
    principal: Principal,
    corpusDigest: Digest,
    storageUri: string,
    windowStart: number,
    windowEnd: number,
  ): CorpusRecord {
    this.capabilities.assert("resolution.index", caller);
    if (!isNonEmptyString(principal)) {
      throw new PreconditionViolation("INVALID_INPUT", "Principal must be non-empty");
    }
    if (this.corpora.has(principal)) {
      throw new PreconditionViolation("CORPUS_ALREADY_FROZEN", `Corpus for "${principal}" is already frozen`);
    }
    if (!isDigest(corpusDigest)) {
      throw new PreconditionViolation("INVALID_INPUT", "Corpus digest must be a SHA-256 hex digest");
    }
    if (!isNonEmptyString(storageUri)) {
      throw new PreconditionViolation("INVALID_INPUT", "Storage URI must be non-empty");
    }
    if (!Number.isInteger(windowStart) || !Number.isInteger(windowEnd) || windowEnd <= windowStart) {
      throw new PreconditionViolation("INVALID_INPUT", "Corpus window end must be after its start");
    }

    const now = this.clock.now();
    const record: CorpusRecord = {
      principal,
      corpusDigest,
      storageUri,
      window: { startYear: windowStart, endYear: windowEnd },
      frozen: true,
      frozenAt: now,
    };
    this.corpora.set(principal, record);
    this.audit.emit("resolution", caller, "CorpusFrozen", {
      principal,
      at: now,
      corpusDigest,
      storageUri,
      windowStart,
      windowEnd,
    });
    return record;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Keyword index
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Write (or overwrite) one keyword's citations and scores.
   */
  createIndex(
    caller: Identity,
    principal: Principal,
    keyword: string,
    citations: readonly string[],
    scores: readonly number[],
  ): IndexEntry {
    return this.createIndexBatch(caller, principal, [{ keyword, citations, scores }])[0]!;
  }

  createIndexBatch(
    caller: Identity,
    principal: Principal,
    items: readonly IndexBatchItem[],
  ): readonly IndexEntry[] {
    this.capabilities.assert("resolution.index", caller);
    this.requireFrozen(principal);
    if (items.length === 0 || items.length > MAX_INDEX_BATCH) {
      throw new PreconditionViolation(
        items.length === 0 ? "INVALID_INPUT" : "LIMIT_EXCEEDED",
        `Index batch must hold 1-${MAX_INDEX_BATCH} keywords, got ${items.length}`,
      );
    }
    for (const item of items) {
      validateIndexItem(item);
    }

    const now = this.clock.now();
    const index = this.indexFor(principal);
    const written = items.map((item): IndexEntry => {
      const entry: IndexEntry = {
        keyword: item.keyword,
        citations: [...item.citations],
        scores: [...item.scores],
        updatedAt: now,
      };
      index.set(item.keyword, entry);
      this.audit.emit("resolution", caller, "IndexCreated", {
        principal,
        at: now,
        keyword: item.keyword,
        citationCount: entry.citations.length,
      });
      return entry;
    });
    return written;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Resolution cache
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Cache ranked results for a query. Stored sorted by confidence,
   * highest first, ties in submission order.
   */
  submitResolution(
    caller: Identity,
    principal: Principal,
    query: string,
    citations: readonly string[],
    confidences: readonly number[],
  ): ResolutionCacheEntry {
    return this.submitResolutionBatch(caller, principal, [{ query, citations, confidences }])[0]!;
  }

  submitResolutionBatch(
    caller: Identity,
    principal: Principal,
    items: readonly ResolutionBatchItem[],
  ): readonly ResolutionCacheEntry[] {
    this.capabilities.assert("resolution.index", caller);
    this.requireFrozen(principal);
    if (items.length === 0 || items.length > MAX_RESOLUTION_BATCH) {
      throw new PreconditionViolation(
        items.length === 0 ? "INVALID_INPUT" : "LIMIT_EXCEEDED",
        `Resolution batch must hold 1-${MAX_RESOLUTION_BATCH} queries, got ${items.length}`,
      );
    }
    for (const item of items) {
      validateResolutionItem(item);
    }

    const now = this.clock.now();
    const cache = this.cacheFor(principal);
    return items.map((item): ResolutionCacheEntry => {
      const ranked = rank(item.citations, item.confidences);
      const entry: ResolutionCacheEntry = {
        query: item.query,
        citations: ranked.citations,
        confidences: ranked.confidences,
        resolvedAt: now,
      };
      cache.set(item.query, entry);
      this.audit.emit("resolution", caller, "ResolutionSubmitted", {
        principal,
        at: now,
        query: item.query,
        citationCount: entry.citations.length,
        topConfidence: entry.confidences[0] ?? 0,
      });
      return entry;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lookups
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Best citation for a query.
   *
   * @throws PreconditionViolation CORPUS_DIGEST_MISMATCH
   */
  resolve(principal: Principal, query: string, expectedCorpusDigest: Digest): Resolution {
    this.requireDigest(principal, expectedCorpusDigest);

    const cached = this.cache.get(principal)?.get(query);
    if (cached !== undefined) {
      return {
        citation: cached.citations[0] ?? "",
        confidence: cached.confidences[0] ?? 0,
      };
    }

    const entry = this.indexes.get(principal)?.get(query);
    if (entry === undefined) {
      return NO_RESOLUTION;
    }
    let best = NO_RESOLUTION;
    for (let i = 0; i < entry.citations.length; i++) {
      const score = entry.scores[i]!;
      if (score > best.confidence) {
        best = { citation: entry.citations[i]!, confidence: score };
      }
    }
    return best;
  }

  /**
   * Up to `k` citations, highest confidence first.
   */
  resolveTopK(
    principal: Principal,
    query: string,
    expectedCorpusDigest: Digest,
    k: number,
  ): TopKResult {
    if (!isIntInRange(k, 1, MAX_TOPK_RESULTS)) {
      throw new PreconditionViolation("INVALID_INPUT", `k must be in [1, ${MAX_TOPK_RESULTS}], got ${k}`);
    }
    this.requireDigest(principal, expectedCorpusDigest);

    const source = this.rankedFor(principal, query);
    if (source === undefined) {
      return { citations: [], confidences: [] };
    }
    return {
      citations: source.citations.slice(0, k),
      confidences: source.confidences.slice(0, k),
    };
  }

  resolveBatch(
    principal: Principal,
    queries: readonly string[],
    expectedCorpusDigest: Digest,
  ): readonly Resolution[] {
    if (queries.length > MAX_RESOLUTION_BATCH) {
      throw new PreconditionViolation(
        "LIMIT_EXCEEDED",
        `At most ${MAX_RESOLUTION_BATCH} queries per batch, got ${queries.length}`,
      );
    }
    this.requireDigest(principal, expectedCorpusDigest);
    return queries.map((q) => this.resolve(principal, q, expectedCorpusDigest));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Legacy clusters
  // ───────────────────────────────────────────────────────────────────────

  createCluster(caller: Identity, clusterId: string, description: string): LegacyCluster {
    this.capabilities.assert("resolution.index", caller);
    if (!isNonEmptyString(clusterId)) {
      throw new PreconditionViolation("INVALID_INPUT", "Cluster id must be non-empty");
    }
    if (this.clusters.has(clusterId)) {
      throw new PreconditionViolation("CLUSTER_EXISTS", `Cluster "${clusterId}" already exists`);
    }
    const cluster: LegacyCluster = {
      clusterId,
      description,
      members: [],
      createdAt: this.clock.now(),
    };
    this.clusters.set(clusterId, cluster);
    return cluster;
  }

  /**
   * Put a principal's legacy in a cluster. A legacy belongs to at most
   * one cluster; reassigning moves it.
   */
  assignLegacyToCluster(caller: Identity, principal: Principal, clusterId: string): void {
    this.capabilities.assert("resolution.index", caller);
    this.requireFrozen(principal);
    const cluster = this.clusters.get(clusterId);
    if (cluster === undefined) {
      throw new PreconditionViolation("CLUSTER_NOT_FOUND", `Cluster "${clusterId}" does not exist`);
    }

    const previousId = this.legacyClusters.get(principal);
    if (previousId === clusterId) {
      return;
    }
    if (previousId !== undefined) {
      const previous = this.clusters.get(previousId);
      if (previous !== undefined) {
        this.clusters.set(previousId, {
          ...previous,
          members: previous.members.filter((m) => m !== principal),
        });
      }
    }

    this.clusters.set(clusterId, { ...cluster, members: [...cluster.members, principal] });
    this.legacyClusters.set(principal, clusterId);
    this.audit.emit("resolution", caller, "LegacyClustered", {
      principal,
      at: this.clock.now(),
      clusterId,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getCorpus(principal: Principal): CorpusRecord | undefined {
    return this.corpora.get(principal);
  }

  isCorpusFrozen(principal: Principal): boolean {
    return this.corpora.has(principal);
  }

  getIndex(principal: Principal, keyword: string): IndexEntry | undefined {
    return this.indexes.get(principal)?.get(keyword);
  }

  getResolution(principal: Principal, query: string): ResolutionCacheEntry | undefined {
    return this.cache.get(principal)?.get(query);
  }

  getCluster(clusterId: string): LegacyCluster | undefined {
    return this.clusters.get(clusterId);
  }

  getLegacyCluster(principal: Principal): string | undefined {
    return this.legacyClusters.get(principal);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private requireFrozen(principal: Principal): CorpusRecord {
    const corpus = this.corpora.get(principal);
    if (corpus === undefined) {
      throw new PreconditionViolation("CORPUS_NOT_FROZEN", `No frozen corpus for "${principal}"`);
    }
    return corpus;
  }

  private requireDigest(principal: Principal, expected: Digest): void {
    const corpus = this.corpora.get(principal);
    if (corpus === undefined || corpus.corpusDigest !== expected) {
      throw new PreconditionViolation(
        "CORPUS_DIGEST_MISMATCH",
        `Corpus digest mismatch for "${principal}"`,
      );
    }
  }

  /** Cached ranking, else the index entry ranked on the fly */
  private rankedFor(principal: Principal, query: string): TopKResult | undefined {
    const cached = this.cache.get(principal)?.get(query);
    if (cached !== undefined) {
      return cached;
    }
    const entry = this.indexes.get(principal)?.get(query);
    return entry === undefined ? undefined : rank(entry.citations, entry.scores);
  }

  private indexFor(principal: Principal): Map<string, IndexEntry> {
    let index = this.indexes.get(principal);
    if (index === undefined) {
      index = new Map();
      this.indexes.set(principal, index);
    }
    return index;
  }

  private cacheFor(principal: Principal): Map<string, ResolutionCacheEntry> {
    let cache = this.cache.get(principal);
    if (cache === undefined) {
      cache = new Map();
      this.cache.set(principal, cache);
    }
    return cache;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Sort citation/score pairs by score descending. Array#sort is stable,
 * so equal scores keep their input order.
 */
function rank(
  citations: readonly string[],
  scores: readonly number[],
): { citations: string[]; confidences: number[] } {
  const pairs = citations.map((citation, i) => ({ citation, score: scores[i]! }));
  pairs.sort((a, b) => b.score - a.score);
  return {
    citations: pairs.map((p) => p.citation),
    confidences: pairs.map((p) => p.score),
  };
}

function validateScores(scores: readonly number[], label: string): void {
  if (!scores.every((s) => isIntInRange(s, 0, MAX_CONFIDENCE))) {
    throw new PreconditionViolation("INVALID_INPUT", `${label} must be integers in [0, ${MAX_CONFIDENCE}]`);
  }
}

function validateIndexItem(item: IndexBatchItem): void {
  if (!isNonEmptyString(item.keyword)) {
    throw new PreconditionViolation("INVALID_INPUT", "Keyword must be non-empty");
  }
  if (item.citations.length !== item.scores.length) {
    throw new PreconditionViolation("INVALID_INPUT", `Array length mismatch for "${item.keyword}"`);
  }
  if (item.citations.length > MAX_CITATIONS_PER_INDEX) {
    throw new PreconditionViolation(
      "LIMIT_EXCEEDED",
      `At most ${MAX_CITATIONS_PER_INDEX} citations per keyword`,
    );
  }
  validateScores(item.scores, "Scores");
}

function validateResolutionItem(item: ResolutionBatchItem): void {
  if (!isNonEmptyString(item.query)) {
    throw new PreconditionViolation("INVALID_INPUT", "Query must be non-empty");
  }
  if (item.citations.length === 0) {
    throw new PreconditionViolation("INVALID_INPUT", `Empty resolution for "${item.query}"`);
  }
  if (item.citations.length !== item.confidences.length) {
    throw new PreconditionViolation("INVALID_INPUT", `Array length mismatch for "${item.query}"`);
  }
  if (item.citations.length > MAX_TOPK_RESULTS) {
    throw new PreconditionViolation(
      "LIMIT_EXCEEDED",
      `At most ${MAX_TOPK_RESULTS} results per query`,
    );
  }
  validateScores(item.confidences, "Confidences");
}
