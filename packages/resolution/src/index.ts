/**
 * @afterword/resolution — Confidence-scored lookups against a frozen corpus.
 *
 * @packageDocumentation
 */

export type {
  CorpusRecord,
  IndexEntry,
  ResolutionCacheEntry,
  Resolution,
  TopKResult,
  IndexBatchItem,
  ResolutionBatchItem,
  LegacyCluster,
  CorpusResolver,
  LegacyClusterRegistry,
} from "./types.js";

export type { ResolutionEngineOptions } from "./resolution-engine.js";
export { ResolutionEngine } from "./resolution-engine.js";
