/**
 * Process-wide constants. None of these are configurable.
 */

export const DAY = 86_400;
export const YEAR = 365 * DAY;

// ─── Execution ───────────────────────────────────────────────────────

/** Lifetime of an activated execution engine */
export const FIXED_DURATION = 20 * YEAR;

export const CONFIDENCE_THRESHOLD = 95;

export const EMERGENCY_RECOVERY_DELAY = YEAR;

export const MAX_ACTION_LENGTH = 1000;

export const MAX_ROYALTY_BASIS_POINTS = 10_000;

// ─── Intent ──────────────────────────────────────────────────────────

export const MAX_ASSETS = 100;
export const MAX_GOALS = 50;
export const MIN_CORPUS_WINDOW_YEARS = 5;
export const MAX_CORPUS_WINDOW_YEARS = 10;
export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 100;

// ─── Trigger ─────────────────────────────────────────────────────────

export const MIN_DEADMAN_INTERVAL = 30 * DAY;
export const MIN_QUORUM = 2;
export const MAX_TRUSTED_SIGNERS = 20;
export const MAX_ORACLES = 10;
export const ORACLE_CONFIDENCE_THRESHOLD = 95;

// ─── Resolution ──────────────────────────────────────────────────────

export const MAX_CITATIONS_PER_INDEX = 100;
export const MAX_INDEX_BATCH = 50;
export const MAX_TOPK_RESULTS = 10;
export const MAX_RESOLUTION_BATCH = 20;
export const MAX_CONFIDENCE = 100;

// ─── Sunset ──────────────────────────────────────────────────────────

export const MAX_ARCHIVES = 100;
