/**
 * @afterword/execution — Gated, time-bounded execution.
 *
 * @packageDocumentation
 */

export type {
  ExecutionLogEntry,
  License,
  FundedProject,
  ExecutionState,
  Decision,
  FundsTransport,
  SunsetPort,
} from "./types.js";

export type { ExecutionEngineOptions } from "./execution-engine.js";
export { ExecutionEngine, LICENSE_QUERY } from "./execution-engine.js";

export type { ProhibitedActionTable, FilterLayer, FilterVerdict } from "./prohibited-action-filter.js";
export {
  ProhibitedActionFilter,
  DEFAULT_TABLE_URL,
  loadProhibitedActionTable,
  containsWord,
  defaultFilter,
} from "./prohibited-action-filter.js";

export type { SentTransfer } from "./in-memory-transport.js";
export { InMemoryFundsTransport } from "./in-memory-transport.js";
