/**
 * @afterword/trigger — When an intent activates.
 *
 * @packageDocumentation
 */

export type {
  TriggerMode,
  TriggerStatus,
  DeadmanConfig,
  QuorumConfig,
  OracleConsensusConfig,
  TriggerConfig,
  TriggerState,
  OracleConsensusInput,
  VerificationRequest,
  OracleReport,
  AggregationResult,
  OracleConsensusProvider,
} from "./types.js";

export type { TriggerCoordinatorOptions } from "./trigger-coordinator.js";
export { TriggerCoordinator } from "./trigger-coordinator.js";
export { InMemoryOracleAggregator } from "./oracle-aggregator.js";
