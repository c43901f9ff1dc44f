/**
 * @afterword/intent-ledger — What a principal intends, captured before it matters.
 *
 * @packageDocumentation
 */

export type {
  CorpusWindow,
  Goal,
  IntentRecord,
  CaptureInput,
  TriggerStatusReader,
  IntentTriggerPort,
} from "./types.js";

export type { IntentLedgerOptions } from "./intent-ledger.js";
export { IntentLedger } from "./intent-ledger.js";
