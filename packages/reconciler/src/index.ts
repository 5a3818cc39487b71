/**
 * @tally/reconciler — Deterministic Ledger reconstruction.
 *
 * Derives balances from the persisted history, never from saved state:
 * 1. Decode records (unknown split modes abort)
 * 2. Merge expenses and settlements into one stable, date-ordered timeline
 * 3. Apply every entry to a fresh Ledger
 *
 * Replay verification hashes the resulting balance table so two
 * rebuilds, or a rebuild and a recorded hash, can be compared.
 */

// Rebuild
export { rebuild } from "./rebuild.js";
export { buildTimeline } from "./timeline.js";

// Record codecs
export {
  decodeExpense,
  encodeExpense,
  decodeSettlement,
  encodeSettlement,
  recordTimestamp,
} from "./records.js";

// Replay verification
export { hashBalanceTable, verifyReplay, assertReplay } from "./replay.js";

// Types
export type {
  TimelineEntry,
  RebuildOptions,
  ReplayVerdict,
  ReplayDiscrepancy,
  ReplayResult,
  ReconcileErrorCode,
} from "./types.js";

export { ReconcileError } from "./types.js";
