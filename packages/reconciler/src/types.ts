/**
 * @tally/reconciler domain types.
 *
 * Types for rebuilding the Ledger from persisted history:
 * - Timeline entries (decoded records in application order)
 * - Rebuild options
 * - Replay verification results
 */

import type { Expense, Settlement } from "@tally/types";

// =============================================================================
// Timeline
// =============================================================================

/** One decoded event, positioned on the merged timeline. */
export type TimelineEntry =
  | {
      readonly kind: "expense";
      readonly id: string;
      /** Parsed `date`, milliseconds since the epoch */
      readonly timestamp: number;
      readonly expense: Expense;
    }
  | {
      readonly kind: "settlement";
      readonly id: string;
      readonly timestamp: number;
      readonly settlement: Settlement;
    };

export interface RebuildOptions {
  /**
   * ISO-8601 instant. Only events dated at or before it are applied.
   * Default: the whole history.
   */
  readonly asOf?: string | undefined;
}

// =============================================================================
// Replay Verification
// =============================================================================

export type ReplayVerdict = "PASS" | "FAIL";

/** A single divergence found during replay verification. */
export interface ReplayDiscrepancy {
  readonly expected: string;
  readonly actual: string;
  readonly description: string;
}

export interface ReplayResult {
  readonly verdict: ReplayVerdict;
  /** Hash of the balance table from the first rebuild */
  readonly hash: string;
  /** Hash of the balance table from the second, independent rebuild */
  readonly replayedHash: string;
  /** Number of events applied per rebuild */
  readonly eventCount: number;
  readonly discrepancies: readonly ReplayDiscrepancy[];
}

// =============================================================================
// Errors
// =============================================================================

export type ReconcileErrorCode =
  | "MALFORMED_RECORD"
  | "INVALID_OPTION"
  | "REPLAY_DIVERGED";

/**
 * Error thrown while rebuilding or verifying the Ledger.
 * A rebuild that throws returns no Ledger at all.
 */
export class ReconcileError extends Error {
  constructor(
    public readonly code: ReconcileErrorCode,
    message: string,
    public readonly recordId?: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "ReconcileError";
  }
}
