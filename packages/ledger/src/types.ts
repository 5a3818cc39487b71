/**
 * @tally/ledger — Internal types for the allocation and ledger engine.
 *
 * Rules:
 * - All types are readonly
 * - Amounts inside the engine are integer minor units (bigint)
 * - Fail-closed: invalid input throws, never silently succeeds
 */

import type { Identity } from "@tally/types";

// ─── Errors ──────────────────────────────────────────────────────────────

/** Error codes for rejected input. */
export type ValidationErrorCode =
  | "SPLIT_SUM_MISMATCH"
  | "NON_POSITIVE_SHARE"
  | "NON_POSITIVE_AMOUNT"
  | "DUPLICATE_IDENTITY"
  | "EMPTY_PARTICIPANTS"
  | "PAYER_NOT_PARTICIPANT"
  | "INVALID_AMOUNT"
  | "INVALID_TIMESTAMP"
  | "INVALID_IDENTITY"
  | "DUPLICATE_RECORD_ID"
  | "UNKNOWN_GROUP";

/**
 * Input rejected before any state change.
 * Always thrown, never returned as an error code.
 */
export class ValidationError extends Error {
  public readonly code: ValidationErrorCode;

  constructor(code: ValidationErrorCode, message: string) {
    super(message);
    this.name = "ValidationError";
    this.code = code;
  }
}

/**
 * Remainder redistribution did not converge within its step cap.
 * This is a logic fault, not a user error.
 */
export class AllocationFaultError extends Error {
  public readonly code = "REDISTRIBUTION_LIMIT" as const;

  constructor(message: string) {
    super(message);
    this.name = "AllocationFaultError";
  }
}

/**
 * A persisted split-mode tag is not one this build knows.
 */
export class UnknownSplitModeError extends Error {
  public readonly code = "UNKNOWN_SPLIT_MODE" as const;
  public readonly tag: string;

  constructor(tag: string) {
    super(`Unknown split mode: "${tag}"`);
    this.name = "UnknownSplitModeError";
    this.tag = tag;
  }
}

// ─── Allocation ──────────────────────────────────────────────────────────

/**
 * Per-participant owed amounts in minor units, in participant order.
 */
export type MinorAllocation = ReadonlyMap<Identity, bigint>;

/**
 * A split policy: divides `amount` (minor units) among ordered
 * participant weights. Pure; no shared state.
 */
export type SplitPolicy = (
  amount: bigint,
  participants: readonly (readonly [Identity, number])[],
) => Map<Identity, bigint>;

/**
 * One entry of an explicitly ordered participant list.
 */
export interface ParticipantEntry {
  readonly identity: Identity;
  readonly weight: number;
}

// ─── Views ───────────────────────────────────────────────────────────────

/**
 * Dashboard aggregates for one identity.
 */
export interface DashboardTotals {
  /** Sum of what this identity owes others */
  readonly owedByMe: number;
  /** Sum of what others owe this identity */
  readonly owedToMe: number;
}

/**
 * One directed, non-zero cell of the balance table.
 * `debtor` owes `creditor` the amount (negative means overpaid).
 */
export interface BalanceLine {
  readonly debtor: Identity;
  readonly creditor: Identity;
  readonly amount: string;
}

/**
 * Serializable view of the whole balance table.
 * Lines are sorted by debtor, then creditor.
 */
export interface BalanceTableSnapshot {
  readonly version: 1;
  readonly balances: readonly BalanceLine[];
}
