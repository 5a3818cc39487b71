/**
 * @tally/event-store — Core types.
 *
 * Defines the interfaces and types for append-only history persistence.
 *
 * Design principles:
 * - Records are immutable after creation
 * - The history is append-only (no UPDATE, no DELETE)
 * - Every record has a monotonically increasing position
 * - The store checks record shape only; domain rules live above it
 */

import type {
  ExpenseRecord,
  GroupRecord,
  History,
  SettlementRecord,
} from "@tally/types";

// =============================================================================
// Stored Record
// =============================================================================

/**
 * Kind of a persisted record.
 */
export type HistoryRecordKind = "expense" | "settlement" | "group";

interface StoredRecord<K extends HistoryRecordKind, R> {
  readonly kind: K;

  /** Position across the whole history (1-based, monotonically increasing) */
  readonly position: number;

  /** When this record was persisted (store-level, not the record's own date) */
  readonly appendedAt: string;

  readonly record: R;
}

/**
 * A record as persisted in the store, tagged with its kind.
 */
export type HistoryEntry =
  | StoredRecord<"expense", ExpenseRecord>
  | StoredRecord<"settlement", SettlementRecord>
  | StoredRecord<"group", GroupRecord>;

// =============================================================================
// History Store Interface
// =============================================================================

/**
 * Append-only history of expenses, settlements and groups.
 *
 * Invariants:
 * - Records are immutable once appended
 * - Each collection is returned in insertion order
 * - A failed append leaves the store exactly as it was
 */
export interface HistoryStore {
  /**
   * Persist an expense record.
   * @throws PersistenceError if the record is malformed or cannot be written
   */
  appendExpense(record: ExpenseRecord): HistoryEntry;

  /**
   * Persist a settlement record.
   * @throws PersistenceError if the record is malformed or cannot be written
   */
  appendSettlement(record: SettlementRecord): HistoryEntry;

  /**
   * Persist a group record.
   * @throws PersistenceError if the record is malformed or cannot be written
   */
  appendGroup(record: GroupRecord): HistoryEntry;

  /** Expenses and settlements, each in insertion order. */
  history(): History;

  /** Groups in insertion order. */
  listGroups(): readonly GroupRecord[];

  /** Whether an expense or settlement with this id exists. */
  hasRecord(id: string): boolean;

  /** Whether a group with this id exists. */
  hasGroup(id: string): boolean;

  /** Total number of persisted records of every kind. */
  size(): number;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for HistoryStore operations.
 */
export type PersistenceErrorCode =
  | "WRITE_FAILED"
  | "READ_FAILED"
  | "INVALID_RECORD";

/**
 * Error thrown by HistoryStore operations.
 * When thrown from an append, the record was not persisted.
 */
export class PersistenceError extends Error {
  constructor(
    public readonly code: PersistenceErrorCode,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "PersistenceError";
  }
}
