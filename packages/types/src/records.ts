/**
 * Record Types
 *
 * Shapes of the records persisted in the history, plus the domain
 * objects they decode into.
 *
 * Rules:
 * - Records are immutable after creation
 * - Field names of persisted records are part of the storage contract
 * - History is append-only: no UPDATE, no DELETE, only new records
 */

/**
 * A participant identity (e.g. "you@example.com").
 */
export type Identity = string;

/**
 * Persisted tag of a split policy.
 */
export type SplitModeTag = "EqualSplit" | "ExactSplit" | "ShareSplit";

/**
 * Identity → mode-dependent weight, in insertion order.
 *
 * - EqualSplit: weight is ignored, the key lists a member
 * - ExactSplit: weight is the owed amount
 * - ShareSplit: weight is a positive proportional weight
 */
export type ParticipantWeights = Readonly<Record<Identity, number>>;

// =============================================================================
// Domain objects
// =============================================================================

/**
 * A shared expense paid by one participant.
 */
export interface Expense {
  readonly id: string;
  readonly description: string;

  /** Positive currency value */
  readonly amount: number;

  readonly payer: Identity;
  readonly participants: ParticipantWeights;
  readonly splitMode: SplitModeTag;

  /** ISO 8601 timestamp */
  readonly date: string;

  readonly groupId?: string | undefined;
  readonly notes: string;
}

/**
 * A real payment from payer to payee that reduces what payer owes.
 */
export interface Settlement {
  readonly id: string;
  readonly payer: Identity;
  readonly payee: Identity;
  readonly amount: number;
  readonly description: string;

  /** ISO 8601 timestamp */
  readonly date: string;

  readonly notes: string;
}

/**
 * A named collection of expenses (a trip, a flat, ...).
 */
export interface Group {
  readonly id: string;
  readonly name: string;
}

// =============================================================================
// Persisted shapes
// =============================================================================

/**
 * Expense as stored in the history.
 *
 * `split_mode` stays a plain string: a record written by another version
 * may carry a tag this build does not know.
 */
export interface ExpenseRecord {
  readonly id: string;
  readonly description: string;
  readonly amount: number;
  readonly payer: string;
  readonly participants: Readonly<Record<string, number>>;
  readonly split_mode: string;
  readonly notes: string;
  readonly date: string;
  readonly group_id?: string | null | undefined;
}

/**
 * Settlement as stored in the history.
 */
export interface SettlementRecord {
  readonly id: string;
  readonly payer: string;
  readonly payee: string;
  readonly amount: number;
  readonly description: string;
  readonly date: string;
  readonly notes: string;
}

/**
 * Group as stored in the history.
 */
export type GroupRecord = Group;

/**
 * The full persisted history, each collection in insertion order.
 */
export interface History {
  readonly expenses: readonly ExpenseRecord[];
  readonly settlements: readonly SettlementRecord[];
}
