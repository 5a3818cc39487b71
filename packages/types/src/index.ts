/**
 * @tally/types — Shared domain types for the Tally stack.
 *
 * These types are used across all Tally packages:
 * - Expense / settlement / group domain objects
 * - Persisted record shapes (the storage contract)
 * - Runtime guards for records read back from storage
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

export type {
  Identity,
  SplitModeTag,
  ParticipantWeights,
  Expense,
  Settlement,
  Group,
  ExpenseRecord,
  SettlementRecord,
  GroupRecord,
  History,
} from "./records.js";

export {
  isRecord,
  isSplitModeTag,
  isParticipantWeights,
  isExpenseRecord,
  isSettlementRecord,
  isGroupRecord,
} from "./guards.js";
