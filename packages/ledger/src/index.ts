/**
 * @tally/ledger — Allocation and pairwise balance engine.
 *
 * A pure TypeScript engine with zero runtime dependencies:
 * - Allocator: divides an amount under Equal / Exact / Share policies
 * - Ledger: accumulates who-owes-whom and exposes netted views
 * - All monetary arithmetic uses bigint minor units
 *
 * Design rules:
 * - All types are readonly
 * - Split policies are pure functions looked up by persisted tag
 * - Fail-closed: invalid input throws, never silently succeeds
 */

// Core engine
export { Ledger } from "./ledger.js";

// Allocation
export {
  allocate,
  allocateMinorUnits,
  assertIdentity,
  isOrderSafeIdentity,
  resolveSplitMode,
  toParticipantWeights,
  SPLIT_MODES,
  MAX_REDISTRIBUTION_STEPS,
  EXACT_SPLIT_TOLERANCE,
} from "./allocator.js";

// Timestamps
export { parseTimestamp } from "./timestamps.js";
export type { ParseTimestampOptions } from "./timestamps.js";

// Boundary validation
export { validateExpense, validateSettlement } from "./validation.js";

// Money arithmetic
export {
  CURRENCY_DECIMALS,
  EPSILON,
  parseAmount,
  formatAmount,
  toMinorUnits,
  fromMinorUnits,
  roundCurrency,
  roundToMinorUnit,
  sumMinorUnits,
} from "./money-math.js";

// Types
export type {
  ValidationErrorCode,
  MinorAllocation,
  SplitPolicy,
  ParticipantEntry,
  DashboardTotals,
  BalanceLine,
  BalanceTableSnapshot,
} from "./types.js";

export {
  ValidationError,
  AllocationFaultError,
  UnknownSplitModeError,
} from "./types.js";
