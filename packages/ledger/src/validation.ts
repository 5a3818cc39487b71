/**
 * @tally/ledger — Boundary validation.
 *
 * Checks run before an event is persisted. A rejected event causes
 * no state change anywhere.
 */

import type { Expense, Settlement } from "@tally/types";
import { allocateMinorUnits, assertIdentity } from "./allocator.js";
import { toMinorUnits } from "./money-math.js";
import { parseTimestamp } from "./timestamps.js";
import { ValidationError } from "./types.js";

function assertTimestamp(date: string, recordId: string): void {
  if (parseTimestamp(date, { requireOffset: true }) === undefined) {
    throw new ValidationError(
      "INVALID_TIMESTAMP",
      `Record "${recordId}" needs an ISO-8601 date-time with an offset, got "${date}"`,
    );
  }
}

function assertPositive(amount: number, recordId: string): void {
  if (toMinorUnits(amount) <= 0n) {
    throw new ValidationError(
      "NON_POSITIVE_AMOUNT",
      `Record "${recordId}" must have a positive amount, got ${String(amount)}`,
    );
  }
}

/**
 * Validate an expense.
 *
 * Rules:
 * 1. amount > 0 at currency precision
 * 2. participants non-empty and include the payer
 * 3. no identity is empty or a bare integer
 * 4. date is an ISO-8601 date-time with an explicit offset
 * 5. the split allocates (exact sums match, shares positive)
 */
export function validateExpense(expense: Expense): void {
  assertPositive(expense.amount, expense.id);

  if (Object.keys(expense.participants).length === 0) {
    throw new ValidationError(
      "EMPTY_PARTICIPANTS",
      `Expense "${expense.id}" has no participants`,
    );
  }

  if (!Object.hasOwn(expense.participants, expense.payer)) {
    throw new ValidationError(
      "PAYER_NOT_PARTICIPANT",
      `Payer "${expense.payer}" is not among the participants of expense "${expense.id}"`,
    );
  }

  for (const identity of Object.keys(expense.participants)) {
    assertIdentity(identity);
  }

  assertTimestamp(expense.date, expense.id);

  allocateMinorUnits(toMinorUnits(expense.amount), expense.participants, expense.splitMode);
}

/**
 * Validate a settlement: positive amount, distinct well-formed payer
 * and payee, ISO-8601 date-time with an offset.
 */
export function validateSettlement(settlement: Settlement): void {
  assertPositive(settlement.amount, settlement.id);
  assertIdentity(settlement.payer);
  assertIdentity(settlement.payee);

  if (settlement.payer === settlement.payee) {
    throw new ValidationError(
      "DUPLICATE_IDENTITY",
      `Settlement payer and payee must differ, both are "${settlement.payer}"`,
    );
  }

  assertTimestamp(settlement.date, settlement.id);
}
