/**
 * Record codecs
 *
 * Maps between persisted records (storage field names, plain-string
 * split-mode tag) and the domain objects the Ledger consumes.
 *
 * Decoding is strict: a record that does not have the persisted shape,
 * or whose date is not an ISO-8601 date-time, is MALFORMED_RECORD. An unknown split
 * mode tag surfaces as UnknownSplitModeError from the lookup.
 */

import type {
  Expense,
  ExpenseRecord,
  Settlement,
  SettlementRecord,
} from "@tally/types";
import { isExpenseRecord, isSettlementRecord } from "@tally/types";
import { parseTimestamp, resolveSplitMode } from "@tally/ledger";
import { ReconcileError } from "./types.js";

function recordIdOf(record: unknown): string | undefined {
  if (typeof record === "object" && record !== null && "id" in record) {
    return typeof record.id === "string" ? record.id : undefined;
  }
  return undefined;
}

/**
 * Epoch milliseconds of a persisted date. Dates written without an
 * offset are UTC, so ordering never depends on the host time zone.
 */
export function recordTimestamp(date: string, id: string): number {
  const timestamp = parseTimestamp(date);
  if (timestamp === undefined) {
    throw new ReconcileError(
      "MALFORMED_RECORD",
      `Record "${id}" has an unparseable date: "${date}"`,
      id,
    );
  }
  return timestamp;
}

export function decodeExpense(record: ExpenseRecord): Expense {
  if (!isExpenseRecord(record)) {
    const id = recordIdOf(record);
    throw new ReconcileError(
      "MALFORMED_RECORD",
      `Expense record ${id === undefined ? "without id" : `"${id}"`} does not have the persisted shape`,
      id,
    );
  }
  recordTimestamp(record.date, record.id);

  return {
    id: record.id,
    description: record.description,
    amount: record.amount,
    payer: record.payer,
    participants: record.participants,
    splitMode: resolveSplitMode(record.split_mode),
    date: record.date,
    groupId: record.group_id ?? undefined,
    notes: record.notes,
  };
}

export function encodeExpense(expense: Expense): ExpenseRecord {
  return {
    id: expense.id,
    description: expense.description,
    amount: expense.amount,
    payer: expense.payer,
    participants: expense.participants,
    split_mode: expense.splitMode,
    notes: expense.notes,
    date: expense.date,
    group_id: expense.groupId ?? null,
  };
}

export function decodeSettlement(record: SettlementRecord): Settlement {
  if (!isSettlementRecord(record)) {
    const id = recordIdOf(record);
    throw new ReconcileError(
      "MALFORMED_RECORD",
      `Settlement record ${id === undefined ? "without id" : `"${id}"`} does not have the persisted shape`,
      id,
    );
  }
  recordTimestamp(record.date, record.id);

  return {
    id: record.id,
    payer: record.payer,
    payee: record.payee,
    amount: record.amount,
    description: record.description,
    date: record.date,
    notes: record.notes,
  };
}

export function encodeSettlement(settlement: Settlement): SettlementRecord {
  return {
    id: settlement.id,
    payer: settlement.payer,
    payee: settlement.payee,
    amount: settlement.amount,
    description: settlement.description,
    date: settlement.date,
    notes: settlement.notes,
  };
}
