/**
 * Timeline — merges expenses and settlements into application order.
 *
 * Rules:
 * - Sorted ascending by parsed date; stored dates without an offset are UTC
 * - asOf must carry an explicit offset
 * - Stable: ties keep merge order, all expenses before all settlements,
 *   each collection in insertion order
 * - Decoding fails closed: one bad record aborts the whole timeline
 */

import type { History } from "@tally/types";
import { parseTimestamp } from "@tally/ledger";
import { decodeExpense, decodeSettlement, recordTimestamp } from "./records.js";
import type { RebuildOptions, TimelineEntry } from "./types.js";
import { ReconcileError } from "./types.js";

function parseAsOf(asOf: string | undefined): number | undefined {
  if (asOf === undefined) {
    return undefined;
  }
  const cutoff = parseTimestamp(asOf, { requireOffset: true });
  if (cutoff === undefined) {
    throw new ReconcileError("INVALID_OPTION", `asOf must be an ISO-8601 date-time with an offset, got "${asOf}"`);
  }
  return cutoff;
}

export function buildTimeline(
  history: History,
  options: RebuildOptions = {},
): readonly TimelineEntry[] {
  const cutoff = parseAsOf(options.asOf);

  const merged: TimelineEntry[] = [
    ...history.expenses.map((record): TimelineEntry => {
      const expense = decodeExpense(record);
      return {
        kind: "expense",
        id: expense.id,
        timestamp: recordTimestamp(expense.date, expense.id),
        expense,
      };
    }),
    ...history.settlements.map((record): TimelineEntry => {
      const settlement = decodeSettlement(record);
      return {
        kind: "settlement",
        id: settlement.id,
        timestamp: recordTimestamp(settlement.date, settlement.id),
        settlement,
      };
    }),
  ];

  // Array.prototype.sort is stable
  merged.sort((a, b) => a.timestamp - b.timestamp);

  return cutoff === undefined
    ? merged
    : merged.filter((entry) => entry.timestamp <= cutoff);
}
