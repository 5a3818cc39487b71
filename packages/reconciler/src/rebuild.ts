/**
 * Rebuild — derives a fresh Ledger from the full persisted history.
 *
 * Usage:
 *   const ledger = rebuild(store.history());
 *   ledger.netFor("you");
 *
 * The result depends only on the history: rebuilding twice from the
 * same history yields identical balance tables. On any error nothing
 * is returned, so callers never hold a partially applied Ledger.
 */

import type { History } from "@tally/types";
import { Ledger, ValidationError } from "@tally/ledger";
import { buildTimeline } from "./timeline.js";
import type { RebuildOptions, TimelineEntry } from "./types.js";
import { ReconcileError } from "./types.js";

function applyEntry(ledger: Ledger, entry: TimelineEntry): void {
  try {
    if (entry.kind === "expense") {
      ledger.applyExpense(entry.expense);
    } else {
      ledger.applySettlement(entry.settlement);
    }
  } catch (err) {
    // A persisted record the engine rejects is a corrupt record
    if (err instanceof ValidationError) {
      throw new ReconcileError(
        "MALFORMED_RECORD",
        `Persisted ${entry.kind} "${entry.id}" cannot be applied: ${err.message}`,
        entry.id,
        { cause: err },
      );
    }
    throw err;
  }
}

export function rebuild(history: History, options: RebuildOptions = {}): Ledger {
  const ledger = new Ledger();
  for (const entry of buildTimeline(history, options)) {
    applyEntry(ledger, entry);
  }
  return ledger;
}
