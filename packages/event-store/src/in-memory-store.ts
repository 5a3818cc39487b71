/**
 * @tally/event-store — In-memory HistoryStore implementation.
 *
 * Stores records in plain arrays. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 * - Development and prototyping
 *
 * Not suitable for production (all state lost on process exit).
 */

import type {
  ExpenseRecord,
  GroupRecord,
  History,
  SettlementRecord,
} from "@tally/types";
import { createEntry, HistoryIndex } from "./history-index.js";
import type { HistoryEntry, HistoryRecordKind, HistoryStore } from "./types.js";

export class InMemoryHistoryStore implements HistoryStore {
  private readonly _index = new HistoryIndex();

  /**
   * Optionally seed the store, e.g. with fixtures in tests.
   */
  constructor(seed?: Partial<History>) {
    for (const record of seed?.expenses ?? []) {
      this.appendExpense(record);
    }
    for (const record of seed?.settlements ?? []) {
      this.appendSettlement(record);
    }
  }

  // ─── Append ─────────────────────────────────────────────────────────

  appendExpense(record: ExpenseRecord): HistoryEntry {
    return this._append("expense", record);
  }

  appendSettlement(record: SettlementRecord): HistoryEntry {
    return this._append("settlement", record);
  }

  appendGroup(record: GroupRecord): HistoryEntry {
    return this._append("group", record);
  }

  // ─── Read ───────────────────────────────────────────────────────────

  history(): History {
    return this._index.history();
  }

  listGroups(): readonly GroupRecord[] {
    return this._index.listGroups();
  }

  hasRecord(id: string): boolean {
    return this._index.hasRecord(id);
  }

  hasGroup(id: string): boolean {
    return this._index.hasGroup(id);
  }

  size(): number {
    return this._index.size();
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _append(kind: HistoryRecordKind, record: unknown): HistoryEntry {
    const entry = createEntry(kind, record, this._index.nextPosition());
    this._index.add(entry);
    return entry;
  }
}
