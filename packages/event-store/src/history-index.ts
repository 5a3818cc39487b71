/**
 * @tally/event-store — In-memory index shared by every store.
 *
 * Holds the decoded history and answers the read side of HistoryStore.
 * Stores feed it entries only after they are durable.
 */

import type {
  ExpenseRecord,
  GroupRecord,
  History,
  SettlementRecord,
} from "@tally/types";
import {
  isExpenseRecord,
  isGroupRecord,
  isRecord,
  isSettlementRecord,
} from "@tally/types";
import type { HistoryEntry, HistoryRecordKind } from "./types.js";
import { PersistenceError } from "./types.js";

/**
 * Narrow an unknown value (e.g. a parsed JSONL line) to a HistoryEntry.
 */
export function isHistoryEntry(value: unknown): value is HistoryEntry {
  if (!isRecord(value)) return false;
  if (typeof value.position !== "number" || typeof value.appendedAt !== "string") {
    return false;
  }

  switch (value.kind) {
    case "expense":
      return isExpenseRecord(value.record);
    case "settlement":
      return isSettlementRecord(value.record);
    case "group":
      return isGroupRecord(value.record);
    default:
      return false;
  }
}

/**
 * Build a new entry, rejecting a record whose shape does not match its kind.
 */
export function createEntry(
  kind: HistoryRecordKind,
  record: unknown,
  position: number,
): HistoryEntry {
  const candidate = {
    kind,
    position,
    appendedAt: new Date().toISOString(),
    record,
  };

  if (!isHistoryEntry(candidate)) {
    throw new PersistenceError(
      "INVALID_RECORD",
      `Malformed ${kind} record rejected by the history store`,
    );
  }
  return candidate;
}

export class HistoryIndex {
  private readonly _expenses: ExpenseRecord[] = [];
  private readonly _settlements: SettlementRecord[] = [];
  private readonly _groups: GroupRecord[] = [];
  private readonly _recordIds = new Set<string>();
  private readonly _groupIds = new Set<string>();

  /** Highest position seen so far */
  private _position = 0;
  private _size = 0;

  add(entry: HistoryEntry): void {
    switch (entry.kind) {
      case "expense":
        this._expenses.push(entry.record);
        this._recordIds.add(entry.record.id);
        break;
      case "settlement":
        this._settlements.push(entry.record);
        this._recordIds.add(entry.record.id);
        break;
      case "group":
        this._groups.push(entry.record);
        this._groupIds.add(entry.record.id);
        break;
    }

    if (entry.position > this._position) {
      this._position = entry.position;
    }
    this._size++;
  }

  nextPosition(): number {
    return this._position + 1;
  }

  history(): History {
    return {
      expenses: [...this._expenses],
      settlements: [...this._settlements],
    };
  }

  listGroups(): readonly GroupRecord[] {
    return [...this._groups];
  }

  hasRecord(id: string): boolean {
    return this._recordIds.has(id);
  }

  hasGroup(id: string): boolean {
    return this._groupIds.has(id);
  }

  size(): number {
    return this._size;
  }
}
