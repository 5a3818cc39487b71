/**
 * @tally/event-store — File-based JSONL HistoryStore implementation.
 *
 * Stores records as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append flushes to disk via fsync before returning
 * - Only the unterminated last line can be a torn write. It is skipped
 *   on load and cut off before the next append
 * - A newline-terminated line that is not a valid entry aborts the load
 *   with READ_FAILED; the store never starts on a partial history
 * - The file is the source of truth; in-memory state is derived
 *
 * Properties:
 * - Durable: records survive process restart
 * - Append-only: committed lines are never rewritten
 * - O(1) append (single write + fsync)
 * - O(n) load on startup (sequential read of all lines)
 *
 * File format:
 * Each line is a JSON object with the HistoryEntry shape:
 * {"kind":"expense","position":1,"appendedAt":"...","record":{...}}
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  ftruncateSync,
  readFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
} from "node:fs";
import { dirname } from "node:path";
import type {
  ExpenseRecord,
  GroupRecord,
  History,
  SettlementRecord,
} from "@tally/types";
import { createEntry, HistoryIndex, isHistoryEntry } from "./history-index.js";
import type { HistoryEntry, HistoryRecordKind, HistoryStore } from "./types.js";
import { PersistenceError } from "./types.js";

/**
 * Options for creating a JsonlHistoryStore.
 */
export interface JsonlHistoryStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

/**
 * File-based JSONL history store.
 *
 * The in-memory index is rebuilt from the file on construction.
 */
export class JsonlHistoryStore implements HistoryStore {
  private readonly _filePath: string;
  private readonly _index = new HistoryIndex();

  /** Torn last lines skipped on load (0 or 1) */
  private _skippedLines = 0;

  /** The file ends in a complete entry without its newline */
  private _pendingNewline = false;

  /** Byte length to cut the file back to before the next append */
  private _tornTailOffset: number | undefined;

  /**
   * Create a new JsonlHistoryStore.
   *
   * If the file exists, records are loaded from it.
   * If the file does not exist, it (and its parent directory) is
   * created on first append.
   *
   * @throws PersistenceError("READ_FAILED") if the file cannot be read
   *   or a committed line is not a valid history entry
   */
  constructor(options: JsonlHistoryStoreOptions) {
    this._filePath = options.filePath;
    this._loadFromFile();
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

  // ─── Diagnostics ────────────────────────────────────────────────────

  /**
   * Get the file path this store writes to.
   */
  get filePath(): string {
    return this._filePath;
  }

  /**
   * Number of torn last lines ignored when the file was loaded.
   */
  get skippedLines(): number {
    return this._skippedLines;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _append(kind: HistoryRecordKind, record: unknown): HistoryEntry {
    const entry = createEntry(kind, record, this._index.nextPosition());

    const line = JSON.stringify(entry) + "\n";
    this._writeAndSync(this._pendingNewline ? "\n" + line : line, this._tornTailOffset);
    this._pendingNewline = false;
    this._tornTailOffset = undefined;

    // Update in-memory state only after successful write
    this._index.add(entry);
    return entry;
  }

  /**
   * Load records from the JSONL file into memory.
   *
   * Every newline-terminated line must be blank or a valid entry. The
   * unterminated last line is the only place a crash can leave a torn
   * write, so it alone is tolerated.
   */
  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    let content: string;
    try {
      content = readFileSync(this._filePath, "utf-8");
    } catch (err) {
      throw new PersistenceError(
        "READ_FAILED",
        `Cannot read history file "${this._filePath}"`,
        { cause: err },
      );
    }

    const committedEnd = content.lastIndexOf("\n") + 1;
    const committed = content.slice(0, committedEnd);
    const tail = content.slice(committedEnd).trim();

    committed.split("\n").forEach((line, index) => {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        return;
      }

      const parsed = parseLine(trimmed);
      if (!isHistoryEntry(parsed)) {
        throw new PersistenceError(
          "READ_FAILED",
          `History file "${this._filePath}" line ${String(index + 1)} is not a valid history entry`,
        );
      }
      this._index.add(parsed);
    });

    if (tail.length === 0) {
      return;
    }

    const parsedTail = parseLine(tail);
    if (isHistoryEntry(parsedTail)) {
      this._index.add(parsedTail);
      this._pendingNewline = true;
      return;
    }

    this._skippedLines = 1;
    this._tornTailOffset = Buffer.byteLength(committed, "utf-8");
  }

  /**
   * Write data to the JSONL file and fsync for durability, first cutting
   * the file back to `truncateTo` bytes when a torn line must go.
   */
  private _writeAndSync(data: string, truncateTo?: number): void {
    try {
      mkdirSync(dirname(this._filePath), { recursive: true });
      const fd = openSync(this._filePath, "a");
      try {
        if (truncateTo !== undefined) {
          ftruncateSync(fd, truncateTo);
        }
        appendFileSync(fd, data, "utf-8");
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
    } catch (err) {
      throw new PersistenceError(
        "WRITE_FAILED",
        `Cannot append to history file "${this._filePath}"`,
        { cause: err },
      );
    }
  }
}

/**
 * Parse one line; invalid JSON yields undefined.
 */
function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch (err) {
    if (err instanceof SyntaxError) {
      return undefined;
    }
    throw err;
  }
}
