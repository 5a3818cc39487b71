/**
 * @tally/event-store — Append-only history persistence.
 *
 * Provides:
 * - HistoryStore interface (the persistence contract)
 * - InMemoryHistoryStore (for testing and development)
 * - JsonlHistoryStore (durable, one JSON line per record)
 *
 * Design rules:
 * - Append-only: no UPDATE, no DELETE
 * - A failed append changes nothing
 * - Fail-closed: errors throw, never silently succeed
 */

// Types
export type {
  HistoryEntry,
  HistoryRecordKind,
  HistoryStore,
  PersistenceErrorCode,
} from "./types.js";

export { PersistenceError } from "./types.js";

// Implementations
export { InMemoryHistoryStore } from "./in-memory-store.js";
export { JsonlHistoryStore } from "./jsonl-store.js";
export type { JsonlHistoryStoreOptions } from "./jsonl-store.js";

// Shared helpers
export { isHistoryEntry } from "./history-index.js";
