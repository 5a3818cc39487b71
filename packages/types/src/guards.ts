/**
 * Runtime Type Guards
 *
 * Narrowing functions for persisted records.
 * These enable safe runtime validation at system boundaries
 * (files read back from disk, request payloads).
 */

import type {
  ExpenseRecord,
  GroupRecord,
  SettlementRecord,
  SplitModeTag,
} from "./records.js";

const SPLIT_MODE_TAGS = new Set<string>(["EqualSplit", "ExactSplit", "ShareSplit"]);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isSplitModeTag(value: unknown): value is SplitModeTag {
  return typeof value === "string" && SPLIT_MODE_TAGS.has(value);
}

export function isParticipantWeights(
  value: unknown,
): value is Record<string, number> {
  if (!isRecord(value)) return false;
  return Object.values(value).every((w) => typeof w === "number");
}

export function isExpenseRecord(value: unknown): value is ExpenseRecord {
  if (!isRecord(value)) return false;
  const groupId = value.group_id;
  return (
    typeof value.id === "string" &&
    typeof value.description === "string" &&
    typeof value.amount === "number" &&
    typeof value.payer === "string" &&
    isParticipantWeights(value.participants) &&
    typeof value.split_mode === "string" &&
    typeof value.notes === "string" &&
    typeof value.date === "string" &&
    (groupId === undefined || groupId === null || typeof groupId === "string")
  );
}

export function isSettlementRecord(value: unknown): value is SettlementRecord {
  if (!isRecord(value)) return false;
  return (
    typeof value.id === "string" &&
    typeof value.payer === "string" &&
    typeof value.payee === "string" &&
    typeof value.amount === "number" &&
    typeof value.description === "string" &&
    typeof value.date === "string" &&
    typeof value.notes === "string"
  );
}

export function isGroupRecord(value: unknown): value is GroupRecord {
  if (!isRecord(value)) return false;
  return (
    typeof value.id === "string" &&
    value.id.length > 0 &&
    typeof value.name === "string"
  );
}
