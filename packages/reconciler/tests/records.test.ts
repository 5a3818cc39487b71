import { describe, it, expect } from "vitest";
import type { Expense, Settlement } from "@tally/types";
import { UnknownSplitModeError } from "@tally/ledger";
import {
  decodeExpense,
  decodeSettlement,
  encodeExpense,
  encodeSettlement,
  recordTimestamp,
} from "../src/records.js";
import { ReconcileError } from "../src/types.js";
import { expenseRecord, settlementRecord } from "./fixtures.js";

describe("expense codec", () => {
  it("maps storage field names to the domain object", () => {
    expect(decodeExpense(expenseRecord({ split_mode: "ShareSplit", group_id: "flat" }))).toEqual({
      id: "dinner",
      description: "Dinner",
      amount: 90,
      payer: "you",
      participants: { you: 1, sam: 1, lee: 1 },
      splitMode: "ShareSplit",
      date: "2024-01-01T19:00:00.000Z",
      groupId: "flat",
      notes: "",
    });
  });

  it("decodes a null group as no group", () => {
    expect(decodeExpense(expenseRecord()).groupId).toBeUndefined();
  });

  it("encodes a missing group as null", () => {
    const expense: Expense = {
      id: "e1",
      description: "Tickets",
      amount: 30,
      payer: "ana",
      participants: { ana: 10, ben: 20 },
      splitMode: "ExactSplit",
      date: "2024-02-02T10:00:00.000Z",
      notes: "row F",
    };

    expect(encodeExpense(expense)).toEqual({
      id: "e1",
      description: "Tickets",
      amount: 30,
      payer: "ana",
      participants: { ana: 10, ben: 20 },
      split_mode: "ExactSplit",
      notes: "row F",
      date: "2024-02-02T10:00:00.000Z",
      group_id: null,
    });
  });

  it("throws UnknownSplitModeError for an unknown tag", () => {
    expect(() => decodeExpense(expenseRecord({ split_mode: "Equal" }))).toThrow(
      UnknownSplitModeError,
    );
  });

  it("throws MALFORMED_RECORD for an unparseable date", () => {
    expect(() => decodeExpense(expenseRecord({ date: "" }))).toThrow(ReconcileError);
  });
});

describe("settlement codec", () => {
  it("round-trips a settlement", () => {
    const settlement: Settlement = {
      id: "s1",
      payer: "ben",
      payee: "ana",
      amount: 15,
      description: "Tickets",
      date: "2024-02-03T10:00:00.000Z",
      notes: "",
    };

    expect(decodeSettlement(encodeSettlement(settlement))).toEqual(settlement);
  });

  it("throws MALFORMED_RECORD for an unparseable date", () => {
    try {
      decodeSettlement(settlementRecord({ date: "not a date" }));
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ReconcileError);
      if (err instanceof ReconcileError) {
        expect(err.code).toBe("MALFORMED_RECORD");
        expect(err.recordId).toBe("sam-pays");
      }
    }
  });
});

describe("recordTimestamp", () => {
  it("reads a stored date without an offset as UTC", () => {
    expect(recordTimestamp("2024-01-01T10:00:00", "e1")).toBe(Date.UTC(2024, 0, 1, 10));
  });

  it("honours an explicit offset", () => {
    expect(recordTimestamp("2024-01-01T19:00:00+09:00", "e1")).toBe(Date.UTC(2024, 0, 1, 10));
  });

  it("rejects a date Date.parse would take but ISO-8601 does not", () => {
    expect(() => recordTimestamp("Mon, 01 Jan 2024 10:00:00 GMT", "e1")).toThrow(
      'Record "e1" has an unparseable date',
    );
  });
});
