/**
 * Rebuild and timeline tests
 *
 * Tests reconstruction of the Ledger from persisted records.
 */
import { describe, it, expect } from "vitest";
import { UnknownSplitModeError } from "@tally/ledger";
import { rebuild } from "../src/rebuild.js";
import { buildTimeline } from "../src/timeline.js";
import { ReconcileError } from "../src/types.js";
import { expenseRecord, settlementRecord } from "./fixtures.js";

function reconcileCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ReconcileError) return err.code;
    throw err;
  }
  return undefined;
}

describe("rebuild", () => {
  it("returns an empty ledger for an empty history", () => {
    const ledger = rebuild({ expenses: [], settlements: [] });

    expect(ledger.appliedCount).toBe(0);
    expect(ledger.snapshot()).toEqual({ version: 1, balances: [] });
  });

  it("applies expenses and settlements", () => {
    const ledger = rebuild({
      expenses: [expenseRecord()],
      settlements: [settlementRecord()],
    });

    expect(ledger.netFor("you")).toEqual({ sam: -10, lee: -30 });
    expect(ledger.totalsFor("you")).toEqual({ owedByMe: 0, owedToMe: 40 });
    expect(ledger.appliedCount).toBe(2);
  });

  it("stops at asOf", () => {
    const ledger = rebuild(
      { expenses: [expenseRecord()], settlements: [settlementRecord()] },
      { asOf: "2024-01-01T23:59:59.000Z" },
    );

    expect(ledger.netFor("you")).toEqual({ sam: -30, lee: -30 });
  });

  it("includes events dated exactly at asOf", () => {
    const ledger = rebuild(
      { expenses: [expenseRecord()], settlements: [settlementRecord()] },
      { asOf: "2024-01-02T09:00:00.000Z" },
    );

    expect(ledger.appliedCount).toBe(2);
  });

  it("rejects an unparseable asOf", () => {
    expect(
      reconcileCode(() =>
        rebuild({ expenses: [expenseRecord()], settlements: [] }, { asOf: "soon" }),
      ),
    ).toBe("INVALID_OPTION");
  });

  it("rejects an asOf without an offset", () => {
    expect(
      reconcileCode(() =>
        rebuild(
          { expenses: [expenseRecord()], settlements: [] },
          { asOf: "2024-01-01T23:59:59" },
        ),
      ),
    ).toBe("INVALID_OPTION");
  });

  it("reads a stored date without an offset as UTC", () => {
    const history = {
      expenses: [expenseRecord({ date: "2024-01-01T10:00:00" })],
      settlements: [],
    };

    expect(rebuild(history, { asOf: "2024-01-01T05:00:00Z" }).netFor("you")).toEqual({});
    expect(rebuild(history, { asOf: "2024-01-01T09:59:59Z" }).appliedCount).toBe(0);
    expect(rebuild(history, { asOf: "2024-01-01T10:00:00Z" }).netFor("you")).toEqual({
      sam: -30,
      lee: -30,
    });
    // 14:00+09:00 is 05:00Z
    expect(rebuild(history, { asOf: "2024-01-01T14:00:00+09:00" }).appliedCount).toBe(0);
  });

  it("reports a free-form stored date as a malformed record", () => {
    const history = {
      expenses: [expenseRecord({ date: "January 1, 2024 10:00 UTC" })],
      settlements: [],
    };

    expect(reconcileCode(() => rebuild(history))).toBe("MALFORMED_RECORD");
  });

  it("aborts the whole rebuild on an unknown split mode", () => {
    const history = {
      expenses: [
        expenseRecord(),
        expenseRecord({ id: "odd", split_mode: "PercentSplit" }),
      ],
      settlements: [],
    };

    expect(() => rebuild(history)).toThrow(UnknownSplitModeError);
  });

  it("reports an unparseable date as a malformed record", () => {
    const history = {
      expenses: [expenseRecord({ date: "not a date" })],
      settlements: [],
    };

    expect(reconcileCode(() => rebuild(history))).toBe("MALFORMED_RECORD");
  });

  it("reports a record the engine rejects as malformed", () => {
    const history = {
      expenses: [
        expenseRecord({
          id: "bad-exact",
          amount: 50,
          participants: { you: 20, sam: 20 },
          split_mode: "ExactSplit",
        }),
      ],
      settlements: [],
    };

    try {
      rebuild(history);
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ReconcileError);
      if (err instanceof ReconcileError) {
        expect(err.code).toBe("MALFORMED_RECORD");
        expect(err.recordId).toBe("bad-exact");
      }
    }
  });

  it("reports a self-payment as malformed", () => {
    const history = {
      expenses: [],
      settlements: [settlementRecord({ payee: "sam" })],
    };

    expect(reconcileCode(() => rebuild(history))).toBe("MALFORMED_RECORD");
  });
});

describe("buildTimeline", () => {
  it("orders events by date", () => {
    const timeline = buildTimeline({
      expenses: [
        expenseRecord({ id: "late", date: "2024-03-01T00:00:00.000Z" }),
        expenseRecord({ id: "early", date: "2024-01-01T00:00:00.000Z" }),
      ],
      settlements: [settlementRecord({ id: "middle", date: "2024-02-01T00:00:00.000Z" })],
    });

    expect(timeline.map((e) => e.id)).toEqual(["early", "middle", "late"]);
  });

  it("puts expenses before settlements on a tie", () => {
    const date = "2024-01-01T12:00:00.000Z";
    const timeline = buildTimeline({
      expenses: [expenseRecord({ id: "e1", date })],
      settlements: [settlementRecord({ id: "s1", date })],
    });

    expect(timeline.map((e) => e.kind)).toEqual(["expense", "settlement"]);
  });

  it("keeps insertion order for tied events of the same kind", () => {
    const date = "2024-01-01T12:00:00.000Z";
    const timeline = buildTimeline({
      expenses: [
        expenseRecord({ id: "b", date }),
        expenseRecord({ id: "a", date }),
        expenseRecord({ id: "c", date }),
      ],
      settlements: [],
    });

    expect(timeline.map((e) => e.id)).toEqual(["b", "a", "c"]);
  });

  it("compares instants, not strings", () => {
    const timeline = buildTimeline({
      expenses: [
        expenseRecord({ id: "utc", date: "2024-01-01T10:00:00Z" }),
        expenseRecord({ id: "offset", date: "2024-01-01T11:00:00+02:00" }),
      ],
      settlements: [],
    });

    // 11:00+02:00 is 09:00Z
    expect(timeline.map((e) => e.id)).toEqual(["offset", "utc"]);
  });

  it("orders a stored date without an offset as UTC", () => {
    const timeline = buildTimeline({
      expenses: [
        expenseRecord({ id: "nine-thirty", date: "2024-01-01T09:30:00Z" }),
        expenseRecord({ id: "ten", date: "2024-01-01T10:00:00" }),
        expenseRecord({ id: "nine", date: "2024-01-01T09:00:00.000Z" }),
      ],
      settlements: [],
    });

    expect(timeline.map((e) => e.id)).toEqual(["nine", "nine-thirty", "ten"]);
    expect(timeline[2]!.timestamp).toBe(Date.UTC(2024, 0, 1, 10, 0, 0));
  });

  it("decodes records into domain objects", () => {
    const [entry] = buildTimeline({
      expenses: [expenseRecord({ group_id: "trip" })],
      settlements: [],
    });

    expect(entry?.kind).toBe("expense");
    if (entry?.kind === "expense") {
      expect(entry.expense.splitMode).toBe("EqualSplit");
      expect(entry.expense.groupId).toBe("trip");
      expect(entry.timestamp).toBe(Date.parse("2024-01-01T19:00:00.000Z"));
    }
  });
});
