import { describe, it, expect } from "vitest";
import type { Expense, Settlement } from "@tally/types";
import { validateExpense, validateSettlement } from "../src/validation.js";
import { ValidationError } from "../src/types.js";

const expense: Expense = {
  id: "exp-1",
  description: "Groceries",
  amount: 45.5,
  payer: "ana",
  participants: { ana: 1, ben: 1 },
  splitMode: "EqualSplit",
  date: "2024-03-10T12:00:00.000Z",
  notes: "",
};

const settlement: Settlement = {
  id: "set-1",
  payer: "ben",
  payee: "ana",
  amount: 22.75,
  description: "Groceries share",
  date: "2024-03-11T12:00:00.000Z",
  notes: "",
};

function codeOf(fn: () => void): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err.code;
    throw err;
  }
  return undefined;
}

describe("validateExpense", () => {
  it("accepts a well-formed expense", () => {
    expect(() => validateExpense(expense)).not.toThrow();
  });

  it("rejects a non-positive amount", () => {
    expect(codeOf(() => validateExpense({ ...expense, amount: 0 }))).toBe("NON_POSITIVE_AMOUNT");
  });

  it("rejects an expense without participants", () => {
    expect(codeOf(() => validateExpense({ ...expense, participants: {} }))).toBe(
      "EMPTY_PARTICIPANTS",
    );
  });

  it("rejects a payer outside the participants", () => {
    expect(codeOf(() => validateExpense({ ...expense, payer: "cat" }))).toBe(
      "PAYER_NOT_PARTICIPANT",
    );
  });

  it("rejects a bare-integer participant", () => {
    expect(
      codeOf(() => validateExpense({ ...expense, participants: { ana: 1, ben: 1, "7": 1 } })),
    ).toBe("INVALID_IDENTITY");
  });

  it("rejects an unparseable date", () => {
    expect(codeOf(() => validateExpense({ ...expense, date: "yesterday" }))).toBe(
      "INVALID_TIMESTAMP",
    );
  });

  it("rejects a date-time without an offset", () => {
    expect(codeOf(() => validateExpense({ ...expense, date: "2024-03-10T12:00:00" }))).toBe(
      "INVALID_TIMESTAMP",
    );
  });

  it("rejects non-ISO dates that Date.parse would accept", () => {
    expect(codeOf(() => validateExpense({ ...expense, date: "March 10, 2024 12:00 UTC" }))).toBe(
      "INVALID_TIMESTAMP",
    );
    expect(codeOf(() => validateExpense({ ...expense, date: "2024-03-10" }))).toBe(
      "INVALID_TIMESTAMP",
    );
  });

  it("accepts a numeric offset", () => {
    expect(() => validateExpense({ ...expense, date: "2024-03-10T13:00:00+01:00" })).not.toThrow();
  });

  it("rejects exact amounts that miss the total", () => {
    expect(
      codeOf(() =>
        validateExpense({
          ...expense,
          splitMode: "ExactSplit",
          participants: { ana: 20, ben: 20 },
        }),
      ),
    ).toBe("SPLIT_SUM_MISMATCH");
  });
});

describe("validateSettlement", () => {
  it("accepts a well-formed settlement", () => {
    expect(() => validateSettlement(settlement)).not.toThrow();
  });

  it("rejects a negative amount", () => {
    expect(codeOf(() => validateSettlement({ ...settlement, amount: -1 }))).toBe(
      "NON_POSITIVE_AMOUNT",
    );
  });

  it("rejects paying oneself", () => {
    expect(codeOf(() => validateSettlement({ ...settlement, payee: "ben" }))).toBe(
      "DUPLICATE_IDENTITY",
    );
  });

  it("rejects a bare-integer payee", () => {
    expect(codeOf(() => validateSettlement({ ...settlement, payee: "1001" }))).toBe(
      "INVALID_IDENTITY",
    );
  });

  it("rejects an unparseable date", () => {
    expect(codeOf(() => validateSettlement({ ...settlement, date: "" }))).toBe(
      "INVALID_TIMESTAMP",
    );
  });
});
