import type { ExpenseRecord, SettlementRecord } from "@tally/types";

export function expenseRecord(overrides: Partial<ExpenseRecord> = {}): ExpenseRecord {
  return {
    id: "dinner",
    description: "Dinner",
    amount: 90,
    payer: "you",
    participants: { you: 1, sam: 1, lee: 1 },
    split_mode: "EqualSplit",
    notes: "",
    date: "2024-01-01T19:00:00.000Z",
    group_id: null,
    ...overrides,
  };
}

export function settlementRecord(overrides: Partial<SettlementRecord> = {}): SettlementRecord {
  return {
    id: "sam-pays",
    payer: "sam",
    payee: "you",
    amount: 20,
    description: "Dinner share",
    date: "2024-01-02T09:00:00.000Z",
    notes: "",
    ...overrides,
  };
}
