/**
 * @tally/ledger — Pairwise balance table.
 *
 * `balance[A][B] > 0` means A owes B that amount. The table is sparse:
 * absent entries are zero, and cells that reach zero are removed.
 *
 * API surface:
 * - applyExpense() — Every non-payer participant owes the payer their allocation
 * - applySettlement() — A payment reduces what payer owes payee
 * - netFor() — Both directions combined from one identity's perspective
 * - totalsFor() — Dashboard aggregates over netFor()
 * - snapshot() — Sorted, serializable balance table
 *
 * There is NO remove(), update() or correct(). A correction is a
 * compensating event followed by a full rebuild.
 */

import type { Expense, Identity, Settlement } from "@tally/types";
import { allocateMinorUnits } from "./allocator.js";
import { formatAmount, fromMinorUnits, toMinorUnits } from "./money-math.js";
import type {
  BalanceLine,
  BalanceTableSnapshot,
  DashboardTotals,
} from "./types.js";
import { ValidationError } from "./types.js";

export class Ledger {
  private readonly _balances = new Map<Identity, Map<Identity, bigint>>();
  private _appliedCount = 0;

  // ─── Mutation ────────────────────────────────────────────────────────

  /**
   * Apply an expense: for every participant other than the payer,
   * increase what they owe the payer by their allocation.
   */
  applyExpense(expense: Expense): void {
    const allocation = allocateMinorUnits(
      toMinorUnits(expense.amount),
      expense.participants,
      expense.splitMode,
    );

    for (const [participant, owed] of allocation) {
      if (participant === expense.payer) {
        continue;
      }
      this._adjust(participant, expense.payer, owed);
    }
    this._appliedCount++;
  }

  /**
   * Apply a settlement: decrease what payer owes payee.
   *
   * Raw accumulation. Paying more than is owed leaves a negative
   * balance, i.e. the payee now owes the payer.
   */
  applySettlement(settlement: Settlement): void {
    if (settlement.payer === settlement.payee) {
      throw new ValidationError(
        "DUPLICATE_IDENTITY",
        `Settlement payer and payee must differ, both are "${settlement.payer}"`,
      );
    }

    this._adjust(settlement.payer, settlement.payee, -toMinorUnits(settlement.amount));
    this._appliedCount++;
  }

  // ─── Views ───────────────────────────────────────────────────────────

  /**
   * Net position of `identity` against each counterparty.
   *
   * Positive: identity owes the counterparty.
   * Negative: the counterparty owes identity.
   * Settled counterparties are omitted.
   */
  netFor(identity: Identity): Record<Identity, number> {
    return Object.fromEntries(
      [...this._netMinorUnits(identity)].map(([other, net]) => [other, fromMinorUnits(net)]),
    );
  }

  /**
   * Sum of positive net entries (owed by identity) and the negated
   * sum of negative entries (owed to identity).
   */
  totalsFor(identity: Identity): DashboardTotals {
    let owedByMe = 0n;
    let owedToMe = 0n;

    for (const net of this._netMinorUnits(identity).values()) {
      if (net > 0n) {
        owedByMe += net;
      } else {
        owedToMe -= net;
      }
    }

    return {
      owedByMe: fromMinorUnits(owedByMe),
      owedToMe: fromMinorUnits(owedToMe),
    };
  }

  /**
   * Raw directed balance: what `debtor` owes `creditor`, without netting.
   */
  balanceOf(debtor: Identity, creditor: Identity): number {
    return fromMinorUnits(this._balances.get(debtor)?.get(creditor) ?? 0n);
  }

  /**
   * Every identity that holds a non-zero balance in either direction, sorted.
   */
  identities(): readonly Identity[] {
    const seen = new Set<Identity>();
    for (const [debtor, row] of this._balances) {
      seen.add(debtor);
      for (const creditor of row.keys()) {
        seen.add(creditor);
      }
    }
    return [...seen].sort(compareIdentity);
  }

  /**
   * Number of expenses and settlements applied so far.
   */
  get appliedCount(): number {
    return this._appliedCount;
  }

  /**
   * Serializable, order-independent view of the balance table.
   */
  snapshot(): BalanceTableSnapshot {
    const balances: BalanceLine[] = [];

    for (const debtor of [...this._balances.keys()].sort(compareIdentity)) {
      const row = this._balances.get(debtor);
      if (row === undefined) continue;

      for (const creditor of [...row.keys()].sort(compareIdentity)) {
        const amount = row.get(creditor);
        if (amount === undefined) continue;
        balances.push({ debtor, creditor, amount: formatAmount(amount) });
      }
    }

    return { version: 1, balances };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _adjust(debtor: Identity, creditor: Identity, delta: bigint): void {
    let row = this._balances.get(debtor);
    if (row === undefined) {
      row = new Map();
      this._balances.set(debtor, row);
    }

    const next = (row.get(creditor) ?? 0n) + delta;
    if (next === 0n) {
      row.delete(creditor);
      if (row.size === 0) {
        this._balances.delete(debtor);
      }
    } else {
      row.set(creditor, next);
    }
  }

  /**
   * net = balance[me][other] − balance[other][me], zero entries dropped.
   * Counterparties appear in the order they are first found: my own
   * row first, then the other rows.
   */
  private _netMinorUnits(identity: Identity): Map<Identity, bigint> {
    const net = new Map<Identity, bigint>();

    for (const [other, amount] of this._balances.get(identity) ?? []) {
      net.set(other, amount);
    }

    for (const [other, row] of this._balances) {
      if (other === identity) continue;
      const owedToMe = row.get(identity);
      if (owedToMe !== undefined) {
        net.set(other, (net.get(other) ?? 0n) - owedToMe);
      }
    }

    for (const [other, amount] of net) {
      if (amount === 0n) {
        net.delete(other);
      }
    }

    return net;
  }
}

function compareIdentity(a: Identity, b: Identity): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
