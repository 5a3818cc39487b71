/**
 * TallyService — Composition root for all domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One instance is built per process and passed by
 * reference; there are no module-level singletons.
 *
 * Mutation discipline (single writer, synchronous):
 *   validate → check ids and groups → persist → rebuild from history
 * A rejected or failed mutation leaves both the store and the Ledger
 * as they were.
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  Expense,
  ExpenseRecord,
  Group,
  GroupRecord,
  Identity,
  Settlement,
  SettlementRecord,
  SplitModeTag,
} from "@tally/types";
import {
  ValidationError,
  validateExpense,
  validateSettlement,
} from "@tally/ledger";
import type { BalanceTableSnapshot, Ledger } from "@tally/ledger";
import type { HistoryStore } from "@tally/event-store";
import {
  assertReplay,
  buildTimeline,
  encodeExpense,
  encodeSettlement,
  hashBalanceTable,
  rebuild,
  verifyReplay,
} from "@tally/reconciler";
import type { ReplayResult } from "@tally/reconciler";

// =============================================================================
// Configuration
// =============================================================================

/** Number of items recentActivity() returns when no limit is given. */
export const DEFAULT_ACTIVITY_LIMIT = 10;

export interface TallyServiceConfig {
  readonly store: HistoryStore;
  /** Defaults to a silent pino logger */
  readonly logger?: Logger | undefined;
  readonly activityLimit?: number | undefined;
}

// =============================================================================
// Views
// =============================================================================

/** One line of the recent-activity feed, newest first. */
export type ActivityItem =
  | {
      readonly kind: "expense";
      readonly id: string;
      readonly date: string;
      readonly description: string;
      readonly amount: number;
      readonly payer: Identity;
      readonly splitMode: SplitModeTag;
      readonly groupId?: string | undefined;
    }
  | {
      readonly kind: "settlement";
      readonly id: string;
      readonly date: string;
      readonly description: string;
      readonly amount: number;
      readonly payer: Identity;
      readonly payee: Identity;
    };

/** The balance table plus its content hash. */
export interface LedgerView extends BalanceTableSnapshot {
  readonly hash: string;
  readonly eventCount: number;
}

// =============================================================================
// Service
// =============================================================================

export class TallyService {
  private readonly _store: HistoryStore;
  private readonly _logger: Logger;
  private readonly _activityLimit: number;
  private _ledger: Ledger;

  /**
   * Rebuilds the Ledger from the store's full history.
   * A history that cannot be rebuilt makes construction throw.
   */
  constructor(config: TallyServiceConfig) {
    this._store = config.store;
    this._logger = config.logger ?? pino({ level: "silent" });
    this._activityLimit = config.activityLimit ?? DEFAULT_ACTIVITY_LIMIT;
    this._ledger = this._rebuild("startup");
  }

  // ─── Mutations ─────────────────────────────────────────────────────

  addExpense(expense: Expense): ExpenseRecord {
    validateExpense(expense);
    this._assertNewRecordId(expense.id);

    if (expense.groupId !== undefined && !this._store.hasGroup(expense.groupId)) {
      throw new ValidationError(
        "UNKNOWN_GROUP",
        `Expense "${expense.id}" references unknown group "${expense.groupId}"`,
      );
    }

    const record = encodeExpense(expense);
    this._store.appendExpense(record);
    this._ledger = this._rebuild("expense");

    this._logger.info(
      { expenseId: expense.id, payer: expense.payer, splitMode: expense.splitMode },
      "Expense recorded",
    );
    return record;
  }

  addSettlement(settlement: Settlement): SettlementRecord {
    validateSettlement(settlement);
    this._assertNewRecordId(settlement.id);

    const record = encodeSettlement(settlement);
    this._store.appendSettlement(record);
    this._ledger = this._rebuild("settlement");

    this._logger.info(
      { settlementId: settlement.id, payer: settlement.payer, payee: settlement.payee },
      "Settlement recorded",
    );
    return record;
  }

  addGroup(group: Group): GroupRecord {
    if (this._store.hasGroup(group.id)) {
      throw new ValidationError(
        "DUPLICATE_RECORD_ID",
        `Group "${group.id}" already exists`,
      );
    }

    const record: GroupRecord = { id: group.id, name: group.name };
    this._store.appendGroup(record);

    this._logger.info({ groupId: group.id }, "Group created");
    return record;
  }

  // ─── Queries ───────────────────────────────────────────────────────

  /**
   * Net position of `identity` against each counterparty.
   * Positive: identity owes them. Negative: they owe identity.
   *
   * With `asOf`, balances are rebuilt from events up to that instant.
   */
  balancesFor(identity: Identity, asOf?: string): Record<Identity, number> {
    const ledger = asOf === undefined ? this._ledger : rebuild(this._store.history(), { asOf });
    return ledger.netFor(identity);
  }

  /**
   * [totalOwedByMe, totalOwedToMe] for `identity`.
   */
  dashboardTotals(identity: Identity): readonly [number, number] {
    const { owedByMe, owedToMe } = this._ledger.totalsFor(identity);
    return [owedByMe, owedToMe];
  }

  listExpenses(): readonly ExpenseRecord[] {
    return this._store.history().expenses;
  }

  listSettlements(): readonly SettlementRecord[] {
    return this._store.history().settlements;
  }

  listGroups(): readonly GroupRecord[] {
    return this._store.listGroups();
  }

  /**
   * Expenses and settlements merged, newest first.
   * Events with the same date keep timeline order.
   */
  recentActivity(limit: number = this._activityLimit): readonly ActivityItem[] {
    const timeline = buildTimeline(this._store.history());

    return [...timeline]
      .sort((a, b) => b.timestamp - a.timestamp)
      .slice(0, limit)
      .map((entry): ActivityItem => {
        if (entry.kind === "expense") {
          const { expense } = entry;
          return {
            kind: "expense",
            id: expense.id,
            date: expense.date,
            description: expense.description,
            amount: expense.amount,
            payer: expense.payer,
            splitMode: expense.splitMode,
            groupId: expense.groupId,
          };
        }
        const { settlement } = entry;
        return {
          kind: "settlement",
          id: settlement.id,
          date: settlement.date,
          description: settlement.description,
          amount: settlement.amount,
          payer: settlement.payer,
          payee: settlement.payee,
        };
      });
  }

  /**
   * The current balance table and its canonical hash.
   */
  snapshot(): LedgerView {
    const snapshot = this._ledger.snapshot();
    return {
      ...snapshot,
      hash: hashBalanceTable(snapshot),
      eventCount: this._ledger.appliedCount,
    };
  }

  /**
   * Rebuild twice from the store and compare hashes.
   */
  verify(expectedHash?: string): ReplayResult {
    return verifyReplay(this._store.history(), expectedHash);
  }

  /**
   * Like verify(), but throws REPLAY_DIVERGED on failure.
   */
  assertVerified(expectedHash?: string): string {
    return assertReplay(this._store.history(), expectedHash);
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _assertNewRecordId(id: string): void {
    if (this._store.hasRecord(id)) {
      throw new ValidationError("DUPLICATE_RECORD_ID", `Record "${id}" already exists`);
    }
  }

  private _rebuild(reason: string): Ledger {
    const started = performance.now();
    const ledger = rebuild(this._store.history());

    this._logger.debug(
      {
        reason,
        events: ledger.appliedCount,
        durationMs: Math.round(performance.now() - started),
      },
      "Ledger rebuilt",
    );
    return ledger;
  }
}
