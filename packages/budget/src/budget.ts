/**
 * @ledgerfold/budget — Budget query facade.
 *
 * Read-only view over a reconciled EntityStore:
 * - accountBalance() — cleared/uncleared balance of one account
 * - monthlySummary() — budgeted and spent per category for a month
 * - resolvePayee() — apply payee renaming rules to a raw name
 *
 * Queries read the store as it is when called, dirty edits included.
 */

import type { Payee } from "@ledgerfold/types";
import type { EntityStore } from "@ledgerfold/delta-store";
import { computeAccountBalance, computeMonthlySummary, formatLocalDate } from "./calculator.js";
import { resolvePayee } from "./payee-resolver.js";
import type { AccountBalance, MonthlySummary } from "./types.js";

export interface BudgetOptions {
  /** Source of the current day; defaults to the system clock */
  readonly clock?: (() => Date) | undefined;
}

export class Budget {
  private readonly _store: EntityStore;
  private readonly _clock: () => Date;

  constructor(store: EntityStore, options: BudgetOptions = {}) {
    this._store = store;
    this._clock = options.clock ?? (() => new Date());
  }

  get store(): EntityStore {
    return this._store;
  }

  // ─── Balances ────────────────────────────────────────────────────────

  /**
   * Balance of an account, leaving out transactions dated `today`
   * (local date from the clock unless given).
   */
  accountBalance(accountId: string, today?: string): AccountBalance {
    return computeAccountBalance(
      this._store,
      accountId,
      today ?? formatLocalDate(this._clock()),
    );
  }

  // ─── Budgets ─────────────────────────────────────────────────────────

  monthlySummary(month: string): MonthlySummary {
    return computeMonthlySummary(this._store, month);
  }

  // ─── Payees ──────────────────────────────────────────────────────────

  resolvePayee(rawName: string): Payee | undefined {
    return resolvePayee(this._store, rawName);
  }
}
