/**
 * @ledgerfold/budget — Balance and budget calculations.
 *
 * Pure functions over the live view of an EntityStore. Tombstoned
 * entities never contribute.
 *
 * Rules:
 * - Transactions dated today are left out of balances (they may still
 *   be edited on another writer before the day closes)
 * - Only budget lines with a positive budgeted amount are summarized
 * - A split transaction spends from each split's category, not the parent's
 */

import type { Transaction } from "@ledgerfold/types";
import type { EntityStore } from "@ledgerfold/delta-store";
import type { AccountBalance, CategorySummary, MonthlySummary } from "./types.js";
import { BudgetQueryError } from "./types.js";

const MONTH_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Local calendar date as "YYYY-MM-DD".
 */
export function formatLocalDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, "0");
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

function isCleared(transaction: Transaction): boolean {
  return transaction.cleared === "Cleared" || transaction.cleared === "Reconciled";
}

/**
 * Compute an account's cleared and uncleared balance, excluding
 * transactions dated `today`.
 */
export function computeAccountBalance(
  store: EntityStore,
  accountId: string,
  today: string,
): AccountBalance {
  if (!DATE_PATTERN.test(today)) {
    throw new BudgetQueryError("INVALID_DATE", `Expected YYYY-MM-DD, got "${today}"`);
  }

  let cleared = 0;
  let uncleared = 0;

  for (const transaction of store.list("transaction")) {
    if (transaction.accountId !== accountId || transaction.date === today) {
      continue;
    }
    if (isCleared(transaction)) {
      cleared += transaction.amount;
    } else {
      uncleared += transaction.amount;
    }
  }

  return { accountId, cleared, uncleared };
}

/**
 * Outflow per category id for transactions dated in `month` ("YYYY-MM").
 */
function outflowByCategory(store: EntityStore, month: string): Map<string, number> {
  const outflow = new Map<string, number>();
  const add = (categoryId: string | null, amount: number): void => {
    if (categoryId === null || amount >= 0) return;
    outflow.set(categoryId, (outflow.get(categoryId) ?? 0) + Math.abs(amount));
  };

  for (const transaction of store.list("transaction")) {
    if (!transaction.date.startsWith(month)) continue;

    const splits = transaction.subTransactions ?? [];
    if (splits.length > 0) {
      for (const split of splits) {
        add(split.categoryId, split.amount);
      }
    } else {
      add(transaction.categoryId, transaction.amount);
    }
  }

  return outflow;
}

/**
 * Summarize one month's budget by category name.
 *
 * Returns an empty summary when the month has no budget. Lines whose
 * category no longer exists are left out.
 */
export function computeMonthlySummary(store: EntityStore, month: string): MonthlySummary {
  if (!MONTH_PATTERN.test(month)) {
    throw new BudgetQueryError("INVALID_MONTH", `Expected YYYY-MM, got "${month}"`);
  }

  const budget = store.list("monthlyBudget").find((b) => b.month.startsWith(month));
  if (budget === undefined) {
    return {};
  }

  const outflow = outflowByCategory(store, month);
  const summary: Record<string, CategorySummary> = {};

  for (const line of store.list("monthlyCategoryBudget")) {
    if (line.parentMonthlyBudgetId !== budget.entityId || line.budgeted <= 0) {
      continue;
    }
    const category = store.get("subCategory", line.categoryId);
    if (category === undefined) continue;

    summary[category.name] = {
      budgeted: line.budgeted,
      outflow: outflow.get(line.categoryId) ?? 0,
    };
  }

  return summary;
}
