/**
 * Tests for balance and monthly budget calculations.
 *
 * Covers:
 * - Cleared vs uncleared balances
 * - Today's transactions left out
 * - Tombstoned transactions ignored
 * - Monthly summary by category name, positive budget lines only
 * - Split transactions spending from several categories
 */

import { describe, it, expect } from "vitest";
import {
  computeAccountBalance,
  computeMonthlySummary,
  formatLocalDate,
} from "../src/calculator.js";
import { BudgetQueryError } from "../src/types.js";
import {
  account,
  categoryBudget,
  monthlyBudget,
  storeOf,
  subCategory,
  transaction,
} from "./fixtures.js";

const TODAY = "2024-03-20";

// ─── Balances ────────────────────────────────────────────────────────────

describe("computeAccountBalance", () => {
  it("splits cleared and uncleared amounts", () => {
    const store = storeOf(
      account("acct-1"),
      transaction("t1", { amount: 100000, cleared: "Cleared" }),
      transaction("t2", { amount: -2500, cleared: "Reconciled" }),
      transaction("t3", { amount: -4000, cleared: "Uncleared" }),
    );

    expect(computeAccountBalance(store, "acct-1", TODAY)).toEqual({
      accountId: "acct-1",
      cleared: 97500,
      uncleared: -4000,
    });
  });

  it("leaves out transactions dated today", () => {
    const store = storeOf(
      transaction("t1", { amount: 5000, cleared: "Cleared" }),
      transaction("t2", { amount: 7000, cleared: "Cleared", date: TODAY }),
    );

    expect(computeAccountBalance(store, "acct-1", TODAY).cleared).toBe(5000);
  });

  it("only counts the requested account", () => {
    const store = storeOf(
      transaction("t1", { amount: 5000 }),
      transaction("t2", { amount: 9000, accountId: "acct-2" }),
    );

    expect(computeAccountBalance(store, "acct-2", TODAY).uncleared).toBe(9000);
  });

  it("ignores tombstoned transactions", () => {
    const store = storeOf(
      transaction("t1", { amount: 5000 }),
      transaction("t2", { amount: 9000 }, true),
    );

    expect(computeAccountBalance(store, "acct-1", TODAY).uncleared).toBe(5000);
  });

  it("is zero for an account with no transactions", () => {
    expect(computeAccountBalance(storeOf(), "acct-9", TODAY)).toEqual({
      accountId: "acct-9",
      cleared: 0,
      uncleared: 0,
    });
  });

  it("rejects a malformed day", () => {
    expect(() => computeAccountBalance(storeOf(), "acct-1", "20/03/2024")).toThrow(
      BudgetQueryError,
    );
  });
});

describe("formatLocalDate", () => {
  it("formats the local calendar day", () => {
    expect(formatLocalDate(new Date(2024, 0, 5, 23, 30))).toBe("2024-01-05");
  });
});

// ─── Monthly Summary ─────────────────────────────────────────────────────

describe("computeMonthlySummary", () => {
  const base = [
    subCategory("cat-food", "Groceries"),
    subCategory("cat-rent", "Rent"),
    subCategory("cat-fun", "Fun"),
    monthlyBudget("mb-03", "2024-03-01"),
    monthlyBudget("mb-04", "2024-04-01"),
    categoryBudget("mcb-1", "mb-03", "cat-food", 40000),
    categoryBudget("mcb-2", "mb-03", "cat-rent", 120000),
    categoryBudget("mcb-3", "mb-03", "cat-fun", 0),
    categoryBudget("mcb-4", "mb-04", "cat-food", 45000),
  ];

  it("summarizes budgeted and spent amounts by category name", () => {
    const store = storeOf(
      ...base,
      transaction("t1", { categoryId: "cat-food", amount: -3250, date: "2024-03-04" }),
      transaction("t2", { categoryId: "cat-food", amount: -1750, date: "2024-03-18" }),
      transaction("t3", { categoryId: "cat-rent", amount: -120000, date: "2024-03-01" }),
    );

    expect(computeMonthlySummary(store, "2024-03")).toEqual({
      Groceries: { budgeted: 40000, outflow: 5000 },
      Rent: { budgeted: 120000, outflow: 120000 },
    });
  });

  it("counts only outflows within the month", () => {
    const store = storeOf(
      ...base,
      transaction("t1", { categoryId: "cat-food", amount: -1000, date: "2024-04-02" }),
      transaction("t2", { categoryId: "cat-food", amount: 600, date: "2024-04-03" }),
      transaction("t3", { categoryId: "cat-food", amount: -800, date: "2024-03-30" }),
    );

    expect(computeMonthlySummary(store, "2024-04")).toEqual({
      Groceries: { budgeted: 45000, outflow: 1000 },
    });
  });

  it("charges each split to its own category", () => {
    const store = storeOf(
      ...base,
      transaction("t1", {
        amount: -9000,
        date: "2024-03-09",
        subTransactions: [
          { entityId: "s1", amount: -6000, categoryId: "cat-food" },
          { entityId: "s2", amount: -3000, categoryId: "cat-rent" },
        ],
      }),
    );

    expect(computeMonthlySummary(store, "2024-03")).toEqual({
      Groceries: { budgeted: 40000, outflow: 6000 },
      Rent: { budgeted: 120000, outflow: 3000 },
    });
  });

  it("leaves out lines whose category was deleted", () => {
    const store = storeOf(
      subCategory("cat-food", "Groceries", true),
      monthlyBudget("mb-03", "2024-03-01"),
      categoryBudget("mcb-1", "mb-03", "cat-food", 40000),
    );

    expect(computeMonthlySummary(store, "2024-03")).toEqual({});
  });

  it("is empty for a month without a budget", () => {
    expect(computeMonthlySummary(storeOf(...base), "2023-12")).toEqual({});
  });

  it("rejects a malformed month", () => {
    expect(() => computeMonthlySummary(storeOf(), "2024-3")).toThrow(/Expected YYYY-MM/);
  });
});
