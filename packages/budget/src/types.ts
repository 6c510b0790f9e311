/**
 * @ledgerfold/budget — Query result types.
 *
 * Rules:
 * - All amounts are integer minor units
 * - All results are readonly snapshots of the store at query time
 */

// ─── Balances ────────────────────────────────────────────────────────────

/**
 * Balance of one account, split by cleared state.
 *
 * `cleared` sums Cleared and Reconciled transactions; `uncleared`
 * sums the rest.
 */
export interface AccountBalance {
  readonly accountId: string;
  readonly cleared: number;
  readonly uncleared: number;
}

// ─── Monthly Summary ─────────────────────────────────────────────────────

export interface CategorySummary {
  readonly budgeted: number;
  /** Money spent from the category in the month, as a positive number */
  readonly outflow: number;
}

/** Category name → budgeted and spent amounts for one month. */
export type MonthlySummary = Readonly<Record<string, CategorySummary>>;

// ─── Errors ──────────────────────────────────────────────────────────────

export type BudgetQueryErrorCode = "INVALID_MONTH" | "INVALID_DATE";

/**
 * Thrown for malformed query arguments.
 */
export class BudgetQueryError extends Error {
  public readonly code: BudgetQueryErrorCode;

  constructor(code: BudgetQueryErrorCode, message: string) {
    super(message);
    this.name = "BudgetQueryError";
    this.code = code;
  }
}
