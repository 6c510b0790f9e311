/**
 * @ledgerfold/budget
 *
 * Read-side queries over a reconciled ledger.
 */

export { Budget } from "./budget.js";
export type { BudgetOptions } from "./budget.js";

export {
  computeAccountBalance,
  computeMonthlySummary,
  formatLocalDate,
} from "./calculator.js";

export { matchesRule, resolvePayee } from "./payee-resolver.js";

export type {
  AccountBalance,
  BudgetQueryErrorCode,
  CategorySummary,
  MonthlySummary,
} from "./types.js";
export { BudgetQueryError } from "./types.js";
