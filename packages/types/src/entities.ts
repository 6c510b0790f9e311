/**
 * Entity Types
 *
 * The closed set of record kinds a budget is made of. Each kind is one
 * variant of the `Entity` union, discriminated by `entityType`, so a
 * record's fields are known as soon as its kind is.
 *
 * Rules:
 * - Money is integer minor-currency units (no floating point)
 * - Dates are "YYYY-MM-DD"; budget months are "YYYY-MM-01"
 * - References to other entities are by id and may be null where
 *   a transaction is uncategorized or has no payee
 */

import type { EntityEnvelope } from "./envelope.js";

// =============================================================================
// Field sets
// =============================================================================

export interface AccountFields {
  readonly accountName: string;
  /** Free-form account type (e.g., "Checking", "CreditCard") */
  readonly accountType: string;
  readonly onBudget: boolean;
  readonly sortableIndex: number;
  readonly hidden: boolean;
  readonly note?: string | undefined;
}

export interface PayeeFields {
  readonly name: string;
  readonly enabled: boolean;
}

/** How a renaming rule compares its operand to a raw payee string. */
export type RenamingOperator = "is" | "contains" | "startsWith" | "endsWith";

/**
 * Maps a raw payee string (as imported from a bank) to a standardized payee.
 */
export interface PayeeRenamingRuleFields {
  readonly operator: RenamingOperator;
  readonly operand: string;
  readonly targetPayeeId: string;
}

export interface MasterCategoryFields {
  readonly name: string;
  readonly type: string;
  readonly sortableIndex: number;
  readonly deleteable: boolean;
  readonly expanded: boolean;
}

export interface SubCategoryFields {
  readonly name: string;
  readonly type: string;
  readonly masterCategoryId: string;
  readonly sortableIndex: number;
  readonly note?: string | undefined;
}

export interface MonthlyBudgetFields {
  /** First day of the month, e.g. "2025-08-01" */
  readonly month: string;
}

export interface MonthlyCategoryBudgetFields {
  readonly parentMonthlyBudgetId: string;
  readonly categoryId: string;
  /** Amount budgeted for the category this month, minor units */
  readonly budgeted: number;
  readonly overspendingHandling?: string | undefined;
  readonly note?: string | undefined;
}

export type ClearedState = "Uncleared" | "Cleared" | "Reconciled";

/**
 * One split of a transaction. Splits share the parent's account and date.
 */
export interface SubTransaction {
  readonly entityId: string;
  readonly amount: number;
  readonly categoryId: string | null;
  readonly payeeId?: string | null | undefined;
  readonly memo?: string | undefined;
}

export interface TransactionFields {
  readonly accountId: string;
  readonly payeeId: string | null;
  readonly categoryId: string | null;
  /** Signed amount, minor units (outflows are negative) */
  readonly amount: number;
  readonly date: string;
  readonly cleared: ClearedState;
  readonly accepted: boolean;
  readonly memo?: string | undefined;
  readonly subTransactions?: readonly SubTransaction[] | undefined;
}

export interface ScheduledTransactionFields {
  readonly accountId: string;
  readonly payeeId: string | null;
  readonly categoryId: string | null;
  readonly amount: number;
  /** Next occurrence */
  readonly date: string;
  /** Recurrence, e.g. "Monthly", "EveryOtherWeek" */
  readonly frequency: string;
  readonly memo?: string | undefined;
}

// =============================================================================
// Variants
// =============================================================================

export type Account = EntityEnvelope & { readonly entityType: "account" } & AccountFields;

export type Payee = EntityEnvelope & { readonly entityType: "payee" } & PayeeFields;

export type PayeeRenamingRule = EntityEnvelope & {
  readonly entityType: "payeeRenamingRule";
} & PayeeRenamingRuleFields;

export type MasterCategory = EntityEnvelope & {
  readonly entityType: "masterCategory";
} & MasterCategoryFields;

export type SubCategory = EntityEnvelope & {
  readonly entityType: "subCategory";
} & SubCategoryFields;

export type MonthlyBudget = EntityEnvelope & {
  readonly entityType: "monthlyBudget";
} & MonthlyBudgetFields;

export type MonthlyCategoryBudget = EntityEnvelope & {
  readonly entityType: "monthlyCategoryBudget";
} & MonthlyCategoryBudgetFields;

export type Transaction = EntityEnvelope & {
  readonly entityType: "transaction";
} & TransactionFields;

export type ScheduledTransaction = EntityEnvelope & {
  readonly entityType: "scheduledTransaction";
} & ScheduledTransactionFields;

/**
 * Any ledger record.
 */
export type Entity =
  | Account
  | Payee
  | PayeeRenamingRule
  | MasterCategory
  | SubCategory
  | MonthlyBudget
  | MonthlyCategoryBudget
  | Transaction
  | ScheduledTransaction;

/** The `entityType` discriminator. */
export type EntityKind = Entity["entityType"];

/** The variant for one kind. */
export type EntityOf<K extends EntityKind> = Extract<Entity, { readonly entityType: K }>;

/** The kind-specific fields of a variant, without envelope or discriminator. */
export type EntityFields<K extends EntityKind> = Omit<
  EntityOf<K>,
  keyof EntityEnvelope | "entityType"
>;

/**
 * Every kind, in the order snapshots list them.
 */
export const ENTITY_KINDS: readonly EntityKind[] = [
  "account",
  "payee",
  "payeeRenamingRule",
  "masterCategory",
  "subCategory",
  "monthlyBudget",
  "monthlyCategoryBudget",
  "transaction",
  "scheduledTransaction",
] as const;

/**
 * Snapshot document key for each kind.
 */
export const SNAPSHOT_KEYS: Readonly<Record<EntityKind, string>> = {
  account: "accounts",
  payee: "payees",
  payeeRenamingRule: "payeeRenamingRules",
  masterCategory: "masterCategories",
  subCategory: "subCategories",
  monthlyBudget: "monthlyBudgets",
  monthlyCategoryBudget: "monthlyCategoryBudgets",
  transaction: "transactions",
  scheduledTransaction: "scheduledTransactions",
} as const;
