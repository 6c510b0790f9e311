/**
 * @ledgerfold/types — Shared domain types for the ledgerfold stack.
 *
 * These types are used across all ledgerfold packages:
 * - Entity envelope and version stamps
 * - Budget entity kinds (accounts, payees, categories, budgets, transactions)
 * - Writer (device) records and counter ranges
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Envelope
export type { EntityVersion, EntityEnvelope } from "./envelope.js";
export {
  UNSTAMPED_VERSION,
  formatEntityVersion,
  parseEntityVersion,
  compareEntityVersions,
  compareWriterTags,
} from "./envelope.js";

// Entities
export type {
  AccountFields,
  PayeeFields,
  RenamingOperator,
  PayeeRenamingRuleFields,
  MasterCategoryFields,
  SubCategoryFields,
  MonthlyBudgetFields,
  MonthlyCategoryBudgetFields,
  ClearedState,
  SubTransaction,
  TransactionFields,
  ScheduledTransactionFields,
  Account,
  Payee,
  PayeeRenamingRule,
  MasterCategory,
  SubCategory,
  MonthlyBudget,
  MonthlyCategoryBudget,
  Transaction,
  ScheduledTransaction,
  Entity,
  EntityKind,
  EntityOf,
  EntityFields,
} from "./entities.js";
export { ENTITY_KINDS, SNAPSHOT_KEYS } from "./entities.js";

// Writers
export type { WriterRecord, CounterRange } from "./writer.js";

// Runtime type guards
export {
  isEntityKind,
  isClearedState,
  isRenamingOperator,
  isWriterTag,
  isEntityVersion,
  isCounterRange,
  isWriterRecord,
} from "./guards.js";
