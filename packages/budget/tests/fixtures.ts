/**
 * Entity builders for budget query tests.
 */

import type {
  Entity,
  EntityFields,
  EntityKind,
  EntityOf,
  TransactionFields,
} from "@ledgerfold/types";
import { EntityStore } from "@ledgerfold/delta-store";

let counter = 0;

function stamp<K extends EntityKind>(
  entityType: K,
  entityId: string,
  fields: EntityFields<K>,
  isTombstone = false,
) {
  counter += 1;
  return {
    entityType,
    entityId,
    entityVersion: { writerTag: "A", counter },
    isTombstone,
    ...fields,
  };
}

export function account(id: string, name = "Checking"): EntityOf<"account"> {
  return stamp("account", id, {
    accountName: name,
    accountType: "Checking",
    onBudget: true,
    sortableIndex: 0,
    hidden: false,
  });
}

export function payee(id: string, name: string, isTombstone = false): EntityOf<"payee"> {
  return stamp("payee", id, { name, enabled: true }, isTombstone);
}

export function renamingRule(
  id: string,
  operator: "is" | "contains" | "startsWith" | "endsWith",
  operand: string,
  targetPayeeId: string,
): EntityOf<"payeeRenamingRule"> {
  return stamp("payeeRenamingRule", id, { operator, operand, targetPayeeId });
}

export function subCategory(id: string, name: string, isTombstone = false): EntityOf<"subCategory"> {
  return stamp(
    "subCategory",
    id,
    { name, type: "OUTFLOW", masterCategoryId: "mc-1", sortableIndex: 0 },
    isTombstone,
  );
}

export function monthlyBudget(id: string, month: string): EntityOf<"monthlyBudget"> {
  return stamp("monthlyBudget", id, { month });
}

export function categoryBudget(
  id: string,
  parentMonthlyBudgetId: string,
  categoryId: string,
  budgeted: number,
): EntityOf<"monthlyCategoryBudget"> {
  return stamp("monthlyCategoryBudget", id, { parentMonthlyBudgetId, categoryId, budgeted });
}

export function transaction(
  id: string,
  fields: Partial<TransactionFields> = {},
  isTombstone = false,
): EntityOf<"transaction"> {
  return stamp(
    "transaction",
    id,
    {
      accountId: "acct-1",
      payeeId: null,
      categoryId: null,
      amount: 0,
      date: "2024-03-01",
      cleared: "Uncleared",
      accepted: true,
      ...fields,
    },
    isTombstone,
  );
}

export function storeOf(...entities: Entity[]): EntityStore {
  return new EntityStore({ entities });
}
