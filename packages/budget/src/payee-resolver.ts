/**
 * @ledgerfold/budget — Payee renaming.
 *
 * Maps a raw payee string, as a bank export spells it, to a standardized
 * payee. Rules are tried in entity-id order and the first match wins.
 * Rule operands compare case-insensitively; the fallback name match
 * is exact.
 */

import type { Payee, PayeeRenamingRule } from "@ledgerfold/types";
import type { EntityStore } from "@ledgerfold/delta-store";

/**
 * Whether a renaming rule applies to a raw payee string.
 */
export function matchesRule(
  rule: Pick<PayeeRenamingRule, "operator" | "operand">,
  rawName: string,
): boolean {
  const subject = rawName.trim().toLowerCase();
  const operand = rule.operand.trim().toLowerCase();

  switch (rule.operator) {
    case "is":
      return subject === operand;
    case "contains":
      return subject.includes(operand);
    case "startsWith":
      return subject.startsWith(operand);
    case "endsWith":
      return subject.endsWith(operand);
  }
}

/**
 * Resolve a raw payee string to a live payee.
 *
 * A rule whose target payee is gone is passed over.
 */
export function resolvePayee(store: EntityStore, rawName: string): Payee | undefined {
  for (const rule of store.list("payeeRenamingRule")) {
    if (!matchesRule(rule, rawName)) continue;
    const target = store.get("payee", rule.targetPayeeId);
    if (target !== undefined) {
      return target;
    }
  }

  return store.list("payee").find((payee) => payee.name === rawName);
}
