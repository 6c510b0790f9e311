/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger types, used where records cross
 * a system boundary (files written by other writers, caller input).
 */

import type { EntityVersion } from "./envelope.js";
import type { ClearedState, EntityKind, RenamingOperator } from "./entities.js";
import { ENTITY_KINDS } from "./entities.js";
import type { CounterRange, WriterRecord } from "./writer.js";

const KINDS = new Set<string>(ENTITY_KINDS);
const CLEARED_STATES = new Set<string>(["Uncleared", "Cleared", "Reconciled"]);
const OPERATORS = new Set<string>(["is", "contains", "startsWith", "endsWith"]);
const TAG_PATTERN = /^[A-Z]+$/;

function isCounter(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

export function isEntityKind(value: unknown): value is EntityKind {
  return typeof value === "string" && KINDS.has(value);
}

export function isClearedState(value: unknown): value is ClearedState {
  return typeof value === "string" && CLEARED_STATES.has(value);
}

export function isRenamingOperator(value: unknown): value is RenamingOperator {
  return typeof value === "string" && OPERATORS.has(value);
}

export function isWriterTag(value: unknown): value is string {
  return typeof value === "string" && TAG_PATTERN.test(value);
}

export function isEntityVersion(value: unknown): value is EntityVersion {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isWriterTag(v.writerTag) && isCounter(v.counter) && v.counter > 0;
}

export function isCounterRange(value: unknown): value is CounterRange {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isCounter(v.start) && isCounter(v.end) && v.start >= 1 && v.start <= v.end;
}

export function isWriterRecord(value: unknown): value is WriterRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.writerGuid === "string" &&
    v.writerGuid.length > 0 &&
    isWriterTag(v.writerTag) &&
    isCounter(v.knowledge) &&
    typeof v.hasFullKnowledge === "boolean" &&
    (v.friendlyName === undefined || typeof v.friendlyName === "string")
  );
}
