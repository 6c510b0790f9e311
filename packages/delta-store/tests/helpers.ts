/**
 * Fixture builders shared by the delta-store tests.
 */

import { join } from "node:path";
import { pino } from "pino";
import type { Logger } from "pino";
import { InMemoryFileSystem } from "../src/fs.js";
import { FORMAT_VERSION, metaPath, segmentPath, snapshotPath, writerDir } from "../src/layout.js";

export const ROOT = "/budget";

export const WRITER_A = "AAAAAAAA-0000-4000-8000-000000000001";
export const WRITER_B = "BBBBBBBB-0000-4000-8000-000000000002";
export const WRITER_C = "CCCCCCCC-0000-4000-8000-000000000003";

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function writeJson(fs: InMemoryFileSystem, path: string, value: unknown): void {
  fs.makeDirectory(join(path, ".."));
  fs.writeFileAtomic(path, JSON.stringify(value, null, 2));
}

// =============================================================================
// Records
// =============================================================================

export function accountRecord(
  entityId: string,
  entityVersion: string,
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    entityType: "account",
    entityId,
    entityVersion,
    isTombstone: false,
    accountName: "Checking",
    accountType: "Checking",
    onBudget: true,
    sortableIndex: 0,
    hidden: false,
    ...overrides,
  };
}

export function payeeRecord(
  entityId: string,
  entityVersion: string,
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    entityType: "payee",
    entityId,
    entityVersion,
    isTombstone: false,
    name: "Corner Shop",
    enabled: true,
    ...overrides,
  };
}

export function transactionRecord(
  entityId: string,
  entityVersion: string,
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    entityType: "transaction",
    entityId,
    entityVersion,
    isTombstone: false,
    accountId: "acct-1",
    payeeId: null,
    categoryId: null,
    amount: 0,
    date: "2024-03-01",
    cleared: "Uncleared",
    accepted: true,
    ...overrides,
  };
}

export function tombstoneRecord(
  entityType: string,
  entityId: string,
  entityVersion: string,
): Record<string, unknown> {
  return { entityType, entityId, entityVersion, isTombstone: true };
}

// =============================================================================
// Files
// =============================================================================

export function writeSnapshot(
  fs: InMemoryFileSystem,
  sections: Record<string, unknown> = {},
  root = ROOT,
): void {
  writeJson(fs, snapshotPath(root), { formatVersion: FORMAT_VERSION, ...sections });
}

export function writeWriterMeta(
  fs: InMemoryFileSystem,
  writerGuid: string,
  writerTag: string,
  knowledge: number,
  root = ROOT,
): void {
  fs.makeDirectory(writerDir(root, writerGuid));
  writeJson(fs, metaPath(root, writerGuid), {
    formatVersion: FORMAT_VERSION,
    deviceGuid: writerGuid,
    shortDeviceId: writerTag,
    hasFullKnowledge: false,
    knowledge,
  });
}

export function writeSegment(
  fs: InMemoryFileSystem,
  writerGuid: string,
  writerTag: string,
  start: number,
  end: number,
  items: readonly unknown[],
  root = ROOT,
): string {
  const path = segmentPath(root, writerGuid, { start, end });
  writeJson(fs, path, {
    formatVersion: FORMAT_VERSION,
    deviceGuid: writerGuid,
    shortDeviceId: writerTag,
    startVersion: start,
    endVersion: end,
    publishTime: "2024-03-01T12:00:00.000Z",
    items,
  });
  return path;
}

export function readJson(fs: InMemoryFileSystem, path: string): unknown {
  return JSON.parse(fs.readFile(path));
}
