/**
 * Tests for DeltaWriter.
 *
 * Verifies:
 * - One counter per dirty entity, stamped in id order
 * - Segment body format
 * - Metadata knowledge update
 * - Conflicts and rollback leave nothing half-published
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryFileSystem } from "../src/fs.js";
import { EntityStore } from "../src/entity-store.js";
import { DeltaWriter } from "../src/delta-writer.js";
import { KnowledgeTracker } from "../src/knowledge-tracker.js";
import { WriteConflictError } from "../src/errors.js";
import { metaPath, segmentPath } from "../src/layout.js";
import {
  ROOT,
  WRITER_A,
  WRITER_B,
  readJson,
  silentLogger,
  writeSegment,
  writeWriterMeta,
} from "./helpers.js";

const PUBLISHED = new Date("2024-03-02T08:30:00.000Z");

/**
 * Refuses to write writer metadata, to exercise rollback.
 */
class MetaRejectingFileSystem extends InMemoryFileSystem {
  rejectMeta = false;

  override writeFileAtomic(path: string, content: string): void {
    if (this.rejectMeta && path.endsWith(".meta")) {
      throw new Error("disk full");
    }
    super.writeFileAtomic(path, content);
  }
}

function makeWriter(fs: InMemoryFileSystem): DeltaWriter {
  const logger = silentLogger();
  return new DeltaWriter({
    fs,
    rootDir: ROOT,
    tracker: new KnowledgeTracker({ fs, rootDir: ROOT, logger }),
    logger,
    clock: () => PUBLISHED,
  });
}

describe("DeltaWriter", () => {
  let fs: InMemoryFileSystem;

  beforeEach(() => {
    fs = new InMemoryFileSystem();
    writeWriterMeta(fs, WRITER_A, "A", 10);
    writeWriterMeta(fs, WRITER_B, "B", 15);
  });

  it("writes nothing when the store is clean", () => {
    const before = fs.listFiles().length;
    const result = makeWriter(fs).commit(new EntityStore({ knowledge: 15 }), WRITER_B);

    expect(result).toEqual({ written: false, writerGuid: WRITER_B });
    expect(fs.listFiles()).toHaveLength(before);
  });

  it("stamps dirty entities in id order with consecutive counters", () => {
    const store = new EntityStore({ knowledge: 15 });
    store.create("payee", { name: "Second", enabled: true }, "p2");
    store.create("payee", { name: "First", enabled: true }, "p1");

    const result = makeWriter(fs).commit(store, WRITER_B);

    expect(result).toMatchObject({
      written: true,
      writerTag: "B",
      range: { start: 16, end: 17 },
      fileName: "16_17.delta",
      entityCount: 2,
    });
    expect(store.get("payee", "p1")?.entityVersion).toEqual({ writerTag: "B", counter: 16 });
    expect(store.get("payee", "p2")?.entityVersion).toEqual({ writerTag: "B", counter: 17 });
    expect(store.hasChanges).toBe(false);
    expect(store.knowledge).toBe(17);
  });

  it("writes the segment body", () => {
    const store = new EntityStore({ knowledge: 15 });
    store.create("payee", { name: "Bakery", enabled: true }, "p1");

    makeWriter(fs).commit(store, WRITER_A);

    expect(readJson(fs, segmentPath(ROOT, WRITER_A, { start: 16, end: 16 }))).toEqual({
      formatVersion: "1.0",
      deviceGuid: WRITER_A,
      shortDeviceId: "A",
      startVersion: 16,
      endVersion: 16,
      publishTime: "2024-03-02T08:30:00.000Z",
      items: [
        {
          entityType: "payee",
          entityId: "p1",
          entityVersion: "A-16",
          isTombstone: false,
          name: "Bakery",
          enabled: true,
        },
      ],
    });
  });

  it("records the new knowledge in the writer's metadata", () => {
    const store = new EntityStore({ knowledge: 15 });
    store.create("payee", { name: "Bakery", enabled: true }, "p1");

    const result = makeWriter(fs).commit(store, WRITER_A);

    expect(result.written && result.hasFullKnowledge).toBe(true);
    expect(readJson(fs, metaPath(ROOT, WRITER_A))).toMatchObject({
      knowledge: 16,
      hasFullKnowledge: true,
    });
  });

  it("does not claim full knowledge when the store is behind", () => {
    writeSegment(fs, WRITER_B, "B", 16, 20, []);
    const store = new EntityStore({ knowledge: 15 });
    store.create("payee", { name: "Bakery", enabled: true }, "p1");

    const result = makeWriter(fs).commit(store, WRITER_A);

    expect(result).toMatchObject({ written: true, range: { start: 21, end: 21 }, hasFullKnowledge: false });
  });

  it("writes tombstones for removed entities", () => {
    const store = new EntityStore({
      entities: [
        {
          entityType: "payee",
          entityId: "p1",
          entityVersion: { writerTag: "A", counter: 3 },
          isTombstone: false,
          name: "Old",
          enabled: true,
        },
      ],
      knowledge: 15,
    });
    store.remove("payee", "p1");

    makeWriter(fs).commit(store, WRITER_A);

    const body = readJson(fs, segmentPath(ROOT, WRITER_A, { start: 16, end: 16 }));
    expect(body).toMatchObject({
      items: [{ entityId: "p1", entityVersion: "A-16", isTombstone: true, name: "Old" }],
    });
  });

  it("refuses to commit for an unknown writer", () => {
    const store = new EntityStore();
    store.create("payee", { name: "Bakery", enabled: true }, "p1");

    expect(() => makeWriter(fs).commit(store, "UNKNOWN")).toThrow(WriteConflictError);
    expect(store.hasChanges).toBe(true);
  });

  it("withdraws the segment when the metadata update fails", () => {
    const failing = new MetaRejectingFileSystem();
    writeWriterMeta(failing, WRITER_A, "A", 10);
    failing.rejectMeta = true;

    const store = new EntityStore({ knowledge: 15 });
    store.create("payee", { name: "Bakery", enabled: true }, "p1");

    expect(() => makeWriter(failing).commit(store, WRITER_A)).toThrow("disk full");
    expect(failing.listFiles().filter((path) => path.endsWith(".delta"))).toEqual([]);
    expect(store.isDirty("payee", "p1")).toBe(true);
    expect(store.get("payee", "p1")?.entityVersion.counter).toBe(0);
  });
});
