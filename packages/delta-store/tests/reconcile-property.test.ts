/**
 * Property-based tests for reconciliation.
 *
 * Random histories of payee edits by up to three writers are split into
 * segments and written in random discovery orders. The folded state
 * must not depend on that order, and must match the last edit made to
 * each entity.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { InMemoryFileSystem } from "../src/fs.js";
import { EntityStore } from "../src/entity-store.js";
import { Reconciler } from "../src/reconciler.js";
import { computeStateHash } from "../src/state-hash.js";
import {
  ROOT,
  WRITER_A,
  WRITER_B,
  WRITER_C,
  payeeRecord,
  silentLogger,
  tombstoneRecord,
  writeSegment,
} from "./helpers.js";

const WRITERS = [
  { guid: WRITER_A, tag: "A" },
  { guid: WRITER_B, tag: "B" },
  { guid: WRITER_C, tag: "C" },
] as const;

interface Edit {
  readonly writer: 0 | 1 | 2;
  readonly entity: number;
  readonly tombstone: boolean;
  readonly name: string;
}

interface PlannedSegment {
  readonly writer: 0 | 1 | 2;
  readonly start: number;
  readonly end: number;
  readonly items: unknown[];
}

const editArb: fc.Arbitrary<Edit> = fc.record({
  writer: fc.constantFrom<0 | 1 | 2>(0, 1, 2),
  entity: fc.integer({ min: 0, max: 3 }),
  tombstone: fc.boolean(),
  name: fc.string({ maxLength: 8 }),
});

/** Counter i+1 for edit i; consecutive edits by one writer share a segment. */
function plan(edits: readonly Edit[]): PlannedSegment[] {
  const segments: PlannedSegment[] = [];
  edits.forEach((edit, i) => {
    const counter = i + 1;
    const { tag } = WRITERS[edit.writer];
    const item = edit.tombstone
      ? tombstoneRecord("payee", `p${edit.entity}`, `${tag}-${counter}`)
      : payeeRecord(`p${edit.entity}`, `${tag}-${counter}`, { name: edit.name });
    const last = segments[segments.length - 1];
    if (last !== undefined && last.writer === edit.writer) {
      segments[segments.length - 1] = { ...last, end: counter, items: [...last.items, item] };
    } else {
      segments.push({ writer: edit.writer, start: counter, end: counter, items: [item] });
    }
  });
  return segments;
}

function fold(segments: readonly PlannedSegment[]): EntityStore {
  const fs = new InMemoryFileSystem();
  for (const segment of segments) {
    const { guid, tag } = WRITERS[segment.writer];
    writeSegment(fs, guid, tag, segment.start, segment.end, segment.items);
  }
  const store = new EntityStore();
  new Reconciler({ fs, policy: "abort", logger: silentLogger() }).reconcile(store, ROOT);
  return store;
}

describe("reconciliation properties", () => {
  it("folded state does not depend on discovery order", () => {
    const historyArb = fc
      .array(editArb, { minLength: 1, maxLength: 20 })
      .map(plan)
      .chain((segments) =>
        fc.tuple(
          fc.constant(segments),
          fc.shuffledSubarray(segments, {
            minLength: segments.length,
            maxLength: segments.length,
          }),
        ),
      );

    fc.assert(
      fc.property(historyArb, ([segments, shuffled]) => {
        expect(computeStateHash(fold(shuffled))).toBe(computeStateHash(fold(segments)));
      }),
      { numRuns: 100 },
    );
  });

  it("each entity ends up as its last edit", () => {
    fc.assert(
      fc.property(fc.array(editArb, { minLength: 1, maxLength: 20 }), (edits) => {
        const store = fold(plan(edits));

        for (let entity = 0; entity <= 3; entity++) {
          const lastIndex = edits.map((e) => e.entity).lastIndexOf(entity);
          const live = store.get("payee", `p${entity}`);
          const lastEdit = edits[lastIndex];

          if (lastEdit === undefined || lastEdit.tombstone) {
            expect(live).toBeUndefined();
          } else {
            expect(live?.name).toBe(lastEdit.name);
            expect(live?.entityVersion.counter).toBe(lastIndex + 1);
          }
        }
        expect(store.knowledge).toBe(edits.length);
      }),
      { numRuns: 100 },
    );
  });
});
