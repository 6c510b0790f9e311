/**
 * @ledgerfold/delta-store — Delta writer.
 *
 * Publishes a store's dirty entities as one new segment:
 *
 *   1. mint a counter range of exactly as many counters as dirty entities
 *   2. stamp each entity (ordered by id) with the next counter
 *   3. write the segment atomically; an existing file is a conflict
 *   4. record the new knowledge in the writer's metadata
 *   5. install the stamped revisions and clear the dirty set
 *
 * If step 4 fails the segment is removed again, so a failed commit never
 * leaves a published segment that the writer's metadata does not cover.
 */

import type { CounterRange, Entity } from "@ledgerfold/types";
import type { EntityStore } from "./entity-store.js";
import { InvalidMutationError, WriteConflictError } from "./errors.js";
import type { LedgerFileSystem } from "./fs.js";
import type { KnowledgeTracker } from "./knowledge-tracker.js";
import { segmentFileName, segmentPath } from "./layout.js";
import type { Logger } from "./logger.js";
import { componentLogger, defaultLogger } from "./logger.js";
import { encodeSegment } from "./segment.js";

export type CommitResult =
  | { readonly written: false; readonly writerGuid: string }
  | {
      readonly written: true;
      readonly writerGuid: string;
      readonly writerTag: string;
      readonly range: CounterRange;
      readonly fileName: string;
      readonly path: string;
      readonly entityCount: number;
      readonly hasFullKnowledge: boolean;
    };

export interface DeltaWriterOptions {
  readonly fs: LedgerFileSystem;
  readonly rootDir: string;
  readonly tracker: KnowledgeTracker;
  readonly logger?: Logger;
  /** Source of the segment's publish time */
  readonly clock?: () => Date;
}

export class DeltaWriter {
  private readonly fs: LedgerFileSystem;
  private readonly rootDir: string;
  private readonly tracker: KnowledgeTracker;
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(options: DeltaWriterOptions) {
    this.fs = options.fs;
    this.rootDir = options.rootDir;
    this.tracker = options.tracker;
    this.log = componentLogger(options.logger ?? defaultLogger(), "delta-writer");
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Publish the store's pending changes as `writerGuid`.
   *
   * A store without changes writes nothing.
   *
   * @throws {WriteConflictError} if no range can be minted or the segment exists
   */
  commit(store: EntityStore, writerGuid: string): CommitResult {
    const dirty = store.dirtyEntries();
    if (dirty.length === 0) {
      this.log.debug({ writerGuid }, "Nothing to commit");
      return { written: false, writerGuid };
    }

    const minted = this.tracker.mintRange(writerGuid, dirty.length, store.knowledge);
    const range: CounterRange = { start: minted.start, end: minted.end };
    const writerTag = minted.writer.writerTag;

    const stamped: Entity[] = dirty.map((ref, i) => {
      const entity = store.getRevision(ref.entityType, ref.entityId);
      if (entity === undefined) {
        throw new InvalidMutationError(`Dirty ${ref.entityType} "${ref.entityId}" is not in the store`);
      }
      return { ...entity, entityVersion: { writerTag, counter: range.start + i } };
    });

    const skippedAny = (store.loadReport?.skippedSegments.length ?? 0) > 0;
    const hasFullKnowledge = !skippedAny && store.knowledge >= minted.globalKnowledge;

    const path = segmentPath(this.rootDir, writerGuid, range);
    const fileName = segmentFileName(range);
    if (this.fs.exists(path)) {
      throw new WriteConflictError(`Segment ${fileName} already exists`, writerGuid);
    }

    this.fs.writeFileAtomic(
      path,
      encodeSegment({ writerGuid, writerTag, range, publishTime: this.clock() }, stamped),
    );

    try {
      this.tracker.recordKnowledge(writerGuid, range.end, hasFullKnowledge);
    } catch (err) {
      this.rollback(path, writerGuid);
      throw err;
    }

    store.markCommitted(stamped, range.end);

    this.log.info(
      { writerGuid, writerTag, start: range.start, end: range.end, entities: stamped.length },
      "Segment committed",
    );

    return {
      written: true,
      writerGuid,
      writerTag,
      range,
      fileName,
      path,
      entityCount: stamped.length,
      hasFullKnowledge,
    };
  }

  private rollback(path: string, writerGuid: string): void {
    try {
      this.fs.removeFile(path);
      this.log.warn({ writerGuid, path }, "Metadata update failed; segment withdrawn");
    } catch (cleanupErr) {
      this.log.error(
        { writerGuid, path, err: cleanupErr },
        "Metadata update failed and the segment could not be withdrawn",
      );
    }
  }
}
