/**
 * @ledgerfold/delta-store — Reconciler.
 *
 * Folds every writer's delta segments into a store loaded from the
 * snapshot. Records from all segments are merged and applied in version
 * order (counter, then writer tag), and a record only replaces what the
 * store holds when its version is strictly newer. The folded state is
 * therefore the same whatever order the segments were discovered in.
 *
 * Problems that do not make the result wrong are reported, not thrown:
 * - a segment whose range starts past the next expected counter (gap)
 * - two records minted with the same counter (collision)
 * - records of unknown kinds
 * Malformed segments are skipped or abort the fold, per DeltaPolicy.
 */

import { compareEntityVersions } from "@ledgerfold/types";
import type { EntityVersion } from "@ledgerfold/types";
import type { DeltaPolicy } from "./config.js";
import type { EntityStore, LoadReport } from "./entity-store.js";
import type { SyncWarning } from "./errors.js";
import {
  CounterCollisionError,
  MalformedDeltaError,
  VersionGapError,
  VersionNotFoundError,
} from "./errors.js";
import type { LedgerFileSystem } from "./fs.js";
import type { Logger } from "./logger.js";
import { componentLogger, defaultLogger } from "./logger.js";
import type { DeltaSegment, MutationRecord, SegmentRef } from "./segment.js";
import { discoverSegments, readSegment } from "./segment.js";

// =============================================================================
// Pure fold
// =============================================================================

/**
 * Outcome of folding parsed segments into a store.
 */
export interface FoldResult {
  readonly appliedSegments: readonly string[];
  readonly appliedRecords: number;
  readonly staleRecords: number;
  readonly warnings: readonly (VersionGapError | CounterCollisionError)[];
}

interface PendingRecord {
  readonly record: MutationRecord;
  readonly version: EntityVersion;
  readonly segment: SegmentRef;
  readonly index: number;
}

function versionOf(record: MutationRecord): EntityVersion {
  return record.kind === "revision" ? record.entity.entityVersion : record.tombstone.entityVersion;
}

function compareSegments(a: SegmentRef, b: SegmentRef): number {
  return (
    a.range.start - b.range.start ||
    a.range.end - b.range.end ||
    (a.writerGuid < b.writerGuid ? -1 : a.writerGuid > b.writerGuid ? 1 : 0)
  );
}

function comparePending(a: PendingRecord, b: PendingRecord): number {
  return (
    compareEntityVersions(a.version, b.version) ||
    compareSegments(a.segment, b.segment) ||
    a.index - b.index
  );
}

/**
 * Apply parsed segments to `store`.
 *
 * Gap detection starts from the store's knowledge before the fold (the
 * snapshot's knowledge when called during a load).
 */
export function foldSegments(store: EntityStore, segments: readonly DeltaSegment[]): FoldResult {
  const ordered = [...segments].sort((a, b) => compareSegments(a.ref, b.ref));
  const warnings: (VersionGapError | CounterCollisionError)[] = [];

  let known = store.knowledge;
  for (const segment of ordered) {
    if (segment.ref.range.start > known + 1) {
      warnings.push(new VersionGapError(segment.ref.path, known + 1, segment.ref.range.start));
    }
    known = Math.max(known, segment.ref.range.end);
  }

  const pending: PendingRecord[] = [];
  for (const segment of ordered) {
    segment.records.forEach((record, index) => {
      pending.push({ record, version: versionOf(record), segment: segment.ref, index });
    });
  }
  pending.sort(comparePending);

  const tagsByCounter = new Map<number, Set<string>>();
  let applied = 0;
  let stale = 0;

  for (const item of pending) {
    const tags = tagsByCounter.get(item.version.counter) ?? new Set<string>();
    tags.add(item.version.writerTag);
    tagsByCounter.set(item.version.counter, tags);

    const outcome =
      item.record.kind === "revision"
        ? store.applyRevision(item.record.entity)
        : store.applyTombstone(item.record.tombstone);
    if (outcome === "applied") {
      applied++;
    } else {
      stale++;
    }
  }

  for (const [counter, tags] of tagsByCounter) {
    if (tags.size > 1) {
      warnings.push(new CounterCollisionError(counter, [...tags].sort()));
    }
  }

  for (const segment of ordered) {
    store.observeCounter(segment.ref.range.end);
  }

  return {
    appliedSegments: ordered.map((s) => s.ref.fileName),
    appliedRecords: applied,
    staleRecords: stale,
    warnings,
  };
}

// =============================================================================
// Reconciler
// =============================================================================

export interface ReconcilerOptions {
  readonly fs: LedgerFileSystem;
  readonly policy: DeltaPolicy;
  readonly logger?: Logger;
}

export interface ReconcileOptions {
  /** Only fold segments whose range ends at or below this counter */
  readonly upToCounter?: number;
  /** Warnings raised before the fold, reported alongside its own */
  readonly priorWarnings?: readonly SyncWarning[];
}

export class Reconciler {
  private readonly fs: LedgerFileSystem;
  private readonly policy: DeltaPolicy;
  private readonly log: Logger;

  constructor(options: ReconcilerOptions) {
    this.fs = options.fs;
    this.policy = options.policy;
    this.log = componentLogger(options.logger ?? defaultLogger(), "reconciler");
  }

  /**
   * Discover, read and fold every segment under `rootDir` into `store`,
   * then attach the resulting report to the store.
   *
   * @throws {MalformedDeltaError} under the "abort" policy
   * @throws {VersionNotFoundError} if upToCounter is not an available version
   */
  reconcile(store: EntityStore, rootDir: string, options: ReconcileOptions = {}): LoadReport {
    const discovery = discoverSegments(this.fs, rootDir);
    const warnings: SyncWarning[] = [...(options.priorWarnings ?? [])];
    const skipped: string[] = [];

    const skip = (error: MalformedDeltaError): void => {
      if (this.policy === "abort") {
        this.log.error({ path: error.path }, error.message);
        throw error;
      }
      this.log.warn({ path: error.path }, `Skipping segment: ${error.message}`);
      skipped.push(error.path);
      warnings.push(error);
    };

    discovery.malformed.forEach(skip);

    let refs = discovery.segments;
    const upTo = options.upToCounter;
    if (upTo !== undefined) {
      const available = versionsFrom(refs);
      if (!available.includes(upTo)) {
        throw new VersionNotFoundError(upTo, available);
      }
      refs = refs.filter((ref) => ref.range.end <= upTo);
    }

    const segments: DeltaSegment[] = [];
    for (const ref of refs) {
      let segment: DeltaSegment;
      try {
        segment = readSegment(this.fs, ref);
      } catch (err) {
        if (err instanceof MalformedDeltaError) {
          skip(err);
          continue;
        }
        throw err;
      }
      for (const warning of segment.warnings) {
        this.log.warn({ path: warning.path, entityType: warning.entityType }, warning.message);
      }
      warnings.push(...segment.warnings);
      segments.push(segment);
    }

    const fold = foldSegments(store, segments);
    for (const warning of fold.warnings) {
      this.log.warn({ code: warning.code }, warning.message);
    }
    warnings.push(...fold.warnings);

    const report: LoadReport = {
      knowledge: store.knowledge,
      appliedSegments: fold.appliedSegments,
      skippedSegments: skipped,
      appliedRecords: fold.appliedRecords,
      staleRecords: fold.staleRecords,
      warnings,
    };
    store.recordLoad(report);

    this.log.info(
      {
        knowledge: report.knowledge,
        segments: report.appliedSegments.length,
        skipped: report.skippedSegments.length,
        records: report.appliedRecords,
        stale: report.staleRecords,
      },
      "Reconciled",
    );
    return report;
  }
}

/**
 * Counters a reader may stop at: 0 (snapshot only) and the end counter
 * of every segment, ascending.
 */
export function versionsFrom(segments: readonly SegmentRef[]): readonly number[] {
  return [0, ...new Set(segments.map((s) => s.range.end))].sort((a, b) => a - b);
}
