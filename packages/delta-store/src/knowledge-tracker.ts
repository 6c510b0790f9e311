/**
 * @ledgerfold/delta-store — Knowledge tracker.
 *
 * Each writer keeps a metadata record in devices/<guid>/<guid>.meta
 * holding its short tag and the highest counter it has seen. Global
 * knowledge is the highest counter anyone has published, taken from the
 * metadata records AND from segment filenames, since a writer can die
 * after publishing a segment but before updating its metadata.
 *
 * New counters are always minted strictly above global knowledge.
 *
 * The tracker takes no locks. Two writers minting concurrently against
 * the same view of knowledge will collide; the reconciler detects and
 * resolves that case.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { CounterRange, WriterRecord } from "@ledgerfold/types";
import { compareWriterTags, isWriterTag } from "@ledgerfold/types";
import { DeviceMetadataCorruptError, WriteConflictError } from "./errors.js";
import type { LedgerFileSystem } from "./fs.js";
import {
  FORMAT_VERSION,
  devicesDir,
  isSegmentCandidate,
  metaPath,
  parseSegmentFileName,
  writerDir,
} from "./layout.js";
import type { Logger } from "./logger.js";
import { componentLogger, defaultLogger } from "./logger.js";

// =============================================================================
// Metadata record
// =============================================================================

const WriterMetaSchema = z.object({
  formatVersion: z.string().optional(),
  deviceGuid: z.string().min(1),
  shortDeviceId: z.string().refine(isWriterTag, "shortDeviceId must be upper-case letters"),
  friendlyName: z.string().optional(),
  hasFullKnowledge: z.boolean(),
  knowledge: z.number().int().min(0),
});

function encodeWriterMeta(writer: WriterRecord): string {
  const doc = {
    formatVersion: FORMAT_VERSION,
    deviceGuid: writer.writerGuid,
    shortDeviceId: writer.writerTag,
    ...(writer.friendlyName !== undefined ? { friendlyName: writer.friendlyName } : {}),
    hasFullKnowledge: writer.hasFullKnowledge,
    knowledge: writer.knowledge,
  };
  return `${JSON.stringify(doc, null, 2)}\n`;
}

// =============================================================================
// Pure helpers
// =============================================================================

/**
 * Writer tag for a zero-based index: A..Z, then AA, AB, ...
 */
export function writerTagAt(index: number): string {
  let n = index + 1;
  let tag = "";
  while (n > 0) {
    const rem = (n - 1) % 26;
    tag = String.fromCharCode(65 + rem) + tag;
    n = Math.floor((n - 1) / 26);
  }
  return tag;
}

/**
 * The first tag, in A, B, ... Z, AA order, not already taken.
 */
export function nextWriterTag(taken: Iterable<string>): string {
  const used = new Set(taken);
  for (let i = 0; ; i++) {
    const tag = writerTagAt(i);
    if (!used.has(tag)) {
      return tag;
    }
  }
}

/**
 * Highest counter published anywhere: the max over every writer's
 * recorded knowledge and every segment filename's end counter.
 * Names that do not parse are ignored.
 */
export function computeGlobalKnowledge(
  writers: readonly Pick<WriterRecord, "knowledge">[],
  segmentFileNames: readonly string[],
): number {
  let knowledge = 0;
  for (const writer of writers) {
    knowledge = Math.max(knowledge, writer.knowledge);
  }
  for (const name of segmentFileNames) {
    const range = parseSegmentFileName(name);
    if (range !== undefined) {
      knowledge = Math.max(knowledge, range.end);
    }
  }
  return knowledge;
}

// =============================================================================
// Tracker
// =============================================================================

/**
 * Everything known about writers after one pass over devices/.
 */
export interface WriterScan {
  readonly writers: readonly WriterRecord[];
  readonly segmentFileNames: readonly string[];
  readonly warnings: readonly DeviceMetadataCorruptError[];
}

/**
 * A freshly minted counter range and the knowledge it was minted against.
 */
export interface MintedRange extends CounterRange {
  readonly writer: WriterRecord;
  readonly globalKnowledge: number;
}

export interface KnowledgeTrackerOptions {
  readonly fs: LedgerFileSystem;
  readonly rootDir: string;
  readonly logger?: Logger;
}

export class KnowledgeTracker {
  private readonly fs: LedgerFileSystem;
  private readonly rootDir: string;
  private readonly log: Logger;

  constructor(options: KnowledgeTrackerOptions) {
    this.fs = options.fs;
    this.rootDir = options.rootDir;
    this.log = componentLogger(options.logger ?? defaultLogger(), "knowledge-tracker");
  }

  /**
   * Read every writer's metadata and collect every segment filename.
   *
   * Unreadable metadata is reported and the writer left out. A missing
   * devices/ directory means no writer has registered yet.
   *
   * @throws if devices/ exists but cannot be listed
   */
  scan(): WriterScan {
    const root = devicesDir(this.rootDir);
    if (!this.fs.exists(root)) {
      return { writers: [], segmentFileNames: [], warnings: [] };
    }

    const writers: WriterRecord[] = [];
    const segmentFileNames: string[] = [];
    const warnings: DeviceMetadataCorruptError[] = [];

    for (const entry of this.fs.listDirectory(root)) {
      if (!entry.isDirectory) {
        continue;
      }
      const guid = entry.name;

      let names: string[];
      try {
        names = this.fs.listDirectory(writerDir(this.rootDir, guid)).map((e) => e.name);
      } catch (err) {
        warnings.push(this.corrupt(guid, `Cannot list writer directory: ${describe(err)}`));
        continue;
      }
      segmentFileNames.push(...names.filter(isSegmentCandidate));

      const result = this.readMeta(guid);
      if (result instanceof DeviceMetadataCorruptError) {
        warnings.push(result);
      } else {
        writers.push(result);
      }
    }

    writers.sort((a, b) => compareWriterTags(a.writerTag, b.writerTag));
    return { writers, segmentFileNames, warnings };
  }

  /** Writers with readable metadata, ordered by tag. */
  listWriters(): readonly WriterRecord[] {
    return this.scan().writers;
  }

  getWriter(writerGuid: string): WriterRecord | undefined {
    const result = this.readMeta(writerGuid);
    return result instanceof DeviceMetadataCorruptError ? undefined : result;
  }

  /**
   * The writer with the highest knowledge (lowest tag on a tie), which is
   * the one whose view of the budget is most complete.
   */
  activeWriter(): WriterRecord | undefined {
    let best: WriterRecord | undefined;
    for (const writer of this.listWriters()) {
      if (best === undefined || writer.knowledge > best.knowledge) {
        best = writer;
      }
    }
    return best;
  }

  /**
   * Global knowledge as of now.
   */
  globalKnowledge(): number {
    const scan = this.scan();
    return computeGlobalKnowledge(scan.writers, scan.segmentFileNames);
  }

  /**
   * Register a new writer under a fresh GUID and the first free tag.
   */
  registerWriter(options: { readonly friendlyName?: string } = {}): WriterRecord {
    const scan = this.scan();
    const writer: WriterRecord = {
      writerGuid: randomUUID().toUpperCase(),
      writerTag: nextWriterTag(scan.writers.map((w) => w.writerTag)),
      knowledge: 0,
      hasFullKnowledge: false,
      ...(options.friendlyName !== undefined ? { friendlyName: options.friendlyName } : {}),
    };

    this.fs.makeDirectory(writerDir(this.rootDir, writer.writerGuid));
    this.fs.writeFileAtomic(metaPath(this.rootDir, writer.writerGuid), encodeWriterMeta(writer));

    this.log.info(
      { writerGuid: writer.writerGuid, writerTag: writer.writerTag },
      "Writer registered",
    );
    return writer;
  }

  /**
   * Reserve `count` consecutive counters for `writerGuid`, starting one
   * above global knowledge, or above `floor` when that is higher. The
   * floor carries counters the caller has seen that no writer metadata
   * or segment name records (those held only in the snapshot). Nothing
   * is written.
   *
   * @throws {WriteConflictError} if knowledge cannot be established or the
   *   writer has no readable metadata
   */
  mintRange(writerGuid: string, count: number, floor = 0): MintedRange {
    if (!Number.isSafeInteger(count) || count < 1) {
      throw new RangeError(`Cannot mint ${count} counters`);
    }

    let scan: WriterScan;
    try {
      scan = this.scan();
    } catch (err) {
      throw new WriteConflictError(
        `Cannot establish global knowledge: ${describe(err)}`,
        writerGuid,
      );
    }

    const writer = scan.writers.find((w) => w.writerGuid === writerGuid);
    if (writer === undefined) {
      throw new WriteConflictError(
        `Writer ${writerGuid} has no readable metadata`,
        writerGuid,
      );
    }

    const globalKnowledge = computeGlobalKnowledge(scan.writers, scan.segmentFileNames);
    const base = Math.max(globalKnowledge, floor);
    const range: MintedRange = {
      start: base + 1,
      end: base + count,
      writer,
      globalKnowledge,
    };
    this.log.debug(
      { writerGuid, start: range.start, end: range.end },
      "Counter range minted",
    );
    return range;
  }

  /**
   * Atomically rewrite a writer's metadata with new knowledge.
   *
   * @throws {DeviceMetadataCorruptError} if the current metadata is unreadable
   */
  recordKnowledge(
    writerGuid: string,
    knowledge: number,
    hasFullKnowledge: boolean,
  ): WriterRecord {
    const current = this.readMeta(writerGuid);
    if (current instanceof DeviceMetadataCorruptError) {
      throw current;
    }
    const updated: WriterRecord = { ...current, knowledge, hasFullKnowledge };
    this.fs.writeFileAtomic(metaPath(this.rootDir, writerGuid), encodeWriterMeta(updated));
    return updated;
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private readMeta(writerGuid: string): WriterRecord | DeviceMetadataCorruptError {
    const path = metaPath(this.rootDir, writerGuid);

    let doc: unknown;
    try {
      doc = JSON.parse(this.fs.readFile(path));
    } catch (err) {
      return this.corrupt(writerGuid, `Cannot read metadata: ${describe(err)}`);
    }

    const parsed = WriterMetaSchema.safeParse(doc);
    if (!parsed.success) {
      return this.corrupt(
        writerGuid,
        `Invalid metadata: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
      );
    }
    if (parsed.data.deviceGuid !== writerGuid) {
      return this.corrupt(
        writerGuid,
        `Metadata names writer ${parsed.data.deviceGuid}, expected ${writerGuid}`,
      );
    }

    return {
      writerGuid,
      writerTag: parsed.data.shortDeviceId,
      knowledge: parsed.data.knowledge,
      hasFullKnowledge: parsed.data.hasFullKnowledge,
      ...(parsed.data.friendlyName !== undefined
        ? { friendlyName: parsed.data.friendlyName }
        : {}),
    };
  }

  private corrupt(writerGuid: string, message: string): DeviceMetadataCorruptError {
    const path = metaPath(this.rootDir, writerGuid);
    this.log.warn({ writerGuid, path }, message);
    return new DeviceMetadataCorruptError(message, path);
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
