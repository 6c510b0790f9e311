/**
 * @ledgerfold/delta-store — Delta segments.
 *
 * A segment is one writer's batch of revisions over an inclusive counter
 * range. Its filename is authoritative for the range; the body repeats
 * it and every record's counter must fall inside it.
 *
 * Discovery walks every directory under devices/, including directories
 * whose metadata is missing or corrupt: a segment published by a writer
 * that later lost its metadata still counts.
 */

import { join } from "node:path";
import { z } from "zod";
import type { CounterRange, Entity } from "@ledgerfold/types";
import { formatEntityVersion, isWriterTag } from "@ledgerfold/types";
import type { TombstoneRef } from "./codec.js";
import { decodeRecord, encodeEntity } from "./codec.js";
import { MalformedDeltaError, UnknownEntityTypeError } from "./errors.js";
import type { LedgerFileSystem } from "./fs.js";
import {
  FORMAT_VERSION,
  devicesDir,
  isSegmentCandidate,
  parseSegmentFileName,
  writerDir,
} from "./layout.js";

// =============================================================================
// Types
// =============================================================================

/**
 * A segment file found on disk, before its body has been read.
 */
export interface SegmentRef {
  readonly writerGuid: string;
  readonly fileName: string;
  readonly path: string;
  readonly range: CounterRange;
}

/**
 * One mutation carried by a segment.
 */
export type MutationRecord =
  | { readonly kind: "revision"; readonly entity: Entity }
  | { readonly kind: "tombstone"; readonly tombstone: TombstoneRef };

/**
 * A parsed segment.
 */
export interface DeltaSegment {
  readonly ref: SegmentRef;
  readonly writerTag: string;
  readonly publishTime: string | undefined;
  readonly records: readonly MutationRecord[];
  /** Records of kinds this engine does not know, left out */
  readonly warnings: readonly UnknownEntityTypeError[];
}

export interface SegmentDiscovery {
  readonly segments: readonly SegmentRef[];
  /** Files named *.delta whose names do not encode a valid range */
  readonly malformed: readonly MalformedDeltaError[];
}

// =============================================================================
// Discovery
// =============================================================================

/**
 * Find every segment file under devices/.
 *
 * @throws if devices/ exists but cannot be listed
 */
export function discoverSegments(fs: LedgerFileSystem, rootDir: string): SegmentDiscovery {
  const root = devicesDir(rootDir);
  if (!fs.exists(root)) {
    return { segments: [], malformed: [] };
  }

  const segments: SegmentRef[] = [];
  const malformed: MalformedDeltaError[] = [];

  for (const entry of fs.listDirectory(root)) {
    if (!entry.isDirectory) {
      continue;
    }
    const dir = writerDir(rootDir, entry.name);
    for (const file of fs.listDirectory(dir)) {
      if (file.isDirectory || !isSegmentCandidate(file.name)) {
        continue;
      }
      const path = join(dir, file.name);
      const range = parseSegmentFileName(file.name);
      if (range === undefined) {
        malformed.push(
          new MalformedDeltaError(`Segment filename "${file.name}" is not <start>_<end>.delta`, path),
        );
        continue;
      }
      segments.push({ writerGuid: entry.name, fileName: file.name, path, range });
    }
  }

  return { segments, malformed };
}

// =============================================================================
// Reading
// =============================================================================

const SegmentHeaderSchema = z.object({
  formatVersion: z.string(),
  deviceGuid: z.string().min(1),
  shortDeviceId: z.string().refine(isWriterTag, "shortDeviceId must be upper-case letters"),
  startVersion: z.number().int(),
  endVersion: z.number().int(),
  publishTime: z.string().optional(),
  items: z.array(z.unknown()),
});

/**
 * Read and validate one segment.
 *
 * @throws {MalformedDeltaError} if any part of the segment is invalid
 */
export function readSegment(fs: LedgerFileSystem, ref: SegmentRef): DeltaSegment {
  const fail = (message: string): MalformedDeltaError => new MalformedDeltaError(message, ref.path);

  let doc: unknown;
  try {
    doc = JSON.parse(fs.readFile(ref.path));
  } catch (err) {
    throw fail(`Cannot parse segment: ${err instanceof Error ? err.message : String(err)}`);
  }

  const header = SegmentHeaderSchema.safeParse(doc);
  if (!header.success) {
    throw fail(
      `Invalid segment header: ${header.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ")}`,
    );
  }
  const body = header.data;

  if (body.deviceGuid !== ref.writerGuid) {
    throw fail(`Segment names writer ${body.deviceGuid}, found under ${ref.writerGuid}`);
  }
  if (body.startVersion !== ref.range.start || body.endVersion !== ref.range.end) {
    throw fail(
      `Segment body covers ${body.startVersion}_${body.endVersion}, filename says ${ref.fileName}`,
    );
  }

  const records: MutationRecord[] = [];
  const warnings: UnknownEntityTypeError[] = [];

  body.items.forEach((raw, index) => {
    const decoded = decodeRecord(raw);
    switch (decoded.status) {
      case "unknownKind":
        warnings.push(new UnknownEntityTypeError(decoded.entityType, ref.path, decoded.entityId));
        return;
      case "invalid":
        throw fail(`Invalid item ${index}: ${decoded.reason}`);
      case "revision":
        records.push({ kind: "revision", entity: decoded.entity });
        break;
      case "bareTombstone":
        records.push({ kind: "tombstone", tombstone: decoded.tombstone });
        break;
    }

    const version =
      decoded.status === "revision" ? decoded.entity.entityVersion : decoded.tombstone.entityVersion;
    if (version.counter < ref.range.start || version.counter > ref.range.end) {
      throw fail(
        `Item ${index} has version ${formatEntityVersion(version)}, outside ${ref.range.start}..${ref.range.end}`,
      );
    }
  });

  return {
    ref,
    writerTag: body.shortDeviceId,
    publishTime: body.publishTime,
    records,
    warnings,
  };
}

// =============================================================================
// Writing
// =============================================================================

export interface SegmentHeader {
  readonly writerGuid: string;
  readonly writerTag: string;
  readonly range: CounterRange;
  readonly publishTime: Date;
}

/**
 * Serialize a segment: header fields, then one record per entity.
 */
export function encodeSegment(header: SegmentHeader, entities: readonly Entity[]): string {
  const doc = {
    formatVersion: FORMAT_VERSION,
    deviceGuid: header.writerGuid,
    shortDeviceId: header.writerTag,
    startVersion: header.range.start,
    endVersion: header.range.end,
    publishTime: header.publishTime.toISOString(),
    items: entities.map(encodeEntity),
  };
  return `${JSON.stringify(doc, null, 2)}\n`;
}
