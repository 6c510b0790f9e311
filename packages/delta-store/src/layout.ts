/**
 * @ledgerfold/delta-store — On-disk layout.
 *
 *   <root>/data/Full.snapshot
 *   <root>/devices/<writerGuid>/<writerGuid>.meta
 *   <root>/devices/<writerGuid>/<start>_<end>.delta
 *
 * Segment filenames carry their inclusive counter range in decimal.
 */

import { join } from "node:path";
import type { CounterRange } from "@ledgerfold/types";

export const FORMAT_VERSION = "1.0";

export const DATA_DIR = "data";
export const DEVICES_DIR = "devices";
export const SNAPSHOT_FILE = "Full.snapshot";
export const META_EXTENSION = ".meta";
export const DELTA_EXTENSION = ".delta";

const SEGMENT_FILENAME_PATTERN = /^(\d+)_(\d+)\.delta$/;

export function snapshotPath(rootDir: string): string {
  return join(rootDir, DATA_DIR, SNAPSHOT_FILE);
}

export function devicesDir(rootDir: string): string {
  return join(rootDir, DEVICES_DIR);
}

export function writerDir(rootDir: string, writerGuid: string): string {
  return join(rootDir, DEVICES_DIR, writerGuid);
}

export function metaPath(rootDir: string, writerGuid: string): string {
  return join(writerDir(rootDir, writerGuid), `${writerGuid}${META_EXTENSION}`);
}

export function segmentPath(rootDir: string, writerGuid: string, range: CounterRange): string {
  return join(writerDir(rootDir, writerGuid), segmentFileName(range));
}

/**
 * Filename for a segment covering `range`, e.g. "16_16.delta".
 */
export function segmentFileName(range: CounterRange): string {
  return `${range.start}_${range.end}${DELTA_EXTENSION}`;
}

/**
 * Parse a segment filename into its counter range.
 *
 * @returns undefined when the name is not "<start>_<end>.delta" with
 *   1 <= start <= end
 */
export function parseSegmentFileName(fileName: string): CounterRange | undefined {
  const match = SEGMENT_FILENAME_PATTERN.exec(fileName);
  if (match === null) {
    return undefined;
  }
  const start = Number(match[1]);
  const end = Number(match[2]);
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    return undefined;
  }
  if (start < 1 || start > end) {
    return undefined;
  }
  return { start, end };
}

/**
 * Whether a filename claims to be a delta segment (valid or not).
 */
export function isSegmentCandidate(fileName: string): boolean {
  return fileName.endsWith(DELTA_EXTENSION);
}
