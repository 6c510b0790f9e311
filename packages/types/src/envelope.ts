/**
 * Entity Envelope
 *
 * The identity and revision metadata every ledger record carries,
 * whatever its kind.
 *
 * Rules:
 * - entityId is immutable for the lifetime of the entity and never reused
 * - counters are totally ordered across ALL writers (minting guarantees it)
 * - a tombstone is a revision, never a removal from the log
 */

/**
 * Version stamp of one entity revision.
 *
 * The counter alone orders revisions; the writer tag only records
 * authorship (and breaks ties should two writers ever mint the same counter).
 */
export interface EntityVersion {
  /** Short tag of the writer that authored this revision (e.g., "A") */
  readonly writerTag: string;

  /** Globally comparable counter minted by the knowledge tracker */
  readonly counter: number;
}

/**
 * Fields shared by every entity revision.
 */
export interface EntityEnvelope {
  /** Stable identifier, unique within the entity's kind */
  readonly entityId: string;

  /** Version of the revision currently held */
  readonly entityVersion: EntityVersion;

  /** True when this revision logically deletes the entity */
  readonly isTombstone: boolean;
}

/**
 * Version carried by an entity created in memory and not yet committed.
 * Real counters start at 1, so this sorts before any minted version.
 */
export const UNSTAMPED_VERSION: EntityVersion = Object.freeze({
  writerTag: "",
  counter: 0,
});

const VERSION_PATTERN = /^([A-Z]+)-(\d+)$/;

/**
 * Encode a version stamp in its on-disk form ("A-10").
 */
export function formatEntityVersion(version: EntityVersion): string {
  return `${version.writerTag}-${version.counter}`;
}

/**
 * Decode an on-disk version stamp. Returns undefined when the string
 * is not of the form "<TAG>-<counter>".
 */
export function parseEntityVersion(value: string): EntityVersion | undefined {
  const match = VERSION_PATTERN.exec(value);
  if (match === null) {
    return undefined;
  }
  const [, writerTag, digits] = match;
  if (writerTag === undefined || digits === undefined) {
    return undefined;
  }
  const counter = Number(digits);
  if (!Number.isSafeInteger(counter)) {
    return undefined;
  }
  return { writerTag, counter };
}

/**
 * Total order over versions: counter first, writer tag as tie-break.
 *
 * Tags compare shortest-first, then alphabetically, so "Z" < "AA"
 * follows the order tags are assigned in.
 *
 * @returns negative if a < b, 0 if equal, positive if a > b
 */
export function compareEntityVersions(a: EntityVersion, b: EntityVersion): number {
  if (a.counter !== b.counter) {
    return a.counter - b.counter;
  }
  return compareWriterTags(a.writerTag, b.writerTag);
}

/**
 * Order writer tags the way they are assigned: A…Z, AA, AB, …
 */
export function compareWriterTags(a: string, b: string): number {
  if (a.length !== b.length) {
    return a.length - b.length;
  }
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
