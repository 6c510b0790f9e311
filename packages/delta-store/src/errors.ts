/**
 * @ledgerfold/delta-store — Error taxonomy.
 *
 * Fatal conditions are thrown. Recoverable ones (a skipped segment, an
 * unknown record kind, unreadable writer metadata, a version gap) are
 * collected as warnings and logged, so a single bad file never blocks
 * reading an otherwise valid budget.
 */

/**
 * Error codes for delta-store operations.
 */
export type LedgerFoldErrorCode =
  | "MALFORMED_SNAPSHOT"
  | "MALFORMED_DELTA"
  | "UNKNOWN_ENTITY_TYPE"
  | "DEVICE_METADATA_CORRUPT"
  | "WRITE_CONFLICT"
  | "VERSION_GAP"
  | "COUNTER_COLLISION"
  | "ENTITY_NOT_FOUND"
  | "INVALID_MUTATION"
  | "VERSION_NOT_FOUND";

/**
 * Base class for every error the engine raises.
 */
export class LedgerFoldError extends Error {
  constructor(
    public readonly code: LedgerFoldErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "LedgerFoldError";
  }
}

/**
 * The snapshot is missing, unreadable, or lacks required fields.
 * Always fatal: loading aborts.
 */
export class MalformedSnapshotError extends LedgerFoldError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super("MALFORMED_SNAPSHOT", message);
    this.name = "MalformedSnapshotError";
  }
}

/**
 * A delta segment could not be parsed. Skipped or fatal depending on
 * the configured delta policy.
 */
export class MalformedDeltaError extends LedgerFoldError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super("MALFORMED_DELTA", message);
    this.name = "MalformedDeltaError";
  }
}

/**
 * A record carries a kind this engine does not know. Only that record
 * is skipped.
 */
export class UnknownEntityTypeError extends LedgerFoldError {
  constructor(
    public readonly entityType: string,
    public readonly path: string,
    public readonly entityId?: string,
  ) {
    super(
      "UNKNOWN_ENTITY_TYPE",
      entityId !== undefined
        ? `Unknown entity type "${entityType}" for entity "${entityId}" in ${path}`
        : `Unknown entity type "${entityType}" in ${path}`,
    );
    this.name = "UnknownEntityTypeError";
  }
}

/**
 * A writer's metadata record is missing or unreadable. The writer is
 * left out of knowledge computation.
 */
export class DeviceMetadataCorruptError extends LedgerFoldError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super("DEVICE_METADATA_CORRUPT", message);
    this.name = "DeviceMetadataCorruptError";
  }
}

/**
 * A counter range cannot be minted safely, or the target segment
 * already exists. The commit aborts without writing anything.
 */
export class WriteConflictError extends LedgerFoldError {
  constructor(
    message: string,
    public readonly writerGuid: string,
  ) {
    super("WRITE_CONFLICT", message);
    this.name = "WriteConflictError";
  }
}

/**
 * A segment starts after the counter expected to come next.
 * Warning only; the segment is still applied.
 */
export class VersionGapError extends LedgerFoldError {
  constructor(
    public readonly path: string,
    public readonly expectedStart: number,
    public readonly actualStart: number,
  ) {
    super(
      "VERSION_GAP",
      `Segment ${path} starts at ${actualStart}, expected ${expectedStart}`,
    );
    this.name = "VersionGapError";
  }
}

/**
 * Two records share a counter, which minting should have prevented.
 * Resolved by writer tag; reported as a warning.
 */
export class CounterCollisionError extends LedgerFoldError {
  constructor(
    public readonly counter: number,
    public readonly writerTags: readonly string[],
  ) {
    super(
      "COUNTER_COLLISION",
      `Counter ${counter} was minted by more than one revision (${writerTags.join(", ")})`,
    );
    this.name = "CounterCollisionError";
  }
}

export class EntityNotFoundError extends LedgerFoldError {
  constructor(
    public readonly entityType: string,
    public readonly entityId: string,
  ) {
    super("ENTITY_NOT_FOUND", `No live ${entityType} with id "${entityId}"`);
    this.name = "EntityNotFoundError";
  }
}

export class InvalidMutationError extends LedgerFoldError {
  constructor(message: string) {
    super("INVALID_MUTATION", message);
    this.name = "InvalidMutationError";
  }
}

/**
 * A requested historical counter is not the end of any segment.
 */
export class VersionNotFoundError extends LedgerFoldError {
  constructor(
    public readonly counter: number,
    public readonly available: readonly number[],
  ) {
    super(
      "VERSION_NOT_FOUND",
      `Counter ${counter} is not an available version (${available.join(", ")})`,
    );
    this.name = "VersionNotFoundError";
  }
}

/**
 * Anything reported without aborting the operation.
 */
export type SyncWarning =
  | MalformedDeltaError
  | UnknownEntityTypeError
  | DeviceMetadataCorruptError
  | VersionGapError
  | CounterCollisionError;
