/**
 * @ledgerfold/delta-store
 *
 * Multi-writer ledger persistence: a shared snapshot plus per-writer
 * delta segments, reconciled by last-writer-wins on a global counter.
 *
 * Exports:
 * - loadState / commit / availableVersions / registerWriter / initializeBudget
 * - EntityStore (in-memory working copy with dirty tracking)
 * - SnapshotLoader, Reconciler, DeltaWriter, KnowledgeTracker
 * - LedgerFileSystem with Node and in-memory implementations
 * - Error taxonomy, configuration and logging
 */

// Session
export {
  loadState,
  commit,
  availableVersions,
  registerWriter,
  initializeBudget,
} from "./session.js";
export type { SessionOptions, LoadOptions, CommitOptions } from "./session.js";

// Entity store
export { EntityStore } from "./entity-store.js";
export type {
  EntityRef,
  StoreOrigin,
  LoadReport,
  ApplyOutcome,
  EntityStoreInit,
} from "./entity-store.js";

// Components
export { SnapshotLoader } from "./snapshot-loader.js";
export type { LoadedSnapshot, SnapshotLoaderOptions } from "./snapshot-loader.js";

export { Reconciler, foldSegments, versionsFrom } from "./reconciler.js";
export type { FoldResult, ReconcilerOptions, ReconcileOptions } from "./reconciler.js";

export { DeltaWriter } from "./delta-writer.js";
export type { CommitResult, DeltaWriterOptions } from "./delta-writer.js";

export {
  KnowledgeTracker,
  computeGlobalKnowledge,
  nextWriterTag,
  writerTagAt,
} from "./knowledge-tracker.js";
export type { WriterScan, MintedRange, KnowledgeTrackerOptions } from "./knowledge-tracker.js";

export { discoverSegments, readSegment, encodeSegment } from "./segment.js";
export type {
  SegmentRef,
  MutationRecord,
  DeltaSegment,
  SegmentDiscovery,
  SegmentHeader,
} from "./segment.js";

// Codec
export { decodeRecord, encodeEntity, isEntityOf, EntitySchema } from "./codec.js";
export type { DecodedRecord, DecodeOptions, TombstoneRef } from "./codec.js";

// Layout
export {
  FORMAT_VERSION,
  snapshotPath,
  devicesDir,
  writerDir,
  metaPath,
  segmentPath,
  segmentFileName,
  parseSegmentFileName,
} from "./layout.js";

// Filesystem
export { NodeFileSystem, InMemoryFileSystem } from "./fs.js";
export type { LedgerFileSystem, DirectoryEntry } from "./fs.js";

// State hash
export { computeStateHash } from "./state-hash.js";

// Errors
export {
  LedgerFoldError,
  MalformedSnapshotError,
  MalformedDeltaError,
  UnknownEntityTypeError,
  DeviceMetadataCorruptError,
  WriteConflictError,
  VersionGapError,
  CounterCollisionError,
  EntityNotFoundError,
  InvalidMutationError,
  VersionNotFoundError,
} from "./errors.js";
export type { LedgerFoldErrorCode, SyncWarning } from "./errors.js";

// Config & logging
export { ConfigSchema, loadConfig } from "./config.js";
export type { AppConfig, DeltaPolicy } from "./config.js";
export { createLogger, defaultLogger, componentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
