/**
 * @ledgerfold/delta-store — Session entry points.
 *
 * The public surface most callers need:
 *
 *   loadState(rootDir)          snapshot + every segment → EntityStore
 *   commit(store, writerGuid)   dirty entities → one new segment
 *   availableVersions(rootDir)  counters loadState can stop at
 *   registerWriter(rootDir)     a new writer directory and metadata
 *   initializeBudget(rootDir)   an empty budget
 *
 * Each call wires the components up from its options; defaults come
 * from the environment (see config.ts).
 */

import { join } from "node:path";
import type { WriterRecord } from "@ledgerfold/types";
import { ENTITY_KINDS, SNAPSHOT_KEYS } from "@ledgerfold/types";
import type { DeltaPolicy } from "./config.js";
import { loadConfig } from "./config.js";
import type { CommitResult } from "./delta-writer.js";
import { DeltaWriter } from "./delta-writer.js";
import type { EntityStore } from "./entity-store.js";
import { InvalidMutationError } from "./errors.js";
import type { LedgerFileSystem } from "./fs.js";
import { NodeFileSystem } from "./fs.js";
import { KnowledgeTracker } from "./knowledge-tracker.js";
import { DATA_DIR, FORMAT_VERSION, devicesDir, snapshotPath } from "./layout.js";
import type { Logger } from "./logger.js";
import { defaultLogger } from "./logger.js";
import { Reconciler, versionsFrom } from "./reconciler.js";
import { discoverSegments } from "./segment.js";
import { SnapshotLoader } from "./snapshot-loader.js";

export interface SessionOptions {
  readonly fs?: LedgerFileSystem;
  readonly logger?: Logger;
}

export interface LoadOptions extends SessionOptions {
  /** Defaults to DELTA_POLICY from the environment */
  readonly policy?: DeltaPolicy;
  /** Stop at this counter; must be one of availableVersions() */
  readonly upToCounter?: number;
}

export interface CommitOptions {
  readonly logger?: Logger;
  readonly clock?: () => Date;
}

/**
 * Reconstruct the current state of the budget at `rootDir`.
 *
 * @throws {MalformedSnapshotError} if the snapshot cannot be loaded
 * @throws {MalformedDeltaError} on a corrupt segment under the "abort" policy
 * @throws {VersionNotFoundError} if upToCounter is not an available version
 */
export function loadState(rootDir: string, options: LoadOptions = {}): EntityStore {
  const fs = options.fs ?? new NodeFileSystem();
  const logger = options.logger ?? defaultLogger();
  const policy = options.policy ?? loadConfig().DELTA_POLICY;

  const loader = new SnapshotLoader({ fs, logger });
  const snapshot = loader.read(rootDir);
  const store = loader.load(rootDir, snapshot);

  new Reconciler({ fs, policy, logger }).reconcile(store, rootDir, {
    ...(options.upToCounter !== undefined ? { upToCounter: options.upToCounter } : {}),
    priorWarnings: snapshot.warnings,
  });
  return store;
}

/**
 * Publish the store's pending changes as `writerGuid`, writing back to
 * the budget the store was loaded from.
 *
 * @throws {InvalidMutationError} if the store was not loaded from disk
 * @throws {WriteConflictError} if no counter range can be minted safely
 */
export function commit(
  store: EntityStore,
  writerGuid: string,
  options: CommitOptions = {},
): CommitResult {
  const origin = store.origin;
  if (origin === undefined) {
    throw new InvalidMutationError("Store was not loaded from a budget directory");
  }
  const logger = options.logger ?? defaultLogger();
  const tracker = new KnowledgeTracker({ fs: origin.fs, rootDir: origin.rootDir, logger });
  const writer = new DeltaWriter({
    fs: origin.fs,
    rootDir: origin.rootDir,
    tracker,
    logger,
    ...(options.clock !== undefined ? { clock: options.clock } : {}),
  });
  return writer.commit(store, writerGuid);
}

/**
 * Counters loadState can be asked to stop at: 0 for the snapshot alone,
 * then the end counter of every well-named segment, ascending.
 */
export function availableVersions(rootDir: string, options: SessionOptions = {}): readonly number[] {
  const fs = options.fs ?? new NodeFileSystem();
  return versionsFrom(discoverSegments(fs, rootDir).segments);
}

/**
 * Register a new writer for the budget at `rootDir`.
 * The friendly name defaults to WRITER_NAME from the environment.
 */
export function registerWriter(
  rootDir: string,
  options: SessionOptions & { readonly friendlyName?: string } = {},
): WriterRecord {
  const fs = options.fs ?? new NodeFileSystem();
  const friendlyName = options.friendlyName ?? loadConfig().WRITER_NAME;
  const tracker = new KnowledgeTracker({
    fs,
    rootDir,
    logger: options.logger ?? defaultLogger(),
  });
  return tracker.registerWriter(friendlyName !== undefined ? { friendlyName } : {});
}

/**
 * Create an empty budget: a snapshot with no records and a devices/
 * directory.
 *
 * @throws {InvalidMutationError} if a snapshot already exists
 */
export function initializeBudget(rootDir: string, options: SessionOptions = {}): void {
  const fs = options.fs ?? new NodeFileSystem();
  const path = snapshotPath(rootDir);
  if (fs.exists(path)) {
    throw new InvalidMutationError(`A budget already exists at ${rootDir}`);
  }

  const doc: Record<string, unknown> = { formatVersion: FORMAT_VERSION, knowledge: 0 };
  for (const kind of ENTITY_KINDS) {
    doc[SNAPSHOT_KEYS[kind]] = [];
  }

  fs.makeDirectory(join(rootDir, DATA_DIR));
  fs.makeDirectory(devicesDir(rootDir));
  fs.writeFileAtomic(path, `${JSON.stringify(doc, null, 2)}\n`);
  (options.logger ?? defaultLogger()).info({ rootDir }, "Budget initialized");
}
