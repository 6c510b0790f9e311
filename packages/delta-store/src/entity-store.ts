/**
 * @ledgerfold/delta-store — Entity store.
 *
 * Working copy of the ledger: the latest revision of every entity that
 * has ever existed, keyed by (kind, id), plus a dirty set of entities the
 * caller changed since the last commit.
 *
 * Two write paths:
 * - caller mutations (create/update/remove) mark entities dirty and keep
 *   their current version until a commit stamps them
 * - the engine's applyRevision/applyTombstone, which only ever let a
 *   strictly newer version replace the held one
 *
 * Live views never include tombstoned entities. Tombstones themselves
 * stay in the store so later stale records cannot resurrect them.
 */

import { randomUUID } from "node:crypto";
import type {
  Entity,
  EntityFields,
  EntityKind,
  EntityOf,
  EntityVersion,
} from "@ledgerfold/types";
import { UNSTAMPED_VERSION, compareEntityVersions } from "@ledgerfold/types";
import type { TombstoneRef } from "./codec.js";
import { explainInvalidEntity, isEntityOf } from "./codec.js";
import type { LedgerFileSystem } from "./fs.js";
import { EntityNotFoundError, InvalidMutationError } from "./errors.js";
import type { SyncWarning } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Identity of one entity.
 */
export interface EntityRef {
  readonly entityType: EntityKind;
  readonly entityId: string;
}

/**
 * Where a store was loaded from. Commits write back to the same place.
 */
export interface StoreOrigin {
  readonly rootDir: string;
  readonly fs: LedgerFileSystem;
}

/**
 * What happened while a store was loaded.
 */
export interface LoadReport {
  /** Highest counter reflected in the store after loading */
  readonly knowledge: number;
  /** Filenames of the segments folded in, in apply order */
  readonly appliedSegments: readonly string[];
  /** Paths of segments left out because they were malformed */
  readonly skippedSegments: readonly string[];
  readonly appliedRecords: number;
  /** Records ignored because a newer revision was already held */
  readonly staleRecords: number;
  readonly warnings: readonly SyncWarning[];
}

/**
 * Result of offering one revision to the store.
 */
export type ApplyOutcome = "applied" | "stale";

export interface EntityStoreInit {
  readonly entities?: Iterable<Entity>;
  readonly tombstones?: Iterable<TombstoneRef>;
  readonly knowledge?: number;
  readonly origin?: StoreOrigin;
}

function keyOf(entityType: EntityKind, entityId: string): string {
  return `${entityType}:${entityId}`;
}

function compareRefs(a: EntityRef, b: EntityRef): number {
  if (a.entityId !== b.entityId) {
    return a.entityId < b.entityId ? -1 : 1;
  }
  if (a.entityType !== b.entityType) {
    return a.entityType < b.entityType ? -1 : 1;
  }
  return 0;
}

// =============================================================================
// Entity Store
// =============================================================================

export class EntityStore {
  private readonly _revisions = new Map<string, Entity>();
  private readonly _bareTombstones = new Map<string, TombstoneRef>();
  private readonly _dirty = new Map<string, EntityRef>();
  private _knowledge: number;
  private _loadReport: LoadReport | undefined;

  readonly origin: StoreOrigin | undefined;

  constructor(init: EntityStoreInit = {}) {
    this._knowledge = init.knowledge ?? 0;
    this.origin = init.origin;
    for (const entity of init.entities ?? []) {
      this.applyRevision(entity);
    }
    for (const tombstone of init.tombstones ?? []) {
      this.applyTombstone(tombstone);
    }
  }

  // ─── Read ──────────────────────────────────────────────────────────

  /**
   * The live entity, or undefined if it never existed or is tombstoned.
   */
  get<K extends EntityKind>(entityType: K, entityId: string): EntityOf<K> | undefined {
    const entity = this._revisions.get(keyOf(entityType, entityId));
    if (entity === undefined || entity.isTombstone || !isKind(entity, entityType)) {
      return undefined;
    }
    return entity;
  }

  /**
   * Like get(), but throws when there is no live entity.
   */
  require<K extends EntityKind>(entityType: K, entityId: string): EntityOf<K> {
    const entity = this.get(entityType, entityId);
    if (entity === undefined) {
      throw new EntityNotFoundError(entityType, entityId);
    }
    return entity;
  }

  has(entityType: EntityKind, entityId: string): boolean {
    return this.get(entityType, entityId) !== undefined;
  }

  /**
   * All live entities of one kind, ordered by id.
   */
  list<K extends EntityKind>(entityType: K): readonly EntityOf<K>[] {
    const result: EntityOf<K>[] = [];
    for (const entity of this._revisions.values()) {
      if (!entity.isTombstone && isKind(entity, entityType)) {
        result.push(entity);
      }
    }
    return result.sort(compareRefs);
  }

  /**
   * Latest revision of every entity, tombstones included, ordered by id.
   */
  revisions(): readonly Entity[] {
    return [...this._revisions.values()].sort(compareRefs);
  }

  /**
   * Deletions known only by their envelope.
   */
  tombstones(): readonly TombstoneRef[] {
    return [...this._bareTombstones.values()].sort(compareRefs);
  }

  /**
   * Latest revision held for (kind, id), tombstoned or not.
   */
  getRevision(entityType: EntityKind, entityId: string): Entity | undefined {
    return this._revisions.get(keyOf(entityType, entityId));
  }

  /**
   * Version of whatever is held for (kind, id), including bare tombstones.
   */
  versionOf(entityType: EntityKind, entityId: string): EntityVersion | undefined {
    const key = keyOf(entityType, entityId);
    return this._revisions.get(key)?.entityVersion ?? this._bareTombstones.get(key)?.entityVersion;
  }

  /** Highest counter this store reflects. */
  get knowledge(): number {
    return this._knowledge;
  }

  get loadReport(): LoadReport | undefined {
    return this._loadReport;
  }

  // ─── Caller mutations ──────────────────────────────────────────────

  /**
   * Create a new entity. The id defaults to a fresh upper-case UUID.
   *
   * @throws {InvalidMutationError} if the fields are invalid or the id was ever used
   */
  create<K extends EntityKind>(
    entityType: K,
    fields: EntityFields<K>,
    entityId: string = randomUUID().toUpperCase(),
  ): EntityOf<K> {
    if (this.versionOf(entityType, entityId) !== undefined) {
      throw new InvalidMutationError(`${entityType} id "${entityId}" is already in use`);
    }
    const candidate = {
      ...fields,
      entityType,
      entityId,
      entityVersion: UNSTAMPED_VERSION,
      isTombstone: false,
    };
    return this._writeMutation(entityType, candidate);
  }

  /**
   * Change fields of a live entity. The envelope cannot be changed.
   *
   * @throws {EntityNotFoundError} if there is no live entity
   * @throws {InvalidMutationError} if the result is invalid
   */
  update<K extends EntityKind>(
    entityType: K,
    entityId: string,
    patch: Partial<EntityFields<K>>,
  ): EntityOf<K> {
    const current = this.require(entityType, entityId);
    const candidate = {
      ...current,
      ...patch,
      entityType,
      entityId,
      entityVersion: current.entityVersion,
      isTombstone: false,
    };
    return this._writeMutation(entityType, candidate);
  }

  /**
   * Delete a live entity by tombstoning it. Fields are kept.
   *
   * @throws {EntityNotFoundError} if there is no live entity
   */
  remove(entityType: EntityKind, entityId: string): void {
    const current = this.require(entityType, entityId);
    const key = keyOf(entityType, entityId);
    this._revisions.set(key, { ...current, isTombstone: true });
    this._dirty.set(key, { entityType, entityId });
  }

  isDirty(entityType: EntityKind, entityId: string): boolean {
    return this._dirty.has(keyOf(entityType, entityId));
  }

  /**
   * Entities changed since the last commit, in the order a commit
   * stamps them (by id).
   */
  dirtyEntries(): readonly EntityRef[] {
    return [...this._dirty.values()].sort(compareRefs);
  }

  get hasChanges(): boolean {
    return this._dirty.size > 0;
  }

  private _writeMutation<K extends EntityKind>(
    entityType: K,
    candidate: object,
  ): EntityOf<K> {
    if (!isEntityOf(candidate, entityType)) {
      throw new InvalidMutationError(
        `Invalid ${entityType}: ${explainInvalidEntity(candidate, entityType)}`,
      );
    }
    const key = keyOf(entityType, candidate.entityId);
    this._revisions.set(key, candidate);
    this._dirty.set(key, { entityType, entityId: candidate.entityId });
    return candidate;
  }

  // ─── Engine side ───────────────────────────────────────────────────

  /**
   * Offer a revision read from disk. It replaces what is held only when
   * its version is strictly newer.
   */
  applyRevision(entity: Entity): ApplyOutcome {
    const key = keyOf(entity.entityType, entity.entityId);
    if (!this._isNewer(key, entity.entityVersion)) {
      return "stale";
    }
    this._revisions.set(key, entity);
    this._bareTombstones.delete(key);
    this.observeCounter(entity.entityVersion.counter);
    return "applied";
  }

  /**
   * Offer a field-less tombstone. A held revision keeps its fields and
   * becomes tombstoned; otherwise the envelope is remembered on its own.
   */
  applyTombstone(tombstone: TombstoneRef): ApplyOutcome {
    const key = keyOf(tombstone.entityType, tombstone.entityId);
    if (!this._isNewer(key, tombstone.entityVersion)) {
      return "stale";
    }
    const held = this._revisions.get(key);
    if (held !== undefined) {
      this._revisions.set(key, {
        ...held,
        entityVersion: tombstone.entityVersion,
        isTombstone: true,
      });
    } else {
      this._bareTombstones.set(key, tombstone);
    }
    this.observeCounter(tombstone.entityVersion.counter);
    return "applied";
  }

  /**
   * Raise the store's knowledge to at least `counter`.
   */
  observeCounter(counter: number): void {
    if (counter > this._knowledge) {
      this._knowledge = counter;
    }
  }

  /**
   * Install the stamped revisions a commit just published and clear
   * their dirty flags.
   */
  markCommitted(stamped: readonly Entity[], knowledge: number): void {
    for (const entity of stamped) {
      const key = keyOf(entity.entityType, entity.entityId);
      this._revisions.set(key, entity);
      this._dirty.delete(key);
    }
    this.observeCounter(knowledge);
  }

  recordLoad(report: LoadReport): void {
    this._loadReport = report;
  }

  private _isNewer(key: string, version: EntityVersion): boolean {
    const held = this._revisions.get(key)?.entityVersion ?? this._bareTombstones.get(key)?.entityVersion;
    return held === undefined || compareEntityVersions(version, held) > 0;
  }
}

function isKind<K extends EntityKind>(entity: Entity, entityType: K): entity is EntityOf<K> {
  return entity.entityType === entityType;
}
