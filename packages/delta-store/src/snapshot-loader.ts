/**
 * @ledgerfold/delta-store — Snapshot loader.
 *
 * Reads data/Full.snapshot into a fresh EntityStore.
 *
 * The snapshot is the base every writer folds deltas onto, so any
 * problem with it is fatal. The one exception is forward compatibility:
 * a top-level key or record kind this engine does not know is reported
 * as a warning and left out.
 */

import { z } from "zod";
import type { Entity, EntityKind } from "@ledgerfold/types";
import { ENTITY_KINDS, SNAPSHOT_KEYS } from "@ledgerfold/types";
import type { TombstoneRef } from "./codec.js";
import { decodeRecord, isPlainObject } from "./codec.js";
import { MalformedSnapshotError, UnknownEntityTypeError } from "./errors.js";
import type { LedgerFileSystem } from "./fs.js";
import { snapshotPath } from "./layout.js";
import type { Logger } from "./logger.js";
import { componentLogger, defaultLogger } from "./logger.js";
import { EntityStore } from "./entity-store.js";

const SnapshotHeaderSchema = z.object({
  formatVersion: z.string().optional(),
  knowledge: z.number().int().min(0).optional(),
});

const HEADER_KEYS = new Set(["formatVersion", "knowledge"]);

/**
 * Records nested inside a parent record, with the reference back to the
 * parent they imply.
 */
const NESTED: ReadonlyArray<{
  readonly parent: EntityKind;
  readonly key: string;
  readonly child: EntityKind;
  readonly parentRef: string;
}> = [
  {
    parent: "masterCategory",
    key: "subCategories",
    child: "subCategory",
    parentRef: "masterCategoryId",
  },
  {
    parent: "monthlyBudget",
    key: "monthlySubCategoryBudgets",
    child: "monthlyCategoryBudget",
    parentRef: "parentMonthlyBudgetId",
  },
];

const KIND_BY_KEY = new Map<string, EntityKind>(
  ENTITY_KINDS.map((kind) => [SNAPSHOT_KEYS[kind], kind]),
);

/**
 * Decoded snapshot contents.
 */
export interface LoadedSnapshot {
  readonly path: string;
  readonly entities: readonly Entity[];
  readonly tombstones: readonly TombstoneRef[];
  /** Declared knowledge, or the highest counter found in the records */
  readonly knowledge: number;
  readonly warnings: readonly UnknownEntityTypeError[];
}

export interface SnapshotLoaderOptions {
  readonly fs: LedgerFileSystem;
  readonly logger?: Logger;
}

export class SnapshotLoader {
  private readonly fs: LedgerFileSystem;
  private readonly log: Logger;

  constructor(options: SnapshotLoaderOptions) {
    this.fs = options.fs;
    this.log = componentLogger(options.logger ?? defaultLogger(), "snapshot-loader");
  }

  /**
   * Load the snapshot under `rootDir` into a new store. Pass `snapshot`
   * when it has already been read.
   *
   * @throws {MalformedSnapshotError}
   */
  load(rootDir: string, snapshot: LoadedSnapshot = this.read(rootDir)): EntityStore {
    return new EntityStore({
      entities: snapshot.entities,
      tombstones: snapshot.tombstones,
      knowledge: snapshot.knowledge,
      origin: { rootDir, fs: this.fs },
    });
  }

  /**
   * Read and decode the snapshot without building a store.
   *
   * @throws {MalformedSnapshotError}
   */
  read(rootDir: string): LoadedSnapshot {
    const path = snapshotPath(rootDir);

    let text: string;
    try {
      text = this.fs.readFile(path);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new MalformedSnapshotError(`Cannot read snapshot: ${message}`, path);
    }

    let doc: unknown;
    try {
      doc = JSON.parse(text);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new MalformedSnapshotError(`Snapshot is not valid JSON: ${message}`, path);
    }
    if (!isPlainObject(doc)) {
      throw new MalformedSnapshotError("Snapshot is not a JSON object", path);
    }

    const header = SnapshotHeaderSchema.safeParse(doc);
    if (!header.success) {
      throw new MalformedSnapshotError(
        `Invalid snapshot header: ${header.error.issues.map((i) => i.message).join("; ")}`,
        path,
      );
    }

    const entities: Entity[] = [];
    const tombstones: TombstoneRef[] = [];
    const warnings: UnknownEntityTypeError[] = [];
    const seen = new Set<string>();

    const accept = (raw: unknown, kind: EntityKind, where: string): Entity | undefined => {
      const decoded = decodeRecord(raw, { impliedKind: kind, defaultTombstoneFlag: true });
      switch (decoded.status) {
        case "revision": {
          claim(kind, decoded.entity.entityId, where);
          entities.push(decoded.entity);
          return decoded.entity;
        }
        case "bareTombstone":
          claim(kind, decoded.tombstone.entityId, where);
          tombstones.push(decoded.tombstone);
          return undefined;
        case "unknownKind":
        case "invalid":
          throw new MalformedSnapshotError(
            `Invalid record at ${where}: ${
              decoded.status === "invalid" ? decoded.reason : `kind "${decoded.entityType}"`
            }`,
            path,
          );
      }
    };

    const claim = (kind: EntityKind, entityId: string, where: string): void => {
      const key = `${kind}:${entityId}`;
      if (seen.has(key)) {
        throw new MalformedSnapshotError(`Duplicate ${kind} id "${entityId}" at ${where}`, path);
      }
      seen.add(key);
    };

    for (const [key, value] of Object.entries(doc)) {
      if (HEADER_KEYS.has(key)) {
        continue;
      }
      const kind = KIND_BY_KEY.get(key);
      if (kind === undefined) {
        const warning = new UnknownEntityTypeError(key, path);
        this.log.warn({ key, path }, "Ignoring unknown snapshot section");
        warnings.push(warning);
        continue;
      }
      if (!Array.isArray(value)) {
        throw new MalformedSnapshotError(`Section "${key}" is not an array`, path);
      }

      value.forEach((raw: unknown, index) => {
        const where = `${key}[${index}]`;
        const parent = accept(raw, kind, where);
        if (parent === undefined || !isPlainObject(raw)) {
          return;
        }
        for (const nested of NESTED) {
          const children = raw[nested.key];
          if (nested.parent !== kind || children === undefined) {
            continue;
          }
          if (!Array.isArray(children)) {
            throw new MalformedSnapshotError(`${where}.${nested.key} is not an array`, path);
          }
          children.forEach((child: unknown, childIndex) => {
            const record = isPlainObject(child)
              ? { [nested.parentRef]: parent.entityId, ...child }
              : child;
            accept(record, nested.child, `${where}.${nested.key}[${childIndex}]`);
          });
        }
      });
    }

    const knowledge =
      header.data.knowledge ??
      [...entities, ...tombstones].reduce(
        (max, record) => Math.max(max, record.entityVersion.counter),
        0,
      );

    this.log.debug(
      { path, entities: entities.length, tombstones: tombstones.length, knowledge },
      "Snapshot loaded",
    );

    return { path, entities, tombstones, knowledge, warnings };
  }
}
