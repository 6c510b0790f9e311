/**
 * @ledgerfold/delta-store — State hash.
 *
 * A digest of a store's reconciled contents, for checking that two
 * readers (or two discovery orders) arrived at the same state.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { formatEntityVersion } from "@ledgerfold/types";
import { encodeEntity } from "./codec.js";
import type { EntityStore } from "./entity-store.js";

/**
 * SHA-256 of the canonical JSON of every revision and bare tombstone.
 * Dirty, uncommitted changes are included as they stand.
 */
export function computeStateHash(store: EntityStore): string {
  const state = {
    revisions: store.revisions().map(encodeEntity),
    tombstones: store.tombstones().map((t) => ({
      entityType: t.entityType,
      entityId: t.entityId,
      entityVersion: formatEntityVersion(t.entityVersion),
    })),
  };
  return createHash("sha256").update(canonicalize(state)).digest("hex");
}
