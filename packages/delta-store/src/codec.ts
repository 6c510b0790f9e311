/**
 * @ledgerfold/delta-store — Entity record codec.
 *
 * Converts between the camelCase JSON records found in snapshots and
 * delta segments and the typed `Entity` variants.
 *
 * Decoding has exactly one dispatch point: the `entityType` discriminator
 * is checked against the known kinds first, so a kind written by a newer
 * writer yields an "unknownKind" outcome instead of a generic failure.
 * Unrecognised fields are dropped.
 */

import { z } from "zod";
import type { Entity, EntityKind, EntityOf, EntityVersion } from "@ledgerfold/types";
import {
  formatEntityVersion,
  isEntityKind,
  parseEntityVersion,
} from "@ledgerfold/types";

// =============================================================================
// Shared Schemas
// =============================================================================

const EntityVersionSchema = z.string().transform((value, ctx): EntityVersion => {
  const version = parseEntityVersion(value);
  if (version === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid entityVersion "${value}"`,
    });
    return z.NEVER;
  }
  return version;
});

const EnvelopeSchema = z.object({
  entityId: z.string().min(1),
  entityVersion: EntityVersionSchema,
  isTombstone: z.boolean(),
});

const MinorUnits = z.number().int();
const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
const OptionalRef = z.string().min(1).nullable().default(null);

const SubTransactionSchema = z.object({
  entityId: z.string().min(1),
  amount: MinorUnits,
  categoryId: OptionalRef,
  payeeId: z.string().min(1).nullable().optional(),
  memo: z.string().optional(),
});

// =============================================================================
// Per-kind Field Schemas
// =============================================================================

const AccountFieldsSchema = z.object({
  accountName: z.string(),
  accountType: z.string(),
  onBudget: z.boolean(),
  sortableIndex: z.number().int(),
  hidden: z.boolean(),
  note: z.string().optional(),
});

const PayeeFieldsSchema = z.object({
  name: z.string(),
  enabled: z.boolean(),
});

const PayeeRenamingRuleFieldsSchema = z.object({
  operator: z.enum(["is", "contains", "startsWith", "endsWith"]),
  operand: z.string(),
  targetPayeeId: z.string().min(1),
});

const MasterCategoryFieldsSchema = z.object({
  name: z.string(),
  type: z.string(),
  sortableIndex: z.number().int(),
  deleteable: z.boolean(),
  expanded: z.boolean(),
});

const SubCategoryFieldsSchema = z.object({
  name: z.string(),
  type: z.string(),
  masterCategoryId: z.string().min(1),
  sortableIndex: z.number().int(),
  note: z.string().optional(),
});

const MonthlyBudgetFieldsSchema = z.object({
  month: IsoDate,
});

const MonthlyCategoryBudgetFieldsSchema = z.object({
  parentMonthlyBudgetId: z.string().min(1),
  categoryId: z.string().min(1),
  budgeted: MinorUnits,
  overspendingHandling: z.string().optional(),
  note: z.string().optional(),
});

const TransactionFieldsSchema = z.object({
  accountId: z.string().min(1),
  payeeId: OptionalRef,
  categoryId: OptionalRef,
  amount: MinorUnits,
  date: IsoDate,
  cleared: z.enum(["Uncleared", "Cleared", "Reconciled"]),
  accepted: z.boolean(),
  memo: z.string().optional(),
  subTransactions: z.array(SubTransactionSchema).optional(),
});

const ScheduledTransactionFieldsSchema = z.object({
  accountId: z.string().min(1),
  payeeId: OptionalRef,
  categoryId: OptionalRef,
  amount: MinorUnits,
  date: IsoDate,
  frequency: z.string().min(1),
  memo: z.string().optional(),
});

const FIELD_SCHEMAS: Readonly<Record<EntityKind, z.AnyZodObject>> = {
  account: AccountFieldsSchema,
  payee: PayeeFieldsSchema,
  payeeRenamingRule: PayeeRenamingRuleFieldsSchema,
  masterCategory: MasterCategoryFieldsSchema,
  subCategory: SubCategoryFieldsSchema,
  monthlyBudget: MonthlyBudgetFieldsSchema,
  monthlyCategoryBudget: MonthlyCategoryBudgetFieldsSchema,
  transaction: TransactionFieldsSchema,
  scheduledTransaction: ScheduledTransactionFieldsSchema,
};

/**
 * A full on-disk entity revision: envelope, discriminator and fields.
 */
export const EntitySchema: z.ZodType<Entity, z.ZodTypeDef, unknown> = z.discriminatedUnion(
  "entityType",
  [
    EnvelopeSchema.extend({ entityType: z.literal("account") }).merge(AccountFieldsSchema),
    EnvelopeSchema.extend({ entityType: z.literal("payee") }).merge(PayeeFieldsSchema),
    EnvelopeSchema.extend({ entityType: z.literal("payeeRenamingRule") }).merge(
      PayeeRenamingRuleFieldsSchema,
    ),
    EnvelopeSchema.extend({ entityType: z.literal("masterCategory") }).merge(
      MasterCategoryFieldsSchema,
    ),
    EnvelopeSchema.extend({ entityType: z.literal("subCategory") }).merge(
      SubCategoryFieldsSchema,
    ),
    EnvelopeSchema.extend({ entityType: z.literal("monthlyBudget") }).merge(
      MonthlyBudgetFieldsSchema,
    ),
    EnvelopeSchema.extend({ entityType: z.literal("monthlyCategoryBudget") }).merge(
      MonthlyCategoryBudgetFieldsSchema,
    ),
    EnvelopeSchema.extend({ entityType: z.literal("transaction") }).merge(
      TransactionFieldsSchema,
    ),
    EnvelopeSchema.extend({ entityType: z.literal("scheduledTransaction") }).merge(
      ScheduledTransactionFieldsSchema,
    ),
  ],
);

/**
 * A tombstone that carries only its envelope.
 */
const BareTombstoneSchema = EnvelopeSchema.extend({
  entityType: z.custom<EntityKind>(isEntityKind),
  isTombstone: z.literal(true),
});

const InMemoryEnvelopeSchema = z.object({
  entityId: z.string().min(1),
  entityVersion: z.object({
    writerTag: z.string(),
    counter: z.number().int().min(0),
  }),
  isTombstone: z.boolean(),
});

/**
 * Whether an in-memory value is a well-formed entity of `kind`.
 *
 * Used to validate caller mutations before they reach the store.
 */
export function isEntityOf<K extends EntityKind>(value: unknown, kind: K): value is EntityOf<K> {
  if (!isPlainObject(value) || value.entityType !== kind) {
    return false;
  }
  return (
    InMemoryEnvelopeSchema.safeParse(value).success &&
    FIELD_SCHEMAS[kind].strict().safeParse(withoutEnvelope(value)).success
  );
}

/**
 * Describe why a value is not a well-formed entity of `kind`.
 */
export function explainInvalidEntity(value: unknown, kind: EntityKind): string {
  if (!isPlainObject(value)) {
    return "value is not an object";
  }
  const envelope = InMemoryEnvelopeSchema.safeParse(value);
  if (!envelope.success) {
    return formatIssues(envelope.error);
  }
  const fields = FIELD_SCHEMAS[kind].strict().safeParse(withoutEnvelope(value));
  return fields.success ? "entityType mismatch" : formatIssues(fields.error);
}

function withoutEnvelope(value: Record<string, unknown>): Record<string, unknown> {
  const { entityType: _type, entityId: _id, entityVersion: _version, isTombstone: _flag, ...fields } =
    value;
  return fields;
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Envelope of a deletion whose record carries no fields.
 */
export interface TombstoneRef {
  readonly entityType: EntityKind;
  readonly entityId: string;
  readonly entityVersion: EntityVersion;
}

/**
 * Outcome of decoding one record.
 */
export type DecodedRecord =
  | { readonly status: "revision"; readonly entity: Entity }
  | { readonly status: "bareTombstone"; readonly tombstone: TombstoneRef }
  | {
      readonly status: "unknownKind";
      readonly entityType: string;
      readonly entityId: string | undefined;
    }
  | { readonly status: "invalid"; readonly reason: string };

export interface DecodeOptions {
  /** Kind implied by the record's position (snapshot key) */
  readonly impliedKind?: EntityKind;

  /** Treat a missing isTombstone flag as false (snapshots only) */
  readonly defaultTombstoneFlag?: boolean;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Decode one raw record.
 */
export function decodeRecord(raw: unknown, options: DecodeOptions = {}): DecodedRecord {
  if (!isPlainObject(raw)) {
    return { status: "invalid", reason: "record is not an object" };
  }

  const declared = raw.entityType;
  const impliedKind = options.impliedKind;
  if (impliedKind !== undefined && declared !== undefined && declared !== impliedKind) {
    return {
      status: "invalid",
      reason: `entityType "${String(declared)}" does not match "${impliedKind}"`,
    };
  }

  const kind = declared ?? impliedKind;
  if (typeof kind !== "string") {
    return { status: "invalid", reason: "entityType is missing" };
  }
  if (!isEntityKind(kind)) {
    return {
      status: "unknownKind",
      entityType: kind,
      entityId: typeof raw.entityId === "string" ? raw.entityId : undefined,
    };
  }

  const candidate: Record<string, unknown> = {
    ...(options.defaultTombstoneFlag === true ? { isTombstone: false } : {}),
    ...raw,
    entityType: kind,
  };

  const full = EntitySchema.safeParse(candidate);
  if (full.success) {
    return { status: "revision", entity: full.data };
  }

  const tombstone = BareTombstoneSchema.safeParse(candidate);
  if (tombstone.success) {
    return {
      status: "bareTombstone",
      tombstone: {
        entityType: tombstone.data.entityType,
        entityId: tombstone.data.entityId,
        entityVersion: tombstone.data.entityVersion,
      },
    };
  }

  return { status: "invalid", reason: formatIssues(full.error) };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ");
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Encode an entity revision as its on-disk record: envelope first,
 * then fields. Absent optional fields are omitted.
 */
export function encodeEntity(entity: Entity): Record<string, unknown> {
  const { entityType, entityId, entityVersion, isTombstone, ...fields } = entity;
  const record: Record<string, unknown> = {
    entityType,
    entityId,
    entityVersion: formatEntityVersion(entityVersion),
    isTombstone,
  };
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      record[key] = value;
    }
  }
  return record;
}
