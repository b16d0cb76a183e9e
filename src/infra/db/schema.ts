import { sql } from "drizzle-orm";
import {
  bigint,
  boolean,
  customType,
  date,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import type { FilingStatus } from "../../core/entities/filing";
import type {
  IntentError,
  RunMode,
  RunState,
  RunStatus,
} from "../../core/entities/runLedger";

const bytea = customType<{ data: Uint8Array; driverData: Buffer }>({
  dataType() {
    return "bytea";
  },
  toDriver(value) {
    return Buffer.from(value);
  },
  fromDriver(value) {
    return new Uint8Array(value);
  },
});

export const issuersTable = pgTable("issuers", {
  issuerId: text("issuer_id").primaryKey(),
  name: text("name").notNull(),
  jurisdiction: text("jurisdiction"),
  type: text("type"),
  inDefault: boolean("in_default"),
  activeRestriction: boolean("active_restriction"),
  firstSeen: timestamp("first_seen", { withTimezone: true }).notNull(),
  lastSeen: timestamp("last_seen", { withTimezone: true }).notNull(),
});

export const filingsTable = pgTable(
  "filings",
  {
    id: text("id").primaryKey(),
    documentIdentity: text("document_identity").notNull(),
    issuerId: text("issuer_id").notNull(),
    filingType: text("filing_type").notNull(),
    documentType: text("document_type").notNull(),
    filedOn: date("filed_on", { mode: "string" }).notNull(),
    version: integer("version").notNull(),
    supersedes: text("supersedes"),
    supersededBy: text("superseded_by"),
    contentKind: text("content_kind").$type<"inline" | "reference">(),
    contentInline: bytea("content_inline"),
    contentUri: text("content_uri"),
    sizeBytes: bigint("size_bytes", { mode: "number" }),
    fetchedBytes: bigint("fetched_bytes", { mode: "number" }),
    sizeMismatch: boolean("size_mismatch").notNull().default(false),
    sourceUrl: text("source_url"),
    amendmentMarker: boolean("amendment_marker").notNull().default(false),
    status: text("status").$type<FilingStatus>().notNull(),
    failureReason: text("failure_reason"),
    runId: text("run_id").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    identityVersionIdx: uniqueIndex("filings_identity_version_uidx").on(
      table.documentIdentity,
      table.version,
    ),
    // At most one active version per document identity.
    activeIdentityIdx: uniqueIndex("filings_active_identity_uidx")
      .on(table.documentIdentity)
      .where(sql`status = 'active'`),
    issuerIdx: index("filings_issuer_idx").on(table.issuerId),
  }),
);

export const runLedgerTable = pgTable(
  "run_ledger",
  {
    runId: text("run_id").primaryKey(),
    mode: text("mode").$type<RunMode>().notNull(),
    windowStart: date("window_start", { mode: "string" }).notNull(),
    windowEnd: date("window_end", { mode: "string" }).notNull(),
    status: text("status").$type<RunStatus>().notNull(),
    state: text("state").$type<RunState>().notNull(),
    recordsSeen: integer("records_seen").notNull().default(0),
    recordsNew: integer("records_new").notNull().default(0),
    recordsSuperseded: integer("records_superseded").notNull().default(0),
    recordsFailed: integer("records_failed").notNull().default(0),
    recordsErrored: integer("records_errored").notNull().default(0),
    startedAt: timestamp("started_at", { withTimezone: true }).notNull(),
    endedAt: timestamp("ended_at", { withTimezone: true }),
    errorDetail: text("error_detail"),
    intentErrors: jsonb("intent_errors").$type<IntentError[]>().notNull(),
    warnings: jsonb("warnings").$type<string[]>().notNull(),
  },
  (table) => ({
    watermarkIdx: index("run_ledger_watermark_idx").on(
      table.mode,
      table.status,
      table.endedAt,
    ),
  }),
);
