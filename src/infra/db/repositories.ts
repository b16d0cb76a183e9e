import { and, asc, desc, eq, inArray, sql } from "drizzle-orm";
import type {
  ContentLocation,
  FilingRecord,
  IsoDate,
} from "../../core/entities/filing";
import type { IssuerRecord } from "../../core/entities/issuer";
import type { RunLedgerEntry } from "../../core/entities/runLedger";
import type {
  FilingSinkPort,
  JobLedgerPort,
  RunLedgerPatch,
} from "../../core/ports/outboundPorts";
import type { Database } from "./client";
import { filingsTable, issuersTable, runLedgerTable } from "./schema";

type FilingRow = typeof filingsTable.$inferSelect;
type FilingInsert = typeof filingsTable.$inferInsert;

const toFilingRow = (record: FilingRecord): FilingInsert => ({
  id: record.id,
  documentIdentity: record.documentIdentity,
  issuerId: record.issuerId,
  filingType: record.filingType,
  documentType: record.documentType,
  filedOn: record.filedOn,
  version: record.version,
  supersedes: record.supersedes,
  supersededBy: record.supersededBy,
  contentKind: record.content?.kind ?? null,
  contentInline: record.content?.kind === "inline" ? record.content.data : null,
  contentUri: record.content?.kind === "reference" ? record.content.uri : null,
  sizeBytes: record.sizeBytes,
  fetchedBytes: record.fetchedBytes,
  sizeMismatch: record.sizeMismatch,
  sourceUrl: record.sourceUrl,
  amendmentMarker: record.amendmentMarker,
  status: record.status,
  failureReason: record.failureReason,
  runId: record.runId,
  createdAt: record.createdAt,
  updatedAt: record.updatedAt,
});

const toContent = (row: FilingRow): ContentLocation | null => {
  if (row.contentKind === "inline" && row.contentInline) {
    return { kind: "inline", data: row.contentInline };
  }

  if (row.contentKind === "reference" && row.contentUri) {
    return { kind: "reference", uri: row.contentUri };
  }

  return null;
};

const toFilingRecord = (row: FilingRow): FilingRecord => ({
  id: row.id,
  documentIdentity: row.documentIdentity,
  issuerId: row.issuerId,
  filingType: row.filingType,
  documentType: row.documentType,
  filedOn: row.filedOn,
  version: row.version,
  supersedes: row.supersedes,
  supersededBy: row.supersededBy,
  content: toContent(row),
  sizeBytes: row.sizeBytes,
  fetchedBytes: row.fetchedBytes,
  sizeMismatch: row.sizeMismatch,
  sourceUrl: row.sourceUrl,
  amendmentMarker: row.amendmentMarker,
  status: row.status,
  failureReason: row.failureReason,
  runId: row.runId,
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
});

/**
 * Columns a re-applied intent may rewrite. `id`, identity, version and
 * `created_at` never change once a row exists.
 */
const mutableFilingColumns = {
  issuerId: sql`excluded.issuer_id`,
  filingType: sql`excluded.filing_type`,
  documentType: sql`excluded.document_type`,
  filedOn: sql`excluded.filed_on`,
  supersedes: sql`excluded.supersedes`,
  contentKind: sql`excluded.content_kind`,
  contentInline: sql`excluded.content_inline`,
  contentUri: sql`excluded.content_uri`,
  sizeBytes: sql`excluded.size_bytes`,
  fetchedBytes: sql`excluded.fetched_bytes`,
  sizeMismatch: sql`excluded.size_mismatch`,
  sourceUrl: sql`excluded.source_url`,
  amendmentMarker: sql`excluded.amendment_marker`,
  status: sql`excluded.status`,
  failureReason: sql`excluded.failure_reason`,
  runId: sql`excluded.run_id`,
  updatedAt: sql`excluded.updated_at`,
};

/**
 * Filing and issuer sink on Postgres. Every write is an upsert keyed by record
 * id, so re-applying an intent from a retried run converges on the same rows.
 */
export class PostgresFilingSink implements FilingSinkPort {
  constructor(private readonly db: Database) {}

  /**
   * `first_seen` is kept from the first insert, `last_seen` only moves forward
   * and unreported (null) attributes keep their stored value.
   */
  async upsertIssuer(issuer: IssuerRecord): Promise<void> {
    await this.db
      .insert(issuersTable)
      .values(issuer)
      .onConflictDoUpdate({
        target: issuersTable.issuerId,
        set: {
          name: sql`excluded.name`,
          jurisdiction: sql`coalesce(excluded.jurisdiction, ${issuersTable.jurisdiction})`,
          type: sql`coalesce(excluded.type, ${issuersTable.type})`,
          inDefault: sql`coalesce(excluded.in_default, ${issuersTable.inDefault})`,
          activeRestriction: sql`coalesce(excluded.active_restriction, ${issuersTable.activeRestriction})`,
          lastSeen: sql`greatest(${issuersTable.lastSeen}, excluded.last_seen)`,
        },
      });
  }

  async upsertFilingActive(record: FilingRecord): Promise<void> {
    await this.db
      .insert(filingsTable)
      .values(toFilingRow({ ...record, status: "active", failureReason: null }))
      .onConflictDoUpdate({
        target: filingsTable.id,
        set: mutableFilingColumns,
      });
  }

  /**
   * Demotes the prior version before the new one becomes active, inside one
   * transaction, so the partial unique index on active rows always holds.
   */
  async supersede(oldId: string, newRecord: FilingRecord): Promise<void> {
    await this.db.transaction(async (tx) => {
      const [prior] = await tx
        .select()
        .from(filingsTable)
        .where(eq(filingsTable.id, oldId))
        .for("update");

      if (!prior) {
        throw new Error(`Cannot supersede unknown filing ${oldId}.`);
      }

      const alreadyApplied =
        prior.status === "superseded" && prior.supersededBy === newRecord.id;
      if (prior.status !== "active" && !alreadyApplied) {
        throw new Error(`Cannot supersede ${oldId}: record is ${prior.status}.`);
      }

      await tx
        .update(filingsTable)
        .set({
          status: "superseded",
          supersededBy: newRecord.id,
          updatedAt: newRecord.updatedAt,
        })
        .where(eq(filingsTable.id, oldId));

      await tx
        .insert(filingsTable)
        .values(
          toFilingRow({
            ...newRecord,
            status: "active",
            supersedes: oldId,
            failureReason: null,
          }),
        )
        .onConflictDoUpdate({
          target: filingsTable.id,
          set: mutableFilingColumns,
        });
    });
  }

  /**
   * Never demotes a row that already holds content: the update only applies
   * while the stored row is itself failed.
   */
  async markFailed(record: FilingRecord): Promise<void> {
    await this.db
      .insert(filingsTable)
      .values(toFilingRow({ ...record, status: "failed", content: null }))
      .onConflictDoUpdate({
        target: filingsTable.id,
        set: mutableFilingColumns,
        setWhere: sql`${filingsTable.status} = 'failed'`,
      });
  }

  async loadHistories(
    documentIdentities: string[],
  ): Promise<Map<string, FilingRecord[]>> {
    const histories = new Map<string, FilingRecord[]>();
    if (documentIdentities.length === 0) {
      return histories;
    }

    const rows = await this.db
      .select()
      .from(filingsTable)
      .where(inArray(filingsTable.documentIdentity, documentIdentities))
      .orderBy(asc(filingsTable.documentIdentity), asc(filingsTable.version));

    for (const row of rows) {
      const history = histories.get(row.documentIdentity) ?? [];
      history.push(toFilingRecord(row));
      histories.set(row.documentIdentity, history);
    }

    return histories;
  }
}

export class PostgresJobLedger implements JobLedgerPort {
  constructor(private readonly db: Database) {}

  async create(entry: RunLedgerEntry): Promise<void> {
    await this.db.insert(runLedgerTable).values(entry);
  }

  async update(runId: string, patch: RunLedgerPatch): Promise<void> {
    const updated = await this.db
      .update(runLedgerTable)
      .set(patch)
      .where(eq(runLedgerTable.runId, runId))
      .returning({ runId: runLedgerTable.runId });

    if (updated.length === 0) {
      throw new Error(`Run ${runId} is not in the ledger.`);
    }
  }

  async finalize(entry: RunLedgerEntry): Promise<void> {
    const { runId, mode: _mode, startedAt: _startedAt, ...patch } = entry;
    await this.update(runId, patch);
  }

  async latestSuccessfulWatermark(): Promise<IsoDate | null> {
    const [row] = await this.db
      .select({ windowEnd: runLedgerTable.windowEnd })
      .from(runLedgerTable)
      .where(
        and(
          eq(runLedgerTable.mode, "incremental"),
          eq(runLedgerTable.status, "completed"),
        ),
      )
      .orderBy(desc(runLedgerTable.endedAt), desc(runLedgerTable.startedAt))
      .limit(1);

    return row?.windowEnd ?? null;
  }

  async listRecent(limit: number): Promise<RunLedgerEntry[]> {
    return this.db
      .select()
      .from(runLedgerTable)
      .orderBy(desc(runLedgerTable.startedAt))
      .limit(limit);
  }
}
