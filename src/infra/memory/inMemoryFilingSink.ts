import type { FilingRecord } from "../../core/entities/filing";
import type { IssuerRecord } from "../../core/entities/issuer";
import type { FilingSinkPort } from "../../core/ports/outboundPorts";

/**
 * Process-local filing sink used by tests and `SINK_BACKEND=memory`. Enforces
 * the same constraints as the Postgres schema: one row per id and at most one
 * active row per document identity.
 */
export class InMemoryFilingSink implements FilingSinkPort {
  private readonly filings = new Map<string, FilingRecord>();
  private readonly issuers = new Map<string, IssuerRecord>();

  async upsertIssuer(issuer: IssuerRecord): Promise<void> {
    const existing = this.issuers.get(issuer.issuerId);
    if (!existing) {
      this.issuers.set(issuer.issuerId, { ...issuer });
      return;
    }

    this.issuers.set(issuer.issuerId, {
      issuerId: issuer.issuerId,
      name: issuer.name,
      jurisdiction: issuer.jurisdiction ?? existing.jurisdiction,
      type: issuer.type ?? existing.type,
      inDefault: issuer.inDefault ?? existing.inDefault,
      activeRestriction: issuer.activeRestriction ?? existing.activeRestriction,
      firstSeen: existing.firstSeen,
      lastSeen:
        issuer.lastSeen > existing.lastSeen ? issuer.lastSeen : existing.lastSeen,
    });
  }

  async upsertFilingActive(record: FilingRecord): Promise<void> {
    this.assertNoOtherActive(record);
    this.write({ ...record, status: "active", failureReason: null });
  }

  async supersede(oldId: string, newRecord: FilingRecord): Promise<void> {
    const prior = this.filings.get(oldId);
    if (!prior) {
      throw new Error(`Cannot supersede unknown filing ${oldId}.`);
    }

    const alreadyApplied =
      prior.status === "superseded" && prior.supersededBy === newRecord.id;
    if (prior.status !== "active" && !alreadyApplied) {
      throw new Error(
        `Cannot supersede ${oldId}: record is ${prior.status}.`,
      );
    }

    this.filings.set(oldId, {
      ...prior,
      status: "superseded",
      supersededBy: newRecord.id,
      updatedAt: newRecord.updatedAt,
    });
    this.write({
      ...newRecord,
      status: "active",
      supersedes: oldId,
      failureReason: null,
    });
  }

  async markFailed(record: FilingRecord): Promise<void> {
    const existing = this.filings.get(record.id);
    if (existing && existing.status !== "failed") {
      return;
    }

    this.write({ ...record, status: "failed", content: null });
  }

  async loadHistories(
    documentIdentities: string[],
  ): Promise<Map<string, FilingRecord[]>> {
    const wanted = new Set(documentIdentities);
    const histories = new Map<string, FilingRecord[]>();

    for (const record of this.filings.values()) {
      if (!wanted.has(record.documentIdentity)) {
        continue;
      }

      const history = histories.get(record.documentIdentity) ?? [];
      history.push({ ...record });
      histories.set(record.documentIdentity, history);
    }

    for (const history of histories.values()) {
      history.sort((left, right) => left.version - right.version);
    }

    return histories;
  }

  listFilings(documentIdentity?: string): FilingRecord[] {
    return [...this.filings.values()]
      .filter(
        (record) =>
          documentIdentity === undefined ||
          record.documentIdentity === documentIdentity,
      )
      .sort(
        (left, right) =>
          left.documentIdentity.localeCompare(right.documentIdentity) ||
          left.version - right.version,
      );
  }

  listIssuers(): IssuerRecord[] {
    return [...this.issuers.values()];
  }

  private write(record: FilingRecord): void {
    const existing = this.filings.get(record.id);
    this.filings.set(record.id, {
      ...record,
      createdAt: existing?.createdAt ?? record.createdAt,
    });
  }

  private assertNoOtherActive(record: FilingRecord): void {
    for (const stored of this.filings.values()) {
      if (
        stored.documentIdentity === record.documentIdentity &&
        stored.status === "active" &&
        stored.id !== record.id
      ) {
        throw new Error(
          `Document ${record.documentIdentity} already has active record ${stored.id}.`,
        );
      }
    }
  }
}
