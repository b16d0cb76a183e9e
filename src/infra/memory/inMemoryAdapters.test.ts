import { describe, expect, it } from "vitest";
import { filingRecord, fixedNow } from "../../__tests__/fixtures";
import { filingRecordId } from "../../core/entities/filing";
import type { IssuerRecord } from "../../core/entities/issuer";
import { emptyRunCounts, type RunLedgerEntry } from "../../core/entities/runLedger";
import { InMemoryFilingSink } from "./inMemoryFilingSink";
import { InMemoryJobLedger } from "./inMemoryJobLedger";

const later = new Date("2024-01-05T00:00:00.000Z");
const earlier = new Date("2023-12-01T00:00:00.000Z");

const issuer = (overrides: Partial<IssuerRecord> = {}): IssuerRecord => ({
  issuerId: "000123",
  name: "Acme Mining Corp.",
  jurisdiction: "Ontario",
  type: "Reporting issuer",
  inDefault: false,
  activeRestriction: false,
  firstSeen: fixedNow,
  lastSeen: fixedNow,
  ...overrides,
});

describe("InMemoryFilingSink", () => {
  it("keeps firstSeen, advances lastSeen and ignores unreported attributes", async () => {
    const sink = new InMemoryFilingSink();
    await sink.upsertIssuer(issuer());
    await sink.upsertIssuer(
      issuer({
        name: "Acme Mining Corporation",
        jurisdiction: null,
        inDefault: null,
        activeRestriction: true,
        firstSeen: later,
        lastSeen: later,
      }),
    );
    await sink.upsertIssuer(issuer({ firstSeen: earlier, lastSeen: earlier }));

    expect(sink.listIssuers()).toEqual([
      {
        issuerId: "000123",
        name: "Acme Mining Corp.",
        jurisdiction: "Ontario",
        type: "Reporting issuer",
        inDefault: false,
        activeRestriction: false,
        firstSeen: fixedNow,
        lastSeen: later,
      },
    ]);
  });

  it("refuses a second active record for one document", async () => {
    const sink = new InMemoryFilingSink();
    await sink.upsertFilingActive(filingRecord({ documentIdentity: "doc-1" }));

    await expect(
      sink.upsertFilingActive(filingRecord({ documentIdentity: "doc-1", version: 2 })),
    ).rejects.toThrow(
      `Document doc-1 already has active record ${filingRecordId("doc-1", 1)}.`,
    );
  });

  it("applies a supersede once and accepts its replay", async () => {
    const sink = new InMemoryFilingSink();
    const first = filingRecord({ documentIdentity: "doc-1" });
    const second = filingRecord({ documentIdentity: "doc-1", version: 2, updatedAt: later });
    await sink.upsertFilingActive(first);

    await sink.supersede(first.id, second);
    await sink.supersede(first.id, second);

    const [prior, current] = sink.listFilings("doc-1");
    expect(prior).toMatchObject({ status: "superseded", supersededBy: second.id, updatedAt: later });
    expect(current).toMatchObject({ status: "active", supersedes: first.id, version: 2 });
  });

  it("never demotes a stored record to failed", async () => {
    const sink = new InMemoryFilingSink();
    const record = filingRecord({ documentIdentity: "doc-1" });
    await sink.upsertFilingActive(record);

    await sink.markFailed({ ...record, failureReason: "timeout" });

    expect(sink.listFilings("doc-1")).toEqual([record]);
  });

  it("returns histories ordered by version", async () => {
    const sink = new InMemoryFilingSink();
    await sink.markFailed(
      filingRecord({ documentIdentity: "doc-2", status: "failed", content: null }),
    );
    await sink.upsertFilingActive(filingRecord({ documentIdentity: "doc-1" }));
    await sink.supersede(
      filingRecordId("doc-1", 1),
      filingRecord({ documentIdentity: "doc-1", version: 2 }),
    );

    const histories = await sink.loadHistories(["doc-1", "doc-3"]);

    expect([...histories.keys()]).toEqual(["doc-1"]);
    expect(histories.get("doc-1")?.map((record) => record.version)).toEqual([1, 2]);
  });
});

const entry = (overrides: Partial<RunLedgerEntry> & { runId: string }): RunLedgerEntry => ({
  mode: "incremental",
  windowStart: "2024-01-01",
  windowEnd: "2024-01-02",
  status: "running",
  state: "initializing",
  startedAt: fixedNow,
  endedAt: null,
  errorDetail: null,
  intentErrors: [],
  warnings: [],
  ...emptyRunCounts(),
  ...overrides,
});

describe("InMemoryJobLedger", () => {
  it("reports the window end of the latest completed incremental run", async () => {
    const ledger = new InMemoryJobLedger();
    await ledger.create(
      entry({ runId: "a", status: "completed", windowEnd: "2024-01-02", endedAt: fixedNow }),
    );
    await ledger.create(
      entry({ runId: "b", status: "failed", windowEnd: "2024-01-09", endedAt: later }),
    );
    await ledger.create(
      entry({
        runId: "c",
        mode: "historical",
        status: "completed",
        windowEnd: "2024-02-01",
        endedAt: later,
      }),
    );

    await expect(ledger.latestSuccessfulWatermark()).resolves.toBe("2024-01-02");
  });

  it("returns null before any incremental run completes", async () => {
    await expect(new InMemoryJobLedger().latestSuccessfulWatermark()).resolves.toBeNull();
  });

  it("rejects updates for unknown runs and duplicate creates", async () => {
    const ledger = new InMemoryJobLedger();
    await ledger.create(entry({ runId: "a" }));

    await expect(ledger.create(entry({ runId: "a" }))).rejects.toThrow(
      "Run a already exists in the ledger.",
    );
    await expect(ledger.update("missing", { state: "fetching" })).rejects.toThrow(
      "Run missing is not in the ledger.",
    );
  });

  it("lists the most recently started runs first", async () => {
    const ledger = new InMemoryJobLedger();
    await ledger.create(entry({ runId: "old", startedAt: earlier }));
    await ledger.create(entry({ runId: "new", startedAt: later }));
    await ledger.update("old", { state: "fetching" });

    const recent = await ledger.listRecent(1);

    expect(recent.map((run) => run.runId)).toEqual(["new"]);
    expect(ledger.get("old")?.state).toBe("fetching");
  });
});
