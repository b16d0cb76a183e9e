import { describe, expect, it } from "vitest";
import { fixedNow } from "../../__tests__/fixtures";
import type { IssuerRecord } from "../../core/entities/issuer";
import type { RunLedgerEntry } from "../../core/entities/runLedger";
import type { RunJobPayload } from "../../core/ports/outboundPorts";
import { InMemoryFilingSink } from "../../infra/memory/inMemoryFilingSink";
import { InMemoryJobLedger } from "../../infra/memory/inMemoryJobLedger";
import { MockDisclosurePortal } from "../../infra/providers/mocks/mockDisclosurePortal";
import { RunRequestFactory } from "../../infra/system/systemPorts";
import { IdentityResolver } from "./identityResolver";
import { ReconciliationEngine } from "./reconciliationEngine";
import { ReconciliationOrchestratorService } from "./reconciliationOrchestratorService";

class RejectingIssuerSink extends InMemoryFilingSink {
  async upsertIssuer(issuer: IssuerRecord): Promise<void> {
    if (issuer.issuerId === "000202") {
      throw new Error("constraint violation");
    }
    await super.upsertIssuer(issuer);
  }
}

const setup = (sink: InMemoryFilingSink = new InMemoryFilingSink()) => {
  const portal = new MockDisclosurePortal();
  const ledger = new InMemoryJobLedger();
  const clock = { now: () => fixedNow };
  let sequence = 0;
  const ids = {
    next: () => {
      sequence += 1;
      return `id-${sequence}`;
    },
  };
  const reports: RunLedgerEntry[] = [];
  const queued: RunJobPayload[] = [];

  const engine = new ReconciliationEngine(
    {
      portal,
      sink,
      ledger,
      contentStore: { put: async (_id, bytes) => ({ kind: "inline", data: bytes }) },
      resolver: new IdentityResolver(["filedOn", "filingType", "documentType"]),
      clock,
      ids,
    },
    {
      maxPagesPerWindow: 10,
      workerPoolSize: 2,
      historicalChunkDays: 30,
      overlapDays: 1,
      initialLookbackDays: 7,
    },
  );

  const orchestrator = new ReconciliationOrchestratorService({
    engine,
    ledger,
    portal,
    sink,
    clock,
    requestFactory: new RunRequestFactory(clock, ids),
    queue: {
      enqueue: async (payload) => {
        queued.push(payload);
      },
    },
    reports: {
      write: async (entry) => {
        reports.push(entry);
        return `/reports/run-${entry.runId}.json`;
      },
    },
  });

  return { orchestrator, sink, ledger, reports, queued };
};

describe("ReconciliationOrchestratorService", () => {
  it("uses the initial lookback first and the stored watermark afterwards", async () => {
    const { orchestrator, reports } = setup();

    const first = await orchestrator.runIncremental();
    expect(first).toMatchObject({
      windowStart: "2023-12-26",
      windowEnd: "2024-01-02",
      status: "completed",
      recordsSeen: 24,
      recordsNew: 24,
    });

    const second = await orchestrator.runIncremental();
    expect(second).toMatchObject({
      windowStart: "2024-01-01",
      windowEnd: "2024-01-02",
      status: "completed",
      recordsSeen: 6,
      recordsNew: 0,
    });
    expect(reports.map((entry) => entry.runId)).toEqual([first.runId, second.runId]);
  });

  it("honours an explicit overlap", async () => {
    const { orchestrator } = setup();
    await orchestrator.runIncremental();

    const summary = await orchestrator.runIncremental(3);

    expect(summary.windowStart).toBe("2023-12-30");
  });

  it("runs a historical backfill without touching the watermark", async () => {
    const { orchestrator } = setup();

    const summary = await orchestrator.runHistorical("2023-11-01", "2023-11-10", 4);
    const status = await orchestrator.status();

    expect(summary).toMatchObject({
      mode: "historical",
      windowStart: "2023-11-01",
      windowEnd: "2023-11-10",
      recordsNew: 30,
    });
    expect(status.watermark).toBeNull();
    expect(status.recentRuns.map((entry) => entry.runId)).toEqual([summary.runId]);
  });

  it("enqueues run requests through the factory", async () => {
    const { orchestrator, queued } = setup();

    const payload = await orchestrator.enqueue({ mode: "incremental" });

    expect(queued).toEqual([payload]);
    expect(payload.idempotencyKey).toBe("incremental-2024-01-02-12");
  });

  it("syncs issuers and collects failed upserts", async () => {
    const sink = new RejectingIssuerSink();
    const { orchestrator } = setup(sink);

    const summary = await orchestrator.syncIssuers();

    expect(summary).toEqual({
      fetched: 3,
      upserted: 2,
      errors: [
        {
          intent: "upsert_issuer",
          issuerId: "000202",
          message: "Issuer upsert failed: constraint violation",
        },
      ],
    });
    expect(sink.listIssuers()).toMatchObject([
      { issuerId: "000101", inDefault: false },
      { issuerId: "000303", inDefault: true },
    ]);
  });
});
