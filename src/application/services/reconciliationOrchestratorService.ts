import { SinkWriteError, describeError } from "../../core/entities/appError";
import type { IsoDate } from "../../core/entities/filing";
import type { IntentError, RunLedgerEntry } from "../../core/entities/runLedger";
import type { DisclosurePortalPort } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  FilingSinkPort,
  JobLedgerPort,
  RunJobPayload,
  RunQueuePort,
  RunReportPort,
  RunRequest,
  RunRequestFactoryPort,
} from "../../core/ports/outboundPorts";
import { logger as rootLogger, type Logger } from "../../shared/logger/logger";
import type {
  EngineRunOptions,
  ReconciliationEngine,
} from "./reconciliationEngine";

export type ReconciliationOrchestratorDependencies = {
  engine: ReconciliationEngine;
  ledger: JobLedgerPort;
  portal: DisclosurePortalPort;
  sink: FilingSinkPort;
  clock: ClockPort;
  requestFactory: RunRequestFactoryPort;
  queue?: RunQueuePort;
  reports?: RunReportPort;
};

export type IssuerSyncSummary = {
  fetched: number;
  upserted: number;
  errors: IntentError[];
};

export type PipelineStatus = {
  watermark: IsoDate | null;
  recentRuns: RunLedgerEntry[];
};

/**
 * Entry point for every trigger (CLI, scheduler, queue worker). Reads the
 * watermark from the ledger and hands it to the engine explicitly.
 */
export class ReconciliationOrchestratorService {
  constructor(
    private readonly deps: ReconciliationOrchestratorDependencies,
    private readonly log: Logger = rootLogger.child({ component: "orchestrator" }),
  ) {}

  async runIncremental(
    overlapDays?: number,
    options: EngineRunOptions = {},
  ): Promise<RunLedgerEntry> {
    return this.execute({ mode: "incremental", overlapDays }, options);
  }

  async runHistorical(
    start: IsoDate,
    end: IsoDate,
    chunkDays?: number,
    options: EngineRunOptions = {},
  ): Promise<RunLedgerEntry> {
    return this.execute({ mode: "historical", start, end, chunkDays }, options);
  }

  async execute(
    request: RunRequest,
    options: EngineRunOptions = {},
  ): Promise<RunLedgerEntry> {
    const summary =
      request.mode === "incremental"
        ? await this.deps.engine.run(
            {
              mode: "incremental",
              watermark: await this.deps.ledger.latestSuccessfulWatermark(),
              overlapDays: request.overlapDays,
            },
            options,
          )
        : await this.deps.engine.run(request, options);

    await this.writeReport(summary);
    return summary;
  }

  /**
   * Queues a run for the worker. `force` bypasses the hourly idempotency key so
   * an operator can rerun inside the same hour.
   */
  async enqueue(request: RunRequest, force = false): Promise<RunJobPayload> {
    if (!this.deps.queue) {
      throw new Error("No run queue is configured for this runtime.");
    }

    const payload = this.deps.requestFactory.create(request, force);
    await this.deps.queue.enqueue(payload);
    this.log.info(
      { requestId: payload.requestId, idempotencyKey: payload.idempotencyKey, request },
      "Run enqueued",
    );
    return payload;
  }

  /**
   * Refreshes every reporting issuer from the portal's issuer export. Failed
   * upserts are collected, like filing intents during a run.
   */
  async syncIssuers(): Promise<IssuerSyncSummary> {
    const profiles = await this.deps.portal.fetchIssuers();
    if (profiles.isErr()) {
      throw profiles.error;
    }

    const now = this.deps.clock.now();
    const errors: IntentError[] = [];
    let upserted = 0;

    for (const profile of profiles.value) {
      try {
        await this.deps.sink.upsertIssuer({
          issuerId: profile.issuerId,
          name: profile.name,
          jurisdiction: profile.jurisdiction ?? null,
          type: profile.type ?? null,
          inDefault: profile.inDefault ?? null,
          activeRestriction: profile.activeRestriction ?? null,
          firstSeen: now,
          lastSeen: now,
        });
        upserted += 1;
      } catch (error) {
        errors.push(
          new SinkWriteError(
            `Issuer upsert failed: ${describeError(error)}`,
            "upsert_issuer",
            { issuerId: profile.issuerId },
            { cause: error },
          ).toIntentError(),
        );
      }
    }

    const summary = { fetched: profiles.value.length, upserted, errors };
    this.log.info(
      { fetched: summary.fetched, upserted, failed: errors.length },
      "Issuer sync finished",
    );
    return summary;
  }

  async status(limit = 10): Promise<PipelineStatus> {
    const [watermark, recentRuns] = await Promise.all([
      this.deps.ledger.latestSuccessfulWatermark(),
      this.deps.ledger.listRecent(limit),
    ]);

    return { watermark, recentRuns };
  }

  private async writeReport(summary: RunLedgerEntry): Promise<void> {
    if (!this.deps.reports) {
      return;
    }

    try {
      const reportPath = await this.deps.reports.write(summary);
      this.log.info({ runId: summary.runId, reportPath }, "Run report written");
    } catch (error) {
      // The ledger already holds the summary; a missing report file is not a run failure.
      this.log.error(
        { runId: summary.runId, err: error },
        "Run report could not be written",
      );
    }
  }
}
