import { err, ok, type Result } from "neverthrow";
import {
  ConfigurationError,
  LedgerWriteError,
  PermanentFetchError,
  RunCancelledError,
  SinkWriteError,
  describeError,
  type FetchError,
} from "../../core/entities/appError";
import {
  filingRecordId,
  type ContentLocation,
  type FilingObservation,
  type FilingRecord,
  type IsoDate,
} from "../../core/entities/filing";
import type { FilingIntent } from "../../core/entities/intent";
import type { IssuerRecord } from "../../core/entities/issuer";
import {
  emptyRunCounts,
  type RunLedgerEntry,
  type RunState,
  type RunWindow,
} from "../../core/entities/runLedger";
import type { DisclosurePortalPort } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  ContentStorePort,
  FilingSinkPort,
  IdGeneratorPort,
  JobLedgerPort,
  RunLedgerPatch,
} from "../../core/ports/outboundPorts";
import { logger as rootLogger, type Logger } from "../../shared/logger/logger";
import { toIsoDate } from "../../shared/time/dateUtils";
import {
  mergeObservations,
  type IdentityDecision,
  type IdentityResolver,
} from "./identityResolver";
import {
  assertWindow,
  historicalChunks,
  incrementalWindow,
} from "./runWindows";
import { runWithConcurrency } from "./workerPool";

export type ReconciliationEngineOptions = {
  maxPagesPerWindow: number;
  workerPoolSize: number;
  historicalChunkDays: number;
  overlapDays: number;
  initialLookbackDays: number;
  runTimeoutMs?: number;
};

export type EngineRunRequest =
  | { mode: "incremental"; watermark: IsoDate | null; overlapDays?: number }
  | { mode: "historical"; start: IsoDate; end: IsoDate; chunkDays?: number };

export type EngineRunOptions = {
  signal?: AbortSignal;
};

export type ReconciliationEngineDependencies = {
  portal: DisclosurePortalPort;
  sink: FilingSinkPort;
  contentStore: ContentStorePort;
  ledger: JobLedgerPort;
  resolver: IdentityResolver;
  clock: ClockPort;
  ids: IdGeneratorPort;
};

type FetchedChunk = {
  observations: FilingObservation[];
  rejectedRows: number;
  pages: number;
};

type ActionableDecision = Extract<
  IdentityDecision,
  { kind: "new" | "amendment" | "retry" }
>;

type MaterializedIntent = {
  intent: FilingIntent;
  warning: string | null;
};

type IntentOutcome = {
  intent: FilingIntent;
  error: SinkWriteError | null;
};

const CANCELLED_DETAIL = "cancelled";

const isActionable = (
  decision: IdentityDecision,
): decision is ActionableDecision =>
  decision.kind === "new" ||
  decision.kind === "amendment" ||
  decision.kind === "retry";

/**
 * Drives one reconciliation run through
 * `initializing → fetching → classifying → persisting → finalizing` and owns
 * every ledger write for it. Workers return values; only this class mutates the
 * run's entry.
 */
export class ReconciliationEngine {
  constructor(
    private readonly deps: ReconciliationEngineDependencies,
    private readonly options: ReconciliationEngineOptions,
    private readonly log: Logger = rootLogger.child({ component: "engine" }),
  ) {}

  /**
   * Runs one window to a terminal state and returns its ledger summary. Only
   * ledger write failures and invalid requests are thrown.
   */
  async run(
    request: EngineRunRequest,
    runOptions: EngineRunOptions = {},
  ): Promise<RunLedgerEntry> {
    const startedAt = this.deps.clock.now();
    const window = this.resolveWindow(request, toIsoDate(startedAt));
    const chunks =
      request.mode === "historical"
        ? historicalChunks(
            window,
            request.chunkDays ?? this.options.historicalChunkDays,
          )
        : [window];

    const entry: RunLedgerEntry = {
      runId: this.deps.ids.next(),
      mode: request.mode,
      windowStart: window.start,
      windowEnd: window.end,
      status: "running",
      state: "initializing",
      ...emptyRunCounts(),
      startedAt,
      endedAt: null,
      errorDetail: null,
      intentErrors: [],
      warnings: [],
    };
    const log = this.log.child({ runId: entry.runId, mode: entry.mode });
    const signal = this.runSignal(runOptions.signal);

    await this.writeLedger(entry.runId, () => this.deps.ledger.create({ ...entry }));
    log.info({ window, chunks: chunks.length }, "Run started");

    try {
      this.throwIfCancelled(signal);
      await this.transition(entry, "fetching");
      const observations = await this.fetchAll(entry, chunks, log, signal);

      this.throwIfCancelled(signal);
      await this.transition(entry, "classifying");
      const intents = await this.classify(entry, observations, log, signal);

      this.throwIfCancelled(signal);
      await this.transition(entry, "persisting");
      await this.persist(entry, observations, intents, log, signal);

      this.throwIfCancelled(signal);
      await this.transition(entry, "finalizing");
      return await this.finish(entry, log);
    } catch (error) {
      if (error instanceof LedgerWriteError) {
        log.error({ err: error }, "Ledger write failed; run aborted");
        throw error;
      }

      return await this.abort(entry, error, log);
    }
  }

  /**
   * Validates the caller's window before a ledger entry exists, so an invalid
   * request never leaves a dangling run behind.
   */
  private resolveWindow(request: EngineRunRequest, today: IsoDate): RunWindow {
    if (request.mode === "incremental") {
      return incrementalWindow({
        watermark: request.watermark,
        today,
        overlapDays: request.overlapDays ?? this.options.overlapDays,
        initialLookbackDays: this.options.initialLookbackDays,
      });
    }

    const window = { start: request.start, end: request.end };
    try {
      assertWindow(window);
      historicalChunks(window, request.chunkDays ?? this.options.historicalChunkDays);
    } catch (error) {
      throw new ConfigurationError("Invalid historical run request.", [
        describeError(error),
      ]);
    }

    return window;
  }

  private runSignal(external: AbortSignal | undefined): AbortSignal | undefined {
    const signals: AbortSignal[] = [];
    if (external) {
      signals.push(external);
    }
    if (this.options.runTimeoutMs !== undefined) {
      signals.push(AbortSignal.timeout(this.options.runTimeoutMs));
    }

    if (signals.length <= 1) {
      return signals[0];
    }

    return AbortSignal.any(signals);
  }

  private throwIfCancelled(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new RunCancelledError(CANCELLED_DETAIL, { cause: signal.reason });
    }
  }

  private async fetchAll(
    entry: RunLedgerEntry,
    chunks: RunWindow[],
    log: Logger,
    signal: AbortSignal | undefined,
  ): Promise<FilingObservation[]> {
    const outcome = await runWithConcurrency(
      chunks,
      this.options.workerPoolSize,
      async (chunk) => {
        const fetched = await this.fetchChunk(chunk, signal);
        if (fetched.isErr()) {
          throw fetched.error;
        }
        return { chunk, ...fetched.value };
      },
      signal,
    );
    this.throwIfCancelled(signal);
    if (outcome.cancelled) {
      throw new RunCancelledError(CANCELLED_DETAIL);
    }

    const observations: FilingObservation[] = [];
    for (const { value } of outcome.completed) {
      observations.push(...value.observations);
      if (value.rejectedRows > 0) {
        entry.warnings.push(
          `${value.rejectedRows} row(s) rejected in ${value.chunk.start}..${value.chunk.end}`,
        );
      }
      log.debug(
        {
          chunk: value.chunk,
          pages: value.pages,
          observations: value.observations.length,
        },
        "Chunk fetched",
      );
    }

    entry.recordsSeen = observations.length;
    log.info({ recordsSeen: entry.recordsSeen }, "Fetching complete");
    return observations;
  }

  /**
   * Pages are requested strictly in token order. The loop ends on a null token
   * and fails permanently past the page cap or on a token it has already seen.
   */
  private async fetchChunk(
    chunk: RunWindow,
    signal: AbortSignal | undefined,
  ): Promise<Result<FetchedChunk, FetchError>> {
    const observations: FilingObservation[] = [];
    const seenTokens = new Set<string>();
    let rejectedRows = 0;
    let pages = 0;
    let pageToken: string | null = null;

    do {
      this.throwIfCancelled(signal);
      if (pages >= this.options.maxPagesPerWindow) {
        return err(
          new PermanentFetchError(
            `Page cap of ${this.options.maxPagesPerWindow} exceeded for ${chunk.start}..${chunk.end}.`,
            "search",
          ),
        );
      }

      const page = await this.deps.portal.search(chunk, pageToken);
      if (page.isErr()) {
        return err(page.error);
      }

      pages += 1;
      observations.push(...page.value.records);
      rejectedRows += page.value.rejectedRows;

      const next = page.value.nextPageToken;
      if (next !== null) {
        if (seenTokens.has(next)) {
          return err(
            new PermanentFetchError(
              `Portal repeated page token '${next}' for ${chunk.start}..${chunk.end}.`,
              "search",
            ),
          );
        }
        seenTokens.add(next);
      }
      pageToken = next;
    } while (pageToken !== null);

    return ok({ observations, rejectedRows, pages });
  }

  /**
   * Merges each identity's observations before deciding anything, then
   * downloads content for every decision that needs a new or promoted record.
   */
  private async classify(
    entry: RunLedgerEntry,
    observations: FilingObservation[],
    log: Logger,
    signal: AbortSignal | undefined,
  ): Promise<FilingIntent[]> {
    const merged = mergeObservations(observations);
    const histories = await this.deps.sink.loadHistories(
      merged.map((observation) => observation.documentIdentity),
    );
    const decisions = merged.map((observation) =>
      this.deps.resolver.classify(
        observation,
        histories.get(observation.documentIdentity) ?? [],
      ),
    );

    const tally = new Map<string, number>();
    for (const decision of decisions) {
      tally.set(decision.kind, (tally.get(decision.kind) ?? 0) + 1);
      if (decision.kind === "stale") {
        log.debug(
          {
            documentIdentity: decision.observation.documentIdentity,
            changedFields: decision.changedFields,
          },
          "Ignoring observation older than the active record",
        );
      }
    }
    log.info({ decisions: Object.fromEntries(tally) }, "Observations classified");

    const outcome = await runWithConcurrency(
      decisions.filter(isActionable),
      this.options.workerPoolSize,
      (decision) => this.materialize(entry.runId, decision, log),
      signal,
    );
    this.throwIfCancelled(signal);
    if (outcome.cancelled) {
      throw new RunCancelledError(CANCELLED_DETAIL);
    }

    return outcome.completed.map(({ value }) => {
      if (value.warning) {
        entry.warnings.push(value.warning);
      }
      return value.intent;
    });
  }

  /**
   * Turns a decision into a sink intent. Download and content-store failures
   * produce a failed record at the intended version instead of an error.
   */
  private async materialize(
    runId: string,
    decision: ActionableDecision,
    log: Logger,
  ): Promise<MaterializedIntent> {
    const { observation } = decision;
    const target = this.intentTarget(decision);
    const now = this.deps.clock.now();
    const base: FilingRecord = {
      id: filingRecordId(observation.documentIdentity, target.version),
      documentIdentity: observation.documentIdentity,
      issuerId: observation.issuerId,
      filingType: observation.filingType,
      documentType: observation.documentType,
      filedOn: observation.filedOn,
      version: target.version,
      supersedes: target.priorId,
      supersededBy: null,
      content: null,
      sizeBytes: observation.sizeBytes ?? null,
      fetchedBytes: null,
      sizeMismatch: false,
      sourceUrl: observation.sourceUrl ?? null,
      amendmentMarker: observation.amendmentMarker,
      status: "failed",
      failureReason: null,
      runId,
      createdAt: now,
      updatedAt: now,
    };

    const downloaded = await this.deps.portal.downloadContent({
      documentIdentity: observation.documentIdentity,
      sourceUrl: observation.sourceUrl,
      declaredSizeBytes: observation.sizeBytes,
    });
    if (downloaded.isErr()) {
      log.warn(
        {
          documentIdentity: base.documentIdentity,
          version: base.version,
          err: downloaded.error,
        },
        "Content download failed; recording failed version",
      );
      return this.failedIntent(base, downloaded.error.message);
    }

    const { bytes, sizeMismatch } = downloaded.value;
    let content: ContentLocation;
    try {
      content = await this.deps.contentStore.put(observation.documentIdentity, bytes);
    } catch (error) {
      log.warn(
        { documentIdentity: base.documentIdentity, err: error },
        "Content store rejected document; recording failed version",
      );
      return this.failedIntent(base, `content store: ${describeError(error)}`);
    }

    const record: FilingRecord = {
      ...base,
      content,
      fetchedBytes: bytes.byteLength,
      sizeMismatch,
      status: "active",
    };
    const warning = sizeMismatch
      ? `Size mismatch for ${record.id}: declared ${record.sizeBytes ?? "unknown"}, fetched ${bytes.byteLength}`
      : null;

    if (target.priorId) {
      return {
        intent: { kind: "supersede", priorId: target.priorId, record },
        warning,
      };
    }

    return { intent: { kind: "create_active", record }, warning };
  }

  private intentTarget(decision: ActionableDecision): {
    version: number;
    priorId: string | null;
  } {
    switch (decision.kind) {
      case "new":
        return { version: decision.version, priorId: null };
      case "amendment":
        return { version: decision.version, priorId: decision.prior.id };
      case "retry":
        return {
          version: decision.failed.version,
          priorId: decision.supersedes?.id ?? null,
        };
    }
  }

  private failedIntent(base: FilingRecord, reason: string): MaterializedIntent {
    return {
      intent: {
        kind: "mark_failed",
        record: { ...base, status: "failed", failureReason: reason },
      },
      warning: null,
    };
  }

  /**
   * Issuers are upserted before filings. Every failed write becomes an intent
   * error on the entry; nothing is rolled back.
   */
  private async persist(
    entry: RunLedgerEntry,
    observations: FilingObservation[],
    intents: FilingIntent[],
    log: Logger,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const issuers = this.collectIssuers(observations);
    const issuerOutcome = await runWithConcurrency(
      issuers,
      this.options.workerPoolSize,
      async (issuer) => {
        try {
          await this.deps.sink.upsertIssuer(issuer);
          return null;
        } catch (error) {
          return new SinkWriteError(
            `Issuer upsert failed: ${describeError(error)}`,
            "upsert_issuer",
            { issuerId: issuer.issuerId },
            { cause: error },
          );
        }
      },
      signal,
    );
    for (const { value } of issuerOutcome.completed) {
      if (value) {
        entry.intentErrors.push(value.toIntentError());
      }
    }
    this.throwIfCancelled(signal);

    const outcome = await runWithConcurrency(
      intents,
      this.options.workerPoolSize,
      (intent) => this.apply(intent),
      signal,
    );

    for (const { value } of outcome.completed) {
      if (value.error) {
        entry.intentErrors.push(value.error.toIntentError());
        log.error(
          { err: value.error, intent: value.intent.kind },
          "Sink write failed",
        );
        continue;
      }

      switch (value.intent.kind) {
        case "create_active":
          entry.recordsNew += 1;
          break;
        case "supersede":
          entry.recordsSuperseded += 1;
          break;
        case "mark_failed":
          entry.recordsFailed += 1;
          break;
      }
    }
    entry.recordsErrored = entry.intentErrors.length;

    log.info(
      {
        issuers: issuers.length,
        intents: intents.length,
        recordsErrored: entry.recordsErrored,
      },
      "Persisting complete",
    );
  }

  private async apply(intent: FilingIntent): Promise<IntentOutcome> {
    try {
      switch (intent.kind) {
        case "create_active":
          await this.deps.sink.upsertFilingActive(intent.record);
          break;
        case "supersede":
          await this.deps.sink.supersede(intent.priorId, intent.record);
          break;
        case "mark_failed":
          await this.deps.sink.markFailed(intent.record);
          break;
      }
      return { intent, error: null };
    } catch (error) {
      return {
        intent,
        error: new SinkWriteError(
          `${intent.kind} failed for ${intent.record.id}: ${describeError(error)}`,
          intent.kind,
          {
            documentIdentity: intent.record.documentIdentity,
            version: intent.record.version,
          },
          { cause: error },
        ),
      };
    }
  }

  /**
   * One upsert per issuer id; the last row that names the issuer wins.
   */
  private collectIssuers(observations: FilingObservation[]): IssuerRecord[] {
    const now = this.deps.clock.now();
    const issuers = new Map<string, IssuerRecord>();

    for (const observation of observations) {
      if (!observation.issuer) {
        continue;
      }

      issuers.set(observation.issuerId, {
        issuerId: observation.issuerId,
        name: observation.issuer.name,
        jurisdiction: observation.issuer.jurisdiction ?? null,
        type: observation.issuer.type ?? null,
        inDefault: observation.issuer.inDefault ?? null,
        activeRestriction: observation.issuer.activeRestriction ?? null,
        firstSeen: now,
        lastSeen: now,
      });
    }

    return Array.from(issuers.values());
  }

  private async finish(
    entry: RunLedgerEntry,
    log: Logger,
  ): Promise<RunLedgerEntry> {
    const errored = entry.intentErrors.length;
    const status: "completed" | "failed" = errored === 0 ? "completed" : "failed";
    entry.status = status;
    entry.state = status;
    entry.errorDetail =
      errored === 0 ? null : `${errored} sink write(s) failed; see intentErrors`;
    entry.endedAt = this.deps.clock.now();

    await this.writeLedger(entry.runId, () =>
      this.deps.ledger.finalize(this.snapshot(entry)),
    );
    log.info(this.summaryFields(entry), "Run finished");
    return this.snapshot(entry);
  }

  private async abort(
    entry: RunLedgerEntry,
    error: unknown,
    log: Logger,
  ): Promise<RunLedgerEntry> {
    const failedIn = entry.state;
    entry.status = "failed";
    entry.state = "failed";
    entry.errorDetail =
      error instanceof RunCancelledError
        ? CANCELLED_DETAIL
        : describeError(error) || `run failed while ${failedIn}`;
    entry.endedAt = this.deps.clock.now();

    if (error instanceof RunCancelledError) {
      log.warn({ failedIn, reason: error.cause }, "Run cancelled");
    } else {
      log.error({ err: error, failedIn }, "Run failed");
    }

    await this.writeLedger(entry.runId, () =>
      this.deps.ledger.finalize(this.snapshot(entry)),
    );
    return this.snapshot(entry);
  }

  private async transition(entry: RunLedgerEntry, state: RunState): Promise<void> {
    entry.state = state;
    const patch: RunLedgerPatch = {
      state,
      recordsSeen: entry.recordsSeen,
      recordsNew: entry.recordsNew,
      recordsSuperseded: entry.recordsSuperseded,
      recordsFailed: entry.recordsFailed,
      recordsErrored: entry.recordsErrored,
      warnings: [...entry.warnings],
    };
    await this.writeLedger(entry.runId, () =>
      this.deps.ledger.update(entry.runId, patch),
    );
  }

  private async writeLedger(
    runId: string,
    write: () => Promise<void>,
  ): Promise<void> {
    try {
      await write();
    } catch (error) {
      throw new LedgerWriteError(
        `Ledger write failed for run ${runId}: ${describeError(error)}`,
        runId,
        { cause: error },
      );
    }
  }

  private snapshot(entry: RunLedgerEntry): RunLedgerEntry {
    return {
      ...entry,
      intentErrors: entry.intentErrors.map((error) => ({ ...error })),
      warnings: [...entry.warnings],
    };
  }

  private summaryFields(entry: RunLedgerEntry): Record<string, unknown> {
    return {
      status: entry.status,
      windowStart: entry.windowStart,
      windowEnd: entry.windowEnd,
      recordsSeen: entry.recordsSeen,
      recordsNew: entry.recordsNew,
      recordsSuperseded: entry.recordsSuperseded,
      recordsFailed: entry.recordsFailed,
      recordsErrored: entry.recordsErrored,
      warnings: entry.warnings.length,
    };
  }
}
