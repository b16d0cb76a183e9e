import { Command, InvalidArgumentError } from "commander";
import {
  createRuntime,
  type Runtime,
  type RuntimeOptions,
} from "../application/bootstrap/runtimeFactory";
import type { RunLedgerEntry } from "../core/entities/runLedger";
import type { RunRequest } from "../core/ports/outboundPorts";
import { logger } from "../shared/logger/logger";
import { isIsoDate } from "../shared/time/dateUtils";

export const parsePositiveInt = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
};

export const parseIsoDateOption = (value: string): string => {
  if (!isIsoDate(value)) {
    throw new InvalidArgumentError("Expected a date as YYYY-MM-DD.");
  }
  return value;
};

type HistoricalOptions = { start: string; end: string; chunkDays?: number };

type EnqueueOptions = {
  mode: string;
  start?: string;
  end?: string;
  chunkDays?: number;
  overlapDays?: number;
  force?: boolean;
};

/**
 * Builds a queued request from `enqueue` flags; historical mode needs both bounds.
 */
export const toRunRequest = (opts: EnqueueOptions): RunRequest => {
  if (opts.mode === "incremental") {
    return { mode: "incremental", overlapDays: opts.overlapDays };
  }

  if (opts.mode === "historical") {
    if (!opts.start || !opts.end) {
      throw new InvalidArgumentError("Historical runs need --start and --end.");
    }
    return {
      mode: "historical",
      start: opts.start,
      end: opts.end,
      chunkDays: opts.chunkDays,
    };
  }

  throw new InvalidArgumentError(`Unknown run mode '${opts.mode}'.`);
};

/**
 * Aborts the run on SIGINT/SIGTERM; the engine finishes in-flight work and
 * records the run as cancelled.
 */
const operatorSignal = (): { signal: AbortSignal; dispose: () => void } => {
  const controller = new AbortController();
  const abort = (reason: NodeJS.Signals) => {
    logger.warn({ signal: reason }, "Cancelling run");
    controller.abort(reason);
  };

  process.once("SIGINT", abort);
  process.once("SIGTERM", abort);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", abort);
      process.off("SIGTERM", abort);
    },
  };
};

const withRuntime = async (
  options: RuntimeOptions,
  action: (runtime: Runtime) => Promise<void>,
): Promise<void> => {
  const runtime = await createRuntime(options);
  try {
    await action(runtime);
  } finally {
    await runtime.close();
  }
};

const reportRun = (summary: RunLedgerEntry): void => {
  if (summary.status === "completed") {
    logger.info({ summary }, `Run ${summary.runId} completed`);
    return;
  }

  logger.error({ summary }, `Run ${summary.runId} ${summary.status}`);
  process.exitCode = 1;
};

/**
 * Defines a single command surface so operational tasks use the same orchestration policies.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("disclosure-sync")
    .description("Disclosure portal filing ingestion and reconciliation");

  const run = cli.command("run").description("Run a reconciliation in this process");

  run
    .command("incremental")
    .description("Reconcile from the last successful watermark to today")
    .option("--overlap-days <days>", "Days re-read before the watermark", parsePositiveInt)
    .action(async (opts: { overlapDays?: number }) => {
      await withRuntime({}, async (runtime) => {
        const cancel = operatorSignal();
        try {
          reportRun(
            await runtime.orchestratorService.runIncremental(opts.overlapDays, {
              signal: cancel.signal,
            }),
          );
        } finally {
          cancel.dispose();
        }
      });
    });

  run
    .command("historical")
    .description("Backfill an explicit date range in chunks")
    .requiredOption("--start <date>", "First filing date (YYYY-MM-DD)", parseIsoDateOption)
    .requiredOption("--end <date>", "Last filing date (YYYY-MM-DD)", parseIsoDateOption)
    .option("--chunk-days <days>", "Days per fetched chunk", parsePositiveInt)
    .action(async (opts: HistoricalOptions) => {
      await withRuntime({}, async (runtime) => {
        const cancel = operatorSignal();
        try {
          reportRun(
            await runtime.orchestratorService.runHistorical(
              opts.start,
              opts.end,
              opts.chunkDays,
              { signal: cancel.signal },
            ),
          );
        } finally {
          cancel.dispose();
        }
      });
    });

  cli
    .command("enqueue")
    .description("Queue a run for the worker")
    .option("--mode <mode>", "incremental or historical", "incremental")
    .option("--start <date>", "Historical start (YYYY-MM-DD)", parseIsoDateOption)
    .option("--end <date>", "Historical end (YYYY-MM-DD)", parseIsoDateOption)
    .option("--chunk-days <days>", "Historical chunk size", parsePositiveInt)
    .option("--overlap-days <days>", "Incremental overlap", parsePositiveInt)
    .option("--force", "Bypass hourly idempotency dedupe for immediate reruns")
    .action(async (opts: EnqueueOptions) => {
      const request = toRunRequest(opts);
      await withRuntime({ withQueue: true }, async (runtime) => {
        await runtime.orchestratorService.enqueue(request, Boolean(opts.force));
      });
    });

  cli
    .command("schedule")
    .description("Enqueue an incremental run every SCHEDULE_INTERVAL_SECONDS")
    .action(async () => {
      const runtime = await createRuntime({ withQueue: true });
      const intervalSeconds = runtime.config.queue.scheduleIntervalSeconds;

      const tick = async () => {
        try {
          await runtime.orchestratorService.enqueue({ mode: "incremental" });
        } catch (error) {
          logger.error({ err: error }, "Scheduled enqueue failed");
        }
      };

      logger.info({ intervalSeconds }, "Scheduler started");
      await tick();
      const timer = setInterval(() => {
        void tick();
      }, intervalSeconds * 1_000);

      const stop = () => {
        clearInterval(timer);
        logger.info("Scheduler stopping");
        runtime.close().catch((error: unknown) => {
          logger.error({ err: error }, "Scheduler shutdown failed");
          process.exitCode = 1;
        });
      };
      process.once("SIGINT", stop);
      process.once("SIGTERM", stop);
    });

  cli
    .command("sync-issuers")
    .description("Refresh reporting issuers from the portal's issuer export")
    .action(async () => {
      await withRuntime({}, async (runtime) => {
        const summary = await runtime.orchestratorService.syncIssuers();
        logger.info({ summary }, "Issuer sync summary");
        if (summary.errors.length > 0) {
          process.exitCode = 1;
        }
      });
    });

  cli
    .command("status")
    .description("Report the watermark and recent runs")
    .option("--limit <count>", "Number of recent runs", parsePositiveInt, 10)
    .option("--queue", "Include run queue counters (needs Redis)")
    .action(async (opts: { limit: number; queue?: boolean }) => {
      await withRuntime({ withQueue: Boolean(opts.queue) }, async (runtime) => {
        const status = await runtime.orchestratorService.status(opts.limit);
        const queueCounts = runtime.queue ? await runtime.queue.getCounts() : undefined;

        logger.info(
          {
            watermark: status.watermark,
            portalProvider: runtime.config.portal.provider,
            sinkBackend: runtime.config.storage.sinkBackend,
            queueCounts,
            recentRuns: status.recentRuns.map((entry) => ({
              runId: entry.runId,
              mode: entry.mode,
              window: `${entry.windowStart}..${entry.windowEnd}`,
              status: entry.status,
              state: entry.state,
              recordsSeen: entry.recordsSeen,
              recordsNew: entry.recordsNew,
              recordsSuperseded: entry.recordsSuperseded,
              recordsFailed: entry.recordsFailed,
              recordsErrored: entry.recordsErrored,
              errorDetail: entry.errorDetail,
            })),
          },
          "Pipeline status",
        );
      });
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
