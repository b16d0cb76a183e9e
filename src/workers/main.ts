import { createRuntime } from "../application/bootstrap/runtimeFactory";
import {
  createRunWorker,
  redisConfigFromUrl,
} from "../infra/queue/bullMqQueue";
import { logger } from "../shared/logger/logger";

const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};

const run = async (): Promise<void> => {
  const runtime = await createRuntime({ requireDurableStorage: true });
  const { config } = runtime;
  const startedAtByJobId = new Map<string, number>();

  logger.info(
    {
      portalProvider: config.portal.provider,
      portalBaseUrl: config.portal.baseUrl,
      sinkBackend: config.storage.sinkBackend,
      redisUrl: config.queue.redisUrl,
      concurrency: config.queue.concurrency,
    },
    "Worker runtime configuration",
  );

  const worker = createRunWorker(
    redisConfigFromUrl(config.queue.redisUrl),
    config.queue.concurrency,
    async (payload) => {
      const summary = await runtime.orchestratorService.execute(payload.request);
      if (summary.status !== "completed") {
        logger.warn(
          {
            runId: summary.runId,
            requestId: payload.requestId,
            errorDetail: summary.errorDetail,
          },
          "Queued run did not complete",
        );
      }
    },
  );

  worker.on("active", (job) => {
    if (!job.id) {
      return;
    }

    startedAtByJobId.set(job.id, Date.now());
    logger.info(
      {
        jobId: job.id,
        requestId: job.data.requestId,
        idempotencyKey: job.data.idempotencyKey,
        mode: job.data.request.mode,
      },
      "Worker job started",
    );
  });

  worker.on("failed", (job, error) => {
    const startedAt = job?.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job?.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.error(
      {
        jobId: job?.id,
        requestId: job?.data.requestId,
        idempotencyKey: job?.data.idempotencyKey,
        durationMs,
        error: toErrorDetails(error),
      },
      "Worker job failed",
    );
  });

  worker.on("completed", (job) => {
    const startedAt = job.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.info(
      {
        jobId: job.id,
        requestId: job.data.requestId,
        idempotencyKey: job.data.idempotencyKey,
        durationMs,
      },
      "Worker job completed",
    );
  });

  const shutdown = async () => {
    logger.info("Worker shutting down");
    await worker.close();
    await runtime.close();
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  logger.info("Worker online");
};

run().catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "Worker bootstrap failed");
  process.exit(1);
});
