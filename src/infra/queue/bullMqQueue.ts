import { Queue, type WorkerOptions, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import type { RunJobPayload, RunQueuePort } from "../../core/ports/outboundPorts";

/**
 * Hyphen-only because BullMQ uses colon as an internal Redis key separator.
 */
export const RUN_QUEUE_NAME = "disclosure-sync-runs";

export type RunQueueCounts = {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: number;
};

const QUEUE_RETRIES = 2;

export const defaultJobOptions = {
  attempts: QUEUE_RETRIES + 1,
  removeOnComplete: 250,
  removeOnFail: 500,
  backoff: {
    type: "exponential",
    delay: 5_000,
  },
} as const;

export const redisConfigFromUrl = (url: string): RedisOptions => {
  const parsed = new URL(url);
  const db = Number.parseInt(parsed.pathname.replace("/", ""), 10);

  return {
    host: parsed.hostname,
    port: Number(parsed.port || 6379),
    username: parsed.username || undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: Number.isFinite(db) ? db : 0,
    // Required by BullMQ workers, which block on Redis commands.
    maxRetriesPerRequest: null,
  };
};

/**
 * Wraps BullMQ so application code depends on queue intent rather than queue vendor details.
 */
export class BullMqRunQueue implements RunQueuePort {
  private readonly queue: Queue<RunJobPayload>;

  constructor(connection: RedisOptions) {
    this.queue = new Queue<RunJobPayload>(RUN_QUEUE_NAME, {
      connection,
      defaultJobOptions,
    });
  }

  /**
   * The idempotency key doubles as the job id, so a duplicate request inside
   * the same bucket is dropped by BullMQ.
   */
  async enqueue(payload: RunJobPayload): Promise<void> {
    await this.queue.add(payload.request.mode, payload, {
      jobId: payload.idempotencyKey,
    });
  }

  async getCounts(): Promise<RunQueueCounts> {
    const counts = await this.queue.getJobCounts(
      "waiting",
      "active",
      "completed",
      "failed",
      "delayed",
      "paused",
    );

    return {
      waiting: counts.waiting ?? 0,
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
      delayed: counts.delayed ?? 0,
      paused: counts.paused ?? 0,
    };
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

export const createRunWorker = (
  connection: RedisOptions,
  concurrency: number,
  processor: (payload: RunJobPayload) => Promise<void>,
) => {
  const options: WorkerOptions = {
    connection,
    concurrency,
  };

  return new Worker<RunJobPayload>(
    RUN_QUEUE_NAME,
    async (job) => {
      await processor(job.data);
    },
    options,
  );
};
