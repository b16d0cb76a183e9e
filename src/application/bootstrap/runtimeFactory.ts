import { IdentityResolver } from "../services/identityResolver";
import { ReconciliationEngine } from "../services/reconciliationEngine";
import { ReconciliationOrchestratorService } from "../services/reconciliationOrchestratorService";
import type { DisclosurePortalPort } from "../../core/ports/inboundPorts";
import type {
  FilingSinkPort,
  JobLedgerPort,
} from "../../core/ports/outboundPorts";
import { createDb } from "../../infra/db/client";
import {
  PostgresFilingSink,
  PostgresJobLedger,
} from "../../infra/db/repositories";
import { HttpClient } from "../../infra/http/httpClient";
import { RateLimiter } from "../../infra/http/rateLimiter";
import { InMemoryFilingSink } from "../../infra/memory/inMemoryFilingSink";
import { InMemoryJobLedger } from "../../infra/memory/inMemoryJobLedger";
import { MockDisclosurePortal } from "../../infra/providers/mocks/mockDisclosurePortal";
import { DisclosurePortalClient } from "../../infra/providers/portal/disclosurePortalClient";
import {
  BullMqRunQueue,
  redisConfigFromUrl,
} from "../../infra/queue/bullMqQueue";
import { ConfigurationError } from "../../core/entities/appError";
import type { ClockPort } from "../../core/ports/outboundPorts";
import { LocalContentStore } from "../../infra/storage/localContentStore";
import { LocalExportCache } from "../../infra/storage/localExportCache";
import { JsonRunReportWriter } from "../../infra/storage/runReportWriter";
import {
  RunRequestFactory,
  SystemClock,
  UuidIdGenerator,
} from "../../infra/system/systemPorts";
import { loadAppConfig, type AppConfig } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";

export type RuntimeOptions = {
  config?: AppConfig;
  /** Connects to Redis for enqueue and schedule flows. */
  withQueue?: boolean;
  /**
   * Set by long-lived processes (worker, scheduler). Refuses the memory
   * backend, whose ledger and watermark end with the process.
   */
  requireDurableStorage?: boolean;
};

type Storage = {
  sink: FilingSinkPort;
  ledger: JobLedgerPort;
  close: () => Promise<void>;
};

const createPortal = (
  config: AppConfig,
  clock: ClockPort,
): DisclosurePortalPort => {
  if (config.portal.provider === "mock") {
    return new MockDisclosurePortal(config.portal.pageSize);
  }

  const { provider: _provider, ...options } = config.portal;
  const rateLimiter = new RateLimiter(config.rateLimit);
  return new DisclosurePortalClient(
    options,
    new HttpClient(config.retry, rateLimiter),
    {
      exportCache: config.storage.cacheDir
        ? new LocalExportCache(config.storage.cacheDir)
        : undefined,
      clock,
    },
  );
};

/**
 * The memory backend keeps state for the lifetime of the process only. It
 * backs tests and one-off local runs against the mock portal.
 */
const createStorage = (config: AppConfig): Storage => {
  if (config.storage.sinkBackend === "memory") {
    return {
      sink: new InMemoryFilingSink(),
      ledger: new InMemoryJobLedger(),
      close: async () => {},
    };
  }

  const { db, sql } = createDb(config.storage.postgresUrl);
  return {
    sink: new PostgresFilingSink(db),
    ledger: new PostgresJobLedger(db),
    close: async () => {
      await sql.end({ timeout: 5 });
    },
  };
};

/**
 * Centralizes runtime wiring so CLI and worker entry points share one composition root.
 */
export const createRuntime = async (options: RuntimeOptions = {}) => {
  const config = options.config ?? loadAppConfig();
  const durable = options.withQueue || options.requireDurableStorage;
  if (durable && config.storage.sinkBackend === "memory") {
    throw new ConfigurationError(
      "Queued and scheduled runs need a durable ledger; set SINK_BACKEND=postgres.",
      ["SINK_BACKEND: memory is not allowed for queue, scheduler or worker processes"],
    );
  }

  const clock = new SystemClock();
  const ids = new UuidIdGenerator();
  const portal = createPortal(config, clock);
  const storage = createStorage(config);

  const engine = new ReconciliationEngine(
    {
      portal,
      sink: storage.sink,
      ledger: storage.ledger,
      contentStore: new LocalContentStore({
        directory: config.storage.contentDir,
        inlineMaxBytes: config.storage.contentInlineMaxBytes,
      }),
      resolver: new IdentityResolver(config.reconciliation.comparisonFields),
      clock,
      ids,
    },
    config.reconciliation,
  );

  const queue = options.withQueue
    ? new BullMqRunQueue(redisConfigFromUrl(config.queue.redisUrl))
    : undefined;

  const orchestratorService = new ReconciliationOrchestratorService({
    engine,
    ledger: storage.ledger,
    portal,
    sink: storage.sink,
    clock,
    requestFactory: new RunRequestFactory(clock, ids),
    queue,
    reports: new JsonRunReportWriter(config.storage.reportDir),
  });

  logger.debug(
    {
      portalProvider: config.portal.provider,
      sinkBackend: config.storage.sinkBackend,
      queue: Boolean(queue),
    },
    "Runtime created",
  );

  return {
    config,
    queue,
    orchestratorService,
    close: async () => {
      await queue?.close();
      await storage.close();
    },
  };
};

export type Runtime = Awaited<ReturnType<typeof createRuntime>>;
