import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "../../core/entities/appError";
import { loadAppConfig } from "../../shared/config/env";
import { createRuntime } from "./runtimeFactory";

describe("createRuntime", () => {
  let directory = "";

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "runtime-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("wires the mock portal to in-memory storage without a queue", async () => {
    const runtime = await createRuntime({
      config: loadAppConfig({
        PORTAL_PROVIDER: "mock",
        SINK_BACKEND: "memory",
        CONTENT_DIR: path.join(directory, "documents"),
        REPORT_DIR: path.join(directory, "reports"),
        INITIAL_LOOKBACK_DAYS: "2",
      }),
    });

    try {
      expect(runtime.queue).toBeUndefined();

      const summary = await runtime.orchestratorService.runIncremental();
      expect(summary.status).toBe("completed");
      expect(summary.recordsSeen).toBe(9);
      expect(summary.recordsNew).toBe(9);

      const status = await runtime.orchestratorService.status();
      expect(status.watermark).toBe(summary.windowEnd);
      expect(await readdir(path.join(directory, "reports"))).toEqual([
        `run-${summary.runId}.json`,
      ]);
      await expect(
        runtime.orchestratorService.enqueue({ mode: "incremental" }),
      ).rejects.toThrow("No run queue is configured for this runtime.");
    } finally {
      await runtime.close();
    }
  });

  it("refuses the memory backend for queued and long-lived processes", async () => {
    const config = loadAppConfig({ PORTAL_PROVIDER: "mock", SINK_BACKEND: "memory" });

    await expect(createRuntime({ config, withQueue: true })).rejects.toBeInstanceOf(
      ConfigurationError,
    );
    await expect(
      createRuntime({ config, requireDurableStorage: true }),
    ).rejects.toThrow(
      "Queued and scheduled runs need a durable ledger; set SINK_BACKEND=postgres.",
    );
  });
});
