import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { emptyRunCounts } from "../../core/entities/runLedger";
import { JsonRunReportWriter } from "./runReportWriter";

describe("JsonRunReportWriter", () => {
  let directory = "";

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "run-reports-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("writes the summary as run-<runId>.json in a nested directory", async () => {
    const writer = new JsonRunReportWriter(path.join(directory, "reports"));

    const filePath = await writer.write({
      runId: "run-7",
      mode: "incremental",
      windowStart: "2024-01-01",
      windowEnd: "2024-01-02",
      status: "completed",
      state: "completed",
      startedAt: new Date("2024-01-02T12:00:00.000Z"),
      endedAt: new Date("2024-01-02T12:05:00.000Z"),
      errorDetail: null,
      intentErrors: [],
      warnings: [],
      ...emptyRunCounts(),
      recordsSeen: 3,
    });

    expect(filePath).toBe(path.join(directory, "reports", "run-run-7.json"));
    const written: unknown = JSON.parse(await readFile(filePath, "utf8"));
    expect(written).toMatchObject({
      runId: "run-7",
      recordsSeen: 3,
      endedAt: "2024-01-02T12:05:00.000Z",
    });
  });
});
