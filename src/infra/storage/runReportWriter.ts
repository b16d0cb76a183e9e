import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { RunLedgerEntry } from "../../core/entities/runLedger";
import type { RunReportPort } from "../../core/ports/outboundPorts";

/**
 * Writes a finished run's ledger summary as `run-<runId>.json`.
 */
export class JsonRunReportWriter implements RunReportPort {
  constructor(private readonly directory: string) {}

  async write(entry: RunLedgerEntry): Promise<string> {
    const directory = path.resolve(this.directory);
    const filePath = path.join(directory, `run-${entry.runId}.json`);

    await mkdir(directory, { recursive: true });
    await writeFile(filePath, `${JSON.stringify(entry, null, 2)}\n`, "utf8");

    return filePath;
  }
}
