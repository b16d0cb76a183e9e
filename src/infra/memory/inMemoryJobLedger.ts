import type { IsoDate } from "../../core/entities/filing";
import type { RunLedgerEntry } from "../../core/entities/runLedger";
import type {
  JobLedgerPort,
  RunLedgerPatch,
} from "../../core/ports/outboundPorts";

const copyEntry = (entry: RunLedgerEntry): RunLedgerEntry => ({
  ...entry,
  intentErrors: entry.intentErrors.map((error) => ({ ...error })),
  warnings: [...entry.warnings],
});

const byMostRecentEnd = (left: RunLedgerEntry, right: RunLedgerEntry): number =>
  (right.endedAt?.getTime() ?? 0) - (left.endedAt?.getTime() ?? 0) ||
  right.startedAt.getTime() - left.startedAt.getTime();

export class InMemoryJobLedger implements JobLedgerPort {
  private readonly entries = new Map<string, RunLedgerEntry>();

  async create(entry: RunLedgerEntry): Promise<void> {
    if (this.entries.has(entry.runId)) {
      throw new Error(`Run ${entry.runId} already exists in the ledger.`);
    }

    this.entries.set(entry.runId, copyEntry(entry));
  }

  async update(runId: string, patch: RunLedgerPatch): Promise<void> {
    const current = this.require(runId);
    this.entries.set(runId, copyEntry({ ...current, ...patch }));
  }

  async finalize(entry: RunLedgerEntry): Promise<void> {
    this.require(entry.runId);
    this.entries.set(entry.runId, copyEntry(entry));
  }

  async latestSuccessfulWatermark(): Promise<IsoDate | null> {
    const [latest] = [...this.entries.values()]
      .filter(
        (entry) => entry.mode === "incremental" && entry.status === "completed",
      )
      .sort(byMostRecentEnd);

    return latest?.windowEnd ?? null;
  }

  async listRecent(limit: number): Promise<RunLedgerEntry[]> {
    return [...this.entries.values()]
      .sort((left, right) => right.startedAt.getTime() - left.startedAt.getTime())
      .slice(0, limit)
      .map(copyEntry);
  }

  get(runId: string): RunLedgerEntry | undefined {
    const entry = this.entries.get(runId);
    return entry ? copyEntry(entry) : undefined;
  }

  private require(runId: string): RunLedgerEntry {
    const entry = this.entries.get(runId);
    if (!entry) {
      throw new Error(`Run ${runId} is not in the ledger.`);
    }

    return entry;
  }
}
