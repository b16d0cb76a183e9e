import type { ContentLocation, FilingRecord, IsoDate } from "../entities/filing";
import type { IssuerRecord } from "../entities/issuer";
import type { RunLedgerEntry } from "../entities/runLedger";

/**
 * Destination for filing and issuer state. Every write is idempotent on
 * `documentIdentity` + `version` so a retried run may re-apply it.
 */
export interface FilingSinkPort {
  upsertIssuer(issuer: IssuerRecord): Promise<void>;
  upsertFilingActive(record: FilingRecord): Promise<void>;
  supersede(oldId: string, newRecord: FilingRecord): Promise<void>;
  markFailed(record: FilingRecord): Promise<void>;
  /**
   * Returns every stored version per identity, ordered by ascending version.
   * Identities without history are absent from the map.
   */
  loadHistories(
    documentIdentities: string[],
  ): Promise<Map<string, FilingRecord[]>>;
}

export interface ContentStorePort {
  put(documentIdentity: string, bytes: Uint8Array): Promise<ContentLocation>;
}

/**
 * Keeps a raw copy of every export body the portal returns, keyed by file name.
 */
export interface ExportCachePort {
  save(fileName: string, body: string): Promise<void>;
}

export type RunLedgerPatch = Partial<
  Omit<RunLedgerEntry, "runId" | "mode" | "startedAt">
>;

export interface JobLedgerPort {
  create(entry: RunLedgerEntry): Promise<void>;
  update(runId: string, patch: RunLedgerPatch): Promise<void>;
  finalize(entry: RunLedgerEntry): Promise<void>;
  /**
   * End of the most recent completed incremental window, or null before the
   * first successful incremental run.
   */
  latestSuccessfulWatermark(): Promise<IsoDate | null>;
  listRecent(limit: number): Promise<RunLedgerEntry[]>;
}

export type RunRequest =
  | { mode: "incremental"; overlapDays?: number }
  | { mode: "historical"; start: IsoDate; end: IsoDate; chunkDays?: number };

export type RunJobPayload = {
  requestId: string;
  idempotencyKey: string;
  requestedAt: string;
  request: RunRequest;
};

export interface RunQueuePort {
  enqueue(payload: RunJobPayload): Promise<void>;
}

export interface RunReportPort {
  write(entry: RunLedgerEntry): Promise<string>;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}

export interface RunRequestFactoryPort {
  create(request: RunRequest, force?: boolean): RunJobPayload;
}
