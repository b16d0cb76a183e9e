import type { IsoDate } from "./filing";

export type RunMode = "incremental" | "historical";

export type RunStatus = "running" | "completed" | "failed";

export type RunState =
  | "initializing"
  | "fetching"
  | "classifying"
  | "persisting"
  | "finalizing"
  | "completed"
  | "failed";

export type RunWindow = {
  start: IsoDate;
  end: IsoDate;
};

export type IntentErrorKind =
  | "upsert_issuer"
  | "create_active"
  | "supersede"
  | "mark_failed";

/**
 * One sink write that failed during persisting. Filing intents carry the
 * document identity and version; issuer upserts carry the issuer id.
 */
export type IntentError = {
  intent: IntentErrorKind;
  documentIdentity?: string;
  version?: number;
  issuerId?: string;
  message: string;
};

export type RunCounts = {
  recordsSeen: number;
  recordsNew: number;
  recordsSuperseded: number;
  recordsFailed: number;
  recordsErrored: number;
};

export type RunLedgerEntry = RunCounts & {
  runId: string;
  mode: RunMode;
  windowStart: IsoDate;
  windowEnd: IsoDate;
  status: RunStatus;
  state: RunState;
  startedAt: Date;
  endedAt: Date | null;
  errorDetail: string | null;
  intentErrors: IntentError[];
  warnings: string[];
};

export const emptyRunCounts = (): RunCounts => ({
  recordsSeen: 0,
  recordsNew: 0,
  recordsSuperseded: 0,
  recordsFailed: 0,
  recordsErrored: 0,
});
