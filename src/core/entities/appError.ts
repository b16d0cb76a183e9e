import type { IntentError, IntentErrorKind } from "./runLedger";

/**
 * Canonical error categories raised or returned by the reconciliation pipeline.
 */
export type PipelineErrorCode =
  | "transient_fetch"
  | "permanent_fetch"
  | "sink_write"
  | "ledger_write"
  | "configuration"
  | "cancelled";

export type FetchOperation = "search" | "download" | "issuers";

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Retryable failure (network, timeout, 5xx, 429) that outlived every attempt.
 */
export class TransientFetchError extends PipelineError {
  readonly code = "transient_fetch";

  constructor(
    message: string,
    readonly operation: FetchOperation,
    readonly attempts: number,
    readonly lastStatus?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * Non-retryable failure: malformed request, unexpected payload, or a pagination
 * sequence that would not terminate.
 */
export class PermanentFetchError extends PipelineError {
  readonly code = "permanent_fetch";

  constructor(
    message: string,
    readonly operation: FetchOperation,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type FetchError = TransientFetchError | PermanentFetchError;

export type SinkWriteTarget = Omit<IntentError, "intent" | "message">;

/**
 * A single sink write that failed. Collected per intent, never run-fatal.
 */
export class SinkWriteError extends PipelineError {
  readonly code = "sink_write";

  constructor(
    message: string,
    readonly intent: IntentErrorKind,
    readonly target: SinkWriteTarget,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  toIntentError(): IntentError {
    return { intent: this.intent, ...this.target, message: this.message };
  }
}

export class LedgerWriteError extends PipelineError {
  readonly code = "ledger_write";

  constructor(
    message: string,
    readonly runId: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ConfigurationError extends PipelineError {
  readonly code = "configuration";

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
  }
}

export class RunCancelledError extends PipelineError {
  readonly code = "cancelled";
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
};
