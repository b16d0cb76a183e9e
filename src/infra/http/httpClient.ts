import { err, ok, type Result } from "neverthrow";
import {
  initialRetryState,
  nextRetryState,
  type RetryPolicy,
} from "./backoff";
import type { RateLimiter } from "./rateLimiter";

type HttpMethod = "GET" | "POST";

export type HttpRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
};

export type HttpResponse<T> = {
  status: number;
  body: T;
  attempts: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  attempts: number;
  cause?: unknown;
};

export type HttpClientDependencies = {
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

type BodyReader<T> = (response: Response) => Promise<T>;

/** 429 and 5xx are retried; every other 4xx fails on the first answer. */
export const isRetryableStatus = (status: number): boolean =>
  status === 429 || status >= 500;

const isAbortError = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "name" in error &&
  error.name === "AbortError";

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Single HTTP policy point for portal adapters: every attempt passes the rate
 * limiter, and retryable failures back off exponentially until the attempt
 * budget is spent.
 */
export class HttpClient {
  constructor(
    private readonly retryPolicy: RetryPolicy,
    private readonly rateLimiter: RateLimiter,
    private readonly dependencies: HttpClientDependencies = {},
  ) {}

  async requestText(
    request: HttpRequest,
  ): Promise<Result<HttpResponse<string>, HttpClientError>> {
    return this.execute(request, (response) => response.text());
  }

  async requestBytes(
    request: HttpRequest,
  ): Promise<Result<HttpResponse<Uint8Array>, HttpClientError>> {
    return this.execute(
      request,
      async (response) => new Uint8Array(await response.arrayBuffer()),
    );
  }

  private async execute<T>(
    request: HttpRequest,
    readBody: BodyReader<T>,
  ): Promise<Result<HttpResponse<T>, HttpClientError>> {
    const random = this.dependencies.random ?? Math.random;
    const sleep = this.dependencies.sleep ?? defaultSleep;
    let state = initialRetryState(this.retryPolicy, random);

    for (;;) {
      const attempt = state.attempt;
      const outcome = await this.rateLimiter.schedule(() =>
        this.performRequest(request, readBody, attempt),
      );
      if (outcome.isOk()) {
        return outcome;
      }

      const next = outcome.error.retryable
        ? nextRetryState(state, this.retryPolicy, random)
        : null;
      if (!next) {
        return outcome;
      }

      await sleep(state.nextDelayMs);
      state = next;
    }
  }

  private async performRequest<T>(
    request: HttpRequest,
    readBody: BodyReader<T>,
    attempt: number,
  ): Promise<Result<HttpResponse<T>, HttpClientError>> {
    const fetchImpl = this.dependencies.fetchImpl ?? fetch;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable: isRetryableStatus(response.status),
          attempts: attempt,
        });
      }

      return ok({
        status: response.status,
        body: await readBody(response),
        attempts: attempt,
      });
    } catch (error) {
      if (isAbortError(error)) {
        return err({
          code: "timeout",
          message: "HTTP request timed out.",
          retryable: true,
          attempts: attempt,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        attempts: attempt,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
