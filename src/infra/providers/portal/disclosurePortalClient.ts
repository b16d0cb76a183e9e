import { err, ok, type Result } from "neverthrow";
import {
  PermanentFetchError,
  TransientFetchError,
  type FetchError,
  type FetchOperation,
} from "../../../core/entities/appError";
import type { FilingObservation } from "../../../core/entities/filing";
import type { RunWindow } from "../../../core/entities/runLedger";
import type {
  ContentRequest,
  DisclosurePortalPort,
  DownloadedContent,
  IssuerProfile,
  SearchPage,
} from "../../../core/ports/inboundPorts";
import type { ClockPort, ExportCachePort } from "../../../core/ports/outboundPorts";
import { logger as rootLogger, type Logger } from "../../../shared/logger/logger";
import { toIsoDate } from "../../../shared/time/dateUtils";
import type { HttpClient, HttpClientError } from "../../http/httpClient";
import { parseCsvRows } from "./csv";
import { toFilingObservation, toIssuerProfile } from "./portalRows";

export type DisclosurePortalClientOptions = {
  baseUrl: string;
  exportPath: string;
  documentPath: string;
  userAgent: string;
  timeoutMs: number;
  downloadTimeoutMs: number;
  pageSize: number;
  locale?: string;
};

export type DisclosurePortalClientExtras = {
  /** Receives every search and issuer export body before it is parsed. */
  exportCache?: ExportCachePort;
  clock?: ClockPort;
};

const FIRST_PAGE_START = 1;
const ISSUER_EXPORT_PAGE_SIZE = 10_000;

/**
 * Fetch client for the disclosure portal's CSV export service. Search pages are
 * addressed by a 1-based row offset, which doubles as the page token.
 */
export class DisclosurePortalClient implements DisclosurePortalPort {
  constructor(
    private readonly options: DisclosurePortalClientOptions,
    private readonly httpClient: HttpClient,
    private readonly extras: DisclosurePortalClientExtras = {},
    private readonly log: Logger = rootLogger.child({ component: "portal" }),
  ) {
    if (!options.userAgent.trim()) {
      throw new Error("A portal user agent is required.");
    }
  }

  async search(
    window: RunWindow,
    pageToken: string | null,
  ): Promise<Result<SearchPage, FetchError>> {
    const start = this.parsePageToken(pageToken);
    if (start === null) {
      return err(
        new PermanentFetchError(
          `Invalid search page token '${pageToken}'.`,
          "search",
        ),
      );
    }

    const response = await this.httpClient.requestText({
      url: this.exportUrl(),
      method: "POST",
      headers: this.headers("text/csv"),
      body: {
        service: "searchDocuments",
        queryArgs: {
          _locale: this.options.locale ?? "en",
          fromDate: window.start,
          toDate: window.end,
          start,
          pageSize: this.options.pageSize,
        },
      },
      timeoutMs: this.options.timeoutMs,
    });
    if (response.isErr()) {
      return err(this.toFetchError("search", response.error));
    }

    await this.cacheExport(
      `filings_${window.start}_${window.end}_p${start}.csv`,
      response.value.body,
    );

    const rowsResult = await parseCsvRows(response.value.body);
    if (rowsResult.isErr()) {
      return err(
        new PermanentFetchError(
          `Search export for ${window.start}..${window.end} was not valid CSV: ${rowsResult.error.message}`,
          "search",
          response.value.status,
          { cause: rowsResult.error },
        ),
      );
    }

    const rows = rowsResult.value;
    const records: FilingObservation[] = [];
    let rejectedRows = 0;
    for (const row of rows) {
      const observation = toFilingObservation(row);
      if (observation) {
        records.push(observation);
      } else {
        rejectedRows += 1;
      }
    }

    if (rejectedRows > 0) {
      this.log.warn(
        { window, start, rejectedRows },
        "Search export contained rows without identity, issuer or filing date",
      );
    }

    return ok({
      records,
      rejectedRows,
      nextPageToken:
        rows.length >= this.options.pageSize
          ? String(start + rows.length)
          : null,
    });
  }

  async downloadContent(
    request: ContentRequest,
  ): Promise<Result<DownloadedContent, FetchError>> {
    const response = await this.httpClient.requestBytes({
      url: request.sourceUrl ?? this.documentUrl(request.documentIdentity),
      method: "GET",
      headers: this.headers("application/pdf, application/octet-stream"),
      timeoutMs: this.options.downloadTimeoutMs,
    });
    if (response.isErr()) {
      return err(this.toFetchError("download", response.error));
    }

    const bytes = response.value.body;
    const sizeMismatch =
      request.declaredSizeBytes !== undefined &&
      request.declaredSizeBytes !== bytes.byteLength;

    if (sizeMismatch) {
      this.log.warn(
        {
          documentIdentity: request.documentIdentity,
          declaredSizeBytes: request.declaredSizeBytes,
          fetchedBytes: bytes.byteLength,
        },
        "Downloaded content size differs from declared size",
      );
    }

    return ok({
      documentIdentity: request.documentIdentity,
      bytes,
      sizeMismatch,
    });
  }

  async fetchIssuers(): Promise<Result<IssuerProfile[], FetchError>> {
    const response = await this.httpClient.requestText({
      url: this.exportUrl(),
      method: "POST",
      headers: this.headers("text/csv"),
      body: {
        service: "reportingIssuers",
        queryArgs: {
          _locale: this.options.locale ?? "en",
          start: FIRST_PAGE_START,
          pageSize: ISSUER_EXPORT_PAGE_SIZE,
        },
      },
      timeoutMs: this.options.timeoutMs,
    });
    if (response.isErr()) {
      return err(this.toFetchError("issuers", response.error));
    }

    const today = toIsoDate(this.extras.clock?.now() ?? new Date());
    await this.cacheExport(
      `issuers_${today.replace(/-/g, "")}.csv`,
      response.value.body,
    );

    const rowsResult = await parseCsvRows(response.value.body);
    if (rowsResult.isErr()) {
      return err(
        new PermanentFetchError(
          `Issuer export was not valid CSV: ${rowsResult.error.message}`,
          "issuers",
          response.value.status,
          { cause: rowsResult.error },
        ),
      );
    }

    return ok(
      rowsResult.value
        .map(toIssuerProfile)
        .filter((profile): profile is IssuerProfile => profile !== null),
    );
  }

  /** A failed cache write is logged; the fetched export is still used. */
  private async cacheExport(fileName: string, body: string): Promise<void> {
    const cache = this.extras.exportCache;
    if (!cache) {
      return;
    }

    try {
      await cache.save(fileName, body);
    } catch (error) {
      this.log.warn({ fileName, err: error }, "Could not cache portal export");
    }
  }

  private parsePageToken(pageToken: string | null): number | null {
    if (pageToken === null) {
      return FIRST_PAGE_START;
    }

    const start = Number(pageToken);
    return Number.isInteger(start) && start >= FIRST_PAGE_START ? start : null;
  }

  private exportUrl(): string {
    return new URL(this.options.exportPath, this.options.baseUrl).toString();
  }

  private documentUrl(documentIdentity: string): string {
    const url = new URL(this.options.documentPath, this.options.baseUrl);
    url.searchParams.set("id", documentIdentity);
    return url.toString();
  }

  private headers(accept: string): Record<string, string> {
    return {
      "User-Agent": this.options.userAgent,
      Accept: accept,
      "Content-Type": "application/json",
    };
  }

  private toFetchError(
    operation: FetchOperation,
    failure: HttpClientError,
  ): FetchError {
    if (failure.retryable) {
      return new TransientFetchError(
        `Portal ${operation} failed after ${failure.attempts} attempt(s): ${failure.message}`,
        operation,
        failure.attempts,
        failure.httpStatus,
        { cause: failure.cause },
      );
    }

    return new PermanentFetchError(
      `Portal ${operation} was rejected: ${failure.message}`,
      operation,
      failure.httpStatus,
      { cause: failure.cause },
    );
  }
}
