import type { Result } from "neverthrow";
import type { FetchError } from "../entities/appError";
import type { FilingObservation, IssuerSnapshot } from "../entities/filing";
import type { RunWindow } from "../entities/runLedger";

export type SearchPage = {
  records: FilingObservation[];
  nextPageToken: string | null;
  rejectedRows: number;
};

export type ContentRequest = {
  documentIdentity: string;
  sourceUrl?: string;
  declaredSizeBytes?: number;
};

export type DownloadedContent = {
  documentIdentity: string;
  bytes: Uint8Array;
  sizeMismatch: boolean;
};

export type IssuerProfile = IssuerSnapshot & {
  issuerId: string;
};

/**
 * Read side of the external disclosure portal. Implementations gate every
 * outbound request through the shared rate limiter.
 */
export interface DisclosurePortalPort {
  search(
    window: RunWindow,
    pageToken: string | null,
  ): Promise<Result<SearchPage, FetchError>>;
  downloadContent(
    request: ContentRequest,
  ): Promise<Result<DownloadedContent, FetchError>>;
  fetchIssuers(): Promise<Result<IssuerProfile[], FetchError>>;
}
