import { err, ok, type Result } from "neverthrow";
import {
  PermanentFetchError,
  type FetchError,
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
import { addDays, compareIsoDates } from "../../../shared/time/dateUtils";

const MOCK_ISSUERS: IssuerProfile[] = [
  {
    issuerId: "000101",
    name: "Northern Lights Resources Ltd.",
    jurisdiction: "British Columbia",
    type: "Reporting issuer",
    inDefault: false,
    activeRestriction: false,
  },
  {
    issuerId: "000202",
    name: "Harbourfront Capital Corp.",
    jurisdiction: "Ontario",
    type: "Investment fund",
    inDefault: false,
    activeRestriction: false,
  },
  {
    issuerId: "000303",
    name: "Prairie Grain Holdings Inc.",
    jurisdiction: "Alberta",
    type: "Reporting issuer",
    inDefault: true,
    activeRestriction: false,
  },
];

const MOCK_FILING_TYPES = [
  ["Annual financial statements", "Audited annual financial statements"],
  ["Interim financial statements", "Interim financial statements/report"],
  ["News releases", "News release"],
] as const;

const encoder = new TextEncoder();

/**
 * Deterministic stand-in for the disclosure portal: one filing per issuer per
 * day of the requested window, paged like the real export.
 */
export class MockDisclosurePortal implements DisclosurePortalPort {
  constructor(private readonly pageSize = 50) {}

  async search(
    window: RunWindow,
    pageToken: string | null,
  ): Promise<Result<SearchPage, FetchError>> {
    const start = pageToken === null ? 0 : Number(pageToken);
    if (!Number.isInteger(start) || start < 0) {
      return err(
        new PermanentFetchError(`Invalid mock page token '${pageToken}'.`, "search"),
      );
    }

    const all = this.observationsFor(window);
    const records = all.slice(start, start + this.pageSize);
    const next = start + records.length;

    return ok({
      records,
      rejectedRows: 0,
      nextPageToken: next < all.length ? String(next) : null,
    });
  }

  async downloadContent(
    request: ContentRequest,
  ): Promise<Result<DownloadedContent, FetchError>> {
    const bytes = encoder.encode(`%PDF-mock ${request.documentIdentity}\n`);
    return ok({
      documentIdentity: request.documentIdentity,
      bytes,
      sizeMismatch:
        request.declaredSizeBytes !== undefined &&
        request.declaredSizeBytes !== bytes.byteLength,
    });
  }

  async fetchIssuers(): Promise<Result<IssuerProfile[], FetchError>> {
    return ok(MOCK_ISSUERS.map((issuer) => ({ ...issuer })));
  }

  private observationsFor(window: RunWindow): FilingObservation[] {
    const observations: FilingObservation[] = [];
    for (
      let day = window.start;
      compareIsoDates(day, window.end) <= 0;
      day = addDays(day, 1)
    ) {
      MOCK_ISSUERS.forEach((issuer, index) => {
        const [filingType, documentType] =
          MOCK_FILING_TYPES[index % MOCK_FILING_TYPES.length] ?? MOCK_FILING_TYPES[0];
        const documentIdentity = `mock-${issuer.issuerId}-${day}`;
        const bytes = encoder.encode(`%PDF-mock ${documentIdentity}\n`);

        observations.push({
          documentIdentity,
          issuerId: issuer.issuerId,
          filingType,
          documentType,
          filedOn: day,
          sourceUrl: `https://mock-portal.local/documents/${documentIdentity}`,
          sizeBytes: bytes.byteLength,
          amendmentMarker: false,
          issuer: {
            name: issuer.name,
            jurisdiction: issuer.jurisdiction,
            type: issuer.type,
          },
          rawPayload: {
            "Document GUID": documentIdentity,
            "Issuer Number": issuer.issuerId,
            "Date Filed": day,
          },
        });
      });
    }

    return observations;
  }
}
