/**
 * ISO calendar date (`YYYY-MM-DD`). Filing dates and run windows are day-granular.
 */
export type IsoDate = string;

export type FilingStatus = "active" | "superseded" | "failed";

export type ContentLocation =
  | { kind: "inline"; data: Uint8Array }
  | { kind: "reference"; uri: string };

export type IssuerSnapshot = {
  name: string;
  jurisdiction?: string;
  type?: string;
  inDefault?: boolean;
  activeRestriction?: boolean;
};

/**
 * One row as the portal reported it, before any identity decision was taken.
 */
export type FilingObservation = {
  documentIdentity: string;
  issuerId: string;
  filingType: string;
  documentType: string;
  filedOn: IsoDate;
  sourceUrl?: string;
  sizeBytes?: number;
  amendmentMarker: boolean;
  issuer?: IssuerSnapshot;
  rawPayload: Record<string, string>;
};

export type FilingRecord = {
  id: string;
  documentIdentity: string;
  issuerId: string;
  filingType: string;
  documentType: string;
  filedOn: IsoDate;
  version: number;
  supersedes: string | null;
  supersededBy: string | null;
  content: ContentLocation | null;
  sizeBytes: number | null;
  fetchedBytes: number | null;
  sizeMismatch: boolean;
  sourceUrl: string | null;
  amendmentMarker: boolean;
  status: FilingStatus;
  failureReason: string | null;
  runId: string;
  createdAt: Date;
  updatedAt: Date;
};

/**
 * Record ids are derived from identity and version so that a re-applied intent
 * lands on the same row.
 */
export const filingRecordId = (
  documentIdentity: string,
  version: number,
): string => `${documentIdentity}#v${version}`;
