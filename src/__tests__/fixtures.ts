import {
  filingRecordId,
  type FilingObservation,
  type FilingRecord,
} from "../core/entities/filing";

export const fixedNow = new Date("2024-01-02T12:00:00.000Z");

export const observation = (
  overrides: Partial<FilingObservation> & { documentIdentity: string },
): FilingObservation => ({
  issuerId: "000123",
  filingType: "Annual financial statements",
  documentType: "Audited annual financial statements",
  filedOn: "2024-01-02",
  sourceUrl: `https://portal.test/docs/${overrides.documentIdentity}`,
  amendmentMarker: false,
  issuer: { name: "Acme Mining Corp.", jurisdiction: "Ontario" },
  rawPayload: { "Document GUID": overrides.documentIdentity },
  ...overrides,
});

export const filingRecord = (
  overrides: Partial<FilingRecord> & { documentIdentity: string },
): FilingRecord => {
  const version = overrides.version ?? 1;
  return {
    id: filingRecordId(overrides.documentIdentity, version),
    issuerId: "000123",
    filingType: "Annual financial statements",
    documentType: "Audited annual financial statements",
    filedOn: "2024-01-02",
    version,
    supersedes: null,
    supersededBy: null,
    content: { kind: "reference", uri: `file:///tmp/${overrides.documentIdentity}.pdf` },
    sizeBytes: null,
    fetchedBytes: 4,
    sizeMismatch: false,
    sourceUrl: `https://portal.test/docs/${overrides.documentIdentity}`,
    amendmentMarker: false,
    status: "active",
    failureReason: null,
    runId: "run-0",
    createdAt: fixedNow,
    updatedAt: fixedNow,
    ...overrides,
  };
};
