import type { FilingObservation, IssuerSnapshot } from "../../../core/entities/filing";
import type { IssuerProfile } from "../../../core/ports/inboundPorts";
import { normalizeDateCell } from "../../../shared/time/dateUtils";
import type { CsvRow } from "./csv";

export const filingColumns = {
  issuerId: "Issuer Number",
  issuerName: "Issuer Name",
  jurisdiction: "Jurisdiction(s)",
  issuerType: "Issuer Type",
  documentIdentity: "Document GUID",
  filingType: "Filing Type",
  documentType: "Document Type",
  filedOn: "Date Filed",
  sourceUrl: "Generate URL",
  size: "Size",
  amendment: "Amendment",
} as const;

export const issuerColumns = {
  issuerId: "Issuer Number",
  name: "Name",
  jurisdiction: "Jurisdiction(s)",
  type: "Type",
  inDefault: "In Default Flag",
  activeRestriction: "Active CTO Flag",
} as const;

const TRUE_FLAGS = new Set(["y", "yes", "true", "1", "x"]);
const SIZE_PATTERN = /^([\d.,]+)\s*(b|bytes|kb|mb|gb)?$/i;
const SIZE_UNITS: Record<string, number> = {
  b: 1,
  bytes: 1,
  kb: 1_024,
  mb: 1_024 ** 2,
  gb: 1_024 ** 3,
};

const cell = (row: CsvRow, column: string): string | undefined => {
  const value = row[column]?.trim();
  return value ? value : undefined;
};

export const parseFlag = (value: string | undefined): boolean =>
  value !== undefined && TRUE_FLAGS.has(value.trim().toLowerCase());

export const parseSizeBytes = (value: string | undefined): number | undefined => {
  if (!value) {
    return undefined;
  }

  const match = SIZE_PATTERN.exec(value.trim());
  if (!match?.[1]) {
    return undefined;
  }

  const amount = Number.parseFloat(match[1].replaceAll(",", ""));
  const unit = SIZE_UNITS[(match[2] ?? "b").toLowerCase()] ?? 1;
  if (!Number.isFinite(amount) || amount < 0) {
    return undefined;
  }

  return Math.round(amount * unit);
};

const toIssuerSnapshot = (row: CsvRow): IssuerSnapshot | undefined => {
  const name = cell(row, filingColumns.issuerName);
  if (!name) {
    return undefined;
  }

  return {
    name,
    jurisdiction: cell(row, filingColumns.jurisdiction),
    type: cell(row, filingColumns.issuerType),
  };
};

/**
 * Maps one search export row. Rows without identity, issuer or a readable
 * filing date are rejected (null).
 */
export const toFilingObservation = (row: CsvRow): FilingObservation | null => {
  const documentIdentity = cell(row, filingColumns.documentIdentity);
  const issuerId = cell(row, filingColumns.issuerId);
  const filedOnCell = cell(row, filingColumns.filedOn);
  const filedOn = filedOnCell ? normalizeDateCell(filedOnCell) : null;

  if (!documentIdentity || !issuerId || !filedOn) {
    return null;
  }

  return {
    documentIdentity,
    issuerId,
    filingType: cell(row, filingColumns.filingType) ?? "",
    documentType: cell(row, filingColumns.documentType) ?? "",
    filedOn,
    sourceUrl: cell(row, filingColumns.sourceUrl),
    sizeBytes: parseSizeBytes(cell(row, filingColumns.size)),
    amendmentMarker: parseFlag(cell(row, filingColumns.amendment)),
    issuer: toIssuerSnapshot(row),
    rawPayload: row,
  };
};

export const toIssuerProfile = (row: CsvRow): IssuerProfile | null => {
  const issuerId = cell(row, issuerColumns.issuerId);
  const name = cell(row, issuerColumns.name);
  if (!issuerId || !name) {
    return null;
  }

  return {
    issuerId,
    name,
    jurisdiction: cell(row, issuerColumns.jurisdiction),
    type: cell(row, issuerColumns.type),
    inDefault: parseFlag(cell(row, issuerColumns.inDefault)),
    activeRestriction: parseFlag(cell(row, issuerColumns.activeRestriction)),
  };
};
