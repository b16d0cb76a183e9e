import type { IsoDate } from "../../core/entities/filing";

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Converts a Date to ISO date string (YYYY-MM-DD format), in UTC.
 */
export const toIsoDate = (value: Date): IsoDate =>
  value.toISOString().slice(0, 10);

/**
 * Parses a strict `YYYY-MM-DD` string to UTC midnight, rejecting impossible dates such as 2024-02-30.
 */
export const parseIsoDate = (value: string): Date | null => {
  const match = ISO_DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const parsed = new Date(`${match[0]}T00:00:00.000Z`);
  if (Number.isNaN(parsed.getTime()) || toIsoDate(parsed) !== match[0]) {
    return null;
  }

  return parsed;
};

export const isIsoDate = (value: string): value is IsoDate =>
  parseIsoDate(value) !== null;

export const addDays = (value: IsoDate, days: number): IsoDate => {
  const parsed = parseIsoDate(value);
  if (!parsed) {
    throw new RangeError(`Not an ISO date: ${value}`);
  }

  return toIsoDate(new Date(parsed.getTime() + days * DAY_MS));
};

export const compareIsoDates = (left: IsoDate, right: IsoDate): number =>
  left < right ? -1 : left > right ? 1 : 0;

export const maxIsoDate = (left: IsoDate, right: IsoDate): IsoDate =>
  compareIsoDates(left, right) >= 0 ? left : right;

export const minIsoDate = (left: IsoDate, right: IsoDate): IsoDate =>
  compareIsoDates(left, right) <= 0 ? left : right;

/**
 * Normalises portal date cells: ISO dates (optionally followed by a time) pass
 * through, anything else goes through Date parsing. Returns null when unreadable.
 */
export const normalizeDateCell = (value: string): IsoDate | null => {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  const leading = trimmed.slice(0, 10);
  if (parseIsoDate(leading)) {
    return leading;
  }

  const parsed = new Date(trimmed);
  if (Number.isNaN(parsed.getTime())) {
    return null;
  }

  return toIsoDate(
    new Date(
      Date.UTC(parsed.getFullYear(), parsed.getMonth(), parsed.getDate()),
    ),
  );
};
