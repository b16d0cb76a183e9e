import type { IsoDate } from "../../core/entities/filing";
import type { RunWindow } from "../../core/entities/runLedger";
import {
  addDays,
  compareIsoDates,
  isIsoDate,
  maxIsoDate,
  minIsoDate,
} from "../../shared/time/dateUtils";

export type IncrementalWindowInput = {
  watermark: IsoDate | null;
  today: IsoDate;
  overlapDays: number;
  initialLookbackDays: number;
};

/**
 * `[watermark - overlapDays, today]`, or `[today - initialLookbackDays, today]`
 * before the first successful incremental run. The start never passes today.
 */
export const incrementalWindow = ({
  watermark,
  today,
  overlapDays,
  initialLookbackDays,
}: IncrementalWindowInput): RunWindow => {
  if (overlapDays < 0 || initialLookbackDays < 0) {
    throw new RangeError("Overlap and lookback days must be >= 0");
  }

  const start =
    watermark === null
      ? addDays(today, -initialLookbackDays)
      : addDays(watermark, -overlapDays);

  return { start: minIsoDate(start, today), end: today };
};

/**
 * Splits an inclusive window into consecutive chunks of at most `chunkDays`
 * calendar days. Chunks never overlap and together cover the window exactly.
 */
export const historicalChunks = (
  window: RunWindow,
  chunkDays: number,
): RunWindow[] => {
  if (!Number.isInteger(chunkDays) || chunkDays < 1) {
    throw new RangeError("chunkDays must be an integer >= 1");
  }
  assertWindow(window);

  const chunks: RunWindow[] = [];
  let cursor = window.start;
  while (compareIsoDates(cursor, window.end) <= 0) {
    const end = minIsoDate(addDays(cursor, chunkDays - 1), window.end);
    chunks.push({ start: cursor, end });
    cursor = addDays(end, 1);
  }

  return chunks;
};

export const assertWindow = (window: RunWindow): void => {
  if (!isIsoDate(window.start) || !isIsoDate(window.end)) {
    throw new RangeError(
      `Window bounds must be ISO dates, got ${window.start}..${window.end}`,
    );
  }

  if (maxIsoDate(window.start, window.end) !== window.end) {
    throw new RangeError(
      `Window start ${window.start} is after its end ${window.end}`,
    );
  }
};
