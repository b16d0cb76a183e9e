import { describe, expect, it } from "vitest";
import { historicalChunks, incrementalWindow } from "./runWindows";

describe("incrementalWindow", () => {
  it("starts the overlap before the watermark", () => {
    expect(
      incrementalWindow({
        watermark: "2024-03-10",
        today: "2024-03-12",
        overlapDays: 1,
        initialLookbackDays: 7,
      }),
    ).toEqual({ start: "2024-03-09", end: "2024-03-12" });
  });

  it("falls back to the initial lookback without a watermark", () => {
    expect(
      incrementalWindow({
        watermark: null,
        today: "2024-03-01",
        overlapDays: 1,
        initialLookbackDays: 7,
      }),
    ).toEqual({ start: "2024-02-23", end: "2024-03-01" });
  });

  it("never starts after today", () => {
    expect(
      incrementalWindow({
        watermark: "2024-03-20",
        today: "2024-03-12",
        overlapDays: 0,
        initialLookbackDays: 7,
      }),
    ).toEqual({ start: "2024-03-12", end: "2024-03-12" });
  });
});

describe("historicalChunks", () => {
  it("covers the window with non-overlapping chunks", () => {
    expect(
      historicalChunks({ start: "2024-01-01", end: "2024-03-05" }, 30),
    ).toEqual([
      { start: "2024-01-01", end: "2024-01-30" },
      { start: "2024-01-31", end: "2024-02-29" },
      { start: "2024-03-01", end: "2024-03-05" },
    ]);
  });

  it("returns a single chunk for a one-day window", () => {
    expect(
      historicalChunks({ start: "2024-06-01", end: "2024-06-01" }, 30),
    ).toEqual([{ start: "2024-06-01", end: "2024-06-01" }]);
  });

  it("rejects inverted windows and invalid chunk sizes", () => {
    expect(() =>
      historicalChunks({ start: "2024-02-01", end: "2024-01-01" }, 30),
    ).toThrow("Window start 2024-02-01 is after its end 2024-01-01");
    expect(() =>
      historicalChunks({ start: "2024-01-01", end: "2024-01-02" }, 0),
    ).toThrow(RangeError);
  });
});
