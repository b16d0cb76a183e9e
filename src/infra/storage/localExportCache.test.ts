import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LocalExportCache } from "./localExportCache";

describe("LocalExportCache", () => {
  let directory = "";

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "export-cache-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("writes exports into a created directory and replaces same-named files", async () => {
    const cache = new LocalExportCache(path.join(directory, "cache"));

    await cache.save("issuers_20240102.csv", "Issuer Number\n000123\n");
    await cache.save("issuers_20240102.csv", "Issuer Number\n000456\n");

    expect(await readdir(path.join(directory, "cache"))).toEqual(["issuers_20240102.csv"]);
    await expect(
      readFile(path.join(directory, "cache", "issuers_20240102.csv"), "utf8"),
    ).resolves.toBe("Issuer Number\n000456\n");
  });

  it("keeps file names inside the cache directory", async () => {
    const cache = new LocalExportCache(directory);

    await cache.save("../filings 2024.csv", "x");

    expect(await readdir(directory)).toEqual([".._filings_2024.csv"]);
  });
});
