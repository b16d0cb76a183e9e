import { mkdtemp, readdir, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LocalContentStore } from "./localContentStore";

describe("LocalContentStore", () => {
  let directory = "";

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "content-store-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("keeps small documents inline", async () => {
    const store = new LocalContentStore({ directory, inlineMaxBytes: 8 });
    const bytes = new Uint8Array([1, 2, 3]);

    await expect(store.put("doc-1", bytes)).resolves.toEqual({
      kind: "inline",
      data: bytes,
    });
    expect(await readdir(directory)).toEqual([]);
  });

  it("writes larger documents to disk and returns a file reference", async () => {
    const store = new LocalContentStore({ directory, inlineMaxBytes: 2 });
    const bytes = new TextEncoder().encode("%PDF-1.7 body");

    const location = await store.put("GUID/with spaces", bytes);
    if (location.kind !== "reference") {
      throw new Error("expected a reference");
    }

    const filePath = fileURLToPath(location.uri);
    expect(path.dirname(filePath)).toBe(path.resolve(directory));
    expect(path.basename(filePath)).toMatch(/^GUID_with_spaces-[0-9a-f]{16}\.pdf$/);
    expect(await readFile(filePath, "utf8")).toBe("%PDF-1.7 body");
  });

  it("does not rewrite an identical document", async () => {
    const store = new LocalContentStore({ directory, inlineMaxBytes: 0 });
    const bytes = new TextEncoder().encode("same content");

    const first = await store.put("doc-2", bytes);
    if (first.kind !== "reference") {
      throw new Error("expected a reference");
    }
    const before = await stat(fileURLToPath(first.uri));

    const second = await store.put("doc-2", bytes);

    expect(second).toEqual(first);
    expect((await stat(fileURLToPath(first.uri))).mtimeMs).toBe(before.mtimeMs);
  });

  it("keeps distinct versions of one identity apart", async () => {
    const store = new LocalContentStore({ directory, inlineMaxBytes: 0 });

    const original = await store.put("doc-3", new TextEncoder().encode("v1"));
    const amended = await store.put("doc-3", new TextEncoder().encode("v2"));

    expect(original).not.toEqual(amended);
    expect(await readdir(directory)).toHaveLength(2);
  });
});
