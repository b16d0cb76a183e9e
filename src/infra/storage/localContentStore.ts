import { createHash } from "node:crypto";
import { mkdir, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import type { ContentLocation } from "../../core/entities/filing";
import type { ContentStorePort } from "../../core/ports/outboundPorts";
import { logger as rootLogger, type Logger } from "../../shared/logger/logger";

export type LocalContentStoreOptions = {
  directory: string;
  inlineMaxBytes: number;
};

const UNSAFE_FILENAME_CHARS = /[^A-Za-z0-9._-]+/g;

const fileSize = async (filePath: string): Promise<number | null> => {
  try {
    return (await stat(filePath)).size;
  } catch (error) {
    if (
      error instanceof Error &&
      "code" in error &&
      error.code === "ENOENT"
    ) {
      return null;
    }
    throw error;
  }
};

/**
 * Keeps documents up to `inlineMaxBytes` inline and writes larger ones under
 * `directory`, one file per identity and content digest. A file that already
 * exists with the same size is not rewritten.
 */
export class LocalContentStore implements ContentStorePort {
  constructor(
    private readonly options: LocalContentStoreOptions,
    private readonly log: Logger = rootLogger.child({ component: "content-store" }),
  ) {}

  async put(
    documentIdentity: string,
    bytes: Uint8Array,
  ): Promise<ContentLocation> {
    if (bytes.byteLength <= this.options.inlineMaxBytes) {
      return { kind: "inline", data: bytes };
    }

    const digest = createHash("sha256").update(bytes).digest("hex").slice(0, 16);
    const safeIdentity = documentIdentity.replace(UNSAFE_FILENAME_CHARS, "_");
    const directory = path.resolve(this.options.directory);
    const filePath = path.join(directory, `${safeIdentity}-${digest}.pdf`);

    if ((await fileSize(filePath)) === bytes.byteLength) {
      this.log.debug({ documentIdentity, filePath }, "Document already stored");
    } else {
      await mkdir(directory, { recursive: true });
      await writeFile(filePath, bytes);
      this.log.info(
        { documentIdentity, filePath, bytes: bytes.byteLength },
        "Stored document",
      );
    }

    return { kind: "reference", uri: pathToFileURL(filePath).toString() };
  }
}
