import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { ExportCachePort } from "../../core/ports/outboundPorts";

const UNSAFE_FILENAME_CHARS = /[^A-Za-z0-9._-]+/g;

/**
 * Writes raw portal exports under `directory`. A file with the same name is
 * overwritten with the latest body.
 */
export class LocalExportCache implements ExportCachePort {
  constructor(private readonly directory: string) {}

  async save(fileName: string, body: string): Promise<void> {
    const directory = path.resolve(this.directory);
    await mkdir(directory, { recursive: true });
    await writeFile(
      path.join(directory, fileName.replace(UNSAFE_FILENAME_CHARS, "_")),
      body,
      "utf8",
    );
  }
}
