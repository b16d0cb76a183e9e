import { parse } from "csv-parse";
import { err, ok, type Result } from "neverthrow";

export type CsvRow = Record<string, string>;

const toCsvRow = (value: unknown): CsvRow | null => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null;
  }

  const row: CsvRow = {};
  for (const [key, cell] of Object.entries(value)) {
    row[key.trim()] = typeof cell === "string" ? cell : String(cell ?? "");
  }

  return row;
};

/**
 * Parses a header-first CSV export into rows keyed by column name.
 */
export const parseCsvRows = (text: string): Promise<Result<CsvRow[], Error>> =>
  new Promise((resolve) => {
    parse(
      text,
      {
        columns: true,
        bom: true,
        trim: true,
        skip_empty_lines: true,
        relax_column_count: true,
      },
      (error: Error | undefined, records: unknown) => {
        if (error) {
          resolve(err(error));
          return;
        }

        if (!Array.isArray(records)) {
          resolve(err(new Error("CSV parser returned no record list.")));
          return;
        }

        const rows: CsvRow[] = [];
        for (const record of records) {
          const row = toCsvRow(record);
          if (row) {
            rows.push(row);
          }
        }

        resolve(ok(rows));
      },
    );
  });
