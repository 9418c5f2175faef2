import { parse as parseCsv } from "csv-parse/sync";
import { MalformedInputError } from "../core/Errors.js";

/** Reads CSV text into rows of cells. Rows may differ in length. */
export function readCsvRows(text: string): string[][] {
  let parsed: unknown;
  try {
    parsed = parseCsv(text, {
      bom: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
    });
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    throw new MalformedInputError(`CSV could not be read: ${message}`, {
      cause: message,
    });
  }

  if (!Array.isArray(parsed)) {
    throw new MalformedInputError("CSV parser returned no rows");
  }
  return parsed.map((row: unknown) =>
    Array.isArray(row) ? row.map((cell: unknown) => String(cell ?? "")) : [],
  );
}
