import type { HeaderRecord, LineItemRecord } from "../types/records.js";
import { MalformedInputError } from "../core/Errors.js";

interface NamedColumn {
  name: string;
  index: number;
}

/** Non-empty names of a field-name row, keeping their column positions. */
function namedColumns(row: ReadonlyArray<string>, section: string): NamedColumn[] {
  const columns: NamedColumn[] = [];
  const seen = new Set<string>();
  row.forEach((cell, index) => {
    const name = cell.trim();
    if (!name) return;
    if (seen.has(name)) {
      throw new MalformedInputError(
        `Field '${name}' appears more than once in the ${section} field-name row`,
        { section, field: name },
      );
    }
    seen.add(name);
    columns.push({ name, index });
  });
  return columns;
}

function zip(columns: ReadonlyArray<NamedColumn>, row: ReadonlyArray<string>): Record<string, string> {
  const record: Record<string, string> = {};
  for (const { name, index } of columns) {
    record[name] = (row[index] ?? "").trim();
  }
  return record;
}

function isBlank(row: ReadonlyArray<string>): boolean {
  return row.every((cell) => cell.trim() === "");
}

/** First row = field names, second row = values. Rows after the second are ignored. */
export function parseHeaderRecord(rows: ReadonlyArray<ReadonlyArray<string>>): HeaderRecord {
  const [names, values] = rows;
  if (!names || !values) {
    throw new MalformedInputError(
      `Header block needs a field-name row and a value row, found ${rows.length} row(s)`,
      { rows: rows.length },
    );
  }
  return Object.freeze(zip(namedColumns(names, "header"), values));
}

/**
 * First row = field names, every further non-blank row = one record, in row
 * order. Short rows are padded with "", extra cells are dropped.
 */
export function parseLineItemRecords(
  rows: ReadonlyArray<ReadonlyArray<string>>,
): LineItemRecord[] {
  const [names, ...data] = rows;
  if (!names) return [];

  const columns = namedColumns(names, "line-items");
  return data
    .filter((row) => !isBlank(row))
    .map((row) => Object.freeze(zip(columns, row)));
}
