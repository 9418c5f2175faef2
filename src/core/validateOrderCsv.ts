import { readCsvRows } from "../parsing/csv.js";
import { locateSentinels } from "../parsing/sections.js";
import { SENTINELS, type SentinelName } from "../mappings/fields.js";
import { OrderMappingError } from "./Errors.js";

export interface CsvValidationResult {
  valid: boolean;
  errors: string[];
}

const SENTINEL_NAMES: ReadonlyArray<SentinelName> = [
  "headerStart",
  "headerEnd",
  "linesStart",
  "linesEnd",
];

/**
 * Pre-flight check of an order CSV. Collects every problem instead of
 * stopping at the first one; never throws for bad input.
 */
export function validateOrderCsv(text: string): CsvValidationResult {
  let rows: string[][];
  try {
    rows = readCsvRows(text);
  } catch (e: unknown) {
    if (!(e instanceof OrderMappingError)) throw e;
    return { valid: false, errors: [e.message] };
  }

  if (rows.length === 0) return { valid: false, errors: ["CSV file is empty"] };

  const errors: string[] = [];
  const positions = locateSentinels(rows);

  const missing = SENTINEL_NAMES.filter((n) => positions[n].length === 0);
  if (missing.length > 0) {
    errors.push(
      `Missing required markers: ${missing.map((n) => SENTINELS[n]).join(", ")}`,
    );
  }
  for (const name of SENTINEL_NAMES) {
    if (positions[name].length > 1) {
      errors.push(
        `Marker ${SENTINELS[name]} appears ${positions[name].length} times`,
      );
    }
  }

  const [headerStart] = positions.headerStart;
  const [headerEnd] = positions.headerEnd;
  const [linesStart] = positions.linesStart;
  const [linesEnd] = positions.linesEnd;

  if (headerStart !== undefined && headerEnd !== undefined) {
    if (headerEnd <= headerStart) {
      errors.push("Header end marker must come after header start marker");
    } else {
      errors.push(...checkHeader(rows.slice(headerStart + 1, headerEnd)));
    }
  }

  if (linesStart !== undefined && linesEnd !== undefined) {
    if (linesEnd <= linesStart) {
      errors.push("Lines end marker must come after lines start marker");
    } else if (linesEnd === linesStart + 1) {
      errors.push("Lines section is empty");
    }
  }

  if (headerEnd !== undefined && linesStart !== undefined && linesStart <= headerEnd) {
    errors.push("Lines section must come after the header section");
  }

  return { valid: errors.length === 0, errors };
}

function checkHeader(headerRows: ReadonlyArray<ReadonlyArray<string>>): string[] {
  const [names, values] = headerRows;
  if (!names) return ["Header section is empty"];
  if (!values) return ["Header section has a field-name row but no value row"];

  const idx = names.findIndex((cell) => cell.trim() === "CUST-ORDER");
  if (idx === -1) return ["CUST-ORDER field is required in header section"];
  if (!(values[idx] ?? "").trim()) return ["CUST-ORDER field is required but empty"];
  return [];
}
