import type { CsvSections } from "../types/records.js";
import { MalformedInputError } from "../core/Errors.js";
import { SENTINELS, type SentinelName } from "../mappings/fields.js";

const SENTINEL_ORDER: ReadonlyArray<SentinelName> = [
  "headerStart",
  "headerEnd",
  "linesStart",
  "linesEnd",
];

const SENTINEL_SEQUENCE: ReadonlyArray<readonly [SentinelName, SentinelName]> = [
  ["headerStart", "headerEnd"],
  ["headerEnd", "linesStart"],
  ["linesStart", "linesEnd"],
];

export type SentinelPositions = Record<SentinelName, number[]>;

export function markerOf(row: ReadonlyArray<string>): string {
  return (row[0] ?? "").trim();
}

/** Row indexes of every sentinel, by sentinel. */
export function locateSentinels(rows: ReadonlyArray<ReadonlyArray<string>>): SentinelPositions {
  const positions: SentinelPositions = {
    headerStart: [],
    headerEnd: [],
    linesStart: [],
    linesEnd: [],
  };
  rows.forEach((row, i) => {
    const marker = markerOf(row);
    for (const name of SENTINEL_ORDER) {
      if (marker === SENTINELS[name]) positions[name].push(i);
    }
  });
  return positions;
}

/**
 * Splits the rows into the header block and the line-items block.
 * Each sentinel must appear exactly once, in the order
 * ###ORD-HEADER, ###ORD-HEADER-END, ###ORD-LINES, ###ORD-LINES-END.
 */
export function splitSections(rows: ReadonlyArray<ReadonlyArray<string>>): CsvSections {
  const positions = locateSentinels(rows);

  const single = (name: SentinelName): number => {
    const found = positions[name];
    const first = found[0];
    if (first === undefined) {
      throw new MalformedInputError(`Missing sentinel row ${SENTINELS[name]}`, {
        sentinel: SENTINELS[name],
      });
    }
    if (found.length > 1) {
      throw new MalformedInputError(
        `Sentinel row ${SENTINELS[name]} appears ${found.length} times`,
        { sentinel: SENTINELS[name], rows: found },
      );
    }
    return first;
  };

  const at: Record<SentinelName, number> = {
    headerStart: single("headerStart"),
    headerEnd: single("headerEnd"),
    linesStart: single("linesStart"),
    linesEnd: single("linesEnd"),
  };

  for (const [before, after] of SENTINEL_SEQUENCE) {
    if (at[after] <= at[before]) {
      throw new MalformedInputError(
        `Sentinel row ${SENTINELS[after]} must come after ${SENTINELS[before]}`,
        { [SENTINELS[before]]: at[before], [SENTINELS[after]]: at[after] },
      );
    }
  }

  const copy = (from: number, to: number) =>
    rows.slice(from + 1, to).map((r) => [...r]);

  return {
    headerRows: copy(at.headerStart, at.headerEnd),
    lineRows: copy(at.linesStart, at.linesEnd),
  };
}
