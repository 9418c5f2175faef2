import type { HEADER_FIELDS, LINE_ITEM_FIELDS } from "../mappings/fields.js";

export type HeaderField = (typeof HEADER_FIELDS)[number];
export type LineItemField = (typeof LINE_ITEM_FIELDS)[number];

/** Field name -> trimmed cell value. "" means "leave the template alone". */
export type FieldRecord = Readonly<Record<string, string>>;

export type HeaderRecord = FieldRecord;
export type LineItemRecord = FieldRecord;

export interface CsvSections {
  headerRows: string[][];
  lineRows: string[][];
}

export interface FieldMappingRule<F extends string = string> {
  field: F;
  /** "/"-separated local names, relative to the section root */
  path: string;
  createIfMissing: boolean;
}
