import type { HeaderRecord, LineItemRecord } from "./records.js";
import type { XmlDocument } from "./tree.js";

export type ConvertResult =
  | { ok: true; value: ConvertedOrder; meta?: ConvertMeta }
  | { ok: false; error: ConvertError; meta?: ConvertMeta };

export interface ConvertedOrder {
  document: XmlDocument;
  xml: string;
  fileName: string;
  header: HeaderRecord;
  lineItems: ReadonlyArray<LineItemRecord>;
}

export interface ConvertMeta {
  lineItemCount: number;
  /** section-relative paths the mutator had to create */
  createdPaths: string[];
  warnings: ConvertWarning[];
}

export interface ConvertWarning {
  code: "UNKNOWN_HEADER_FIELD" | "UNKNOWN_LINE_FIELD";
  message: string;
  field?: string;
}

export type ConvertErrorCode =
  | "MALFORMED_INPUT"
  | "PATH_NOT_FOUND"
  | "ENCODING_ERROR"
  | "TEMPLATE_PARSE_ERROR"
  | "INVALID_TEMPLATE";

export interface ConvertError {
  code: ConvertErrorCode;
  message: string;
  details?: Record<string, unknown>;
}
