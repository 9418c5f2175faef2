export type {
  HeaderRecord,
  LineItemRecord,
  FieldRecord,
  FieldMappingRule,
  HeaderField,
  LineItemField,
  CsvSections,
} from "./types/records.js";
export type {
  ConvertResult,
  ConvertedOrder,
  ConvertMeta,
  ConvertError,
  ConvertErrorCode,
  ConvertWarning,
} from "./types/result.js";
export type {
  XmlCData,
  XmlComment,
  XmlDocument,
  XmlElement,
  XmlMisc,
  XmlNode,
  XmlProcessingInstruction,
  XmlText,
} from "./types/tree.js";
export {
  OrderMappingError,
  MalformedInputError,
  PathNotFoundError,
  EncodingError,
  TemplateError,
} from "./core/Errors.js";
export { OrderConverter } from "./core/OrderConverter.js";
export { applyValue, applyRecord } from "./core/TreeMutator.js";
export { expandLineItems } from "./core/LineItemExpander.js";
export { aggregateTrailer } from "./core/TrailerAggregator.js";
export { validateOrderCsv } from "./core/validateOrderCsv.js";
export { readCsvRows } from "./parsing/csv.js";
export { splitSections } from "./parsing/sections.js";
export { parseHeaderRecord, parseLineItemRecords } from "./parsing/records.js";
export { parseXmlDocument } from "./parsing/xml.js";
export { serializeXmlDocument } from "./output/serialize.js";
export { outputFileName } from "./output/filename.js";
export { HEADER_FIELDS, LINE_ITEM_FIELDS, SENTINELS } from "./mappings/fields.js";
export {
  HEADER_MAPPINGS,
  LINE_ITEM_MAPPINGS,
  TRAILER_TOTAL_LINES_PATH,
} from "./mappings/tables.js";

import type { OrderConverterOptions } from "./core/OrderConverter.js";
import { OrderConverter as OrderConverterClass } from "./core/OrderConverter.js";

export type { OrderConverterOptions };

export function createOrderConverter(opts: OrderConverterOptions) {
  return new OrderConverterClass(opts);
}
