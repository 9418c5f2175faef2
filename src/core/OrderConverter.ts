import type { Logger } from "pino";
import type { ConvertMeta, ConvertResult, ConvertWarning } from "../types/result.js";
import type { FieldRecord } from "../types/records.js";
import type { XmlElement } from "../types/tree.js";
import { OrderMappingError } from "./Errors.js";
import { findFirst } from "./Tree.js";
import { applyRecord } from "./TreeMutator.js";
import { expandLineItems } from "./LineItemExpander.js";
import { aggregateTrailer } from "./TrailerAggregator.js";
import { readCsvRows } from "../parsing/csv.js";
import { splitSections } from "../parsing/sections.js";
import { parseHeaderRecord, parseLineItemRecords } from "../parsing/records.js";
import { parseXmlDocument } from "../parsing/xml.js";
import { serializeXmlDocument } from "../output/serialize.js";
import { DEFAULT_PARTNER_PREFIX, outputFileName } from "../output/filename.js";
import { HEADER_FIELDS, LINE_ITEM_FIELDS } from "../mappings/fields.js";
import {
  DOCUMENT_ELEMENT,
  HEADER_MAPPINGS,
  LINE_ITEM_MAPPINGS,
  assertUniqueFields,
} from "../mappings/tables.js";
import { silentLogger } from "../utils/logger.js";

export interface OrderConverterOptions {
  /** base XML template text; parsed afresh for every conversion */
  template: string;
  logger?: Logger;
  /** default: "WAITROSE" */
  partnerPrefix?: string;
  /** default: false (attach ConvertMeta to results) */
  debug?: boolean;
}

export class OrderConverter {
  private template: string;
  private logger: Logger;
  private partnerPrefix: string;
  private debug: boolean;

  constructor(opts: OrderConverterOptions) {
    assertUniqueFields(HEADER_MAPPINGS, "header");
    assertUniqueFields(LINE_ITEM_MAPPINGS, "line-item");

    this.template = opts.template;
    this.logger = opts.logger ?? silentLogger();
    this.partnerPrefix = opts.partnerPrefix ?? DEFAULT_PARTNER_PREFIX;
    this.debug = opts.debug ?? false;
  }

  convert(csvText: string): ConvertResult {
    const meta: ConvertMeta = { lineItemCount: 0, createdPaths: [], warnings: [] };

    try {
      const { headerRows, lineRows } = splitSections(readCsvRows(csvText));
      const header = parseHeaderRecord(headerRows);
      const lineItems = parseLineItemRecords(lineRows);
      this.logger.debug(
        { headerFields: Object.keys(header).length, lineItems: lineItems.length },
        "parsed order csv",
      );

      meta.warnings.push(
        ...unknownFields(header, HEADER_FIELDS, "UNKNOWN_HEADER_FIELD"),
        ...lineItems
          .slice(0, 1)
          .flatMap((r) => unknownFields(r, LINE_ITEM_FIELDS, "UNKNOWN_LINE_FIELD")),
      );
      for (const w of meta.warnings) this.logger.warn({ field: w.field }, w.message);

      const document = parseXmlDocument(this.template);
      const root = documentRoot(document.root);

      applyRecord(root, header, HEADER_MAPPINGS, meta.createdPaths);
      expandLineItems(root, lineItems, LINE_ITEM_MAPPINGS, meta.createdPaths);
      meta.lineItemCount = aggregateTrailer(root, meta.createdPaths);

      const fileName = outputFileName(header, this.partnerPrefix);
      const xml = serializeXmlDocument(document);
      this.logger.info(
        { fileName, lineItems: meta.lineItemCount, created: meta.createdPaths },
        "order converted",
      );

      return finalizeResult(
        { ok: true, value: { document, xml, fileName, header, lineItems }, meta },
        this.debug,
      );
    } catch (e: unknown) {
      if (!(e instanceof OrderMappingError)) throw e;
      this.logger.error({ code: e.code, details: e.details }, e.message);
      return finalizeResult({ ok: false, error: e.toConvertError(), meta }, this.debug);
    }
  }
}

/** The Document element, or the root element when the template has none. */
function documentRoot(root: XmlElement): XmlElement {
  return findFirst(root, DOCUMENT_ELEMENT) ?? root;
}

function unknownFields(
  record: FieldRecord,
  known: ReadonlyArray<string>,
  code: ConvertWarning["code"],
): ConvertWarning[] {
  return Object.keys(record)
    .filter((f) => !known.includes(f))
    .map((field) => ({
      code,
      field,
      message: `Field '${field}' has no mapping and is ignored`,
    }));
}

function finalizeResult(result: ConvertResult, debug: boolean): ConvertResult {
  if (debug) return result;

  if (result.ok) {
    return { ok: true, value: result.value };
  }

  return { ok: false, error: result.error };
}
