import type {
  FieldMappingRule,
  HeaderField,
  LineItemField,
} from "../types/records.js";

/** Local name of the section root that header and trailer paths start from. */
export const DOCUMENT_ELEMENT = "Document";

/** Local name of the repeated line-item element. */
export const LINE_ITEM_ELEMENT = "OrderLine";

export const TRAILER_TOTAL_LINES_PATH = "DocTrailer/TotalLines";

/** Paths are relative to the Document element. */
export const HEADER_MAPPINGS: ReadonlyArray<FieldMappingRule<HeaderField>> = [
  { field: "CUST-ORDER", path: "OrderHeader/CustOrder", createIfMissing: false },
  { field: "CUST-ADDR-CODE", path: "DocHeader/CustAddr/Code", createIfMissing: false },
  { field: "CUST-ADDR-NAME", path: "DocHeader/CustAddr/Name", createIfMissing: false },
  { field: "CUST-ADDR-ADDRESS1", path: "DocHeader/CustAddr/Address1", createIfMissing: false },
  { field: "CUST-ADDR-ADDRESS2", path: "DocHeader/CustAddr/Address2", createIfMissing: true },
  { field: "CUST-ADDR-ADDRESS3", path: "DocHeader/CustAddr/Address3", createIfMissing: true },
  { field: "DELIVERY-DUE-DATE", path: "OrderHeader/Delivery/ReqDel/Date", createIfMissing: false },
  { field: "DELIVERY-TO-CODE", path: "OrderHeader/Delivery/DeliverTo/Code", createIfMissing: false },
  { field: "DELIVERY-TO-NAME", path: "OrderHeader/Delivery/DeliverTo/Name", createIfMissing: false },
  { field: "DELIVERY-TO-ADDRESS1", path: "OrderHeader/Delivery/DeliverTo/Address1", createIfMissing: false },
  { field: "INVOICE-TO-CODE", path: "OrderHeader/Locations/InvoiceTo/Code", createIfMissing: false },
  { field: "INVOICE-TO-NAME", path: "OrderHeader/Locations/InvoiceTo/Name", createIfMissing: false },
  { field: "INVOICE-TO-ADDRESS1", path: "OrderHeader/Locations/InvoiceTo/Address1", createIfMissing: false },
  { field: "TOTAL-ORDER-UNITS", path: "OrderHeader/TotalOrderUnits", createIfMissing: false },
  { field: "TOTAL-ORDER-VALUE", path: "OrderHeader/TotalOrderVal", createIfMissing: false },
];

/** Paths are relative to one OrderLine element. */
export const LINE_ITEM_MAPPINGS: ReadonlyArray<FieldMappingRule<LineItemField>> = [
  { field: "LINE-NO", path: "LineNo", createIfMissing: false },
  { field: "LINE-CODE", path: "Item/CustItem/Code", createIfMissing: false },
  { field: "LINE-DESC", path: "Item/Desc1", createIfMissing: false },
  { field: "LINE-QUANT", path: "OrderQty/Unit", createIfMissing: false },
  { field: "LINE-PRICE", path: "OrderQty/CostPrice", createIfMissing: false },
  { field: "LINE-TOTAL-AMOUNT", path: "OrderQty/LineAmount", createIfMissing: false },
];

export function assertUniqueFields(
  rules: ReadonlyArray<FieldMappingRule>,
  tableName: string,
): void {
  const seen = new Set<string>();
  for (const rule of rules) {
    if (seen.has(rule.field)) {
      throw new Error(
        `Mapping table '${tableName}' maps field '${rule.field}' more than once`,
      );
    }
    seen.add(rule.field);
  }
}
