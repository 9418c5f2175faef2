import fs from "node:fs";
import { parseXmlDocument } from "../src/parsing/xml.js";
import { findFirst, textOf } from "../src/core/Tree.js";
import { splitPath } from "../src/resolvers/ElementPath.js";
import type { XmlDocument, XmlElement } from "../src/types/tree.js";

export function readFixture(name: string): string {
  return fs.readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf-8");
}

export function loadTemplate(): XmlDocument {
  return parseXmlDocument(readFixture("baseEDI.xml"));
}

export function documentOf(doc: XmlDocument): XmlElement {
  const el = findFirst(doc.root, "Document");
  if (!el) throw new Error("fixture has no Document element");
  return el;
}

/** Element at a "/"-path below `root`, matching local names; throws when absent. */
export function at(root: XmlElement, path: string): XmlElement {
  let cur = root;
  for (const seg of splitPath(path)) {
    const next = cur.children.find(
      (c): c is XmlElement =>
        c.kind === "element" && c.name.replace(/^[^:]*:/, "") === seg,
    );
    if (!next) throw new Error(`no element '${seg}' in path '${path}'`);
    cur = next;
  }
  return cur;
}

export function textAt(root: XmlElement, path: string): string {
  return textOf(at(root, path));
}

export function elementNames(el: XmlElement): string[] {
  return el.children.flatMap((c) => (c.kind === "element" ? [c.name] : []));
}

export const HEADER_NAMES_ROW =
  "CUST-ORDER,CUST-ADDR-CODE,CUST-ADDR-NAME,CUST-ADDR-ADDRESS1,CUST-ADDR-ADDRESS2,CUST-ADDR-ADDRESS3,DELIVERY-DUE-DATE,DELIVERY-TO-CODE,DELIVERY-TO-NAME,DELIVERY-TO-ADDRESS1,INVOICE-TO-CODE,INVOICE-TO-NAME,INVOICE-TO-ADDRESS1,TOTAL-ORDER-UNITS,TOTAL-ORDER-VALUE";

export const LINE_NAMES_ROW =
  "LINE-NO,LINE-CODE,LINE-DESC,LINE-QUANT,LINE-PRICE,LINE-TOTAL-AMOUNT";

/** Builds an order CSV from raw lines for each block. */
export function orderCsv(headerLines: string[], lineLines: string[]): string {
  return [
    "###ORD-HEADER",
    ...headerLines,
    "###ORD-HEADER-END",
    "###ORD-LINES",
    ...lineLines,
    "###ORD-LINES-END",
    "",
  ].join("\n");
}
