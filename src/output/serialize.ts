import { XMLBuilder } from "fast-xml-parser";
import type { XmlDocument, XmlNode } from "../types/tree.js";
import {
  ATTRIBUTE_PREFIX,
  ATTRIBUTES_KEY,
  CDATA_KEY,
  COMMENT_KEY,
  PI_MARKER,
  TEXT_KEY,
} from "../parsing/xml.js";

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

type OrderedEntry = Record<string, unknown>;

function withAttributes(entry: OrderedEntry, attributes: Record<string, string>): OrderedEntry {
  const attrs = Object.entries(attributes);
  if (attrs.length > 0) {
    entry[ATTRIBUTES_KEY] = Object.fromEntries(
      attrs.map(([k, v]) => [`${ATTRIBUTE_PREFIX}${k}`, v]),
    );
  }
  return entry;
}

function fromNodes(nodes: ReadonlyArray<XmlNode>): OrderedEntry[] {
  return nodes.map((node) => {
    switch (node.kind) {
      case "text":
        return { [TEXT_KEY]: node.value };
      case "cdata":
        return { [CDATA_KEY]: [{ [TEXT_KEY]: node.value }] };
      case "comment":
        return { [COMMENT_KEY]: [{ [TEXT_KEY]: node.value }] };
      case "pi":
        return withAttributes(
          { [`${PI_MARKER}${node.target}`]: [{ [TEXT_KEY]: "" }] },
          node.attributes,
        );
      case "element":
        return withAttributes({ [node.name]: fromNodes(node.children) }, node.attributes);
    }
  });
}

/** Text is written as held in the tree; escaping already happened on the way in. */
export function serializeXmlDocument(doc: XmlDocument): string {
  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: TEXT_KEY,
    cdataPropName: CDATA_KEY,
    commentPropName: COMMENT_KEY,
    processEntities: false,
    suppressEmptyNode: false,
    format: true,
    indentBy: "  ",
  });
  const body: string = builder.build(fromNodes([...doc.prolog, doc.root, ...doc.epilog]));
  return `${XML_DECLARATION}\n${body.trim()}\n`;
}
