import { XMLParser, XMLValidator } from "fast-xml-parser";
import type { XmlDocument, XmlElement, XmlMisc, XmlNode } from "../types/tree.js";
import { TemplateError } from "../core/Errors.js";

export const ATTRIBUTE_PREFIX = "@_";
export const ATTRIBUTES_KEY = ":@";
export const TEXT_KEY = "#text";
export const CDATA_KEY = "#cdata";
export const COMMENT_KEY = "#comment";
export const PI_MARKER = "?";

/**
 * Template parsing:
 * - document order kept (preserveOrder)
 * - namespace prefixes kept on element names
 * - entities left encoded, values never coerced to numbers
 * - CDATA, comments and processing instructions kept as their own nodes
 * - XML declaration dropped (the serializer writes its own)
 */
export function createTemplateParser(): XMLParser {
  return new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: TEXT_KEY,
    cdataPropName: CDATA_KEY,
    commentPropName: COMMENT_KEY,
    removeNSPrefix: false,
    parseTagValue: false,
    parseAttributeValue: false,
    processEntities: false,
    ignoreDeclaration: true,
    ignorePiTags: false,
    trimValues: true,
  });
}

export function parseXmlDocument(xml: string): XmlDocument {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new TemplateError(
      "TEMPLATE_PARSE_ERROR",
      `Template is not well-formed XML: ${valid.err.msg} (line ${valid.err.line}, column ${valid.err.col})`,
      { line: valid.err.line, col: valid.err.col, code: valid.err.code },
    );
  }

  const nodes = toNodes(createTemplateParser().parse(xml));
  const roots = nodes.filter((n): n is XmlElement => n.kind === "element");
  const root = roots[0];
  if (!root || roots.length > 1) {
    throw new TemplateError(
      "TEMPLATE_PARSE_ERROR",
      `Template must have exactly one root element, found ${roots.length}`,
    );
  }

  const rootIdx = nodes.indexOf(root);
  return {
    prolog: nodes.slice(0, rootIdx).filter(isMisc),
    root,
    epilog: nodes.slice(rootIdx + 1).filter(isMisc),
  };
}

function isMisc(node: XmlNode): node is XmlMisc {
  return node.kind === "comment" || node.kind === "pi";
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function toAttributes(raw: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!isRecord(raw)) return out;
  for (const [key, value] of Object.entries(raw)) {
    const name = key.startsWith(ATTRIBUTE_PREFIX)
      ? key.slice(ATTRIBUTE_PREFIX.length)
      : key;
    out[name] = String(value);
  }
  return out;
}

/** Body of a CDATA or comment entry: `[{ "#text": "..." }]` */
function innerText(raw: unknown): string {
  if (!Array.isArray(raw)) return "";
  return raw
    .map((part) => (isRecord(part) && TEXT_KEY in part ? String(part[TEXT_KEY]) : ""))
    .join("");
}

/** preserveOrder output -> XmlNode[] */
function toNodes(raw: unknown): XmlNode[] {
  if (!Array.isArray(raw)) return [];

  const out: XmlNode[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) continue;
    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY) continue;
      if (key === TEXT_KEY) {
        out.push({ kind: "text", value: String(value) });
        continue;
      }
      if (key === CDATA_KEY) {
        out.push({ kind: "cdata", value: innerText(value) });
        continue;
      }
      if (key === COMMENT_KEY) {
        out.push({ kind: "comment", value: innerText(value) });
        continue;
      }
      if (key.startsWith(PI_MARKER)) {
        out.push({
          kind: "pi",
          target: key.slice(PI_MARKER.length),
          attributes: toAttributes(entry[ATTRIBUTES_KEY]),
        });
        continue;
      }
      out.push({
        kind: "element",
        name: key,
        attributes: toAttributes(entry[ATTRIBUTES_KEY]),
        children: toNodes(value),
      });
    }
  }
  return out;
}
