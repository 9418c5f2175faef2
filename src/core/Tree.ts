import type { XmlElement, XmlNode } from "../types/tree.js";
import { escapeXmlText } from "../utils/escape.js";

export function localName(name: string): string {
  const idx = name.indexOf(":");
  return idx === -1 ? name : name.slice(idx + 1);
}

/** "tc" for "tc:OrderLine", "" for an unprefixed name */
export function prefixOf(name: string): string {
  const idx = name.indexOf(":");
  return idx === -1 ? "" : name.slice(0, idx);
}

export function isElement(node: XmlNode): node is XmlElement {
  return node.kind === "element";
}

export function childElements(el: XmlElement): XmlElement[] {
  return el.children.filter(isElement);
}

export function findChild(
  el: XmlElement,
  local: string,
): XmlElement | undefined {
  return childElements(el).find((c) => localName(c.name) === local);
}

/** Depth-first, document order, `el` itself included. */
export function findFirst(
  el: XmlElement,
  local: string,
): XmlElement | undefined {
  if (localName(el.name) === local) return el;
  for (const child of childElements(el)) {
    const hit = findFirst(child, local);
    if (hit) return hit;
  }
  return undefined;
}

export interface LocatedElement {
  element: XmlElement;
  parent: XmlElement;
}

/** Every descendant (not `el` itself) with the given local name, in document order. */
export function findAll(el: XmlElement, local: string): LocatedElement[] {
  const out: LocatedElement[] = [];
  for (const child of childElements(el)) {
    if (localName(child.name) === local) out.push({ element: child, parent: el });
    out.push(...findAll(child, local));
  }
  return out;
}

/** Escaped character data of `el`; CDATA sections are escaped on the way out. */
export function textOf(el: XmlElement): string {
  return el.children
    .map((c) => {
      if (c.kind === "text") return c.value;
      if (c.kind === "cdata") return escapeXmlText(c.value);
      return "";
    })
    .join("");
}

/** `value` must already be escaped. */
export function setText(el: XmlElement, value: string): void {
  el.children = [{ kind: "text", value }];
}

export function createElement(name: string): XmlElement {
  return { kind: "element", name, attributes: {}, children: [] };
}

function cloneNode(node: XmlNode): XmlNode {
  switch (node.kind) {
    case "element":
      return cloneElement(node);
    case "pi":
      return { kind: "pi", target: node.target, attributes: { ...node.attributes } };
    default:
      return { ...node };
  }
}

export function cloneElement(el: XmlElement): XmlElement {
  return {
    kind: "element",
    name: el.name,
    attributes: { ...el.attributes },
    children: el.children.map(cloneNode),
  };
}

export function insertAfter(
  parent: XmlElement,
  reference: XmlElement,
  node: XmlElement,
): void {
  const idx = parent.children.indexOf(reference);
  if (idx === -1) {
    throw new Error(`'${reference.name}' is not a child of '${parent.name}'`);
  }
  parent.children.splice(idx + 1, 0, node);
}

export function removeChild(parent: XmlElement, child: XmlElement): void {
  const idx = parent.children.indexOf(child);
  if (idx === -1) {
    throw new Error(`'${child.name}' is not a child of '${parent.name}'`);
  }
  parent.children.splice(idx, 1);
}
