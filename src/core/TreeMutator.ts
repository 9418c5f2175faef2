import type { FieldMappingRule, FieldRecord } from "../types/records.js";
import type { XmlElement } from "../types/tree.js";
import { PathNotFoundError } from "./Errors.js";
import { createElement, findChild, prefixOf, setText } from "./Tree.js";
import { joinPath, splitPath } from "../resolvers/ElementPath.js";
import { escapeXmlText } from "../utils/escape.js";

/**
 * Sets the text of the element at `path` (relative to `root`) to `value`.
 *
 * An empty value is a no-op: nothing is resolved, created or overwritten.
 * Missing components are created as last children, carrying the parent's
 * namespace prefix, when `createIfMissing` is set; otherwise the walk fails
 * with PathNotFoundError. Created paths are appended to `created` when given.
 */
export function applyValue(
  root: XmlElement,
  path: string,
  value: string,
  createIfMissing: boolean,
  created?: string[],
): void {
  if (value === "") return;

  // rejects before any element is created
  const escaped = escapeXmlText(value);
  const segments = splitPath(path);

  let cur = root;
  for (let i = 0; i < segments.length; i++) {
    const seg = segments[i] ?? "";
    const next = findChild(cur, seg);
    if (next) {
      cur = next;
      continue;
    }

    if (!createIfMissing) throw new PathNotFoundError(path, seg);

    const prefix = prefixOf(cur.name);
    const child = createElement(prefix ? `${prefix}:${seg}` : seg);
    cur.children.push(child);
    created?.push(joinPath(segments.slice(0, i + 1)));
    cur = child;
  }

  setText(cur, escaped);
}

export function applyRecord(
  root: XmlElement,
  record: FieldRecord,
  rules: ReadonlyArray<FieldMappingRule>,
  created?: string[],
): void {
  for (const rule of rules) {
    applyValue(
      root,
      rule.path,
      record[rule.field] ?? "",
      rule.createIfMissing,
      created,
    );
  }
}
