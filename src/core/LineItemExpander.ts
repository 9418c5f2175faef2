import type { FieldMappingRule, LineItemRecord } from "../types/records.js";
import type { XmlElement } from "../types/tree.js";
import { TemplateError } from "./Errors.js";
import { applyRecord } from "./TreeMutator.js";
import { cloneElement, findAll, insertAfter, removeChild } from "./Tree.js";
import {
  LINE_ITEM_ELEMENT,
  LINE_ITEM_MAPPINGS,
} from "../mappings/tables.js";

/**
 * Replaces the template's single OrderLine with one OrderLine per record, in
 * record order. Record 0 fills the template itself; every later record fills
 * a fresh copy of the untouched template, inserted right after the previous
 * line. With no records the template is removed.
 *
 * Returns the line elements in document order.
 */
export function expandLineItems(
  documentRoot: XmlElement,
  lineItems: ReadonlyArray<LineItemRecord>,
  rules: ReadonlyArray<FieldMappingRule> = LINE_ITEM_MAPPINGS,
  created?: string[],
): XmlElement[] {
  const found = findAll(documentRoot, LINE_ITEM_ELEMENT);
  const located = found[0];
  if (!located || found.length > 1) {
    throw new TemplateError(
      "INVALID_TEMPLATE",
      `Template must contain exactly one ${LINE_ITEM_ELEMENT} element, found ${found.length}`,
      { found: found.length },
    );
  }

  const { element: template, parent: container } = located;
  const pristine = cloneElement(template);

  if (lineItems.length === 0) {
    removeChild(container, template);
    return [];
  }

  const lines: XmlElement[] = [];
  let previous: XmlElement | undefined;

  for (const record of lineItems) {
    let line: XmlElement;
    if (previous === undefined) {
      line = template;
    } else {
      line = cloneElement(pristine);
      insertAfter(container, previous, line);
    }
    applyRecord(line, record, rules, created);
    lines.push(line);
    previous = line;
  }

  return lines;
}
