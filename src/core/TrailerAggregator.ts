import type { XmlElement } from "../types/tree.js";
import { applyValue } from "./TreeMutator.js";
import { findAll } from "./Tree.js";
import {
  LINE_ITEM_ELEMENT,
  TRAILER_TOTAL_LINES_PATH,
} from "../mappings/tables.js";

/** Writes the number of OrderLine elements to DocTrailer/TotalLines and returns it. */
export function aggregateTrailer(
  documentRoot: XmlElement,
  created?: string[],
): number {
  const count = findAll(documentRoot, LINE_ITEM_ELEMENT).length;
  applyValue(documentRoot, TRAILER_TOTAL_LINES_PATH, String(count), true, created);
  return count;
}
