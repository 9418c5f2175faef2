import type { HeaderRecord } from "../types/records.js";

export const DEFAULT_PARTNER_PREFIX = "WAITROSE";

/** `${prefix}_${CUST-ORDER}.XML`; the order number is used verbatim. */
export function outputFileName(
  header: HeaderRecord,
  prefix: string = DEFAULT_PARTNER_PREFIX,
): string {
  const order = header["CUST-ORDER"] || "UNKNOWN";
  return `${prefix}_${order}.XML`;
}
