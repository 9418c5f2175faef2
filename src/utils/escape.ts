import { EncodingError } from "../core/Errors.js";

const XML_TEXT_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
};

function isXmlChar(cp: number): boolean {
  if (cp === 0x9 || cp === 0xa || cp === 0xd) return true;
  if (cp >= 0x20 && cp <= 0xd7ff) return true;
  if (cp >= 0xe000 && cp <= 0xfffd) return true;
  return cp >= 0x10000 && cp <= 0x10ffff;
}

/** Escapes `&`, `<` and `>`; throws EncodingError for characters XML 1.0 cannot carry. */
export function escapeXmlText(value: string): string {
  for (const ch of value) {
    const cp = ch.codePointAt(0) ?? 0;
    if (!isXmlChar(cp)) throw new EncodingError(value, cp);
  }
  return value.replace(/[&<>]/g, (c) => XML_TEXT_ESCAPES[c] ?? c);
}

