import type { ConvertError, ConvertErrorCode } from "../types/result.js";

export function err(
  code: ConvertErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ConvertError {
  return { code, message, details };
}

export class OrderMappingError extends Error {
  readonly code: ConvertErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    code: ConvertErrorCode,
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }

  toConvertError(): ConvertError {
    return err(this.code, this.message, this.details);
  }
}

/** Sentinel rows missing, duplicated or out of order; header rows missing. */
export class MalformedInputError extends OrderMappingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("MALFORMED_INPUT", message, details);
  }
}

export class PathNotFoundError extends OrderMappingError {
  readonly path: string;
  readonly missing: string;

  constructor(path: string, missing: string) {
    super(
      "PATH_NOT_FOUND",
      `Element '${missing}' of path '${path}' does not exist in the template`,
      { path, missing },
    );
    this.path = path;
    this.missing = missing;
  }
}

export class EncodingError extends OrderMappingError {
  readonly codePoint: number;

  constructor(value: string, codePoint: number) {
    const hex = codePoint.toString(16).toUpperCase().padStart(4, "0");
    super(
      "ENCODING_ERROR",
      `Value '${value}' contains U+${hex}, which cannot be written to XML`,
      { codePoint },
    );
    this.codePoint = codePoint;
  }
}

export class TemplateError extends OrderMappingError {
  constructor(
    code: "TEMPLATE_PARSE_ERROR" | "INVALID_TEMPLATE",
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(code, message, details);
  }
}
