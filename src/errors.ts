/**
 * Error taxonomy for the HCL pipeline. Every error here is fatal to the
 * conversion that raised it.
 */

export type HclPrintErrorCode =
  | "DUPLICATE_RESOURCE"
  | "ENCODING_FAILED"
  | "PARSE_FAILED"
  | "RENDER_FAILED"
  | "FORMAT_FAILED"
  | "INVALID_CONFIG";

export class HclPrintError extends Error {
  readonly code: HclPrintErrorCode;

  constructor(code: HclPrintErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HclPrintError";
    this.code = code;
  }
}

/** Two entries map to the same resource type and sanitized name. */
export class DuplicateResourceError extends HclPrintError {
  readonly resourceType: string;
  readonly resourceName: string;

  constructor(resourceType: string, resourceName: string) {
    super("DUPLICATE_RESOURCE", `duplicate resource found: ${resourceType}.${resourceName}`);
    this.name = "DuplicateResourceError";
    this.resourceType = resourceType;
    this.resourceName = resourceName;
  }
}

export class EncodingError extends HclPrintError {
  constructor(cause: unknown) {
    super("ENCODING_FAILED", `error marshalling terraform data to json: ${describeCause(cause)}`, { cause });
    this.name = "EncodingError";
  }
}

export class ParseError extends HclPrintError {
  constructor(cause: unknown) {
    super("PARSE_FAILED", `error parsing terraform json: ${describeCause(cause)}`, { cause });
    this.name = "ParseError";
  }
}

export class RenderError extends HclPrintError {
  constructor(cause: unknown) {
    super("RENDER_FAILED", `error writing HCL: ${describeCause(cause)}`, { cause });
    this.name = "RenderError";
  }
}

export class FormatError extends HclPrintError {
  /** The rendered text the formatter rejected. */
  readonly source: string;

  constructor(cause: unknown, source: string) {
    super("FORMAT_FAILED", `error formatting HCL: ${describeCause(cause)}`, { cause });
    this.name = "FormatError";
    this.source = source;
  }
}

export class ConfigError extends HclPrintError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_CONFIG", `invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
