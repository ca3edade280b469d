/**
 * HCL Printer — sanitize, render, patch, format.
 *
 * The renderer's output has a handful of known defects. Rather than fork
 * the renderer, they are corrected with literal whole-text replacements
 * (`HCL_PATCH_RULES`), applied in order, before the canonical formatter
 * runs.
 */

import type { FileNode } from "./hcl/ast.js";
import { formatHcl, renderHcl } from "./hcl/printer.js";
import { FormatError, RenderError } from "./errors.js";
import type { HclLogger, TextSink } from "./logging/index.js";
import { getHclLogger } from "./logging/index.js";
import { sanitize } from "./sanitizer.js";

export interface PatchRule {
  readonly name: string;
  readonly pattern: string;
  readonly replacement: string;
}

/**
 * Ordered patch rules. Order matters: blank lines are collapsed before the
 * separator between resource blocks is put back.
 */
export const HCL_PATCH_RULES: readonly PatchRule[] = Object.freeze([
  { name: "collapse-blank-lines", pattern: "\n\n", replacement: "\n" },
  { name: "separate-resources", pattern: "}\nresource", replacement: "}\n\nresource" },
  // Quotes inside function calls such as ${file(\"path\")} must not be escaped.
  { name: "unescape-call-open", pattern: '(\\"', replacement: '("' },
  { name: "unescape-call-close", pattern: '\\")', replacement: '")' },
  { name: "unescape-lt", pattern: "\\u003c", replacement: "<" },
  { name: "unescape-gt", pattern: "\\u003e", replacement: ">" },
]);

export function applyPatchRules(text: string, rules: readonly PatchRule[] = HCL_PATCH_RULES): string {
  return rules.reduce((acc, rule) => acc.replaceAll(rule.pattern, rule.replacement), text);
}

export interface PrintOptions {
  logger?: HclLogger;
  /** Dump the rejected text, line-numbered, when formatting fails. Default true. */
  diagnostics?: boolean;
  /** Where the dump goes. Default stderr. */
  diagnosticSink?: TextSink;
  /** Apply `HCL_PATCH_RULES` before formatting. Default true. */
  patches?: boolean;
}

/**
 * Print a syntax tree as canonically formatted HCL. The tree is sanitized
 * in place first.
 */
export function printHcl(tree: FileNode, options: PrintOptions = {}): string {
  const logger = options.logger ?? getHclLogger("printer");

  sanitize(tree, logger.child("sanitizer"));

  let rendered: string;
  try {
    rendered = renderHcl(tree);
  } catch (err) {
    throw new RenderError(err);
  }

  const patched = options.patches === false ? rendered : applyPatchRules(rendered);

  try {
    return formatHcl(patched);
  } catch (err) {
    if (options.diagnostics !== false) {
      logger.warn("Invalid HCL follows:");
      dumpNumbered(patched, options.diagnosticSink ?? process.stderr);
    }
    throw new FormatError(err, patched);
  }
}

/** Write `text` to `sink` as `<line number>\t<line>` rows. */
export function dumpNumbered(text: string, sink: TextSink): void {
  text.split("\n").forEach((line, i) => {
    sink.write(`${i + 1}\t${line}\n`);
  });
}
