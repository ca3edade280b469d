/**
 * Document builder — groups resource entries by type, wraps them with the
 * provider configuration and drives JSON encode → parse → print.
 */

import type { FileNode } from "./hcl/ast.js";
import { parseJson } from "./hcl/json-parser.js";
import { EncodingError, DuplicateResourceError, ParseError } from "./errors.js";
import { stableStringify } from "./json.js";
import { getHclLogger } from "./logging/index.js";
import type { PrintOptions } from "./printer.js";
import { printHcl } from "./printer.js";
import type { HclDocument, JsonValue, ProviderConfig, ResourceEntry, ResourcesByType } from "./types.js";

/**
 * Sanitize a resource name for Terraform: drop wildcard prefixes, then
 * `.` → `-`, then `/` → `--`.
 */
export function sanitizeResourceName(name: string): string {
  return name.replaceAll("*.", "").replaceAll(".", "-").replaceAll("/", "--");
}

/**
 * Group entries by resource type under their sanitized names. The first
 * collision in input order throws `DuplicateResourceError`.
 */
export function groupResources(entries: readonly ResourceEntry[]): ResourcesByType {
  const byType = new Map<string, Map<string, JsonValue>>();

  for (const entry of entries) {
    let group = byType.get(entry.ResourceType);
    if (!group) {
      group = new Map();
      byType.set(entry.ResourceType, group);
    }

    const name = sanitizeResourceName(entry.ResourceName);
    if (group.has(name)) {
      throw new DuplicateResourceError(entry.ResourceType, name);
    }
    group.set(name, entry.Item);
  }

  return Object.fromEntries(
    [...byType].map(([type, group]): [string, Record<string, JsonValue>] => [type, Object.fromEntries(group)]),
  );
}

export function buildDocument(entries: readonly ResourceEntry[], provider: ProviderConfig): HclDocument {
  return { resource: groupResources(entries), provider };
}

/**
 * Encode a document as 2-space indented JSON with sorted keys. Escaped
 * `<` and `>` are restored so string tokens carry them literally.
 */
export function encodeDocument(doc: HclDocument): string {
  let json: string;
  try {
    json = stableStringify(doc, 2);
  } catch (err) {
    throw new EncodingError(err);
  }
  return json.replaceAll("\\u003c", "<").replaceAll("\\u003e", ">");
}

/**
 * Render resource entries plus provider configuration as formatted HCL.
 */
export function buildHcl(
  entries: readonly ResourceEntry[],
  provider: ProviderConfig,
  options: PrintOptions = {},
): string {
  const logger = options.logger ? options.logger.child("document") : getHclLogger("document");
  const doc = buildDocument(entries, provider);
  const json = encodeDocument(doc);

  logger.debug("encoded document", {
    resourceTypes: Object.keys(doc.resource).length,
    resources: entries.length,
    bytes: json.length,
  });

  let tree: FileNode;
  try {
    tree = parseJson(json);
  } catch (err) {
    throw new ParseError(err);
  }

  return printHcl(tree, options);
}
