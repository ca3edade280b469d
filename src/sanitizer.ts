/**
 * AST Sanitizer — repairs a syntax tree parsed from JSON so that it prints
 * as HCL source rather than literal JSON.
 *
 * - Quoted keys made only of identifier characters lose their quotes.
 * - String values that encode a heredoc (`"<<EOF\n...\nEOF"`) become real
 *   heredocs; a JSON object body is re-indented.
 * - Every item is marked as assigned so the renderer writes ` = `.
 *
 * The tree is mutated in place. Nothing here throws.
 */

import type { HclNode, ObjectItemNode, ObjectKeyNode, Token } from "./hcl/ast.js";
import { describeNodeKind } from "./hcl/ast.js";
import { stableStringify } from "./json.js";
import type { HclLogger } from "./logging/index.js";
import { getHclLogger } from "./logging/index.js";

export const SAFE_KEY_CHARS = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789-_";

const HEREDOC_PREFIX = '"<<';

/**
 * Sanitize a syntax tree in place.
 */
export function sanitize(tree: HclNode, logger: HclLogger = getHclLogger("sanitizer")): void {
  new AstSanitizer(logger).visit(tree);
}

class AstSanitizer {
  private logger: HclLogger;

  constructor(logger: HclLogger) {
    this.logger = logger;
  }

  visit(node: HclNode): void {
    switch (node.kind) {
      case "File":
        this.visit(node.node);
        break;
      case "ObjectList":
        for (const item of node.items) this.visit(item);
        break;
      case "ObjectItem":
        this.visitObjectItem(node);
        break;
      case "List":
        for (const element of node.list) this.visit(element);
        break;
      case "ObjectType":
        this.visit(node.list);
        break;
      case "ObjectKey":
      case "Literal":
        break;
      default:
        this.logger.warn("unknown node type", { kind: describeNodeKind(node) });
    }
  }

  private visitObjectItem(item: ObjectItemNode): void {
    // Only the first key: `resource "aws_instance" "web"` keeps its labels quoted.
    const first = item.keys[0];
    if (first) unquoteKey(first);

    if (item.val.kind === "Literal" && item.val.token.text.startsWith(HEREDOC_PREFIX)) {
      this.recoverHeredoc(item.val.token);
    }

    // JSON members carry no `=`; without it the renderer would print `key value`.
    item.assign = true;

    this.visit(item.val);
  }

  private recoverHeredoc(token: Token): void {
    const text = token.text.slice(1, -1).replaceAll("\\n", "\n").replaceAll("\\t", "");
    token.type = "HEREDOC";
    token.text = this.reindentJsonBody(text) ?? text;
  }

  /**
   * Pretty-print a heredoc whose body (everything between the marker lines)
   * is a JSON object. Returns null when it is not.
   */
  private reindentJsonBody(text: string): string | null {
    const lines = text.split("\n");
    if (lines.length < 2) return null;

    const body = lines.slice(1, -1).join("\n").replaceAll('\\"', '"');
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (err) {
      this.logger.debug("heredoc body is not JSON, leaving it as-is", {
        marker: lines[0],
        reason: err instanceof Error ? err.message : String(err),
      });
      return null;
    }

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      return null;
    }

    const pretty = stableStringify(parsed, 2).split("\n");
    return [lines[0], ...pretty, lines[lines.length - 1]].join("\n");
  }
}

/**
 * Strip the quotes from a key whose content is entirely identifier-safe.
 */
export function unquoteKey(key: ObjectKeyNode): void {
  const text = key.token.text;
  if (text.length < 2 || !text.startsWith('"') || !text.endsWith('"')) return;

  const inner = text.slice(1, -1);
  if (isSafeIdentifier(inner)) {
    key.token.text = inner;
  }
}

export function isSafeIdentifier(value: string): boolean {
  if (value.length === 0) return false;
  for (const ch of value) {
    if (!SAFE_KEY_CHARS.includes(ch)) return false;
  }
  return true;
}
