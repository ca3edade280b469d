/**
 * HCL — Syntax Tree
 *
 * Node shapes shared by the JSON parser, the HCL parser, the sanitizer and
 * the renderer. Nodes are plain mutable records; the sanitizer rewrites
 * token text and token types in place.
 */

// =============================================================================
// Tokens
// =============================================================================

export type TokenType = "IDENT" | "NUMBER" | "FLOAT" | "BOOL" | "STRING" | "HEREDOC";

export type Token = {
  type: TokenType;
  /** Raw source text. Quoted strings keep their quotes and escapes. */
  text: string;
};

// =============================================================================
// Nodes
// =============================================================================

export type HclNode =
  | FileNode
  | ObjectListNode
  | ObjectItemNode
  | ObjectKeyNode
  | LiteralNode
  | ListNode
  | ObjectTypeNode;

export type HclNodeKind = HclNode["kind"];

/** Value positions: what may follow a key or sit inside a list. */
export type HclValue = LiteralNode | ListNode | ObjectTypeNode;

export type FileNode = {
  kind: "File";
  node: ObjectListNode;
};

export type ObjectListNode = {
  kind: "ObjectList";
  items: ObjectItemNode[];
};

export type ObjectItemNode = {
  kind: "ObjectItem";
  keys: ObjectKeyNode[];
  /** Whether the item is written with an explicit `=`. */
  assign: boolean;
  val: HclValue;
  /** A blank line preceded this item in the source text. */
  blankBefore: boolean;
};

export type ObjectKeyNode = {
  kind: "ObjectKey";
  token: Token;
};

export type LiteralNode = {
  kind: "Literal";
  token: Token;
};

export type ListNode = {
  kind: "List";
  list: HclValue[];
};

export type ObjectTypeNode = {
  kind: "ObjectType";
  list: ObjectListNode;
};

// =============================================================================
// Constructors
// =============================================================================

export function fileNode(node: ObjectListNode): FileNode {
  return { kind: "File", node };
}

export function objectList(items: ObjectItemNode[] = []): ObjectListNode {
  return { kind: "ObjectList", items };
}

export function objectItem(
  keys: ObjectKeyNode[],
  val: HclValue,
  options?: { assign?: boolean; blankBefore?: boolean },
): ObjectItemNode {
  return {
    kind: "ObjectItem",
    keys,
    assign: options?.assign ?? false,
    val,
    blankBefore: options?.blankBefore ?? false,
  };
}

export function objectKey(text: string, type: TokenType = "STRING"): ObjectKeyNode {
  return { kind: "ObjectKey", token: { type, text } };
}

export function literal(type: TokenType, text: string): LiteralNode {
  return { kind: "Literal", token: { type, text } };
}

export function listNode(list: HclValue[] = []): ListNode {
  return { kind: "List", list };
}

export function objectType(list: ObjectListNode = objectList()): ObjectTypeNode {
  return { kind: "ObjectType", list };
}

/** Best-effort name of a node's kind, for nodes that failed exhaustive matching. */
export function describeNodeKind(node: unknown): string {
  if (typeof node === "object" && node !== null && "kind" in node) {
    return String(node.kind);
  }
  return typeof node;
}
