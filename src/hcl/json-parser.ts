/**
 * HCL — JSON Parser
 *
 * Parses JSON text into an HCL syntax tree. String tokens keep their raw
 * JSON text (quotes and escapes included) so the sanitizer can inspect
 * exactly what the encoder produced.
 *
 * After parsing, nested objects are flattened into multi-key items the way
 * HCL reads JSON: `{"resource": {"aws_instance": {"web": {...}}}}` becomes
 * `resource "aws_instance" "web" {...}`, and a list of objects becomes a
 * repeated block.
 */

import type { FileNode, HclValue, ObjectItemNode, ObjectKeyNode, ObjectListNode, ObjectTypeNode } from "./ast.js";
import { fileNode, listNode, literal, objectItem, objectKey, objectList, objectType } from "./ast.js";
import { HclSyntaxError } from "./lexer.js";

const JSON_NUMBER = /^-?(0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?/;
const HEX4 = /^[0-9a-fA-F]{4}$/;

/**
 * Parse a JSON document into a flattened HCL file node.
 * The top-level value must be an object.
 */
export function parseJson(source: string): FileNode {
  const parser = new JsonTreeParser(source);
  const file = parser.parse();
  flattenObjectList(file.node);
  return file;
}

class JsonTreeParser {
  private source: string;
  private pos = 0;

  constructor(source: string) {
    this.source = source;
  }

  parse(): FileNode {
    this.skipWhitespace();
    if (this.current() !== "{") {
      throw this.error("Expected a JSON object at the top level");
    }
    const root = this.parseObject();
    this.skipWhitespace();
    if (this.pos < this.source.length) {
      throw this.error(`Unexpected trailing content '${this.current()}'`);
    }
    return fileNode(root.list);
  }

  // ---------------------------------------------------------------------------
  // Values
  // ---------------------------------------------------------------------------

  private parseValue(): HclValue {
    this.skipWhitespace();
    const ch = this.current();

    if (ch === "{") return this.parseObject();
    if (ch === "[") return this.parseArray();
    if (ch === '"') return literal("STRING", this.readString());
    if (ch === "-" || (ch >= "0" && ch <= "9")) return this.readNumber();

    if (this.source.startsWith("true", this.pos) || this.source.startsWith("false", this.pos)) {
      const text = this.source.startsWith("true", this.pos) ? "true" : "false";
      this.pos += text.length;
      return literal("BOOL", text);
    }
    if (this.source.startsWith("null", this.pos)) {
      this.pos += 4;
      return literal("STRING", '""');
    }

    if (ch === "") throw this.error("Unexpected end of input");
    throw this.error(`Unexpected character '${ch}'`);
  }

  private parseObject(): ObjectTypeNode {
    this.expect("{");
    const items: ObjectItemNode[] = [];

    this.skipWhitespace();
    if (this.current() === "}") {
      this.pos++;
      return objectType(objectList(items));
    }

    for (;;) {
      this.skipWhitespace();
      if (this.current() !== '"') {
        throw this.error("Expected a string object key");
      }
      const key = objectKey(this.readString(), "STRING");
      this.skipWhitespace();
      this.expect(":");
      const val = this.parseValue();
      items.push(objectItem([key], val));

      this.skipWhitespace();
      if (this.current() === ",") {
        this.pos++;
        continue;
      }
      this.expect("}");
      return objectType(objectList(items));
    }
  }

  private parseArray(): HclValue {
    this.expect("[");
    const elements: HclValue[] = [];

    this.skipWhitespace();
    if (this.current() === "]") {
      this.pos++;
      return listNode(elements);
    }

    for (;;) {
      elements.push(this.parseValue());
      this.skipWhitespace();
      if (this.current() === ",") {
        this.pos++;
        continue;
      }
      this.expect("]");
      return listNode(elements);
    }
  }

  // ---------------------------------------------------------------------------
  // Scalars
  // ---------------------------------------------------------------------------

  /** Read a string and return its raw text, quotes included. */
  private readString(): string {
    const start = this.pos;
    this.pos++;

    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      if (ch === '"') {
        this.pos++;
        return this.source.slice(start, this.pos);
      }
      if (ch === "\\") {
        const next = this.source[this.pos + 1] ?? "";
        if (next === "u") {
          if (!HEX4.test(this.source.slice(this.pos + 2, this.pos + 6))) {
            throw this.error("Invalid unicode escape");
          }
          this.pos += 6;
          continue;
        }
        if (!'"\\/bfnrt'.includes(next) || next === "") {
          throw this.error(`Invalid escape '\\${next}'`);
        }
        this.pos += 2;
        continue;
      }
      if (ch < " ") {
        throw this.error("Control character in string literal");
      }
      this.pos++;
    }

    throw new HclSyntaxError("Unterminated string literal", start, this.source);
  }

  private readNumber(): HclValue {
    const match = JSON_NUMBER.exec(this.source.slice(this.pos));
    if (!match) throw this.error("Invalid number");
    this.pos += match[0].length;
    const isFloat = match[2] !== undefined || match[3] !== undefined;
    return literal(isFloat ? "FLOAT" : "NUMBER", match[0]);
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private current(): string {
    return this.source[this.pos] ?? "";
  }

  private expect(ch: string): void {
    this.skipWhitespace();
    if (this.current() !== ch) {
      const got = this.current() === "" ? "end of input" : `'${this.current()}'`;
      throw this.error(`Expected '${ch}', got ${got}`);
    }
    this.pos++;
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length && " \t\r\n".includes(this.source[this.pos])) {
      this.pos++;
    }
  }

  private error(message: string): HclSyntaxError {
    return new HclSyntaxError(message, this.pos, this.source);
  }
}

// =============================================================================
// Flattening
// =============================================================================

/**
 * Collapse object-of-objects and list-of-objects items into multi-key items,
 * then recurse into every remaining value.
 */
export function flattenObjectList(list: ObjectListNode): void {
  const items: ObjectItemNode[] = [];
  const frontier = [...list.items];

  // The frontier is a stack; items come out reversed and are put back in order below.
  let item = frontier.pop();
  while (item) {
    const val = item.val;
    if (val.kind === "ObjectType" && isObjectOfObjects(val)) {
      for (const sub of val.list.items) {
        frontier.push(objectItem(cloneKeys([...item.keys, ...sub.keys]), sub.val, { assign: item.assign }));
      }
    } else if (val.kind === "List" && val.list.length > 0 && val.list.every((e) => e.kind === "ObjectType")) {
      for (const element of val.list) {
        frontier.push(objectItem(cloneKeys(item.keys), element, { assign: item.assign }));
      }
    } else {
      items.push(item);
    }
    item = frontier.pop();
  }

  items.reverse();
  list.items = items;

  for (const kept of items) {
    flattenValue(kept.val);
  }
}

// Flattened siblings must not share key nodes: the sanitizer rewrites them in place.
function cloneKeys(keys: ObjectKeyNode[]): ObjectKeyNode[] {
  return keys.map((k) => objectKey(k.token.text, k.token.type));
}

function isObjectOfObjects(node: ObjectTypeNode): boolean {
  const items = node.list.items;
  return items.length > 0 && items.every((i) => i.val.kind === "ObjectType");
}

function flattenValue(value: HclValue): void {
  switch (value.kind) {
    case "ObjectType":
      flattenObjectList(value.list);
      break;
    case "List":
      for (const element of value.list) flattenValue(element);
      break;
    case "Literal":
      break;
  }
}
