/**
 * HCL — lexer, parsers, renderer and formatter tests
 */

import { describe, expect, it } from "vitest";
import type { HclNode, ObjectItemNode, ObjectTypeNode } from "./ast.js";
import { fileNode, listNode, literal, objectItem, objectKey, objectList, objectType } from "./ast.js";
import { parseJson } from "./json-parser.js";
import { HclLexer, HclSyntaxError } from "./lexer.js";
import { parseHcl } from "./parser.js";
import { formatHcl, renderHcl } from "./printer.js";

// =============================================================================
// Helpers
// =============================================================================

function keysOf(item: ObjectItemNode): string[] {
  return item.keys.map((k) => k.token.text);
}

function asObject(item: ObjectItemNode): ObjectTypeNode {
  if (item.val.kind !== "ObjectType") {
    throw new Error(`expected an object value, got ${item.val.kind}`);
  }
  return item.val;
}

function tokenTypes(source: string): string[] {
  return new HclLexer(source).tokenize().map((t) => t.type);
}

// =============================================================================
// Lexer
// =============================================================================

describe("HclLexer", () => {
  it("tokenizes an attribute", () => {
    const tokens = new HclLexer('name = "web"\n').tokenize();
    expect(tokens.map((t) => [t.type, t.value])).toEqual([
      ["IDENT", "name"],
      ["ASSIGN", "="],
      ["STRING", '"web"'],
      ["EOF", ""],
    ]);
  });

  it("keeps quotes inside interpolations within one string token", () => {
    const tokens = new HclLexer('"${file("init.sh")}"').tokenize();
    expect(tokens).toHaveLength(2);
    expect(tokens[0].type).toBe("STRING");
    expect(tokens[0].value).toBe('"${file("init.sh")}"');
  });

  it("reads escaped quotes inside interpolations", () => {
    const tokens = new HclLexer('"${file(\\"init.sh\\")}"').tokenize();
    expect(tokens[0].value).toBe('"${file(\\"init.sh\\")}"');
  });

  it("reads a heredoc through its closing marker", () => {
    const tokens = new HclLexer("x = <<EOF\nhello\nEOF\n").tokenize();
    const heredoc = tokens[2];
    expect(heredoc.type).toBe("HEREDOC");
    expect(heredoc.value).toBe("<<EOF\nhello\nEOF");
    expect(heredoc.line).toBe(1);
    expect(heredoc.endLine).toBe(3);
  });

  it("accepts an indented closing marker for <<-", () => {
    const tokens = new HclLexer("x = <<-EOT\n  body\n  EOT\n").tokenize();
    expect(tokens[2].value).toBe("<<-EOT\n  body\n  EOT");
  });

  it("distinguishes integers from floats", () => {
    expect(tokenTypes("1 -2 3.5 1e3")).toEqual(["NUMBER", "NUMBER", "FLOAT", "FLOAT", "EOF"]);
  });

  it("reads booleans and identifiers with dots and dashes", () => {
    const tokens = new HclLexer("true false tfer--web.example").tokenize();
    expect(tokens.map((t) => t.type)).toEqual(["BOOL", "BOOL", "IDENT", "EOF"]);
    expect(tokens[2].value).toBe("tfer--web.example");
  });

  it("skips comments", () => {
    expect(tokenTypes("# hash\n// slashes\n/* block */ a")).toEqual(["IDENT", "EOF"]);
  });

  it("tracks line numbers", () => {
    const tokens = new HclLexer("a = 1\n\nb = 2").tokenize();
    expect(tokens.map((t) => t.line)).toEqual([1, 1, 1, 3, 3, 3, 3]);
  });

  it("rejects an unterminated string", () => {
    expect(() => new HclLexer('"abc').tokenize()).toThrow("Unterminated string literal");
  });

  it("rejects a string broken by a newline", () => {
    expect(() => new HclLexer('a = "abc\n"').tokenize()).toThrow(HclSyntaxError);
  });

  it("rejects an unterminated heredoc", () => {
    expect(() => new HclLexer("x = <<EOF\nno end").tokenize()).toThrow("Heredoc 'EOF' is not terminated");
  });

  it("rejects unknown characters with a position", () => {
    try {
      new HclLexer("a = 1\nb @ 2").tokenize();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(HclSyntaxError);
      if (!(err instanceof HclSyntaxError)) return;
      expect(err.line).toBe(2);
      expect(err.column).toBe(3);
      expect(err.message).toContain("Unexpected character '@'");
    }
  });
});

// =============================================================================
// HCL parser
// =============================================================================

describe("parseHcl", () => {
  it("parses a labelled block", () => {
    const file = parseHcl('resource "aws_instance" "web" {\n  ami = "ami-123"\n}\n');
    const block = file.node.items[0];

    expect(keysOf(block)).toEqual(["resource", '"aws_instance"', '"web"']);
    expect(block.assign).toBe(false);

    const inner = asObject(block).list.items;
    expect(inner).toHaveLength(1);
    expect(keysOf(inner[0])).toEqual(["ami"]);
    expect(inner[0].assign).toBe(true);
    expect(inner[0].val).toEqual(literal("STRING", '"ami-123"'));
  });

  it("records blank lines before items", () => {
    const file = parseHcl("a = 1\n\nb = 2\nc = 3\n");
    expect(file.node.items.map((i) => i.blankBefore)).toEqual([false, true, false]);
  });

  it("measures blank lines from the end of a multi-line item", () => {
    const file = parseHcl("a = {\n  x = 1\n}\nb = 2\n");
    expect(file.node.items.map((i) => i.blankBefore)).toEqual([false, false]);
  });

  it("parses lists with a trailing comma", () => {
    const file = parseHcl('l = [1, "two", [3],]');
    const val = file.node.items[0].val;
    expect(val.kind).toBe("List");
    if (val.kind !== "List") return;
    expect(val.list).toHaveLength(3);
    expect(val.list[2]).toEqual(listNode([literal("NUMBER", "3")]));
  });

  it("parses inline objects with comma separators", () => {
    const file = parseHcl("t = { a = 1, b = 2 }");
    const items = asObject(file.node.items[0]).list.items;
    expect(items.map(keysOf)).toEqual([["a"], ["b"]]);
  });

  it("reports a missing value", () => {
    expect(() => parseHcl("a = ")).toThrow("Expected a value, got end of input");
  });

  it("reports a key without = or {", () => {
    expect(() => parseHcl("a b")).toThrow("Expected '=' or '{' after 'b', got end of input");
  });

  it("reports an unclosed block", () => {
    expect(() => parseHcl("a {\n  b = 1\n")).toThrow(HclSyntaxError);
  });
});

// =============================================================================
// JSON parser
// =============================================================================

describe("parseJson", () => {
  it("keeps raw JSON text for scalars", () => {
    const file = parseJson('{"a": "x", "n": 1, "f": 1.5, "b": true, "z": null}');
    const vals = file.node.items.map((i) => i.val);
    expect(vals).toEqual([
      literal("STRING", '"x"'),
      literal("NUMBER", "1"),
      literal("FLOAT", "1.5"),
      literal("BOOL", "true"),
      literal("STRING", '""'),
    ]);
  });

  it("leaves keys quoted and unassigned", () => {
    const item = parseJson('{"name": 1}').node.items[0];
    expect(keysOf(item)).toEqual(['"name"']);
    expect(item.assign).toBe(false);
  });

  it("keeps escape sequences in string text", () => {
    const file = parseJson('{"s": "line\\nnext \\"q\\""}');
    expect(file.node.items[0].val).toEqual(literal("STRING", '"line\\nnext \\"q\\""'));
  });

  it("flattens nested objects into labelled blocks", () => {
    const file = parseJson('{"resource": {"aws_instance": {"web": {"ami": "x"}}}}');
    expect(file.node.items).toHaveLength(1);
    expect(keysOf(file.node.items[0])).toEqual(['"resource"', '"aws_instance"', '"web"']);
  });

  it("keeps member order while flattening", () => {
    const file = parseJson(
      '{"p": 0, "resource": {"a": {"x": {"k": 1}}, "b": {"y": {"k": 2}, "z": {"k": 3}}}, "q": 1}',
    );
    expect(file.node.items.map(keysOf)).toEqual([
      ['"p"'],
      ['"resource"', '"a"', '"x"'],
      ['"resource"', '"b"', '"y"'],
      ['"resource"', '"b"', '"z"'],
      ['"q"'],
    ]);
  });

  it("turns a list of objects into repeated blocks", () => {
    const file = parseJson('{"ebs_block_device": [{"size": 1}, {"size": 2}]}');
    const items = file.node.items;
    expect(items.map(keysOf)).toEqual([['"ebs_block_device"'], ['"ebs_block_device"']]);
    expect(items.map((i) => asObject(i).list.items[0].val)).toEqual([
      literal("NUMBER", "1"),
      literal("NUMBER", "2"),
    ]);
  });

  it("does not share key nodes between flattened siblings", () => {
    const items = parseJson('{"b": [{"x": 1}, {"x": 2}]}').node.items;
    expect(items[0].keys[0]).not.toBe(items[1].keys[0]);
  });

  it("leaves mixed lists alone", () => {
    const item = parseJson('{"l": [{"a": 1}, 2]}').node.items[0];
    expect(item.val.kind).toBe("List");
  });

  it("leaves maps of scalars alone", () => {
    const item = parseJson('{"tags": {"Name": "x"}}').node.items[0];
    expect(keysOf(item)).toEqual(['"tags"']);
    expect(asObject(item).list.items).toHaveLength(1);
  });

  it("keeps empty objects", () => {
    const item = parseJson('{"provider": {}}').node.items[0];
    expect(item.val).toEqual(objectType(objectList([])));
  });

  it("requires a top-level object", () => {
    expect(() => parseJson("[1]")).toThrow("Expected a JSON object at the top level");
  });

  it("rejects a missing value", () => {
    expect(() => parseJson('{"a": }')).toThrow("Unexpected character '}'");
  });

  it("rejects trailing content", () => {
    expect(() => parseJson('{"a": 1} x')).toThrow("Unexpected trailing content 'x'");
  });

  it("rejects unknown escapes", () => {
    expect(() => parseJson('{"a": "\\x"}')).toThrow("Invalid escape '\\x'");
  });

  it("rejects an unterminated object", () => {
    expect(() => parseJson('{"a": 1')).toThrow("Expected '}', got end of input");
  });
});

// =============================================================================
// Renderer
// =============================================================================

describe("renderHcl", () => {
  const block = (name: string, items: ObjectItemNode[]) =>
    objectItem([objectKey("resource"), objectKey('"t"'), objectKey(`"${name}"`)], objectType(objectList(items)));
  const attr = (key: string, text: string) => objectItem([objectKey(key)], literal("STRING", text), { assign: true });

  it("separates top-level items and spreads multi-line items", () => {
    const tags = objectItem([objectKey("tags")], objectType(objectList([attr("Name", '"x"')])), { assign: true });
    const file = fileNode(objectList([block("a", [attr("ami", '"1"'), tags, attr("zone", '"z"')]), block("b", [])]));

    expect(renderHcl(file)).toBe(
      [
        'resource "t" "a" {',
        '  ami = "1"',
        "",
        "  tags = {",
        '    Name = "x"',
        "  }",
        "",
        '  zone = "z"',
        "}",
        "",
        'resource "t" "b" {}',
        "",
      ].join("\n"),
    );
  });

  it("omits = when the item is not assigned", () => {
    const item = objectItem([objectKey("name")], literal("STRING", '"x"'));
    expect(renderHcl(item)).toBe('name "x"');
  });

  it("omits = for multi-key items even when assigned", () => {
    const item = objectItem([objectKey("a"), objectKey('"b"')], objectType(), { assign: true });
    expect(renderHcl(item)).toBe('a "b" {}');
  });

  it("does not indent heredoc bodies", () => {
    const heredoc = objectItem([objectKey("policy")], literal("HEREDOC", "<<EOF\n{\n  \"a\": 1\n}\nEOF"), {
      assign: true,
    });
    const file = fileNode(objectList([block("p", [heredoc])]));
    expect(renderHcl(file)).toBe('resource "t" "p" {\n  policy = <<EOF\n{\n  "a": 1\n}\nEOF\n}\n');
  });

  it("prints short lists inline and empty collections compactly", () => {
    const list = listNode([literal("NUMBER", "1"), literal("STRING", '"a"')]);
    expect(renderHcl(list)).toBe('[1, "a"]');
    expect(renderHcl(listNode())).toBe("[]");
    expect(renderHcl(objectType())).toBe("{}");
  });

  it("puts a comma on its own line after a heredoc list element", () => {
    const list = listNode([literal("HEREDOC", "<<EOF\nx\nEOF")]);
    expect(renderHcl(list)).toBe("[\n  <<EOF\nx\nEOF\n  ,\n]");
  });

  it("ends a heredoc at its closing marker", () => {
    const item = objectItem([objectKey("u")], literal("HEREDOC", "<<EOF\nx\nEOF\n"), { assign: true });
    expect(renderHcl(item)).toBe("u = <<EOF\nx\nEOF");
  });

  it("rejects unknown node kinds", () => {
    const bogus: HclNode = JSON.parse('{"kind": "Bogus"}');
    expect(() => renderHcl(bogus)).toThrow("unknown node type: Bogus");
  });
});

// =============================================================================
// Formatter
// =============================================================================

describe("formatHcl", () => {
  it("aligns = across consecutive attributes", () => {
    expect(formatHcl("a = 1\nlong_name = 2\n")).toBe("a         = 1\nlong_name = 2\n");
  });

  it("starts a new alignment group after a blank line", () => {
    expect(formatHcl("a = 1\n\nlong_name = 2\n")).toBe("a = 1\n\nlong_name = 2\n");
  });

  it("does not align multi-line items", () => {
    const source = 'resource "x" "y" {\nname = "a"\ntags = {\nk = "v"\n}\n}\n';
    expect(formatHcl(source)).toBe('resource "x" "y" {\n  name = "a"\n  tags = {\n    k = "v"\n  }\n}\n');
  });

  it("normalizes indentation", () => {
    const source = 'resource "x" "y" {\nname="a"\n      count=2\n}\n';
    expect(formatHcl(source)).toBe('resource "x" "y" {\n  name  = "a"\n  count = 2\n}\n');
  });

  it("normalizes list spacing", () => {
    expect(formatHcl("l = [ 1,2 ,3 ]")).toBe("l = [1, 2, 3]\n");
  });

  it("breaks lists that contain objects", () => {
    expect(formatHcl("l = [{a = 1}, 2]")).toBe("l = [\n  {\n    a = 1\n  },\n  2,\n]\n");
  });

  it("keeps heredocs verbatim", () => {
    expect(formatHcl("p = <<EOF\n  indented\nEOF\n")).toBe("p = <<EOF\n  indented\nEOF\n");
  });

  it("separates multi-line top-level blocks", () => {
    const source = 'provider "aws" {\nregion = "a"\n}\nprovider "google" {\nproject = "p"\n}\n';
    expect(formatHcl(source)).toBe('provider "aws" {\n  region = "a"\n}\n\nprovider "google" {\n  project = "p"\n}\n');
  });

  it("does not separate nested blocks", () => {
    const source = "x {\n  a {\n    b = 1\n  }\n  c {\n    d = 2\n  }\n}\n";
    expect(formatHcl(source)).toBe(source);
  });

  it("drops comments", () => {
    expect(formatHcl("# note\na = 1\n")).toBe("a = 1\n");
  });

  it("is idempotent", () => {
    const once = formatHcl('provider "aws" {\nregion="us-east-1"\n}\nresource "a" "b" {\n  x = [1,2]\n\n  yy = true\n}\n');
    expect(formatHcl(once)).toBe(once);
  });

  it("returns an empty string for an empty file", () => {
    expect(formatHcl("")).toBe("");
  });

  it("throws HclSyntaxError on invalid input", () => {
    expect(() => formatHcl('a = "open')).toThrow(HclSyntaxError);
  });
});
