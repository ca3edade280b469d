import { describe, expect, it } from "vitest";
import type { HclValue, LiteralNode, ObjectItemNode } from "./hcl/ast.js";
import { fileNode, listNode, literal, objectItem, objectKey, objectList, objectType } from "./hcl/ast.js";
import { HclLoggerImpl, type LogEntry } from "./logging/index.js";
import { isSafeIdentifier, sanitize, unquoteKey } from "./sanitizer.js";

function makeLogger() {
  const entries: LogEntry[] = [];
  const logger = new HclLoggerImpl({
    subsystem: "test",
    level: "trace",
    transports: [{ name: "memory", write: (entry) => entries.push(entry) }],
  });
  return { logger, entries };
}

/** A JSON-encoded string literal, as the JSON parser produces it. */
function jsonString(value: string): LiteralNode {
  return literal("STRING", JSON.stringify(value));
}

function makeItem(key: string, val: HclValue): ObjectItemNode {
  return objectItem([objectKey(JSON.stringify(key), "STRING")], val);
}

function sanitizeItem(item: ObjectItemNode) {
  const { logger, entries } = makeLogger();
  sanitize(fileNode(objectList([item])), logger);
  return entries;
}

function tokenOf(item: ObjectItemNode) {
  if (item.val.kind !== "Literal") throw new Error(`expected a literal, got ${item.val.kind}`);
  return item.val.token;
}

// ── Keys ─────────────────────────────────────────────────────────

describe("key unquoting", () => {
  it("unquotes identifier-safe keys", () => {
    const item = makeItem("instance_type", jsonString("t3.micro"));
    sanitizeItem(item);
    expect(item.keys[0].token.text).toBe("instance_type");
  });

  it("keeps quotes on keys with other characters", () => {
    for (const key of ["tag.name", "with space", "a/b", "kubernetes.io/role"]) {
      const item = makeItem(key, jsonString("x"));
      sanitizeItem(item);
      expect(item.keys[0].token.text).toBe(JSON.stringify(key));
    }
  });

  it("keeps the empty key quoted", () => {
    const key = objectKey('""');
    unquoteKey(key);
    expect(key.token.text).toBe('""');
  });

  it("only unquotes the first key of a block", () => {
    const item = objectItem(
      [objectKey('"resource"'), objectKey('"aws_instance"'), objectKey('"web"')],
      objectType(objectList([makeItem("ami", jsonString("ami-1"))])),
    );
    sanitizeItem(item);
    expect(item.keys.map((k) => k.token.text)).toEqual(["resource", '"aws_instance"', '"web"']);
  });

  it("leaves unquoted keys alone", () => {
    const key = objectKey("already", "IDENT");
    unquoteKey(key);
    expect(key.token.text).toBe("already");
  });

  it("checks identifier safety character by character", () => {
    expect(isSafeIdentifier("ebs_block-device2")).toBe(true);
    expect(isSafeIdentifier("")).toBe(false);
    expect(isSafeIdentifier("a.b")).toBe(false);
    expect(isSafeIdentifier("naïve")).toBe(false);
  });
});

// ── Assignment ───────────────────────────────────────────────────

describe("assignment", () => {
  it("marks every item as assigned, nested ones included", () => {
    const inner = makeItem("Name", jsonString("web"));
    const tags = makeItem("tags", objectType(objectList([inner])));
    const listed = makeItem("port", literal("NUMBER", "80"));
    const rules = makeItem("rules", listNode([objectType(objectList([listed]))]));

    sanitizeItem(tags);
    sanitizeItem(rules);

    expect([tags.assign, inner.assign, rules.assign, listed.assign]).toEqual([true, true, true, true]);
    expect(listed.keys[0].token.text).toBe("port");
  });
});

// ── Heredocs ─────────────────────────────────────────────────────

describe("heredoc recovery", () => {
  it("re-indents a JSON object body", () => {
    const item = makeItem("policy", jsonString('<<EOF\n{"a": 1}\nEOF'));
    sanitizeItem(item);
    expect(tokenOf(item)).toEqual({ type: "HEREDOC", text: '<<EOF\n{\n  "a": 1\n}\nEOF' });
  });

  it("sorts keys at every depth", () => {
    const item = makeItem("policy", jsonString('<<POLICY\n{"b": {"y": 1, "x": 2}, "a": true}\nPOLICY'));
    sanitizeItem(item);
    expect(tokenOf(item).text).toBe('<<POLICY\n{\n  "a": true,\n  "b": {\n    "x": 2,\n    "y": 1\n  }\n}\nPOLICY');
  });

  it("reads a body spread over several lines", () => {
    const item = makeItem("policy", jsonString('<<EOF\n{\n"Version": "2012-10-17",\n"Statement": []\n}\nEOF'));
    sanitizeItem(item);
    expect(tokenOf(item).text).toBe('<<EOF\n{\n  "Statement": [],\n  "Version": "2012-10-17"\n}\nEOF');
  });

  it("keeps a non-JSON body and strips tabs", () => {
    const item = makeItem("user_data", jsonString("<<EOF\necho\thi\nEOF"));
    const entries = sanitizeItem(item);

    expect(tokenOf(item)).toEqual({ type: "HEREDOC", text: "<<EOF\nechohi\nEOF" });
    expect(entries.map((e) => e.message)).toEqual(["heredoc body is not JSON, leaving it as-is"]);
    expect(entries[0].level).toBe("debug");
  });

  it("keeps a JSON array body as written", () => {
    const item = makeItem("list", jsonString("<<EOF\n[1, 2]\nEOF"));
    sanitizeItem(item);
    expect(tokenOf(item)).toEqual({ type: "HEREDOC", text: "<<EOF\n[1, 2]\nEOF" });
  });

  it("converts a marker without a body", () => {
    const item = makeItem("odd", jsonString("<<EOF"));
    sanitizeItem(item);
    expect(tokenOf(item)).toEqual({ type: "HEREDOC", text: "<<EOF" });
  });

  it("leaves ordinary strings untouched", () => {
    const item = makeItem("name", jsonString("a <<b"));
    sanitizeItem(item);
    expect(tokenOf(item)).toEqual({ type: "STRING", text: '"a <<b"' });
  });
});

// ── Unknown nodes ────────────────────────────────────────────────

describe("unknown nodes", () => {
  it("logs a warning and carries on", () => {
    const bogus: HclValue = JSON.parse('{"kind": "Bogus"}');
    const after = makeItem("after", jsonString("x"));
    const item = makeItem("values", listNode([bogus]));

    const { logger, entries } = makeLogger();
    sanitize(fileNode(objectList([item, after])), logger);

    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe("warn");
    expect(entries[0].message).toBe("unknown node type");
    expect(entries[0].metadata).toEqual({ kind: "Bogus" });
    expect(after.assign).toBe(true);
  });
});
