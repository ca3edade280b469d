/**
 * Deterministic JSON encoding: object keys sorted, 2-space indentation by
 * default. Output is otherwise what `JSON.stringify(value, null, indent)`
 * produces.
 *
 * Keys are sorted by code unit, and integer-like keys ("10", "2") sort as
 * strings too, which rebuilding a sorted object cannot guarantee.
 */

export function stableStringify(value: unknown, indent = 2): string {
  const encoded = encode(value, "", " ".repeat(indent), new Set());
  if (encoded === undefined) {
    throw new TypeError(`unsupported value: ${typeof value}`);
  }
  return encoded;
}

function encode(value: unknown, current: string, step: string, seen: Set<object>): string | undefined {
  if (value === null) return "null";

  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "boolean":
      return value ? "true" : "false";
    case "number":
      if (!Number.isFinite(value)) {
        throw new TypeError(`unsupported value: ${value}`);
      }
      return JSON.stringify(value);
    case "undefined":
      return undefined;
    case "object":
      break;
    default:
      throw new TypeError(`unsupported type: ${typeof value}`);
  }

  if (typeof value !== "object" || value === null) return undefined;

  if (hasToJSON(value)) {
    return encode(value.toJSON(), current, step, seen);
  }
  if (seen.has(value)) {
    throw new TypeError("encountered a cycle");
  }

  seen.add(value);
  try {
    const inner = current + step;

    if (Array.isArray(value)) {
      if (value.length === 0) return "[]";
      const parts = value.map((v: unknown) => encode(v, inner, step, seen) ?? "null");
      return `[\n${inner}${parts.join(`,\n${inner}`)}\n${current}]`;
    }

    const parts: string[] = [];
    for (const key of Object.keys(value).sort()) {
      const encoded = encode(Reflect.get(value, key), inner, step, seen);
      if (encoded !== undefined) parts.push(`${JSON.stringify(key)}: ${encoded}`);
    }
    if (parts.length === 0) return "{}";
    return `{\n${inner}${parts.join(`,\n${inner}`)}\n${current}}`;
  } finally {
    seen.delete(value);
  }
}

function hasToJSON(value: object): value is { toJSON: () => unknown } {
  return "toJSON" in value && typeof value.toJSON === "function";
}
