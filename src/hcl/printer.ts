/**
 * HCL — Renderer & Canonical Formatter
 *
 * `renderHcl` turns a syntax tree into text. `formatHcl` parses text and
 * renders it back in canonical style: two-space indentation, `=` aligned
 * across consecutive single-line attributes, blank lines kept where the
 * source had them and put around multi-line top-level blocks.
 */

import type { HclNode, HclValue, ObjectItemNode, ObjectListNode } from "./ast.js";
import { describeNodeKind } from "./ast.js";
import { parseHcl } from "./parser.js";

export type RenderLayout = "spread" | "preserve";

export type RenderOptions = {
  /**
   * `spread` puts blank lines between top-level items and around multi-line
   * items; `preserve` where an item is marked `blankBefore` and around
   * multi-line top-level items.
   */
  layout?: RenderLayout;
  /** Pad keys so `=` lines up across consecutive single-line attributes. */
  align?: boolean;
  indent?: string;
};

type Line = {
  indent: number;
  text: string;
  /** Heredoc body lines are emitted exactly as written. */
  raw: boolean;
};

type RenderedItem = {
  item: ObjectItemNode;
  keys: string;
  value: Line[];
  alignable: boolean;
};

/**
 * Thrown when a node cannot be rendered.
 */
export class HclRenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HclRenderError";
  }
}

class HclRenderer {
  private layout: RenderLayout;
  private align: boolean;
  private indentUnit: string;

  constructor(options?: RenderOptions) {
    this.layout = options?.layout ?? "spread";
    this.align = options?.align ?? false;
    this.indentUnit = options?.indent ?? "  ";
  }

  render(node: HclNode): string {
    switch (node.kind) {
      case "File": {
        const lines = this.renderItems(node.node, 0, true);
        return lines.length > 0 ? `${this.join(lines)}\n` : "";
      }
      case "ObjectList":
        return this.join(this.renderItems(node, 0, false));
      case "ObjectItem":
        return this.join(this.renderItem(this.prepare(node), 0, 0));
      case "ObjectKey":
        return node.token.text;
      case "Literal":
      case "List":
      case "ObjectType":
        return this.join(this.renderValue(node, 0));
      default:
        throw new HclRenderError(`unknown node type: ${describeNodeKind(node)}`);
    }
  }

  // ---------------------------------------------------------------------------
  // Items
  // ---------------------------------------------------------------------------

  private renderItems(list: ObjectListNode, indent: number, topLevel: boolean): Line[] {
    const prepared = list.items.map((item) => this.prepare(item, indent));
    const widths = this.align ? this.alignmentWidths(prepared) : prepared.map(() => 0);
    const out: Line[] = [];

    prepared.forEach((entry, i) => {
      if (i > 0 && this.blankBetween(prepared[i - 1], entry, topLevel)) {
        out.push({ indent: 0, text: "", raw: false });
      }
      out.push(...this.renderItem(entry, indent, widths[i]));
    });

    return out;
  }

  private prepare(item: ObjectItemNode, indent = 0): RenderedItem {
    const value = this.renderValue(item.val, indent);
    const assigns = item.assign && item.keys.length === 1;
    return {
      item,
      keys: item.keys.map((k) => k.token.text).join(" "),
      value,
      alignable: assigns && value.length === 1,
    };
  }

  private renderItem(entry: RenderedItem, indent: number, keyWidth: number): Line[] {
    const { item, keys, value } = entry;
    const separator = item.assign && item.keys.length === 1 ? " = " : " ";
    const head = `${keys.padEnd(keyWidth)}${separator}${value[0].text}`;
    return [{ indent, text: head, raw: false }, ...value.slice(1)];
  }

  private blankBetween(prev: RenderedItem, next: RenderedItem, topLevel: boolean): boolean {
    const multiLine = prev.value.length > 1 || next.value.length > 1;
    if (this.layout === "preserve") return next.item.blankBefore || (topLevel && multiLine);
    return topLevel || multiLine;
  }

  /** Key width per item; 0 where the item is not part of an aligned run. */
  private alignmentWidths(items: RenderedItem[]): number[] {
    const widths = items.map(() => 0);
    let start = 0;

    while (start < items.length) {
      if (!items[start].alignable) {
        start++;
        continue;
      }
      let end = start + 1;
      while (end < items.length && items[end].alignable && !this.breaksRun(items[end])) {
        end++;
      }
      const width = Math.max(...items.slice(start, end).map((e) => e.keys.length));
      for (let i = start; i < end; i++) widths[i] = width;
      start = end;
    }

    return widths;
  }

  private breaksRun(entry: RenderedItem): boolean {
    return this.layout === "preserve" && entry.item.blankBefore;
  }

  // ---------------------------------------------------------------------------
  // Values
  // ---------------------------------------------------------------------------

  private renderValue(value: HclValue, indent: number): Line[] {
    switch (value.kind) {
      case "Literal": {
        if (value.token.type !== "HEREDOC") {
          return [{ indent, text: value.token.text, raw: false }];
        }
        const [first, ...rest] = value.token.text.split("\n");
        // A final newline belongs to the heredoc token; the closing marker ends the value.
        if (rest.length > 0 && rest[rest.length - 1] === "") rest.pop();
        return [
          { indent, text: first, raw: false },
          ...rest.map((text) => ({ indent: 0, text, raw: true })),
        ];
      }

      case "List": {
        if (value.list.length === 0) return [{ indent, text: "[]", raw: false }];

        const elements = value.list.map((e) => this.renderValue(e, indent + 1));
        if (elements.every((lines) => lines.length === 1)) {
          const inline = elements.map((lines) => lines[0].text).join(", ");
          return [{ indent, text: `[${inline}]`, raw: false }];
        }

        const out: Line[] = [{ indent, text: "[", raw: false }];
        for (const lines of elements) {
          const last = lines[lines.length - 1];
          if (last.raw) {
            // A heredoc's closing marker must stand alone on its line.
            out.push(...lines, { indent: indent + 1, text: ",", raw: false });
          } else {
            out.push(...lines.slice(0, -1), { ...last, text: `${last.text},` });
          }
        }
        out.push({ indent, text: "]", raw: false });
        return out;
      }

      case "ObjectType": {
        if (value.list.items.length === 0) return [{ indent, text: "{}", raw: false }];
        return [
          { indent, text: "{", raw: false },
          ...this.renderItems(value.list, indent + 1, false),
          { indent, text: "}", raw: false },
        ];
      }

      default:
        throw new HclRenderError(`unknown node type: ${describeNodeKind(value)}`);
    }
  }

  private join(lines: Line[]): string {
    return lines
      .map((line) => {
        if (line.raw || line.text === "") return line.text;
        return this.indentUnit.repeat(line.indent) + line.text;
      })
      .join("\n");
  }
}

/**
 * Render a syntax tree (or any node) to HCL text.
 * A file renders with a trailing newline.
 */
export function renderHcl(node: HclNode, options?: RenderOptions): string {
  return new HclRenderer(options).render(node);
}

/**
 * Canonical reformat of HCL text. Throws `HclSyntaxError` when the text
 * does not parse.
 */
export function formatHcl(source: string): string {
  const tree = parseHcl(source);
  return renderHcl(tree, { layout: "preserve", align: true });
}
