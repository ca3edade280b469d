/**
 * HCL — Recursive Descent Parser
 *
 * Transforms the lexer's token stream into a syntax tree for the formatter.
 *
 * Grammar (simplified):
 *   file      → item*
 *   item      → key+ ( "=" value | object ) ","?
 *   key       → IDENT | STRING
 *   value     → literal | list | object
 *   literal   → STRING | NUMBER | FLOAT | BOOL | HEREDOC | IDENT
 *   list      → "[" ( value ( "," value )* ","? )? "]"
 *   object    → "{" item* "}"
 */

import type { FileNode, HclValue, ObjectItemNode, ObjectKeyNode, ObjectTypeNode, TokenType } from "./ast.js";
import { fileNode, listNode, literal, objectItem, objectKey, objectList, objectType } from "./ast.js";
import type { HclToken, HclTokenType } from "./lexer.js";
import { HclLexer, HclSyntaxError } from "./lexer.js";

const LITERAL_TYPES: Partial<Record<HclTokenType, TokenType>> = {
  STRING: "STRING",
  NUMBER: "NUMBER",
  FLOAT: "FLOAT",
  BOOL: "BOOL",
  HEREDOC: "HEREDOC",
  IDENT: "IDENT",
};

export class HclParser {
  private tokens: HclToken[];
  private pos = 0;
  private source: string;

  constructor(source: string) {
    this.source = source;
    this.tokens = new HclLexer(source).tokenize();
  }

  parse(): FileNode {
    const items = this.parseItems("EOF");
    this.expect("EOF");
    return fileNode(objectList(items));
  }

  // ---------------------------------------------------------------------------
  // Items
  // ---------------------------------------------------------------------------

  private parseItems(terminator: "EOF" | "RBRACE"): ObjectItemNode[] {
    const items: ObjectItemNode[] = [];
    let prevEndLine = 0;

    while (this.current().type !== terminator) {
      const startLine = this.current().line;
      const item = this.parseItem();
      item.blankBefore = items.length > 0 && startLine - prevEndLine >= 2;
      items.push(item);

      if (this.current().type === "COMMA") this.advance();
      prevEndLine = this.previous().endLine;
    }

    return items;
  }

  private parseItem(): ObjectItemNode {
    const keys: ObjectKeyNode[] = [];
    while (this.current().type === "IDENT" || this.current().type === "STRING") {
      const tok = this.advance();
      keys.push(objectKey(tok.value, tok.type === "IDENT" ? "IDENT" : "STRING"));
    }

    if (keys.length === 0) {
      throw this.error(`Expected an attribute or block name, got ${this.describe(this.current())}`);
    }

    if (this.current().type === "ASSIGN") {
      this.advance();
      return objectItem(keys, this.parseValue(), { assign: true });
    }

    if (this.current().type === "LBRACE") {
      return objectItem(keys, this.parseObject());
    }

    throw this.error(`Expected '=' or '{' after '${keys[keys.length - 1].token.text}', got ${this.describe(this.current())}`);
  }

  // ---------------------------------------------------------------------------
  // Values
  // ---------------------------------------------------------------------------

  private parseValue(): HclValue {
    const tok = this.current();

    if (tok.type === "LBRACE") return this.parseObject();
    if (tok.type === "LBRACK") return this.parseList();

    const literalType = LITERAL_TYPES[tok.type];
    if (literalType) {
      this.advance();
      return literal(literalType, tok.value);
    }

    throw this.error(`Expected a value, got ${this.describe(tok)}`);
  }

  private parseObject(): ObjectTypeNode {
    this.expect("LBRACE");
    const items = this.parseItems("RBRACE");
    this.expect("RBRACE");
    return objectType(objectList(items));
  }

  private parseList(): HclValue {
    this.expect("LBRACK");
    const elements: HclValue[] = [];

    while (this.current().type !== "RBRACK") {
      elements.push(this.parseValue());
      if (this.current().type !== "COMMA") break;
      this.advance();
    }

    this.expect("RBRACK");
    return listNode(elements);
  }

  // ---------------------------------------------------------------------------
  // Token helpers
  // ---------------------------------------------------------------------------

  private current(): HclToken {
    return this.tokens[this.pos];
  }

  private previous(): HclToken {
    return this.tokens[Math.max(0, this.pos - 1)];
  }

  private advance(): HclToken {
    const tok = this.tokens[this.pos];
    if (tok.type !== "EOF") this.pos++;
    return tok;
  }

  private expect(type: HclTokenType): HclToken {
    const tok = this.current();
    if (tok.type !== type) {
      throw this.error(`Expected ${type}, got ${this.describe(tok)}`);
    }
    return this.advance();
  }

  private describe(tok: HclToken): string {
    return tok.type === "EOF" ? "end of input" : `'${tok.value}'`;
  }

  private error(message: string): HclSyntaxError {
    return new HclSyntaxError(message, this.current().position, this.source);
  }
}

/**
 * Parse HCL source text into a syntax tree.
 */
export function parseHcl(source: string): FileNode {
  return new HclParser(source).parse();
}
