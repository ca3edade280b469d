/**
 * HCL — Lexical Analyzer (Tokenizer)
 *
 * Transforms HCL source text into a stream of tokens for the formatter.
 * Handles identifiers, numbers, booleans, quoted strings (including `${}`
 * interpolations with nested quotes), heredocs, and punctuation.
 * Comments are skipped.
 */

export type HclTokenType =
  | "IDENT"
  | "NUMBER"
  | "FLOAT"
  | "BOOL"
  | "STRING"
  | "HEREDOC"
  | "LBRACE"
  | "RBRACE"
  | "LBRACK"
  | "RBRACK"
  | "ASSIGN"
  | "COMMA"
  | "EOF";

export type HclToken = {
  type: HclTokenType;
  value: string;
  position: number;
  /** 1-based line of the first character. */
  line: number;
  /** 1-based line of the last character. */
  endLine: number;
};

const HEREDOC_MARKER = /^<<(-?)([A-Za-z_][A-Za-z0-9_-]*)\r?\n/;
const NUMBER = /^-?\d+(\.\d+)?([eE][+-]?\d+)?/;

/**
 * Tokenize an HCL source string.
 */
export class HclLexer {
  private input: string;
  private pos = 0;
  private tokens: HclToken[] = [];
  private lineStarts: number[];

  constructor(input: string) {
    this.input = input;
    this.lineStarts = [0];
    for (let i = 0; i < input.length; i++) {
      if (input[i] === "\n") this.lineStarts.push(i + 1);
    }
  }

  tokenize(): HclToken[] {
    this.tokens = [];
    this.pos = 0;

    while (this.pos < this.input.length) {
      this.skipWhitespace();
      if (this.pos >= this.input.length) break;

      const ch = this.input[this.pos];

      if (ch === "#" || (ch === "/" && this.peek(1) === "/")) {
        this.skipToEndOfLine();
        continue;
      }

      if (ch === "/" && this.peek(1) === "*") {
        this.skipBlockComment();
        continue;
      }

      if (ch === '"') {
        const end = this.scanQuoted(this.pos);
        this.emit("STRING", this.input.slice(this.pos, end), this.pos);
        this.pos = end;
        continue;
      }

      if (ch === "<" && this.peek(1) === "<") {
        this.readHeredoc();
        continue;
      }

      if (this.isDigit(ch) || (ch === "-" && this.isDigit(this.peek(1)))) {
        this.readNumber();
        continue;
      }

      if (this.isIdentStart(ch)) {
        this.readIdentifier();
        continue;
      }

      const punct = PUNCTUATION[ch];
      if (punct) {
        this.emit(punct, ch, this.pos);
        this.pos++;
        continue;
      }

      throw new HclSyntaxError(`Unexpected character '${ch}'`, this.pos, this.input);
    }

    this.emit("EOF", "", this.pos);
    return this.tokens;
  }

  // ---------------------------------------------------------------------------
  // Strings
  // ---------------------------------------------------------------------------

  /**
   * Scan a quoted string starting at `start` (the opening quote) and return
   * the index just past its closing quote. Quotes inside `${ }` open nested
   * strings rather than closing this one.
   */
  private scanQuoted(start: number): number {
    let i = start + 1;
    let depth = 0;

    while (i < this.input.length) {
      const ch = this.input[i];

      if (ch === "\\") {
        i += 2;
        continue;
      }
      if (ch === "\n" && depth === 0) break;

      if (depth === 0) {
        if (ch === '"') return i + 1;
        if (ch === "$" && this.input[i + 1] === "{") {
          depth = 1;
          i += 2;
          continue;
        }
      } else {
        if (ch === '"') {
          i = this.scanQuoted(i);
          continue;
        }
        if (ch === "{") depth++;
        if (ch === "}") depth--;
      }
      i++;
    }

    throw new HclSyntaxError("Unterminated string literal", start, this.input);
  }

  private readHeredoc(): void {
    const start = this.pos;
    const match = HEREDOC_MARKER.exec(this.input.slice(start));
    if (!match) {
      throw new HclSyntaxError("Invalid heredoc anchor", start, this.input);
    }

    const marker = match[2];
    let lineStart = start + match[0].length;

    while (lineStart <= this.input.length) {
      let lineEnd = this.input.indexOf("\n", lineStart);
      if (lineEnd === -1) lineEnd = this.input.length;

      const line = this.input.slice(lineStart, lineEnd).replace(/\r$/, "");
      if (line.trim() === marker) {
        this.emit("HEREDOC", this.input.slice(start, lineEnd).replace(/\r$/, ""), start);
        this.pos = lineEnd;
        return;
      }
      if (lineEnd === this.input.length) break;
      lineStart = lineEnd + 1;
    }

    throw new HclSyntaxError(`Heredoc '${marker}' is not terminated`, start, this.input);
  }

  // ---------------------------------------------------------------------------
  // Numbers & identifiers
  // ---------------------------------------------------------------------------

  private readNumber(): void {
    const start = this.pos;
    const match = NUMBER.exec(this.input.slice(start));
    if (!match) {
      throw new HclSyntaxError("Invalid number", start, this.input);
    }
    const text = match[0];
    const isFloat = match[1] !== undefined || match[2] !== undefined;
    this.emit(isFloat ? "FLOAT" : "NUMBER", text, start);
    this.pos += text.length;
  }

  private readIdentifier(): void {
    const start = this.pos;
    while (this.pos < this.input.length && this.isIdentPart(this.input[this.pos])) {
      this.pos++;
    }
    const text = this.input.slice(start, this.pos);
    this.emit(text === "true" || text === "false" ? "BOOL" : "IDENT", text, start);
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private skipWhitespace(): void {
    while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
      this.pos++;
    }
  }

  private skipToEndOfLine(): void {
    while (this.pos < this.input.length && this.input[this.pos] !== "\n") {
      this.pos++;
    }
  }

  private skipBlockComment(): void {
    const end = this.input.indexOf("*/", this.pos + 2);
    if (end === -1) {
      throw new HclSyntaxError("Unterminated block comment", this.pos, this.input);
    }
    this.pos = end + 2;
  }

  private peek(offset: number): string {
    return this.input[this.pos + offset] ?? "";
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private isIdentStart(ch: string): boolean {
    return /[a-zA-Z_]/.test(ch);
  }

  private isIdentPart(ch: string): boolean {
    return /[a-zA-Z0-9_.-]/.test(ch);
  }

  private lineOf(position: number): number {
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.lineStarts[mid] <= position) lo = mid;
      else hi = mid - 1;
    }
    return lo + 1;
  }

  private emit(type: HclTokenType, value: string, position: number): void {
    const last = value.length > 0 ? position + value.length - 1 : position;
    this.tokens.push({
      type,
      value,
      position,
      line: this.lineOf(position),
      endLine: this.lineOf(last),
    });
  }
}

const PUNCTUATION: Record<string, HclTokenType | undefined> = {
  "{": "LBRACE",
  "}": "RBRACE",
  "[": "LBRACK",
  "]": "RBRACK",
  "=": "ASSIGN",
  ",": "COMMA",
};

/**
 * Syntax error thrown by the HCL lexer, the HCL parser or the JSON parser.
 * Carries the 1-based line and column plus a short excerpt of the source.
 */
export class HclSyntaxError extends Error {
  readonly position: number;
  readonly line: number;
  readonly column: number;

  constructor(message: string, position: number, source: string) {
    const before = source.slice(0, position);
    const line = before.split("\n").length;
    const column = position - before.lastIndexOf("\n");
    const contextStart = Math.max(0, position - 20);
    const contextEnd = Math.min(source.length, position + 20);
    const context = source.slice(contextStart, contextEnd).replace(/\n/g, "\\n");
    super(`At ${line}:${column}: ${message}\n  near: ...${context}...`);
    this.name = "HclSyntaxError";
    this.position = position;
    this.line = line;
    this.column = column;
  }
}
