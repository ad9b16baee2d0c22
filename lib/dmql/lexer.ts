import type { SyntaxErrorInfo, Token, TokenType } from "./types";

export const KEYWORDS = new Set([
  "USE",
  "DATABASE",
  "FROM",
  "WHERE",
  "RELEVANCE",
  "TO",
  "GROUP",
  "BY",
  "ORDER",
  "ASC",
  "DESC",
  "MINE",
  "CLUSTER",
  "STATISTICS",
  "ANOMALIES",
  "ASSOCIATION_RULES",
  "CLASSIFICATION",
  "REGRESSION",
  "WITH",
  "DISPLAY",
  "AS",
  "AND",
  "OR",
  "NOT",
  "BETWEEN",
  "LIKE",
  "IS",
  "NULL",
  "IN",
]);

/**
 * Turns DMQL source into tokens. Unknown characters and unterminated strings
 * are recorded in `errors` and skipped, so tokenizing always reaches EOF.
 */
export class Lexer {
  private input: string;
  private position: number = 0;
  private line: number = 1;
  private lineStart: number = 0;
  private tokens: Token[] = [];
  readonly errors: SyntaxErrorInfo[] = [];

  constructor(input: string) {
    this.input = input;
  }

  tokenize(): Token[] {
    while (this.position < this.input.length) {
      this.skipWhitespaceAndComments();

      if (this.position >= this.input.length) break;

      const char = this.input[this.position];

      if (char === "*") {
        this.emit("STAR", "*", 1);
      } else if (char === ",") {
        this.emit("COMMA", ",", 1);
      } else if (char === ".") {
        this.emit("DOT", ".", 1);
      } else if (char === "(") {
        this.emit("LPAREN", "(", 1);
      } else if (char === ")") {
        this.emit("RPAREN", ")", 1);
      } else if (char === "+" || char === "-" || char === "/") {
        this.emit("ARITHMETIC", char, 1);
      } else if (char === "=") {
        this.emit("OPERATOR", "=", 1);
      } else if (char === "!" && this.peek() === "=") {
        this.emit("OPERATOR", "!=", 2);
      } else if (char === ">") {
        if (this.peek() === "=") {
          this.emit("OPERATOR", ">=", 2);
        } else {
          this.emit("OPERATOR", ">", 1);
        }
      } else if (char === "<") {
        if (this.peek() === "=") {
          this.emit("OPERATOR", "<=", 2);
        } else if (this.peek() === ">") {
          this.emit("OPERATOR", "!=", 2);
        } else {
          this.emit("OPERATOR", "<", 1);
        }
      } else if (char === "'" || char === '"') {
        this.tokenizeString(char);
      } else if (this.isDigit(char)) {
        this.tokenizeNumber();
      } else if (this.isAlpha(char)) {
        this.tokenizeIdentifierOrKeyword();
      } else {
        this.error(`token recognition error at: '${char}'`, this.column());
        this.position++;
      }
    }

    this.tokens.push({
      type: "EOF",
      value: "",
      text: "<EOF>",
      position: this.position,
      line: this.line,
      column: this.column(),
    });
    return this.tokens;
  }

  private emit(type: TokenType, value: string, length: number): void {
    this.tokens.push({
      type,
      value,
      text: this.input.slice(this.position, this.position + length),
      position: this.position,
      line: this.line,
      column: this.column(),
    });
    this.position += length;
  }

  private skipWhitespaceAndComments(): void {
    while (this.position < this.input.length) {
      const char = this.input[this.position];

      if (char === "\n") {
        this.position++;
        this.line++;
        this.lineStart = this.position;
      } else if (/\s/.test(char)) {
        this.position++;
      } else if (char === "-" && this.peek() === "-") {
        while (this.position < this.input.length && this.input[this.position] !== "\n") {
          this.position++;
        }
      } else {
        break;
      }
    }
  }

  private column(): number {
    return this.position - this.lineStart;
  }

  private error(message: string, column: number): void {
    this.errors.push({ line: this.line, column, message });
  }

  private peek(offset: number = 1): string {
    return this.input[this.position + offset] || "";
  }

  private isDigit(char: string): boolean {
    return /[0-9]/.test(char);
  }

  private isAlpha(char: string): boolean {
    return /[a-zA-Z_]/.test(char);
  }

  private isAlphaNumeric(char: string): boolean {
    return /[a-zA-Z0-9_]/.test(char);
  }

  private tokenizeString(quote: string): void {
    const start = this.position;
    const startColumn = this.column();
    let end = start + 1;

    while (end < this.input.length && this.input[end] !== quote && this.input[end] !== "\n") {
      end++;
    }

    if (end >= this.input.length || this.input[end] !== quote) {
      // Drop the rest of the line; the string cannot be recovered
      this.error(`token recognition error at: '${this.input.slice(start, end)}'`, startColumn);
      this.position = end;
      return;
    }

    this.tokens.push({
      type: "STRING",
      value: this.input.slice(start + 1, end),
      text: this.input.slice(start, end + 1),
      position: start,
      line: this.line,
      column: startColumn,
    });
    this.position = end + 1;
  }

  private tokenizeNumber(): void {
    const start = this.position;
    let type: TokenType = "INTEGER";

    while (this.position < this.input.length && this.isDigit(this.input[this.position])) {
      this.position++;
    }

    if (this.input[this.position] === "." && this.isDigit(this.peek())) {
      type = "FLOAT";
      this.position++;
      while (this.position < this.input.length && this.isDigit(this.input[this.position])) {
        this.position++;
      }
    }

    const text = this.input.slice(start, this.position);
    this.tokens.push({
      type,
      value: text,
      text,
      position: start,
      line: this.line,
      column: start - this.lineStart,
    });
  }

  private tokenizeIdentifierOrKeyword(): void {
    const start = this.position;

    while (this.position < this.input.length && this.isAlphaNumeric(this.input[this.position])) {
      this.position++;
    }

    const text = this.input.slice(start, this.position);
    const upperValue = text.toUpperCase();
    const type: TokenType = KEYWORDS.has(upperValue) ? "KEYWORD" : "IDENTIFIER";

    this.tokens.push({
      type,
      value: type === "KEYWORD" ? upperValue : text,
      text,
      position: start,
      line: this.line,
      column: start - this.lineStart,
    });
  }
}
