/**
 * Lexer - Tokenizes source code into tokens.
 *
 * The token stream is lazy: iterating a Lexer scans the source on demand and
 * every new iteration starts again from the beginning.
 */

// ============================================================================
// Token Types
// ============================================================================

export type TokenType =
  // Literals
  | "INT"
  | "STRING"
  | "TRUE"
  | "FALSE"
  | "NULL"
  // Identifiers
  | "IDENT"
  // Keywords
  | "LET"
  | "FN"
  | "STRUCT"
  | "IF"
  | "ELSE"
  | "WHILE"
  | "FOR"
  | "IN"
  | "BREAK"
  | "CONTINUE"
  | "RETURN"
  | "IMPORT"
  | "THIS"
  // Operators
  | "PLUS"
  | "MINUS"
  | "STAR"
  | "SLASH"
  | "PERCENT"
  | "EQ"
  | "NEQ"
  | "LT"
  | "GT"
  | "LTE"
  | "GTE"
  | "AND"
  | "OR"
  | "NOT"
  | "ASSIGN"
  // Punctuation
  | "LPAREN"
  | "RPAREN"
  | "LBRACE"
  | "RBRACE"
  | "LBRACKET"
  | "RBRACKET"
  | "COMMA"
  | "COLON"
  | "DOT"
  | "SEMICOLON"
  // Special
  | "EOF";

export type TokenCategory =
  | "literal"
  | "identifier"
  | "keyword"
  | "operator"
  | "punctuation"
  | "eof";

export interface Token {
  type: TokenType;
  /** Raw lexeme; for strings, the decoded contents without quotes */
  value: string;
  line: number;
  column: number;
}

// ============================================================================
// Keywords
// ============================================================================

const KEYWORDS: Record<string, TokenType> = {
  let: "LET",
  fn: "FN",
  struct: "STRUCT",
  if: "IF",
  else: "ELSE",
  while: "WHILE",
  for: "FOR",
  in: "IN",
  break: "BREAK",
  continue: "CONTINUE",
  return: "RETURN",
  import: "IMPORT",
  this: "THIS",
  true: "TRUE",
  false: "FALSE",
  null: "NULL",
};

const SINGLE_CHAR: Record<string, TokenType> = {
  "+": "PLUS",
  "-": "MINUS",
  "*": "STAR",
  "/": "SLASH",
  "%": "PERCENT",
  "(": "LPAREN",
  ")": "RPAREN",
  "{": "LBRACE",
  "}": "RBRACE",
  "[": "LBRACKET",
  "]": "RBRACKET",
  ",": "COMMA",
  ":": "COLON",
  ".": "DOT",
  ";": "SEMICOLON",
};

export function tokenCategory(type: TokenType): TokenCategory {
  switch (type) {
    case "INT":
    case "STRING":
    case "TRUE":
    case "FALSE":
    case "NULL":
      return "literal";
    case "IDENT":
      return "identifier";
    case "LET":
    case "FN":
    case "STRUCT":
    case "IF":
    case "ELSE":
    case "WHILE":
    case "FOR":
    case "IN":
    case "BREAK":
    case "CONTINUE":
    case "RETURN":
    case "IMPORT":
    case "THIS":
      return "keyword";
    case "PLUS":
    case "MINUS":
    case "STAR":
    case "SLASH":
    case "PERCENT":
    case "EQ":
    case "NEQ":
    case "LT":
    case "GT":
    case "LTE":
    case "GTE":
    case "AND":
    case "OR":
    case "NOT":
    case "ASSIGN":
      return "operator";
    case "LPAREN":
    case "RPAREN":
    case "LBRACE":
    case "RBRACE":
    case "LBRACKET":
    case "RBRACKET":
    case "COMMA":
    case "COLON":
    case "DOT":
    case "SEMICOLON":
      return "punctuation";
    case "EOF":
      return "eof";
  }
}

// ============================================================================
// Lexer Class
// ============================================================================

/**
 * Lazy token stream over a source string. Each iteration starts from the
 * beginning with its own cursor, so iterations never interfere.
 */
export class Lexer implements Iterable<Token> {
  constructor(private readonly source: string) {}

  *[Symbol.iterator](): Iterator<Token> {
    const scanner = new Scanner(this.source);
    while (true) {
      const token = scanner.next();
      yield token;
      if (token.type === "EOF") return;
    }
  }

  tokenize(): Token[] {
    return Array.from(this);
  }
}

/**
 * Cursor over the source for a single pass.
 */
class Scanner {
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;

  constructor(private readonly source: string) {}

  next(): Token {
    this.skipWhitespaceAndComments();
    if (this.isAtEnd()) {
      return { type: "EOF", value: "", line: this.line, column: this.column };
    }
    return this.nextToken();
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(): string {
    return this.source[this.pos] ?? "";
  }

  private peekNext(): string {
    return this.source[this.pos + 1] ?? "";
  }

  private advance(): string {
    const ch = this.source[this.pos] ?? "";
    this.pos++;
    if (ch === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  private skipWhitespaceAndComments(): void {
    while (!this.isAtEnd()) {
      const ch = this.peek();

      if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n") {
        this.advance();
      } else if (ch === "/" && this.peekNext() === "/") {
        while (!this.isAtEnd() && this.peek() !== "\n") {
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  private nextToken(): Token {
    const ch = this.peek();

    if (isDigit(ch)) {
      return this.readNumber();
    }

    if (ch === '"') {
      return this.readString();
    }

    if (isAlpha(ch)) {
      return this.readIdentifier();
    }

    return this.readOperator();
  }

  private readNumber(): Token {
    const line = this.line;
    const column = this.column;
    let value = "";

    while (!this.isAtEnd() && isDigit(this.peek())) {
      value += this.advance();
    }

    return { type: "INT", value, line, column };
  }

  private readString(): Token {
    const line = this.line;
    const column = this.column;
    let value = "";

    this.advance(); // opening "

    while (!this.isAtEnd() && this.peek() !== '"') {
      if (this.peek() === "\\") {
        const escLine = this.line;
        const escColumn = this.column;
        this.advance();
        if (this.isAtEnd()) break;
        const escaped = this.advance();
        switch (escaped) {
          case "n": value += "\n"; break;
          case "t": value += "\t"; break;
          case "r": value += "\r"; break;
          case "\\": value += "\\"; break;
          case '"': value += '"'; break;
          default:
            throw new LexerError(`Invalid escape sequence '\\${escaped}'`, escLine, escColumn);
        }
      } else {
        value += this.advance();
      }
    }

    if (this.isAtEnd()) {
      throw new LexerError("Unterminated string", line, column);
    }

    this.advance(); // closing "

    return { type: "STRING", value, line, column };
  }

  private readIdentifier(): Token {
    const line = this.line;
    const column = this.column;
    let value = "";

    while (!this.isAtEnd() && isAlphaNumeric(this.peek())) {
      value += this.advance();
    }

    const type = KEYWORDS[value] ?? "IDENT";
    return { type, value, line, column };
  }

  private readOperator(): Token {
    const line = this.line;
    const column = this.column;
    const ch = this.advance();
    const make = (type: TokenType, value: string): Token => ({ type, value, line, column });

    const single = SINGLE_CHAR[ch];
    if (single !== undefined) {
      return make(single, ch);
    }

    switch (ch) {
      case "=":
        if (this.peek() === "=") {
          this.advance();
          return make("EQ", "==");
        }
        return make("ASSIGN", "=");

      case "!":
        if (this.peek() === "=") {
          this.advance();
          return make("NEQ", "!=");
        }
        return make("NOT", "!");

      case "<":
        if (this.peek() === "=") {
          this.advance();
          return make("LTE", "<=");
        }
        return make("LT", "<");

      case ">":
        if (this.peek() === "=") {
          this.advance();
          return make("GTE", ">=");
        }
        return make("GT", ">");

      case "&":
        if (this.peek() === "&") {
          this.advance();
          return make("AND", "&&");
        }
        throw new LexerError("Unexpected character '&'. Did you mean '&&'?", line, column);

      case "|":
        if (this.peek() === "|") {
          this.advance();
          return make("OR", "||");
        }
        throw new LexerError("Unexpected character '|'. Did you mean '||'?", line, column);

      default:
        throw new LexerError(`Unexpected character '${ch}'`, line, column);
    }
  }
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isAlpha(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
}

function isAlphaNumeric(ch: string): boolean {
  return isAlpha(ch) || isDigit(ch);
}

// ============================================================================
// Token Text
// ============================================================================

/**
 * Render a token as source text. Re-lexing the text of a literal token gives
 * back an equal token (apart from position).
 */
export function tokenText(token: Token): string {
  if (token.type === "STRING") {
    return quoteString(token.value);
  }
  return token.value;
}

export function quoteString(value: string): string {
  let out = '"';
  for (const ch of value) {
    switch (ch) {
      case "\n": out += "\\n"; break;
      case "\t": out += "\\t"; break;
      case "\r": out += "\\r"; break;
      case "\\": out += "\\\\"; break;
      case '"': out += '\\"'; break;
      default: out += ch;
    }
  }
  return out + '"';
}

// ============================================================================
// Errors
// ============================================================================

export class LexerError extends Error {
  constructor(
    public readonly reason: string,
    public readonly line: number,
    public readonly column: number
  ) {
    super(`${reason} at line ${line}, column ${column}`);
    this.name = "LexerError";
  }
}

// ============================================================================
// Convenience Function
// ============================================================================

export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
