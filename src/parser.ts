/**
 * Parser - Recursive descent parser for Giu programs.
 *
 * Statements are parsed top-down; expressions use precedence climbing.
 *
 * Grammar (expression levels from lowest to highest precedence):
 *
 * program     = stmt* EOF
 * stmt        = letStmt | fnDecl | structDecl | returnStmt | "break" ";"
 *             | "continue" ";" | whileStmt | forStmt | importStmt | exprStmt
 * letStmt     = "let" IDENT "=" expr ";"
 * fnDecl      = "fn" IDENT "(" params? ")" block ";"?
 * structDecl  = "struct" IDENT "{" (IDENT ":" expr ("," IDENT ":" expr)* ","?)? "}" ";"?
 * returnStmt  = "return" expr? ";"?
 * whileStmt   = "while" "(" expr ")" block
 * forStmt     = "for" "(" IDENT "in" expr ")" block
 *             | "for" "(" (letClause | expr)? ";" expr? ";" expr? ")" block
 * importStmt  = "import" (STRING | IDENT ("." IDENT)*) ("." "{" IDENT ("," IDENT)* "}")? ";"
 * exprStmt    = expr ";"        (";" optional after a block-ended expression or before "}" / EOF)
 *
 * expr        = assignment
 * assignment  = orExpr ("=" assignment)?
 * orExpr      = andExpr ("||" andExpr)*
 * andExpr     = eqExpr ("&&" eqExpr)*
 * eqExpr      = cmpExpr (("==" | "!=") cmpExpr)*
 * cmpExpr     = addExpr (("<" | ">" | "<=" | ">=") addExpr)*
 * addExpr     = mulExpr (("+" | "-") mulExpr)*
 * mulExpr     = unaryExpr (("*" | "/" | "%") unaryExpr)*
 * unaryExpr   = ("!" | "-" | "+") unaryExpr | postfixExpr
 * postfixExpr = primary ("(" args? ")" | "[" expr "]" | "." IDENT)*
 * primary     = INT | STRING | "true" | "false" | "null" | "this"
 *             | IDENT | structLit | "(" expr ")" | array | hash | fnExpr | ifExpr
 * structLit   = IDENT "{" (IDENT ":" expr ("," IDENT ":" expr)* ","?)? "}"
 * fnExpr      = "fn" "(" params? ")" block
 * ifExpr      = "if" "(" expr ")" block ("else" (ifExpr | block))?
 */

import { Token, TokenType, tokenize } from "./lexer";
import type {
  Expr,
  Stmt,
  Block,
  Program,
  BinOp,
  FnExpr,
  IfExpr,
  FieldInit,
  ForClause,
  LetStmt,
  ModuleSource,
  StructDecl,
} from "./ast";

// ============================================================================
// Binary Operator Table
// ============================================================================

const enum Prec {
  Lowest = 0,
  Or,
  And,
  Equality,
  Relational,
  Additive,
  Multiplicative,
}

const BINARY_OPS: Partial<Record<TokenType, { op: BinOp; prec: Prec }>> = {
  OR: { op: "||", prec: Prec.Or },
  AND: { op: "&&", prec: Prec.And },
  EQ: { op: "==", prec: Prec.Equality },
  NEQ: { op: "!=", prec: Prec.Equality },
  LT: { op: "<", prec: Prec.Relational },
  GT: { op: ">", prec: Prec.Relational },
  LTE: { op: "<=", prec: Prec.Relational },
  GTE: { op: ">=", prec: Prec.Relational },
  PLUS: { op: "+", prec: Prec.Additive },
  MINUS: { op: "-", prec: Prec.Additive },
  STAR: { op: "*", prec: Prec.Multiplicative },
  SLASH: { op: "/", prec: Prec.Multiplicative },
  PERCENT: { op: "%", prec: Prec.Multiplicative },
};

// ============================================================================
// Parser Class
// ============================================================================

export class Parser {
  private tokens: Token[];
  private pos: number = 0;

  constructor(tokens: Token[]) {
    if (tokens.length === 0 || tokens[tokens.length - 1].type !== "EOF") {
      const last = tokens[tokens.length - 1];
      tokens = [...tokens, { type: "EOF", value: "", line: last?.line ?? 1, column: last?.column ?? 1 }];
    }
    this.tokens = tokens;
  }

  parseProgram(): Program {
    const program: Program = [];
    while (!this.isAtEnd()) {
      program.push(this.parseStatement());
    }
    return program;
  }

  /**
   * Parse a single expression that must span the whole input.
   */
  parseExpression(): Expr {
    const expr = this.parseExpr();
    if (!this.isAtEnd()) {
      throw this.error("end of input");
    }
    return expr;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private isAtEnd(): boolean {
    return this.peek().type === "EOF";
  }

  private peek(offset: number = 0): Token {
    const i = Math.min(this.pos + offset, this.tokens.length - 1);
    return this.tokens[i];
  }

  private previous(): Token {
    return this.tokens[this.pos - 1];
  }

  private advance(): Token {
    if (!this.isAtEnd()) {
      this.pos++;
    }
    return this.previous();
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  private expect(type: TokenType, expected: string): Token {
    if (this.check(type)) {
      return this.advance();
    }
    throw this.error(expected);
  }

  private error(expected: string): ParseError {
    return new ParseError(this.peek(), expected);
  }

  // ==========================================================================
  // Statements
  // ==========================================================================

  private parseStatement(): Stmt {
    switch (this.peek().type) {
      case "LET":
        return this.parseLetStmt();
      case "FN":
        // `fn name(...)` is a declaration; `fn(...)` is a literal ending at its block
        if (this.peek(1).type === "IDENT") return this.parseFnDecl();
        return this.parseBlockEndedStmt(this.parseFnLiteral());
      case "IF":
        return this.parseBlockEndedStmt(this.parseIfExpr());
      case "STRUCT":
        return this.parseStructDecl();
      case "RETURN":
        return this.parseReturnStmt();
      case "BREAK":
        this.advance();
        this.expect("SEMICOLON", "';' after 'break'");
        return { tag: "break" };
      case "CONTINUE":
        this.advance();
        this.expect("SEMICOLON", "';' after 'continue'");
        return { tag: "continue" };
      case "WHILE":
        return this.parseWhileStmt();
      case "FOR":
        return this.parseForStmt();
      case "IMPORT":
        return this.parseImportStmt();
      default:
        break;
    }
    return this.parseExprStmt();
  }

  private parseLetClause(): LetStmt {
    this.expect("LET", "'let'");
    const name = this.expect("IDENT", "variable name after 'let'").value;
    this.expect("ASSIGN", "'=' after variable name");
    const value = this.parseExpr();
    return { tag: "let", name, value };
  }

  private parseLetStmt(): Stmt {
    const stmt = this.parseLetClause();
    this.expect("SEMICOLON", "';' after let statement");
    return stmt;
  }

  private parseFnDecl(): Stmt {
    this.expect("FN", "'fn'");
    const name = this.expect("IDENT", "function name").value;
    const { params, body } = this.parseFnSignatureAndBody();
    this.match("SEMICOLON");
    const value: FnExpr = { tag: "fn", name, params, body };
    return { tag: "let", name, value };
  }

  private parseStructDecl(): StructDecl {
    this.expect("STRUCT", "'struct'");
    const name = this.expect("IDENT", "struct name").value;
    this.expect("LBRACE", "'{' after struct name");

    const fields: FieldInit[] = [];
    const methods: { name: string; fn: FnExpr }[] = [];
    const seen = new Set<string>();

    while (!this.check("RBRACE")) {
      const nameTok = this.expect("IDENT", "field name in struct definition");
      if (seen.has(nameTok.value)) {
        throw new ParseError(nameTok, `a new field name (duplicate '${nameTok.value}')`);
      }
      seen.add(nameTok.value);
      this.expect("COLON", "':' after field name");
      const value = this.parseExpr();
      if (value.tag === "fn") {
        methods.push({ name: nameTok.value, fn: { ...value, name: nameTok.value } });
      } else {
        fields.push({ name: nameTok.value, value });
      }
      if (!this.match("COMMA")) break;
    }

    this.expect("RBRACE", "'}' to close struct definition");
    this.match("SEMICOLON");
    return { tag: "struct", name, fields, methods };
  }

  private parseReturnStmt(): Stmt {
    this.expect("RETURN", "'return'");
    if (this.match("SEMICOLON")) {
      return { tag: "return", value: null };
    }
    if (this.check("RBRACE") || this.isAtEnd()) {
      return { tag: "return", value: null };
    }
    const value = this.parseExpr();
    this.match("SEMICOLON");
    return { tag: "return", value };
  }

  private parseWhileStmt(): Stmt {
    this.expect("WHILE", "'while'");
    this.expect("LPAREN", "'(' after 'while'");
    const cond = this.parseExpr();
    this.expect("RPAREN", "')' after while condition");
    const body = this.parseBlock();
    return { tag: "while", cond, body };
  }

  private parseForStmt(): Stmt {
    this.expect("FOR", "'for'");
    this.expect("LPAREN", "'(' after 'for'");

    let clause: ForClause;
    if (this.check("IDENT") && this.peek(1).type === "IN") {
      const name = this.advance().value;
      this.advance(); // in
      const iterable = this.parseExpr();
      clause = { kind: "in", name, iterable };
    } else {
      let init: LetStmt | Expr | null = null;
      if (this.check("LET")) {
        init = this.parseLetClause();
      } else if (!this.check("SEMICOLON")) {
        init = this.parseExpr();
      }
      this.expect("SEMICOLON", "';' after for-loop initializer");
      const cond = this.check("SEMICOLON") ? null : this.parseExpr();
      this.expect("SEMICOLON", "';' after for-loop condition");
      const update = this.check("RPAREN") ? null : this.parseExpr();
      clause = { kind: "c", init, cond, update };
    }

    this.expect("RPAREN", "')' to close for-loop header");
    const body = this.parseBlock();
    return { tag: "for", clause, body };
  }

  private parseImportStmt(): Stmt {
    this.expect("IMPORT", "'import'");

    let source: ModuleSource;
    if (this.check("STRING")) {
      source = { kind: "file", path: this.advance().value };
    } else {
      const segments = [this.expect("IDENT", "module path or string after 'import'").value];
      while (this.check("DOT") && this.peek(1).type === "IDENT") {
        this.advance();
        segments.push(this.advance().value);
      }
      source = { kind: "dotted", segments };
    }

    let names: string[] | null = null;
    if (this.match("DOT")) {
      this.expect("LBRACE", "'{' or module name after '.'");
      names = [this.expect("IDENT", "imported name").value];
      while (this.match("COMMA")) {
        if (this.check("RBRACE")) break;
        names.push(this.expect("IDENT", "imported name").value);
      }
      this.expect("RBRACE", "'}' after imported names");
    }

    this.expect("SEMICOLON", "';' after import");
    return { tag: "import", source, names };
  }

  private parseExprStmt(): Stmt {
    const expr = this.parseExpr();
    if (!this.match("SEMICOLON") && !this.check("RBRACE") && !this.isAtEnd()) {
      throw this.error("';' after expression");
    }
    return { tag: "exprStmt", expr };
  }

  /**
   * An `if` or function literal at statement start is the whole statement,
   * so a following line starting with `-`, `(` or `[` is not glued onto it.
   */
  private parseBlockEndedStmt(expr: Expr): Stmt {
    this.match("SEMICOLON");
    return { tag: "exprStmt", expr };
  }

  private parseBlock(): Block {
    this.expect("LBRACE", "'{' to start a block");
    const body: Stmt[] = [];
    while (!this.check("RBRACE")) {
      if (this.isAtEnd()) {
        throw this.error("'}' to close block");
      }
      body.push(this.parseStatement());
    }
    this.advance();
    return { tag: "block", body };
  }

  // ==========================================================================
  // Expressions
  // ==========================================================================

  private parseExpr(): Expr {
    return this.parseAssignment();
  }

  private parseAssignment(): Expr {
    const startTok = this.peek();
    const target = this.parseBinary(Prec.Lowest);

    if (this.check("ASSIGN")) {
      if (target.tag !== "ident" && target.tag !== "index" && target.tag !== "member") {
        throw new ParseError(startTok, "assignable expression (variable, index or field) before '='");
      }
      this.advance();
      const value = this.parseAssignment();
      return { tag: "assign", target, value };
    }

    return target;
  }

  /**
   * Precedence climbing over the binary operator table. All binary operators
   * are left-associative.
   */
  private parseBinary(minPrec: Prec): Expr {
    let left = this.parseUnary();

    while (true) {
      const entry = BINARY_OPS[this.peek().type];
      if (entry === undefined || entry.prec <= minPrec) break;
      this.advance();
      const right = this.parseBinary(entry.prec);
      left = { tag: "binary", op: entry.op, left, right };
    }

    return left;
  }

  private parseUnary(): Expr {
    if (this.match("NOT")) {
      return { tag: "unary", op: "!", operand: this.parseUnary() };
    }
    if (this.match("MINUS")) {
      return { tag: "unary", op: "-", operand: this.parseUnary() };
    }
    if (this.match("PLUS")) {
      return { tag: "unary", op: "+", operand: this.parseUnary() };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): Expr {
    let expr = this.parsePrimary();

    while (true) {
      if (this.match("LPAREN")) {
        const args = this.parseCommaList("RPAREN", () => this.parseExpr());
        this.expect("RPAREN", "')' after arguments");
        expr = { tag: "call", callee: expr, args };
      } else if (this.match("LBRACKET")) {
        const idx = this.parseExpr();
        this.expect("RBRACKET", "']' after index");
        expr = { tag: "index", object: expr, index: idx };
      } else if (this.match("DOT")) {
        const name = this.expect("IDENT", "field or method name after '.'").value;
        expr = { tag: "member", object: expr, name };
      } else {
        break;
      }
    }

    return expr;
  }

  private parsePrimary(): Expr {
    const tok = this.peek();

    switch (tok.type) {
      case "INT":
        this.advance();
        return { tag: "literal", value: { kind: "int", value: BigInt(tok.value) } };

      case "STRING":
        this.advance();
        return { tag: "literal", value: { kind: "string", value: tok.value } };

      case "TRUE":
        this.advance();
        return { tag: "literal", value: { kind: "bool", value: true } };

      case "FALSE":
        this.advance();
        return { tag: "literal", value: { kind: "bool", value: false } };

      case "NULL":
        this.advance();
        return { tag: "literal", value: { kind: "null" } };

      case "THIS":
        this.advance();
        return { tag: "this" };

      case "IDENT":
        if (this.atStructLiteral()) {
          return this.parseStructLiteral();
        }
        this.advance();
        return { tag: "ident", name: tok.value };

      case "LPAREN": {
        this.advance();
        const expr = this.parseExpr();
        this.expect("RPAREN", "')' after expression");
        return expr;
      }

      case "LBRACKET": {
        this.advance();
        const elements = this.parseCommaList("RBRACKET", () => this.parseExpr());
        this.expect("RBRACKET", "']' after array elements");
        return { tag: "array", elements };
      }

      case "LBRACE": {
        this.advance();
        const entries = this.parseCommaList("RBRACE", () => {
          const key = this.parseExpr();
          this.expect("COLON", "':' after map key");
          const value = this.parseExpr();
          return { key, value };
        });
        this.expect("RBRACE", "'}' after map entries");
        return { tag: "hash", entries };
      }

      case "FN":
        return this.parseFnLiteral();

      case "IF":
        return this.parseIfExpr();

      default:
        throw this.error("expression");
    }
  }

  /**
   * An identifier starts a struct literal when it is followed by `{` and then
   * either `}` or `name :`.
   */
  private atStructLiteral(): boolean {
    if (this.peek(1).type !== "LBRACE") return false;
    const third = this.peek(2).type;
    if (third === "RBRACE") return true;
    return third === "IDENT" && this.peek(3).type === "COLON";
  }

  private parseStructLiteral(): Expr {
    const name = this.expect("IDENT", "struct name").value;
    this.expect("LBRACE", "'{' after struct name");
    const fields = this.parseCommaList("RBRACE", () => {
      const fieldName = this.expect("IDENT", "field name").value;
      this.expect("COLON", "':' after field name");
      return { name: fieldName, value: this.parseExpr() };
    });
    this.expect("RBRACE", "'}' after struct fields");
    return { tag: "structLit", name, fields };
  }

  private parseFnLiteral(): FnExpr {
    this.expect("FN", "'fn'");
    const { params, body } = this.parseFnSignatureAndBody();
    return { tag: "fn", params, body };
  }

  private parseFnSignatureAndBody(): { params: string[]; body: Block } {
    this.expect("LPAREN", "'(' before parameters");
    const params = this.parseCommaList("RPAREN", () => this.expect("IDENT", "parameter name").value);
    this.expect("RPAREN", "')' after parameters");
    const body = this.parseBlock();
    return { params, body };
  }

  private parseIfExpr(): IfExpr {
    this.expect("IF", "'if'");
    this.expect("LPAREN", "'(' after 'if'");
    const cond = this.parseExpr();
    this.expect("RPAREN", "')' after if condition");
    const then = this.parseBlock();

    let otherwise: Block | IfExpr | null = null;
    if (this.match("ELSE")) {
      otherwise = this.check("IF") ? this.parseIfExpr() : this.parseBlock();
    }

    return { tag: "if", cond, then, else: otherwise };
  }

  /**
   * Parse `item ("," item)* ","?` up to (not including) the closing token.
   */
  private parseCommaList<T>(close: TokenType, item: () => T): T[] {
    const items: T[] = [];
    while (!this.check(close)) {
      items.push(item());
      if (!this.match("COMMA")) break;
    }
    return items;
  }
}

// ============================================================================
// Errors
// ============================================================================

export class ParseError extends Error {
  public readonly line: number;
  public readonly column: number;

  constructor(
    public readonly token: Token,
    public readonly expected: string
  ) {
    const found = token.type === "EOF" ? "end of input" : `'${token.value}'`;
    super(`Expected ${expected} at line ${token.line}, column ${token.column}. Got ${found}`);
    this.name = "ParseError";
    this.line = token.line;
    this.column = token.column;
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

/**
 * Parse source text into a program.
 * Throws LexerError or ParseError on failure.
 */
export function parse(source: string): Program {
  return new Parser(tokenize(source)).parseProgram();
}

/**
 * Parse source text consisting of exactly one expression.
 */
export function parseExpression(source: string): Expr {
  return new Parser(tokenize(source)).parseExpression();
}
