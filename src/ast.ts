/**
 * Abstract syntax tree for Giu programs.
 *
 * Statements and expressions are plain tagged records. Every statement form
 * the parser recognizes maps to exactly one node kind.
 */

import { quoteString } from "./lexer";

// ============================================================================
// Expressions
// ============================================================================

export type Expr =
  | LiteralExpr
  | IdentExpr
  | ThisExpr
  | BinaryExpr
  | UnaryExpr
  | CallExpr
  | IndexExpr
  | MemberExpr
  | ArrayExpr
  | HashExpr
  | StructLiteralExpr
  | FnExpr
  | IfExpr
  | AssignExpr;

export type LiteralValue =
  | { kind: "int"; value: bigint }
  | { kind: "string"; value: string }
  | { kind: "bool"; value: boolean }
  | { kind: "null" };

export interface LiteralExpr {
  tag: "literal";
  value: LiteralValue;
}

export interface IdentExpr {
  tag: "ident";
  name: string;
}

export interface ThisExpr {
  tag: "this";
}

export type BinOp =
  | "+" | "-" | "*" | "/" | "%"
  | "==" | "!=" | "<" | ">" | "<=" | ">="
  | "&&" | "||";

export type UnaryOp = "-" | "+" | "!";

export interface BinaryExpr {
  tag: "binary";
  op: BinOp;
  left: Expr;
  right: Expr;
}

export interface UnaryExpr {
  tag: "unary";
  op: UnaryOp;
  operand: Expr;
}

export interface CallExpr {
  tag: "call";
  callee: Expr;
  args: Expr[];
}

export interface IndexExpr {
  tag: "index";
  object: Expr;
  index: Expr;
}

export interface MemberExpr {
  tag: "member";
  object: Expr;
  name: string;
}

export interface ArrayExpr {
  tag: "array";
  elements: Expr[];
}

export interface HashExpr {
  tag: "hash";
  entries: { key: Expr; value: Expr }[];
}

export interface FieldInit {
  name: string;
  value: Expr;
}

export interface StructLiteralExpr {
  tag: "structLit";
  name: string;
  fields: FieldInit[];
}

export interface FnExpr {
  tag: "fn";
  /** Set for `fn name(...) {}` declarations; used in displays */
  name?: string;
  params: string[];
  body: Block;
}

export interface IfExpr {
  tag: "if";
  cond: Expr;
  then: Block;
  else: Block | IfExpr | null;
}

export type AssignTarget = IdentExpr | IndexExpr | MemberExpr;

export interface AssignExpr {
  tag: "assign";
  target: AssignTarget;
  value: Expr;
}

// ============================================================================
// Statements
// ============================================================================

export type Stmt =
  | LetStmt
  | ExprStmt
  | ReturnStmt
  | BreakStmt
  | ContinueStmt
  | WhileStmt
  | ForStmt
  | ImportStmt
  | StructDecl;

export interface Block {
  tag: "block";
  body: Stmt[];
}

export interface LetStmt {
  tag: "let";
  name: string;
  value: Expr;
}

export interface ExprStmt {
  tag: "exprStmt";
  expr: Expr;
}

export interface ReturnStmt {
  tag: "return";
  value: Expr | null;
}

export interface BreakStmt {
  tag: "break";
}

export interface ContinueStmt {
  tag: "continue";
}

export interface WhileStmt {
  tag: "while";
  cond: Expr;
  body: Block;
}

/**
 * `for (x in xs) {}` or `for (init; cond; update) {}`.
 */
export type ForClause =
  | { kind: "in"; name: string; iterable: Expr }
  | { kind: "c"; init: LetStmt | Expr | null; cond: Expr | null; update: Expr | null };

export interface ForStmt {
  tag: "for";
  clause: ForClause;
  body: Block;
}

export type ModuleSource =
  | { kind: "dotted"; segments: string[] }
  | { kind: "file"; path: string };

/**
 * `names === null` binds the module itself (dotted form) or merges every
 * export (file form); otherwise only the listed names are bound.
 */
export interface ImportStmt {
  tag: "import";
  source: ModuleSource;
  names: string[] | null;
}

export interface StructDecl {
  tag: "struct";
  name: string;
  fields: FieldInit[];
  methods: { name: string; fn: FnExpr }[];
}

export type Program = Stmt[];

// ============================================================================
// Constructors
// ============================================================================

export const int = (value: bigint | number): LiteralExpr => ({
  tag: "literal",
  value: { kind: "int", value: BigInt(value) },
});
export const str = (value: string): LiteralExpr => ({ tag: "literal", value: { kind: "string", value } });
export const bool = (value: boolean): LiteralExpr => ({ tag: "literal", value: { kind: "bool", value } });
export const nil: LiteralExpr = { tag: "literal", value: { kind: "null" } };

export const ident = (name: string): IdentExpr => ({ tag: "ident", name });
export const thisExpr: ThisExpr = { tag: "this" };
export const binary = (op: BinOp, left: Expr, right: Expr): BinaryExpr => ({ tag: "binary", op, left, right });
export const unary = (op: UnaryOp, operand: Expr): UnaryExpr => ({ tag: "unary", op, operand });
export const call = (callee: Expr, ...args: Expr[]): CallExpr => ({ tag: "call", callee, args });
export const index = (object: Expr, idx: Expr): IndexExpr => ({ tag: "index", object, index: idx });
export const member = (object: Expr, name: string): MemberExpr => ({ tag: "member", object, name });
export const array = (...elements: Expr[]): ArrayExpr => ({ tag: "array", elements });
export const block = (...body: Stmt[]): Block => ({ tag: "block", body });

export const fn = (params: string[], body: Block, name?: string): FnExpr =>
  name === undefined ? { tag: "fn", params, body } : { tag: "fn", name, params, body };

export const assign = (target: AssignTarget, value: Expr): AssignExpr => ({ tag: "assign", target, value });
export const letStmt = (name: string, value: Expr): LetStmt => ({ tag: "let", name, value });
export const exprStmt = (expr: Expr): ExprStmt => ({ tag: "exprStmt", expr });

// ============================================================================
// Pretty Printing
// ============================================================================

export function exprToString(expr: Expr): string {
  switch (expr.tag) {
    case "literal":
      return literalToString(expr.value);
    case "ident":
      return expr.name;
    case "this":
      return "this";
    case "binary":
      return `(${exprToString(expr.left)} ${expr.op} ${exprToString(expr.right)})`;
    case "unary":
      return `${expr.op}${exprToString(expr.operand)}`;
    case "call":
      return `${exprToString(expr.callee)}(${expr.args.map(exprToString).join(", ")})`;
    case "index":
      return `${exprToString(expr.object)}[${exprToString(expr.index)}]`;
    case "member":
      return `${exprToString(expr.object)}.${expr.name}`;
    case "array":
      return `[${expr.elements.map(exprToString).join(", ")}]`;
    case "hash":
      return `{${expr.entries.map(e => `${exprToString(e.key)}: ${exprToString(e.value)}`).join(", ")}}`;
    case "structLit":
      return `${expr.name} {${expr.fields.map(f => ` ${f.name}: ${exprToString(f.value)}`).join(",")}${expr.fields.length > 0 ? " " : ""}}`;
    case "fn":
      return `fn(${expr.params.join(", ")}) ${blockToString(expr.body)}`;
    case "if": {
      const head = `if (${exprToString(expr.cond)}) ${blockToString(expr.then)}`;
      if (expr.else === null) return head;
      const tail = expr.else.tag === "block" ? blockToString(expr.else) : exprToString(expr.else);
      return `${head} else ${tail}`;
    }
    case "assign":
      return `${exprToString(expr.target)} = ${exprToString(expr.value)}`;
  }
}

function literalToString(lit: LiteralValue): string {
  switch (lit.kind) {
    case "int":
      return lit.value.toString();
    case "string":
      return quoteString(lit.value);
    case "bool":
      return lit.value ? "true" : "false";
    case "null":
      return "null";
  }
}

export function blockToString(b: Block): string {
  if (b.body.length === 0) return "{ }";
  return `{ ${b.body.map(stmtToString).join(" ")} }`;
}

export function stmtToString(stmt: Stmt): string {
  switch (stmt.tag) {
    case "let":
      return `let ${stmt.name} = ${exprToString(stmt.value)};`;
    case "exprStmt":
      return `${exprToString(stmt.expr)};`;
    case "return":
      return stmt.value === null ? "return;" : `return ${exprToString(stmt.value)};`;
    case "break":
      return "break;";
    case "continue":
      return "continue;";
    case "while":
      return `while (${exprToString(stmt.cond)}) ${blockToString(stmt.body)}`;
    case "for": {
      const c = stmt.clause;
      if (c.kind === "in") {
        return `for (${c.name} in ${exprToString(c.iterable)}) ${blockToString(stmt.body)}`;
      }
      const init = c.init === null ? "" : c.init.tag === "let" ? stmtToString(c.init).slice(0, -1) : exprToString(c.init);
      const cond = c.cond === null ? "" : ` ${exprToString(c.cond)}`;
      const update = c.update === null ? "" : ` ${exprToString(c.update)}`;
      return `for (${init};${cond};${update}) ${blockToString(stmt.body)}`;
    }
    case "import": {
      const src = stmt.source.kind === "file" ? quoteString(stmt.source.path) : stmt.source.segments.join(".");
      const names = stmt.names === null ? "" : `.{${stmt.names.join(", ")}}`;
      return `import ${src}${names};`;
    }
    case "struct": {
      const entries = [
        ...stmt.fields.map(f => `${f.name}: ${exprToString(f.value)}`),
        ...stmt.methods.map(m => `${m.name}: ${exprToString(m.fn)}`),
      ];
      return `struct ${stmt.name} { ${entries.join(", ")} }`;
    }
  }
}

export function programToString(program: Program): string {
  return program.map(stmtToString).join("\n");
}
