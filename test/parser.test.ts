/**
 * Tests for the parser.
 */
import { describe, it, expect } from "vitest";

import { parse, parseExpression, ParseError, exprToString, stmtToString, programToString } from "../src/index";
import {
  array,
  assign,
  binary,
  block,
  bool,
  call,
  exprStmt,
  fn,
  ident,
  index,
  int,
  letStmt,
  member,
  nil,
  str,
  thisExpr,
  unary,
} from "../src/ast";

function show(source: string): string {
  return exprToString(parseExpression(source));
}

function parseError(source: string): ParseError {
  try {
    parse(source);
  } catch (e) {
    if (e instanceof ParseError) return e;
    throw e;
  }
  throw new Error(`expected a ParseError for ${source}`);
}

describe("Parser Tests", () => {
  describe("expression precedence", () => {
    it("binds * tighter than +", () => {
      expect(show("1 + 2 * 3")).toBe("(1 + (2 * 3))");
      expect(show("(1 + 2) * 3")).toBe("((1 + 2) * 3)");
    });

    it("is left-associative for binary operators", () => {
      expect(show("a - b - c")).toBe("((a - b) - c)");
      expect(show("a / b % c")).toBe("((a / b) % c)");
    });

    it("orders every level from || down to *", () => {
      expect(show("a || b && c == d < e + f * g")).toBe("(a || (b && (c == (d < (e + (f * g))))))");
    });

    it("binds prefix operators tighter than binary ones", () => {
      expect(show("-x * 2")).toBe("(-x * 2)");
      expect(show("!a && b")).toBe("(!a && b)");
      expect(show("- -1")).toBe("--1");
    });

    it("parses right-associative assignment", () => {
      expect(parseExpression("a = b = 3")).toEqual(assign(ident("a"), assign(ident("b"), int(3))));
    });

    it("parses postfix chains", () => {
      expect(show("f(1, 2)(3)")).toBe("f(1, 2)(3)");
      expect(show("a.b[0].c(x)")).toBe("a.b[0].c(x)");
      expect(parseExpression("a.b[0].c(x)")).toEqual(
        call(member(index(member(ident("a"), "b"), int(0)), "c"), ident("x"))
      );
    });

    it("accepts trailing commas", () => {
      expect(show("[1, 2,]")).toBe("[1, 2]");
      expect(show("f(a, b,)")).toBe("f(a, b)");
      expect(show('{"a": 1, 2: true,}')).toBe('{"a": 1, 2: true}');
    });

    it("keeps large integer literals exact", () => {
      expect(parseExpression("123456789012345678901234567890")).toEqual(int(123456789012345678901234567890n));
    });
  });

  describe("literals", () => {
    it("parses struct literals by lookahead", () => {
      const expr = parseExpression('Point { x: 1, y: "two" }');
      expect(expr).toEqual({
        tag: "structLit",
        name: "Point",
        fields: [
          { name: "x", value: int(1) },
          { name: "y", value: { tag: "literal", value: { kind: "string", value: "two" } } },
        ],
      });
      expect(parseExpression("Empty {}")).toEqual({ tag: "structLit", name: "Empty", fields: [] });
    });

    it("parses hash literals", () => {
      const expr = parseExpression('{ "a": 1, 2: [3] }');
      expect(expr.tag).toBe("hash");
      if (expr.tag === "hash") {
        expect(expr.entries).toHaveLength(2);
      }
    });

    it("parses function literals and if-expressions", () => {
      expect(show("fn(a, b) { a + b }")).toBe("fn(a, b) { (a + b); }");
      expect(show("if (x) { 1 } else if (y) { 2 } else { 3 }")).toBe("if (x) { 1; } else if (y) { 2; } else { 3; }");
    });
  });

  describe("statements", () => {
    it("parses let", () => {
      expect(parse("let x = 5;")).toEqual([letStmt("x", int(5))]);
    });

    it("parses named function declarations as bindings", () => {
      expect(parse("fn add(a, b) { a + b }")).toEqual([
        {
          tag: "let",
          name: "add",
          value: {
            tag: "fn",
            name: "add",
            params: ["a", "b"],
            body: block(exprStmt(binary("+", ident("a"), ident("b")))),
          },
        },
      ]);
    });

    it("splits struct fields from methods", () => {
      const [stmt] = parse("struct Point { x: 0, y: 0, sum: fn() { this.x + this.y } }");
      expect(stmt.tag).toBe("struct");
      if (stmt.tag === "struct") {
        expect(stmt.name).toBe("Point");
        expect(stmt.fields.map(f => f.name)).toEqual(["x", "y"]);
        expect(stmt.methods.map(m => m.name)).toEqual(["sum"]);
        expect(stmt.methods[0].fn.name).toBe("sum");
      }
    });

    it("rejects duplicate struct fields", () => {
      expect(parseError("struct P { x: 1, x: 2 }").message).toBe(
        "Expected a new field name (duplicate 'x') at line 1, column 18. Got 'x'"
      );
    });

    it("parses for-in loops", () => {
      const [stmt] = parse("for (x in xs) { println(x); }");
      expect(stmt).toMatchObject({ tag: "for", clause: { kind: "in", name: "x", iterable: ident("xs") } });
    });

    it("parses C-style for loops", () => {
      const [stmt] = parse("for (let i = 0; i < 3; i = i + 1) { }");
      expect(stmtToString(stmt)).toBe("for (let i = 0; (i < 3); i = (i + 1)) { }");
      expect(stmtToString(parse("for (;;) { break; }")[0])).toBe("for (;;) { break; }");
    });

    it("parses while, return, break and continue", () => {
      const [stmt] = parse("while (true) { if (done) { break; } continue; }");
      expect(stmtToString(stmt)).toBe("while (true) { if (done) { break; }; continue; }");
      expect(parse("fn f() { return; }")[0]).toMatchObject({
        value: { body: { body: [{ tag: "return", value: null }] } },
      });
    });

    it("parses the three import forms", () => {
      expect(parse("import a.b;")).toEqual([
        { tag: "import", source: { kind: "dotted", segments: ["a", "b"] }, names: null },
      ]);
      expect(parse("import std.math.{abs, pow};")).toEqual([
        { tag: "import", source: { kind: "dotted", segments: ["std", "math"] }, names: ["abs", "pow"] },
      ]);
      expect(parse('import "lib/util.giu";')).toEqual([
        { tag: "import", source: { kind: "file", path: "lib/util.giu" }, names: null },
      ]);
    });

    it("lets block-ended expressions omit the semicolon", () => {
      expect(parse("if (x) { 1 } else { 2 } y;")).toHaveLength(2);
      expect(parse("fn(){ 1 } 2")).toHaveLength(2);
    });

    it("ends a leading if at its closing brace", () => {
      expect(parse('if (true) { println("a"); }\n-1;\nprintln("b");')).toEqual([
        exprStmt({ tag: "if", cond: bool(true), then: block(exprStmt(call(ident("println"), str("a")))), else: null }),
        exprStmt(unary("-", int(1))),
        exprStmt(call(ident("println"), str("b"))),
      ]);
      expect(parse("if (x) { } else { }\n[nil, this];")).toEqual([
        exprStmt({ tag: "if", cond: ident("x"), then: block(), else: block() }),
        exprStmt(array(nil, thisExpr)),
      ]);
    });

    it("ends a leading function literal at its closing brace", () => {
      expect(parse("fn() { 1 }\n(2);")).toEqual([exprStmt(fn([], block(exprStmt(int(1))))), exprStmt(int(2))]);
      expect(parse("fn(a) { a };")).toEqual([exprStmt(fn(["a"], block(exprStmt(ident("a")))))]);
    });

    it("lets the last expression in a block or program omit the semicolon", () => {
      expect(parse("while (c) { x }")).toHaveLength(1);
      expect(parse("x")).toEqual([exprStmt(ident("x"))]);
    });
  });

  describe("errors", () => {
    it("requires semicolons between statements", () => {
      const err = parseError("let x = 1 let y = 2;");
      expect(err.message).toBe("Expected ';' after let statement at line 1, column 11. Got 'let'");
      expect(err.token.type).toBe("LET");
      expect(err.expected).toBe("';' after let statement");
    });

    it("requires semicolons after plain expressions", () => {
      expect(parseError("x\ny").message).toBe("Expected ';' after expression at line 2, column 1. Got 'y'");
    });

    it("requires parentheses around conditions", () => {
      expect(parseError("if x { }").message).toBe("Expected '(' after 'if' at line 1, column 4. Got 'x'");
    });

    it("reports unclosed blocks at end of input", () => {
      expect(parseError("fn f() { 1").message).toBe("Expected '}' to close block at line 1, column 11. Got end of input");
    });

    it("rejects assignment to non-assignable expressions", () => {
      expect(parseError("1 = 2;").message).toBe(
        "Expected assignable expression (variable, index or field) before '=' at line 1, column 1. Got '1'"
      );
    });
  });

  it("parses printed programs back to the same tree", () => {
    const source = `
      let x = [1, 2, 3];
      let total = 0;
      for (v in x) { total = total + v; }
      if (total > 5) { println("big"); } else { println("small"); }
      let h = {"k": -1};
      h["k"] = !false;
    `;
    const program = parse(source);
    expect(parse(programToString(program))).toEqual(program);
  });
});
