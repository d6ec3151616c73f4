/**
 * Tests for the REPL's line handling.
 */
import { describe, it, expect } from "vitest";

import { BufferHost, MemorySourceReader, createInterpreter } from "../src/index";
import { Repl } from "../src/repl";

function setup(): { repl: Repl; lines: string[]; host: BufferHost } {
  const lines: string[] = [];
  const host = new BufferHost();
  const interpreter = createInterpreter({ host, reader: new MemorySourceReader(), baseDir: "/project" });
  const repl = new Repl({ interpreter, print: line => lines.push(line) });
  return { repl, lines, host };
}

describe("REPL Tests", () => {
  it("prints non-null results and keeps bindings between lines", () => {
    const { repl, lines } = setup();
    expect(repl.processInput("let x = 5;")).toBe("continue");
    repl.processInput("x * 2 + 1");
    repl.processInput('"a" + "b"');
    repl.processInput("null");
    expect(lines).toEqual(["11", "ab"]);
  });

  it("sends program output to the host", () => {
    const { repl, lines, host } = setup();
    repl.processInput('println("hi")');
    expect(host.output).toBe("hi\n");
    expect(lines).toEqual([]);
  });

  it("reports errors and keeps going", () => {
    const { repl, lines } = setup();
    expect(repl.processInput("missing")).toBe("continue");
    repl.processInput("let = 1;");
    repl.processInput("@");
    expect(lines).toEqual([
      "Runtime error: Undefined variable: 'missing'",
      "Parse error: Expected variable name after 'let' at line 1, column 5. Got '='",
      "Lexer error: Unexpected character '@' at line 1, column 1",
    ]);
  });

  it("sends error reports to printError when given", () => {
    const lines: string[] = [];
    const errors: string[] = [];
    const interpreter = createInterpreter({ host: new BufferHost(), reader: new MemorySourceReader(), baseDir: "/project" });
    const repl = new Repl({ interpreter, print: line => lines.push(line), printError: line => errors.push(line) });
    repl.processInput("1 / 0");
    repl.processInput("7");
    expect(errors).toEqual(["Runtime error: Division by zero"]);
    expect(lines).toEqual(["7"]);
  });

  it("exits on exit, quit and :exit", () => {
    const { repl } = setup();
    expect(repl.processInput("exit")).toBe("exit");
    expect(repl.processInput("  quit  ")).toBe("exit");
    expect(repl.processInput(":exit")).toBe("exit");
  });

  it("ignores blank lines", () => {
    const { repl, lines } = setup();
    expect(repl.processInput("   ")).toBe("continue");
    expect(lines).toEqual([]);
  });

  it("toggles AST mode", () => {
    const { repl, lines } = setup();
    repl.processInput(":ast");
    expect(repl.mode).toBe("ast");
    repl.processInput("1 + 2");
    expect(lines[0]).toBe("Mode set to: ast");
    expect(JSON.parse(lines[1])).toEqual([
      {
        tag: "exprStmt",
        expr: {
          tag: "binary",
          op: "+",
          left: { tag: "literal", value: { kind: "int", value: 1 } },
          right: { tag: "literal", value: { kind: "int", value: 2 } },
        },
      },
    ]);
    repl.processInput(":ast");
    expect(lines[2]).toBe("Mode set to: eval");
  });

  it("lists commands and rejects unknown ones", () => {
    const { repl, lines } = setup();
    repl.processInput(":help");
    expect(lines[0]).toBe("Commands:");
    expect(lines).toContain("  exit, quit    Leave the REPL");
    lines.length = 0;
    repl.processInput(":nope");
    expect(lines).toEqual(["Unknown command: :nope. Type :help for available commands."]);
  });
});
